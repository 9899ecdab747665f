import { describe, it, expect } from '@jest/globals';
import { formatTime, normalizeDuration, parseSimulationTime, toFemtoseconds } from '../../../src/simulation/time.js';
import { InvalidArgumentError } from '../../../src/errors.js';

describe('simulation time', () => {
  it('should read the first time value in simulator output', () => {
    expect(parseSimulationTime('1000 ns')).toEqual({ value: 1000, unit: 'ns' });
    expect(parseSimulationTime('Stopped at time : 12.5 us : File "tb.v"')).toEqual({ value: 12.5, unit: 'us' });
    expect(parseSimulationTime('no time here')).toBeUndefined();
  });

  it('should compare values in different units', () => {
    expect(toFemtoseconds({ value: 1, unit: 'us' })).toBe(toFemtoseconds({ value: 1000, unit: 'ns' }));
    expect(formatTime({ value: 2, unit: 'ps' })).toBe('2 ps');
  });

  describe('normalizeDuration', () => {
    it('should default bare numbers to nanoseconds', () => {
      expect(normalizeDuration('100')).toBe('100ns');
      expect(normalizeDuration(' 1.5 US ')).toBe('1.5us');
    });

    it('should reject zero and garbage', () => {
      expect(() => normalizeDuration('0ns')).toThrow(InvalidArgumentError);
      expect(() => normalizeDuration('10 sec')).toThrow(InvalidArgumentError);
      expect(() => normalizeDuration('-5ns')).toThrow(InvalidArgumentError);
    });
  });
});
