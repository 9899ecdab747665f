import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs, writeFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import { ReportStore } from '../../../src/reports/store.js';
import {
  FileNotFoundError,
  InvalidArgumentError,
  RangeOutOfBoundsError,
  ReportNotFoundError,
} from '../../../src/errors.js';
import { ScriptedRunner } from '../../helpers/scripted-runner.js';
import { silentLogger } from '../../helpers/session.js';

describe('ReportStore', () => {
  let directory: string;
  let store: ReportStore;

  beforeEach(() => {
    directory = path.join(os.tmpdir(), `eda-bridge-reports-test-${uuidv4()}`);
    store = new ReportStore({ directory, cacheHours: 1, logger: silentLogger });
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  const numberedLines = (count: number): string =>
    Array.from({ length: count }, (_, i) => `line ${i + 1}\n`).join('');

  describe('envelopeWithArtifact', () => {
    it('should spill truncated content to an artifact', async () => {
      const content = `${'x'.repeat(50)}\n${'y'.repeat(50)}`;

      const result = await store.envelopeWithArtifact(content, 20, 'timing');

      expect(result.truncated).toBe(true);
      expect(result.content).toBe('x'.repeat(20));
      expect(result.reportId).toMatch(/^[0-9a-f]{8}$/);
      expect(result.artifactPath).toBe(path.join(directory, `timing_${result.reportId}.txt`));
      expect(await fs.readFile(path.join(directory, `timing_${result.reportId}.txt`), 'utf-8')).toBe(content);
    });

    it('should not write anything when content fits', async () => {
      const result = await store.envelopeWithArtifact('short', 20, 'timing');

      expect(result.artifactPath).toBeUndefined();
      expect(store.list()).toEqual([]);
    });
  });

  describe('readReportSection', () => {
    it('should clip a range running past the end', async () => {
      const artifact = await store.save(`${'x'.repeat(50)}\n${'y'.repeat(50)}`, 'drc');

      const section = await store.readReportSection(artifact.filePath, 95, 10);

      expect(section.content).toBe('yyyyyy');
      expect(section.returnedLength).toBe(6);
      expect(section.totalLength).toBe(101);
      expect(section.hasMore).toBe(false);
    });

    it('should report more content after a middle range', async () => {
      const artifact = await store.save('abcdefghij', 'drc');

      const section = await store.readReportSection(artifact.filePath, 2, 3);

      expect(section.content).toBe('cde');
      expect(section.hasMore).toBe(true);
    });

    it('should reject an offset past the end', async () => {
      const artifact = await store.save('abcdefghij', 'drc');

      await expect(store.readReportSection(artifact.filePath, 10, 5)).rejects.toBeInstanceOf(RangeOutOfBoundsError);
      await expect(store.readReportSection(artifact.filePath, 200, 5)).rejects.toBeInstanceOf(RangeOutOfBoundsError);
      await expect(store.readReportSection(artifact.filePath, -1, 5)).rejects.toBeInstanceOf(InvalidArgumentError);
    });

    it('should raise FileNotFound for a missing file', async () => {
      await expect(store.readReportSection(path.join(directory, 'nope.txt'), 0, 10)).rejects.toBeInstanceOf(
        FileNotFoundError
      );
    });
  });

  describe('readReportLines', () => {
    it('should return a line window', async () => {
      const artifact = await store.save(numberedLines(20), 'timing');

      const window = await store.readReportLines({ reportId: artifact.reportId }, { startLine: 3, numLines: 2 });

      expect(window.content).toBe('line 3\nline 4\n');
      expect(window.startLine).toBe(3);
      expect(window.endLine).toBe(4);
      expect(window.totalLines).toBe(20);
      expect(window.returnedLines).toBe(2);
    });

    it('should open the window a quarter before the first match', async () => {
      const artifact = await store.save(numberedLines(20), 'timing');

      const window = await store.readReportLines(
        { filePath: artifact.filePath },
        { searchPattern: 'LINE 12', numLines: 8 }
      );

      expect(window.matchLine).toBe(12);
      expect(window.startLine).toBe(10);
      expect(window.endLine).toBe(17);
      expect(window.content.split('\n')[0]).toBe('line 10');
    });

    it('should warn when the pattern is not found', async () => {
      const artifact = await store.save(numberedLines(5), 'timing');

      const window = await store.readReportLines({ reportId: artifact.reportId }, { searchPattern: 'slack' });

      expect(window.returnedLines).toBe(0);
      expect(window.warning).toBe("Pattern 'slack' not found in file");
    });

    it('should reject an invalid search pattern', async () => {
      const artifact = await store.save(numberedLines(5), 'timing');

      await expect(
        store.readReportLines({ reportId: artifact.reportId }, { searchPattern: '(' })
      ).rejects.toBeInstanceOf(InvalidArgumentError);
    });
  });

  describe('resolve', () => {
    it('should find an artifact by id from the directory alone', async () => {
      const artifact = await store.save('content\n', 'clocks');
      const other = new ReportStore({ directory, cacheHours: 1, logger: silentLogger });

      expect(await other.resolve({ reportId: artifact.reportId })).toBe(artifact.filePath);
    });

    it('should raise ReportNotFound for an unknown id', async () => {
      await expect(store.resolve({ reportId: 'deadbeef' })).rejects.toBeInstanceOf(ReportNotFoundError);
    });
  });

  it('should delete artifacts past the retention window', async () => {
    const artifact = await store.save('old\n', 'power');

    const removed = await store.cleanup(Date.now() + 2 * 3600 * 1000);

    expect(removed).toBe(1);
    expect(store.lookup(artifact.reportId)).toBeUndefined();
    await expect(store.resolve({ reportId: artifact.reportId })).rejects.toBeInstanceOf(ReportNotFoundError);
  });

  describe('generateFullReport', () => {
    it('should index the file the engine wrote', async () => {
      const runner = new ScriptedRunner().on((command) => {
        const match = /-file \{(.+)\}$/.exec(command);
        if (match?.[1]) {
          writeFileSync(match[1], 'WNS(ns): 1.0\n');
          return '';
        }
        return undefined;
      });

      const result = await store.generateFullReport(runner, 'report_timing_summary', { reportType: 'timing_summary' });

      expect(result.success).toBe(true);
      expect(result.artifact?.lineCount).toBe(1);
      expect(result.artifact?.sizeBytes).toBe(13);
      expect(runner.commands).toEqual([`report_timing_summary -file {${result.artifact?.filePath}}`]);
    });

    it('should write printed output when no file appears', async () => {
      const runner = new ScriptedRunner().on(() => 'printed report');
      const destinationPath = path.join(directory, 'custom', 'out.txt');

      const result = await store.generateFullReport(runner, 'report_drc', { reportType: 'drc', destinationPath });

      expect(result.artifact?.filePath).toBe(destinationPath);
      expect(await fs.readFile(destinationPath, 'utf-8')).toBe('printed report');
    });

    it('should return the engine error when the command fails', async () => {
      const runner = new ScriptedRunner().on(() => 'ERROR: [Common 17-69] Command failed: no open design');

      const result = await store.generateFullReport(runner, 'report_power', { reportType: 'power' });

      expect(result.success).toBe(false);
      expect(result.error).toBe('ERROR: [Common 17-69] Command failed: no open design');
    });
  });
});
