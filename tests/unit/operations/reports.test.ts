import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { v4 as uuidv4 } from 'uuid';
import {
  generateFullReport,
  readReportLines,
  readReportSection,
  reportCommand,
} from '../../../src/operations/reports.js';
import { getHostStatus } from '../../../src/operations/host.js';
import type { OperationContext } from '../../../src/operations/types.js';
import { InvalidArgumentError, ReportNotFoundError } from '../../../src/errors.js';
import { ScriptedRunner } from '../../helpers/scripted-runner.js';
import { createTestContext } from '../../helpers/context.js';

describe('report operations', () => {
  let directory: string;
  let runner: ScriptedRunner;
  let ctx: OperationContext;

  beforeEach(() => {
    directory = path.join(os.tmpdir(), `eda-bridge-report-ops-test-${uuidv4()}`);
    runner = new ScriptedRunner();
    ctx = createTestContext(runner, directory);
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  describe('reportCommand', () => {
    it('should map known types and options', () => {
      expect(reportCommand('timing')).toBe('report_timing -max_paths 100');
      expect(reportCommand('timing', { numPaths: 5 })).toBe('report_timing -max_paths 5');
      expect(reportCommand('utilization', { hierarchical: true })).toBe('report_utilization -hierarchical');
      expect(reportCommand('drc')).toBe('report_drc');
    });

    it('should fall back to report_<type>', () => {
      expect(reportCommand('route_status')).toBe('report_route_status');
    });

    it('should reject bad arguments', () => {
      expect(() => reportCommand('timing; exit')).toThrow(InvalidArgumentError);
      expect(() => reportCommand('timing', { numPaths: 0 })).toThrow(InvalidArgumentError);
    });
  });

  describe('generateFullReport', () => {
    const drcText = ['Report DRC', 'Checks found: 2', 'NSTD-1 Unspecified I/O Standard', 'UCIO-1 Unconstrained Logical Port', ''].join('\n');

    it('should write the report to a file and return only its location', async () => {
      runner.on((command) => (command.startsWith('report_drc -file ') ? drcText : undefined));

      const result = await generateFullReport(ctx, 'drc');

      expect(result.success).toBe(true);
      expect(result.reportType).toBe('drc');
      const artifact = result.artifact;
      expect(artifact?.filePath).toBe(path.join(directory, `drc_${artifact?.reportId}.txt`));
      expect(runner.commands).toEqual([`report_drc -file {${artifact?.filePath}}`]);
      expect(artifact?.lineCount).toBe(4);
      expect(artifact?.totalLength).toBe(drcText.length);
    });

    it('should read the generated report back by id', async () => {
      runner.on((command) => (command.startsWith('report_drc -file ') ? drcText : undefined));
      const result = await generateFullReport(ctx, 'drc');
      const reportId = result.artifact?.reportId ?? '';

      const window = await readReportLines(ctx, { reportId }, { searchPattern: 'ucio', numLines: 1 });
      const section = await readReportSection(ctx, { reportId }, 0, 10);

      expect(window.matchLine).toBe(4);
      expect(window.startLine).toBe(4);
      expect(window.content).toBe('UCIO-1 Unconstrained Logical Port\n');
      expect(section.content).toBe('Report DRC');
      expect(section.hasMore).toBe(true);
    });

    it('should report a command that fails', async () => {
      runner.on(() => 'ERROR: [Common 17-53] User Exception: No open design.');

      const result = await generateFullReport(ctx, 'power');

      expect(result.success).toBe(false);
      expect(result.artifact).toBeUndefined();
      expect(result.error).toBe('ERROR: [Common 17-53] User Exception: No open design.');
    });
  });

  it('should reject an unknown report id', async () => {
    await expect(readReportLines(ctx, { reportId: 'deadbeef' })).rejects.toThrow(ReportNotFoundError);
  });

  it('should describe the host', () => {
    const status = getHostStatus(true);

    expect(status.hostname).toBe(os.hostname());
    expect(status.sessionActive).toBe(true);
    expect(status.memoryTotalGb).toBeGreaterThanOrEqual(status.memoryFreeGb);
    expect(status.memoryPercentUsed).toBeGreaterThanOrEqual(0);
    expect(status.memoryPercentUsed).toBeLessThanOrEqual(100);
  });
});
