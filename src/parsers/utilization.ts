import {
  cellByHeader,
  parseNumber,
  pipeTables,
  runExtractors,
  type FieldExtractor,
  type PipeTable,
} from './extract.js';
import type { ModuleUtilization, ResourceKind, ResourceUsage, Utilization } from './types.js';

// Site names differ between device families (Slice on 7-series, CLB on UltraScale)
const RESOURCE_ROWS: Record<ResourceKind, RegExp> = {
  lut: /^(?:Slice|CLB) LUTs\*?$/i,
  ff: /^(?:Slice|CLB) Registers\*?$/i,
  bram: /^Block RAM Tile$/i,
  dsp: /^DSPs?$/i,
  io: /^(?:Bonded IOB|Bonded User I\/O)$/i,
};

function resourceRow(kind: ResourceKind): FieldExtractor<ResourceKind, ResourceUsage> {
  return {
    field: kind,
    required: true,
    extract: (raw) => findResource(pipeTables(raw, ['Site Type', 'Used', 'Available']), RESOURCE_ROWS[kind]),
  };
}

function findResource(tables: PipeTable[], name: RegExp): ResourceUsage | undefined {
  for (const table of tables) {
    for (const row of table.rows) {
      if (!name.test(row.cells[0] ?? '')) {
        continue;
      }
      const used = parseNumber(cellByHeader(table, row, 'Used'));
      const available = parseNumber(cellByHeader(table, row, 'Available'));
      const percent = parseNumber(cellByHeader(table, row, 'Util%'));
      if (used === undefined || available === undefined) {
        return undefined;
      }
      return {
        used,
        available,
        percent: percent ?? (available > 0 ? Number(((used / available) * 100).toFixed(2)) : 0),
      };
    }
  }
  return undefined;
}

export const UTILIZATION_FIELDS: ReadonlyArray<FieldExtractor<ResourceKind, ResourceUsage>> = [
  resourceRow('lut'),
  resourceRow('ff'),
  resourceRow('bram'),
  resourceRow('dsp'),
  resourceRow('io'),
];

/**
 * Rows of a `report_utilization -hierarchical` table
 * Instance names are indented two blanks per level below the top.
 */
export function parseModuleTable(raw: string): ModuleUtilization[] {
  const modules: ModuleUtilization[] = [];

  for (const table of pipeTables(raw, ['Instance', 'Module'])) {
    for (const row of table.rows) {
      const resources: Record<string, number> = {};
      let instance = '';
      let module = '';
      let depth = 0;

      table.headers.forEach((header, index) => {
        const cell = row.cells[index] ?? '';
        if (header === 'Instance') {
          instance = cell;
          const printed = row.rawCells[index] ?? '';
          const indent = printed.length - printed.trimStart().length;
          depth = Math.max(0, Math.floor((indent - 1) / 2));
        } else if (header === 'Module') {
          module = cell;
        } else {
          const value = parseNumber(cell);
          if (value !== undefined) {
            resources[header] = value;
          }
        }
      });

      if (instance) {
        modules.push({ instance, module, depth, resources });
      }
    }
  }

  return modules;
}

/**
 * Parse report_utilization output
 */
export function parseUtilization(raw: string): Utilization {
  const { values, missing } = runExtractors(raw, UTILIZATION_FIELDS);

  const utilization: Utilization = {
    kind: 'utilization',
    raw,
    ...values,
    parseIncomplete: missing.length > 0,
    missingFields: missing,
  };

  const modules = parseModuleTable(raw);
  if (modules.length > 0) {
    utilization.modules = modules;
  }

  return utilization;
}
