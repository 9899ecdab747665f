import { tokenizeTclList } from './extract.js';
import type { DesignObject, ObjectList, ObjectListKind, ObjectType } from './types.js';

const OBJECT_TYPES: Record<ObjectListKind, ObjectType> = {
  hierarchy: 'instance',
  ports: 'port',
  nets: 'net',
  cells: 'cell',
};

// Properties printed after the name in `name|value|...` rows
export const DEFAULT_ATTRIBUTES: Record<ObjectListKind, string[]> = {
  hierarchy: ['REF_NAME'],
  ports: ['DIRECTION'],
  nets: ['TYPE'],
  cells: ['REF_NAME'],
};

const MESSAGE_LINE = /^(?:ERROR|CRITICAL WARNING|WARNING|INFO):/;
const BUS_BIT = /^(.*)\[(\d+)\]$/;

interface Entry {
  name: string;
  attributes: Record<string, string>;
}

function readEntries(raw: string, attributeNames: string[]): Entry[] {
  const entries: Entry[] = [];

  for (const line of raw.split('\n')) {
    const trimmed = line.trim();
    if (!trimmed || MESSAGE_LINE.test(trimmed)) {
      continue;
    }

    if (trimmed.includes('|')) {
      const [name = '', ...values] = trimmed.split('|').map((cell) => cell.trim());
      if (!name) {
        continue;
      }
      const attributes: Record<string, string> = {};
      values.forEach((value, index) => {
        const key = attributeNames[index] ?? `ATTR${index + 1}`;
        if (value) {
          attributes[key] = value;
        }
      });
      entries.push({ name, attributes });
      continue;
    }

    for (const name of tokenizeTclList(trimmed)) {
      entries.push({ name, attributes: {} });
    }
  }

  return entries;
}

function toObject(entry: Entry, type: ObjectType): DesignObject {
  const object: DesignObject = { name: entry.name, type, attributes: entry.attributes };
  const direction = entry.attributes.DIRECTION;
  if (direction) {
    object.direction = direction.toLowerCase();
  }
  const refName = entry.attributes.REF_NAME;
  if (refName) {
    object.refName = refName;
  }
  return object;
}

/**
 * Fold `name[i]` bits into one bus record, keeping first-seen order
 */
function groupBuses(entries: Entry[], type: ObjectType): DesignObject[] {
  const objects: DesignObject[] = [];
  const buses = new Map<string, DesignObject>();

  for (const entry of entries) {
    const bit = BUS_BIT.exec(entry.name);
    const base = bit?.[1];
    const index = bit?.[2];
    if (base === undefined || index === undefined || type === 'instance') {
      objects.push(toObject(entry, type));
      continue;
    }

    const position = Number(index);
    const bus = buses.get(base);
    if (!bus) {
      const created = toObject({ name: base, attributes: entry.attributes }, type);
      created.width = 1;
      created.range = { msb: position, lsb: position };
      buses.set(base, created);
      objects.push(created);
      continue;
    }

    bus.width = (bus.width ?? 0) + 1;
    const range = bus.range ?? { msb: position, lsb: position };
    bus.range = { msb: Math.max(range.msb, position), lsb: Math.min(range.lsb, position) };
  }

  return objects;
}

/**
 * Parse list-shaped query output (plain Tcl list or `name|attr|...` rows)
 * Hierarchy entries keep their bracketed names and get a depth instead of
 * bus grouping.
 */
export function parseObjectList<K extends ObjectListKind>(
  kind: K,
  raw: string,
  attributeNames: string[] = DEFAULT_ATTRIBUTES[kind]
): ObjectList<K> {
  const type = OBJECT_TYPES[kind];
  const objects = groupBuses(readEntries(raw, attributeNames), type);

  if (type === 'instance') {
    for (const object of objects) {
      object.depth = object.name.split('/').length - 1;
    }
  }

  const meaningful = raw.split('\n').some((line) => line.trim() && !MESSAGE_LINE.test(line.trim()));
  const missing = meaningful && objects.length === 0 ? ['objects'] : [];

  return {
    kind,
    raw,
    objects,
    parseIncomplete: missing.length > 0,
    missingFields: missing,
  };
}
