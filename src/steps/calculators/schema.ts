import fs from 'node:fs';
import { SCHEMA_PATH } from '../../config';
import { isPlainObject } from '../../utils';

let schemaStatsCache: Set<string> | null = null;
let groupsCache: Record<string, string[]> | null = null;

export function loadSchemaStats(): Set<string> | null {
  if (schemaStatsCache !== null) return schemaStatsCache;
  const groups = loadSchemaGroups();
  if (!groups) {
    schemaStatsCache = null;
    return null;
  }
  schemaStatsCache = new Set(Object.values(groups).flat());
  return schemaStatsCache;
}

export function parseSchemaGroups(schema: unknown): Record<string, string[]> {
  const groups = isPlainObject(schema) && isPlainObject(schema.groups) ? schema.groups : {};
  const out: Record<string, string[]> = {};
  Object.entries(groups).forEach(([groupName, groupValue]) => {
    const stats = isPlainObject(groupValue) && isPlainObject(groupValue.stats) ? groupValue.stats : {};
    out[groupName] = Object.keys(stats);
  });
  return out;
}

export function loadSchemaGroups(schemaPath: string = SCHEMA_PATH): Record<string, string[]> | null {
  if (groupsCache !== null && schemaPath === SCHEMA_PATH) return groupsCache;
  if (!fs.existsSync(schemaPath)) {
    return null;
  }
  try {
    const out = parseSchemaGroups(JSON.parse(fs.readFileSync(schemaPath, 'utf-8')));
    if (schemaPath === SCHEMA_PATH) groupsCache = out;
    return out;
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.warn(`Failed to parse stats schema at ${schemaPath}: ${message}`);
    return null;
  }
}
