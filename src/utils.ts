import fs from 'node:fs';
import path from 'node:path';
import _ from 'lodash';

type FlatObject = Record<string, unknown>;

export function isPlainObject(value: unknown): value is FlatObject {
  return _.isPlainObject(value);
}

export function flattenObject(
  obj: FlatObject,
  parentKey: string = '',
  result: FlatObject = {},
): FlatObject {
  return _.transform(obj, (res: FlatObject, value: unknown, key: string) => {
    const newKey = parentKey ? `${parentKey}_${key}` : key;

    if (isPlainObject(value)) {
      // Recurse into nested plain objects
      flattenObject(value, newKey, res);
    } else if (Array.isArray(value)) {
      res[newKey] = value.length;
    } else {
      res[newKey] = value;
    }
  }, result);
}

export function readJson(pathname: string): unknown {
  return JSON.parse(fs.readFileSync(pathname, 'utf-8'));
}

export function writeJson(pathname: string, value: unknown): void {
  fs.mkdirSync(path.dirname(pathname), { recursive: true });
  fs.writeFileSync(pathname, `${JSON.stringify(value, null, 2)}\n`);
}

export function listSeasons(root: string): string[] {
  if (!fs.existsSync(root)) return [];
  return fs
    .readdirSync(root)
    .filter((entry) => /^\d{4}$/.test(entry))
    .filter((entry) => fs.statSync(path.join(root, entry)).isDirectory())
    .sort();
}

export function listJsonFiles(dir: string): string[] {
  if (!fs.existsSync(dir)) return [];
  return fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.json'))
    .sort()
    .map((f) => path.join(dir, f));
}
