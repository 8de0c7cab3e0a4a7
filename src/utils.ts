import fs from 'node:fs';
import path from 'node:path';
import _ from 'lodash';

type FlatObject = Record<string, unknown>;

export const PROJECT_ROOT = path.resolve(__dirname, '..');

export function isPlainObject(value: unknown): value is FlatObject {
  return _.isPlainObject(value);
}

export function resolveDataDir(): string {
  return process.env.REPLAY_DATA_DIR ? path.resolve(process.env.REPLAY_DATA_DIR) : path.join(PROJECT_ROOT, 'data');
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
    } else {
      res[newKey] = value;
    }
  }, result);
}

export function toCsv(rows: FlatObject[]): string {
  if (rows.length === 0) return '';
  const flatRows = rows.map((row) => flattenObject(row));
  const headerKeys = _.uniq(flatRows.flatMap((row) => Object.keys(row)));
  const lines = flatRows.map((record) =>
    headerKeys
      .map((key) => {
        const value = record[key];
        if (value === null || value === undefined) return '';
        const str = String(value);
        return str.includes(',') || str.includes('"') || str.includes('\n')
          ? `"${str.replace(/"/g, '""')}"`
          : str;
      })
      .join(','),
  );
  return [headerKeys.join(','), ...lines].join('\n');
}

export function readJson(pathname: string): unknown {
  return JSON.parse(fs.readFileSync(pathname, 'utf-8'));
}

export function writeFile(pathname: string, contents: string): void {
  fs.mkdirSync(path.dirname(pathname), { recursive: true });
  fs.writeFileSync(pathname, contents);
}

export function writeJson(pathname: string, value: unknown): void {
  writeFile(pathname, JSON.stringify(value, null, 2));
}

/** Replay ids are the directory names under `<data>/replays`. */
export function listReplayIds(dataDir: string, only?: string): string[] {
  const replaysDir = path.join(dataDir, 'replays');
  if (!fs.existsSync(replaysDir)) {
    throw new Error(`Replay directory not found at ${replaysDir}`);
  }
  return fs
    .readdirSync(replaysDir)
    .filter((entry) => fs.statSync(path.join(replaysDir, entry)).isDirectory())
    .filter((entry) => only === undefined || entry === only)
    .sort((a, b) => a.localeCompare(b));
}
