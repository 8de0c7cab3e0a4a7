import fs from 'node:fs';
import path from 'node:path';
import _ from 'lodash';
import { isPlainObject } from '../utils';

const PROJECT_ROOT = path.resolve(__dirname, '..', '..');
const CODE_TABLES_PATH = path.join(PROJECT_ROOT, 'attribute-codes.json');

export const CODE_TABLE_NAMES = [
  'playerType',
  'gameFormat',
  'gameSpeed',
  'race',
  'teamColor',
  'difficulty',
  'gameCategory',
] as const;

export type CodeTableName = (typeof CODE_TABLE_NAMES)[number];
export type CodeTable = Readonly<Record<string, string>>;
export type CodeTables = Readonly<Record<CodeTableName, CodeTable>>;

let tablesCache: CodeTables | null = null;

function readTable(source: Record<string, unknown>, name: CodeTableName): CodeTable {
  if (!(name in source)) {
    throw new Error(`Code table "${name}" missing from ${CODE_TABLES_PATH}`);
  }
  const raw = source[name];
  if (!isPlainObject(raw)) {
    throw new Error(`Code table "${name}" in ${CODE_TABLES_PATH} must be an object`);
  }
  const table: Record<string, string> = {};
  Object.entries(raw).forEach(([key, label]: [string, unknown]) => {
    if (typeof label !== 'string') {
      throw new Error(`Code table "${name}" maps "${key}" to a non-string label`);
    }
    table[key] = label;
  });
  return Object.freeze(table);
}

export function parseCodeTables(raw: unknown): CodeTables {
  if (!isPlainObject(raw)) {
    throw new Error(`Expected an object of code tables in ${CODE_TABLES_PATH}`);
  }
  return Object.freeze({
    playerType: readTable(raw, 'playerType'),
    gameFormat: readTable(raw, 'gameFormat'),
    gameSpeed: readTable(raw, 'gameSpeed'),
    race: readTable(raw, 'race'),
    teamColor: readTable(raw, 'teamColor'),
    difficulty: readTable(raw, 'difficulty'),
    gameCategory: readTable(raw, 'gameCategory'),
  });
}

export function loadCodeTables(): CodeTables {
  if (tablesCache !== null) return tablesCache;
  if (!fs.existsSync(CODE_TABLES_PATH)) {
    throw new Error(`Attribute code tables not found at ${CODE_TABLES_PATH}`);
  }
  tablesCache = parseCodeTables(JSON.parse(fs.readFileSync(CODE_TABLES_PATH, 'utf-8')));
  return tablesCache;
}

export function lookupCode(table: CodeTableName, key: string): string | undefined {
  const entries = loadCodeTables()[table];
  return _.has(entries, key) ? entries[key] : undefined;
}
