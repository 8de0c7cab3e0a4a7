import type { CodeTableName } from './codeTables';

export const AttributeCode = {
  PlayerType: 0x01f4,
  GameType: 0x07d1,
  Teams1v1: 0x07d2,
  Teams2v2: 0x07d3,
  Teams3v3: 0x07d4,
  Teams4v4: 0x07d5,
  TeamsFFA: 0x07d6,
  Teams5v5: 0x07d7,
  GameSpeed: 0x0bb8,
  Race: 0x0bb9,
  Color: 0x0bba,
  Handicap: 0x0bbb,
  Difficulty: 0x0bbc,
  Category: 0x0bc1,
} as const;

export type AttributeCode = (typeof AttributeCode)[keyof typeof AttributeCode];

export type ValueTransform =
  | { kind: 'none' }
  | { kind: 'lookup'; table: CodeTableName }
  | { kind: 'computed'; compute: (value: string) => number | null };

export interface AttributeDefinition {
  displayName: string;
  transform: ValueTransform;
}

// Team slot attributes carry the team number as their first character.
const firstDigit = (value: string): number | null => (/^\d/.test(value) ? Number(value[0]) : null);

const ATTRIBUTE_TABLE: Readonly<Record<AttributeCode, AttributeDefinition>> = {
  [AttributeCode.PlayerType]: { displayName: 'Player Type', transform: { kind: 'lookup', table: 'playerType' } },
  [AttributeCode.GameType]: { displayName: 'Game Type', transform: { kind: 'lookup', table: 'gameFormat' } },
  [AttributeCode.GameSpeed]: { displayName: 'Game Speed', transform: { kind: 'lookup', table: 'gameSpeed' } },
  [AttributeCode.Race]: { displayName: 'Race', transform: { kind: 'lookup', table: 'race' } },
  [AttributeCode.Color]: { displayName: 'Color', transform: { kind: 'lookup', table: 'teamColor' } },
  [AttributeCode.Handicap]: { displayName: 'Handicap', transform: { kind: 'none' } },
  [AttributeCode.Difficulty]: { displayName: 'Difficulty', transform: { kind: 'lookup', table: 'difficulty' } },
  [AttributeCode.Category]: { displayName: 'Category', transform: { kind: 'lookup', table: 'gameCategory' } },
  [AttributeCode.Teams1v1]: { displayName: 'Teams1v1', transform: { kind: 'computed', compute: firstDigit } },
  [AttributeCode.Teams2v2]: { displayName: 'Teams2v2', transform: { kind: 'computed', compute: firstDigit } },
  [AttributeCode.Teams3v3]: { displayName: 'Teams3v3', transform: { kind: 'computed', compute: firstDigit } },
  [AttributeCode.Teams4v4]: { displayName: 'Teams4v4', transform: { kind: 'computed', compute: firstDigit } },
  [AttributeCode.TeamsFFA]: { displayName: 'TeamsFFA', transform: { kind: 'computed', compute: firstDigit } },
  [AttributeCode.Teams5v5]: { displayName: 'Teams5v5', transform: { kind: 'computed', compute: firstDigit } },
};

const KNOWN_CODES: ReadonlySet<number> = new Set<number>(Object.values(AttributeCode));

export function isAttributeCode(code: number): code is AttributeCode {
  return KNOWN_CODES.has(code);
}

export function lookupAttribute(code: number): AttributeDefinition | undefined {
  return isAttributeCode(code) ? ATTRIBUTE_TABLE[code] : undefined;
}
