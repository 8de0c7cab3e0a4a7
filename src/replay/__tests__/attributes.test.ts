import { test } from 'node:test';
import assert from 'node:assert';
import {
  decodeAttribute,
  decodeAttributes,
  formatAttribute,
  groupAttributesByOwner,
  stripTrailingNulls,
} from '../attributes';
import { AttributeCode, lookupAttribute } from '../attributeCodes';
import { parseCodeTables } from '../codeTables';
import { MalformedValueError, UnknownCodeError } from '../errors';
import type { RawAttributeRecord } from '../types';

function record(code: number, value: string, ownerIndex: number = 1): RawAttributeRecord {
  return { header: 0xe7, code, ownerIndex, rawValue: Buffer.from(value, 'latin1') };
}

test('stripTrailingNulls removes only the trailing run of nulls', () => {
  assert.deepEqual(Array.from(stripTrailingNulls(Uint8Array.from([1, 0, 2, 0, 0]))), [1, 0, 2]);
  assert.deepEqual(Array.from(stripTrailingNulls(Uint8Array.from([7, 8]))), [7, 8]);
  assert.deepEqual(Array.from(stripTrailingNulls(Uint8Array.from([0, 0, 0]))), []);
});

test('race attribute is resolved through the race table', () => {
  const attr = decodeAttribute(record(0x0bb9, 'Terr\x00\x00'));
  assert.deepEqual(attr, { code: 0x0bb9, ownerIndex: 1, displayName: 'Race', value: 'Terran' });
});

test('team slot attribute decodes to the integer in its first character', () => {
  const attr = decodeAttribute(record(0x07d2, '2\x00'));
  assert.equal(attr.displayName, 'Teams1v1');
  assert.strictEqual(attr.value, 2);
});

test('unknown codes keep the stripped raw value', () => {
  const attr = decodeAttribute(record(0x1234, 'a\x00b\x00\x00', 16));
  assert.equal(attr.displayName, 'Unknown');
  assert.equal(attr.value, 'a\x00b');
  assert.equal(attr.ownerIndex, 16);
});

test('handicap has no transform and stays a string', () => {
  const attr = decodeAttribute(record(AttributeCode.Handicap, '100\x00'));
  assert.equal(attr.displayName, 'Handicap');
  assert.strictEqual(attr.value, '100');
});

test('an all-null value strips to the empty key', () => {
  const attr = decodeAttribute(record(AttributeCode.Category, '\x00\x00\x00\x00', 16));
  assert.equal(attr.value, 'Single');
});

test('a missing secondary table entry raises UnknownCodeError', () => {
  assert.throws(
    () => decodeAttribute(record(AttributeCode.Race, 'Xxxx', 3)),
    (err: unknown) =>
      err instanceof UnknownCodeError &&
      err.table === 'race' &&
      err.key === 'Xxxx' &&
      err.ownerIndex === 3 &&
      err.message === 'No "race" entry for "Xxxx" (attribute 0x0BB9, owner 3)',
  );
});

test('a team slot without a leading digit raises MalformedValueError', () => {
  assert.throws(() => decodeAttribute(record(AttributeCode.Teams2v2, 'T1\x00')), MalformedValueError);
});

test('decodeAttributes skips bad records and keeps going', () => {
  const result = decodeAttributes([
    record(AttributeCode.Race, 'Zerg', 1),
    record(AttributeCode.Race, 'Nope', 2),
    record(0x0bc2, 'Dflt\x00', 16),
  ]);
  assert.deepEqual(
    result.attributes.map((attr) => attr.value),
    ['Zerg', 'Dflt'],
  );
  assert.equal(result.skipped.length, 1);
  assert.ok(result.skipped[0] instanceof UnknownCodeError);
  assert.equal(result.skipped[0].ownerIndex, 2);
});

test('groupAttributesByOwner orders owners numerically', () => {
  const { attributes } = decodeAttributes([
    record(AttributeCode.GameSpeed, 'Fasr', 16),
    record(AttributeCode.Race, 'Prot', 2),
    record(AttributeCode.GameType, '1v1\x00', 16),
    record(AttributeCode.Race, 'Terr', 1),
  ]);
  const grouped = groupAttributesByOwner(attributes);
  assert.deepEqual(Array.from(grouped.keys()), [1, 2, 16]);
  assert.deepEqual(
    grouped.get(16)?.map((attr) => attr.displayName),
    ['Game Speed', 'Game Type'],
  );
});

test('formatAttribute shows owner, name and value', () => {
  assert.equal(formatAttribute(decodeAttribute(record(AttributeCode.Color, 'tc02', 4))), '[4] Color: Blue');
});

test('every team slot code uses the computed transform', () => {
  [0x07d2, 0x07d3, 0x07d4, 0x07d5, 0x07d6, 0x07d7].forEach((code) => {
    assert.equal(lookupAttribute(code)?.transform.kind, 'computed');
  });
  assert.equal(lookupAttribute(0x0bc2), undefined);
});

test('parseCodeTables requires every named table', () => {
  assert.throws(() => parseCodeTables({ race: { Prot: 'Protoss' } }), /Code table "playerType" missing/);
  assert.throws(
    () =>
      parseCodeTables({
        playerType: {},
        gameFormat: {},
        gameSpeed: {},
        race: { Prot: 7 },
        teamColor: {},
        difficulty: {},
        gameCategory: {},
      }),
    /Code table "race" maps "Prot" to a non-string label/,
  );
});
