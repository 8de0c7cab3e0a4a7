import _ from 'lodash';
import { lookupAttribute } from './attributeCodes';
import type { ValueTransform } from './attributeCodes';
import { lookupCode } from './codeTables';
import { AttributeDecodeError, MalformedValueError, UnknownCodeError } from './errors';
import type { Attribute, AttributeValue, RawAttributeRecord } from './types';

export const UNKNOWN_ATTRIBUTE_NAME = 'Unknown';

// Attributes owned by this index describe the game rather than a player.
export const GLOBAL_OWNER_INDEX = 16;

export interface DecodeBatchResult {
  attributes: Attribute[];
  skipped: AttributeDecodeError[];
}

export function stripTrailingNulls(bytes: Uint8Array): Uint8Array {
  let end = bytes.length;
  while (end > 0 && bytes[end - 1] === 0) {
    end -= 1;
  }
  return bytes.subarray(0, end);
}

function applyTransform(record: RawAttributeRecord, transform: ValueTransform, stripped: string): AttributeValue {
  switch (transform.kind) {
    case 'none':
      return stripped;
    case 'lookup': {
      const label = lookupCode(transform.table, stripped);
      if (label === undefined) {
        throw new UnknownCodeError(record.code, record.ownerIndex, transform.table, stripped);
      }
      return label;
    }
    case 'computed': {
      const computed = transform.compute(stripped);
      if (computed === null) {
        throw new MalformedValueError(record.code, record.ownerIndex, stripped);
      }
      return computed;
    }
  }
}

export function decodeAttribute(record: RawAttributeRecord): Attribute {
  // Attribute values are single-byte text, so latin1 keeps a 1:1 byte mapping.
  const stripped = Buffer.from(stripTrailingNulls(record.rawValue)).toString('latin1');
  const definition = lookupAttribute(record.code);
  const base = { code: record.code, ownerIndex: record.ownerIndex };

  if (!definition) {
    return { ...base, displayName: UNKNOWN_ATTRIBUTE_NAME, value: stripped };
  }

  return {
    ...base,
    displayName: definition.displayName,
    value: applyTransform(record, definition.transform, stripped),
  };
}

/**
 * Decodes every record in order. A record that fails to decode is logged and
 * left out; anything other than a decode failure propagates.
 */
export function decodeAttributes(records: Iterable<RawAttributeRecord>): DecodeBatchResult {
  const attributes: Attribute[] = [];
  const skipped: AttributeDecodeError[] = [];
  for (const record of records) {
    try {
      attributes.push(decodeAttribute(record));
    } catch (err) {
      if (!(err instanceof AttributeDecodeError)) throw err;
      console.warn(`Skipping attribute record: ${err.message}`);
      skipped.push(err);
    }
  }
  return { attributes, skipped };
}

export function groupAttributesByOwner(attributes: Attribute[]): Map<number, Attribute[]> {
  const grouped = _.groupBy(attributes, (attr) => attr.ownerIndex);
  return new Map(
    Object.entries(grouped)
      .map(([owner, attrs]): [number, Attribute[]] => [Number(owner), attrs])
      .sort(([a], [b]) => a - b),
  );
}

export function findAttribute(attributes: Attribute[], displayName: string): Attribute | undefined {
  return attributes.find((attr) => attr.displayName === displayName);
}

export function formatAttribute(attr: Attribute): string {
  return `[${attr.ownerIndex}] ${attr.displayName}: ${attr.value}`;
}
