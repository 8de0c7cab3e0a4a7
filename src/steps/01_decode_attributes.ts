import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { decodeAttributes, formatCode } from '../replay';
import type { Attribute, RawAttributeRecord } from '../replay';
import { isPlainObject, listReplayIds, readJson, resolveDataDir, writeJson } from '../utils';

export interface SkippedRecord {
  code: string;
  ownerIndex: number;
  reason: string;
}

export interface DecodedAttributesFile {
  replay: string;
  attributes: Attribute[];
  skipped: SkippedRecord[];
}

function readInteger(entry: Record<string, unknown>, key: string, where: string): number {
  const value = entry[key];
  if (typeof value === 'number' && Number.isInteger(value)) return value;
  // Codes are usually written in hex, e.g. "0x0BB9".
  if (typeof value === 'string' && /^(0x[0-9a-f]+|\d+)$/i.test(value)) return Number(value);
  throw new Error(`${where}: "${key}" must be an integer`);
}

export function parseRawRecords(raw: unknown, source: string): RawAttributeRecord[] {
  if (!Array.isArray(raw)) {
    throw new Error(`Expected an array of attribute records in ${source}`);
  }
  return raw.map((entry: unknown, index) => {
    const where = `${source} record ${index}`;
    if (!isPlainObject(entry)) {
      throw new Error(`${where}: expected an object`);
    }
    const hex = entry.rawValue;
    if (typeof hex !== 'string' || !/^([0-9a-f]{2})*$/i.test(hex)) {
      throw new Error(`${where}: "rawValue" must be a hex string`);
    }
    const code = readInteger(entry, 'code', where);
    if (code < 0 || code > 0xffff) {
      throw new Error(`${where}: code ${code} does not fit in 16 bits`);
    }
    return {
      header: readInteger(entry, 'header', where),
      code,
      ownerIndex: readInteger(entry, 'ownerIndex', where),
      rawValue: Buffer.from(hex, 'hex'),
    };
  });
}

export function decodeRecords(replay: string, records: RawAttributeRecord[]): DecodedAttributesFile {
  const { attributes, skipped } = decodeAttributes(records);
  return {
    replay,
    attributes,
    skipped: skipped.map((err) => ({
      code: `0x${formatCode(err.code)}`,
      ownerIndex: err.ownerIndex,
      reason: err.message,
    })),
  };
}

export function decodedAttributesPath(dataDir: string, replay: string): string {
  return path.join(dataDir, 'decoded', replay, 'attributes.json');
}

export async function decodeReplayAttributes(options?: { replay?: string; dataDir?: string }): Promise<void> {
  const dataDir = options?.dataDir ?? resolveDataDir();
  const replays = listReplayIds(dataDir, options?.replay);
  if (!replays.length) {
    console.info('No replays found; nothing to do.');
    return;
  }

  for (const replay of replays) {
    const inputPath = path.join(dataDir, 'replays', replay, 'attributes.json');
    const records = parseRawRecords(readJson(inputPath), inputPath);
    const decoded = decodeRecords(replay, records);
    const outPath = decodedAttributesPath(dataDir, replay);
    writeJson(outPath, decoded);
    console.info(
      `Decoded ${decoded.attributes.length} attributes (${decoded.skipped.length} skipped) for ${replay} -> ${outPath}`,
    );
  }
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('replay', {
      alias: 'r',
      type: 'string',
      describe: 'Only decode this replay directory',
    })
    .help()
    .parseSync();

  decodeReplayAttributes({ replay: argv.replay }).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
