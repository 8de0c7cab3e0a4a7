export {
  decodeAttribute,
  decodeAttributes,
  findAttribute,
  formatAttribute,
  groupAttributesByOwner,
  stripTrailingNulls,
  GLOBAL_OWNER_INDEX,
  UNKNOWN_ATTRIBUTE_NAME,
} from './attributes';
export type { DecodeBatchResult } from './attributes';
export { AttributeCode, isAttributeCode, lookupAttribute } from './attributeCodes';
export type { AttributeDefinition, ValueTransform } from './attributeCodes';
export { CODE_TABLE_NAMES, loadCodeTables, lookupCode, parseCodeTables } from './codeTables';
export type { CodeTable, CodeTableName, CodeTables } from './codeTables';
export * from './errors';
export { Graph } from './graph';
export type { GraphPoint } from './graph';
export { Observer, Person, Player, Team, PROFILE_URL_TEMPLATE } from './identity';
export type { PersonField, TeamHandle } from './identity';
export { PlayerSummary, STAT_PRETTY_NAMES, isStatCode } from './playerSummary';
export type { StatValue } from './playerSummary';
export { Roster } from './roster';
export type * from './types';
