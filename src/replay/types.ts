export interface Location {
  readonly x: number;
  readonly y: number;
}

/** One entry of the attribute block, already split out by the container reader. */
export interface RawAttributeRecord {
  header: number;
  code: number;
  ownerIndex: number;
  rawValue: Uint8Array;
}

export type AttributeValue = string | number;

export interface Attribute {
  code: number;
  ownerIndex: number;
  displayName: string;
  value: AttributeValue;
}

export type TeamResult = 'Win' | 'Loss' | 'Unknown';

// Chat and game events are decoded elsewhere; this core only keeps them in order.
export type ChatEvent = Record<string, unknown>;
export type ReplayEvent = Record<string, unknown>;

export interface BnetData {
  subregion: number;
  uid: number;
}

/** Per-player entry of the replay details block. */
export interface PlayerData {
  name: string;
  bnet: BnetData;
  race: string;
  handicap: number;
  result: number;
}

export interface ReplayDetails {
  gateway: string;
  players: PlayerData[];
  observers?: string[];
}
