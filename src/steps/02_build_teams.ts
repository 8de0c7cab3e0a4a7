import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import _ from 'lodash';
import {
  findAttribute,
  groupAttributesByOwner,
  GLOBAL_OWNER_INDEX,
  Observer,
  Player,
  Roster,
} from '../replay';
import type { Attribute, PlayerData, ReplayDetails, Team, TeamResult } from '../replay';
import { isPlainObject, listReplayIds, readJson, resolveDataDir, toCsv, writeFile, writeJson } from '../utils';
import { decodedAttributesPath } from './01_decode_attributes';

export interface PlayerRow {
  pid: number;
  name: string;
  url: string;
  result: TeamResult;
  pickRace: string;
  playRace: string;
  color: string;
  difficulty: string;
  handicap: number;
  isHuman: boolean;
}

export interface TeamRow {
  number: number;
  hash: string;
  result: TeamResult;
  lineup: string;
  players: PlayerRow[];
}

export interface TeamsFile {
  replay: string;
  teams: TeamRow[];
  observers: { pid: number; name: string }[];
}

const RESULT_CODES: Record<number, TeamResult> = { 1: 'Win', 2: 'Loss' };

function fail(source: string, message: string): never {
  throw new Error(`${source}: ${message}`);
}

function readNumber(entry: Record<string, unknown>, key: string, source: string): number {
  const value = entry[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : fail(source, `"${key}" must be a number`);
}

function readString(entry: Record<string, unknown>, key: string, source: string): string {
  const value = entry[key];
  return typeof value === 'string' ? value : fail(source, `"${key}" must be a string`);
}

function readHandicap(entry: Record<string, unknown>, source: string): number {
  const handicap = readNumber(entry, 'handicap', source);
  return Number.isInteger(handicap) && handicap >= 0 && handicap <= 100
    ? handicap
    : fail(source, `"handicap" must be an integer between 0 and 100, got ${handicap}`);
}

function parsePlayerData(entry: unknown, source: string): PlayerData {
  if (!isPlainObject(entry)) fail(source, 'expected an object');
  const bnet = entry.bnet;
  if (!isPlainObject(bnet)) fail(source, '"bnet" must be an object');
  return {
    name: readString(entry, 'name', source),
    bnet: {
      subregion: readNumber(bnet, 'subregion', `${source} bnet`),
      uid: readNumber(bnet, 'uid', `${source} bnet`),
    },
    race: readString(entry, 'race', source),
    handicap: readHandicap(entry, source),
    result: readNumber(entry, 'result', source),
  };
}

export function parseDetails(raw: unknown, source: string): ReplayDetails {
  if (!isPlainObject(raw)) fail(source, 'expected an object');
  const players = raw.players;
  if (!Array.isArray(players)) fail(source, '"players" must be an array');
  const observers = raw.observers ?? [];
  if (!Array.isArray(observers) || !observers.every((name): name is string => typeof name === 'string')) {
    fail(source, '"observers" must be a list of names');
  }
  return {
    gateway: readString(raw, 'gateway', source),
    players: players.map((entry: unknown, index) => parsePlayerData(entry, `${source} player ${index}`)),
    observers,
  };
}

export function parseDecodedAttributes(raw: unknown, source: string): Attribute[] {
  const list = isPlainObject(raw) ? raw.attributes : undefined;
  if (!Array.isArray(list)) fail(source, 'expected decoded attributes');
  return list.map((entry: unknown, index): Attribute => {
    const where = `${source} attribute ${index}`;
    if (!isPlainObject(entry)) fail(where, 'expected an object');
    const value = entry.value;
    if (typeof value !== 'string' && typeof value !== 'number') fail(where, '"value" must be a string or number');
    return {
      code: readNumber(entry, 'code', where),
      ownerIndex: readNumber(entry, 'ownerIndex', where),
      displayName: readString(entry, 'displayName', where),
      value,
    };
  });
}

function applyPlayerAttributes(player: Player, attributes: Attribute[]): void {
  attributes.forEach((attr) => {
    const value = String(attr.value);
    switch (attr.displayName) {
      case 'Race':
        player.pickRace = value;
        break;
      case 'Color':
        player.color = value;
        break;
      case 'Difficulty':
        player.difficulty = value;
        break;
      case 'Handicap': {
        const handicap = Number(value);
        if (Number.isInteger(handicap) && handicap >= 0 && handicap <= 100) {
          player.handicap = handicap;
        } else {
          console.warn(`Ignoring handicap "${value}" for player ${player.pid}`);
        }
        break;
      }
      case 'Player Type':
        player.isHuman = value === 'Human';
        break;
      default:
        break;
    }
  });
}

function resolveTeamNumber(player: Player, attributes: Attribute[], teamsAttribute?: string): number {
  if (teamsAttribute) {
    const slot = findAttribute(attributes, teamsAttribute)?.value;
    if (typeof slot === 'number' && slot >= 1) return slot;
    console.warn(`Player ${player.pid} has no usable ${teamsAttribute} attribute; placing on team ${player.pid}`);
  }
  return player.pid;
}

export function buildLineup(team: Team): string {
  return team.players
    .map((player) => player.pickRace)
    .filter((race) => race !== '' && race !== 'Random')
    .map((race) => race[0])
    .join('');
}

function resolveTeamResult(results: number[]): TeamResult {
  const known = results.map((code) => RESULT_CODES[code]).find((result) => result !== undefined);
  return known ?? 'Unknown';
}

/**
 * Builds the team graph for one replay from its details block and decoded
 * attributes. Player pids follow the order of the details block, starting at 1.
 */
export function buildRoster(details: ReplayDetails, attributes: Attribute[]): Roster {
  const roster = new Roster();
  const byOwner = groupAttributesByOwner(attributes);
  const gameFormat = findAttribute(byOwner.get(GLOBAL_OWNER_INDEX) ?? [], 'Game Type')?.value;
  const teamsAttribute = gameFormat === undefined ? undefined : `Teams${gameFormat}`;
  const resultsByTeam = new Map<number, number[]>();

  details.players.forEach((data, index) => {
    const player = new Player(index + 1, data.name);
    player.region = details.gateway;
    player.subregion = data.bnet.subregion;
    player.bnetUid = data.bnet.uid;
    player.playRace = data.race;
    player.handicap = data.handicap;

    const own = byOwner.get(player.pid) ?? [];
    applyPlayerAttributes(player, own);
    const teamNumber = resolveTeamNumber(player, own, teamsAttribute);
    roster.assignPlayer(player, teamNumber);
    resultsByTeam.set(teamNumber, [...(resultsByTeam.get(teamNumber) ?? []), data.result]);
  });

  (details.observers ?? []).forEach((name, index) => {
    roster.addPerson(new Observer(details.players.length + index + 1, name));
  });

  roster.teams.forEach((team) => {
    team.result = resolveTeamResult(resultsByTeam.get(team.number) ?? []);
    team.lineup = buildLineup(team);
  });

  return roster;
}

export function summarizeRoster(replay: string, roster: Roster): TeamsFile {
  return {
    replay,
    teams: roster.teams.map((team) => ({
      number: team.number,
      hash: team.hash,
      result: team.result,
      lineup: team.lineup,
      players: team.players.map((player) => ({
        pid: player.pid,
        name: player.name,
        url: player.url,
        result: player.result,
        pickRace: player.pickRace,
        playRace: player.playRace,
        color: player.color ?? '',
        difficulty: player.difficulty,
        handicap: player.handicap,
        isHuman: player.isHuman,
      })),
    })),
    observers: roster.observers.map((observer) => ({ pid: observer.pid, name: observer.name })),
  };
}

export function teamsToCsv(summary: TeamsFile): string {
  const rows = summary.teams.flatMap((team) =>
    team.players.map((player) => ({
      team: _.pick(team, ['number', 'hash', 'result', 'lineup']),
      player,
    })),
  );
  return toCsv(rows);
}

export async function buildTeams(options?: { replay?: string; dataDir?: string }): Promise<void> {
  const dataDir = options?.dataDir ?? resolveDataDir();
  const replays = listReplayIds(dataDir, options?.replay);
  if (!replays.length) {
    console.info('No replays found; nothing to do.');
    return;
  }

  for (const replay of replays) {
    const detailsPath = path.join(dataDir, 'replays', replay, 'details.json');
    const attributesPath = decodedAttributesPath(dataDir, replay);
    const details = parseDetails(readJson(detailsPath), detailsPath);
    const attributes = parseDecodedAttributes(readJson(attributesPath), attributesPath);
    const summary = summarizeRoster(replay, buildRoster(details, attributes));

    const outDir = path.join(dataDir, 'decoded', replay);
    writeJson(path.join(outDir, 'teams.json'), summary);
    writeFile(path.join(outDir, 'teams.csv'), teamsToCsv(summary));
    console.info(`Wrote ${summary.teams.length} teams for ${replay} -> ${outDir}`);
  }
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('replay', {
      alias: 'r',
      type: 'string',
      describe: 'Only build teams for this replay directory',
    })
    .help()
    .parseSync();

  buildTeams({ replay: argv.replay }).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
