import path from 'node:path';
import fs from 'node:fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import _ from 'lodash';
import { Graph, PlayerSummary, UnknownStatCodeError, isStatCode } from '../replay';
import type { GraphPoint } from '../replay';
import { isPlainObject, listReplayIds, readJson, resolveDataDir } from '../utils';

function fail(source: string, message: string): never {
  throw new Error(`${source}: ${message}`);
}

function isPoint(value: unknown): value is GraphPoint {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number'
  );
}

function isNumberList(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'number');
}

/** Accepts either `[[time, value], ...]` or `{ times: [...], values: [...] }`. */
export function parseGraph(raw: unknown, source: string): Graph | null {
  if (raw === undefined || raw === null) return null;
  if (Array.isArray(raw)) {
    if (!raw.every(isPoint)) fail(source, 'graph points must be [time, value] pairs');
    return Graph.fromPoints(raw);
  }
  const times = isPlainObject(raw) ? raw.times : undefined;
  const values = isPlainObject(raw) ? raw.values : undefined;
  if (isNumberList(times) && isNumberList(values)) {
    return new Graph(times, values);
  }
  return fail(source, 'unrecognised graph');
}

/**
 * Collects score-screen entries into summaries. Stat codes are checked here so
 * that rendering never meets a code without a label.
 */
export function parseSummaries(raw: unknown, source: string): PlayerSummary[] {
  if (!Array.isArray(raw)) fail(source, 'expected an array of player summaries');
  return raw.map((entry: unknown, index) => {
    const where = `${source} summary ${index}`;
    if (!isPlainObject(entry)) fail(where, 'expected an object');
    const { pid, teamId, race, isAi, bnetId, subregion } = entry;
    if (typeof pid !== 'number') fail(where, '"pid" must be a number');

    const summary = new PlayerSummary(pid);
    if (typeof teamId === 'number') summary.teamId = teamId;
    if (typeof race === 'string') summary.race = race;
    summary.isAi = isAi === true;
    if (typeof bnetId === 'number') summary.bnetId = bnetId;
    if (typeof subregion === 'number') summary.subregion = subregion;
    summary.armyGraph = parseGraph(entry.armyGraph, `${where} armyGraph`);
    summary.incomeGraph = parseGraph(entry.incomeGraph, `${where} incomeGraph`);

    const stats = entry.stats ?? {};
    if (!isPlainObject(stats)) fail(where, '"stats" must be an object');
    Object.entries(stats).forEach(([code, value]) => {
      if (!isStatCode(code)) throw new UnknownStatCodeError(code);
      if (typeof value !== 'string' && typeof value !== 'number') fail(where, `stat ${code} must be a string or number`);
      summary.stats.set(code, value);
    });
    return summary;
  });
}

function describeGraph(label: string, graph: Graph | null): string {
  if (!graph) return `${label}: none`;
  const peak = _.maxBy(Array.from(graph.asPoints()), ([, value]) => value);
  return peak ? `${label}: ${graph} (peak ${peak[1]} at ${peak[0]}s)` : `${label}: ${graph}`;
}

export function renderSummary(summary: PlayerSummary): string {
  const lines = [
    `Player ${summary.pid}: ${summary}`,
    describeGraph('Army', summary.armyGraph),
    describeGraph('Income', summary.incomeGraph),
  ];
  const stats = summary.getStats();
  if (stats) lines.push(stats);
  return lines.join('\n');
}

export async function renderSummaries(options?: { replay?: string; dataDir?: string }): Promise<void> {
  const dataDir = options?.dataDir ?? resolveDataDir();
  const replays = listReplayIds(dataDir, options?.replay);

  for (const replay of replays) {
    const summaryPath = path.join(dataDir, 'replays', replay, 'summaries.json');
    if (!fs.existsSync(summaryPath)) {
      console.warn(`Skipping ${replay}: no summary file at ${summaryPath}`);
      continue;
    }
    const summaries = parseSummaries(readJson(summaryPath), summaryPath);
    console.info(`\n${replay}`);
    console.info('-'.repeat(replay.length));
    summaries.forEach((summary) => console.info(`${renderSummary(summary)}\n`));
  }
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('replay', {
      alias: 'r',
      type: 'string',
      describe: 'Only render summaries for this replay directory',
    })
    .help()
    .parseSync();

  renderSummaries({ replay: argv.replay }).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
