import { UnknownStatCodeError } from './errors';
import { Graph } from './graph';

export const STAT_PRETTY_NAMES: Readonly<Record<string, string>> = Object.freeze({
  R: 'Resources',
  U: 'Units',
  S: 'Structures',
  O: 'Overview',
  AUR: 'Average Unspent Resources',
  RCR: 'Resource Collection Rate',
  WC: 'Workers Created',
  UT: 'Units Trained',
  KUC: 'Killed Unit Count',
  SB: 'Structures Built',
  SRC: 'Structures Razed Count',
});

export type StatValue = string | number;

export function isStatCode(code: string): boolean {
  return Object.hasOwn(STAT_PRETTY_NAMES, code);
}

/** One player's line on the post-game summary screen. */
export class PlayerSummary {
  teamId = 0;
  race = '';
  isAi = false;
  bnetId = 0;
  subregion = 0;
  armyGraph: Graph | null = null;
  incomeGraph: Graph | null = null;
  readonly stats = new Map<string, StatValue>();

  constructor(public readonly pid: number) {}

  getStats(): string {
    const lines: string[] = [];
    this.stats.forEach((value, code) => {
      if (!isStatCode(code)) {
        throw new UnknownStatCodeError(code);
      }
      lines.push(`${STAT_PRETTY_NAMES[code]}: ${value}`);
    });
    return lines.join('\n').trimEnd();
  }

  toString(): string {
    if (this.isAi) {
      return `${this.teamId} - ${this.race} - AI`;
    }
    return `${this.teamId} - ${this.race} - ${this.subregion}/${this.bnetId}/`;
  }
}
