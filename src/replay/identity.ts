import crypto from 'node:crypto';
import { IllegalStateError, IncompleteIdentityError, MissingFieldError } from './errors';
import type { ChatEvent, ReplayEvent, TeamResult } from './types';

export const PROFILE_URL_TEMPLATE = 'http://{region}.battle.net/sc2/en/profile/{bnetUid}/{subregion}/{name}/';

/** Non-owning link from a player back to the team that holds it. */
export interface TeamHandle {
  readonly number: number;
  resolve(): Team;
}

export type PersonField = string | number | boolean;

/**
 * Shared shape of everyone listed in a replay. Never built directly; see
 * {@link Player} and {@link Observer}.
 */
export abstract class Person {
  abstract readonly isObserver: boolean;
  isHuman = false;
  // Filled in once the message stream shows who saved the replay.
  recorder = false;
  readonly messages: ChatEvent[] = [];
  readonly events: ReplayEvent[] = [];

  constructor(
    public readonly pid: number,
    public name: string,
  ) {}
}

export class Observer extends Person {
  readonly isObserver = true;

  constructor(pid: number, name: string) {
    super(pid, name);
    this.isHuman = true;
  }

  toString(): string {
    return `Observer ${this.pid} - ${this.name}`;
  }
}

export class Player extends Person {
  readonly isObserver = false;
  color?: string;
  /** Race chosen in the lobby, possibly Random. */
  pickRace = '';
  /** Race actually played. */
  playRace = '';
  difficulty = '';
  region?: string;
  subregion?: number;
  bnetUid?: number;

  private teamHandle: TeamHandle | null = null;
  private handicapValue = 100;

  get handicap(): number {
    return this.handicapValue;
  }

  set handicap(value: number) {
    if (!Number.isInteger(value) || value < 0 || value > 100) {
      throw new RangeError(`Handicap must be an integer between 0 and 100, got ${value}`);
    }
    this.handicapValue = value;
  }

  get hasTeam(): boolean {
    return this.teamHandle !== null;
  }

  get team(): Team {
    if (!this.teamHandle) {
      throw new IllegalStateError(`Player ${this.pid} (${this.name}) has no team yet`);
    }
    return this.teamHandle.resolve();
  }

  /** Called by the roster when the player joins a team. */
  attachTeam(handle: TeamHandle | null): void {
    this.teamHandle = handle;
  }

  get url(): string {
    if (!this.teamHandle) {
      throw new IllegalStateError(`Player ${this.pid} (${this.name}) has no team yet`);
    }
    const missing: string[] = [];
    if (!this.region) missing.push('region');
    if (this.bnetUid === undefined) missing.push('bnetUid');
    if (this.subregion === undefined) missing.push('subregion');
    if (!this.name) missing.push('name');
    if (missing.length) {
      throw new IncompleteIdentityError(missing);
    }
    return this.format(PROFILE_URL_TEMPLATE);
  }

  get result(): TeamResult {
    return this.team.result;
  }

  fields(): Record<string, PersonField | undefined> {
    return {
      pid: this.pid,
      name: this.name,
      isObserver: this.isObserver,
      isHuman: this.isHuman,
      recorder: this.recorder,
      color: this.color,
      pickRace: this.pickRace,
      playRace: this.playRace,
      difficulty: this.difficulty,
      handicap: this.handicap,
      region: this.region,
      subregion: this.subregion,
      bnetUid: this.bnetUid,
    };
  }

  /**
   * Fills `{field}` placeholders from this player's own fields. `{{` and `}}`
   * stand for literal braces.
   */
  format(template: string): string {
    const fields = this.fields();
    return template.replace(/\{\{|\}\}|\{([^{}]*)\}/g, (match, key: string | undefined) => {
      if (key === undefined) return match[0];
      const value = Object.hasOwn(fields, key) ? fields[key] : undefined;
      if (value === undefined) {
        throw new MissingFieldError(key);
      }
      return String(value);
    });
  }

  toString(): string {
    return `Player ${this.pid} - ${this.name} (${this.playRace})`;
  }
}

// Byte order of the UTF-8 encoding, i.e. code-point order rather than UTF-16 unit order.
function compareUtf8(a: string, b: string): number {
  return Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8'));
}

export class Team implements Iterable<Player> {
  readonly players: Player[] = [];
  result: TeamResult = 'Unknown';
  /** Pick-race letters in join order, random picks left out. */
  lineup = '';

  constructor(public readonly number: number) {
    if (!Number.isInteger(number) || number < 1) {
      throw new RangeError(`Team number must be a positive integer, got ${number}`);
    }
  }

  [Symbol.iterator](): Iterator<Player> {
    return this.players[Symbol.iterator]();
  }

  /** SHA-256 over the sorted profile urls of the current members. */
  get hash(): string {
    const raw = this.players
      .map((player) => player.url)
      .sort(compareUtf8)
      .join(',');
    return crypto.createHash('sha256').update(raw, 'utf8').digest('hex');
  }

  toString(): string {
    return `Team ${this.number}: ${this.players.map((player) => player.name).join(', ')}`;
  }
}
