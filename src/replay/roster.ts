import { IllegalStateError } from './errors';
import { Observer, Player, Team } from './identity';
import type { Person, TeamHandle } from './identity';

/**
 * Owns the teams of one replay. Players reach their team through a handle
 * into this roster rather than holding the team directly.
 */
export class Roster {
  private readonly teamsByNumber = new Map<number, Team>();
  private readonly people: Person[] = [];

  addTeam(number: number): Team {
    const existing = this.teamsByNumber.get(number);
    if (existing) return existing;
    const team = new Team(number);
    this.teamsByNumber.set(number, team);
    return team;
  }

  getTeam(number: number): Team | undefined {
    return this.teamsByNumber.get(number);
  }

  handleFor(number: number): TeamHandle {
    if (!this.teamsByNumber.has(number)) {
      throw new IllegalStateError(`Team ${number} is not part of this roster`);
    }
    return {
      number,
      resolve: () => {
        const team = this.teamsByNumber.get(number);
        if (!team) {
          throw new IllegalStateError(`Team ${number} is no longer part of this roster`);
        }
        return team;
      },
    };
  }

  addPerson(person: Person): void {
    if (this.people.some((existing) => existing.pid === person.pid)) {
      throw new IllegalStateError(`Person ${person.pid} is already on the roster`);
    }
    this.people.push(person);
  }

  /** Moves the player onto the numbered team, creating the team on first use. */
  assignPlayer(player: Player, teamNumber: number): Team {
    if (!this.people.includes(player)) {
      this.addPerson(player);
    }
    if (player.hasTeam) {
      const previous = player.team;
      if (previous.number === teamNumber) return previous;
      const index = previous.players.indexOf(player);
      if (index >= 0) previous.players.splice(index, 1);
    }
    const team = this.addTeam(teamNumber);
    team.players.push(player);
    player.attachTeam(this.handleFor(teamNumber));
    return team;
  }

  get teams(): Team[] {
    return Array.from(this.teamsByNumber.values()).sort((a, b) => a.number - b.number);
  }

  get players(): Player[] {
    return this.people.filter((person): person is Player => person instanceof Player);
  }

  get observers(): Observer[] {
    return this.people.filter((person): person is Observer => person instanceof Observer);
  }

  getPerson(pid: number): Person | undefined {
    return this.people.find((person) => person.pid === pid);
  }
}
