import { NonStrictOrderError } from '../errors/standings.errors';
import { TeamId } from '../types/standings.types';
import { Group } from './group';

/**
 * Intermediate group order
 *
 * Best-to-worst sequence of disjoint subsets of teams that are still level.
 * A group where nothing has been decided yet is a single subset holding every team.
 */
export class NonStrictGroupOrder implements Iterable<readonly TeamId[]> {
  private constructor(private readonly subsets: readonly (readonly TeamId[])[]) {}

  static init(group: Group): NonStrictGroupOrder {
    return new NonStrictGroupOrder([group.teamIds()]);
  }

  static empty(): NonStrictGroupOrder {
    return new NonStrictGroupOrder([]);
  }

  static single(subset: readonly TeamId[]): NonStrictGroupOrder {
    return new NonStrictGroupOrder([subset]);
  }

  static of(subsets: readonly (readonly TeamId[])[]): NonStrictGroupOrder {
    return new NonStrictGroupOrder(subsets.filter((subset) => subset.length > 0));
  }

  /**
   * Strict when every subset holds exactly one team
   */
  isStrict(): boolean {
    return this.subsets.every((subset) => subset.length === 1);
  }

  concat(other: NonStrictGroupOrder): NonStrictGroupOrder {
    return new NonStrictGroupOrder([...this.subsets, ...other.subsets]);
  }

  tiedSubsets(): TeamId[][] {
    return this.subsets.filter((subset) => subset.length > 1).map((subset) => [...subset]);
  }

  toArray(): TeamId[][] {
    return this.subsets.map((subset) => [...subset]);
  }

  get length(): number {
    return this.subsets.length;
  }

  [Symbol.iterator](): Iterator<readonly TeamId[]> {
    return this.subsets[Symbol.iterator]();
  }
}

/**
 * Strict group order, best team first
 */
export class GroupOrder implements Iterable<TeamId> {
  private readonly teams: readonly TeamId[];

  constructor(teams: readonly TeamId[]) {
    this.teams = Object.freeze([...teams]);
  }

  /**
   * @throws NonStrictOrderError when any subset still holds more than one team
   */
  static fromNonStrict(order: NonStrictGroupOrder): GroupOrder {
    if (!order.isStrict()) {
      throw new NonStrictOrderError(order.tiedSubsets());
    }
    return new GroupOrder([...order].map((subset) => subset[0]));
  }

  /**
   * Team at a zero-based rank
   * @throws RangeError for a rank outside the group
   */
  at(rank: number): TeamId {
    if (!Number.isInteger(rank) || rank < 0 || rank >= this.teams.length) {
      throw new RangeError(`Rank ${rank} is outside a group of ${this.teams.length} teams`);
    }
    return this.teams[rank];
  }

  winner(): TeamId {
    return this.at(0);
  }

  runnerUp(): TeamId {
    return this.at(1);
  }

  rankOf(team: TeamId): number {
    return this.teams.indexOf(team);
  }

  get length(): number {
    return this.teams.length;
  }

  toArray(): TeamId[] {
    return [...this.teams];
  }

  [Symbol.iterator](): Iterator<TeamId> {
    return this.teams[Symbol.iterator]();
  }
}
