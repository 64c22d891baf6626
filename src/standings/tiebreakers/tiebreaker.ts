import { Group } from '../domain/group';
import { GroupOrder, NonStrictGroupOrder } from '../domain/group-order';
import { TeamId } from '../types/standings.types';

/**
 * Final step of a rule set, turning a possibly non-strict order into a strict one
 */
export abstract class Tiebreaker {
  abstract readonly name: string;

  /**
   * Expands every tied subset in place; subsets of one team are kept as they are
   */
  order(group: Group, nonStrict: NonStrictGroupOrder): GroupOrder {
    const teams: TeamId[] = [];
    for (const subset of nonStrict) {
      if (subset.length === 1) {
        teams.push(subset[0]);
      } else {
        teams.push(...this.orderSubGroup(group, subset));
      }
    }
    return new GroupOrder(teams);
  }

  orderSubGroup(_group: Group, tied: readonly TeamId[]): TeamId[] {
    return [...tied].sort((a, b) => this.compare(a, b));
  }

  /**
   * Negative when `a` ranks above `b`, positive when below. Never zero for two distinct teams.
   */
  abstract compare(a: TeamId, b: TeamId): number;
}
