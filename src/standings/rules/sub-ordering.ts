import { Group } from '../domain/group';
import { NonStrictGroupOrder } from '../domain/group-order';
import { MissingStatisticError } from '../errors/standings.errors';
import { FairPlayScorer } from '../stats/fair-play';
import { aggregateAll, aggregateInternal } from '../stats/stat-aggregator';
import { StatKind, SubOrderingRule, TeamId } from '../types/standings.types';

export const allGames = (stat: StatKind): SubOrderingRule => Object.freeze({ stat, scope: 'all' });

export const internalGames = (stat: StatKind): SubOrderingRule =>
  Object.freeze({ stat, scope: 'internal' });

export function describeRule(rule: SubOrderingRule): string {
  return rule.scope === 'all' ? rule.stat : `internal ${rule.stat}`;
}

/**
 * Splits a tied subset of two or more teams into best-to-worst subsets by one statistic.
 * Teams with equal values stay together, in their input order.
 *
 * @throws MissingStatisticError when a team of the subset has no finite computed value
 */
export function applySubOrdering(
  group: Group,
  rule: SubOrderingRule,
  tied: readonly TeamId[],
  fairPlay: FairPlayScorer,
): NonStrictGroupOrder {
  const stats =
    rule.scope === 'all'
      ? aggregateAll(group, rule.stat, fairPlay)
      : aggregateInternal(group, tied, rule.stat, fairPlay);

  const ranked = tied
    .map((team) => {
      const value = stats.get(team);
      if (value === undefined || !Number.isFinite(value)) {
        throw new MissingStatisticError(team, describeRule(rule));
      }
      return { team, value };
    })
    .sort((a, b) => b.value - a.value);

  const subsets: TeamId[][] = [];
  let previous: number | undefined;
  for (const { team, value } of ranked) {
    if (previous === value) {
      subsets[subsets.length - 1].push(team);
    } else {
      subsets.push([team]);
    }
    previous = value;
  }

  return NonStrictGroupOrder.of(subsets);
}
