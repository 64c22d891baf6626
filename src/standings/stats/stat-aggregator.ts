import { Group } from '../domain/group';
import { PlayedGroupGame, StatKind, TeamId } from '../types/standings.types';
import { FairPlayScorer } from './fair-play';
import { statDelta } from './unary-stat';

export type TeamStats = Map<TeamId, number>;

function fold(
  teams: Iterable<TeamId>,
  games: Iterable<PlayedGroupGame>,
  stat: StatKind,
  fairPlay: FairPlayScorer,
): TeamStats {
  const stats: TeamStats = new Map();
  for (const team of teams) {
    stats.set(team, 0);
  }

  for (const game of games) {
    const [home, away] = statDelta(stat, game, fairPlay);
    stats.set(game.home, (stats.get(game.home) ?? 0) + home);
    stats.set(game.away, (stats.get(game.away) ?? 0) + away);
  }

  return stats;
}

/**
 * Statistic for every team over all played games of the group.
 * Teams without a game are present with value zero.
 */
export function aggregateAll(group: Group, stat: StatKind, fairPlay: FairPlayScorer): TeamStats {
  return fold(group.teamIds(), group.playedGames, stat, fairPlay);
}

/**
 * Statistic for the teams of `subset` over the games played between them (head to head)
 */
export function aggregateInternal(
  group: Group,
  subset: readonly TeamId[],
  stat: StatKind,
  fairPlay: FairPlayScorer,
): TeamStats {
  const members = new Set(subset);
  const internalGames = group.playedGames.filter(
    (game) => members.has(game.home) && members.has(game.away),
  );
  return fold(members, internalGames, stat, fairPlay);
}
