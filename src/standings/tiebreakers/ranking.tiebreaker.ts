import { Group } from '../domain/group';
import { TiebreakerConfigError } from '../errors/standings.errors';
import { TeamId } from '../types/standings.types';
import { Tiebreaker } from './tiebreaker';

/**
 * Orders tied teams by an external ranking, lower rank first
 * (e.g. the European Qualifiers overall ranking).
 */
export class RankingTiebreaker extends Tiebreaker {
  readonly name = 'ranking';

  private constructor(private readonly ranking: ReadonlyMap<TeamId, number>) {
    super();
  }

  /**
   * @throws TiebreakerConfigError when any team of the groups has no rank
   */
  static create(groups: Group[], ranking: ReadonlyMap<TeamId, number>): RankingTiebreaker {
    const missing = [
      ...new Set(groups.flatMap((group) => group.teamIds()).filter((team) => !ranking.has(team))),
    ];

    if (missing.length > 0) {
      throw new TiebreakerConfigError(
        `Ranking is missing teams: ${missing.join(', ')}`,
        missing,
      );
    }

    return new RankingTiebreaker(new Map(ranking));
  }

  compare(a: TeamId, b: TeamId): number {
    return this.rankOf(a) - this.rankOf(b);
  }

  private rankOf(team: TeamId): number {
    const rank = this.ranking.get(team);
    // create() has checked every team of the configured groups
    if (rank === undefined) {
      throw new TiebreakerConfigError(`Team ${team} was not part of the ranked groups`, [team]);
    }
    return rank;
  }
}
