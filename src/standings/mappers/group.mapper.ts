import { Group, PlayedGameInput } from '../domain/group';
import { Game } from '../entities/game.entity';
import { Team } from '../entities/team.entity';
import { GroupError, GroupErrorCode } from '../errors/standings.errors';
import { NO_CARDS, UnplayedGroupGame } from '../types/standings.types';

/**
 * Maps stored teams and games of one group to a domain group.
 * Games not yet played become fixtures and contribute no statistics.
 */
export function mapRowsToGroup(teams: Team[], games: Game[]): Group {
  const playedGames: PlayedGameInput[] = [];
  const unplayedGames: UnplayedGroupGame[] = [];

  for (const game of games) {
    if (!game.played) {
      unplayedGames.push({
        id: game.id,
        home: game.homeTeam,
        away: game.awayTeam,
        date: game.kickoff,
      });
      continue;
    }

    if (game.homeResult === null || game.awayResult === null) {
      throw new GroupError(
        GroupErrorCode.INVALID_SCORE,
        `Game ${game.id} is marked as played but has no result`,
      );
    }

    playedGames.push({
      id: game.id,
      home: game.homeTeam,
      away: game.awayTeam,
      score: { home: game.homeResult, away: game.awayResult },
      fairPlay: {
        home: game.homeFairPlay ?? NO_CARDS,
        away: game.awayFairPlay ?? NO_CARDS,
      },
      date: game.kickoff,
    });
  }

  return Group.create({
    teams: teams.map((team) => team.id),
    playedGames,
    unplayedGames,
  });
}
