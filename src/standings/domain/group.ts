import { GroupError, GroupErrorCode } from '../errors/standings.errors';
import {
  FairPlayCards,
  FairPlayScore,
  GameId,
  NO_CARDS,
  PlayedGroupGame,
  Score,
  TeamId,
  UnplayedGroupGame,
} from '../types/standings.types';

export interface PlayedGameInput {
  id: GameId;
  home: TeamId;
  away: TeamId;
  score: Score;
  fairPlay?: Partial<FairPlayScore>;
  date: Date;
}

export interface GroupInput {
  /** Team set; when omitted it is taken from the game participants */
  teams?: TeamId[];
  playedGames: PlayedGameInput[];
  unplayedGames?: UnplayedGroupGame[];
}

const isCount = (value: number): boolean => Number.isInteger(value) && value >= 0;

/**
 * A round-robin group: a team set plus the games played and scheduled among those teams.
 * Immutable once created.
 */
export class Group {
  private readonly teamSet: ReadonlySet<TeamId>;

  private constructor(
    teams: TeamId[],
    readonly playedGames: readonly PlayedGroupGame[],
    readonly unplayedGames: readonly UnplayedGroupGame[],
  ) {
    this.teamSet = new Set(teams);
  }

  /**
   * Validates the input and builds a group
   * @throws GroupError when a game or team breaks a group invariant
   */
  static create(input: GroupInput): Group {
    const unplayed = input.unplayedGames ?? [];
    const teams = input.teams ?? Group.participants(input.playedGames, unplayed);

    if (teams.length === 0) {
      throw new GroupError(GroupErrorCode.EMPTY_GROUP, 'A group needs at least one team');
    }

    const teamSet = new Set(teams);
    if (teamSet.size !== teams.length) {
      const duplicate = teams.find((team, i) => teams.indexOf(team) !== i);
      throw new GroupError(GroupErrorCode.DUPLICATE_TEAM, `Team ${duplicate} is listed twice`);
    }

    const gameIds = new Set<GameId>();
    const checkFixture = (game: { id: GameId; home: TeamId; away: TeamId }): void => {
      if (gameIds.has(game.id)) {
        throw new GroupError(GroupErrorCode.DUPLICATE_GAME, `Game ${game.id} is listed twice`);
      }
      gameIds.add(game.id);

      if (game.home === game.away) {
        throw new GroupError(
          GroupErrorCode.SAME_TEAM,
          `Game ${game.id} has team ${game.home} playing itself`,
        );
      }

      for (const team of [game.home, game.away]) {
        if (!teamSet.has(team)) {
          throw new GroupError(
            GroupErrorCode.UNKNOWN_TEAM,
            `Game ${game.id} references team ${team} outside the group`,
          );
        }
      }
    };

    const playedGames = input.playedGames.map((game) => {
      checkFixture(game);
      if (!isCount(game.score.home) || !isCount(game.score.away)) {
        throw new GroupError(
          GroupErrorCode.INVALID_SCORE,
          `Game ${game.id} has an invalid score ${game.score.home}-${game.score.away}`,
        );
      }
      return Group.freezeGame(game);
    });

    const unplayedGames = unplayed.map((game) => {
      checkFixture(game);
      return Object.freeze({ ...game });
    });

    return new Group(teams, Object.freeze(playedGames), Object.freeze(unplayedGames));
  }

  /**
   * Team ids in group order
   */
  teamIds(): TeamId[] {
    return [...this.teamSet];
  }

  hasTeam(team: TeamId): boolean {
    return this.teamSet.has(team);
  }

  get size(): number {
    return this.teamSet.size;
  }

  private static participants(
    played: PlayedGameInput[],
    unplayed: UnplayedGroupGame[],
  ): TeamId[] {
    const seen = new Set<TeamId>();
    for (const game of [...played, ...unplayed]) {
      seen.add(game.home);
      seen.add(game.away);
    }
    return [...seen];
  }

  private static freezeGame(game: PlayedGameInput): PlayedGroupGame {
    const home = Group.checkedCards(game.id, game.fairPlay?.home);
    const away = Group.checkedCards(game.id, game.fairPlay?.away);

    return Object.freeze({
      id: game.id,
      home: game.home,
      away: game.away,
      score: Object.freeze({ home: game.score.home, away: game.score.away }),
      fairPlay: Object.freeze({ home, away }),
      date: game.date,
    });
  }

  private static checkedCards(gameId: GameId, cards?: FairPlayCards): Readonly<FairPlayCards> {
    if (!cards) return NO_CARDS;

    // Stored card rows are untyped JSON: every count must be present, extra keys are dropped
    const { yellow, indirectRed, directRed, yellowDirectRed } = cards;
    const counts = { yellow, indirectRed, directRed, yellowDirectRed };
    if (Object.values(counts).some((count) => !isCount(count))) {
      throw new GroupError(GroupErrorCode.INVALID_CARDS, `Game ${gameId} has invalid card counts`);
    }
    return Object.freeze(counts);
  }
}
