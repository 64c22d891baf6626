/**
 * Type definitions for the group standings engine
 */

export type TeamId = string;

export type GameId = string;

export interface Score {
  home: number;
  away: number;
}

/**
 * Disciplinary cards received by one team in one game
 */
export interface FairPlayCards {
  yellow: number;
  indirectRed: number;
  directRed: number;
  yellowDirectRed: number;
}

export interface FairPlayScore {
  home: FairPlayCards;
  away: FairPlayCards;
}

export interface PlayedGroupGame {
  readonly id: GameId;
  readonly home: TeamId;
  readonly away: TeamId;
  readonly score: Readonly<Score>;
  readonly fairPlay: Readonly<FairPlayScore>;
  readonly date: Date;
}

export interface UnplayedGroupGame {
  readonly id: GameId;
  readonly home: TeamId;
  readonly away: TeamId;
  readonly date: Date;
}

export type StatKind = 'points' | 'goalDiff' | 'goalsScored' | 'wins' | 'fairPlay';

/**
 * `all` folds every game of the group, `internal` only the games between the tied teams
 */
export type StatScope = 'all' | 'internal';

export interface SubOrderingRule {
  readonly stat: StatKind;
  readonly scope: StatScope;
}

export type FairPlayWeights = FairPlayCards;

export const STANDINGS_CONSTANTS = {
  POINTS: {
    WIN: 3,
    DRAW: 1,
    LOSS: 0,
  },
  PRESETS: {
    FIFA_2018: 'fifa-2018',
    EURO_2020: 'euro-2020',
  },
  // Higher is better for every statistic, so penalties are negative
  FIFA_FAIR_PLAY_WEIGHTS: {
    yellow: -1,
    indirectRed: -3,
    directRed: -4,
    yellowDirectRed: -5,
  },
  UEFA_FAIR_PLAY_WEIGHTS: {
    yellow: -1,
    indirectRed: -3,
    directRed: -3,
    yellowDirectRed: -5,
  },
} as const;

export const NO_CARDS: Readonly<FairPlayCards> = Object.freeze({
  yellow: 0,
  indirectRed: 0,
  directRed: 0,
  yellowDirectRed: 0,
});
