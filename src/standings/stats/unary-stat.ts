import { PlayedGroupGame, STANDINGS_CONSTANTS, StatKind } from '../types/standings.types';
import { FairPlayScorer } from './fair-play';

/**
 * Statistic change for the home and away team from one game
 */
export type StatDelta = readonly [home: number, away: number];

type DeltaFn = (game: PlayedGroupGame, fairPlay: FairPlayScorer) => StatDelta;

const { WIN, DRAW, LOSS } = STANDINGS_CONSTANTS.POINTS;

export const STAT_DELTAS: Record<StatKind, DeltaFn> = {
  points: ({ score }) => {
    if (score.home > score.away) return [WIN, LOSS];
    if (score.home < score.away) return [LOSS, WIN];
    return [DRAW, DRAW];
  },
  goalDiff: ({ score }) => [score.home - score.away, score.away - score.home],
  goalsScored: ({ score }) => [score.home, score.away],
  wins: ({ score }) => [score.home > score.away ? 1 : 0, score.away > score.home ? 1 : 0],
  fairPlay: (game, fairPlay) => [
    fairPlay.score(game.fairPlay.home),
    fairPlay.score(game.fairPlay.away),
  ],
};

export function statDelta(
  stat: StatKind,
  game: PlayedGroupGame,
  fairPlay: FairPlayScorer,
): StatDelta {
  return STAT_DELTAS[stat](game, fairPlay);
}
