import { PlayedGameInput } from '../domain/group';
import { FairPlayCards, FairPlayScore, NO_CARDS } from '../types/standings.types';

export const MOCK_DATE = new Date('2018-06-14T15:00:00Z');

export const cards = (overrides: Partial<FairPlayCards> = {}): FairPlayCards => ({
  ...NO_CARDS,
  ...overrides,
});

/**
 * Played game fixture, e.g. `played('g1', 'A', 'B', [0, 2])` for A 0-2 B
 */
export function played(
  id: string,
  home: string,
  away: string,
  [homeGoals, awayGoals]: [number, number],
  fairPlay?: Partial<FairPlayScore>,
): PlayedGameInput {
  return {
    id,
    home,
    away,
    score: { home: homeGoals, away: awayGoals },
    fairPlay,
    date: MOCK_DATE,
  };
}
