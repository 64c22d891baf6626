import { MissingComparisonError, TiebreakerConfigError } from '../errors/standings.errors';
import { TeamId } from '../types/standings.types';
import { Tiebreaker } from './tiebreaker';

export interface ManualOutcome {
  higher: TeamId;
  lower: TeamId;
}

const pairKey = (a: TeamId, b: TeamId): string => JSON.stringify([a, b]);

/**
 * Replays tiebreaks decided outside the system, e.g. a drawing of lots held by the organiser.
 */
export class ManualTiebreaker extends Tiebreaker {
  readonly name = 'manual';
  private readonly outcomes = new Map<string, number>();

  /**
   * @throws TiebreakerConfigError for a team placed above itself or a pair decided both ways
   */
  constructor(outcomes: ManualOutcome[]) {
    super();
    for (const { higher, lower } of outcomes) {
      if (higher === lower || this.outcomes.get(pairKey(higher, lower)) === 1) {
        throw new TiebreakerConfigError(`Contradictory manual outcome: ${higher} above ${lower}`);
      }
      this.outcomes.set(pairKey(higher, lower), -1);
      this.outcomes.set(pairKey(lower, higher), 1);
    }
  }

  /**
   * @throws MissingComparisonError when the pair was never decided. Not recoverable.
   */
  compare(a: TeamId, b: TeamId): number {
    const outcome = this.outcomes.get(pairKey(a, b));
    if (outcome === undefined) {
      throw new MissingComparisonError(a, b);
    }
    return outcome;
  }
}
