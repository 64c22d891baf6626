import { randomInt } from 'crypto';
import { TeamId } from '../types/standings.types';
import { Tiebreaker } from './tiebreaker';

export interface RandomBitSource {
  nextBit(): boolean;
}

export class CryptoRandomBitSource implements RandomBitSource {
  nextBit(): boolean {
    return randomInt(2) === 1;
  }
}

/**
 * Drawing of lots
 *
 * Every comparison draws a fresh unbiased bit, so two comparisons of the same pair
 * within one sort may disagree. The result is a strict order but is neither
 * reproducible nor transitive unless the bit source is.
 */
export class RandomTiebreaker extends Tiebreaker {
  readonly name = 'random';

  constructor(private readonly source: RandomBitSource = new CryptoRandomBitSource()) {
    super();
  }

  compare(_a: TeamId, _b: TeamId): number {
    return this.source.nextBit() ? -1 : 1;
  }
}
