import { FairPlayCards, FairPlayWeights, STANDINGS_CONSTANTS } from '../types/standings.types';

/**
 * Converts the cards a team received in one game into a fair-play value.
 * Higher values are better.
 */
export interface FairPlayScorer {
  score(cards: FairPlayCards): number;
}

export class WeightedFairPlayScorer implements FairPlayScorer {
  constructor(private readonly weights: FairPlayWeights) {}

  score(cards: FairPlayCards): number {
    return (
      cards.yellow * this.weights.yellow +
      cards.indirectRed * this.weights.indirectRed +
      cards.directRed * this.weights.directRed +
      cards.yellowDirectRed * this.weights.yellowDirectRed
    );
  }
}

export const FIFA_FAIR_PLAY = new WeightedFairPlayScorer(STANDINGS_CONSTANTS.FIFA_FAIR_PLAY_WEIGHTS);

export const UEFA_FAIR_PLAY = new WeightedFairPlayScorer(STANDINGS_CONSTANTS.UEFA_FAIR_PLAY_WEIGHTS);
