import { FIFA_FAIR_PLAY, UEFA_FAIR_PLAY } from '../stats/fair-play';
import { RandomTiebreaker } from '../tiebreakers/random.tiebreaker';
import { RankingTiebreaker } from '../tiebreakers/ranking.tiebreaker';
import { Tiebreaker } from '../tiebreakers/tiebreaker';
import { STANDINGS_CONSTANTS } from '../types/standings.types';
import { RuleSet } from './rule-set';

/**
 * FIFA World Cup 2018
 *
 * 1. Points in all group matches
 * 2. Goal difference in all group matches
 * 3. Goals scored in all group matches
 * 4. Points in the matches between the teams concerned
 * 5. Goal difference in the matches between the teams concerned
 * 6. Goals scored in the matches between the teams concerned
 * 7. Fair play points in all group matches
 *    (yellow -1, indirect red -3, direct red -4, yellow and direct red -5)
 * 8. Drawing of lots
 *
 * Pass a {@link ManualTiebreaker} to replay the lots actually drawn by FIFA.
 */
export function fifa2018(tiebreaker: Tiebreaker = new RandomTiebreaker()): RuleSet {
  return RuleSet.builder(STANDINGS_CONSTANTS.PRESETS.FIFA_2018)
    .byAll('points')
    .byAll('goalDiff')
    .byAll('goalsScored')
    .byInternal('points')
    .byInternal('goalDiff')
    .byInternal('goalsScored')
    .byAll('fairPlay')
    .withFairPlay(FIFA_FAIR_PLAY)
    .tiebreakWith(tiebreaker)
    .build();
}

/**
 * UEFA Euro 2020
 *
 * 1. Points in all group matches
 * 2. Points in the matches between the teams in question
 * 3. Goal difference in the matches between the teams in question
 * 4. Goals scored in the matches between the teams in question
 * 5. Goal difference in all group matches
 * 6. Wins in all group matches
 * 7. Disciplinary points (yellow 1, indirect red 3, direct red 3, yellow and direct red 5),
 *    lower is better
 * 8. European Qualifiers overall ranking
 *
 * Reapplying 2-4 to a still-level subset and the last-round penalty shoot-out are not modelled.
 */
export function euro2020(ranking: RankingTiebreaker): RuleSet {
  return RuleSet.builder(STANDINGS_CONSTANTS.PRESETS.EURO_2020)
    .byAll('points')
    .byInternal('points')
    .byInternal('goalDiff')
    .byInternal('goalsScored')
    .byAll('goalDiff')
    .byAll('wins')
    .byInternal('fairPlay')
    .withFairPlay(UEFA_FAIR_PLAY)
    .tiebreakWith(ranking)
    .build();
}
