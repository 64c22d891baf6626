import { TiebreakerConfigError } from '../errors/standings.errors';
import { FIFA_FAIR_PLAY, FairPlayScorer } from '../stats/fair-play';
import { Tiebreaker } from '../tiebreakers/tiebreaker';
import { StatKind, SubOrderingRule } from '../types/standings.types';
import { allGames, internalGames } from './sub-ordering';

/**
 * Group ordering rules of one regulation
 *
 * A prioritised list of sub-ordering rules, which may leave teams level,
 * followed by the tiebreaker that guarantees a strict order.
 */
export class RuleSet {
  readonly rules: readonly SubOrderingRule[];

  constructor(
    readonly name: string,
    rules: SubOrderingRule[],
    readonly tiebreaker: Tiebreaker,
    readonly fairPlay: FairPlayScorer = FIFA_FAIR_PLAY,
  ) {
    this.rules = Object.freeze([...rules]);
  }

  static builder(name: string): RuleSetBuilder {
    return new RuleSetBuilder(name);
  }
}

export class RuleSetBuilder {
  private readonly rules: SubOrderingRule[] = [];
  private tiebreaker?: Tiebreaker;
  private fairPlay: FairPlayScorer = FIFA_FAIR_PLAY;

  constructor(private readonly name: string) {}

  byAll(stat: StatKind): this {
    this.rules.push(allGames(stat));
    return this;
  }

  byInternal(stat: StatKind): this {
    this.rules.push(internalGames(stat));
    return this;
  }

  withFairPlay(scorer: FairPlayScorer): this {
    this.fairPlay = scorer;
    return this;
  }

  tiebreakWith(tiebreaker: Tiebreaker): this {
    this.tiebreaker = tiebreaker;
    return this;
  }

  /**
   * @throws TiebreakerConfigError when no tiebreaker was given
   */
  build(): RuleSet {
    if (!this.tiebreaker) {
      throw new TiebreakerConfigError(`Rule set ${this.name} has no tiebreaker`);
    }
    return new RuleSet(this.name, this.rules, this.tiebreaker, this.fairPlay);
  }
}
