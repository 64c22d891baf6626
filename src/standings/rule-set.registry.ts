import { Injectable, Logger } from '@nestjs/common';
import { Group } from './domain/group';
import { TiebreakerConfigError } from './errors/standings.errors';
import { euro2020, fifa2018 } from './rules/presets';
import { RuleSet } from './rules/rule-set';
import { ManualOutcome, ManualTiebreaker } from './tiebreakers/manual.tiebreaker';
import { RandomBitSource, RandomTiebreaker } from './tiebreakers/random.tiebreaker';
import { RankingTiebreaker } from './tiebreakers/ranking.tiebreaker';
import { STANDINGS_CONSTANTS, TeamId } from './types/standings.types';

export interface PresetOptions {
  /** Groups the rule set will order; tiebreakers validate against them */
  groups: Group[];
  ranking?: ReadonlyMap<TeamId, number>;
  manual?: ManualOutcome[];
  random?: RandomBitSource;
}

export type RuleSetFactory = (options: PresetOptions) => RuleSet;

export type TiebreakOption = 'ranking' | 'manual' | 'random';

const TIEBREAK_OPTIONS: readonly TiebreakOption[] = ['ranking', 'manual', 'random'];

interface PresetDefinition {
  factory: RuleSetFactory;
  accepts: readonly TiebreakOption[];
}

/**
 * Named rule set presets
 */
@Injectable()
export class RuleSetRegistry {
  private readonly logger = new Logger(RuleSetRegistry.name);
  private readonly presets = new Map<string, PresetDefinition>();

  constructor() {
    this.register(
      STANDINGS_CONSTANTS.PRESETS.FIFA_2018,
      ({ manual, random }) => {
        if (manual && random) {
          throw new TiebreakerConfigError(
            `${STANDINGS_CONSTANTS.PRESETS.FIFA_2018} takes manual outcomes or a random source, not both`,
          );
        }
        return fifa2018(manual ? new ManualTiebreaker(manual) : new RandomTiebreaker(random));
      },
      ['manual', 'random'],
    );
    this.register(
      STANDINGS_CONSTANTS.PRESETS.EURO_2020,
      ({ groups, ranking }) => {
        if (!ranking) {
          throw new TiebreakerConfigError(
            `${STANDINGS_CONSTANTS.PRESETS.EURO_2020} needs a team ranking`,
          );
        }
        return euro2020(RankingTiebreaker.create(groups, ranking));
      },
      ['ranking'],
    );
  }

  /**
   * @param accepts - tiebreak options the factory reads; any other option is refused by `create`
   */
  register(
    name: string,
    factory: RuleSetFactory,
    accepts: readonly TiebreakOption[] = TIEBREAK_OPTIONS,
  ): void {
    if (this.presets.has(name)) {
      this.logger.warn(`Replacing rule set preset ${name}`);
    }
    this.presets.set(name, { factory, accepts });
  }

  has(name: string): boolean {
    return this.presets.has(name);
  }

  names(): string[] {
    return [...this.presets.keys()];
  }

  /**
   * Whether the preset reads the given option, e.g. to skip loading a ranking nobody uses
   */
  accepts(name: string, option: TiebreakOption): boolean {
    return this.presets.get(name)?.accepts.includes(option) ?? false;
  }

  /**
   * @throws TiebreakerConfigError for an unknown preset or options the preset rejects
   */
  create(name: string, options: PresetOptions): RuleSet {
    const preset = this.presets.get(name);
    if (!preset) {
      throw new TiebreakerConfigError(
        `Unknown rule set preset ${name}, expected one of: ${this.names().join(', ')}`,
      );
    }

    const unused = TIEBREAK_OPTIONS.filter(
      (option) => options[option] !== undefined && !preset.accepts.includes(option),
    );
    if (unused.length > 0) {
      throw new TiebreakerConfigError(
        `Rule set preset ${name} does not take: ${unused.join(', ')}`,
      );
    }

    return preset.factory(options);
  }
}
