import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Group } from './domain/group';
import { GroupOrder } from './domain/group-order';
import { parseGroupDto } from './dto/group.dto';
import { GroupOrderService } from './group-order.service';
import { RuleSet } from './rules/rule-set';
import { PresetOptions, RuleSetRegistry } from './rule-set.registry';
import { GroupDataService } from './services/group-data.service';
import { STANDINGS_CONSTANTS, TeamId } from './types/standings.types';

export type OrderOptions = Omit<PresetOptions, 'groups'> & {
  /** Preset name, defaults to `standings.defaultPreset` */
  preset?: string;
};

export interface Qualifiers {
  winner: TeamId;
  runnerUp: TeamId;
}

/**
 * Standings Service
 *
 * Entry point for ordering groups: picks the rule set preset, builds its tiebreaker
 * for the groups at hand and runs the group order.
 */
@Injectable()
export class StandingsService {
  private readonly logger = new Logger(StandingsService.name);
  private readonly defaultPreset: string;

  constructor(
    private groupOrderService: GroupOrderService,
    private ruleSetRegistry: RuleSetRegistry,
    private groupDataService: GroupDataService,
    private configService: ConfigService,
  ) {
    this.defaultPreset =
      this.configService.get<string>('standings.defaultPreset') ??
      STANDINGS_CONSTANTS.PRESETS.FIFA_2018;
  }

  orderGroup(group: Group, options: OrderOptions = {}): GroupOrder {
    const ruleSet = this.ruleSetFor([group], options);
    return this.groupOrderService.orderGroup(group, ruleSet);
  }

  /**
   * Validates plain group data and orders it
   */
  orderFromInput(plain: object, options: OrderOptions = {}): GroupOrder {
    return this.orderGroup(parseGroupDto(plain), options);
  }

  /**
   * Orders a stored group; presets ordering by ranking get the stored one unless one is given
   */
  async orderStoredGroup(name: string, options: OrderOptions = {}): Promise<GroupOrder> {
    const group = await this.groupDataService.loadGroup(name);
    const ranking = await this.rankingFor(options);
    return this.orderGroup(group, { ...options, ranking });
  }

  /**
   * Orders every stored group with one rule set
   * @returns Map of group names to their orders
   */
  async orderAllStoredGroups(options: OrderOptions = {}): Promise<Map<string, GroupOrder>> {
    const groups = await this.groupDataService.loadGroups();
    const ranking = await this.rankingFor(options);
    const ruleSet = this.ruleSetFor([...groups.values()], { ...options, ranking });

    const orders = new Map<string, GroupOrder>();
    for (const [name, group] of groups) {
      orders.set(name, this.groupOrderService.orderGroup(group, ruleSet));
    }
    this.logger.log(`Ordered ${orders.size} group(s) with ${ruleSet.name}`);
    return orders;
  }

  /**
   * Group winner and runner-up, the teams advancing to the knockout bracket
   */
  async qualifiers(name: string, options: OrderOptions = {}): Promise<Qualifiers> {
    const order = await this.orderStoredGroup(name, options);
    return { winner: order.winner(), runnerUp: order.runnerUp() };
  }

  /**
   * The given ranking, else the stored one when the preset orders by ranking
   */
  private async rankingFor(
    options: OrderOptions,
  ): Promise<ReadonlyMap<TeamId, number> | undefined> {
    if (options.ranking) return options.ranking;

    const preset = options.preset ?? this.defaultPreset;
    if (!this.ruleSetRegistry.accepts(preset, 'ranking')) return undefined;

    return this.groupDataService.getTeamRanking();
  }

  private ruleSetFor(groups: Group[], options: OrderOptions): RuleSet {
    const { preset = this.defaultPreset, ...presetOptions } = options;

    if (!this.ruleSetRegistry.has(preset)) {
      throw new BadRequestException(
        `Unknown preset ${preset}, expected one of: ${this.ruleSetRegistry.names().join(', ')}`,
      );
    }

    return this.ruleSetRegistry.create(preset, { ...presetOptions, groups });
  }
}
