import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Group } from './domain/group';
import { GroupOrder, NonStrictGroupOrder } from './domain/group-order';
import { RuleSet } from './rules/rule-set';
import { applySubOrdering, describeRule } from './rules/sub-ordering';

/**
 * Group Order Service
 *
 * Orders a group greedily: the next rule is only applied while the order is non-strict,
 * and only to the subsets that are still tied. Rule priority therefore decides both the
 * outcome and how often the expensive head-to-head statistics are computed.
 * Whatever is left tied after the last rule goes to the rule set's tiebreaker.
 */
@Injectable()
export class GroupOrderService {
  private readonly logger = new Logger(GroupOrderService.name);
  private readonly logSteps: boolean;

  constructor(private configService: ConfigService) {
    this.logSteps = this.configService.get<boolean>('standings.logSteps') ?? false;
  }

  /**
   * Strict order of the group under the rule set
   */
  orderGroup(group: Group, ruleSet: RuleSet): GroupOrder {
    const order = this.refine(group, ruleSet);
    if (order.isStrict()) {
      return GroupOrder.fromNonStrict(order);
    }

    this.logger.log(
      `${ruleSet.name}: ${order.tiedSubsets().length} tied subset(s) left for the ${ruleSet.tiebreaker.name} tiebreaker`,
    );
    return ruleSet.tiebreaker.order(group, order);
  }

  /**
   * Applies the rules in priority order until the order is strict or the rules run out
   */
  refine(group: Group, ruleSet: RuleSet): NonStrictGroupOrder {
    let order = NonStrictGroupOrder.init(group);

    for (const rule of ruleSet.rules) {
      if (order.isStrict()) break;

      let next = NonStrictGroupOrder.empty();
      for (const subset of order) {
        next = next.concat(
          subset.length > 1
            ? applySubOrdering(group, rule, subset, ruleSet.fairPlay)
            : NonStrictGroupOrder.single(subset),
        );
      }
      order = next;

      if (this.logSteps) {
        this.logger.debug(`${ruleSet.name} / ${describeRule(rule)}: ${JSON.stringify(order.toArray())}`);
      }
    }

    return order;
  }
}
