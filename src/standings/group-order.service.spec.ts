import { Test, TestingModule } from '@nestjs/testing';
import { ConfigService } from '@nestjs/config';
import { Logger } from '@nestjs/common';
import { GroupOrderService } from './group-order.service';
import { Group } from './domain/group';
import { MissingComparisonError } from './errors/standings.errors';
import { euro2020, fifa2018 } from './rules/presets';
import { RuleSet } from './rules/rule-set';
import * as subOrdering from './rules/sub-ordering';
import { ManualTiebreaker } from './tiebreakers/manual.tiebreaker';
import { RandomBitSource, RandomTiebreaker } from './tiebreakers/random.tiebreaker';
import { RankingTiebreaker } from './tiebreakers/ranking.tiebreaker';
import { cards, played } from './testing/fixtures';

describe('GroupOrderService', () => {
  let service: GroupOrderService;
  let logSteps: boolean;

  // Manual tiebreaker without outcomes: throws if the rules leave anything tied
  const fifa = () => fifa2018(new ManualTiebreaker([]));

  const createService = async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [
        GroupOrderService,
        {
          provide: ConfigService,
          useValue: {
            get: jest.fn((key: string) => (key === 'standings.logSteps' ? logSteps : undefined)),
          },
        },
      ],
    }).compile();

    return module.get<GroupOrderService>(GroupOrderService);
  };

  beforeEach(async () => {
    logSteps = false;
    service = await createService();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should be defined', () => {
    expect(service).toBeDefined();
  });

  describe('FIFA 2018', () => {
    it('should order on points alone when they differ', () => {
      const group = Group.create({
        playedGames: [
          played('g1', 'A', 'B', [0, 2]),
          played('g2', 'C', 'D', [1, 1]),
          played('g3', 'C', 'D', [0, 1]),
        ],
      });

      const order = service.orderGroup(group, fifa());

      expect(order.toArray()).toEqual(['D', 'B', 'C', 'A']);
      expect(order.winner()).toBe('D');
      expect(order.runnerUp()).toBe('B');
    });

    it('should break points ties on goals scored when goal difference is level', () => {
      const group = Group.create({
        playedGames: [
          played('g1', 'A', 'B', [0, 1]),
          played('g2', 'C', 'D', [1, 0]),
          played('g3', 'A', 'C', [0, 0]),
          played('g4', 'B', 'D', [5, 5]),
        ],
      });

      expect(service.orderGroup(group, fifa()).toArray()).toEqual(['B', 'C', 'D', 'A']);
    });

    it('should break points ties on goal difference', () => {
      const group = Group.create({
        playedGames: [played('g1', 'A', 'B', [0, 2]), played('g2', 'C', 'D', [1, 0])],
      });

      expect(service.orderGroup(group, fifa()).toArray()).toEqual(['B', 'C', 'D', 'A']);
    });

    it('should rank the head-to-head winner first when all-games statistics are level', () => {
      // A and B: 6 points, +1 goal difference, 2 goals each; A beat B
      const group = Group.create({
        playedGames: [
          played('g1', 'A', 'C', [1, 0]),
          played('g2', 'B', 'C', [1, 0]),
          played('g3', 'B', 'C', [1, 0]),
          played('g4', 'A', 'B', [1, 0]),
          played('g5', 'A', 'D', [0, 1]),
        ],
      });

      expect(service.orderGroup(group, fifa()).toArray()).toEqual(['A', 'B', 'D', 'C']);
    });

    it('should fall back to fair play points', () => {
      const group = Group.create({
        playedGames: [played('g1', 'A', 'B', [0, 0], { home: cards({ yellow: 1 }) })],
      });

      expect(service.orderGroup(group, fifa()).toArray()).toEqual(['B', 'A']);
    });

    it('should draw lots for teams level on every criterion', () => {
      const source: RandomBitSource = { nextBit: jest.fn().mockReturnValue(false) };
      const group = Group.create({ playedGames: [played('g1', 'A', 'B', [2, 2])] });

      const order = service.orderGroup(group, fifa2018(new RandomTiebreaker(source)));

      expect([...order].sort()).toEqual(['A', 'B']);
      expect(source.nextBit).toHaveBeenCalled();
    });

    it('should replay a manual draw', () => {
      const group = Group.create({ playedGames: [played('g1', 'A', 'B', [2, 2])] });
      const ruleSet = fifa2018(new ManualTiebreaker([{ higher: 'B', lower: 'A' }]));

      expect(service.orderGroup(group, ruleSet).toArray()).toEqual(['B', 'A']);
    });

    it('should fail when a manual draw is missing for teams still level', () => {
      const group = Group.create({ playedGames: [played('g1', 'A', 'B', [2, 2])] });

      expect(() => service.orderGroup(group, fifa())).toThrow(MissingComparisonError);
    });

    it('should return the same order on repeated calls', () => {
      const group = Group.create({
        playedGames: [
          played('g1', 'A', 'B', [0, 1]),
          played('g2', 'C', 'D', [1, 0]),
          played('g3', 'A', 'C', [0, 0]),
          played('g4', 'B', 'D', [5, 5]),
        ],
      });
      const ruleSet = fifa();

      const first = service.orderGroup(group, ruleSet).toArray();
      const second = service.orderGroup(group, ruleSet).toArray();

      expect(second).toEqual(first);
    });
  });

  describe('Euro 2020', () => {
    // A and B on 6 points, A won their match, B has the better goal difference
    const group = Group.create({
      teams: ['A', 'B', 'C', 'D'],
      playedGames: [
        played('g1', 'A', 'B', [1, 0]),
        played('g2', 'A', 'D', [1, 0]),
        played('g3', 'C', 'A', [1, 0]),
        played('g4', 'B', 'C', [4, 0]),
        played('g5', 'B', 'D', [3, 0]),
        played('g6', 'C', 'D', [0, 0]),
      ],
    });
    const ranking = new Map([
      ['A', 10],
      ['B', 5],
      ['C', 3],
      ['D', 1],
    ]);

    it('should put head-to-head before overall goal difference', () => {
      const ruleSet = euro2020(RankingTiebreaker.create([group], ranking));

      expect(service.orderGroup(group, ruleSet).toArray()).toEqual(['A', 'B', 'C', 'D']);
      expect(service.orderGroup(group, fifa()).toArray()).toEqual(['B', 'A', 'C', 'D']);
    });

    it('should use internal disciplinary points', () => {
      const booked = Group.create({
        playedGames: [played('g1', 'A', 'B', [1, 1], { home: cards({ directRed: 1 }) })],
      });
      const ruleSet = euro2020(RankingTiebreaker.create([booked], ranking));

      expect(service.orderGroup(booked, ruleSet).toArray()).toEqual(['B', 'A']);
    });

    it('should fall back to the external ranking', () => {
      const level = Group.create({ playedGames: [played('g1', 'A', 'B', [0, 0])] });
      const ruleSet = euro2020(RankingTiebreaker.create([level], ranking));

      expect(service.orderGroup(level, ruleSet).toArray()).toEqual(['B', 'A']);
    });
  });

  describe('refine', () => {
    const group = Group.create({
      playedGames: [
        played('g1', 'A', 'B', [0, 1]),
        played('g2', 'C', 'D', [1, 0]),
        played('g3', 'A', 'C', [0, 0]),
        played('g4', 'B', 'D', [5, 5]),
      ],
    });

    it('should leave teams tied when the rules run out', () => {
      const pointsOnly = RuleSet.builder('points-only')
        .byAll('points')
        .tiebreakWith(new ManualTiebreaker([]))
        .build();

      expect(service.refine(group, pointsOnly).toArray()).toEqual([
        ['B', 'C'],
        ['A', 'D'],
      ]);
    });

    it('should keep the subsets a partition of the group at every step', () => {
      const ruleSet = fifa();

      for (let count = 0; count <= ruleSet.rules.length; count++) {
        const partial = new RuleSet('partial', ruleSet.rules.slice(0, count), ruleSet.tiebreaker);
        const subsets = service.refine(group, partial).toArray();
        const teams = subsets.flat();

        expect(subsets.every((subset) => subset.length > 0)).toBe(true);
        expect(new Set(teams).size).toBe(teams.length);
        expect([...teams].sort()).toEqual(['A', 'B', 'C', 'D']);
      }
    });

    it('should never move a decided team', () => {
      const afterPoints = new RuleSet('points', [{ stat: 'points', scope: 'all' }], fifa().tiebreaker);
      const subsetSizes = service.refine(group, afterPoints).toArray().map((subset) => subset.length);

      expect(subsetSizes).toEqual([2, 2]);
      const final = service.orderGroup(group, fifa()).toArray();
      expect(final.slice(0, 2).sort()).toEqual(['B', 'C']);
      expect(final.slice(2).sort()).toEqual(['A', 'D']);
    });

    it('should only apply rules to subsets that are still tied', () => {
      const applied = jest.spyOn(subOrdering, 'applySubOrdering');
      // B and C on 3 points and +1 goal difference, B scored more; A is decided by points
      const threeTeams = Group.create({
        playedGames: [played('g1', 'A', 'B', [0, 2]), played('g2', 'B', 'C', [0, 1])],
      });

      const order = service.refine(threeTeams, fifa());

      expect(order.toArray()).toEqual([['B'], ['C'], ['A']]);
      expect(applied.mock.calls.map(([, rule, tied]) => [rule.stat, tied])).toEqual([
        ['points', ['A', 'B', 'C']],
        ['goalDiff', ['B', 'C']],
        ['goalsScored', ['B', 'C']],
      ]);
    });

    it('should log each refinement step when enabled', async () => {
      logSteps = true;
      service = await createService();
      const debug = jest.spyOn(Logger.prototype, 'debug').mockImplementation(() => undefined);
      const strictAfterPoints = Group.create({
        playedGames: [
          played('g1', 'A', 'B', [0, 2]),
          played('g2', 'C', 'D', [1, 1]),
          played('g3', 'C', 'D', [0, 1]),
        ],
      });

      service.refine(strictAfterPoints, fifa());

      expect(debug).toHaveBeenCalledTimes(1);
      expect(debug).toHaveBeenCalledWith('fifa-2018 / points: [["D"],["B"],["C"],["A"]]');
    });
  });
});
