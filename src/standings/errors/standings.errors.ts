import { TeamId } from '../types/standings.types';

export enum GroupErrorCode {
  EMPTY_GROUP = 'EMPTY_GROUP',
  DUPLICATE_TEAM = 'DUPLICATE_TEAM',
  DUPLICATE_GAME = 'DUPLICATE_GAME',
  SAME_TEAM = 'SAME_TEAM',
  UNKNOWN_TEAM = 'UNKNOWN_TEAM',
  INVALID_SCORE = 'INVALID_SCORE',
  INVALID_CARDS = 'INVALID_CARDS',
}

/**
 * Base class for every error raised by the standings engine
 */
export class StandingsError extends Error {
  constructor(
    message: string,
    readonly code: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Raised when group data breaks a structural invariant at construction
 */
export class GroupError extends StandingsError {
  constructor(code: GroupErrorCode, message: string) {
    super(message, code);
  }
}

/**
 * Raised when a non-strict order is converted to a strict one
 */
export class NonStrictOrderError extends StandingsError {
  constructor(readonly tiedSubsets: TeamId[][]) {
    super(
      `Order is not strict, tied subsets: ${tiedSubsets.map((s) => `[${s.join(', ')}]`).join(' ')}`,
      'NON_STRICT_ORDER',
    );
  }
}

/**
 * Raised while a rule set or tiebreaker is built, before any ordering runs
 */
export class TiebreakerConfigError extends StandingsError {
  constructor(
    message: string,
    readonly missingTeams: TeamId[] = [],
  ) {
    super(message, 'TIEBREAKER_CONFIG');
  }
}

/**
 * Fatal: a manual tiebreaker was asked about a pair it has no outcome for.
 * The outcome was decided outside the system and cannot be synthesised.
 */
export class MissingComparisonError extends StandingsError {
  constructor(
    readonly first: TeamId,
    readonly second: TeamId,
  ) {
    super(`No manual comparison exists for teams ${first} and ${second}`, 'MISSING_COMPARISON');
  }
}

/**
 * Fatal: a tied team has no computed statistic value
 */
export class MissingStatisticError extends StandingsError {
  constructor(
    readonly team: TeamId,
    readonly stat: string,
  ) {
    super(`No ${stat} value computed for team ${team}`, 'MISSING_STATISTIC');
  }
}
