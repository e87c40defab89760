import { isPlainObject } from '../../utils';
import { GameInput, PlayType, RawPenaltyFlag, RawPlayRecord, TeamGameStats, TeamPair } from './types';

const PLAY_TYPES: readonly PlayType[] = ['rush', 'pass', 'kick', 'penalty', 'other'];

const toNumber = (val: unknown): number | null => {
  if (val === null || val === undefined || val === '') return null;
  const num = typeof val === 'number' ? val : Number(val);
  return Number.isFinite(num) ? num : null;
};

const toText = (val: unknown): string | null => {
  if (typeof val === 'string') return val.trim() === '' ? null : val.trim();
  if (typeof val === 'number' && Number.isFinite(val)) return String(val);
  return null;
};

const toBool = (val: unknown): boolean =>
  val === true || val === 1 || (typeof val === 'string' && ['true', 'yes', '1', 'y'].includes(val.toLowerCase()));

function toPlayType(val: unknown): PlayType {
  const text = toText(val)?.toLowerCase() ?? '';
  if (text === 'run') return 'rush';
  return PLAY_TYPES.find((type) => type === text) ?? 'other';
}

function toPenaltyFlag(val: unknown): RawPenaltyFlag | null {
  if (typeof val === 'string') {
    return toText(val) === null ? null : { team: null, type: val.trim(), yards: null, declined: false };
  }
  if (!isPlainObject(val)) return null;
  const status = toText(val.status)?.toLowerCase();
  return {
    team: toText(val.team),
    type: toText(val.type) ?? toText(val.code) ?? 'UNKNOWN',
    yards: toNumber(val.yards),
    declined: toBool(val.declined) || status === 'declined',
  };
}

/**
 * Coerces one parser record. Malformed fields fall back to "unknown" values so
 * that a bad record degrades instead of aborting the game.
 */
export function toRawPlayRecord(val: unknown): RawPlayRecord {
  const record = isPlainObject(val) ? val : {};
  const penaltyFlags = Array.isArray(record.penalty_flags) ? record.penalty_flags : [];
  const reviewFlags = Array.isArray(record.review_flags) ? record.review_flags : [];

  return {
    team: toText(record.team),
    quarter: toNumber(record.quarter) ?? 0,
    clock: toText(record.clock) ?? '',
    down: toNumber(record.down),
    distance: toNumber(record.distance),
    spot: toText(record.spot),
    play_type: toPlayType(record.play_type),
    yards_gained: toNumber(record.yards_gained),
    scoring_flag: toBool(record.scoring_flag),
    turnover_flag: toBool(record.turnover_flag),
    penalty_flags: penaltyFlags
      .map(toPenaltyFlag)
      .filter((flag): flag is RawPenaltyFlag => flag !== null),
    review_flags: reviewFlags.map(toText).filter((flag): flag is string => flag !== null),
    raw_text: toText(record.raw_text) ?? '',
  };
}

function resolveTeams(game: Record<string, unknown>): TeamPair | null {
  const listed = Array.isArray(game.teams) ? game.teams.map(toText) : [];
  const [first, second] =
    listed.length === 2 ? listed : [toText(game.home_team), toText(game.away_team)];
  if (!first || !second || first === second) return null;
  return [first, second];
}

export function parseGameInput(value: unknown, source: string): GameInput {
  if (!isPlainObject(value)) {
    throw new Error(`Game file ${source} is not a JSON object`);
  }
  const gameId = toText(value.game_id);
  if (!gameId) {
    throw new Error(`Game file ${source} has no game_id`);
  }
  const teams = resolveTeams(value);
  if (!teams) {
    throw new Error(`Game ${gameId} (${source}) must name exactly two distinct teams`);
  }
  if (!Array.isArray(value.plays)) {
    throw new Error(`Game ${gameId} (${source}) has no plays array`);
  }

  return {
    game_id: gameId,
    season: toText(value.season) ?? '',
    week: toText(value.week),
    date: toText(value.date),
    teams,
    plays: value.plays.map((play: unknown) => toRawPlayRecord(play)),
  };
}

const isNumberRecord = (val: unknown): val is Record<string, number> =>
  isPlainObject(val) && Object.values(val).every((entry) => typeof entry === 'number');

/** Shallow shape check for rows written by the derive step. */
export function isTeamGameStats(val: unknown): val is TeamGameStats {
  return (
    isPlainObject(val) &&
    typeof val.game_id === 'string' &&
    typeof val.team === 'string' &&
    typeof val.opponent === 'string' &&
    typeof val.season === 'string' &&
    isNumberRecord(val.stats) &&
    Array.isArray(val.red_zone_plays) &&
    Array.isArray(val.explosive_plays) &&
    Array.isArray(val.two_pt_details) &&
    Array.isArray(val.post_turnover_drives) &&
    isPlainObject(val.penalty_breakdown) &&
    Array.isArray(val.issues)
  );
}

export function parseGameRows(value: unknown, source: string): TeamGameStats[] {
  if (!Array.isArray(value)) {
    throw new Error(`Derived stats file ${source} is not a JSON array`);
  }
  return value.map((row: unknown, idx) => {
    if (!isTeamGameStats(row)) {
      throw new Error(`Derived stats file ${source} has a malformed row at index ${idx}`);
    }
    return row;
  });
}
