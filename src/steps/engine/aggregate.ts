import { buildCalculators, buildPenaltyBreakdown } from '../calculators';
import type { DetailKey, StatCalculator, StatContext } from '../calculators';
import { assertDriveInvariants, segmentDrives } from './drives';
import { normalizePlays } from './normalize';
import { isScrimmage } from './plays';
import { opponentOf } from './spot';
import { collectTurnoverEvents, drivePoints, linkTurnovers, pointsOffTurnovers } from './turnovers';
import { Drive, GameInput, Play, PlayDetail, PostTurnoverDrive, TeamGameStats } from './types';
import { validateGameRow } from './validate';
import { collectRedZonePlays, tallyZones } from './zones';

export interface GameAnalysis {
  plays: Play[];
  drives: Drive[];
  postTurnoverDrives: PostTurnoverDrive[];
}

function buildStatContext(entry: TeamGameStats, details: Record<DetailKey, PlayDetail[]>): StatContext {
  return {
    season: entry.season,
    game_id: entry.game_id,
    team: entry.team,
    opponent: entry.opponent,
    stats: entry.stats,
    details,
    addStat(key: string, value: number) {
      entry.stats[key] = value;
    },
    incrementStat(key: string, by: number = 1) {
      const current = entry.stats[key] ?? 0;
      entry.stats[key] = current + by;
    },
    recordDetail(key: DetailKey, detail: PlayDetail) {
      details[key].push(detail);
    },
  };
}

export function analyzeGame(game: GameInput): GameAnalysis {
  const plays = normalizePlays(game.plays, game.teams);
  const drives = segmentDrives(plays);
  assertDriveInvariants(plays, drives, game.game_id);
  return { plays, drives, postTurnoverDrives: linkTurnovers(plays, drives) };
}

function driveStats(drives: Drive[], plays: Play[], team: string): Record<string, number> {
  const own = drives.filter((drive) => drive.offense_team === team);
  return {
    drives: own.length,
    unclassified_drives: own.filter((drive) => drive.start_yards_to_goal === null).length,
    incomplete_drives: own.filter((drive) => drive.outcome.type === 'Incomplete').length,
    unparsed_spots: plays.filter(
      (play) => isScrimmage(play) && play.team === team && play.flags.includes('unparsed_spot'),
    ).length,
    total_plays: plays.filter(
      (play) => isScrimmage(play) && play.team === team && !play.is_negated && play.kick === null,
    ).length,
  };
}

/** Points `team` earned from drive outcomes: its own scoring drives plus safeties it forced. */
export function pointsFromDrives(drives: Drive[], team: string): number {
  return drives.reduce((sum, drive) => {
    if (drive.offense_team === team) return sum + drivePoints(drive);
    return drive.outcome.type === 'Safety' ? sum + 2 : sum;
  }, 0);
}

function scoringStats(drives: Drive[], team: string, opponent: string): Record<string, number> {
  const pointsFor = pointsFromDrives(drives, team);
  const pointsAgainst = pointsFromDrives(drives, opponent);
  return {
    points_for: pointsFor,
    points_against: pointsAgainst,
    wins: pointsFor > pointsAgainst ? 1 : 0,
    losses: pointsFor < pointsAgainst ? 1 : 0,
    ties: pointsFor === pointsAgainst ? 1 : 0,
  };
}

function turnoverStats(
  plays: Play[],
  postTurnoverDrives: PostTurnoverDrive[],
  team: string,
): Record<string, number> {
  const events = collectTurnoverEvents(plays);
  const count = (predicate: (kind: string, lostBy: string, recoveredBy: string) => boolean) =>
    events.filter((event) => predicate(event.kind, event.lost_by, event.recovered_by)).length;

  return {
    turnovers_int: count((kind, lostBy) => kind === 'INT' && lostBy === team),
    turnovers_fumble: count((kind, lostBy) => kind === 'FUM' && lostBy === team),
    takeaways_int: count((kind, _lostBy, recoveredBy) => kind === 'INT' && recoveredBy === team),
    takeaways_fumble: count((kind, _lostBy, recoveredBy) => kind === 'FUM' && recoveredBy === team),
    points_off_turnovers: pointsOffTurnovers(postTurnoverDrives, team),
  };
}

export function buildTeamGameStats(
  game: GameInput,
  team: string,
  analysis: GameAnalysis,
  calculators: StatCalculator[],
): TeamGameStats {
  const opponent = opponentOf(team, game.teams) ?? '';
  const entry: TeamGameStats = {
    season: game.season,
    week: game.week,
    date: game.date,
    game_id: game.game_id,
    team,
    opponent,
    stats: {},
    red_zone_plays: [],
    explosive_plays: [],
    two_pt_details: [],
    post_turnover_drives: analysis.postTurnoverDrives,
    penalty_breakdown: buildPenaltyBreakdown(analysis.plays, team),
    issues: [],
  };
  const ctx = buildStatContext(entry, {
    explosive_plays: entry.explosive_plays,
    two_pt_details: entry.two_pt_details,
  });

  calculators.forEach((calc) => calc.init?.(ctx));
  analysis.plays.forEach((play) => {
    calculators.forEach((calc) => calc.accumulate?.(play, ctx));
  });

  const derived = {
    ...tallyZones(analysis.drives, team),
    ...driveStats(analysis.drives, analysis.plays, team),
    ...turnoverStats(analysis.plays, analysis.postTurnoverDrives, team),
    ...scoringStats(analysis.drives, team, opponent),
  };
  Object.entries(derived).forEach(([key, value]) => ctx.addStat(key, value));

  calculators.forEach((calc) => calc.finalize?.(ctx));

  entry.red_zone_plays = collectRedZonePlays(analysis.drives, team, { game_id: game.game_id, opponent });
  entry.issues = validateGameRow(entry);
  return entry;
}

/**
 * One row per team, in the order the game lists its teams. Each row also
 * carries the opponent's two-point tries, read from the other row.
 */
export function processGame(game: GameInput, calculators?: StatCalculator[]): TeamGameStats[] {
  const analysis = analyzeGame(game);
  const calcs = buildCalculators(calculators);
  const rows = game.teams.map((team) => buildTeamGameStats(game, team, analysis, calcs));

  rows.forEach((row) => {
    const other = rows.find((candidate) => candidate.team === row.opponent);
    row.stats.opp_two_pt_attempts = other?.stats.two_pt_attempts ?? 0;
    row.stats.opp_two_pt_conversions = other?.stats.two_pt_conversions ?? 0;
  });
  return rows;
}

/** Flat record merged into the dashboard's game object. */
export function toGameRecord(row: TeamGameStats): Record<string, unknown> {
  return {
    game_id: row.game_id,
    season: row.season,
    week: row.week,
    date: row.date,
    team: row.team,
    opponent: row.opponent,
    ...row.stats,
    red_zone_plays: row.red_zone_plays,
    explosive_plays: row.explosive_plays,
    two_pt_details: row.two_pt_details,
    post_turnover_drives: row.post_turnover_drives,
    penalty_breakdown: row.penalty_breakdown,
  };
}
