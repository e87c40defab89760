import _ from 'lodash';
import { validateSeasonAggregate } from './validate';
import { ZONES, zoneStatKey } from './zones';
import { PenaltyBreakdown, TeamGameStats, TeamSeasonAggregate } from './types';

const pct = (numerator: number, denominator: number): number | null =>
  denominator > 0 ? _.round((numerator / denominator) * 100, 1) : null;

const perGame = (total: number, games: number): number | null =>
  games > 0 ? _.round(total / games, 2) : null;

function sumTotals(rows: TeamGameStats[]): Record<string, number> {
  const totals: Record<string, number> = {};
  rows.forEach((row) => {
    Object.entries(row.stats).forEach(([key, value]) => {
      totals[key] = (totals[key] ?? 0) + value;
    });
  });
  return totals;
}

/** Wins-losses, with ties appended only when there are any. */
export function formatRecord(totals: Record<string, number>): string {
  const wins = totals.wins ?? 0;
  const losses = totals.losses ?? 0;
  const ties = totals.ties ?? 0;
  return ties > 0 ? `${wins}-${losses}-${ties}` : `${wins}-${losses}`;
}

function mergeBreakdowns(rows: TeamGameStats[]): PenaltyBreakdown {
  const merged: PenaltyBreakdown = {};
  rows.forEach((row) => {
    Object.entries(row.penalty_breakdown).forEach(([type, counts]) => {
      const entry = merged[type] ?? { accepted: 0, declined: 0 };
      entry.accepted += counts.accepted;
      entry.declined += counts.declined;
      merged[type] = entry;
    });
  });
  return Object.fromEntries(Object.keys(merged).sort().map((type) => [type, merged[type]]));
}

export function computeRates(totals: Record<string, number>, games: number): Record<string, number | null> {
  const get = (key: string) => totals[key] ?? 0;
  const rates: Record<string, number | null> = {};

  ZONES.forEach(({ name }) => {
    const trips = get(zoneStatKey(name, 'trips'));
    const tds = get(zoneStatKey(name, 'tds'));
    const fgs = get(zoneStatKey(name, 'fgs'));
    rates[`${name}_td_pct`] = pct(tds, trips);
    rates[`${name}_fg_pct`] = pct(fgs, trips);
    rates[`${name}_score_pct`] = pct(tds + fgs, trips);
    rates[`${name}_failed_pct`] = pct(get(zoneStatKey(name, 'failed')), trips);
  });

  rates.fourth_down_pct = pct(get('fourth_down_conversions'), get('fourth_down_attempts'));
  rates.two_pt_pct = pct(get('two_pt_conversions'), get('two_pt_attempts'));
  rates.explosives_per_game = perGame(get('explosive_rushes') + get('explosive_passes'), games);
  rates.penalties_per_game = perGame(get('penalties'), games);
  rates.points_off_turnovers_per_game = perGame(get('points_off_turnovers'), games);
  rates.ppg = perGame(get('points_for'), games);
  rates.points_against_per_game = perGame(get('points_against'), games);
  rates.win_pct = pct(get('wins') + get('ties') / 2, games);
  rates.turnover_margin =
    get('takeaways_int') + get('takeaways_fumble') - get('turnovers_int') - get('turnovers_fumble');

  return rates;
}

/**
 * Folds one team's per-game rows into its season line. The result does not
 * depend on the order of `rows`; a game listed twice is counted once.
 */
export function buildSeasonAggregate(team: string, rows: TeamGameStats[]): TeamSeasonAggregate {
  const games = _.uniqBy(
    _.sortBy(
      rows.filter((row) => row.team === team),
      (row) => row.game_id,
    ),
    (row) => row.game_id,
  );
  const totals = sumTotals(games);

  const aggregate: TeamSeasonAggregate = {
    season: games[0]?.season ?? '',
    team,
    games: games.length,
    game_ids: games.map((row) => row.game_id),
    totals,
    record: formatRecord(totals),
    rates: computeRates(totals, games.length),
    post_turnover_drives: games.flatMap((row) =>
      row.post_turnover_drives.map((drive) => ({ game_id: row.game_id, ...drive })),
    ),
    red_zone_plays: games.flatMap((row) => row.red_zone_plays),
    penalty_breakdown: mergeBreakdowns(games),
    unresolved_games: games
      .filter((row) => ZONES.some(({ name }) => (row.stats[zoneStatKey(name, 'unresolved')] ?? 0) > 0))
      .map((row) => row.game_id),
    issues: [],
  };
  aggregate.issues = validateSeasonAggregate(aggregate);
  return aggregate;
}

export function buildSeasonAggregates(rows: TeamGameStats[]): TeamSeasonAggregate[] {
  return _.uniq(rows.map((row) => row.team))
    .sort()
    .map((team) => buildSeasonAggregate(team, rows));
}
