import { ZONES, zoneStatKey } from './zones';
import { TeamGameStats, TeamSeasonAggregate, ValidationIssue } from './types';

export const SCORE_RATE_BAND = { min: 75, max: 95, minTrips: 10 };

const stat = (stats: Record<string, number>, key: string): number => stats[key] ?? 0;

export function validateZoneAccounting(
  stats: Record<string, number>,
  label: string,
): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  ZONES.forEach(({ name }) => {
    const trips = stat(stats, zoneStatKey(name, 'trips'));
    const tds = stat(stats, zoneStatKey(name, 'tds'));
    const fgs = stat(stats, zoneStatKey(name, 'fgs'));
    const failed = stat(stats, zoneStatKey(name, 'failed'));
    const unresolved = stat(stats, zoneStatKey(name, 'unresolved'));

    if (trips < tds + fgs + failed) {
      issues.push({
        severity: 'error',
        code: 'zone_overflow',
        message: `${label}: ${name} has ${trips} trips but ${tds + fgs + failed} scores and failures`,
      });
    }
    if (trips !== tds + fgs + failed + unresolved) {
      issues.push({
        severity: 'error',
        code: 'zone_accounting',
        message: `${label}: ${name} trips ${trips} != tds ${tds} + fgs ${fgs} + failed ${failed} + unresolved ${unresolved}`,
      });
    }
    if (unresolved > 0) {
      issues.push({
        severity: 'warning',
        code: 'zone_unresolved',
        message: `${label}: ${name} has ${unresolved} unresolved trip(s)`,
      });
    }
  });
  return issues;
}

export function validateGameRow(row: TeamGameStats): ValidationIssue[] {
  const label = `${row.game_id} ${row.team}`;
  const issues = validateZoneAccounting(row.stats, label);

  const linked = row.post_turnover_drives
    .filter((drive) => drive.recovered_by === row.team)
    .reduce((sum, drive) => sum + drive.points_scored, 0);
  const pot = stat(row.stats, 'points_off_turnovers');
  if (linked !== pot) {
    issues.push({
      severity: 'error',
      code: 'points_off_turnovers',
      message: `${label}: points_off_turnovers ${pot} != ${linked} from post-turnover drives`,
    });
  }

  Object.entries(row.stats).forEach(([key, value]) => {
    if (!Number.isFinite(value) || value < 0) {
      issues.push({
        severity: 'error',
        code: 'bad_counter',
        message: `${label}: ${key} = ${value}`,
      });
    }
  });

  return issues;
}

export function validateSeasonAggregate(aggregate: TeamSeasonAggregate): ValidationIssue[] {
  const label = `${aggregate.season} ${aggregate.team}`;
  const issues = validateZoneAccounting(aggregate.totals, label).filter(
    (issue) => issue.severity === 'error',
  );

  const trips = stat(aggregate.totals, 'red_zone_trips');
  const scoreRate = aggregate.rates.red_zone_score_pct;
  if (
    trips >= SCORE_RATE_BAND.minTrips &&
    scoreRate !== null &&
    scoreRate !== undefined &&
    (scoreRate < SCORE_RATE_BAND.min || scoreRate > SCORE_RATE_BAND.max)
  ) {
    issues.push({
      severity: 'warning',
      code: 'red_zone_score_rate',
      message: `${label}: red zone score rate ${scoreRate}% is outside ${SCORE_RATE_BAND.min}-${SCORE_RATE_BAND.max}%`,
    });
  }
  return issues;
}

export function missingStats(stats: Record<string, number>, expected: Iterable<string>): string[] {
  return Array.from(expected).filter((key) => stats[key] === undefined);
}
