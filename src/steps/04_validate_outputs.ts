import fs from 'node:fs';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { DERIVED_DIR } from '../config';
import { listSeasons } from '../utils';
import { loadSchemaStats } from './calculators';
import { loadSeasonRows } from './02_build_season_stats';
import { buildSeasonAggregates, missingStats, validateGameRow, validateSeasonAggregate } from './engine';
import type { TeamGameStats, ValidationIssue } from './engine';

export interface ValidationSummary {
  errors: number;
  warnings: number;
}

export function collectIssues(rows: TeamGameStats[], schemaStats: Set<string> | null): ValidationIssue[] {
  const issues: ValidationIssue[] = [];
  rows.forEach((row) => {
    if (schemaStats) {
      const missing = missingStats(row.stats, schemaStats);
      if (missing.length) {
        issues.push({
          severity: 'error',
          code: 'schema_missing',
          message: `${row.game_id} ${row.team}: missing ${missing.join(', ')}`,
        });
      }
    }
    issues.push(...validateGameRow(row));
  });
  buildSeasonAggregates(rows).forEach((aggregate) => {
    issues.push(...validateSeasonAggregate(aggregate));
  });
  return issues;
}

export async function validateOutputs(options?: { season?: string }): Promise<ValidationSummary> {
  if (!fs.existsSync(DERIVED_DIR)) {
    throw new Error(`Derived stats directory not found at ${DERIVED_DIR}`);
  }

  const schemaStats = loadSchemaStats();
  if (!schemaStats) {
    console.warn('No stats schema found; skipping shape checks.');
  }

  const summary: ValidationSummary = { errors: 0, warnings: 0 };
  listSeasons(DERIVED_DIR)
    .filter((season) => !options?.season || season === options.season)
    .forEach((season) => {
      const rows = loadSeasonRows(season);
      const issues = collectIssues(rows, schemaStats);
      issues.forEach((issue) => {
        if (issue.severity === 'error') {
          summary.errors += 1;
          console.error(`[${issue.code}] ${issue.message}`);
        } else {
          summary.warnings += 1;
          console.warn(`[${issue.code}] ${issue.message}`);
        }
      });
      console.info(`Validated ${rows.length} game rows for ${season}`);
    });

  console.info(`Validation finished: ${summary.errors} error(s), ${summary.warnings} warning(s)`);
  if (summary.errors > 0) {
    process.exitCode = 1;
  }
  return summary;
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('season', {
      type: 'string',
      describe: 'Only validate this season',
    })
    .help()
    .parseSync();

  validateOutputs({ season: argv.season }).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
