import fs from 'node:fs';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { DERIVED_DIR, SEASON_DIR } from '../config';
import { listJsonFiles, listSeasons, readJson, writeJson } from '../utils';
import { buildSeasonAggregates, parseGameRows } from './engine';
import type { TeamGameStats, TeamSeasonAggregate } from './engine';

export function loadSeasonRows(season: string): TeamGameStats[] {
  return listJsonFiles(path.join(DERIVED_DIR, season)).flatMap((filePath) =>
    parseGameRows(readJson(filePath), filePath),
  );
}

export function buildSeasonStatsFor(season: string): TeamSeasonAggregate[] {
  const aggregates = buildSeasonAggregates(loadSeasonRows(season));
  aggregates.forEach((aggregate) => {
    aggregate.issues.forEach((issue) => console.warn(`   [${issue.code}] ${issue.message}`));
  });

  const outPath = path.join(SEASON_DIR, `${season}.json`);
  writeJson(outPath, aggregates);
  console.info(`Wrote ${aggregates.length} team aggregates -> ${outPath}`);
  return aggregates;
}

export async function buildSeasonStats(options?: { season?: string }): Promise<void> {
  if (!fs.existsSync(DERIVED_DIR)) {
    throw new Error(`Derived stats directory not found at ${DERIVED_DIR}`);
  }

  const seasons = listSeasons(DERIVED_DIR).filter((season) => !options?.season || season === options.season);
  if (!seasons.length) {
    console.info('No derived stats found; nothing to do.');
    return;
  }

  seasons.forEach((season) => {
    buildSeasonStatsFor(season);
  });
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('season', {
      type: 'string',
      describe: 'Only aggregate this season',
    })
    .help()
    .parseSync();

  buildSeasonStats({ season: argv.season }).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
