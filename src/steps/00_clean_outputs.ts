import fs from 'node:fs';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { CURRENT_SEASON, DERIVED_DIR, MATCHUP_DIR, SEASON_DIR } from '../config';

function removePath(target: string): void {
  if (!fs.existsSync(target)) return;
  fs.rmSync(target, { recursive: true, force: true });
  console.info(`Removed ${target}`);
}

/** Drops a season's derived artifacts so the next run rebuilds them from play-by-play. */
export function cleanOutputs(options?: { season?: string }): void {
  const season = options?.season ?? CURRENT_SEASON;
  removePath(path.join(DERIVED_DIR, season));
  removePath(path.join(SEASON_DIR, `${season}.json`));
  removePath(path.join(MATCHUP_DIR, season));
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('season', {
      type: 'string',
      describe: 'Season whose outputs are removed',
      default: CURRENT_SEASON,
    })
    .help()
    .parseSync();

  cleanOutputs({ season: argv.season });
}
