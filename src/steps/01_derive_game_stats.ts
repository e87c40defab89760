import fs from 'node:fs';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { DERIVED_DIR, PBP_DIR } from '../config';
import { listJsonFiles, listSeasons, readJson, writeJson } from '../utils';
import { InvariantViolationError, parseGameInput, processGame } from './engine';
import type { TeamGameStats } from './engine';
import type { StatCalculator } from './calculators';

export interface GameFile {
  season: string;
  gameId: string;
  filePath: string;
}

function listGameFiles(options: { season?: string; game?: string }): GameFile[] {
  if (!fs.existsSync(PBP_DIR)) {
    throw new Error(`PBP directory not found at ${PBP_DIR}`);
  }

  const seasons = listSeasons(PBP_DIR).filter((season) => !options.season || season === options.season);
  return seasons.flatMap((season) =>
    listJsonFiles(path.join(PBP_DIR, season))
      .map((filePath) => ({ season, gameId: path.basename(filePath, '.json'), filePath }))
      .filter((file) => !options.game || file.gameId === options.game),
  );
}

export function deriveGameFile(file: GameFile, calculators?: StatCalculator[]): TeamGameStats[] {
  const parsed = parseGameInput(readJson(file.filePath), file.filePath);
  const game = parsed.season ? parsed : { ...parsed, season: file.season };
  const rows = processGame(game, calculators);

  rows.forEach((row) => {
    row.issues.forEach((issue) => {
      const log = issue.severity === 'error' ? console.error : console.warn;
      log(`   [${issue.code}] ${issue.message}`);
    });
  });

  const outPath = path.join(DERIVED_DIR, file.season, `${game.game_id}.json`);
  writeJson(outPath, rows);
  console.info(`Wrote derived stats for ${rows.length} team-entries -> ${outPath}`);
  return rows;
}

/**
 * Derives every file in turn. A file that cannot be read as a game is logged
 * and skipped; its path is returned so the caller can report it.
 */
export function deriveGameFiles(files: GameFile[], calculators?: StatCalculator[]): string[] {
  const skipped: string[] = [];
  files.forEach((file) => {
    try {
      deriveGameFile(file, calculators);
    } catch (err) {
      if (err instanceof InvariantViolationError) throw err;
      const reason = err instanceof Error ? err.message : String(err);
      console.warn(`   Skipping ${file.filePath}: ${reason}`);
      skipped.push(file.filePath);
    }
  });
  return skipped;
}

export async function deriveGameStats(options?: {
  season?: string;
  game?: string;
  calculators?: StatCalculator[];
}): Promise<void> {
  const files = listGameFiles({ season: options?.season, game: options?.game });
  if (!files.length) {
    console.info('No PBP files found; nothing to do.');
    return;
  }

  const skipped = deriveGameFiles(files, options?.calculators);
  if (skipped.length) {
    console.warn(`Skipped ${skipped.length} malformed game file(s)`);
    process.exitCode = 1;
  }
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('season', {
      type: 'string',
      describe: 'Only process this season',
    })
    .option('game', {
      type: 'string',
      describe: 'Only reprocess this game id',
    })
    .help()
    .parseSync();

  deriveGameStats({ season: argv.season, game: argv.game }).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
