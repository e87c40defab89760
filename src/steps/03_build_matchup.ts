import fs from 'node:fs';
import path from 'node:path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import _ from 'lodash';
import { CURRENT_SEASON, MATCHUP_DIR } from '../config';
import { flattenObject, writeJson } from '../utils';
import { loadSeasonRows } from './02_build_season_stats';
import { buildSeasonAggregate, toGameRecord } from './engine';
import type { TeamGameStats, TeamSeasonAggregate } from './engine';

export interface TeamMatchupSide {
  team: string;
  season: TeamSeasonAggregate;
  games: Record<string, unknown>[];
}

export interface Matchup {
  season: string;
  teams: [string, string];
  head_to_head: string[];
  sides: [TeamMatchupSide, TeamMatchupSide];
}

function buildSide(team: string, rows: TeamGameStats[]): TeamMatchupSide {
  const own = _.sortBy(
    rows.filter((row) => row.team === team),
    (row) => row.game_id,
  );
  if (!own.length) {
    throw new Error(`No derived stats for team ${team}`);
  }
  return { team, season: buildSeasonAggregate(team, own), games: own.map(toGameRecord) };
}

export function buildMatchup(season: string, teamA: string, teamB: string, rows: TeamGameStats[]): Matchup {
  if (teamA === teamB) {
    throw new Error(`A matchup needs two different teams, got ${teamA} twice`);
  }
  const headToHead = _.uniq(
    rows.filter((row) => row.team === teamA && row.opponent === teamB).map((row) => row.game_id),
  ).sort();

  return {
    season,
    teams: [teamA, teamB],
    head_to_head: headToHead,
    sides: [buildSide(teamA, rows), buildSide(teamB, rows)],
  };
}

export function toCsv(rows: Record<string, unknown>[]): string {
  if (rows.length === 0) return '';
  const flatRows = rows.map((row) => flattenObject(row));
  const keysSet = new Set<string>();
  flatRows.forEach((r) => Object.keys(r).forEach((k) => keysSet.add(k)));
  const headerKeys = Array.from(keysSet);
  const header = headerKeys.join(',');
  const lines = flatRows.map((record) => {
    return headerKeys
      .map((key) => {
        const value = record[key];
        if (value === null || value === undefined) return '';
        const str = String(value);
        return str.includes(',') || str.includes('"') || str.includes('\n')
          ? `"${str.replace(/"/g, '""')}"`
          : str;
      })
      .join(',');
  });

  return [header, ...lines].join('\n');
}

function writeCsv(pathname: string, rows: Record<string, unknown>[]): void {
  fs.mkdirSync(path.dirname(pathname), { recursive: true });
  fs.writeFileSync(pathname, toCsv(rows));
  console.info(`Wrote ${rows.length} rows -> ${pathname}`);
}

export async function buildMatchupFiles(options: { season?: string; teamA: string; teamB: string }): Promise<void> {
  const season = options.season ?? CURRENT_SEASON;
  const matchup = buildMatchup(season, options.teamA, options.teamB, loadSeasonRows(season));
  const base = path.join(MATCHUP_DIR, season, `${options.teamA}_vs_${options.teamB}`);

  writeJson(`${base}.json`, matchup);
  console.info(`Wrote matchup -> ${base}.json`);
  writeCsv(
    `${base}.csv`,
    matchup.sides.flatMap((side) => side.games),
  );
}

if (require.main === module) {
  const argv = yargs(hideBin(process.argv))
    .option('season', {
      type: 'string',
      describe: 'Season to read derived stats from',
      default: CURRENT_SEASON,
    })
    .option('team-a', {
      type: 'string',
      describe: 'First team of the matchup',
      demandOption: true,
    })
    .option('team-b', {
      type: 'string',
      describe: 'Second team of the matchup',
      demandOption: true,
    })
    .help()
    .parseSync();

  buildMatchupFiles({ season: argv.season, teamA: argv['team-a'], teamB: argv['team-b'] }).catch((err) => {
    console.error(err);
    process.exitCode = 1;
  });
}
