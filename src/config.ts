import path from 'node:path';
import process from 'node:process';

export const PROJECT_ROOT = path.resolve(__dirname, '..');
export const DATA_DIR = process.env.PBP_DATA_DIR
  ? path.resolve(process.env.PBP_DATA_DIR)
  : path.join(PROJECT_ROOT, 'data');
export const PBP_DIR = path.join(DATA_DIR, 'pbp_data');
export const DERIVED_DIR = path.join(DATA_DIR, 'derived_stats');
export const SEASON_DIR = path.join(DATA_DIR, 'season_stats');
export const MATCHUP_DIR = path.join(DATA_DIR, 'matchup');
export const SCHEMA_PATH = path.join(PROJECT_ROOT, 'stats-schema.json');
export const CURRENT_SEASON = (process.env.CURRENT_SEASON ?? new Date().getFullYear()).toString();
