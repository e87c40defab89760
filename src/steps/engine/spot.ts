import { TeamPair } from './types';

const ABSOLUTE_SPOT = /^\s*(\d{1,2})\s*$/;
const TEAM_RELATIVE_SPOT = /^\s*([A-Za-z][A-Za-z.&' ]*?)\s*-?\s*(\d{1,2})\s*$/;

export function matchTeam(token: string, teams: TeamPair): string | null {
  const needle = token.trim().toUpperCase();
  if (!needle) return null;
  return teams.find((team) => team.toUpperCase() === needle) ?? null;
}

export function opponentOf(team: string | null, teams: TeamPair): string | null {
  if (team === teams[0]) return teams[1];
  if (team === teams[1]) return teams[0];
  return null;
}

/**
 * Resolves a spot to yards-to-goal for `offense`. A bare number is already a
 * distance to the opponent's goal line; `ASU35` is ASU's 35-yard line.
 * Returns null for anything that cannot be placed on the field.
 */
export function parseYardsToGoal(
  spot: string | null,
  offense: string | null,
  teams: TeamPair,
): number | null {
  if (spot === null) return null;

  const absolute = ABSOLUTE_SPOT.exec(spot);
  if (absolute) {
    const ytg = Number(absolute[1]);
    return ytg <= 99 ? ytg : null;
  }

  const relative = TEAM_RELATIVE_SPOT.exec(spot);
  if (!relative || offense === null) return null;

  const side = matchTeam(relative[1], teams);
  const yardLine = Number(relative[2]);
  if (side === null || yardLine > 50) return null;

  const ytg = side === offense ? 100 - yardLine : yardLine;
  return ytg >= 0 && ytg <= 99 ? ytg : null;
}
