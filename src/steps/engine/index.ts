export { analyzeGame, buildTeamGameStats, pointsFromDrives, processGame, toGameRecord } from './aggregate';
export type { GameAnalysis } from './aggregate';
export { assertDriveInvariants, describeOutcome, segmentDrives } from './drives';
export { InvariantViolationError } from './errors';
export { isTeamGameStats, parseGameInput, parseGameRows, toRawPlayRecord } from './input';
export { normalizePlay, normalizePlays } from './normalize';
export { buildSeasonAggregate, buildSeasonAggregates, computeRates, formatRecord } from './season';
export { matchTeam, opponentOf, parseYardsToGoal } from './spot';
export {
  collectTurnoverEvents,
  DEFAULT_TOUCHDOWN_POINTS,
  drivePoints,
  linkTurnovers,
  pointsOffTurnovers,
} from './turnovers';
export { missingStats, validateGameRow, validateSeasonAggregate } from './validate';
export { classifyDrive, classifyTripOutcome, collectRedZonePlays, tallyZones, ZONES } from './zones';
export type * from './types';
