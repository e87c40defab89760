export type PlayType = 'rush' | 'pass' | 'kick' | 'penalty' | 'other';
export type TurnoverKind = 'INT' | 'FUM';
export type KickKind = 'kickoff' | 'punt' | 'field_goal' | 'extra_point';
export type ConversionKind = 'kick' | 'rush' | 'pass';
export type TeamPair = [string, string];

export interface RawPenaltyFlag {
  team: string | null;
  type: string;
  yards: number | null;
  declined: boolean;
}

/** One play as supplied by the play-by-play parser. */
export interface RawPlayRecord {
  team: string | null;
  quarter: number;
  clock: string;
  down: number | null;
  distance: number | null;
  spot: string | null;
  play_type: PlayType;
  yards_gained: number | null;
  scoring_flag: boolean;
  turnover_flag: boolean;
  penalty_flags: RawPenaltyFlag[];
  review_flags: string[];
  raw_text: string;
}

export interface GameInput {
  game_id: string;
  season: string;
  week: string | null;
  date: string | null;
  teams: TeamPair;
  plays: RawPlayRecord[];
}

export type PlayFlag = 'unparsed_spot' | 'unknown_team' | 'review_overturned';

export interface ConversionAttempt {
  kind: ConversionKind;
  good: boolean;
}

export interface PlayTurnover {
  kind: TurnoverKind;
  lost_by: string;
  recovered_by: string;
}

export interface Play {
  index: number;
  team: string | null;
  quarter: number;
  clock: string;
  down: number | null;
  distance: number | null;
  /** 0-99 from the offense's view, null when the spot could not be read. */
  yards_to_goal: number | null;
  play_type: PlayType;
  kick: KickKind | null;
  conversion: ConversionAttempt | null;
  yards_gained: number;
  is_scoring: boolean;
  is_turnover_raw: boolean;
  /** Raw turnover detail; only becomes an event when the play is not negated. */
  turnover: PlayTurnover | null;
  is_negated: boolean;
  review_overturned: boolean;
  penalties: RawPenaltyFlag[];
  raw_text: string;
  effective_text: string;
  flags: PlayFlag[];
}

export type DriveOutcomeType =
  | 'TD'
  | 'FG'
  | 'MissedFG'
  | 'Punt'
  | 'TurnoverOnDowns'
  | 'Turnover'
  | 'EndOfHalf'
  | 'EndOfGame'
  | 'Safety'
  | 'Incomplete';

export type DriveOutcome =
  | { type: Exclude<DriveOutcomeType, 'Turnover'> }
  | { type: 'Turnover'; kind: TurnoverKind };

export interface Drive {
  number: number;
  offense_team: string;
  start_yards_to_goal: number | null;
  plays: Play[];
  outcome: DriveOutcome;
  conversion: ConversionAttempt | null;
}

export type ZoneName = 'green_zone' | 'red_zone' | 'tight_red_zone';
export type TripOutcome = 'TD' | 'FG' | 'Failed' | 'Unresolved';

export interface ZoneTrip {
  zone: ZoneName;
  drive: Drive;
  outcome: TripOutcome;
}

export interface TurnoverEvent {
  kind: TurnoverKind;
  lost_by: string;
  recovered_by: string;
  source_play: Play;
}

export interface PostTurnoverDrive {
  turnover_type: TurnoverKind;
  turnover_by: string;
  recovered_by: string;
  drive_result: string | null;
  points_scored: number;
  play_description: string;
}

export interface PlayDetail {
  game_id: string;
  opponent: string;
  quarter: number;
  clock: string;
  down: number | null;
  distance: number | null;
  yards_to_goal: number | null;
  play_type: PlayType;
  yards: number;
  scoring: boolean;
  description: string;
}

export type PenaltyBreakdown = Record<string, { accepted: number; declined: number }>;

export type IssueSeverity = 'error' | 'warning';

export interface ValidationIssue {
  severity: IssueSeverity;
  code: string;
  message: string;
}

export interface TeamGameStats {
  season: string;
  week: string | null;
  date: string | null;
  game_id: string;
  team: string;
  opponent: string;
  stats: Record<string, number>;
  red_zone_plays: PlayDetail[];
  explosive_plays: PlayDetail[];
  two_pt_details: PlayDetail[];
  post_turnover_drives: PostTurnoverDrive[];
  penalty_breakdown: PenaltyBreakdown;
  issues: ValidationIssue[];
}

export type SeasonPostTurnoverDrive = PostTurnoverDrive & { game_id: string };

export interface TeamSeasonAggregate {
  season: string;
  team: string;
  games: number;
  game_ids: string[];
  totals: Record<string, number>;
  /** "W-L", or "W-L-T" once a tie is on the books. */
  record: string;
  rates: Record<string, number | null>;
  post_turnover_drives: SeasonPostTurnoverDrive[];
  red_zone_plays: PlayDetail[];
  penalty_breakdown: PenaltyBreakdown;
  unresolved_games: string[];
  issues: ValidationIssue[];
}
