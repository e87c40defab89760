import { normalizePlays } from '../normalize';
import { Drive, DriveOutcome, GameInput, Play, RawPlayRecord, TeamPair } from '../types';

export const TEAMS: TeamPair = ['HOME', 'AWAY'];

export function rawPlay(overrides: Partial<RawPlayRecord> = {}): RawPlayRecord {
  return {
    team: 'HOME',
    quarter: 1,
    clock: '15:00',
    down: 1,
    distance: 10,
    spot: 'HOME25',
    play_type: 'rush',
    yards_gained: 0,
    scoring_flag: false,
    turnover_flag: false,
    penalty_flags: [],
    review_flags: [],
    raw_text: '',
    ...overrides,
  };
}

export function kickoff(team: string, overrides: Partial<RawPlayRecord> = {}): RawPlayRecord {
  return rawPlay({
    team,
    down: null,
    distance: null,
    spot: `${team}35`,
    play_type: 'kick',
    raw_text: 'K.Foot kickoff 65 yards, touchback.',
    ...overrides,
  });
}

export function playsOf(records: RawPlayRecord[]): Play[] {
  return normalizePlays(records, TEAMS);
}

export function gameOf(records: RawPlayRecord[], overrides: Partial<GameInput> = {}): GameInput {
  return {
    game_id: 'G1',
    season: '2024',
    week: '1',
    date: '2024-09-01',
    teams: TEAMS,
    plays: records,
    ...overrides,
  };
}

/** A bare drive for zone and scoring checks that never look at plays. */
export function driveOf(
  offense: string,
  start: number | null,
  outcome: DriveOutcome,
  overrides: Partial<Drive> = {},
): Drive {
  return {
    number: 1,
    offense_team: offense,
    start_yards_to_goal: start,
    plays: [],
    outcome,
    conversion: null,
    ...overrides,
  };
}

/**
 * Kickoff, AWAY punt, HOME 75-yard TD with a good kick, AWAY interception,
 * HOME TD off the takeaway with a good two-point pass.
 */
export function sampleGameRecords(): RawPlayRecord[] {
  return [
    kickoff('HOME'),
    rawPlay({ team: 'AWAY', spot: 'AWAY25', yards_gained: 5, raw_text: 'R.Run rush for 5 yards' }),
    rawPlay({ team: 'AWAY', down: 2, distance: 5, spot: 'AWAY30', play_type: 'pass', raw_text: 'Q.Arm pass incomplete' }),
    rawPlay({ team: 'AWAY', down: 3, distance: 5, spot: 'AWAY30', play_type: 'pass', raw_text: 'Q.Arm pass incomplete' }),
    rawPlay({
      team: 'AWAY',
      down: 4,
      distance: 5,
      spot: 'AWAY30',
      play_type: 'kick',
      raw_text: 'P.Leg punts 45 yards to HOME25',
    }),
    rawPlay({
      team: 'HOME',
      spot: 'HOME25',
      yards_gained: 75,
      scoring_flag: true,
      raw_text: 'R.Back rush for 75 yards, TOUCHDOWN',
    }),
    rawPlay({
      team: 'HOME',
      down: null,
      distance: null,
      spot: 'AWAY3',
      play_type: 'kick',
      scoring_flag: true,
      raw_text: 'K.Foot kick attempt is good',
    }),
    kickoff('HOME', { quarter: 1 }),
    rawPlay({
      team: 'AWAY',
      spot: 'AWAY25',
      play_type: 'pass',
      turnover_flag: true,
      raw_text: 'Q.Arm pass intercepted by S.Safe at AWAY40',
    }),
    rawPlay({
      team: 'HOME',
      spot: 'AWAY40',
      yards_gained: 40,
      scoring_flag: true,
      raw_text: 'R.Back rush for 40 yards, TOUCHDOWN',
    }),
    rawPlay({
      team: 'HOME',
      down: null,
      distance: null,
      spot: 'AWAY3',
      play_type: 'pass',
      scoring_flag: true,
      raw_text: 'Q.Back pass attempt is good',
    }),
  ];
}

/**
 * HOME scores a touchdown on a drive that starts at the AWAY 18, through an
 * accepted holding foul and a declined offside; AWAY runs out the clock.
 */
export function redZoneGameRecords(): RawPlayRecord[] {
  return [
    rawPlay({ spot: 'AWAY18', yards_gained: 5, raw_text: 'R.Run rush for 5 yards' }),
    rawPlay({
      down: 2,
      distance: 5,
      spot: 'AWAY13',
      penalty_flags: [{ team: 'HOME', type: 'Holding', yards: 10, declined: false }],
      raw_text: 'R.Run rush for 13 yards. PENALTY HOME Holding 10 yards NO PLAY.',
    }),
    rawPlay({
      down: 2,
      distance: 5,
      spot: 'AWAY13',
      play_type: 'pass',
      yards_gained: 13,
      scoring_flag: true,
      penalty_flags: [{ team: 'AWAY', type: 'Offside', yards: 5, declined: true }],
      raw_text: 'Q.Back pass for 13 yards, TOUCHDOWN. PENALTY AWAY Offside declined.',
    }),
    rawPlay({
      down: null,
      distance: null,
      spot: 'AWAY3',
      play_type: 'kick',
      scoring_flag: true,
      raw_text: 'K.Foot kick attempt is good',
    }),
    kickoff('HOME'),
    rawPlay({ team: 'AWAY', quarter: 4, spot: 'AWAY25', yards_gained: 2, raw_text: 'R.Run rush for 2 yards' }),
  ];
}
