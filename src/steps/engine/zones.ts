import { isScrimmage, toPlayDetail } from './plays';
import { Drive, DriveOutcome, PlayDetail, TripOutcome, ZoneName, ZoneTrip } from './types';

export const ZONES: ReadonlyArray<{ name: ZoneName; threshold: number }> = [
  { name: 'green_zone', threshold: 30 },
  { name: 'red_zone', threshold: 20 },
  { name: 'tight_red_zone', threshold: 10 },
];

export const ZONE_COUNTERS = ['trips', 'tds', 'fgs', 'failed', 'unresolved'] as const;
export type ZoneCounter = (typeof ZONE_COUNTERS)[number];

export function zoneStatKey(zone: ZoneName, counter: ZoneCounter): string {
  return `${zone}_${counter}`;
}

/**
 * Failed is matched positively against the three failure outcomes. Punts,
 * expiring halves, safeties and incomplete drives stay Unresolved.
 */
export function classifyTripOutcome(outcome: DriveOutcome): TripOutcome {
  switch (outcome.type) {
    case 'TD':
      return 'TD';
    case 'FG':
      return 'FG';
    case 'Turnover':
    case 'TurnoverOnDowns':
    case 'MissedFG':
      return 'Failed';
    default:
      return 'Unresolved';
  }
}

/** A drive is a trip into a zone only when it starts inside it. */
export function classifyDrive(drive: Drive): ZoneTrip[] {
  const start = drive.start_yards_to_goal;
  if (start === null) return [];
  const outcome = classifyTripOutcome(drive.outcome);
  return ZONES.filter((zone) => start <= zone.threshold).map((zone) => ({
    zone: zone.name,
    drive,
    outcome,
  }));
}

const TRIP_COUNTER: Record<TripOutcome, ZoneCounter> = {
  TD: 'tds',
  FG: 'fgs',
  Failed: 'failed',
  Unresolved: 'unresolved',
};

export function tallyZones(drives: Drive[], team: string): Record<string, number> {
  const tally: Record<string, number> = {};
  ZONES.forEach((zone) => {
    ZONE_COUNTERS.forEach((counter) => {
      tally[zoneStatKey(zone.name, counter)] = 0;
    });
  });

  drives
    .filter((drive) => drive.offense_team === team)
    .flatMap(classifyDrive)
    .forEach((trip) => {
      tally[zoneStatKey(trip.zone, 'trips')] += 1;
      tally[zoneStatKey(trip.zone, TRIP_COUNTER[trip.outcome])] += 1;
    });

  return tally;
}

export function collectRedZonePlays(
  drives: Drive[],
  team: string,
  context: { game_id: string; opponent: string },
): PlayDetail[] {
  return drives
    .filter((drive) => drive.offense_team === team)
    .filter((drive) => classifyDrive(drive).some((trip) => trip.zone === 'red_zone'))
    .flatMap((drive) => drive.plays)
    .filter((play) => isScrimmage(play) && !play.is_negated && play.team === team)
    .map((play) => toPlayDetail(play, context));
}
