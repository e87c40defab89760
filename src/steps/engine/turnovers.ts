import { describeOutcome } from './drives';
import { isScrimmage } from './plays';
import { Drive, Play, PostTurnoverDrive, TurnoverEvent } from './types';

/**
 * Points credited to a touchdown drive when no try is recorded. The try is
 * often missing from the feed; 7 assumes the kick was good.
 */
export const DEFAULT_TOUCHDOWN_POINTS = 7;

export function collectTurnoverEvents(plays: Play[]): TurnoverEvent[] {
  return plays.flatMap((play) => {
    if (play.is_negated || play.turnover === null) return [];
    return [
      {
        kind: play.turnover.kind,
        lost_by: play.turnover.lost_by,
        recovered_by: play.turnover.recovered_by,
        source_play: play,
      },
    ];
  });
}

export function drivePoints(drive: Drive): number {
  switch (drive.outcome.type) {
    case 'TD': {
      const attempt = drive.conversion;
      if (attempt === null) return DEFAULT_TOUCHDOWN_POINTS;
      if (!attempt.good) return 6;
      return attempt.kind === 'kick' ? 7 : 8;
    }
    case 'FG':
      return 3;
    // A safety scores for the defense, never for the drive's offense.
    default:
      return 0;
  }
}

function driveStartIndex(drive: Drive): number {
  const snap = drive.plays.find((play) => isScrimmage(play) && !play.is_negated);
  return snap?.index ?? Number.POSITIVE_INFINITY;
}

/**
 * Pairs every turnover with the drive that follows it. Only the immediately
 * following drive qualifies, and only when the recovering team has the ball;
 * otherwise the turnover is kept with no result and no points.
 */
export function linkTurnovers(plays: Play[], drives: Drive[]): PostTurnoverDrive[] {
  const starts = drives.map((drive) => ({ drive, start: driveStartIndex(drive) }));

  return collectTurnoverEvents(plays).map((event) => {
    const next = starts.find(({ start }) => start > event.source_play.index)?.drive;
    const paired = next !== undefined && next.offense_team === event.recovered_by ? next : null;
    return {
      turnover_type: event.kind,
      turnover_by: event.lost_by,
      recovered_by: event.recovered_by,
      drive_result: paired ? describeOutcome(paired.outcome) : null,
      points_scored: paired ? drivePoints(paired) : 0,
      play_description: event.source_play.effective_text,
    };
  });
}

export function pointsOffTurnovers(drives: PostTurnoverDrive[], team: string): number {
  return drives
    .filter((drive) => drive.recovered_by === team)
    .reduce((sum, drive) => sum + drive.points_scored, 0);
}
