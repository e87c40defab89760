import { InvariantViolationError } from './errors';
import {
  isCountedConversion,
  isFieldGoalGood,
  isFourthDownConverted,
  isGoForIt,
  isSafety,
  isScrimmage,
  isTouchdown,
} from './plays';
import { ConversionAttempt, Drive, DriveOutcome, Play } from './types';

type Boundary = 'possession' | 'half' | 'end';

interface DriveAccumulator {
  offense: string;
  plays: Play[];
  terminal: DriveOutcome | null;
}

/** Leaving the 2nd quarter, the 4th quarter or any overtime period ends a half. */
export function isHalfBoundary(previousQuarter: number, nextQuarter: number): boolean {
  if (nextQuarter === previousQuarter) return false;
  return previousQuarter === 2 || previousQuarter >= 4;
}

/** Outcome a non-negated snap imposes on the drive it ends, or null if it ends nothing. */
export function terminalOutcome(play: Play, offense: string): DriveOutcome | null {
  if (play.turnover !== null && play.turnover.lost_by === offense) {
    return { type: 'Turnover', kind: play.turnover.kind };
  }
  if (isSafety(play)) return { type: 'Safety' };
  if (play.kick === 'field_goal') return { type: isFieldGoalGood(play) ? 'FG' : 'MissedFG' };
  if (play.kick === 'punt') return { type: 'Punt' };
  if (isTouchdown(play)) return { type: 'TD' };
  if (isGoForIt(play) && !isFourthDownConverted(play)) return { type: 'TurnoverOnDowns' };
  return null;
}

export function describeOutcome(outcome: DriveOutcome): string {
  return outcome.type === 'Turnover' ? `Turnover (${outcome.kind})` : outcome.type;
}

/** The scoring team's try, looked for between the touchdown and the next snap or kickoff. */
function findConversion(plays: Play[], offense: string): ConversionAttempt | null {
  const scoreAt = plays.findIndex((play) => !play.is_negated && isScrimmage(play) && isTouchdown(play));
  if (scoreAt < 0) return null;
  for (const play of plays.slice(scoreAt + 1)) {
    if (isScrimmage(play) || play.kick === 'kickoff') return null;
    if (play.team === offense && isCountedConversion(play)) return play.conversion;
  }
  return null;
}

/**
 * Whether `offense` still holds the drive. A turnover on downs read from
 * yardage stays provisional until the other side snaps the ball.
 */
function continuesDrive(acc: DriveAccumulator, offense: string): boolean {
  if (acc.offense !== offense) return false;
  return acc.terminal === null || acc.terminal.type === 'TurnoverOnDowns';
}

function finalizeDrive(acc: DriveAccumulator, boundary: Boundary, number: number): Drive {
  const firstSnap = acc.plays.find((play) => isScrimmage(play) && play.team === acc.offense);
  const lastQuarter = acc.plays[acc.plays.length - 1]?.quarter ?? 0;

  let outcome: DriveOutcome;
  if (acc.terminal) {
    outcome = acc.terminal;
  } else if (boundary === 'half') {
    outcome = { type: 'EndOfHalf' };
  } else if (boundary === 'end' && lastQuarter >= 4) {
    outcome = { type: 'EndOfGame' };
  } else {
    outcome = { type: 'Incomplete' };
  }

  return {
    number,
    offense_team: acc.offense,
    start_yards_to_goal: firstSnap?.yards_to_goal ?? null,
    plays: acc.plays,
    outcome,
    conversion: outcome.type === 'TD' ? findConversion(acc.plays, acc.offense) : null,
  };
}

/**
 * Single ordered pass over one game's plays. Holds the open drive and a buffer
 * of plays whose owner is not yet known (negated snaps by the other side,
 * kickoffs before the first snap of a half).
 */
export function segmentDrives(plays: Play[]): Drive[] {
  const drives: Drive[] = [];
  let current: DriveAccumulator | null = null;
  let pending: Play[] = [];
  let lastQuarter: number | null = null;

  const close = (boundary: Boundary): void => {
    if (current === null) return;
    drives.push(finalizeDrive(current, boundary, drives.length + 1));
    current = null;
  };

  for (const play of plays) {
    if (lastQuarter !== null && isHalfBoundary(lastQuarter, play.quarter)) {
      if (current !== null) {
        current.plays.push(...pending);
        pending = [];
      }
      close('half');
    }
    lastQuarter = play.quarter;

    if (!isScrimmage(play)) {
      if (current !== null && pending.length === 0) current.plays.push(play);
      else pending.push(play);
      continue;
    }

    const offense = play.team;
    if (play.is_negated) {
      const joinsCurrent = current !== null && continuesDrive(current, offense) && pending.length === 0;
      if (joinsCurrent && current !== null) current.plays.push(play);
      else pending.push(play);
      continue;
    }

    if (current === null || !continuesDrive(current, offense)) {
      close('possession');
      current = { offense, plays: [...pending, play], terminal: null };
    } else {
      current.plays.push(...pending, play);
    }
    pending = [];
    current.terminal = terminalOutcome(play, offense);
  }

  if (current !== null) {
    current.plays.push(...pending);
  } else if (drives.length > 0) {
    // Trailing kickoffs after the last half boundary stay with the last drive.
    drives[drives.length - 1].plays.push(...pending);
  }
  close('end');

  return drives;
}

/** Structural checks on a segmentation; a failure is a defect upstream, never data. */
export function assertDriveInvariants(plays: Play[], drives: Drive[], gameId?: string): void {
  const seen = new Map<number, number>();
  drives.forEach((drive) => {
    if (!drive.offense_team) {
      throw new InvariantViolationError(`drive ${drive.number} has no offense`, gameId);
    }
    if (!drive.plays.some((play) => isScrimmage(play) && !play.is_negated)) {
      throw new InvariantViolationError(`drive ${drive.number} has no live snap`, gameId);
    }
    if (drive.outcome.type === 'Turnover') {
      const last = [...drive.plays].reverse().find((play) => isScrimmage(play) && !play.is_negated);
      if (!last || last.turnover === null || last.is_negated) {
        throw new InvariantViolationError(
          `drive ${drive.number} ends in a turnover without a live turnover play`,
          gameId,
        );
      }
    }
    drive.plays.forEach((play) => seen.set(play.index, (seen.get(play.index) ?? 0) + 1));
  });

  if (drives.length === 0) return;
  plays.forEach((play) => {
    const count = seen.get(play.index) ?? 0;
    if (count !== 1) {
      throw new InvariantViolationError(
        `play ${play.index} belongs to ${count} drives (expected exactly one)`,
        gameId,
      );
    }
  });
}
