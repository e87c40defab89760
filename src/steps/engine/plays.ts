import { Play, PlayDetail } from './types';

export const TOUCHDOWN = /\btouchdown\b|\bTD\b/i;
export const SAFETY = /\bsafety\b/i;
const FIELD_GOAL_GOOD = /\bgood\b/i;
const FIELD_GOAL_MISSED = /\bno good\b|\bblocked\b/i;
const FIRST_DOWN = /\b1ST DOWN\b/i;
const UNSPORTSMANLIKE = /\bUNS\b|unsportsmanlike/i;

export function isFieldGoalText(text: string): boolean {
  return FIELD_GOAL_GOOD.test(text) && !FIELD_GOAL_MISSED.test(text);
}

/** A snap that can open, extend or end a drive. Kickoffs and tries cannot. */
export function isScrimmage(play: Play): play is Play & { team: string } {
  return (
    play.team !== null &&
    play.conversion === null &&
    play.kick !== 'kickoff' &&
    play.kick !== 'extra_point'
  );
}

export function isSafety(play: Play): boolean {
  return play.is_scoring && SAFETY.test(play.effective_text);
}

export function isFieldGoalGood(play: Play): boolean {
  return play.kick === 'field_goal' && isFieldGoalText(play.effective_text);
}

export function isTouchdown(play: Play): boolean {
  return (
    play.is_scoring &&
    play.kick !== 'field_goal' &&
    play.conversion === null &&
    !isSafety(play)
  );
}

export function isGoForIt(play: Play): boolean {
  return (
    play.down === 4 &&
    (play.play_type === 'rush' || play.play_type === 'pass') &&
    play.kick === null &&
    play.conversion === null
  );
}

export function isFourthDownConverted(play: Play): boolean {
  if (play.turnover !== null) return false;
  if (isTouchdown(play)) return true;
  if (FIRST_DOWN.test(play.effective_text)) return true;
  const needed = play.distance ?? play.yards_to_goal;
  return needed !== null && play.yards_gained >= needed;
}

/**
 * Whether a try after touchdown counts. A negated try still counts when it
 * succeeded and the foul was unsportsmanlike conduct enforced on the kickoff.
 */
export function isCountedConversion(play: Play): boolean {
  if (play.conversion === null) return false;
  if (!play.is_negated) return true;
  return play.conversion.good && UNSPORTSMANLIKE.test(play.effective_text);
}

export function toPlayDetail(
  play: Play,
  context: { game_id: string; opponent: string },
): PlayDetail {
  return {
    game_id: context.game_id,
    opponent: context.opponent,
    quarter: play.quarter,
    clock: play.clock,
    down: play.down,
    distance: play.distance,
    yards_to_goal: play.yards_to_goal,
    play_type: play.play_type,
    yards: play.yards_gained,
    scoring: play.is_scoring,
    description: play.effective_text,
  };
}
