import { isFieldGoalText, isSafety, SAFETY, TOUCHDOWN } from './plays';
import { matchTeam, opponentOf, parseYardsToGoal } from './spot';
import {
  ConversionAttempt,
  ConversionKind,
  KickKind,
  Play,
  PlayFlag,
  PlayTurnover,
  RawPenaltyFlag,
  RawPlayRecord,
  TeamPair,
} from './types';

const REVIEW_RULING = /\b(?:overturned|reversed)\b[\s.:;,]*/gi;
const REVIEW_FLAG = /overturn|revers/i;
const NO_PLAY = /\bNO PLAY\b/i;
const PENALTY_TEXT = /\bPENALTY\b/i;

const CONVERSION_ATTEMPT = /\b(kick|rush|pass) attempt\b/i;
const CONVERSION_GOOD = /\b(?:good|successful)\b/i;
const CONVERSION_FAILED = /\b(?:no good|failed|unsuccessful|blocked)\b/i;
const FIELD_GOAL = /\bfield goal\b/i;
const PUNT = /\bpunts?\b/i;
const KICKOFF = /\bkick\s?offs?\b|\bkicks off\b/i;

const INTERCEPTION = /\bintercept/i;
const FUMBLE = /\bfumble/i;
const RECOVERED_BY = /\brecovered by ([A-Za-z][A-Za-z.&']*)/i;

const GAIN = /\bfor (-?\d+) yards?\b/i;
const LOSS = /\bfor (?:a )?loss of (\d+) yards?\b/i;

export function isReviewOverturned(reviewFlags: string[]): boolean {
  return reviewFlags.some((flag) => REVIEW_FLAG.test(flag));
}

/**
 * Drops everything up to and including the last overturn ruling, leaving the
 * description of the final ruling only.
 */
export function resolveEffectiveText(rawText: string, overturned: boolean): string {
  const text = rawText.trim();
  if (!overturned) return text;

  let cut = -1;
  for (const match of text.matchAll(REVIEW_RULING)) {
    cut = (match.index ?? 0) + match[0].length;
  }
  return cut < 0 ? text : text.slice(cut).trim();
}

export function hasAcceptedPenalty(penalties: RawPenaltyFlag[], text: string): boolean {
  if (penalties.length === 0) return PENALTY_TEXT.test(text);
  return penalties.some((penalty) => !penalty.declined);
}

export function isNegatedPlay(effectiveText: string, penalties: RawPenaltyFlag[]): boolean {
  return NO_PLAY.test(effectiveText) && hasAcceptedPenalty(penalties, effectiveText);
}

function toConversionKind(token: string): ConversionKind | null {
  switch (token.toLowerCase()) {
    case 'kick':
      return 'kick';
    case 'rush':
      return 'rush';
    case 'pass':
      return 'pass';
    default:
      return null;
  }
}

export function detectConversion(text: string): ConversionAttempt | null {
  const match = CONVERSION_ATTEMPT.exec(text);
  const kind = match ? toConversionKind(match[1]) : null;
  if (kind === null) return null;
  return { kind, good: CONVERSION_GOOD.test(text) && !CONVERSION_FAILED.test(text) };
}

export function detectKick(
  record: Pick<RawPlayRecord, 'play_type'>,
  text: string,
  conversion: ConversionAttempt | null,
): KickKind | null {
  if (conversion) return conversion.kind === 'kick' ? 'extra_point' : null;
  if (record.play_type !== 'kick' && record.play_type !== 'other') return null;
  if (FIELD_GOAL.test(text)) return 'field_goal';
  if (PUNT.test(text)) return 'punt';
  if (KICKOFF.test(text)) return 'kickoff';
  return null;
}

/** Yardage read from a final-ruling description; 0 when none is stated. */
export function parseYardsFromText(text: string): number {
  const loss = LOSS.exec(text);
  if (loss) return -Number(loss[1]);
  const gain = GAIN.exec(text);
  return gain ? Number(gain[1]) : 0;
}

function resolveTurnover(
  team: string | null,
  kick: KickKind | null,
  record: RawPlayRecord,
  text: string,
  turnoverFlag: boolean,
  teams: TeamPair,
): PlayTurnover | null {
  if (!turnoverFlag || team === null) return null;

  let kind: PlayTurnover['kind'];
  if (INTERCEPTION.test(text)) kind = 'INT';
  else if (FUMBLE.test(text)) kind = 'FUM';
  else kind = record.play_type === 'pass' ? 'INT' : 'FUM';

  // On punts and kickoffs the ball belongs to the return team.
  const possessor = kick === 'punt' || kick === 'kickoff' ? opponentOf(team, teams) : team;
  if (possessor === null) return null;

  const recoveryToken = kind === 'FUM' ? RECOVERED_BY.exec(text) : null;
  const recoveredBy =
    (recoveryToken ? matchTeam(recoveryToken[1], teams) : null) ?? opponentOf(possessor, teams);
  if (recoveredBy === null || recoveredBy === possessor) return null;

  return { kind, lost_by: possessor, recovered_by: recoveredBy };
}

export function normalizePlay(record: RawPlayRecord, index: number, teams: TeamPair): Play {
  const flags: PlayFlag[] = [];
  const team = record.team === null ? null : matchTeam(record.team, teams);
  if (team === null) flags.push('unknown_team');

  const overturned = isReviewOverturned(record.review_flags);
  if (overturned) flags.push('review_overturned');

  const effectiveText = resolveEffectiveText(record.raw_text, overturned);
  const conversion = detectConversion(effectiveText);
  const kick = detectKick(record, effectiveText, conversion);

  // Overturned plays take their stats from the final ruling only.
  const yardsGained = overturned ? parseYardsFromText(effectiveText) : (record.yards_gained ?? 0);
  const isScoring = overturned
    ? TOUCHDOWN.test(effectiveText) ||
      SAFETY.test(effectiveText) ||
      (kick === 'field_goal' && isFieldGoalText(effectiveText))
    : record.scoring_flag;
  const turnoverFlag = overturned
    ? INTERCEPTION.test(effectiveText) || FUMBLE.test(effectiveText)
    : record.turnover_flag;
  const turnover = resolveTurnover(team, kick, record, effectiveText, turnoverFlag, teams);

  const yardsToGoal = parseYardsToGoal(record.spot, team, teams);
  if (yardsToGoal === null) flags.push('unparsed_spot');

  return {
    index,
    team,
    quarter: record.quarter,
    clock: record.clock,
    down: record.down,
    distance: record.distance,
    yards_to_goal: yardsToGoal,
    play_type: record.play_type,
    kick,
    conversion,
    yards_gained: yardsGained,
    is_scoring: isScoring,
    is_turnover_raw: turnoverFlag,
    turnover,
    is_negated: isNegatedPlay(effectiveText, record.penalty_flags),
    review_overturned: overturned,
    penalties: record.penalty_flags.map((penalty) => ({
      ...penalty,
      team: penalty.team === null ? null : (matchTeam(penalty.team, teams) ?? penalty.team),
    })),
    raw_text: record.raw_text,
    effective_text: effectiveText,
    flags,
  };
}

/** A "punt" by the team that just gave up a safety is the free kick that follows it. */
export function isSafetyFreeKick(previous: Play, play: Play): boolean {
  return (
    !previous.is_negated &&
    isSafety(previous) &&
    play.kick === 'punt' &&
    play.team !== null &&
    play.team === previous.team
  );
}

export function normalizePlays(records: RawPlayRecord[], teams: TeamPair): Play[] {
  const plays: Play[] = [];
  records.forEach((record, index) => {
    const play = normalizePlay(record, index, teams);
    const previous = plays[plays.length - 1];
    plays.push(previous !== undefined && isSafetyFreeKick(previous, play) ? { ...play, kick: 'kickoff' } : play);
  });
  return plays;
}
