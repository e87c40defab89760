import { test } from 'node:test';
import assert from 'node:assert';
import { detectConversion, normalizePlay, normalizePlays, resolveEffectiveText } from '../normalize';
import { collectTurnoverEvents } from '../turnovers';
import { rawPlay, TEAMS } from './fixtures';

const ROUGHING = { team: 'AWAY', type: 'Roughing the Passer', yards: 15, declined: false };

test('resolveEffectiveText keeps only the final ruling of an overturned play', () => {
  const raw = 'J.Smith pass to K.Lee, fumbles, recovered by AWAY. Ruling overturned. J.Smith pass incomplete to K.Lee.';
  assert.equal(resolveEffectiveText(raw, true), 'J.Smith pass incomplete to K.Lee.');
  assert.equal(resolveEffectiveText(raw, false), raw);
  assert.equal(resolveEffectiveText('no ruling here', true), 'no ruling here');
});

test('an overturned fumble becomes an incomplete pass with no turnover', () => {
  const play = normalizePlay(
    rawPlay({
      play_type: 'pass',
      yards_gained: 12,
      turnover_flag: true,
      review_flags: ['Ruling overturned'],
      raw_text:
        'J.Smith pass to K.Lee for 12 yards, fumbles, recovered by AWAY. Ruling overturned. J.Smith pass incomplete to K.Lee.',
    }),
    0,
    TEAMS,
  );

  assert.equal(play.review_overturned, true);
  assert.equal(play.effective_text, 'J.Smith pass incomplete to K.Lee.');
  assert.equal(play.yards_gained, 0);
  assert.equal(play.is_turnover_raw, false);
  assert.equal(play.turnover, null);
  assert.deepEqual(play.flags, ['review_overturned']);
});

test('an interception wiped out by an accepted NO PLAY penalty is negated', () => {
  const play = normalizePlay(
    rawPlay({
      play_type: 'pass',
      turnover_flag: true,
      penalty_flags: [ROUGHING],
      raw_text: 'Q.Back pass intercepted by D.Back. PENALTY AWAY Roughing the Passer 15 yards NO PLAY.',
    }),
    3,
    TEAMS,
  );

  assert.equal(play.is_negated, true);
  assert.equal(play.is_turnover_raw, true);
  assert.deepEqual(play.turnover, { kind: 'INT', lost_by: 'HOME', recovered_by: 'AWAY' });
  assert.deepEqual(collectTurnoverEvents([play]), []);
});

test('a declined penalty does not negate the play', () => {
  const play = normalizePlay(
    rawPlay({
      play_type: 'pass',
      turnover_flag: true,
      penalty_flags: [{ ...ROUGHING, declined: true }],
      raw_text: 'Q.Back pass intercepted by D.Back. PENALTY AWAY Roughing the Passer declined NO PLAY.',
    }),
    0,
    TEAMS,
  );
  assert.equal(play.is_negated, false);
  assert.equal(collectTurnoverEvents([play]).length, 1);
});

test('without structured flags the description decides negation', () => {
  const play = normalizePlay(
    rawPlay({ raw_text: 'R.Run rush for 9 yards. PENALTY HOME Holding 10 yards NO PLAY.' }),
    0,
    TEAMS,
  );
  assert.equal(play.is_negated, true);
});

test('detectConversion reads the try kind and result', () => {
  assert.deepEqual(detectConversion('T.Run rush attempt is good'), { kind: 'rush', good: true });
  assert.deepEqual(detectConversion('K.Foot kick attempt is no good'), { kind: 'kick', good: false });
  assert.deepEqual(detectConversion('Q.Back pass attempt failed'), { kind: 'pass', good: false });
  assert.equal(detectConversion('R.Run rush for 3 yards'), null);
});

test('kicks are classified from the description', () => {
  const kick = (text: string) => normalizePlay(rawPlay({ play_type: 'kick', raw_text: text }), 0, TEAMS).kick;
  assert.equal(kick('P.Leg punts 45 yards to AWAY20'), 'punt');
  assert.equal(kick('K.Foot kickoff 65 yards, touchback'), 'kickoff');
  assert.equal(kick('K.Foot 30 yard field goal is GOOD'), 'field_goal');
  assert.equal(kick('K.Foot kick attempt is good'), 'extra_point');
  assert.equal(normalizePlay(rawPlay({ raw_text: 'fake punt, R.Run rush for 4 yards' }), 0, TEAMS).kick, null);
});

test('a fumble recovered by the offense is not a turnover', () => {
  const play = normalizePlay(
    rawPlay({ turnover_flag: true, raw_text: 'R.Back rush for 3 yards, fumbles, recovered by HOME' }),
    0,
    TEAMS,
  );
  assert.equal(play.is_turnover_raw, true);
  assert.equal(play.turnover, null);
});

test('a muffed punt is lost by the return team', () => {
  const play = normalizePlay(
    rawPlay({
      play_type: 'kick',
      turnover_flag: true,
      raw_text: 'P.Leg punts 40 yards, P.Ret fumbles, recovered by HOME at AWAY25',
    }),
    0,
    TEAMS,
  );
  assert.equal(play.kick, 'punt');
  assert.deepEqual(play.turnover, { kind: 'FUM', lost_by: 'AWAY', recovered_by: 'HOME' });
});

test('an unreadable spot is flagged, never fatal', () => {
  const play = normalizePlay(rawPlay({ spot: 'midfield' }), 0, TEAMS);
  assert.equal(play.yards_to_goal, null);
  assert.deepEqual(play.flags, ['unparsed_spot']);
});

test('penalty teams are matched to the game pair', () => {
  const play = normalizePlay(
    rawPlay({ penalty_flags: [{ team: 'away', type: 'Holding', yards: 10, declined: false }] }),
    0,
    TEAMS,
  );
  assert.equal(play.penalties[0].team, 'AWAY');
});

test('a punt right after a safety by the same team is read as the free kick', () => {
  const plays = normalizePlays(
    [
      rawPlay({ spot: 'HOME2', scoring_flag: true, yards_gained: -3, raw_text: 'R.Run tackled in end zone for a SAFETY' }),
      rawPlay({ down: null, distance: null, spot: 'HOME20', play_type: 'kick', raw_text: 'P.Leg punt 50 yards' }),
      rawPlay({ team: 'AWAY', down: 4, spot: 'AWAY40', play_type: 'kick', raw_text: 'P.Leg punts 40 yards' }),
    ],
    TEAMS,
  );
  assert.deepEqual(
    plays.map((play) => play.kick),
    [null, 'kickoff', 'punt'],
  );
});
