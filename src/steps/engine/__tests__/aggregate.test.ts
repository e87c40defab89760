import { test } from 'node:test';
import assert from 'node:assert';
import { loadSchemaStats } from '../../calculators';
import { pointsFromDrives, processGame, toGameRecord } from '../aggregate';
import { DEFAULT_TOUCHDOWN_POINTS } from '../turnovers';
import { missingStats } from '../validate';
import { driveOf, gameOf, redZoneGameRecords, sampleGameRecords } from './fixtures';

test('processGame returns one row per team in game order', () => {
  const [home, away] = processGame(gameOf(sampleGameRecords()));

  assert.equal(home.team, 'HOME');
  assert.equal(home.opponent, 'AWAY');
  assert.equal(away.team, 'AWAY');
  assert.equal(away.opponent, 'HOME');
  assert.equal(home.season, '2024');
  assert.equal(home.week, '1');
});

test('processGame counts drives, takeaways and points off turnovers', () => {
  const [home, away] = processGame(gameOf(sampleGameRecords()));

  assert.equal(home.stats.drives, 2);
  assert.equal(home.stats.explosive_rushes, 2);
  assert.equal(home.stats.takeaways_int, 1);
  assert.equal(home.stats.turnovers_int, 0);
  assert.equal(home.stats.points_off_turnovers, 8);
  assert.equal(home.stats.two_pt_attempts, 1);
  assert.equal(home.stats.two_pt_pass_conversions, 1);
  assert.equal(home.stats.red_zone_trips, 0);
  assert.equal(home.explosive_plays.length, 2);
  assert.equal(home.two_pt_details[0].scoring, true);

  assert.equal(away.stats.drives, 2);
  assert.equal(away.stats.turnovers_int, 1);
  assert.equal(away.stats.points_off_turnovers, 0);
  assert.equal(away.stats.fourth_down_attempts, 0);

  assert.deepEqual(home.post_turnover_drives, away.post_turnover_drives);
  assert.deepEqual(home.issues, []);
  assert.deepEqual(away.issues, []);
});

test('points off turnovers equals the linked drive points per team', () => {
  processGame(gameOf(sampleGameRecords())).forEach((row) => {
    const linked = row.post_turnover_drives
      .filter((drive) => drive.recovered_by === row.team)
      .reduce((sum, drive) => sum + drive.points_scored, 0);
    assert.equal(row.stats.points_off_turnovers, linked);
  });
});

test('processGame tallies red-zone trips, plays and penalties', () => {
  const [home, away] = processGame(gameOf(redZoneGameRecords(), { game_id: 'G2' }));

  assert.equal(home.stats.green_zone_trips, 1);
  assert.equal(home.stats.red_zone_trips, 1);
  assert.equal(home.stats.red_zone_tds, 1);
  assert.equal(home.stats.tight_red_zone_trips, 0);
  assert.equal(home.red_zone_plays.length, 2);
  assert.equal(home.red_zone_plays[1].description, 'Q.Back pass for 13 yards, TOUCHDOWN. PENALTY AWAY Offside declined.');
  assert.equal(home.stats.penalties, 1);
  assert.equal(home.stats.penalty_yards, 10);
  assert.deepEqual(home.penalty_breakdown, { HOLDING: { accepted: 1, declined: 0 } });

  assert.equal(away.stats.penalties, 0);
  assert.equal(away.stats.penalties_declined, 1);
  assert.deepEqual(away.penalty_breakdown, { OFFSIDE: { accepted: 0, declined: 1 } });
  assert.equal(away.stats.drives, 1);
  assert.equal(away.stats.red_zone_trips, 0);
  assert.deepEqual(away.red_zone_plays, []);
});

test('processGame scores the game from drive outcomes', () => {
  const [home, away] = processGame(gameOf(sampleGameRecords()));

  assert.equal(home.stats.points_for, 15);
  assert.equal(home.stats.points_against, 0);
  assert.deepEqual([home.stats.wins, home.stats.losses, home.stats.ties], [1, 0, 0]);
  assert.deepEqual([away.stats.wins, away.stats.losses, away.stats.ties], [0, 1, 0]);
  assert.equal(away.stats.points_against, 15);
  assert.equal(home.stats.total_plays, 2);
  assert.equal(away.stats.total_plays, 4);
});

test('each row carries the opponent two-point tries', () => {
  const [home, away] = processGame(gameOf(sampleGameRecords()));

  assert.equal(away.stats.opp_two_pt_attempts, 1);
  assert.equal(away.stats.opp_two_pt_conversions, 1);
  assert.equal(home.stats.opp_two_pt_attempts, 0);
  assert.equal(home.stats.opp_two_pt_conversions, 0);
});

test('a forced safety scores two for the defense', () => {
  const drives = [
    driveOf('HOME', 98, { type: 'Safety' }),
    driveOf('AWAY', 40, { type: 'FG' }),
    driveOf('HOME', 75, { type: 'TD' }),
  ];
  assert.equal(pointsFromDrives(drives, 'AWAY'), 5);
  assert.equal(pointsFromDrives(drives, 'HOME'), DEFAULT_TOUCHDOWN_POINTS);
});

test('every row satisfies the zone accounting identity', () => {
  [sampleGameRecords(), redZoneGameRecords()].forEach((records) => {
    processGame(gameOf(records)).forEach((row) => {
      ['green_zone', 'red_zone', 'tight_red_zone'].forEach((zone) => {
        const s = row.stats;
        assert.equal(
          s[`${zone}_trips`],
          s[`${zone}_tds`] + s[`${zone}_fgs`] + s[`${zone}_failed`] + s[`${zone}_unresolved`],
        );
      });
    });
  });
});

test('processGame fills every counter the schema names', () => {
  const expected = loadSchemaStats();
  assert.ok(expected);
  processGame(gameOf(sampleGameRecords())).forEach((row) => {
    assert.deepEqual(missingStats(row.stats, expected), []);
  });
});

test('processGame with no calculators keeps only drive-derived counters', () => {
  const [home] = processGame(gameOf(sampleGameRecords()), []);
  assert.equal(Object.keys(home.stats).length, 32);
  assert.equal(home.stats.opp_two_pt_attempts, 0);
  assert.equal(home.stats.explosive_rushes, undefined);
  assert.equal(home.stats.points_off_turnovers, 8);
});

test('reprocessing a game yields identical output', () => {
  const game = gameOf(sampleGameRecords());
  assert.equal(JSON.stringify(processGame(game)), JSON.stringify(processGame(game)));
});

test('toGameRecord spreads counters at the top level', () => {
  const [home] = processGame(gameOf(redZoneGameRecords(), { game_id: 'G2' }));
  const record = toGameRecord(home);
  assert.equal(record.game_id, 'G2');
  assert.equal(record.team, 'HOME');
  assert.equal(record.red_zone_tds, 1);
  assert.equal(record.stats, undefined);
  assert.deepEqual(record.penalty_breakdown, { HOLDING: { accepted: 1, declined: 0 } });
});
