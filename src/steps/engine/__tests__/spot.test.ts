import { test } from 'node:test';
import assert from 'node:assert';
import { matchTeam, opponentOf, parseYardsToGoal } from '../spot';
import { TEAMS } from './fixtures';

test('parseYardsToGoal reads a bare number as yards to goal', () => {
  assert.equal(parseYardsToGoal('35', 'HOME', TEAMS), 35);
  assert.equal(parseYardsToGoal(' 7 ', 'AWAY', TEAMS), 7);
});

test('parseYardsToGoal resolves team-relative spots for the offense', () => {
  assert.equal(parseYardsToGoal('HOME 20', 'HOME', TEAMS), 80);
  assert.equal(parseYardsToGoal('AWAY20', 'HOME', TEAMS), 20);
  assert.equal(parseYardsToGoal('away-15', 'HOME', TEAMS), 15);
  assert.equal(parseYardsToGoal('HOME50', 'AWAY', TEAMS), 50);
});

test('parseYardsToGoal returns null for spots it cannot place', () => {
  assert.equal(parseYardsToGoal(null, 'HOME', TEAMS), null);
  assert.equal(parseYardsToGoal('', 'HOME', TEAMS), null);
  assert.equal(parseYardsToGoal('midfield', 'HOME', TEAMS), null);
  assert.equal(parseYardsToGoal('XYZ20', 'HOME', TEAMS), null);
  assert.equal(parseYardsToGoal('AWAY60', 'HOME', TEAMS), null);
  assert.equal(parseYardsToGoal('100', 'HOME', TEAMS), null);
  assert.equal(parseYardsToGoal('AWAY20', null, TEAMS), null);
});

test('matchTeam and opponentOf work on the game pair', () => {
  assert.equal(matchTeam(' home ', TEAMS), 'HOME');
  assert.equal(matchTeam('VISITOR', TEAMS), null);
  assert.equal(opponentOf('HOME', TEAMS), 'AWAY');
  assert.equal(opponentOf('AWAY', TEAMS), 'HOME');
  assert.equal(opponentOf(null, TEAMS), null);
});
