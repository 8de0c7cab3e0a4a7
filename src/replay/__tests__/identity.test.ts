import { test } from 'node:test';
import assert from 'node:assert';
import crypto from 'node:crypto';
import { IllegalStateError, IncompleteIdentityError, MissingFieldError } from '../errors';
import { Observer, Player, Team } from '../identity';
import { Roster } from '../roster';

function makePlayer(pid: number, name: string, uid: number): Player {
  const player = new Player(pid, name);
  player.region = 'us';
  player.subregion = 1;
  player.bnetUid = uid;
  return player;
}

function sha256(value: string): string {
  return crypto.createHash('sha256').update(value, 'utf8').digest('hex');
}

test('url is built from region, uid, subregion and name', () => {
  const roster = new Roster();
  const player = makePlayer(1, 'Alpha', 1001);
  roster.assignPlayer(player, 1);
  assert.equal(player.url, 'http://us.battle.net/sc2/en/profile/1001/1/Alpha/');
});

test('url and result need a team first', () => {
  const player = makePlayer(1, 'Alpha', 1001);
  assert.throws(() => player.url, IllegalStateError);
  assert.throws(() => player.result, IllegalStateError);
});

test('url lists every missing identity field', () => {
  const roster = new Roster();
  const player = new Player(2, 'Bravo');
  player.subregion = 2;
  roster.assignPlayer(player, 1);
  assert.throws(
    () => player.url,
    (err: unknown) => err instanceof IncompleteIdentityError && err.missing.join(',') === 'region,bnetUid',
  );
});

test('team hash ignores join order', () => {
  const first = new Roster();
  first.assignPlayer(makePlayer(1, 'bob', 2), 1);
  first.assignPlayer(makePlayer(2, 'alice', 1), 1);

  const second = new Roster();
  second.assignPlayer(makePlayer(1, 'alice', 1), 1);
  second.assignPlayer(makePlayer(2, 'bob', 2), 1);

  const expected = sha256(
    'http://us.battle.net/sc2/en/profile/1/1/alice/,http://us.battle.net/sc2/en/profile/2/1/bob/',
  );
  assert.equal(first.getTeam(1)?.hash, expected);
  assert.equal(second.getTeam(1)?.hash, expected);
});

test('team hash follows url changes and late joins', () => {
  const roster = new Roster();
  const bob = makePlayer(1, 'bob', 2);
  const team = roster.assignPlayer(bob, 1);
  const before = team.hash;

  bob.name = 'robert';
  const renamed = team.hash;
  assert.notEqual(renamed, before);
  assert.equal(renamed, sha256('http://us.battle.net/sc2/en/profile/2/1/robert/'));

  roster.assignPlayer(makePlayer(2, 'carol', 3), 1);
  assert.notEqual(team.hash, renamed);
});

test('an empty team hashes the empty string', () => {
  assert.equal(new Team(1).hash, 'e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
});

test('player result reads through the team', () => {
  const roster = new Roster();
  const a = makePlayer(1, 'Alpha', 1001);
  const b = makePlayer(2, 'Bravo', 1002);
  const team = roster.assignPlayer(a, 1);
  roster.assignPlayer(b, 1);

  assert.equal(a.result, 'Unknown');
  team.result = 'Win';
  assert.equal(a.result, 'Win');
  assert.equal(b.result, 'Win');
});

test('reassigning a player moves it between teams', () => {
  const roster = new Roster();
  const player = makePlayer(1, 'Alpha', 1001);
  roster.assignPlayer(player, 1);
  roster.assignPlayer(player, 2);

  assert.equal(roster.getTeam(1)?.players.length, 0);
  assert.equal(player.team.number, 2);
  assert.deepEqual(
    roster.teams.map((team) => team.number),
    [1, 2],
  );
  assert.equal(roster.players.length, 1);
});

test('format fills placeholders from the player only', () => {
  const player = makePlayer(1, 'Alpha', 1001);
  player.playRace = 'Zerg';
  assert.equal(player.format('{name} plays {playRace} at {handicap}%'), 'Alpha plays Zerg at 100%');
  assert.throws(
    () => player.format('{name} on {team}'),
    (err: unknown) => err instanceof MissingFieldError && err.field === 'team',
  );
  assert.throws(() => player.format('{color}'), MissingFieldError);
});

test('observers are always human and sit outside teams', () => {
  const roster = new Roster();
  const observer = new Observer(5, 'Echo');
  roster.addPerson(observer);
  assert.equal(observer.isObserver, true);
  assert.equal(observer.isHuman, true);
  assert.equal(observer.recorder, false);
  assert.deepEqual(
    roster.observers.map((o) => o.name),
    ['Echo'],
  );
  assert.equal(roster.players.length, 0);
  assert.throws(() => roster.addPerson(new Observer(5, 'Dup')), IllegalStateError);
});

test('each person gets its own event lists', () => {
  const a = new Player(1, 'Alpha');
  const b = new Player(2, 'Bravo');
  a.messages.push({ text: 'gl hf' });
  assert.equal(b.messages.length, 0);
  assert.notStrictEqual(a.events, b.events);
});

test('handicap and team number are range checked', () => {
  const player = new Player(1, 'Alpha');
  assert.throws(() => {
    player.handicap = 101;
  }, RangeError);
  player.handicap = 50;
  assert.equal(player.handicap, 50);
  assert.throws(() => new Team(0), RangeError);
});

test('teams iterate their players in join order', () => {
  const roster = new Roster();
  const team = roster.assignPlayer(makePlayer(1, 'Alpha', 1001), 3);
  roster.assignPlayer(makePlayer(2, 'Bravo', 1002), 3);
  assert.deepEqual(
    [...team].map((player) => player.name),
    ['Alpha', 'Bravo'],
  );
  assert.equal(String(team), 'Team 3: Alpha, Bravo');
  assert.throws(() => roster.handleFor(9), IllegalStateError);
});

test('team hash sorts urls by code point, not UTF-16 unit', () => {
  const roster = new Roster();
  const emoji = makePlayer(1, 'a\u{1F600}', 1);
  const fullwidth = makePlayer(2, 'a\u{FF5E}', 1);
  const team = roster.assignPlayer(emoji, 1);
  roster.assignPlayer(fullwidth, 1);

  const emojiUrl = 'http://us.battle.net/sc2/en/profile/1/1/a\u{1F600}/';
  const fullwidthUrl = 'http://us.battle.net/sc2/en/profile/1/1/a\u{FF5E}/';
  assert.equal(team.hash, sha256(`${fullwidthUrl},${emojiUrl}`));
  assert.notEqual(team.hash, sha256(`${emojiUrl},${fullwidthUrl}`));
});

test('assigning a player to its current team keeps join order', () => {
  const roster = new Roster();
  const alpha = makePlayer(1, 'Alpha', 1001);
  const team = roster.assignPlayer(alpha, 1);
  roster.assignPlayer(makePlayer(2, 'Bravo', 1002), 1);

  assert.strictEqual(roster.assignPlayer(alpha, 1), team);
  assert.deepEqual(
    team.players.map((player) => player.name),
    ['Alpha', 'Bravo'],
  );
});

test('format treats doubled braces as literals and rejects odd placeholders', () => {
  const player = makePlayer(1, 'Alpha', 1001);
  assert.equal(player.format('{{name}} is {name}'), '{name} is Alpha');
  assert.equal(player.format('}}{pid}{{'), '}1{');
  assert.throws(
    () => player.format('{a-b}'),
    (err: unknown) => err instanceof MissingFieldError && err.field === 'a-b',
  );
});
