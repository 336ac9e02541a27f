import test from "node:test";
import assert from "node:assert/strict";
import { SessionStore } from "../src/services/sessionStore.js";
import { ManualClock, MemoryAuthRepository } from "./support/memoryAuthRepository.js";

const SEVEN_DAYS_MS = 7 * 24 * 60 * 60 * 1000;

function setup() {
  const repository = new MemoryAuthRepository();
  const clock = new ManualClock();
  const store = new SessionStore(repository, { ttlMs: SEVEN_DAYS_MS, now: clock.now });
  const user = repository.addUser({ username: "carlos" });
  return { repository, clock, store, user };
}

test("create persists a session expiring seven days after creation", async () => {
  const { repository, clock, store, user } = setup();
  const session = await store.create(user.id);

  assert.equal(session.userId, user.id);
  assert.equal(session.createdAt.toISOString(), clock.now().toISOString());
  assert.equal(session.expiresAt.getTime() - session.createdAt.getTime(), SEVEN_DAYS_MS);
  assert.ok(repository.sessions.has(session.token));
  assert.equal(store.ttlSeconds, 604800);
});

test("tokens are unguessable base64url strings and differ per login", async () => {
  const { repository, store, user } = setup();
  const first = await store.create(user.id);
  const second = await store.create(user.id);

  assert.match(first.token, /^[A-Za-z0-9_-]{43}$/);
  assert.notEqual(first.token, second.token);
  assert.equal(repository.sessions.size, 2);
});

test("fetch returns the session one second before expiry and at the expiry instant", async () => {
  const { clock, store, user } = setup();
  const session = await store.create(user.id);

  clock.set(new Date(session.expiresAt.getTime() - 1000));
  assert.equal((await store.fetch(session.token))?.token, session.token);

  clock.set(session.expiresAt);
  assert.equal((await store.fetch(session.token))?.token, session.token);
});

test("fetch after expiry returns null and deletes the row", async () => {
  const { repository, clock, store, user } = setup();
  const session = await store.create(user.id);

  clock.set(new Date(session.expiresAt.getTime() + 1000));
  assert.equal(await store.fetch(session.token), null);
  assert.equal(repository.sessions.has(session.token), false);
});

test("inspect distinguishes missing from expired sessions", async () => {
  const { clock, store, user } = setup();
  const session = await store.create(user.id);

  assert.equal((await store.inspect("not-a-token")).status, "missing");
  clock.advance(SEVEN_DAYS_MS + 1);
  assert.equal((await store.inspect(session.token)).status, "expired");
  assert.equal((await store.inspect(session.token)).status, "missing");
});

test("revoke is idempotent", async () => {
  const { store, user } = setup();
  const session = await store.create(user.id);

  await store.revoke(session.token);
  await store.revoke(session.token);
  assert.equal(await store.fetch(session.token), null);
});

test("sweepExpired removes only sessions past their expiry", async () => {
  const { repository, clock, store, user } = setup();
  const old = await store.create(user.id);
  clock.advance(3 * 24 * 60 * 60 * 1000);
  const recent = await store.create(user.id);
  clock.advance(5 * 24 * 60 * 60 * 1000);

  assert.equal(await store.sweepExpired(), 1);
  assert.equal(repository.sessions.has(old.token), false);
  assert.equal(repository.sessions.has(recent.token), true);
});
