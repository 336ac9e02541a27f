import test from "node:test";
import assert from "node:assert/strict";
import { ResetTokenStore } from "../src/services/resetTokenStore.js";
import { ManualClock, MemoryAuthRepository } from "./support/memoryAuthRepository.js";

const HOUR_MS = 60 * 60 * 1000;

function setup() {
  const repository = new MemoryAuthRepository();
  const clock = new ManualClock();
  const store = new ResetTokenStore(repository, { ttlMs: HOUR_MS, now: clock.now });
  const user = repository.addUser({ username: "maria", passwordHash: "old-hash" });
  return { repository, clock, store, user };
}

test("issue stores an unused token expiring in one hour", async () => {
  const { repository, clock, store, user } = setup();
  const issued = await store.issue(user.id);
  const record = repository.resetTokens.get(issued.token);

  assert.ok(record);
  assert.equal(record.used, false);
  assert.equal(record.userId, user.id);
  assert.equal(issued.expiresAt.getTime() - clock.now().getTime(), HOUR_MS);
  assert.equal(store.ttlMinutes, 60);
});

test("consume succeeds once and applies the new hash", async () => {
  const { repository, store, user } = setup();
  const { token } = await store.issue(user.id);

  assert.equal(await store.consume(token, "new-hash"), user.id);
  assert.equal(repository.users.get(user.id)?.passwordHash, "new-hash");
  assert.equal(repository.resetTokens.get(token)?.used, true);
});

test("a second consume of the same token is rejected", async () => {
  const { repository, store, user } = setup();
  const { token } = await store.issue(user.id);

  await store.consume(token, "first-hash");
  assert.equal(await store.consume(token, "second-hash"), null);
  assert.equal(repository.users.get(user.id)?.passwordHash, "first-hash");
});

test("concurrent consumes let exactly one through", async () => {
  const { store, user } = setup();
  const { token } = await store.issue(user.id);

  const results = await Promise.all([store.consume(token, "a"), store.consume(token, "b"), store.consume(token, "c")]);
  assert.equal(results.filter((result) => result === user.id).length, 1);
  assert.equal(results.filter((result) => result === null).length, 2);
});

test("expired and unknown tokens are rejected the same way", async () => {
  const { repository, clock, store, user } = setup();
  const { token } = await store.issue(user.id);

  clock.advance(HOUR_MS);
  assert.equal(await store.consume(token, "new-hash"), null);
  assert.equal(await store.consume("never-issued", "new-hash"), null);
  assert.equal(repository.users.get(user.id)?.passwordHash, "old-hash");
  assert.equal(repository.resetTokens.get(token)?.used, false);
});

test("sweepExpired keeps tokens for a day past their expiry", async () => {
  const { repository, clock, store, user } = setup();
  const { token } = await store.issue(user.id);

  clock.advance(HOUR_MS + 23 * HOUR_MS);
  assert.equal(await store.sweepExpired(), 0);
  clock.advance(HOUR_MS + 1);
  assert.equal(await store.sweepExpired(), 1);
  assert.equal(repository.resetTokens.has(token), false);
});

test("sweepExpired removes used tokens a day after they were issued", async () => {
  const { repository, clock, store, user } = setup();
  const used = await store.issue(user.id);
  const pending = await store.issue(user.id);
  assert.equal(await store.consume(used.token, "new-hash"), user.id);

  clock.advance(24 * HOUR_MS);
  assert.equal(await store.sweepExpired(), 0);
  clock.advance(1);
  assert.equal(await store.sweepExpired(), 1);
  assert.equal(repository.resetTokens.has(used.token), false);
  assert.equal(repository.resetTokens.has(pending.token), true);
});
