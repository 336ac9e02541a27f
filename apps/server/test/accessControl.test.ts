import test from "node:test";
import assert from "node:assert/strict";
import { AccessControlResolver, resolveVisibleIds } from "../src/services/accessControl.js";
import { MemoryAuthRepository } from "./support/memoryAuthRepository.js";

function seededRoster() {
  const repository = new MemoryAuthRepository();
  const admin = repository.addUser({ username: "admin", role: "administrator" });
  const boss = repository.addUser({ username: "boss", role: "boss" });
  const bossA = repository.addUser({ username: "boss_a", role: "group_boss", subgroup: "A" });
  const bossB = repository.addUser({ username: "boss_b", role: "group_boss", subgroup: "B" });
  const carlos = repository.addUser({ username: "carlos", role: "agent", subgroup: "A" });
  const maria = repository.addUser({ username: "maria", role: "agent", subgroup: "A" });
  const ana = repository.addUser({ username: "ana", role: "agent", subgroup: "B" });
  const javier = repository.addUser({ username: "javier", role: "agent", subgroup: "B" });
  return { repository, admin, boss, bossA, bossB, carlos, maria, ana, javier };
}

test("administrator and boss see every identity", async () => {
  const roster = seededRoster();
  const resolver = new AccessControlResolver(roster.repository);

  assert.deepEqual(await resolver.visibleIdentityIds(roster.admin), [1, 2, 3, 4, 5, 6, 7, 8]);
  assert.deepEqual(await resolver.visibleIdentityIds(roster.boss), [1, 2, 3, 4, 5, 6, 7, 8]);
});

test("group boss of subgroup A sees self and subgroup A only", async () => {
  const roster = seededRoster();
  const resolver = new AccessControlResolver(roster.repository);

  const ids = await resolver.visibleIdentityIds(roster.bossA);
  assert.deepEqual(ids, [roster.bossA.id, roster.carlos.id, roster.maria.id]);
  assert.equal(ids.includes(roster.ana.id), false);
  assert.equal(ids.includes(roster.javier.id), false);
});

test("agent sees only itself", async () => {
  const roster = seededRoster();
  const resolver = new AccessControlResolver(roster.repository);

  assert.deepEqual(await resolver.visibleIdentityIds(roster.ana), [roster.ana.id]);
});

test("group boss without a subgroup falls back to self", async () => {
  const roster = seededRoster();
  const orphan = roster.repository.addUser({ username: "orphan", role: "group_boss" });
  const resolver = new AccessControlResolver(roster.repository);

  assert.deepEqual(await resolver.visibleIdentityIds(orphan), [orphan.id]);
});

test("canView follows the visible set", async () => {
  const roster = seededRoster();
  const resolver = new AccessControlResolver(roster.repository);

  assert.equal(await resolver.canView(roster.bossB, roster.javier.id), true);
  assert.equal(await resolver.canView(roster.bossB, roster.carlos.id), false);
  assert.equal(await resolver.canView(roster.carlos, roster.carlos.id), true);
  assert.equal(await resolver.canView(roster.carlos, roster.maria.id), false);
});

test("resolveVisibleIds adds the group boss when the roster slice omits it", () => {
  const ids = resolveVisibleIds({ id: 9, role: "group_boss", subgroup: "B" }, [
    { id: 4, subgroup: "B" },
    { id: 5, subgroup: "A" },
    { id: 7, subgroup: "B" }
  ]);
  assert.deepEqual(ids, [4, 7, 9]);
});
