import { describe, it, expect } from "vitest";

import { SubscriberRegistry } from "../src/primitives/subscriber-registry.js";
import { PskStore, createPsk, pskIdFromKey } from "../src/primitives/psk-store.js";
import { BranchStore } from "../src/primitives/branch-store.js";
import { nobleSuite } from "../src/backends/noble-suite.js";
import { SeedIdentity } from "../src/backends/seed-identity.js";
import { asSessionKey, toHex } from "../src/backends/crypto-utils.js";
import { deriveChannelInstance, deriveNextAddress } from "../src/codec/address.js";

const alice = SeedIdentity.fromSeed(nobleSuite, "registry-alice");
const bob = SeedIdentity.fromSeed(nobleSuite, "registry-bob");

// ─── SubscriberRegistry ────────────────────────────────────────────

describe("SubscriberRegistry", () => {
  it("registers subscribers as PENDING", () => {
    const registry = new SubscriberRegistry();
    const record = registry.register(alice.publisherId, alice.exchangeKey);
    expect(record.state).toBe("PENDING");
    expect(registry.isActive(alice.publisherId)).toBe(false);
    expect(registry.active()).toEqual([]);
  });

  it("offers only ACTIVE subscribers for keyloads", () => {
    const registry = new SubscriberRegistry();
    registry.register(alice.publisherId, alice.exchangeKey);
    registry.register(bob.publisherId, bob.exchangeKey);
    registry.activate(bob.publisherId);
    expect(registry.active().map((record) => record.publisher)).toEqual([bob.publisherId]);
  });

  it("keeps unregistered records but reports them once", () => {
    const registry = new SubscriberRegistry();
    registry.register(alice.publisherId, alice.exchangeKey);
    registry.activate(alice.publisherId);
    expect(registry.unregister(alice.publisherId)).toBe(true);
    expect(registry.unregister(alice.publisherId)).toBe(false);
    expect(registry.get(alice.publisherId)?.state).toBe("UNREGISTERED");
    expect(registry.unregister(bob.publisherId)).toBe(false);
  });

  it("sorts all records by publisher id", () => {
    const registry = new SubscriberRegistry();
    registry.register(alice.publisherId, alice.exchangeKey);
    registry.register(bob.publisherId, bob.exchangeKey);
    const ids = registry.all().map((record) => record.publisher);
    expect(ids).toEqual([alice.publisherId, bob.publisherId].sort());
  });
});

// ─── PskStore ──────────────────────────────────────────────────────

describe("PskStore", () => {
  it("derives the same id for the same secret", () => {
    const a = createPsk(nobleSuite, "test-secret");
    const b = createPsk(nobleSuite, "test-secret");
    expect(pskIdFromKey(nobleSuite, a)).toBe(pskIdFromKey(nobleSuite, b));
    expect(pskIdFromKey(nobleSuite, a)).toMatch(/^[0-9a-f]{32}$/);
    expect(pskIdFromKey(nobleSuite, createPsk(nobleSuite, "other-secret"))).not.toBe(pskIdFromKey(nobleSuite, a));
  });

  it("stores, lists and removes keys", () => {
    const store = new PskStore(nobleSuite);
    const id = store.store(createPsk(nobleSuite, "test-secret"));
    expect(store.has(id)).toBe(true);
    expect(store.ids()).toEqual([id]);
    expect(store.size).toBe(1);
    expect(store.remove(id)).toBe(true);
    expect(store.remove(id)).toBe(false);
    expect(store.get(id)).toBeUndefined();
  });

  it("never wipes the caller's buffer", () => {
    const store = new PskStore(nobleSuite);
    const psk = createPsk(nobleSuite, "test-secret");
    const before = toHex(psk);
    const id = store.store(psk);
    store.remove(id);
    expect(toHex(psk)).toBe(before);
  });
});

// ─── BranchStore ───────────────────────────────────────────────────

describe("BranchStore", () => {
  const instanceId = deriveChannelInstance(nobleSuite, alice.publicKey, 0);
  const root = deriveNextAddress(nobleSuite, instanceId, alice.publicKey, 1);

  it("knows locked and open branches apart", () => {
    const store = new BranchStore();
    store.lock(root.messageId);
    expect(store.knows(root.messageId)).toBe(true);
    expect(store.isLocked(root.messageId)).toBe(true);
    expect(store.get(root.messageId)).toBeUndefined();

    store.open({ root, sessionKey: asSessionKey(new Uint8Array(32).fill(3)), recipients: new Set(), pskIds: new Set() });
    expect(store.isLocked(root.messageId)).toBe(false);
    expect(store.get(root.messageId)?.root).toEqual(root);
  });

  it("does not lock a branch it already holds a key for", () => {
    const store = new BranchStore();
    store.open({ root, sessionKey: asSessionKey(new Uint8Array(32).fill(3)), recipients: new Set(), pskIds: new Set() });
    store.lock(root.messageId);
    expect(store.isLocked(root.messageId)).toBe(false);
    expect(store.get(root.messageId)?.root).toEqual(root);
  });

  it("indexes recorded messages", () => {
    const store = new BranchStore();
    store.record({ link: root, publisher: alice.publisherId, seq: 1, msgType: "KEYLOAD", branchId: root.messageId });
    expect(store.isKnown(root.messageId)).toBe(true);
    expect(store.message(root.messageId)?.seq).toBe(1);
    store.clear();
    expect(store.isKnown(root.messageId)).toBe(false);
  });

  it("forgets messages but keeps branch keys", () => {
    const store = new BranchStore();
    store.open({ root, sessionKey: asSessionKey(new Uint8Array(32).fill(3)), recipients: new Set(), pskIds: new Set() });
    store.record({ link: root, publisher: alice.publisherId, seq: 1, msgType: "KEYLOAD", branchId: root.messageId });
    store.forgetMessages();
    expect(store.isKnown(root.messageId)).toBe(false);
    expect(store.get(root.messageId)?.sessionKey).toEqual(new Uint8Array(32).fill(3));
  });
});
