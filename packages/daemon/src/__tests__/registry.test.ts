import { describe, it, expect } from "vitest";
import type { Token } from "@gatewarden/shared";
import { EventBus } from "../event-bus.js";
import { Logger } from "../logger.js";
import { TokenRegistry } from "../tokens/registry.js";
import { canonicalTokenId, tokenKey } from "../tokens/normalize.js";
import { createRegistry, MemoryPersistence } from "./helpers.js";

describe("token id normalization", () => {
  it("strips separators and case for the lookup key", () => {
    expect(tokenKey("AA:BB:CC:DD:EE:FF")).toBe("aabbccddeeff");
    expect(tokenKey(" aa-bb_cc.dd ee:ff ")).toBe("aabbccddeeff");
  });

  it("keeps separators in the display form", () => {
    expect(canonicalTokenId("  AA:BB:CC  ")).toBe("aa:bb:cc");
  });
});

describe("TokenRegistry", () => {
  it("registers a token under its normalized id", () => {
    const { registry, persistence } = createRegistry();

    const result = registry.register("AA:BB:CC:DD:EE:FF", "Phone");

    expect(result).toEqual({
      ok: true,
      token: { id: "aa:bb:cc:dd:ee:ff", displayName: "Phone", enabled: true },
    });
    expect(registry.get("aabbccddeeff")?.displayName).toBe("Phone");
    expect(registry.get("AA-BB-CC-DD-EE-FF")?.displayName).toBe("Phone");
    expect(persistence.saved).toHaveLength(1);
  });

  it("rejects a duplicate without side effects", () => {
    const { registry, persistence } = createRegistry();
    registry.register("AA:BB:CC", "Phone");

    const result = registry.register("aabbcc", "Other");

    expect(result).toEqual({ ok: false, reason: "already_exists" });
    expect(registry.list()).toEqual([{ id: "aa:bb:cc", displayName: "Phone", enabled: true }]);
    expect(persistence.saved).toHaveLength(1);
  });

  it("rejects empty ids and blank names", () => {
    const { registry, persistence } = createRegistry();

    expect(registry.register(":-:", "Phone")).toEqual({ ok: false, reason: "invalid_id" });
    expect(registry.register("fob-1", "   ")).toEqual({ ok: false, reason: "invalid_name" });
    expect(persistence.saved).toHaveLength(0);
  });

  it("registers disabled tokens when asked", () => {
    const { registry } = createRegistry();
    registry.register("fob-1", "Fob", false);
    expect(registry.get("fob-1")?.enabled).toBe(false);
  });

  it("updates only the provided fields", () => {
    const { registry, persistence } = createRegistry();
    registry.register("fob-1", "Fob");

    expect(registry.update("FOB1", { enabled: false })).toEqual({
      ok: true,
      token: { id: "fob-1", displayName: "Fob", enabled: false },
    });
    expect(registry.update("fob-1", { displayName: "Key fob" })).toEqual({
      ok: true,
      token: { id: "fob-1", displayName: "Key fob", enabled: false },
    });
    expect(persistence.saved).toHaveLength(3);
  });

  it("reports not_found for updates and removals of unknown tokens", () => {
    const { registry, persistence } = createRegistry();

    expect(registry.update("ghost", { enabled: true })).toEqual({ ok: false, reason: "not_found" });
    expect(registry.unregister("ghost")).toEqual({ ok: false, reason: "not_found" });
    expect(persistence.saved).toHaveLength(0);
  });

  it("unregisters and lists in insertion order", () => {
    const { registry } = createRegistry();
    registry.register("c", "Third");
    registry.register("a", "First");
    registry.register("b", "Second");

    const removed = registry.unregister("A");

    expect(removed).toEqual({ ok: true, token: { id: "a", displayName: "First", enabled: true } });
    expect(registry.list().map((t) => t.id)).toEqual(["c", "b"]);
    expect(registry.get("a")).toBeUndefined();
  });

  it("persists the full list on every mutation", () => {
    const { registry, persistence } = createRegistry();
    registry.register("a", "First");
    registry.register("b", "Second");
    registry.unregister("a");

    expect(persistence.saved[2]).toEqual([{ id: "b", displayName: "Second", enabled: true }]);
  });

  it("emits bus events for each mutation", () => {
    const eventBus = new EventBus();
    const { registry } = createRegistry(eventBus);
    const seen: string[] = [];
    eventBus.on("token:registered", ({ token }) => seen.push(`registered ${token.id}`));
    eventBus.on("token:updated", ({ token, changes }) => seen.push(`updated ${token.id} ${JSON.stringify(changes)}`));
    eventBus.on("token:unregistered", ({ token }) => seen.push(`unregistered ${token.id}`));

    registry.register("fob-1", "Fob");
    registry.update("fob-1", { enabled: false });
    registry.unregister("fob-1");
    registry.unregister("fob-1");

    expect(seen).toEqual([
      "registered fob-1",
      'updated fob-1 {"enabled":false}',
      "unregistered fob-1",
    ]);
  });

  it("skips duplicate ids when loading from settings", () => {
    const initial: Token[] = [
      { id: "AA:BB", displayName: "Phone", enabled: true },
      { id: "aabb", displayName: "Duplicate", enabled: true },
      { id: "fob", displayName: "Fob", enabled: false },
    ];
    const registry = new TokenRegistry(new MemoryPersistence(), new EventBus(), Logger.silent(), initial);

    expect(registry.list()).toEqual([
      { id: "aa:bb", displayName: "Phone", enabled: true },
      { id: "fob", displayName: "Fob", enabled: false },
    ]);
  });

  it("hands out copies", () => {
    const { registry } = createRegistry();
    registry.register("fob", "Fob");

    const token = registry.get("fob");
    if (token) token.enabled = false;

    expect(registry.get("fob")?.enabled).toBe(true);
  });
});
