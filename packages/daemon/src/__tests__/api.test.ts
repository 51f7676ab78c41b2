import { describe, it, expect } from "vitest";
import { createCaller } from "../api/router.js";
import type { TRPCContext } from "../api/context.js";
import { ActivityLog } from "../activity/log.js";
import { ActivityRecorder } from "../activity/recorder.js";
import { GateRuntime } from "../gate/runtime.js";
import { SessionGate } from "../gate/session-gate.js";
import { Logger } from "../logger.js";
import { SettingsStore } from "../settings/store.js";
import { createRegistry, FakeGateway, FakeScanner } from "./helpers.js";

function setup() {
  const { registry, eventBus } = createRegistry();
  const settings = SettingsStore.inMemory();
  const gateway = new FakeGateway();
  const scanner = new FakeScanner();
  const log = Logger.silent();
  const tunables = () => settings.getTunables();
  const gate = new SessionGate({ registry, gateway, eventBus, log, tunables });
  const runtime = new GateRuntime({ gate, gateway, scanner, eventBus, log, tunables });
  const activity = new ActivityRecorder(
    new ActivityLog({ maxEntries: 100, mode: "suppress" }),
    eventBus,
    log,
  );
  activity.start();

  const ctx: TRPCContext = { registry, gate, runtime, scanner, activity, settings, eventBus, log };
  return { caller: createCaller(ctx), gateway, scanner, settings, log, gate };
}

describe("tokens router", () => {
  it("registers, updates, lists and unregisters", async () => {
    const { caller } = setup();

    expect(await caller.tokens.register({ id: "AA:BB:CC", name: "Phone" })).toEqual({
      id: "aa:bb:cc",
      displayName: "Phone",
      enabled: true,
    });
    await caller.tokens.update({ id: "aabbcc", enabled: false });

    expect(await caller.tokens.list()).toEqual([
      { id: "aa:bb:cc", displayName: "Phone", enabled: false, inRange: false, lastSeen: null },
    ]);

    expect(await caller.tokens.unregister({ id: "aa-bb-cc" })).toMatchObject({ id: "aa:bb:cc" });
    expect(await caller.tokens.list()).toEqual([]);
  });

  it("maps registry rejections to error codes", async () => {
    const { caller } = setup();
    await caller.tokens.register({ id: "fob", name: "Fob" });

    await expect(caller.tokens.register({ id: "FOB", name: "Other" })).rejects.toMatchObject({
      code: "CONFLICT",
      message: "Token FOB is already registered",
    });
    await expect(caller.tokens.get({ id: "ghost" })).rejects.toMatchObject({
      code: "NOT_FOUND",
      message: "Token ghost not found",
    });
    await expect(caller.tokens.register({ id: "key", name: "   " })).rejects.toMatchObject({
      code: "BAD_REQUEST",
      message: "Token name must not be empty",
    });
  });

  it("marks tokens heard in a live scan as in range", async () => {
    const { caller, scanner } = setup();
    await caller.tokens.register({ id: "fob", name: "Fob" });
    await caller.tokens.register({ id: "phone", name: "Phone" });
    scanner.batches.push([{ id: "fob", name: "Fob", rssi: -60, distance: 1.12 }]);

    const tokens = await caller.tokens.list({ live: true });

    expect(scanner.scans).toBe(1);
    expect(tokens.map((t) => [t.id, t.inRange])).toEqual([
      ["fob", true],
      ["phone", false],
    ]);
    expect(typeof tokens[0]?.lastSeen).toBe("number");
  });
});

describe("gate router", () => {
  it("opens and closes on request", async () => {
    const { caller, gateway } = setup();

    expect(await caller.gate.open()).toEqual({ success: true, state: "open" });
    expect(await caller.gate.close({ reason: "Leaving" })).toEqual({ success: true, state: "closed" });
    expect(gateway.notifications.map((n) => n.message)).toEqual(["Manual", "Leaving"]);
  });

  it("reports a failed command without throwing", async () => {
    const { caller, gateway } = setup();
    gateway.openResult = false;

    expect(await caller.gate.open()).toEqual({ success: false, state: "unknown" });
  });

  it("returns the status snapshot", async () => {
    const { caller } = setup();

    expect(await caller.gate.status()).toMatchObject({
      gateState: "unknown",
      running: false,
      sessionActive: false,
      actuator: { online: true, state: "closed" },
    });
  });

  it("rejects an empty reason", async () => {
    const { caller } = setup();
    await expect(caller.gate.open({ reason: "" })).rejects.toMatchObject({ code: "BAD_REQUEST" });
  });
});

describe("activity router", () => {
  it("lists recorded entries by type", async () => {
    const { caller } = setup();
    await caller.gate.open({ reason: "Delivery" });

    const entries = await caller.activity.list({ type: "gate_opened" });

    expect(entries.map((e) => e.message)).toEqual(["Gate opened: Delivery"]);
  });

  it("switches mode and persists it", async () => {
    const { caller, settings } = setup();

    expect(await caller.activity.setMode({ mode: "extended" })).toEqual({ mode: "extended" });
    expect(await caller.activity.mode()).toEqual({ mode: "extended" });
    expect(settings.get().logging.activityMode).toBe("extended");

    const [latest] = await caller.activity.list({ limit: 1 });
    expect(latest).toMatchObject({ type: "config_updated", message: "Configuration updated: logging" });
  });

  it("clears the log", async () => {
    const { caller } = setup();
    await caller.gate.open();

    expect(await caller.activity.clear()).toEqual({ success: true });
    expect(await caller.activity.list()).toEqual([]);
  });
});

describe("settings router", () => {
  it("applies gate tunables to the running gate", async () => {
    const { caller, gate } = setup();

    const tunables = await caller.settings.updateGate({ tokenIdleTimeout: 120 });

    expect(tunables.tokenIdleTimeout).toBe(120);
    expect((await caller.settings.get()).gate.tokenIdleTimeout).toBe(120);
    expect(gate.isInRange("nobody")).toBe(false);
  });

  it("changes the log level at runtime", async () => {
    const { caller, log } = setup();

    await caller.settings.setLogLevel({ level: "debug" });

    expect(log.getLevel()).toBe("debug");
    expect((await caller.settings.get()).logging.level).toBe("debug");
  });

  it("does not expose the actuator token", async () => {
    const { caller } = setup();
    const { actuator } = await caller.settings.get();
    expect(Object.keys(actuator).sort()).toEqual(["gateEntityId", "notifyService", "provider", "url"]);
  });
});

describe("scan router", () => {
  it("lists nearby devices", async () => {
    const { caller, scanner } = setup();
    scanner.nearby = [{ type: "device", address: "AA", name: "Unknown", rssi: -70, distance: 3.55 }];

    expect(await caller.scan.nearby({ duration: 3 })).toEqual(scanner.nearby);
  });
});
