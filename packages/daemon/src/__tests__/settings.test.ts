import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { SettingsError, SettingsStore } from "../settings/store.js";
import { loadConfig } from "../config.js";

describe("SettingsStore", () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "gatewarden-settings-"));
    file = path.join(dir, "nested", "settings.json");
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("falls back to defaults when the file is missing", () => {
    const store = SettingsStore.load(file);

    expect(store.getTunables()).toEqual({
      autoCloseTimeout: 300,
      sessionTimeout: 60,
      statusCheckInterval: 30,
      bleScanInterval: 5,
      tokenIdleTimeout: 30,
      autoClosePollInterval: 10,
    });
    expect(store.get().actuator.provider).toBe("dummy");
    expect(store.get().logging).toEqual({
      level: "info",
      activityMaxEntries: 1000,
      activityMode: "suppress",
    });
    expect(store.get().tokens).toEqual([]);
  });

  it("fills in defaults around partial sections", () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(
      file,
      JSON.stringify({ gate: { sessionTimeout: 90 }, tokens: [{ id: "fob", displayName: "Fob" }] }),
    );

    const store = SettingsStore.load(file);

    expect(store.getTunables().sessionTimeout).toBe(90);
    expect(store.getTunables().autoCloseTimeout).toBe(300);
    expect(store.get().tokens).toEqual([{ id: "fob", displayName: "Fob", enabled: true }]);
  });

  it("rejects malformed JSON", () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, "{ not json");

    expect(() => SettingsStore.load(file)).toThrow(SettingsError);
  });

  it("names the offending field when validation fails", () => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, JSON.stringify({ gate: { sessionTimeout: -5 } }));

    expect(() => SettingsStore.load(file)).toThrow(/^Invalid settings: gate\.sessionTimeout: /);
  });

  it("persists token lists and reloads them", () => {
    const store = SettingsStore.load(file);
    store.saveTokens([{ id: "aa:bb", displayName: "Phone", enabled: false }]);

    expect(SettingsStore.load(file).get().tokens).toEqual([
      { id: "aa:bb", displayName: "Phone", enabled: false },
    ]);
    expect(fs.readFileSync(file, "utf-8").endsWith("}\n")).toBe(true);
  });

  it("merges tunable updates and ignores undefined fields", () => {
    const store = SettingsStore.load(file);

    const updated = store.updateTunables({ sessionTimeout: 120, autoCloseTimeout: undefined });

    expect(updated.sessionTimeout).toBe(120);
    expect(updated.autoCloseTimeout).toBe(300);
    expect(SettingsStore.load(file).getTunables().sessionTimeout).toBe(120);
  });

  it("refuses invalid tunable updates and keeps the previous values", () => {
    const store = SettingsStore.load(file);

    expect(() => store.updateTunables({ bleScanInterval: 0 })).toThrow(SettingsError);
    expect(store.getTunables().bleScanInterval).toBe(5);
  });

  it("keeps in-memory stores off disk", () => {
    const store = SettingsStore.inMemory({ logging: { activityMode: "extended" } });
    store.updateLogging({ level: "debug" });

    expect(store.get().logging).toMatchObject({ level: "debug", activityMode: "extended" });
  });
});

describe("loadConfig", () => {
  it("uses defaults under the home directory", () => {
    const config = loadConfig({});

    expect(config.apiPort).toBe(3100);
    expect(config.apiHost).toBe("0.0.0.0");
    expect(config.settingsPath).toBe(path.resolve(os.homedir(), ".gatewarden", "settings.json"));
    expect(config.dbPath).toBe(path.resolve(os.homedir(), ".gatewarden", "activity.db"));
    expect(config.logLevel).toBeUndefined();
  });

  it("reads overrides from the environment", () => {
    const config = loadConfig({
      GATEWARDEN_PORT: "4200",
      GATEWARDEN_HOST: "127.0.0.1",
      GATEWARDEN_SETTINGS_PATH: "~/gate/settings.json",
      GATEWARDEN_DB_PATH: "/var/lib/gatewarden/activity.db",
      GATEWARDEN_LOG_LEVEL: "DEBUG",
    });

    expect(config).toEqual({
      apiPort: 4200,
      apiHost: "127.0.0.1",
      settingsPath: `${os.homedir()}/gate/settings.json`,
      dbPath: "/var/lib/gatewarden/activity.db",
      logLevel: "debug",
    });
  });

  it("ignores an unparseable port and an unknown log level", () => {
    const config = loadConfig({ GATEWARDEN_PORT: "gate", GATEWARDEN_LOG_LEVEL: "verbose" });

    expect(config.apiPort).toBe(3100);
    expect(config.logLevel).toBeUndefined();
  });
});
