import { loadConfig } from "./config.js";
import { Logger } from "./logger.js";
import { EventBus } from "./event-bus.js";
import { SettingsStore } from "./settings/store.js";
import { ActivityStore } from "./activity/store.js";
import { ActivityLog } from "./activity/log.js";
import { ActivityRecorder } from "./activity/recorder.js";
import { TokenRegistry } from "./tokens/registry.js";
import { createGateway } from "./actuator/factory.js";
import { BluezDeviceSource } from "./ble/bluez.js";
import { BleScanner } from "./ble/scanner.js";
import { SessionGate } from "./gate/session-gate.js";
import { GateRuntime } from "./gate/runtime.js";
import { startApiServer } from "./api/server.js";

async function main() {
  console.log("🚧 Gatewarden · BLE gate controller");
  console.log("==================================\n");

  // 1. Load config + settings file (invalid settings abort startup)
  const config = loadConfig();
  const settings = SettingsStore.load(config.settingsPath);
  const { logging, ble, actuator } = settings.get();

  // 2. Logger
  const log = Logger.create("Init", {
    level: config.logLevel ?? logging.level,
    file: logging.file,
  });
  log.info(`Settings loaded from ${config.settingsPath}`);

  // 3. EventBus
  const eventBus = new EventBus();

  // 4. Activity log (SQLite mirror, reloaded on start)
  const activityStore = new ActivityStore(config.dbPath);
  const activityLog = new ActivityLog({
    store: activityStore,
    maxEntries: logging.activityMaxEntries,
    mode: logging.activityMode,
  });
  const activity = new ActivityRecorder(activityLog, eventBus, log.child("Activity"));
  activity.start();
  log.info(`Activity log ready (${activityLog.size} entries, ${config.dbPath})`);

  // 5. Token registry
  const registry = new TokenRegistry(settings, eventBus, log.child("Tokens"), settings.get().tokens);
  log.info(`${registry.list().length} tokens registered`);

  // 6. Actuator + scanner
  const gateway = createGateway(actuator, log);
  const scanner = new BleScanner(
    new BluezDeviceSource(ble.adapter, log.child("BlueZ")),
    registry,
    log.child("Scanner"),
  );

  // 7. Session gate + runtime loops
  const tunables = () => settings.getTunables();
  const gate = new SessionGate({
    registry,
    gateway,
    eventBus,
    log: log.child("Gate"),
    tunables,
  });
  const runtime = new GateRuntime({
    gate,
    gateway,
    scanner,
    eventBus,
    log: log.child("Runtime"),
    tunables,
  });
  await runtime.start();

  // 8. tRPC API server
  const apiServer = startApiServer(
    {
      registry,
      gate,
      runtime,
      scanner,
      activity,
      settings,
      eventBus,
      log,
    },
    config.apiPort,
    config.apiHost,
  );

  console.log(`\n✅ Gatewarden running, API on port ${config.apiPort}`);
  console.log("   Press Ctrl+C to stop\n");

  // 9. Graceful shutdown
  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log("\n\nShutting down...");
    await apiServer.close();
    await runtime.stop();
    await scanner.close();
    activity.stop();
    activityStore.close();
    log.close();
    console.log("Goodbye!");
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error) => {
      console.error("Shutdown failed:", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
