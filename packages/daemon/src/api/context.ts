import type { TokenRegistry } from "../tokens/registry.js";
import type { SessionGate } from "../gate/session-gate.js";
import type { GateRuntime } from "../gate/runtime.js";
import type { SignalScanner } from "../ble/scanner.js";
import type { ActivityRecorder } from "../activity/recorder.js";
import type { SettingsStore } from "../settings/store.js";
import type { EventBus } from "../event-bus.js";
import type { Logger } from "../logger.js";

export interface TRPCContext {
  registry: TokenRegistry;
  gate: SessionGate;
  runtime: GateRuntime;
  scanner: SignalScanner;
  activity: ActivityRecorder;
  settings: SettingsStore;
  eventBus: EventBus;
  log: Logger;
}
