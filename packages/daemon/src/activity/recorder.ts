import type { ActivityEntry, ActivityMode } from "@gatewarden/shared";
import { errorMessage } from "../actuator/types.js";
import type { EventBus, EventBusEvents } from "../event-bus.js";
import type { Logger } from "../logger.js";
import type { ActivityLog } from "./log.js";

type Subscription = () => void;

/**
 * Turns bus events into activity entries and re-emits every stored entry as
 * `activity:recorded` for live subscribers.
 */
export class ActivityRecorder {
  private subscriptions: Subscription[] = [];

  constructor(
    private activityLog: ActivityLog,
    private eventBus: EventBus,
    private log: Logger,
  ) {}

  start(): void {
    if (this.subscriptions.length > 0) return;

    this.listen("token:detected", (data) => {
      this.record("token:detected", () =>
        this.activityLog.recordDetection({
          tokenId: data.id,
          tokenName: data.name,
          rssi: data.rssi,
          distance: data.distance,
        }),
      );
    });
    this.listen("gate:opened", (data) => {
      this.record("gate:opened", () =>
        this.activityLog.append("gate_opened", `Gate opened: ${data.reason}`, { reason: data.reason }),
      );
    });
    this.listen("gate:closed", (data) => {
      this.record("gate:closed", () =>
        this.activityLog.append("gate_closed", `Gate closed: ${data.reason}`, { reason: data.reason }),
      );
    });
    this.listen("gate:failed", (data) => {
      this.record("gate:failed", () =>
        this.activityLog.append("error", `Failed to ${data.action} gate: ${data.reason}`, {
          action: data.action,
          reason: data.reason,
        }),
      );
    });
    this.listen("token:registered", ({ token }) => {
      this.record("token:registered", () =>
        this.activityLog.append("token_registered", `Token registered: ${token.displayName}`, {
          tokenId: token.id,
          tokenName: token.displayName,
        }),
      );
    });
    this.listen("token:updated", ({ token, changes }) => {
      this.record("token:updated", () =>
        this.activityLog.append("token_updated", `Token updated: ${token.displayName}`, {
          tokenId: token.id,
          tokenName: token.displayName,
          ...changes,
        }),
      );
    });
    this.listen("token:unregistered", ({ token }) => {
      this.record("token:unregistered", () =>
        this.activityLog.append("token_unregistered", `Token unregistered: ${token.displayName}`, {
          tokenId: token.id,
          tokenName: token.displayName,
        }),
      );
    });
    this.listen("settings:updated", (data) => {
      this.record("settings:updated", () =>
        this.activityLog.append("config_updated", `Configuration updated: ${data.section}`, data.changes),
      );
    });
    this.listen("runtime:info", (data) => {
      this.record("runtime:info", () => this.activityLog.append("info", data.message));
    });
    this.listen("runtime:error", (data) => {
      this.record("runtime:error", () =>
        this.activityLog.append("error", data.message, { source: data.source }),
      );
    });
  }

  stop(): void {
    for (const unsubscribe of this.subscriptions) unsubscribe();
    this.subscriptions = [];
  }

  getEntries(limit?: number, type?: ActivityEntry["type"]): ActivityEntry[] {
    return this.activityLog.getEntries(limit, type);
  }

  getMode(): ActivityMode {
    return this.activityLog.getMode();
  }

  setMode(mode: ActivityMode): void {
    this.activityLog.setMode(mode);
    this.log.info(`Activity mode set to ${mode}`);
  }

  clear(): void {
    this.activityLog.clear();
    this.log.info("Activity log cleared");
    this.eventBus.emit("activity:cleared", { timestamp: Date.now() });
  }

  private listen<K extends keyof EventBusEvents>(event: K, listener: EventBusEvents[K]): void {
    this.eventBus.on(event, listener);
    this.subscriptions.push(() => this.eventBus.off(event, listener));
  }

  /** Stores and publishes one entry; a failing store must not reach the emitter. */
  private record(event: keyof EventBusEvents, build: () => ActivityEntry): void {
    try {
      const entry = build();
      this.log.debug(`${entry.type}: ${entry.message}`);
      this.eventBus.emit("activity:recorded", entry);
    } catch (err) {
      this.log.error(`Failed to record ${event}: ${errorMessage(err)}`);
    }
  }
}
