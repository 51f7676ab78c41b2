import type {
  ActuatorStatus,
  GateSnapshot,
  GateState,
  GateTunables,
  SignalObservation,
  Token,
} from "@gatewarden/shared";
import type { ActuatorGateway } from "../actuator/types.js";
import { errorMessage } from "../actuator/types.js";
import type { EventBus } from "../event-bus.js";
import type { Logger } from "../logger.js";
import { tokenKey } from "../tokens/normalize.js";
import { Mutex } from "./mutex.js";

export const AUTO_CLOSE_REASON = "auto-close timeout";

export interface TokenLookup {
  get(id: string): Token | undefined;
}

export interface SessionGateDeps {
  registry: TokenLookup;
  gateway: ActuatorGateway;
  eventBus: EventBus;
  log: Logger;
  /** Read on every decision so runtime changes apply without a restart */
  tunables: () => GateTunables;
  now?: () => number;
}

export type ObservationOutcome =
  | "opened"
  | "open_failed"
  | "unknown_token"
  | "disabled"
  | "already_open"
  | "session_active";

/**
 * Owns gate state, the last-open time and the detection session, and decides
 * when to call the actuator. Decisions run under one lock; actuator calls are
 * awaited after it is released.
 */
export class SessionGate {
  private state: GateState = "unknown";
  private lastOpenTime: number | null = null;
  private sessionStartedAt: number | null = null;
  private lastSeen = new Map<string, number>();
  private decisionLock = new Mutex();
  private registry: TokenLookup;
  private gateway: ActuatorGateway;
  private eventBus: EventBus;
  private log: Logger;
  private tunables: () => GateTunables;
  private now: () => number;

  constructor(deps: SessionGateDeps) {
    this.registry = deps.registry;
    this.gateway = deps.gateway;
    this.eventBus = deps.eventBus;
    this.log = deps.log;
    this.tunables = deps.tunables;
    this.now = deps.now ?? Date.now;
  }

  // ── Read-only accessors ──

  getState(): GateState {
    return this.state;
  }

  getLastOpenTime(): number | null {
    return this.lastOpenTime;
  }

  getSessionStartedAt(): number | null {
    return this.sessionStartedAt;
  }

  isSessionActive(): boolean {
    return (
      this.sessionStartedAt !== null &&
      this.now() - this.sessionStartedAt < this.tunables().sessionTimeout * 1000
    );
  }

  lastSeenAt(tokenId: string): number | null {
    return this.lastSeen.get(tokenKey(tokenId)) ?? null;
  }

  isInRange(tokenId: string): boolean {
    const seen = this.lastSeenAt(tokenId);
    return seen !== null && this.now() - seen < this.tunables().tokenIdleTimeout * 1000;
  }

  // ── Decisions ──

  async handleObservation(observation: SignalObservation): Promise<ObservationOutcome> {
    const token = this.registry.get(observation.id);
    this.lastSeen.set(tokenKey(observation.id), this.now());
    this.eventBus.emit("token:detected", {
      id: token?.id ?? observation.id,
      name: token?.displayName ?? observation.id,
      rssi: observation.rssi,
      distance: observation.distance,
      known: token !== undefined,
      timestamp: this.now(),
    });

    const decision = await this.decisionLock.runExclusive((): ObservationOutcome | Token => {
      if (!token) return "unknown_token";
      // re-read so an update that landed while we waited for the lock is honoured
      const current = this.registry.get(token.id);
      if (!current) return "unknown_token";
      if (!current.enabled) return "disabled";
      if (this.state === "open" || this.state === "opening") return "already_open";
      if (this.isSessionActive()) return "session_active";

      this.sessionStartedAt = this.now();
      this.setState("opening");
      return current;
    });

    if (typeof decision === "string") {
      if (decision !== "unknown_token") {
        this.log.debug(`Observation of ${observation.id} ignored: ${decision}`);
      }
      return decision;
    }

    this.log.info(`Authorized token detected: ${decision.displayName}`);
    const opened = await this.performOpen(`token detected: ${decision.displayName}`);
    return opened ? "opened" : "open_failed";
  }

  async requestOpen(reason: string): Promise<boolean> {
    await this.decisionLock.runExclusive(() => this.setState("opening"));
    return this.performOpen(reason);
  }

  async requestClose(reason: string): Promise<boolean> {
    await this.decisionLock.runExclusive(() => this.setState("closing"));
    return this.performClose(reason);
  }

  /**
   * Closes the gate when it has been open for at least `autoCloseTimeout`.
   * Session state is not consulted.
   */
  async autoCloseIfDue(): Promise<boolean> {
    const due = await this.decisionLock.runExclusive(() => {
      if (this.state !== "open" || this.lastOpenTime === null) return false;
      const openFor = this.now() - this.lastOpenTime;
      if (openFor < this.tunables().autoCloseTimeout * 1000) return false;
      this.setState("closing");
      return true;
    });
    if (!due) return false;

    this.log.info("Auto-close timeout reached, closing gate");
    return this.performClose(AUTO_CLOSE_REASON);
  }

  async queryStatus(): Promise<GateSnapshot> {
    let actuator: ActuatorStatus;
    try {
      actuator = await this.gateway.queryState();
    } catch (err) {
      this.log.warn(`Actuator status query failed: ${errorMessage(err)}`);
      actuator = { online: false, info: {}, error: errorMessage(err) };
    }

    return {
      gateState: this.state,
      lastOpenTime: this.lastOpenTime,
      sessionStartedAt: this.sessionStartedAt,
      sessionActive: this.isSessionActive(),
      actuator,
      timestamp: this.now(),
    };
  }

  // ── Actuation ──

  private async performOpen(reason: string): Promise<boolean> {
    this.log.info(`Opening gate: ${reason}`);
    const ok = await this.callGateway("open");

    if (!ok) {
      this.setState("unknown");
      this.log.error(`Failed to open gate (${reason})`);
      this.eventBus.emit("gate:failed", { action: "open", reason, timestamp: this.now() });
      return false;
    }

    this.lastOpenTime = this.now();
    this.setState("open");
    this.eventBus.emit("gate:opened", { reason, timestamp: this.now() });
    await this.notify("Gate opened", reason);
    return true;
  }

  private async performClose(reason: string): Promise<boolean> {
    this.log.info(`Closing gate: ${reason}`);
    const ok = await this.callGateway("close");

    if (!ok) {
      this.setState("unknown");
      this.log.error(`Failed to close gate (${reason})`);
      this.eventBus.emit("gate:failed", { action: "close", reason, timestamp: this.now() });
      return false;
    }

    this.lastOpenTime = null;
    this.setState("closed");
    this.eventBus.emit("gate:closed", { reason, timestamp: this.now() });
    await this.notify("Gate closed", reason);
    return true;
  }

  private async callGateway(action: "open" | "close"): Promise<boolean> {
    try {
      return action === "open" ? await this.gateway.open() : await this.gateway.close();
    } catch (err) {
      this.log.error(`Actuator ${action} threw: ${errorMessage(err)}`);
      return false;
    }
  }

  private async notify(title: string, message: string): Promise<void> {
    try {
      await this.gateway.notify(title, message);
    } catch (err) {
      this.log.warn(`Notification failed: ${errorMessage(err)}`);
    }
  }

  private setState(next: GateState): void {
    const previous = this.state;
    if (previous === next) return;
    this.state = next;
    this.eventBus.emit("gate:state", { state: next, previous, timestamp: this.now() });
  }
}
