import type { GateSnapshot, GateStatus, GateTunables, SignalObservation } from "@gatewarden/shared";
import type { ActuatorGateway } from "../actuator/types.js";
import { errorMessage } from "../actuator/types.js";
import type { SignalScanner } from "../ble/scanner.js";
import type { EventBus } from "../event-bus.js";
import type { Logger } from "../logger.js";
import type { SessionGate } from "./session-gate.js";

export interface GateRuntimeDeps {
  gate: SessionGate;
  gateway: ActuatorGateway;
  scanner: SignalScanner;
  eventBus: EventBus;
  log: Logger;
  tunables: () => GateTunables;
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function interruptibleSleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener("abort", done, { once: true });
  });
}

/**
 * Drives the SessionGate with three independent loops: radio scan, actuator
 * status poll and the auto-close watchdog. Intervals are re-read every cycle.
 */
export class GateRuntime {
  private running = false;
  private abort: AbortController | null = null;
  private loops: Promise<void>[] = [];
  private gate: SessionGate;
  private gateway: ActuatorGateway;
  private scanner: SignalScanner;
  private eventBus: EventBus;
  private log: Logger;
  private tunables: () => GateTunables;

  constructor(deps: GateRuntimeDeps) {
    this.gate = deps.gate;
    this.gateway = deps.gateway;
    this.scanner = deps.scanner;
    this.eventBus = deps.eventBus;
    this.log = deps.log;
    this.tunables = deps.tunables;
  }

  isRunning(): boolean {
    return this.running;
  }

  /** Connects the actuator (failure propagates) and starts the loops. */
  async start(): Promise<void> {
    if (this.running) return;

    this.log.info(`Connecting to actuator (${this.gateway.name})`);
    await this.gateway.connect();

    const initial = await this.statusTick();
    this.log.info(
      `Actuator ${initial.actuator.online ? "online" : "offline"}` +
        (initial.actuator.state ? `, reports gate ${initial.actuator.state}` : ""),
    );

    this.running = true;
    const abort = new AbortController();
    this.abort = abort;
    this.loops = [
      this.runLoop("scan", () => this.scanTick(), () => this.tunables().bleScanInterval, abort.signal),
      this.runLoop("status", () => this.statusTick(), () => this.tunables().statusCheckInterval, abort.signal),
      this.runLoop("auto-close", () => this.autoCloseTick(), () => this.tunables().autoClosePollInterval, abort.signal),
    ];

    this.log.info("Gate controller started");
    this.eventBus.emit("runtime:info", { message: "Gate controller started", timestamp: Date.now() });
  }

  /** Stops the loops, waits for them to finish, then disconnects the actuator. */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.log.info("Stopping gate controller");
    this.running = false;
    this.abort?.abort();
    await Promise.all(this.loops);
    this.loops = [];
    this.abort = null;

    try {
      await this.gateway.disconnect();
    } catch (err) {
      this.log.warn(`Actuator disconnect failed: ${errorMessage(err)}`);
    }
    this.eventBus.emit("runtime:info", { message: "Gate controller stopped", timestamp: Date.now() });
    this.log.info("Gate controller stopped");
  }

  async getStatus(): Promise<GateStatus> {
    const snapshot = await this.gate.queryStatus();
    return { ...snapshot, running: this.running };
  }

  // ── Loop bodies (one cycle each) ──

  /** One scan cycle. Returns how many observations were handled. */
  async scanTick(): Promise<number> {
    const duration = this.tunables().bleScanInterval;
    let observations: SignalObservation[];
    try {
      observations = await this.scanner.scanOnce(duration);
    } catch (err) {
      this.log.error(`BLE scan failed: ${errorMessage(err)}`);
      return 0;
    }

    for (const observation of observations) {
      await this.gate.handleObservation(observation);
    }
    return observations.length;
  }

  async statusTick(): Promise<GateSnapshot> {
    const snapshot = await this.gate.queryStatus();
    this.log.debug(
      `Status: gate ${snapshot.gateState}, actuator ${snapshot.actuator.online ? "online" : "offline"}`,
    );
    return snapshot;
  }

  autoCloseTick(): Promise<boolean> {
    return this.gate.autoCloseIfDue();
  }

  private async runLoop(
    name: string,
    body: () => Promise<unknown>,
    intervalSeconds: () => number,
    signal: AbortSignal,
  ): Promise<void> {
    this.log.debug(`Starting ${name} loop`);
    while (this.running) {
      try {
        await body();
      } catch (err) {
        this.log.error(`Error in ${name} loop: ${errorMessage(err)}`);
        this.eventBus.emit("runtime:error", {
          source: name,
          message: `Error in ${name} loop: ${errorMessage(err)}`,
          timestamp: Date.now(),
        });
      }
      if (!this.running) break;
      await interruptibleSleep(intervalSeconds() * 1000, signal);
    }
    this.log.debug(`${name} loop stopped`);
  }
}
