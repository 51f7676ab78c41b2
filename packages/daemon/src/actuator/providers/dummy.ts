import type { ActuatorStatus } from "@gatewarden/shared";
import type { Logger } from "../../logger.js";
import { ActuatorUnavailableError, type ActuatorGateway } from "../types.js";

type SimulatedState = "open" | "opening" | "closed" | "closing";

export interface DummyGatewayOptions {
  /** Simulated motor travel time; 0 settles immediately */
  travelMs?: number;
}

/** In-process gate for running the daemon without a controller. */
export class DummyGateway implements ActuatorGateway {
  readonly name = "dummy";

  private connected = false;
  private state: SimulatedState = "closed";
  private timers: ReturnType<typeof setTimeout>[] = [];
  private failures = new Set<"open" | "close" | "query">();
  readonly notifications: Array<{ title: string; message: string }> = [];

  constructor(
    private log: Logger,
    private options: DummyGatewayOptions = {},
  ) {}

  async connect(): Promise<void> {
    this.connected = true;
    this.log.info(`Connected (simulated gate ${this.state})`);
  }

  async disconnect(): Promise<void> {
    for (const timer of this.timers) clearTimeout(timer);
    this.timers = [];
    this.connected = false;
    this.log.info("Disconnected");
  }

  /** Makes the given operation fail until `recover` is called. */
  fail(operation: "open" | "close" | "query"): void {
    this.failures.add(operation);
  }

  recover(operation?: "open" | "close" | "query"): void {
    if (operation) this.failures.delete(operation);
    else this.failures.clear();
  }

  async open(): Promise<boolean> {
    return this.move("open");
  }

  async close(): Promise<boolean> {
    return this.move("close");
  }

  async notify(title: string, message: string): Promise<boolean> {
    if (!this.connected) return false;
    this.notifications.push({ title, message });
    this.log.info(`Notification: ${title}: ${message}`);
    return true;
  }

  async queryState(): Promise<ActuatorStatus> {
    if (!this.connected || this.failures.has("query")) {
      throw new ActuatorUnavailableError("Simulated gate unavailable");
    }
    return { online: true, state: this.state, info: { simulated: true } };
  }

  private move(action: "open" | "close"): boolean {
    if (!this.connected || this.failures.has(action)) {
      this.log.warn(`Simulated ${action} failed`);
      return false;
    }

    const target: SimulatedState = action === "open" ? "open" : "closed";
    const travelMs = this.options.travelMs ?? 0;
    if (travelMs <= 0) {
      this.state = target;
    } else {
      this.state = action === "open" ? "opening" : "closing";
      this.timers.push(
        setTimeout(() => {
          this.state = target;
        }, travelMs),
      );
    }
    this.log.info(`Simulated ${action} accepted`);
    return true;
  }
}
