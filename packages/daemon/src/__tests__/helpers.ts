import type {
  ActuatorStatus,
  GateTunables,
  NearbyDevice,
  SignalObservation,
  Token,
} from "@gatewarden/shared";
import { ActuatorUnavailableError, type ActuatorGateway } from "../actuator/types.js";
import type { SignalScanner } from "../ble/scanner.js";
import { EventBus } from "../event-bus.js";
import { Logger } from "../logger.js";
import { TokenRegistry } from "../tokens/registry.js";

export const T0 = Date.UTC(2026, 0, 1, 12, 0, 0);

export function defaultTunables(overrides: Partial<GateTunables> = {}): GateTunables {
  return {
    autoCloseTimeout: 300,
    sessionTimeout: 60,
    statusCheckInterval: 30,
    bleScanInterval: 5,
    tokenIdleTimeout: 30,
    autoClosePollInterval: 10,
    ...overrides,
  };
}

export class ManualClock {
  constructor(public current = T0) {}

  now = (): number => this.current;

  advanceSeconds(seconds: number): void {
    this.current += seconds * 1000;
  }
}

export interface Deferred {
  promise: Promise<void>;
  resolve: () => void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

/** Lets every pending microtask and zero-delay timer run. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

export class FakeGateway implements ActuatorGateway {
  readonly name = "fake";
  calls: string[] = [];
  notifications: Array<{ title: string; message: string }> = [];
  openResult = true;
  closeResult = true;
  connectError: Error | null = null;
  statusError: Error | null = null;
  status: ActuatorStatus = { online: true, state: "closed", info: {} };
  /** When set, `open` waits for it before answering */
  holdOpen: Promise<void> | null = null;

  async connect(): Promise<void> {
    this.calls.push("connect");
    if (this.connectError) throw this.connectError;
  }

  async disconnect(): Promise<void> {
    this.calls.push("disconnect");
  }

  async open(): Promise<boolean> {
    this.calls.push("open");
    if (this.holdOpen) await this.holdOpen;
    return this.openResult;
  }

  async close(): Promise<boolean> {
    this.calls.push("close");
    return this.closeResult;
  }

  async notify(title: string, message: string): Promise<boolean> {
    this.notifications.push({ title, message });
    return true;
  }

  async queryState(): Promise<ActuatorStatus> {
    this.calls.push("queryState");
    if (this.statusError) throw new ActuatorUnavailableError(this.statusError.message);
    return this.status;
  }

  count(call: string): number {
    return this.calls.filter((c) => c === call).length;
  }
}

export class FakeScanner implements SignalScanner {
  batches: SignalObservation[][] = [];
  nearby: NearbyDevice[] = [];
  scanError: Error | null = null;
  scans = 0;

  async scanOnce(): Promise<SignalObservation[]> {
    this.scans++;
    if (this.scanError) throw this.scanError;
    return this.batches.shift() ?? [];
  }

  async listNearby(): Promise<NearbyDevice[]> {
    return this.nearby;
  }
}

export class MemoryPersistence {
  saved: Token[][] = [];

  saveTokens(tokens: Token[]): void {
    this.saved.push(tokens);
  }
}

export function createRegistry(eventBus = new EventBus()) {
  const persistence = new MemoryPersistence();
  const registry = new TokenRegistry(persistence, eventBus, Logger.silent());
  return { registry, persistence, eventBus };
}
