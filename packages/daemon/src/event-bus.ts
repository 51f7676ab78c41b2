import { EventEmitter } from "events";
import type {
  ActivityEntry,
  GateState,
  SignalObservation,
  Token,
} from "@gatewarden/shared";

export interface EventBusEvents {
  "token:detected": (data: SignalObservation & { known: boolean; timestamp: number }) => void;
  "token:registered": (data: { token: Token; timestamp: number }) => void;
  "token:updated": (data: { token: Token; changes: Partial<Omit<Token, "id">>; timestamp: number }) => void;
  "token:unregistered": (data: { token: Token; timestamp: number }) => void;
  "gate:state": (data: { state: GateState; previous: GateState; timestamp: number }) => void;
  "gate:opened": (data: { reason: string; timestamp: number }) => void;
  "gate:closed": (data: { reason: string; timestamp: number }) => void;
  "gate:failed": (data: { action: "open" | "close"; reason: string; timestamp: number }) => void;
  "settings:updated": (data: { section: string; changes: Record<string, unknown>; timestamp: number }) => void;
  "runtime:info": (data: { message: string; timestamp: number }) => void;
  "runtime:error": (data: { source: string; message: string; timestamp: number }) => void;
  "activity:recorded": (entry: ActivityEntry) => void;
  "activity:cleared": (data: { timestamp: number }) => void;
}

export class EventBus {
  private emitter = new EventEmitter();

  constructor() {
    this.emitter.setMaxListeners(50);
  }

  on<K extends keyof EventBusEvents>(
    event: K,
    listener: EventBusEvents[K],
  ): void {
    this.emitter.on(event, listener as (...args: unknown[]) => void);
  }

  off<K extends keyof EventBusEvents>(
    event: K,
    listener: EventBusEvents[K],
  ): void {
    this.emitter.off(event, listener as (...args: unknown[]) => void);
  }

  emit<K extends keyof EventBusEvents>(
    event: K,
    ...args: Parameters<EventBusEvents[K]>
  ): void {
    this.emitter.emit(event, ...args);
  }
}
