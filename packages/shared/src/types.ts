// ── Token Types ──

export interface Token {
  id: string;
  displayName: string;
  enabled: boolean;
}

export interface TokenWithPresence extends Token {
  inRange: boolean;
  lastSeen: number | null;
}

export type TokenRejection = "already_exists" | "not_found" | "invalid_id" | "invalid_name";

export type TokenResult =
  | { ok: true; token: Token }
  | { ok: false; reason: TokenRejection };

// ── Gate Types ──

export type GateState = "closed" | "opening" | "open" | "closing" | "unknown";

export interface ActuatorStatus {
  online: boolean;
  state?: string;
  info: Record<string, unknown>;
  error?: string;
}

export interface GateSnapshot {
  gateState: GateState;
  lastOpenTime: number | null;
  sessionStartedAt: number | null;
  sessionActive: boolean;
  /** Reported by the remote controller; never overrides `gateState` */
  actuator: ActuatorStatus;
  timestamp: number;
}

export interface GateStatus extends GateSnapshot {
  running: boolean;
}

// ── Signal Types ──

export interface SignalObservation {
  id: string;
  name: string;
  rssi?: number;
  distance?: number;
}

export type NearbyDeviceType = "beacon" | "device";

export interface NearbyDevice {
  type: NearbyDeviceType;
  address: string;
  name: string;
  rssi: number;
  distance: number;
  uuid?: string;
  major?: number;
  minor?: number;
}

export type SignalQuality = "Excellent" | "Good" | "Fair" | "Weak" | "Very Weak";

// ── Activity Types ──

export type ActivityEventType =
  | "token_detected"
  | "gate_opened"
  | "gate_closed"
  | "token_registered"
  | "token_updated"
  | "token_unregistered"
  | "config_updated"
  | "error"
  | "info";

export type ActivityMode = "suppress" | "extended";

export interface ActivityEntry {
  id: number;
  timestamp: number;
  type: ActivityEventType;
  message: string;
  details: Record<string, unknown>;
  updateCount: number;
}

// ── Settings Types ──

export interface GateTunables {
  /** Seconds the gate may stay open before the watchdog closes it */
  autoCloseTimeout: number;
  /** Seconds during which a detected token cannot retrigger an open */
  sessionTimeout: number;
  statusCheckInterval: number;
  bleScanInterval: number;
  /** Seconds after the last sighting during which a token counts as in range */
  tokenIdleTimeout: number;
  autoClosePollInterval: number;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

// ── Bus Events (streamed to API subscribers) ──

export type GateBusEvent =
  | { type: "token:detected"; data: SignalObservation & { known: boolean }; timestamp: number }
  | { type: "token:registered"; data: Token; timestamp: number }
  | { type: "token:updated"; data: Token; timestamp: number }
  | { type: "token:unregistered"; data: Token; timestamp: number }
  | { type: "gate:state"; data: { state: GateState; previous: GateState }; timestamp: number }
  | { type: "gate:opened"; data: { reason: string }; timestamp: number }
  | { type: "gate:closed"; data: { reason: string }; timestamp: number }
  | { type: "gate:failed"; data: { action: "open" | "close"; reason: string }; timestamp: number }
  | { type: "activity:recorded"; data: ActivityEntry; timestamp: number }
  | { type: "activity:cleared"; data: Record<string, never>; timestamp: number };
