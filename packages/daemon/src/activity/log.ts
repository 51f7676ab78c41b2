import type { ActivityEntry, ActivityEventType, ActivityMode } from "@gatewarden/shared";
import { signalQuality } from "../ble/ibeacon.js";
import { tokenKey } from "../tokens/normalize.js";
import type { ActivityStore } from "./store.js";

export interface ActivityLogOptions {
  maxEntries: number;
  mode: ActivityMode;
  store?: ActivityStore;
  now?: () => number;
}

export interface DetectionRecord {
  tokenId: string;
  tokenName: string;
  rssi?: number;
  distance?: number;
}

/**
 * Bounded activity arena. Entries carry consecutive ids in insertion order and
 * a token-id index points at the newest detection entry of each token, so
 * suppress mode can refresh it in place. All mutations are synchronous.
 */
export class ActivityLog {
  private entries: ActivityEntry[] = [];
  private detectionIndex = new Map<string, number>();
  private nextId = 1;
  private maxEntries: number;
  private mode: ActivityMode;
  private store?: ActivityStore;
  private now: () => number;

  constructor(options: ActivityLogOptions) {
    this.maxEntries = options.maxEntries;
    this.mode = options.mode;
    this.store = options.store;
    this.now = options.now ?? Date.now;

    if (this.store) {
      this.entries = this.store.loadRecent(this.maxEntries);
      for (const entry of this.entries) this.indexDetection(entry);
      const last = this.entries[this.entries.length - 1];
      if (last) this.nextId = last.id + 1;
    }
  }

  getMode(): ActivityMode {
    return this.mode;
  }

  setMode(mode: ActivityMode): void {
    this.mode = mode;
  }

  get size(): number {
    return this.entries.length;
  }

  append(type: ActivityEventType, message: string, details: Record<string, unknown> = {}): ActivityEntry {
    const entry: ActivityEntry = {
      id: this.nextId++,
      timestamp: this.now(),
      type,
      message,
      details,
      updateCount: 0,
    };
    this.entries.push(entry);
    this.store?.insert(entry);
    this.indexDetection(entry);
    this.trim();
    return { ...entry };
  }

  recordDetection(record: DetectionRecord): ActivityEntry {
    const { message, details } = describeDetection(record);

    if (this.mode === "suppress") {
      const existingId = this.detectionIndex.get(tokenKey(record.tokenId));
      const existing = existingId !== undefined ? this.findById(existingId) : undefined;
      if (existing) {
        existing.message = message;
        existing.details = details;
        existing.timestamp = this.now();
        existing.updateCount += 1;
        this.store?.update(existing);
        return { ...existing };
      }
    }

    return this.append("token_detected", message, details);
  }

  /** Most recent first, optionally filtered by type, then limited. */
  getEntries(limit?: number, type?: ActivityEventType): ActivityEntry[] {
    let result = type ? this.entries.filter((e) => e.type === type) : this.entries.slice();
    result.reverse();
    if (limit !== undefined && limit > 0) result = result.slice(0, limit);
    return result.map((e) => ({ ...e }));
  }

  clear(): void {
    this.entries = [];
    this.detectionIndex.clear();
    this.store?.clear();
  }

  private indexDetection(entry: ActivityEntry): void {
    if (entry.type !== "token_detected") return;
    const tokenId = entry.details.tokenId;
    if (typeof tokenId === "string") this.detectionIndex.set(tokenKey(tokenId), entry.id);
  }

  private findById(id: number): ActivityEntry | undefined {
    const first = this.entries[0];
    if (!first) return undefined;
    const candidate = this.entries[id - first.id];
    if (candidate?.id === id) return candidate;
    return this.entries.find((e) => e.id === id);
  }

  private trim(): void {
    const excess = this.entries.length - this.maxEntries;
    if (excess <= 0) return;

    const dropped = this.entries.splice(0, excess);
    const dropIds = new Set(dropped.map((e) => e.id));
    for (const [key, id] of this.detectionIndex) {
      if (dropIds.has(id)) this.detectionIndex.delete(key);
    }
    const oldest = this.entries[0];
    if (oldest) this.store?.deleteBefore(oldest.id);
  }
}

export function describeDetection(record: DetectionRecord): {
  message: string;
  details: Record<string, unknown>;
} {
  const details: Record<string, unknown> = {
    tokenId: record.tokenId,
    tokenName: record.tokenName,
  };
  const parts = [`Token detected: ${record.tokenName}`];

  if (record.rssi !== undefined) {
    const quality = signalQuality(record.rssi);
    details.rssi = record.rssi;
    details.signalQuality = quality;
    parts.push(`RSSI: ${record.rssi} dBm (${quality})`);
  }
  if (record.distance !== undefined && record.distance > 0) {
    details.distanceMeters = record.distance;
    parts.push(`Distance: ~${record.distance}m`);
  }

  return { message: parts.join(" | "), details };
}
