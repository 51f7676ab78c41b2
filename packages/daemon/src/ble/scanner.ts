import type { NearbyDevice, SignalObservation } from "@gatewarden/shared";
import type { TokenLookup } from "../gate/session-gate.js";
import { Mutex } from "../gate/mutex.js";
import type { Logger } from "../logger.js";
import { describeNearby, matchObservations, type AdvertisedDevice } from "./advertisement.js";

/** Radio access: listen for `durationSeconds` and report what was heard. */
export interface DeviceSource {
  discover(durationSeconds: number): Promise<AdvertisedDevice[]>;
  close(): Promise<void>;
}

export interface SignalScanner {
  scanOnce(durationSeconds: number): Promise<SignalObservation[]>;
  listNearby(durationSeconds: number): Promise<NearbyDevice[]>;
}

/**
 * Serializes radio use: the scan loop, manual area scans and live token
 * listings all go through one lock.
 */
export class BleScanner implements SignalScanner {
  private scanLock = new Mutex();

  constructor(
    private source: DeviceSource,
    private registry: TokenLookup,
    private log: Logger,
  ) {}

  get busy(): boolean {
    return this.scanLock.locked;
  }

  async scanOnce(durationSeconds: number): Promise<SignalObservation[]> {
    const devices = await this.scanLock.runExclusive(() => this.source.discover(durationSeconds));
    const observations = matchObservations(devices, this.registry);
    this.log.debug(
      `Scan heard ${devices.length} devices, ${observations.length} registered tokens`,
    );
    return observations;
  }

  async listNearby(durationSeconds: number): Promise<NearbyDevice[]> {
    this.log.info(`Scanning for nearby devices for ${durationSeconds}s`);
    const devices = await this.scanLock.runExclusive(() => this.source.discover(durationSeconds));
    const nearby = describeNearby(devices);
    const beacons = nearby.filter((d) => d.type === "beacon").length;
    this.log.info(`Found ${nearby.length} entries (${beacons} iBeacons)`);
    return nearby;
  }

  close(): Promise<void> {
    return this.source.close();
  }
}
