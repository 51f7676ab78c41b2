import type { NearbyDevice, SignalObservation } from "@gatewarden/shared";
import type { TokenLookup } from "../gate/session-gate.js";
import { tokenKey } from "../tokens/normalize.js";
import { DEFAULT_TX_POWER, estimateDistance, parseIBeacon, type IBeacon } from "./ibeacon.js";

/** One device as reported by the radio after a discovery window. */
export interface AdvertisedDevice {
  address: string;
  name?: string;
  rssi: number;
  manufacturerData: Map<number, Uint8Array>;
}

export function findIBeacon(device: AdvertisedDevice): IBeacon | null {
  for (const [companyId, data] of device.manufacturerData) {
    const beacon = parseIBeacon(companyId, data);
    if (beacon) return beacon;
  }
  return null;
}

/**
 * Identifiers a registered token may use for this device, most specific first:
 * `<uuid>-<major>-<minor>`, then the bare UUID for beacons; the address, then
 * the advertised name for everything.
 */
export function identifierCandidates(device: AdvertisedDevice): string[] {
  const candidates: string[] = [];
  const beacon = findIBeacon(device);
  if (beacon) {
    candidates.push(`${beacon.uuid}-${beacon.major}-${beacon.minor}`, beacon.uuid);
  }
  candidates.push(device.address);
  if (device.name) candidates.push(device.name);
  return candidates;
}

export function distanceOf(device: AdvertisedDevice): number {
  const beacon = findIBeacon(device);
  return estimateDistance(device.rssi, beacon?.txPower ?? DEFAULT_TX_POWER);
}

/**
 * Maps a discovery batch onto registered tokens. Each token appears at most
 * once, with its strongest reading.
 */
export function matchObservations(
  devices: AdvertisedDevice[],
  registry: TokenLookup,
): SignalObservation[] {
  const strongest = new Map<string, SignalObservation>();

  for (const device of devices) {
    for (const candidate of identifierCandidates(device)) {
      const token = registry.get(candidate);
      if (!token) continue;

      const key = tokenKey(token.id);
      const previous = strongest.get(key);
      if (!previous || (previous.rssi ?? -Infinity) < device.rssi) {
        strongest.set(key, {
          id: token.id,
          name: token.displayName,
          rssi: device.rssi,
          distance: distanceOf(device),
        });
      }
      break;
    }
  }

  return Array.from(strongest.values());
}

/** Beacons first, then plain devices, each group strongest signal first. */
export function describeNearby(devices: AdvertisedDevice[]): NearbyDevice[] {
  const beacons: NearbyDevice[] = [];
  const others: NearbyDevice[] = [];

  for (const device of devices) {
    const distance = distanceOf(device);
    const beacon = findIBeacon(device);
    if (beacon) {
      beacons.push({
        type: "beacon",
        address: device.address,
        name: device.name ?? "iBeacon",
        rssi: device.rssi,
        distance,
        uuid: beacon.uuid,
        major: beacon.major,
        minor: beacon.minor,
      });
    }
    others.push({
      type: "device",
      address: device.address,
      name: device.name ?? "Unknown",
      rssi: device.rssi,
      distance,
    });
  }

  const byRssi = (a: NearbyDevice, b: NearbyDevice) => b.rssi - a.rssi;
  return [...beacons.sort(byRssi), ...others.sort(byRssi)];
}
