import type { SignalQuality } from "@gatewarden/shared";

export const APPLE_COMPANY_ID = 0x004c;
export const DEFAULT_TX_POWER = -59;
export const PATH_LOSS_EXPONENT = 2.0;
/** Distance reported when the RSSI carries no information */
export const UNKNOWN_DISTANCE = -1;

export interface IBeacon {
  /** Uppercase, dashed 8-4-4-4-12 form */
  uuid: string;
  major: number;
  minor: number;
  /** Calibrated RSSI at one metre, in dBm */
  txPower: number;
}

// type(1) + length(1) + uuid(16) + major(2) + minor(2) + tx power(1)
const IBEACON_LENGTH = 23;

/**
 * Decodes Apple iBeacon manufacturer data. Returns null for any other company
 * id or payload.
 */
export function parseIBeacon(companyId: number, data: Uint8Array): IBeacon | null {
  if (companyId !== APPLE_COMPANY_ID) return null;
  if (data.length < IBEACON_LENGTH || data[0] !== 0x02 || data[1] !== 0x15) return null;

  const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  const hex = Buffer.from(data.subarray(2, 18)).toString("hex").toUpperCase();
  const uuid = [
    hex.slice(0, 8),
    hex.slice(8, 12),
    hex.slice(12, 16),
    hex.slice(16, 20),
    hex.slice(20, 32),
  ].join("-");

  const measured = view.getInt8(22);
  return {
    uuid,
    major: view.getUint16(18, false),
    minor: view.getUint16(20, false),
    txPower: measured === 0 ? DEFAULT_TX_POWER : measured,
  };
}

/**
 * Log-distance path loss estimate in metres, rounded to two decimals.
 * An RSSI of 0 means the adapter reported nothing usable.
 */
export function estimateDistance(rssi: number, txPower: number = DEFAULT_TX_POWER): number {
  if (rssi === 0) return UNKNOWN_DISTANCE;
  const distance = Math.pow(10, (txPower - rssi) / (10 * PATH_LOSS_EXPONENT));
  return Math.round(distance * 100) / 100;
}

export function signalQuality(rssi: number): SignalQuality {
  if (rssi >= -60) return "Excellent";
  if (rssi >= -70) return "Good";
  if (rssi >= -80) return "Fair";
  if (rssi >= -90) return "Weak";
  return "Very Weak";
}
