import chalk from "chalk";
import type { ActivityEntry, GateState, GateStatus, NearbyDevice, TokenWithPresence } from "@gatewarden/shared";
import { signalQuality } from "../ble/ibeacon.js";

/** `YYYY-MM-DD HH:MM:SS` in UTC. */
export function formatTime(timestamp: number): string {
  return new Date(timestamp).toISOString().replace("T", " ").slice(0, 19);
}

export function formatDistance(distance: number): string {
  return distance > 0 ? `~${distance}m` : "Unknown";
}

function colorState(state: GateState): string {
  switch (state) {
    case "open":
      return chalk.green(state);
    case "closed":
      return chalk.cyan(state);
    case "unknown":
      return chalk.red(state);
    default:
      return chalk.yellow(state);
  }
}

export function formatTokens(tokens: TokenWithPresence[]): string {
  if (tokens.length === 0) return "No tokens registered";

  return tokens
    .map((token, i) => {
      const flags = [
        token.enabled ? "" : chalk.dim(" [disabled]"),
        token.inRange ? chalk.green(" ● in range") : "",
      ].join("");
      return `${i + 1}. ${chalk.bold(token.displayName)} (${token.id})${flags}`;
    })
    .join("\n");
}

export function formatStatus(status: GateStatus): string {
  const actuator = status.actuator.online
    ? chalk.green("online") + (status.actuator.state ? ` (reports ${status.actuator.state})` : "")
    : chalk.red("offline") + (status.actuator.error ? `: ${status.actuator.error}` : "");

  return [
    `Gate:       ${colorState(status.gateState)}`,
    `Running:    ${status.running ? "yes" : "no"}`,
    `Last open:  ${status.lastOpenTime !== null ? formatTime(status.lastOpenTime) : "-"}`,
    `Session:    ${
      status.sessionStartedAt !== null
        ? `${status.sessionActive ? "active" : "expired"} (started ${formatTime(status.sessionStartedAt)})`
        : "none"
    }`,
    `Actuator:   ${actuator}`,
  ].join("\n");
}

export function formatNearby(devices: NearbyDevice[]): string {
  if (devices.length === 0) return "No devices found";

  return devices
    .map((device, i) => {
      const label = device.type === "beacon" ? chalk.magenta("iBeacon") : "device ";
      const beacon =
        device.type === "beacon" && device.uuid
          ? ` uuid=${device.uuid} major=${device.major ?? "-"} minor=${device.minor ?? "-"}`
          : "";
      return (
        `${String(i + 1).padStart(2)}. ${label} ${device.name} [${device.address}] ` +
        `${device.rssi} dBm ${formatDistance(device.distance)} (${signalQuality(device.rssi)})${beacon}`
      );
    })
    .join("\n");
}

export function formatActivity(entries: ActivityEntry[]): string {
  if (entries.length === 0) return "No activity recorded";

  return entries
    .map((entry) => {
      const repeats = entry.updateCount > 0 ? chalk.dim(` (x${entry.updateCount + 1})`) : "";
      const type = entry.type === "error" ? chalk.red(entry.type) : chalk.dim(entry.type);
      return `${formatTime(entry.timestamp)} [${type}] ${entry.message}${repeats}`;
    })
    .join("\n");
}
