#!/usr/bin/env node

import { createTRPCClient, httpBatchLink } from "@trpc/client";
import type { ActivityEventType } from "@gatewarden/shared";
import type { AppRouter } from "../api/router.js";
import { formatActivity, formatNearby, formatStatus, formatTokens } from "./format.js";
import { printBanner, printError, printHelp, printSuccess } from "./output.js";

const ACTIVITY_TYPES: readonly ActivityEventType[] = [
  "token_detected",
  "gate_opened",
  "gate_closed",
  "token_registered",
  "token_updated",
  "token_unregistered",
  "config_updated",
  "error",
  "info",
];

class UsageError extends Error {}

const VALUE_FLAGS = new Set(["--url", "--name", "--duration", "--limit", "--type"]);

/** Value following `flag`, if present. */
function flagValue(args: string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index !== -1 ? args[index + 1] : undefined;
}

/** Arguments that are neither flags nor flag values. */
function positionals(args: string[]): string[] {
  return args.filter((arg, i) => !arg.startsWith("--") && !VALUE_FLAGS.has(args[i - 1] ?? ""));
}

function numberFlag(args: string[], flag: string): number | undefined {
  const raw = flagValue(args, flag);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    throw new UsageError(`${flag} expects a positive number, got "${raw}"`);
  }
  return value;
}

function isActivityType(value: string): value is ActivityEventType {
  return ACTIVITY_TYPES.some((type) => type === value);
}

function createClient(url: string) {
  return createTRPCClient<AppRouter>({ links: [httpBatchLink({ url })] });
}

const args = process.argv.slice(2);
const command = args[0];

async function main(): Promise<void> {
  if (!command || command === "--help" || command === "-h") {
    printBanner();
    printHelp();
    return;
  }

  const rest = args.slice(1);
  const url = flagValue(args, "--url") ?? process.env.GATEWARDEN_URL ?? "http://localhost:3100/trpc";
  const client = createClient(url);
  const [first, ...others] = positionals(rest);

  switch (command) {
    case "tokens": {
      const live = rest.includes("--live");
      if (live) console.log("Scanning for tokens in range (5s)...");
      const tokens = await client.tokens.list.query({ live });
      console.log(formatTokens(tokens));
      break;
    }
    case "register": {
      const name = others.join(" ");
      if (!first || !name) throw new UsageError("Usage: gatewarden register <id> <name...> [--disabled]");
      const token = await client.tokens.register.mutate({
        id: first,
        name,
        enabled: !rest.includes("--disabled"),
      });
      printSuccess(`Registered ${token.displayName} (${token.id})${token.enabled ? "" : " [disabled]"}`);
      break;
    }
    case "update": {
      if (!first) throw new UsageError("Usage: gatewarden update <id> [--name <name>] [--enable | --disable]");
      const enabled = rest.includes("--enable") ? true : rest.includes("--disable") ? false : undefined;
      const name = flagValue(rest, "--name");
      if (name === undefined && enabled === undefined) {
        throw new UsageError("Nothing to update: pass --name, --enable or --disable");
      }
      const token = await client.tokens.update.mutate({ id: first, name, enabled });
      printSuccess(`Updated ${token.displayName} (${token.id})${token.enabled ? "" : " [disabled]"}`);
      break;
    }
    case "unregister": {
      if (!first) throw new UsageError("Usage: gatewarden unregister <id>");
      const token = await client.tokens.unregister.mutate({ id: first });
      printSuccess(`Unregistered ${token.displayName} (${token.id})`);
      break;
    }
    case "open":
    case "close": {
      const reason = [first, ...others].filter(Boolean).join(" ") || "Manual";
      const procedure = command === "open" ? client.gate.open : client.gate.close;
      const result = await procedure.mutate({ reason });
      if (!result.success) {
        printError(`Failed to ${command} gate (state: ${result.state})`);
        process.exitCode = 1;
        return;
      }
      printSuccess(`Gate ${command === "open" ? "opened" : "closed"}`);
      break;
    }
    case "status": {
      const status = await client.gate.status.query();
      console.log(formatStatus(status));
      break;
    }
    case "scan": {
      const duration = numberFlag(rest, "--duration") ?? 10;
      console.log(`Scanning for ${duration}s...`);
      const devices = await client.scan.nearby.query({ duration });
      console.log(formatNearby(devices));
      break;
    }
    case "activity": {
      const type = flagValue(rest, "--type");
      if (type !== undefined && !isActivityType(type)) {
        throw new UsageError(`Unknown activity type "${type}". Use one of: ${ACTIVITY_TYPES.join(", ")}`);
      }
      const entries = await client.activity.list.query({
        limit: numberFlag(rest, "--limit") ?? 50,
        type,
      });
      console.log(formatActivity(entries));
      break;
    }
    case "activity-clear": {
      await client.activity.clear.mutate();
      printSuccess("Activity log cleared");
      break;
    }
    case "activity-mode": {
      if (!first) {
        const { mode } = await client.activity.mode.query();
        console.log(`Activity mode: ${mode}`);
        break;
      }
      if (first !== "suppress" && first !== "extended") {
        throw new UsageError("Usage: gatewarden activity-mode [suppress | extended]");
      }
      const { mode } = await client.activity.setMode.mutate({ mode: first });
      printSuccess(`Activity mode set to ${mode}`);
      break;
    }
    default:
      printError(`Unknown command: ${command}`);
      printHelp();
      process.exitCode = 1;
  }
}

main().catch((err: unknown) => {
  // TRPCClientError carries the daemon's message (e.g. "Token x not found")
  printError(err instanceof Error ? err.message : "Unexpected error");
  process.exit(1);
});
