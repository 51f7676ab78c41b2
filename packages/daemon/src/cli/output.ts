import chalk from "chalk";

export function printBanner(): void {
  console.log(chalk.dim("  gatewarden · BLE gate controller\n"));
}

export function printHelp(): void {
  console.log(`${chalk.bold("Usage:")} gatewarden <command> [options]

${chalk.bold("Tokens:")}
  tokens [--live]                     List registered tokens (--live scans 5s first)
  register <id> <name...> [--disabled]
  update <id> [--name <name>] [--enable | --disable]
  unregister <id>

${chalk.bold("Gate:")}
  open [reason...]                    Open the gate now
  close [reason...]                   Close the gate now
  status                              Gate, session and actuator status

${chalk.bold("Radio:")}
  scan [--duration <seconds>]         List every nearby beacon and device

${chalk.bold("Activity:")}
  activity [--limit <n>] [--type <type>]
  activity-clear
  activity-mode [suppress | extended]

${chalk.bold("Options:")}
  --url <url>    Daemon API (default $GATEWARDEN_URL or http://localhost:3100/trpc)
  --help         Show this help message
`);
}

export function printSuccess(msg: string): void {
  console.log(`${chalk.green("✓")} ${msg}`);
}

export function printError(msg: string): void {
  console.error(`${chalk.red("✗")} ${msg}`);
}
