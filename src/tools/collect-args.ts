/** Argument parsing for the collect tool. */
export type CollectCommand = "weekly" | "setup" | "players" | "full" | "check" | "test-stats" | "test-year";

export interface CliOptions {
  command: CollectCommand;
  year: number | null;
}

const COMMANDS: Record<CollectCommand, string> = {
  weekly: "Weekly update (no player data)",
  setup: "Initial setup (historical data)",
  players: "Collect player stats for every season",
  full: "Weekly update with player data",
  check: "Check available seasons",
  "test-stats": "Test the stats provider [year]",
  "test-year": "Test player collection for one year [year]",
};

export function parseArgs(argv: string[]): CliOptions {
  const [rawCommand, rawYear] = argv;

  if (rawCommand === "--help" || rawCommand === "-h") {
    printUsage();
    process.exit(0);
  }

  const command = (rawCommand ?? "weekly").toLowerCase();
  if (!isCommand(command)) {
    printUsage();
    throw new Error(`Unknown command: ${command}`);
  }

  let year: number | null = null;
  if (rawYear !== undefined) {
    if (!/^\d{4}$/.test(rawYear)) {
      throw new Error("Expected a four-digit season year");
    }
    year = Number.parseInt(rawYear, 10);
  }

  return { command, year };
}

function isCommand(value: string): value is CollectCommand {
  return Object.prototype.hasOwnProperty.call(COMMANDS, value);
}

function printUsage(): void {
  const lines = Object.entries(COMMANDS).map(([command, description]) => `  ${command.padEnd(12)} ${description}`);
  // eslint-disable-next-line no-console
  console.log(["Usage: npm run collect -- [command] [year]", "", "Commands:", ...lines].join("\n"));
}
