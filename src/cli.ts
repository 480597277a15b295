import type { CliOptions, Command } from "./types.js";

export const VERSION = "0.1.0";

export const HELP = `rev - Review the pull requests waiting on you, in the terminal

Usage:
  rev [review] [options]
  rev init

Commands:
  review               Browse open pull requests with a review request (default)
  init                 Write a default config file

Options:
  --requested <who>    User or org/team the review is requested from (default @me)
  --org <org>          Only pull requests in this org
  --label <name>       Only pull requests with this label (repeatable)
  --cap <n>            Stop listing after n pull requests (default 100)
  --details            Start in the review screen
  -v, --version        Show version
  -h, --help           Show help

Environment:
  GITHUB_API_TOKEN     Token passed to gh instead of its stored login
  REV_CONFIG_HOME      Directory holding rev.json
  REV_LOG_LEVEL        error, warn, info, debug or trace (default info)
  REV_LOG_FILE         Log file path
`;

export type ParsedArgs =
  | { kind: "run"; options: CliOptions }
  | { kind: "help" }
  | { kind: "version" };

const COMMANDS: Command[] = ["review", "init"];

function isCommand(value: string): value is Command {
  return COMMANDS.some((command) => command === value);
}

function takeValue(argv: string[], index: number, flag: string): string {
  const next = argv[index + 1];
  if (!next || next.startsWith("--")) {
    throw new Error(`Missing value for ${flag}`);
  }
  return next;
}

function parseCap(value: string): number {
  const cap = Number.parseInt(value, 10);
  if (!/^\d+$/.test(value) || !Number.isInteger(cap) || cap <= 0) {
    throw new Error(`Invalid --cap value "${value}"`);
  }
  return cap;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const options: CliOptions = { command: "review" };
  let commandSeen = false;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];

    if (arg === "-h" || arg === "--help") {
      return { kind: "help" };
    }

    if (arg === "-v" || arg === "--version") {
      return { kind: "version" };
    }

    if (!arg.startsWith("-") && !commandSeen && isCommand(arg)) {
      options.command = arg;
      commandSeen = true;
      continue;
    }

    const eq = arg.startsWith("--") ? arg.indexOf("=") : -1;
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    const inline = eq >= 0 ? arg.slice(eq + 1) : undefined;

    const value = (): string => {
      if (inline !== undefined) {
        if (!inline) {
          throw new Error(`Missing value for ${flag}`);
        }
        return inline;
      }
      const next = takeValue(argv, i, flag);
      i += 1;
      return next;
    };

    switch (flag) {
      case "--requested":
        options.requested = value();
        break;
      case "--org":
        options.org = value();
        break;
      case "--label":
        options.labels = [...(options.labels || []), value()];
        break;
      case "--cap":
        options.hardCap = parseCap(value());
        break;
      case "--details":
        if (inline !== undefined) {
          throw new Error("--details does not take a value");
        }
        options.details = true;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return { kind: "run", options };
}
