/**
 * Command-line parsing for scripts/feedmail.ts.
 */

import { ConfigError } from "./errors";

export const COMMANDS = [
  "new",
  "email",
  "add",
  "run",
  "list",
  "pause",
  "unpause",
  "reset",
  "delete",
  "opmlimport",
  "opmlexport",
] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface CommandLine {
  command: CommandName | "help";
  /** Positional arguments after the command */
  args: string[];
  dataPath?: string;
  configPath?: string;
  /** Number of -v/--verbose flags */
  verbosity: number;
  /** run: record entries without sending (--no-send or --clean) */
  noSend: boolean;
}

export const USAGE = `Usage: feedmail [--data PATH] [--config PATH] [-v] <command> [args]

Commands:
  new [email]                 Create a feed database
  email [address]             Set (or clear) the default target address
  add <name> <url> [email]    Add a feed
  run [--no-send] [name...]   Fetch feeds and send new entries
  list                        List feeds
  pause [name...]             Pause feeds (all when no name is given)
  unpause [name...]           Resume feeds (all when no name is given)
  reset [name...]             Forget seen entries (all when no name is given)
  delete <name...>            Remove feeds
  opmlimport [path]           Import feeds from OPML (stdin when no path)
  opmlexport [path]           Export feeds as OPML (stdout when no path)

A feed name can be replaced by its index in \`list\` output.

Options:
  --data PATH      Feed database (default: $FEEDMAIL_DATA or ~/.local/share/feedmail/feeds.json)
  --config PATH    Options file (default: $FEEDMAIL_CONFIG or ~/.config/feedmail/config.json)
  -v, --verbose    Log progress (repeat for debug output)
`;

function isCommand(value: string): value is CommandName {
  return (COMMANDS as readonly string[]).includes(value);
}

/**
 * Parses argv (without the node and script entries).
 *
 * @throws ConfigError on an unknown option or command, or a missing argument
 */
export function parseCommandLine(argv: readonly string[]): CommandLine {
  const line: CommandLine = { command: "help", args: [], verbosity: 0, noSend: false };
  let command: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    const [flag, inlineValue] = arg.startsWith("--") ? splitFlag(arg) : [arg, undefined];
    const takeValue = (): string => {
      if (inlineValue !== undefined) return inlineValue;
      const value = argv[++i];
      if (value === undefined) {
        throw new ConfigError(`${flag} needs a value`);
      }
      return value;
    };

    if (flag === "--data") {
      line.dataPath = takeValue();
    } else if (flag === "--config") {
      line.configPath = takeValue();
    } else if (flag === "-v" || flag === "--verbose") {
      line.verbosity++;
    } else if (flag === "-h" || flag === "--help") {
      return { ...line, command: "help", args: [] };
    } else if (command === "run" && (flag === "--no-send" || flag === "--clean")) {
      line.noSend = true;
    } else if (arg.startsWith("-") && arg !== "-") {
      throw new ConfigError(`Unknown option: ${arg}`);
    } else if (command === undefined) {
      command = arg;
    } else {
      line.args.push(arg);
    }
  }

  if (command === undefined) {
    return line;
  }
  if (!isCommand(command)) {
    throw new ConfigError(`Unknown command: ${command}`);
  }
  if (command === "add" && line.args.length < 2) {
    throw new ConfigError("add needs a name and a URL");
  }
  return { ...line, command };
}

function splitFlag(arg: string): [string, string | undefined] {
  const eq = arg.indexOf("=");
  return eq === -1 ? [arg, undefined] : [arg.slice(0, eq), arg.slice(eq + 1)];
}
