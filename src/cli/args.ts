/* Copyright(C) 2024-2026, HJD (https://github.com/hjdhjd). All rights reserved.
 *
 * args.ts: Command-line argument parsing for StationBase.
 */
import path from "node:path";

/**
 * The commands the entry point dispatches.
 */
export const COMMANDS = [ "cache", "markets", "rebuild", "search", "serve", "status" ] as const;

export type Command = (typeof COMMANDS)[number];

/**
 * Result of parsing command-line arguments. CLI flags have the highest priority in the configuration merge order, so values are kept here rather than written
 * directly to CONFIG.
 */
export interface ParsedArgs {

  command: Command;
  commandArgs: string[];
  consoleLogging: boolean;
  dataDir?: string;
  debugLogging: boolean;
  help: boolean;
  listEnv: boolean;
  logFile?: string;
  port?: number;
  version: boolean;
}

function isCommand(value: string): value is Command {

  return COMMANDS.some((command) => command === value);
}

// Validates a path flag value. Returns an error message, or null when the value is an absolute path.
function checkAbsolutePath(flag: string, value: string | undefined): string | null {

  if(!value) {

    return flag + " requires a path argument.";
  }

  if(!path.isAbsolute(value)) {

    return flag + " requires an absolute path, got: " + value;
  }

  return null;
}

/**
 * Parses command-line arguments. Global flags are recognized anywhere on the line. The first other argument names the command, and everything after it that is not a
 * global flag is passed to the command untouched.
 * @param argv - The arguments, without the node binary and script path.
 * @returns The parsed arguments, or an error message.
 */
export function parseCliArgs(argv: readonly string[]): ParsedArgs | string {

  const result: ParsedArgs = { command: "serve", commandArgs: [], consoleLogging: false, debugLogging: false, help: false, listEnv: false, version: false };
  let commandSeen = false;

  for(let i = 0; i < argv.length; i++) {

    const arg = argv[i];

    switch(arg) {

      case "-c":
      case "--console": {

        result.consoleLogging = true;

        break;
      }

      case "-d":
      case "--debug": {

        result.debugLogging = true;

        break;
      }

      case "-h":
      case "--help": {

        result.help = true;

        break;
      }

      case "-v":
      case "--version": {

        result.version = true;

        break;
      }

      case "--list-env": {

        result.listEnv = true;

        break;
      }

      case "-p":
      case "--port": {

        const port = Number.parseInt(argv[++i] ?? "", 10);

        if(Number.isNaN(port)) {

          return arg + " requires a port number.";
        }

        result.port = port;

        break;
      }

      case "--data-dir":
      case "--log-file": {

        const value = argv[++i];
        const problem = checkAbsolutePath(arg, value);

        if(problem) {

          return problem;
        }

        if(arg === "--data-dir") {

          result.dataDir = value;
        } else {

          result.logFile = value;
        }

        break;
      }

      default: {

        if(commandSeen) {

          result.commandArgs.push(arg);

          break;
        }

        if(arg.startsWith("-")) {

          return "Unknown option: " + arg;
        }

        if(!isCommand(arg)) {

          return "Unknown command: " + arg;
        }

        result.command = arg;
        commandSeen = true;
      }
    }
  }

  return result;
}
