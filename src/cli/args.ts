/**
 * Argument parsing for the report-pipeline CLI.
 */

import { parseArgs } from "node:util";

export const USAGE = `
Usage: report-pipeline <command> [options]

Commands:
  run <topic>        Research a topic and write the report
  resume [runId]     Continue a stored run, or every unfinished run
  status <runId>     Show the state of a run
  list               List stored runs

Options:
  --sections <n>     Number of report sections (run)
  --depth <n>        Search depth per section (run)
  --out <path>       Write the report markdown to a file (run, resume)
  --json             Print JSON instead of text
  -h, --help         Show this help message

Exit codes:
  0 - Run completed (or the query succeeded)
  1 - Run failed, or the command could not be carried out
`;

export type CliCommand =
  | {
      readonly command: "run";
      readonly topic: string;
      readonly sections?: number;
      readonly depth?: number;
      readonly out?: string;
      readonly json: boolean;
    }
  | {
      readonly command: "resume";
      /** Absent: resume every unfinished run */
      readonly runId?: string;
      readonly out?: string;
      readonly json: boolean;
    }
  | { readonly command: "status"; readonly runId: string; readonly json: boolean }
  | { readonly command: "list"; readonly json: boolean }
  | { readonly command: "help" };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

function parseCount(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value)) {
    throw new CliUsageError(`--${flag} must be a whole number, got "${value}"`);
  }
  return Number.parseInt(value, 10);
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      options: {
        sections: { type: "string" },
        depth: { type: "string" },
        out: { type: "string" },
        json: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (err) {
    throw new CliUsageError(err instanceof Error ? err.message : String(err));
  }
}

/**
 * @throws CliUsageError on unknown commands, unknown options or bad values
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { command: "help" };

  const command = positionals.at(0);
  const rest = positionals.slice(1);
  const json = values.json === true;

  switch (command) {
    case "run": {
      const topic = rest.join(" ").trim();
      if (topic.length === 0) {
        throw new CliUsageError("run needs a topic");
      }
      return {
        command: "run",
        topic,
        sections: parseCount("sections", values.sections),
        depth: parseCount("depth", values.depth),
        out: values.out,
        json,
      };
    }
    case "resume":
      return { command: "resume", runId: rest.at(0), out: values.out, json };
    case "status": {
      const runId = rest.at(0);
      if (runId === undefined) {
        throw new CliUsageError("status needs a run id");
      }
      return { command: "status", runId, json };
    }
    case "list":
      return { command: "list", json };
    case undefined:
      return { command: "help" };
    default:
      throw new CliUsageError(`Unknown command "${command}"`);
  }
}
