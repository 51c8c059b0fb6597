#!/usr/bin/env node
/**
 * report-pipeline CLI.
 *
 * Usage:
 *   npm start -- run "Urban heat islands" --sections 4 --depth 2 --out report.md
 *   npm start -- resume [runId]
 *   npm start -- status <runId> [--json]
 *   npm start -- list
 *
 * Exit codes:
 *   0 - Run completed, or the query succeeded
 *   1 - Run failed, or the command could not be carried out
 */

import { mkdir, writeFile } from "node:fs/promises";
import { dirname, resolve } from "node:path";

import {
  loadAppConfig,
  resolveLogLevel,
  validateAppConfig,
  type AppConfig,
} from "../config/index.js";
import { createLogger, type Logger } from "../logging/index.js";
import { FileRunStore } from "../store/index.js";
import { createPipeline, toStatus, type RunStatus } from "../service/index.js";
import { RunState } from "../types/index.js";
import { CliUsageError, parseCliArgs, USAGE, type CliCommand } from "./args.js";

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function stateLabel(state: RunState): string {
  switch (state) {
    case RunState.Completed:
      return c("green", state);
    case RunState.Failed:
      return c("red", state);
    default:
      return c("yellow", state);
  }
}

function printStatus(status: RunStatus): void {
  const { progress } = status;
  console.log(`${c("bold", status.runId)}  ${stateLabel(status.state)}  ${status.topic}`);
  console.log(
    c(
      "dim",
      `  sections: ${progress.completed} completed, ${progress.failed} failed, ` +
        `${progress.pending} pending of ${progress.planned}`
    )
  );
  if (status.failure) {
    console.log(
      `  ${c("red", "failed")} at ${status.failure.stage}: ` +
        `${status.failure.kind}: ${status.failure.message}`
    );
  }
}

// ============================================================
// Commands
// ============================================================

/**
 * Print or write the outcome of a finished run. Returns the exit code.
 */
async function reportOutcome(status: RunStatus, out: string | undefined, json: boolean): Promise<number> {
  if (status.report !== null && out !== undefined) {
    const path = resolve(out);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, status.report.markdown, "utf-8");
  }

  if (json) {
    console.log(JSON.stringify(status, null, 2));
  } else if (status.report !== null && out === undefined) {
    console.log(status.report.markdown);
  } else {
    printStatus(status);
    if (out !== undefined && status.report !== null) {
      console.log(`  report written to ${resolve(out)}`);
    }
  }

  return status.state === RunState.Completed ? 0 : 1;
}

async function runCommand(command: CliCommand, appConfig: AppConfig, logger: Logger): Promise<number> {
  switch (command.command) {
    case "help":
      console.log(USAGE);
      return 0;

    case "status": {
      const run = await new FileRunStore(appConfig.runDir).load(command.runId);
      if (run === null) {
        console.error(`Run ${command.runId} not found`);
        return 1;
      }
      const status = toStatus(run);
      if (command.json) console.log(JSON.stringify(status, null, 2));
      else printStatus(status);
      return 0;
    }

    case "list": {
      const runs = await new FileRunStore(appConfig.runDir, logger).list();
      const statuses = runs.map(toStatus);
      if (command.json) {
        console.log(JSON.stringify(statuses, null, 2));
      } else if (statuses.length === 0) {
        console.log("No runs stored.");
      } else {
        statuses.forEach(printStatus);
      }
      return 0;
    }

    case "run": {
      validateAppConfig(appConfig);
      const { service } = createPipeline(appConfig, { logger });
      const { runId } = await service.submit({
        topic: command.topic,
        sectionCount: command.sections,
        searchDepth: command.depth,
      });
      logger.info("Run submitted", { runId });
      return reportOutcome(await service.waitFor(runId), command.out, command.json);
    }

    case "resume": {
      validateAppConfig(appConfig);
      const { service } = createPipeline(appConfig, { logger });
      if (command.runId !== undefined) {
        service.resume(command.runId);
        return reportOutcome(await service.waitFor(command.runId), command.out, command.json);
      }

      const ids = await service.resumePending();
      await service.drain();
      let exitCode = 0;
      for (const id of ids) {
        const status = await service.waitFor(id);
        if (command.json) console.log(JSON.stringify(status, null, 2));
        else printStatus(status);
        if (status.state !== RunState.Completed) exitCode = 1;
      }
      if (ids.length === 0 && !command.json) console.log("No unfinished runs.");
      return exitCode;
    }
  }
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(c("red", err.message));
      console.error(USAGE);
      return 1;
    }
    throw err;
  }

  const appConfig = loadAppConfig();
  const json = command.command !== "help" && command.json;
  const logger = createLogger({
    level: resolveLogLevel(appConfig),
    logDir: appConfig.logDir,
    console: !json,
  });

  return runCommand(command, appConfig, logger);
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(c("red", err instanceof Error ? err.message : String(err)));
    process.exitCode = 1;
  }
);
