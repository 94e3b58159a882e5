#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { defaultDbPath, envLogLevel } from "./config.js";
import { CLI_NAME } from "./constants.js";
import { errorMessage, LOG_LEVELS, parseLogLevel } from "./logger.js";
import { registerSessionCommands } from "./session-cli.js";
import {
  configureSyncCommand,
  EXIT_FAILURE,
  runSyncCommand,
  type RunSyncCommandOptions,
} from "./sync-cli.js";

function packageVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    if (raw && typeof raw === "object" && "version" in raw && typeof raw.version === "string") {
      return raw.version;
    }
  } catch (err) {
    return `unknown (${errorMessage(err)})`;
  }
  return "unknown";
}

const program = new Command()
  .name(CLI_NAME)
  .description("Push media to a server over ssh, deduplicated by content hash")
  .version(packageVersion());

program
  .option(
    "--log-level <level>",
    `log verbosity (${LOG_LEVELS.join(", ")})`,
    envLogLevel(),
  )
  .option("--db <file>", "path to the session database", defaultDbPath());

configureSyncCommand(program.command("sync")).action(
  async (opts: Omit<RunSyncCommandOptions, "db" | "logLevel">, command: Command) => {
    const globals = command.optsWithGlobals<{ db: string; logLevel: string }>();
    process.exitCode = await runSyncCommand({
      ...opts,
      db: globals.db,
      logLevel: parseLogLevel(globals.logLevel, "info"),
    });
  },
);

registerSessionCommands(program);

if (process.argv.length <= 2) {
  program.outputHelp();
  process.exit(0);
}

program.parseAsync(process.argv).catch((err: unknown) => {
  console.error(`${CLI_NAME}: ${errorMessage(err)}`);
  process.exitCode = EXIT_FAILURE;
});
