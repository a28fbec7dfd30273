#!/usr/bin/env node
import { Command } from "commander";
import pino, { type Logger } from "pino";
import { loadConfigFile } from "./config.js";
import { errorMessage } from "./errors.js";
import { initLogger, log, type LoggerBackend } from "./logger.js";
import { Orchestrator } from "./orchestrator.js";
import { registerCli } from "./cli.js";

// stdout carries command output; all logging goes to stderr, synchronously so
// nothing is lost when the process exits right after a command.
function pinoBackend(debug: boolean): LoggerBackend {
  const logger: Logger = pino(
    { name: "tiered-memory", level: debug ? "debug" : (process.env.LOG_LEVEL ?? "info") },
    pino.destination({ fd: 2, sync: true }),
  );
  return {
    debug: (msg) => logger.debug(msg),
    info: (msg) => logger.info(msg),
    warn: (msg) => logger.warn(msg),
    error: (msg) => logger.error(msg),
  };
}

const program = new Command();
program
  .name("tiered-memory")
  .description("Daily, weekly and archived conversation memory with entity quarantine and fallback retrieval")
  .option("--config <path>", "config file (default: $TIERED_MEMORY_CONFIG or ~/.tiered-memory/config.json)")
  .option("--debug", "verbose logging");

let opened: Orchestrator | null = null;

async function open(): Promise<Orchestrator> {
  if (opened) return opened;
  const opts = program.opts<{ config?: string; debug?: boolean }>();

  // Debug stays off until the config has been read, unless forced on the command line.
  initLogger(pinoBackend(opts.debug === true), opts.debug === true);
  const config = await loadConfigFile(opts.config);
  const debug = opts.debug === true || config.debug;
  initLogger(pinoBackend(debug), debug);
  log.debug(
    `initialized (memoryDir=${config.memoryDir}, vector=${config.vector.enabled ? config.vector.url : "disabled"}, ` +
      `collections=${Object.keys(config.collections).length})`,
  );

  opened = Orchestrator.open(config);
  return opened;
}

registerCli(program, open);

try {
  await program.parseAsync(process.argv);
} catch (err) {
  console.error(`error: ${errorMessage(err)}`);
  process.exitCode = 1;
}
