#!/usr/bin/env node

import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";

import { logger } from "./logger.js";
import { loadConfig } from "./config/loader.js";
import { resolveProgram } from "./execution/platform.js";
import { ExecaRunner } from "./execution/runner.js";
import { ToolRegistry } from "./tools/registry.js";
import { Dispatcher } from "./tools/dispatcher.js";
import { createServer, SERVER_NAME } from "./server.js";

async function main(): Promise<void> {
  logger.info(`Starting ${SERVER_NAME} server`);

  // ── Phase 1: Load config ──────────────────────────────────────
  const { config, configPath, fromFile } = loadConfig();
  logger.info({ configPath, fromFile }, "Configuration loaded");

  // ── Phase 2: Resolve the CLI once for this host ───────────────
  const program = resolveProgram(process.platform, config.phalcon.executable);
  const cwd = config.phalcon.working_directory ?? undefined;

  // ── Phase 3: Registry, runner, dispatcher ─────────────────────
  const registry = new ToolRegistry();
  const runner = new ExecaRunner({ killGraceMs: config.execution.kill_grace_ms });
  const dispatcher = new Dispatcher(registry, runner, {
    program,
    cwd,
    timeoutMs: config.execution.timeout_ms,
    serveGraceMs: config.execution.serve_grace_ms,
  });

  // ── Phase 4: Shutdown hooks ───────────────────────────────────
  // run() children live in their own process group, outside execa's exit cleanup.
  process.once("exit", () => runner.terminateAll());
  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      logger.info({ signal, inFlight: runner.activeCount }, "Shutting down");
      process.exit(0);
    });
  }

  // ── Phase 5: Connect transport ────────────────────────────────
  const server = createServer(registry, dispatcher);
  server.onclose = () => runner.terminateAll();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info({ tools: registry.size, program, cwd: cwd ?? process.cwd() }, `${SERVER_NAME} running on stdio`);
}

main().catch((err) => {
  logger.fatal({ error: err instanceof Error ? err.message : String(err) }, "Fatal startup error");
  process.exit(1);
});
