import type { BuildContext, ToolArgs, ToolResult, ToolSpec } from "../types/tool.js";
import type { CommandSpec, ExecutionResult } from "../types/command.js";
import type { ProcessRunner } from "../execution/runner.js";
import type { ToolRegistry } from "./registry.js";
import { validateArgs } from "./schema.js";
import { formatCommand } from "./args.js";
import { ToolError, ToolErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";

export interface DispatcherOptions extends BuildContext {
  readonly timeoutMs: number;
  readonly serveGraceMs: number;
}

/** A validated call, ready to execute. */
export interface PreparedCall {
  readonly tool: ToolSpec;
  readonly args: ToolArgs;
  readonly command: CommandSpec;
}

const NO_OUTPUT = "Command completed with no output.";

/**
 * Tool call pipeline: look up -> validate -> build argv -> run -> classify.
 * Holds no mutable state, so concurrent calls need no coordination.
 * ToolError and ProcessError propagate to the protocol layer; a nonzero
 * exit comes back as a ToolResult with success: false.
 */
export class Dispatcher {
  constructor(
    private readonly registry: ToolRegistry,
    private readonly runner: ProcessRunner,
    private readonly options: DispatcherOptions,
  ) {}

  /** Validation and argv construction only. Never starts a process. */
  prepare(toolName: string, rawArgs: Record<string, unknown> = {}): PreparedCall {
    const tool = this.registry.get(toolName);
    if (!tool) {
      throw new ToolError(ToolErrorCode.UNKNOWN_TOOL, toolName, `Unknown tool: ${toolName}`);
    }
    const args = validateArgs(tool, rawArgs);
    const ctx: BuildContext = { program: this.options.program, cwd: this.options.cwd };
    return { tool, args, command: tool.build(args, ctx) };
  }

  async dispatch(toolName: string, rawArgs: Record<string, unknown> = {}): Promise<ToolResult> {
    let prepared: PreparedCall;
    try {
      prepared = this.prepare(toolName, rawArgs);
    } catch (err) {
      if (err instanceof ToolError) {
        logger.info({ tool: toolName, code: err.code, field: err.context.field }, "Rejected tool call");
      }
      throw err;
    }

    const { tool, args, command } = prepared;
    const display = formatCommand(command.argv);
    logger.info({ tool: tool.name, argv: command.argv, cwd: command.cwd }, "Dispatching tool call");

    if (tool.mode === "detach") {
      const outcome = await this.runner.detach(command, this.options.serveGraceMs);
      if (outcome.state === "running") {
        const started = tool.startedMessage?.(args, outcome.pid) ?? `Started ${display} (pid ${outcome.pid}).`;
        const early = joinOutput(outcome.stdout, outcome.stderr);
        return {
          tool: tool.name,
          success: true,
          output: early ? `${started}\n\n${early}` : started,
          command: display,
          durationMs: outcome.durationMs,
        };
      }
      return this.classify(tool, display, outcome.result);
    }

    const result = await this.runner.run(command, this.options.timeoutMs);
    return this.classify(tool, display, result);
  }

  private classify(tool: ToolSpec, display: string, result: ExecutionResult): ToolResult {
    logger.info(
      { tool: tool.name, exitCode: result.exitCode, signal: result.signal, durationMs: result.durationMs },
      "Tool command finished",
    );
    if (result.exitCode === 0) {
      const stdout = result.stdout.trim();
      const stderr = result.stderr.trim();
      const output = stderr ? `${stdout}\n\n[stderr]\n${stderr}`.trimStart() : stdout;
      return { tool: tool.name, success: true, output: output || NO_OUTPUT, command: display, durationMs: result.durationMs };
    }
    return {
      tool: tool.name,
      success: false,
      output: joinOutput(result.stdout, result.stderr),
      command: display,
      exitCode: result.exitCode,
      durationMs: result.durationMs,
    };
  }
}

function joinOutput(stdout: string, stderr: string): string {
  return [stdout.trim(), stderr.trim()].filter((s) => s.length > 0).join("\n");
}
