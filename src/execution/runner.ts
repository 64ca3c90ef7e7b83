// Process execution layer. Every tool call ends up here.
// ProcessRunner is the seam the dispatcher and tests depend on; ExecaRunner is
// the only implementation and the only code in the server that starts processes.
// Commands are argv vectors handed to execa without a shell, so argument values
// are never re-parsed. On Windows execa's cross-spawn layer escapes each token
// for the cmd.exe that runs phalcon.bat.
import execa from "execa";
import type { ChildProcess } from "node:child_process";
import { Socket } from "node:net";
import type { Readable } from "node:stream";
import type { CommandSpec, DetachResult, ExecutionResult } from "../types/command.js";
import { ProcessError, ProcessErrorCode } from "../shared/errors.js";
import { logger } from "../logger.js";
import { formatCommand } from "../tools/args.js";

/** Per-stream capture ceiling, in characters. */
const MAX_BUFFER = 10 * 1024 * 1024;

/** Exit code reported for a child that died from a signal nobody here sent. */
const SIGNAL_EXIT_CODE = 128;

/** How long an exited child's pipes get to flush before we stop listening. */
const CLOSE_WAIT_MS = 500;

// POSIX children get their own process group so a timeout can signal the
// whole tree. Windows has no equivalent; only the direct child is killed there.
const PROCESS_GROUPS = process.platform !== "win32";

export interface ProcessRunner {
  /** Run to completion. Nonzero exits resolve; launch failures and timeouts throw ProcessError. */
  run(command: CommandSpec, timeoutMs: number): Promise<ExecutionResult>;
  /** Start and return once the child has exited or survived `graceMs`. */
  detach(command: CommandSpec, graceMs: number): Promise<DetachResult>;
}

export interface RunnerOptions {
  /** Delay between SIGTERM and SIGKILL after a timeout. */
  killGraceMs?: number;
}

export class ExecaRunner implements ProcessRunner {
  private readonly killGraceMs: number;
  // Children started by run() that have not exited yet. Detached servers are never tracked.
  private readonly active = new Set<ChildProcess>();

  constructor(options: RunnerOptions = {}) {
    this.killGraceMs = options.killGraceMs ?? 5_000;
  }

  /** Number of run() children still in flight. */
  get activeCount(): number {
    return this.active.size;
  }

  async run(command: CommandSpec, timeoutMs: number): Promise<ExecutionResult> {
    const [file, args] = split(command);
    const start = performance.now();
    logger.debug({ argv: command.argv, cwd: command.cwd, timeoutMs }, "Spawning command");

    // buffer: false makes execa settle on the child's exit rather than on pipe
    // close, so a grandchild holding stdout open cannot stall a finished command.
    const child = execa(file, args, {
      cwd: command.cwd,
      stdin: "ignore",
      buffer: false,
      windowsHide: true,
      detached: PROCESS_GROUPS,
    });
    const output = capture(child);
    this.active.add(child);

    let timedOut = false;
    let forceKill: NodeJS.Timeout | undefined;
    const timer = setTimeout(() => {
      timedOut = true;
      logger.warn({ argv: command.argv, pid: child.pid, timeoutMs }, "Command timed out — terminating");
      signalTree(child, "SIGTERM");
      forceKill = setTimeout(() => signalTree(child, "SIGKILL"), this.killGraceMs);
    }, timeoutMs);

    try {
      const result = await child;
      // A child that traps SIGTERM and exits cleanly still timed out.
      if (timedOut) throw timeoutError(command, timeoutMs);
      await output.flushed();
      return { exitCode: result.exitCode, stdout: output.stdout(), stderr: output.stderr(), durationMs: elapsed(start) };
    } catch (err) {
      if (err instanceof ProcessError) throw err;
      if (timedOut) throw timeoutError(command, timeoutMs);
      const exited = completedResult(err, start);
      if (!exited) throw launchError(err, file, command.cwd);
      await output.flushed();
      return { ...exited, stdout: output.stdout(), stderr: output.stderr() };
    } finally {
      clearTimeout(timer);
      if (forceKill) clearTimeout(forceKill);
      this.active.delete(child);
      output.release();
    }
  }

  async detach(command: CommandSpec, graceMs: number): Promise<DetachResult> {
    const [file, args] = split(command);
    const start = performance.now();
    logger.debug({ argv: command.argv, cwd: command.cwd, graceMs }, "Spawning detached command");

    // No buffering and no cleanup: a server that survives the grace period
    // outlives this call and must not be killed when the MCP server exits.
    const child = execa(file, args, {
      cwd: command.cwd,
      stdin: "ignore",
      buffer: false,
      cleanup: false,
      windowsHide: true,
      detached: PROCESS_GROUPS,
    });
    const output = capture(child);

    const settled = child.then(
      (result) => ({ kind: "exit" as const, exitCode: result.exitCode }),
      (err: unknown) => ({ kind: "error" as const, err }),
    );
    let graceTimer: NodeJS.Timeout | undefined;
    const grace = new Promise<{ kind: "grace" }>((resolve) => {
      graceTimer = setTimeout(() => resolve({ kind: "grace" }), graceMs);
    });

    const outcome = await Promise.race([settled, grace]);
    clearTimeout(graceTimer);

    if (outcome.kind === "grace") {
      if (child.pid === undefined) {
        output.release();
        throw new ProcessError(ProcessErrorCode.LAUNCH_FAILED, `Process for ${file} has no pid after ${graceMs}ms`, { program: file });
      }
      output.release();
      child.unref();
      logger.info({ argv: command.argv, pid: child.pid }, "Detached command still running after grace period");
      return {
        state: "running",
        pid: child.pid,
        stdout: output.stdout(),
        stderr: output.stderr(),
        durationMs: elapsed(start),
      };
    }

    try {
      if (outcome.kind === "exit") {
        await output.flushed();
        return {
          state: "exited",
          result: { exitCode: outcome.exitCode, stdout: output.stdout(), stderr: output.stderr(), durationMs: elapsed(start) },
        };
      }
      const exited = completedResult(outcome.err, start);
      if (!exited) throw launchError(outcome.err, file, command.cwd);
      await output.flushed();
      return { state: "exited", result: { ...exited, stdout: output.stdout(), stderr: output.stderr() } };
    } finally {
      output.release();
    }
  }

  /**
   * SIGTERM every run() child still in flight, process group included.
   * Called on shutdown: those children were started without execa's exit cleanup.
   */
  terminateAll(): void {
    for (const child of this.active) {
      logger.warn({ pid: child.pid }, "Terminating in-flight command on shutdown");
      signalTree(child, "SIGTERM");
    }
  }
}

// ── Output capture ─────────────────────────────────────────────────

interface Capture {
  stdout(): string;
  stderr(): string;
  /** Resolves once both pipes closed, or after CLOSE_WAIT_MS. */
  flushed(): Promise<void>;
  /** Stop collecting but keep draining, so a chatty child never blocks on a full pipe. */
  release(): void;
}

class StreamBuffer {
  private readonly chunks: string[] = [];
  private size = 0;
  private truncated = false;

  readonly onData = (chunk: string): void => {
    if (this.size >= MAX_BUFFER) {
      if (!this.truncated) logger.warn({ limit: MAX_BUFFER }, "Command output exceeds capture limit; truncating");
      this.truncated = true;
      return;
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  };

  text(): string {
    return this.chunks.join("");
  }
}

function capture(child: ChildProcess): Capture {
  const out = new StreamBuffer();
  const err = new StreamBuffer();
  child.stdout?.setEncoding("utf8");
  child.stderr?.setEncoding("utf8");
  child.stdout?.on("data", out.onData);
  child.stderr?.on("data", err.onData);
  const closed = new Promise<void>((resolve) => {
    child.once("close", () => resolve());
  });

  return {
    stdout: () => out.text(),
    stderr: () => err.text(),
    flushed: () => waitForClose(closed),
    release: () => {
      child.stdout?.off("data", out.onData);
      child.stderr?.off("data", err.onData);
      release(child.stdout);
      release(child.stderr);
    },
  };
}

// ── Helpers ────────────────────────────────────────────────────────

function split(command: CommandSpec): [string, string[]] {
  const [file, ...args] = command.argv;
  if (!file) {
    throw new ProcessError(ProcessErrorCode.LAUNCH_FAILED, "Command has no program");
  }
  return [file, args];
}

function elapsed(start: number): number {
  return Math.round(performance.now() - start);
}

// Spawn errors can come from another realm (Jest's VM context), where
// `instanceof Error` is false. Read their fields structurally.
function isObject(value: unknown): value is object {
  return typeof value === "object" && value !== null;
}

function errnoCode(err: unknown): string | undefined {
  return isObject(err) && "code" in err && typeof err.code === "string" ? err.code : undefined;
}

function errorMessage(err: unknown): string {
  return isObject(err) && "message" in err && typeof err.message === "string" ? err.message : String(err);
}

/**
 * Execa rejects for nonzero exits and signal deaths as well as for launch
 * failures. The first two mean the program ran; turn them back into a result.
 * Streams are filled in by the caller from its own capture.
 */
function completedResult(err: unknown, start: number): ExecutionResult | undefined {
  if (!isObject(err)) return undefined;
  const exitCode = "exitCode" in err && typeof err.exitCode === "number" ? err.exitCode : undefined;
  const signal = "signal" in err && typeof err.signal === "string" ? err.signal : undefined;
  if (exitCode === undefined && signal === undefined) return undefined;
  const base = { exitCode: exitCode ?? SIGNAL_EXIT_CODE, stdout: "", stderr: "", durationMs: elapsed(start) };
  return signal === undefined ? base : { ...base, signal };
}

function launchError(err: unknown, file: string, cwd: string | undefined): ProcessError {
  const code = errnoCode(err);
  const reason = errorMessage(err);
  const context = { program: file, cwd, errno: code, reason };
  switch (code) {
    case "ENOENT":
      return new ProcessError(
        ProcessErrorCode.EXECUTABLE_NOT_FOUND,
        cwd
          ? `Could not start ${file}: executable not found on PATH, or working directory ${cwd} does not exist`
          : `Could not start ${file}: executable not found on PATH. Is Phalcon DevTools installed?`,
        context,
      );
    case "EACCES":
    case "EPERM":
      return new ProcessError(ProcessErrorCode.PERMISSION_DENIED, `Could not start ${file}: permission denied`, context);
    default:
      return new ProcessError(ProcessErrorCode.LAUNCH_FAILED, `Could not start ${file}: ${reason}`, context);
  }
}

function timeoutError(command: CommandSpec, timeoutMs: number): ProcessError {
  return new ProcessError(
    ProcessErrorCode.TIMEOUT,
    `Command timed out after ${timeoutMs}ms and was terminated: ${formatCommand(command.argv)}`,
    { timeoutMs },
  );
}

/** Signal the child's process group where there is one; best effort for grandchildren. */
function signalTree(child: ChildProcess, signal: NodeJS.Signals): void {
  const pid = child.pid;
  if (PROCESS_GROUPS && pid !== undefined) {
    try {
      process.kill(-pid, signal);
      return;
    } catch (err) {
      logger.debug({ pid, signal, errno: errnoCode(err) }, "Could not signal process group; signalling child only");
    }
  }
  child.kill(signal);
}

function release(stream: Readable | null): void {
  if (!stream) return;
  stream.resume();
  if (stream instanceof Socket) stream.unref();
}

async function waitForClose(closed: Promise<void>): Promise<void> {
  let timer: NodeJS.Timeout | undefined;
  const cap = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, CLOSE_WAIT_MS);
  });
  await Promise.race([closed, cap]);
  clearTimeout(timer);
}
