/**
 * A structured command ready for execution.
 * Tool builders never produce raw command strings; argv[0] is the program and
 * every following token reaches the child process as one argument.
 */
export interface CommandSpec {
  readonly argv: readonly string[];
  readonly cwd?: string;
}

/** Outcome of a child process that ran to completion. */
export interface ExecutionResult {
  readonly exitCode: number;
  readonly stdout: string;
  readonly stderr: string;
  readonly durationMs: number;
  readonly signal?: string;
}

/** Outcome of a detached start: the child either ended inside the grace period or is still up. */
export type DetachResult =
  | { readonly state: "exited"; readonly result: ExecutionResult }
  | {
      readonly state: "running";
      readonly pid: number;
      readonly stdout: string;
      readonly stderr: string;
      readonly durationMs: number;
    };
