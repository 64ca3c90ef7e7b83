import type { CommandSpec } from "./command.js";

/** How a parameter is typed on the wire and mapped onto the CLI. */
export type ParamKind = "string" | "path" | "enum" | "flag" | "port";

interface ParamBase {
  readonly name: string;
  readonly description: string;
  readonly required: boolean;
}

export interface StringParam extends ParamBase {
  readonly kind: "string" | "path";
  readonly default?: string;
}

export interface EnumParam extends ParamBase {
  readonly kind: "enum";
  readonly allowed: readonly [string, ...string[]];
  readonly default?: string;
}

export interface FlagParam extends ParamBase {
  readonly kind: "flag";
  readonly default?: boolean;
}

/** TCP port: an integer 1-65535 or a string of digits, normalized to a decimal string. */
export interface PortParam extends ParamBase {
  readonly kind: "port";
  readonly default?: string;
}

export type ParamSpec = StringParam | EnumParam | FlagParam | PortParam;

/** Arguments after validation and default application. Omitted optionals are absent. */
export type ToolArgs = Readonly<Record<string, string | boolean>>;

/** Values resolved once at startup and shared by every builder. */
export interface BuildContext {
  readonly program: string;
  readonly cwd?: string;
}

export type ToolCategory = "project" | "codegen" | "devtools";

/** "wait" runs to completion under the timeout; "detach" returns once the child survives the grace period. */
export type ExecutionMode = "wait" | "detach";

export interface ToolAnnotations {
  readonly readOnlyHint?: boolean;
  readonly destructiveHint?: boolean;
  readonly idempotentHint?: boolean;
  readonly openWorldHint?: boolean;
}

/** Static description of one tool. Built once, never mutated. */
export interface ToolSpec {
  readonly name: string;
  readonly title: string;
  readonly description: string;
  readonly category: ToolCategory;
  readonly mode: ExecutionMode;
  readonly params: readonly ParamSpec[];
  readonly annotations?: ToolAnnotations;
  readonly build: (args: ToolArgs, ctx: BuildContext) => CommandSpec;
  /** Success text for a detached child that is still running after the grace period. */
  readonly startedMessage?: (args: ToolArgs, pid: number) => string;
}

/** What a tool call produced once the CLI ran. Nonzero exits are results, not errors. */
export interface ToolResult {
  readonly tool: string;
  readonly success: boolean;
  readonly output: string;
  readonly command: string;
  readonly exitCode?: number;
  readonly durationMs: number;
}
