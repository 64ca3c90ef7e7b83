// Token helpers shared by the catalog builders. Pure; no I/O.
import type { BuildContext, ToolArgs } from "../types/tool.js";
import type { CommandSpec } from "../types/command.js";

/** String value of an argument, or undefined when absent or empty. */
export function value(args: ToolArgs, name: string): string | undefined {
  const v = args[name];
  return typeof v === "string" && v !== "" ? v : undefined;
}

/**
 * String value of a required argument. Validation guarantees presence; an
 * empty string is passed through so the CLI reports it in its own words.
 */
export function required(args: ToolArgs, name: string): string {
  const v = args[name];
  if (typeof v !== "string") throw new Error(`Builder called without validated argument: ${name}`);
  return v;
}

/** `[flag, value]` when the value is present, nothing otherwise. */
export function option(flag: string, v: string | undefined): string[] {
  return v === undefined ? [] : [flag, v];
}

/** Bare flag when the argument is true. */
export function toggle(flag: string, args: ToolArgs, name: string): string[] {
  return args[name] === true ? [flag] : [];
}

export function command(ctx: BuildContext, tokens: readonly string[]): CommandSpec {
  return ctx.cwd === undefined
    ? { argv: [ctx.program, ...tokens] }
    : { argv: [ctx.program, ...tokens], cwd: ctx.cwd };
}

/** Display form of an argv. Only for logs and messages; never executed. */
export function formatCommand(argv: readonly string[]): string {
  return argv.map((t) => (t === "" || /[\s"'\\$`]/.test(t) ? JSON.stringify(t) : t)).join(" ");
}
