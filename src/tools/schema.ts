// Parameter descriptors -> zod objects, and zod issues -> ToolError.
// The same zod object validates tools/call arguments and produces the
// JSON schema advertised in tools/list, so the two cannot drift apart.
import { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import type { ParamSpec, ToolArgs, ToolSpec } from "../types/tool.js";
import { ToolError, ToolErrorCode } from "../shared/errors.js";

const DIGITS = /^\d+$/;

function isValidPort(value: string | number): boolean {
  const n = typeof value === "number" ? value : Number(value);
  return Number.isInteger(n) && n >= 1 && n <= 65535;
}

function baseSchema(param: ParamSpec): z.ZodTypeAny {
  switch (param.kind) {
    case "string":
    case "path":
      return z.string();
    case "enum":
      return z.enum(param.allowed);
    case "flag":
      return z.boolean();
    case "port":
      return z
        .union([z.number().int(), z.string().regex(DIGITS, "Expected a port number")])
        .refine(isValidPort, { message: "Port must be between 1 and 65535" });
  }
}

function paramSchema(param: ParamSpec): z.ZodTypeAny {
  const schema = baseSchema(param).describe(param.description);
  if (param.default !== undefined) return schema.default(param.default);
  return param.required ? schema : schema.optional();
}

/** Strict object schema for a tool: unknown keys are issues, not silently stripped. */
export function toZodSchema(params: readonly ParamSpec[]): z.ZodObject<z.ZodRawShape, "strict"> {
  const shape: z.ZodRawShape = {};
  for (const param of params) {
    shape[param.name] = paramSchema(param);
  }
  return z.object(shape).strict();
}

/** JSON schema for tools/list. */
export function toInputSchema(params: readonly ParamSpec[]) {
  return { ...zodToJsonSchema(toZodSchema(params), { $refStrategy: "none" }), type: "object" as const };
}

// ── Issue classification ──────────────────────────────────────────

interface Classified {
  rank: number;
  error: ToolError;
}

function fieldOf(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? String(issue.path[0]) : "";
}

function classify(tool: string, issue: z.ZodIssue): Classified {
  switch (issue.code) {
    case z.ZodIssueCode.unrecognized_keys: {
      const field = issue.keys[0] ?? "";
      return {
        rank: 0,
        error: new ToolError(
          ToolErrorCode.UNEXPECTED_ARGUMENT,
          tool,
          `Unexpected argument${issue.keys.length > 1 ? "s" : ""} for ${tool}: ${issue.keys.join(", ")}`,
          { field },
        ),
      };
    }
    case z.ZodIssueCode.invalid_type:
      if (issue.received === z.ZodParsedType.undefined) {
        const field = fieldOf(issue);
        return {
          rank: 1,
          error: new ToolError(ToolErrorCode.MISSING_ARGUMENT, tool, `Missing required argument for ${tool}: ${field}`, { field }),
        };
      }
      break;
    case z.ZodIssueCode.invalid_enum_value: {
      const field = fieldOf(issue);
      const allowed = issue.options.map(String);
      return {
        rank: 2,
        error: new ToolError(
          ToolErrorCode.INVALID_VALUE,
          tool,
          `Invalid value for ${field}: ${JSON.stringify(issue.received)}. Allowed: ${allowed.join(", ")}`,
          { field, allowed, received: issue.received },
        ),
      };
    }
    default:
      break;
  }
  const field = fieldOf(issue);
  return {
    rank: 3,
    error: new ToolError(ToolErrorCode.INVALID_VALUE, tool, `Invalid value for ${field}: ${issue.message}`, { field }),
  };
}

/** Pick the most actionable issue: unexpected, then missing, then enum, then anything else. */
export function toToolError(tool: string, issues: readonly z.ZodIssue[]): ToolError {
  let best: Classified | undefined;
  for (const issue of issues) {
    const candidate = classify(tool, issue);
    if (!best || candidate.rank < best.rank) best = candidate;
  }
  return best?.error ?? new ToolError(ToolErrorCode.INVALID_VALUE, tool, `Invalid arguments for ${tool}`);
}

// ── Validation ────────────────────────────────────────────────────

/** Zod output with numbers (ports) rendered as strings and anything else dropped. */
function normalize(parsed: Record<string, unknown>): ToolArgs {
  const args: Record<string, string | boolean> = {};
  for (const [key, value] of Object.entries(parsed)) {
    if (typeof value === "string" || typeof value === "boolean") args[key] = value;
    else if (typeof value === "number") args[key] = String(value);
  }
  return args;
}

/**
 * Validate raw call arguments against a tool's parameters.
 * A null value counts as omitted, and so does an empty string for an optional
 * parameter; defaults apply to both.
 */
export function validateArgs(tool: ToolSpec, raw: Record<string, unknown>): ToolArgs {
  const optional = new Set(tool.params.filter((p) => !p.required).map((p) => p.name));
  const present: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (value === null || value === undefined) continue;
    if (value === "" && optional.has(key)) continue;
    present[key] = value;
  }
  const result = toZodSchema(tool.params).safeParse(present);
  if (!result.success) throw toToolError(tool.name, result.error.issues);
  return normalize(result.data);
}
