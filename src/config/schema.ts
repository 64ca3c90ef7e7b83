import { z } from "zod";

const PhalconConfigSchema = z.object({
  // null: `phalcon`, or `phalcon.bat` on Windows
  executable: z.string().min(1).nullable().default(null),
  // null: the server's own working directory
  working_directory: z.string().min(1).nullable().default(null),
});

const ExecutionConfigSchema = z.object({
  timeout_ms: z.number().int().positive().default(120_000),
  kill_grace_ms: z.number().int().nonnegative().default(5_000),
  serve_grace_ms: z.number().int().positive().default(3_000),
});

export const ServerConfigSchema = z.object({
  phalcon: PhalconConfigSchema.default({}),
  execution: ExecutionConfigSchema.default({}),
});

export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type PhalconConfig = z.infer<typeof PhalconConfigSchema>;
export type ExecutionConfig = z.infer<typeof ExecutionConfigSchema>;

export const DEFAULT_CONFIG: ServerConfig = ServerConfigSchema.parse({});
