import type { ToolSpec } from "../types/tool.js";
import { command, option, required, toggle, value } from "./args.js";

// Every tool maps onto exactly one Phalcon DevTools invocation. Optional flags
// without a value are left out so the CLI applies its own defaults.

// ── Project management ─────────────────────────────────────────

const projectTools: ToolSpec[] = [
  {
    name: "phalcon_create_project",
    title: "Create project",
    description: "Create a new Phalcon project from one of the DevTools templates.",
    category: "project",
    mode: "wait",
    params: [
      { name: "name", kind: "string", required: true, description: "Project name; also the directory created for it" },
      {
        name: "template",
        kind: "enum",
        required: false,
        allowed: ["basic", "micro", "api"],
        default: "basic",
        description: "Application skeleton: 'basic' (MVC), 'micro' (micro application) or 'api'",
      },
      { name: "directory", kind: "path", required: false, description: "Parent directory for the project (defaults to the working directory)" },
    ],
    annotations: { destructiveHint: false, openWorldHint: false },
    build: (args, ctx) =>
      command(ctx, [
        "project",
        required(args, "name"),
        ...option("--template", value(args, "template")),
        ...option("--directory", value(args, "directory")),
      ]),
  },
  {
    name: "phalcon_create_module",
    title: "Create module",
    description: "Create a new module in a multi-module Phalcon application.",
    category: "project",
    mode: "wait",
    params: [
      { name: "name", kind: "string", required: true, description: "Module name" },
      { name: "directory", kind: "path", required: false, description: "Project directory the module is added to" },
    ],
    annotations: { destructiveHint: false, openWorldHint: false },
    build: (args, ctx) =>
      command(ctx, [
        "create-module",
        "--name",
        required(args, "name"),
        ...option("--directory", value(args, "directory")),
      ]),
  },
  {
    name: "phalcon_serve",
    title: "Start development server",
    description:
      "Start the built-in development server in the background. Returns once the server has stayed up for a short grace period; an immediate startup failure is reported with its output.",
    category: "project",
    mode: "detach",
    params: [
      { name: "host", kind: "string", required: false, default: "localhost", description: "Interface to bind" },
      { name: "port", kind: "port", required: false, default: "8000", description: "Port to listen on (1-65535)" },
    ],
    annotations: { readOnlyHint: false, destructiveHint: false, idempotentHint: false, openWorldHint: false },
    build: (args, ctx) =>
      command(ctx, ["serve", "--host", required(args, "host"), "--port", required(args, "port")]),
    startedMessage: (args, pid) =>
      `Development server started at http://${required(args, "host")}:${required(args, "port")} (pid ${pid}).`,
  },
];

// ── Code generation ─────────────────────────────────────────────

const codegenTools: ToolSpec[] = [
  {
    name: "phalcon_create_controller",
    title: "Create controller",
    description: "Generate a controller class.",
    category: "codegen",
    mode: "wait",
    params: [
      { name: "name", kind: "string", required: true, description: "Controller name, e.g. 'Users'" },
      { name: "base_class", kind: "string", required: false, description: "Class the controller extends, e.g. 'ControllerBase'" },
    ],
    annotations: { destructiveHint: false, openWorldHint: false },
    build: (args, ctx) =>
      command(ctx, [
        "create-controller",
        "--name",
        required(args, "name"),
        ...option("--base-class", value(args, "base_class")),
      ]),
  },
  {
    name: "phalcon_create_model",
    title: "Create model",
    description: "Generate a model class from a database table.",
    category: "codegen",
    mode: "wait",
    params: [
      { name: "name", kind: "string", required: true, description: "Table name the model is generated from" },
      { name: "schema", kind: "string", required: false, description: "Database schema containing the table" },
      { name: "namespace", kind: "string", required: false, description: "PHP namespace for the generated class" },
    ],
    annotations: { destructiveHint: false, openWorldHint: false },
    build: (args, ctx) =>
      command(ctx, [
        "create-model",
        "--name",
        required(args, "name"),
        ...option("--schema", value(args, "schema")),
        ...option("--namespace", value(args, "namespace")),
      ]),
  },
  {
    name: "phalcon_create_all_models",
    title: "Create all models",
    description: "Generate model classes for every table in the database.",
    category: "codegen",
    mode: "wait",
    params: [
      { name: "schema", kind: "string", required: false, description: "Database schema to read tables from" },
      { name: "namespace", kind: "string", required: false, description: "PHP namespace for the generated classes" },
    ],
    annotations: { destructiveHint: false, openWorldHint: false },
    build: (args, ctx) =>
      command(ctx, [
        "create-model",
        "--all",
        ...option("--schema", value(args, "schema")),
        ...option("--namespace", value(args, "namespace")),
      ]),
  },
  {
    name: "phalcon_create_migration",
    title: "Create migration",
    description: "Generate a database migration for a table.",
    category: "codegen",
    mode: "wait",
    params: [
      { name: "table_name", kind: "string", required: true, description: "Table the migration is generated for" },
      { name: "directory", kind: "path", required: false, description: "Directory migrations are written to" },
    ],
    annotations: { destructiveHint: false, openWorldHint: false },
    build: (args, ctx) =>
      command(ctx, [
        "migration",
        "generate",
        "--table",
        required(args, "table_name"),
        ...option("--migrations-dir", value(args, "directory")),
      ]),
  },
  {
    name: "phalcon_create_scaffold",
    title: "Create scaffold",
    description: "Generate a full CRUD scaffold (model, controller, views) for a table.",
    category: "codegen",
    mode: "wait",
    params: [
      { name: "name", kind: "string", required: true, description: "Table name to scaffold" },
      { name: "schema", kind: "string", required: false, description: "Database schema containing the table" },
      { name: "template", kind: "string", required: false, description: "Template engine or template path for generated views" },
      { name: "force", kind: "flag", required: false, description: "Overwrite existing files" },
    ],
    // --force overwrites generated files
    annotations: { destructiveHint: true, openWorldHint: false },
    build: (args, ctx) =>
      command(ctx, [
        "create-scaffold",
        "--name",
        required(args, "name"),
        ...option("--schema", value(args, "schema")),
        ...option("--template", value(args, "template")),
        ...toggle("--force", args, "force"),
      ]),
  },
];

// ── Development tools ───────────────────────────────────────────

const devTools: ToolSpec[] = [
  {
    name: "phalcon_info",
    title: "Phalcon info",
    description: "Show the Phalcon and DevTools versions and environment information.",
    category: "devtools",
    mode: "wait",
    params: [],
    annotations: { readOnlyHint: true, idempotentHint: true, openWorldHint: false },
    build: (_args, ctx) => command(ctx, ["info"]),
  },
  {
    name: "phalcon_create_webtools",
    title: "Enable webtools",
    description: "Enable the Phalcon web tools in the current project.",
    category: "devtools",
    mode: "wait",
    params: [],
    annotations: { destructiveHint: false, openWorldHint: false },
    build: (_args, ctx) => command(ctx, ["webtools", "--action", "enable"]),
  },
  {
    name: "phalcon_list_commands",
    title: "List commands",
    description: "List every command the installed Phalcon DevTools provide.",
    category: "devtools",
    mode: "wait",
    params: [],
    annotations: { readOnlyHint: true, idempotentHint: true, openWorldHint: false },
    build: (_args, ctx) => command(ctx, ["commands"]),
  },
];

export const TOOL_CATALOG: readonly ToolSpec[] = [...devTools, ...projectTools, ...codegenTools];
