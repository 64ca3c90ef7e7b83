import type { ToolCategory } from "../types/tool.js";
import type { ToolRegistry } from "../tools/registry.js";

export const HELP_PROMPT_NAME = "phalcon_help";
export const HELP_PROMPT_DESCRIPTION = "Overview of the Phalcon DevTools tools this server provides";

const CATEGORY_HEADINGS: ReadonlyArray<[ToolCategory, string]> = [
  ["project", "Project management"],
  ["codegen", "Code generation"],
  ["devtools", "Development tools"],
];

/** Help text grouped by category, generated from the registry so it never lists a tool that does not exist. */
export function buildHelpText(registry: ToolRegistry): string {
  const tools = registry.getAll();
  const sections = CATEGORY_HEADINGS.map(([category, heading], i) => {
    const lines = tools
      .filter((t) => t.category === category)
      .map((t) => `   - ${t.name}: ${t.description}`);
    return [`${i + 1}. ${heading}`, ...lines].join("\n");
  });
  return ["The Phalcon MCP tools provide the following:", ...sections].join("\n\n");
}
