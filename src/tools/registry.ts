import type { ToolSpec } from "../types/tool.js";
import { TOOL_CATALOG } from "./catalog.js";

/**
 * Tool Registry: the immutable name -> ToolSpec table.
 * Built once at startup; the MCP server reads it for tools/list and the
 * dispatcher for tools/call.
 */
export class ToolRegistry {
  private readonly tools: ReadonlyMap<string, ToolSpec>;

  constructor(specs: readonly ToolSpec[] = TOOL_CATALOG) {
    const tools = new Map<string, ToolSpec>();
    for (const spec of specs) {
      if (tools.has(spec.name)) {
        throw new Error(`Duplicate tool registration: ${spec.name}`);
      }
      const seen = new Set<string>();
      for (const param of spec.params) {
        if (seen.has(param.name)) {
          throw new Error(`Duplicate parameter ${param.name} on tool ${spec.name}`);
        }
        seen.add(param.name);
      }
      tools.set(spec.name, Object.freeze({ ...spec, params: Object.freeze([...spec.params]) }));
    }
    this.tools = tools;
  }

  get(name: string): ToolSpec | undefined {
    return this.tools.get(name);
  }

  getAll(): ToolSpec[] {
    return [...this.tools.values()];
  }

  get size(): number {
    return this.tools.size;
  }
}
