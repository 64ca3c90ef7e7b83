import { ToolRegistry } from "../../../src/tools/registry.js";
import { TOOL_CATALOG } from "../../../src/tools/catalog.js";
import type { ToolSpec } from "../../../src/types/tool.js";

function stub(name: string, params: ToolSpec["params"] = []): ToolSpec {
  return {
    name,
    title: name,
    description: `${name} stub`,
    category: "devtools",
    mode: "wait",
    params,
    build: (_args, ctx) => ({ argv: [ctx.program, "info"] }),
  };
}

describe("ToolRegistry", () => {
  const registry = new ToolRegistry();

  it("registers the full catalog", () => {
    expect(registry.size).toBe(11);
    expect(registry.getAll().map((t) => t.name)).toEqual(TOOL_CATALOG.map((t) => t.name));
  });

  it("exposes every tool by name", () => {
    expect(registry.getAll().map((t) => t.name).sort()).toEqual([
      "phalcon_create_all_models",
      "phalcon_create_controller",
      "phalcon_create_migration",
      "phalcon_create_model",
      "phalcon_create_module",
      "phalcon_create_project",
      "phalcon_create_scaffold",
      "phalcon_create_webtools",
      "phalcon_info",
      "phalcon_list_commands",
      "phalcon_serve",
    ]);
  });

  it("returns undefined for an unknown name", () => {
    expect(registry.get("phalcon_deploy")).toBeUndefined();
  });

  it("only detaches phalcon_serve", () => {
    expect(registry.getAll().filter((t) => t.mode === "detach").map((t) => t.name)).toEqual(["phalcon_serve"]);
  });

  it("freezes registered specs", () => {
    const spec = registry.get("phalcon_info");
    expect(Object.isFrozen(spec)).toBe(true);
    expect(Object.isFrozen(spec?.params)).toBe(true);
  });

  it("rejects duplicate tool names", () => {
    expect(() => new ToolRegistry([stub("phalcon_x"), stub("phalcon_x")]))
      .toThrow("Duplicate tool registration: phalcon_x");
  });

  it("rejects duplicate parameter names", () => {
    const params: ToolSpec["params"] = [
      { name: "name", kind: "string", description: "first", required: true },
      { name: "name", kind: "string", description: "second", required: false },
    ];
    expect(() => new ToolRegistry([stub("phalcon_x", params)]))
      .toThrow("Duplicate parameter name on tool phalcon_x");
  });
});
