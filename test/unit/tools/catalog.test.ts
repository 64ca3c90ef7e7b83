import { Dispatcher } from "../../../src/tools/dispatcher.js";
import { ToolRegistry } from "../../../src/tools/registry.js";
import { FakeRunner } from "../../fixtures/fake-runner.js";

// argv construction is checked through Dispatcher.prepare so schema defaults
// are applied exactly as they are for a real tools/call.
function argvFor(tool: string, args: Record<string, unknown> = {}, program = "phalcon"): readonly string[] {
  const dispatcher = new Dispatcher(new ToolRegistry(), new FakeRunner(), {
    program,
    timeoutMs: 1000,
    serveGraceMs: 100,
  });
  return dispatcher.prepare(tool, args).command.argv;
}

describe("phalcon_info", () => {
  it("runs the info command", () => {
    expect(argvFor("phalcon_info")).toEqual(["phalcon", "info"]);
  });
});

describe("phalcon_create_project", () => {
  it("applies the basic template by default", () => {
    expect(argvFor("phalcon_create_project", { name: "my-app" }))
      .toEqual(["phalcon", "project", "my-app", "--template", "basic"]);
  });

  it("passes template and directory through", () => {
    expect(argvFor("phalcon_create_project", { name: "my-app", template: "micro", directory: "/srv/www" }))
      .toEqual(["phalcon", "project", "my-app", "--template", "micro", "--directory", "/srv/www"]);
  });

  it("omits an empty directory", () => {
    expect(argvFor("phalcon_create_project", { name: "my-app", template: "api", directory: "" }))
      .toEqual(["phalcon", "project", "my-app", "--template", "api"]);
  });
});

describe("phalcon_create_module", () => {
  it("passes the name as --name", () => {
    expect(argvFor("phalcon_create_module", { name: "Backend" }))
      .toEqual(["phalcon", "create-module", "--name", "Backend"]);
  });

  it("adds --directory when given", () => {
    expect(argvFor("phalcon_create_module", { name: "Backend", directory: "/srv/app" }))
      .toEqual(["phalcon", "create-module", "--name", "Backend", "--directory", "/srv/app"]);
  });
});

describe("phalcon_create_controller", () => {
  it("builds the minimal form", () => {
    expect(argvFor("phalcon_create_controller", { name: "Users" }))
      .toEqual(["phalcon", "create-controller", "--name", "Users"]);
  });

  it("appends --base-class", () => {
    expect(argvFor("phalcon_create_controller", { name: "Users", base_class: "ControllerBase" }))
      .toEqual(["phalcon", "create-controller", "--name", "Users", "--base-class", "ControllerBase"]);
  });
});

describe("phalcon_create_model", () => {
  it("passes schema and namespace in order", () => {
    expect(argvFor("phalcon_create_model", { name: "robots", schema: "shop", namespace: "App\\Models" }))
      .toEqual(["phalcon", "create-model", "--name", "robots", "--schema", "shop", "--namespace", "App\\Models"]);
  });

  it("omits unset optional flags", () => {
    expect(argvFor("phalcon_create_model", { name: "robots" }))
      .toEqual(["phalcon", "create-model", "--name", "robots"]);
  });
});

describe("phalcon_create_all_models", () => {
  it("leaves schema and namespace to the CLI when omitted", () => {
    expect(argvFor("phalcon_create_all_models")).toEqual(["phalcon", "create-model", "--all"]);
  });

  it("passes only the flags that were given", () => {
    expect(argvFor("phalcon_create_all_models", { namespace: "App\\Models" }))
      .toEqual(["phalcon", "create-model", "--all", "--namespace", "App\\Models"]);
  });
});

describe("phalcon_create_migration", () => {
  it("maps table_name and directory", () => {
    expect(argvFor("phalcon_create_migration", { table_name: "users", directory: "db/migrations" }))
      .toEqual(["phalcon", "migration", "generate", "--table", "users", "--migrations-dir", "db/migrations"]);
  });

  it("builds the minimal form", () => {
    expect(argvFor("phalcon_create_migration", { table_name: "users" }))
      .toEqual(["phalcon", "migration", "generate", "--table", "users"]);
  });
});

describe("phalcon_create_scaffold", () => {
  it("emits --force only when true", () => {
    expect(argvFor("phalcon_create_scaffold", { name: "products", force: true }))
      .toEqual(["phalcon", "create-scaffold", "--name", "products", "--force"]);
    expect(argvFor("phalcon_create_scaffold", { name: "products", force: false }))
      .toEqual(["phalcon", "create-scaffold", "--name", "products"]);
  });

  it("passes every option", () => {
    expect(argvFor("phalcon_create_scaffold", { name: "products", schema: "shop", template: "volt", force: true }))
      .toEqual(["phalcon", "create-scaffold", "--name", "products", "--schema", "shop", "--template", "volt", "--force"]);
  });
});

describe("phalcon_create_webtools", () => {
  it("enables webtools", () => {
    expect(argvFor("phalcon_create_webtools")).toEqual(["phalcon", "webtools", "--action", "enable"]);
  });
});

describe("phalcon_serve", () => {
  it("uses localhost:8000 by default", () => {
    expect(argvFor("phalcon_serve")).toEqual(["phalcon", "serve", "--host", "localhost", "--port", "8000"]);
  });

  it("accepts a numeric port and renders it as a token", () => {
    expect(argvFor("phalcon_serve", { host: "0.0.0.0", port: 8080 }))
      .toEqual(["phalcon", "serve", "--host", "0.0.0.0", "--port", "8080"]);
  });

  it("falls back to localhost for an empty host", () => {
    expect(argvFor("phalcon_serve", { host: "" }))
      .toEqual(["phalcon", "serve", "--host", "localhost", "--port", "8000"]);
  });

  it("treats null as omitted", () => {
    expect(argvFor("phalcon_serve", { host: null, port: "9000" }))
      .toEqual(["phalcon", "serve", "--host", "localhost", "--port", "9000"]);
  });
});

describe("phalcon_list_commands", () => {
  it("delegates the listing to the CLI", () => {
    expect(argvFor("phalcon_list_commands")).toEqual(["phalcon", "commands"]);
  });
});

describe("argv construction", () => {
  it("keeps shell metacharacters and spaces inside a single token", () => {
    expect(argvFor("phalcon_create_controller", { name: "Users; rm -rf $HOME" }))
      .toEqual(["phalcon", "create-controller", "--name", "Users; rm -rf $HOME"]);
  });

  it("leaves name legality to the CLI", () => {
    expect(argvFor("phalcon_create_module", { name: "a/b" }))
      .toEqual(["phalcon", "create-module", "--name", "a/b"]);
  });

  it("uses the program resolved at startup", () => {
    expect(argvFor("phalcon_info", {}, "phalcon.bat")).toEqual(["phalcon.bat", "info"]);
  });

  it("is deterministic for identical input", () => {
    expect(argvFor("phalcon_list_commands")).toEqual(argvFor("phalcon_list_commands"));
    expect(argvFor("phalcon_create_model", { name: "robots", schema: "shop" }))
      .toEqual(argvFor("phalcon_create_model", { name: "robots", schema: "shop" }));
  });

  it("attaches the configured working directory", () => {
    const dispatcher = new Dispatcher(new ToolRegistry(), new FakeRunner(), {
      program: "phalcon",
      cwd: "/srv/project",
      timeoutMs: 1000,
      serveGraceMs: 100,
    });
    expect(dispatcher.prepare("phalcon_info").command).toEqual({ argv: ["phalcon", "info"], cwd: "/srv/project" });
  });

  it("omits cwd when none is configured", () => {
    const dispatcher = new Dispatcher(new ToolRegistry(), new FakeRunner(), {
      program: "phalcon",
      timeoutMs: 1000,
      serveGraceMs: 100,
    });
    expect(dispatcher.prepare("phalcon_info").command).not.toHaveProperty("cwd");
  });
});
