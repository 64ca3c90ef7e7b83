import { resolveProgram, UNIX_PROGRAM, WINDOWS_PROGRAM } from "../../../src/execution/platform.js";

describe("resolveProgram", () => {
  it.each(["linux", "darwin", "freebsd"] as const)("uses the bare launcher on %s", (platform) => {
    expect(resolveProgram(platform)).toBe(UNIX_PROGRAM);
    expect(UNIX_PROGRAM).toBe("phalcon");
  });

  it("uses the batch wrapper on Windows", () => {
    expect(resolveProgram("win32")).toBe("phalcon.bat");
    expect(WINDOWS_PROGRAM).toBe("phalcon.bat");
  });

  it("prefers an explicit executable", () => {
    expect(resolveProgram("win32", "C:\\tools\\phalcon.bat")).toBe("C:\\tools\\phalcon.bat");
    expect(resolveProgram("linux", "/opt/phalcon/bin/phalcon")).toBe("/opt/phalcon/bin/phalcon");
  });

  it("ignores a null or empty override", () => {
    expect(resolveProgram("linux", null)).toBe("phalcon");
    expect(resolveProgram("win32", "")).toBe("phalcon.bat");
  });
});
