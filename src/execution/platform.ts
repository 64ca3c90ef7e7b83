// The DevTools ship a bare `phalcon` launcher on Unix and a `phalcon.bat`
// wrapper on Windows. Resolved once at startup and stored in the build
// context; builders never look at the platform themselves.

export const UNIX_PROGRAM = "phalcon";
export const WINDOWS_PROGRAM = "phalcon.bat";

/** Program token for argv[0]. An explicit override (config or env) always wins. */
export function resolveProgram(platform: NodeJS.Platform = process.platform, override?: string | null): string {
  if (override) return override;
  return platform === "win32" ? WINDOWS_PROGRAM : UNIX_PROGRAM;
}
