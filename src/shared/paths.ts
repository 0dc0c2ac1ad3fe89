import { homedir } from "node:os";
import { isAbsolute, join, resolve } from "node:path";

/** Expand a leading `~` to the current user's home directory. */
export function expandHome(pathInput: string): string {
  if (pathInput === "~") return homedir();
  if (pathInput.startsWith("~/")) return join(homedir(), pathInput.slice(2));
  return pathInput;
}

/**
 * Resolve a user-supplied path. Relative paths are taken from `baseDir`,
 * never from the process cwd.
 */
export function resolveAgainst(baseDir: string, pathInput: string): string {
  const expanded = expandHome(pathInput.trim());
  return isAbsolute(expanded) ? resolve(expanded) : resolve(baseDir, expanded);
}
