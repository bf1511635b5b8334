import { existsSync, statSync } from "fs";
import path from "path";

export const COMPOSE_FILE_NAMES = [
  "compose.yaml",
  "compose.yml",
  "docker-compose.yaml",
  "docker-compose.yml",
];

export function findFileUpwards(
  startDir: string,
  candidateFilenames: string[] = COMPOSE_FILE_NAMES,
): string | null {
  let current = path.resolve(startDir);
  while (true) {
    for (const name of candidateFilenames) {
      const p = path.join(current, name);
      if (existsSync(p)) return p;
    }
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return null;
}

/**
 * Resolves the compose file to load. An explicit path is used as given (a
 * directory is searched from there); without one the search starts at `cwd`.
 * Returns null when nothing is found so the loader can report the path.
 */
export function resolveComposePath(
  input?: string,
  cwd: string = process.cwd(),
): string | null {
  if (input && input.trim().length > 0) {
    const given = path.resolve(cwd, input);
    if (!existsSync(given)) return null;
    if (statSync(given).isDirectory()) {
      return findFileUpwards(given);
    }
    return given;
  }
  return findFileUpwards(cwd);
}
