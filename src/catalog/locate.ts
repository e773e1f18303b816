import path from "node:path";

import fse from "fs-extra";

import { COMPOSE_FILE_NAMES } from "./compose.js";

export type EnvironmentLocation = {
  id: string;
  dir: string;
  composePath: string;
};

const ID_PATTERN = /^[^/\\\0]+\/[^/\\\0]+$/;

/**
 * Maps an environment id back to its directory. Returns null for ids that are
 * malformed, escape the catalog root, or no longer hold a composition file.
 */
export async function locateEnvironment(
  catalogRoot: string,
  id: string,
): Promise<EnvironmentLocation | null> {
  if (!ID_PATTERN.test(id)) return null;

  const root = path.resolve(catalogRoot);
  const dir = path.resolve(root, id);
  const relative = path.relative(root, dir);
  if (!relative || relative.startsWith("..") || path.isAbsolute(relative)) {
    return null;
  }
  if (relative.split(path.sep).length !== 2) {
    return null;
  }

  for (const name of COMPOSE_FILE_NAMES) {
    const composePath = path.join(dir, name);
    if (await fse.pathExists(composePath)) {
      return { id, dir, composePath };
    }
  }

  return null;
}
