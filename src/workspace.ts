import { existsSync, readdirSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import { WorkspaceError } from "./errors";

export const SOURCE_EXTENSION = ".rs";

export interface Workspace {
  root: string;
  /** Source files in the root and its `src/` folder, relative to root. */
  sourceFiles: string[];
}

function listSources(dir: string, prefix: string): string[] {
  if (!existsSync(dir)) return [];
  return readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(SOURCE_EXTENSION))
    .map((entry) => entry.name)
    .sort()
    .map((name) => prefix + name);
}

/** Validate a folder chosen as the analysis target and list its sources. */
export function selectWorkspace(path: string): Workspace {
  const root = resolve(path);
  let isDir: boolean;
  try {
    isDir = statSync(root).isDirectory();
  } catch (err) {
    throw new WorkspaceError(root, "Workspace folder does not exist", err);
  }
  if (!isDir) throw new WorkspaceError(root, "Workspace is not a folder");

  return {
    root,
    sourceFiles: [...listSources(root, ""), ...listSources(join(root, "src"), "src/")],
  };
}
