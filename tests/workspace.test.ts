import { describe, it, expect, afterEach } from "vitest";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { WorkspaceError } from "../src/errors";
import { selectWorkspace } from "../src/workspace";
import { makeTempDir } from "./helpers";
import type { TempDir } from "./helpers";

let dir: TempDir | null = null;

afterEach(() => {
  dir?.remove();
  dir = null;
});

describe("selectWorkspace", () => {
  it("lists source files in the root and src/", () => {
    dir = makeTempDir();
    dir.file("main.rs");
    dir.file("lib.rs");
    dir.file("Cargo.toml");
    mkdirSync(join(dir.path, "src"));
    writeFileSync(join(dir.path, "src", "a.rs"), "");
    writeFileSync(join(dir.path, "src", "notes.md"), "");

    const workspace = selectWorkspace(dir.path);

    expect(workspace.root).toBe(dir.path);
    expect(workspace.sourceFiles).toEqual(["lib.rs", "main.rs", "src/a.rs"]);
  });

  it("accepts a folder without src/", () => {
    dir = makeTempDir();

    expect(selectWorkspace(dir.path).sourceFiles).toEqual([]);
  });

  it("rejects a file", () => {
    dir = makeTempDir();
    const file = dir.file("Cargo.toml");

    expect(() => selectWorkspace(file)).toThrow(WorkspaceError);
    expect(() => selectWorkspace(file)).toThrow(`Workspace is not a folder: ${file}`);
  });

  it("rejects a missing folder", () => {
    dir = makeTempDir();
    const missing = join(dir.path, "gone");

    expect(() => selectWorkspace(missing)).toThrow(`Workspace folder does not exist: ${missing}`);
  });
});
