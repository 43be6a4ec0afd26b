import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ProcessHandle, SpawnHooks, Spawner } from "../src/orchestrator";

export const SCENARIO_A = '"a" [label="main@bin_demo"]\n"b" [label="run_trait@bin_demo"]\n"a" -> "b"';

/** Stand-in for a child process; tests drive its output and exit by hand. */
export class FakeProcess implements ProcessHandle {
  readonly pid = 4242;
  readonly signals: NodeJS.Signals[] = [];

  constructor(
    readonly command: string,
    readonly args: string[],
    private readonly hooks: SpawnHooks,
  ) {}

  kill(signal: NodeJS.Signals = "SIGTERM"): boolean {
    this.signals.push(signal);
    return true;
  }

  writeStdout(chunk: string): void {
    this.hooks.onStdout(chunk);
  }

  writeStderr(chunk: string): void {
    this.hooks.onStderr(chunk);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    this.hooks.onExit(code, signal);
  }

  fail(err: Error): void {
    this.hooks.onError(err);
  }
}

export function createFakeSpawner(): { spawn: Spawner; spawned: FakeProcess[] } {
  const spawned: FakeProcess[] = [];
  const spawn: Spawner = (command, args, hooks) => {
    const proc = new FakeProcess(command, [...args], hooks);
    spawned.push(proc);
    return proc;
  };
  return { spawn, spawned };
}

export interface TempDir {
  path: string;
  file(name: string, content?: string): string;
  remove(): void;
}

export function makeTempDir(): TempDir {
  const path = mkdtempSync(join(tmpdir(), "callgraph-test-"));
  return {
    path,
    file(name, content = "") {
      const target = join(path, name);
      writeFileSync(target, content, "utf8");
      return target;
    },
    remove() {
      rmSync(path, { recursive: true, force: true });
    },
  };
}
