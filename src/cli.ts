#!/usr/bin/env node
import { writeFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { CallGraphApp } from "./app";
import { loadConfig } from "./config";
import { configureLogging } from "./logger";
import { renderViewportSvg } from "./react";
import { Viewport } from "./viewport";

const HELP = `
Usage:
  callgraph-view analyze --workspace <dir> [options]   Run the engine, render its graph
  callgraph-view render <artifact.dot> [options]        Render an existing artifact

Options:
  --workspace  Project folder to analyse
  --out        SVG file to write (default: callgraph.svg)
  --engine     Engine passed to the backend (syn, scip)
  --backend    Path to the analysis executable
  --width      Viewport width in pixels (default: 1400)
  --height     Viewport height in pixels (default: 900)
  --log-level  error, warn, info, verbose, debug, silly
  --help       Show this help

Environment:
  CALLGRAPH_BACKEND, CALLGRAPH_OUTPUT, CALLGRAPH_ENGINE,
  CALLGRAPH_LOG_LEVEL, CALLGRAPH_LOG_FILE
`;

function parseSize(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new Error(`--${name} must be a positive integer`);
  return n;
}

function writeSvg(viewport: Viewport, out: string): void {
  writeFileSync(out, renderViewportSvg(viewport), "utf8");
  console.log(`Wrote ${out}`);
}

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      workspace: { type: "string", short: "w" },
      out: { type: "string", short: "o" },
      engine: { type: "string", short: "e" },
      backend: { type: "string", short: "b" },
      width: { type: "string" },
      height: { type: "string" },
      "log-level": { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  const command = positionals[0];
  if (values.help || !command) {
    console.log(HELP);
    return 0;
  }

  const overrides: Record<string, string> = {};
  if (values.engine) overrides.engine = values.engine;
  if (values.backend) overrides.backendPath = values.backend;
  if (values["log-level"]) overrides.logLevel = values["log-level"];
  const config = loadConfig(overrides);
  configureLogging({ level: config.logLevel, file: config.logFile });

  const viewport = {
    width: parseSize(values.width, "width"),
    height: parseSize(values.height, "height"),
  };
  const out = values.out ?? "callgraph.svg";

  switch (command) {
    case "render": {
      const artifact = positionals[1];
      if (!artifact) {
        console.error("render: missing artifact path");
        return 2;
      }
      const view = new Viewport(viewport);
      const result = view.load(artifact);
      writeSvg(view, out);
      if (!result.ok) {
        console.error(result.error.message);
        return 1;
      }
      console.log(`${result.nodeCount} nodes, ${result.edgeCount} edges`);
      return 0;
    }

    case "analyze": {
      if (!values.workspace) {
        console.error("analyze: --workspace is required");
        return 2;
      }
      const app = new CallGraphApp({ config, viewport });
      if (!app.selectWorkspace(values.workspace)) {
        console.error(app.status);
        return 1;
      }

      // never leave the engine running behind us
      const terminate = (): void => {
        app.shutdown();
        process.exit(130);
      };
      process.once("SIGINT", terminate);
      process.once("SIGTERM", terminate);
      app.runAnalysis();
      await app.waitForIdle();
      process.off("SIGINT", terminate);
      process.off("SIGTERM", terminate);

      writeSvg(app.viewport, out);
      console.log(app.status);
      return app.viewport.getState().kind === "graph" ? 0 : 1;
    }

    default:
      console.error(`Unknown command: ${command}`);
      console.log(HELP);
      return 2;
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exitCode = 1;
  },
);
