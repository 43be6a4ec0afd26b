export type CallGraphErrorCode =
  | "ARTIFACT_IO"
  | "PROCESS_SPAWN"
  | "PROCESS_FAILURE"
  | "EMPTY_GRAPH"
  | "NO_ARTIFACT"
  | "WORKSPACE"
  | "CONFIG";

/** Base class for every recoverable failure in the load/analysis pipeline. */
export abstract class CallGraphError extends Error {
  abstract readonly code: CallGraphErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The artifact file could not be opened or read. */
export class ArtifactIoError extends CallGraphError {
  readonly code = "ARTIFACT_IO";

  constructor(
    readonly path: string,
    cause?: unknown,
  ) {
    super(`Failed to read artifact ${path}`, { cause });
  }
}

/** The analysis executable is missing or could not be executed. */
export class ProcessSpawnError extends CallGraphError {
  readonly code = "PROCESS_SPAWN";

  constructor(
    readonly command: string,
    cause?: unknown,
  ) {
    super(`Could not start ${command}`, { cause });
  }
}

export class ProcessFailure extends CallGraphError {
  readonly code = "PROCESS_FAILURE";

  constructor(
    readonly exitCode: number | null,
    readonly signal: string | null,
    readonly stderr: string,
  ) {
    super(
      exitCode !== null
        ? `Analysis exited with code ${exitCode}`
        : `Analysis terminated by ${signal ?? "unknown signal"}`,
    );
  }
}

/** The artifact parsed cleanly but declared no nodes. */
export class EmptyGraphResult extends CallGraphError {
  readonly code = "EMPTY_GRAPH";

  constructor(readonly path: string) {
    super(`No nodes found in ${path}`);
  }
}

/** The process exited 0 without writing its artifact. */
export class NoArtifactProduced extends CallGraphError {
  readonly code = "NO_ARTIFACT";

  constructor(readonly path: string) {
    super(`Analysis completed but ${path} was not written`);
  }
}

export class WorkspaceError extends CallGraphError {
  readonly code = "WORKSPACE";

  constructor(
    readonly path: string,
    reason: string,
    cause?: unknown,
  ) {
    super(`${reason}: ${path}`, { cause });
  }
}

export class ConfigError extends CallGraphError {
  readonly code = "CONFIG";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}
