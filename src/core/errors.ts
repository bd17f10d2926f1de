import type { StageName } from "../types/pipeline.js";

export type PipelineErrorCode =
  | "BUILD_FAILED"
  | "MISSING_ARTIFACT"
  | "BUNDLE_WRITE_FAILED"
  | "INSTALL_FAILED";

export type Diagnostic = {
  level: "error" | "warn" | "info";
  code: string;
  message: string;
  stage?: StageName;
  path?: string;
  details?: Record<string, unknown>;
};

type ErrorContext = {
  path?: string;
  osCode?: string;
  cause?: unknown;
};

/**
 * Base class for every failure the pipeline reports. Carries enough context
 * (stage, path, OS error code) to print a one-line diagnostic.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: PipelineErrorCode;
  readonly stage: StageName;
  readonly path?: string;
  readonly osCode?: string;

  constructor(stage: StageName, message: string, context: ErrorContext = {}) {
    super(message, context.cause === undefined ? undefined : { cause: context.cause });
    this.name = new.target.name;
    this.stage = stage;
    this.path = context.path;
    this.osCode = context.osCode;
  }

  protected details(): Record<string, unknown> | undefined {
    return this.osCode ? { osCode: this.osCode } : undefined;
  }

  toDiagnostic(): Diagnostic {
    const diagnostic: Diagnostic = {
      level: "error",
      code: this.code,
      message: this.message,
      stage: this.stage,
    };
    if (this.path) diagnostic.path = this.path;
    const details = this.details();
    if (details) diagnostic.details = details;
    return diagnostic;
  }
}

export class BuildFailedError extends PipelineError {
  readonly code = "BUILD_FAILED";
  readonly profile: string;
  readonly target: string;
  /** Toolchain exit status; null when no process ran or it was killed. */
  readonly exitCode: number | null;

  constructor(
    opts: { profile: string; target: string; exitCode: number | null },
    message: string,
    context: ErrorContext = {},
  ) {
    super("build", message, context);
    this.profile = opts.profile;
    this.target = opts.target;
    this.exitCode = opts.exitCode;
  }

  protected override details(): Record<string, unknown> {
    return {
      profile: this.profile,
      target: this.target,
      exitCode: this.exitCode,
      ...super.details(),
    };
  }
}

export class MissingArtifactError extends PipelineError {
  readonly code = "MISSING_ARTIFACT";

  constructor(stage: StageName, artifactPath: string, context: Omit<ErrorContext, "path"> = {}) {
    super(stage, `Build artifact not found: ${artifactPath}`, { ...context, path: artifactPath });
  }
}

export class BundleWriteFailedError extends PipelineError {
  readonly code = "BUNDLE_WRITE_FAILED";

  constructor(message: string, context: ErrorContext = {}) {
    super("bundle", message, context);
  }
}

export class InstallFailedError extends PipelineError {
  readonly code = "INSTALL_FAILED";

  constructor(message: string, context: ErrorContext = {}) {
    super("install", message, context);
  }
}

export function isPipelineError(value: unknown): value is PipelineError {
  return value instanceof PipelineError;
}

/** Extract the errno-style code (`EACCES`, `ENOENT`, ...) from a thrown value. */
export function osErrorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
