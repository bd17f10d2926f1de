import {
  BuildFailedError,
  BundleWriteFailedError,
  InstallFailedError,
  PipelineError,
  errorMessage,
  isPipelineError,
  osErrorCode,
} from "./errors.js";
import { silentReporter, type Reporter } from "./reporter.js";
import type {
  Artifact,
  Bundle,
  BundleSpec,
  BuildSpec,
  InstallTarget,
  StageName,
} from "../types/pipeline.js";

export type StepResult = {
  status: "success" | "failed";
  duration_ms: number;
  error?: string;
};

export type StepResults = Partial<Record<StageName, StepResult>>;

/** The three stages, each consuming only the previous stage's output. */
export type PipelineStages = {
  build: (spec: BuildSpec) => Promise<Artifact>;
  bundle: (spec: BundleSpec) => Bundle | Promise<Bundle>;
  install: (bundle: Bundle, target: InstallTarget) => void | Promise<void>;
  /** Where `install` puts the bundle; reported on success. */
  installedPath: (bundle: Bundle, target: InstallTarget) => string;
};

export type PipelineInput = {
  build: BuildSpec;
  productName: string;
  installTarget: InstallTarget;
};

export type PipelineResult =
  | {
      success: true;
      artifact: Artifact;
      bundle: Bundle;
      installedPath: string;
      step_results: StepResults;
    }
  | {
      success: false;
      failedStage: StageName;
      error: PipelineError;
      step_results: StepResults;
    };

class StageFailure extends Error {
  constructor(
    readonly stage: StageName,
    readonly error: PipelineError,
  ) {
    super(error.message);
  }
}

/**
 * Pipeline: build → bundle → install, fail-fast.
 *
 * Each stage is timed and reported; the first failure stops the run and the
 * remaining stages never start.
 */
export class Pipeline {
  private readonly stages: PipelineStages;
  private readonly reporter: Reporter;

  constructor(stages: PipelineStages, reporter: Reporter = silentReporter) {
    this.stages = stages;
    this.reporter = reporter;
  }

  async run(input: PipelineInput): Promise<PipelineResult> {
    const step_results: StepResults = {};

    try {
      const artifact = await this.step("build", step_results, input, () => this.stages.build(input.build));
      this.reporter.info({ code: "BUILD_OK", message: `Built ${artifact.path}`, stage: "build", path: artifact.path });

      const bundle = await this.step("bundle", step_results, input, () =>
        this.stages.bundle({ sourceArtifact: artifact, productName: input.productName }),
      );
      this.reporter.info({ code: "BUNDLE_OK", message: `Bundled ${bundle.rootPath}`, stage: "bundle", path: bundle.rootPath });

      await this.step("install", step_results, input, () => this.stages.install(bundle, input.installTarget));
      const installedPath = this.stages.installedPath(bundle, input.installTarget);
      this.reporter.info({ code: "INSTALL_OK", message: `Installed ${installedPath}`, stage: "install", path: installedPath });

      return { success: true, artifact, bundle, installedPath, step_results };
    } catch (e: unknown) {
      if (!(e instanceof StageFailure)) throw e;
      this.reporter.error(e.error.toDiagnostic());
      return { success: false, failedStage: e.stage, error: e.error, step_results };
    }
  }

  private async step<T>(
    stage: StageName,
    results: StepResults,
    input: PipelineInput,
    fn: () => T | Promise<T>,
  ): Promise<T> {
    const start = Date.now();
    try {
      const value = await fn();
      results[stage] = { status: "success", duration_ms: Date.now() - start };
      return value;
    } catch (e: unknown) {
      const error = toStageError(stage, e, input);
      results[stage] = { status: "failed", duration_ms: Date.now() - start, error: error.message };
      throw new StageFailure(stage, error);
    }
  }
}

/** Keep taxonomy errors as thrown; wrap anything else in the stage's own error type. */
export function toStageError(stage: StageName, err: unknown, input: PipelineInput): PipelineError {
  if (isPipelineError(err)) return err;
  const context = { osCode: osErrorCode(err), cause: err };
  const message = errorMessage(err);
  switch (stage) {
    case "build":
      return new BuildFailedError(
        { profile: input.build.profile, target: input.build.target, exitCode: null },
        message,
        context,
      );
    case "bundle":
      return new BundleWriteFailedError(message, context);
    case "install":
      return new InstallFailedError(message, context);
  }
}
