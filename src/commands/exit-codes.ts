import type { StageName } from "../types/pipeline.js";

/**
 * CLI exit codes. Each stage has its own code so calling scripts can branch
 * on which stage failed.
 */
export const EXIT = {
  SUCCESS: 0,
  BUILD_FAILED: 1,
  BUNDLE_FAILED: 2,
  INSTALL_FAILED: 3,
  INVALID_ARGS: 4,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

export function exitCodeForStage(stage: StageName): ExitCode {
  switch (stage) {
    case "build":
      return EXIT.BUILD_FAILED;
    case "bundle":
      return EXIT.BUNDLE_FAILED;
    case "install":
      return EXIT.INSTALL_FAILED;
  }
}
