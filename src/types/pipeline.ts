/** Values passed stage to stage. Each is created once per run and never mutated. */

export type StageName = "build" | "bundle" | "install";

export type BuildSpec = Readonly<{
  profile: string;
  target: string;
}>;

export type Artifact = Readonly<{
  path: string;
}>;

export type BundleSpec = Readonly<{
  sourceArtifact: Artifact;
  productName: string;
}>;

export type Bundle = Readonly<{
  rootPath: string;
  binaryPath: string;
}>;

export type InstallTarget = Readonly<{
  destinationRoot: string;
}>;
