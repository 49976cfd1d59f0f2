// pattern: Functional Core

/**
 * A scoped staging directory owned by the ArchiveManager
 */
export interface StagingArea {
  readonly path: string;
  // Base names copied in successfully, in staging order
  readonly staged: string[];
  closed: boolean;
}

export type StageResult =
  | { ok: true; sourcePath: string; stagedPath: string }
  | { ok: false; sourcePath: string; stagingDir: string; cause: Error };

/**
 * The only way the extractor reaches the staging area
 */
export type StageFn = (sourcePath: string) => Promise<StageResult>;

export type SealResult =
  | { status: "sealed"; archivePath: string; entries: string[] }
  | { status: "skipped" }
  | { status: "failed"; archivePath: string; cause: Error };
