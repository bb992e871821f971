import type { StorageSessionError } from "./errors";

/**
 * Lifecycle of the bucket a session works in
 */
export type BucketState =
  | "absent"
  | "creating"
  | "present"
  | "deleting"
  | "deleted";

export interface BucketHandle {
  readonly name: string;
  state: BucketState;
}

export type UploadState = "pending" | "uploaded" | "failed";

/**
 * An object uploaded (or attempted) during a run
 */
export interface ObjectRecord {
  /** `<timestamp>_<name>`, fixed once assigned */
  readonly key: string;
  readonly name: string;
  readonly payload: Uint8Array;
  readonly sourcePath?: string;
  state: UploadState;
}

/**
 * Something to upload: inline bytes (strings are UTF-8) or a local file
 */
export type Payload =
  | { name: string; data: Uint8Array | string }
  | { name: string; path: string };

export type TransferOperation =
  | "createBucket"
  | "upload"
  | "list"
  | "download"
  | "deleteObject"
  | "deleteBucket";

/**
 * Outcome of a single remote call. Bucket-level operations use the bucket
 * name as `key`.
 */
export type TransferResult =
  | {
      ok: true;
      operation: TransferOperation;
      key: string;
      bytes?: number;
      localPath?: string;
      detail?: string;
    }
  | {
      ok: false;
      operation: TransferOperation;
      key: string;
      error: StorageSessionError;
    };

export const PhasePolicy = {
  BestEffort: "best-effort",
  FailFast: "fail-fast",
} as const;

export type PhasePolicy = (typeof PhasePolicy)[keyof typeof PhasePolicy];

export type PhaseName =
  | "ensureBucket"
  | "upload"
  | "list"
  | "download"
  | "deleteObjects"
  | "deleteBucket";

export type RunState =
  | "init"
  | "bucketEnsured"
  | "uploaded"
  | "listed"
  | "downloaded"
  | "objectsDeleted"
  | "bucketDeleted"
  | "done"
  | "aborted";

/**
 * What a phase hands back to the driver. `partial` means the phase
 * completed but skipped something (see `warnings`).
 */
export type PhaseResult =
  | {
      status: "success" | "partial";
      results: TransferResult[];
      warnings: string[];
    }
  | {
      status: "failed";
      results: TransferResult[];
      warnings: string[];
      error: StorageSessionError;
    };

export type PhaseOutcome = PhaseResult & {
  phase: PhaseName;
  policy: PhasePolicy;
};

export interface DownloadedFile {
  key: string;
  localPath: string;
  bytes: number;
}

export interface RunReport {
  state: "done" | "aborted";
  /** 0 when the run is done, 1 when it was aborted */
  exitCode: 0 | 1;
  bucket: BucketHandle;
  objects: ObjectRecord[];
  listedKeys: string[];
  downloads: DownloadedFile[];
  phases: PhaseOutcome[];
  warnings: string[];
  history: RunState[];
  abortedPhase?: PhaseName;
  error?: StorageSessionError;
}
