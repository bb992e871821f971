import fs from "fs-extra";
import { StorageClient } from "../storage/StorageClient";
import { Logger } from "../logger";
import { loadPayload } from "../utils/PayloadLoader";
import { downloadPath, objectKey } from "./naming";
import {
  BucketAlreadyExistsError,
  ConsistencyError,
  DownloadConflictError,
  IntegrityError,
  StateError,
  StorageSessionError,
  toSessionError,
} from "../errors";
import {
  BucketHandle,
  DownloadedFile,
  ObjectRecord,
  Payload,
  PhaseName,
  PhasePolicy,
  PhaseResult,
  RunState,
  TransferOperation,
  TransferResult,
} from "../types";

/**
 * Everything a phase reads or appends to during one run
 */
export interface PhaseContext {
  readonly client: StorageClient;
  readonly logger: Logger;
  readonly bucket: BucketHandle;
  readonly payloads: readonly Payload[];
  readonly timestamp: string;
  readonly downloadDir: string;
  readonly downloadPrefix: string;
  readonly verifyDownloads: boolean;
  readonly objects: ObjectRecord[];
  readonly listedKeys: string[];
  readonly downloads: DownloadedFile[];
}

export interface Phase {
  readonly name: PhaseName;
  readonly policy: PhasePolicy;
  /** Run state reached once the phase has been handled */
  readonly completes: RunState;
  readonly description: string;
  execute(context: PhaseContext): Promise<PhaseResult>;
}

function succeeded(
  operation: TransferOperation,
  key: string,
  extra: { bytes?: number; localPath?: string; detail?: string } = {},
): TransferResult {
  return { ok: true, operation, key, ...extra };
}

function failed(
  operation: TransferOperation,
  key: string,
  error: StorageSessionError,
): TransferResult {
  return { ok: false, operation, key, error };
}

function requirePresent(bucket: BucketHandle): void {
  if (bucket.state !== "present") {
    throw new StateError(
      `Bucket '${bucket.name}' is ${bucket.state}; object operations need it present`,
    );
  }
}

export const ensureBucketPhase: Phase = {
  name: "ensureBucket",
  policy: PhasePolicy.BestEffort,
  completes: "bucketEnsured",
  description: "Creating bucket",
  async execute({ client, logger, bucket }) {
    bucket.state = "creating";

    try {
      await client.createBucket(bucket.name);
      bucket.state = "present";
      logger.log(`✅ Bucket '${bucket.name}' created.`);
      return {
        status: "success",
        results: [succeeded("createBucket", bucket.name)],
        warnings: [],
      };
    } catch (caught: unknown) {
      const error = toSessionError(caught);
      // Later phases are attempted either way; they fail fast if the
      // bucket really is missing
      bucket.state = "present";

      if (error instanceof BucketAlreadyExistsError) {
        logger.log(`ℹ️ Bucket '${bucket.name}' already exists.`);
        return {
          status: "success",
          results: [
            succeeded("createBucket", bucket.name, { detail: "already exists" }),
          ],
          warnings: [],
        };
      }

      return {
        status: "failed",
        results: [failed("createBucket", bucket.name, error)],
        warnings: [
          `Bucket '${bucket.name}' could not be created: ${error.message}`,
        ],
        error,
      };
    }
  },
};

export const uploadPhase: Phase = {
  name: "upload",
  policy: PhasePolicy.FailFast,
  completes: "uploaded",
  description: "Uploading payloads",
  async execute({ client, logger, bucket, payloads, timestamp, objects }) {
    const results: TransferResult[] = [];
    const warnings: string[] = [];

    requirePresent(bucket);

    for (const payload of payloads) {
      const key = objectKey(timestamp, payload.name);
      let record: ObjectRecord | undefined;

      try {
        const loaded = await loadPayload(payload);

        if (loaded.status === "missing") {
          const warning = `File '${loaded.sourcePath}' not found. Skipping upload.`;
          logger.warn(`⚠️ ${warning}`);
          warnings.push(warning);
          continue;
        }

        record = {
          key,
          name: payload.name,
          payload: loaded.data,
          sourcePath: loaded.sourcePath,
          state: "pending",
        };
        objects.push(record);

        await client.putObject(bucket.name, key, record.payload);
        record.state = "uploaded";
        results.push(
          succeeded("upload", key, { bytes: record.payload.byteLength }),
        );
        logger.log(`✅ Uploaded: ${key}`);
      } catch (caught: unknown) {
        const error = toSessionError(caught);
        if (record) {
          record.state = "failed";
        }
        results.push(failed("upload", key, error));
        return { status: "failed", results, warnings, error };
      }
    }

    return {
      status: warnings.length > 0 ? "partial" : "success",
      results,
      warnings,
    };
  },
};

export const listPhase: Phase = {
  name: "list",
  policy: PhasePolicy.FailFast,
  completes: "listed",
  description: "Listing objects",
  async execute({ client, logger, bucket, objects, listedKeys }) {
    requirePresent(bucket);

    let keys: string[];
    try {
      keys = await client.listObjects(bucket.name);
    } catch (caught: unknown) {
      const error = toSessionError(caught);
      return {
        status: "failed",
        results: [failed("list", bucket.name, error)],
        warnings: [],
        error,
      };
    }

    listedKeys.push(...keys);
    logger.log("📋 Objects in bucket:");
    for (const key of keys) {
      logger.log(`- ${key}`);
    }

    const listed = new Set(keys);
    const missingKeys = objects
      .filter((object) => object.state === "uploaded" && !listed.has(object.key))
      .map((object) => object.key);

    if (missingKeys.length > 0) {
      const error = new ConsistencyError(
        `Listing of '${bucket.name}' is missing uploaded objects: ${missingKeys.join(", ")}`,
        missingKeys,
      );
      return {
        status: "failed",
        results: [failed("list", bucket.name, error)],
        warnings: [],
        error,
      };
    }

    return {
      status: "success",
      results: [succeeded("list", bucket.name, { detail: `${keys.length} keys` })],
      warnings: [],
    };
  },
};

export const downloadPhase: Phase = {
  name: "download",
  policy: PhasePolicy.FailFast,
  completes: "downloaded",
  description: "Downloading objects",
  async execute(context) {
    const { client, logger, bucket, listedKeys, objects, downloads } = context;
    const results: TransferResult[] = [];

    requirePresent(bucket);

    // Every target is known before the first write
    const planned: Array<{ key: string; localPath: string }> = [];
    const owners = new Map<string, string>();
    for (const key of listedKeys) {
      try {
        const localPath = downloadPath(
          context.downloadDir,
          key,
          context.downloadPrefix,
        );
        const owner = owners.get(localPath);
        if (owner !== undefined) {
          throw new DownloadConflictError(
            `Objects '${owner}' and '${key}' would both be downloaded to '${localPath}'`,
            [owner, key],
          );
        }
        owners.set(localPath, key);
        planned.push({ key, localPath });
      } catch (caught: unknown) {
        const error = toSessionError(caught);
        results.push(failed("download", key, error));
        return { status: "failed", results, warnings: [], error };
      }
    }

    for (const { key, localPath } of planned) {
      try {
        const data = await client.getObject(bucket.name, key);

        const uploaded = objects.find(
          (object) => object.key === key && object.state === "uploaded",
        );
        if (
          context.verifyDownloads &&
          uploaded &&
          !Buffer.from(uploaded.payload).equals(data)
        ) {
          throw new IntegrityError(
            `Downloaded content of '${key}' differs from what was uploaded`,
            key,
          );
        }

        await fs.outputFile(localPath, data);

        downloads.push({ key, localPath, bytes: data.byteLength });
        results.push(
          succeeded("download", key, { bytes: data.byteLength, localPath }),
        );
        logger.log(`✅ Downloaded: ${localPath}`);
      } catch (caught: unknown) {
        const error = toSessionError(caught);
        results.push(failed("download", key, error));
        return { status: "failed", results, warnings: [], error };
      }
    }

    return { status: "success", results, warnings: [] };
  },
};

export const deleteObjectsPhase: Phase = {
  name: "deleteObjects",
  policy: PhasePolicy.FailFast,
  completes: "objectsDeleted",
  description: "Deleting objects",
  async execute({ client, logger, bucket, listedKeys }) {
    const results: TransferResult[] = [];

    requirePresent(bucket);

    for (const key of listedKeys) {
      try {
        await client.deleteObject(bucket.name, key);
        results.push(succeeded("deleteObject", key));
        logger.log(`🗑️ Deleted: ${key}`);
      } catch (caught: unknown) {
        const error = toSessionError(caught);
        results.push(failed("deleteObject", key, error));
        return { status: "failed", results, warnings: [], error };
      }
    }

    return { status: "success", results, warnings: [] };
  },
};

export const deleteBucketPhase: Phase = {
  name: "deleteBucket",
  policy: PhasePolicy.BestEffort,
  completes: "bucketDeleted",
  description: "Deleting bucket",
  async execute({ client, logger, bucket }) {
    bucket.state = "deleting";

    try {
      await client.deleteBucket(bucket.name);
      bucket.state = "deleted";
      logger.log(`✅ Bucket '${bucket.name}' deleted.`);
      return {
        status: "success",
        results: [succeeded("deleteBucket", bucket.name)],
        warnings: [],
      };
    } catch (caught: unknown) {
      const error = toSessionError(caught);
      bucket.state = "present";
      return {
        status: "failed",
        results: [failed("deleteBucket", bucket.name, error)],
        warnings: [
          `Bucket '${bucket.name}' could not be deleted: ${error.message}`,
        ],
        error,
      };
    }
  },
};

/**
 * The fixed order a session runs in. Each phase depends on the one before.
 */
export const PHASES: readonly Phase[] = [
  ensureBucketPhase,
  uploadPhase,
  listPhase,
  downloadPhase,
  deleteObjectsPhase,
  deleteBucketPhase,
];
