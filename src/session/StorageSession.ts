import path from "path";
import { StorageClient } from "../storage/StorageClient";
import { S3StorageClient } from "../storage/S3StorageClient";
import { LocalStorageClient } from "../storage/LocalStorageClient";
import { Logger, consoleLogger } from "../logger";
import { SessionConfig } from "../config";
import { PHASES, Phase, PhaseContext } from "./phases";
import { RunStateMachine } from "./RunStateMachine";
import { DEFAULT_DOWNLOAD_PREFIX, isValidBucketName, timestampOf } from "./naming";
import {
  CancelledError,
  StorageSessionError,
  ValidationError,
  toSessionError,
} from "../errors";
import {
  BucketHandle,
  Payload,
  PhaseName,
  PhaseOutcome,
  PhasePolicy,
  PhaseResult,
  RunReport,
} from "../types";

/**
 * Configuration options for StorageSession
 */
export interface StorageSessionOptions {
  /**
   * Backend every remote call is delegated to
   */
  client: StorageClient;

  /**
   * Progress output (default: console)
   */
  logger?: Logger;

  /**
   * Directory downloaded objects are written to (default: current directory)
   */
  downloadDir?: string;

  /**
   * Prepended to the last key segment to name downloaded files (default: "downloaded_")
   */
  downloadPrefix?: string;

  /**
   * Compare downloaded bytes with the uploaded ones (default: true)
   */
  verifyDownloads?: boolean;

  /**
   * Source of the run timestamp used in object keys
   */
  clock?: () => Date;
}

export interface RunOptions {
  /**
   * Checked between phases; a phase that has started always finishes
   */
  signal?: AbortSignal;
}

/**
 * Drives one bucket through create, upload, list, download, delete and
 * bucket removal, applying each phase's failure policy
 */
export class StorageSession {
  private readonly client: StorageClient;
  private readonly logger: Logger;
  private readonly downloadDir: string;
  private readonly downloadPrefix: string;
  private readonly verifyDownloads: boolean;
  private readonly clock: () => Date;

  /**
   * Creates a new StorageSession
   *
   * @param options - Configuration options
   */
  constructor(options: StorageSessionOptions) {
    this.client = options.client;
    this.logger = options.logger ?? consoleLogger;
    this.downloadDir = path.resolve(options.downloadDir ?? ".");
    this.downloadPrefix = options.downloadPrefix ?? DEFAULT_DOWNLOAD_PREFIX;
    this.verifyDownloads = options.verifyDownloads !== false;
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Builds a session and its storage client from configuration
   */
  static fromConfig(config: SessionConfig, logger?: Logger): StorageSession {
    let client: StorageClient;

    switch (config.backend) {
      case "local":
        client = new LocalStorageClient(config.localRoot);
        break;

      case "s3":
      default:
        client = new S3StorageClient(config.region, {
          endpoint: config.endpoint,
          accessKeyId: config.credentials?.accessKeyId,
          secretAccessKey: config.credentials?.secretAccessKey,
          forcePathStyle: config.forcePathStyle,
          maxAttempts: config.maxAttempts,
        });
        break;
    }

    return new StorageSession({
      client,
      logger,
      downloadDir: config.downloadDir,
      downloadPrefix: config.downloadPrefix,
      verifyDownloads: config.verifyDownloads,
    });
  }

  /**
   * Runs every phase against a bucket
   *
   * @param bucketName - Bucket to create, fill, empty and delete
   * @param payloads - Uploaded in order under `<timestamp>_<name>` keys
   * @returns Report of the run; it ends "aborted" when a fail-fast phase fails
   * @throws ValidationError when the bucket name or payloads are invalid
   */
  async run(
    bucketName: string,
    payloads: readonly Payload[],
    options: RunOptions = {},
  ): Promise<RunReport> {
    validateRunInput(bucketName, payloads);

    const machine = new RunStateMachine();
    const bucket: BucketHandle = { name: bucketName, state: "absent" };
    const context: PhaseContext = {
      client: this.client,
      logger: this.logger,
      bucket,
      payloads,
      timestamp: timestampOf(this.clock()),
      downloadDir: this.downloadDir,
      downloadPrefix: this.downloadPrefix,
      verifyDownloads: this.verifyDownloads,
      objects: [],
      listedKeys: [],
      downloads: [],
    };
    const outcomes: PhaseOutcome[] = [];
    const warnings: string[] = [];

    const report = (
      abortedPhase?: PhaseName,
      error?: StorageSessionError,
    ): RunReport => ({
      state: abortedPhase ? "aborted" : "done",
      exitCode: abortedPhase ? 1 : 0,
      bucket,
      objects: context.objects,
      listedKeys: context.listedKeys,
      downloads: context.downloads,
      phases: outcomes,
      warnings,
      history: machine.getHistory(),
      abortedPhase,
      error,
    });

    this.logger.log(
      `⏳ Starting session on bucket '${bucketName}' with ${payloads.length} payload(s) via ${this.client.provider}`,
    );

    for (const phase of PHASES) {
      if (options.signal?.aborted) {
        const error = new CancelledError(
          `Run cancelled before phase '${phase.name}'`,
        );
        this.logger.error(`❌ ${error.message}`);
        machine.abort();
        return report(phase.name, error);
      }

      this.logger.log(`⏳ ${phase.description}...`);
      const result = await this.executePhase(phase, context);
      outcomes.push({ ...result, phase: phase.name, policy: phase.policy });
      warnings.push(...result.warnings);

      if (result.status === "failed") {
        if (phase.policy === PhasePolicy.FailFast) {
          this.logger.error(
            `❌ Phase '${phase.name}' failed: ${result.error.message}. Aborting run.`,
          );
          machine.abort();
          return report(phase.name, result.error);
        }

        this.logger.warn(
          `⚠️ Phase '${phase.name}' failed: ${result.error.message}. Continuing.`,
        );
      }

      machine.transition(phase.completes);
    }

    machine.transition("done");
    this.logger.log(`✅ Session on bucket '${bucketName}' completed`);
    return report();
  }

  private async executePhase(
    phase: Phase,
    context: PhaseContext,
  ): Promise<PhaseResult> {
    try {
      return await phase.execute(context);
    } catch (caught: unknown) {
      const error = toSessionError(caught);
      return { status: "failed", results: [], warnings: [], error };
    }
  }
}

function validateRunInput(
  bucketName: string,
  payloads: readonly Payload[],
): void {
  if (!isValidBucketName(bucketName)) {
    throw new ValidationError(`Invalid bucket name: '${bucketName}'`);
  }

  const seen = new Set<string>();
  for (const payload of payloads) {
    if (!payload.name || payload.name.includes("/")) {
      throw new ValidationError(`Invalid payload name: '${payload.name}'`);
    }
    if (seen.has(payload.name)) {
      throw new ValidationError(`Duplicate payload name: '${payload.name}'`);
    }
    seen.add(payload.name);
  }
}
