// Export the session orchestrator
export {
  StorageSession,
  StorageSessionOptions,
  RunOptions,
} from "./session/StorageSession";
export { RunStateMachine } from "./session/RunStateMachine";
export { PHASES, Phase, PhaseContext } from "./session/phases";
export {
  downloadPath,
  isValidBucketName,
  localFileName,
  objectKey,
  timestampOf,
} from "./session/naming";

// Storage clients, for custom backends implement StorageClient
export { StorageClient } from "./storage/StorageClient";
export {
  S3StorageClient,
  S3StorageClientOptions,
  mapS3Error,
} from "./storage/S3StorageClient";
export { LocalStorageClient } from "./storage/LocalStorageClient";

export { SessionConfig, StorageBackend, loadConfig, loadEnvFile } from "./config";
export { Logger, consoleLogger, silentLogger } from "./logger";
export * from "./errors";
export * from "./types";
