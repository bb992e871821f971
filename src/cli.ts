#!/usr/bin/env node

import { Command } from "commander";
import path from "path";
import { loadConfig, loadEnvFile } from "./config";
import { StorageSessionError, ValidationError } from "./errors";
import { Logger, consoleLogger } from "./logger";
import { StorageSession } from "./session/StorageSession";
import { Payload, RunReport } from "./types";

interface CliOptions {
  bucket?: string;
  endpoint?: string;
  region?: string;
  downloadDir?: string;
  prefix?: string;
  backend?: string;
  localRoot?: string;
  envFile?: string;
  text: string[];
  verify: boolean;
}

/**
 * Payloads used when none are given: one inline text object and two
 * optional sample files
 */
export const DEFAULT_PAYLOADS: readonly Payload[] = [
  { name: "hello.txt", data: "Hello World" },
  { name: "sample.png", path: "sample.png" },
  { name: "sample.jpg", path: "sample.jpg" },
];

/**
 * Parses `name=content` into an inline payload
 */
export function parseTextPayload(value: string): Payload {
  const separator = value.indexOf("=");
  if (separator <= 0) {
    throw new ValidationError(
      `Inline payload must look like name=content, got '${value}'`,
    );
  }
  return {
    name: value.slice(0, separator),
    data: value.slice(separator + 1),
  };
}

export function collectPayloads(files: string[], texts: string[]): Payload[] {
  const payloads: Payload[] = [
    ...texts.map(parseTextPayload),
    ...files.map((file) => ({ name: path.basename(file), path: file })),
  ];
  return payloads.length > 0 ? payloads : [...DEFAULT_PAYLOADS];
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function definedEntries(
  values: Record<string, string | undefined>,
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function printSummary(report: RunReport, logger: Logger): void {
  logger.log("");
  logger.log(`📊 Run ${report.state} (${report.history.join(" -> ")})`);
  for (const outcome of report.phases) {
    logger.log(`  ${outcome.phase} [${outcome.policy}]: ${outcome.status}`);
  }
  for (const warning of report.warnings) {
    logger.warn(`  ⚠️ ${warning}`);
  }
  if (report.state === "aborted") {
    logger.error(
      `❌ Aborted in phase '${report.abortedPhase}': ${report.error?.message ?? "unknown error"}`,
    );
  }
}

async function execute(
  files: string[],
  options: CliOptions,
  env: NodeJS.ProcessEnv,
  logger: Logger,
): Promise<number> {
  const resolvedEnv: NodeJS.ProcessEnv = { ...env };
  loadEnvFile(
    options.envFile ?? path.resolve(".env"),
    resolvedEnv,
    options.envFile !== undefined,
  );

  // Flags win over the environment and the .env file
  const config = loadConfig({
    ...resolvedEnv,
    ...definedEntries({
      S3_BUCKET: options.bucket,
      S3_ENDPOINT: options.endpoint,
      S3_REGION: options.region,
      DOWNLOAD_DIR: options.downloadDir,
      DOWNLOAD_PREFIX: options.prefix,
      STORAGE_BACKEND: options.backend,
      STORAGE_ROOT: options.localRoot,
      VERIFY_DOWNLOADS: options.verify ? undefined : "false",
    }),
  });

  const payloads = collectPayloads(files, options.text);
  const session = StorageSession.fromConfig(config, logger);

  const controller = new AbortController();
  const onInterrupt = (): void => {
    logger.warn("⚠️ Interrupted, stopping after the current phase...");
    controller.abort();
  };
  process.once("SIGINT", onInterrupt);

  try {
    const report = await session.run(config.bucketName, payloads, {
      signal: controller.signal,
    });
    printSummary(report, logger);
    return report.exitCode;
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}

/**
 * Entry point of the `bucket-session` command
 *
 * @param argv - Arguments after the executable and script
 * @returns Process exit code: 0 when the run is done, 1 otherwise
 */
export async function main(
  argv: string[],
  env: NodeJS.ProcessEnv = process.env,
  logger: Logger = consoleLogger,
): Promise<number> {
  let exitCode = 0;
  const program = new Command();

  program
    .name("bucket-session")
    .description(
      "Create a bucket, upload files, list, download and delete them, then delete the bucket",
    )
    .version("0.1.0")
    .argument("[files...]", "local files to upload")
    .option("-b, --bucket <name>", "bucket name (S3_BUCKET)")
    .option("-e, --endpoint <url>", "S3-compatible endpoint (S3_ENDPOINT)")
    .option("-r, --region <region>", "region (S3_REGION)")
    .option("-d, --download-dir <dir>", "where downloads are written (DOWNLOAD_DIR)")
    .option("--prefix <prefix>", "prefix of downloaded file names, \"\" for none (DOWNLOAD_PREFIX)")
    .option("--backend <backend>", "s3 or local (STORAGE_BACKEND)")
    .option("--local-root <dir>", "root directory of the local backend (STORAGE_ROOT)")
    .option("--env-file <path>", "environment file to load (default: ./.env)")
    .option("-t, --text <name=content>", "inline payload, repeatable", collect, [])
    .option("--no-verify", "skip comparing downloads with uploads")
    .action(async (files: string[], options: CliOptions) => {
      try {
        exitCode = await execute(files, options, env, logger);
      } catch (error: unknown) {
        if (!(error instanceof StorageSessionError)) {
          throw error;
        }
        logger.error(`❌ ${error.message}`);
        exitCode = 1;
      }
    });

  await program.parseAsync(argv, { from: "user" });
  return exitCode;
}

if (require.main === module) {
  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(
        "❌ Fatal error:",
        error instanceof Error ? error.message : String(error),
      );
      process.exitCode = 1;
    });
}
