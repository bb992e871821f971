import { StorageSession } from "../../src";
import { config } from "./config";

/**
 * Example running a full bucket session against an S3-compatible endpoint
 *
 * Prerequisites:
 * 1. Start an S3-compatible service on the endpoint in config.ts
 * 2. Optionally put sample.png and sample.jpg in the working directory
 *    (they are skipped with a warning when absent)
 */
async function main() {
  const session = StorageSession.fromConfig(config);

  const report = await session.run(config.bucketName, [
    { name: "hello.txt", data: "Hello World from TypeScript" },
    { name: "sample.png", path: "sample.png" },
    { name: "sample.jpg", path: "sample.jpg" },
  ]);

  for (const download of report.downloads) {
    console.log(`${download.key} -> ${download.localPath} (${download.bytes} bytes)`);
  }

  process.exitCode = report.exitCode;
}

main().catch(console.error);
