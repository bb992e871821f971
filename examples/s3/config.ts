import { SessionConfig } from "../../src";

// Configuration for a local S3-compatible endpoint
export const config: SessionConfig = {
  endpoint: "http://localhost",
  region: "us-east-1",
  credentials: {
    accessKeyId: "FAKEACCESS",
    secretAccessKey: "FAKESECRET",
  },
  bucketName: "mybucket",
  forcePathStyle: true,
  maxAttempts: 3,
  downloadDir: ".",
  downloadPrefix: "downloaded_",
  verifyDownloads: true,
  backend: "s3",
  localRoot: "data",
};
