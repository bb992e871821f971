import { StorageClient } from "./StorageClient";
import fs from "fs-extra";
import path from "path";
import {
  BucketAlreadyExistsError,
  ErrorCodes,
  ResourceNotFoundError,
  StorageProviderError,
  ValidationError,
} from "../errors";

const PROVIDER = "local";

/**
 * StorageClient over a local directory tree: each bucket is a directory
 * under the root and each object a file named by its key
 */
export class LocalStorageClient implements StorageClient {
  readonly provider = PROVIDER;
  private basePath: string;

  constructor(rootPath: string) {
    this.basePath = path.resolve(rootPath);
    fs.ensureDirSync(this.basePath);
  }

  /**
   * Get the directory for a bucket
   */
  private getBucketPath(bucket: string): string {
    const bucketPath = path.join(this.basePath, bucket);
    if (path.dirname(bucketPath) !== this.basePath) {
      throw new ValidationError(`Invalid bucket name: ${bucket}`);
    }
    return bucketPath;
  }

  /**
   * Get the file for an object, refusing keys that escape the bucket
   */
  private getObjectPath(bucketPath: string, key: string): string {
    const objectPath = path.resolve(bucketPath, key);
    if (!objectPath.startsWith(bucketPath + path.sep)) {
      throw new ValidationError(`Invalid object key: ${key}`);
    }
    return objectPath;
  }

  private async requireBucket(bucket: string): Promise<string> {
    const bucketPath = this.getBucketPath(bucket);
    if (!(await fs.pathExists(bucketPath))) {
      throw new ResourceNotFoundError(
        `Bucket '${bucket}' not found`,
        PROVIDER,
        "NoSuchBucket",
      );
    }
    return bucketPath;
  }

  async createBucket(bucket: string): Promise<void> {
    const bucketPath = this.getBucketPath(bucket);
    if (await fs.pathExists(bucketPath)) {
      throw new BucketAlreadyExistsError(
        `Bucket '${bucket}' already exists`,
        PROVIDER,
        "BucketAlreadyExists",
      );
    }
    await fs.ensureDir(bucketPath);
  }

  async putObject(bucket: string, key: string, data: Uint8Array): Promise<void> {
    const bucketPath = await this.requireBucket(bucket);
    await fs.outputFile(this.getObjectPath(bucketPath, key), data);
  }

  async listObjects(bucket: string): Promise<string[]> {
    const bucketPath = await this.requireBucket(bucket);
    const files = await this.getAllFiles(bucketPath);

    return files
      .map((file) => path.relative(bucketPath, file).split(path.sep).join("/"))
      .sort();
  }

  async getObject(bucket: string, key: string): Promise<Uint8Array> {
    const bucketPath = await this.requireBucket(bucket);
    const objectPath = this.getObjectPath(bucketPath, key);

    if (!(await this.isFile(objectPath))) {
      throw new ResourceNotFoundError(
        `Object '${key}' not found`,
        PROVIDER,
        "NoSuchKey",
      );
    }

    return fs.readFile(objectPath);
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    const bucketPath = await this.requireBucket(bucket);
    const objectPath = this.getObjectPath(bucketPath, key);

    if (!(await this.isFile(objectPath))) {
      throw new ResourceNotFoundError(
        `Object '${key}' not found`,
        PROVIDER,
        "NoSuchKey",
      );
    }

    await fs.remove(objectPath);
  }

  async deleteBucket(bucket: string): Promise<void> {
    const bucketPath = await this.requireBucket(bucket);
    const files = await this.getAllFiles(bucketPath);

    if (files.length > 0) {
      throw new StorageProviderError(
        `Bucket '${bucket}' is not empty`,
        ErrorCodes.PROVIDER_ERROR,
        PROVIDER,
        "BucketNotEmpty",
      );
    }

    // Directories left behind by nested keys go with the bucket
    await fs.remove(bucketPath);
  }

  private async isFile(filePath: string): Promise<boolean> {
    if (!(await fs.pathExists(filePath))) {
      return false;
    }
    const stats = await fs.stat(filePath);
    return stats.isFile();
  }

  /**
   * Recursively gets all files in a directory
   */
  private async getAllFiles(dirPath: string): Promise<string[]> {
    const files: string[] = [];
    const entries = await fs.readdir(dirPath, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(dirPath, entry.name);

      if (entry.isDirectory()) {
        files.push(...(await this.getAllFiles(fullPath)));
      } else {
        files.push(fullPath);
      }
    }

    return files;
  }
}
