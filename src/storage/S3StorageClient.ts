import { StorageClient } from "./StorageClient";
import {
  S3Client,
  CreateBucketCommand,
  CreateBucketCommandInput,
  BucketLocationConstraint,
  ListObjectsV2Command,
  GetObjectCommand,
  DeleteObjectCommand,
  DeleteBucketCommand,
  S3ServiceException,
  S3ClientConfig,
} from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import {
  AuthenticationError,
  BucketAlreadyExistsError,
  ConnectionError,
  ErrorCodes,
  ResourceNotFoundError,
  StorageProviderError,
} from "../errors";

export interface S3StorageClientOptions {
  /**
   * Endpoint of an S3-compatible service; AWS is used when omitted
   */
  endpoint?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  /**
   * Path-style addressing (`http://host/bucket/key`), needed by most
   * self-hosted services (default: true)
   */
  forcePathStyle?: boolean;
  /**
   * Attempts the SDK makes per request, transport retries included (default: 3)
   */
  maxAttempts?: number;
  /**
   * Preconfigured client; when given the options above are ignored
   */
  client?: S3Client;
}

const PROVIDER = "s3";

const ALREADY_EXISTS_CODES = new Set([
  "BucketAlreadyExists",
  "BucketAlreadyOwnedByYou",
]);
const NOT_FOUND_CODES = new Set(["NoSuchBucket", "NoSuchKey", "NotFound"]);
const AUTH_CODES = new Set([
  "AccessDenied",
  "InvalidAccessKeyId",
  "SignatureDoesNotMatch",
]);
const NETWORK_CODES = new Set([
  "ECONNREFUSED",
  "ECONNRESET",
  "ENOTFOUND",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
]);

/**
 * Maps SDK and transport errors onto the storage error hierarchy
 */
export function mapS3Error(error: unknown, context: string): Error {
  if (error instanceof S3ServiceException) {
    const serviceCode = error.name;
    const message = `${context}: ${error.message || serviceCode}`;

    if (ALREADY_EXISTS_CODES.has(serviceCode)) {
      return new BucketAlreadyExistsError(message, PROVIDER, serviceCode);
    }
    if (
      NOT_FOUND_CODES.has(serviceCode) ||
      error.$metadata?.httpStatusCode === 404
    ) {
      return new ResourceNotFoundError(message, PROVIDER, serviceCode);
    }
    if (AUTH_CODES.has(serviceCode)) {
      return new AuthenticationError(message, PROVIDER, serviceCode);
    }
    return new StorageProviderError(
      message,
      ErrorCodes.PROVIDER_ERROR,
      PROVIDER,
      serviceCode,
    );
  }

  if (error instanceof Error) {
    const code =
      "code" in error && typeof error.code === "string"
        ? error.code
        : undefined;
    if ((code && NETWORK_CODES.has(code)) || error.name === "TimeoutError") {
      return new ConnectionError(
        `${context}: ${error.message}`,
        PROVIDER,
        code ?? error.name,
      );
    }
    return new StorageProviderError(
      `${context}: ${error.message}`,
      ErrorCodes.PROVIDER_ERROR,
      PROVIDER,
    );
  }

  return new StorageProviderError(
    `${context}: ${String(error)}`,
    ErrorCodes.PROVIDER_ERROR,
    PROVIDER,
  );
}

/**
 * StorageClient backed by the AWS SDK, for AWS S3 and S3-compatible services
 */
export class S3StorageClient implements StorageClient {
  readonly provider = PROVIDER;
  private readonly s3Client: S3Client;
  private readonly region: string;

  constructor(region: string, options: S3StorageClientOptions = {}) {
    this.region = region;

    if (options.client) {
      this.s3Client = options.client;
      return;
    }

    const clientConfig: S3ClientConfig = {
      region,
      forcePathStyle: options.forcePathStyle ?? true,
      maxAttempts: options.maxAttempts ?? 3,
    };

    if (options.endpoint) {
      clientConfig.endpoint = options.endpoint;
    }

    if (options.accessKeyId && options.secretAccessKey) {
      clientConfig.credentials = {
        accessKeyId: options.accessKeyId,
        secretAccessKey: options.secretAccessKey,
      };
    }

    this.s3Client = new S3Client(clientConfig);
  }

  async createBucket(bucket: string): Promise<void> {
    const params: CreateBucketCommandInput = { Bucket: bucket };

    // us-east-1 is the default region and doesn't accept a LocationConstraint
    if (this.region !== "us-east-1") {
      params.CreateBucketConfiguration = {
        LocationConstraint: this.region as BucketLocationConstraint,
      };
    }

    try {
      await this.s3Client.send(new CreateBucketCommand(params));
    } catch (error: unknown) {
      throw mapS3Error(error, `Failed to create bucket '${bucket}'`);
    }
  }

  async putObject(bucket: string, key: string, data: Uint8Array): Promise<void> {
    try {
      // Upload switches to multipart for large bodies
      const upload = new Upload({
        client: this.s3Client,
        params: {
          Bucket: bucket,
          Key: key,
          Body: data,
        },
      });

      await upload.done();
    } catch (error: unknown) {
      throw mapS3Error(error, `Failed to upload '${key}'`);
    }
  }

  async listObjects(bucket: string): Promise<string[]> {
    const keys: string[] = [];
    let continuationToken: string | undefined;

    try {
      do {
        const listResponse = await this.s3Client.send(
          new ListObjectsV2Command({
            Bucket: bucket,
            ContinuationToken: continuationToken,
          }),
        );

        for (const object of listResponse.Contents ?? []) {
          if (object.Key) {
            keys.push(object.Key);
          }
        }

        continuationToken = listResponse.IsTruncated
          ? listResponse.NextContinuationToken
          : undefined;
      } while (continuationToken);
    } catch (error: unknown) {
      throw mapS3Error(error, `Failed to list objects in '${bucket}'`);
    }

    return keys;
  }

  async getObject(bucket: string, key: string): Promise<Uint8Array> {
    try {
      const getResponse = await this.s3Client.send(
        new GetObjectCommand({ Bucket: bucket, Key: key }),
      );

      if (!getResponse.Body) {
        return new Uint8Array(0);
      }

      return await getResponse.Body.transformToByteArray();
    } catch (error: unknown) {
      throw mapS3Error(error, `Failed to download '${key}'`);
    }
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    try {
      await this.s3Client.send(
        new DeleteObjectCommand({ Bucket: bucket, Key: key }),
      );
    } catch (error: unknown) {
      throw mapS3Error(error, `Failed to delete '${key}'`);
    }
  }

  async deleteBucket(bucket: string): Promise<void> {
    try {
      await this.s3Client.send(new DeleteBucketCommand({ Bucket: bucket }));
    } catch (error: unknown) {
      throw mapS3Error(error, `Failed to delete bucket '${bucket}'`);
    }
  }
}
