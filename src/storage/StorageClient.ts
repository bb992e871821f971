/**
 * Interface for the object storage backends a session drives
 */
export interface StorageClient {
  /**
   * Name used in error reports (e.g. "s3", "local")
   */
  readonly provider: string;

  /**
   * Creates a bucket
   *
   * @param bucket - Bucket name
   * @throws BucketAlreadyExistsError when the bucket is already there
   */
  createBucket(bucket: string): Promise<void>;

  /**
   * Stores bytes under a key, replacing any previous object
   */
  putObject(bucket: string, key: string, data: Uint8Array): Promise<void>;

  /**
   * Lists every key in a bucket, in the order the backend returns them
   */
  listObjects(bucket: string): Promise<string[]>;

  /**
   * Fetches the bytes stored under a key
   */
  getObject(bucket: string, key: string): Promise<Uint8Array>;

  deleteObject(bucket: string, key: string): Promise<void>;

  /**
   * Deletes an empty bucket
   */
  deleteBucket(bucket: string): Promise<void>;
}
