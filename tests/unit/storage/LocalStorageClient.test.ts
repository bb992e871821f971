import { LocalStorageClient } from '../../../src/storage/LocalStorageClient';
import {
  BucketAlreadyExistsError,
  ResourceNotFoundError,
  StorageProviderError,
  ValidationError,
} from '../../../src/errors';
import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';

describe('LocalStorageClient', () => {
  let rootDir: string;
  let storage: LocalStorageClient;

  beforeEach(async () => {
    rootDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bucket-session-local-'));
    storage = new LocalStorageClient(path.join(rootDir, 'data'));
  });

  afterEach(async () => {
    await fs.remove(rootDir);
  });

  describe('constructor', () => {
    it('should create the root directory', async () => {
      expect(await fs.pathExists(path.join(rootDir, 'data'))).toBe(true);
    });
  });

  describe('createBucket', () => {
    it('should create a directory per bucket', async () => {
      await storage.createBucket('mybucket');

      expect(await fs.pathExists(path.join(rootDir, 'data', 'mybucket'))).toBe(true);
    });

    it('should report an existing bucket', async () => {
      await storage.createBucket('mybucket');

      await expect(storage.createBucket('mybucket')).rejects.toBeInstanceOf(
        BucketAlreadyExistsError,
      );
    });

    it('should refuse names that leave the root', async () => {
      await expect(storage.createBucket('..')).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('objects', () => {
    beforeEach(async () => {
      await storage.createBucket('mybucket');
    });

    it('should store and return the same bytes', async () => {
      const data = new Uint8Array([0, 1, 254, 255]);

      await storage.putObject('mybucket', '1700000000_blob.bin', data);
      const stored = await storage.getObject('mybucket', '1700000000_blob.bin');

      expect(Array.from(stored)).toEqual([0, 1, 254, 255]);
    });

    it('should list nested keys with forward slashes, sorted', async () => {
      await storage.putObject('mybucket', 'b.txt', Buffer.from('b'));
      await storage.putObject('mybucket', 'photos/cat.jpg', Buffer.from('c'));
      await storage.putObject('mybucket', 'a.txt', Buffer.from('a'));

      await expect(storage.listObjects('mybucket')).resolves.toEqual([
        'a.txt',
        'b.txt',
        'photos/cat.jpg',
      ]);
    });

    it('should refuse keys that escape the bucket', async () => {
      await expect(
        storage.putObject('mybucket', '../other/file.txt', Buffer.from('x')),
      ).rejects.toBeInstanceOf(ValidationError);
    });

    it('should report missing objects', async () => {
      await expect(storage.getObject('mybucket', 'missing.txt')).rejects.toBeInstanceOf(
        ResourceNotFoundError,
      );
      await expect(storage.deleteObject('mybucket', 'missing.txt')).rejects.toBeInstanceOf(
        ResourceNotFoundError,
      );
    });

    it('should delete objects', async () => {
      await storage.putObject('mybucket', 'a.txt', Buffer.from('a'));

      await storage.deleteObject('mybucket', 'a.txt');

      await expect(storage.listObjects('mybucket')).resolves.toEqual([]);
    });

    it('should fail on a bucket that does not exist', async () => {
      await expect(
        storage.putObject('otherbucket', 'a.txt', Buffer.from('a')),
      ).rejects.toMatchObject({ code: 'NOT_FOUND', serviceCode: 'NoSuchBucket' });
    });
  });

  describe('deleteBucket', () => {
    it('should refuse a bucket that still holds objects', async () => {
      await storage.createBucket('mybucket');
      await storage.putObject('mybucket', 'a.txt', Buffer.from('a'));

      const error = await storage.deleteBucket('mybucket').catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(StorageProviderError);
      expect(error).toMatchObject({ serviceCode: 'BucketNotEmpty' });
    });

    it('should remove an emptied bucket including leftover directories', async () => {
      await storage.createBucket('mybucket');
      await storage.putObject('mybucket', 'photos/cat.jpg', Buffer.from('c'));
      await storage.deleteObject('mybucket', 'photos/cat.jpg');

      await storage.deleteBucket('mybucket');

      expect(await fs.pathExists(path.join(rootDir, 'data', 'mybucket'))).toBe(false);
    });

    it('should report a missing bucket', async () => {
      await expect(storage.deleteBucket('mybucket')).rejects.toBeInstanceOf(
        ResourceNotFoundError,
      );
    });
  });
});
