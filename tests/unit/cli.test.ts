import { DEFAULT_PAYLOADS, collectPayloads, main, parseTextPayload } from '../../src/cli';
import { ValidationError } from '../../src/errors';
import { LocalStorageClient } from '../../src/storage/LocalStorageClient';
import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';

describe('cli', () => {
  describe('parseTextPayload', () => {
    it('should split on the first equals sign', () => {
      expect(parseTextPayload('note.txt=a=b')).toEqual({ name: 'note.txt', data: 'a=b' });
    });

    it('should reject values without a name', () => {
      expect(() => parseTextPayload('=content')).toThrow(ValidationError);
      expect(() => parseTextPayload('content')).toThrow(ValidationError);
    });
  });

  describe('collectPayloads', () => {
    it('should put inline payloads before files', () => {
      expect(collectPayloads(['photos/cat.jpg'], ['hello.txt=Hi'])).toEqual([
        { name: 'hello.txt', data: 'Hi' },
        { name: 'cat.jpg', path: 'photos/cat.jpg' },
      ]);
    });

    it('should fall back to the demo payloads', () => {
      expect(collectPayloads([], [])).toEqual([
        { name: 'hello.txt', data: 'Hello World' },
        { name: 'sample.png', path: 'sample.png' },
        { name: 'sample.jpg', path: 'sample.jpg' },
      ]);
      expect(DEFAULT_PAYLOADS).toHaveLength(3);
    });
  });

  describe('main', () => {
    let tempDir: string;
    let envFile: string;
    let logger: { log: jest.Mock; warn: jest.Mock; error: jest.Mock };

    const localArgs = (): string[] => [
      '--backend',
      'local',
      '--local-root',
      path.join(tempDir, 'storage'),
      '--download-dir',
      path.join(tempDir, 'downloads'),
      '--env-file',
      envFile,
    ];

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bucket-session-cli-'));
      envFile = path.join(tempDir, 'test.env');
      await fs.writeFile(envFile, 'S3_BUCKET=cli-bucket\n');
      logger = { log: jest.fn(), warn: jest.fn(), error: jest.fn() };
    });

    afterEach(async () => {
      jest.restoreAllMocks();
      await fs.remove(tempDir);
    });

    it('should run against the local backend and exit with 0', async () => {
      const code = await main([...localArgs(), '-t', 'hello.txt=Hello World'], {}, logger);

      expect(code).toBe(0);
      const downloads = await fs.readdir(path.join(tempDir, 'downloads'));
      expect(downloads).toHaveLength(1);
      expect(downloads[0]).toMatch(/^downloaded_\d+_hello\.txt$/);
      expect(
        await fs.readFile(path.join(tempDir, 'downloads', downloads[0]), 'utf8'),
      ).toBe('Hello World');
      expect(await fs.pathExists(path.join(tempDir, 'storage', 'cli-bucket'))).toBe(false);
    });

    it('should let flags override the environment file', async () => {
      const code = await main(
        [...localArgs(), '--bucket', 'flag-bucket', '-t', 'a.txt=a'],
        {},
        logger,
      );

      expect(code).toBe(0);
      expect(logger.log).toHaveBeenCalledWith("✅ Bucket 'flag-bucket' created.");
    });

    it('should exit with 1 when a fail-fast phase aborts', async () => {
      const unreadable = path.join(tempDir, 'folder.bin');
      await fs.ensureDir(unreadable);

      const code = await main([...localArgs(), unreadable], {}, logger);

      expect(code).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(
        expect.stringContaining("❌ Aborted in phase 'upload'"),
      );
    });

    it('should keep an empty --prefix', async () => {
      const code = await main([...localArgs(), '--prefix', '', '-t', 'a.txt=a'], {}, logger);

      expect(code).toBe(0);
      const downloads = await fs.readdir(path.join(tempDir, 'downloads'));
      expect(downloads).toHaveLength(1);
      expect(downloads[0]).toMatch(/^\d+_a\.txt$/);
    });

    it('should stop after the current phase on SIGINT and exit with 1', async () => {
      const putObject = LocalStorageClient.prototype.putObject;
      jest
        .spyOn(LocalStorageClient.prototype, 'putObject')
        .mockImplementation(async function (
          this: LocalStorageClient,
          bucket: string,
          key: string,
          data: Uint8Array,
        ) {
          process.emit('SIGINT');
          await putObject.call(this, bucket, key, data);
        });

      const code = await main([...localArgs(), '-t', 'a.txt=a'], {}, logger);

      expect(code).toBe(1);
      expect(logger.warn).toHaveBeenCalledWith(
        '⚠️ Interrupted, stopping after the current phase...',
      );
      expect(logger.error).toHaveBeenCalledWith(
        "❌ Aborted in phase 'list': Run cancelled before phase 'list'",
      );
      expect(await fs.readdir(path.join(tempDir, 'storage', 'cli-bucket'))).toHaveLength(1);
    });

    it('should exit with 1 on invalid configuration', async () => {
      const code = await main(['--backend', 'ftp', '--env-file', envFile], {}, logger);

      expect(code).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(
        expect.stringContaining('❌ Invalid configuration: STORAGE_BACKEND'),
      );
    });
  });
});
