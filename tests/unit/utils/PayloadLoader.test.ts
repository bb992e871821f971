import { loadPayload } from '../../../src/utils/PayloadLoader';
import * as fs from 'fs-extra';
import * as path from 'path';
import * as os from 'os';

describe('loadPayload', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'bucket-session-payload-'));
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  it('should encode inline strings as UTF-8', async () => {
    const loaded = await loadPayload({ name: 'hi.txt', data: 'héllo' });

    expect(loaded.status).toBe('loaded');
    expect(loaded.status === 'loaded' && Buffer.from(loaded.data).toString('hex')).toBe(
      '68c3a96c6c6f',
    );
  });

  it('should pass inline bytes through', async () => {
    const data = new Uint8Array([1, 2, 3]);

    const loaded = await loadPayload({ name: 'raw.bin', data });

    expect(loaded).toEqual({ status: 'loaded', name: 'raw.bin', data });
  });

  it('should read files from disk', async () => {
    const filePath = path.join(tempDir, 'data.txt');
    await fs.writeFile(filePath, 'file contents');

    const loaded = await loadPayload({ name: 'data.txt', path: filePath });

    expect(loaded.status).toBe('loaded');
    expect(loaded.sourcePath).toBe(filePath);
    expect(loaded.status === 'loaded' && Buffer.from(loaded.data).toString()).toBe('file contents');
  });

  it('should report a missing file instead of throwing', async () => {
    const filePath = path.join(tempDir, 'nope.png');

    const loaded = await loadPayload({ name: 'nope.png', path: filePath });

    expect(loaded).toEqual({ status: 'missing', name: 'nope.png', sourcePath: filePath });
  });

  it('should throw when the path cannot be read', async () => {
    await expect(loadPayload({ name: 'dir', path: tempDir })).rejects.toThrow();
  });
});
