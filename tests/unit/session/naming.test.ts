import * as path from 'path';
import {
  downloadPath,
  isValidBucketName,
  localFileName,
  objectKey,
  timestampOf,
} from '../../../src/session/naming';
import { ValidationError } from '../../../src/errors';

describe('naming', () => {
  describe('isValidBucketName', () => {
    it.each(['mybucket', 'my-bucket.01', 'abc'])('should accept %s', (name) => {
      expect(isValidBucketName(name)).toBe(true);
    });

    it.each([
      'ab',
      'My_Bucket',
      '-bucket',
      'bucket-',
      'my..bucket',
      '192.168.1.1',
      'a'.repeat(64),
    ])('should reject %s', (name) => {
      expect(isValidBucketName(name)).toBe(false);
    });
  });

  describe('timestampOf', () => {
    it('should use whole Unix seconds', () => {
      expect(timestampOf(new Date(1700000000999))).toBe('1700000000');
    });
  });

  describe('objectKey', () => {
    it('should prefix the name with the timestamp', () => {
      expect(objectKey('1700000000', 'hello.txt')).toBe('1700000000_hello.txt');
    });
  });

  describe('localFileName', () => {
    it('should use the default prefix', () => {
      expect(localFileName('1700000000_hello.txt')).toBe('downloaded_1700000000_hello.txt');
    });

    it('should keep only the last segment of the key', () => {
      expect(localFileName('photos/2024/cat.jpg', 'copy-')).toBe('copy-cat.jpg');
    });
  });

  describe('downloadPath', () => {
    it('should place the file directly in the download directory', () => {
      expect(downloadPath('/tmp/out', 'x/report.csv')).toBe(
        path.resolve('/tmp/out', 'downloaded_report.csv'),
      );
    });

    it.each(['a/..', 'a/.'])('should reject %s without a prefix', (key) => {
      expect(() => downloadPath('/tmp/out', key, '')).toThrow(ValidationError);
    });

    it('should accept names that only start with dots', () => {
      expect(downloadPath('/tmp/out', 'a/..hidden', '')).toBe(
        path.resolve('/tmp/out', '..hidden'),
      );
    });
  });
});
