import path from "path";
import { ValidationError } from "../errors";

export const DEFAULT_DOWNLOAD_PREFIX = "downloaded_";

const BUCKET_NAME_PATTERN = /^[a-z0-9][a-z0-9.-]{1,61}[a-z0-9]$/;
const IPV4_PATTERN = /^\d{1,3}(\.\d{1,3}){3}$/;

/**
 * S3 bucket naming rules: 3-63 characters of lowercase letters, digits,
 * dots and hyphens, starting and ending with a letter or digit
 */
export function isValidBucketName(name: string): boolean {
  return (
    BUCKET_NAME_PATTERN.test(name) &&
    !name.includes("..") &&
    !IPV4_PATTERN.test(name)
  );
}

/**
 * Unix seconds, shared by every key of one run
 */
export function timestampOf(date: Date): string {
  return Math.floor(date.getTime() / 1000).toString();
}

export function objectKey(timestamp: string, name: string): string {
  return `${timestamp}_${name}`;
}

/**
 * Local file name for a downloaded object: prefix + last segment of the key
 */
export function localFileName(
  key: string,
  prefix: string = DEFAULT_DOWNLOAD_PREFIX,
): string {
  return `${prefix}${path.posix.basename(key)}`;
}

/**
 * Where a downloaded object is written. The name must stay a plain file
 * directly inside the download directory.
 *
 * @throws ValidationError for names like "." or ".." or ones leaving the directory
 */
export function downloadPath(
  downloadDir: string,
  key: string,
  prefix: string = DEFAULT_DOWNLOAD_PREFIX,
): string {
  const name = localFileName(key, prefix);
  const root = path.resolve(downloadDir);
  const target = path.resolve(root, name);
  if (path.dirname(target) !== root) {
    throw new ValidationError(
      `Object '${key}' cannot be downloaded as '${name}'`,
    );
  }
  return target;
}
