import { isAbsolute, join, resolve } from 'path';
import { FILE_PATTERNS } from '../constants/index.js';
import { exists, isDirectory } from './fs.js';
import { FileSystemError } from './errors.js';

/**
 * Path helpers for locating crate metadata files
 */

/**
 * Resolve a metadata argument to a file path. A directory stands for the
 * crate it holds: its `ro-crate-metadata.json`, or the legacy `.jsonld` name.
 */
export async function resolveMetadataPath(input: string, cwd: string = process.cwd()): Promise<string> {
  const target = isAbsolute(input) ? input : resolve(cwd, input);

  if (await isDirectory(target)) {
    for (const fileName of [FILE_PATTERNS.CRATE_METADATA, FILE_PATTERNS.CRATE_METADATA_LEGACY]) {
      const candidate = join(target, fileName);
      if (await exists(candidate)) {
        return candidate;
      }
    }
    throw new FileSystemError(`No ${FILE_PATTERNS.CRATE_METADATA} in directory: ${target}`, { path: target });
  }

  if (!(await exists(target))) {
    throw new FileSystemError(`Metadata file not found: ${target}`, { path: target });
  }
  return target;
}
