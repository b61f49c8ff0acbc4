/**
 * JSONC (JSON with Comments) file utilities
 * Handles reading and parsing JSONC files with comment support
 */

import { readFileSync, existsSync } from 'fs';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';
import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { logger } from './logger.js';
import { FileSystemError } from './errors.js';

const ROOT_MARKER = 'base-images.jsonc';

/**
 * Get the project root directory by walking up from the current file's
 * location until we find base-images.jsonc (a known root marker).
 *
 * Works both from sources (src/utils) and from the compiled tree
 * (dist/src/utils), which sit at different depths.
 */
export function getProjectRoot(): string {
  const __filename = fileURLToPath(import.meta.url);
  let dir = dirname(__filename);

  for (let i = 0; i < 10; i++) {
    if (existsSync(join(dir, ROOT_MARKER))) {
      return dir;
    }
    const parent = dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }

  return join(dirname(__filename), '..', '..');
}

/**
 * Parse JSONC text, failing on syntax errors instead of returning a partial value
 */
export function parseJsonc(content: string, label: string): unknown {
  const errors: ParseError[] = [];
  const parsed: unknown = parse(content, errors, { allowTrailingComma: true });
  if (errors.length > 0) {
    const first = errors[0];
    throw new Error(`${label}: ${printParseErrorCode(first.error)} at offset ${first.offset}`);
  }
  return parsed;
}

/**
 * Read and parse a JSONC file from the project root
 * @param relativePath - Path relative to project root (e.g., 'base-images.jsonc')
 */
export function readJsoncFileSync(relativePath: string): unknown {
  const fullPath = join(getProjectRoot(), relativePath);

  try {
    return parseJsonc(readFileSync(fullPath, 'utf-8'), relativePath);
  } catch (error) {
    logger.error(`Failed to read JSONC file: ${relativePath}`, { error, fullPath });
    throw new FileSystemError(`Failed to read JSONC file ${relativePath}`, { path: fullPath, cause: String(error) });
  }
}
