/**
 * Base image catalog: the fixed mapping from (distribution, version) pairs to
 * container base images.
 */

import type { BaseImageEntry, ResolvedRequirement } from '../../types/index.js';
import { ConfigError, UnsupportedBaseOSError } from '../../utils/errors.js';
import { readJsoncFileSync } from '../../utils/jsonc.js';
import { normalizeOsName } from '../../utils/requirement-name.js';
import { compareVersions, exactVersion, formatVersionRange, isValidVersion, rangeContains } from '../../utils/version-range.js';

const CATALOG_FILE = 'base-images.jsonc';

let builtInCatalog: BaseImageEntry[] | null = null;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a list of catalog entries read from JSON
 *
 * @throws ConfigError naming the first invalid entry
 */
export function parseBaseImageEntries(value: unknown, source: string): BaseImageEntry[] {
  if (!Array.isArray(value)) {
    throw new ConfigError(`${source}: baseImages must be an array`);
  }
  return value.map((entry: unknown, position) => {
    const fields: Record<string, unknown> = isRecord(entry) ? entry : {};
    const { distribution, version, image } = fields;
    if (typeof distribution !== 'string' || typeof version !== 'string' || typeof image !== 'string' || !image) {
      throw new ConfigError(`${source}: baseImages[${position}] needs string distribution, version and image`);
    }
    if (!isValidVersion(version)) {
      throw new ConfigError(`${source}: baseImages[${position}] has invalid version '${version}'`);
    }
    return { distribution: normalizeOsName(distribution), version, image };
  });
}

/**
 * The catalog shipped with the project, read once from base-images.jsonc
 */
export function loadBuiltInCatalog(): BaseImageEntry[] {
  if (!builtInCatalog) {
    const document = readJsoncFileSync(CATALOG_FILE);
    builtInCatalog = parseBaseImageEntries(isRecord(document) ? document.baseImages : undefined, CATALOG_FILE);
  }
  return builtInCatalog;
}

/**
 * Overlay entries on a catalog; an override replaces the entry with the same
 * distribution and equal version
 */
export function mergeBaseImages(base: BaseImageEntry[], overrides: BaseImageEntry[]): BaseImageEntry[] {
  const merged = [...base];
  for (const override of overrides) {
    const existing = merged.findIndex(
      entry => entry.distribution === override.distribution && compareVersions(entry.version, override.version) === 0
    );
    if (existing >= 0) {
      merged[existing] = override;
    } else {
      merged.push(override);
    }
  }
  return merged;
}

/**
 * True when `pinned` names the catalog release or a point release of it
 * (`22.04.3` belongs to `22.04`, `12.5` to `12`)
 */
function belongsToRelease(pinned: string, release: string): boolean {
  if (compareVersions(pinned, release) === 0) return true;
  const releaseSegments = release.split('.');
  const pinnedSegments = pinned.split('.');
  return releaseSegments.length < pinnedSegments.length &&
    releaseSegments.every((segment, i) => Number(segment) === Number(pinnedSegments[i]));
}

/**
 * Pick the base image for a resolved OS requirement.
 *
 * A pinned version selects its own release; any other range selects the
 * newest catalog release it admits.
 *
 * @throws UnsupportedBaseOSError when no catalog entry fits
 */
export function selectBaseImage(os: ResolvedRequirement, catalog: BaseImageEntry[]): BaseImageEntry {
  const entries = catalog
    .filter(entry => entry.distribution === os.name)
    .sort((a, b) => compareVersions(a.version, b.version));
  const supported = entries.map(entry => entry.version);

  const pinned = exactVersion(os.range);
  const matching = pinned !== undefined
    ? entries.filter(entry => belongsToRelease(pinned, entry.version))
    : entries.filter(entry => rangeContains(os.range, entry.version));

  const selected = matching[matching.length - 1];
  if (!selected) {
    throw new UnsupportedBaseOSError(os.name, formatVersionRange(os.range), supported, os.sourceIds);
  }
  return selected;
}
