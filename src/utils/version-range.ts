/**
 * Interval algebra over declared version constraints.
 *
 * A constraint is a single interval with optional inclusive/exclusive bounds.
 * Bounds keep the version text exactly as declared (`20.04` stays `20.04`);
 * ordering goes through semver coercion, with numeric segments past the
 * third compared separately.
 */

import semver from 'semver';
import type { SemVer } from 'semver';
import type { VersionBound, VersionRange } from '../types/index.js';
import { ANY_VERSION } from '../constants/index.js';
import { InvalidVersionRangeError } from './errors.js';

const UNBOUNDED_TOKENS = new Set(['', '*', 'x', 'any', ANY_VERSION, 'latest']);

const VERSION_PATTERN = /^v?(\d+(?:\.\d+)*)(?:[-+.]?[0-9A-Za-z][0-9A-Za-z.+-]*)?$/;
const WILDCARD_PATTERN = /^(?:==|=)?v?(\d+(?:\.\d+)*)(?:\.[xX*])+$/;
const OPERATOR_PATTERN = /^(===|==|=|>=|<=|>|<|~=|\^|~)?(.*)$/;

function coerceVersion(text: string): SemVer {
  const coerced = semver.coerce(text, { loose: true });
  if (!coerced) {
    throw new InvalidVersionRangeError(text, 'not a version');
  }
  return coerced;
}

function numericSegments(text: string): number[] {
  const match = text.match(VERSION_PATTERN);
  if (!match) {
    throw new InvalidVersionRangeError(text, 'not a version');
  }
  return match[1].split('.').map(segment => Number.parseInt(segment, 10));
}

/**
 * Compare two version strings. `1.0` and `1.0.0` compare equal.
 */
export function compareVersions(a: string, b: string): number {
  const primary = semver.compare(coerceVersion(a), coerceVersion(b));
  if (primary !== 0) return primary;

  const extraA = numericSegments(a).slice(3);
  const extraB = numericSegments(b).slice(3);
  for (let i = 0; i < Math.max(extraA.length, extraB.length); i++) {
    const diff = (extraA[i] ?? 0) - (extraB[i] ?? 0);
    if (diff !== 0) return diff < 0 ? -1 : 1;
  }
  return 0;
}

export function isValidVersion(text: string): boolean {
  return VERSION_PATTERN.test(text) && semver.coerce(text, { loose: true }) !== null;
}

function bump(parts: number[], index: number): string {
  return [...parts.slice(0, index), parts[index] + 1].join('.');
}

function exact(version: string): VersionRange {
  return { lower: { version, inclusive: true }, upper: { version, inclusive: true } };
}

function halfOpen(lower: string, upper: string): VersionRange {
  return { lower: { version: lower, inclusive: true }, upper: { version: upper, inclusive: false } };
}

function parseToken(token: string, source: string): VersionRange {
  const wildcard = token.match(WILDCARD_PATTERN);
  if (wildcard) {
    const parts = wildcard[1].split('.').map(p => Number.parseInt(p, 10));
    return halfOpen(wildcard[1], bump(parts, parts.length - 1));
  }

  const [, operator = '', rawVersion] = token.match(OPERATOR_PATTERN) ?? [];
  const version = (rawVersion ?? '').replace(/^v(?=\d)/, '');
  if (!isValidVersion(version)) {
    throw new InvalidVersionRangeError(source, `'${token}' is not a version comparator`);
  }
  const parts = numericSegments(version);

  switch (operator) {
    case '':
    case '=':
    case '==':
    case '===':
      return exact(version);
    case '>=':
      return { lower: { version, inclusive: true } };
    case '>':
      return { lower: { version, inclusive: false } };
    case '<=':
      return { upper: { version, inclusive: true } };
    case '<':
      return { upper: { version, inclusive: false } };
    case '^': {
      const firstNonZero = parts.findIndex(p => p !== 0);
      const index = firstNonZero === -1 ? parts.length - 1 : firstNonZero;
      return halfOpen(version, bump(parts, index));
    }
    case '~':
      return halfOpen(version, bump(parts, parts.length >= 2 ? 1 : 0));
    case '~=':
      if (parts.length < 2) {
        throw new InvalidVersionRangeError(source, 'compatible release needs at least two segments');
      }
      return halfOpen(version, bump(parts, parts.length - 2));
    default:
      throw new InvalidVersionRangeError(source, `unsupported operator '${operator}'`);
  }
}

/**
 * Parse a constraint such as `>=1.2,<2`, `^1.4`, `~=3.10`, `1.x` or `20.04`.
 *
 * @throws InvalidVersionRangeError for unions, exclusions, unknown syntax
 *   or a constraint that admits no version
 */
export function parseVersionRange(text: string | number): VersionRange {
  const source = String(text).trim();
  if (UNBOUNDED_TOKENS.has(source.toLowerCase())) {
    return {};
  }
  if (source.includes('||')) {
    throw new InvalidVersionRangeError(source, 'alternatives (||) cannot be expressed as one interval');
  }
  if (source.includes('!=')) {
    throw new InvalidVersionRangeError(source, 'exclusions (!=) cannot be expressed as one interval');
  }

  const tokens = source
    .replace(/(===|==|>=|<=|~=|[=<>^~])\s+/g, '$1')
    .split(/[\s,]+/)
    .filter(Boolean);

  let range: VersionRange = {};
  for (const token of tokens) {
    const next = intersectRanges(range, parseToken(token, source));
    if (!next) {
      throw new InvalidVersionRangeError(source, 'constraint admits no version');
    }
    range = next;
  }
  return range;
}

function segmentCount(version: string): number {
  return version.split('.').length;
}

function preferSpecific(a: VersionBound, b: VersionBound): VersionBound {
  return segmentCount(b.version) > segmentCount(a.version) ? b : a;
}

function tighterLower(a?: VersionBound, b?: VersionBound): VersionBound | undefined {
  if (!a) return b;
  if (!b) return a;
  const cmp = compareVersions(a.version, b.version);
  if (cmp !== 0) return cmp > 0 ? a : b;
  if (!a.inclusive) return a;
  if (!b.inclusive) return b;
  return preferSpecific(a, b);
}

function tighterUpper(a?: VersionBound, b?: VersionBound): VersionBound | undefined {
  if (!a) return b;
  if (!b) return a;
  const cmp = compareVersions(a.version, b.version);
  if (cmp !== 0) return cmp < 0 ? a : b;
  if (!a.inclusive) return a;
  if (!b.inclusive) return b;
  return preferSpecific(a, b);
}

export function isEmptyRange(range: VersionRange): boolean {
  const { lower, upper } = range;
  if (!lower || !upper) return false;
  const cmp = compareVersions(lower.version, upper.version);
  return cmp > 0 || (cmp === 0 && !(lower.inclusive && upper.inclusive));
}

/**
 * Intersect two ranges; `null` when no version satisfies both
 */
export function intersectRanges(a: VersionRange, b: VersionRange): VersionRange | null {
  const result: VersionRange = {};
  const lower = tighterLower(a.lower, b.lower);
  const upper = tighterUpper(a.upper, b.upper);
  if (lower) result.lower = lower;
  if (upper) result.upper = upper;
  return isEmptyRange(result) ? null : result;
}

export function rangeContains(range: VersionRange, version: string): boolean {
  const { lower, upper } = range;
  if (lower) {
    const cmp = compareVersions(version, lower.version);
    if (cmp < 0 || (cmp === 0 && !lower.inclusive)) return false;
  }
  if (upper) {
    const cmp = compareVersions(version, upper.version);
    if (cmp > 0 || (cmp === 0 && !upper.inclusive)) return false;
  }
  return true;
}

/**
 * True when every version admitted by `inner` is admitted by `outer`
 */
export function isSubrange(inner: VersionRange, outer: VersionRange): boolean {
  if (isEmptyRange(inner)) return true;

  if (outer.lower) {
    if (!inner.lower) return false;
    const cmp = compareVersions(inner.lower.version, outer.lower.version);
    if (cmp < 0 || (cmp === 0 && inner.lower.inclusive && !outer.lower.inclusive)) return false;
  }
  if (outer.upper) {
    if (!inner.upper) return false;
    const cmp = compareVersions(inner.upper.version, outer.upper.version);
    if (cmp > 0 || (cmp === 0 && inner.upper.inclusive && !outer.upper.inclusive)) return false;
  }
  return true;
}

export function isUnbounded(range: VersionRange): boolean {
  return !range.lower && !range.upper;
}

/**
 * The single version a range pins, if it pins one
 */
export function exactVersion(range: VersionRange): string | undefined {
  const { lower, upper } = range;
  if (lower && upper && lower.inclusive && upper.inclusive && compareVersions(lower.version, upper.version) === 0) {
    return preferSpecific(lower, upper).version;
  }
  return undefined;
}

export function formatVersionRange(range: VersionRange): string {
  if (isUnbounded(range)) return ANY_VERSION;

  const pinned = exactVersion(range);
  if (pinned) return `==${pinned}`;

  const parts: string[] = [];
  if (range.lower) parts.push(`${range.lower.inclusive ? '>=' : '>'}${range.lower.version}`);
  if (range.upper) parts.push(`${range.upper.inclusive ? '<=' : '<'}${range.upper.version}`);
  return parts.join(',');
}
