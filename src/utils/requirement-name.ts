import { DEFAULT_ECOSYSTEM_PREFIXES, OS_ALIASES } from '../constants/index.js';

export interface NameAndVersion {
  name: string;
  version?: string;
}

export interface RequirementExpression {
  name: string;
  rangeText: string;
}

const PURL_PATTERN = /^pkg:[a-z0-9.+-]+\/([^@?#]+)/;
const ECOSYSTEM_PREFIX_PATTERN = /^([a-z0-9][a-z0-9._-]*)::?(.+)$/;

/**
 * Normalize a software requirement name so equivalent declarations collide.
 *
 * `PyPI:Scikit_Learn`, `pkg:pypi/scikit-learn` and `scikit.learn` all become
 * `scikit-learn`.
 */
export function normalizeSoftwareName(
  name: string,
  prefixes: readonly string[] = DEFAULT_ECOSYSTEM_PREFIXES
): string {
  let normalized = name.trim().toLowerCase();

  const purl = normalized.match(PURL_PATTERN);
  if (purl) {
    normalized = purl[1];
  } else {
    const prefixed = normalized.match(ECOSYSTEM_PREFIX_PATTERN);
    if (prefixed && prefixes.includes(prefixed[1])) {
      normalized = prefixed[2];
    }
  }

  // PEP 503: runs of -, _ and . are equivalent
  return normalized.replace(/[-_.]+/g, '-');
}

/**
 * Normalize an operating system / distribution name: `Rocky Linux` → `rockylinux`
 */
export function normalizeOsName(name: string): string {
  const lowered = name.trim().toLowerCase();
  const compact = lowered
    .replace(/gnu\/linux|linux/g, '')
    .replace(/[^a-z0-9]/g, '');
  if (!compact) {
    return lowered.replace(/[^a-z0-9]/g, '');
  }
  return OS_ALIASES[compact] ?? compact;
}

/**
 * Split a display name carrying its version, such as `Ubuntu 20.04 LTS` or
 * `Python 3.10`, into name and version.
 */
export function splitNameAndVersion(text: string): NameAndVersion {
  const cleaned = text
    .trim()
    .replace(/\s*\([^)]*\)$/, '')
    .replace(/\s+lts$/i, '');
  const match = cleaned.match(/^(.*?\S)[\s-]+v?(\d+(?:\.\d+)*[0-9A-Za-z.+-]*)$/);
  if (match) {
    return { name: match[1].trim(), version: match[2] };
  }
  return { name: cleaned };
}

/**
 * Split a textual requirement such as `numpy>=1.20,<2`, `scipy 1.11`,
 * `pkg:pypi/pandas@2.1` or `xarray[io] (>=2023.1)` into name and range text.
 * Environment markers after `;` are dropped.
 *
 * @returns undefined when the text has no leading name
 */
export function parseRequirementExpression(text: string): RequirementExpression | undefined {
  const withoutMarker = text.split(';')[0].trim();
  const match = withoutMarker.match(/^([^\s<>=!~^,@()[\]]+)(.*)$/);
  if (!match) {
    return undefined;
  }

  let rest = match[2].trim().replace(/^\[[^\]]*\]/, '').trim();
  if (rest.startsWith('@')) {
    rest = rest.slice(1).trim();
  }
  if (rest.startsWith('(') && rest.endsWith(')')) {
    rest = rest.slice(1, -1).trim();
  }
  return { name: match[1], rangeText: rest };
}
