/**
 * Requirement Reconciler: collapses the classifier's requirement candidates
 * into one consistent requirement set.
 *
 * Candidates sharing a normalized name form a conflict group. Each group
 * resolves to the intersection of its members' ranges, or the whole
 * reconciliation fails; no declaration ever silently overrides another.
 */

import type {
  OsDeclaration,
  PipelineWarning,
  PrerequisiteEdge,
  ReconciliationResult,
  RequirementCandidate,
  RequirementKind,
  ResolvedRequirement,
  VersionRange
} from '../../types/index.js';
import { DEFAULT_ECOSYSTEM_PREFIXES, DEFAULT_OS } from '../../constants/index.js';
import {
  ConflictingOSRequirementError,
  UnsatisfiableRequirementError,
  type OsDeclarationDetail,
  type UnsatisfiableGroup
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { exactVersion, formatVersionRange, intersectRanges, parseVersionRange } from '../../utils/version-range.js';
import { normalizeOsName, normalizeSoftwareName } from '../../utils/requirement-name.js';

export interface ReconcileOptions {
  /** Operating system assumed when the crate declares none */
  defaultOs?: OsDeclaration;
  /** Ecosystem prefixes stripped from software names (`pypi:`, `conda-forge::`, ...) */
  ecosystemPrefixes?: readonly string[];
}

export interface ConflictGroup {
  name: string;
  kind: RequirementKind;
  members: RequirementCandidate[];
}

function uniqueSorted(ids: Iterable<string>): string[] {
  return Array.from(new Set(ids)).sort();
}

function compareNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Partition candidates by kind and normalized name, sorted by name
 */
export function groupCandidates(
  candidates: RequirementCandidate[],
  ecosystemPrefixes: readonly string[] = DEFAULT_ECOSYSTEM_PREFIXES
): ConflictGroup[] {
  const groups = new Map<string, ConflictGroup>();

  for (const candidate of candidates) {
    const name = candidate.kind === 'os'
      ? normalizeOsName(candidate.name)
      : normalizeSoftwareName(candidate.name, ecosystemPrefixes);
    const key = `${candidate.kind}:${name}`;

    let group = groups.get(key);
    if (!group) {
      group = { name, kind: candidate.kind, members: [] };
      groups.set(key, group);
    }
    group.members.push(candidate);
  }

  return Array.from(groups.values()).sort((a, b) => compareNames(a.name, b.name));
}

/**
 * Intersect every member range of a group; `null` when they share no version
 */
export function intersectGroup(group: ConflictGroup): VersionRange | null {
  let range: VersionRange | null = {};
  for (const member of group.members) {
    range = intersectRanges(range, member.range);
    if (!range) return null;
  }
  return range;
}

function releaseSegments(version: string): number[] {
  return version.split('.').map(segment => Number.parseInt(segment, 10));
}

function extendsRelease(release: string, pointRelease: string): boolean {
  const outer = releaseSegments(release);
  const inner = releaseSegments(pointRelease);
  return inner.length > outer.length && outer.every((segment, i) => segment === inner[i]);
}

/**
 * Intersect an operating system group. A pin on a release (`22.04`) also
 * admits a pin on one of its point releases (`22.04.3`); the longer pin wins.
 */
function intersectOsGroup(group: ConflictGroup): VersionRange | null {
  const pins = group.members
    .map(member => exactVersion(member.range))
    .filter((pin): pin is string => pin !== undefined);

  return intersectGroup({
    ...group,
    members: group.members.map(member => {
      const pin = exactVersion(member.range);
      if (pin === undefined) return member;
      const pointRelease = pins
        .filter(other => extendsRelease(pin, other))
        .sort((a, b) => releaseSegments(b).length - releaseSegments(a).length)[0];
      return pointRelease === undefined ? member : { ...member, range: parseVersionRange(pointRelease) };
    })
  });
}

function describeMembers(group: ConflictGroup): UnsatisfiableGroup {
  return {
    name: group.name,
    members: group.members.map(member => ({
      constraint: formatVersionRange(member.range),
      entityIds: member.sourceIds
    }))
  };
}

function describeOsMembers(group: ConflictGroup): OsDeclarationDetail[] {
  return group.members.map(member => ({
    name: group.name,
    constraint: formatVersionRange(member.range),
    entityIds: member.sourceIds
  }));
}

function resolveSoftware(groups: ConflictGroup[]): ResolvedRequirement[] {
  const resolved: ResolvedRequirement[] = [];
  const unsatisfiable: UnsatisfiableGroup[] = [];

  for (const group of groups) {
    const range = intersectGroup(group);
    if (!range) {
      unsatisfiable.push(describeMembers(group));
      continue;
    }
    resolved.push({
      name: group.name,
      range,
      kind: 'software',
      sourceIds: uniqueSorted(group.members.flatMap(m => m.sourceIds))
    });
    logger.debug(`Resolved '${group.name}' to ${formatVersionRange(range)} from ${group.members.length} declaration(s)`);
  }

  if (unsatisfiable.length > 0) {
    throw new UnsatisfiableRequirementError(unsatisfiable);
  }
  return resolved;
}

function resolveOs(
  groups: ConflictGroup[],
  defaultOs: OsDeclaration,
  warnings: PipelineWarning[]
): { os: ResolvedRequirement; defaulted: boolean } {
  if (groups.length > 1) {
    throw new ConflictingOSRequirementError(groups.flatMap(describeOsMembers));
  }

  if (groups.length === 1) {
    const [group] = groups;
    const range = intersectOsGroup(group);
    if (!range) {
      throw new ConflictingOSRequirementError(describeOsMembers(group));
    }
    return {
      os: { name: group.name, range, kind: 'os', sourceIds: uniqueSorted(group.members.flatMap(m => m.sourceIds)) },
      defaulted: false
    };
  }

  const name = normalizeOsName(defaultOs.name);
  const range = parseVersionRange(defaultOs.version);
  warnings.push({
    code: 'DEFAULTED_OS',
    message: `Crate declares no operating system; defaulting to ${name} ${formatVersionRange(range)}`,
    entityIds: []
  });
  return { os: { name, range, kind: 'os', sourceIds: [] }, defaulted: true };
}

function normalizeEdges(
  edges: PrerequisiteEdge[],
  softwareNames: Set<string>,
  ecosystemPrefixes: readonly string[]
): Array<{ before: string; after: string }> {
  const seen = new Map<string, { before: string; after: string }>();

  for (const edge of edges) {
    const before = normalizeSoftwareName(edge.before, ecosystemPrefixes);
    const after = normalizeSoftwareName(edge.after, ecosystemPrefixes);
    if (before === after) {
      logger.debug(`Ignoring self prerequisite of '${after}' declared by '${edge.sourceId}'`);
      continue;
    }
    if (!softwareNames.has(before) || !softwareNames.has(after)) continue;
    seen.set(`${before}\u0000${after}`, { before, after });
  }

  return Array.from(seen.values()).sort((a, b) => compareNames(a.before, b.before) || compareNames(a.after, b.after));
}

/**
 * Reconcile requirement candidates into at most one OS requirement and exactly
 * one resolved range per software name.
 *
 * @throws UnsatisfiableRequirementError listing every group whose ranges do not intersect
 * @throws ConflictingOSRequirementError for different distributions or incompatible versions
 */
export function reconcileRequirements(
  candidates: RequirementCandidate[],
  prerequisites: PrerequisiteEdge[] = [],
  options: ReconcileOptions = {}
): ReconciliationResult {
  const ecosystemPrefixes = options.ecosystemPrefixes ?? DEFAULT_ECOSYSTEM_PREFIXES;
  const groups = groupCandidates(candidates, ecosystemPrefixes);
  const warnings: PipelineWarning[] = [];

  const software = resolveSoftware(groups.filter(g => g.kind === 'software'));
  const { os, defaulted } = resolveOs(
    groups.filter(g => g.kind === 'os'),
    options.defaultOs ?? DEFAULT_OS,
    warnings
  );

  const softwareNames = new Set(software.map(r => r.name));
  return {
    requirements: {
      os,
      software,
      prerequisites: normalizeEdges(prerequisites, softwareNames, ecosystemPrefixes),
      defaultedOs: defaulted
    },
    warnings
  };
}
