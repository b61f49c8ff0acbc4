/**
 * Build Plan Generator: turns a reconciled requirement set into the ordered
 * container build plan.
 *
 * The first step selects the base image. Install steps follow in topological
 * order of the declared prerequisites, with ties broken by normalized name,
 * so the same input always yields the same steps.
 */

import * as yaml from 'js-yaml';
import type {
  BaseImageEntry,
  BuildPlan,
  BuildStep,
  PlanFormat,
  ResolvedRequirement,
  ResolvedRequirementSet
} from '../../types/index.js';
import { CyclicDependencyError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { formatVersionRange } from '../../utils/version-range.js';
import { loadBuiltInCatalog, selectBaseImage } from './base-images.js';

export interface GenerateOptions {
  /** Base image catalog; defaults to the built-in one */
  baseImages?: BaseImageEntry[];
}

function insertSorted(queue: string[], name: string): void {
  let low = 0;
  let high = queue.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (queue[mid] < name) low = mid + 1;
    else high = mid;
  }
  queue.splice(low, 0, name);
}

function reachesItself(start: string, successors: Map<string, Set<string>>, within: Set<string>): string[] | null {
  const parent = new Map<string, string>();
  const queue = [start];
  const seen = new Set<string>();

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const next of Array.from(successors.get(current) ?? []).sort()) {
      if (!within.has(next)) continue;
      if (next === start) {
        const path = [start];
        for (let node: string | undefined = current; node !== undefined && node !== start; node = parent.get(node)) {
          path.splice(1, 0, node);
        }
        path.push(start);
        return path;
      }
      if (!seen.has(next)) {
        seen.add(next);
        parent.set(next, current);
        queue.push(next);
      }
    }
  }
  return null;
}

function reportCycle(
  remaining: Set<string>,
  successors: Map<string, Set<string>>,
  byName: Map<string, ResolvedRequirement>
): never {
  const members: string[] = [];
  let cyclePath: string[] = [];
  for (const name of Array.from(remaining).sort()) {
    const path = reachesItself(name, successors, remaining);
    if (path) {
      members.push(name);
      if (cyclePath.length === 0) cyclePath = path;
    }
  }
  const entityIds = members.flatMap(name => byName.get(name)?.sourceIds ?? []);
  throw new CyclicDependencyError(members, cyclePath, entityIds);
}

/**
 * Order software requirements with Kahn's algorithm; independent requirements
 * come out in lexicographic order of their normalized names.
 *
 * @throws CyclicDependencyError naming every requirement on a prerequisite cycle
 */
export function orderRequirements(
  software: ResolvedRequirement[],
  prerequisites: Array<{ before: string; after: string }>
): ResolvedRequirement[] {
  const byName = new Map(software.map(requirement => [requirement.name, requirement]));
  const successors = new Map<string, Set<string>>();
  const inDegree = new Map<string, number>();
  for (const name of byName.keys()) {
    successors.set(name, new Set());
    inDegree.set(name, 0);
  }

  for (const { before, after } of prerequisites) {
    const next = successors.get(before);
    if (!next || !byName.has(after) || next.has(after)) continue;
    next.add(after);
    inDegree.set(after, (inDegree.get(after) ?? 0) + 1);
  }

  const ready = Array.from(inDegree.entries())
    .filter(([, degree]) => degree === 0)
    .map(([name]) => name)
    .sort();
  const ordered: ResolvedRequirement[] = [];

  while (ready.length > 0) {
    const name = ready.shift();
    if (name === undefined) break;
    const requirement = byName.get(name);
    if (requirement) ordered.push(requirement);

    for (const next of successors.get(name) ?? []) {
      const degree = (inDegree.get(next) ?? 0) - 1;
      inDegree.set(next, degree);
      if (degree === 0) insertSorted(ready, next);
    }
  }

  if (ordered.length < byName.size) {
    const placed = new Set(ordered.map(requirement => requirement.name));
    const remaining = new Set(Array.from(byName.keys()).filter(name => !placed.has(name)));
    reportCycle(remaining, successors, byName);
  }
  return ordered;
}

/**
 * Generate the complete build plan, or fail without producing a partial one.
 *
 * @throws UnsupportedBaseOSError when the OS requirement maps to no base image
 * @throws CyclicDependencyError when prerequisites form a cycle
 */
export function generateBuildPlan(requirements: ResolvedRequirementSet, options: GenerateOptions = {}): BuildPlan {
  const catalog = options.baseImages ?? loadBuiltInCatalog();
  const base = selectBaseImage(requirements.os, catalog);
  const ordered = orderRequirements(requirements.software, requirements.prerequisites);

  const steps: BuildStep[] = [
    Object.freeze({ step: 'base-image', image: base.image } as const),
    ...ordered.map(requirement => Object.freeze({
      step: 'install',
      name: requirement.name,
      constraint: formatVersionRange(requirement.range)
    } as const))
  ];

  logger.debug(`Generated build plan on ${base.image} with ${ordered.length} install step(s)`);
  return Object.freeze({ baseImage: base.image, steps: Object.freeze(steps) });
}

/**
 * Serialize a plan as JSON or YAML. Key order is fixed, so equal plans
 * serialize to identical bytes.
 */
export function serializeBuildPlan(plan: BuildPlan, format: PlanFormat = 'json'): string {
  const document = {
    baseImage: plan.baseImage,
    steps: plan.steps.map(step => step.step === 'base-image'
      ? { step: step.step, image: step.image }
      : { step: step.step, name: step.name, constraint: step.constraint })
  };
  if (format === 'yaml') {
    return yaml.dump(document, { indent: 2, lineWidth: -1, noRefs: true });
  }
  return `${JSON.stringify(document, null, 2)}\n`;
}
