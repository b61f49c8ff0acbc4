/**
 * Crate pipeline: load -> classify -> reconcile -> generate.
 *
 * Each stage hands an immutable value to the next. Any stage error ends the
 * run; warnings from every stage are gathered in order.
 */

import type {
  BaseImageEntry,
  BuildPlan,
  ClassificationResult,
  CrateGraph,
  OsDeclaration,
  PipelineWarning,
  ResolvedRequirementSet
} from '../types/index.js';
import { logger } from '../utils/logger.js';
import { loadCrateGraph } from './graph/graph-loader.js';
import { classifyEntities } from './classify/entity-classifier.js';
import { reconcileRequirements } from './reconcile/requirement-reconciler.js';
import { generateBuildPlan } from './plan/build-plan-generator.js';

export interface PipelineOptions {
  defaultOs?: OsDeclaration;
  baseImages?: BaseImageEntry[];
  ecosystemPrefixes?: readonly string[];
}

export interface CrateAnalysis {
  graph: CrateGraph;
  classification: ClassificationResult;
}

export interface PipelineResult {
  plan: BuildPlan;
  requirements: ResolvedRequirementSet;
  classification: ClassificationResult;
  warnings: PipelineWarning[];
}

/**
 * Load and classify a crate without reconciling anything
 */
export function analyzeCrate(input: Uint8Array | string): CrateAnalysis {
  const graph = loadCrateGraph(input);
  return { graph, classification: classifyEntities(graph) };
}

/**
 * Run the whole pipeline over one metadata document
 */
export function runCratePipeline(input: Uint8Array | string, options: PipelineOptions = {}): PipelineResult {
  const { classification } = analyzeCrate(input);

  const reconciliation = reconcileRequirements(classification.candidates, classification.prerequisites, {
    defaultOs: options.defaultOs,
    ecosystemPrefixes: options.ecosystemPrefixes
  });
  logger.debug(
    `Reconciled ${reconciliation.requirements.software.length} software requirement(s) on ` +
    `${reconciliation.requirements.os.name}`
  );

  const plan = generateBuildPlan(reconciliation.requirements, { baseImages: options.baseImages });

  return {
    plan,
    requirements: reconciliation.requirements,
    classification,
    warnings: [...classification.warnings, ...reconciliation.warnings]
  };
}
