/**
 * Data model shared by the crate pipeline stages.
 *
 * Every stage consumes its input and returns a new value; nothing here is
 * mutated once handed to the next stage.
 */

// Graph

export type Scalar = string | number | boolean | null;

/** A symbolic link to another entity in the same crate */
export interface EntityRef {
  ref: string;
}

export type PropertyAtom = Scalar | EntityRef;

export type PropertyValue = PropertyAtom | PropertyAtom[];

export interface Entity {
  id: string;
  /** Compacted `@type` values, in declaration order */
  types: string[];
  properties: Record<string, PropertyValue>;
}

/**
 * Arena of entities keyed by identifier. References between entities are ids,
 * never nested objects, so cyclic crates stay finite.
 */
export interface CrateGraph {
  entities: Entity[];
  index: Map<string, number>;
  rootId: string;
  /** Id of the `ro-crate-metadata.json` descriptor, when the crate has one */
  descriptorId?: string;
}

// Classification

export type EntityKind =
  | 'operating-system'
  | 'runtime'
  | 'software-application'
  | 'source-code'
  | 'dataset'
  | 'other';

export type RequirementKind = 'software' | 'os';

export interface VersionBound {
  /** Version text as declared, e.g. `20.04` */
  version: string;
  inclusive: boolean;
}

/** Interval of versions; a missing bound is unbounded on that side */
export interface VersionRange {
  lower?: VersionBound;
  upper?: VersionBound;
}

export interface RequirementCandidate {
  name: string;
  range: VersionRange;
  kind: RequirementKind;
  sourceIds: string[];
}

/** `before` must be installed before `after` (both requirement names) */
export interface PrerequisiteEdge {
  before: string;
  after: string;
  sourceId: string;
}

export type WarningCode =
  | 'DEGRADED_VERSION'
  | 'DANGLING_REFERENCE'
  | 'NON_SOFTWARE_REFERENCE'
  | 'UNPARSEABLE_REQUIREMENT'
  | 'DEFAULTED_OS';

export interface PipelineWarning {
  code: WarningCode;
  message: string;
  entityIds: string[];
}

export interface ClassificationResult {
  kinds: Map<string, EntityKind>;
  candidates: RequirementCandidate[];
  prerequisites: PrerequisiteEdge[];
  warnings: PipelineWarning[];
}

// Reconciliation

export interface ResolvedRequirement {
  name: string;
  range: VersionRange;
  kind: RequirementKind;
  sourceIds: string[];
}

export interface ResolvedRequirementSet {
  os: ResolvedRequirement;
  software: ResolvedRequirement[];
  prerequisites: Array<{ before: string; after: string }>;
  defaultedOs: boolean;
}

export interface ReconciliationResult {
  requirements: ResolvedRequirementSet;
  warnings: PipelineWarning[];
}

// Build plan

export interface BaseImageStep {
  readonly step: 'base-image';
  readonly image: string;
}

export interface InstallStep {
  readonly step: 'install';
  readonly name: string;
  readonly constraint: string;
}

export type BuildStep = BaseImageStep | InstallStep;

export interface BuildPlan {
  readonly baseImage: string;
  readonly steps: readonly BuildStep[];
}

export type PlanFormat = 'json' | 'yaml';
