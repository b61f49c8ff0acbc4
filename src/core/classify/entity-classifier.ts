/**
 * Entity Classifier: tags every entity with a semantic role and extracts the
 * software and operating system requirement candidates the crate declares.
 *
 * Classification never fails. Unknown types become `other`, unusable version
 * strings degrade to `any-version`, and both are reported as warnings.
 */

import type {
  ClassificationResult,
  CrateGraph,
  Entity,
  EntityKind,
  PipelineWarning,
  PrerequisiteEdge,
  RequirementCandidate,
  RequirementKind,
  VersionRange,
  WarningCode
} from '../../types/index.js';
import { ENTITY_PROPERTIES, KIND_PRECEDENCE, REQUIREMENT_PROPERTIES, TYPE_KINDS } from '../../constants/index.js';
import { InvalidVersionRangeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { parseVersionRange } from '../../utils/version-range.js';
import { parseRequirementExpression, splitNameAndVersion } from '../../utils/requirement-name.js';
import { firstText, getEntity, isEntityRef, toAtoms } from '../graph/crate-graph.js';

const SELF_DECLARING_KINDS: ReadonlySet<EntityKind> = new Set(['operating-system', 'runtime', 'software-application']);

/**
 * Pick the most specific kind among an entity's declared types
 */
export function classifyEntity(entity: Entity): EntityKind {
  const kinds = new Set(entity.types.map(type => TYPE_KINDS[type.toLowerCase()] ?? 'other'));
  return KIND_PRECEDENCE.find(kind => kinds.has(kind)) ?? 'other';
}

class ClassificationCollector {
  readonly kinds = new Map<string, EntityKind>();
  readonly candidates: RequirementCandidate[] = [];
  readonly prerequisites: PrerequisiteEdge[] = [];
  readonly warnings: PipelineWarning[] = [];
  /** Requirement name each self-declaring entity installs as */
  private readonly selfNames = new Map<string, string>();

  constructor(private readonly graph: CrateGraph) {
    for (const entity of graph.entities) {
      this.kinds.set(entity.id, classifyEntity(entity));
    }
  }

  run(): ClassificationResult {
    for (const entity of this.graph.entities) {
      const kind = this.kindOf(entity.id);
      if (SELF_DECLARING_KINDS.has(kind)) {
        this.addSelfCandidate(entity, kind);
      }
    }

    for (const entity of this.graph.entities) {
      const kind = this.kindOf(entity.id);
      if (kind === 'software-application' || kind === 'source-code' || entity.id === this.graph.rootId) {
        this.collectDeclarations(entity, kind);
      }
    }

    return {
      kinds: this.kinds,
      candidates: this.candidates,
      prerequisites: this.prerequisites,
      warnings: this.warnings
    };
  }

  private kindOf(id: string): EntityKind {
    return this.kinds.get(id) ?? 'other';
  }

  private warn(code: WarningCode, message: string, entityIds: string[]): void {
    logger.debug(message);
    this.warnings.push({ code, message, entityIds });
  }

  private rangeFor(text: string | undefined, entityId: string): VersionRange {
    if (text === undefined) return {};
    try {
      return parseVersionRange(text);
    } catch (error) {
      if (!(error instanceof InvalidVersionRangeError)) throw error;
      this.warn(
        'DEGRADED_VERSION',
        `Entity '${entityId}' declares unusable version '${text}'; treating it as any-version`,
        [entityId]
      );
      return {};
    }
  }

  private push(name: string, range: VersionRange, kind: RequirementKind, entityId: string): void {
    this.candidates.push({ name, range, kind, sourceIds: [entityId] });
  }

  private addSelfCandidate(entity: Entity, kind: EntityKind): void {
    const declaredVersion = firstText(entity, ENTITY_PROPERTIES.SOFTWARE_VERSION, ENTITY_PROPERTIES.VERSION);

    if (kind === 'software-application') {
      const name = firstText(entity, ENTITY_PROPERTIES.NAME) ?? entity.id;
      this.selfNames.set(entity.id, name);
      this.push(name, this.rangeFor(declaredVersion, entity.id), 'software', entity.id);
      return;
    }

    // Runtimes and operating systems often carry the version in their name
    const rawName = kind === 'runtime'
      ? firstText(entity, ENTITY_PROPERTIES.NAME, ENTITY_PROPERTIES.ALTERNATE_NAME) ?? entity.id
      : firstText(entity, ENTITY_PROPERTIES.NAME) ?? entity.id;
    const split = declaredVersion === undefined ? splitNameAndVersion(rawName) : { name: rawName, version: declaredVersion };
    const requirementKind: RequirementKind = kind === 'operating-system' ? 'os' : 'software';

    if (requirementKind === 'software') {
      this.selfNames.set(entity.id, split.name);
    }
    this.push(split.name, this.rangeFor(split.version, entity.id), requirementKind, entity.id);
  }

  private addEdge(before: string, declarer: Entity, declarerKind: EntityKind): void {
    if (declarerKind !== 'software-application') return;
    const after = this.selfNames.get(declarer.id);
    if (after === undefined) return;
    this.prerequisites.push({ before, after, sourceId: declarer.id });
  }

  private collectDeclarations(entity: Entity, kind: EntityKind): void {
    for (const property of REQUIREMENT_PROPERTIES) {
      for (const atom of toAtoms(entity.properties[property])) {
        if (isEntityRef(atom)) {
          this.followSoftwareReference(atom.ref, entity, kind, property);
        } else if (typeof atom === 'string') {
          this.addRequirementText(atom, entity, kind);
        }
      }
    }

    for (const atom of toAtoms(entity.properties[ENTITY_PROPERTIES.PROGRAMMING_LANGUAGE])) {
      if (isEntityRef(atom)) {
        this.followSoftwareReference(atom.ref, entity, kind, ENTITY_PROPERTIES.PROGRAMMING_LANGUAGE);
      } else if (typeof atom === 'string' && atom.trim()) {
        const { name, version } = splitNameAndVersion(atom);
        this.push(name, this.rangeFor(version, entity.id), 'software', entity.id);
        this.addEdge(name, entity, kind);
      }
    }

    for (const atom of toAtoms(entity.properties[ENTITY_PROPERTIES.OPERATING_SYSTEM])) {
      if (isEntityRef(atom)) {
        this.followOsReference(atom.ref, entity);
      } else if (typeof atom === 'string' && atom.trim()) {
        const { name, version } = splitNameAndVersion(atom);
        this.push(name, this.rangeFor(version, entity.id), 'os', entity.id);
      }
    }
  }

  private addRequirementText(text: string, declarer: Entity, declarerKind: EntityKind): void {
    // Some crates reference entities by bare id instead of {"@id": ...}
    if (getEntity(this.graph, text) && text !== declarer.id) {
      this.followSoftwareReference(text, declarer, declarerKind, 'requirement text');
      return;
    }

    const expression = parseRequirementExpression(text);
    if (!expression) {
      this.warn('UNPARSEABLE_REQUIREMENT', `Entity '${declarer.id}' declares unparseable requirement '${text}'`, [declarer.id]);
      return;
    }
    this.push(expression.name, this.rangeFor(expression.rangeText, declarer.id), 'software', declarer.id);
    this.addEdge(expression.name, declarer, declarerKind);
  }

  private followSoftwareReference(targetId: string, declarer: Entity, declarerKind: EntityKind, via: string): void {
    const target = getEntity(this.graph, targetId);
    if (!target) {
      this.warn('DANGLING_REFERENCE', `Entity '${declarer.id}' references missing entity '${targetId}' in ${via}`, [declarer.id, targetId]);
      return;
    }

    const targetKind = this.kindOf(targetId);
    if (targetKind === 'operating-system') {
      // Already contributed its own OS candidate
      return;
    }
    const targetName = this.selfNames.get(targetId) ?? this.addInlineDependency(target, declarer);
    if (targetName === undefined) {
      this.warn(
        'NON_SOFTWARE_REFERENCE',
        `Entity '${declarer.id}' lists '${targetId}' (${targetKind}) in ${via}, which is not installable software`,
        [declarer.id, targetId]
      );
      return;
    }
    this.addEdge(targetName, declarer, declarerKind);
  }

  /**
   * Untyped `{ name, version }` objects listed as dependencies count as
   * software declared by the entity that lists them.
   */
  private addInlineDependency(target: Entity, declarer: Entity): string | undefined {
    if (target.types.length > 0) return undefined;
    const name = firstText(target, ENTITY_PROPERTIES.NAME);
    if (name === undefined) return undefined;

    const version = firstText(target, ENTITY_PROPERTIES.VERSION, ENTITY_PROPERTIES.SOFTWARE_VERSION);
    this.push(name, this.rangeFor(version, declarer.id), 'software', declarer.id);
    return name;
  }

  private followOsReference(targetId: string, declarer: Entity): void {
    if (!getEntity(this.graph, targetId)) {
      this.warn('DANGLING_REFERENCE', `Entity '${declarer.id}' references missing operating system '${targetId}'`, [declarer.id, targetId]);
      return;
    }
    const targetKind = this.kindOf(targetId);
    if (targetKind !== 'operating-system') {
      this.warn(
        'NON_SOFTWARE_REFERENCE',
        `Entity '${declarer.id}' lists '${targetId}' (${targetKind}) as its operating system`,
        [declarer.id, targetId]
      );
    }
  }
}

/**
 * Classify every entity of a loaded crate and collect requirement candidates
 * plus the prerequisite edges declared between installable software.
 */
export function classifyEntities(graph: CrateGraph): ClassificationResult {
  const result = new ClassificationCollector(graph).run();
  logger.debug(
    `Classified ${result.kinds.size} entities: ${result.candidates.length} requirement candidates, ` +
    `${result.prerequisites.length} prerequisite edges`
  );
  return result;
}
