import { CrateBuildError, ErrorCodes, CommandResult } from '../types/index.js';
import { logger } from './logger.js';

/**
 * Error classes for every failure kind of the crate pipeline.
 * Each one carries the entity ids involved under `details.entityIds`.
 */

export interface ConstraintDeclaration {
  constraint: string;
  entityIds: string[];
}

export interface UnsatisfiableGroup {
  name: string;
  members: ConstraintDeclaration[];
}

export interface OsDeclarationDetail extends ConstraintDeclaration {
  name: string;
}

function uniqueSorted(ids: Iterable<string>): string[] {
  return Array.from(new Set(ids)).sort();
}

export class MalformedDocumentError extends CrateBuildError {
  constructor(reason: string, details: Record<string, unknown> = {}) {
    super(`Malformed crate document: ${reason}`, ErrorCodes.MALFORMED_DOCUMENT, { entityIds: [], ...details });
    this.name = 'MalformedDocumentError';
  }
}

export class MissingRootEntityError extends CrateBuildError {
  constructor(expectedId: string, descriptorId?: string) {
    const via = descriptorId ? ` (declared by '${descriptorId}')` : '';
    super(
      `Crate has no root dataset entity '${expectedId}'${via}`,
      ErrorCodes.MISSING_ROOT_ENTITY,
      { expectedId, descriptorId, entityIds: descriptorId ? [descriptorId] : [] }
    );
    this.name = 'MissingRootEntityError';
  }
}

export class UnsatisfiableRequirementError extends CrateBuildError {
  constructor(groups: UnsatisfiableGroup[]) {
    const summary = groups
      .map(group => `'${group.name}' (${group.members
        .map(member => `${member.constraint} from ${member.entityIds.join(', ')}`)
        .join('; ')})`)
      .join(', ');
    super(
      `No version satisfies every declared constraint for ${summary}`,
      ErrorCodes.UNSATISFIABLE_REQUIREMENT,
      {
        conflicts: groups,
        entityIds: uniqueSorted(groups.flatMap(g => g.members.flatMap(m => m.entityIds)))
      }
    );
    this.name = 'UnsatisfiableRequirementError';
  }
}

export class ConflictingOSRequirementError extends CrateBuildError {
  constructor(declarations: OsDeclarationDetail[]) {
    const summary = declarations
      .map(d => `${d.name} ${d.constraint} (${d.entityIds.join(', ')})`)
      .join(' vs ');
    super(
      `Conflicting operating system requirements: ${summary}`,
      ErrorCodes.CONFLICTING_OS_REQUIREMENT,
      { declarations, entityIds: uniqueSorted(declarations.flatMap(d => d.entityIds)) }
    );
    this.name = 'ConflictingOSRequirementError';
  }
}

export class UnsupportedBaseOSError extends CrateBuildError {
  constructor(distribution: string, constraint: string, supportedVersions: string[], entityIds: string[]) {
    const supported = supportedVersions.length > 0
      ? `. Supported versions: ${supportedVersions.join(', ')}`
      : '. No base images are known for this distribution';
    super(
      `No base image for ${distribution} ${constraint}${supported}`,
      ErrorCodes.UNSUPPORTED_BASE_OS,
      { distribution, constraint, supportedVersions, entityIds: uniqueSorted(entityIds) }
    );
    this.name = 'UnsupportedBaseOSError';
  }
}

export class CyclicDependencyError extends CrateBuildError {
  constructor(members: string[], cyclePath: string[], entityIds: string[]) {
    super(
      `Cyclic prerequisite chain: ${cyclePath.join(' -> ')} (members: ${members.join(', ')})`,
      ErrorCodes.CYCLIC_DEPENDENCY,
      { members, cyclePath, entityIds: uniqueSorted(entityIds) }
    );
    this.name = 'CyclicDependencyError';
  }
}

export class InvalidVersionRangeError extends CrateBuildError {
  constructor(text: string, reason: string) {
    super(`Invalid version constraint '${text}': ${reason}`, ErrorCodes.INVALID_VERSION_RANGE, { text, entityIds: [] });
    this.name = 'InvalidVersionRangeError';
  }
}

export class FileSystemError extends CrateBuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(`File system error: ${message}`, ErrorCodes.FILE_SYSTEM_ERROR, details);
    this.name = 'FileSystemError';
  }
}

export class ConfigError extends CrateBuildError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, ErrorCodes.CONFIG_ERROR, details);
    this.name = 'ConfigError';
  }
}

/**
 * Entity ids attached to an error, if it carries any
 */
export function getErrorEntityIds(error: CrateBuildError): string[] {
  const ids = error.details?.entityIds;
  return Array.isArray(ids) ? ids.filter((id): id is string => typeof id === 'string') : [];
}

/**
 * Error handler function that provides consistent error handling across commands
 */
export function handleError(error: unknown): CommandResult {
  if (error instanceof CrateBuildError) {
    logger.debug(error.message, { code: error.code, details: error.details });
    return {
      success: false,
      code: error.code,
      error: error.message
    };
  } else if (error instanceof Error) {
    logger.debug('Unexpected error occurred', { message: error.message, stack: error.stack });
    return {
      success: false,
      error: error.message
    };
  } else {
    logger.debug('Unknown error occurred', { error });
    return {
      success: false,
      error: 'An unknown error occurred'
    };
  }
}

/**
 * Renders an error for the error stream: kind, message and offending entities
 */
export function formatErrorReport(error: unknown): string {
  const result = handleError(error);
  const lines = [result.code ? `${result.code}: ${result.error}` : `Error: ${result.error}`];
  if (error instanceof CrateBuildError) {
    const ids = getErrorEntityIds(error);
    if (ids.length > 0) {
      lines.push(`  entities: ${ids.join(', ')}`);
    }
  }
  return lines.join('\n');
}

/**
 * Wraps an async function with error handling for Commander.js actions
 */
export function withErrorHandling<T extends unknown[]>(
  fn: (...args: T) => Promise<void>
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      console.error(formatErrorReport(error));
      process.exit(1);
    }
  };
}
