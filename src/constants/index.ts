/**
 * Shared constants for the cratebuild CLI and pipeline
 */

import type { EntityKind, OsDeclaration } from '../types/index.js';

export const FILE_PATTERNS = {
  CRATE_METADATA: 'ro-crate-metadata.json',
  CRATE_METADATA_LEGACY: 'ro-crate-metadata.jsonld',
  CONFIG_FILES: ['cratebuild.config.jsonc', 'cratebuild.config.json']
} as const;

export const CRATE_IDS = {
  ROOT_DATASET: './',
  DESCRIPTORS: [FILE_PATTERNS.CRATE_METADATA, FILE_PATTERNS.CRATE_METADATA_LEGACY],
  BLANK_NODE_PREFIX: '_:b'
} as const;

/**
 * Vocabulary prefixes always compacted to bare terms, whatever the context says
 */
export const SCHEMA_ORG_PREFIXES = ['http://schema.org/', 'https://schema.org/', 'schema:'] as const;

/**
 * Kinds ordered from most to least specific. An entity carrying several types
 * takes the first kind in this list that any of its types maps to.
 */
export const KIND_PRECEDENCE: readonly EntityKind[] = [
  'operating-system',
  'runtime',
  'software-application',
  'source-code',
  'dataset',
  'other'
];

export const TYPE_KINDS: Readonly<Record<string, EntityKind>> = {
  operatingsystem: 'operating-system',
  computerlanguage: 'runtime',
  programminglanguage: 'runtime',
  runtimeplatform: 'runtime',
  softwareapplication: 'software-application',
  webapplication: 'software-application',
  mobileapplication: 'software-application',
  softwaresourcecode: 'source-code',
  computationalworkflow: 'source-code',
  script: 'source-code',
  dataset: 'dataset',
  file: 'dataset',
  mediaobject: 'dataset',
  datadownload: 'dataset'
};

export const REQUIREMENT_PROPERTIES = ['softwareRequirements', 'requirements', 'softwareDependencies'] as const;

export const ENTITY_PROPERTIES = {
  NAME: 'name',
  ALTERNATE_NAME: 'alternateName',
  VERSION: 'version',
  SOFTWARE_VERSION: 'softwareVersion',
  PROGRAMMING_LANGUAGE: 'programmingLanguage',
  OPERATING_SYSTEM: 'operatingSystem',
  ABOUT: 'about'
} as const;

export const DEFAULT_ECOSYSTEM_PREFIXES = [
  'pypi', 'pip', 'conda', 'conda-forge', 'bioconda', 'npm', 'cran', 'apt', 'deb', 'rpm', 'gem', 'cargo', 'maven'
] as const;

export const OS_ALIASES: Readonly<Record<string, string>> = {
  rocky: 'rockylinux',
  alma: 'almalinux',
  redhatenterprise: 'rhel',
  redhat: 'rhel',
  centosstream: 'centos',
  opensuseleap: 'opensuse'
};

export const ANY_VERSION = 'any-version';

export const DEFAULT_OS: OsDeclaration = {
  name: 'ubuntu',
  version: '22.04'
};
