/**
 * Graph Loader: parses an RO-Crate JSON-LD document into a flat entity arena.
 *
 * Nested node objects are lifted into entities of their own and replaced by
 * `{ ref }` links, so later stages only ever follow identifiers.
 */

import type { CrateGraph, Entity, PropertyAtom, PropertyValue } from '../../types/index.js';
import { CRATE_IDS, ENTITY_PROPERTIES, SCHEMA_ORG_PREFIXES } from '../../constants/index.js';
import { MalformedDocumentError, MissingRootEntityError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { referencedIds } from './crate-graph.js';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Term lookup built from the document's inline `@context` objects.
 * Remote contexts (plain URL strings) are taken as the RO-Crate/schema.org
 * vocabulary, which is compacted unconditionally.
 */
export class ContextTerms {
  private readonly termByIri = new Map<string, string>();
  private readonly prefixes = new Map<string, string>();
  private vocab?: string;

  constructor(context: unknown) {
    const parts = Array.isArray(context) ? context : [context];
    for (const part of parts) {
      if (typeof part === 'string') continue;
      if (!isJsonObject(part)) {
        throw new MalformedDocumentError('@context entries must be strings or objects');
      }
      this.addDefinitions(part);
    }
  }

  private addDefinitions(definitions: JsonObject): void {
    for (const [term, definition] of Object.entries(definitions)) {
      if (term === '@vocab' && typeof definition === 'string') {
        this.vocab = definition;
        continue;
      }
      if (term.startsWith('@')) continue;

      const nestedId = isJsonObject(definition) ? definition['@id'] : undefined;
      const iri = typeof definition === 'string'
        ? definition
        : typeof nestedId === 'string' ? nestedId : undefined;
      if (!iri) continue;

      if (iri.endsWith('/') || iri.endsWith('#')) {
        this.prefixes.set(term, iri);
      } else {
        this.termByIri.set(iri, term);
      }
    }
  }

  private expand(key: string): string {
    const separator = key.indexOf(':');
    if (separator <= 0) return key;
    const base = this.prefixes.get(key.slice(0, separator));
    return base ? base + key.slice(separator + 1) : key;
  }

  /**
   * Compact a key or type written as a full IRI or CURIE back to its short term
   */
  compact(key: string): string {
    if (key.startsWith('@')) return key;

    const iri = this.expand(key);
    const term = this.termByIri.get(key) ?? this.termByIri.get(iri);
    if (term) return term;

    for (const prefix of SCHEMA_ORG_PREFIXES) {
      if (iri.startsWith(prefix)) return iri.slice(prefix.length);
    }
    if (this.vocab && iri.startsWith(this.vocab)) {
      return iri.slice(this.vocab.length);
    }
    return key;
  }
}

class CrateGraphBuilder {
  private readonly entities: Entity[] = [];
  private readonly index = new Map<string, number>();
  private blankNodeCount = 0;

  constructor(private readonly terms: ContextTerms) {}

  /**
   * Register a node object and return its id. Repeated ids merge into the
   * first slot; later declarations overwrite the properties they repeat.
   */
  addNode(node: JsonObject): string {
    const rawId = node['@id'];
    const id = typeof rawId === 'string' ? rawId : `${CRATE_IDS.BLANK_NODE_PREFIX}${this.blankNodeCount++}`;

    let position = this.index.get(id);
    if (position === undefined) {
      position = this.entities.length;
      this.entities.push({ id, types: [], properties: {} });
      this.index.set(id, position);
    } else {
      logger.debug(`Merging repeated definition of entity '${id}'`);
    }
    const entity = this.entities[position];

    if ('@type' in node) {
      entity.types = this.convertTypes(node['@type'], id);
    }

    for (const [key, raw] of Object.entries(node)) {
      if (key === '@id' || key === '@type' || key === '@context') continue;
      Object.defineProperty(entity.properties, this.terms.compact(key), {
        value: this.convertValue(raw),
        enumerable: true,
        writable: true,
        configurable: true
      });
    }

    return id;
  }

  private convertTypes(raw: unknown, id: string): string[] {
    const values = Array.isArray(raw) ? raw : [raw];
    const types: string[] = [];
    for (const value of values) {
      if (typeof value !== 'string') {
        throw new MalformedDocumentError(`@type of '${id}' must be a string or a list of strings`, { entityIds: [id] });
      }
      types.push(this.terms.compact(value));
    }
    return types;
  }

  private convertValue(raw: unknown): PropertyValue {
    if (Array.isArray(raw)) {
      return raw.flatMap(item => this.convertValue(item));
    }
    return this.convertAtom(raw);
  }

  private convertAtom(raw: unknown): PropertyAtom | PropertyAtom[] {
    if (raw === null || typeof raw === 'string' || typeof raw === 'number' || typeof raw === 'boolean') {
      return raw;
    }
    if (!isJsonObject(raw)) {
      return String(raw);
    }
    if ('@value' in raw) {
      const value = raw['@value'];
      return value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean'
        ? value
        : JSON.stringify(value);
    }
    if ('@list' in raw || '@set' in raw) {
      const items = raw['@list'] ?? raw['@set'];
      return Array.isArray(items) ? items.flatMap(item => this.convertValue(item)) : this.convertAtom(items);
    }

    const id = raw['@id'];
    if (typeof id === 'string' && Object.keys(raw).length === 1) {
      return { ref: id };
    }
    return { ref: this.addNode(raw) };
  }

  build(): Pick<CrateGraph, 'entities' | 'index'> {
    return { entities: this.entities, index: this.index };
  }
}

function decode(input: Uint8Array | string): string {
  if (typeof input === 'string') {
    return input.replace(/^\uFEFF/, '');
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(input);
  } catch (error) {
    throw new MalformedDocumentError('document is not valid UTF-8', { cause: String(error) });
  }
}

function parseDocument(text: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new MalformedDocumentError(`invalid JSON (${reason})`);
  }
  if (!isJsonObject(parsed)) {
    throw new MalformedDocumentError('top-level value must be a JSON object');
  }
  return parsed;
}

function resolveRootId(entities: Entity[], index: Map<string, number>): { rootId: string; descriptorId?: string } {
  const descriptorId = CRATE_IDS.DESCRIPTORS.find(id => index.has(id));
  if (!descriptorId) {
    if (!index.has(CRATE_IDS.ROOT_DATASET)) {
      throw new MissingRootEntityError(CRATE_IDS.ROOT_DATASET);
    }
    return { rootId: CRATE_IDS.ROOT_DATASET };
  }

  const descriptor = entities[index.get(descriptorId) ?? -1];
  const [about] = referencedIds(descriptor?.properties[ENTITY_PROPERTIES.ABOUT]);
  const rootId = about ?? CRATE_IDS.ROOT_DATASET;
  if (!index.has(rootId)) {
    throw new MissingRootEntityError(rootId, descriptorId);
  }
  return { rootId, descriptorId };
}

/**
 * Load a crate metadata document into a de-referenced entity graph.
 *
 * @throws MalformedDocumentError when the bytes are not a JSON-LD crate document
 * @throws MissingRootEntityError when the root dataset cannot be found
 */
export function loadCrateGraph(input: Uint8Array | string): CrateGraph {
  const document = parseDocument(decode(input));

  const context = document['@context'];
  if (context === undefined || !(typeof context === 'string' || isJsonObject(context) || Array.isArray(context))) {
    throw new MalformedDocumentError('missing or invalid @context');
  }
  const graphNodes = document['@graph'];
  if (!Array.isArray(graphNodes)) {
    throw new MalformedDocumentError('missing @graph array');
  }

  const builder = new CrateGraphBuilder(new ContextTerms(context));
  graphNodes.forEach((node, position) => {
    if (!isJsonObject(node) || typeof node['@id'] !== 'string') {
      throw new MalformedDocumentError(`@graph node at position ${position} has no string @id`);
    }
    builder.addNode(node);
  });

  const { entities, index } = builder.build();
  const { rootId, descriptorId } = resolveRootId(entities, index);
  logger.debug(`Loaded crate graph with ${entities.length} entities (root '${rootId}')`);

  const graph: CrateGraph = { entities, index, rootId };
  if (descriptorId) graph.descriptorId = descriptorId;
  return graph;
}
