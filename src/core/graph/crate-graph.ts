/**
 * Read-only accessors over a loaded crate graph.
 */

import type { CrateGraph, Entity, EntityRef, PropertyAtom, PropertyValue } from '../../types/index.js';

export function isEntityRef(atom: PropertyAtom): atom is EntityRef {
  return typeof atom === 'object' && atom !== null && 'ref' in atom;
}

export function toAtoms(value: PropertyValue | undefined): PropertyAtom[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

export function getEntity(graph: CrateGraph, id: string): Entity | undefined {
  const position = graph.index.get(id);
  return position === undefined ? undefined : graph.entities[position];
}

/**
 * Ids referenced by a property value, in declaration order
 */
export function referencedIds(value: PropertyValue | undefined): string[] {
  return toAtoms(value).filter(isEntityRef).map(atom => atom.ref);
}

/**
 * Literal text of a property value; numbers are stringified, booleans and nulls skipped
 */
export function textValues(value: PropertyValue | undefined): string[] {
  const texts: string[] = [];
  for (const atom of toAtoms(value)) {
    if (typeof atom === 'string') {
      const trimmed = atom.trim();
      if (trimmed) texts.push(trimmed);
    } else if (typeof atom === 'number') {
      texts.push(String(atom));
    }
  }
  return texts;
}

/**
 * First literal text found under any of the given property keys
 */
export function firstText(entity: Entity, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const [text] = textValues(entity.properties[key]);
    if (text !== undefined) return text;
  }
  return undefined;
}
