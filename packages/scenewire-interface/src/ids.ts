import type { NodeId } from './index.js';

const textEncoder = new TextEncoder();

export const MAX_IDENTIFIER_BYTES = 1024;
export const MAX_ATTRIBUTE_NAME_BYTES = 256;

export function utf8ByteLength(value: string): number {
  return textEncoder.encode(value).length;
}

function nameProblem(value: unknown, label: string, maxBytes: number): string | null {
  if (typeof value !== 'string') return `${label} must be a string`;
  if (value.length === 0) return `${label} must not be empty`;
  if (value.trim() !== value) return `${label} must not have leading or trailing whitespace: ${JSON.stringify(value)}`;
  // eslint-disable-next-line no-control-regex
  if (/[\u0000-\u001f\u007f]/.test(value)) return `${label} must not contain control characters: ${JSON.stringify(value)}`;
  const bytes = utf8ByteLength(value);
  if (bytes > maxBytes) return `${label} too long: ${bytes} bytes (max ${maxBytes})`;
  return null;
}

/**
 * Returns a description of what is wrong with `id`, or `null` when it is a valid NodeId.
 */
export function identifierProblem(id: unknown): string | null {
  return nameProblem(id, 'identifier', MAX_IDENTIFIER_BYTES);
}

export function attributeNameProblem(name: unknown): string | null {
  return nameProblem(name, 'attribute name', MAX_ATTRIBUTE_NAME_BYTES);
}

export function isValidIdentifier(id: unknown): id is NodeId {
  return identifierProblem(id) === null;
}

/**
 * Join path-style identifiers: `joinNodePath('/world', 'robot')` is `/world/robot`.
 */
export function joinNodePath(parent: NodeId | null, name: string): NodeId {
  const clean = name.replace(/^\/+/, '');
  if (clean.length === 0) throw new Error(`invalid path segment: ${JSON.stringify(name)}`);
  if (parent === null) return `/${clean}`;
  return parent.endsWith('/') ? `${parent}${clean}` : `${parent}/${clean}`;
}
