/**
 * Parameter decoder - `[type:idx:value][type:idx:value]...`
 */

import type { ParameterBinding, ParameterKind, ParameterSet } from '../types/index.js';

const KIND_BY_TYPE: Record<string, ParameterKind> = {
  string: 'string',
  int: 'integer',
  integer: 'integer',
  long: 'long',
  float: 'float',
  bigdecimal: 'decimal',
  number: 'decimal',
};

export function parameterKind(typeName: string): ParameterKind {
  return KIND_BY_TYPE[typeName.toLowerCase()] ?? 'other';
}

/**
 * Decode one bracket's content. The value is everything after the second
 * colon, so it may contain colons itself.
 */
export function decodeBinding(content: string): ParameterBinding | null {
  const typeEnd = content.indexOf(':');
  if (typeEnd === -1) return null;

  const positionEnd = content.indexOf(':', typeEnd + 1);
  if (positionEnd === -1) return null;

  const positionText = content.slice(typeEnd + 1, positionEnd).trim();
  if (!/^[+-]?\d+$/.test(positionText)) return null;

  const typeName = content.slice(0, typeEnd);
  return {
    kind: parameterKind(typeName),
    typeName,
    position: Number.parseInt(positionText, 10),
    rawValue: content.slice(positionEnd + 1),
  };
}

/**
 * Decode a parameter dump into bindings keyed by position. Brackets that do
 * not split into type, position and value are dropped; a repeated position
 * keeps its last occurrence.
 */
export function decodeParameters(body: string): ParameterSet {
  const bindings = new Map<number, ParameterBinding>();
  let from = 0;

  while (from < body.length) {
    const open = body.indexOf('[', from);
    if (open === -1) break;
    const close = body.indexOf(']', open + 1);
    if (close === -1) break;
    from = close + 1;

    const content = body.slice(open + 1, close);
    if (content === '') continue;

    const binding = decodeBinding(content);
    if (binding) {
      bindings.set(binding.position, binding);
    }
  }

  return bindings;
}
