import { definitionError } from './errors.js';
import type { ServiceDefinitionError, SourcePosition } from './types.js';

const NAME_PATTERN = /^[A-Za-z][A-Za-z0-9_]*$/;

export function isValidName(name: string): boolean {
  return typeof name === 'string' && NAME_PATTERN.test(name);
}

/**
 * Check a service, member, field or value name against the identifier grammar.
 */
export function* validateName(
  name: string,
  position?: SourcePosition
): Generator<ServiceDefinitionError> {
  if (!isValidName(name)) {
    yield definitionError('InvalidName', `Invalid name '${name}'.`, position);
  }
}

/**
 * Report every item whose name was already used by an earlier item.
 * Names are compared exactly; each error points at the later occurrence.
 */
export function* validateNoDuplicateNames(
  items: Iterable<{ readonly name: string; readonly position?: SourcePosition }>,
  label: string
): Generator<ServiceDefinitionError> {
  const seen = new Set<string>();
  for (const item of items) {
    if (seen.has(item.name)) {
      yield definitionError('DuplicateName', `Duplicate ${label}: ${item.name}`, item.position);
    } else {
      seen.add(item.name);
    }
  }
}
