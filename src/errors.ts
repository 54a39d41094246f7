import type {
  DefinitionErrorCode,
  ServiceDefinitionError,
  SourcePosition,
} from './types.js';

/** Stable diagnostic codes, keyed by error kind */
export const ErrorCodes = {
  InvalidName: 'SD-E001',
  DuplicateName: 'SD-E002',
  UnsupportedMemberKind: 'SD-E003',
  UnknownType: 'SD-E004',
  InvalidTypeReference: 'SD-E005',
  MalformedTypeSyntax: 'SD-E006',
  MalformedDefinition: 'SD-E007',
} as const satisfies Record<string, DefinitionErrorCode>;

export type ErrorKind = keyof typeof ErrorCodes;

export function definitionError(
  kind: ErrorKind,
  message: string,
  position?: SourcePosition
): ServiceDefinitionError {
  return position
    ? { code: ErrorCodes[kind], message, position }
    : { code: ErrorCodes[kind], message };
}

/**
 * Raised by strict construction and by the throwing lookups.
 * Carries every error that was found, not only the first.
 */
export class ServiceDefinitionException extends Error {
  readonly errors: readonly ServiceDefinitionError[];

  constructor(errors: readonly ServiceDefinitionError[]) {
    super(exceptionMessage(errors));
    this.name = 'ServiceDefinitionException';
    this.errors = errors;
  }
}

/**
 * Drain an error sequence and throw if it produced anything.
 */
export function throwIfAny(errors: Iterable<ServiceDefinitionError>): void {
  const collected = [...errors];
  if (collected.length > 0) {
    throw new ServiceDefinitionException(collected);
  }
}

/**
 * Format one error as `file:line:col error[code]: message`.
 */
export function formatDefinitionError(error: ServiceDefinitionError): string {
  const { position } = error;
  const prefix = position ? `${position.file}:${position.line}:${position.col} ` : '';
  return `${prefix}error[${error.code}]: ${error.message}`;
}

/**
 * One line per error followed by a count line.
 */
export function summarizeDefinitionErrors(errors: Iterable<ServiceDefinitionError>): string {
  const lines: string[] = [];
  let count = 0;

  for (const error of errors) {
    lines.push(formatDefinitionError(error));
    count++;
  }

  lines.push(`${count} error${count !== 1 ? 's' : ''}.`);
  return lines.join('\n');
}

function exceptionMessage(errors: readonly ServiceDefinitionError[]): string {
  if (errors.length === 0) return 'Invalid service definition.';
  const first = formatDefinitionError(errors[0]);
  const rest = errors.length - 1;
  return rest > 0 ? `${first} (and ${rest} more)` : first;
}
