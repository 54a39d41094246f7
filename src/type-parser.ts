import { definitionError, ServiceDefinitionException } from './errors.js';
import { isValidName } from './names.js';
import type {
  MemberLookup,
  PrimitiveTypeKind,
  ResolvedType,
  SourcePosition,
  TypeResult,
} from './types.js';

export const PRIMITIVE_TYPES: ReadonlySet<string> = new Set<PrimitiveTypeKind>([
  'string', 'boolean', 'double', 'int32', 'int64', 'decimal', 'bytes', 'object', 'error',
]);

export function isPrimitiveTypeName(name: string): name is PrimitiveTypeKind {
  return PRIMITIVE_TYPES.has(name);
}

const GENERIC_PATTERN = /^([A-Za-z]+)<(.*)>$/s;

/** Deepest decorator nesting a type name may use */
export const MAX_TYPE_NESTING = 64;

/**
 * Resolve a field type name such as `nullable<array<Widget>>` against the
 * members of a service. Never throws; failures come back as the error result.
 */
export function tryParseType(
  typeName: string,
  findMember: MemberLookup,
  position?: SourcePosition
): TypeResult {
  const ctx: ParseContext = { typeName, findMember, position };
  if (nestingBound(typeName) > MAX_TYPE_NESTING) {
    return malformed(ctx, `type nesting exceeds ${MAX_TYPE_NESTING} levels`);
  }
  return parse(typeName.trim(), ctx);
}

/**
 * Throwing form of tryParseType.
 */
export function parseType(
  typeName: string,
  findMember: MemberLookup,
  position?: SourcePosition
): ResolvedType {
  const result = tryParseType(typeName, findMember, position);
  if (!result.ok) throw new ServiceDefinitionException([result.error]);
  return result.type;
}

/**
 * Render a resolved type as canonical type name text.
 */
export function formatType(type: ResolvedType): string {
  switch (type.kind) {
    case 'primitive':
      return type.primitive;
    case 'nullable':
    case 'array':
    case 'result':
      return `${type.kind}<${formatType(type.valueType)}>`;
    case 'map':
      return `map<string,${formatType(type.valueType)}>`;
    case 'reference':
      return type.member.name;
  }
}

// --- Internal ---

interface ParseContext {
  typeName: string;
  findMember: MemberLookup;
  position?: SourcePosition;
}

function parse(text: string, ctx: ParseContext): TypeResult {
  if (text.length === 0) {
    return malformed(ctx, 'type name is empty');
  }

  if (text.endsWith('[]')) {
    return wrap('array', parse(text.slice(0, -2).trim(), ctx));
  }

  const generic = GENERIC_PATTERN.exec(text);
  if (generic) {
    return parseGeneric(generic[1], generic[2], ctx);
  }

  if (!isValidName(text)) {
    return malformed(ctx, `'${text}' is not a type name`);
  }

  if (isPrimitiveTypeName(text)) {
    return { ok: true, type: { kind: 'primitive', primitive: text } };
  }

  const member = ctx.findMember(text);
  if (!member) {
    return fail(ctx, 'UnknownType', `Unknown field type '${text}'.`);
  }
  if (member.kind === 'method') {
    return fail(ctx, 'InvalidTypeReference', `Field type '${text}' refers to a method.`);
  }
  return { ok: true, type: { kind: 'reference', member } };
}

function parseGeneric(decorator: string, inner: string, ctx: ParseContext): TypeResult {
  const args = splitArguments(inner);
  if (!args) {
    return malformed(ctx, `'${decorator}<${inner}>' has missing or unbalanced type arguments`);
  }

  switch (decorator) {
    case 'nullable': {
      if (args.length !== 1) return malformed(ctx, 'nullable takes one type argument');
      const valueResult = parse(args[0], ctx);
      if (valueResult.ok && valueResult.type.kind === 'nullable') {
        return malformed(ctx, 'nullable types cannot be nested');
      }
      return wrap('nullable', valueResult);
    }
    case 'array':
      if (args.length !== 1) return malformed(ctx, 'array takes one type argument');
      return wrap('array', parse(args[0], ctx));
    case 'result':
      if (args.length !== 1) return malformed(ctx, 'result takes one type argument');
      return wrap('result', parse(args[0], ctx));
    case 'map':
      if (args.length !== 2) return malformed(ctx, 'map takes a key type and a value type');
      if (args[0] !== 'string') return malformed(ctx, `map key type must be 'string', not '${args[0]}'`);
      return wrap('map', parse(args[1], ctx));
    default:
      return malformed(ctx, `unknown type decorator '${decorator}'`);
  }
}

/**
 * Upper bound on decorator nesting: deepest `<` level plus every `[]` suffix.
 */
function nestingBound(text: string): number {
  let depth = 0;
  let maxDepth = 0;
  let suffixes = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '<') {
      depth++;
      if (depth > maxDepth) maxDepth = depth;
    } else if (ch === '>') {
      depth--;
    } else if (ch === '[' && text[i + 1] === ']') {
      suffixes++;
    }
  }

  return maxDepth + suffixes;
}

/**
 * Split generic arguments on top-level commas. Returns undefined when the
 * brackets do not balance or an argument is empty.
 */
function splitArguments(text: string): string[] | undefined {
  const args: string[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '<') {
      depth++;
    } else if (ch === '>') {
      depth--;
      if (depth < 0) return undefined;
    } else if (ch === ',' && depth === 0) {
      args.push(text.slice(start, i).trim());
      start = i + 1;
    }
  }

  if (depth !== 0) return undefined;
  args.push(text.slice(start).trim());
  return args.some(a => a.length === 0) ? undefined : args;
}

function wrap(kind: 'nullable' | 'array' | 'map' | 'result', inner: TypeResult): TypeResult {
  return inner.ok ? { ok: true, type: { kind, valueType: inner.type } } : inner;
}

function malformed(ctx: ParseContext, reason: string): TypeResult {
  return fail(ctx, 'MalformedTypeSyntax', `Invalid type '${ctx.typeName}': ${reason}.`);
}

function fail(
  ctx: ParseContext,
  kind: 'UnknownType' | 'InvalidTypeReference' | 'MalformedTypeSyntax',
  message: string
): TypeResult {
  return { ok: false, error: definitionError(kind, message, ctx.position) };
}
