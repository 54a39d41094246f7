import { definitionError, throwIfAny } from './errors.js';
import {
  getMemberValidationErrors,
  isDto,
  isEnum,
  isErrorSet,
  isMethod,
  isServiceMember,
} from './members.js';
import { validateName, validateNoDuplicateNames } from './names.js';
import { parseType, tryParseType } from './type-parser.js';
import type {
  ConstructionOptions,
  ResolvedType,
  ServiceAttribute,
  ServiceData,
  ServiceDefinitionError,
  ServiceDto,
  ServiceEnum,
  ServiceErrorSet,
  ServiceField,
  ServiceMember,
  ServiceMethod,
  SourcePosition,
  TypeResult,
} from './types.js';

/**
 * A service definition: the root of the model, owning every member.
 *
 * Members are looked up by name through an index built once at construction;
 * nothing in the model points back at its owner.
 */
export class Service {
  readonly name: string;
  readonly members: readonly ServiceMember[];
  readonly attributes: readonly ServiceAttribute[];
  readonly summary: string;
  readonly remarks: readonly string[];
  readonly position?: SourcePosition;

  /** Everything the caller declared, including values of unsupported kinds */
  private readonly declared: readonly unknown[];
  private readonly membersByName: ReadonlyMap<string, ServiceMember>;
  private readonly lookup = (name: string): ServiceMember | undefined => this.findMember(name);

  constructor(data: ServiceData, options: ConstructionOptions = {}) {
    this.name = data.name;
    // Untyped callers can still hand over arbitrary objects.
    this.declared = [...(data.members ?? [])];
    this.members = this.declared.filter(isServiceMember);
    this.attributes = [...(data.attributes ?? [])];
    this.summary = data.summary ?? '';
    this.remarks = [...(data.remarks ?? [])];
    this.position = data.position;
    this.membersByName = indexMembers(this.members);

    if (options.strict ?? true) {
      throwIfAny(this.getValidationErrors());
    }
  }

  get methods(): readonly ServiceMethod[] {
    return this.members.filter(isMethod);
  }

  get dtos(): readonly ServiceDto[] {
    return this.members.filter(isDto);
  }

  get enums(): readonly ServiceEnum[] {
    return this.members.filter(isEnum);
  }

  get errorSets(): readonly ServiceErrorSet[] {
    return this.members.filter(isErrorSet);
  }

  /**
   * Every definition error, produced on demand in a fixed order: service name,
   * unsupported members, duplicate member names, unresolvable field types, then
   * the local errors of methods, DTOs, enums and error sets.
   */
  *getValidationErrors(): Generator<ServiceDefinitionError> {
    yield* validateName(this.name, this.position);

    for (const candidate of this.declared) {
      if (!isServiceMember(candidate)) {
        yield definitionError(
          'UnsupportedMemberKind',
          `Unsupported member type '${describeValue(candidate)}'.`,
          positionOf(candidate)
        );
      }
    }

    yield* validateNoDuplicateNames(namedDeclarations(this.declared), 'service member');

    for (const field of this.typedFields()) {
      const result = this.tryGetFieldType(field);
      if (!result.ok) yield result.error;
    }

    for (const member of [...this.methods, ...this.dtos, ...this.enums, ...this.errorSets]) {
      yield* getMemberValidationErrors(member);
    }
  }

  /** The member declared under `name`; the first one when the name is duplicated */
  findMember(name: string): ServiceMember | undefined {
    return this.membersByName.get(name);
  }

  getType(typeName: string): ResolvedType {
    return parseType(typeName, this.lookup);
  }

  tryGetType(typeName: string): TypeResult {
    return tryParseType(typeName, this.lookup);
  }

  getFieldType(field: ServiceField): ResolvedType {
    return parseType(field.typeName, this.lookup, field.typeNamePosition ?? field.position);
  }

  tryGetFieldType(field: ServiceField): TypeResult {
    return tryParseType(field.typeName, this.lookup, field.typeNamePosition ?? field.position);
  }

  private *typedFields(): Generator<ServiceField> {
    for (const method of this.methods) {
      yield* method.requestFields;
      yield* method.responseFields;
    }
    for (const dto of this.dtos) {
      yield* dto.fields;
    }
  }
}

function indexMembers(members: readonly ServiceMember[]): ReadonlyMap<string, ServiceMember> {
  const index = new Map<string, ServiceMember>();
  for (const member of members) {
    if (!index.has(member.name)) index.set(member.name, member);
  }
  return index;
}

function* namedDeclarations(
  declared: readonly unknown[]
): Generator<{ name: string; position?: SourcePosition }> {
  for (const value of declared) {
    if (typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string') {
      yield { name: value.name, position: positionOf(value) };
    }
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'object' && value !== null && 'kind' in value) {
    return String(value.kind);
  }
  return value === null ? 'null' : typeof value;
}

function positionOf(value: unknown): SourcePosition | undefined {
  if (typeof value !== 'object' || value === null || !('position' in value)) return undefined;
  const { position } = value;
  if (
    typeof position === 'object' && position !== null
    && 'file' in position && typeof position.file === 'string'
    && 'line' in position && typeof position.line === 'number'
    && 'col' in position && typeof position.col === 'number'
  ) {
    return { file: position.file, line: position.line, col: position.col };
  }
  return undefined;
}
