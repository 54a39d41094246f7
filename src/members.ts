import { throwIfAny } from './errors.js';
import { validateName, validateNoDuplicateNames } from './names.js';
import type {
  ConstructionOptions,
  DtoData,
  ElementData,
  EnumData,
  EnumValueData,
  ErrorSetData,
  ErrorValueData,
  FieldData,
  MethodData,
  ServiceDefinitionError,
  ServiceDto,
  ServiceElement,
  ServiceEnum,
  ServiceEnumValue,
  ServiceErrorSet,
  ServiceErrorValue,
  ServiceField,
  ServiceMember,
  ServiceMemberKind,
  ServiceMethod,
} from './types.js';

const MEMBER_KINDS: ReadonlySet<string> = new Set<ServiceMemberKind>(['method', 'dto', 'enum', 'errorSet']);

// --- Factories ---

export function createField(data: FieldData, options: ConstructionOptions = {}): ServiceField {
  const field: ServiceField = {
    ...element(data),
    typeName: data.typeName,
    typeNamePosition: data.typeNamePosition,
  };
  return checked(field, validateElementName, options);
}

export function createEnumValue(data: EnumValueData, options: ConstructionOptions = {}): ServiceEnumValue {
  return checked(element(data), validateElementName, options);
}

export function createErrorValue(data: ErrorValueData, options: ConstructionOptions = {}): ServiceErrorValue {
  const value: ServiceErrorValue = data.code === undefined
    ? element(data)
    : { ...element(data), code: data.code };
  return checked(value, validateElementName, options);
}

export function createEnum(data: EnumData, options: ConstructionOptions = {}): ServiceEnum {
  const en: ServiceEnum = {
    kind: 'enum',
    ...element(data),
    values: [...(data.values ?? [])],
  };
  return checked(en, validateEnum, options);
}

export function createDto(data: DtoData, options: ConstructionOptions = {}): ServiceDto {
  const dto: ServiceDto = {
    kind: 'dto',
    ...element(data),
    fields: [...(data.fields ?? [])],
  };
  return checked(dto, validateDto, options);
}

export function createErrorSet(data: ErrorSetData, options: ConstructionOptions = {}): ServiceErrorSet {
  const errorSet: ServiceErrorSet = {
    kind: 'errorSet',
    ...element(data),
    errors: [...(data.errors ?? [])],
  };
  return checked(errorSet, validateErrorSet, options);
}

export function createMethod(data: MethodData, options: ConstructionOptions = {}): ServiceMethod {
  const method: ServiceMethod = {
    kind: 'method',
    ...element(data),
    requestFields: [...(data.requestFields ?? [])],
    responseFields: [...(data.responseFields ?? [])],
  };
  return checked(method, validateMethod, options);
}

// --- Kind checks ---

/** True for any value shaped like one of the four member kinds */
export function isServiceMember(value: unknown): value is ServiceMember {
  return typeof value === 'object'
    && value !== null
    && 'kind' in value
    && typeof value.kind === 'string'
    && MEMBER_KINDS.has(value.kind);
}

export function isMethod(member: ServiceMember): member is ServiceMethod {
  return member.kind === 'method';
}

export function isDto(member: ServiceMember): member is ServiceDto {
  return member.kind === 'dto';
}

export function isEnum(member: ServiceMember): member is ServiceEnum {
  return member.kind === 'enum';
}

export function isErrorSet(member: ServiceMember): member is ServiceErrorSet {
  return member.kind === 'errorSet';
}

// --- Local validation ---

export function* validateElementName(el: ServiceElement): Generator<ServiceDefinitionError> {
  yield* validateName(el.name, el.position);
}

export function* validateEnum(en: ServiceEnum): Generator<ServiceDefinitionError> {
  yield* validateElementName(en);
  for (const value of en.values) yield* validateElementName(value);
  yield* validateNoDuplicateNames(en.values, 'enumerated value');
}

export function* validateDto(dto: ServiceDto): Generator<ServiceDefinitionError> {
  yield* validateElementName(dto);
  for (const field of dto.fields) yield* validateElementName(field);
  yield* validateNoDuplicateNames(dto.fields, 'field');
}

export function* validateErrorSet(errorSet: ServiceErrorSet): Generator<ServiceDefinitionError> {
  yield* validateElementName(errorSet);
  for (const value of errorSet.errors) yield* validateElementName(value);
  yield* validateNoDuplicateNames(errorSet.errors, 'error');
}

/**
 * Request and response fields are separate scopes: a name may appear in both.
 */
export function* validateMethod(method: ServiceMethod): Generator<ServiceDefinitionError> {
  yield* validateElementName(method);
  for (const field of method.requestFields) yield* validateElementName(field);
  for (const field of method.responseFields) yield* validateElementName(field);
  yield* validateNoDuplicateNames(method.requestFields, 'request field');
  yield* validateNoDuplicateNames(method.responseFields, 'response field');
}

export function getMemberValidationErrors(member: ServiceMember): Generator<ServiceDefinitionError> {
  switch (member.kind) {
    case 'method':
      return validateMethod(member);
    case 'dto':
      return validateDto(member);
    case 'enum':
      return validateEnum(member);
    case 'errorSet':
      return validateErrorSet(member);
  }
}

// --- Internal ---

function element(data: ElementData): ServiceElement {
  return {
    name: data.name,
    attributes: [...(data.attributes ?? [])],
    summary: data.summary ?? '',
    remarks: [...(data.remarks ?? [])],
    position: data.position,
  };
}

function checked<T>(
  value: T,
  validate: (value: T) => Iterable<ServiceDefinitionError>,
  options: ConstructionOptions
): T {
  if (options.strict ?? true) {
    throwIfAny(validate(value));
  }
  return value;
}
