/** Source location for error reporting */
export interface SourcePosition {
  file: string;
  line: number;
  col: number;
}

// --- Attributes ---

export interface ServiceAttributeParameter {
  readonly name: string;
  readonly value: string;
  readonly position?: SourcePosition;
}

/** Metadata attribute, e.g. `[http(method: POST)]`; consumed by generators */
export interface ServiceAttribute {
  readonly name: string;
  readonly parameters: readonly ServiceAttributeParameter[];
  readonly position?: SourcePosition;
}

/** Anything that carries attributes */
export interface AttributedElement {
  readonly attributes: readonly ServiceAttribute[];
}

// --- Model ---

/** Properties shared by every named element of a definition */
export interface ServiceElement extends AttributedElement {
  readonly name: string;
  readonly summary: string;
  readonly remarks: readonly string[];
  readonly position?: SourcePosition;
}

export interface ServiceField extends ServiceElement {
  readonly typeName: string;
  /** Where the type name itself starts; type errors are reported here */
  readonly typeNamePosition?: SourcePosition;
}

export type ServiceEnumValue = ServiceElement;

export interface ServiceErrorValue extends ServiceElement {
  readonly code?: number | string;
}

export interface ServiceEnum extends ServiceElement {
  readonly kind: 'enum';
  readonly values: readonly ServiceEnumValue[];
}

export interface ServiceDto extends ServiceElement {
  readonly kind: 'dto';
  readonly fields: readonly ServiceField[];
}

export interface ServiceErrorSet extends ServiceElement {
  readonly kind: 'errorSet';
  readonly errors: readonly ServiceErrorValue[];
}

export interface ServiceMethod extends ServiceElement {
  readonly kind: 'method';
  readonly requestFields: readonly ServiceField[];
  readonly responseFields: readonly ServiceField[];
}

export type ServiceMember = ServiceMethod | ServiceDto | ServiceEnum | ServiceErrorSet;

export type ServiceMemberKind = ServiceMember['kind'];

/** Members that a field type may refer to by name */
export type ReferenceableMember = ServiceDto | ServiceEnum | ServiceErrorSet;

// --- Construction input ---

/** Already-parsed data for a named element; omitted parts default to empty */
export interface ElementData {
  name: string;
  attributes?: readonly ServiceAttribute[];
  summary?: string;
  remarks?: readonly string[];
  position?: SourcePosition;
}

export interface FieldData extends ElementData {
  typeName: string;
  typeNamePosition?: SourcePosition;
}

export type EnumValueData = ElementData;

export interface ErrorValueData extends ElementData {
  code?: number | string;
}

export interface EnumData extends ElementData {
  values?: readonly ServiceEnumValue[];
}

export interface DtoData extends ElementData {
  fields?: readonly ServiceField[];
}

export interface ErrorSetData extends ElementData {
  errors?: readonly ServiceErrorValue[];
}

export interface MethodData extends ElementData {
  requestFields?: readonly ServiceField[];
  responseFields?: readonly ServiceField[];
}

export interface ServiceData extends ElementData {
  members?: readonly ServiceMember[];
}

export interface ConstructionOptions {
  /**
   * Throw a ServiceDefinitionException when the constructed element is invalid.
   * Defaults to true; pass false to defer reporting to getValidationErrors().
   */
  strict?: boolean;
}

// --- Resolved types ---

export type PrimitiveTypeKind =
  | 'string'
  | 'boolean'
  | 'double'
  | 'int32'
  | 'int64'
  | 'decimal'
  | 'bytes'
  | 'object'
  | 'error';

export type ResolvedType =
  | { readonly kind: 'primitive'; readonly primitive: PrimitiveTypeKind }
  | { readonly kind: 'nullable'; readonly valueType: ResolvedType }
  | { readonly kind: 'array'; readonly valueType: ResolvedType }
  /** Keys are always strings */
  | { readonly kind: 'map'; readonly valueType: ResolvedType }
  | { readonly kind: 'result'; readonly valueType: ResolvedType }
  | { readonly kind: 'reference'; readonly member: ReferenceableMember };

/** Name-to-member lookup used during type resolution */
export type MemberLookup = (name: string) => ServiceMember | undefined;

// --- Diagnostics ---

export type DefinitionErrorCode =
  | 'SD-E001'
  | 'SD-E002'
  | 'SD-E003'
  | 'SD-E004'
  | 'SD-E005'
  | 'SD-E006'
  | 'SD-E007';

export interface ServiceDefinitionError {
  code: DefinitionErrorCode;
  message: string;
  position?: SourcePosition;
}

export type TypeResult =
  | { ok: true; type: ResolvedType }
  | { ok: false; error: ServiceDefinitionError };
