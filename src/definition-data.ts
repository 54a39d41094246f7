import { z } from 'zod/v4';
import { createAttribute } from './attributes.js';
import { definitionError, ServiceDefinitionException } from './errors.js';
import {
  createDto,
  createEnum,
  createEnumValue,
  createErrorSet,
  createErrorValue,
  createField,
  createMethod,
} from './members.js';
import { Service } from './service.js';
import type {
  ConstructionOptions,
  ElementData,
  ServiceDefinitionError,
  ServiceField,
  ServiceMember,
} from './types.js';

// --- Schemas for definitions handed over as plain data (e.g. a JSON AST) ---

const PositionSchema = z.object({
  file: z.string(),
  line: z.number().int(),
  col: z.number().int(),
});

const AttributeSchema = z.object({
  name: z.string(),
  parameters: z.array(z.object({
    name: z.string(),
    value: z.string(),
    position: PositionSchema.optional(),
  })).optional(),
  position: PositionSchema.optional(),
});

const ElementSchema = z.object({
  name: z.string(),
  attributes: z.array(AttributeSchema).optional(),
  summary: z.string().optional(),
  remarks: z.array(z.string()).optional(),
  position: PositionSchema.optional(),
});

const FieldSchema = ElementSchema.extend({
  typeName: z.string(),
  typeNamePosition: PositionSchema.optional(),
});

const ErrorValueSchema = ElementSchema.extend({
  code: z.union([z.number(), z.string()]).optional(),
});

const MemberHeaderSchema = z.object({
  kind: z.string(),
  position: PositionSchema.optional(),
});

const MethodSchema = ElementSchema.extend({
  kind: z.literal('method'),
  requestFields: z.array(FieldSchema).optional(),
  responseFields: z.array(FieldSchema).optional(),
});

const DtoSchema = ElementSchema.extend({
  kind: z.literal('dto'),
  fields: z.array(FieldSchema).optional(),
});

const EnumSchema = ElementSchema.extend({
  kind: z.literal('enum'),
  values: z.array(ElementSchema).optional(),
});

const ErrorSetSchema = ElementSchema.extend({
  kind: z.literal('errorSet'),
  errors: z.array(ErrorValueSchema).optional(),
});

const ServiceSchema = ElementSchema.extend({
  members: z.array(z.unknown()).optional(),
});

export type DefinitionResult =
  | { ok: true; service: Service }
  | { ok: false; errors: ServiceDefinitionError[] };

const DEFERRED: ConstructionOptions = { strict: false };

/**
 * Build a Service from plain definition data produced by an external front end.
 *
 * Shape problems and unknown member kinds always fail the result. In strict
 * mode (the default) any validation error of the finished service fails it too;
 * with `strict: false` the service is returned and errors are left to
 * `getValidationErrors()`.
 */
export function tryReadServiceDefinition(
  data: unknown,
  options: ConstructionOptions = {}
): DefinitionResult {
  const parsed = ServiceSchema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, errors: issuesToErrors(parsed.error.issues, []) };
  }

  const errors: ServiceDefinitionError[] = [];
  const members: ServiceMember[] = [];
  (parsed.data.members ?? []).forEach((raw, index) => {
    const member = readMember(raw, ['members', index], errors);
    if (member) members.push(member);
  });
  if (errors.length > 0) {
    return { ok: false, errors };
  }

  const service = new Service({ ...readElement(parsed.data), members }, DEFERRED);
  if (options.strict ?? true) {
    const validationErrors = [...service.getValidationErrors()];
    if (validationErrors.length > 0) return { ok: false, errors: validationErrors };
  }
  return { ok: true, service };
}

/**
 * Throwing form of tryReadServiceDefinition.
 */
export function readServiceDefinition(data: unknown, options: ConstructionOptions = {}): Service {
  const result = tryReadServiceDefinition(data, options);
  if (!result.ok) throw new ServiceDefinitionException(result.errors);
  return result.service;
}

// --- Internal ---

function readMember(
  raw: unknown,
  path: PropertyKey[],
  errors: ServiceDefinitionError[]
): ServiceMember | undefined {
  const header = MemberHeaderSchema.safeParse(raw);
  if (!header.success) {
    errors.push(...issuesToErrors(header.error.issues, path));
    return undefined;
  }

  switch (header.data.kind) {
    case 'method':
      return readWith(MethodSchema, raw, path, errors, d => createMethod({
        ...readElement(d),
        requestFields: d.requestFields?.map(readField),
        responseFields: d.responseFields?.map(readField),
      }, DEFERRED));
    case 'dto':
      return readWith(DtoSchema, raw, path, errors, d => createDto({
        ...readElement(d),
        fields: d.fields?.map(readField),
      }, DEFERRED));
    case 'enum':
      return readWith(EnumSchema, raw, path, errors, d => createEnum({
        ...readElement(d),
        values: d.values?.map(v => createEnumValue(readElement(v), DEFERRED)),
      }, DEFERRED));
    case 'errorSet':
      return readWith(ErrorSetSchema, raw, path, errors, d => createErrorSet({
        ...readElement(d),
        errors: d.errors?.map(v => createErrorValue({ ...readElement(v), code: v.code }, DEFERRED)),
      }, DEFERRED));
    default:
      errors.push(definitionError(
        'UnsupportedMemberKind',
        `Unsupported member type '${header.data.kind}'.`,
        header.data.position
      ));
      return undefined;
  }
}

function readWith<T, R>(
  schema: z.ZodType<T>,
  raw: unknown,
  path: PropertyKey[],
  errors: ServiceDefinitionError[],
  build: (data: T) => R
): R | undefined {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    errors.push(...issuesToErrors(parsed.error.issues, path));
    return undefined;
  }
  return build(parsed.data);
}

function readElement(d: z.infer<typeof ElementSchema>): ElementData {
  return {
    name: d.name,
    attributes: d.attributes?.map(a => createAttribute(a.name, a.parameters, a.position)),
    summary: d.summary,
    remarks: d.remarks,
    position: d.position,
  };
}

function readField(d: z.infer<typeof FieldSchema>): ServiceField {
  return createField({
    ...readElement(d),
    typeName: d.typeName,
    typeNamePosition: d.typeNamePosition,
  }, DEFERRED);
}

function issuesToErrors(
  issues: readonly { path: readonly PropertyKey[]; message: string }[],
  prefix: readonly PropertyKey[]
): ServiceDefinitionError[] {
  return issues.map(issue => {
    const path = [...prefix, ...issue.path].map(String).join('.');
    const where = path ? ` at '${path}'` : '';
    return definitionError('MalformedDefinition', `Invalid definition${where}: ${issue.message}`);
  });
}
