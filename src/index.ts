export { Service } from './service.js';
export {
  createField,
  createEnumValue,
  createErrorValue,
  createEnum,
  createDto,
  createErrorSet,
  createMethod,
  isServiceMember,
  isMethod,
  isDto,
  isEnum,
  isErrorSet,
  getMemberValidationErrors,
} from './members.js';
export {
  createAttribute,
  createAttributeParameter,
  findAttribute,
  getAttributeParameterValue,
} from './attributes.js';
export { isValidName, validateName, validateNoDuplicateNames } from './names.js';
export {
  parseType,
  tryParseType,
  formatType,
  isPrimitiveTypeName,
  MAX_TYPE_NESTING,
  PRIMITIVE_TYPES,
} from './type-parser.js';
export {
  ErrorCodes,
  ServiceDefinitionException,
  definitionError,
  throwIfAny,
  formatDefinitionError,
  summarizeDefinitionErrors,
} from './errors.js';
export type { ErrorKind } from './errors.js';
export { readServiceDefinition, tryReadServiceDefinition } from './definition-data.js';
export type { DefinitionResult } from './definition-data.js';
export type * from './types.js';
