import type {
  AttributedElement,
  ServiceAttribute,
  ServiceAttributeParameter,
  SourcePosition,
} from './types.js';

export function createAttribute(
  name: string,
  parameters: readonly ServiceAttributeParameter[] = [],
  position?: SourcePosition
): ServiceAttribute {
  return { name, parameters: [...parameters], position };
}

export function createAttributeParameter(
  name: string,
  value: string,
  position?: SourcePosition
): ServiceAttributeParameter {
  return { name, value, position };
}

/** First attribute with the given name, if any */
export function findAttribute(element: AttributedElement, name: string): ServiceAttribute | undefined {
  return element.attributes.find(a => a.name === name);
}

export function getAttributeParameterValue(attribute: ServiceAttribute, name: string): string | undefined {
  return attribute.parameters.find(p => p.name === name)?.value;
}
