import { describe, it, expect } from 'vitest';
import { Service } from '../src/service.js';
import {
  createDto,
  createEnum,
  createEnumValue,
  createErrorSet,
  createErrorValue,
  createField,
  createMethod,
} from '../src/members.js';
import { ErrorCodes, ServiceDefinitionException } from '../src/errors.js';
import type { ServiceMember } from '../src/types.js';

const lenient = { strict: false };
const at = (line: number, col = 1) => ({ file: 'widgets.fsd', line, col });

function field(name: string, typeName: string, line = 1) {
  return createField({ name, typeName, position: at(line), typeNamePosition: at(line, 10) }, lenient);
}

function widgetMembers(): ServiceMember[] {
  return [
    createMethod({
      name: 'getWidget',
      requestFields: [field('id', 'string', 2)],
      responseFields: [field('widget', 'Widget', 4)],
      position: at(1),
    }),
    createDto({
      name: 'Widget',
      fields: [field('id', 'string', 7), field('color', 'nullable<Color>', 8), field('tags', 'map<string,string[]>', 9)],
      position: at(6),
    }),
    createEnum({
      name: 'Color',
      values: [createEnumValue({ name: 'red' }), createEnumValue({ name: 'blue' })],
      position: at(11),
    }),
    createErrorSet({
      name: 'WidgetErrors',
      errors: [createErrorValue({ name: 'NotFound', code: 404 })],
      position: at(15),
    }),
  ];
}

describe('service', () => {
  it('should build a valid service in strict mode', () => {
    const service = new Service({ name: 'WidgetApi', members: widgetMembers() });
    expect(service.members).toHaveLength(4);
    expect([...service.getValidationErrors()]).toHaveLength(0);
  });

  it('should derive the typed views from the member list', () => {
    const service = new Service({ name: 'WidgetApi', members: widgetMembers() });
    expect(service.methods.map(m => m.name)).toEqual(['getWidget']);
    expect(service.dtos.map(m => m.name)).toEqual(['Widget']);
    expect(service.enums.map(m => m.name)).toEqual(['Color']);
    expect(service.errorSets.map(m => m.name)).toEqual(['WidgetErrors']);
  });

  it('should partition members across the typed views', () => {
    const members = [
      ...widgetMembers(),
      createDto({ name: 'Gadget' }),
      createMethod({ name: 'listWidgets' }),
      createEnum({ name: 'Size' }),
    ];
    const service = new Service({ name: 'WidgetApi', members });
    const views: ServiceMember[] = [
      ...service.methods,
      ...service.dtos,
      ...service.enums,
      ...service.errorSets,
    ];
    expect(views).toHaveLength(service.members.length);
    for (const member of service.members) {
      expect(views.filter(v => v === member)).toHaveLength(1);
    }
  });

  it('should find members by name', () => {
    const service = new Service({ name: 'WidgetApi', members: widgetMembers() });
    expect(service.findMember('Color')?.kind).toBe('enum');
    expect(service.findMember('getWidget')?.kind).toBe('method');
    expect(service.findMember('color')).toBeUndefined();
  });

  it('should resolve field types through the member index', () => {
    const service = new Service({ name: 'WidgetApi', members: widgetMembers() });
    const widget = service.dtos[0];
    expect(service.getFieldType(widget.fields[1])).toEqual({
      kind: 'nullable',
      valueType: { kind: 'reference', member: service.enums[0] },
    });
    expect(service.getType('Widget[]')).toEqual({
      kind: 'array',
      valueType: { kind: 'reference', member: widget },
    });
    expect(service.tryGetType('Gadget')).toEqual({
      ok: false,
      error: { code: ErrorCodes.UnknownType, message: "Unknown field type 'Gadget'." },
    });
    expect(() => service.getType('getWidget')).toThrow(ServiceDefinitionException);
  });

  it('should report field type errors at the type name position', () => {
    const service = new Service({ name: 'WidgetApi', members: widgetMembers() });
    const badField = field('gadget', 'Gadget', 20);
    expect(service.tryGetFieldType(badField)).toEqual({
      ok: false,
      error: { code: ErrorCodes.UnknownType, message: "Unknown field type 'Gadget'.", position: at(20, 10) },
    });
    expect(() => service.getFieldType(badField)).toThrow("widgets.fsd:20:10 error[SD-E004]: Unknown field type 'Gadget'.");
  });

  it('should reject duplicate member names across kinds', () => {
    const members = [
      createDto({ name: 'Widget', position: at(1) }),
      createEnum({ name: 'Widget', position: at(5) }),
    ];
    expect(() => new Service({ name: 'WidgetApi', members })).toThrow(ServiceDefinitionException);

    const service = new Service({ name: 'WidgetApi', members }, lenient);
    expect([...service.getValidationErrors()]).toEqual([
      { code: ErrorCodes.DuplicateName, message: 'Duplicate service member: Widget', position: at(5) },
    ]);
  });

  it('should look up the first of duplicated members', () => {
    const dto = createDto({ name: 'Widget' });
    const service = new Service({ name: 'WidgetApi', members: [dto, createEnum({ name: 'Widget' })] }, lenient);
    expect(service.findMember('Widget')).toBe(dto);
  });

  it('should abort strict construction on an invalid member name', () => {
    const members = [createDto({ name: '1Widget', position: at(3) }, lenient)];
    expect(() => new Service({ name: 'WidgetApi', members })).toThrow(
      "widgets.fsd:3:1 error[SD-E001]: Invalid name '1Widget'."
    );

    const service = new Service({ name: 'WidgetApi', members }, lenient);
    expect([...service.getValidationErrors()]).toEqual([
      { code: ErrorCodes.InvalidName, message: "Invalid name '1Widget'.", position: at(3) },
    ]);
  });

  it('should reject fields typed as a method', () => {
    const members = [
      createMethod({ name: 'getWidget' }),
      createDto({ name: 'Widget', fields: [field('loader', 'getWidget', 4)] }),
    ];
    const service = new Service({ name: 'WidgetApi', members }, lenient);
    const errors = [...service.getValidationErrors()];
    expect(errors.map(e => e.code)).toEqual([ErrorCodes.InvalidTypeReference]);
    expect(errors[0].position).toEqual(at(4, 10));
  });

  it('should yield errors in validation order', () => {
    const members: ServiceMember[] = [
      createEnum({
        name: 'Color',
        values: [createEnumValue({ name: 'red' }), createEnumValue({ name: 'red', position: at(3) })],
      }, lenient),
      createDto({ name: 'Widget', fields: [field('color', 'Colour', 6)], position: at(5) }, lenient),
      createMethod({
        name: 'getWidget',
        requestFields: [field('id', 'Id', 9), field('id', 'string', 10)],
        position: at(8),
      }, lenient),
      createDto({ name: 'Widget', position: at(12) }, lenient),
    ];
    const service = new Service({ name: 'Widget Api', members, position: at(1) }, lenient);

    expect([...service.getValidationErrors()].map(e => `${e.code} ${e.message}`)).toEqual([
      "SD-E001 Invalid name 'Widget Api'.",
      'SD-E002 Duplicate service member: Widget',
      "SD-E004 Unknown field type 'Id'.",
      "SD-E004 Unknown field type 'Colour'.",
      'SD-E002 Duplicate request field: id',
      'SD-E002 Duplicate enumerated value: red',
    ]);
  });

  it('should let callers take a prefix of the errors', () => {
    const members = ['A', 'A', 'A'].map(name => createDto({ name }));
    const service = new Service({ name: '', members }, lenient);
    const first = service.getValidationErrors().next();
    expect(first.value?.code).toBe(ErrorCodes.InvalidName);
  });

  it('should report members of unknown kinds', () => {
    // As handed over by an untyped caller
    const shape = JSON.parse('{"kind":"union","name":"Shape","position":{"file":"widgets.fsd","line":2,"col":1}}');
    const service = new Service({ name: 'WidgetApi', members: [...widgetMembers(), shape] }, lenient);

    expect([...service.getValidationErrors()]).toEqual([
      { code: ErrorCodes.UnsupportedMemberKind, message: "Unsupported member type 'union'.", position: at(2) },
    ]);
    expect(service.members).toHaveLength(4);
    expect(service.members.map(m => m.kind)).toEqual(['method', 'dto', 'enum', 'errorSet']);
    expect(service.findMember('Shape')).toBeUndefined();
  });

  it('should report unknown members that reuse a member name', () => {
    const shape = JSON.parse('{"kind":"union","name":"Widget","position":{"file":"widgets.fsd","line":20,"col":1}}');
    const service = new Service({ name: 'WidgetApi', members: [...widgetMembers(), shape] }, lenient);

    expect([...service.getValidationErrors()]).toEqual([
      { code: ErrorCodes.UnsupportedMemberKind, message: "Unsupported member type 'union'.", position: at(20) },
      { code: ErrorCodes.DuplicateName, message: 'Duplicate service member: Widget', position: at(20) },
    ]);
    expect(service.findMember('Widget')?.kind).toBe('dto');
  });

  it('should reject a missing service name from untyped callers', () => {
    const data = JSON.parse('{"name":null}');
    const service = new Service(data, lenient);
    expect([...service.getValidationErrors()].map(e => e.code)).toEqual([ErrorCodes.InvalidName]);
  });

  it('should report deeply nested field types as errors', () => {
    const deep = 'array<'.repeat(5000) + 'string' + '>'.repeat(5000);
    const members = [createDto({ name: 'Widget', fields: [field('parts', deep, 3)] })];
    const service = new Service({ name: 'WidgetApi', members }, lenient);

    const errors = [...service.getValidationErrors()];
    expect(errors.map(e => e.code)).toEqual([ErrorCodes.MalformedTypeSyntax]);
    expect(errors[0].message.endsWith(': type nesting exceeds 64 levels.')).toBe(true);
    expect(errors[0].position).toEqual(at(3, 10));
  });

  it('should default summary and remarks', () => {
    const service = new Service({ name: 'WidgetApi' });
    expect(service.summary).toBe('');
    expect(service.remarks).toEqual([]);
    expect(service.attributes).toEqual([]);
    expect(service.members).toEqual([]);
  });
});
