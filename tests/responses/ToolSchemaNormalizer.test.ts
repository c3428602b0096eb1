import { closeSchema, normalizeTools } from '../../src/responses/ToolSchemaNormalizer.js';
import { isSchemaObject } from '../../src/responses/JsonSchema.js';
import type { ToolDescriptor } from '../../src/responses/types.js';
import {
  DuplicateToolNameError,
  InvalidToolDefinitionError,
} from '../../src/errors/ErrorHandling.js';

function readFileTool(): ToolDescriptor {
  return {
    name: 'read_file',
    description: 'Read file content, supports specifying line number range',
    parameters: {
      type: 'object',
      properties: {
        file_path: { type: 'string', description: 'File path, relative to workspace' },
        start_line: { type: 'integer', description: 'Start line number (1-based)' },
      },
    },
  };
}

describe('normalizeTools', () => {
  it('wraps each descriptor as a function tool in input order', () => {
    const tools = normalizeTools([
      readFileTool(),
      { name: 'list_dir', description: 'List a directory', parameters: { type: 'object' } },
    ]);

    expect(tools.map((tool) => tool.name)).toEqual(['read_file', 'list_dir']);
    expect(tools[0].type).toBe('function');
    expect(tools[0].description).toBe('Read file content, supports specifying line number range');
  });

  it('closes an object node and requires every declared property in order', () => {
    const [tool] = normalizeTools([
      {
        name: 'pair',
        description: '',
        parameters: { type: 'object', properties: { a: { type: 'string' }, b: { type: 'number' } } },
      },
    ]);

    expect(tool.parameters).toEqual({
      type: 'object',
      properties: { a: { type: 'string' }, b: { type: 'number' } },
      additionalProperties: false,
      required: ['a', 'b'],
    });
  });

  it('keeps an explicit required list that omits declared properties', () => {
    const [tool] = normalizeTools([
      {
        name: 'pair',
        description: '',
        parameters: {
          type: 'object',
          properties: { a: { type: 'string' }, b: { type: 'string' } },
          required: ['a'],
        },
      },
    ]);

    expect(tool.parameters.required).toEqual(['a']);
    expect(tool.parameters.additionalProperties).toBe(false);
  });

  it('keeps a required entry naming an undeclared property', () => {
    const [tool] = normalizeTools([
      {
        name: 'ghost',
        description: '',
        parameters: { type: 'object', properties: { a: { type: 'string' } }, required: ['a', 'z'] },
      },
    ]);

    expect(tool.parameters.required).toEqual(['a', 'z']);
  });

  it('replaces additionalProperties true with false', () => {
    const [tool] = normalizeTools([
      {
        name: 'open',
        description: '',
        parameters: { type: 'object', properties: {}, additionalProperties: true },
      },
    ]);

    expect(tool.parameters.additionalProperties).toBe(false);
    expect(tool.parameters.required).toEqual([]);
  });

  it('leaves a schema-valued additionalProperties in place', () => {
    const [tool] = normalizeTools([
      {
        name: 'labels',
        description: '',
        parameters: { type: 'object', additionalProperties: { type: 'string' } },
      },
    ]);

    expect(tool.parameters.additionalProperties).toEqual({ type: 'string' });
  });

  it('closes nested objects under properties and array items', () => {
    const [tool] = normalizeTools([
      {
        name: 'search',
        description: 'Search documents',
        parameters: {
          type: 'object',
          properties: {
            filters: {
              type: 'object',
              properties: { author: { type: 'string' }, year: { type: 'integer' } },
            },
            sort: {
              type: 'array',
              items: {
                type: 'object',
                properties: { field: { type: 'string' }, desc: { type: 'boolean' } },
              },
            },
          },
        },
      },
    ]);

    expect(tool.parameters).toEqual({
      type: 'object',
      properties: {
        filters: {
          type: 'object',
          properties: { author: { type: 'string' }, year: { type: 'integer' } },
          additionalProperties: false,
          required: ['author', 'year'],
        },
        sort: {
          type: 'array',
          items: {
            type: 'object',
            properties: { field: { type: 'string' }, desc: { type: 'boolean' } },
            additionalProperties: false,
            required: ['field', 'desc'],
          },
        },
      },
      additionalProperties: false,
      required: ['filters', 'sort'],
    });
  });

  it('closes object alternatives under anyOf and nullable object types', () => {
    const schema = closeSchema({
      type: ['object', 'null'],
      properties: {
        target: {
          anyOf: [{ type: 'object', properties: { id: { type: 'string' } } }, { type: 'null' }],
        },
      },
    });

    expect(schema.additionalProperties).toBe(false);
    expect(schema.required).toEqual(['target']);
    expect(schema.properties).toEqual({
      target: {
        anyOf: [
          {
            type: 'object',
            properties: { id: { type: 'string' } },
            additionalProperties: false,
            required: ['id'],
          },
          { type: 'null' },
        ],
      },
    });
  });

  it('closes shared definitions under $defs', () => {
    const schema = closeSchema({
      type: 'object',
      properties: { point: { $ref: '#/$defs/point' } },
      $defs: { point: { type: 'object', properties: { x: { type: 'number' } } } },
    });

    expect(schema.$defs).toEqual({
      point: {
        type: 'object',
        properties: { x: { type: 'number' } },
        additionalProperties: false,
        required: ['x'],
      },
    });
  });

  it('passes malformed nodes through unchanged', () => {
    const schema = closeSchema({ type: 'string', properties: 'not-a-map', items: 42 });

    expect(schema).toEqual({ type: 'string', properties: 'not-a-map', items: 42 });
  });

  it('is a fixed point on already normalized tools', () => {
    const once = normalizeTools([readFileTool()]);
    const twice = normalizeTools(
      once.map((tool) => ({
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      })),
    );

    expect(twice).toEqual(once);
  });

  it('does not mutate or alias the input schemas', () => {
    const input = readFileTool();
    const snapshot = JSON.parse(JSON.stringify(input));

    const [tool] = normalizeTools([input]);

    expect(input).toEqual(snapshot);
    expect(tool.parameters).not.toBe(input.parameters);
    expect(tool.parameters.properties).not.toBe(input.parameters.properties);

    const copied = tool.parameters.properties;
    if (!isSchemaObject(copied) || !isSchemaObject(copied.file_path)) {
      throw new Error('expected copied properties');
    }
    copied.file_path.description = 'changed';
    expect(input).toEqual(snapshot);
  });

  it('fails with DuplicateToolNameError naming the repeated tool', () => {
    const run = () =>
      normalizeTools([
        { name: 'x', description: 'first', parameters: { type: 'object' } },
        { name: 'x', description: 'second', parameters: { type: 'object' } },
      ]);

    expect(run).toThrow(DuplicateToolNameError);
    expect(run).toThrow('Duplicate tool name: x');
  });

  it('rejects an empty tool name', () => {
    expect(() =>
      normalizeTools([{ name: '', description: 'nameless', parameters: { type: 'object' } }]),
    ).toThrow(InvalidToolDefinitionError);
  });

  it('returns an empty list for no tools', () => {
    expect(normalizeTools([])).toEqual([]);
  });
});
