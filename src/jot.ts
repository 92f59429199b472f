import type { ResponseFormatTextJSONSchemaConfig } from 'openai/resources/responses/responses';
import { makeParseableTextFormat, type AutoParseableTextFormat } from 'openai/lib/parser';

type JsonSchema =
  | { type: 'string'; description?: string; enum?: readonly string[] }
  | { type: 'number' | 'integer'; description?: string }
  | { type: 'array'; description?: string; items: JsonSchema }
  | {
      type: 'object';
      description?: string;
      properties: Record<string, JsonSchema>;
      required: string[];
      additionalProperties: boolean;
    };

export interface JotSchema<T> {
  toJsonSchema(): JsonSchema;
  parse(value: unknown, path?: string): T;
}

interface Described {
  description?: string;
}

function describe(options: Described): { description?: string } {
  return options.description ? { description: options.description } : {};
}

class StringNode implements JotSchema<string> {
  constructor(readonly options: Described & { minLength?: number } = {}) {}

  toJsonSchema(): JsonSchema {
    return { type: 'string', ...describe(this.options) };
  }

  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }
    const minLength = this.options.minLength ?? 0;
    if (value.trim().length < minLength) {
      throw new TypeError(`${path} must contain at least ${minLength} non-blank character${minLength === 1 ? '' : 's'}`);
    }

    return value;
  }
}

class NumberNode implements JotSchema<number> {
  constructor(readonly options: Described & { integer?: boolean } = {}) {}

  toJsonSchema(): JsonSchema {
    return { type: this.options.integer ? 'integer' : 'number', ...describe(this.options) };
  }

  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new TypeError(`${path} must be a finite number`);
    }
    if (this.options.integer && !Number.isInteger(value)) {
      throw new TypeError(`${path} must be an integer`);
    }

    return value;
  }
}

class EnumNode<TValue extends string> implements JotSchema<TValue> {
  constructor(readonly values: readonly TValue[], readonly options: Described = {}) {}

  toJsonSchema(): JsonSchema {
    return { type: 'string', enum: this.values, ...describe(this.options) };
  }

  parse(value: unknown, path: string = 'value'): TValue {
    const match = this.values.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new TypeError(`${path} must be one of ${this.values.join(', ')}`);
    }

    return match;
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>, readonly options: Described & { minItems?: number } = {}) {}

  toJsonSchema(): JsonSchema {
    return { type: 'array', items: this.itemNode.toJsonSchema(), ...describe(this.options) };
  }

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }
    if (value.length < (this.options.minItems ?? 0)) {
      throw new TypeError(`${path} must hold at least ${this.options.minItems} item(s)`);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

type InferShape<Shape extends Record<string, JotSchema<unknown>>> = { [K in keyof Shape]: InferJot<Shape[K]> };

class ObjectNode<Shape extends Record<string, JotSchema<unknown>>> implements JotSchema<InferShape<Shape>> {
  constructor(readonly shape: Shape, readonly options: Described = {}) {}

  toJsonSchema(): JsonSchema {
    const properties: Record<string, JsonSchema> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      properties[key] = node.toJsonSchema();
    }

    return {
      type: 'object',
      properties,
      required: Object.keys(this.shape),
      additionalProperties: false,
      ...describe(this.options),
    };
  }

  parse(value: unknown, path: string = 'value'): InferShape<Shape> {
    if (!isRecord(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const result: Record<string, unknown> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      result[key] = node.parse(value[key], `${path}.${key}`);
    }

    return result as InferShape<Shape>;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export const jot = {
  string: (options?: Described & { minLength?: number }): JotSchema<string> => new StringNode(options),
  number: (options?: Described & { integer?: boolean }): JotSchema<number> => new NumberNode(options),
  enum: <TValue extends string>(values: readonly TValue[], options?: Described): JotSchema<TValue> =>
    new EnumNode(values, options),
  array: <T>(schema: JotSchema<T>, options?: Described & { minItems?: number }): JotSchema<T[]> =>
    new ArrayNode(schema, options),
  object: <Shape extends Record<string, JotSchema<unknown>>>(shape: Shape, options?: Described) =>
    new ObjectNode(shape, options),
};

/** Wraps a schema as a Responses API text format whose output is validated by the same schema. */
export function compileJotSchema<T>(name: string, schema: JotSchema<T>): AutoParseableTextFormat<T> {
  const format: ResponseFormatTextJSONSchemaConfig = {
    type: 'json_schema',
    name,
    strict: true,
    schema: schema.toJsonSchema(),
  };

  return makeParseableTextFormat(format, (raw) => schema.parse(JSON.parse(raw)));
}
