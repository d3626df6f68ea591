export interface JotSchema<T> {
  parse(value: unknown, path?: string): T;
}

class StringNode implements JotSchema<string> {
  parse(value: unknown, path: string = 'value'): string {
    if (typeof value !== 'string') {
      throw new TypeError(`${path} must be a string`);
    }

    return value;
  }
}

class NumberNode implements JotSchema<number> {
  constructor(readonly options: { integer?: boolean } = {}) {}

  parse(value: unknown, path: string = 'value'): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new TypeError(`${path} must be a number`);
    }
    if (this.options.integer && !Number.isInteger(value)) {
      throw new TypeError(`${path} must be an integer`);
    }

    return value;
  }
}

class BooleanNode implements JotSchema<boolean> {
  parse(value: unknown, path: string = 'value'): boolean {
    if (typeof value !== 'boolean') {
      throw new TypeError(`${path} must be a boolean`);
    }

    return value;
  }
}

class UnknownNode implements JotSchema<unknown> {
  parse(value: unknown): unknown {
    return value;
  }
}

class EnumNode<TValue extends readonly string[]> implements JotSchema<TValue[number]> {
  constructor(readonly values: TValue) {}

  parse(value: unknown, path: string = 'value'): TValue[number] {
    const match = this.values.find((candidate) => candidate === value);
    if (match === undefined) {
      throw new TypeError(`${path} must be one of ${this.values.join(', ')}`);
    }

    return match;
  }
}

class ArrayNode<T> implements JotSchema<T[]> {
  constructor(readonly itemNode: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T[] {
    if (!Array.isArray(value)) {
      throw new TypeError(`${path} must be an array`);
    }

    return value.map((item, index) => this.itemNode.parse(item, `${path}[${index}]`));
  }
}

class NullableNode<T> implements JotSchema<T | null> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | null {
    return value === null ? null : this.inner.parse(value, path);
  }
}

class OptionalNode<T> implements JotSchema<T | undefined> {
  constructor(readonly inner: JotSchema<T>) {}

  parse(value: unknown, path: string = 'value'): T | undefined {
    return value === undefined || value === null ? undefined : this.inner.parse(value, path);
  }
}

export interface ObjectNodeOptions {
  /** Reject keys the shape does not name. API payloads carry many extra fields, so this is off by default. */
  strict?: boolean;
}

type ObjectShape = Record<string, JotSchema<unknown>>;

export type InferShape<Shape extends ObjectShape> = { [K in keyof Shape]: InferJot<Shape[K]> };

class ObjectNode<Shape extends ObjectShape> implements JotSchema<InferShape<Shape>> {
  constructor(readonly shape: Shape, readonly options: ObjectNodeOptions = {}) {}

  parse(value: unknown, path: string = 'value'): InferShape<Shape> {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new TypeError(`${path} must be an object`);
    }

    const record = value as Record<string, unknown>;
    if (this.options.strict) {
      const extra = Object.keys(record).filter((key) => !(key in this.shape));
      if (extra.length > 0) {
        throw new TypeError(`${path} has unexpected keys: ${extra.join(', ')}`);
      }
    }

    const result: Record<string, unknown> = {};
    for (const [key, node] of Object.entries(this.shape)) {
      const parsed = node.parse(record[key], `${path}.${key}`);
      if (parsed !== undefined) {
        result[key] = parsed;
      }
    }

    return result as InferShape<Shape>;
  }
}

export type InferJot<TSchema> = TSchema extends JotSchema<infer TValue> ? TValue : never;

export const jot = {
  string: (): JotSchema<string> => new StringNode(),
  number: (): JotSchema<number> => new NumberNode(),
  integer: (): JotSchema<number> => new NumberNode({ integer: true }),
  boolean: (): JotSchema<boolean> => new BooleanNode(),
  unknown: (): JotSchema<unknown> => new UnknownNode(),
  enum: <TValue extends readonly string[]>(values: TValue): JotSchema<TValue[number]> => new EnumNode(values),
  array: <T>(schema: JotSchema<T>): JotSchema<T[]> => new ArrayNode(schema),
  nullable: <T>(schema: JotSchema<T>): JotSchema<T | null> => new NullableNode(schema),
  optional: <T>(schema: JotSchema<T>): JotSchema<T | undefined> => new OptionalNode(schema),
  object: <Shape extends ObjectShape>(shape: Shape, options?: ObjectNodeOptions): JotSchema<InferShape<Shape>> =>
    new ObjectNode(shape, options),
};
