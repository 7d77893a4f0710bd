import type { JsonSchema } from "./types.js";
import { ValidationError } from "../errors.js";

export interface Schema<T> {
  readonly jsonSchema: JsonSchema;
  parse(value: unknown, path?: string): T;
}

type Parser<T> = (value: unknown, path: string) => T;

const hasOwn = Object.prototype.hasOwnProperty;

function createSchema<T>(jsonSchema: JsonSchema, parser: Parser<T>): Schema<T> {
  return {
    jsonSchema,
    parse(value: unknown, path?: string): T {
      return parser(value, path ?? "$");
    },
  };
}

function schemaHasDefault(schema: Schema<unknown>): boolean {
  return hasOwn.call(schema.jsonSchema, "default");
}

export interface StringSchemaOptions {
  readonly description?: string;
  readonly minLength?: number;
  readonly maxLength?: number;
  readonly pattern?: RegExp;
  readonly enum?: readonly string[];
  readonly default?: string;
  /** Trim surrounding whitespace before length checks. */
  readonly trim?: boolean;
}

export function stringSchema(options: StringSchemaOptions = {}): Schema<string> {
  const jsonSchema: JsonSchema = {
    type: "string",
    ...(options.description ? { description: options.description } : {}),
    ...(options.minLength !== undefined ? { minLength: options.minLength } : {}),
    ...(options.maxLength !== undefined ? { maxLength: options.maxLength } : {}),
    ...(options.pattern ? { pattern: options.pattern.source } : {}),
    ...(options.enum ? { enum: options.enum } : {}),
    ...(options.default !== undefined ? { default: options.default } : {}),
  };

  return createSchema<string>(jsonSchema, (value, path) => {
    if (value === undefined || value === null) {
      if (options.default !== undefined) {
        return options.default;
      }
      throw new ValidationError("Value is required", { path });
    }

    if (typeof value !== "string") {
      throw new ValidationError("Expected a string", { path, details: { receivedType: typeof value } });
    }

    const stringValue = options.trim ? value.trim() : value;

    if (options.minLength !== undefined && stringValue.length < options.minLength) {
      throw new ValidationError(`String must have length >= ${options.minLength}`, {
        path,
        details: { minLength: options.minLength },
      });
    }

    if (options.maxLength !== undefined && stringValue.length > options.maxLength) {
      throw new ValidationError(`String must have length <= ${options.maxLength}`, {
        path,
        details: { maxLength: options.maxLength },
      });
    }

    if (options.pattern && !options.pattern.test(stringValue)) {
      throw new ValidationError("String does not match required pattern", {
        path,
        details: { pattern: options.pattern.source },
      });
    }

    if (options.enum && !options.enum.includes(stringValue)) {
      throw new ValidationError("Value must be one of the allowed options", {
        path,
        details: { allowed: options.enum },
      });
    }

    return stringValue;
  });
}

export interface NumberSchemaOptions {
  readonly description?: string;
  readonly minimum?: number;
  readonly maximum?: number;
  readonly integer?: boolean;
  readonly default?: number;
  /** Accept numeric strings such as query-string values. */
  readonly coerce?: boolean;
}

export function numberSchema(options: NumberSchemaOptions = {}): Schema<number> {
  const jsonSchema: JsonSchema = {
    type: options.integer ? "integer" : "number",
    ...(options.description ? { description: options.description } : {}),
    ...(options.minimum !== undefined ? { minimum: options.minimum } : {}),
    ...(options.maximum !== undefined ? { maximum: options.maximum } : {}),
    ...(options.default !== undefined ? { default: options.default } : {}),
  };

  return createSchema<number>(jsonSchema, (value, path) => {
    if (value === undefined || value === null || (options.coerce && value === "")) {
      if (options.default !== undefined) {
        return options.default;
      }
      throw new ValidationError("Value is required", { path });
    }

    const numberValue = options.coerce && typeof value === "string" ? Number(value.trim()) : value;

    if (typeof numberValue !== "number" || !Number.isFinite(numberValue)) {
      throw new ValidationError("Expected a number", { path, details: { receivedType: typeof value } });
    }

    if (options.integer && !Number.isInteger(numberValue)) {
      throw new ValidationError("Expected an integer", { path });
    }

    if (options.minimum !== undefined && numberValue < options.minimum) {
      throw new ValidationError("Value is below minimum", {
        path,
        details: { minimum: options.minimum },
      });
    }

    if (options.maximum !== undefined && numberValue > options.maximum) {
      throw new ValidationError("Value is above maximum", {
        path,
        details: { maximum: options.maximum },
      });
    }

    return numberValue;
  });
}

export function integerSchema(options: Omit<NumberSchemaOptions, "integer"> = {}): Schema<number> {
  return numberSchema({ ...options, integer: true });
}

export function arraySchema<T>(
  itemSchema: Schema<T>,
  options: { description?: string; minItems?: number; maxItems?: number } = {},
): Schema<readonly T[]> {
  const jsonSchema: JsonSchema = {
    type: "array",
    ...(options.description ? { description: options.description } : {}),
    items: itemSchema.jsonSchema,
    ...(options.minItems !== undefined ? { minItems: options.minItems } : {}),
    ...(options.maxItems !== undefined ? { maxItems: options.maxItems } : {}),
  };

  return createSchema<readonly T[]>(jsonSchema, (value, path) => {
    if (!Array.isArray(value)) {
      throw new ValidationError("Expected an array", { path, details: { receivedType: typeof value } });
    }

    const result = value.map((item: unknown, index) => itemSchema.parse(item, `${path}[${index}]`));

    if (options.minItems !== undefined && result.length < options.minItems) {
      throw new ValidationError("Array has too few items", {
        path,
        details: { minItems: options.minItems },
      });
    }

    if (options.maxItems !== undefined && result.length > options.maxItems) {
      throw new ValidationError("Array has too many items", {
        path,
        details: { maxItems: options.maxItems },
      });
    }

    return result;
  });
}

export function optionalSchema<T>(schema: Schema<T>, defaultValue?: T): Schema<T | undefined> {
  const baseSchema = schema.jsonSchema;
  const baseType = baseSchema.type;
  const optionalType = Array.isArray(baseType)
    ? baseType.includes("null")
      ? baseType
      : [...baseType, "null"]
    : baseType
      ? [baseType, "null"]
      : undefined;

  const jsonSchema: JsonSchema = {
    ...baseSchema,
    ...(optionalType ? { type: optionalType } : {}),
    ...(defaultValue !== undefined ? { default: defaultValue } : {}),
  };

  return createSchema<T | undefined>(jsonSchema, (value, path) => {
    if (value === undefined || value === null) {
      if (defaultValue !== undefined) {
        return defaultValue;
      }
      // Let the inner schema supply its own default, if it has one.
      return schemaHasDefault(schema) ? schema.parse(undefined, path) : undefined;
    }
    return schema.parse(value, path);
  });
}

export interface ObjectSchemaOptions<T extends Record<string, unknown>> {
  readonly description?: string;
  readonly properties: { [K in keyof T]: Schema<T[K]> };
  readonly required?: readonly (keyof T & string)[];
  readonly additionalProperties?: boolean;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function objectSchema<T extends Record<string, unknown>>(options: ObjectSchemaOptions<T>): Schema<T> {
  const required = options.required ?? [];
  const propertyEntries: Array<[string, Schema<unknown>]> = Object.entries(options.properties);
  const jsonSchema: JsonSchema = {
    type: "object",
    ...(options.description ? { description: options.description } : {}),
    properties: Object.fromEntries(propertyEntries.map(([key, schema]) => [key, schema.jsonSchema])),
    ...(required.length > 0 ? { required } : {}),
    additionalProperties: options.additionalProperties ?? false,
  };

  return createSchema<T>(jsonSchema, (value, path) => {
    if (!isPlainObject(value)) {
      throw new ValidationError("Expected an object", { path, details: { receivedType: typeof value } });
    }

    for (const key of required) {
      if (!hasOwn.call(value, key) || value[key] === undefined) {
        throw new ValidationError("Missing required property", { path: `${path}.${key}` });
      }
    }

    const result: Record<string, unknown> = {};

    for (const [key, schema] of propertyEntries) {
      const propertyPath = `${path}.${key}`;
      if (hasOwn.call(value, key)) {
        const parsed = schema.parse(value[key], propertyPath);
        if (parsed !== undefined) {
          result[key] = parsed;
        }
        continue;
      }

      if (schemaHasDefault(schema)) {
        const parsed = schema.parse(undefined, propertyPath);
        if (parsed !== undefined) {
          result[key] = parsed;
        }
      }
    }

    if (options.additionalProperties === true) {
      for (const key of Object.keys(value)) {
        if (!hasOwn.call(options.properties, key)) {
          result[key] = value[key];
        }
      }
    } else {
      for (const key of Object.keys(value)) {
        if (!hasOwn.call(options.properties, key)) {
          throw new ValidationError("Unexpected property", { path: `${path}.${key}` });
        }
      }
    }

    // Each property went through its own schema above.
    return result as T;
  });
}
