import type { JsonSchema } from "./types.js";
import { ToolValidationError } from "./errors.js";

export interface Schema<T> {
  readonly jsonSchema: JsonSchema;
  parse(value: unknown, path?: string): T;
}

type Parser<T> = (value: unknown, path: string) => T;

const hasOwn = Object.prototype.hasOwnProperty;

function withDefaultPath(path?: string): string {
  return path ?? "$";
}

function createSchema<T>(jsonSchema: JsonSchema, parser: Parser<T>): Schema<T> {
  return {
    jsonSchema,
    parse(value: unknown, path?: string): T {
      return parser(value, withDefaultPath(path));
    },
  };
}

function schemaHasDefault(schema: Schema<unknown>): boolean {
  return hasOwn.call(schema.jsonSchema, "default");
}

export interface StringSchemaOptions<T extends string = string> {
  readonly description?: string;
  readonly minLength?: number;
  readonly pattern?: RegExp;
  readonly enum?: readonly T[];
  readonly default?: T;
}

export function stringSchema<T extends string>(options: StringSchemaOptions<T> & { readonly enum: readonly T[] }): Schema<T>;
export function stringSchema(options?: StringSchemaOptions): Schema<string>;
export function stringSchema<T extends string>(options: StringSchemaOptions<T> = {}): Schema<string> {
  const jsonSchema: JsonSchema = {
    type: "string",
    ...(options.description ? { description: options.description } : {}),
    ...(options.minLength !== undefined ? { minLength: options.minLength } : {}),
    ...(options.pattern ? { pattern: options.pattern.source } : {}),
    ...(options.enum ? { enum: options.enum } : {}),
    ...(options.default !== undefined ? { default: options.default } : {}),
  };

  return createSchema<string>(jsonSchema, (value, path) => {
    if (value === undefined || value === null) {
      if (options.default !== undefined) {
        return options.default;
      }
      throw new ToolValidationError("Value is required", { path });
    }

    if (typeof value !== "string") {
      throw new ToolValidationError("Expected a string", { path, details: { receivedType: typeof value } });
    }

    if (options.minLength !== undefined && value.length < options.minLength) {
      throw new ToolValidationError(
        `String must have length ≥ ${options.minLength}`,
        { path, details: { minLength: options.minLength } },
      );
    }

    if (options.pattern && !options.pattern.test(value)) {
      throw new ToolValidationError("String does not match required pattern", {
        path,
        details: { pattern: options.pattern.source },
      });
    }

    if (options.enum && !options.enum.some((allowed) => allowed === value)) {
      throw new ToolValidationError("Value must be one of the allowed options", {
        path,
        details: { allowed: options.enum },
      });
    }

    return value;
  });
}

export interface NumberSchemaOptions {
  readonly description?: string;
  readonly minimum?: number;
  readonly integer?: boolean;
  readonly default?: number;
}

export function numberSchema(options: NumberSchemaOptions = {}): Schema<number> {
  const jsonSchema: JsonSchema = {
    type: options.integer ? "integer" : "number",
    ...(options.description ? { description: options.description } : {}),
    ...(options.minimum !== undefined ? { minimum: options.minimum } : {}),
    ...(options.default !== undefined ? { default: options.default } : {}),
  };

  return createSchema<number>(jsonSchema, (value, path) => {
    if (value === undefined || value === null) {
      if (options.default !== undefined) {
        return options.default;
      }
      throw new ToolValidationError("Value is required", { path });
    }

    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw new ToolValidationError("Expected a number", { path, details: { receivedType: typeof value } });
    }

    if (options.integer && !Number.isInteger(value)) {
      throw new ToolValidationError("Expected an integer", { path });
    }

    if (options.minimum !== undefined && value < options.minimum) {
      throw new ToolValidationError("Value is below minimum", {
        path,
        details: { minimum: options.minimum },
      });
    }

    return value;
  });
}

export function integerSchema(options: Omit<NumberSchemaOptions, "integer"> = {}): Schema<number> {
  return numberSchema({ ...options, integer: true });
}

export function booleanSchema(options: { description?: string; default?: boolean } = {}): Schema<boolean> {
  const jsonSchema: JsonSchema = {
    type: "boolean",
    ...(options.description ? { description: options.description } : {}),
    ...(options.default !== undefined ? { default: options.default } : {}),
  };

  return createSchema<boolean>(jsonSchema, (value, path) => {
    if (value === undefined || value === null) {
      if (options.default !== undefined) {
        return options.default;
      }
      throw new ToolValidationError("Value is required", { path });
    }

    if (typeof value !== "boolean") {
      throw new ToolValidationError("Expected a boolean", { path, details: { receivedType: typeof value } });
    }

    return value;
  });
}

/** An object of string values, e.g. metadata equality filters. */
export function stringRecordSchema(options: { description?: string } = {}): Schema<Record<string, string>> {
  const jsonSchema: JsonSchema = {
    type: "object",
    ...(options.description ? { description: options.description } : {}),
    additionalProperties: { type: "string" },
  };

  return createSchema<Record<string, string>>(jsonSchema, (value, path) => {
    if (!isPlainObject(value)) {
      throw new ToolValidationError("Expected an object", { path, details: { receivedType: typeof value } });
    }
    const result: Record<string, string> = {};
    for (const [key, entry] of Object.entries(value)) {
      if (typeof entry !== "string") {
        throw new ToolValidationError("Expected a string", {
          path: `${path}.${key}`,
          details: { receivedType: typeof entry },
        });
      }
      result[key] = entry;
    }
    return result;
  });
}

export function optionalSchema<T>(schema: Schema<T>): Schema<T | undefined> {
  const baseSchema = schema.jsonSchema;
  const baseType = baseSchema.type;
  const optionalType = typeof baseType === "string"
    ? [baseType, "null"]
    : baseType
      ? baseType.includes("null")
        ? baseType
        : [...baseType, "null"]
      : undefined;

  const jsonSchema: JsonSchema = {
    ...baseSchema,
    ...(optionalType ? { type: optionalType } : {}),
  };

  return createSchema<T | undefined>(jsonSchema, (value, path) => {
    if (value === undefined || value === null) {
      return schemaHasDefault(schema) ? schema.parse(undefined, path) : undefined;
    }
    return schema.parse(value, path);
  });
}

export interface ObjectSchemaOptions<T extends Record<string, unknown>> {
  readonly description?: string;
  readonly properties: { [K in keyof T]: Schema<T[K]> };
  readonly required?: readonly (keyof T & string)[];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Closed object schema: unknown properties are rejected. */
export function objectSchema<T extends Record<string, unknown>>(
  options: ObjectSchemaOptions<T>,
): Schema<T> {
  const required = options.required ?? [];
  const propertyEntries = Object.entries(options.properties).map(([key, schema]) => [key, schema.jsonSchema] as const);
  const jsonSchema: JsonSchema = {
    type: "object",
    ...(options.description ? { description: options.description } : {}),
    properties: Object.fromEntries(propertyEntries),
    ...(required.length > 0 ? { required } : {}),
    additionalProperties: false,
  };

  return createSchema<T>(jsonSchema, (value, path) => {
    const input = value === undefined || value === null ? {} : value;
    if (!isPlainObject(input)) {
      throw new ToolValidationError("Expected an object", { path, details: { receivedType: typeof input } });
    }

    for (const key of required) {
      if (!hasOwn.call(input, key)) {
        throw new ToolValidationError("Missing required property", {
          path: `${path}.${key}`,
        });
      }
    }

    for (const key of Object.keys(input)) {
      if (!hasOwn.call(options.properties, key)) {
        throw new ToolValidationError("Unexpected property", {
          path: `${path}.${key}`,
        });
      }
    }

    const result: Record<string, unknown> = {};
    for (const [key, schema] of Object.entries(options.properties)) {
      const parsed = schema.parse(input[key], `${path}.${key}`);
      if (parsed !== undefined) {
        result[key] = parsed;
      }
    }

    return result as T;
  });
}
