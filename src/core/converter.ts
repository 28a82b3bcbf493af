import type { ParameterSchema, ParameterType } from "./types.js";
import {
  ConversionError,
  EnumError,
  FormatError,
  NestedConversionError,
} from "./errors.js";
import { isRecord, setOwn } from "./schema.js";

type Converter = (value: string, schema: ParameterSchema) => unknown;

export const ERROR_HINTS: Record<ParameterType, string> = {
  string: "Use any text value",
  integer: "Use whole numbers like 42 or -10",
  number: "Use numbers like 3.14, -0.5, or 42",
  boolean: "Use true/false, yes/no, 1/0, or on/off",
  array: "Use JSON format [1,2,3] or comma-separated: a,b,c",
  object: 'Use JSON format: {"key":"value"}',
  null: "Use empty string or 'null'",
};

const BOOLEAN_TRUE = new Set(["true", "yes", "1", "on"]);
const BOOLEAN_FALSE = new Set(["false", "no", "0", "off"]);

const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const converters: Record<ParameterType, Converter> = {
  string: convertString,
  integer: convertInteger,
  number: convertNumber,
  boolean: convertBoolean,
  array: convertArray,
  object: convertObject,
  null: convertNull,
};

/**
 * Convert one raw command-line string to the value its schema declares.
 *
 * An empty input on a node with a default yields the default as is, without
 * type, enum or format checks. Types the converter does not know pass the raw
 * string through.
 */
export function convertValue(value: string, schema?: ParameterSchema): unknown {
  if (!schema) return value;

  if (value === "" && schema.default !== undefined) {
    return schema.default;
  }

  if (!isParameterType(schema.type)) return value;
  return converters[schema.type](value, schema);
}

function isParameterType(type: string): type is ParameterType {
  return Object.hasOwn(converters, type);
}

function typeError(
  schema: ParameterSchema,
  expectedType: string,
  value: string,
  hint: string
): ConversionError {
  return new ConversionError({ parameter: schema.name, expectedType, value, hint });
}

function convertString(value: string, schema: ParameterSchema): string {
  const unquoted = stripQuotes(value);

  if (schema.enum && schema.enum.length > 0 && !schema.enum.includes(unquoted)) {
    throw enumError(schema, "enum", unquoted);
  }

  if (schema.format && !validateFormat(unquoted, schema.format)) {
    throw new FormatError(
      {
        parameter: schema.name,
        expectedType: `string (format: ${schema.format})`,
        value: unquoted,
        hint: getFormatHint(schema.format),
      },
      schema.format
    );
  }

  return unquoted;
}

function convertInteger(value: string, schema: ParameterSchema): number {
  const trimmed = value.trim();

  if (trimmed.includes(".") || !INTEGER_PATTERN.test(trimmed)) {
    throw typeError(schema, "integer", trimmed, ERROR_HINTS.integer);
  }

  // Larger magnitudes cannot travel as exact JSON numbers
  const result = Number(trimmed);
  if (!Number.isSafeInteger(result)) {
    throw typeError(schema, "integer", trimmed, ERROR_HINTS.integer);
  }

  if (schema.enum && schema.enum.length > 0 && !schema.enum.includes(result)) {
    throw enumError(schema, "integer enum", trimmed);
  }

  return result;
}

function convertNumber(value: string, schema: ParameterSchema): number {
  const trimmed = value.trim();

  if (!NUMBER_PATTERN.test(trimmed)) {
    throw typeError(schema, "number", trimmed, ERROR_HINTS.number);
  }

  const result = Number(trimmed);
  if (!Number.isFinite(result)) {
    throw typeError(schema, "number", trimmed, ERROR_HINTS.number);
  }

  if (schema.enum && schema.enum.length > 0 && !schema.enum.includes(result)) {
    throw enumError(schema, "number enum", trimmed);
  }

  return result;
}

function convertBoolean(value: string, schema: ParameterSchema): boolean {
  const normalized = value.trim().toLowerCase();

  if (BOOLEAN_TRUE.has(normalized)) return true;
  if (BOOLEAN_FALSE.has(normalized)) return false;

  throw typeError(schema, "boolean", normalized, ERROR_HINTS.boolean);
}

/**
 * Arrays are given either as a JSON array or as comma-separated parts. With
 * an `items` schema each element is rendered back to a string and converted.
 */
function convertArray(value: string, schema: ParameterSchema): unknown[] {
  const trimmed = value.trim();

  if (isJsonArray(trimmed)) {
    const decoded = parseJson(trimmed);
    if (!Array.isArray(decoded)) {
      throw typeError(
        schema,
        "array",
        trimmed,
        "Invalid JSON array format. " + ERROR_HINTS.array
      );
    }

    const items = schema.items;
    if (!items) return decoded;

    return decoded.map((item, i) =>
      convertNested(`array item ${i}`, () => convertValue(renderValue(item), items))
    );
  }

  if (trimmed === "") return [];

  const parts = trimmed.split(",").map((part) => part.trim());
  const items = schema.items;
  if (!items) return parts;

  return parts.map((part, i) =>
    convertNested(`array item ${i}`, () => convertValue(part, items))
  );
}

function convertObject(value: string, schema: ParameterSchema): Record<string, unknown> {
  const trimmed = value.trim();

  const decoded = parseJson(trimmed);
  if (!isRecord(decoded)) {
    throw typeError(schema, "object", trimmed, ERROR_HINTS.object);
  }

  const properties = schema.properties;
  if (!properties) return decoded;

  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(decoded)) {
    const propSchema = Object.hasOwn(properties, key) ? properties[key] : undefined;
    setOwn(
      result,
      key,
      propSchema
        ? convertNested(`object property ${JSON.stringify(key)}`, () =>
            convertValue(renderValue(val), propSchema)
          )
        : val
    );
  }
  return result;
}

function convertNull(value: string, schema: ParameterSchema): null {
  const trimmed = value.trim();
  if (trimmed === "" || trimmed === "null") return null;

  throw typeError(schema, "null", trimmed, ERROR_HINTS.null);
}

function convertNested(path: string, convert: () => unknown): unknown {
  try {
    return convert();
  } catch (err) {
    if (err instanceof ConversionError) throw new NestedConversionError(path, err);
    throw err;
  }
}

function enumError(schema: ParameterSchema, label: string, value: string): EnumError {
  const allowed = schema.enum ?? [];
  const list = JSON.stringify(allowed);
  return new EnumError(
    {
      parameter: schema.name,
      expectedType: `${label} ${list}`,
      value,
      hint: `Must be one of: ${list}`,
    },
    allowed
  );
}

/** Remove one layer of matching double or single quotes. */
function stripQuotes(value: string): string {
  if (value.length >= 2) {
    const first = value[0];
    if ((first === '"' || first === "'") && value[value.length - 1] === first) {
      return value.slice(1, -1);
    }
  }
  return value;
}

/** Strings render as themselves, everything else as JSON. */
function renderValue(value: unknown): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

function isJsonArray(value: string): boolean {
  return value.startsWith("[") && value.endsWith("]");
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

/**
 * Check a string against a named format. Formats without a rule pass.
 */
export function validateFormat(value: string, format: string): boolean {
  switch (format) {
    case "email":
      return value.includes("@");
    case "uri":
    case "url":
      return value.startsWith("http://") || value.startsWith("https://");
    case "date-time":
      return value.includes("T") && value.includes("-");
    default:
      return true;
  }
}

export function getFormatHint(format: string): string {
  switch (format) {
    case "email":
      return "Use email format: user@example.com";
    case "uri":
    case "url":
      return "Use URL format: https://example.com";
    case "date-time":
      return "Use ISO 8601 format: 2024-01-01T12:00:00Z";
    default:
      return `Must match format: ${format}`;
  }
}
