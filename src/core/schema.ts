import type { ParameterSchema, ToolSchema } from "./types.js";
import { SchemaError } from "./errors.js";

/**
 * Normalize a tool's raw input schema into the canonical ToolSchema.
 *
 * The schema arrives either as the typed `inputSchema` of a tool listed by the
 * MCP client or as a generic mapping decoded from the cache file. Both are
 * plain objects at run time, so a single reader handles them; everything
 * downstream sees only the canonical tree. Schemas are assumed acyclic.
 */
export function extractToolSchema(raw: unknown): ToolSchema {
  if (raw === null || raw === undefined) {
    return { parameters: {}, required: [] };
  }

  if (!isRecord(raw)) {
    throw new SchemaError(
      `schema is not a valid object (got ${Array.isArray(raw) ? "array" : typeof raw})`
    );
  }

  const required = readRequired(raw.required);
  const parameters: Record<string, ParameterSchema> = {};

  if (isRecord(raw.properties)) {
    for (const [name, propSchema] of Object.entries(raw.properties)) {
      setOwn(parameters, name, extractParameterSchema(name, propSchema, required));
    }
  }

  return { parameters, required };
}

/**
 * Build one canonical node. `required` is the list of the enclosing tool
 * schema; nested nodes are given an empty list.
 */
export function extractParameterSchema(
  name: string,
  raw: unknown,
  required: readonly string[]
): ParameterSchema {
  const param: ParameterSchema = {
    name,
    type: "string",
    required: required.includes(name),
  };

  if (!isRecord(raw)) return param;

  if (typeof raw.type === "string") param.type = raw.type;
  if (typeof raw.description === "string") param.description = raw.description;
  if (typeof raw.format === "string") param.format = raw.format;
  if ("default" in raw && raw.default !== undefined) param.default = raw.default;
  if (Array.isArray(raw.enum)) param.enum = [...raw.enum];

  if (param.type === "array" && "items" in raw && raw.items !== undefined) {
    param.items = extractParameterSchema("", raw.items, []);
  }

  if (param.type === "object" && isRecord(raw.properties)) {
    const properties: Record<string, ParameterSchema> = {};
    for (const [propName, propSchema] of Object.entries(raw.properties)) {
      setOwn(properties, propName, extractParameterSchema(propName, propSchema, []));
    }
    param.properties = properties;
  }

  return param;
}

function readRequired(value: unknown): string[] {
  if (!Array.isArray(value)) return [];
  return value.filter((entry): entry is string => typeof entry === "string");
}

/**
 * Assign `key` as an own data property. Plain assignment would hit the
 * `__proto__` setter for that name.
 */
export function setOwn<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, {
    value,
    enumerable: true,
    writable: true,
    configurable: true,
  });
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
