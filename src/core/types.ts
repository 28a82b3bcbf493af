/**
 * Canonical parameter schema tree and the cached server metadata format.
 *
 * Design principles:
 * - One canonical schema form; raw tool schemas are normalized once at intake
 * - Schema nodes own their children (no shared or back references)
 * - Cached records are stored as the server returned them
 */

export type ParameterType =
  | "string"
  | "integer"
  | "number"
  | "boolean"
  | "array"
  | "object"
  | "null";

export interface ParameterSchema {
  name: string;
  /** Declared JSON Schema type; unrecognized names are kept and converted as strings */
  type: string;
  required: boolean;
  default?: unknown;
  enum?: unknown[];
  format?: string;
  /** Element schema, only when type is "array" */
  items?: ParameterSchema;
  /** Member schemas, only when type is "object" */
  properties?: Record<string, ParameterSchema>;
  description?: string;
}

export interface ToolSchema {
  parameters: Record<string, ParameterSchema>;
  /** Names that must be supplied; may mention names missing from `parameters` */
  required: string[];
}

export type ToolRecord = {
  name: string;
  description?: string;
  inputSchema?: unknown;
  [key: string]: unknown;
};

export type ResourceRecord = {
  uri: string;
  name?: string;
  description?: string;
  [key: string]: unknown;
};

export type PromptRecord = {
  name: string;
  description?: string;
  [key: string]: unknown;
};

/** Metadata snapshot of one server. */
export interface CacheData {
  tools: ToolRecord[];
  resources: ResourceRecord[];
  prompts: PromptRecord[];
}

/** On-disk cache file. */
export interface CacheEnvelope {
  /** Format version; anything other than the current one is discarded */
  version: number;
  /** RFC 3339 time of the write */
  timestamp: string;
  /** Reserved */
  server_info: { name: string; version: string };
  data: CacheData;
}

/** Everything that identifies a connection to one server. */
export interface ConnectionConfig {
  serverUrl: string;
  /** "sse", "http", "streamable" or "streamable-http" */
  transport: string;
  token?: string;
  proxy?: string;
  clientName: string;
}
