/**
 * Types for mcp-invoke configuration files.
 */

export type ProfileTransport = "sse" | "http";

export interface ServerProfile {
  /** Server endpoint */
  url: string;
  /** Transport type */
  transport: ProfileTransport;
  /** Bearer token */
  token?: string;
  /** HTTP proxy URL */
  proxy?: string;
  /** Client name sent in the initialize request */
  name?: string;
}

export interface ProfileDefaults {
  token?: string;
  proxy?: string;
  name?: string;
  /** Request timeout in ms */
  timeout?: number;
}

export interface InvokeConfig {
  /** Absolute path to the config file */
  configPath: string;
  defaults: ProfileDefaults;
  /** Named server profiles */
  servers: Record<string, ServerProfile>;
}

export interface ConfigLocation {
  path: string;
  exists: boolean;
}
