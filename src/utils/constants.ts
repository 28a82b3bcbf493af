export const VERSION = "0.1.0";
export const APP_NAME = "mcp-invoke";
export const CACHE_VERSION = 1;
export const CACHE_KEY_LENGTH = 16;
export const DEFAULT_CLIENT_NAME = APP_NAME;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const SCHEMA_TIMEOUT_MS = 2_000;
export const COMPLETION_TIMEOUT_MS = 3_000;
export const HASH_ALGORITHM = "sha256";
export const TOKEN_ENV_VAR = "MCP_INVOKE_TOKEN";

// Exit codes following Unix conventions
export const EXIT_OK = 0;
export const EXIT_FAILURE = 1; // Conversion, transport or cache failure
export const EXIT_USAGE = 2; // Bad flags or arguments
