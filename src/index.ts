// Public API for programmatic usage
export { extractToolSchema, extractParameterSchema } from "./core/schema.js";
export { convertValue, validateFormat, getFormatHint } from "./core/converter.js";
export {
  parseParamsWithSchema,
  parseRawParams,
  validateRequired,
} from "./core/validator.js";
export { FileCache, clearAll, getCacheInfo, getCacheDir } from "./core/cache.js";
export {
  createSession,
  fetchServerData,
  getToolSchema,
  callTool,
} from "./core/session.js";
export { loadServerData } from "./core/loader.js";
export { completeToolNames, completeParameterNames } from "./core/completion.js";
export { cacheKey } from "./utils/hash.js";
export * from "./core/errors.js";
export type {
  ParameterSchema,
  ParameterType,
  ToolSchema,
  CacheData,
  CacheEnvelope,
  ConnectionConfig,
  ToolRecord,
  ResourceRecord,
  PromptRecord,
} from "./core/types.js";
export type { MetadataCache, CacheLoadResult, CacheInfo, CacheFileInfo } from "./core/cache.js";
export type { ServerSession, SessionOptions, TransportFactory } from "./core/session.js";
export type { CompletionResult } from "./core/completion.js";
export type { ParsedParams } from "./core/validator.js";
