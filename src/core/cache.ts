import { mkdir, readdir, readFile, rename, rm, stat, unlink, writeFile } from "node:fs/promises";
import { homedir, platform } from "node:os";
import { join } from "node:path";
import type {
  CacheData,
  CacheEnvelope,
  ConnectionConfig,
  PromptRecord,
  ResourceRecord,
  ToolRecord,
} from "./types.js";
import { CacheCorruptError, CacheIOError, errorMessage } from "./errors.js";
import { isRecord } from "./schema.js";
import { cacheKey } from "../utils/hash.js";
import { APP_NAME, CACHE_VERSION } from "../utils/constants.js";
import { silentLogger, type Logger } from "../utils/logger.js";

export interface CacheLoadResult {
  /** Cached snapshot, null on a miss */
  data: CacheData | null;
  /** True on every hit; there is no expiry */
  isFresh: boolean;
}

/**
 * Metadata snapshot store for one server connection.
 */
export interface MetadataCache {
  load(): Promise<CacheLoadResult>;
  save(data: CacheData): Promise<void>;
  delete(): Promise<void>;
}

export interface FileCacheOptions {
  /** Directory holding the cache files; platform default when omitted */
  cacheDir?: string;
  logger?: Logger;
}

export interface CacheFileInfo {
  name: string;
  size: number;
  modifiedTime: Date;
  toolsCount: number;
  resourcesCount: number;
  promptsCount: number;
}

export interface CacheInfo {
  cacheDir: string;
  totalFiles: number;
  totalSize: number;
  files: CacheFileInfo[];
}

const CACHE_EXT = ".json";
const TEMP_EXT = ".tmp";

let tempCounter = 0;

/**
 * File-backed cache: one `<key>.json` per connection, replaced only by
 * renaming a fully written temp file over it. Unreadable or outdated files
 * are deleted when loaded and reported as a miss.
 *
 * There is no locking. Concurrent saves for the same key race and the last
 * rename wins.
 */
export class FileCache implements MetadataCache {
  readonly key: string;
  readonly cacheDir: string;
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(connection: ConnectionConfig, options: FileCacheOptions = {}) {
    this.key = cacheKey(
      connection.serverUrl,
      connection.transport,
      connection.token ?? "",
      connection.clientName
    );
    this.cacheDir = options.cacheDir ?? getCacheDir();
    this.filePath = join(this.cacheDir, this.key + CACHE_EXT);
    this.logger = options.logger ?? silentLogger;
  }

  async load(): Promise<CacheLoadResult> {
    await this.ensureDir();

    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isNotFound(err)) return { data: null, isFresh: false };
      throw new CacheIOError(`read cache file: ${errorMessage(err)}`, err);
    }

    let data: CacheData;
    try {
      data = parseEnvelope(raw).data;
    } catch (err) {
      if (!(err instanceof CacheCorruptError)) throw err;
      this.logger.debug(`Discarding cache file ${this.filePath}: ${err.message}`);
      await this.removeQuietly(this.filePath);
      return { data: null, isFresh: false };
    }

    return { data, isFresh: true };
  }

  async save(data: CacheData): Promise<void> {
    await this.ensureDir();

    const envelope: CacheEnvelope = {
      version: CACHE_VERSION,
      timestamp: new Date().toISOString(),
      server_info: { name: "", version: "" },
      data,
    };
    const json = JSON.stringify(envelope, null, 2) + "\n";

    const tmpFile = `${this.filePath}.${process.pid}.${++tempCounter}${TEMP_EXT}`;
    try {
      await writeFile(tmpFile, json, { encoding: "utf-8", mode: 0o600 });
    } catch (err) {
      await this.removeQuietly(tmpFile);
      throw new CacheIOError(`write temp cache file: ${errorMessage(err)}`, err);
    }

    try {
      await rename(tmpFile, this.filePath);
    } catch (err) {
      await this.removeQuietly(tmpFile);
      throw new CacheIOError(`rename cache file: ${errorMessage(err)}`, err);
    }
  }

  async delete(): Promise<void> {
    try {
      await unlink(this.filePath);
    } catch (err) {
      if (isNotFound(err)) return;
      throw new CacheIOError(`delete cache file: ${errorMessage(err)}`, err);
    }
  }

  private async ensureDir(): Promise<void> {
    try {
      await mkdir(this.cacheDir, { recursive: true, mode: 0o700 });
    } catch (err) {
      throw new CacheIOError(`create cache dir: ${errorMessage(err)}`, err);
    }
  }

  private async removeQuietly(path: string): Promise<void> {
    try {
      await rm(path, { force: true });
    } catch (err) {
      this.logger.debug(`Could not remove ${path}: ${errorMessage(err)}`);
    }
  }
}

/**
 * Parse and check a cache file. Throws CacheCorruptError for malformed JSON,
 * a version other than the current one, or a data section of the wrong shape.
 */
export function parseEnvelope(raw: string): CacheEnvelope {
  let parsed: unknown;
  try {
    // Only `__proto__` is dropped; other names are ordinary schema data
    parsed = JSON.parse(raw, (key, value: unknown) =>
      key === "__proto__" ? undefined : value
    );
  } catch (err) {
    throw new CacheCorruptError(`invalid JSON: ${errorMessage(err)}`, err);
  }

  if (!isRecord(parsed)) {
    throw new CacheCorruptError("cache file is not an object");
  }
  if (parsed.version !== CACHE_VERSION) {
    throw new CacheCorruptError(`unsupported cache version ${String(parsed.version)}`);
  }

  const data: Record<string, unknown> = isRecord(parsed.data) ? parsed.data : {};
  const { tools, resources, prompts } = data;
  if (
    !isRecordList(tools, isToolRecord) ||
    !isRecordList(resources, isResourceRecord) ||
    !isRecordList(prompts, isPromptRecord)
  ) {
    throw new CacheCorruptError("cache data has an unexpected shape");
  }

  const serverInfo: Record<string, unknown> = isRecord(parsed.server_info)
    ? parsed.server_info
    : {};
  return {
    version: CACHE_VERSION,
    timestamp: typeof parsed.timestamp === "string" ? parsed.timestamp : "",
    server_info: {
      name: typeof serverInfo.name === "string" ? serverInfo.name : "",
      version: typeof serverInfo.version === "string" ? serverInfo.version : "",
    },
    data: { tools, resources, prompts },
  };
}

function isRecordList<T>(value: unknown, guard: (item: unknown) => item is T): value is T[] {
  return Array.isArray(value) && value.every(guard);
}

function isToolRecord(item: unknown): item is ToolRecord {
  return isRecord(item) && typeof item.name === "string";
}

function isResourceRecord(item: unknown): item is ResourceRecord {
  return isRecord(item) && typeof item.uri === "string";
}

function isPromptRecord(item: unknown): item is PromptRecord {
  return isRecord(item) && typeof item.name === "string";
}

/**
 * Remove every cache file in `cacheDir`, whether or not it parses, along with
 * temp files left by interrupted saves. A missing directory counts as already
 * clear.
 */
export async function clearAll(cacheDir: string = getCacheDir()): Promise<number> {
  let names: string[];
  try {
    names = await readdir(cacheDir);
  } catch (err) {
    if (isNotFound(err)) return 0;
    throw new CacheIOError(`read cache directory: ${errorMessage(err)}`, err);
  }

  let removed = 0;
  for (const name of names) {
    if (!name.endsWith(CACHE_EXT) && !isTempFile(name)) continue;
    const filePath = join(cacheDir, name);
    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) continue;
      await unlink(filePath);
      removed++;
    } catch (err) {
      if (isNotFound(err)) continue;
      throw new CacheIOError(`remove cache file ${name}: ${errorMessage(err)}`, err);
    }
  }
  return removed;
}

/**
 * Summarize the cache directory. Entries that cannot be stat'ed are skipped;
 * entries that do not parse are listed with zero counts.
 */
export async function getCacheInfo(cacheDir: string = getCacheDir()): Promise<CacheInfo> {
  const info: CacheInfo = { cacheDir, totalFiles: 0, totalSize: 0, files: [] };

  let names: string[];
  try {
    names = await readdir(cacheDir);
  } catch (err) {
    if (isNotFound(err)) return info;
    throw new CacheIOError(`read cache directory: ${errorMessage(err)}`, err);
  }

  for (const name of names.filter((n) => n.endsWith(CACHE_EXT)).sort()) {
    const filePath = join(cacheDir, name);

    let size: number;
    let modifiedTime: Date;
    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) continue;
      size = stats.size;
      modifiedTime = stats.mtime;
    } catch {
      continue;
    }

    const counts = await readCounts(filePath);
    info.files.push({ name, size, modifiedTime, ...counts });
    info.totalFiles++;
    info.totalSize += size;
  }

  return info;
}

async function readCounts(
  filePath: string
): Promise<{ toolsCount: number; resourcesCount: number; promptsCount: number }> {
  try {
    const { data } = parseEnvelope(await readFile(filePath, "utf-8"));
    return {
      toolsCount: data.tools.length,
      resourcesCount: data.resources.length,
      promptsCount: data.prompts.length,
    };
  } catch {
    return { toolsCount: 0, resourcesCount: 0, promptsCount: 0 };
  }
}

/**
 * Per-user cache directory. XDG_CACHE_HOME wins on every platform.
 */
export function getCacheDir(
  env: NodeJS.ProcessEnv = process.env,
  plat: NodeJS.Platform = platform(),
  home: string = homedir()
): string {
  if (env.XDG_CACHE_HOME) return join(env.XDG_CACHE_HOME, APP_NAME);

  if (plat === "darwin") return join(home, "Library", "Caches", APP_NAME);
  if (plat === "win32") {
    const localAppData = env.LOCALAPPDATA || join(home, "AppData", "Local");
    return join(localAppData, APP_NAME);
  }
  return join(home, ".cache", APP_NAME);
}

function isTempFile(name: string): boolean {
  return name.includes(CACHE_EXT + ".") && name.endsWith(TEMP_EXT);
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
