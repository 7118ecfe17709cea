/**
 * Server configuration read from the environment
 */

import { z } from "zod";
import { ValidationError, type AnnoStoreOptions } from "@annostore/sdk";
import { LOG_LEVELS, type LogLevel } from "./observability/logger.js";

const Flag = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const EnvSchema = z.object({
  DATA_ROOT: z.string().min(1).default("./data"),
  ANNOSTORE_API_KEY: z.string().min(1).optional(),
  ANNOSTORE_ROOT_API_KEY: z.string().min(1).optional(),
  ANNOSTORE_BASE_URL: z.string().url().default("http://localhost:8080"),
  ANNOSTORE_PAGE_SIZE: z.coerce.number().int().min(1).max(10_000).default(100),
  ANNOSTORE_SEARCH_CACHE_SIZE: z.coerce.number().int().positive().default(1000),
  ANNOSTORE_SEARCH_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  MCP_ANNOSTORE_READONLY: Flag,
  MCP_ANNOSTORE_ENABLED: z
    .enum(["true", "false"])
    .default("true")
    .transform((value) => value === "true"),
  LOG_LEVEL: z
    .string()
    .default("info")
    .transform((value): LogLevel => LOG_LEVELS.find((l) => l === value) ?? "info"),
});

export interface ServerConfig {
  dataRoot: string;
  /** Key identifying the caller; absent means anonymous */
  apiKey?: string;
  rootApiKey?: string;
  baseUrl: string;
  pageSize: number;
  searchCacheSize: number;
  searchTtlMs: number;
  readOnly: boolean;
  enabled: boolean;
  logLevel: LogLevel;
}

/**
 * Parse the server environment
 * @throws ValidationError naming every invalid variable
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`Invalid server environment: ${problems.join("; ")}`);
  }

  const vars = parsed.data;
  return {
    dataRoot: vars.DATA_ROOT,
    apiKey: vars.ANNOSTORE_API_KEY,
    rootApiKey: vars.ANNOSTORE_ROOT_API_KEY,
    baseUrl: vars.ANNOSTORE_BASE_URL,
    pageSize: vars.ANNOSTORE_PAGE_SIZE,
    searchCacheSize: vars.ANNOSTORE_SEARCH_CACHE_SIZE,
    searchTtlMs: vars.ANNOSTORE_SEARCH_TTL_MS,
    readOnly: vars.MCP_ANNOSTORE_READONLY,
    enabled: vars.MCP_ANNOSTORE_ENABLED,
    logLevel: vars.LOG_LEVEL,
  };
}

export function toStoreOptions(config: ServerConfig): AnnoStoreOptions {
  return {
    root: config.dataRoot,
    rootApiKey: config.rootApiKey,
    externalBaseUrl: config.baseUrl,
    pageSize: config.pageSize,
    searchCache: { ttlMs: config.searchTtlMs, maxSize: config.searchCacheSize },
  };
}
