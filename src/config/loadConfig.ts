import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { AppConfig, ConfigLogLevel, ConfigOverrides, SelectorConfig } from "./types";

const DEFAULT_SELECTORS: SelectorConfig = {
  loginForm: ['form[action*="login"]'],
  usernameField: ['input[name="username"]', 'input[type="email"]'],
  passwordField: ['input[name="password"]', 'input[type="password"]'],
  submitButton: ['button[type="submit"]', 'input[type="submit"]'],
  authIndicators: ['[href*="logout"]', ".user-menu", ".user-info", ".logout", '[class*="user"]', '[class*="profile"]'],
  searchResults: ['a[href*="/content/"]', ".article-link", ".content-item a"],
  pagination: [".pagination", ".page-links", '[class*="pagination"]'],
  articleTitle: ["h1", ".article-title", ".page-title"],
  articleContent: ["article", ".article-content", ".content", ".post-content"],
  metadataDate: [".date", ".published", ".created", '[class*="date"]'],
  metadataAuthor: [".author", ".byline", '[class*="author"]'],
  metadataCategory: [".category", ".topic", '[class*="category"]'],
  tags: [".tags a", 'a[rel="tag"]', ".tag"],
};

const DEFAULT_CONFIG: AppConfig = {
  baseUrl: "https://kb.example.com",
  searchPath: "/search?q={query}",
  contentPathPattern: "/content/",
  credentials: undefined,
  headless: true,
  browserChannel: "chrome",
  browserExecutablePath: undefined,
  userAgent: undefined,
  ignoreHttpsErrors: false,
  requestTimeoutMs: 30_000,
  documentTimeoutMs: 10_000,
  settleDelayMs: 2_000,
  loginSettleDelayMs: 3_000,
  maxRetries: 3,
  retryDelayMs: 2_000,
  requestDelayMs: 1_000,
  maxArticlesPerRun: 50,
  maxConcurrentJobs: 5,
  maxSearchPages: 1,
  logLevel: "info",
  storageDir: "data",
  outputDirs: {
    exports: "data/exports",
    manifests: "data/manifests",
  },
  selectors: DEFAULT_SELECTORS,
};

const selectorListSchema = z.array(z.string().min(1));
const logLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const ConfigOverridesSchema = z
  .object({
    baseUrl: z.string().url(),
    searchPath: z.string().min(1),
    contentPathPattern: z.string().min(1),
    credentials: z.object({ username: z.string(), password: z.string() }),
    headless: z.boolean(),
    browserChannel: z.string(),
    browserExecutablePath: z.string(),
    userAgent: z.string(),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    documentTimeoutMs: z.number().int().positive(),
    settleDelayMs: z.number().int().nonnegative(),
    loginSettleDelayMs: z.number().int().nonnegative(),
    maxRetries: z.number().int().positive(),
    retryDelayMs: z.number().int().nonnegative(),
    requestDelayMs: z.number().int().nonnegative(),
    maxArticlesPerRun: z.number().int().positive(),
    maxConcurrentJobs: z.number().int().positive(),
    maxSearchPages: z.number().int().positive(),
    logLevel: logLevelSchema,
    storageDir: z.string().min(1),
    outputDirs: z.object({ exports: z.string().min(1), manifests: z.string().min(1) }).partial(),
    selectors: z
      .object({
        loginForm: selectorListSchema,
        usernameField: selectorListSchema,
        passwordField: selectorListSchema,
        submitButton: selectorListSchema,
        authIndicators: selectorListSchema,
        searchResults: selectorListSchema,
        pagination: selectorListSchema,
        articleTitle: selectorListSchema,
        articleContent: selectorListSchema,
        metadataDate: selectorListSchema,
        metadataAuthor: selectorListSchema,
        metadataCategory: selectorListSchema,
        tags: selectorListSchema,
      })
      .partial(),
  })
  .partial()
  .strict();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new Error(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const parsed = ConfigOverridesSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new Error(`Invalid config file ${absolutePath}: ${issues.join("; ")}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

function toLogLevel(value: string | undefined, fallback: ConfigLogLevel): ConfigLogLevel {
  const parsed = logLevelSchema.safeParse(value?.trim().toLowerCase());
  return parsed.success ? parsed.data : fallback;
}

// Engines receive selector lists read-only; freezing makes accidental mutation throw.
function freezeSelectors(selectors: SelectorConfig): SelectorConfig {
  const frozen: SelectorConfig = {
    loginForm: Object.freeze([...selectors.loginForm]),
    usernameField: Object.freeze([...selectors.usernameField]),
    passwordField: Object.freeze([...selectors.passwordField]),
    submitButton: Object.freeze([...selectors.submitButton]),
    authIndicators: Object.freeze([...selectors.authIndicators]),
    searchResults: Object.freeze([...selectors.searchResults]),
    pagination: Object.freeze([...selectors.pagination]),
    articleTitle: Object.freeze([...selectors.articleTitle]),
    articleContent: Object.freeze([...selectors.articleContent]),
    metadataDate: Object.freeze([...selectors.metadataDate]),
    metadataAuthor: Object.freeze([...selectors.metadataAuthor]),
    metadataCategory: Object.freeze([...selectors.metadataCategory]),
    tags: Object.freeze([...selectors.tags]),
  };
  return Object.freeze(frozen);
}

function resolveCredentials(merged: AppConfig, env: NodeJS.ProcessEnv): AppConfig["credentials"] {
  const username = env.KB_USERNAME ?? merged.credentials?.username ?? "";
  const password = env.KB_PASSWORD ?? merged.credentials?.password ?? "";
  if (!username || !password) {
    return undefined;
  }
  return { username, password };
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
    selectors: {
      ...DEFAULT_CONFIG.selectors,
      ...(fileConfig.selectors ?? {}),
    },
  };

  return {
    ...merged,
    baseUrl: env.BASE_URL ?? merged.baseUrl,
    searchPath: env.SEARCH_PATH ?? merged.searchPath,
    contentPathPattern: env.CONTENT_PATH_PATTERN ?? merged.contentPathPattern,
    credentials: resolveCredentials(merged, env),
    headless: toBool(env.HEADLESS, merged.headless),
    browserChannel: env.BROWSER_CHANNEL ?? merged.browserChannel,
    browserExecutablePath: env.BROWSER_EXECUTABLE_PATH ?? merged.browserExecutablePath,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    documentTimeoutMs: toInt(env.DOCUMENT_TIMEOUT_MS, merged.documentTimeoutMs),
    settleDelayMs: toInt(env.SETTLE_DELAY_MS, merged.settleDelayMs),
    loginSettleDelayMs: toInt(env.LOGIN_SETTLE_DELAY_MS, merged.loginSettleDelayMs),
    maxRetries: toInt(env.MAX_RETRIES, merged.maxRetries),
    retryDelayMs: toInt(env.RETRY_DELAY_MS, merged.retryDelayMs),
    requestDelayMs: toInt(env.REQUEST_DELAY_MS, merged.requestDelayMs),
    maxArticlesPerRun: toInt(env.MAX_ARTICLES_PER_RUN, merged.maxArticlesPerRun),
    maxConcurrentJobs: toInt(env.MAX_CONCURRENT_JOBS, merged.maxConcurrentJobs),
    maxSearchPages: toInt(env.MAX_SEARCH_PAGES, merged.maxSearchPages),
    logLevel: toLogLevel(env.LOG_LEVEL, merged.logLevel),
    storageDir: env.STORAGE_DIR ?? merged.storageDir,
    outputDirs: {
      exports: env.OUTPUT_EXPORTS_DIR ?? merged.outputDirs.exports,
      manifests: env.OUTPUT_MANIFESTS_DIR ?? merged.outputDirs.manifests,
    },
    selectors: freezeSelectors(merged.selectors),
  };
}

export { DEFAULT_CONFIG, DEFAULT_SELECTORS };
