export type SelectorList = readonly string[];

export interface SelectorConfig {
  loginForm: SelectorList;
  usernameField: SelectorList;
  passwordField: SelectorList;
  submitButton: SelectorList;
  authIndicators: SelectorList;
  searchResults: SelectorList;
  pagination: SelectorList;
  articleTitle: SelectorList;
  articleContent: SelectorList;
  metadataDate: SelectorList;
  metadataAuthor: SelectorList;
  metadataCategory: SelectorList;
  tags: SelectorList;
}

export interface Credentials {
  username: string;
  password: string;
}

export interface OutputDirs {
  exports: string;
  manifests: string;
}

export type ConfigLogLevel = "debug" | "info" | "warn" | "error" | "silent";

export interface AppConfig {
  baseUrl: string;
  /** Appended to `baseUrl`; `{query}` is replaced by the URL-encoded query. */
  searchPath: string;
  /** Substring that marks an address as an article page rather than site chrome. */
  contentPathPattern: string;
  credentials?: Credentials;
  headless: boolean;
  browserChannel?: string;
  browserExecutablePath?: string;
  userAgent?: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  documentTimeoutMs: number;
  settleDelayMs: number;
  loginSettleDelayMs: number;
  maxRetries: number;
  retryDelayMs: number;
  requestDelayMs: number;
  maxArticlesPerRun: number;
  maxConcurrentJobs: number;
  maxSearchPages: number;
  logLevel: ConfigLogLevel;
  storageDir: string;
  outputDirs: OutputDirs;
  selectors: SelectorConfig;
}

export type ConfigOverrides = Partial<Omit<AppConfig, "outputDirs" | "selectors">> & {
  outputDirs?: Partial<OutputDirs>;
  selectors?: Partial<SelectorConfig>;
};
