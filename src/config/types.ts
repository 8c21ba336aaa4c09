export interface AppConfig {
  apiBaseUrl: string;
  userAgent: string;
  ignoreHttpsErrors: boolean;
  requestTimeoutMs: number;
  downloadTimeoutMs: number;
  downloadsDir: string;
  downloadConcurrency: number;
  resolveConcurrency: number;
  maxAttempts: number;
  retryDelayMs: number;
  logFile?: string;
  manifestsDir: string;
  storePath: string;
}

export type ConfigOverrides = Partial<AppConfig>;
