/**
 * Centralized configuration for the GitHub client, output file and logging
 */

type Env = Record<string, string | undefined>;

/**
 * Parse an environment variable as a number with a default value
 */
function parseEnvNumber(envVar: string | undefined, defaultValue: number): number {
  if (!envVar) return defaultValue;
  const parsed = parseInt(envVar, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse an environment variable as a boolean with a default value
 */
function parseEnvBoolean(envVar: string | undefined, defaultValue: boolean): boolean {
  if (!envVar) return defaultValue;
  const normalized = envVar.trim().toLowerCase();
  if (["true", "1", "yes"].includes(normalized)) return true;
  if (["false", "0", "no"].includes(normalized)) return false;
  return defaultValue;
}

export interface HarvesterConfig {
  github: {
    token?: string;
    baseUrl: string;
    userAgent: string;
  };
  retry: {
    // Plain retries for 5xx and network errors, never for quota responses
    maxRetries: number;
    standardRetryBaseDelay: number;
  };
  output: {
    filename: string;
    fsync: boolean;
    progressInterval: number;
    confirmCursor: boolean;
  };
  log: {
    level: string;
    pretty: boolean;
    file?: string;
  };
}

export function loadConfig(env: Env = process.env): HarvesterConfig {
  return {
    github: {
      token: env.GITHUB_TOKEN || undefined,
      baseUrl: env.GITHUB_API_URL || "https://api.github.com",
      userAgent: env.GITHUB_USER_AGENT || "public-repo-harvester",
    },
    retry: {
      maxRetries: parseEnvNumber(env.MAX_RETRIES, 3),
      standardRetryBaseDelay: parseEnvNumber(env.STANDARD_RETRY_BASE_DELAY, 1000),
    },
    output: {
      filename: env.OUTPUT_FILENAME || "repos.csv",
      fsync: parseEnvBoolean(env.SINK_FSYNC, false),
      progressInterval: Math.max(1, parseEnvNumber(env.PROGRESS_INTERVAL, 100)),
      confirmCursor: parseEnvBoolean(env.CONFIRM_CURSOR, true),
    },
    log: {
      level: env.LOG_LEVEL || "info",
      pretty: parseEnvBoolean(env.LOG_PRETTY, env.NODE_ENV !== "production"),
      file: env.LOG_FILE || undefined,
    },
  };
}

export const config = loadConfig();

export default config;
