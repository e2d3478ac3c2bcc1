import * as dotenv from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

export interface Config {
  server: {
    name: string;
    version: string;
    debug: boolean;
  };
  search: {
    apiUrl: string;
    token?: string;
    username?: string;
    password?: string;
    requestTimeoutMs: number;
    mockMode: boolean;
  };
  polling: {
    intervalSeconds: number;
    timeoutSeconds: number;
  };
  retry: {
    maxAttempts: number;
    initialDelayMs: number;
    maxDelayMs: number;
  };
}

const ConfigSchema = z
  .object({
    server: z.object({
      name: z.string().min(1, 'Server name must not be empty'),
      version: z.string().min(1, 'Version must not be empty'),
      debug: z.boolean(),
    }),
    search: z.object({
      apiUrl: z.string().url('Invalid search API URL format'),
      token: z.string().min(1).optional(),
      username: z.string().min(1).optional(),
      password: z.string().optional(),
      requestTimeoutMs: z.number().int().min(1000).max(600000),
      mockMode: z.boolean(),
    }),
    polling: z.object({
      intervalSeconds: z.number().min(0).max(60),
      timeoutSeconds: z.number().positive().max(86400),
    }),
    retry: z.object({
      maxAttempts: z.number().int().min(1).max(10),
      initialDelayMs: z.number().int().min(0).max(10000),
      maxDelayMs: z.number().int().min(0).max(60000),
    }),
  })
  .refine(
    (config) =>
      config.search.mockMode ||
      config.search.token !== undefined ||
      (config.search.username !== undefined && config.search.password !== undefined),
    {
      message: 'Provide a token, or a username and password (or enable mock mode)',
      path: ['search'],
    }
  );

export class ConfigValidationError extends Error {
  constructor(readonly issues: Array<{ path: string; message: string }>) {
    super(`Invalid configuration: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`);
    this.name = 'ConfigValidationError';
  }
}

/**
 * Parse command line arguments
 * Usage: node dist/src/index.js --search-url https://localhost:8089/services --token <token> --debug
 */
export function parseArgs(argv: string[]): Record<string, string | boolean> {
  const args: Record<string, string | boolean> = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Build configuration from CLI arguments and environment variables.
 * CLI arguments win over environment variables, which win over defaults.
 */
export function loadConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliArgs = parseArgs(argv);

  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || defaultValue;
  };

  const getOptionalString = (cliKey: string, envKey: string): string | undefined => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return cliValue;
    return env[envKey] || undefined;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    const cliValue = cliArgs[cliKey];
    if (typeof cliValue === 'string') return Number(cliValue);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'search-job-lifecycle'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
    },
    search: {
      apiUrl: getString('search-url', 'SEARCH_API_URL', 'https://localhost:8089/services'),
      token: getOptionalString('token', 'SEARCH_API_TOKEN'),
      username: getOptionalString('username', 'SEARCH_API_USERNAME'),
      password: getOptionalString('password', 'SEARCH_API_PASSWORD'),
      requestTimeoutMs: getNumber('request-timeout', 'SEARCH_REQUEST_TIMEOUT_MS', 30000),
      mockMode: getBoolean('mock', 'MOCK_MODE', false),
    },
    polling: {
      intervalSeconds: getNumber('poll-interval', 'POLL_INTERVAL_SECONDS', 1),
      timeoutSeconds: getNumber('poll-timeout', 'POLL_TIMEOUT_SECONDS', 300),
    },
    retry: {
      maxAttempts: getNumber('retry-attempts', 'RETRY_MAX_ATTEMPTS', 3),
      initialDelayMs: getNumber('retry-initial-delay', 'RETRY_INITIAL_DELAY_MS', 500),
      maxDelayMs: getNumber('retry-max-delay', 'RETRY_MAX_DELAY_MS', 8000),
    },
  };

  const result = ConfigSchema.safeParse(rawConfig);
  if (!result.success) {
    throw new ConfigValidationError(
      result.error.errors.map((err) => ({ path: err.path.join('.') || 'root', message: err.message }))
    );
  }
  return result.data;
}

/**
 * Get configuration, printing validation problems and exiting when invalid
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigValidationError) {
      console.error('\n❌ Configuration Validation Failed!\n');
      console.error('Errors:');
      error.issues.forEach((issue) => {
        console.error(`  • ${issue.path}: ${issue.message}`);
      });
      console.error('\n💡 Tips:');
      console.error('  - Check your .env file');
      console.error('  - Verify CLI arguments');
      console.error('  - Search API URL must be valid (e.g., https://localhost:8089/services)');
      console.error('  - Set SEARCH_API_TOKEN, or SEARCH_API_USERNAME and SEARCH_API_PASSWORD');
      console.error();
      process.exit(1);
    }
    throw error;
  }
}

/**
 * Print configuration summary to stderr
 */
export function printConfigInfo(config: Config): void {
  console.error('╔══════════════════════════════════════════════════════════════════╗');
  console.error('║           Search Job Lifecycle MCP Server - Configuration         ║');
  console.error('╚══════════════════════════════════════════════════════════════════╝');

  console.error(`\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`);
  if (config.search.mockMode) {
    console.error('🧪 Search API: in-memory mock');
  } else {
    const auth = config.search.token ? 'token' : `basic (${config.search.username})`;
    console.error(`🔗 Search API: ${config.search.apiUrl} [auth: ${auth}]`);
  }
  console.error(`⏱️  Requests: ${config.search.requestTimeoutMs}ms timeout | Retry: ${config.retry.maxAttempts}x (${config.retry.initialDelayMs}-${config.retry.maxDelayMs}ms)`);
  console.error(`🔄 Polling: every ${config.polling.intervalSeconds}s, give up after ${config.polling.timeoutSeconds}s`);

  console.error('\n' + '─'.repeat(68));
}
