import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { JobLifecycleClient } from '../application/services/JobLifecycleClient.js';
import { ISearchTransport } from '../core/interfaces/ISearchTransport.js';
import { SearchApiClient } from '../infrastructure/http/SearchApiClient.js';
import { InMemoryJobStore } from '../infrastructure/memory/InMemoryJobStore.js';
import { InMemorySearchTransport } from '../infrastructure/memory/InMemorySearchTransport.js';
import { CircuitBreaker, isRetryableError } from '../utils/retry.js';
import { registerSearchJobTools } from './tools/SearchJobTools.js';
import { registerHealthCheckTool, ServiceProbe } from './tools/HealthCheckTool.js';

/**
 * Main MCP Server class that wires the search transport, the job client and the tools
 */
export class McpServer {
  private server: BaseMcpServer;
  private client: JobLifecycleClient;
  private probe: ServiceProbe;
  private debugLog: (message: string) => void;

  constructor(private config: Config) {
    this.debugLog = (message: string) => {
      if (config.server.debug) {
        console.error(`[DEBUG] ${message}`);
      }
    };

    const { transport, probe } = this.createTransport();
    this.probe = probe;
    this.client = new JobLifecycleClient(transport, {
      requestTimeoutMs: config.search.requestTimeoutMs,
      defaultPollIntervalSeconds: config.polling.intervalSeconds,
    });

    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });
    this.registerTools();
  }

  private createTransport(): { transport: ISearchTransport; probe: ServiceProbe } {
    const { search, retry } = this.config;

    if (search.mockMode) {
      const store = new InMemoryJobStore();
      this.seedMockJobs(store);
      const transport = new InMemorySearchTransport(store, { progressStep: 0.2 });
      this.debugLog(`Mock search service seeded with ${store.size} jobs`);
      return {
        transport,
        probe: { mode: 'mock', healthCheck: async () => true },
      };
    }

    const circuitBreaker = new CircuitBreaker(5, 60000, isRetryableError);
    const api = new SearchApiClient(
      search.apiUrl,
      { token: search.token, username: search.username, password: search.password },
      {
        circuitBreaker,
        retryConfig: {
          maxAttempts: retry.maxAttempts,
          initialDelayMs: retry.initialDelayMs,
          maxDelayMs: retry.maxDelayMs,
          multiplier: 2,
          timeoutMs: search.requestTimeoutMs,
        },
        defaultTimeoutMs: search.requestTimeoutMs,
        onRetryLog: (log) => {
          if (!log.success) {
            this.debugLog(`[SearchApi] attempt ${log.attempt} failed: ${log.error}${log.nextRetryInMs !== undefined ? `, retrying in ${log.nextRetryInMs}ms` : ''}`);
          }
        },
      }
    );
    return {
      transport: api,
      probe: {
        mode: 'http',
        healthCheck: () => api.healthCheck(),
        circuitBreaker: () => api.getCircuitBreakerStats(),
      },
    };
  }

  /**
   * A few jobs in different states so mock mode has something to show
   */
  private seedMockJobs(store: InMemoryJobStore) {
    store.create('index=main | stats count by host', { expectedResultCount: 12 });
    store.create('index=web status>=500 | timechart count', { dispatchState: 'RUNNING', doneProgress: 0.4 });
    const done = store.create('index=_internal | head 100', { expectedResultCount: 100 });
    store.complete(done.sid);
  }

  private registerTools() {
    registerSearchJobTools(this.server, this.client, {
      pollIntervalSeconds: this.config.polling.intervalSeconds,
      timeoutSeconds: this.config.polling.timeoutSeconds,
    });
    registerHealthCheckTool(this.server, this.probe, this.client);
  }

  /**
   * Start the MCP server on stdio
   */
  async start() {
    const transport = new StdioServerTransport();

    // stdio errors are reported, not fatal
    process.stdin.on('error', (error) => {
      console.error('⚠️ stdin error (non-fatal):', error.message);
    });

    process.stdout.on('error', (error) => {
      console.error('⚠️ stdout error (non-fatal):', error.message);
    });

    process.stdin.on('end', () => {
      console.error('⚠️ stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    console.error(`\n✅ Search Job Lifecycle MCP Server running on stdio`);
    this.debugLog('stdio transport connected successfully');
  }

  /**
   * Graceful shutdown
   */
  async shutdown() {
    console.error('\n👋 Shutting down gracefully...');
    await this.server.close();
  }
}
