import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobLifecycleClient } from '../../application/services/JobLifecycleClient.js';
import { ToolResult, formatToolError } from './SearchJobTools.js';

/**
 * What the health check needs to know about the configured transport
 */
export interface ServiceProbe {
  mode: 'http' | 'mock';
  healthCheck(): Promise<boolean>;
  circuitBreaker?: () => unknown;
}

interface HealthReport {
  timestamp: string;
  status: 'healthy' | 'degraded';
  components: {
    searchService: { mode: ServiceProbe['mode']; status: 'healthy' | 'error'; message: string };
    circuitBreaker?: unknown;
    jobs?: { active: number } | { error: string };
  };
}

export function createHealthCheckHandler(probe: ServiceProbe, client: JobLifecycleClient) {
  return async (): Promise<ToolResult> => {
    try {
      const reachable = await probe.healthCheck();
      const health: HealthReport = {
        timestamp: new Date().toISOString(),
        status: reachable ? 'healthy' : 'degraded',
        components: {
          searchService: {
            mode: probe.mode,
            status: reachable ? 'healthy' : 'error',
            message: reachable ? 'Search service is reachable' : 'Search service did not answer the job listing request',
          },
          circuitBreaker: probe.circuitBreaker?.(),
        },
      };

      if (reachable) {
        try {
          const active = await client.listActive();
          health.components.jobs = { active: active.length };
        } catch (error) {
          health.components.jobs = { error: error instanceof Error ? error.message : String(error) };
          health.status = 'degraded';
        }
      }

      return {
        content: [
          {
            type: 'text',
            text: `# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``,
          },
        ],
      };
    } catch (error) {
      return formatToolError('running health check', error);
    }
  };
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(server: McpServer, probe: ServiceProbe, client: JobLifecycleClient) {
  server.tool(
    'health-check',
    'Check the health of the MCP server and its search service connection (reachability, circuit breaker state, active jobs)',
    {},
    createHealthCheckHandler(probe, client)
  );
}
