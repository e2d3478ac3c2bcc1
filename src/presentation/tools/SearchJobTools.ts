import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { JobLifecycleClient } from '../../application/services/JobLifecycleClient.js';
import { JobState } from '../../core/entities/JobState.js';
import { JobSummary } from '../../core/entities/JobSummary.js';
import { StatusSnapshot } from '../../core/entities/StatusSnapshot.js';
import {
  JobFailedError,
  MalformedStatusError,
  NotFoundError,
  PollAbortedError,
  PollTimeoutError,
  TransportError,
  ValidationError,
  errorMessage,
} from '../../core/errors.js';

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export interface SearchJobToolDefaults {
  pollIntervalSeconds: number;
  timeoutSeconds: number;
}

export type ControlToolAction = 'cancel' | 'pause' | 'resume' | 'finalize' | 'touch' | 'delete';

/**
 * Progress update recorded while waiting on a job
 */
export interface ProgressUpdate {
  timestamp: Date;
  message: string;
  percentage: number;
}

function textResult(text: string, isError = false): ToolResult {
  return isError ? { isError: true, content: [{ type: 'text', text }] } : { content: [{ type: 'text', text }] };
}

function stateEmoji(state: JobState): string {
  switch (state) {
    case 'DONE':
      return '✅';
    case 'FAILED':
      return '❌';
    case 'PAUSED':
      return '⏸️';
    default:
      return '🔄';
  }
}

export function formatSnapshot(snapshot: StatusSnapshot): string {
  const lines = [
    `# ${stateEmoji(snapshot.state)} Search Job Status: ${snapshot.identifier}`,
    '',
    `- **State**: ${snapshot.state}`,
    `- **Progress**: ${snapshot.progressPercent.toFixed(1)}%`,
    `- **Events**: ${snapshot.eventCount}`,
    `- **Results**: ${snapshot.resultCount}`,
    `- **Scanned**: ${snapshot.scanCount}`,
    `- **Run Duration**: ${snapshot.runDurationSeconds.toFixed(2)}s`,
    `- **TTL**: ${snapshot.ttlSeconds}s`,
    `- **Flags**: done=${snapshot.isDone}, failed=${snapshot.isFailed}, paused=${snapshot.isPaused}`,
  ];
  if (snapshot.messages.length > 0) {
    lines.push('', '## Messages');
    for (const message of snapshot.messages) {
      lines.push(`- [${message.severity}] ${message.text}`);
    }
  }
  return lines.join('\n');
}

function formatSummaryRow(summary: JobSummary) {
  return {
    id: summary.identifier,
    state: summary.state,
    progress: `${(summary.progressFraction * 100).toFixed(0)}%`,
    results: summary.resultCount,
    events: summary.eventCount,
    duration: `${summary.runDurationSeconds.toFixed(1)}s`,
    paused: summary.isPaused,
  };
}

/**
 * One distinct message per failure kind so callers can tell them apart
 */
export function formatToolError(action: string, error: unknown): ToolResult {
  if (error instanceof JobFailedError) {
    const messages = error.messages.map((m) => `- [${m.severity}] ${m.text}`).join('\n');
    return textResult(
      `# ❌ Search job failed\n\nJob: ${error.identifier}\nState: ${error.dispatchState}\n\n## Messages\n${messages || 'No diagnostic messages'}`,
      true
    );
  }
  if (error instanceof PollTimeoutError) {
    return textResult(
      `# ⏳ Search job still running\n\nJob ${error.identifier} did not finish within ${error.timeoutSeconds}s (waited ${error.elapsedSeconds.toFixed(1)}s).\nThe job may still complete: call wait-for-search-job again, or cancel-search-job to stop it.`,
      true
    );
  }
  if (error instanceof PollAbortedError) {
    return textResult(`Wait aborted for job ${error.identifier} after ${error.elapsedSeconds.toFixed(1)}s`, true);
  }
  if (error instanceof NotFoundError) {
    return textResult(`Job not found: ${error.message}`, true);
  }
  if (error instanceof ValidationError) {
    return textResult(`Invalid input: ${error.message}`, true);
  }
  if (error instanceof MalformedStatusError) {
    return textResult(`Unexpected status response from search service: ${error.message}`, true);
  }
  if (error instanceof TransportError) {
    const status = error.statusCode !== undefined ? ` (HTTP ${error.statusCode})` : '';
    return textResult(`Search service error${status} while ${action}: ${error.message}`, true);
  }
  return textResult(`Error ${action}: ${errorMessage(error)}`, true);
}

const CONTROL_VERBS: Record<ControlToolAction, string> = {
  cancel: 'Cancellation requested',
  pause: 'Pause requested',
  resume: 'Resume requested',
  finalize: 'Finalize requested',
  touch: 'Inactivity timer reset',
  delete: 'Job deleted',
};

export function createSearchJobToolHandlers(client: JobLifecycleClient, defaults: SearchJobToolDefaults) {
  const runControl = (action: ControlToolAction, jobId: string): Promise<boolean> => {
    switch (action) {
      case 'cancel':
        return client.cancel(jobId);
      case 'pause':
        return client.pause(jobId);
      case 'resume':
        return client.resume(jobId);
      case 'finalize':
        return client.finalize(jobId);
      case 'touch':
        return client.touch(jobId);
      case 'delete':
        return client.delete(jobId);
    }
  };

  return {
    async getStatus({ job_id }: { job_id: string }): Promise<ToolResult> {
      try {
        return textResult(formatSnapshot(await client.fetchStatus(job_id)));
      } catch (error) {
        return formatToolError('getting job status', error);
      }
    },

    async waitForJob({
      job_id,
      timeout_seconds,
      poll_interval_seconds,
      signal,
    }: {
      job_id: string;
      timeout_seconds?: number;
      poll_interval_seconds?: number;
      signal?: AbortSignal;
    }): Promise<ToolResult> {
      const updates: ProgressUpdate[] = [];
      try {
        const snapshot = await client.pollUntilTerminal(job_id, {
          timeoutSeconds: timeout_seconds ?? defaults.timeoutSeconds,
          pollIntervalSeconds: poll_interval_seconds ?? defaults.pollIntervalSeconds,
          signal,
          onProgress: (progress) => {
            updates.push({
              timestamp: new Date(),
              message: `${progress.state} - ${progress.resultCount} results`,
              percentage: progress.progressPercent,
            });
          },
        });

        const heading = snapshot.isPaused
          ? `Job is paused; call resume-search-job before waiting again.`
          : `Job finished: ${snapshot.state}`;
        const progressText = updates
          .map((update) => `- [${update.percentage.toFixed(1)}%] ${update.message}`)
          .join('\n');

        return textResult(`${heading}\n\n${formatSnapshot(snapshot)}\n\n## Progress Updates\n${progressText}`);
      } catch (error) {
        return formatToolError('waiting for job', error);
      }
    },

    async listJobs({
      count,
      offset,
      active_only,
    }: {
      count?: number;
      offset?: number;
      active_only?: boolean;
    }): Promise<ToolResult> {
      try {
        const jobs = active_only
          ? await client.listActive(count, offset)
          : await client.listJobs({ count, offset });
        const rows = jobs.map(formatSummaryRow);
        const title = active_only ? 'Active Search Jobs' : 'Search Jobs';
        const body = rows.length === 0 ? 'No jobs found' : `\`\`\`json\n${JSON.stringify(rows, null, 2)}\n\`\`\``;
        return textResult(`# ${title}\n\nTotal: ${rows.length}\n\n${body}`);
      } catch (error) {
        return formatToolError('listing jobs', error);
      }
    },

    async control({ job_id, action }: { job_id: string; action: ControlToolAction }): Promise<ToolResult> {
      try {
        await runControl(action, job_id);
        return textResult(`${CONTROL_VERBS[action]}: ${job_id}`);
      } catch (error) {
        return formatToolError(`running ${action}`, error);
      }
    },

    async setTtl({ job_id, ttl_seconds }: { job_id: string; ttl_seconds: number }): Promise<ToolResult> {
      try {
        await client.setExpiry(job_id, ttl_seconds);
        return textResult(
          `TTL set to ${ttl_seconds}s: ${job_id}\nThe service may clamp this value; check get-search-job-status to confirm.`
        );
      } catch (error) {
        return formatToolError('setting TTL', error);
      }
    },

    async getSummary({ job_id }: { job_id: string }): Promise<ToolResult> {
      try {
        const summary = await client.getSummary(job_id);
        return textResult(`# Search Job Summary: ${job_id}\n\n\`\`\`json\n${JSON.stringify(summary, null, 2)}\n\`\`\``);
      } catch (error) {
        return formatToolError('getting job summary', error);
      }
    },
  };
}

const CONTROL_TOOLS: Array<{ name: string; description: string; action: ControlToolAction }> = [
  {
    name: 'cancel-search-job',
    description: 'Request cancellation of a search job. A job that is already gone counts as cancelled.',
    action: 'cancel',
  },
  { name: 'pause-search-job', description: 'Pause a running search job', action: 'pause' },
  { name: 'resume-search-job', description: 'Resume a paused search job', action: 'resume' },
  {
    name: 'finalize-search-job',
    description: 'Stop a search job early and keep the results computed so far',
    action: 'finalize',
  },
  {
    name: 'touch-search-job',
    description: 'Reset the inactivity countdown of a search job without changing its TTL',
    action: 'touch',
  },
  { name: 'delete-search-job', description: 'Delete a search job immediately', action: 'delete' },
];

/**
 * Register all search job tools
 */
export function registerSearchJobTools(
  server: McpServer,
  client: JobLifecycleClient,
  defaults: SearchJobToolDefaults
) {
  const handlers = createSearchJobToolHandlers(client, defaults);
  const jobId = z.string().min(1).describe('The search job identifier (sid)');

  server.tool(
    'get-search-job-status',
    'Get the dispatch state, progress and counters of a search job',
    { job_id: jobId },
    async ({ job_id }) => handlers.getStatus({ job_id })
  );

  server.tool(
    'wait-for-search-job',
    'Poll a search job until it is done, failed or paused, or until the timeout elapses',
    {
      job_id: jobId,
      timeout_seconds: z.number().positive().optional().describe(`Give up after this many seconds (default ${defaults.timeoutSeconds})`),
      poll_interval_seconds: z.number().min(0).optional().describe(`Seconds between polls (default ${defaults.pollIntervalSeconds})`),
    },
    // A cancelled tool request aborts the wait
    async (args, extra) => handlers.waitForJob({ ...args, signal: extra.signal })
  );

  server.tool(
    'list-search-jobs',
    'List search jobs with their state and counters',
    {
      count: z.number().int().min(0).optional().describe('Maximum jobs to return (default 50)'),
      offset: z.number().int().min(0).optional().describe('Number of jobs to skip'),
      active_only: z.boolean().optional().describe('Only include queued, parsing, running or finalizing jobs'),
    },
    async (args) => handlers.listJobs(args)
  );

  for (const tool of CONTROL_TOOLS) {
    server.tool(tool.name, tool.description, { job_id: jobId }, async ({ job_id }) =>
      handlers.control({ job_id, action: tool.action })
    );
  }

  server.tool(
    'set-search-job-ttl',
    'Set how long an inactive search job is kept before the service removes it',
    {
      job_id: jobId,
      ttl_seconds: z.number().int().min(0).describe('Time-to-live in seconds'),
    },
    async (args) => handlers.setTtl(args)
  );

  server.tool(
    'get-search-job-summary',
    'Get the field summary of a search job',
    { job_id: jobId },
    async ({ job_id }) => handlers.getSummary({ job_id })
  );
}
