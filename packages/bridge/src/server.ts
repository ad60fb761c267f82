/**
 * MCP server exposing the build tools and the prompt templates
 */

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, GetPromptResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  chooseTemplatePrompt,
  transformPrompt,
  translateConfigPrompt,
  type PromptMessage,
  type TemplateCandidate
} from '@task-transformer/prompts';
import { logger } from '@task-transformer/logger';
import type { TaskBuilder } from './builder.js';
import { formatError } from './errors.js';

const log = logger.server;

export const SERVER_INFO = {
  name: 'task-transformer',
  version: '0.1.0',
} as const;

const candidateListSchema = z.array(z.object({
  repo: z.string(),
  readme_snippet: z.string().default(''),
}));

/**
 * Parse the JSON candidate list prompt argument (prompt arguments are strings on the wire)
 */
export function parseCandidates(raw: string | undefined): TemplateCandidate[] {
  if (raw === undefined || raw.trim() === '') {
    return [];
  }

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    throw new McpError(ErrorCode.InvalidParams, `candidates must be a JSON array: ${formatError(error)}`);
  }

  const parsed = candidateListSchema.safeParse(value);
  if (!parsed.success) {
    throw new McpError(
      ErrorCode.InvalidParams,
      `candidates must be an array of { repo, readme_snippet }: ${parsed.error.issues[0]?.message ?? 'invalid value'}`
    );
  }
  return parsed.data.map(c => ({ repo: c.repo, readmeSnippet: c.readme_snippet }));
}

export function toPromptResult(messages: PromptMessage[], description?: string): GetPromptResult {
  return {
    description,
    messages: messages.map((m): GetPromptResult['messages'][number] => ({
      role: m.role,
      content: { type: 'text', text: m.content },
    })),
  };
}

async function runTool(name: string, operation: () => Promise<unknown>): Promise<CallToolResult> {
  log.debug(`Tool call: ${name}`);
  try {
    const result = await operation();
    return { content: [{ type: 'text', text: JSON.stringify(result, null, 2) }] };
  } catch (error) {
    const label = error instanceof Error ? error.name : 'Error';
    log.error(`${name} failed: ${formatError(error)}`);
    return {
      isError: true,
      content: [{ type: 'text', text: `${label}: ${formatError(error)}` }],
    };
  }
}

export function createBridgeServer(builder: TaskBuilder): McpServer {
  const server = new McpServer(SERVER_INFO);

  server.registerTool(
    'build_task',
    {
      title: 'Build Task',
      description:
        'With source_task: clone the matching template and return the Stage 0-5 transformation prompt plus the local path. ' +
        'Without source_task: return a template selection prompt; answer it, then call build_task again with source_task=<repo>.',
      inputSchema: {
        target_task: z.string().min(1).describe('Task to build, e.g. "flanker"'),
        source_task: z.string().optional().describe('Template to start from; matched as a case-insensitive substring of repo names'),
      },
    },
    async ({ target_task, source_task }) => runTool('build_task', () => builder.build(target_task, source_task))
  );

  server.registerTool(
    'download_task',
    {
      title: 'Download Task',
      description: 'Clone a template repository into the local cache and return its path.',
      inputSchema: {
        repo: z.string().min(1).describe('Exact template repository name'),
      },
    },
    async ({ repo }) => runTool('download_task', () => builder.downloadTask(repo))
  );

  server.registerTool(
    'translate_config',
    {
      title: 'Translate Config',
      description: 'Load <task_path>/config.yaml and return prompt messages for translating its display text.',
      inputSchema: {
        task_path: z.string().min(1).describe('Local task directory containing config.yaml'),
        target_language: z.string().min(1).describe('Language to translate into'),
      },
    },
    async ({ task_path, target_language }) =>
      runTool('translate_config', () => builder.translateConfig(task_path, target_language))
  );

  server.registerTool(
    'list_tasks',
    {
      title: 'List Tasks',
      description: 'List every template repository with a README snippet and up to 10 branch names.',
    },
    async () => runTool('list_tasks', () => builder.listTasks())
  );

  server.registerPrompt(
    'transform_prompt',
    {
      title: 'Task Transformation Prompt',
      argsSchema: {
        source_task: z.string(),
        target_task: z.string(),
      },
    },
    ({ source_task, target_task }) =>
      toPromptResult([{ role: 'user', content: transformPrompt(source_task, target_task) }])
  );

  server.registerPrompt(
    'translate_config_prompt',
    {
      title: 'Translate Config YAML',
      argsSchema: {
        yaml_text: z.string(),
        target_language: z.string(),
      },
    },
    ({ yaml_text, target_language }) => toPromptResult(translateConfigPrompt(yaml_text, target_language))
  );

  server.registerPrompt(
    'choose_template_prompt',
    {
      title: 'Choose Template',
      description: 'Ask the LLM to pick the single template repo needing the fewest changes.',
      argsSchema: {
        desc: z.string().describe('Free-form description of the wanted task'),
        candidates: z.string().optional().describe('JSON array of { "repo", "readme_snippet" }'),
      },
    },
    ({ desc, candidates }) => toPromptResult(chooseTemplatePrompt(desc, parseCandidates(candidates)))
  );

  return server;
}
