#!/usr/bin/env node
import { config as loadEnv } from 'dotenv';
import { Command } from 'commander';
import chalk from 'chalk';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { logger } from '@task-transformer/logger';
import { createBridge } from './bridge.js';
import { isSelectionRequest } from './builder.js';
import { loadBridgeConfig } from './config.js';
import { formatError } from './errors.js';
import { createBridgeServer, SERVER_INFO } from './server.js';

loadEnv();

const log = logger.cli;

function fail(action: string, error: unknown): never {
  log.error(chalk.red(`${action} failed: ${formatError(error)}`));
  process.exit(1);
}

const program = new Command();

program
  .name('task-bridge')
  .description('Turn an existing experiment-task template into a new task with minimal edits')
  .version(SERVER_INFO.version);

program
  .command('serve', { isDefault: true })
  .description('Serve the tools and prompts over MCP on stdio')
  .action(async () => {
    try {
      const { builder, config } = createBridge(loadBridgeConfig());
      const server = createBridgeServer(builder);
      await server.connect(new StdioServerTransport());
      // stdout now carries the protocol; report through the stderr debug channel only
      logger.server.info(`Serving ${config.organization} templates on stdio (cache ${config.cacheDir})`);
    } catch (error) {
      fail('Starting the server', error);
    }
  });

program
  .command('list')
  .description('List template repositories with README snippets and branches')
  .action(async () => {
    try {
      const { builder } = createBridge(loadBridgeConfig());
      const tasks = await builder.listTasks();
      for (const task of tasks) {
        log.raw(`${chalk.bold(task.repo)} ${chalk.gray(`[${task.branches.join(', ')}]`)}`);
        if (task.readme_snippet) {
          log.raw(`  ${task.readme_snippet.slice(0, 160)}`);
        }
      }
      log.success(`${tasks.length} templates`);
    } catch (error) {
      fail('Listing templates', error);
    }
  });

program
  .command('download')
  .description('Clone a template repository into the local cache')
  .argument('<repo>', 'Exact template repository name')
  .action(async (repo: string) => {
    try {
      const { builder } = createBridge(loadBridgeConfig());
      const result = await builder.downloadTask(repo);
      log.success(`${repo} → ${result.template_path}`);
    } catch (error) {
      fail(`Downloading ${repo}`, error);
    }
  });

program
  .command('build')
  .description('Print the build_task result for a target task')
  .argument('<target>', 'Task to build')
  .option('--source <name>', 'Template to start from (case-insensitive substring)')
  .action(async (target: string, options: { source?: string }) => {
    try {
      const { builder } = createBridge(loadBridgeConfig());
      const result = await builder.build(target, options.source);
      if (isSelectionRequest(result)) {
        log.info(result.note);
      }
      log.raw(JSON.stringify(result, null, 2));
    } catch (error) {
      fail(`Building ${target}`, error);
    }
  });

await program.parseAsync(process.argv);
