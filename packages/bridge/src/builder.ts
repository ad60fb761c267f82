/**
 * Build orchestration
 *
 * `build` either resolves an explicit source template, clones it and emits the
 * transformation prompt, or gathers candidates and emits a selection request
 * the caller answers with a second `build` call.
 */

import {
  chooseTemplatePrompt,
  NO_TEMPLATE_VERDICT,
  transformPrompt,
  translateConfigPrompt,
  type PromptMessage
} from '@task-transformer/prompts';
import { logger } from '@task-transformer/logger';
import type { RepositoryCache } from './cache/repository-cache.js';
import type { TaskCatalog } from './catalog.js';
import { TemplateNotFoundError } from './errors.js';
import { readTaskConfig } from './task-config.js';

const log = logger.builder;

export const SELECTION_NOTE =
  'Reply with the chosen repo, then call build_task again with source_task=<repo>.';

/** Template resolved and cloned */
export interface TransformationResult {
  prompt: string;
  template_path: string;
}

/** Caller must pick a template first */
export interface SelectionRequest {
  prompt_messages: PromptMessage[];
  note: string;
}

export type BuildResult = TransformationResult | SelectionRequest;

export interface DownloadResult {
  template_path: string;
}

export interface TranslateConfigResult {
  prompt_messages: PromptMessage[];
}

export interface TaskListing {
  repo: string;
  readme_snippet: string;
  branches: string[];
}

export function isSelectionRequest(result: BuildResult): result is SelectionRequest {
  return 'prompt_messages' in result;
}

/**
 * First repository whose name contains `sourceTask`, ignoring case
 */
export function resolveSourceTemplate(repositories: readonly string[], sourceTask: string): string | undefined {
  const needle = sourceTask.toLowerCase();
  return repositories.find(repo => repo.toLowerCase().includes(needle));
}

export function selectionDescription(targetTask: string): string {
  return `A ${targetTask} task.`;
}

export class TaskBuilder {
  constructor(private catalog: TaskCatalog, private cache: RepositoryCache) {}

  async build(targetTask: string, sourceTask?: string): Promise<BuildResult> {
    const repositories = await this.catalog.listTaskRepositories();

    if (sourceTask) {
      return this.buildFromSource(repositories, sourceTask, targetTask);
    }
    return this.requestSelection(repositories, targetTask);
  }

  async downloadTask(repo: string): Promise<DownloadResult> {
    const repositories = await this.catalog.listTaskRepositories();
    if (!repositories.includes(repo)) {
      throw new TemplateNotFoundError(`Repo "${repo}" not found or not a task template.`);
    }
    return { template_path: await this.cache.materialize(repo) };
  }

  async translateConfig(taskPath: string, targetLanguage: string): Promise<TranslateConfigResult> {
    const documentText = await readTaskConfig(taskPath);
    return { prompt_messages: translateConfigPrompt(documentText, targetLanguage) };
  }

  async listTasks(): Promise<TaskListing[]> {
    const repositories = await this.catalog.listTaskRepositories();
    const descriptors = await this.catalog.describe(repositories, { branches: true });
    return descriptors.map(d => ({ repo: d.name, readme_snippet: d.readmeSnippet, branches: d.branches }));
  }

  private async buildFromSource(
    repositories: readonly string[],
    sourceTask: string,
    targetTask: string
  ): Promise<TransformationResult> {
    if (sourceTask.trim().toUpperCase() === NO_TEMPLATE_VERDICT) {
      throw new TemplateNotFoundError(
        `No template was judged close enough to "${targetTask}"; pick a repository from list_tasks or start from scratch.`
      );
    }

    const repo = resolveSourceTemplate(repositories, sourceTask);
    if (!repo) {
      throw new TemplateNotFoundError(`Template repo not found for "${sourceTask}".`);
    }

    log.info(`Resolved "${sourceTask}" to ${repo}`);
    const templatePath = await this.cache.materialize(repo);

    return {
      prompt: transformPrompt(sourceTask, targetTask),
      template_path: templatePath,
    };
  }

  private async requestSelection(repositories: readonly string[], targetTask: string): Promise<SelectionRequest> {
    const descriptors = await this.catalog.describe(repositories, { branches: false });
    const candidates = descriptors.map(d => ({ repo: d.name, readmeSnippet: d.readmeSnippet }));

    log.info(`Requesting template selection among ${candidates.length} candidates`);
    return {
      prompt_messages: chooseTemplatePrompt(selectionDescription(targetTask), candidates),
      note: SELECTION_NOTE,
    };
  }
}
