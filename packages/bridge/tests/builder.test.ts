import { mkdirSync, readdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, describe, expect, it } from '@rstest/core';
import {
  isSelectionRequest,
  resolveSourceTemplate,
  SELECTION_NOTE,
  type BuildResult,
  type SelectionRequest,
  type TransformationResult
} from '../src/builder.js';
import { RemoteServiceError, TemplateNotFoundError } from '../src/errors.js';
import { createTestBridge, removeDir, type TestBridge } from './helpers.js';

const CATALOG = ['stroop-task', 'gonogo-task', 'task-registry'];

function expectTransformation(result: BuildResult): TransformationResult {
  if (isSelectionRequest(result)) {
    throw new Error('expected a transformation result');
  }
  return result;
}

function expectSelection(result: BuildResult): SelectionRequest {
  if (!isSelectionRequest(result)) {
    throw new Error('expected a selection request');
  }
  return result;
}

describe('resolveSourceTemplate', () => {
  it('matches case-insensitive substrings and takes the first match', () => {
    expect(resolveSourceTemplate(['Stroop-Task', 'stroop-v2'], 'STROOP')).toBe('Stroop-Task');
    expect(resolveSourceTemplate(['stroop-task'], 'flanker')).toBeUndefined();
  });
});

describe('TaskBuilder', () => {
  let bridge: TestBridge;

  afterEach(() => {
    removeDir(bridge.cwd);
  });

  describe('build with a source task', () => {
    it('resolves, clones once and emits the transformation prompt', async () => {
      bridge = createTestBridge({ repositories: CATALOG });

      const result = expectTransformation(await bridge.builder.build('flanker', 'stroop'));

      expect(result.template_path).toBe(join(bridge.cwd, 'task_cache', 'stroop-task'));
      expect(bridge.cloner.clones).toHaveLength(1);
      expect(bridge.cloner.clones[0]?.url).toBe('https://git.example.test/TestOrg/stroop-task.git');
      expect(result.prompt).toContain('Turn my existing stroop implementation');
      expect(result.prompt).toContain('into a flanker task');
    });

    it('returns the materialized path and reuses the clone on later builds', async () => {
      bridge = createTestBridge({ repositories: CATALOG });

      const first = expectTransformation(await bridge.builder.build('flanker', 'gonogo'));
      const second = expectTransformation(await bridge.builder.build('sst', 'GoNoGo'));

      expect(second.template_path).toBe(first.template_path);
      expect(await bridge.cache.materialize('gonogo-task')).toBe(first.template_path);
      expect(bridge.cloner.clones).toHaveLength(1);
    });

    it('fails with TemplateNotFoundError and clones nothing when no repository matches', async () => {
      bridge = createTestBridge({ repositories: CATALOG });

      await expect(bridge.builder.build('flanker', 'nback')).rejects.toThrow(TemplateNotFoundError);
      expect(bridge.cloner.clones).toHaveLength(0);
    });

    it('never resolves an excluded repository', async () => {
      bridge = createTestBridge({ repositories: CATALOG });

      await expect(bridge.builder.build('flanker', 'registry')).rejects.toThrow(TemplateNotFoundError);
    });

    it('treats the NONE verdict as no template even when a name contains it', async () => {
      bridge = createTestBridge({ repositories: ['nonexistent-demo', 'stroop-task'] });

      await expect(bridge.builder.build('flanker', ' none ')).rejects.toThrow(
        'No template was judged close enough to "flanker"'
      );
      expect(bridge.cloner.clones).toHaveLength(0);
    });

    it('propagates catalog failures without cloning', async () => {
      bridge = createTestBridge({ repositories: CATALOG, catalogError: new Error('HTTP 502') });

      await expect(bridge.builder.build('flanker', 'stroop')).rejects.toThrow(RemoteServiceError);
      expect(bridge.cloner.clones).toHaveLength(0);
    });
  });

  describe('build without a source task', () => {
    it('asks for a selection over every catalog repository', async () => {
      bridge = createTestBridge({
        repositories: CATALOG,
        readmes: { 'stroop-task': 'Color-word\nStroop' },
      });

      const result = expectSelection(await bridge.builder.build('flanker'));

      expect(result.note).toBe(SELECTION_NOTE);
      expect(result.prompt_messages).toHaveLength(3);
      expect(result.prompt_messages[1]?.content).toBe('Desired task:\nA flanker task.');
      expect(result.prompt_messages[2]?.content).toBe(
        'Candidate templates:\n- **stroop-task**: Color-word Stroop\n- **gonogo-task**: '
      );
    });

    it('never touches the cache', async () => {
      bridge = createTestBridge({ repositories: CATALOG });

      await bridge.builder.build('flanker');

      expect(bridge.cloner.clones).toHaveLength(0);
      expect(readdirSync(bridge.cache.root)).toEqual([]);
    });

    it('treats an empty source task as absent', async () => {
      bridge = createTestBridge({ repositories: CATALOG });

      expect(isSelectionRequest(await bridge.builder.build('flanker', ''))).toBe(true);
    });

    it('resolves a whitespace-only source task like any other name', async () => {
      bridge = createTestBridge({ repositories: CATALOG });

      await expect(bridge.builder.build('flanker', '  ')).rejects.toThrow('Template repo not found for "  ".');
      expect(bridge.cloner.clones).toHaveLength(0);
    });

    it('bounds README snippets', async () => {
      bridge = createTestBridge({
        repositories: ['stroop-task'],
        readmes: { 'stroop-task': 'x'.repeat(2500) },
      });

      const result = expectSelection(await bridge.builder.build('flanker'));

      expect(result.prompt_messages[2]?.content).toBe(`Candidate templates:\n- **stroop-task**: ${'x'.repeat(2000)}`);
    });

    it('renders the placeholder for an empty catalog', async () => {
      bridge = createTestBridge({ repositories: ['task-registry'] });

      const result = expectSelection(await bridge.builder.build('flanker'));

      expect(result.prompt_messages[2]?.content).toBe('Candidate templates:\n(no templates found)');
    });
  });

  describe('downloadTask', () => {
    it('clones an exact catalog name', async () => {
      bridge = createTestBridge({ repositories: CATALOG });

      const result = await bridge.builder.downloadTask('gonogo-task');

      expect(result).toEqual({ template_path: join(bridge.cwd, 'task_cache', 'gonogo-task') });
    });

    it('rejects names outside the filtered catalog', async () => {
      bridge = createTestBridge({ repositories: CATALOG });

      await expect(bridge.builder.downloadTask('task-registry')).rejects.toThrow(TemplateNotFoundError);
      await expect(bridge.builder.downloadTask('gonogo')).rejects.toThrow(
        'Repo "gonogo" not found or not a task template.'
      );
      expect(bridge.cloner.clones).toHaveLength(0);
    });
  });

  describe('translateConfig', () => {
    it('passes config.yaml through verbatim', async () => {
      bridge = createTestBridge({ repositories: CATALOG });
      const taskPath = join(bridge.cwd, 'my-task');
      const yamlText = 'subinfo_mapping:\n  age: Age\nstimuli:\n  - type: text\n    text: Hello\n';
      mkdirSync(taskPath);
      writeFileSync(join(taskPath, 'config.yaml'), yamlText);

      const result = await bridge.builder.translateConfig(taskPath, 'Spanish');

      expect(result.prompt_messages).toHaveLength(2);
      expect(result.prompt_messages[1]).toEqual({ role: 'user', content: yamlText });
    });

    it('still passes a malformed document through', async () => {
      bridge = createTestBridge({ repositories: CATALOG });
      const taskPath = join(bridge.cwd, 'broken');
      mkdirSync(taskPath);
      writeFileSync(join(taskPath, 'config.yaml'), 'stimuli: [unclosed');

      const result = await bridge.builder.translateConfig(taskPath, 'German');

      expect(result.prompt_messages[1]?.content).toBe('stimuli: [unclosed');
    });

    it('fails when config.yaml is missing', async () => {
      bridge = createTestBridge({ repositories: CATALOG });

      await expect(bridge.builder.translateConfig(bridge.cwd, 'Spanish')).rejects.toThrow(
        `config.yaml not found in ${bridge.cwd}`
      );
    });
  });

  describe('listTasks', () => {
    it('pairs README snippets and branches with each repository', async () => {
      const manyBranches = Array.from({ length: 12 }, (_, i) => `b${i}`);
      bridge = createTestBridge({
        repositories: CATALOG,
        readmes: { 'gonogo-task': 'Go/No-Go\ntask' },
        branches: { 'stroop-task': manyBranches },
      });

      const tasks = await bridge.builder.listTasks();

      expect(tasks).toEqual([
        { repo: 'stroop-task', readme_snippet: '', branches: manyBranches.slice(0, 10) },
        { repo: 'gonogo-task', readme_snippet: 'Go/No-Go task', branches: [] },
      ]);
      expect(bridge.cloner.clones).toHaveLength(0);
    });
  });
});
