import { substituteTemplate } from './template-substitution.js';

/**
 * Six-stage workflow for turning one task template into another:
 * plan, config, trial logic, session logic, docs, static validation.
 */
export const TRANSFORM_PROMPT_TEMPLATE = `Turn my existing {{source_task}} implementation in PsyFlow/TAPs into a {{target_task}} task with as few changes as possible.

Breakdown:

Stage 0: Plan
* Read the literature and work out what a typical {{target_task}} task looks like
* Define the flow: blocks → trials → events
* Identify stimulus types, response keys, timing parameters, and key output fields

Stage 1: config.yaml
* Adapt the existing config.yaml to run a {{target_task}} task
* Highlight any parameters that need careful review

Stage 2: Trial logic (src/run_trial.py)
* Adapt one existing trial template to run a single {{target_task}} trial
* (Optional) Add helpers in src/utils.py only if they are needed

Stage 3: Block/session logic (main.py)
* Implement block order, feedback screens, and pauses based on the {{source_task}} template
* Keep the public API consistent with the original task

Stage 4: README.md
* Match the structure and tone of existing tasks
* Cover: purpose, install steps, config details, run instructions, and expected outputs

Stage 5: Static validation
* Check that config.yaml keys line up with code references
* Ensure logged DataFrame columns match the template task
* Verify naming, docstrings, and imports follow PsyFlow conventions
* Confirm timing and trigger variables match between run_trial.py and config.yaml
* Spot any logic errors or unused variables

(No PsychoPy runtime or unit tests are required during this step)`;

export function transformPrompt(sourceTask: string, targetTask: string): string {
  return substituteTemplate(TRANSFORM_PROMPT_TEMPLATE, {
    source_task: sourceTask,
    target_task: targetTask,
  });
}
