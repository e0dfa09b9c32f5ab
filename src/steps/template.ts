import fs from 'node:fs';
import path from 'node:path';
import type { TaskConfig } from '../registry.js';
import { renderString } from '../utils/expression.js';
import { requireString } from './inputs.js';

/** `template` task: renders `inputs.template` against the run context and writes it to `inputs.output`. */
export function renderTemplateStep(task: TaskConfig): string {
  const template = requireString(task, 'template');
  const output = task.path(requireString(task, 'output'));
  const rendered = renderString(template, task.scope);
  fs.mkdirSync(path.dirname(output), { recursive: true });
  fs.writeFileSync(output, rendered);
  return output;
}
