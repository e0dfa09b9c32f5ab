import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import { WorkflowDefinitionError, errorMessage } from './errors.js';
import { validateFlows } from './flows.js';
import { WorkflowSchema } from './schema.js';
import type { WorkflowDefinition } from './types.js';

export function loadWorkflowFile(filePath: string): WorkflowDefinition {
  const resolved = path.resolve(process.cwd(), filePath);
  let raw: unknown;
  try {
    raw = YAML.parse(fs.readFileSync(resolved, 'utf8'));
  } catch (e) {
    throw new WorkflowDefinitionError(`Failed to read workflow ${resolved}: ${errorMessage(e)}`, { cause: e });
  }
  const workflow = parseWorkflow(raw, resolved);
  return { ...workflow, name: workflow.name ?? path.basename(resolved).replace(/\.ya?ml$/i, '') };
}

export function parseWorkflow(raw: unknown, source = '<inline>'): WorkflowDefinition {
  const parsed = WorkflowSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `  - ${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
      .join('\n');
    throw new WorkflowDefinitionError(`Invalid workflow ${source}:\n${issues}`);
  }
  const { flows: rawFlows, ...doc } = parsed.data;

  const names = new Set<string>();
  for (const step of doc.steps) {
    if (step.name === undefined) continue;
    if (names.has(step.name)) {
      throw new WorkflowDefinitionError(`Duplicate step name '${step.name}' in ${source}`);
    }
    names.add(step.name);
  }
  for (const step of doc.steps) {
    const target = step.on_error?.next;
    if (target !== undefined && !names.has(target)) {
      throw new WorkflowDefinitionError(
        `Step '${step.name ?? '<unnamed>'}' sends errors to undefined step '${target}'`
      );
    }
  }

  const flows = validateFlows({ steps: doc.steps, flows: rawFlows });
  return flows ? { ...doc, flows } : doc;
}
