import type { TaskConfig } from '../registry.js';
import { optionalString, requireInput } from './inputs.js';

export function echoStep(task: TaskConfig): unknown {
  return requireInput(task, 'message');
}

export function failStep(task: TaskConfig): never {
  throw new Error(optionalString(task, 'message', 'Task failed'));
}

export function helloWorldStep(task: TaskConfig): string {
  return `Hello, ${optionalString(task, 'name', 'World')}!`;
}

function toNumber(value: unknown, key: string): number {
  const n = typeof value === 'number' ? value : Number(value);
  if (value === '' || Number.isNaN(n)) throw new Error(`${key} must be a number, got: ${String(value)}`);
  return n;
}

export function addNumbersStep(task: TaskConfig): number {
  return toNumber(requireInput(task, 'a'), 'a') + toNumber(requireInput(task, 'b'), 'b');
}

export function joinStringsStep(task: TaskConfig): string {
  const strings = requireInput(task, 'strings');
  if (!Array.isArray(strings)) throw new Error('strings must be a list');
  return strings.map(s => String(s)).join(optionalString(task, 'separator', ' '));
}

/** Returns its inputs and what the step can see; `should_fail` makes it throw. */
export function noopStep(task: TaskConfig) {
  if (task.inputs.should_fail === true) {
    throw new Error('Task failed as requested');
  }
  return {
    processed_inputs: task.inputs,
    task_name: task.name,
    task_type: task.taskType,
    available_variables: task.availableVariables()
  };
}
