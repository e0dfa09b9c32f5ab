import type { TaskConfig } from '../registry.js';

export function requireInput(task: TaskConfig, key: string): unknown {
  const value = task.inputs[key];
  if (value === undefined || value === null) {
    throw new Error(`${key} parameter is required`);
  }
  return value;
}

export function requireString(task: TaskConfig, key: string): string {
  const value = requireInput(task, key);
  if (typeof value !== 'string' || value === '') {
    throw new Error(`${key} must be a non-empty string`);
  }
  return value;
}

export function optionalString(task: TaskConfig, key: string, fallback: string): string;
export function optionalString(task: TaskConfig, key: string): string | undefined;
export function optionalString(task: TaskConfig, key: string, fallback?: string): string | undefined {
  const value = task.inputs[key];
  if (value === undefined || value === null) return fallback;
  return String(value);
}

export function optionalNumber(task: TaskConfig, key: string): number | undefined {
  const value = task.inputs[key];
  if (value === undefined || value === null || value === '') return undefined;
  const n = Number(value);
  if (Number.isNaN(n)) throw new Error(`${key} must be a number, got: ${String(value)}`);
  return n;
}
