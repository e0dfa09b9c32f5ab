import type { BatchScope, RunContext, StepOutput } from './types.js';
import type { TemplateScope } from './utils/expression.js';

export const NAMESPACES = ['args', 'env', 'steps', 'batch', 'error'] as const;

export function createContext(init: Partial<RunContext> = {}): RunContext {
  return {
    args: { ...(init.args ?? {}) },
    env: { ...(init.env ?? {}) },
    steps: { ...(init.steps ?? {}) },
    extra: { ...(init.extra ?? {}) },
    ...(init.batch ? { batch: init.batch } : {}),
    ...(init.error ? { error: init.error } : {})
  };
}

/**
 * Flatten a context for template rendering. Namespaces are laid over the root keys so an ad-hoc
 * root value can never hide `args`, `env` or `steps`.
 */
export function toTemplateScope(ctx: RunContext): TemplateScope {
  const scope: TemplateScope = { ...ctx.extra, args: ctx.args, env: ctx.env, steps: ctx.steps };
  if (ctx.batch) scope.batch = ctx.batch;
  if (ctx.error) scope.error = ctx.error;
  return scope;
}

/** Item-scoped copy used by batch workers; namespace maps are re-created so workers never share them. */
export function forkContext(ctx: RunContext, argName: string, batch: BatchScope): RunContext {
  return {
    args: { ...ctx.args, [argName]: batch.item },
    env: { ...ctx.env },
    steps: { ...ctx.steps },
    extra: { ...ctx.extra },
    batch,
    ...(ctx.error ? { error: { ...ctx.error } } : {})
  };
}

export function isStepOutput(value: unknown): value is StepOutput {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function normalizeStepOutput(value: unknown): StepOutput {
  return isStepOutput(value) ? value : { result: value };
}

