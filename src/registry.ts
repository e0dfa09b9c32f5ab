import { NAMESPACES, toTemplateScope } from './context.js';
import type { Logger } from './logger.js';
import type { ExecutionStateStore } from './state.js';
import type { RunContext, StepDefinition } from './types.js';
import { renderTemplate, type TemplateScope } from './utils/expression.js';
import { resolvePath } from './workspace.js';

/** A task implementation. It may return a value or a promise of one, and signals failure by throwing. */
export type TaskHandler = (task: TaskConfig) => unknown;

export type RegisterOptions = {
  /** Input keys handed to the handler unrendered. */
  rawInputs?: string[];
  description?: string;
};

export type TaskEntry = {
  name: string;
  handler: TaskHandler;
  rawInputs: string[];
  description?: string;
};

export type TaskLookup =
  | { found: true; entry: TaskEntry }
  | { found: false; name: string; available: string[] };

export class TaskRegistry {
  private readonly tasks = new Map<string, TaskEntry>();

  register(name: string, handler: TaskHandler, options: RegisterOptions = {}): this {
    this.tasks.set(name, {
      name,
      handler,
      rawInputs: options.rawInputs ?? [],
      ...(options.description ? { description: options.description } : {})
    });
    return this;
  }

  lookup(name: string): TaskLookup {
    const entry = this.tasks.get(name);
    if (entry) return { found: true, entry };
    return { found: false, name, available: this.names() };
  }

  has(name: string): boolean {
    return this.tasks.has(name);
  }

  names(): string[] {
    return [...this.tasks.keys()].sort();
  }
}

export type TaskConfigInit = {
  name: string;
  taskType: string;
  inputs: Record<string, unknown>;
  step: StepDefinition;
  context: RunContext;
  workspace: string;
  registry: TaskRegistry;
  logger: Logger;
  state?: ExecutionStateStore;
};

/** Everything a handler sees of the step it runs for. */
export class TaskConfig {
  readonly name: string;
  readonly taskType: string;
  readonly inputs: Record<string, unknown>;
  readonly step: StepDefinition;
  readonly context: RunContext;
  readonly workspace: string;
  readonly registry: TaskRegistry;
  readonly logger: Logger;
  /** Absent inside batch items, which never touch persisted state. */
  readonly state?: ExecutionStateStore;

  constructor(init: TaskConfigInit) {
    this.name = init.name;
    this.taskType = init.taskType;
    this.inputs = init.inputs;
    this.step = init.step;
    this.context = init.context;
    this.workspace = init.workspace;
    this.registry = init.registry;
    this.logger = init.logger;
    this.state = init.state;
  }

  get scope(): TemplateScope {
    return toTemplateScope(this.context);
  }

  getVariable(name: string, namespace?: string): unknown {
    if (namespace === undefined) return this.context.extra[name];
    const ns = namespaceOf(this.context, namespace);
    return ns && Object.hasOwn(ns, name) ? ns[name] : undefined;
  }

  availableVariables(): Record<string, string[]> {
    const out: Record<string, string[]> = { root: Object.keys(this.context.extra) };
    for (const namespace of NAMESPACES) {
      const ns = namespaceOf(this.context, namespace);
      if (ns) out[namespace] = Object.keys(ns);
    }
    return out;
  }

  /** Resolve a path against the run workspace. */
  path(filePath: string): string {
    return resolvePath(this.workspace, filePath);
  }
}

function namespaceOf(ctx: RunContext, namespace: string): Record<string, unknown> | undefined {
  switch (namespace) {
    case 'args':
      return ctx.args;
    case 'env':
      return ctx.env;
    case 'steps':
      return ctx.steps;
    case 'batch':
      return ctx.batch ? { ...ctx.batch } : undefined;
    case 'error':
      return ctx.error ? { ...ctx.error } : undefined;
    default:
      return undefined;
  }
}

/** Render every input except the raw keys. */
export function prepareInputs(
  inputs: Record<string, unknown>,
  rawInputs: readonly string[],
  scope: TemplateScope
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(inputs)) {
    out[key] = rawInputs.includes(key) ? value : renderTemplate(value, scope);
  }
  return out;
}
