import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { StateStoreError } from './errors.js';
import type { ExecutionState, StepOutput } from './types.js';

export const METADATA_FILE = '.workflow_metadata.json';

const now = () => new Date().toISOString();

const ExecutionStateSchema = z.object({
  current_step: z.number().int().min(0).default(0),
  completed_steps: z.array(z.string()).default([]),
  failed_step: z
    .object({ step_name: z.string(), error: z.string(), failed_at: z.string() })
    .nullable()
    .default(null),
  step_outputs: z.record(z.record(z.unknown())).default({}),
  status: z.enum(['not_started', 'in_progress', 'completed', 'failed']).default('not_started'),
  flow: z.string().nullable().default(null),
  retry_state: z.record(z.object({ attempt: z.number().int().min(0) })).default({}),
  error_flow_target: z.string().nullable().default(null),
  last_updated: z.string().default(now),
  completed_at: z.string().nullable().default(null)
});

// workspace bookkeeping (run_number, workflow_name, ...) lives beside execution_state and is kept as-is
const MetadataSchema = z
  .object({
    execution_state: ExecutionStateSchema.default({}),
    namespaces: z.record(z.record(z.unknown())).default({})
  })
  .passthrough();

type MetadataDocument = z.infer<typeof MetadataSchema>;

export function emptyExecutionState(): ExecutionState {
  return ExecutionStateSchema.parse({});
}

/**
 * Durable run progress for one workspace. Every mutator writes the metadata file before it
 * returns; an I/O failure surfaces as {@link StateStoreError}.
 */
export class ExecutionStateStore {
  readonly file: string;
  private doc: MetadataDocument;

  constructor(readonly workspace: string) {
    this.file = path.join(workspace, METADATA_FILE);
    this.doc = this.load();
  }

  private load(): MetadataDocument {
    let raw: unknown = {};
    if (fs.existsSync(this.file)) {
      try {
        raw = JSON.parse(fs.readFileSync(this.file, 'utf8'));
      } catch (e) {
        throw new StateStoreError(this.file, e);
      }
    }
    const parsed = MetadataSchema.safeParse(raw);
    if (!parsed.success) {
      throw new StateStoreError(this.file, new Error(parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')));
    }
    return parsed.data;
  }

  private get state(): ExecutionState {
    return this.doc.execution_state;
  }

  save(): void {
    this.state.last_updated = now();
    const tmp = `${this.file}.${process.pid}.tmp`;
    try {
      fs.mkdirSync(this.workspace, { recursive: true });
      fs.writeFileSync(tmp, JSON.stringify(this.doc, null, 2));
      fs.renameSync(tmp, this.file);
    } catch (e) {
      throw new StateStoreError(this.file, e);
    }
  }

  /** Deep copy of the execution state. */
  snapshot(): ExecutionState {
    return structuredClone(this.state);
  }

  get status(): ExecutionState['status'] {
    return this.state.status;
  }

  get failedStep(): ExecutionState['failed_step'] {
    return this.state.failed_step ? { ...this.state.failed_step } : null;
  }

  isCompleted(stepName: string): boolean {
    return this.state.completed_steps.includes(stepName);
  }

  markStepSuccess(stepName: string, output: StepOutput): void {
    const state = this.state;
    if (!state.completed_steps.includes(stepName)) {
      state.completed_steps.push(stepName);
      state.current_step += 1;
    }
    state.step_outputs[stepName] = output;
    state.status = 'in_progress';
    delete state.retry_state[stepName];
    if (state.failed_step?.step_name === stepName) state.failed_step = null;
    this.save();
  }

  markStepFailed(stepName: string, error: string): void {
    const state = this.state;
    delete state.retry_state[stepName];
    state.completed_steps = state.completed_steps.filter(name => name !== stepName);
    state.failed_step = { step_name: stepName, error, failed_at: now() };
    state.status = 'failed';
    this.save();
  }

  markWorkflowCompleted(): void {
    this.state.status = 'completed';
    this.state.completed_at = now();
    this.save();
  }

  getStepRetryCount(stepName: string): number {
    return this.state.retry_state[stepName]?.attempt ?? 0;
  }

  incrementStepRetry(stepName: string): number {
    const attempt = this.getStepRetryCount(stepName) + 1;
    this.state.retry_state[stepName] = { attempt };
    this.save();
    return attempt;
  }

  resetStepRetries(stepName: string): void {
    if (!Object.hasOwn(this.state.retry_state, stepName)) return;
    delete this.state.retry_state[stepName];
    this.save();
  }

  setErrorFlowTarget(stepName: string): void {
    this.state.error_flow_target = stepName;
    this.save();
  }

  getErrorFlowTarget(): string | null {
    return this.state.error_flow_target;
  }

  clearErrorFlowTarget(): void {
    if (this.state.error_flow_target === null) return;
    this.state.error_flow_target = null;
    this.save();
  }

  setFlow(flow: string | null): void {
    this.state.flow = flow;
    this.save();
  }

  getFlow(): string | null {
    return this.state.flow;
  }

  /** A failed run can resume from its failed step once no retry is pending for it. */
  canResumeFromStep(stepName: string): boolean {
    const state = this.state;
    if (state.status !== 'failed' || !state.failed_step) return false;
    if (state.failed_step.step_name !== stepName) return false;
    return !Object.hasOwn(state.retry_state, stepName);
  }

  getCompletedOutputs(): Record<string, StepOutput> {
    return structuredClone(this.state.step_outputs);
  }

  resetState(): void {
    this.doc.execution_state = emptyExecutionState();
    this.save();
  }

  updateNamespace(namespace: string, data: Record<string, unknown>): void {
    this.doc.namespaces[namespace] = { ...(this.doc.namespaces[namespace] ?? {}), ...data };
    this.save();
  }

  getNamespace(namespace: string): Record<string, unknown> {
    return { ...(this.doc.namespaces[namespace] ?? {}) };
  }

  /** Workspace-level metadata outside the execution state. */
  getMetadata(key: string): unknown {
    return this.doc[key];
  }
}

/** Persisted state of a workspace, or undefined when it holds no metadata file. */
export function readExecutionState(workspace: string): ExecutionState | undefined {
  if (!fs.existsSync(path.join(workspace, METADATA_FILE))) return undefined;
  return new ExecutionStateStore(workspace).snapshot();
}
