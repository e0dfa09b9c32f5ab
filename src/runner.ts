import path from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import type { LevelWithSilent } from 'pino';
import { createContext, normalizeStepOutput, toTemplateScope } from './context.js';
import {
  ParameterValidationError,
  StateStoreError,
  StepConfigurationError,
  TaskExecutionError,
  WorkflowDefinitionError,
  WorkflowError,
  WorkflowHaltedError,
  errorMessage
} from './errors.js';
import { findFlowContaining, resolveFlowSteps, selectFlowName } from './flows.js';
import { createLogger, logFilePath, type Logger } from './logger.js';
import { TaskConfig, prepareInputs, type TaskRegistry } from './registry.js';
import { ExecutionStateStore } from './state.js';
import { createDefaultRegistry } from './steps/index.js';
import type {
  ParamDefinition,
  RunContext,
  RunOptions,
  RunResult,
  StepDefinition,
  StepOutcome,
  StepOutput,
  WorkflowDefinition
} from './types.js';
import { renderString } from './utils/expression.js';
import { loadWorkflowFile, parseWorkflow } from './workflow.js';
import { createWorkspace, sanitizeName } from './workspace.js';

export const PARAMETER_VALIDATION_STEP = 'parameter_validation';
export const DEFAULT_MAX_RETRIES = 3;
export const MAX_ERROR_JUMPS = 100;

export type RunnerOptions = {
  registry?: TaskRegistry;
  /** Defaults to a pino logger writing to stdout and to the run's log file. */
  logger?: Logger;
  logLevel?: LevelWithSilent;
  workspace?: string;
  baseDir?: string;
  env?: Record<string, string | undefined>;
  /** Called before each step's handler; a throw fails the step and halts the run. */
  onStepStart?: (stepName: string) => void | Promise<void>;
};

type LoopOptions = {
  skip: Set<string>;
  maxRetries: number;
  resuming: boolean;
};

function isParamObject(param: unknown): param is ParamDefinition {
  return typeof param === 'object' && param !== null && !Array.isArray(param);
}

function stringEnv(env: Record<string, string | undefined>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined) out[key] = value;
  }
  return out;
}

export class WorkflowRunner {
  readonly workflow: WorkflowDefinition;
  readonly name: string;
  readonly workspace: string;
  readonly runNumber: number;
  readonly state: ExecutionStateStore;
  readonly registry: TaskRegistry;
  readonly logger: Logger;
  readonly context: RunContext;
  private readonly onStepStart?: (stepName: string) => void | Promise<void>;
  private jumps = 0;

  constructor(workflow: WorkflowDefinition | string, options: RunnerOptions = {}) {
    const workflowFile = typeof workflow === 'string' ? path.resolve(workflow) : undefined;
    this.workflow = typeof workflow === 'string' ? loadWorkflowFile(workflow) : parseWorkflow(workflow);
    this.name = this.workflow.name ?? 'workflow';

    const workspace = createWorkspace(this.name, { workspace: options.workspace, baseDir: options.baseDir });
    this.workspace = workspace.path;
    this.runNumber = workspace.runNumber;
    this.logger = options.logger ?? createLogger({
      level: options.logLevel,
      name: this.name,
      file: logFilePath(this.workspace, sanitizeName(this.name))
    });
    this.state = new ExecutionStateStore(this.workspace);
    this.registry = options.registry ?? createDefaultRegistry();
    this.onStepStart = options.onStepStart;

    this.context = createContext({
      env: stringEnv(options.env ?? process.env),
      extra: {
        workflow_name: this.name,
        workspace: this.workspace,
        run_number: this.runNumber,
        timestamp: new Date().toISOString(),
        ...(workflowFile ? { workflow_file: workflowFile } : {})
      }
    });
    for (const [name, param] of Object.entries(this.workflow.params ?? {})) {
      const value = isParamObject(param) ? param.default ?? null : param;
      this.context.args[name] = value;
      if (!isParamObject(param) || param.default !== undefined) this.context.extra[name] = value;
    }
    this.context.steps = this.state.getCompletedOutputs();

    this.logger.info({ workspace: this.workspace, runNumber: this.runNumber }, `Initialized workflow: ${this.name}`);
  }

  async run(options: RunOptions = {}): Promise<RunResult> {
    const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.jumps = 0;

    if (options.params) {
      for (const [name, value] of Object.entries(options.params)) {
        this.context.args[name] = value;
        this.context.extra[name] = value;
      }
      this.logger.info({ params: options.params }, 'Parameters provided');
    }

    let resumeFrom = options.resumeFrom;
    if (resumeFrom && this.state.failedStep?.step_name === PARAMETER_VALIDATION_STEP) {
      this.logger.info('Previous run failed parameter validation; starting a fresh run');
      resumeFrom = undefined;
    }

    this.validateParams();

    let flowName: string;
    if (resumeFrom) {
      const saved = this.state.getFlow();
      if (saved && options.flow && saved !== options.flow) {
        throw new WorkflowDefinitionError(
          `Cannot resume with different flow. Previous flow was '${saved}', requested flow is '${options.flow}'`
        );
      }
      flowName = saved ?? selectFlowName(this.workflow, options.flow);
    } else {
      flowName = selectFlowName(this.workflow, options.flow);
    }
    const steps = resolveFlowSteps(this.workflow, flowName);
    if (steps.length === 0) throw new WorkflowDefinitionError('No steps to execute');

    let startIndex = 0;
    if (resumeFrom) {
      if (this.state.status !== 'failed' || !this.state.failedStep) {
        throw new WorkflowError('Cannot resume: workflow is not in failed state');
      }
      const target = resumeFrom;
      startIndex = steps.findIndex(step => step.name === target);
      if (startIndex < 0) throw new WorkflowError(`Cannot resume: step '${target}' not found in workflow`);
      this.context.steps = { ...this.context.steps, ...this.state.getCompletedOutputs() };
      this.logger.info(`Resuming workflow from failed step: ${target}`);
    } else {
      this.state.resetState();
      this.state.setFlow(flowName);
      this.context.steps = {};
      if (options.startFrom) {
        const target = options.startFrom;
        startIndex = steps.findIndex(step => step.name === target);
        if (startIndex < 0) throw new WorkflowError(`Cannot start: step '${target}' not found in workflow`);
      }
    }
    this.logger.info({ flow: flowName, steps: steps.length }, `Using flow: ${flowName}`);

    await this.executeSequence(steps, startIndex, {
      skip: new Set(options.skipSteps ?? []),
      maxRetries,
      resuming: Boolean(resumeFrom)
    });

    // Halts throw out of executeSequence, so reaching here means the run finished.
    this.state.markWorkflowCompleted();
    const executionState = this.state.snapshot();
    this.logger.info({ status: executionState.status }, 'Workflow finished');
    return { status: 'completed', outputs: { ...this.context.steps }, execution_state: executionState };
  }

  private validateParams(): void {
    for (const [name, param] of Object.entries(this.workflow.params ?? {})) {
      if (!isParamObject(param)) continue;
      const value = this.context.args[name];
      const missing = value === undefined || value === null;
      if (param.required && missing) {
        this.failParameter(name, `Required parameter '${name}' is undefined`);
      }
      if (param.minLength !== undefined && !missing && String(value).length < param.minLength) {
        this.failParameter(name, `Parameter '${name}' must be at least ${param.minLength} characters long`);
      }
    }
  }

  private failParameter(name: string, message: string): never {
    this.state.markStepFailed(PARAMETER_VALIDATION_STEP, message);
    throw new ParameterValidationError(name, message);
  }

  private async executeSequence(steps: StepDefinition[], startIndex: number, options: LoopOptions): Promise<void> {
    let sequence = steps;
    let index = startIndex;
    while (index < sequence.length) {
      const step = sequence[index];
      if (step.name !== undefined && options.skip.has(step.name)) {
        this.logger.info(`Skipping step: ${step.name} (explicitly skipped)`);
        index += 1;
        continue;
      }
      if (options.resuming && step.name !== undefined && this.state.isCompleted(step.name)) {
        this.logger.info(`Skipping completed step: ${step.name}`);
        index += 1;
        continue;
      }

      const outcome = await this.executeStep(step, options.maxRetries);
      switch (outcome.kind) {
        case 'success':
        case 'skipped':
        case 'continue':
          index += 1;
          break;
        case 'retry':
          break;
        case 'jump': {
          const stepName = this.stepName(step);
          this.jumps += 1;
          if (this.jumps > MAX_ERROR_JUMPS) {
            const message = `Exceeded ${MAX_ERROR_JUMPS} error-flow jumps`;
            this.state.markStepFailed(stepName, message);
            throw new WorkflowHaltedError(stepName, message, outcome.error);
          }
          const target = this.state.getErrorFlowTarget() ?? outcome.target;
          const next = this.jumpSequence(sequence, target);
          this.state.clearErrorFlowTarget();
          this.logger.info({ from: stepName, to: target }, 'Following error flow');
          sequence = next.steps;
          index = next.index;
          break;
        }
        case 'halt':
          throw outcome.error;
      }
    }
  }

  /** Where execution continues after an error-flow jump to `target`. */
  private jumpSequence(sequence: StepDefinition[], target: string): { steps: StepDefinition[]; index: number } {
    const inSequence = sequence.findIndex(step => step.name === target);
    if (inSequence >= 0) return { steps: sequence, index: inSequence };

    const flow = findFlowContaining(this.workflow, target);
    if (flow) {
      return { steps: flow.steps.slice(flow.steps.findIndex(step => step.name === target)), index: 0 };
    }
    const position = this.workflow.steps.findIndex(step => step.name === target);
    if (position < 0) throw new WorkflowDefinitionError(`Error-flow target '${target}' is not a defined step`);
    return { steps: this.workflow.steps.slice(position), index: 0 };
  }

  private stepName(step: StepDefinition): string {
    return step.name ?? `step_${this.workflow.steps.indexOf(step) + 1}`;
  }

  async executeStep(step: StepDefinition, maxRetries = DEFAULT_MAX_RETRIES): Promise<StepOutcome> {
    const name = this.stepName(step);
    const log = this.logger.child({ step: name });

    if (step.name === undefined) {
      return this.configurationFailure(name, `Step at position ${name.slice('step_'.length)} is missing a name`);
    }

    if (step.condition !== undefined) {
      let rendered: string;
      try {
        rendered = renderString(step.condition, toTemplateScope(this.context));
      } catch (e) {
        log.info({ err: e }, `Skipping step ${name}: condition could not be evaluated`);
        return { kind: 'skipped', reason: `condition error: ${errorMessage(e)}` };
      }
      if (rendered.trim().toLowerCase() !== 'true') {
        log.info(`Skipping step ${name}: condition not met`);
        return { kind: 'skipped', reason: 'condition not met' };
      }
    }

    if (!step.task) {
      return this.configurationFailure(name, `No task type specified for step: ${name}`);
    }
    const lookup = this.registry.lookup(step.task);
    if (!lookup.found) {
      return this.configurationFailure(
        name,
        `Unknown task type: '${lookup.name}'. Available tasks: ${lookup.available.join(', ')}`
      );
    }
    const entry = lookup.entry;

    if (this.onStepStart) {
      try {
        await this.onStepStart(name);
      } catch (e) {
        const message = errorMessage(e);
        this.state.markStepFailed(name, message);
        return { kind: 'halt', error: new WorkflowHaltedError(name, message, e) };
      }
    }

    log.info(`Running step: ${name}`);
    let output: StepOutput;
    try {
      const inputs = prepareInputs(step.inputs ?? {}, entry.rawInputs, toTemplateScope(this.context));
      const task = new TaskConfig({
        name,
        taskType: step.task,
        inputs,
        step,
        context: this.context,
        workspace: this.workspace,
        registry: this.registry,
        logger: log,
        state: this.state
      });
      const result: unknown = await entry.handler(task);
      output = normalizeStepOutput(result);
    } catch (e) {
      if (e instanceof StateStoreError) throw e;
      return this.handleFailure(step, name, new TaskExecutionError(name, e), maxRetries);
    }

    this.context.steps[name] = output;
    this.applyOutputs(step, name, output);
    this.state.markStepSuccess(name, output);
    log.info(`Step '${name}' completed`);
    return { kind: 'success', output };
  }

  private configurationFailure(name: string, message: string): StepOutcome {
    const error = new StepConfigurationError(name, message);
    this.state.markStepFailed(name, message);
    return { kind: 'halt', error: new WorkflowHaltedError(name, message, error) };
  }

  private async handleFailure(
    step: StepDefinition,
    name: string,
    error: TaskExecutionError,
    maxRetries: number
  ): Promise<StepOutcome> {
    const log = this.logger.child({ step: name });
    const policy = step.on_error ?? {};
    const retryLimit = policy.retry ?? maxRetries;

    if (this.state.getStepRetryCount(name) < retryLimit) {
      const attempt = this.state.incrementStepRetry(name);
      const delay = policy.delay ?? 0;
      log.warn({ attempt, retryLimit, delay, err: error }, `Step '${name}' failed, retrying`);
      if (delay > 0) await sleep(delay * 1000);
      return { kind: 'retry', attempt, error };
    }

    const rawError = error.rootMessage;
    this.context.error = { step: name, error: rawError, message: error.message, raw_error: error.message };
    let failureMessage = error.message;
    if (policy.message !== undefined) {
      try {
        failureMessage = renderString(policy.message, toTemplateScope(this.context));
      } catch (e) {
        log.warn({ err: e }, 'Failed to render on_error.message; using the raw error');
      }
      this.context.error.message = failureMessage;
    }

    if (policy.action === 'continue') {
      this.state.markStepFailed(name, failureMessage);
      this.state.clearErrorFlowTarget();
      log.warn({ err: error }, `Step '${name}' failed; continuing`);
      return { kind: 'continue', error };
    }
    if (policy.next !== undefined) {
      this.state.setErrorFlowTarget(policy.next);
      this.state.resetStepRetries(name);
      log.warn({ err: error, next: policy.next }, `Step '${name}' failed; jumping to '${policy.next}'`);
      return { kind: 'jump', target: policy.next, error };
    }

    this.state.markStepFailed(name, failureMessage);
    log.error({ err: error }, `Step '${name}' failed`);
    return { kind: 'halt', error: new WorkflowHaltedError(name, failureMessage, error) };
  }

  private applyOutputs(step: StepDefinition, name: string, output: StepOutput): void {
    const outputs = step.outputs;
    if (outputs === undefined) return;
    const primary = Object.hasOwn(output, 'result') ? output.result : output;

    if (typeof outputs === 'string') {
      this.context.extra[outputs] = primary;
      return;
    }
    if (Array.isArray(outputs)) {
      if (outputs.length === 1) {
        this.context.extra[outputs[0]] = primary;
      } else if (Array.isArray(primary)) {
        outputs.forEach((key, i) => { this.context.extra[key] = primary[i]; });
      } else {
        this.logger.warn({ step: name, outputs }, 'Several outputs named but the result is not a list');
      }
      return;
    }
    for (const [contextKey, resultKey] of Object.entries(outputs)) {
      if (Object.hasOwn(output, resultKey)) {
        this.context.extra[contextKey] = output[resultKey];
      } else {
        this.logger.warn({ step: name, key: resultKey }, `Output key '${resultKey}' missing from step result`);
      }
    }
  }
}
