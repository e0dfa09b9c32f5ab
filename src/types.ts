export type ParamDefinition = {
  type?: string;
  description?: string;
  default?: unknown;
  required?: boolean;
  minLength?: number;
};

export type ErrorAction = 'fail' | 'continue';

export type OnErrorPolicy = {
  action?: ErrorAction;
  retry?: number;
  delay?: number; // seconds
  next?: string;
  message?: string; // template
};

export type StepOutputs = string | string[] | Record<string, string>;

export type StepDefinition = {
  name?: string;
  task?: string;
  description?: string;
  inputs?: Record<string, unknown>;
  condition?: string; // template, "true" runs the step
  outputs?: StepOutputs;
  on_error?: OnErrorPolicy;
};

export type FlowsSection = {
  default?: string;
  definitions: Array<Record<string, string[]>>;
};

export type WorkflowDefinition = {
  name?: string;
  description?: string;
  params?: Record<string, ParamDefinition | string | number | boolean | null>;
  steps: StepDefinition[];
  flows?: FlowsSection;
};

export type StepOutput = Record<string, unknown>;

export type BatchScope = {
  item: unknown;
  index: number;
  total: number;
  chunk_index: number;
  chunk_size: number;
};

export type StepErrorInfo = {
  step: string;
  error: string;
  message: string;
  raw_error: string;
};

export type RunContext = {
  args: Record<string, unknown>;
  env: Record<string, string>;
  steps: Record<string, StepOutput>;
  extra: Record<string, unknown>;
  batch?: BatchScope;
  error?: StepErrorInfo;
};

export type ExecutionStatus = 'not_started' | 'in_progress' | 'completed' | 'failed';

export type FailedStep = {
  step_name: string;
  error: string;
  failed_at: string;
};

export type RetryState = {
  attempt: number;
};

export type ExecutionState = {
  current_step: number;
  completed_steps: string[];
  failed_step: FailedStep | null;
  step_outputs: Record<string, StepOutput>;
  status: ExecutionStatus;
  flow: string | null;
  retry_state: Record<string, RetryState>;
  error_flow_target: string | null;
  last_updated: string;
  completed_at: string | null;
};

export type RunOptions = {
  params?: Record<string, unknown>;
  resumeFrom?: string;
  startFrom?: string;
  skipSteps?: string[];
  flow?: string;
  maxRetries?: number;
};

export type RunResult = {
  // always 'completed' when run() returns; execution_state.status is authoritative
  status: 'completed';
  outputs: Record<string, StepOutput>;
  execution_state: ExecutionState;
};

export type StepOutcome =
  | { kind: 'success'; output: StepOutput }
  | { kind: 'skipped'; reason: string }
  | { kind: 'retry'; attempt: number; error: Error }
  | { kind: 'jump'; target: string; error: Error }
  | { kind: 'continue'; error: Error }
  | { kind: 'halt'; error: Error };
