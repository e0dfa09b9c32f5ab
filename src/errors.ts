export class WorkflowError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class WorkflowDefinitionError extends WorkflowError {}

export class InvalidFlowDefinitionError extends WorkflowDefinitionError {
  constructor(readonly flowName: string, readonly reason: string) {
    super(`Invalid flow definition '${flowName}': ${reason}`);
  }
}

export class FlowNotFoundError extends WorkflowDefinitionError {
  constructor(readonly flowName: string) {
    super(`Flow '${flowName}' not found`);
  }
}

export class StepNotInFlowError extends WorkflowDefinitionError {
  constructor(readonly stepName: string, readonly flowName: string) {
    super(`Step '${stepName}' referenced in flow '${flowName}' is not defined`);
  }
}

export class ParameterValidationError extends WorkflowError {
  constructor(readonly param: string, message: string) {
    super(message);
  }
}

/** Step cannot be prepared for dispatch: missing name or task, or unknown task type. */
export class StepConfigurationError extends WorkflowError {
  constructor(readonly stepName: string, message: string) {
    super(message);
  }
}

export class TaskExecutionError extends WorkflowError {
  constructor(readonly stepName: string, cause: unknown) {
    super(`Task '${stepName}' failed: ${errorMessage(cause)}`, { cause });
  }

  /** Message of the innermost non-wrapper error. */
  get rootMessage(): string {
    let current: unknown = this.cause;
    while (current instanceof TaskExecutionError) current = current.cause;
    return errorMessage(current);
  }
}

export class TemplateError extends WorkflowError {}

export class UndefinedVariableError extends TemplateError {
  constructor(
    readonly variable: string,
    readonly namespace: string,
    readonly available: string[]
  ) {
    super(
      `Variable '${variable}' is undefined.` +
      (available.length ? ` Available variables in '${namespace}' namespace: ${available.join(', ')}` : '')
    );
  }
}

export class StateStoreError extends WorkflowError {
  constructor(readonly path: string, cause: unknown) {
    super(`State store failure at ${path}: ${errorMessage(cause)}`, { cause });
  }
}

export class BatchValidationError extends WorkflowError {}

export class ConfigError extends WorkflowError {}

/** Terminal error raised by a run when a step failure is not absorbed by its error policy. */
export class WorkflowHaltedError extends WorkflowError {
  constructor(readonly stepName: string, readonly failureMessage: string, cause?: unknown) {
    super(`Error in step '${stepName}': ${failureMessage}`, { cause });
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function describeError(error: unknown): string {
  const parts: string[] = [];
  let current: unknown = error;
  const seen = new Set<unknown>();
  while (current !== undefined && !seen.has(current)) {
    seen.add(current);
    parts.push(current instanceof Error ? `${current.name}: ${current.message}` : String(current));
    current = current instanceof Error ? current.cause : undefined;
  }
  return parts.join(' <- ');
}
