export * from './errors.js';
export * from './types.js';
export { loadConfig, type EngineConfig } from './config.js';
export { createContext, normalizeStepOutput, toTemplateScope } from './context.js';
export { ALL_FLOW, findFlowContaining, listFlows, resolveFlowSteps, selectFlowName, validateFlows } from './flows.js';
export { createLogger, type Logger } from './logger.js';
export { coerceParam, parseParams } from './params.js';
export {
  TaskConfig,
  TaskRegistry,
  prepareInputs,
  type RegisterOptions,
  type TaskEntry,
  type TaskHandler,
  type TaskLookup
} from './registry.js';
export { DEFAULT_MAX_RETRIES, MAX_ERROR_JUMPS, PARAMETER_VALIDATION_STEP, WorkflowRunner, type RunnerOptions } from './runner.js';
export { ExecutionStateStore, METADATA_FILE, emptyExecutionState, readExecutionState } from './state.js';
export {
  BatchProcessor,
  type BatchItemOutcome,
  type BatchResult,
  type BatchRunOptions,
  type BatchStats,
  type ChunkProgress,
  type PoolScope,
  type SubTaskConfig
} from './steps/batch.js';
export { createDefaultRegistry, registerBuiltinSteps, type DefaultRegistryOptions } from './steps/index.js';
export { renderString, renderTemplate, renderValue, type TemplateScope } from './utils/expression.js';
export { loadWorkflowFile, parseWorkflow } from './workflow.js';
export { createWorkspace, resolvePath, sanitizeName } from './workspace.js';
