import {
  FlowNotFoundError,
  InvalidFlowDefinitionError,
  StepNotInFlowError,
  WorkflowDefinitionError
} from './errors.js';
import type { FlowsSection, StepDefinition, WorkflowDefinition } from './types.js';

export const ALL_FLOW = 'all';

type FlowSource = {
  steps: StepDefinition[];
  flows?: unknown;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check the `flows` section of a freshly parsed document and return it typed.
 * Returns undefined when the workflow declares no flows.
 */
export function validateFlows(workflow: FlowSource): FlowsSection | undefined {
  const raw = workflow.flows;
  if (raw === undefined || raw === null) return undefined;
  if (!isRecord(raw)) {
    throw new WorkflowDefinitionError("'flows' must be a mapping");
  }
  if (!('definitions' in raw)) {
    throw new WorkflowDefinitionError("'flows' must contain a 'definitions' list");
  }
  const definitions = raw.definitions;
  if (!Array.isArray(definitions)) {
    throw new WorkflowDefinitionError("'flows.definitions' must be a list");
  }

  const stepNames = new Set(workflow.steps.map(s => s.name).filter((n): n is string => typeof n === 'string'));
  const seen = new Set<string>();
  const typed: Array<Record<string, string[]>> = [];

  for (const def of definitions) {
    if (!isRecord(def)) {
      throw new WorkflowDefinitionError('each flow definition must be a mapping of flow name to step list');
    }
    const entry: Record<string, string[]> = {};
    for (const [flowName, steps] of Object.entries(def)) {
      if (seen.has(flowName)) {
        throw new InvalidFlowDefinitionError(flowName, 'duplicate flow name');
      }
      seen.add(flowName);
      if (!Array.isArray(steps)) {
        throw new InvalidFlowDefinitionError(flowName, 'steps must be a list');
      }
      const names: string[] = [];
      for (const step of steps) {
        if (typeof step !== 'string') {
          throw new InvalidFlowDefinitionError(flowName, 'step references must be strings');
        }
        if (!stepNames.has(step)) throw new StepNotInFlowError(step, flowName);
        names.push(step);
      }
      entry[flowName] = names;
    }
    typed.push(entry);
  }

  const section: FlowsSection = { definitions: typed };
  if (raw.default !== undefined && raw.default !== null) {
    if (typeof raw.default !== 'string') {
      throw new WorkflowDefinitionError("'flows.default' must be a flow name");
    }
    if (raw.default !== ALL_FLOW && !seen.has(raw.default)) {
      throw new FlowNotFoundError(raw.default);
    }
    section.default = raw.default;
  }
  return section;
}

export function listFlows(workflow: WorkflowDefinition): string[] {
  if (!workflow.flows) return [];
  return workflow.flows.definitions.flatMap(def => Object.keys(def));
}

export function selectFlowName(workflow: WorkflowDefinition, requested?: string): string {
  return requested ?? workflow.flows?.default ?? ALL_FLOW;
}

function flowStepNames(flows: FlowsSection, flowName: string): string[] | undefined {
  for (const def of flows.definitions) {
    if (Object.hasOwn(def, flowName)) return def[flowName];
  }
  return undefined;
}

/** Ordered steps for a flow. Without a `flows` section every flow name means all steps. */
export function resolveFlowSteps(workflow: WorkflowDefinition, flowName?: string): StepDefinition[] {
  const flows = workflow.flows;
  const name = selectFlowName(workflow, flowName);
  if (!flows || name === ALL_FLOW) return [...workflow.steps];

  const names = flowStepNames(flows, name);
  if (!names) throw new FlowNotFoundError(name);

  const byName = new Map<string, StepDefinition>();
  for (const step of workflow.steps) {
    if (step.name !== undefined) byName.set(step.name, step);
  }
  return names.map(stepName => {
    const step = byName.get(stepName);
    if (!step) throw new StepNotInFlowError(stepName, name);
    return step;
  });
}

/** First flow (in declaration order) listing the step, with its steps. */
export function findFlowContaining(
  workflow: WorkflowDefinition,
  stepName: string
): { flow: string; steps: StepDefinition[] } | undefined {
  if (!workflow.flows) return undefined;
  for (const def of workflow.flows.definitions) {
    for (const [flow, names] of Object.entries(def)) {
      if (names.includes(stepName)) return { flow, steps: resolveFlowSteps(workflow, flow) };
    }
  }
  return undefined;
}
