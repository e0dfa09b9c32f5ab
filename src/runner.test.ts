import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { pino } from 'pino';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { ParameterValidationError, WorkflowHaltedError } from './errors.js';
import type { TaskRegistry } from './registry.js';
import { MAX_ERROR_JUMPS, PARAMETER_VALIDATION_STEP, WorkflowRunner, type RunnerOptions } from './runner.js';
import { createDefaultRegistry } from './steps/index.js';
import type { WorkflowDefinition } from './types.js';

const logger = pino({ level: 'silent' });

describe('WorkflowRunner', () => {
  let dir: string;
  let registry: TaskRegistry;
  let calls: Record<string, number>;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'stepwise-runner-'));
    calls = {};
    registry = createDefaultRegistry()
      .register('count', task => {
        calls[task.name] = (calls[task.name] ?? 0) + 1;
        return calls[task.name];
      })
      .register('flaky', task => {
        calls[task.name] = (calls[task.name] ?? 0) + 1;
        const failures = Number(task.inputs.failures ?? 0);
        if (calls[task.name] <= failures) throw new Error(`attempt ${calls[task.name]} failed`);
        return 'recovered';
      })
      .register('pair', () => ['left', 'right']);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function runner(workflow: WorkflowDefinition, options: RunnerOptions = {}) {
    return new WorkflowRunner(workflow, { registry, logger, workspace: dir, env: {}, ...options });
  }

  describe('sequencing', () => {
    test('should run steps in order and expose outputs to later steps', async () => {
      const result = await runner({
        name: 'chain',
        steps: [
          { name: 'A', task: 'echo', inputs: { message: 'hello' } },
          { name: 'B', task: 'echo', inputs: { message: '{{ steps.A.result }} world' } }
        ]
      }).run();
      expect(result.status).toBe('completed');
      expect(result.outputs).toEqual({ A: { result: 'hello' }, B: { result: 'hello world' } });
      expect(result.execution_state.status).toBe('completed');
      expect(result.execution_state.completed_steps).toEqual(['A', 'B']);
    });

    test('should halt on a failing step and record it', async () => {
      const wf = runner({
        name: 'halts',
        steps: [
          { name: 'A', task: 'echo', inputs: { message: 'ok' } },
          { name: 'B', task: 'fail', inputs: { message: 'boom' } },
          { name: 'C', task: 'count' }
        ]
      });
      await expect(wf.run({ maxRetries: 0 })).rejects.toThrow("Error in step 'B': Task 'B' failed: boom");
      const state = wf.state.snapshot();
      expect(state.status).toBe('failed');
      expect(state.failed_step?.step_name).toBe('B');
      expect(state.completed_steps).toEqual(['A']);
      expect(calls.C).toBeUndefined();
    });

    test('should expose env and params to templates', async () => {
      const result = await runner(
        {
          name: 'vars',
          params: { region: { default: 'us' } },
          steps: [{ name: 'A', task: 'echo', inputs: { message: '{{ env.STAGE }}-{{ args.region }}-{{ region }}' } }]
        },
        { env: { STAGE: 'dev' } }
      ).run();
      expect(result.outputs.A).toEqual({ result: 'dev-us-us' });
    });

    test('should override defaults with run params', async () => {
      const result = await runner({
        name: 'vars',
        params: { region: { default: 'us' } },
        steps: [{ name: 'A', task: 'echo', inputs: { message: '{{ args.region }}' } }]
      }).run({ params: { region: 'eu' } });
      expect(result.outputs.A).toEqual({ result: 'eu' });
    });
  });

  describe('conditions', () => {
    test('should skip steps whose condition is not true', async () => {
      const result = await runner({
        name: 'conditional',
        params: { enabled: { default: false } },
        steps: [
          { name: 'A', task: 'count', condition: '{{ args.enabled }}' },
          { name: 'B', task: 'count', condition: 'false' },
          { name: 'C', task: 'count', condition: '{{ args.missing }}' },
          { name: 'D', task: 'count', condition: '{{ not args.enabled }}' }
        ]
      }).run();
      expect(Object.keys(result.outputs)).toEqual(['D']);
      expect(result.execution_state.completed_steps).toEqual(['D']);
    });
  });

  describe('outputs', () => {
    test('should mirror a named result into the root scope', async () => {
      const result = await runner({
        name: 'mirror',
        steps: [
          { name: 'A', task: 'echo', inputs: { message: 'hi' }, outputs: 'greeting' },
          { name: 'B', task: 'echo', inputs: { message: '{{ greeting }}!' } }
        ]
      }).run();
      expect(result.outputs.B).toEqual({ result: 'hi!' });
    });

    test('should zip list results and copy mapped keys', async () => {
      const wf = runner({
        name: 'mirror',
        steps: [
          { name: 'A', task: 'pair', outputs: ['first', 'second'] },
          { name: 'B', task: 'noop', outputs: { kind: 'task_type', absent: 'nope' } }
        ]
      });
      await wf.run();
      expect(wf.context.extra.first).toBe('left');
      expect(wf.context.extra.second).toBe('right');
      expect(wf.context.extra.kind).toBe('noop');
      expect(wf.context.extra).not.toHaveProperty('absent');
    });
  });

  describe('error handling', () => {
    test('should retry up to the limit and then fail', async () => {
      const wf = runner({
        name: 'retries',
        steps: [{ name: 'A', task: 'flaky', inputs: { failures: 10 }, on_error: { retry: 2 } }]
      });
      await expect(wf.run()).rejects.toThrow(WorkflowHaltedError);
      expect(calls.A).toBe(3);
      expect(wf.state.snapshot().retry_state).toEqual({});
    });

    test('should succeed when a retry recovers', async () => {
      const result = await runner({
        name: 'retries',
        steps: [{ name: 'A', task: 'flaky', inputs: { failures: 2 } }]
      }).run();
      expect(calls.A).toBe(3);
      expect(result.outputs.A).toEqual({ result: 'recovered' });
      expect(result.execution_state.retry_state).toEqual({});
    });

    test('should continue past a failure when asked', async () => {
      const wf = runner({
        name: 'continues',
        steps: [
          { name: 'A', task: 'fail', inputs: { message: 'boom' }, on_error: { action: 'continue' } },
          { name: 'B', task: 'echo', inputs: { message: '{{ error.step }}: {{ error.error }}' } }
        ]
      });
      const result = await wf.run({ maxRetries: 0 });
      expect(result.outputs).toEqual({ B: { result: 'A: boom' } });
      expect(result.execution_state.completed_steps).toEqual(['B']);
      expect(result.execution_state.failed_step?.step_name).toBe('A');
      expect(wf.context.error).toEqual({
        step: 'A',
        error: 'boom',
        message: "Task 'A' failed: boom",
        raw_error: "Task 'A' failed: boom"
      });
    });

    test('should wait between retries', async () => {
      const started = Date.now();
      const result = await runner({
        name: 'delayed',
        steps: [{ name: 'A', task: 'flaky', inputs: { failures: 1 }, on_error: { retry: 1, delay: 0.05 } }]
      }).run();
      expect(Date.now() - started).toBeGreaterThanOrEqual(45);
      expect(calls.A).toBe(2);
      expect(result.outputs.A).toEqual({ result: 'recovered' });
    });

    test('should complete when the last step fails with continue', async () => {
      const result = await runner({
        name: 'continues-last',
        steps: [
          { name: 'A', task: 'echo', inputs: { message: 'ok' } },
          { name: 'B', task: 'fail', on_error: { action: 'continue' } }
        ]
      }).run({ maxRetries: 0 });
      expect(result.execution_state.status).toBe('completed');
      expect(result.execution_state.failed_step?.step_name).toBe('B');
      expect(result.outputs).toEqual({ A: { result: 'ok' } });
    });

    test('should complete when only skipped steps follow a continued failure', async () => {
      const result = await runner({
        name: 'continues-skipped',
        steps: [
          { name: 'A', task: 'fail', on_error: { action: 'continue' } },
          { name: 'B', task: 'count', condition: 'false' }
        ]
      }).run({ maxRetries: 0 });
      expect(result.execution_state.status).toBe('completed');
      expect(calls.B).toBeUndefined();
    });

    test('should halt with a rendered custom message', async () => {
      const wf = runner({
        name: 'custom',
        steps: [{ name: 'A', task: 'fail', inputs: { message: 'boom' }, on_error: { message: 'A said {{ error.error }}' } }]
      });
      await expect(wf.run({ maxRetries: 0 })).rejects.toThrow("Error in step 'A': A said boom");
      expect(wf.state.failedStep?.error).toBe('A said boom');
    });

    test('should jump to the error-flow target and skip the steps between', async () => {
      const wf = runner({
        name: 'jumps',
        steps: [
          { name: 'A', task: 'fail', inputs: { message: 'boom' }, on_error: { next: 'cleanup', message: 'A broke: {{ error.error }}' } },
          { name: 'B', task: 'count' },
          { name: 'cleanup', task: 'echo', inputs: { message: '{{ error.message }}' } }
        ]
      });
      const target = vi.spyOn(wf.state, 'getErrorFlowTarget');
      const result = await wf.run({ maxRetries: 0 });
      expect(target).toHaveReturnedWith('cleanup');
      expect(result.outputs).toEqual({ cleanup: { result: 'A broke: boom' } });
      expect(calls.B).toBeUndefined();
      expect(result.execution_state.status).toBe('completed');
      expect(result.execution_state.error_flow_target).toBeNull();
    });

    test('should jump into the flow that holds the target', async () => {
      const result = await runner({
        name: 'flow-jumps',
        steps: [
          { name: 'A', task: 'fail', on_error: { next: 'cleanup' } },
          { name: 'B', task: 'count' },
          { name: 'cleanup', task: 'count' },
          { name: 'report', task: 'count' }
        ],
        flows: { default: 'main', definitions: [{ main: ['A', 'B'] }, { recovery: ['cleanup'] }] }
      }).run({ maxRetries: 0 });
      expect(Object.keys(result.outputs)).toEqual(['cleanup']);
    });

    test('should stop a run that keeps jumping', async () => {
      registry.register('always_fail', task => {
        calls[task.name] = (calls[task.name] ?? 0) + 1;
        throw new Error('again');
      });
      const wf = runner({
        name: 'loop',
        steps: [{ name: 'A', task: 'always_fail', on_error: { next: 'A' } }]
      });
      await expect(wf.run({ maxRetries: 0 })).rejects.toThrow(`Exceeded ${MAX_ERROR_JUMPS} error-flow jumps`);
      expect(calls.A).toBe(MAX_ERROR_JUMPS + 1);
    });

    test('should halt on unknown task types without retrying', async () => {
      const wf = runner({ name: 'unknown', steps: [{ name: 'A', task: 'ghost' }] });
      await expect(wf.run()).rejects.toThrow("Unknown task type: 'ghost'");
      expect(wf.state.failedStep?.step_name).toBe('A');
      expect(wf.state.snapshot().retry_state).toEqual({});
    });

    test('should name unnamed steps by position', async () => {
      const wf = runner({ name: 'unnamed', steps: [{ task: 'count' }] });
      await expect(wf.run()).rejects.toThrow('Step at position 1 is missing a name');
      expect(wf.state.failedStep?.step_name).toBe('step_1');
    });

    test('should halt when the step-start hook throws', async () => {
      const wf = runner(
        {
          name: 'hooked',
          steps: [
            { name: 'A', task: 'count' },
            { name: 'B', task: 'count' }
          ]
        },
        {
          onStepStart: name => {
            if (name === 'B') throw new Error('cancelled');
          }
        }
      );
      await expect(wf.run()).rejects.toThrow("Error in step 'B': cancelled");
      expect(calls).toEqual({ A: 1 });
      expect(wf.state.failedStep?.error).toBe('cancelled');
    });
  });

  describe('batch steps', () => {
    test('should fan a parameter list out and store the batch result', async () => {
      registry.register('divide', task => {
        const item = Number(task.inputs.item);
        if (item === 0) throw new Error('division by zero');
        return 10 / item;
      });
      const wf = runner({
        name: 'batched',
        params: { items: { default: [2, 0, 1] } },
        steps: [
          {
            name: 'process',
            task: 'batch',
            inputs: { items: '{{ args.items }}', chunk_size: 2, task: { task: 'divide' } }
          },
          { name: 'summary', task: 'echo', inputs: { message: '{{ steps.process.results | join(",") }}' } }
        ]
      });
      const result = await wf.run();
      expect(result.outputs.process).toMatchObject({
        processed: [2, 1],
        results: [5, 10],
        failed: [{ item: 0, error: "Task 'batch_item_1' failed: division by zero" }],
        stats: { total: 3, processed: 2, failed: 1, chunks: 2 }
      });
      expect(result.outputs.summary).toEqual({ result: '5,10' });
      expect(wf.state.getNamespace('batch').process).toMatchObject({ chunks: 2, processed: 2, failed: 1 });
    });
  });

  describe('resume', () => {
    const workflow: WorkflowDefinition = {
      name: 'resumable',
      steps: [
        { name: 'A', task: 'count' },
        { name: 'B', task: 'flaky', inputs: { failures: 1 } },
        { name: 'C', task: 'echo', inputs: { message: 'A ran {{ steps.A.result }} time' } }
      ]
    };

    test('should resume from the failed step and reuse earlier outputs', async () => {
      await expect(runner(workflow).run({ maxRetries: 0 })).rejects.toThrow(WorkflowHaltedError);
      const second = runner(workflow);
      const result = await second.run({ resumeFrom: 'B', maxRetries: 0 });
      expect(calls).toEqual({ A: 1, B: 2 });
      expect(result.outputs).toEqual({
        A: { result: 1 },
        B: { result: 'recovered' },
        C: { result: 'A ran 1 time' }
      });
      expect(result.execution_state.status).toBe('completed');
      expect(result.execution_state.failed_step).toBeNull();
    });

    test('should refuse to resume a run that did not fail', async () => {
      await expect(runner(workflow).run({ resumeFrom: 'B' })).rejects.toThrow(
        'Cannot resume: workflow is not in failed state'
      );
    });

    test('should refuse to resume with a different flow', async () => {
      const flowed: WorkflowDefinition = {
        ...workflow,
        flows: { default: 'main', definitions: [{ main: ['A', 'B', 'C'] }, { short: ['B', 'C'] }] }
      };
      await expect(runner(flowed).run({ maxRetries: 0 })).rejects.toThrow(WorkflowHaltedError);
      await expect(runner(flowed).run({ resumeFrom: 'B', flow: 'short' })).rejects.toThrow(
        "Cannot resume with different flow. Previous flow was 'main'"
      );
    });

    test('should start a fresh run without replaying saved outputs', async () => {
      await expect(runner(workflow).run({ maxRetries: 0 })).rejects.toThrow(WorkflowHaltedError);
      const result = await runner(workflow).run({ maxRetries: 0 });
      expect(calls).toEqual({ A: 2, B: 2 });
      expect(result.outputs.C).toEqual({ result: 'A ran 2 time' });
    });
  });

  describe('selection', () => {
    const workflow: WorkflowDefinition = {
      name: 'select',
      steps: [
        { name: 'A', task: 'count' },
        { name: 'B', task: 'count' },
        { name: 'C', task: 'count' }
      ],
      flows: { default: 'main', definitions: [{ main: ['A', 'C'] }, { full: ['A', 'B', 'C'] }] }
    };

    test('should run the default flow', async () => {
      const result = await runner(workflow).run();
      expect(Object.keys(result.outputs)).toEqual(['A', 'C']);
      expect(result.execution_state.flow).toBe('main');
    });

    test('should run a requested flow', async () => {
      const result = await runner(workflow).run({ flow: 'full' });
      expect(Object.keys(result.outputs)).toEqual(['A', 'B', 'C']);
    });

    test('should honour skip lists and start points', async () => {
      const skipped = await runner(workflow).run({ flow: 'full', skipSteps: ['B'] });
      expect(Object.keys(skipped.outputs)).toEqual(['A', 'C']);
      const started = await runner(workflow).run({ flow: 'full', startFrom: 'B' });
      expect(Object.keys(started.outputs)).toEqual(['B', 'C']);
      await expect(runner(workflow).run({ startFrom: 'ghost' })).rejects.toThrow(
        "Cannot start: step 'ghost' not found in workflow"
      );
    });
  });

  describe('parameters', () => {
    const workflow: WorkflowDefinition = {
      name: 'params',
      params: { region: { required: true, minLength: 2 } },
      steps: [{ name: 'A', task: 'echo', inputs: { message: '{{ args.region }}' } }]
    };

    test('should reject missing and short parameters', async () => {
      const wf = runner(workflow);
      await expect(wf.run()).rejects.toThrow(ParameterValidationError);
      expect(wf.state.failedStep?.step_name).toBe(PARAMETER_VALIDATION_STEP);
      expect(wf.state.failedStep?.error).toBe("Required parameter 'region' is undefined");
      await expect(runner(workflow).run({ params: { region: 'x' } })).rejects.toThrow(
        "Parameter 'region' must be at least 2 characters long"
      );
    });

    test('should turn a resume after failed validation into a fresh run', async () => {
      await expect(runner(workflow).run()).rejects.toThrow(ParameterValidationError);
      const result = await runner(workflow).run({ params: { region: 'eu' }, resumeFrom: PARAMETER_VALIDATION_STEP });
      expect(result.outputs.A).toEqual({ result: 'eu' });
      expect(result.execution_state.status).toBe('completed');
    });
  });
});
