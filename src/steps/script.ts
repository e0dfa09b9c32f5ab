import * as vm from 'node:vm';
import type { TaskConfig } from '../registry.js';
import { optionalNumber, requireString } from './inputs.js';

const DEFAULT_TIMEOUT_SECONDS = 30;

/**
 * `script` task: evaluates `inputs.code` as JavaScript in a fresh `node:vm` context holding
 * `args`, `env`, `steps`, `batch` and the step's other `inputs`. The result is a top-level `result`
 * variable when the script assigns one, otherwise the value of the last expression.
 *
 * node:vm is not a security boundary; only run workflows from trusted sources.
 */
export async function runScriptStep(task: TaskConfig): Promise<unknown> {
  const code = requireString(task, 'code');
  const timeout = (optionalNumber(task, 'timeout') ?? DEFAULT_TIMEOUT_SECONDS) * 1000;
  const inputs = Object.fromEntries(Object.entries(task.inputs).filter(([key]) => key !== 'code' && key !== 'timeout'));

  const log = task.logger;
  const format = (args: unknown[]) => args.map(arg => String(arg)).join(' ');
  const sandbox: Record<string, unknown> = {
    args: structuredClone(task.context.args),
    env: { ...task.context.env },
    steps: structuredClone(task.context.steps),
    batch: task.context.batch ? { ...task.context.batch } : undefined,
    inputs,
    console: {
      log: (...args: unknown[]) => log.info(format(args)),
      info: (...args: unknown[]) => log.info(format(args)),
      warn: (...args: unknown[]) => log.warn(format(args)),
      error: (...args: unknown[]) => log.error(format(args)),
      debug: (...args: unknown[]) => log.debug(format(args))
    }
  };

  const completion: unknown = vm.runInNewContext(code, sandbox, {
    timeout,
    displayErrors: true,
    filename: `${task.name}.js`
  });
  const value: unknown = await completion;
  return Object.hasOwn(sandbox, 'result') ? sandbox.result : value;
}
