import spawn from 'cross-spawn';
import type { TaskConfig, TaskHandler } from '../registry.js';
import { optionalNumber, requireString } from './inputs.js';

export type ShellResult = {
  exit_code: number;
  stdout: string;
  stderr: string;
  command: string;
};

function stringEnv(value: unknown): Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return {};
  return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, String(v)]));
}

/** `shell` task: runs `inputs.command` through `shellPath -c`, in the workspace unless `cwd` is set. */
export function createShellStep(shellPath = '/bin/bash'): TaskHandler {
  return (task: TaskConfig) => runShellStep(task, shellPath);
}

export async function runShellStep(task: TaskConfig, shellPath = '/bin/bash'): Promise<ShellResult> {
  const command = requireString(task, 'command');
  const cwd = task.path(typeof task.inputs.cwd === 'string' ? task.inputs.cwd : '.');
  const timeout = optionalNumber(task, 'timeout');
  const env = { ...process.env, ...task.context.env, ...stringEnv(task.inputs.env) };

  const child = spawn(shellPath, ['-c', command], { stdio: 'pipe', cwd, env });
  let stdout = '';
  let stderr = '';
  child.stdout?.on('data', d => { stdout += String(d); });
  child.stderr?.on('data', d => { stderr += String(d); });

  let timedOut = false;
  const timer = timeout === undefined
    ? undefined
    : setTimeout(() => {
      timedOut = true;
      child.kill('SIGKILL');
    }, timeout * 1000);

  const exitCode = await new Promise<number>((resolve, reject) => {
    child.on('error', reject);
    child.on('close', code => resolve(code ?? 1));
  }).finally(() => clearTimeout(timer));

  if (timedOut) throw new Error(`Command timed out after ${timeout} seconds`);
  if (exitCode !== 0) {
    throw new Error(`Command failed with exit code ${exitCode}${stderr.trim() ? `: ${stderr.trim()}` : ''}`);
  }
  task.logger.debug({ command, exitCode }, 'shell command finished');
  return { exit_code: exitCode, stdout, stderr, command };
}
