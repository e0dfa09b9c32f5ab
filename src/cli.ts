#!/usr/bin/env node
import fs from 'node:fs';
import path from 'node:path';
import * as url from 'node:url';
import { Command, InvalidArgumentError } from 'commander';
import dotenv from 'dotenv';
import { loadConfig } from './config.js';
import { describeError } from './errors.js';
import { listFlows } from './flows.js';
import { parseParams } from './params.js';
import { WorkflowRunner } from './runner.js';
import { readExecutionState } from './state.js';
import { createDefaultRegistry } from './steps/index.js';
import type { ExecutionState } from './types.js';
import { loadWorkflowFile } from './workflow.js';

dotenv.config();

const __dirname = path.dirname(url.fileURLToPath(import.meta.url));

type RunCommandOptions = {
  flow?: string;
  resume?: boolean;
  resumeFrom?: string;
  startFrom?: string;
  skipSteps?: string[];
  workspace?: string;
  baseDir?: string;
  maxRetries?: number;
};

function packageVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
  const version = typeof pkg === 'object' && pkg !== null ? Reflect.get(pkg, 'version') : undefined;
  return typeof version === 'string' ? version : '0.0.0';
}

function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError('Expected a non-negative integer.');
  return n;
}

function commaList(value: string): string[] {
  return value.split(',').map(s => s.trim()).filter(Boolean);
}

function printState(state: ExecutionState) {
  console.log(`status: ${state.status}`);
  if (state.flow) console.log(`flow: ${state.flow}`);
  console.log(`completed steps: ${state.completed_steps.length ? state.completed_steps.join(', ') : '(none)'}`);
  if (state.failed_step) {
    console.log(`failed step: ${state.failed_step.step_name} (${state.failed_step.failed_at})`);
    console.log(`  ${state.failed_step.error}`);
  }
  for (const [step, retry] of Object.entries(state.retry_state)) {
    console.log(`retrying: ${step} (attempt ${retry.attempt})`);
  }
}

async function runCommand(file: string, pairs: string[], options: RunCommandOptions) {
  const config = loadConfig();
  const runner = new WorkflowRunner(file, {
    registry: createDefaultRegistry({ shell: config.shell }),
    logLevel: config.logLevel,
    workspace: options.workspace,
    baseDir: options.baseDir ?? config.baseDir
  });

  let resumeFrom = options.resumeFrom;
  if (options.resume && !resumeFrom) {
    const failed = runner.state.failedStep;
    if (!failed || !runner.state.canResumeFromStep(failed.step_name)) {
      throw new Error('Cannot resume: no failed step recorded in the workspace');
    }
    resumeFrom = failed.step_name;
  }

  const result = await runner.run({
    params: parseParams(pairs),
    flow: options.flow,
    resumeFrom,
    startFrom: options.startFrom,
    skipSteps: options.skipSteps,
    maxRetries: options.maxRetries ?? config.maxRetries
  });

  console.log('\n=== Workflow Results ===');
  console.log(`workspace: ${runner.workspace} (run ${runner.runNumber})`);
  for (const name of Object.keys(result.outputs)) {
    console.log(`  - step ${name}: ok`);
  }
  printState(result.execution_state);
}

const program = new Command();

program
  .name('stepwise')
  .description('Run declarative YAML step workflows with resumable state')
  .version(packageVersion());

program
  .command('run')
  .description('Execute a workflow')
  .argument('<workflow>', 'path to the workflow YAML file')
  .argument('[params...]', 'workflow parameters as key=value')
  .option('--flow <name>', 'flow to execute')
  .option('--resume', 'resume from the failed step of the previous run')
  .option('--resume-from <step>', 'resume a failed run from this step')
  .option('--start-from <step>', 'start a fresh run at this step')
  .option('--skip-steps <steps>', 'comma-separated steps to skip', commaList)
  .option('--workspace <dir>', 'custom workspace directory')
  .option('--base-dir <dir>', 'parent directory of run workspaces')
  .option('--max-retries <n>', 'retries for steps without on_error.retry', nonNegativeInt)
  .action(async (file: string, pairs: string[], options: RunCommandOptions) => {
    await runCommand(file, pairs, options);
  });

program
  .command('validate')
  .description('Check a workflow definition without running it')
  .argument('<workflow>', 'path to the workflow YAML file')
  .action((file: string) => {
    const workflow = loadWorkflowFile(file);
    console.log(`✓ ${workflow.name ?? file}: ${workflow.steps.length} steps, ${listFlows(workflow).length} flows`);
  });

program
  .command('flows')
  .description('List the flows a workflow defines')
  .argument('<workflow>', 'path to the workflow YAML file')
  .action((file: string) => {
    const workflow = loadWorkflowFile(file);
    const flows = listFlows(workflow);
    if (!flows.length) {
      console.log('No flows defined; all steps run in declaration order.');
      return;
    }
    const defaultFlow = workflow.flows?.default;
    for (const flow of flows) {
      console.log(`${flow}${flow === defaultFlow ? ' (default)' : ''}`);
    }
  });

program
  .command('status')
  .description('Show the persisted execution state of a run workspace')
  .argument('<workspace>', 'run workspace directory')
  .action((workspace: string) => {
    const state = readExecutionState(path.resolve(workspace));
    if (!state) {
      console.log(`No workflow state found in ${workspace}`);
      return;
    }
    printState(state);
  });

program.parseAsync(process.argv).catch((e: unknown) => {
  console.error(`✗ ${describeError(e)}`);
  process.exitCode = 1;
});
