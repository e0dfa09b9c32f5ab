import { TaskRegistry } from '../registry.js';
import { addNumbersStep, echoStep, failStep, helloWorldStep, joinStringsStep, noopStep } from './basic.js';
import { runBatchStep } from './batch.js';
import {
  appendFileStep,
  copyFileStep,
  deleteFileStep,
  moveFileStep,
  readFileStep,
  readJsonStep,
  readYamlStep,
  writeFileStep,
  writeJsonStep,
  writeYamlStep
} from './files.js';
import { runScriptStep } from './script.js';
import { createShellStep } from './shell.js';
import { renderTemplateStep } from './template.js';

export type DefaultRegistryOptions = {
  /** Interpreter for the `shell` task. */
  shell?: string;
};

export function registerBuiltinSteps(registry: TaskRegistry, options: DefaultRegistryOptions = {}): TaskRegistry {
  return registry
    .register('echo', echoStep)
    .register('fail', failStep)
    .register('hello_world', helloWorldStep)
    .register('add_numbers', addNumbersStep)
    .register('join_strings', joinStringsStep)
    .register('noop', noopStep)
    .register('shell', createShellStep(options.shell))
    .register('write_file', writeFileStep)
    .register('read_file', readFileStep)
    .register('append_file', appendFileStep)
    .register('copy_file', copyFileStep)
    .register('move_file', moveFileStep)
    .register('delete_file', deleteFileStep)
    .register('read_json', readJsonStep)
    .register('write_json', writeJsonStep)
    .register('read_yaml', readYamlStep)
    .register('write_yaml', writeYamlStep)
    .register('template', renderTemplateStep, { rawInputs: ['template'] })
    .register('script', runScriptStep, { rawInputs: ['code'] })
    .register('batch', runBatchStep, { rawInputs: ['task'] });
}

export function createDefaultRegistry(options: DefaultRegistryOptions = {}): TaskRegistry {
  return registerBuiltinSteps(new TaskRegistry(), options);
}
