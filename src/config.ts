import { z } from 'zod';
import { ConfigError } from './errors.js';

const ConfigSchema = z.object({
  STEPWISE_BASE_DIR: z.string().min(1).default('runs'),
  STEPWISE_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  STEPWISE_MAX_RETRIES: z.coerce.number().int().min(0).default(3),
  STEPWISE_SHELL: z.string().min(1).default('/bin/bash')
});

export type EngineConfig = {
  baseDir: string;
  logLevel: z.infer<typeof ConfigSchema>['STEPWISE_LOG_LEVEL'];
  maxRetries: number;
  shell: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
  const parsed = ConfigSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `  - ${issue.path.join('.')}: ${issue.message}`).join('\n');
    throw new ConfigError(`Invalid environment configuration:\n${issues}`);
  }
  return {
    baseDir: parsed.data.STEPWISE_BASE_DIR,
    logLevel: parsed.data.STEPWISE_LOG_LEVEL,
    maxRetries: parsed.data.STEPWISE_MAX_RETRIES,
    shell: parsed.data.STEPWISE_SHELL
  };
}
