import os from 'node:os';
import { z } from 'zod';
import { forkContext, toTemplateScope } from '../context.js';
import { BatchValidationError, TaskExecutionError } from '../errors.js';
import type { Logger } from '../logger.js';
import { TaskConfig, prepareInputs, type TaskEntry, type TaskRegistry } from '../registry.js';
import type { RunContext } from '../types.js';

export type PoolScope = 'chunk' | 'global';

export type SubTaskConfig = {
  task: string;
  inputs: Record<string, unknown>;
};

export type BatchItemOutcome =
  | { status: 'success'; index: number; item: unknown; result: unknown }
  | { status: 'failed'; index: number; item: unknown; error: string };

export type BatchStats = {
  total: number;
  processed: number;
  failed: number;
  chunks: number;
  start_time: string;
  end_time: string;
  success_rate: number;
};

export type BatchResult = {
  processed: unknown[];
  results: unknown[];
  failed: Array<{ item: unknown; error: string }>;
  stats: BatchStats;
};

export type ChunkProgress = {
  chunk_index: number;
  chunks: number;
  total: number;
  processed: number;
  failed: number;
};

export type BatchRunOptions = {
  items: unknown;
  task: SubTaskConfig;
  context: RunContext;
  stepName: string;
  workspace: string;
  argName?: string;
  chunkSize?: number;
  maxWorkers?: number;
  poolScope?: PoolScope;
  /** Outcomes of an earlier run; items at the same index with an equal value are not run again. */
  previous?: BatchItemOutcome[];
  /** Called once per finished chunk, outside the workers, with that chunk's outcomes. */
  onChunkComplete?: (progress: ChunkProgress, outcomes: BatchItemOutcome[]) => void;
};

type ItemJob = {
  item: unknown;
  index: number;
  chunkIndex: number;
};

const DEFAULT_CHUNK_SIZE = 10;

function positiveInt(value: number, label: string): number {
  if (!Number.isInteger(value) || value <= 0) {
    throw new BatchValidationError(`${label} must be a positive integer, got: ${value}`);
  }
  return value;
}

/** Run `work` over `jobs` with at most `limit` in flight; results come back in completion order. */
async function runPool<T, R>(jobs: T[], limit: number, work: (job: T) => Promise<R>): Promise<R[]> {
  const results: R[] = [];
  let next = 0;
  const workers = Array.from({ length: Math.min(limit, jobs.length) }, async () => {
    while (next < jobs.length) {
      const job = jobs[next];
      next += 1;
      results.push(await work(job));
    }
  });
  await Promise.all(workers);
  return results;
}

function sameItem(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

function unwrapResult(value: unknown): unknown {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    const keys = Object.keys(value);
    if (keys.length === 1 && keys[0] === 'result') return Reflect.get(value, 'result');
  }
  return value;
}

export function emptyBatchResult(now = new Date().toISOString()): BatchResult {
  return {
    processed: [],
    results: [],
    failed: [],
    stats: { total: 0, processed: 0, failed: 0, chunks: 0, start_time: now, end_time: now, success_rate: 100.0 }
  };
}

/**
 * Fans one sub-task out over a list of items: items are split into chunks and each item runs the
 * sub-task's handler under a bounded pool of async workers. Item failures are collected, never
 * thrown; only invalid configuration rejects the whole batch.
 */
export class BatchProcessor {
  constructor(
    private readonly registry: TaskRegistry,
    private readonly logger: Logger
  ) {}

  async run(options: BatchRunOptions): Promise<BatchResult> {
    const { items, task, context, stepName, workspace } = options;
    if (!Array.isArray(items)) {
      throw new BatchValidationError('items must be a list after template resolution');
    }
    const chunkSize = positiveInt(options.chunkSize ?? DEFAULT_CHUNK_SIZE, 'chunk_size');
    const maxWorkers = positiveInt(options.maxWorkers ?? Math.min(chunkSize, os.cpus().length || 1), 'max_workers');
    const poolScope = options.poolScope ?? 'chunk';
    if (poolScope !== 'chunk' && poolScope !== 'global') {
      throw new BatchValidationError(`pool_scope must be 'chunk' or 'global', got: ${String(poolScope)}`);
    }
    if (items.length === 0) return emptyBatchResult();

    const lookup = this.registry.lookup(task.task);
    if (!lookup.found) {
      throw new BatchValidationError(
        `Unknown task type '${lookup.name}' for batch step '${stepName}'. Available: ${lookup.available.join(', ')}`
      );
    }
    const entry = lookup.entry;
    const argName = options.argName ?? 'item';
    const startTime = new Date().toISOString();

    const chunks: ItemJob[][] = [];
    for (let start = 0; start < items.length; start += chunkSize) {
      const chunkIndex = chunks.length;
      chunks.push(items.slice(start, start + chunkSize).map((item, offset) => ({ item, index: start + offset, chunkIndex })));
    }

    const reusable = new Map<number, BatchItemOutcome>();
    for (const outcome of options.previous ?? []) {
      if (outcome.index < items.length && sameItem(outcome.item, items[outcome.index])) {
        reusable.set(outcome.index, outcome);
      }
    }

    const log = this.logger.child({ step: stepName });
    log.debug(
      { total: items.length, chunks: chunks.length, chunkSize, maxWorkers, poolScope, reused: reusable.size },
      'batch started'
    );

    const outcomes: BatchItemOutcome[] = [];
    const progress = { processed: 0, failed: 0 };
    const finishChunk = (chunkIndex: number, chunkOutcomes: BatchItemOutcome[]) => {
      for (const outcome of chunkOutcomes) {
        if (outcome.status === 'success') progress.processed += 1;
        else progress.failed += 1;
      }
      log.debug({ chunk: chunkIndex, ...progress }, 'batch chunk complete');
      options.onChunkComplete?.(
        { chunk_index: chunkIndex, chunks: chunks.length, total: items.length, ...progress },
        chunkOutcomes
      );
    };

    const runItem = async (job: ItemJob): Promise<BatchItemOutcome> => {
      const saved = reusable.get(job.index);
      if (saved) return saved;
      return this.processItem(job, { entry, task, context, argName, workspace, total: items.length, chunkSize });
    };

    if (poolScope === 'chunk') {
      for (const [chunkIndex, chunk] of chunks.entries()) {
        const chunkOutcomes = await runPool(chunk, maxWorkers, runItem);
        outcomes.push(...chunkOutcomes);
        finishChunk(chunkIndex, chunkOutcomes);
      }
    } else {
      const pending = chunks.map(chunk => chunk.length);
      const byChunk: BatchItemOutcome[][] = chunks.map(() => []);
      await runPool(chunks.flat(), maxWorkers, async job => {
        const outcome = await runItem(job);
        outcomes.push(outcome);
        byChunk[job.chunkIndex].push(outcome);
        pending[job.chunkIndex] -= 1;
        if (pending[job.chunkIndex] === 0) finishChunk(job.chunkIndex, byChunk[job.chunkIndex]);
        return outcome;
      });
    }

    outcomes.sort((a, b) => a.index - b.index);
    const result: BatchResult = {
      processed: [],
      results: [],
      failed: [],
      stats: {
        total: items.length,
        processed: 0,
        failed: 0,
        chunks: chunks.length,
        start_time: startTime,
        end_time: '',
        success_rate: 0
      }
    };
    for (const outcome of outcomes) {
      if (outcome.status === 'success') {
        result.processed.push(outcome.item);
        result.results.push(outcome.result);
      } else {
        result.failed.push({ item: outcome.item, error: outcome.error });
      }
    }
    result.stats.processed = result.processed.length;
    result.stats.failed = result.failed.length;
    result.stats.end_time = new Date().toISOString();
    result.stats.success_rate = (result.stats.processed / result.stats.total) * 100.0;
    log.info({ processed: result.stats.processed, failed: result.stats.failed }, 'batch finished');
    return result;
  }

  private async processItem(
    job: ItemJob,
    shared: {
      entry: TaskEntry;
      task: SubTaskConfig;
      context: RunContext;
      argName: string;
      workspace: string;
      total: number;
      chunkSize: number;
    }
  ): Promise<BatchItemOutcome> {
    const { entry, task, argName } = shared;
    const name = `batch_item_${job.index}`;
    const itemContext = forkContext(shared.context, argName, {
      item: job.item,
      index: job.index,
      total: shared.total,
      chunk_index: job.chunkIndex,
      chunk_size: shared.chunkSize
    });
    try {
      const inputs = {
        ...prepareInputs(task.inputs, entry.rawInputs, toTemplateScope(itemContext)),
        [argName]: job.item
      };
      const config = new TaskConfig({
        name,
        taskType: task.task,
        inputs,
        step: { name, task: task.task, inputs: task.inputs },
        context: itemContext,
        workspace: shared.workspace,
        registry: this.registry,
        logger: this.logger.child({ step: name })
      });
      const result: unknown = await entry.handler(config);
      return { status: 'success', index: job.index, item: job.item, result: unwrapResult(result) };
    } catch (e) {
      return { status: 'failed', index: job.index, item: job.item, error: new TaskExecutionError(name, e).message };
    }
  }
}

const SubTaskSchema = z.union([
  z.string().min(1).transform(task => ({ task, inputs: {} })),
  z.object({
    task: z.string({ required_error: 'sub-task must name a task' }).min(1),
    inputs: z.record(z.unknown()).default({})
  })
]);

const BatchInputsSchema = z.object({
  arg_name: z.string().min(1).default('item'),
  chunk_size: z.coerce.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  max_workers: z.coerce.number().int().positive().optional(),
  pool_scope: z.enum(['chunk', 'global']).default('chunk'),
  resume: z.boolean().default(false)
});

const SavedOutcomeSchema = z.discriminatedUnion('status', [
  z.object({ status: z.literal('success'), index: z.number().int().min(0), item: z.unknown(), result: z.unknown() }),
  z.object({ status: z.literal('failed'), index: z.number().int().min(0), item: z.unknown(), error: z.string() })
]);

const SavedProgressSchema = z.object({ outcomes: z.array(SavedOutcomeSchema) });

/** Outcomes recorded under `batch.<step>` by an earlier run, or none if the record is missing or unreadable. */
function savedOutcomes(record: unknown): BatchItemOutcome[] {
  const parsed = SavedProgressSchema.safeParse(record);
  if (!parsed.success) return [];
  return parsed.data.outcomes.map(
    (o): BatchItemOutcome =>
      o.status === 'success'
        ? { status: 'success', index: o.index, item: o.item, result: o.result }
        : { status: 'failed', index: o.index, item: o.item, error: o.error }
  );
}

function issues(error: z.ZodError): string {
  return error.issues.map(i => `${i.path.length ? i.path.join('.') : 'task'}: ${i.message}`).join('; ');
}

/**
 * `batch` task: runs `inputs.task` once per entry of `inputs.items`.
 *
 * Progress and finished item outcomes are saved to the `batch` state namespace after every chunk.
 * With `resume: true` a re-run reuses those outcomes and only runs the items that never finished.
 */
export async function runBatchStep(task: TaskConfig): Promise<BatchResult> {
  const { items } = task.inputs;
  if (items === undefined || items === null) {
    throw new BatchValidationError('items parameter is required');
  }
  if (!Array.isArray(items)) {
    throw new BatchValidationError('items must be a list after template resolution');
  }
  if (items.length === 0) return emptyBatchResult();

  if (task.inputs.task === undefined || task.inputs.task === null) {
    throw new BatchValidationError('task configuration is required');
  }
  const subTask = SubTaskSchema.safeParse(task.inputs.task);
  if (!subTask.success) throw new BatchValidationError(`invalid sub-task: ${issues(subTask.error)}`);
  const settings = BatchInputsSchema.safeParse(task.inputs);
  if (!settings.success) throw new BatchValidationError(`invalid batch settings: ${issues(settings.error)}`);

  const state = task.state;
  const previous = state && settings.data.resume ? savedOutcomes(state.getNamespace('batch')[task.name]) : [];
  if (previous.length > 0) task.logger.info({ saved: previous.length }, 'Resuming batch from saved progress');
  const finished: BatchItemOutcome[] = [];
  const processor = new BatchProcessor(task.registry, task.logger);
  return processor.run({
    items,
    task: subTask.data,
    context: task.context,
    stepName: task.name,
    workspace: task.workspace,
    argName: settings.data.arg_name,
    chunkSize: settings.data.chunk_size,
    maxWorkers: settings.data.max_workers,
    poolScope: settings.data.pool_scope,
    previous,
    onChunkComplete: state
      ? (progress, outcomes) => {
          finished.push(...outcomes);
          state.updateNamespace('batch', { [task.name]: { ...progress, outcomes: [...finished] } });
        }
      : undefined
  });
}
