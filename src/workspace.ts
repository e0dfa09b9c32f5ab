import fs from 'node:fs';
import path from 'node:path';
import { StateStoreError } from './errors.js';
import { METADATA_FILE } from './state.js';

export type WorkspaceOptions = {
  /** Use this directory instead of `<baseDir>/<workflow>`. */
  workspace?: string;
  baseDir?: string;
};

export type WorkspaceInfo = {
  path: string;
  runNumber: number;
};

export const WORKSPACE_DIRS = ['logs', 'output', 'temp'] as const;

export function sanitizeName(name: string): string {
  return name.replace(/[^\w-]/g, '_');
}

function readMetadata(workspace: string): Record<string, unknown> {
  const file = path.join(workspace, METADATA_FILE);
  if (!fs.existsSync(file)) return {};
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, 'utf8'));
    return typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)
      ? Object.fromEntries(Object.entries(parsed))
      : {};
  } catch (e) {
    throw new StateStoreError(file, e);
  }
}

export function readRunNumber(workspace: string): number | undefined {
  const run = readMetadata(workspace).run_number;
  return typeof run === 'number' && Number.isInteger(run) ? run : undefined;
}

function isResumable(state: unknown): boolean {
  if (typeof state !== 'object' || state === null) return false;
  const status: unknown = Reflect.get(state, 'status');
  const failed: unknown = Reflect.get(state, 'failed_step');
  return status === 'failed' && typeof failed === 'object' && failed !== null;
}

/**
 * Prepare the run directory: create it with its `logs/`, `output/` and `temp/` folders, bump the
 * run number and rewrite the metadata file. A previous execution state survives only when it
 * recorded a failure, so that run can be resumed.
 */
export function createWorkspace(workflowName: string, options: WorkspaceOptions = {}): WorkspaceInfo {
  const baseDir = path.resolve(options.baseDir ?? 'runs');
  const workspace = options.workspace
    ? path.resolve(options.workspace)
    : path.join(baseDir, sanitizeName(workflowName));

  const existing = readMetadata(workspace);
  const previousRun = readRunNumber(workspace);
  const runNumber = previousRun === undefined ? 1 : previousRun + 1;

  fs.mkdirSync(workspace, { recursive: true });
  for (const dir of WORKSPACE_DIRS) {
    fs.mkdirSync(path.join(workspace, dir), { recursive: true });
  }

  const metadata: Record<string, unknown> = {
    workflow_name: workflowName,
    created_at: new Date().toISOString(),
    run_number: runNumber,
    custom_dir: Boolean(options.workspace),
    base_dir: baseDir
  };
  if (isResumable(existing.execution_state)) {
    metadata.execution_state = existing.execution_state;
  }
  fs.writeFileSync(path.join(workspace, METADATA_FILE), JSON.stringify(metadata, null, 2));

  return { path: workspace, runNumber };
}

export function resolvePath(workspace: string, filePath: string): string {
  return path.isAbsolute(filePath) ? filePath : path.join(workspace, filePath);
}
