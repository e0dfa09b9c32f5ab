import fs from 'node:fs';
import path from 'node:path';
import YAML from 'yaml';
import type { TaskConfig } from '../registry.js';
import { formatValue } from '../utils/expression.js';
import { optionalNumber, optionalString, requireInput, requireString } from './inputs.js';

function encodingOf(task: TaskConfig): BufferEncoding {
  const encoding = optionalString(task, 'encoding', 'utf-8');
  if (!Buffer.isEncoding(encoding)) throw new Error(`Unsupported encoding: ${encoding}`);
  return encoding;
}

function ensureParent(filePath: string): void {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
}

function existingFile(task: TaskConfig, key: string): string {
  const filePath = task.path(requireString(task, key));
  if (!fs.existsSync(filePath)) throw new Error(`File not found: ${filePath}`);
  return filePath;
}

export function writeFileStep(task: TaskConfig) {
  const filePath = task.path(requireString(task, 'file_path'));
  const content = formatValue(requireInput(task, 'content'));
  const encoding = encodingOf(task);
  ensureParent(filePath);
  fs.writeFileSync(filePath, content, { encoding });
  return { path: filePath, encoding, size: content.length };
}

export function readFileStep(task: TaskConfig) {
  const filePath = existingFile(task, 'file_path');
  const encoding = encodingOf(task);
  const content = fs.readFileSync(filePath, { encoding });
  return { path: filePath, content, encoding, size: content.length };
}

export function appendFileStep(task: TaskConfig) {
  const filePath = task.path(requireString(task, 'file_path'));
  const content = formatValue(requireInput(task, 'content'));
  const encoding = encodingOf(task);
  ensureParent(filePath);
  fs.appendFileSync(filePath, content, { encoding });
  return { path: filePath, encoding, size: fs.statSync(filePath).size };
}

export function copyFileStep(task: TaskConfig) {
  const source = existingFile(task, 'source');
  const destination = task.path(requireString(task, 'destination'));
  ensureParent(destination);
  fs.copyFileSync(source, destination);
  return { source, destination };
}

export function moveFileStep(task: TaskConfig) {
  const source = existingFile(task, 'source');
  const destination = task.path(requireString(task, 'destination'));
  ensureParent(destination);
  fs.renameSync(source, destination);
  return { source, destination };
}

export function deleteFileStep(task: TaskConfig) {
  const filePath = existingFile(task, 'file_path');
  fs.rmSync(filePath);
  return { path: filePath };
}

export function readJsonStep(task: TaskConfig): unknown {
  const filePath = existingFile(task, 'file_path');
  return JSON.parse(fs.readFileSync(filePath, 'utf8'));
}

export function writeJsonStep(task: TaskConfig): string {
  const filePath = task.path(requireString(task, 'file_path'));
  const data = requireInput(task, 'data');
  const indent = optionalNumber(task, 'indent') ?? 2;
  ensureParent(filePath);
  fs.writeFileSync(filePath, JSON.stringify(data, null, indent));
  return filePath;
}

export function readYamlStep(task: TaskConfig): unknown {
  const filePath = existingFile(task, 'file_path');
  return YAML.parse(fs.readFileSync(filePath, 'utf8'));
}

export function writeYamlStep(task: TaskConfig): string {
  const filePath = task.path(requireString(task, 'file_path'));
  const data = requireInput(task, 'data');
  ensureParent(filePath);
  fs.writeFileSync(filePath, YAML.stringify(data));
  return filePath;
}
