/**
 * JSON export of scan reports
 */

import { mkdir, readdir, rm, writeFile } from 'fs/promises';
import { basename, dirname, join, resolve } from 'path';
import { isSystemError } from '../core/errors.js';
import type { ScanReport } from '../core/types.js';

export const DEFAULT_EXPORT_DIR = 'exports';

export class PathTraversalError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PathTraversalError';
  }
}

/**
 * Replace anything outside [A-Za-z0-9_.-] with an underscore
 */
export function safeFilename(name: string): string {
  return name.replace(/[^a-zA-Z0-9_\-.]/g, '_');
}

/**
 * Absolute export path for a user-supplied file name.
 *
 * @throws PathTraversalError for paths with `..` segments
 */
export function resolveExportPath(file: string, baseDir = process.cwd()): string {
  const trimmed = file.trim();
  if (trimmed === '') {
    throw new PathTraversalError('Export path cannot be empty');
  }
  if (trimmed.split(/[\\/]/).includes('..')) {
    throw new PathTraversalError(`Path traversal detected in '${trimmed}'`);
  }

  let name = safeFilename(basename(trimmed));
  if (!name.endsWith('.json')) {
    name += '.json';
  }
  return resolve(baseDir, dirname(trimmed), name);
}

/**
 * Write the report as indented JSON and return where it went
 */
export async function exportReport(
  report: ScanReport,
  file: string,
  baseDir?: string
): Promise<string> {
  const target = resolveExportPath(file, baseDir);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, `${JSON.stringify(report, null, 2)}\n`, 'utf-8');
  return target;
}

const pad = (n: number) => String(n).padStart(2, '0');

/**
 * `scan_YYYY-MM-DD_HH-MM-SS.json` in local time
 */
export function timestampedFilename(now = new Date()): string {
  const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}-${pad(now.getMinutes())}-${pad(now.getSeconds())}`;
  return `scan_${date}_${time}.json`;
}

function isMissing(error: unknown): boolean {
  return isSystemError(error) && error.code === 'ENOENT';
}

/**
 * JSON exports directly inside `dir`, newest name first. A missing directory has none.
 */
export async function listExports(dir = DEFAULT_EXPORT_DIR): Promise<string[]> {
  try {
    const entries = await readdir(dir, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
      .map((entry) => entry.name)
      .sort()
      .reverse();
  } catch (error) {
    if (isMissing(error)) return [];
    throw error;
  }
}

async function collectJsonFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await collectJsonFiles(path)));
    } else if (entry.isFile() && entry.name.endsWith('.json')) {
      files.push(path);
    }
  }
  return files;
}

/**
 * Delete every JSON export under `dir`, nested ones included, and return how many went
 */
export async function cleanExports(dir = DEFAULT_EXPORT_DIR): Promise<number> {
  let files: string[];
  try {
    files = await collectJsonFiles(dir);
  } catch (error) {
    if (isMissing(error)) return 0;
    throw error;
  }

  for (const file of files) {
    await rm(file);
  }
  return files.length;
}
