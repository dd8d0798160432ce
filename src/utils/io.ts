/**
 * File I/O utilities
 */

import { mkdir, writeFile, readFile } from 'fs/promises';
import { readFileSync, readdirSync, existsSync } from 'fs';
import { dirname } from 'path';

export async function ensureDir(dir_path: string): Promise<void> {
  await mkdir(dir_path, { recursive: true });
}

export async function writeJson(file_path: string, data: unknown): Promise<void> {
  await ensureDir(dirname(file_path));
  await writeFile(file_path, JSON.stringify(data, null, 2), 'utf-8');
}

export async function readJson(file_path: string): Promise<unknown> {
  const content = await readFile(file_path, 'utf-8');
  return JSON.parse(content);
}

/**
 * Synchronous read for one-time configuration loading
 */
export function readJsonSync(file_path: string): unknown {
  const content = readFileSync(file_path, 'utf-8');
  return JSON.parse(content);
}

export function fileExistsSync(file_path: string): boolean {
  return existsSync(file_path);
}

export function listFilesSync(dir_path: string): string[] {
  if (!existsSync(dir_path)) return [];
  return readdirSync(dir_path);
}
