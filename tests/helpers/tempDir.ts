import { promises as fs } from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export async function createTempDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/** Writes `size` bytes and pins the file's modification time. */
export async function writeSizedFile(filePath: string, size: number, mtime: Date): Promise<void> {
  await fs.writeFile(filePath, Buffer.alloc(size, 1));
  await fs.utimes(filePath, mtime, mtime);
}
