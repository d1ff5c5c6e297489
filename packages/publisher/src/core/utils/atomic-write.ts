/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename so a reader (the pipeline executor picking up a
 * verification artifact) sees either the old file or the new one, never a
 * partial write. Rename is atomic on POSIX within one directory.
 */

import { randomUUID } from 'node:crypto';
import { writeFile, rename, unlink, mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';

export interface AtomicWriteOptions {
  readonly encoding?: BufferEncoding;
  /** Create missing parent directories (default: true) */
  readonly createParents?: boolean;
}

/**
 * Atomically write string data to file
 *
 * @throws the underlying fs error if the directory is missing (with
 *   `createParents: false`) or not writable
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  options: AtomicWriteOptions = {}
): Promise<void> {
  const { encoding = 'utf-8', createParents = true } = options;

  if (createParents) {
    await mkdir(dirname(filePath), { recursive: true });
  }

  // Unique per call: writers in one process can share a PID and a millisecond
  const tempPath = `${filePath}.${process.pid}.${randomUUID()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch(() => {
      /* temp file was never created or is already gone */
    });
    throw error;
  }
}

/**
 * Atomically write JSON data to file
 */
export async function atomicWriteJSON(
  filePath: string,
  data: unknown,
  options: AtomicWriteOptions & { readonly space?: number } = {}
): Promise<void> {
  const json = JSON.stringify(data, null, options.space ?? 2);
  await atomicWriteFile(filePath, `${json}\n`, options);
}
