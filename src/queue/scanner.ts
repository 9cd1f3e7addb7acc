/**
 * Queue directory scanner.
 *
 * Lists definition files waiting in the queue directory, oldest first.
 * Subdirectories (including the failed directory kept under the queue),
 * hidden files, other extensions and already-completed names are left out.
 *
 * @module queue/scanner
 */

import { readdir, stat } from 'node:fs/promises';
import { extname, join } from 'node:path';

/** One definition file tracked through the pipeline. */
export interface WorkItem {
  /** Base name; the dedup key recorded in the completed set. */
  name: string;
  /** Absolute path inside the queue directory. */
  path: string;
  /** Modification time in epoch milliseconds; the ordering key. */
  modifiedAt: number;
}

export interface ScanOptions {
  /** Extension a definition must carry, e.g. ".md". */
  extension: string;
}

/**
 * Order by modification time, then by name in code-unit order.
 */
export function compareWorkItems(a: WorkItem, b: WorkItem): number {
  if (a.modifiedAt !== b.modifiedAt) return a.modifiedAt - b.modifiedAt;
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

/**
 * List pending work items in `directory`.
 *
 * A missing directory yields an empty list. A file removed between the
 * listing and its stat is skipped.
 */
export async function listPending(
  directory: string,
  completed: ReadonlySet<string>,
  options: ScanOptions,
): Promise<WorkItem[]> {
  let entries;
  try {
    entries = await readdir(directory, { withFileTypes: true });
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return [];
    throw err;
  }

  const items: WorkItem[] = [];
  for (const entry of entries) {
    if (!entry.isFile()) continue;
    if (entry.name.startsWith('.')) continue;
    if (extname(entry.name) !== options.extension) continue;
    if (completed.has(entry.name)) continue;

    const path = join(directory, entry.name);
    try {
      const info = await stat(path);
      items.push({ name: entry.name, path, modifiedAt: info.mtimeMs });
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') continue;
      throw err;
    }
  }

  return items.sort(compareWorkItems);
}
