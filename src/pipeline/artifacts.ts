/**
 * Per-item artifact locations, resume detection and atomic moves.
 *
 * Every artifact an item produces is named after the definition's stem,
 * so a re-scan can tell from the filesystem alone how far a previous run
 * got. Collaborators write to `<path>.partial` and the pipeline commits
 * with a rename: a canonical path exists only once its phase finished.
 *
 * @module pipeline/artifacts
 */

import { copyFile, mkdir, rename, rm, stat, unlink } from 'node:fs/promises';
import { basename, dirname, extname, join } from 'node:path';
import type { DirectoryLayout } from '../config/reader.js';
import type { WorkItem } from '../queue/scanner.js';
import type { PipelinePhase } from './types.js';

export interface ItemArtifacts {
  stem: string;
  contextPath: string;
  draftRequestPath: string;
  draftResultsDir: string;
  /** Relocated draft, input to the final phases. */
  draftPath: string;
  finalContextPath: string;
  finalRequestPath: string;
  finalResultsDir: string;
  /** Ready-for-next-stage directory holding the final artifacts. */
  activeItemDir: string;
  /** Hidden directory the final artifacts are gathered in before publishing. */
  activeStagingDir: string;
  failedPath: string;
  errorPath: string;
  completedPath: string;
}

export function definitionStem(name: string): string {
  return basename(name, extname(name));
}

/**
 * Compute every location an item's pipeline reads or writes.
 */
export function itemArtifacts(
  layout: DirectoryLayout,
  item: WorkItem,
  artifactExtension: string,
): ItemArtifacts {
  const stem = definitionStem(item.name);
  return {
    stem,
    contextPath: join(layout.stagingDir, `${stem}-context.json`),
    draftRequestPath: join(layout.stagingDir, `${stem}-draft-request.jsonl`),
    draftResultsDir: join(layout.stagingDir, `${stem}-draft-results`),
    draftPath: join(layout.draftsDir, `${stem}${artifactExtension}`),
    finalContextPath: join(layout.stagingDir, `${stem}-final-context.json`),
    finalRequestPath: join(layout.stagingDir, `${stem}-final-request.jsonl`),
    finalResultsDir: join(layout.stagingDir, `${stem}-final-results`),
    activeItemDir: join(layout.activeDir, stem),
    activeStagingDir: join(layout.activeDir, `.${stem}.partial`),
    failedPath: join(layout.failedDir, item.name),
    errorPath: join(layout.failedDir, `${stem}-error.txt`),
    completedPath: join(layout.completedDir, item.name),
  };
}

/** Temp path a collaborator writes before the pipeline commits it. */
export function partialPath(path: string): string {
  return `${path}.partial`;
}

export async function pathExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw err;
  }
}

/**
 * Find the latest phase whose inputs already exist.
 *
 * Later evidence wins: published final artifacts mean the item is done;
 * a relocated draft means the draft half never needs to run again.
 */
export async function resolveResumePhase(paths: ItemArtifacts): Promise<PipelinePhase> {
  if (await pathExists(paths.activeItemDir)) return 'DONE';

  if (await pathExists(paths.draftPath)) {
    if (await pathExists(paths.finalRequestPath)) return 'RATE_GATE_2';
    if (await pathExists(paths.finalContextPath)) return 'BUILD_FINAL_REQUEST';
    return 'COLLECT_DRAFT_CONTEXT';
  }

  if (await pathExists(paths.draftRequestPath)) return 'RATE_GATE_1';
  if (await pathExists(paths.contextPath)) return 'BUILD_DRAFT_REQUEST';
  return 'COLLECT_CONTEXT';
}

/**
 * Remove everything a run left behind for an item short of its published
 * output: staged context, requests and batch results, the relocated
 * draft, uncommitted `.partial` files and the hidden publish directory.
 * A definition dropped back into the queue then starts from scratch.
 */
export async function discardArtifacts(paths: ItemArtifacts): Promise<void> {
  const files = [
    paths.contextPath,
    paths.draftRequestPath,
    paths.draftPath,
    paths.finalContextPath,
    paths.finalRequestPath,
  ];
  for (const file of files) {
    await rm(file, { force: true });
    await rm(partialPath(file), { force: true });
  }
  for (const dir of [paths.draftResultsDir, paths.finalResultsDir, paths.activeStagingDir]) {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * Move a file so that `dest` never appears half-written.
 *
 * Same-filesystem moves are a single rename. Across filesystems the file
 * is copied to a hidden temp name beside `dest`, renamed into place,
 * then the source is removed.
 */
export async function moveAtomic(source: string, dest: string): Promise<void> {
  await mkdir(dirname(dest), { recursive: true });
  try {
    await rename(source, dest);
    return;
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code !== 'EXDEV') throw err;
  }

  const temp = join(dirname(dest), `.${basename(dest)}.${process.pid}.tmp`);
  await copyFile(source, temp);
  await rename(temp, dest);
  await unlink(source);
}

/**
 * Publish files into `targetDir` as one unit: gather them in a hidden
 * staging directory, then rename the directory into place.
 *
 * @returns The published paths, in input order.
 */
export async function publishDirectory(
  files: readonly string[],
  stagingDir: string,
  targetDir: string,
): Promise<string[]> {
  await rm(stagingDir, { recursive: true, force: true });
  await mkdir(stagingDir, { recursive: true });

  for (const file of files) {
    await moveAtomic(file, join(stagingDir, basename(file)));
  }
  await rename(stagingDir, targetDir);

  return files.map((file) => join(targetDir, basename(file)));
}
