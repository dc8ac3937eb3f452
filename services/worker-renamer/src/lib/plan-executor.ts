/**
 * Plan Executor
 *
 * Applies a rename plan to the file system. Never overwrites: an existing
 * target is reported and left alone. Flagged documents are copied (the
 * original stays put) with a markdown note beside the copy. A move whose
 * target was written but whose source could not be removed is reported as
 * `partial`: both files exist.
 */

import fs from 'fs/promises';
import { constants } from 'fs';
import path from 'path';
import {
  logger,
  currentRecords,
  renderReviewNote,
  type AuditRecord,
  type BatchReport,
  type RenamePlanEntry,
} from '@docnamer/shared';

export type ExecutionStatus = 'renamed' | 'copied' | 'partial' | 'unchanged' | 'skipped' | 'planned' | 'error';

export interface ExecutionResult {
  document_id: string;
  source_path: string;
  target_path: string | null;
  status: ExecutionStatus;
  message: string;
}

export interface ExecuteOptions {
  dryRun?: boolean;
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') return error.code;
  return undefined;
}

/** The target holds the document but its source is still in place. */
class SourceNotRemovedError extends Error {
  constructor(readonly original: unknown) {
    super(original instanceof Error ? original.message : String(original));
    this.name = 'SourceNotRemovedError';
  }
}

/**
 * Move without replacing: hard link then unlink, or an exclusive copy then
 * unlink across devices. Both fail with EEXIST when the target exists.
 *
 * @throws SourceNotRemovedError when the target was written but the source
 * could not be unlinked
 */
async function moveExclusive(source: string, target: string): Promise<void> {
  try {
    await fs.link(source, target);
  } catch (error) {
    const code = errorCode(error);
    if (code !== 'EXDEV' && code !== 'EPERM' && code !== 'ENOTSUP') throw error;
    await fs.copyFile(source, target, constants.COPYFILE_EXCL);
  }
  try {
    await fs.unlink(source);
  } catch (error) {
    throw new SourceNotRemovedError(error);
  }
}

/** Write the review note beside a copy; false when a note is already there. */
async function writeReviewNote(targetPath: string, record: AuditRecord): Promise<boolean> {
  try {
    await fs.writeFile(reviewNotePath(targetPath), renderReviewNote(record), { flag: 'wx' });
    return true;
  } catch (error) {
    if (errorCode(error) !== 'EEXIST') throw error;
    logger.warn('Review note exists, not overwriting', { target_path: targetPath });
    return false;
  }
}

export function reviewNotePath(targetPath: string): string {
  return `${targetPath}.md`;
}

async function applyEntry(entry: RenamePlanEntry, record: AuditRecord | undefined): Promise<ExecutionResult> {
  const base = { document_id: entry.document_id, source_path: entry.source_path, target_path: entry.target_path };

  if (entry.action === 'none' || entry.target_path === null) {
    return { ...base, status: 'unchanged', message: record?.reason ?? 'no action' };
  }
  if (path.resolve(entry.source_path) === path.resolve(entry.target_path)) {
    return { ...base, status: 'unchanged', message: 'already named' };
  }

  await fs.mkdir(path.dirname(entry.target_path), { recursive: true });

  if (entry.action === 'rename') {
    try {
      await moveExclusive(entry.source_path, entry.target_path);
      return { ...base, status: 'renamed', message: `renamed to ${entry.file_name}` };
    } catch (error) {
      return failed(entry, base, error);
    }
  }

  try {
    await fs.copyFile(entry.source_path, entry.target_path, constants.COPYFILE_EXCL);
  } catch (error) {
    return failed(entry, base, error);
  }

  const message = `copied for review as ${entry.file_name}`;
  try {
    if (record && !(await writeReviewNote(entry.target_path, record))) {
      return { ...base, status: 'copied', message: `${message}; review note already exists` };
    }
  } catch (error) {
    logger.error('Review note failed', error, { target_path: entry.target_path });
    const reason = error instanceof Error ? error.message : String(error);
    return { ...base, status: 'copied', message: `${message}; review note not written: ${reason}` };
  }
  return { ...base, status: 'copied', message };
}

function failed(
  entry: RenamePlanEntry,
  base: Pick<ExecutionResult, 'document_id' | 'source_path' | 'target_path'>,
  error: unknown
): ExecutionResult {
  if (error instanceof SourceNotRemovedError) {
    logger.error('Source not removed after move', error.original, {
      source_path: entry.source_path,
      target_path: entry.target_path,
    });
    return {
      ...base,
      status: 'partial',
      message: `moved to ${entry.file_name} but source not removed: ${error.message}`,
    };
  }
  if (errorCode(error) === 'EEXIST') {
    logger.warn('Target exists, not overwriting', { source_path: entry.source_path, target_path: entry.target_path });
    return { ...base, status: 'skipped', message: 'target already exists' };
  }
  logger.error('Plan entry failed', error, { source_path: entry.source_path, target_path: entry.target_path });
  return { ...base, status: 'error', message: error instanceof Error ? error.message : String(error) };
}

/**
 * Execute every plan entry in order. A failing entry is reported and does
 * not stop the rest.
 */
export async function executePlan(
  plan: readonly RenamePlanEntry[],
  report: BatchReport,
  options: ExecuteOptions = {}
): Promise<ExecutionResult[]> {
  const records = new Map(currentRecords(report).map((r) => [r.document_id, r]));
  const results: ExecutionResult[] = [];

  for (const entry of plan) {
    if (options.dryRun) {
      results.push({
        document_id: entry.document_id,
        source_path: entry.source_path,
        target_path: entry.target_path,
        status: entry.action === 'none' ? 'unchanged' : 'planned',
        message: entry.action === 'none' ? 'no action' : `would ${entry.action} to ${entry.file_name}`,
      });
      continue;
    }
    results.push(await applyEntry(entry, records.get(entry.document_id)));
  }

  const counts: Partial<Record<ExecutionStatus, number>> = {};
  for (const result of results) {
    counts[result.status] = (counts[result.status] ?? 0) + 1;
  }
  logger.info('Rename plan executed', { dry_run: options.dryRun ?? false, ...counts });

  return results;
}
