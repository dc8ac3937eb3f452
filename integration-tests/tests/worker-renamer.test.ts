/**
 * Rename Worker Tests
 *
 * Document discovery, plan execution on a temporary directory tree and a
 * full rename_batch job with sidecar text files standing in for OCR.
 */

import fs from 'fs';
import fsPromises from 'fs/promises';
import path from 'path';
import {
  AuditRecorder,
  PlainTextOcrProvider,
  type RenameBatchJob,
  type RenamePlanEntry,
} from '@docnamer/shared';
import { listDocuments, listFileNames } from '../../services/worker-renamer/src/lib/files';
import { executePlan, reviewNotePath } from '../../services/worker-renamer/src/lib/plan-executor';
import { writeReport } from '../../services/worker-renamer/src/lib/report';
import { processRenameBatch } from '../../services/worker-renamer/src/lib/batch';
import { makeTempDir, removeDir, writeFile } from './helpers';

let dir: string;

beforeEach(() => {
  dir = makeTempDir();
});

afterEach(() => {
  removeDir(dir);
});

function entry(overrides: Partial<RenamePlanEntry>): RenamePlanEntry {
  return {
    document_id: 'doc-1',
    source_path: path.join(dir, 'in', 'a.pdf'),
    target_path: path.join(dir, 'out', 'contrato_123.pdf'),
    file_name: 'contrato_123.pdf',
    decision: 'AUTO_RENAMED',
    action: 'rename',
    ...overrides,
  };
}

const emptyReport = () => new AuditRecorder('batch-1').finalize();

describe('listDocuments', () => {
  it('finds documents recursively in sorted order', async () => {
    writeFile(dir, 'a.pdf');
    writeFile(dir, 'a.txt', 'sidecar of a.pdf');
    writeFile(dir, 'notes.txt', 'a document of its own');
    writeFile(dir, '.hidden.pdf');
    writeFile(dir, 'readme.md');
    writeFile(dir, 'sub/b.PNG');
    writeFile(dir, '_pendentes/c.pdf');

    const documents = await listDocuments(dir, undefined, [path.join(dir, '_pendentes')]);

    expect(documents).toEqual([path.join(dir, 'a.pdf'), path.join(dir, 'notes.txt'), path.join(dir, 'sub', 'b.PNG')]);
  });

  it('filters by extension', async () => {
    writeFile(dir, 'a.pdf');
    writeFile(dir, 'b.png');

    expect(await listDocuments(dir, ['png'])).toEqual([path.join(dir, 'b.png')]);
  });
});

describe('listFileNames', () => {
  it('lists files only, and nothing for a missing directory', async () => {
    writeFile(dir, 'x.pdf');
    writeFile(dir, 'sub/y.pdf');

    expect(await listFileNames(dir)).toEqual(['x.pdf']);
    expect(await listFileNames(path.join(dir, 'missing'))).toEqual([]);
  });
});

describe('executePlan', () => {
  it('moves auto-renamed documents', async () => {
    const source = writeFile(dir, 'in/a.pdf', 'scan');

    const [result] = await executePlan([entry({ source_path: source })], emptyReport());

    expect(result.status).toBe('renamed');
    expect(result.message).toBe('renamed to contrato_123.pdf');
    expect(fs.existsSync(source)).toBe(false);
    expect(fs.readFileSync(path.join(dir, 'out', 'contrato_123.pdf'), 'utf-8')).toBe('scan');
  });

  it('never overwrites an existing target', async () => {
    const source = writeFile(dir, 'in/a.pdf', 'new scan');
    const target = writeFile(dir, 'out/contrato_123.pdf', 'old scan');

    const [result] = await executePlan([entry({ source_path: source, target_path: target })], emptyReport());

    expect(result.status).toBe('skipped');
    expect(fs.readFileSync(target, 'utf-8')).toBe('old scan');
    expect(fs.existsSync(source)).toBe(true);
  });

  it('leaves a document that already has its name', async () => {
    const source = writeFile(dir, 'out/contrato_123.pdf', 'scan');

    const [result] = await executePlan([entry({ source_path: source, target_path: source })], emptyReport());

    expect(result).toMatchObject({ status: 'unchanged', message: 'already named' });
  });

  it('copies flagged documents and keeps the original', async () => {
    const source = writeFile(dir, 'in/a.pdf', 'scan');
    const target = path.join(dir, 'out', '_pendentes', 'a.pdf');

    const [result] = await executePlan(
      [entry({ source_path: source, target_path: target, file_name: 'a.pdf', decision: 'FLAGGED_FOR_REVIEW', action: 'copy' })],
      emptyReport()
    );

    expect(result).toMatchObject({ status: 'copied', message: 'copied for review as a.pdf' });
    expect(fs.existsSync(source)).toBe(true);
    expect(fs.readFileSync(target, 'utf-8')).toBe('scan');
    expect(fs.existsSync(reviewNotePath(target))).toBe(false);
  });

  it('reports a copy as copied when a stale review note is in the way', async () => {
    const source = writeFile(dir, 'in/a.pdf', 'scan');
    const target = path.join(dir, 'out', '_pendentes', 'a.pdf');
    const staleNote = writeFile(dir, 'out/_pendentes/a.pdf.md', 'old note');
    const recorder = new AuditRecorder('batch-1');
    recorder.append({
      document_id: 'doc-1',
      source_path: source,
      ocr: null,
      candidates: [],
      context: null,
      proposed_name: null,
      name: null,
      decision: 'FLAGGED_FOR_REVIEW',
      reason_code: 'below_auto_threshold',
      reason: 'overall confidence 0 < auto threshold 0.7',
      states: ['RECEIVED', 'FLAGGED'],
    });

    const [result] = await executePlan(
      [entry({ source_path: source, target_path: target, file_name: 'a.pdf', decision: 'FLAGGED_FOR_REVIEW', action: 'copy' })],
      recorder.finalize()
    );

    expect(result).toMatchObject({ status: 'copied', message: 'copied for review as a.pdf; review note already exists' });
    expect(fs.readFileSync(target, 'utf-8')).toBe('scan');
    expect(fs.readFileSync(staleNote, 'utf-8')).toBe('old note');
  });

  it('reports a move whose source could not be removed as partial', async () => {
    const source = writeFile(dir, 'in/a.pdf', 'scan');
    const target = path.join(dir, 'out', 'contrato_123.pdf');
    const unlink = jest
      .spyOn(fsPromises, 'unlink')
      .mockRejectedValueOnce(Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' }));

    try {
      const [result] = await executePlan([entry({ source_path: source })], emptyReport());

      expect(result).toMatchObject({
        status: 'partial',
        message: 'moved to contrato_123.pdf but source not removed: EACCES: permission denied',
      });
      expect(fs.readFileSync(target, 'utf-8')).toBe('scan');
      expect(fs.existsSync(source)).toBe(true);
    } finally {
      unlink.mockRestore();
    }
  });

  it('reports failed documents as unchanged', async () => {
    const [result] = await executePlan(
      [entry({ target_path: null, file_name: null, decision: 'FAILED', action: 'none' })],
      emptyReport()
    );
    expect(result).toMatchObject({ status: 'unchanged', message: 'no action' });
  });

  it('touches nothing in a dry run', async () => {
    const source = writeFile(dir, 'in/a.pdf', 'scan');

    const [result] = await executePlan([entry({ source_path: source })], emptyReport(), { dryRun: true });

    expect(result).toMatchObject({ status: 'planned', message: 'would rename to contrato_123.pdf' });
    expect(fs.existsSync(source)).toBe(true);
    expect(fs.existsSync(path.join(dir, 'out'))).toBe(false);
  });
});

describe('writeReport', () => {
  it('writes the JSON and CSV reports side by side', async () => {
    const report = emptyReport();
    const written = await writeReport(report, path.join(dir, 'reports', 'batch'));

    expect(written).toEqual({ json: path.join(dir, 'reports', 'batch.json'), csv: path.join(dir, 'reports', 'batch.csv') });
    expect(JSON.parse(fs.readFileSync(written.json, 'utf-8'))).toEqual(report);
    expect(fs.readFileSync(written.csv, 'utf-8').split('\n')[0].startsWith('source_path,new_name,status,')).toBe(true);
  });
});

describe('processRenameBatch', () => {
  function setUpInbox(): { inputDir: string; outputDir: string } {
    const inputDir = path.join(dir, 'in');
    writeFile(inputDir, 'scan-a.pdf', 'scan a');
    writeFile(inputDir, 'scan-a.txt', 'CONTRATO Nº 123 - Empresa XYZ - 10/03/2024\n');
    writeFile(inputDir, 'blank.pdf', 'blank');
    writeFile(inputDir, 'blank.txt', '   \n');
    writeFile(inputDir, 'missing.pdf', 'no text source');
    return { inputDir, outputDir: path.join(dir, 'out') };
  }

  function job(inputDir: string, outputDir: string, dryRun: boolean): RenameBatchJob {
    const policy = { template: '{document_type}_{reference_number}_{party}_{date}' };
    const policyPath = writeFile(dir, 'policy.json', JSON.stringify(policy));
    return {
      correlation_id: 'corr-1',
      batch_id: 'batch-1',
      input_dir: inputDir,
      output_dir: outputDir,
      policy_path: policyPath,
      dry_run: dryRun,
    };
  }

  it('renames, copies for review and writes the report', async () => {
    const { inputDir, outputDir } = setUpInbox();

    const { result, execution } = await processRenameBatch(job(inputDir, outputDir, false), {
      provider: new PlainTextOcrProvider(),
    });

    expect(result).toEqual({
      batch_id: 'batch-1',
      aborted: false,
      total: 3,
      auto_renamed: 1,
      flagged: 1,
      failed: 1,
      report_json: path.join(outputDir, 'renomeacoes.json'),
      report_csv: path.join(outputDir, 'renomeacoes.csv'),
    });
    expect(execution.map((e) => e.status)).toEqual(['copied', 'unchanged', 'renamed']);

    expect(fs.readFileSync(path.join(outputDir, 'contrato_123_empresa-xyz_2024-03-10.pdf'), 'utf-8')).toBe('scan a');
    expect(fs.existsSync(path.join(inputDir, 'scan-a.pdf'))).toBe(false);
    expect(fs.existsSync(path.join(inputDir, 'scan-a.txt'))).toBe(true);

    const reviewCopy = path.join(outputDir, '_pendentes', 'blank.pdf');
    expect(fs.readFileSync(reviewCopy, 'utf-8')).toBe('blank');
    expect(fs.readFileSync(reviewNotePath(reviewCopy), 'utf-8').startsWith(`# Review: ${path.join(inputDir, 'blank.pdf')}\n`)).toBe(true);
    expect(fs.existsSync(path.join(inputDir, 'blank.pdf'))).toBe(true);
    expect(fs.existsSync(path.join(inputDir, 'missing.pdf'))).toBe(true);
  });

  it('only plans in a dry run', async () => {
    const { inputDir, outputDir } = setUpInbox();

    const { result, execution } = await processRenameBatch(job(inputDir, outputDir, true), {
      provider: new PlainTextOcrProvider(),
    });

    expect(result.report_json).toBeNull();
    expect(execution.map((e) => e.status)).toEqual(['planned', 'unchanged', 'planned']);
    expect(fs.existsSync(outputDir)).toBe(false);
  });
});
