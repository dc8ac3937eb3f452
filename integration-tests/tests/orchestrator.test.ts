/**
 * Batch Orchestrator Tests
 *
 * End-to-end batches over an in-process OCR stub: decisions, collisions,
 * failures, cancellation, concurrency and determinism.
 */

import path from 'path';
import {
  DocumentLifecycle,
  MissingTemplateFieldError,
  OcrUnavailableError,
  buildNamingPolicy,
  canTransition,
  decide,
  isTerminalState,
  loadNamingPolicyFile,
  runBatch,
  terminalStateFor,
  validateBatchReport,
  validateDocument,
  type AuditRecord,
  type BatchReport,
  type OcrBlock,
  type RawOcrResult,
} from '@docnamer/shared';
import { StubOcrProvider, hangingResponse, sleep, type StubResponse } from './helpers';

const INBOX = path.join(path.sep, 'inbox');
const OUT = path.join(path.sep, 'out');
const SHORT_TEMPLATE = { template: '{document_type}_{reference_number}' };
const POLICY_FILE = path.join(__dirname, '../../config/naming-policy.json');

function contractText(number: number | string): string {
  return `CONTRATO Nº ${number} - Empresa XYZ - 10/03/2024`;
}

function inbox(name: string): string {
  return path.join(INBOX, name);
}

function recordFor(report: BatchReport, documentId: string): AuditRecord {
  const record = report.records.find((r) => r.document_id === documentId);
  if (!record) throw new Error(`no record for ${documentId}`);
  return record;
}

function fileNames(report: BatchReport): Array<string | null> {
  return report.records.map((r) => (r.name ? `${r.name.base_name}${r.name.extension}` : null));
}

describe('runBatch', () => {
  it('auto-renames a clearly identified contract', async () => {
    const provider = new StubOcrProvider({ [inbox('scan-a.pdf')]: contractText(123) });

    const { report, plan } = await runBatch([{ source_path: inbox('scan-a.pdf'), document_id: 'doc-a' }], {
      provider,
      targetDir: OUT,
    });
    const record = recordFor(report, 'doc-a');

    expect(record.decision).toBe('AUTO_RENAMED');
    expect(record.reason_code).toBe('auto_threshold_met');
    expect(record.reason).toBe('overall confidence 0.8 >= auto threshold 0.7');
    expect(record.name).toEqual({
      base_name: 'contrato_123_empresa-xyz_2024-03-10',
      extension: '.pdf',
      is_disambiguated: false,
    });
    expect(record.context?.fields.party?.value).toBe('Empresa XYZ');
    expect(record.context?.fields.date?.canonical).toBe('2024-03-10');
    expect(record.states).toEqual(['RECEIVED', 'NORMALIZED', 'EXTRACTED', 'RESOLVED', 'NAMED', 'AUTO_RENAMED']);
    expect(plan).toEqual([
      {
        document_id: 'doc-a',
        source_path: inbox('scan-a.pdf'),
        target_path: path.join(OUT, 'contrato_123_empresa-xyz_2024-03-10.pdf'),
        file_name: 'contrato_123_empresa-xyz_2024-03-10.pdf',
        decision: 'AUTO_RENAMED',
        action: 'rename',
      },
    ]);
    expect(report.summary).toEqual({ total: 1, AUTO_RENAMED: 1, FLAGGED_FOR_REVIEW: 0, FAILED: 0 });
    expect(validateBatchReport(report)).toEqual({ valid: true });
  });

  it('flags a document with no readable text for review', async () => {
    const provider = new StubOcrProvider({ [inbox('blank.pdf')]: '' });

    const { report, plan } = await runBatch([{ source_path: inbox('blank.pdf'), document_id: 'doc-b' }], {
      provider,
      targetDir: OUT,
    });
    const record = recordFor(report, 'doc-b');

    expect(record.decision).toBe('FLAGGED_FOR_REVIEW');
    expect(record.reason_code).toBe('below_auto_threshold');
    expect(record.reason).toBe(
      'overall confidence 0 < auto threshold 0.7; missing: document_type, reference_number, party, date'
    );
    expect(record.proposed_name?.base_name).toBe('UNKNOWN_UNKNOWN_UNKNOWN_UNKNOWN');
    expect(record.name).toBeNull();
    expect(record.states[record.states.length - 1]).toBe('FLAGGED');
    expect(plan[0]).toEqual({
      document_id: 'doc-b',
      source_path: inbox('blank.pdf'),
      target_path: path.join(OUT, '_pendentes', 'blank.pdf'),
      file_name: 'blank.pdf',
      decision: 'FLAGGED_FOR_REVIEW',
      action: 'copy',
    });
  });

  it('disambiguates documents that synthesize the same name', async () => {
    const provider = new StubOcrProvider({
      [inbox('c1.pdf')]: contractText(123),
      [inbox('c2.pdf')]: contractText(123),
    });

    const { report } = await runBatch(
      [
        { source_path: inbox('c1.pdf'), document_id: 'doc-c1' },
        { source_path: inbox('c2.pdf'), document_id: 'doc-c2' },
      ],
      { policy: SHORT_TEMPLATE, provider, targetDir: OUT }
    );

    expect(fileNames(report)).toEqual(['contrato_123.pdf', 'contrato_123_1.pdf']);
    expect(recordFor(report, 'doc-c2').proposed_name?.base_name).toBe('contrato_123');
    expect(recordFor(report, 'doc-c2').name?.is_disambiguated).toBe(true);
  });

  it('avoids names already present in the target directory', async () => {
    const provider = new StubOcrProvider({ [inbox('c1.pdf')]: contractText(123) });

    const { report } = await runBatch([{ source_path: inbox('c1.pdf') }], {
      policy: SHORT_TEMPLATE,
      provider,
      targetDir: OUT,
      existingNames: ['CONTRATO_123.PDF'],
    });

    expect(fileNames(report)).toEqual(['contrato_123_1.pdf']);
  });

  it('fails only the document whose OCR times out', async () => {
    const paths = [1, 2, 3, 4, 5].map((n) => inbox(`d${n}.pdf`));
    const responses: Record<string, StubResponse> = {};
    paths.forEach((p, i) => {
      responses[p] = i === 2 ? hangingResponse() : contractText(i + 1);
    });

    const { report, plan } = await runBatch(
      paths.map((p, i) => ({ source_path: p, document_id: `doc-d${i + 1}` })),
      { provider: new StubOcrProvider(responses), targetDir: OUT, ocrTimeoutMs: 50 }
    );
    const timedOut = recordFor(report, 'doc-d3');

    expect(timedOut.decision).toBe('FAILED');
    expect(timedOut.reason_code).toBe('ocr_timeout');
    expect(timedOut.reason).toBe('OCR call exceeded 50ms');
    expect(timedOut.states).toEqual(['RECEIVED', 'FAILED']);
    expect(plan[2]).toMatchObject({ document_id: 'doc-d3', target_path: null, file_name: null, action: 'none' });
    expect(report.summary).toEqual({ total: 5, AUTO_RENAMED: 4, FLAGGED_FOR_REVIEW: 0, FAILED: 1 });
    expect(report.aborted).toBe(false);
  });

  it('rejects a template with an undeclared field before any OCR call', async () => {
    const provider = new StubOcrProvider({ [inbox('e.pdf')]: contractText(1) });

    await expect(
      runBatch([{ source_path: inbox('e.pdf') }], {
        policy: { template: '{document_type}_{signer}' },
        provider,
        targetDir: OUT,
      })
    ).rejects.toBeInstanceOf(MissingTemplateFieldError);
    expect(provider.calls).toEqual([]);
  });

  it('selects a naming variant from the fields found', async () => {
    const provider = new StubOcrProvider({
      [inbox('mat.pdf')]: 'MAT 2023 da Fazenda Contendas - parceiro Radial Eucalipto',
    });

    const { report } = await runBatch([{ source_path: inbox('mat.pdf'), document_id: 'doc-m' }], {
      policy: loadNamingPolicyFile(POLICY_FILE),
      provider,
      targetDir: OUT,
    });
    const record = recordFor(report, 'doc-m');

    expect(record.context?.template).toBe('{issue_year}_{environmental_document}_{farm}_{partner}');
    expect(record.context?.overall_confidence).toBe(0.7);
    expect(record.decision).toBe('AUTO_RENAMED');
    expect(fileNames(report)).toEqual(['2023_mat_contendas_radial-eucalipto.pdf']);
  });

  it('names a contract after its business context hint', async () => {
    const source = inbox('ccv.pdf');
    const provider = new StubOcrProvider({ [source]: 'CCV PROM Nº 45 - Fazenda Boa Vista - 10/03/2024' });
    const policyWithHint = (contextHint: string) =>
      buildNamingPolicy({ ...loadNamingPolicyFile(POLICY_FILE), context_hint: contextHint });

    const market = await runBatch([{ source_path: source, document_id: 'doc-ccv' }], {
      policy: policyWithHint('auto'),
      provider,
      targetDir: OUT,
    });
    const funds = await runBatch([{ source_path: source, document_id: 'doc-ccv' }], {
      policy: policyWithHint('funds'),
      provider,
      targetDir: OUT,
    });

    expect(recordFor(market.report, 'doc-ccv')).toMatchObject({ decision: 'AUTO_RENAMED' });
    expect(recordFor(market.report, 'doc-ccv').context?.overall_confidence).toBe(0.75);
    expect(fileNames(market.report)).toEqual(['2024-03-10_ccv_45_prom_boa-vista.pdf']);

    const record = recordFor(funds.report, 'doc-ccv');
    expect(record.context?.template).toBe('{date}_{contract_type}_{reference_number}_{document_title}_{fund}_{spe}');
    expect(record.context?.overall_confidence).toBe(0);
    expect(record.decision).toBe('FLAGGED_FOR_REVIEW');
    expect(record.proposed_name?.base_name).toBe('2024-03-10_ccv_45_prom_UNKNOWN_UNKNOWN');
  });

  it('names a contract after fund and SPE in the funds context or when both are found', async () => {
    const source = inbox('cpr.pdf');
    const provider = new StubOcrProvider({ [source]: 'CPR TIP Nº 7 - 05/06/2023 - Fundo Terra Forte SPE Norte' });

    for (const contextHint of ['auto', 'market']) {
      const { report } = await runBatch([{ source_path: source, document_id: 'doc-cpr' }], {
        policy: buildNamingPolicy({ ...loadNamingPolicyFile(POLICY_FILE), context_hint: contextHint }),
        provider,
        targetDir: OUT,
      });

      expect(recordFor(report, 'doc-cpr').context?.overall_confidence).toBe(0.8);
      expect(fileNames(report)).toEqual(['2023-06-05_cpa_7_tip_terra-forte_norte.pdf']);
    }
  });

  it('names an environmental document of the funds context after fund and SPE', async () => {
    const provider = new StubOcrProvider({ [inbox('itr.pdf')]: 'ITR 2022 - Fundo Terra Forte SPE Norte' });

    const { report } = await runBatch([{ source_path: inbox('itr.pdf'), document_id: 'doc-itr' }], {
      policy: loadNamingPolicyFile(POLICY_FILE),
      provider,
      targetDir: OUT,
    });

    expect(recordFor(report, 'doc-itr').context?.overall_confidence).toBe(0.7);
    expect(fileNames(report)).toEqual(['2022_itr_terra-forte_norte.pdf']);
  });

  it('does not give a document in the target directory a name claimed earlier in the batch', async () => {
    const current = path.join(OUT, 'contrato_1.pdf');
    const provider = new StubOcrProvider({ [inbox('x.pdf')]: contractText(1), [current]: contractText(1) });

    const { plan } = await runBatch(
      [
        { source_path: inbox('x.pdf'), document_id: 'doc-x' },
        { source_path: current, document_id: 'doc-current' },
      ],
      { policy: SHORT_TEMPLATE, provider, targetDir: OUT }
    );

    expect(plan.map((p) => p.target_path)).toEqual([path.join(OUT, 'contrato_1_1.pdf'), current]);
  });

  it('flags a document whose OCR result holds no blocks and continues', async () => {
    const paths = [1, 2, 3, 4, 5].map((n) => inbox(`b${n}.pdf`));
    const responses: Record<string, StubResponse> = {};
    paths.forEach((p, i) => {
      responses[p] =
        i === 1
          ? async (sourcePath): Promise<RawOcrResult> => JSON.parse(JSON.stringify({ source_path: sourcePath, engine: 'stub' }))
          : contractText(i + 1);
    });

    const { report } = await runBatch(
      paths.map((p, i) => ({ source_path: p, document_id: `doc-b${i + 1}` })),
      { provider: new StubOcrProvider(responses), targetDir: OUT }
    );
    const empty = recordFor(report, 'doc-b2');

    expect(empty.decision).toBe('FLAGGED_FOR_REVIEW');
    expect(empty.context?.overall_confidence).toBe(0);
    expect(empty.ocr?.blocks).toEqual([]);
    expect(report.summary).toEqual({ total: 5, AUTO_RENAMED: 4, FLAGGED_FOR_REVIEW: 1, FAILED: 0 });
    expect(report.aborted).toBe(false);
  });

  it('fails only the document a pipeline stage throws on', async () => {
    class CorruptBlock implements OcrBlock {
      get text(): string {
        throw new Error('corrupt OCR block');
      }
    }
    const paths = [1, 2, 3].map((n) => inbox(`p${n}.pdf`));
    const responses: Record<string, StubResponse> = {
      [paths[0]]: contractText(1),
      [paths[1]]: async (sourcePath) => ({ source_path: sourcePath, engine: 'stub', blocks: [new CorruptBlock()] }),
      [paths[2]]: contractText(3),
    };

    const { report, plan } = await runBatch(
      paths.map((p, i) => ({ source_path: p, document_id: `doc-p${i + 1}` })),
      { provider: new StubOcrProvider(responses), targetDir: OUT }
    );

    expect(recordFor(report, 'doc-p2')).toMatchObject({
      decision: 'FAILED',
      reason_code: 'pipeline_error',
      reason: 'Pipeline error: corrupt OCR block',
      states: ['RECEIVED', 'FAILED'],
    });
    expect(plan[1].action).toBe('none');
    expect(recordFor(report, 'doc-p1').decision).toBe('AUTO_RENAMED');
    expect(recordFor(report, 'doc-p3').decision).toBe('AUTO_RENAMED');
    expect(report.aborted).toBe(false);
    expect(validateBatchReport(report)).toEqual({ valid: true });
  });

  it('lets a document already in the target directory keep its name', async () => {
    const archive = path.join(path.sep, 'archive');
    const source = path.join(archive, 'contrato_123.pdf');
    const provider = new StubOcrProvider({ [source]: contractText(123) });

    const { report, plan } = await runBatch([{ source_path: source }], {
      policy: SHORT_TEMPLATE,
      provider,
      targetDir: archive,
      existingNames: ['contrato_123.pdf'],
    });

    expect(fileNames(report)).toEqual(['contrato_123.pdf']);
    expect(plan[0].target_path).toBe(source);
  });

  it('fails documents below the review floor', async () => {
    const provider = new StubOcrProvider({ [inbox('blank.pdf')]: '' });

    const { report, plan } = await runBatch([{ source_path: inbox('blank.pdf'), document_id: 'doc-f' }], {
      policy: { review_floor: 0.5 },
      provider,
      targetDir: OUT,
    });
    const record = recordFor(report, 'doc-f');

    expect(record.decision).toBe('FAILED');
    expect(record.reason_code).toBe('below_review_floor');
    expect(record.reason).toBe(
      'overall confidence 0 < review floor 0.5; missing: document_type, reference_number, party, date'
    );
    expect(record.proposed_name?.base_name).toBe('UNKNOWN_UNKNOWN_UNKNOWN_UNKNOWN');
    expect(plan[0].action).toBe('none');
  });

  it('records OCR errors per document', async () => {
    const provider = new StubOcrProvider({ [inbox('jam.pdf')]: new Error('scanner jammed') });

    const { report } = await runBatch(
      [
        { source_path: inbox('jam.pdf'), document_id: 'doc-jam' },
        { source_path: inbox('missing.pdf'), document_id: 'doc-missing' },
      ],
      { provider, targetDir: OUT }
    );

    expect(recordFor(report, 'doc-jam')).toMatchObject({
      decision: 'FAILED',
      reason_code: 'ocr_error',
      reason: 'OCR failed: scanner jammed',
    });
    expect(recordFor(report, 'doc-missing')).toMatchObject({
      decision: 'FAILED',
      reason_code: 'ocr_unavailable',
      reason: `No stub response for ${inbox('missing.pdf')}`,
    });
  });

  it('commits in input order whatever order OCR finishes in', async () => {
    const paths = [1, 2, 3, 4, 5].map((n) => inbox(`o${n}.pdf`));
    let active = 0;
    let peak = 0;
    const responses: Record<string, StubResponse> = {};
    paths.forEach((p, i) => {
      responses[p] = async (sourcePath) => {
        active++;
        peak = Math.max(peak, active);
        await sleep(40 - i * 10);
        active--;
        return { source_path: sourcePath, engine: 'stub', blocks: [{ text: contractText(i + 1) }] };
      };
    });

    const { report, plan } = await runBatch(
      paths.map((p, i) => ({ source_path: p, document_id: `doc-o${i + 1}` })),
      { provider: new StubOcrProvider(responses), targetDir: OUT, concurrency: 2 }
    );

    expect(peak).toBe(2);
    expect(report.records.map((r) => r.document_id)).toEqual(['doc-o1', 'doc-o2', 'doc-o3', 'doc-o4', 'doc-o5']);
    expect(plan.map((p) => p.file_name)).toEqual([1, 2, 3, 4, 5].map((n) => `contrato_${n}_empresa-xyz_2024-03-10.pdf`));
  });

  it('gives the unsuffixed name to the first document in input order', async () => {
    const paths = [1, 2, 3].map((n) => inbox(`s${n}.pdf`));
    const responses: Record<string, StubResponse> = {};
    paths.forEach((p, i) => {
      responses[p] = async (sourcePath) => {
        await sleep(30 - i * 10);
        return { source_path: sourcePath, engine: 'stub', blocks: [{ text: contractText(123) }] };
      };
    });

    const { report } = await runBatch(
      paths.map((p) => ({ source_path: p })),
      { policy: SHORT_TEMPLATE, provider: new StubOcrProvider(responses), targetDir: OUT, concurrency: 3 }
    );

    expect(fileNames(report)).toEqual(['contrato_123.pdf', 'contrato_123_1.pdf', 'contrato_123_2.pdf']);
  });

  it('produces the same decisions for the same inputs', async () => {
    const provider = new StubOcrProvider({
      [inbox('r1.pdf')]: contractText(123),
      [inbox('r2.pdf')]: '',
      [inbox('r3.pdf')]: contractText(123),
    });
    const documents = [1, 2, 3].map((n) => ({ source_path: inbox(`r${n}.pdf`), document_id: `doc-r${n}` }));
    const summary = (report: BatchReport) =>
      report.records.map((r) => [r.document_id, r.decision, r.reason, r.name, r.proposed_name]);

    const first = await runBatch(documents, { provider, targetDir: OUT });
    const second = await runBatch(documents, { provider, targetDir: OUT });

    expect(summary(second.report)).toEqual(summary(first.report));
    expect(second.plan).toEqual(first.plan);
  });

  it('stops on cancellation and fails what is left', async () => {
    const provider = new StubOcrProvider({
      [inbox('x1.pdf')]: contractText(1),
      [inbox('x2.pdf')]: hangingResponse(),
      [inbox('x3.pdf')]: contractText(3),
    });
    const controller = new AbortController();

    const pending = runBatch(
      [1, 2, 3].map((n) => ({ source_path: inbox(`x${n}.pdf`), document_id: `doc-x${n}` })),
      { provider, targetDir: OUT, concurrency: 1, signal: controller.signal }
    );
    await sleep(20);
    controller.abort(new Error('operator cancelled'));
    const { report } = await pending;

    expect(report.aborted).toBe(true);
    expect(report.abort_reason).toBe('operator cancelled');
    expect(recordFor(report, 'doc-x1').decision).toBe('AUTO_RENAMED');
    for (const id of ['doc-x2', 'doc-x3']) {
      expect(recordFor(report, id)).toMatchObject({
        decision: 'FAILED',
        reason_code: 'batch_aborted',
        reason: 'Batch aborted: operator cancelled',
      });
    }
    expect(provider.calls).toEqual([inbox('x1.pdf'), inbox('x2.pdf')]);
  });

  it('makes no OCR call when cancelled before starting', async () => {
    const provider = new StubOcrProvider({ [inbox('x1.pdf')]: contractText(1) });
    const controller = new AbortController();
    controller.abort(new Error('shutdown'));

    const { report } = await runBatch([{ source_path: inbox('x1.pdf') }], {
      provider,
      targetDir: OUT,
      signal: controller.signal,
    });

    expect(report.aborted).toBe(true);
    expect(report.records[0].reason_code).toBe('batch_aborted');
    expect(provider.calls).toEqual([]);
  });

  it('aborts the batch when no collision suffix is left', async () => {
    const responses: Record<string, StubResponse> = {};
    for (const n of [1, 2, 3]) responses[inbox(`k${n}.pdf`)] = contractText(123);
    responses[inbox('k4.pdf')] = contractText(456);

    const { report } = await runBatch(
      [1, 2, 3, 4].map((n) => ({ source_path: inbox(`k${n}.pdf`), document_id: `doc-k${n}` })),
      {
        policy: { ...SHORT_TEMPLATE, max_collision_attempts: 1 },
        provider: new StubOcrProvider(responses),
        targetDir: OUT,
      }
    );
    const reason = 'No free name for "contrato_123.pdf" after 1 attempts';

    expect(report.aborted).toBe(true);
    expect(report.abort_reason).toBe(reason);
    expect(fileNames(report)).toEqual(['contrato_123.pdf', 'contrato_123_1.pdf', null, null]);
    expect(recordFor(report, 'doc-k3').reason).toBe(`Batch aborted: ${reason}`);
    expect(recordFor(report, 'doc-k4').reason_code).toBe('batch_aborted');
    expect(report.summary).toEqual({ total: 4, AUTO_RENAMED: 2, FLAGGED_FOR_REVIEW: 0, FAILED: 2 });
  });
});

describe('decide', () => {
  const policy = buildNamingPolicy({ review_floor: 0.5 });

  it('compares the overall confidence with both thresholds', () => {
    expect(decide(0.7, policy).decision).toBe('AUTO_RENAMED');
    expect(decide(0.69, policy).decision).toBe('FLAGGED_FOR_REVIEW');
    expect(decide(0.5, policy).decision).toBe('FLAGGED_FOR_REVIEW');
    expect(decide(0.49, policy)).toEqual({ decision: 'FAILED', reasonCode: 'below_review_floor' });
  });
});

describe('validateDocument', () => {
  it('previews the name without deciding', async () => {
    const provider = new StubOcrProvider({ [inbox('v.pdf')]: contractText(123) });
    const preview = await validateDocument(inbox('v.pdf'), { provider });

    expect(preview.name.base_name).toBe('contrato_123_empresa-xyz_2024-03-10');
    expect(preview.template).toBe('{document_type}_{reference_number}_{party}_{date}');
    expect(preview.context.overall_confidence).toBe(0.8);
    expect(preview.text.display).toBe('CONTRATO No 123 - Empresa XYZ - 10/03/2024');
  });

  it('surfaces OCR failures', async () => {
    await expect(validateDocument(inbox('v.pdf'), { provider: new StubOcrProvider({}) })).rejects.toBeInstanceOf(
      OcrUnavailableError
    );
  });
});

describe('DocumentLifecycle', () => {
  it('walks the pipeline states', () => {
    const lifecycle = new DocumentLifecycle();
    lifecycle.advance('NORMALIZED').advance('EXTRACTED').advance('RESOLVED').advance('NAMED');
    lifecycle.advance(terminalStateFor('FLAGGED_FOR_REVIEW'));

    expect(lifecycle.states).toEqual(['RECEIVED', 'NORMALIZED', 'EXTRACTED', 'RESOLVED', 'NAMED', 'FLAGGED']);
    expect(lifecycle.isTerminal).toBe(true);
  });

  it('rejects skipped and post-terminal transitions', () => {
    expect(() => new DocumentLifecycle().advance('NAMED')).toThrow(
      'Invalid document state transition: RECEIVED -> NAMED'
    );
    expect(canTransition('AUTO_RENAMED', 'FAILED')).toBe(false);
    expect(canTransition('EXTRACTED', 'FAILED')).toBe(true);
    expect(isTerminalState('FAILED')).toBe(true);
    expect(isTerminalState('NAMED')).toBe(false);
  });
});
