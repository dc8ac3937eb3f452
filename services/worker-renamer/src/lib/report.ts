/**
 * Report output: JSON (full audit trail) and CSV (one row per document).
 */

import fs from 'fs/promises';
import path from 'path';
import { renderReportCsv, renderReportJson, type BatchReport } from '@docnamer/shared';

export const DEFAULT_REPORT_NAME = 'renomeacoes';

export interface WrittenReport {
  json: string;
  csv: string;
}

export async function writeReport(report: BatchReport, basePath: string): Promise<WrittenReport> {
  const json = `${basePath}.json`;
  const csv = `${basePath}.csv`;
  await fs.mkdir(path.dirname(json), { recursive: true });
  await fs.writeFile(json, renderReportJson(report), 'utf-8');
  await fs.writeFile(csv, renderReportCsv(report), 'utf-8');
  return { json, csv };
}
