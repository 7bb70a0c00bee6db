/**
 * Report files on disk.
 *
 * Reports are written as UTF-8. Reviewed reports often come back saved by
 * Windows editors in the Central European code page, so reading falls back
 * to windows-1250 when the bytes are not valid UTF-8.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileTimestamp } from '../utils/timestamp.js';

export type ReportKind =
  | 'product_variants'
  | 'product_differences'
  | 'variant_assignment_summary'
  | 'merge_summary';

export function reportFileName(kind: ReportKind, now: Date = new Date()): string {
  return `${kind}_${fileTimestamp(now)}.txt`;
}

export function saveReport(reportDir: string, kind: ReportKind, content: string, now: Date = new Date()): string {
  fs.mkdirSync(reportDir, { recursive: true });
  const filePath = path.join(reportDir, reportFileName(kind, now));
  fs.writeFileSync(filePath, content, 'utf-8');
  console.log(`📝 [reports] Saved ${filePath}`);
  return filePath;
}

export function decodeReportBytes(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch {
    return new TextDecoder('windows-1250').decode(bytes);
  }
}

/** Report text, or null when the file does not exist */
export function readReportText(filePath: string): string | null {
  if (!fs.existsSync(filePath)) {
    console.warn(`⚠️  [reports] Report not found: ${filePath}`);
    return null;
  }
  let text = decodeReportBytes(fs.readFileSync(filePath));
  if (text.charCodeAt(0) === 0xFEFF) text = text.slice(1);
  return text;
}
