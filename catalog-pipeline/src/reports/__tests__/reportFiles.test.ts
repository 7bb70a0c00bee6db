import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { decodeReportBytes, readReportText, reportFileName, saveReport } from '../reportFiles.js';

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'reports-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('report files', () => {
  const now = new Date(2026, 9, 18, 14, 5, 9);

  test('names files by kind and local timestamp', () => {
    expect(reportFileName('product_variants', now)).toBe('product_variants_20261018_140509.txt');
  });

  test('saves into a new directory and reads the text back', () => {
    const target = path.join(dir, 'nested');
    const filePath = saveReport(target, 'merge_summary', 'Stôl – 400 mm\n', now);

    expect(filePath).toBe(path.join(target, 'merge_summary_20261018_140509.txt'));
    expect(readReportText(filePath)).toBe('Stôl – 400 mm\n');
  });

  test('strips a byte order mark', () => {
    const filePath = path.join(dir, 'edited.txt');
    fs.writeFileSync(filePath, '\uFEFFGroup #1', 'utf-8');
    expect(readReportText(filePath)).toBe('Group #1');
  });

  test('falls back to windows-1250 for non-UTF-8 bytes', () => {
    expect(decodeReportBytes(Uint8Array.from([0x53, 0x74, 0xf4, 0x6c]))).toBe('Stôl');
  });

  test('a missing report reads as null', () => {
    expect(readReportText(path.join(dir, 'missing.txt'))).toBeNull();
  });
});
