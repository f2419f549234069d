/**
 * Diffable text extraction from binary document formats.
 *
 * - docx → markdown via pandoc (tracked changes kept)
 * - pdf  → text via pdftotext, one section per page
 * - csv  → markdown pipe table
 */
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { parse } from 'csv-parse/sync';
import { runCommand, type CommandRunner } from '../utils/exec.js';
import { extractionFormat } from './formats.js';
import { postprocess } from './postprocess.js';

export type ExtractionResult =
  | { status: 'ok'; text: string }
  | { status: 'not-applicable' }
  | { status: 'failed'; reason: string };

export type TextExtractor = (content: Buffer, name: string, mimeType: string) => Promise<ExtractionResult>;

export interface ExtractorOptions {
  runner?: CommandRunner;
  pandocPath?: string;
  pdftotextPath?: string;
  timeoutMs?: number;
}

const SCANNED_WARNING = 'WARNING: Some pages contain no extractable text (scanned/image-only).';

/**
 * Format rows as a markdown pipe table. Ragged rows are padded and every
 * column is at least three characters wide.
 */
export function formatTable(rows: ReadonlyArray<ReadonlyArray<string | null>>): string {
  if (rows.length === 0) return '';

  const cleaned = rows.map(row => row.map(cell => cell ?? ''));
  const columnCount = cleaned.reduce((max, row) => Math.max(max, row.length), 0);

  const widths: number[] = new Array<number>(columnCount).fill(3);
  for (const row of cleaned) {
    while (row.length < columnCount) row.push('');
    row.forEach((cell, c) => {
      widths[c] = Math.max(widths[c], cell.length);
    });
  }

  const formatRow = (row: string[]) => '| ' + row.map((cell, i) => cell.padEnd(widths[i])).join(' | ') + ' |';

  const lines = [formatRow(cleaned[0])];
  lines.push('| ' + widths.map(w => '-'.repeat(w)).join(' | ') + ' |');
  for (const row of cleaned.slice(1)) {
    lines.push(formatRow(row));
  }
  return lines.join('\n');
}

export function csvToMarkdown(content: Buffer): string {
  const rows: string[][] = parse(content.toString('utf-8'), {
    relax_column_count: true,
    skip_empty_lines: true,
    bom: true,
  });
  return formatTable(rows);
}

/**
 * Lay out pdftotext output (pages separated by form feeds) with page markers,
 * flagging pages that had no text layer.
 */
export function formatPdfPages(raw: string): string {
  const pages = raw.split('\f');
  // pdftotext terminates the last page with a form feed too
  if (pages.length > 1 && pages[pages.length - 1].trim() === '') {
    pages.pop();
  }

  const parts: string[] = [];
  let hasEmptyPages = false;

  pages.forEach((page, i) => {
    if (i > 0) parts.push(`\n--- Page ${i + 1} ---\n`);
    const text = page.replace(/\s+$/, '');
    if (text.trim()) {
      parts.push(text);
    } else {
      hasEmptyPages = true;
      parts.push(`[Page ${i + 1}: no extractable text (possibly scanned)]`);
    }
  });

  const result = parts.join('\n');
  return hasEmptyPages ? `${SCANNED_WARNING}\n\n${result}` : result;
}

async function withTempFile<T>(content: Buffer, extension: string, fn: (file: string) => Promise<T>): Promise<T> {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'drivegit-extract-'));
  const file = path.join(dir, `source${extension}`);
  try {
    fs.writeFileSync(file, content);
    return await fn(file);
  } finally {
    fs.rmSync(dir, { recursive: true, force: true });
  }
}

export function createTextExtractor(options: ExtractorOptions = {}): TextExtractor {
  const {
    runner = runCommand,
    pandocPath = 'pandoc',
    pdftotextPath = 'pdftotext',
    timeoutMs = 120_000,
  } = options;

  async function docxToMarkdown(content: Buffer): Promise<string> {
    return withTempFile(content, '.docx', async (file) => {
      const { stdout } = await runner(
        pandocPath,
        [file, '--from=docx', '--to=markdown', '--track-changes=all', '--wrap=none'],
        { timeoutMs },
      );
      return postprocess(stdout.toString('utf-8'));
    });
  }

  async function pdfToText(content: Buffer): Promise<string> {
    return withTempFile(content, '.pdf', async (file) => {
      const { stdout } = await runner(pdftotextPath, ['-layout', '-enc', 'UTF-8', file, '-'], { timeoutMs });
      return formatPdfPages(stdout.toString('utf-8'));
    });
  }

  return async (content, name, mimeType) => {
    const format = extractionFormat(name, mimeType);
    if (!format) return { status: 'not-applicable' };

    try {
      switch (format) {
        case 'docx':
          return { status: 'ok', text: await docxToMarkdown(content) };
        case 'pdf':
          return { status: 'ok', text: await pdfToText(content) };
        case 'csv':
          return { status: 'ok', text: csvToMarkdown(content) };
      }
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      return { status: 'failed', reason };
    }
  };
}
