/**
 * File formats that get a diffable text companion, and how natively-edited
 * Drive documents are exported before they are written to the repository.
 */
import path from 'node:path';

export type ExtractionFormat = 'docx' | 'pdf' | 'csv';

export interface NativeExport {
  format: ExtractionFormat;
  /** Extension appended to the document name, e.g. `.docx` */
  extension: string;
  /** MIME type requested from the export endpoint */
  exportMimeType: string;
}

export const NATIVE_EXPORTS: Readonly<Record<string, NativeExport>> = {
  'application/vnd.google-apps.document': {
    format: 'docx',
    extension: '.docx',
    exportMimeType: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
  },
  'application/vnd.google-apps.spreadsheet': {
    format: 'csv',
    extension: '.csv',
    exportMimeType: 'text/csv',
  },
  'application/vnd.google-apps.presentation': {
    format: 'pdf',
    extension: '.pdf',
    exportMimeType: 'application/pdf',
  },
};

const EXTRACTABLE_EXTENSIONS: Readonly<Record<string, ExtractionFormat>> = {
  '.docx': 'docx',
  '.pdf': 'pdf',
  '.csv': 'csv',
};

export function nativeExportFor(mimeType: string): NativeExport | undefined {
  return Object.hasOwn(NATIVE_EXPORTS, mimeType) ? NATIVE_EXPORTS[mimeType] : undefined;
}

export function isNativeDocument(mimeType: string): boolean {
  return nativeExportFor(mimeType) !== undefined;
}

/**
 * Which extractor applies to a file, or null when it has no text companion.
 */
export function extractionFormat(name: string, mimeType: string): ExtractionFormat | null {
  const native = nativeExportFor(mimeType);
  if (native) return native.format;
  const ext = path.posix.extname(name.toLowerCase());
  return EXTRACTABLE_EXTENSIONS[ext] ?? null;
}

/**
 * Name of the file as written to the repository. Natively-edited documents
 * carry their export extension (`Plan` becomes `Plan.docx`).
 */
export function exportedName(name: string, mimeType: string): string {
  const native = nativeExportFor(mimeType);
  return native ? name + native.extension : name;
}

/**
 * Name of the derived text companion: `.md` for word-processing documents,
 * `.txt` for PDFs and CSVs, appended to the exported name.
 */
export function derivedTextName(name: string, mimeType: string): string | null {
  const format = extractionFormat(name, mimeType);
  if (!format) return null;
  const suffix = format === 'docx' ? '.md' : '.txt';
  return exportedName(name, mimeType) + suffix;
}

/**
 * Replace the last segment of a relative path.
 */
export function siblingPath(relPath: string, fileName: string): string {
  const dir = path.posix.dirname(relPath);
  return dir === '.' ? fileName : `${dir}/${fileName}`;
}

export function originalPathFor(relPath: string, name: string, mimeType: string): string {
  return siblingPath(relPath, exportedName(name, mimeType));
}

export function extractedPathFor(relPath: string, name: string, mimeType: string): string | null {
  const derived = derivedTextName(name, mimeType);
  return derived ? siblingPath(relPath, derived) : null;
}
