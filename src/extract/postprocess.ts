/**
 * Clean-up passes over pandoc markdown so that diffs stay readable.
 */

export function postprocess(markdown: string): string {
  let result = markdown;
  result = stripFencedDivs(result);
  result = cleanUnderlineSpans(result);
  result = simpleTablesToPipe(result);
  return result;
}

/**
 * Remove `:::` fenced div wrappers, keeping their content.
 */
export function stripFencedDivs(text: string): string {
  return text
    .replace(/^:::\s*\{[^}]*\}\s*$\n?/gm, '')
    .replace(/^:::\s*$\n?/gm, '');
}

/**
 * `[text]{.underline}` becomes `<u>text</u>`.
 */
export function cleanUnderlineSpans(text: string): string {
  return text.replace(/\[([^\]]+)\]\{\.underline\}/g, '<u>$1</u>');
}

interface ColumnSpan {
  start: number;
  end: number;
}

function isSimpleTableSeparator(line: string): boolean {
  const parts = line.trim().split(/\s+/).filter(p => p.length > 0);
  if (parts.length < 2) return false;
  return parts.every(p => /^-{2,}$/.test(p));
}

function columnSpans(separator: string): ColumnSpan[] {
  const spans: ColumnSpan[] = [];
  for (const match of separator.matchAll(/-{2,}/g)) {
    const start = match.index ?? 0;
    spans.push({ start, end: start + match[0].length });
  }
  return spans;
}

function extractCells(line: string, spans: ColumnSpan[]): string[] {
  return spans.map(({ start, end }) => line.slice(start, end).trim());
}

/**
 * Convert pandoc simple tables (header, dashed separator, rows until a blank
 * line) into pipe tables.
 */
export function simpleTablesToPipe(text: string): string {
  const lines = text.split('\n');
  const result: string[] = [];
  let i = 0;

  while (i < lines.length) {
    const line = lines[i];
    if (i > 0 && isSimpleTableSeparator(line)) {
      const spans = columnSpans(line);
      const header = lines[i - 1];
      if (result.length > 0 && result[result.length - 1] === header) {
        result.pop();
      }

      const headerCells = extractCells(header, spans);
      result.push('| ' + headerCells.join(' | ') + ' |');
      result.push('| ' + headerCells.map(c => '-'.repeat(c.length)).join(' | ') + ' |');

      i++;
      while (i < lines.length && lines[i].trim()) {
        result.push('| ' + extractCells(lines[i], spans).join(' | ') + ' |');
        i++;
      }
      continue;
    }
    result.push(line);
    i++;
  }

  return result.join('\n');
}
