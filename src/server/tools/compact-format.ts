/**
 * Compact and markdown serialization helpers for MCP tool responses.
 */

export type CompactField = string | number | boolean | null | undefined;
export type CompactRecord = Record<string, CompactField>;

export type ResponseFormat = 'compact' | 'markdown';

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
}

const TRUNCATION_MARKER = '\n...[truncated]';

function sanitizeCompactValue(value: CompactField): string {
  if (value == null) return '';
  return String(value)
    .replaceAll('\t', '    ')
    .replaceAll('\r\n', '\\n')
    .replaceAll('\n', '\\n')
    .replaceAll('\r', '\\n');
}

function sanitizeMarkdownCell(value: CompactField): string {
  return sanitizeCompactValue(value).replaceAll('|', '\\|');
}

function columnsOf(records: CompactRecord[], columns?: string[]): string[] {
  if (columns && columns.length > 0) return columns;
  const keys = new Set<string>();
  for (const record of records) {
    for (const key of Object.keys(record)) keys.add(key);
  }
  return Array.from(keys);
}

/**
 * Render records as TSV: header row + one row per record.
 */
export function formatCompactTable(
  records: CompactRecord[],
  opts?: { maxBytes?: number; columns?: string[] }
): string {
  const columns = columnsOf(records, opts?.columns);
  if (columns.length === 0) return '';

  const rows = records.map(record => columns.map(column => sanitizeCompactValue(record[column])).join('\t'));
  const output = [columns.join('\t'), ...rows].join('\n');

  return opts?.maxBytes != null ? enforceOutputBudget(output, opts.maxBytes) : output;
}

/**
 * Render records as a GitHub-flavoured markdown table.
 */
export function formatMarkdownTable(
  records: CompactRecord[],
  opts?: { maxBytes?: number; columns?: string[] }
): string {
  const columns = columnsOf(records, opts?.columns);
  if (columns.length === 0) return '';

  const lines = [
    `| ${columns.join(' | ')} |`,
    `| ${columns.map(() => '---').join(' | ')} |`,
    ...records.map(record => `| ${columns.map(column => sanitizeMarkdownCell(record[column])).join(' | ')} |`),
  ];
  const output = lines.join('\n');

  return opts?.maxBytes != null ? enforceOutputBudget(output, opts.maxBytes) : output;
}

export function formatTable(
  format: ResponseFormat,
  records: CompactRecord[],
  opts: { columns: string[] }
): string {
  if (records.length === 0) {
    return format === 'compact' ? opts.columns.join('\t') : '_none_';
  }
  return format === 'compact' ? formatCompactTable(records, opts) : formatMarkdownTable(records, opts);
}

/**
 * Enforce a UTF-8 byte budget with deterministic truncation marker.
 */
export function enforceOutputBudget(output: string, maxBytes: number): string {
  if (maxBytes <= 0) return '';

  const markerBytes = Buffer.byteLength(TRUNCATION_MARKER, 'utf8');
  if (Buffer.byteLength(output, 'utf8') <= maxBytes) {
    return output;
  }

  if (markerBytes >= maxBytes) {
    return TRUNCATION_MARKER.slice(0, maxBytes);
  }

  const allowedBytes = maxBytes - markerBytes;
  let truncated = Buffer.from(output, 'utf8').toString('utf8', 0, allowedBytes);

  // A multi-byte character cut in half decodes to a wider replacement char
  while (Buffer.byteLength(truncated, 'utf8') > allowedBytes) {
    truncated = truncated.slice(0, -1);
  }

  return `${truncated}${TRUNCATION_MARKER}`;
}

export function textResponse(text: string, isError = false): ToolResponse {
  return isError ? { content: [{ type: 'text', text }], isError: true } : { content: [{ type: 'text', text }] };
}
