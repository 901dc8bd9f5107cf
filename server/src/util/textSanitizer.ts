// Sanitizer for column headers and text cells coming from uploaded sheets.
// Spreadsheet exports carry BOMs, full-width spaces and stray control chars.

function normalizeAndClean(input: string): string {
  return input
    .normalize('NFC')
    .replace(/\uFEFF/g, '')
    .replace(/\uFFFD/g, '')
    .replace(/[\u0000-\u0008\u000B\u000C\u000E-\u001F]/g, '')
    .replace(/[\s\u3000]+/g, ' ')
    .trim();
}

// Display form of a header: cleaned but case preserved.
export function sanitizeHeader(header: string | null | undefined): string {
  return normalizeAndClean(header ?? '');
}

// Comparison key used by alias matching (case-insensitive).
export function headerKey(header: string | null | undefined): string {
  return sanitizeHeader(header).toLowerCase();
}

// Text cell → trimmed string, or null when the cell is blank.
export function sanitizeText(value: unknown): string | null {
  if (value == null) return null;
  if (typeof value === 'number') {
    return Number.isFinite(value) ? String(value) : null;
  }
  if (typeof value === 'boolean') return String(value);
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  if (typeof value !== 'string') return null;
  const cleaned = normalizeAndClean(value);
  if (!cleaned) return null;
  const lowered = cleaned.toLowerCase();
  if (lowered === 'nan' || lowered === 'null' || lowered === 'none') {
    return null;
  }
  return cleaned;
}
