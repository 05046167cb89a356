// lib/hsCode.ts
// Pull Harmonized System codes out of free-form LLM answers

// "8471.30", "847130" or an 8-digit national subheading like "84713000"
const HS_CODE_PATTERN = /\b\d{4}\.\d{2}\b|\b\d{6}\b|\b\d{8}\b/g;

/**
 * Reduce an HS code to its 6-digit subheading.
 * "8471.30" → "847130", "84713000" → "847130", "84" → null
 */
export function normalizeHsCode(code: string): string | null {
  const digits = code.replace(/\D/g, '');
  if (digits.length < 6) return null;
  return digits.slice(0, 6);
}

/**
 * Dotted display form of a 6-digit subheading: "847130" → "8471.30"
 */
export function formatHsCode(code: string): string {
  const digits = code.replace(/\D/g, '');
  if (digits.length !== 6) return code;
  return `${digits.slice(0, 4)}.${digits.slice(4)}`;
}

/**
 * Extract unique 6-digit HS codes from text, in the order they first appear.
 */
export function extractHsCodes(text: string | null | undefined): string[] {
  if (!text) return [];

  const seen = new Set<string>();
  for (const match of text.match(HS_CODE_PATTERN) ?? []) {
    const code = match.replace('.', '').slice(0, 6);
    seen.add(code);
  }
  return Array.from(seen);
}

/**
 * Merge code lists keeping first-seen order
 */
export function mergeHsCodes(lists: string[][]): string[] {
  const merged = new Set<string>();
  for (const list of lists) {
    for (const code of list) merged.add(code);
  }
  return Array.from(merged);
}
