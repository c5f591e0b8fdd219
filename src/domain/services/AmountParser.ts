const anyWhitespace = /\s+/g;
const amountWithSuffix = /([-−]?)\s*(\d[\d\s]*(?:,\d+)?)\s*kr\b/i;
const plainDecimal = /^\d+(?:\.\d+)?$/;

/**
 * Parses a Norwegian-formatted figure such as `"11 007,05 kr"` into `11007.05`.
 *
 * Thousands may be separated by any whitespace (regular, non-breaking or narrow
 * no-break space). Returns `null` when the text holds no figure with a `kr` suffix.
 */
export const parseLocaleAmount = (text: string): number | null => {
  const match = amountWithSuffix.exec(text.replace(anyWhitespace, ' '));
  if (!match) {
    return null;
  }

  const [, sign, figure] = match;
  const normalized = figure.replace(anyWhitespace, '').replace(',', '.');
  if (!plainDecimal.test(normalized)) {
    return null;
  }

  const value = Number(normalized);
  if (!Number.isFinite(value)) {
    return null;
  }

  return sign ? -value : value;
};

export const normalizeWhitespace = (text: string): string => text.replace(anyWhitespace, ' ').trim();
