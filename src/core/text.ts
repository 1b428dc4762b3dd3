export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

/**
 * Matching form of free text: lowercase, diacritics and apostrophes dropped,
 * every other non letter/digit run turned into a single space.
 */
export function toMatchText(value: string): string {
  return collapseWhitespace(
    value
      .normalize('NFKD')
      .replace(/[\u0300-\u036f]/g, '')
      .toLowerCase()
      .replace(/['\u2018\u2019`\u00b4]/g, '')
      .replace(/[^\p{L}\p{N}]+/gu, ' ')
  );
}

/** Whole-word (or whole-phrase) containment on already normalized text. */
export function containsPhrase(matchText: string, phrase: string): boolean {
  const needle = toMatchText(phrase);
  if (!needle) return false;
  return ` ${matchText} `.includes(` ${needle} `);
}

/** Month names and abbreviations, lowercase, to month number. */
export const MONTHS: Record<string, number> = {
  january: 1, jan: 1,
  february: 2, feb: 2,
  march: 3, mar: 3,
  april: 4, apr: 4,
  may: 5,
  june: 6, jun: 6,
  july: 7, jul: 7,
  august: 8, aug: 8,
  september: 9, sep: 9, sept: 9,
  october: 10, oct: 10,
  november: 11, nov: 11,
  december: 12, dec: 12,
};
