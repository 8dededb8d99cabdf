/**
 * Score Normalization
 *
 * Converts raw score text into a number. Scores are often negative and come
 * with units or punctuation around them: "-3.4", "-3.4 pts", "(+2)", "−1.5".
 */

/**
 * First numeric token: optional sign, digits, at most one decimal point.
 */
export const NUMERIC_TOKEN_PATTERN = /[-+]?(?:\d+(?:\.\d+)?|\.\d+)/;

const NUMBER_WORDS: Record<string, number> = {
  zero: 0,
  one: 1,
  two: 2,
  three: 3,
  four: 4,
  five: 5,
  six: 6,
  seven: 7,
  eight: 8,
  nine: 9,
  ten: 10,
  eleven: 11,
  twelve: 12,
  thirteen: 13,
  fourteen: 14,
  fifteen: 15,
  sixteen: 16,
  seventeen: 17,
  eighteen: 18,
  nineteen: 19,
  twenty: 20,
};

/**
 * Spelled-out integer with an optional sign word, e.g. "minus two".
 * Exported as a source string so the fallback scanner can embed it.
 */
export const SPELLED_NUMBER_SOURCE = `(?:(?:minus|negative|plus)\\s+)?(?:${Object.keys(NUMBER_WORDS).join('|')})`;

/** A spelled-out number only counts when it is the whole value, units aside */
const SPELLED_NUMBER_PATTERN = new RegExp(
  `^\\W*(?:(minus|negative|plus)\\s+)?(${Object.keys(NUMBER_WORDS).join('|')})\\W*(?:(?:pts|points)\\W*)?$`,
  'i'
);

/** First numeric token, with a sign word directly in front of it ("minus 2") */
const WORD_SIGNED_TOKEN_PATTERN = new RegExp(
  `(?:\\b(minus|negative|plus)\\s+)?(${NUMERIC_TOKEN_PATTERN.source})`,
  'i'
);

function isNegativeWord(word: string | undefined): boolean {
  const sign = word?.toLowerCase();
  return sign === 'minus' || sign === 'negative';
}

function parseSpelledNumber(text: string): number | null {
  const match = text.match(SPELLED_NUMBER_PATTERN);
  if (!match) return null;

  const value = NUMBER_WORDS[match[2].toLowerCase()];
  if (value === undefined) return null;

  return isNegativeWord(match[1]) ? -value : value;
}

/**
 * Parse a raw score string into a number.
 *
 * The first digit token wins, taking its sign from a sign word in front of
 * it when it has none ("minus 2" → -2). Only when the text has no digits at
 * all is a spelled-out number from zero to twenty recognised, and only as
 * the whole value ("minus two" → -2, "no one knows" → null).
 * Returns null for null input or text with nothing numeric in it.
 */
export function parseScoreNumeric(raw: string | null | undefined): number | null {
  if (raw == null) return null;

  // U+2212 MINUS SIGN shows up in pasted reports
  const text = raw.replace(/−/g, '-');

  const match = text.match(WORD_SIGNED_TOKEN_PATTERN);
  if (match) {
    const token = match[2];
    const value = Number.parseFloat(token);
    if (!Number.isFinite(value)) return null;

    const unsigned = token[0] !== '-' && token[0] !== '+';
    return unsigned && isNegativeWord(match[1]) ? -value : value;
  }

  return parseSpelledNumber(text);
}
