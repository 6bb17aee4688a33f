/**
 * Unicode utility functions for text rendering
 */

/**
 * Map of regular digits to their Unicode superscript equivalents
 */
const SUPERSCRIPT_MAP: Record<string, string> = {
  '0': '\u2070', // ⁰
  '1': '\u00B9', // ¹
  '2': '\u00B2', // ²
  '3': '\u00B3', // ³
  '4': '\u2074', // ⁴
  '5': '\u2075', // ⁵
  '6': '\u2076', // ⁶
  '7': '\u2077', // ⁷
  '8': '\u2078', // ⁸
  '9': '\u2079', // ⁹
};

/**
 * Convert digits to Unicode superscript characters, leaving anything else as is
 * Example: "123" → "¹²³"
 */
export function toSuperscript(text: string): string {
  return Array.from(text, (char) => SUPERSCRIPT_MAP[char] ?? char).join('');
}
