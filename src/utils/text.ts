/**
 * Text cleanup for outgoing posts
 */

import { DEFAULT_MAX_POST_LENGTH } from '../config/config.js';

// Control, format, surrogate, private-use and unassigned code points, plus line and paragraph separators
const NON_PRINTABLE = /[\p{C}\p{Zl}\p{Zp}]/gu;

// Space separators other than the ASCII space
const NON_ASCII_SPACE = /[^\P{Zs} ]/gu;

/**
 * Drops non-printable characters, cuts the text to maxLength code points and trims it.
 * Newlines and tabs count as non-printable and are removed.
 */
export function sanitizeText(text: string, maxLength: number = DEFAULT_MAX_POST_LENGTH): string {
  const printable = text.replace(NON_PRINTABLE, '').replace(NON_ASCII_SPACE, '');
  return Array.from(printable).slice(0, maxLength).join('').trim();
}
