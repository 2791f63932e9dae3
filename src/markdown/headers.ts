import { z } from 'zod';

import { ATX_MARKER, LF, SETEXT_MARKERS } from '../config/formatting.js';
import { getErrorMessage } from '../errors.js';
import {
  ResourceExhaustedError,
  ValidationError,
} from '../errors/app-error.js';
import { logError, logWarn } from '../services/logger.js';

export const headingLevelSchema = z.union([
  z.literal(1),
  z.literal(2),
  z.literal(3),
  z.literal(4),
  z.literal(5),
  z.literal(6),
]);

export type HeadingLevel = z.infer<typeof headingLevelSchema>;

type SetextLevel = keyof typeof SETEXT_MARKERS;

/* -------------------------------------------------------------------------------------------------
 * Setext (levels 1-2)
 * ------------------------------------------------------------------------------------------------- */

// Code points, so a surrogate pair underlines as a single character.
export function countCodePoints(text: string): number {
  let count = 0;
  for (let index = 0; index < text.length; count += 1) {
    const codePoint = text.codePointAt(index) ?? 0;
    index += codePoint > 0xffff ? 2 : 1;
  }
  return count;
}

function setextHeader(text: string, level: SetextLevel): string {
  const charCount = countCodePoints(text);
  try {
    return `${text}${LF}${SETEXT_MARKERS[level].repeat(charCount)}`;
  } catch (error) {
    if (!(error instanceof RangeError)) throw error;

    const details = { level, charCount };
    logError(`Setext header too large: ${getErrorMessage(error)}`, details);
    throw new ResourceExhaustedError(
      `Cannot build a level ${level} header underline of ${charCount} characters`,
      details,
      { cause: error }
    );
  }
}

/**
 * Create a level 1 setext header: `text` underlined with one `=` per code point.
 *
 * @throws {ResourceExhaustedError} when the header exceeds the maximum string
 * length of the runtime.
 *
 * @see https://spec.commonmark.org/0.30/#setext-headings
 */
export function h1(text: string): string {
  return setextHeader(text, 1);
}

/**
 * Create a level 2 setext header: `text` underlined with one `-` per code point.
 *
 * @throws {ResourceExhaustedError} under the same condition as {@link h1}.
 */
export function h2(text: string): string {
  return setextHeader(text, 2);
}

/* -------------------------------------------------------------------------------------------------
 * ATX (levels 3-6)
 * ------------------------------------------------------------------------------------------------- */

function atxHeader(text: string, level: HeadingLevel): string {
  return `${ATX_MARKER.repeat(level)} ${text}`;
}

/** @see https://spec.commonmark.org/0.30/#atx-heading */
export function h3(text: string): string {
  return atxHeader(text, 3);
}

export function h4(text: string): string {
  return atxHeader(text, 4);
}

export function h5(text: string): string {
  return atxHeader(text, 5);
}

export function h6(text: string): string {
  return atxHeader(text, 6);
}

const HEADER_BUILDERS: Readonly<
  Record<HeadingLevel, (text: string) => string>
> = {
  1: h1,
  2: h2,
  3: h3,
  4: h4,
  5: h5,
  6: h6,
};

export function parseHeadingLevel(level: unknown): HeadingLevel {
  const parsed = headingLevelSchema.safeParse(level);
  if (!parsed.success) {
    logWarn('Rejected heading level', { level: String(level) });
    throw new ValidationError('Heading level must be an integer from 1 to 6', {
      level,
    });
  }
  return parsed.data;
}

/**
 * Create a header of the given level: setext for 1-2, ATX for 3-6.
 */
export function heading(level: HeadingLevel, text: string): string {
  return HEADER_BUILDERS[parseHeadingLevel(level)](text);
}
