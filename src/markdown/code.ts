import { CODE_FENCE, joinLines } from '../config/formatting.js';

/**
 * Create a code fence, optionally followed by an info string.
 *
 * An omitted info string and an empty one render the same way.
 * The info string is not checked for backticks or line feeds.
 *
 * @example
 * codeFence('rust'); // "```rust"
 * codeFence(); // "```"
 *
 * @see https://spec.commonmark.org/0.30/#code-fence
 */
export function codeFence(infoString?: string): string {
  return `${CODE_FENCE}${infoString ?? ''}`;
}

/**
 * Wrap `code` in single backticks. Embedded backticks are not escaped.
 *
 * @see https://spec.commonmark.org/0.30/#code-span
 */
export function codeSpan(code: string): string {
  return `\`${code}\``;
}

/**
 * Create a fenced code block. The closing fence never carries the info string,
 * and lines are always joined with `\n`.
 *
 * @example
 * fencedCodeBlock('x = 1', 'python'); // "```python\nx = 1\n```"
 *
 * @see https://spec.commonmark.org/0.30/#fenced-code-blocks
 */
export function fencedCodeBlock(code: string, infoString?: string): string {
  return joinLines([codeFence(infoString), code, codeFence()]);
}

export function fencedJsCodeBlock(code: string): string {
  return fencedCodeBlock(code, 'javascript');
}

export function fencedRsCodeBlock(code: string): string {
  return fencedCodeBlock(code, 'rust');
}

export function fencedShCodeBlock(code: string): string {
  return fencedCodeBlock(code, 'shell');
}

export function fencedTsCodeBlock(code: string): string {
  return fencedCodeBlock(code, 'typescript');
}
