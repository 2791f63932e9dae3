export const LF = '\n';

export const CODE_FENCE = '```';

export const SETEXT_MARKERS = {
  1: '=',
  2: '-',
} as const;

export const ATX_MARKER = '#';

export const joinLines = (lines: readonly string[]): string => lines.join(LF);
