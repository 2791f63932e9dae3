export { LF } from './config/formatting.js';
export {
  codeFence,
  codeSpan,
  fencedCodeBlock,
  fencedJsCodeBlock,
  fencedRsCodeBlock,
  fencedShCodeBlock,
  fencedTsCodeBlock,
} from './markdown/code.js';
export {
  h1,
  h2,
  h3,
  h4,
  h5,
  h6,
  heading,
  parseHeadingLevel,
} from './markdown/headers.js';
export type { HeadingLevel } from './markdown/headers.js';
export {
  AppError,
  ResourceExhaustedError,
  ValidationError,
  getErrorMessage,
} from './errors.js';
