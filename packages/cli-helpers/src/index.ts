/**
 * Helpers for txrun command lines: input classification and option reporting
 */

export {
  collectVcfBamArgs,
  detectFileType,
  existsOrGz,
  readFirstLine,
  type CollectedInputs,
  type InputFileType,
} from './fileTypes.js';

export { checkMissing, errorMsg, exitWith } from './options.js';
