/**
 * State file exports
 */

export {
  StateFileError,
  parseKindDocument,
  parseDesired,
  parseState,
  readKindDocument,
  readStateKind,
  loadState,
  toStateFile,
  saveState,
  removeState,
  type KindDocument,
  type StateFile,
} from './files.js';
