export {
  persistKeyToString,
  type AcmePersist,
  type PersistKey,
  type PersistKind,
} from './types.js';
export { MemoryPersist } from './memory-persist.js';
export { FilePersist } from './file-persist.js';
