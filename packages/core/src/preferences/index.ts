export {
  readJsonPreference,
  writeJsonPreference,
  type PreferenceStore,
} from './preference-store.js';
export { MemoryPreferenceStore, createMemoryPreferenceStore } from './memory-preference-store.js';
export { FilePreferenceStore, createFilePreferenceStore } from './file-preference-store.js';
