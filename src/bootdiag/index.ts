export { resolveBootDiagnosticsStorage, storageAccountNameFromUri } from "./resolver.js";
export type { BootDiagnosticsStorage, ResolverDependencies, ResolverInput } from "./resolver.js";
export {
  generateStorageAccountName,
  pickStorageAccountName,
  formatTimestamp,
  MAX_NAME_ATTEMPTS,
} from "./naming.js";
export type { StorageNameParts } from "./naming.js";
