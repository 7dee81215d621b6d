export { selectBginfoVersion, pickHighestVersion, parseVersion, canonicalizeLocation } from "./selector.js";
export {
  BGINFO_DEFAULT_VERSION,
  BGINFO_EXTENSION_NAME,
  BGINFO_EXTENSION_PUBLISHER,
  createBginfoExtensionSpec,
} from "./types.js";
export type { ExtensionSpec, ExtensionImageClientLike, VMExtensionClientLike } from "./types.js";
