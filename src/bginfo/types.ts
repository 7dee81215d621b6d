/**
 * BGInfo Extension: Constants and Types
 */

export const BGINFO_EXTENSION_NAME = "BGInfo";
export const BGINFO_EXTENSION_PUBLISHER = "Microsoft.Compute";
/** Used when none of the published versions parse. */
export const BGINFO_DEFAULT_VERSION = "2.1";

/** An extension to install on a VM. Built per create call, never stored. */
export type ExtensionSpec = {
  location: string;
  name: string;
  publisher: string;
  type: string;
  typeHandlerVersion: string;
  autoUpgradeMinorVersion: boolean;
};

/** Extension image catalogue lookups the version selector consumes. */
export interface ExtensionImageClientLike {
  listPublishers(location: string): Promise<string[]>;
  listExtensionTypes(location: string, publisher: string): Promise<string[]>;
  listExtensionVersions(location: string, publisher: string, type: string): Promise<string[]>;
}

export interface VMExtensionClientLike {
  createOrUpdateExtension(resourceGroup: string, vmName: string, extension: ExtensionSpec): Promise<void>;
}

export function createBginfoExtensionSpec(location: string, version: string): ExtensionSpec {
  return {
    location,
    name: BGINFO_EXTENSION_NAME,
    publisher: BGINFO_EXTENSION_PUBLISHER,
    type: BGINFO_EXTENSION_NAME,
    typeHandlerVersion: version,
    autoUpgradeMinorVersion: true,
  };
}
