/**
 * BGInfo Version Selector
 *
 * Picks the newest published BGInfo handler version for a location.
 */

import type { PluginLogger } from "../types.js";
import {
  BGINFO_DEFAULT_VERSION,
  BGINFO_EXTENSION_NAME,
  BGINFO_EXTENSION_PUBLISHER,
  type ExtensionImageClientLike,
} from "./types.js";

type ParsedVersion = { major: number; minor: number };

const VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.(\d+)(?:\.(\d+))?)?$/;

/**
 * Parse `major.minor[.build[.revision]]`. Anything else yields null.
 */
export function parseVersion(text: string): ParsedVersion | null {
  const match = VERSION_PATTERN.exec(text.trim());
  if (!match) return null;
  const major = Number(match[1]);
  const minor = Number(match[2]);
  if (!Number.isSafeInteger(major) || !Number.isSafeInteger(minor)) return null;
  return { major, minor };
}

/** "West US 2" -> "westus2" */
export function canonicalizeLocation(location: string): string {
  return location.replace(/\s+/g, "").toLowerCase();
}

/**
 * Highest parsable version as "major.minor". When no entry parses the
 * default version is returned; an empty list yields undefined.
 */
export function pickHighestVersion(versions: string[]): string | undefined {
  if (versions.length === 0) return undefined;

  let best: ParsedVersion | null = null;
  for (const text of versions) {
    const parsed = parseVersion(text);
    if (!parsed) continue;
    if (!best || parsed.major > best.major || (parsed.major === best.major && parsed.minor > best.minor)) {
      best = parsed;
    }
  }

  return best ? `${best.major}.${best.minor}` : BGINFO_DEFAULT_VERSION;
}

/**
 * Newest usable BGInfo version at a location, or undefined when the
 * publisher, the extension type or its versions are not available there.
 */
export async function selectBginfoVersion(
  client: ExtensionImageClientLike,
  location: string,
  logger?: PluginLogger,
): Promise<string | undefined> {
  const canonical = canonicalizeLocation(location);

  const publishers = await client.listPublishers(canonical);
  if (!publishers.includes(BGINFO_EXTENSION_PUBLISHER)) {
    logger?.debug?.(`bginfo: publisher ${BGINFO_EXTENSION_PUBLISHER} not offered in ${canonical}`);
    return undefined;
  }

  const types = await client.listExtensionTypes(canonical, BGINFO_EXTENSION_PUBLISHER);
  if (!types.includes(BGINFO_EXTENSION_NAME)) {
    logger?.debug?.(`bginfo: extension type ${BGINFO_EXTENSION_NAME} not offered in ${canonical}`);
    return undefined;
  }

  const versions = await client.listExtensionVersions(canonical, BGINFO_EXTENSION_PUBLISHER, BGINFO_EXTENSION_NAME);
  const version = pickHighestVersion(versions);
  logger?.debug?.(`bginfo: ${versions.length} version(s) in ${canonical}, selected ${version ?? "none"}`);
  return version;
}
