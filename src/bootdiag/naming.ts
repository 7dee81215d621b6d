/**
 * Storage account name candidates for boot diagnostics.
 */

const MAX_SUBSCRIPTION_LENGTH = 5;
const MAX_RESOURCE_GROUP_LENGTH = 6;
const MAX_VM_NAME_LENGTH = 4;

/** Candidates tried before the last one is taken unchecked. */
export const MAX_NAME_ATTEMPTS = 10;

export type StorageNameParts = {
  subscriptionName: string;
  resourceGroup: string;
  vmName: string;
};

function truncate(value: string, maxLength: number): string {
  return value.length > maxLength ? value.slice(0, maxLength) : value;
}

function pad2(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time as MMddHHmm. */
export function formatTimestamp(now: Date): string {
  return `${pad2(now.getMonth() + 1)}${pad2(now.getDate())}${pad2(now.getHours())}${pad2(now.getMinutes())}`;
}

/**
 * Build the candidate for a zero-based attempt: truncated subscription,
 * resource group and VM names, the timestamp and the attempt number, with
 * everything but ASCII letters and digits dropped, lower-cased.
 */
export function generateStorageAccountName(parts: StorageNameParts, attempt: number, now: Date): string {
  const raw =
    truncate(parts.subscriptionName, MAX_SUBSCRIPTION_LENGTH) +
    truncate(parts.resourceGroup, MAX_RESOURCE_GROUP_LENGTH) +
    truncate(parts.vmName, MAX_VM_NAME_LENGTH) +
    formatTimestamp(now) +
    String(attempt);

  return raw.replace(/[^A-Za-z0-9]/g, "").toLowerCase();
}

/**
 * Walk the candidates until one is available. After MAX_NAME_ATTEMPTS
 * candidates the last is returned without a further check, so the result
 * may still be taken; account creation then reports the conflict.
 */
export async function pickStorageAccountName(
  parts: StorageNameParts,
  isAvailable: (name: string) => Promise<boolean>,
  now: Date,
): Promise<string> {
  let name = "";
  let attempt = 0;
  do {
    name = generateStorageAccountName(parts, attempt, now);
    attempt++;
  } while (attempt < MAX_NAME_ATTEMPTS && !(await isAvailable(name)));
  return name;
}
