import { headerEntries } from "../http/pipeline.js";

export type ServerType = "account" | "container" | "object";

const PASS_HEADERS = new Set(["x-delete-at"]);

export function userMetaPrefix(type: ServerType): string {
  return `x-${type}-meta-`;
}

export function sysMetaPrefix(type: ServerType): string {
  return `x-${type}-sysmeta-`;
}

function hasPrefix(key: string, prefix: string): boolean {
  const lower = key.toLowerCase();
  return lower.length > prefix.length && lower.startsWith(prefix);
}

export function isUserMeta(type: ServerType, key: string): boolean {
  return hasPrefix(key, userMetaPrefix(type));
}

export function isSysMeta(type: ServerType, key: string): boolean {
  return hasPrefix(key, sysMetaPrefix(type));
}

export function isSysOrUserMeta(type: ServerType, key: string): boolean {
  return isUserMeta(type, key) || isSysMeta(type, key);
}

/** Strips the sysmeta prefix, e.g. `x-container-sysmeta-migration-active` -> `migration-active`. */
export function stripSysMetaPrefix(type: ServerType, key: string): string {
  return key.toLowerCase().slice(sysMetaPrefix(type).length);
}

/** Copies object sys/user metadata and pass-through headers from one set onto another. */
export function copyHeadersInto(from: Headers, to: Headers): void {
  for (const [key, value] of headerEntries(from)) {
    if (isSysOrUserMeta("object", key) || PASS_HEADERS.has(key)) {
      to.set(key, value);
    }
  }
}

export function copyHeaderSubset(
  from: Headers,
  to: Headers,
  condition: (key: string) => boolean,
): void {
  for (const [key, value] of headerEntries(from)) {
    if (condition(key)) to.set(key, value);
  }
}

export function removeItems(headers: Headers, condition: (key: string) => boolean): void {
  for (const [key] of headerEntries(headers)) {
    if (condition(key)) headers.delete(key);
  }
}

/** Metadata headers of `headers` that belong in a copy response. */
export function metadataHeaders(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of headerEntries(headers)) {
    if (isSysOrUserMeta("object", key) || PASS_HEADERS.has(key)) out[key] = value;
  }
  return out;
}
