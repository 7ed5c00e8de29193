export interface ObjectPath {
  version: string;
  account: string;
  container: string;
  object: string;
}

export interface ContainerPath {
  version: string;
  account: string;
  container: string;
  object?: string;
}

/**
 * Splits `/seg1/seg2/...` into at most `maxSegs` segments. The first `minSegs`
 * must be non-empty. With `restWithLast`, the final segment keeps any further
 * slashes (object names may contain them). Missing trailing segments come back
 * as undefined; returns null when the path does not fit.
 */
export function splitPath(
  path: string,
  minSegs: number,
  maxSegs: number,
  restWithLast = false,
): Array<string | undefined> | null {
  if (!path.startsWith("/")) return null;
  const raw = path.slice(1).split("/");
  const segs =
    restWithLast && raw.length > maxSegs
      ? [...raw.slice(0, maxSegs - 1), raw.slice(maxSegs - 1).join("/")]
      : raw;
  if (segs.length < minSegs || segs.length > maxSegs) return null;
  for (let i = 0; i < segs.length; i++) {
    const isLast = i === segs.length - 1;
    if (segs[i] === "" && (i < minSegs || !isLast)) return null;
  }
  const out: Array<string | undefined> = segs.map((s) => (s === "" ? undefined : s));
  while (out.length < maxSegs) out.push(undefined);
  return out;
}

export function parseObjectPath(path: string): ObjectPath | null {
  const parts = splitPath(path, 4, 4, true);
  if (!parts) return null;
  const [version, account, container, object] = parts;
  if (!version || !account || !container || !object) return null;
  return { version, account, container, object };
}

export function parseContainerPath(path: string): ContainerPath | null {
  const parts = splitPath(path, 3, 4, true);
  if (!parts) return null;
  const [version, account, container, object] = parts;
  if (!version || !account || !container) return null;
  return object ? { version, account, container, object } : { version, account, container };
}

export function objectPath(p: ObjectPath): string {
  return `/${p.version}/${p.account}/${p.container}/${p.object}`;
}

export function containerPath(p: Pick<ContainerPath, "version" | "account" | "container">) {
  return `/${p.version}/${p.account}/${p.container}`;
}

/**
 * Percent-encodes everything except unreserved characters and `safe`.
 * `quote("/c/o b")` is `/c/o%20b`.
 */
export function quote(value: string, safe = "/"): string {
  let out = encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => "%" + c.charCodeAt(0).toString(16).toUpperCase(),
  );
  for (const ch of safe) {
    const encoded = encodeURIComponent(ch);
    if (encoded !== ch) out = out.split(encoded).join(ch);
  }
  return out;
}

/** Decodes percent-escapes, leaving malformed input as it was. */
export function unquote(value: string): string {
  try {
    return decodeURIComponent(value);
  } catch {
    return value;
  }
}

/** Encodes a decoded path for the wire, keeping slashes. */
export function encodePath(path: string): string {
  return quote(path, "/");
}
