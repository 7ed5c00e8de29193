import {
  cloneRequest,
  discardBody,
  headerEntries,
  isSuccess,
  type Handler,
  type ProxyRequest,
} from "../http/pipeline.js";
import { containerPath, type ContainerPath } from "../http/path.js";
import { isSysMeta, stripSysMetaPrefix } from "../copy/metadata.js";

export interface ContainerInfo {
  status: number;
  /** Container sysmeta with the prefix removed, e.g. `migration-active`. */
  sysmeta: Record<string, string>;
}

/** Reads the container's metadata through a HEAD sub-request. */
export async function getContainerInfo(
  next: Handler,
  req: ProxyRequest,
  path: Pick<ContainerPath, "version" | "account" | "container">,
): Promise<ContainerInfo> {
  const headReq = cloneRequest(req, {
    method: "HEAD",
    path: containerPath(path),
    query: new URLSearchParams(),
    body: null,
  });
  for (const name of ["range", "if-match", "if-none-match", "if-modified-since", "if-unmodified-since"]) {
    headReq.headers.delete(name);
  }
  const resp = await next(headReq);
  discardBody(resp);
  const sysmeta: Record<string, string> = {};
  if (isSuccess(resp.status)) {
    for (const [key, value] of headerEntries(resp.headers)) {
      if (isSysMeta("container", key)) sysmeta[stripSysMetaPrefix("container", key)] = value;
    }
  }
  return { status: resp.status, sysmeta };
}
