import { isSuccess, type Handler, type ProxyRequest, type ProxyResponse } from "../http/pipeline.js";

const ADVERTISED_HEADERS = ["allow", "access-control-allow-methods"];

function methodList(value: string): string[] {
  return value.split(",").map((m) => m.trim().toUpperCase());
}

/** Adds COPY to the method lists of a successful OPTIONS response. */
export function advertiseCopy(resp: ProxyResponse): ProxyResponse {
  if (!isSuccess(resp.status)) return resp;
  for (const name of ADVERTISED_HEADERS) {
    const value = resp.headers.get(name);
    if (value != null && !methodList(value).includes("COPY")) {
      resp.headers.set(name, value ? `${value}, COPY` : "COPY");
    }
  }
  return resp;
}

export async function handleOptions(next: Handler, req: ProxyRequest): Promise<ProxyResponse> {
  return advertiseCopy(await next(req));
}
