import { describe, it, expect } from "vitest";
import { Readable } from "node:stream";
import {
  cloneRequest,
  compose,
  contentLength,
  makeRequest,
  makeResponse,
  readBody,
  textResponse,
  type Middleware,
} from "./pipeline.js";

describe("http/pipeline", () => {
  it("runs the first middleware outermost", async () => {
    const order: string[] = [];
    const tag =
      (name: string): Middleware =>
      (next) =>
      async (req) => {
        order.push(`${name}:in`);
        const res = await next(req);
        order.push(`${name}:out`);
        return res;
      };
    const handler = compose([tag("a"), tag("b")], async () => {
      order.push("backend");
      return makeResponse(204);
    });
    await handler(makeRequest({ method: "get", path: "/v1/a" }));
    expect(order).toEqual(["a:in", "b:in", "backend", "b:out", "a:out"]);
  });

  it("clones headers, query and context independently", () => {
    const original = makeRequest({
      method: "GET",
      path: "/v1/a/c/o",
      query: "x=1",
      headers: { "X-One": "1" },
    });
    original.ctx.origMethod = "GET";
    const copy = cloneRequest(original, { method: "HEAD" });
    copy.headers.set("X-Two", "2");
    copy.query.set("y", "2");
    copy.ctx.postAsCopy = true;

    expect(copy.method).toBe("HEAD");
    expect(copy.ctx.origMethod).toBe("GET");
    expect(original.headers.get("x-two")).toBeNull();
    expect(original.query.toString()).toBe("x=1");
    expect(original.ctx.postAsCopy).toBe(false);
  });

  it("reads declared content lengths", () => {
    expect(contentLength(new Headers({ "Content-Length": "12" }))).toBe(12);
    expect(contentLength(new Headers({ "Content-Length": "-1" }))).toBeNull();
    expect(contentLength(new Headers())).toBeNull();
  });

  it("builds plain-text responses", async () => {
    const res = textResponse(412, "nope");
    expect(res.headers.get("content-length")).toBe("4");
    expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    expect((await readBody(res.body)).toString()).toBe("nope");
  });

  it("collects streamed bodies", async () => {
    const body = Readable.from([Buffer.from("ab"), Buffer.from("c")]);
    expect((await readBody(body)).toString()).toBe("abc");
  });
});
