import { describe, it, expect, beforeEach } from "vitest";
import { createServerSideCopyMiddleware } from "./middleware.js";
import { createContext, makeResponse, type Handler } from "../http/pipeline.js";
import { createObjectConstraints } from "../constraints/constraints.js";
import type { MemoryBackend } from "../backend/memory.js";
import { recording, req, seededBackend, text } from "../../tests/helpers/proxy.js";

const SOURCE = "/v1/AUTH_test/photos/src";

describe("copy/middleware", () => {
  let backend: MemoryBackend;
  let handler: Handler;

  beforeEach(async () => {
    backend = await seededBackend({
      [SOURCE]: {
        body: "hello",
        headers: {
          "Content-Type": "text/plain",
          "X-Object-Meta-Color": "blue",
          "X-Object-Sysmeta-Tag": "keep",
        },
      },
    });
    handler = createServerSideCopyMiddleware()(backend.handle);
  });

  describe("PUT with X-Copy-From", () => {
    it("copies bytes, metadata and content type", async () => {
      const resp = await handler(
        req("PUT", "/v1/AUTH_test/photos/dst", { "X-Copy-From": "/photos/src", "Content-Length": "0" }),
      );
      expect(resp.status).toBe(201);
      expect(resp.headers.get("x-copied-from")).toBe("photos/src");
      expect(resp.headers.get("x-copied-from-account")).toBe("AUTH_test");
      expect(resp.headers.get("x-copied-from-last-modified")).toBe("Tue, 14 Nov 2023 22:13:20 GMT");
      expect(resp.headers.get("x-object-meta-color")).toBe("blue");

      const copied = await handler(req("GET", "/v1/AUTH_test/photos/dst"));
      expect(await text(copied)).toBe("hello");
      expect(copied.headers.get("content-type")).toBe("text/plain");
      expect(copied.headers.get("x-object-meta-color")).toBe("blue");
      expect(copied.headers.get("x-object-sysmeta-tag")).toBe("keep");
    });

    it("merges client metadata over the source's", async () => {
      await backend.handle(
        req("PUT", "/v1/AUTH_test/photos/meta", { "X-Object-Meta-A": "1" }, Buffer.from("m")),
      );
      const resp = await handler(
        req("PUT", "/v1/AUTH_test/photos/merged", {
          "X-Copy-From": "/photos/meta",
          "X-Object-Meta-A": "2",
          "X-Object-Meta-B": "3",
        }),
      );
      expect(resp.status).toBe(201);
      const copied = await handler(req("HEAD", "/v1/AUTH_test/photos/merged"));
      const meta = [...copied.headers].filter(([k]) => k.startsWith("x-object-meta-"));
      expect(meta).toEqual([
        ["x-object-meta-a", "2"],
        ["x-object-meta-b", "3"],
      ]);
    });

    it("lets client metadata and content type win over the source's", async () => {
      await handler(
        req("PUT", "/v1/AUTH_test/photos/dst", {
          "X-Copy-From": "photos/src",
          "X-Object-Meta-Color": "red",
          "Content-Type": "image/png",
        }),
      );
      const copied = await handler(req("HEAD", "/v1/AUTH_test/photos/dst"));
      expect(copied.headers.get("x-object-meta-color")).toBe("red");
      expect(copied.headers.get("content-type")).toBe("image/png");
    });

    it("drops source user metadata with X-Fresh-Metadata but keeps system metadata", async () => {
      await handler(
        req("PUT", "/v1/AUTH_test/photos/dst", {
          "X-Copy-From": "/photos/src",
          "X-Fresh-Metadata": "true",
          "X-Object-Meta-Shape": "round",
        }),
      );
      const copied = await handler(req("HEAD", "/v1/AUTH_test/photos/dst"));
      expect(copied.headers.get("x-object-meta-color")).toBeNull();
      expect(copied.headers.get("x-object-meta-shape")).toBe("round");
      expect(copied.headers.get("x-object-sysmeta-tag")).toBe("keep");
    });

    it("records the copy source for request logging", async () => {
      const r = req("PUT", "/v1/AUTH_test/photos/dst", { "X-Copy-From": "/photos/src" });
      await handler(r);
      expect(r.ctx.logInfo).toEqual(["x-copy-from:/photos/src"]);
    });

    it("requires a zero byte body", async () => {
      const rec = recording(backend.handle);
      const copy = createServerSideCopyMiddleware()(rec.handle);
      const bodyHeaders: Record<string, string>[] = [{ "Content-Length": "3" }, { "Transfer-Encoding": "chunked" }];
      for (const headers of bodyHeaders) {
        const resp = await copy(
          req("PUT", "/v1/AUTH_test/photos/dst", { "X-Copy-From": "/photos/src", ...headers }),
        );
        expect(resp.status).toBe(400);
        expect(await text(resp)).toBe("Copy requests require a zero byte body");
      }
      expect(rec.calls).toEqual([]);
    });

    it("rejects a malformed X-Copy-From", async () => {
      const resp = await handler(
        req("PUT", "/v1/AUTH_test/photos/dst", { "X-Copy-From": "nocontainer" }),
      );
      expect(resp.status).toBe(412);
      expect(await text(resp)).toBe(
        "X-Copy-From header must be of the form <container name>/<object name>",
      );
    });

    it("rejects a source account containing a slash", async () => {
      const resp = await handler(
        req("PUT", "/v1/AUTH_test/photos/dst", {
          "X-Copy-From": "/photos/src",
          "X-Copy-From-Account": "AUTH_a/b",
        }),
      );
      expect(resp.status).toBe(412);
      expect(await text(resp)).toBe("Account name cannot contain slashes");
    });

    it("propagates the source's failure", async () => {
      const resp = await handler(
        req("PUT", "/v1/AUTH_test/photos/dst", { "X-Copy-From": "/photos/missing" }),
      );
      expect(resp.status).toBe(404);
      const dst = await handler(req("HEAD", "/v1/AUTH_test/photos/dst"));
      expect(dst.status).toBe(404);
    });

    it("refuses sources over the size limit", async () => {
      const small = createServerSideCopyMiddleware({ maxFileSize: 3 })(backend.handle);
      const resp = await small(
        req("PUT", "/v1/AUTH_test/photos/dst", { "X-Copy-From": "/photos/src" }),
      );
      expect(resp.status).toBe(413);
      expect(await text(resp)).toBe("Your request is too large.");
      const dst = await handler(req("HEAD", "/v1/AUTH_test/photos/dst"));
      expect(dst.status).toBe(404);
    });

    it("applies object constraints to the destination", async () => {
      const rec = recording(backend.handle);
      const copy = createServerSideCopyMiddleware()(rec.handle);
      const ctx = createContext({
        constraints: createObjectConstraints({ maxObjectNameLength: 5, maxFileSize: 100 }),
      });
      const resp = await copy(
        req("PUT", "/v1/AUTH_test/photos/long-name", { "X-Copy-From": "/photos/src" }, null, ctx),
      );
      expect(resp.status).toBe(400);
      expect(await text(resp)).toBe("Object name length of 9 longer than 5");
      expect(rec.calls.map((c) => c.method)).toEqual(["GET"]);
    });

    it("keeps the large-object flag only when the manifest itself is copied", async () => {
      await backend.handle(
        req(
          "PUT",
          "/v1/AUTH_test/photos/manifest",
          { "X-Static-Large-Object": "True" },
          Buffer.from("[]"),
        ),
      );
      await handler(
        req("PUT", "/v1/AUTH_test/photos/raw?multipart-manifest=get", {
          "X-Copy-From": "/photos/manifest",
        }),
      );
      await handler(
        req("PUT", "/v1/AUTH_test/photos/plain", { "X-Copy-From": "/photos/manifest" }),
      );
      const raw = await handler(req("HEAD", "/v1/AUTH_test/photos/raw"));
      const plain = await handler(req("HEAD", "/v1/AUTH_test/photos/plain"));
      expect(raw.headers.get("x-static-large-object")).toBe("True");
      expect(plain.headers.get("x-static-large-object")).toBeNull();
    });
  });

  describe("COPY", () => {
    it("is rewritten into a PUT on the destination", async () => {
      const rec = recording(backend.handle);
      const copy = createServerSideCopyMiddleware()(rec.handle);
      const resp = await copy(req("COPY", SOURCE, { Destination: "/photos/copied" }));

      expect(resp.status).toBe(201);
      expect(rec.calls.map((c) => `${c.method} ${c.path}`)).toEqual([
        "GET /v1/AUTH_test/photos/src",
        "PUT /v1/AUTH_test/photos/copied",
      ]);
      expect(rec.calls[0].headers.get("x-newest")).toBe("true");
      expect(rec.calls[1].headers.get("x-copy-from")).toBeNull();
      expect(rec.calls[1].headers.get("destination")).toBeNull();
      expect(rec.calls[1].headers.get("content-length")).toBe("5");
      expect(await text(await copy(req("GET", "/v1/AUTH_test/photos/copied")))).toBe("hello");
    });

    it("decodes the destination name", async () => {
      await handler(req("COPY", SOURCE, { Destination: "/photos/new%20name" }));
      const copied = await handler(req("GET", "/v1/AUTH_test/photos/new name"));
      expect(copied.status).toBe(200);
    });

    it("copies across accounts with Destination-Account", async () => {
      await backend.handle(req("PUT", "/v1/AUTH_other/archive"));
      const resp = await handler(
        req("COPY", SOURCE, { Destination: "archive/cat", "Destination-Account": "AUTH_other" }),
      );
      expect(resp.status).toBe(201);
      expect(resp.headers.get("x-copied-from-account")).toBe("AUTH_test");
      const copied = await handler(req("GET", "/v1/AUTH_other/archive/cat"));
      expect(await text(copied)).toBe("hello");
    });

    it("requires a Destination header", async () => {
      const resp = await handler(req("COPY", SOURCE));
      expect(resp.status).toBe(412);
      expect(await text(resp)).toBe("Destination header required");
    });

    it("requires a zero byte body", async () => {
      const rec = recording(backend.handle);
      const copy = createServerSideCopyMiddleware()(rec.handle);
      const resp = await copy(
        req("COPY", SOURCE, { Destination: "/photos/copied", "Content-Length": "4" }),
      );
      expect(resp.status).toBe(400);
      expect(rec.calls).toEqual([]);
    });
  });

  describe("POST as copy", () => {
    it("replaces user metadata, keeps system metadata and answers 202", async () => {
      const r = req("POST", SOURCE, { "X-Object-Meta-Color": "red" });
      const resp = await handler(r);
      expect(resp.status).toBe(202);
      expect(r.ctx.logInfo).toEqual([]);

      const after = await handler(req("GET", SOURCE));
      expect(await text(after)).toBe("hello");
      expect(after.headers.get("x-object-meta-color")).toBe("red");
      expect(after.headers.get("x-object-sysmeta-tag")).toBe("keep");
      expect(after.headers.get("content-type")).toBe("text/plain");
    });

    it("passes POST through when disabled", async () => {
      const rec = recording(backend.handle);
      const plain = createServerSideCopyMiddleware({ objectPostAsCopy: false })(rec.handle);
      const resp = await plain(req("POST", SOURCE, { "X-Object-Meta-Color": "red" }));
      expect(resp.status).toBe(202);
      expect(rec.calls.map((c) => c.method)).toEqual(["POST"]);
    });
  });

  it("advertises COPY on OPTIONS", async () => {
    const resp = await handler(req("OPTIONS", SOURCE));
    expect(resp.headers.get("allow")).toBe("HEAD, GET, PUT, POST, DELETE, OPTIONS, COPY");
  });

  it("never lists COPY twice", async () => {
    const twice = createServerSideCopyMiddleware()(handler);
    const resp = await twice(req("OPTIONS", SOURCE));
    expect(resp.headers.get("allow")).toBe("HEAD, GET, PUT, POST, DELETE, OPTIONS, COPY");

    const copyAware: Handler = async () =>
      makeResponse(200, { Allow: "GET, copy", "Access-Control-Allow-Methods": "GET" });
    const advertised = await createServerSideCopyMiddleware()(copyAware)(req("OPTIONS", SOURCE));
    expect(advertised.headers.get("allow")).toBe("GET, copy");
    expect(advertised.headers.get("access-control-allow-methods")).toBe("GET, COPY");
  });

  it("leaves other requests alone", async () => {
    const rec = recording(backend.handle);
    const copy = createServerSideCopyMiddleware()(rec.handle);
    await copy(req("DELETE", SOURCE));
    await copy(req("POST", "/v1/AUTH_test/photos"));
    expect(rec.calls.map((c) => `${c.method} ${c.path}`)).toEqual([
      "DELETE /v1/AUTH_test/photos/src",
      "POST /v1/AUTH_test/photos",
    ]);
  });
});
