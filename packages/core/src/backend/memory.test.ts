import { describe, it, expect } from "vitest";
import { createMemoryBackend } from "./memory.js";
import { req, text } from "../../tests/helpers/proxy.js";

describe("backend/memory", () => {
  it("needs the container before objects can be written", async () => {
    const backend = createMemoryBackend();
    const orphan = await backend.handle(req("PUT", "/v1/AUTH_test/c/o", {}, Buffer.from("x")));
    expect(orphan.status).toBe(404);

    expect((await backend.handle(req("PUT", "/v1/AUTH_test/c"))).status).toBe(201);
    expect((await backend.handle(req("PUT", "/v1/AUTH_test/c"))).status).toBe(202);
    const put = await backend.handle(req("PUT", "/v1/AUTH_test/c/o", {}, Buffer.from("x")));
    expect(put.status).toBe(201);
    expect(put.headers.get("etag")).toBe('"9dd4e461268c8034f5c8564e155c67a6"');
  });

  it("stores object metadata and honors X-Timestamp", async () => {
    const backend = createMemoryBackend();
    await backend.handle(req("PUT", "/v1/AUTH_test/c"));
    await backend.handle(
      req(
        "PUT",
        "/v1/AUTH_test/c/o",
        {
          "X-Object-Meta-Color": "blue",
          "X-Object-Sysmeta-Tag": "keep",
          "X-Delete-At": "1900000000",
          "X-Timestamp": "1600000000.00000",
          "X-Unrelated": "dropped",
          "Content-Type": "text/plain",
        },
        Buffer.from("hello"),
      ),
    );
    const got = await backend.handle(req("GET", "/v1/AUTH_test/c/o"));
    expect(await text(got)).toBe("hello");
    expect(got.headers.get("x-object-meta-color")).toBe("blue");
    expect(got.headers.get("x-object-sysmeta-tag")).toBe("keep");
    expect(got.headers.get("x-delete-at")).toBe("1900000000");
    expect(got.headers.get("x-unrelated")).toBeNull();
    expect(got.headers.get("x-timestamp")).toBe("1600000000.00000");
    expect(got.headers.get("last-modified")).toBe("Sun, 13 Sep 2020 12:26:40 GMT");
  });

  it("rejects a body that does not match the declared ETag", async () => {
    const backend = createMemoryBackend();
    await backend.handle(req("PUT", "/v1/AUTH_test/c"));
    const resp = await backend.handle(
      req("PUT", "/v1/AUTH_test/c/o", { ETag: "0000" }, Buffer.from("hello")),
    );
    expect(resp.status).toBe(422);
  });

  it("replaces user metadata on POST", async () => {
    const backend = createMemoryBackend();
    await backend.handle(req("PUT", "/v1/AUTH_test/c"));
    await backend.handle(
      req("PUT", "/v1/AUTH_test/c/o", { "X-Object-Meta-A": "1", "X-Object-Sysmeta-S": "s" }, Buffer.from("x")),
    );
    expect((await backend.handle(req("POST", "/v1/AUTH_test/c/o", { "X-Object-Meta-B": "2" }))).status).toBe(202);
    const head = await backend.handle(req("HEAD", "/v1/AUTH_test/c/o"));
    expect(head.headers.get("x-object-meta-a")).toBeNull();
    expect(head.headers.get("x-object-meta-b")).toBe("2");
    expect(head.headers.get("x-object-sysmeta-s")).toBe("s");
  });

  it("keeps container metadata and lists objects", async () => {
    const backend = createMemoryBackend();
    await backend.handle(req("PUT", "/v1/AUTH_test/c", { "X-Container-Meta-Owner": "ann" }));
    await backend.handle(req("PUT", "/v1/AUTH_test/c/b", {}, Buffer.from("1")));
    await backend.handle(req("PUT", "/v1/AUTH_test/c/a", {}, Buffer.from("2")));
    await backend.handle(req("POST", "/v1/AUTH_test/c", { "X-Container-Sysmeta-Flag": "on" }));

    const head = await backend.handle(req("HEAD", "/v1/AUTH_test/c"));
    expect(head.status).toBe(204);
    expect(head.headers.get("x-container-meta-owner")).toBe("ann");
    expect(head.headers.get("x-container-sysmeta-flag")).toBe("on");
    expect(head.headers.get("x-container-object-count")).toBe("2");
    expect(await text(await backend.handle(req("GET", "/v1/AUTH_test/c")))).toBe("a\nb\n");
    expect((await backend.handle(req("DELETE", "/v1/AUTH_test/c"))).status).toBe(409);
  });

  it("deletes objects", async () => {
    const backend = createMemoryBackend();
    await backend.handle(req("PUT", "/v1/AUTH_test/c"));
    await backend.handle(req("PUT", "/v1/AUTH_test/c/o", {}, Buffer.from("x")));
    expect((await backend.handle(req("DELETE", "/v1/AUTH_test/c/o"))).status).toBe(204);
    expect((await backend.handle(req("GET", "/v1/AUTH_test/c/o"))).status).toBe(404);
  });
});
