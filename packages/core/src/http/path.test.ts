import { describe, it, expect } from "vitest";
import {
  encodePath,
  objectPath,
  parseContainerPath,
  parseObjectPath,
  quote,
  splitPath,
  unquote,
} from "./path.js";

describe("http/path", () => {
  it("keeps slashes in object names", () => {
    expect(parseObjectPath("/v1/AUTH_test/photos/2024/cat.jpg")).toEqual({
      version: "v1",
      account: "AUTH_test",
      container: "photos",
      object: "2024/cat.jpg",
    });
  });

  it("rejects paths without an object segment", () => {
    expect(parseObjectPath("/v1/AUTH_test/photos")).toBeNull();
    expect(parseObjectPath("/v1/AUTH_test/photos/")).toBeNull();
    expect(parseObjectPath("v1/AUTH_test/photos/cat.jpg")).toBeNull();
  });

  it("parses container paths with and without an object", () => {
    expect(parseContainerPath("/v1/AUTH_test/photos")).toEqual({
      version: "v1",
      account: "AUTH_test",
      container: "photos",
    });
    expect(parseContainerPath("/v1/AUTH_test/photos/a")?.object).toBe("a");
    expect(parseContainerPath("/v1/AUTH_test")).toBeNull();
  });

  it("splits with missing trailing segments as undefined", () => {
    expect(splitPath("/v1/AUTH_test", 2, 4)).toEqual(["v1", "AUTH_test", undefined, undefined]);
    expect(splitPath("/v1//c", 3, 3)).toBeNull();
  });

  it("quotes like a URL path", () => {
    expect(quote("/c/o b")).toBe("/c/o%20b");
    expect(quote("a'b")).toBe("a%27b");
    expect(quote("café")).toBe("caf%C3%A9");
    expect(quote("a:b", "/:")).toBe("a:b");
    expect(encodePath("/v1/AUTH_test/c/o?x")).toBe("/v1/AUTH_test/c/o%3Fx");
  });

  it("leaves malformed escapes alone when unquoting", () => {
    expect(unquote("o%20b")).toBe("o b");
    expect(unquote("%E0%A4%A")).toBe("%E0%A4%A");
  });

  it("formats object paths", () => {
    expect(objectPath({ version: "v1", account: "a", container: "c", object: "o/p" })).toBe(
      "/v1/a/c/o/p",
    );
  });
});
