import { request, type Dispatcher } from "undici";
import {
  createErr,
  createOk,
  isErr,
  unwrapErr,
  unwrapOk,
  type Result,
} from "option-t/plain_result";
import { quote } from "../http/path.js";
import { isUserMeta } from "../copy/metadata.js";
import {
  DriverError,
  type MigrationDriver,
  type MigrationDriverModule,
  type MigrationParams,
  type SourceObject,
} from "./types.js";

type ResponseBody = Dispatcher.ResponseData["body"];
type ResponseHeaders = Dispatcher.ResponseData["headers"];

export interface SwiftCredentials {
  tokenUrl: string;
  user: string;
  key: string;
}

function header(headers: ResponseHeaders, name: string): string | undefined {
  const value = headers[name];
  return Array.isArray(value) ? value.join(", ") : value;
}

/**
 * Reads objects from a container in another Swift cluster, authenticating with
 * TempAuth-style v1 credentials taken from the container's migration metadata.
 */
export class SwiftDriver implements MigrationDriver {
  readonly dataSource: string;
  readonly credentials: SwiftCredentials;
  private body: ResponseBody | null = null;

  constructor(dataSource: string, credentials: SwiftCredentials) {
    this.dataSource = dataSource;
    this.credentials = credentials;
  }

  private async authenticate(): Promise<
    Result<{ storageUrl: string; token: string }, DriverError>
  > {
    try {
      const res = await request(this.credentials.tokenUrl, {
        method: "GET",
        headers: { "X-Auth-User": this.credentials.user, "X-Auth-Key": this.credentials.key },
      });
      const text = await res.body.text();
      const storageUrl = header(res.headers, "x-storage-url");
      const token = header(res.headers, "x-auth-token");
      if (res.statusCode >= 300 || !storageUrl || !token) {
        return createErr(
          new DriverError("CONNECTION", `Authorization failed: ${res.statusCode} ${text}`.trim()),
        );
      }
      return createOk({ storageUrl, token });
    } catch (e) {
      return createErr(new DriverError("CONNECTION", (e as Error).message));
    }
  }

  async fetchObject(name: string): Promise<Result<SourceObject, DriverError>> {
    const auth = await this.authenticate();
    if (isErr(auth)) return createErr(unwrapErr(auth));
    const { storageUrl, token } = unwrapOk(auth);

    const url = `${storageUrl.replace(/\/+$/, "")}/${quote(this.dataSource)}/${quote(name)}`;
    let res: Dispatcher.ResponseData;
    try {
      res = await request(url, {
        method: "GET",
        headers: { "X-Auth-Token": token, "X-Container-Migration-Provider": "swift" },
      });
    } catch {
      return createErr(new DriverError("CONNECTION", `Connection failed to ${storageUrl}`));
    }
    if (res.statusCode < 200 || res.statusCode >= 300) {
      let text: string;
      try {
        text = await res.body.text();
      } catch (e) {
        return createErr(new DriverError("CONNECTION", (e as Error).message));
      }
      return createErr(
        new DriverError(
          res.statusCode === 404 ? "NOT_FOUND" : "CONNECTION",
          `Object GET failed: ${text}`,
        ),
      );
    }

    const metadata: Record<string, string> = {};
    for (const [key, value] of Object.entries(res.headers)) {
      if (value != null && isUserMeta("object", key)) {
        metadata[key.toLowerCase()] = Array.isArray(value) ? value.join(", ") : value;
      }
    }
    const length = header(res.headers, "content-length");
    const timestamp = header(res.headers, "x-timestamp");
    this.body = res.body;
    return createOk({
      metadata,
      size: length != null ? Number(length) : null,
      body: res.body,
      contentType: header(res.headers, "content-type"),
      timestamp: timestamp != null ? Number(timestamp) : undefined,
    });
  }

  async finalize() {
    if (this.body && !this.body.destroyed) this.body.destroy();
    this.body = null;
  }
}

export const swiftDriverModule: MigrationDriverModule = {
  async isAvailable() {
    return true;
  },
  async create(source: string, params: MigrationParams) {
    return createOk(
      new SwiftDriver(source, {
        tokenUrl: params["token-url"] ?? "",
        user: params["user"] ?? "",
        key: params["key"] ?? "",
      }),
    );
  },
};
