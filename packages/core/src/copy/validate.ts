import { HttpError } from "../internal/errors.js";
import { unquote } from "../http/path.js";
import type { Result } from "option-t/plain_result";
import { createErr, createOk } from "option-t/plain_result";

export interface ContainerObject {
  container: string;
  object: string;
}

/** Accepts `/container/object` or `container/object`; the object may contain slashes. */
function parseContainerObject(value: string): ContainerObject | null {
  let v = unquote(value);
  if (v.startsWith("/")) v = v.slice(1);
  const slash = v.indexOf("/");
  if (slash <= 0) return null;
  const container = v.slice(0, slash);
  const object = v.slice(slash + 1);
  if (!object) return null;
  return { container, object };
}

export function checkCopyFromHeader(headers: Headers): Result<ContainerObject, HttpError> {
  const parsed = parseContainerObject(headers.get("x-copy-from") ?? "");
  if (!parsed) {
    return createErr(
      HttpError.preconditionFailed(
        "X-Copy-From header must be of the form <container name>/<object name>",
      ),
    );
  }
  return createOk(parsed);
}

export function checkDestinationHeader(headers: Headers): Result<ContainerObject, HttpError> {
  const parsed = parseContainerObject(headers.get("destination") ?? "");
  if (!parsed) {
    return createErr(
      HttpError.preconditionFailed(
        "Destination header must be of the form <container name>/<object name>",
      ),
    );
  }
  return createOk(parsed);
}

export function checkAccountFormat(value: string): Result<string, HttpError> {
  const account = unquote(value);
  if (!account) {
    return createErr(HttpError.preconditionFailed("Account name cannot be empty"));
  }
  if (account.includes("/")) {
    return createErr(HttpError.preconditionFailed("Account name cannot contain slashes"));
  }
  return createOk(account);
}
