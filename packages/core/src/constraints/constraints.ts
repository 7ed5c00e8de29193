import type { ObjectConstraints } from "../http/pipeline.js";
import { HttpError } from "../internal/errors.js";

export interface ObjectConstraintOptions {
  maxObjectNameLength: number;
  maxFileSize: number;
}

/** Name-length and size limits applied to objects created by the proxy. */
export function createObjectConstraints(opts: ObjectConstraintOptions): ObjectConstraints {
  return {
    validateObjectCreation(name, length) {
      if (name.length > opts.maxObjectNameLength) {
        return HttpError.badRequest(
          `Object name length of ${name.length} longer than ${opts.maxObjectNameLength}`,
        );
      }
      if (length != null && length > opts.maxFileSize) return HttpError.entityTooLarge();
      return null;
    },
  };
}
