import type { Handler } from "../http/pipeline.js";

/** The terminal handler of the pipeline: the storage endpoint every sub-request lands on. */
export interface Backend {
  readonly name: string;
  handle: Handler;
  close?(): Promise<void>;
}

export type BackendFactory = (opts: { config: Record<string, unknown> }) => Promise<Backend>;
