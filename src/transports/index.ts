import type { ResultTransport, RunConfig } from "../types.js";
import { ConsoleTransport, type OutputWriter } from "./console.js";
import { JsonTransport } from "./json.js";

export function createTransport(config: Pick<RunConfig, "format">, write?: OutputWriter): ResultTransport {
  if (config.format === "json") {
    return new JsonTransport(write);
  }
  return new ConsoleTransport(write);
}
