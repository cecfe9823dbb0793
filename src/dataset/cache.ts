import { resolve } from "node:path";
import type { Logger } from "../logger.js";
import type { Dataset } from "../types.js";
import { loadDataset } from "./load.js";

const datasetCache = new Map<string, Promise<Dataset>>();

/**
 * Loads the dataset at `path` once per process. Callers racing on the first
 * load share the same promise; a failed load is evicted so a later call retries.
 */
export function getDataset(path: string, logger?: Logger): Promise<Dataset> {
  const key = resolve(path);
  const cached = datasetCache.get(key);
  if (cached) {
    logger?.debug(`Dataset cache hit: ${key}`);
    return cached;
  }

  const pending = loadDataset(key, { logger }).catch((error: unknown) => {
    datasetCache.delete(key);
    throw error;
  });
  datasetCache.set(key, pending);
  return pending;
}
