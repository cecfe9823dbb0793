import { distinctValues } from "./dataset/accessor.js";
import { ENTITY_CATEGORIES, type Dataset, type EntityCategory } from "./types.js";

export { analyze, DEFAULT_COMPARATIVE_TOP_TEAMS } from "./analysis/analyze.js";
export { getDataset } from "./dataset/cache.js";
export { loadDataset, parseDataset } from "./dataset/load.js";

export function listCategories(): EntityCategory[] {
  return [...ENTITY_CATEGORIES];
}

export function listValues(dataset: Dataset, category: EntityCategory): string[] {
  return distinctValues(dataset, category);
}
