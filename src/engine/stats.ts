import type { EnvironmentDescriptor } from "../catalog/types.js";
import { compareIds } from "../core/utils.js";

export type CatalogStats = {
  total: number;
  running: number;
  stopped: number;
  unknown: number;
  with_exploit: number;
  with_images: number;
  // category -> environment count, sorted by category name.
  categories: Record<string, number>;
};

export function computeStats(environments: readonly EnvironmentDescriptor[]): CatalogStats {
  const stats: CatalogStats = {
    total: environments.length,
    running: 0,
    stopped: 0,
    unknown: 0,
    with_exploit: 0,
    with_images: 0,
    categories: {},
  };

  const counts = new Map<string, number>();
  for (const env of environments) {
    stats[env.status] += 1;
    if (env.has_exploit) stats.with_exploit += 1;
    if (env.has_images) stats.with_images += 1;
    counts.set(env.category, (counts.get(env.category) ?? 0) + 1);
  }

  for (const category of [...counts.keys()].sort(compareIds)) {
    stats.categories[category] = counts.get(category) ?? 0;
  }

  return stats;
}
