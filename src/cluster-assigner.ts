import type { Cluster, Entity } from "./types.js";
import { assertArgument } from "./text-utils.js";

/** Checked in order; the first rule whose marker appears in the path wins. */
const LAYER_RULES: ReadonlyArray<{ layer: string; markers: readonly string[] }> = [
  { layer: "Domain Layer", markers: ["domain", "entity", "model"] },
  { layer: "Application Layer", markers: ["service", "application", "handler"] },
  { layer: "Infrastructure Layer", markers: ["repo", "db", "storage"] },
  { layer: "Interface Layer", markers: ["api", "http", "web"] },
  { layer: "Utilities", markers: ["util", "common", "helper"] },
];

/** Layer label for a module path. Total: every path gets exactly one label. */
export function classifyLayer(modulePath: string): string {
  for (const { layer, markers } of LAYER_RULES) {
    if (markers.some((m) => modulePath.includes(m))) return layer;
  }

  const parts = modulePath.split("/");
  if (parts.length > 1) {
    const last = parts[parts.length - 1];
    return `Module: ${last.endsWith(".rs") ? parts[parts.length - 2] : last}`;
  }
  return "Core";
}

/**
 * Partition entities into layers. Clusters are sorted by name and hold sorted,
 * unique entity names.
 */
export function assignClusters(entities: readonly Entity[]): Cluster[] {
  assertArgument(Array.isArray(entities), "assignClusters: entities must be an array");

  const clusters = new Map<string, Set<string>>();
  for (const entity of entities) {
    const layer = classifyLayer(entity.module);
    let members = clusters.get(layer);
    if (!members) {
      members = new Set();
      clusters.set(layer, members);
    }
    members.add(entity.name);
  }

  return [...clusters.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, members]) => ({ name, entityIds: [...members].sort() }));
}
