// Public API surface: every non-private entity grouped by kind, visibility
// and parent directory.

import type { ApiSurface, Entity, PublicApiEntry } from "./types.js";

export function summarizeApiSurface(entities: readonly Entity[]): ApiSurface {
  const exposed = entities.filter((e) => e.visibility !== "private");

  const items: PublicApiEntry[] = exposed.map((e) => ({
    name: e.name,
    kind: e.kind,
    module: e.module,
  }));

  const byKind: Record<string, string[]> = {};
  const byVisibility: Record<string, string[]> = {};
  const byModule: Record<string, string[]> = {};

  for (const entity of exposed) {
    (byKind[entity.kind] ??= []).push(entity.name);
    (byVisibility[entity.visibility] ??= []).push(entity.name);
    (byModule[parentDirectory(entity.module)] ??= []).push(entity.name);
  }

  const count = (kind: Entity["kind"]) => exposed.filter((e) => e.kind === kind).length;

  return {
    items,
    byKind,
    byVisibility,
    byModule,
    stats: {
      totalItems: exposed.length,
      structs: count("struct"),
      enums: count("enum"),
      traits: count("trait"),
      functions: count("fn"),
      modules: count("mod"),
    },
  };
}

function parentDirectory(modulePath: string): string {
  const slash = modulePath.lastIndexOf("/");
  return slash > 0 ? modulePath.slice(0, slash) : "root";
}
