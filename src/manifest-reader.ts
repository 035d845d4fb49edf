// src/manifest-reader.ts — Cargo manifest reader
// Reads the root Cargo.toml and the manifests of its workspace members.
// The raw text is kept as import evidence even when TOML parsing fails.

import { existsSync, readFileSync, readdirSync, statSync } from "node:fs";
import { join, relative, resolve } from "node:path";
import picomatch from "picomatch";
import { parse } from "smol-toml";
import type { ManifestInfo, ManifestPackage, Warning } from "./types.js";

const MANIFEST_FILE = "Cargo.toml";
const DEPENDENCY_TABLES = ["dependencies", "dev-dependencies", "build-dependencies"] as const;
/** Depth cap for `**` in member globs. */
const MAX_MEMBER_DEPTH = 4;

type TomlTable = Record<string, unknown>;

/**
 * Read the project's manifest. A missing Cargo.toml yields an empty,
 * non-workspace result.
 */
export function readManifest(projectDir: string, warnings: Warning[] = []): ManifestInfo {
  const absDir = resolve(projectDir);
  const result: ManifestInfo = {
    found: false,
    text: "",
    isWorkspace: false,
    packageCount: 0,
    packages: [],
  };

  const rootText = readManifestText(join(absDir, MANIFEST_FILE), warnings);
  if (rootText === undefined) return result;

  result.found = true;
  const texts = [rootText];
  const root = parseManifest(rootText, join(absDir, MANIFEST_FILE), warnings);

  if (root) {
    const rootPackage = readPackage(root, ".");
    if (rootPackage) {
      result.name = rootPackage.name;
      result.version = rootPackage.version;
      result.packages.push(rootPackage);
    }

    for (const memberDir of expandWorkspaceMembers(absDir, root)) {
      const manifestPath = join(absDir, memberDir, MANIFEST_FILE);
      const memberText = readManifestText(manifestPath, warnings);
      if (memberText === undefined) continue;
      texts.push(memberText);

      const member = parseManifest(memberText, manifestPath, warnings);
      const pkg = member ? readPackage(member, memberDir) : undefined;
      if (pkg) result.packages.push(pkg);
    }
  }

  result.text = texts.join("\n");
  result.packageCount = result.packages.length;
  result.isWorkspace = result.packageCount > 1;
  return result;
}

/**
 * Member directories (project-relative, posix) named by `[workspace].members`
 * that hold a Cargo.toml and are not listed in `[workspace].exclude`.
 */
export function expandWorkspaceMembers(absDir: string, manifest: TomlTable): string[] {
  const workspace = manifest.workspace;
  if (!isTable(workspace)) return [];

  const members = stringArray(workspace.members);
  if (members.length === 0) return [];

  const excluded = stringArray(workspace.exclude).map(trimSlashes);
  const isExcluded = excluded.length > 0 ? picomatch(excluded) : undefined;

  const found = new Set<string>();
  for (const raw of members) {
    const pattern = trimSlashes(raw);
    const scan = picomatch.scan(pattern);
    if (!scan.isGlob) {
      if (hasManifest(absDir, pattern)) found.add(pattern);
      continue;
    }

    const isMatch = picomatch(pattern);
    const base = trimSlashes(scan.base);
    const depth = pattern.includes("**") ? MAX_MEMBER_DEPTH : pattern.split("/").length;
    for (const dir of listDirectories(absDir, base, depth)) {
      if (isMatch(dir) && hasManifest(absDir, dir)) found.add(dir);
    }
  }

  return [...found].filter((dir) => !isExcluded?.(dir)).sort();
}

function readPackage(manifest: TomlTable, path: string): ManifestPackage | undefined {
  const pkg = manifest.package;
  if (!isTable(pkg) || typeof pkg.name !== "string") return undefined;

  const dependencies = new Set<string>();
  for (const table of DEPENDENCY_TABLES) {
    const deps = manifest[table];
    if (isTable(deps)) Object.keys(deps).forEach((d) => dependencies.add(d));
  }

  return {
    name: pkg.name,
    path,
    // Workspace-inherited fields are tables like `{ workspace = true }`
    version: typeof pkg.version === "string" ? pkg.version : undefined,
    description: typeof pkg.description === "string" ? pkg.description : undefined,
    dependencies: [...dependencies].sort(),
  };
}

function readManifestText(path: string, warnings: Warning[]): string | undefined {
  if (!existsSync(path)) return undefined;
  try {
    return readFileSync(path, "utf-8");
  } catch (err) {
    warnings.push({
      level: "warn",
      module: "manifest-reader",
      message: `Could not read manifest: ${err instanceof Error ? err.message : String(err)}`,
      file: path,
    });
    return undefined;
  }
}

function parseManifest(text: string, path: string, warnings: Warning[]): TomlTable | undefined {
  try {
    return parse(text);
  } catch (err) {
    warnings.push({
      level: "warn",
      module: "manifest-reader",
      message: `Malformed TOML, raw text used as import evidence only: ${err instanceof Error ? err.message : String(err)}`,
      file: path,
    });
    return undefined;
  }
}

function listDirectories(absDir: string, base: string, depth: number): string[] {
  const out: string[] = [];
  const walk = (rel: string, remaining: number) => {
    if (remaining === 0) return;
    let entries: string[];
    try {
      entries = readdirSync(join(absDir, rel));
    } catch {
      return; // missing base directory
    }
    for (const entry of entries) {
      if (entry.startsWith(".") || entry === "target") continue;
      const child = rel ? `${rel}/${entry}` : entry;
      if (!isDirectory(join(absDir, child))) continue;
      out.push(child);
      walk(child, remaining - 1);
    }
  };
  walk(base, depth - (base ? base.split("/").length : 0));
  return out;
}

function hasManifest(absDir: string, dir: string): boolean {
  const path = join(absDir, dir, MANIFEST_FILE);
  return relative(absDir, path) !== MANIFEST_FILE && existsSync(path);
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function isTable(value: unknown): value is TomlTable {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringArray(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string") : [];
}

function trimSlashes(value: string): string {
  return value.replace(/^\.\//, "").replace(/\/+$/, "");
}
