// src/source-scanner.ts — Source Scanner
// Enumerates Rust sources under a project, drops test/bench/example code by
// path substring, and decodes file text with lossy UTF-8.

import { readdirSync, readFileSync, statSync, realpathSync, existsSync } from "node:fs";
import { resolve, relative, join, sep } from "node:path";
import picomatch from "picomatch";
import {
  type Warning,
  DEFAULT_EXCLUDE_DIRS,
  TEST_PATH_MARKERS,
  SOURCE_EXTENSION,
} from "./types.js";

const SKIPPED_DIRS: ReadonlySet<string> = new Set(DEFAULT_EXCLUDE_DIRS);

export interface ScanOptions {
  /** Extra globs, matched against the project-relative path. */
  exclude?: string[];
  includeTests?: boolean;
}

export interface SourceFile {
  /** Project-relative, posix separators. */
  relativePath: string;
  absolutePath: string;
  text: string;
}

/**
 * Discover analyzable source files for a project.
 * Scans `src/` when present, the project root otherwise. Results are
 * project-relative posix paths in sorted order.
 */
export function scanSourceFiles(
  projectDir: string,
  options: ScanOptions = {},
  warnings: Warning[] = [],
): string[] {
  const absProjectDir = resolve(projectDir);
  if (!existsSync(absProjectDir)) {
    warnings.push({
      level: "warn",
      module: "source-scanner",
      message: "Project directory does not exist",
      file: absProjectDir,
    });
    return [];
  }

  const srcDir = join(absProjectDir, "src");
  const scanRoot = isDirectory(srcDir) ? srcDir : absProjectDir;

  const visited = new Set<number>();
  const found: string[] = [];
  walkDirectory(scanRoot, absProjectDir, found, visited, warnings);

  const isExcluded =
    options.exclude && options.exclude.length > 0
      ? picomatch(options.exclude, { dot: true })
      : undefined;

  return found
    .map((f) => toPosix(relative(absProjectDir, f)))
    .filter((rel) => options.includeTests || !isTestPath(rel))
    .filter((rel) => !isExcluded || !isExcluded(rel))
    .sort();
}

/**
 * True when a project-relative path belongs to test, bench or example code.
 * The path is anchored with a leading slash so top-level `tests/` matches too.
 */
export function isTestPath(relativePath: string): boolean {
  const anchored = "/" + relativePath;
  return TEST_PATH_MARKERS.some((marker) => anchored.includes(marker));
}

/**
 * Read a file as UTF-8, substituting U+FFFD for invalid byte sequences.
 * Returns undefined (with a warning) when the file cannot be read.
 */
export function readSourceText(
  absolutePath: string,
  warnings: Warning[] = [],
): string | undefined {
  let bytes: Buffer;
  try {
    bytes = readFileSync(absolutePath);
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "source-scanner",
      message: `Cannot read file: ${msg}`,
      file: absolutePath,
    });
    return undefined;
  }
  return new TextDecoder("utf-8", { fatal: false }).decode(bytes);
}

/**
 * Scan and decode every source file of a project, in sorted order.
 * Unreadable files are skipped.
 */
export function loadSourceFiles(
  projectDir: string,
  options: ScanOptions = {},
  warnings: Warning[] = [],
): SourceFile[] {
  const absProjectDir = resolve(projectDir);
  const files: SourceFile[] = [];
  for (const rel of scanSourceFiles(absProjectDir, options, warnings)) {
    const absolutePath = join(absProjectDir, rel);
    const text = readSourceText(absolutePath, warnings);
    if (text === undefined) continue;
    files.push({ relativePath: rel, absolutePath, text });
  }
  return files;
}

function walkDirectory(
  dir: string,
  projectDir: string,
  results: string[],
  visitedInodes: Set<number>,
  warnings: Warning[],
): void {
  let entries;
  try {
    entries = readdirSync(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const msg = err instanceof Error ? err.message : String(err);
    warnings.push({
      level: "warn",
      module: "source-scanner",
      message: `Cannot read directory: ${msg}`,
      file: dir,
    });
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (SKIPPED_DIRS.has(entry.name)) continue;
      walkDirectory(fullPath, projectDir, results, visitedInodes, warnings);
    } else if (entry.isSymbolicLink()) {
      try {
        const realPath = realpathSync(fullPath);
        const stat = statSync(realPath);

        if (!realPath.startsWith(projectDir)) {
          warnings.push({
            level: "info",
            module: "source-scanner",
            message: `Symlink ${toPosix(relative(projectDir, fullPath))} points outside the project, skipped`,
            file: fullPath,
          });
          continue;
        }

        if (stat.isDirectory()) {
          if (visitedInodes.has(stat.ino)) continue;
          visitedInodes.add(stat.ino);
          if (!SKIPPED_DIRS.has(entry.name)) {
            walkDirectory(fullPath, projectDir, results, visitedInodes, warnings);
          }
        } else if (stat.isFile() && SOURCE_EXTENSION.test(entry.name)) {
          results.push(fullPath);
        }
      } catch (err: unknown) {
        const msg = err instanceof Error ? err.message : String(err);
        warnings.push({
          level: "warn",
          module: "source-scanner",
          message: `Cannot resolve symlink: ${msg}`,
          file: fullPath,
        });
      }
    } else if (entry.isFile() && SOURCE_EXTENSION.test(entry.name)) {
      results.push(fullPath);
    }
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function toPosix(p: string): string {
  return p.split(sep).join("/");
}
