import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

// =============================================================================
// STORAGE LAYOUT
// =============================================================================

export type StoragePaths = {
  root: string;
  originalsDir: string;
  logsDir: string;
};

export function createStoragePaths(storageDir: string, cwd: string = process.cwd()): StoragePaths {
  const root = path.resolve(cwd, storageDir);
  return {
    root,
    originalsDir: path.join(root, "originals"),
    logsDir: path.join(root, "logs"),
  };
}

export function uploadDir(paths: StoragePaths, uploadId: string): string {
  return path.join(paths.originalsDir, uploadId);
}

export function originalArtifactPath(
  paths: StoragePaths,
  uploadId: string,
  safeName: string,
): string {
  return path.join(uploadDir(paths, uploadId), safeName);
}

export function eventsLogPath(paths: StoragePaths): string {
  return path.join(paths.logsDir, "events.jsonl");
}

// Only entries directly inside the root resolve; the root itself, nested paths
// (originals/, logs/) and anything outside give null.
export function resolveRootEntry(root: string, name: string): string | null {
  const resolvedRoot = path.resolve(root);
  const candidate = path.resolve(resolvedRoot, name);
  const relative = path.relative(resolvedRoot, candidate);
  if (!relative || relative === ".." || path.isAbsolute(relative) || path.dirname(relative) !== ".") {
    return null;
  }
  return candidate;
}

// =============================================================================
// FILENAMES
// =============================================================================

// ASCII letters, digits, "_", "." and "-" only; whitespace runs become "_".
export function secureFilename(filename: string): string {
  const name = filename
    .normalize("NFKD")
    .replace(/[^\x00-\x7f]/g, "")
    .replace(/[/\\]/g, " ");

  return name
    .split(/\s+/)
    .filter((part) => part.length > 0)
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+|[._]+$/g, "");
}

export function hasAllowedExtension(filename: string, extensions: readonly string[]): boolean {
  const lower = filename.toLowerCase();
  return extensions.some((extension) => lower.endsWith(extension.toLowerCase()));
}

export function fileExtension(filename: string): string {
  const extension = path.extname(filename);
  return extension.startsWith(".") ? extension.slice(1) : extension;
}

// =============================================================================
// PACKAGE ASSETS
// =============================================================================

export function findPackageRoot(startDir: string = path.dirname(fileURLToPath(import.meta.url))): string {
  let current = startDir;

  while (true) {
    if (fs.existsSync(path.join(current, "package.json"))) return current;

    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }

  throw new Error("package.json not found while resolving package assets");
}
