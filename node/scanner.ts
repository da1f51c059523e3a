import { readdir } from "node:fs/promises";
import path from "node:path";
import type { Logger } from "./log.js";

export type ExclusionRules = {
  excludedExtensions: readonly string[];
  excludedDirectories: readonly string[];
};

/**
 * Lists the absolute paths of all regular files below `root`, sorted.
 * Entries are judged by their own type; symlinks are never followed.
 * Rejects with the underlying I/O error if `root` cannot be read.
 */
export async function listFiles(root: string): Promise<string[]> {
  const absRoot = path.resolve(root);
  const entries = await readdir(absRoot, {
    recursive: true,
    withFileTypes: true,
  });
  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => path.join(entry.parentPath ?? entry.path, entry.name))
    .sort();
}

/**
 * Excluded directory names are matched against the directory path
 * relative to `root`, so the root's own path never triggers a match.
 */
export function isExcluded(file: string, rules: ExclusionRules, root: string) {
  const ext = path.extname(file).toLowerCase();
  if (rules.excludedExtensions.some((e) => e.toLowerCase() === ext)) {
    return true;
  }
  if (path.basename(file).startsWith(".")) {
    return true;
  }
  const dir = path.relative(path.resolve(root), path.dirname(file));
  return rules.excludedDirectories.some((d) => dir.includes(d));
}

export function filterFiles(
  files: readonly string[],
  rules: ExclusionRules,
  root: string
) {
  return files.filter((file) => !isExcluded(file, rules, root));
}

/** Scans once; a failed scan is logged and yields an empty list. */
export async function loadAllImages(
  root: string,
  rules: ExclusionRules,
  logger: Logger
): Promise<readonly string[]> {
  const started = Date.now();
  let files: string[];
  try {
    files = await listFiles(root);
  } catch (err) {
    logger.error(`Error scanning ${root}`, err);
    return Object.freeze([]);
  }
  const images = filterFiles(files, rules, root);
  logger.info(
    `Found ${images.length} images (${files.length} files) in ${root} in ${Date.now() - started}ms`
  );
  return Object.freeze(images);
}
