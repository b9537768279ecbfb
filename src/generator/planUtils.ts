import { existsSync, readFileSync, statSync, type Stats } from "node:fs";
import { join } from "node:path";
import type { DirAction, FileAction, FileSet, PlanAction } from "./types.js";

export const normalizeNewlines = (text: string): string => text.replace(/\r\n/g, "\n").replace(/\r/g, "\n");

export const contentEqual = (left: string, right: string): boolean => normalizeNewlines(left) === normalizeNewlines(right);

const createDirAction = (path: string, exists: boolean): DirAction => ({
  type: exists ? "SKIP" : "CREATE",
  path,
  entryType: "dir",
  reason: exists ? "directory exists" : "new directory"
});

const errorCode = (error: unknown): string =>
  error instanceof Error && "code" in error && typeof error.code === "string" ? error.code : "unknown error";

type EntryState = { kind: "missing" } | { kind: "found"; stats: Stats } | { kind: "unreadable"; code: string };

// Planning never throws: entries it cannot inspect are left for the write step to report.
const inspectEntry = (path: string): EntryState => {
  try {
    return { kind: "found", stats: statSync(path) };
  } catch (error) {
    const code = errorCode(error);
    return code === "ENOENT" || code === "ENOTDIR" ? { kind: "missing" } : { kind: "unreadable", code };
  }
};

const readText = (path: string): { ok: true; text: string } | { ok: false; code: string } => {
  try {
    return { ok: true, text: readFileSync(path, "utf8") };
  } catch (error) {
    return { ok: false, code: errorCode(error) };
  }
};

// Existing files are always overwritten; the reason only tells whether anything changes.
const createFileAction = (rootDir: string, path: string, content: string): FileAction => {
  const absolute = join(rootDir, path);
  const entry = inspectEntry(absolute);
  if (entry.kind === "missing") {
    return { type: "CREATE", path, entryType: "file", reason: "new file", content };
  }
  if (entry.kind === "unreadable") {
    return { type: "OVERWRITE", path, entryType: "file", reason: `cannot stat (${entry.code})`, content };
  }
  if (!entry.stats.isFile()) {
    return { type: "OVERWRITE", path, entryType: "file", reason: "not a regular file", content };
  }

  const current = readText(absolute);
  if (!current.ok) {
    return { type: "OVERWRITE", path, entryType: "file", reason: `cannot read (${current.code})`, content };
  }

  const same = contentEqual(current.text, content);
  return {
    type: "OVERWRITE",
    path,
    entryType: "file",
    reason: same ? "unchanged" : "content changed",
    content
  };
};

export const buildActionsForFileSet = (rootDir: string, fileSet: FileSet): PlanAction[] => {
  const actions: PlanAction[] = [];

  Array.from(new Set(fileSet.directories)).forEach((dirPath) => {
    actions.push(createDirAction(dirPath, existsSync(join(rootDir, dirPath))));
  });

  Object.entries(fileSet.files).forEach(([relativePath, content]) => {
    actions.push(createFileAction(rootDir, relativePath, content));
  });

  return actions;
};
