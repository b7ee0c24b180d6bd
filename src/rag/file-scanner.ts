import { readFile, readdir, stat } from "node:fs/promises";
import { createHash } from "node:crypto";
import path from "node:path";
import { UnprocessableDocumentError } from "./errors.js";

export async function hashFile(filePath: string): Promise<string> {
  const buffer = await readFile(filePath);
  return createHash("sha256").update(buffer).digest("hex");
}

export function isPdf(filePath: string): boolean {
  return filePath.toLowerCase().endsWith(".pdf");
}

/** False for files and for paths that do not exist. */
export async function isDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
    throw err;
  }
}

/** Absolute paths of the PDFs under `root`, sorted. */
export async function scanPdfFiles(root: string, options: { recursive?: boolean } = {}): Promise<string[]> {
  const absRoot = path.resolve(root);
  const rootStat = await stat(absRoot).catch(() => null);
  if (!rootStat?.isDirectory()) {
    throw new UnprocessableDocumentError(absRoot, "not a directory");
  }

  const found: string[] = [];
  const walk = async (dir: string): Promise<void> => {
    const entries = await readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        if (options.recursive !== false && !entry.name.startsWith(".")) await walk(full);
      } else if (entry.isFile() && isPdf(entry.name)) {
        found.push(full);
      }
    }
  };
  await walk(absRoot);
  return found.sort();
}

/**
 * Parent directory of `filePath` relative to `root`, with "/" separators.
 * Files directly in `root` get "".
 */
export function directoryLabel(filePath: string, root: string): string {
  const rel = path.relative(path.resolve(root), path.dirname(path.resolve(filePath)));
  if (rel === "" || rel.startsWith("..")) return "";
  return rel.split(path.sep).join("/");
}
