import { Dirent, promises as fs } from "node:fs";
import path from "node:path";
import { describeError } from "../../utils/logger.js";

const SUPPORTED_EXTENSIONS = new Set([".md", ".json"]);

export const DEFAULT_PREFIX_BYTES = 800;

export interface DocumentFile {
  path: string;
  bytes: number;
}

export interface SkippedEntry {
  path: string;
  reason: string;
}

export interface DocumentScan {
  files: DocumentFile[];
  /** Entries below the root that could not be read; the walk carries on past them. */
  skipped: SkippedEntry[];
}

export interface ListDocumentFilesOptions {
  /** Directories skipped during the walk, e.g. the index output directory. */
  exclude?: string[];
}

export function isSupportedDocumentExtension(filePath: string): boolean {
  return SUPPORTED_EXTENSIONS.has(path.extname(filePath).toLowerCase());
}

/**
 * Walks `root` in name order and collects non-empty `.md` / `.json` files.
 * Symlinked files are kept; symlinked directories are not followed.
 * A missing or unreadable root rejects.
 */
export async function listDocumentFiles(
  root: string,
  options: ListDocumentFilesOptions = {},
): Promise<DocumentScan> {
  const absoluteRoot = path.resolve(root);
  const excluded = new Set((options.exclude ?? []).map((dir) => path.resolve(dir)));
  const files: DocumentFile[] = [];
  const skipped: SkippedEntry[] = [];

  const rootStat = await fs.stat(absoluteRoot);
  if (rootStat.isFile()) {
    if (isSupportedDocumentExtension(absoluteRoot) && rootStat.size > 0) {
      files.push({ path: absoluteRoot, bytes: rootStat.size });
    }
    return { files, skipped };
  }

  const walk = async (dir: string, entries: Dirent[]): Promise<void> => {
    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const entryPath = path.join(dir, entry.name);
      try {
        if (entry.isDirectory()) {
          if (!excluded.has(entryPath)) {
            await walk(entryPath, await fs.readdir(entryPath, { withFileTypes: true }));
          }
          continue;
        }
        const maybeFile = entry.isFile() || entry.isSymbolicLink();
        if (!maybeFile || !isSupportedDocumentExtension(entryPath)) {
          continue;
        }

        const stat = await fs.stat(entryPath);
        if (stat.isFile() && stat.size > 0) {
          files.push({ path: entryPath, bytes: stat.size });
        }
      } catch (error) {
        skipped.push({ path: entryPath, reason: describeError(error) });
      }
    }
  };

  if (!excluded.has(absoluteRoot)) {
    await walk(absoluteRoot, await fs.readdir(absoluteRoot, { withFileTypes: true }));
  }
  return { files, skipped };
}

/**
 * Reads at most `maxBytes` bytes and decodes them as UTF-8. Invalid byte
 * sequences become U+FFFD; a multi-byte character cut by the limit is dropped.
 */
export async function readTextPrefix(
  filePath: string,
  maxBytes: number = DEFAULT_PREFIX_BYTES,
): Promise<string> {
  const handle = await fs.open(filePath, "r");
  try {
    const buffer = Buffer.alloc(maxBytes);
    const { bytesRead } = await handle.read(buffer, 0, maxBytes, 0);
    return decodePrefix(buffer.subarray(0, bytesRead));
  } finally {
    await handle.close();
  }
}

export function decodePrefix(bytes: Uint8Array): string {
  const decoder = new TextDecoder("utf-8", { fatal: false });
  // stream mode holds back an incomplete trailing sequence instead of replacing it
  return decoder.decode(bytes, { stream: true });
}
