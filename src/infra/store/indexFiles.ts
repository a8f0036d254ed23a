import { promises as fs } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { DocumentRecord } from "../../domain/types.js";
import { FlatL2Index, IndexFormatError } from "./flatL2Index.js";

export const INDEX_FILE_NAME = "repo.index";
export const METADATA_FILE_NAME = "repo.meta.json";

const metadataSchema = z.array(
  z.object({
    path: z.string().min(1),
    bytes: z.number().int().nonnegative(),
  }),
);

export class IndexNotFoundError extends Error {
  constructor(readonly missingPath: string) {
    super(`Index file not found: ${missingPath}. Run the ingest command first.`);
    this.name = "IndexNotFoundError";
  }
}

export interface IndexBundle {
  index: FlatL2Index;
  records: DocumentRecord[];
}

export interface IndexFilePaths {
  indexPath: string;
  metadataPath: string;
}

export interface IndexStorageInfo extends IndexFilePaths {
  exists: boolean;
  index_size_bytes: number;
  metadata_size_bytes: number;
  document_count: number | null;
  dimension: number | null;
}

export function resolveIndexFilePaths(dataDir: string): IndexFilePaths {
  const absoluteDir = path.resolve(dataDir);
  return {
    indexPath: path.join(absoluteDir, INDEX_FILE_NAME),
    metadataPath: path.join(absoluteDir, METADATA_FILE_NAME),
  };
}

export async function saveIndexBundle(
  dataDir: string,
  bundle: IndexBundle,
): Promise<IndexFilePaths> {
  const { index, records } = bundle;
  if (index.size !== records.length) {
    throw new Error(
      `Index has ${index.size} rows but metadata lists ${records.length} documents.`,
    );
  }

  const paths = resolveIndexFilePaths(dataDir);
  await fs.mkdir(path.dirname(paths.indexPath), { recursive: true });

  const metadata: DocumentRecord[] = records.map((record) => ({
    path: record.path,
    bytes: record.bytes,
  }));

  await writeFileAtomically(paths.indexPath, index.serialize());
  await writeFileAtomically(paths.metadataPath, JSON.stringify(metadata));

  return paths;
}

export async function loadIndexBundle(dataDir: string): Promise<IndexBundle> {
  const paths = resolveIndexFilePaths(dataDir);

  const rawIndex = await readRequiredFile(paths.indexPath);
  const rawMetadata = await readRequiredFile(paths.metadataPath);

  const index = FlatL2Index.deserialize(rawIndex);
  const records = parseMetadata(rawMetadata.toString("utf-8"), paths.metadataPath);

  if (index.size !== records.length) {
    throw new IndexFormatError(
      `Index has ${index.size} rows but ${paths.metadataPath} lists ${records.length} documents.`,
    );
  }

  return { index, records };
}

export async function getIndexStorageInfo(dataDir: string): Promise<IndexStorageInfo> {
  const paths = resolveIndexFilePaths(dataDir);
  const indexStat = await readStorageStat(paths.indexPath);
  const metadataStat = await readStorageStat(paths.metadataPath);
  const exists = indexStat.exists && metadataStat.exists;

  let documentCount: number | null = null;
  let dimension: number | null = null;
  if (exists) {
    const { index } = await loadIndexBundle(dataDir);
    documentCount = index.size;
    dimension = index.dimension;
  }

  return {
    ...paths,
    exists,
    index_size_bytes: indexStat.sizeBytes,
    metadata_size_bytes: metadataStat.sizeBytes,
    document_count: documentCount,
    dimension,
  };
}

function parseMetadata(raw: string, filePath: string): DocumentRecord[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    const reason = error instanceof Error ? error.message : "unknown error";
    throw new IndexFormatError(`Metadata file ${filePath} is not valid JSON: ${reason}`);
  }

  const result = metadataSchema.safeParse(parsed);
  if (!result.success) {
    throw new IndexFormatError(
      `Metadata file ${filePath} has an invalid shape: ${result.error.issues[0]?.message ?? "unknown issue"}`,
    );
  }
  return result.data;
}

async function readRequiredFile(filePath: string): Promise<Buffer> {
  try {
    return await fs.readFile(filePath);
  } catch (error) {
    if (isFileMissing(error)) {
      throw new IndexNotFoundError(filePath);
    }
    throw error;
  }
}

async function readStorageStat(filePath: string): Promise<{ exists: boolean; sizeBytes: number }> {
  try {
    const stat = await fs.stat(filePath);
    return { exists: true, sizeBytes: stat.size };
  } catch (error) {
    if (isFileMissing(error)) {
      return { exists: false, sizeBytes: 0 };
    }
    throw error;
  }
}

async function writeFileAtomically(targetPath: string, content: Buffer | string): Promise<void> {
  const tempPath = `${targetPath}.tmp`;
  await fs.writeFile(tempPath, content);
  try {
    await fs.rename(tempPath, targetPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}

function isFileMissing(error: unknown): boolean {
  return errorCode(error) === "ENOENT";
}

function errorCode(error: unknown): string | undefined {
  if (!(error instanceof Error) || !("code" in error)) {
    return undefined;
  }
  const { code } = error;
  return typeof code === "string" ? code : undefined;
}
