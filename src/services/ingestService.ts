import { DocumentRecord } from "../domain/types.js";
import { EmbeddingClient } from "../infra/ai/types.js";
import {
  DEFAULT_PREFIX_BYTES,
  listDocumentFiles,
  readTextPrefix,
} from "../infra/parsers/documentLoader.js";
import { FlatL2Index } from "../infra/store/flatL2Index.js";
import { saveIndexBundle } from "../infra/store/indexFiles.js";
import { consoleLogger, describeError, Logger } from "../utils/logger.js";

const PROGRESS_EVERY = 10;

export interface IngestServiceOptions {
  dataDir: string;
  prefixBytes?: number;
  /** Shown in the diagnostic when nothing could be embedded. */
  embeddingServiceUrl: string;
  logger?: Logger;
}

export interface FailedIngest {
  path: string;
  reason: string;
}

export interface IngestResult {
  ingested_count: number;
  written: boolean;
  index_path: string | null;
  metadata_path: string | null;
  failed: FailedIngest[];
}

export class IngestService {
  private readonly logger: Logger;

  private readonly prefixBytes: number;

  constructor(
    private readonly embedder: EmbeddingClient,
    private readonly options: IngestServiceOptions,
  ) {
    this.logger = options.logger ?? consoleLogger;
    this.prefixBytes = options.prefixBytes ?? DEFAULT_PREFIX_BYTES;
  }

  async ingest(root: string): Promise<IngestResult> {
    const { files, skipped } = await listDocumentFiles(root, {
      exclude: [this.options.dataDir],
    });

    const vectors: Float32Array[] = [];
    const records: DocumentRecord[] = [];
    const failed: FailedIngest[] = [];
    let dimension: number | null = null;

    for (const entry of skipped) {
      failed.push(entry);
      this.logger.warn(`Skipping ${entry.path}: ${entry.reason}`);
    }

    for (const file of files) {
      try {
        const prefix = await readTextPrefix(file.path, this.prefixBytes);
        const vector = await this.embedder.embed(prefix);

        dimension ??= vector.length;
        if (vector.length !== dimension) {
          throw new Error(
            `Embedding dimension ${vector.length} does not match ${dimension} from earlier files.`,
          );
        }

        vectors.push(vector);
        records.push({ path: file.path, bytes: file.bytes });
        if (records.length % PROGRESS_EVERY === 0) {
          this.logger.info(`Processed ${records.length} files...`);
        }
      } catch (error) {
        const reason = describeError(error);
        failed.push({ path: file.path, reason });
        this.logger.warn(`Skipping ${file.path}: ${reason}`);
      }
    }

    if (dimension === null || records.length === 0) {
      this.logger.warn(
        `No files ingested. Check your embedding service at ${this.options.embeddingServiceUrl}`,
      );
      return {
        ingested_count: 0,
        written: false,
        index_path: null,
        metadata_path: null,
        failed,
      };
    }

    const index = new FlatL2Index(dimension);
    index.add(vectors);
    const paths = await saveIndexBundle(this.options.dataDir, { index, records });
    this.logger.info(`Ingested ${records.length} files -> ${paths.indexPath}`);

    return {
      ingested_count: records.length,
      written: true,
      index_path: paths.indexPath,
      metadata_path: paths.metadataPath,
      failed,
    };
  }
}
