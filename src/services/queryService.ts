import { promises as fs } from "node:fs";
import path from "node:path";
import { QueryHit, RetrievedContext } from "../domain/types.js";
import { ChatClient, EmbeddingClient } from "../infra/ai/types.js";
import { DEFAULT_PREFIX_BYTES, readTextPrefix } from "../infra/parsers/documentLoader.js";
import { loadIndexBundle } from "../infra/store/indexFiles.js";
import { buildContext, buildPrompt } from "../pipelines/context.js";

const DEFAULT_TOP_K = 3;

export interface QueryServiceOptions {
  dataDir: string;
  prefixBytes?: number;
  topK?: number;
  queryLogPath?: string | null;
}

export interface AskResult {
  question: string;
  answer: string;
  contexts: Array<{ path: string; distance: number }>;
}

export class QueryService {
  private readonly prefixBytes: number;

  private readonly topK: number;

  constructor(
    private readonly embedder: EmbeddingClient,
    private readonly chatClient: ChatClient,
    private readonly options: QueryServiceOptions,
  ) {
    this.prefixBytes = options.prefixBytes ?? DEFAULT_PREFIX_BYTES;
    this.topK = options.topK ?? DEFAULT_TOP_K;
  }

  /** Nearest documents to `question`; k is clamped to the corpus size. */
  async search(question: string, topK: number = this.topK): Promise<QueryHit[]> {
    const { index, records } = await loadIndexBundle(this.options.dataDir);
    const queryVector = await this.embedder.embed(question);
    const { distances, positions } = index.search(queryVector, topK);

    return positions.map((position, rank) => ({
      distance: distances[rank],
      position,
      document: records[position],
    }));
  }

  async retrieveContexts(question: string, topK: number = this.topK): Promise<RetrievedContext[]> {
    const hits = await this.search(question, topK);
    const contexts: RetrievedContext[] = [];

    // Re-read at query time: the context reflects the file as it is now.
    for (const hit of hits) {
      contexts.push({
        path: hit.document.path,
        distance: hit.distance,
        text: await readTextPrefix(hit.document.path, this.prefixBytes),
      });
    }
    return contexts;
  }

  async ask(question: string): Promise<AskResult> {
    const contexts = await this.retrieveContexts(question);
    // logged once the index has answered, so a missing index leaves no entry
    await this.appendQueryLog(question);
    const context = buildContext(contexts.map((item) => item.text));
    const answer = await this.chatClient.chat(buildPrompt(context, question));

    return {
      question,
      answer,
      contexts: contexts.map(({ path: contextPath, distance }) => ({
        path: contextPath,
        distance,
      })),
    };
  }

  private async appendQueryLog(question: string): Promise<void> {
    const logPath = this.options.queryLogPath;
    if (!logPath) {
      return;
    }
    const absolutePath = path.resolve(logPath);
    await fs.mkdir(path.dirname(absolutePath), { recursive: true });
    await fs.appendFile(absolutePath, `${new Date().toISOString()} - ${question}\n`, "utf-8");
  }
}
