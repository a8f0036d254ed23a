import { promises as fs } from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { OllamaTransportError } from "../src/infra/ai/errors.js";
import { EmbeddingClient } from "../src/infra/ai/types.js";
import { IndexNotFoundError } from "../src/infra/store/indexFiles.js";
import { DEFAULT_QUESTION, resolveQuestion } from "../src/pipelines/context.js";
import { IngestService } from "../src/services/ingestService.js";
import { QueryService, QueryServiceOptions } from "../src/services/queryService.js";
import {
  createMemoryLogger,
  FakeChatClient,
  FakeEmbeddingClient,
  TEST_OLLAMA_URL,
} from "./helpers/fakes.js";

const TMP_DIR = path.resolve(".tmp-tests-query");
const DOCS_DIR = path.join(TMP_DIR, "docs");
const DATA_DIR = path.join(TMP_DIR, "data");

async function ingestDocs(files: Record<string, string>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const filePath = path.join(DOCS_DIR, name);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, "utf-8");
  }
  const service = new IngestService(new FakeEmbeddingClient(), {
    dataDir: DATA_DIR,
    embeddingServiceUrl: TEST_OLLAMA_URL,
    logger: createMemoryLogger(),
  });
  await service.ingest(DOCS_DIR);
}

function createQueryService(
  options: Partial<QueryServiceOptions> = {},
  embedder: EmbeddingClient = new FakeEmbeddingClient(),
) {
  const chat = new FakeChatClient();
  const service = new QueryService(embedder, chat, { dataDir: DATA_DIR, ...options });
  return { service, chat };
}

describe("QueryService", () => {
  afterEach(async () => {
    await fs.rm(TMP_DIR, { recursive: true, force: true });
  });

  it("sends the retrieved prefixes followed by the question to the chat model", async () => {
    await ingestDocs({ "alpha.md": "alpha alpha alpha", "beta.md": "beta" });
    const { service, chat } = createQueryService();

    const result = await service.ask("alpha alpha alpha");

    expect(result.answer).toBe("stub answer");
    expect(chat.prompts).toEqual(["alpha alpha alpha\n\nbeta\n\nalpha alpha alpha"]);
    expect(result.contexts.map((item) => path.basename(item.path))).toEqual([
      "alpha.md",
      "beta.md",
    ]);
    expect(result.contexts[0]?.distance).toBe(0);
  });

  it("returns at most three hits, nearest first", async () => {
    await ingestDocs({
      "one.md": "aaaa",
      "two.md": "aaab",
      "three.md": "aabb",
      "four.md": "bbbb",
    });
    const { service } = createQueryService();

    const hits = await service.search("aaaa");

    expect(hits.map((hit) => path.basename(hit.document.path))).toEqual([
      "one.md",
      "two.md",
      "three.md",
    ]);
    expect(hits.map((hit) => hit.distance)).toEqual([0, 2, 8]);
  });

  it("finds a document when queried with its own full text", async () => {
    await ingestDocs({
      "entities.md": "# Entities\nAlpha, Beta and Gamma are the registered entities.",
      "setup.md": "Install the toolchain, then run the ingest command.",
      "faq.json": '{"q":"What is the index?","a":"A flat L2 index."}',
    });
    const { service } = createQueryService();

    const hits = await service.search(
      '{"q":"What is the index?","a":"A flat L2 index."}',
    );

    expect(path.basename(hits[0]?.document.path ?? "")).toBe("faq.json");
    expect(hits[0]?.distance).toBe(0);
  });

  it("clamps the neighbour count to a smaller corpus", async () => {
    await ingestDocs({ "only.md": "lonely document" });
    const { service, chat } = createQueryService({ topK: 3 });

    const result = await service.ask("anything");

    expect(result.contexts).toHaveLength(1);
    expect(chat.prompts).toEqual(["lonely document\n\nanything"]);
  });

  it("re-reads context from disk at query time", async () => {
    await ingestDocs({ "doc.md": "original text" });
    await fs.writeFile(path.join(DOCS_DIR, "doc.md"), "edited after ingest", "utf-8");
    const { service, chat } = createQueryService();

    await service.ask("what changed?");

    expect(chat.prompts).toEqual(["edited after ingest\n\nwhat changed?"]);
  });

  it("truncates each context block to the prefix size", async () => {
    await ingestDocs({ "long.md": "y".repeat(1200) });
    const { service } = createQueryService({ prefixBytes: 800 });

    const contexts = await service.retrieveContexts("y");

    expect(contexts[0]?.text).toBe("y".repeat(800));
  });

  it("fails before embedding when no index has been built", async () => {
    const embedder = new FakeEmbeddingClient();
    const { service } = createQueryService({}, embedder);

    await expect(service.ask("anything")).rejects.toBeInstanceOf(IndexNotFoundError);
    expect(embedder.calls).toHaveLength(0);
  });

  it("propagates a failure to embed the question", async () => {
    await ingestDocs({ "doc.md": "content" });
    const failing: EmbeddingClient = {
      embed: async () => {
        throw new OllamaTransportError(`${TEST_OLLAMA_URL}/api/embeddings`, "fetch failed");
      },
    };
    const { service, chat } = createQueryService({}, failing);

    await expect(service.ask("anything")).rejects.toBeInstanceOf(OllamaTransportError);
    expect(chat.prompts).toHaveLength(0);
  });

  it("appends each question to the query log when configured", async () => {
    await ingestDocs({ "doc.md": "content" });
    const logPath = path.join(TMP_DIR, "logs", "queries.log");
    const { service } = createQueryService({ queryLogPath: logPath });

    await service.ask("first question");
    await service.ask("second question");

    const lines = (await fs.readFile(logPath, "utf-8")).trimEnd().split("\n");
    expect(lines).toHaveLength(2);
    expect(lines[0]).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z - first question$/);
    expect(lines[1]).toMatch(/ - second question$/);
  });

  it("leaves the query log untouched when no index exists", async () => {
    const logPath = path.join(TMP_DIR, "logs", "queries.log");
    const { service } = createQueryService({ queryLogPath: logPath });

    await expect(service.ask("too early")).rejects.toBeInstanceOf(IndexNotFoundError);
    await expect(fs.stat(logPath)).rejects.toThrow("ENOENT");
  });
});

describe("resolveQuestion", () => {
  it("joins trailing arguments with spaces", () => {
    expect(resolveQuestion(["who", "is", "Alpha?"])).toBe("who is Alpha?");
  });

  it("falls back to the default question without arguments", () => {
    expect(resolveQuestion([])).toBe("List all entity names.");
    expect(DEFAULT_QUESTION).toBe("List all entity names.");
  });
});
