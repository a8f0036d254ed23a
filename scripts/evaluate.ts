import "dotenv/config";
import { loadConfig } from "../src/config/env.js";
import { readTextPrefix } from "../src/infra/parsers/documentLoader.js";
import { loadIndexBundle } from "../src/infra/store/indexFiles.js";
import { createServices } from "../src/services/createServices.js";

// Embeds every indexed document's prefix as a query and checks that the
// document comes back among the nearest hits. Needs a running Ollama.
async function main() {
  const config = loadConfig();
  const { queryService } = createServices(config);
  const { records } = await loadIndexBundle(config.dataDir);

  const rows: Array<{
    path: string;
    top1_ok: boolean;
    topk_ok: boolean;
    self_distance: number | null;
    latency_ms: number;
  }> = [];

  for (const record of records) {
    const startedAt = Date.now();
    const prefix = await readTextPrefix(record.path, config.prefixBytes);
    const hits = await queryService.search(prefix, config.topK);
    const self = hits.find((hit) => hit.document.path === record.path);

    rows.push({
      path: record.path,
      top1_ok: hits[0]?.document.path === record.path,
      topk_ok: self !== undefined,
      self_distance: self ? self.distance : null,
      latency_ms: Date.now() - startedAt,
    });
  }

  const top1HitRate = ratio(rows.filter((row) => row.top1_ok).length, rows.length);
  const topKHitRate = ratio(rows.filter((row) => row.topk_ok).length, rows.length);
  const avgLatencyMs =
    rows.length === 0
      ? 0
      : Math.round(rows.reduce((sum, row) => sum + row.latency_ms, 0) / rows.length);

  console.log("Self-retrieval Summary");
  console.log("======================");
  console.log(`documents: ${rows.length}`);
  console.log(`top1_hit_rate: ${top1HitRate}`);
  console.log(`top${config.topK}_hit_rate: ${topKHitRate}`);
  console.log(`avg_latency_ms: ${avgLatencyMs}`);
  console.log("");
  console.log("Per Document");
  console.log("------------");
  for (const row of rows) {
    const distance = row.self_distance === null ? "-" : row.self_distance.toFixed(4);
    console.log(
      `- ${row.path} | top1=${row.top1_ok} | top${config.topK}=${row.topk_ok} | self_distance=${distance} | latency=${row.latency_ms}ms`,
    );
  }
}

function ratio(hit: number, total: number): string {
  if (total === 0) {
    return "0.00";
  }
  return (hit / total).toFixed(2);
}

main().catch((error) => {
  console.error("Evaluation failed:", error);
  process.exit(1);
});
