/**
 * Application entry point.
 *
 * High-level flow:
 * 1. Load environment configuration (.env beside the project root).
 * 2. Load the embedding model from MODEL_PATH (no downloads) and read its output size.
 * 3. Open the memory engine, restoring the snapshot at STORE_PATH if present.
 * 4. Optionally ingest INGEST_ROOT (files already in the snapshot are skipped).
 * 5. Serve the engine as MCP tools over stdio (default) or streamable HTTP
 *    (MCP_TRANSPORT=http|streamable-http), which adds GET /health.
 *
 * ENVIRONMENT VARIABLES (all optional):
 *  - STORE_PATH        JSON snapshot persisted after every change and reloaded at start.
 *  - INGEST_ROOT       Directory ingested at startup.
 *  - ALLOWED_EXT       Comma list of extensions picked up by ingestion (default txt,md,pdf).
 *  - CHUNK_SIZE        Tokens per chunk, windows overlap by half (default 512).
 *  - TOP_K             Default number of matches per query (default 5, max 50).
 *  - RERANK            Boost matches by query-term overlap by default.
 *  - VERBOSE           '1'/'true'/'yes'/'on' enables extra logging.
 *  - MODEL_NAME        Embedding model (default Xenova/all-MiniLM-L6-v2).
 *  - MODEL_PATH        Directory of local model folders (default ./models), e.g.
 *                      ./models/Xenova/all-MiniLM-L6-v2/onnx/model.onnx.
 *  - MCP_TRANSPORT     'stdio' (default) or 'http'.
 *  - MCP_PORT, HOST, ALLOWED_HOSTS, ENABLE_DNS_REBINDING_PROTECTION  HTTP mode only.
 *
 * All logging goes to stderr; stdout belongs to the stdio transport.
 */
import { getConfig } from "./config";
import { TransformersEmbeddings } from "./embeddings";
import { MemoryEngine } from "./memory-engine";
import { createServer } from "./server";
import { startHttpTransport } from "./transport/http";
import { startStdioTransport } from "./transport/stdio";

const config = getConfig();

const embeddings = new TransformersEmbeddings(config.MODEL_NAME, config.MODEL_PATH);
await embeddings.init();

const engine = await MemoryEngine.open({
  embeddings,
  storePath: config.STORE_PATH,
  chunkSize: config.CHUNK_SIZE,
  verbose: config.VERBOSE,
});

if (config.INGEST_ROOT) {
  engine.status.markReady(false);
  await engine.ingestDirectory(config.INGEST_ROOT, { extensions: config.ALLOWED_EXT });
  engine.status.markReady();
}

const shutdown = (signal: string) => {
  console.error(`[memory] ${signal} received, flushing snapshot...`);
  engine
    .close()
    .then(() => process.exit(0))
    .catch((e: unknown) => {
      console.error("[memory] Failed to flush snapshot on shutdown:", e);
      process.exit(1);
    });
};
process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

const defaults = { topK: config.TOP_K, rerank: config.RERANK };
const factory = () => createServer(engine, defaults);

if (config.MCP_TRANSPORT === "http") {
  await startHttpTransport(factory, engine.status);
} else {
  await startStdioTransport(factory, engine.status);
}
