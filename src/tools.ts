import { z } from "zod";
import { MemoryEngineError } from "./errors";
import type { MemoryEngine } from "./memory-engine";
import { ErrorCode, McpError, type CallToolResult, type Tool } from "./mcp-sdk";
import type { QueryResponse } from "./types";

// Tool argument schemas. Unknown keys are ignored.
const DocumentTypeArg = z.enum(["text", "pdf", "image", "audio"]);

const IndexDocumentArgs = z.object({
  source: z.string().trim().min(1, "Missing source"),
  type: z.enum(["auto", "text", "pdf", "image", "audio"]).default("auto"),
});

const QueryArgs = z.object({
  query: z.string().trim().min(1, "Missing query"),
  top_k: z.number().int().min(0).max(50).optional(),
  type: DocumentTypeArg.optional(),
  source: z.string().optional(),
  rerank: z.boolean().optional(),
  fusion: z.boolean().optional(),
  format: z.enum(["matches", "context"]).default("matches"),
});

const DocumentIdArgs = z.object({
  document_id: z.string().trim().min(1, "Missing document_id"),
});

/** Server-level defaults applied when a tool call omits them. */
export interface ToolDefaults {
  topK: number;
  rerank: boolean;
}

/** Static tool schemas returned by tools/list. */
export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: "index_document",
    description:
      "Extract, chunk and embed a local document into memory. Returns the new document id and its chunk count.",
    inputSchema: {
      type: "object",
      properties: {
        source: { type: "string", description: "Path of the document on the local filesystem." },
        type: {
          type: "string",
          enum: ["auto", "text", "pdf", "image", "audio"],
          description: "Extractor to use. 'auto' (default) picks one from the file extension.",
        },
      },
      required: ["source"],
    },
  },
  {
    name: "query",
    description:
      "Semantically search memory and return the most similar chunks with document id, source, chunk text and score.",
    inputSchema: {
      type: "object",
      properties: {
        query: { type: "string", description: "Natural language query." },
        top_k: {
          type: "number",
          description: "Maximum number of matches (0-50). Defaults to the server setting (5).",
          minimum: 0,
          maximum: 50,
        },
        type: {
          type: "string",
          enum: ["text", "pdf", "image", "audio"],
          description: "Only search documents of this type.",
        },
        source: { type: "string", description: "Only search the document indexed from this path." },
        rerank: { type: "boolean", description: "Boost matches sharing terms with the query." },
        fusion: {
          type: "boolean",
          description: "Also search rephrasings of the query and merge the results.",
        },
        format: {
          type: "string",
          enum: ["matches", "context"],
          description: "'matches' (default) returns JSON; 'context' returns [Source: ...] blocks.",
        },
      },
      required: ["query"],
    },
  },
  {
    name: "delete_document",
    description: "Delete a document and all of its chunks. Returns whether the id was known.",
    inputSchema: {
      type: "object",
      properties: { document_id: { type: "string" } },
      required: ["document_id"],
    },
  },
  {
    name: "get_document",
    description: "Return the metadata of one indexed document.",
    inputSchema: {
      type: "object",
      properties: { document_id: { type: "string" } },
      required: ["document_id"],
    },
  },
  {
    name: "list_documents",
    description: "List every indexed document.",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "memory_stats",
    description: "Document and chunk totals, per-type distribution and embedding dimension.",
    inputSchema: { type: "object", properties: {} },
  },
];

/**
 * Execute one tool call against the engine.
 *
 * @throws {McpError} InvalidParams for bad arguments, MethodNotFound for
 *   unknown tools, and a mapped code for engine errors.
 */
export async function callTool(
  engine: MemoryEngine,
  name: string,
  args: Record<string, unknown> | undefined,
  defaults: ToolDefaults,
): Promise<CallToolResult> {
  try {
    switch (name) {
      case "index_document": {
        const { source, type } = IndexDocumentArgs.parse(args ?? {});
        const result = await engine.indexDocument(source, type);
        return json({
          document_id: result.documentId,
          chunks_created: result.chunksCreated,
          document_type: result.documentType,
        });
      }
      case "query": {
        const q = QueryArgs.parse(args ?? {});
        const response = await engine.query(q.query, q.top_k ?? defaults.topK, {
          rerank: q.rerank ?? defaults.rerank,
          fusion: q.fusion ?? false,
          filter: q.type !== undefined || q.source !== undefined ? { type: q.type, source: q.source } : undefined,
        });
        if (q.format === "context") return text(renderContext(engine, response));
        return json(toMatchesPayload(response));
      }
      case "delete_document": {
        const { document_id } = DocumentIdArgs.parse(args ?? {});
        return json({ deleted: await engine.deleteDocument(document_id) });
      }
      case "get_document": {
        const { document_id } = DocumentIdArgs.parse(args ?? {});
        return json(engine.getDocument(document_id));
      }
      case "list_documents":
        return json({ documents: engine.listDocuments() });
      case "memory_stats":
        return json(engine.statistics());
      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }
  } catch (e) {
    throw toMcpError(e);
  }
}

/** Map validation and engine errors onto MCP error codes. */
export function toMcpError(e: unknown): McpError {
  if (e instanceof McpError) return e;
  if (e instanceof z.ZodError) {
    return new McpError(ErrorCode.InvalidParams, e.issues.map((i) => i.message).join("; "));
  }
  if (e instanceof MemoryEngineError) {
    switch (e.code) {
      case "INVALID_ARGUMENT":
        return new McpError(ErrorCode.InvalidParams, e.message);
      case "NOT_FOUND":
        return new McpError(ErrorCode.InvalidRequest, e.message);
      default:
        return new McpError(ErrorCode.InternalError, `${e.name}: ${e.message}`);
    }
  }
  return new McpError(ErrorCode.InternalError, e instanceof Error ? e.message : String(e));
}

function toMatchesPayload(response: QueryResponse) {
  return {
    status: response.status,
    total_entries: response.totalEntries,
    matches: response.matches.map((m) => ({
      document_id: m.documentId,
      source: m.source,
      chunk_index: m.chunkIndex,
      chunk_text: m.chunkText,
      score: Number(m.score.toFixed(4)),
    })),
  };
}

function renderContext(engine: MemoryEngine, response: QueryResponse): string {
  if (response.status === "empty") return "No documents indexed.";
  if (!response.matches.length) return "No matching chunks.";
  return engine.formatContext(response.matches);
}

function json(payload: unknown): CallToolResult {
  return text(JSON.stringify(payload, null, 2));
}

function text(value: string): CallToolResult {
  return { content: [{ type: "text", text: value }] };
}
