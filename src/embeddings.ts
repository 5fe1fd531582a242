import { env, pipeline, type FeatureExtractionPipeline } from "@huggingface/transformers";
import { EmbedderNotInitializedError, EmbeddingError, describeError } from "./errors";
import { configureLocalModels } from "./model-env";

/**
 * Text → vector capability consumed by the registry and the query engine.
 * Any model backend can sit behind it; the engine re-normalizes whatever it
 * returns and only relies on `dimension` staying fixed.
 */
export interface EmbeddingProvider {
  /** Identifier recorded in snapshots (informational). */
  readonly modelName: string;
  /** Length of every vector returned by {@link embed}. */
  readonly dimension: number;
  embed(text: string, signal?: AbortSignal): Promise<ArrayLike<number>>;
}

export const DEFAULT_MODEL_NAME = "Xenova/all-MiniLM-L6-v2";

/**
 * Embedding provider backed by a local @huggingface/transformers
 * feature-extraction pipeline (mean pooling + L2 normalization). Models are
 * read from `modelPath` only; nothing is downloaded.
 */
export class TransformersEmbeddings implements EmbeddingProvider {
  public readonly modelName: string;
  private readonly modelPath: string;
  private embedder: FeatureExtractionPipeline | null = null;
  private dim = 0;

  /**
   * @param modelName Model id, resolved as a folder under `modelPath`.
   * @param modelPath Directory holding local model folders.
   */
  public constructor(modelName: string | undefined, modelPath: string) {
    // Resolution precedence: explicit ctor arg > MODEL_NAME env var > default model
    this.modelName = modelName?.trim() || process.env.MODEL_NAME?.trim() || DEFAULT_MODEL_NAME;
    this.modelPath = modelPath;
  }

  public get dimension(): number {
    if (!this.embedder) throw new EmbedderNotInitializedError();
    return this.dim;
  }

  /**
   * Load the pipeline from disk and measure its output size (idempotent).
   * @throws {EmbeddingError} If the model is missing or cannot be loaded.
   */
  public async init(): Promise<void> {
    if (this.embedder) return;
    const dir = configureLocalModels(env, this.modelPath);
    console.error(`[memory] Loading embedding model ${this.modelName} from ${dir}`);
    let embedder: FeatureExtractionPipeline;
    try {
      embedder = await pipeline("feature-extraction", this.modelName);
    } catch (e) {
      throw new EmbeddingError(
        `Cannot load model ${this.modelName} from ${dir} (remote downloads are disabled): ${describeError(e)}`,
        { cause: e },
      );
    }
    this.dim = (await TransformersEmbeddings.run(embedder, "dimension check")).length;
    this.embedder = embedder;
    console.error(`[memory] Model ready: ${this.modelName} (dimension ${this.dim})`);
  }

  /**
   * @throws {EmbedderNotInitializedError} If {@link init} has not been called.
   */
  public async embed(text: string, signal?: AbortSignal): Promise<Float32Array> {
    if (!this.embedder) throw new EmbedderNotInitializedError();
    signal?.throwIfAborted();
    return TransformersEmbeddings.run(this.embedder, text);
  }

  private static async run(embedder: FeatureExtractionPipeline, text: string): Promise<Float32Array> {
    const output = await embedder(text, { pooling: "mean", normalize: true });
    const data = output.data;
    const vector = new Float32Array(data.length);
    for (let i = 0; i < data.length; i++) vector[i] = Number(data[i]);
    return vector;
  }
}
