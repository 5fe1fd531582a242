import path from "node:path";
import type { env } from "@huggingface/transformers";

/** The transformers runtime settings that decide where model files come from. */
export type ModelRuntimeEnv = Pick<
  typeof env,
  "allowLocalModels" | "allowRemoteModels" | "localModelPath" | "useBrowserCache"
>;

/**
 * Restrict model loading to `modelPath` on disk. Remote downloads are turned
 * off, so a model must already sit at `<modelPath>/<model name>/` (an ONNX
 * export with its tokenizer and config files).
 *
 * @returns The absolute model directory.
 */
export function configureLocalModels(target: ModelRuntimeEnv, modelPath: string): string {
  const dir = path.resolve(modelPath);
  target.allowRemoteModels = false;
  target.allowLocalModels = true;
  target.localModelPath = dir;
  target.useBrowserCache = false;
  return dir;
}
