import fs from 'node:fs';
import path from 'node:path';
import { PNG } from 'pngjs';
import * as ort from 'onnxruntime-web';
import logger from '../logger.js';
import { cosineSimilarity, softmax } from '../detection/math.js';
import type { ScorePrediction, ScoreProvider } from './scoreProvider.js';

const DEFAULT_IMAGE_SIZE = 224;
const CLIP_MEAN = [0.48145466, 0.4578275, 0.40821073] as const;
const CLIP_STD = [0.26862954, 0.26130258, 0.27577711] as const;

type InferenceSessionLike = {
  readonly inputNames: readonly string[];
  readonly outputNames: readonly string[];
  run(feeds: Record<string, ort.Tensor>): Promise<Record<string, ort.OnnxValue>>;
};

export interface ClipScoreProviderOptions {
  imageModelPath: string;
  promptEmbeddingsPath: string;
  imageSize?: number;
  createSession?: (modelPath: string) => Promise<InferenceSessionLike>;
}

export type PromptEmbeddings = Map<string, Float32Array>;

/**
 * Zero-shot frame scorer. The image encoder runs through onnxruntime; prompt
 * embeddings are computed offline and loaded from a JSON file of
 * `{ "<prompt>": number[] }`.
 */
export class ClipScoreProvider implements ScoreProvider<Buffer> {
  private embeddings: PromptEmbeddings;
  private readonly imageSize: number;
  private readonly inputName: string;

  private constructor(
    private readonly options: ClipScoreProviderOptions,
    private readonly session: InferenceSessionLike
  ) {
    this.imageSize = options.imageSize ?? DEFAULT_IMAGE_SIZE;
    if (!Number.isInteger(this.imageSize) || this.imageSize < 1) {
      throw new Error(`imageSize must be a positive integer (received ${this.imageSize})`);
    }
    const inputName = session.inputNames[0];
    if (!inputName) {
      throw new Error(`Image model ${options.imageModelPath} declares no inputs`);
    }
    this.inputName = inputName;
    this.embeddings = loadPromptEmbeddings(options.promptEmbeddingsPath);
  }

  static async create(options: ClipScoreProviderOptions) {
    const createSession = options.createSession ?? defaultCreateSession;
    const session = await createSession(path.resolve(options.imageModelPath));
    const provider = new ClipScoreProvider(options, session);
    logger.info(
      {
        detector: 'clip',
        modelPath: options.imageModelPath,
        prompts: provider.embeddings.size
      },
      'CLIP score provider ready'
    );
    return provider;
  }

  reloadPromptEmbeddings() {
    this.embeddings = loadPromptEmbeddings(this.options.promptEmbeddingsPath);
    return this.embeddings.size;
  }

  /** Re-reads the embeddings file and keeps it only if it covers every prompt. */
  prepare(prompts: readonly string[]) {
    const next = loadPromptEmbeddings(this.options.promptEmbeddingsPath);
    const missing = prompts.filter(prompt => !next.has(prompt));
    if (missing.length > 0) {
      throw new Error(`No embedding for prompt(s) ${missing.map(prompt => `"${prompt}"`).join(', ')}`);
    }
    this.embeddings = next;
    logger.info({ detector: 'clip', prompts: next.size }, 'Prompt embeddings reloaded');
  }

  async predict(frame: Buffer, prompts: readonly string[], temperature: number): Promise<ScorePrediction> {
    if (!Number.isFinite(temperature) || temperature <= 0) {
      throw new Error(`temperature must be a positive number (received ${temperature})`);
    }
    const textEmbeddings = prompts.map(prompt => {
      const embedding = this.embeddings.get(prompt);
      if (!embedding) {
        throw new Error(`No embedding for prompt "${prompt}"`);
      }
      return embedding;
    });

    const imageEmbedding = await this.encodeImage(frame);
    const rawScores = textEmbeddings.map(embedding => {
      if (embedding.length !== imageEmbedding.length) {
        throw new Error(
          `Embedding dimension mismatch: image ${imageEmbedding.length}, prompt ${embedding.length}`
        );
      }
      return cosineSimilarity(imageEmbedding, embedding) / temperature;
    });

    return { rawScores, probabilities: softmax(rawScores) };
  }

  describe() {
    const first = this.embeddings.values().next();
    return {
      model: 'clip',
      modelPath: this.options.imageModelPath,
      imageSize: this.imageSize,
      embeddingDimension: first.done ? null : first.value.length,
      cachedPrompts: this.embeddings.size
    };
  }

  private async encodeImage(frame: Buffer): Promise<Float32Array> {
    const tensor = preprocessFrame(frame, this.imageSize);
    const results = await this.session.run({ [this.inputName]: tensor });
    const outputName = this.session.outputNames[0] ?? Object.keys(results)[0];
    const output = outputName ? results[outputName] : undefined;
    if (!output || !(output.data instanceof Float32Array) || output.data.length === 0) {
      throw new Error('Image model returned no embedding');
    }
    return output.data;
  }
}

// The WebAssembly backend takes the model bytes rather than a file path.
async function defaultCreateSession(modelPath: string): Promise<InferenceSessionLike> {
  const model = await fs.promises.readFile(modelPath);
  return ort.InferenceSession.create(model);
}

/** Nearest-neighbour resize to a square, then CLIP normalization in CHW order. */
export function preprocessFrame(frame: Buffer, size: number): ort.Tensor {
  const { width, height, data } = PNG.sync.read(frame);
  const pixels = size * size;
  const chw = new Float32Array(3 * pixels);

  for (let y = 0; y < size; y += 1) {
    const srcY = Math.min(height - 1, Math.floor((y * height) / size));
    for (let x = 0; x < size; x += 1) {
      const srcX = Math.min(width - 1, Math.floor((x * width) / size));
      const srcIndex = (srcY * width + srcX) * 4;
      const destIndex = y * size + x;
      for (let channel = 0; channel < 3; channel += 1) {
        const value = data[srcIndex + channel] / 255;
        chw[channel * pixels + destIndex] = (value - CLIP_MEAN[channel]) / CLIP_STD[channel];
      }
    }
  }

  return new ort.Tensor('float32', chw, [1, 3, size, size]);
}

export function parsePromptEmbeddings(contents: string, source = 'prompt embeddings'): PromptEmbeddings {
  let parsed: unknown;
  try {
    parsed = JSON.parse(contents);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse ${source}: ${message}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error(`${source} must map prompt text to embedding vectors`);
  }

  const embeddings: PromptEmbeddings = new Map();
  let dimension: number | null = null;
  for (const [prompt, vector] of Object.entries(parsed)) {
    if (
      !Array.isArray(vector) ||
      vector.length === 0 ||
      !vector.every(value => typeof value === 'number' && Number.isFinite(value))
    ) {
      throw new Error(`${source}: embedding for "${prompt}" must be a non-empty list of numbers`);
    }
    if (dimension !== null && vector.length !== dimension) {
      throw new Error(`${source}: embedding for "${prompt}" has ${vector.length} values, expected ${dimension}`);
    }
    dimension = vector.length;
    embeddings.set(prompt, Float32Array.from(vector));
  }
  return embeddings;
}

function loadPromptEmbeddings(filePath: string): PromptEmbeddings {
  const resolved = path.resolve(filePath);
  return parsePromptEmbeddings(fs.readFileSync(resolved, 'utf-8'), resolved);
}
