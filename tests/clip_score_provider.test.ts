import { EventEmitter } from 'node:events';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { PNG } from 'pngjs';
import * as ort from 'onnxruntime-web';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { DetectionEngine } from '../src/detection/engine.js';
import { ScenarioValidationError } from '../src/detection/errors.js';
import { ScenarioHotReloader } from '../src/detection/hotReload.js';
import { ScenarioStore } from '../src/detection/scenarioStore.js';
import { MetricsRegistry } from '../src/metrics/index.js';
import { ClipScoreProvider, parsePromptEmbeddings, preprocessFrame } from '../src/models/clipScoreProvider.js';

vi.mock('onnxruntime-web', () => {
  class Tensor {
    constructor(
      public readonly type: string,
      public readonly data: Float32Array,
      public readonly dims: readonly number[]
    ) {}
  }
  const create = vi.fn(async () => ({ inputNames: ['pixel_values'], outputNames: ['embeds'], run: vi.fn() }));
  return { Tensor, InferenceSession: { create } };
});

function solidPng(width: number, height: number, rgb: [number, number, number]) {
  const png = new PNG({ width, height });
  for (let i = 0; i < width * height; i += 1) {
    png.data[i * 4] = rgb[0];
    png.data[i * 4 + 1] = rgb[1];
    png.data[i * 4 + 2] = rgb[2];
    png.data[i * 4 + 3] = 255;
  }
  return PNG.sync.write(png);
}

describe('parsePromptEmbeddings', () => {
  it('reads prompt vectors', () => {
    const embeddings = parsePromptEmbeddings('{"flames":[0,1,0],"smoke":[1,0,0]}');
    expect([...embeddings.keys()]).toEqual(['flames', 'smoke']);
    expect(Array.from(embeddings.get('flames') ?? [])).toEqual([0, 1, 0]);
  });

  it('rejects malformed files', () => {
    expect(() => parsePromptEmbeddings('[]', 'emb.json')).toThrow(
      'emb.json must map prompt text to embedding vectors'
    );
    expect(() => parsePromptEmbeddings('{"flames":[]}', 'emb.json')).toThrow(
      'emb.json: embedding for "flames" must be a non-empty list of numbers'
    );
    expect(() => parsePromptEmbeddings('{"a":[1,2],"b":[1,2,3]}', 'emb.json')).toThrow(
      'emb.json: embedding for "b" has 3 values, expected 2'
    );
    expect(() => parsePromptEmbeddings('{oops', 'emb.json')).toThrow(/^Failed to parse emb\.json: /);
  });
});

describe('preprocessFrame', () => {
  it('resizes and normalizes into CHW order', () => {
    const tensor = preprocessFrame(solidPng(2, 2, [255, 0, 0]), 4);

    expect(tensor.dims).toEqual([1, 3, 4, 4]);
    expect(tensor.data).toHaveLength(48);
    expect(tensor.data[0]).toBeCloseTo(1.9303, 3);
    expect(tensor.data[16]).toBeCloseTo(-1.7521, 3);
  });
});

describe('ClipScoreProvider', () => {
  let dir: string;
  let embeddingsPath: string;
  const run = vi.fn();

  async function createProvider(imageEmbedding: number[]) {
    run.mockResolvedValue({ embeds: new ort.Tensor('float32', Float32Array.from(imageEmbedding), [1, 3]) });
    return ClipScoreProvider.create({
      imageModelPath: 'models/test.onnx',
      promptEmbeddingsPath: embeddingsPath,
      imageSize: 4,
      createSession: async () => ({ inputNames: ['pixel_values'], outputNames: ['embeds'], run })
    });
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scenewatch-clip-'));
    embeddingsPath = path.join(dir, 'embeddings.json');
    fs.writeFileSync(
      embeddingsPath,
      JSON.stringify({ 'a person on the floor': [1, 0, 0], flames: [0, 1, 0] })
    );
    run.mockReset();
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('scores prompts by cosine similarity over the temperature', async () => {
    const provider = await createProvider([2, 0, 0]);

    const prediction = await provider.predict(solidPng(2, 2, [10, 20, 30]), ['a person on the floor', 'flames'], 0.5);

    expect(prediction.rawScores).toEqual([2, 0]);
    expect(prediction.probabilities[0]).toBeCloseTo(0.8808, 4);
    expect(prediction.probabilities[1]).toBeCloseTo(0.1192, 4);
    expect(run).toHaveBeenCalledTimes(1);
    expect(Object.keys(run.mock.calls[0][0])).toEqual(['pixel_values']);
  });

  it('requires an embedding for every prompt', async () => {
    const provider = await createProvider([1, 0, 0]);

    await expect(provider.predict(solidPng(1, 1, [0, 0, 0]), ['smoke'], 1)).rejects.toThrow(
      'No embedding for prompt "smoke"'
    );
    expect(run).not.toHaveBeenCalled();
  });

  it('rejects a non-positive temperature', async () => {
    const provider = await createProvider([1, 0, 0]);

    await expect(provider.predict(solidPng(1, 1, [0, 0, 0]), ['flames'], 0)).rejects.toThrow(
      'temperature must be a positive number (received 0)'
    );
  });

  it('rejects an embedding of the wrong size', async () => {
    const provider = await createProvider([1, 0]);

    await expect(provider.predict(solidPng(1, 1, [0, 0, 0]), ['flames'], 1)).rejects.toThrow(
      'Embedding dimension mismatch: image 2, prompt 3'
    );
  });

  it('describes itself and reloads prompt embeddings', async () => {
    const provider = await createProvider([1, 0, 0]);
    expect(provider.describe()).toEqual({
      model: 'clip',
      modelPath: 'models/test.onnx',
      imageSize: 4,
      embeddingDimension: 3,
      cachedPrompts: 2
    });

    fs.writeFileSync(embeddingsPath, JSON.stringify({ smoke: [0, 0, 1] }));
    expect(provider.reloadPromptEmbeddings()).toBe(1);
    expect(provider.describe()).toMatchObject({ cachedPrompts: 1 });
  });

  it('loads the image model from its bytes by default', async () => {
    const modelPath = path.join(dir, 'image.onnx');
    fs.writeFileSync(modelPath, 'onnx-bytes');

    const provider = await ClipScoreProvider.create({ imageModelPath: modelPath, promptEmbeddingsPath: embeddingsPath });

    expect(ort.InferenceSession.create).toHaveBeenCalledWith(Buffer.from('onnx-bytes'));
    expect(provider.describe()).toMatchObject({ modelPath, cachedPrompts: 2 });
  });

  it('re-reads embeddings when preparing for a prompt set', async () => {
    const provider = await createProvider([0, 0, 1]);
    fs.writeFileSync(
      embeddingsPath,
      JSON.stringify({ 'a person on the floor': [1, 0, 0], flames: [0, 1, 0], smoke: [0, 0, 1] })
    );

    provider.prepare(['flames', 'smoke']);

    const prediction = await provider.predict(solidPng(1, 1, [0, 0, 0]), ['smoke'], 1);
    expect(prediction.rawScores).toEqual([1]);
    expect(provider.describe()).toMatchObject({ cachedPrompts: 3 });
  });

  it('keeps the current embeddings when the file lacks a prompt', async () => {
    const provider = await createProvider([0, 1, 0]);
    fs.writeFileSync(embeddingsPath, JSON.stringify({ smoke: [0, 0, 1] }));

    expect(() => provider.prepare(['flames', 'steam', 'fog'])).toThrow(
      'No embedding for prompt(s) "steam", "fog"'
    );

    const prediction = await provider.predict(solidPng(1, 1, [0, 0, 0]), ['flames'], 1);
    expect(prediction.rawScores).toEqual([1]);
    expect(provider.describe()).toMatchObject({ cachedPrompts: 2 });
  });
});

describe('scenario hot reload with CLIP scoring', () => {
  let dir: string;
  let embeddingsPath: string;
  let store: ScenarioStore;
  let engine: DetectionEngine<Buffer>;
  let reloader: ScenarioHotReloader<Buffer>;

  const configSource = Object.assign(new EventEmitter(), { watch: () => () => undefined });
  const baseScenarios = [
    { id: 'fall', name: 'Fall', prompt: 'a person on the floor', threshold: 0.5, alertLevel: 'high' },
    { id: 'fire', name: 'Fire', prompt: 'flames', threshold: 0.5, alertLevel: 'high' }
  ];
  const withSmoke = [...baseScenarios, { id: 'smoke', name: 'Smoke', prompt: 'smoke', threshold: 0.5 }];

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scenewatch-clip-reload-'));
    embeddingsPath = path.join(dir, 'embeddings.json');
    fs.writeFileSync(
      embeddingsPath,
      JSON.stringify({ 'a person on the floor': [1, 0, 0], flames: [0, 1, 0] })
    );
    const run = vi.fn(async () => ({
      embeds: new ort.Tensor('float32', Float32Array.from([0, 0, 1]), [1, 3])
    }));
    const provider = await ClipScoreProvider.create({
      imageModelPath: 'models/test.onnx',
      promptEmbeddingsPath: embeddingsPath,
      imageSize: 2,
      createSession: async () => ({ inputNames: ['pixel_values'], outputNames: ['embeds'], run })
    });
    const metrics = new MetricsRegistry();
    store = new ScenarioStore(baseScenarios);
    engine = new DetectionEngine<Buffer>(store, provider, { metrics });
    reloader = new ScenarioHotReloader<Buffer>(engine, configSource, { metrics });
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('scores a scenario added after its embedding was written', async () => {
    fs.writeFileSync(
      embeddingsPath,
      JSON.stringify({ 'a person on the floor': [1, 0, 0], flames: [0, 1, 0], smoke: [0, 0, 1] })
    );

    const outcome = await reloader.apply(() => withSmoke);
    expect(outcome).toEqual({
      ok: true,
      report: { added: ['smoke'], removed: [], updated: [], unchanged: ['fall', 'fire'] }
    });

    const result = await engine.detect(solidPng(1, 1, [0, 0, 0]), 0);
    expect(result).toMatchObject({ detected: true, scenarioId: 'smoke' });
  });

  it('rejects a scenario whose prompt has no embedding and keeps detecting', async () => {
    const outcome = await reloader.apply(() => withSmoke);

    expect(outcome.ok).toBe(false);
    if (!outcome.ok) {
      expect(outcome.error).toBeInstanceOf(ScenarioValidationError);
      expect(outcome.error.message).toBe(
        'score provider rejected the scenarios: No embedding for prompt(s) "smoke"'
      );
    }
    expect(store.list().map(scenario => scenario.id)).toEqual(['fall', 'fire']);

    const result = await engine.detect(solidPng(1, 1, [0, 0, 0]), 0);
    expect(Object.keys(result.allScores)).toEqual(['fall', 'fire']);
  });
});
