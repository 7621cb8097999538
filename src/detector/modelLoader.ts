/**
 * TensorFlow.js graph model loading from a local directory.
 * Expects the converter layout: model.json plus the weight shards it lists.
 */

import * as tf from '@tensorflow/tfjs';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import type { InferenceModel, ModelOutput } from './types.js';

// ============================================================================
// MANIFEST
// ============================================================================

const WeightEntrySchema = z.object({
    name: z.string(),
    shape: z.array(z.number().int()),
    dtype: z.enum(['float32', 'int32', 'bool', 'string', 'complex64']),
    quantization: z
        .object({
            dtype: z.enum(['uint8', 'uint16', 'float16']),
            scale: z.number().optional(),
            min: z.number().optional(),
        })
        .optional(),
});

const ModelManifestSchema = z.object({
    format: z.string().optional(),
    generatedBy: z.string().optional(),
    convertedBy: z.string().nullable().optional(),
    modelTopology: z.record(z.unknown()),
    signature: z.record(z.unknown()).optional(),
    userDefinedMetadata: z.record(z.unknown()).optional(),
    weightsManifest: z.array(
        z.object({
            paths: z.array(z.string().min(1)),
            weights: z.array(WeightEntrySchema),
        }),
    ),
});

const concatShards = (shards: Buffer[]): ArrayBuffer => {
    const total = shards.reduce((sum, shard) => sum + shard.byteLength, 0);
    const out = new ArrayBuffer(total);
    const view = new Uint8Array(out);
    let offset = 0;
    for (const shard of shards) {
        view.set(shard, offset);
        offset += shard.byteLength;
    }
    return out;
};

// ============================================================================
// MODEL
// ============================================================================

class TfGraphInferenceModel implements InferenceModel {
    constructor(
        private readonly model: tf.GraphModel,
        readonly inputSize: number,
    ) {}

    async predict(input: Float32Array): Promise<ModelOutput> {
        const tensor = tf.tensor4d(input, [1, this.inputSize, this.inputSize, 3]);
        let outputs: tf.Tensor[] = [];
        try {
            const result = await this.model.executeAsync(tensor);
            outputs = Array.isArray(result) ? result : [result];
            const [head] = outputs;
            if (!head) {
                throw new Error('Model returned no output tensor');
            }
            const values = await head.data();
            return { data: Float32Array.from(values), shape: [...head.shape] };
        } finally {
            tensor.dispose();
            outputs.forEach((output) => output.dispose());
        }
    }
}

/**
 * Load the detection model once at startup and run a warm-up pass so the first request does
 * not pay for kernel setup.
 */
export async function loadGraphModel(modelDir: string, inputSize: number): Promise<InferenceModel> {
    const manifestPath = path.resolve(modelDir, 'model.json');
    console.log(`[Detector] Loading model from ${manifestPath}`);

    const manifest = ModelManifestSchema.parse(JSON.parse(await readFile(manifestPath, 'utf8')));
    const shardPaths = manifest.weightsManifest.flatMap((group) => group.paths);
    const shards = await Promise.all(shardPaths.map((shard) => readFile(path.resolve(modelDir, shard))));

    await tf.setBackend('cpu');
    await tf.ready();

    const graph = await tf.loadGraphModel(
        tf.io.fromMemory({
            modelTopology: manifest.modelTopology,
            format: manifest.format,
            generatedBy: manifest.generatedBy,
            convertedBy: manifest.convertedBy,
            signature: manifest.signature,
            userDefinedMetadata: manifest.userDefinedMetadata,
            weightSpecs: manifest.weightsManifest.flatMap((group) => group.weights),
            weightData: concatShards(shards),
        }),
    );

    const model = new TfGraphInferenceModel(graph, inputSize);
    await model.predict(new Float32Array(inputSize * inputSize * 3));
    console.log(`[Detector] Model ready (${shardPaths.length} weight shard(s), input ${inputSize}px)`);
    return model;
}
