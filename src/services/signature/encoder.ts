/**
 * SentenceEncoderClient - TypeScript bridge to python/encoder_worker.py
 *
 * The worker loads a sentence-transformers model from the local cache only
 * (it never downloads), so a missing package or model shows up as an
 * EncoderError with category RESOURCE_UNAVAILABLE rather than a hang.
 *
 * @module services/signature/encoder
 */

import { PythonShell, Options as PythonShellOptions } from 'python-shell';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

type EncoderErrorCode =
  | 'RUNTIME_NOT_FOUND'
  | 'MISSING_DEPENDENCY'
  | 'MODEL_NOT_FOUND'
  | 'ENCODE_FAILED'
  | 'PARSE_ERROR'
  | 'WORKER_ERROR';

type EncoderErrorCategory = 'RESOURCE_UNAVAILABLE' | 'INTERNAL_ERROR';

const RESOURCE_CODES = new Set<EncoderErrorCode>([
  'RUNTIME_NOT_FOUND',
  'MISSING_DEPENDENCY',
  'MODEL_NOT_FOUND',
]);

export class EncoderError extends Error {
  public readonly category: EncoderErrorCategory;

  constructor(
    message: string,
    public readonly code: EncoderErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EncoderError';
    this.category = RESOURCE_CODES.has(code) ? 'RESOURCE_UNAVAILABLE' : 'INTERNAL_ERROR';
    Error.captureStackTrace?.(this, EncoderError);
  }
}

/** Result from --probe (matches the worker's ProbeResult) */
const ProbeResultSchema = z.object({
  success: z.boolean(),
  model: z.string().default(''),
  dimensions: z.number().int().nonnegative().default(0),
  device: z.string().default('unknown'),
  error: z.string().nullable().default(null),
  error_type: z.string().nullable().default(null),
});

/** Result from --stdin batch encoding */
const EncodeResultSchema = z.object({
  success: z.boolean(),
  embeddings: z.array(z.array(z.number())).default([]),
  model: z.string().default(''),
  dimensions: z.number().int().nonnegative().default(0),
  elapsed_ms: z.number().default(0),
  error: z.string().nullable().default(null),
  error_type: z.string().nullable().default(null),
});

type WorkerSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface EncoderInfo {
  model: string;
  dimensions: number;
  device: string;
}

export const DEFAULT_ENCODER_MODEL = 'sentence-transformers/all-MiniLM-L6-v2';
export const DEFAULT_ENCODER_BATCH_SIZE = 32;

/**
 * Minimal surface the semantic builder needs; tests substitute a fake.
 */
export interface SentenceEncoder {
  probe(): Promise<EncoderInfo>;
  encode(texts: readonly string[]): Promise<Float32Array[]>;
}

export interface SentenceEncoderOptions {
  workerPath?: string;
  pythonPath?: string;
  model?: string;
  batchSize?: number;
}

export class SentenceEncoderClient implements SentenceEncoder {
  private readonly workerPath: string;
  private readonly pythonPath: string | undefined;
  private readonly model: string;
  private readonly batchSize: number;
  private dimensions: number | null = null;

  constructor(options: SentenceEncoderOptions = {}) {
    this.workerPath =
      options.workerPath ?? path.resolve(__dirname, '../../../python/encoder_worker.py');
    this.pythonPath = options.pythonPath;
    this.model = options.model ?? DEFAULT_ENCODER_MODEL;
    this.batchSize = options.batchSize ?? DEFAULT_ENCODER_BATCH_SIZE;
  }

  /** Texts per worker call. Each call reloads the model, so keep it large. */
  private static readonly MAX_TEXTS_PER_CALL = 256;

  /** Worker timeout: model load plus a full batch on CPU */
  private static readonly WORKER_TIMEOUT_MS = 120_000;

  private static readonly MAX_STDERR_LENGTH = 10_240;

  /**
   * Capability check: load the model and embed one sentence.
   *
   * @throws EncoderError (RESOURCE_UNAVAILABLE) if python, the package or the model is missing
   */
  async probe(): Promise<EncoderInfo> {
    const result = await this.runWorker(
      ['--probe', '--model', this.model, '--json'],
      ProbeResultSchema
    );
    if (!result.success) {
      throw new EncoderError(
        result.error ?? 'Encoder probe failed with no error message',
        this.classifyError(result.error_type, result.error),
        { model: this.model }
      );
    }
    this.dimensions = result.dimensions;
    return { model: result.model, dimensions: result.dimensions, device: result.device };
  }

  async encode(texts: readonly string[]): Promise<Float32Array[]> {
    if (texts.length === 0) {
      return [];
    }

    const vectors: Float32Array[] = [];
    const maxPerCall = SentenceEncoderClient.MAX_TEXTS_PER_CALL;
    for (let i = 0; i < texts.length; i += maxPerCall) {
      const batch = texts.slice(i, i + maxPerCall);
      if (texts.length > maxPerCall) {
        console.error(
          `[Encoder] Batch ${Math.floor(i / maxPerCall) + 1}/${Math.ceil(texts.length / maxPerCall)} (${batch.length} texts)`
        );
      }
      vectors.push(...(await this.encodeBatch(batch)));
    }
    return vectors;
  }

  private async encodeBatch(texts: readonly string[]): Promise<Float32Array[]> {
    const args = ['--stdin', '--model', this.model, '--batch-size', String(this.batchSize), '--json'];
    const result = await this.runWorker(args, EncodeResultSchema, JSON.stringify(texts));

    if (!result.success) {
      throw new EncoderError(
        result.error ?? 'Encoding failed with no error message',
        this.classifyError(result.error_type, result.error),
        { count: texts.length, model: this.model }
      );
    }

    if (result.embeddings.length !== texts.length) {
      throw new EncoderError(
        `Vector count mismatch: got ${result.embeddings.length}, expected ${texts.length}`,
        'ENCODE_FAILED',
        { vectorCount: result.embeddings.length, textCount: texts.length }
      );
    }

    const expectedDim = this.dimensions ?? result.dimensions;
    for (let i = 0; i < result.embeddings.length; i++) {
      if (result.embeddings[i].length !== expectedDim) {
        throw new EncoderError(
          `Embedding ${i} has wrong dimensions: ${result.embeddings[i].length}, expected ${expectedDim}`,
          'ENCODE_FAILED',
          { index: i, actualDim: result.embeddings[i].length }
        );
      }
    }

    return result.embeddings.map((e) => new Float32Array(e));
  }

  private async runWorker<T>(args: string[], schema: WorkerSchema<T>, stdin?: string): Promise<T> {
    return new Promise((resolve, reject) => {
      let settled = false;
      const options: PythonShellOptions = {
        mode: 'text',
        pythonPath: this.pythonPath,
        pythonOptions: ['-u'],
        args,
      };

      const shell = new PythonShell(this.workerPath, options);
      let stderr = '';

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        try {
          shell.kill();
        } catch (error) {
          console.error(
            '[Encoder] Failed to kill worker on timeout:',
            error instanceof Error ? error.message : String(error)
          );
        }
        reject(
          new EncoderError(
            `Encoder worker timeout after ${SentenceEncoderClient.WORKER_TIMEOUT_MS}ms`,
            'WORKER_ERROR',
            { stderr: stderr.substring(0, 1000) }
          )
        );
      }, SentenceEncoderClient.WORKER_TIMEOUT_MS);

      const outputLines: string[] = [];
      shell.on('message', (msg: string) => {
        outputLines.push(msg);
      });

      shell.on('stderr', (err: string) => {
        if (stderr.length < SentenceEncoderClient.MAX_STDERR_LENGTH) {
          stderr += err + '\n';
        }
      });

      // python-shell emits 'error' when the interpreter itself cannot start
      shell.on('error', (err: NodeJS.ErrnoException) => {
        if (settled || err.code !== 'ENOENT') return;
        clearTimeout(timer);
        settled = true;
        reject(
          new EncoderError(`Python interpreter not found: ${err.message}`, 'RUNTIME_NOT_FOUND', {
            pythonPath: this.pythonPath ?? 'python3',
          })
        );
      });

      const handleEnd = (err?: Error) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;

        const parsed = this.parseLastJsonLine(outputLines);

        // The worker exits non-zero after printing a structured failure;
        // prefer that payload over the generic exit error.
        if (parsed !== undefined) {
          const validated = schema.safeParse(parsed);
          if (validated.success) {
            resolve(validated.data);
          } else {
            reject(
              new EncoderError(
                `Worker output has unexpected shape: ${validated.error.message}`,
                'PARSE_ERROR',
                { output: outputLines.join('\n').substring(0, 1000) }
              )
            );
          }
          return;
        }

        if (err) {
          console.error('[Encoder] Worker error:', err.message);
          if (stderr) console.error('[Encoder] Stderr:', stderr.substring(0, 1000));
          reject(
            new EncoderError(
              `Worker error: ${err.message}`,
              this.classifyError(null, stderr || err.message),
              { stderr: stderr.substring(0, 1000) }
            )
          );
          return;
        }

        reject(
          new EncoderError('Failed to parse worker output as JSON', 'PARSE_ERROR', {
            output: outputLines.join('\n').substring(0, 1000),
            stderr: stderr.substring(0, 1000),
          })
        );
      };

      if (stdin !== undefined) shell.send(stdin);
      shell.end(handleEnd);
    });
  }

  /**
   * Parse the last line that is a JSON object (model loading may print to stdout)
   */
  private parseLastJsonLine(lines: string[]): object | undefined {
    for (let i = lines.length - 1; i >= 0; i--) {
      const line = lines[i].trim();
      if (!line.startsWith('{')) continue;
      try {
        const value: unknown = JSON.parse(line);
        if (typeof value === 'object' && value !== null) {
          return value;
        }
      } catch (error) {
        console.error(
          '[Encoder] JSON parse failed for output line, trying previous:',
          error instanceof Error ? error.message : String(error)
        );
      }
    }
    return undefined;
  }

  private classifyError(errorType: string | null, message: string | null): EncoderErrorCode {
    if (errorType === 'missing_dependency') return 'MISSING_DEPENDENCY';
    if (errorType === 'model_not_found') return 'MODEL_NOT_FOUND';
    if (errorType === 'encode_failed') return 'ENCODE_FAILED';

    const lower = (message ?? '').toLowerCase();
    if (lower.includes('no module named')) return 'MISSING_DEPENDENCY';
    if (lower.includes('model not found') || lower.includes('local_files_only')) {
      return 'MODEL_NOT_FOUND';
    }
    return 'WORKER_ERROR';
  }
}
