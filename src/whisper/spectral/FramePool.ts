import { Worker } from 'worker_threads';
import { availableParallelism } from 'os';
import { createLogger } from '../../utils/logger';
import type { FilterBank } from './FilterBank';
import { powerSpectrumFrames } from './powerSpectrumKernel';

const logger = createLogger({ service: 'FramePool' });

const WORKER_SOURCE = `
'use strict';
const { parentPort } = require('worker_threads');
const powerSpectrumFrames = ${powerSpectrumFrames.toString()};

parentPort.on('message', (job) => {
  try {
    powerSpectrumFrames(
      job.padded, job.window, job.dftCos, job.dftSin,
      job.nFft, job.hopLength, job.freqBins, job.start, job.end, job.out
    );
    parentPort.postMessage({ id: job.id, ok: true });
  } catch (error) {
    parentPort.postMessage({ id: job.id, ok: false, message: String(error && error.message ? error.message : error) });
  }
});
`;

interface JobReply {
  id: number;
  ok: boolean;
  message?: string;
}

interface PendingJob {
  worker: Worker;
  resolve: () => void;
  reject: (error: Error) => void;
}

function isJobReply(value: unknown): value is JobReply {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number' &&
    'ok' in value &&
    typeof value.ok === 'boolean'
  );
}

export function defaultWorkerCount(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Fixed set of worker threads computing frame power spectra.
 *
 * Frames are split into contiguous ranges, one per worker; input and output
 * live in SharedArrayBuffers so nothing is copied between threads. A worker
 * that dies fails the jobs it was given and is replaced.
 */
export class FramePool {
  private readonly workers: Worker[] = [];
  private readonly pending = new Map<number, PendingJob>();
  private nextJobId = 0;
  private closed = false;

  constructor(readonly size: number = defaultWorkerCount()) {
    for (let i = 0; i < size; i++) {
      this.workers.push(this.spawn(i));
    }
    logger.debug({ size }, 'Frame pool started');
  }

  private spawn(index: number): Worker {
    const worker = new Worker(WORKER_SOURCE, { eval: true });

    worker.on('message', (reply: unknown) => {
      if (!isJobReply(reply)) return;
      const job = this.pending.get(reply.id);
      if (!job) return;
      this.pending.delete(reply.id);
      if (reply.ok) {
        job.resolve();
      } else {
        job.reject(new Error(reply.message ?? 'Frame worker failed'));
      }
    });

    worker.on('error', (error) => {
      logger.error({ worker: index, error: error.message }, 'Frame worker crashed');
      this.failWorker(worker, error);
    });

    worker.on('exit', (code) => {
      if (this.closed) return;
      logger.warn({ worker: index, code }, 'Frame worker exited, respawning');
      this.failWorker(worker, new Error(`Frame worker ${index} exited with code ${code}`));
      if (this.workers[index] === worker) {
        this.workers[index] = this.spawn(index);
      }
    });

    return worker;
  }

  private failWorker(worker: Worker, error: Error): void {
    for (const [id, job] of this.pending) {
      if (job.worker !== worker) continue;
      this.pending.delete(id);
      job.reject(error);
    }
  }

  private failAll(error: Error): void {
    for (const job of this.pending.values()) {
      job.reject(error);
    }
    this.pending.clear();
  }

  /** Live worker threads, one per slot */
  get threads(): readonly Worker[] {
    return this.workers;
  }

  /**
   * Power spectra of frames [0, frameCount). `padded` must be backed by a
   * SharedArrayBuffer.
   */
  async computePower(padded: Float32Array, bank: FilterBank, frameCount: number): Promise<Float32Array> {
    if (this.closed) {
      throw new Error('Frame pool is closed');
    }

    const out = new Float32Array(
      new SharedArrayBuffer(frameCount * bank.freqBins * Float32Array.BYTES_PER_ELEMENT)
    );
    const perWorker = Math.ceil(frameCount / this.workers.length);
    const jobs: Promise<void>[] = [];

    for (let w = 0; w < this.workers.length; w++) {
      const start = w * perWorker;
      const end = Math.min(frameCount, start + perWorker);
      if (start >= end) break;

      const id = this.nextJobId++;
      const worker = this.workers[w];
      jobs.push(
        new Promise<void>((resolve, reject) => {
          this.pending.set(id, { worker, resolve, reject });
        })
      );
      worker.postMessage({
        id,
        padded,
        window: bank.window,
        dftCos: bank.dftCos,
        dftSin: bank.dftSin,
        nFft: bank.config.nFft,
        hopLength: bank.config.hopLength,
        freqBins: bank.freqBins,
        start,
        end,
        out
      });
    }

    await Promise.all(jobs);
    return out;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.failAll(new Error('Frame pool is closed'));
    await Promise.all(this.workers.map((worker) => worker.terminate()));
    logger.debug({ size: this.size }, 'Frame pool stopped');
  }
}
