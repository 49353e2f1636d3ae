/**
 * Drivers execute engine steps.
 *
 * {@link AsyncDriver} awaits each effect; {@link SyncDriver} blocks on it.
 * Both walk the same generators, so retry, pagination and error handling
 * behave identically in the two modes.
 *
 * @module drivers
 */

import { readFileSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { RESUMED, type EffectResult, type IoEffect, type ItemSteps, type Steps } from './engine.js';
import type { SyncTransport, Transport } from './transport.js';
import type { Mode, Result, Stream } from './types.js';

/** Suspends the caller for a number of seconds. */
export type Sleep = (seconds: number) => Promise<void>;

/** Blocks the calling thread for a number of seconds. */
export type SleepSync = (seconds: number) => void;

/** Loads a file's bytes. */
export type FileLoader = (path: string) => Promise<Uint8Array>;

/** Blocking variant of {@link FileLoader}. */
export type FileLoaderSync = (path: string) => Uint8Array;

/**
 * Executes engine steps in mode `M`.
 */
export interface Driver<M extends Mode> {
  readonly mode: M;
  /** Runs a computation to completion. */
  run<T>(steps: Steps<T>): Result<M, T>;
  /** Exposes a lazy list. Nothing is fetched until the first item is pulled. */
  stream<T>(steps: ItemSteps<T>): Stream<M, T>;
  /** Releases the transport. */
  close(): Result<M, void>;
}

// Longest delay a single setTimeout honours; larger values fire at once.
export const MAX_TIMER_MS = 2 ** 31 - 1;

export const sleep: Sleep = async (seconds) => {
  let remaining = seconds * 1000;
  while (remaining > 0) {
    const chunk = Math.min(remaining, MAX_TIMER_MS);
    await new Promise<void>((resolve) => setTimeout(resolve, chunk));
    remaining -= chunk;
  }
};

export const sleepSync: SleepSync = (seconds) => {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, seconds * 1000);
};

/**
 * Options shared by the async driver.
 */
export interface AsyncDriverOptions {
  sleep?: Sleep;
  readFile?: FileLoader;
}

/**
 * Options shared by the blocking driver.
 */
export interface SyncDriverOptions {
  sleep?: SleepSync;
  readFile?: FileLoaderSync;
}

/**
 * Driver for the promise-based client.
 */
export class AsyncDriver implements Driver<'async'> {
  readonly mode = 'async' as const;
  private readonly transport: Transport;
  private readonly sleep: Sleep;
  private readonly readFile: FileLoader;

  constructor(transport: Transport, options: AsyncDriverOptions = {}) {
    this.transport = transport;
    this.sleep = options.sleep ?? sleep;
    this.readFile = options.readFile ?? ((path) => readFile(path));
  }

  async run<T>(steps: Steps<T>): Promise<T> {
    let step = steps.next(RESUMED);
    while (!step.done) {
      let result: EffectResult;
      try {
        result = await this.execute(step.value);
      } catch (error) {
        step = steps.throw(error);
        continue;
      }
      step = steps.next(result);
    }
    return step.value;
  }

  async *stream<T>(steps: ItemSteps<T>): AsyncIterableIterator<T> {
    try {
      let step = steps.next(RESUMED);
      while (!step.done) {
        const effect = step.value;
        if (effect.type === 'emit') {
          yield effect.item;
          step = steps.next(RESUMED);
          continue;
        }

        let result: EffectResult;
        try {
          result = await this.execute(effect);
        } catch (error) {
          step = steps.throw(error);
          continue;
        }
        step = steps.next(result);
      }
    } finally {
      steps.return(undefined);
    }
  }

  close(): Promise<void> {
    return this.transport.close();
  }

  private async execute(effect: IoEffect): Promise<EffectResult> {
    switch (effect.type) {
      case 'send':
        return { type: 'response', response: await this.transport.send(effect.request) };
      case 'wait':
        await this.sleep(effect.seconds);
        return RESUMED;
      case 'read':
        return { type: 'file', data: await this.readFile(effect.path) };
    }
  }
}

/**
 * Driver for the blocking client.
 */
export class SyncDriver implements Driver<'sync'> {
  readonly mode = 'sync' as const;
  private readonly transport: SyncTransport;
  private readonly sleep: SleepSync;
  private readonly readFile: FileLoaderSync;

  constructor(transport: SyncTransport, options: SyncDriverOptions = {}) {
    this.transport = transport;
    this.sleep = options.sleep ?? sleepSync;
    this.readFile = options.readFile ?? ((path) => readFileSync(path));
  }

  run<T>(steps: Steps<T>): T {
    let step = steps.next(RESUMED);
    while (!step.done) {
      let result: EffectResult;
      try {
        result = this.execute(step.value);
      } catch (error) {
        step = steps.throw(error);
        continue;
      }
      step = steps.next(result);
    }
    return step.value;
  }

  *stream<T>(steps: ItemSteps<T>): IterableIterator<T> {
    try {
      let step = steps.next(RESUMED);
      while (!step.done) {
        const effect = step.value;
        if (effect.type === 'emit') {
          yield effect.item;
          step = steps.next(RESUMED);
          continue;
        }

        let result: EffectResult;
        try {
          result = this.execute(effect);
        } catch (error) {
          step = steps.throw(error);
          continue;
        }
        step = steps.next(result);
      }
    } finally {
      steps.return(undefined);
    }
  }

  close(): void {
    this.transport.close();
  }

  private execute(effect: IoEffect): EffectResult {
    switch (effect.type) {
      case 'send':
        return { type: 'response', response: this.transport.send(effect.request) };
      case 'wait':
        this.sleep(effect.seconds);
        return RESUMED;
      case 'read':
        return { type: 'file', data: this.readFile(effect.path) };
    }
  }
}
