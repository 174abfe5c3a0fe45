/**
 * Log file watcher - re-reads a log after it changes
 */

import chokidar, { type FSWatcher } from 'chokidar';
import { EventEmitter } from 'node:events';
import path from 'node:path';
import type { LogEncoding } from '../config/schema.js';
import { readLogFile } from './log-reader.js';

export interface LogWatcherEvents {
  changed: { filePath: string; text: string };
  error: { filePath: string; error: Error };
  ready: void;
}

export interface LogWatcherOptions {
  debounceMs?: number;
  ignoreInitial?: boolean;
}

export class LogWatcher extends EventEmitter {
  private watcher: FSWatcher | null = null;
  private filePath: string;
  private encoding: LogEncoding;
  private options: Required<LogWatcherOptions>;
  private debounceTimer: NodeJS.Timeout | null = null;

  constructor(
    filePath: string,
    encoding: LogEncoding,
    options: LogWatcherOptions = {}
  ) {
    super();
    this.filePath = path.resolve(filePath);
    this.encoding = encoding;
    this.options = {
      debounceMs: 300,
      ignoreInitial: true,
      ...options,
    };
  }

  async start(): Promise<void> {
    this.watcher = chokidar.watch(this.filePath, {
      persistent: true,
      ignoreInitial: this.options.ignoreInitial,
      awaitWriteFinish: {
        stabilityThreshold: 200,
        pollInterval: 100,
      },
    });

    this.watcher.on('add', () => this.handleChange());
    this.watcher.on('change', () => this.handleChange());
    this.watcher.on('error', (err: unknown) => {
      const error = err instanceof Error ? err : new Error(String(err));
      this.emit('error', { filePath: this.filePath, error });
    });
    this.watcher.on('ready', () => this.emit('ready'));
  }

  async stop(): Promise<void> {
    if (this.watcher) {
      await this.watcher.close();
      this.watcher = null;
    }

    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
      this.debounceTimer = null;
    }
  }

  /** Read the current file contents and emit them as a change. */
  async refresh(): Promise<void> {
    try {
      const text = await readLogFile(this.filePath, this.encoding);
      this.emit('changed', { filePath: this.filePath, text });
    } catch (error) {
      this.emit('error', {
        filePath: this.filePath,
        error: error instanceof Error ? error : new Error(String(error)),
      });
    }
  }

  private handleChange(): void {
    if (this.debounceTimer) {
      clearTimeout(this.debounceTimer);
    }

    this.debounceTimer = setTimeout(() => {
      this.debounceTimer = null;
      void this.refresh();
    }, this.options.debounceMs);
  }

  // Type-safe event emitter methods
  override on<K extends keyof LogWatcherEvents>(
    event: K,
    listener: (arg: LogWatcherEvents[K]) => void
  ): this {
    return super.on(event, listener as (...args: unknown[]) => void);
  }

  override emit<K extends keyof LogWatcherEvents>(
    event: K,
    arg?: LogWatcherEvents[K]
  ): boolean {
    // Unhandled "error" events would otherwise throw from EventEmitter.
    if (event === 'error' && this.listenerCount('error') === 0) {
      return false;
    }

    return super.emit(event, arg);
  }
}
