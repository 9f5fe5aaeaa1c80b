// Copyright 2025 The Pigweed Authors
//
// Licensed under the Apache License, Version 2.0 (the "License"); you may not
// use this file except in compliance with the License. You may obtain a copy of
// the License at
//
//     https://www.apache.org/licenses/LICENSE-2.0
//
// Unless required by applicable law or agreed to in writing, software
// distributed under the License is distributed on an "AS IS" BASIS, WITHOUT
// WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied. See the
// License for the specific language governing permissions and limitations under
// the License.

import { watch, type FSWatcher } from 'chokidar';

import type { Logger } from './loggingTypes';

/**
 * Regenerates the compilation database whenever the `.dep` file changes.
 *
 * uVision rewrites the file several times during a build, so changes are
 * debounced. Generations never overlap: a change that arrives while one is
 * running schedules exactly one more after it.
 */
export class DepFileWatcher {
  private watcher: FSWatcher | undefined;
  private debounceTimeout: NodeJS.Timeout | undefined;
  private running: Promise<void> | undefined;
  private pending = false;

  generationCount = 0;
  lastGenerationTime: Date | undefined;

  /**
   * @param onGenerated Called after every generation, successful or not, once
   *   `generationCount` and `lastGenerationTime` are updated
   */
  constructor(
    private readonly depFile: string,
    private readonly generate: () => Promise<void>,
    private readonly debounceMs: number,
    private readonly logger?: Logger,
    private readonly onGenerated?: (watcher: DepFileWatcher) => void,
  ) {}

  /**
   * Start watching. Does not run a generation by itself. Resolves once the
   * file is being watched.
   */
  start(): Promise<void> {
    const watcher = watch(this.depFile, { ignoreInitial: true });
    this.watcher = watcher;
    watcher.on('add', () => this.refresh());
    watcher.on('change', () => this.refresh());
    watcher.on('error', (err: unknown) =>
      this.logger?.error(
        `Watcher error: ${err instanceof Error ? err.message : String(err)}`,
      ),
    );

    return new Promise((resolve) => {
      watcher.once('ready', () => {
        this.logger?.info(`Watching ${this.depFile} for changes`);
        resolve();
      });
    });
  }

  refresh = (): void => {
    if (this.debounceTimeout) {
      clearTimeout(this.debounceTimeout);
    }

    this.debounceTimeout = setTimeout(() => {
      this.debounceTimeout = undefined;
      void this.runGeneration();
    }, this.debounceMs);
  };

  /**
   * Run one generation now, or once more after the current one. Resolves when
   * the generation this call caused has finished. Failures are logged, not
   * thrown, so that watching continues.
   */
  async runGeneration(): Promise<void> {
    if (this.running) {
      this.pending = true;
      return this.running;
    }

    this.running = (async () => {
      do {
        this.pending = false;
        try {
          await this.generate();
        } catch (err: unknown) {
          this.logger?.error(err instanceof Error ? err.message : String(err));
        }
        this.generationCount++;
        this.lastGenerationTime = new Date();
        this.onGenerated?.(this);
      } while (this.pending);
    })();

    try {
      await this.running;
    } finally {
      this.running = undefined;
    }
  }

  async close(): Promise<void> {
    if (this.debounceTimeout) {
      clearTimeout(this.debounceTimeout);
      this.debounceTimeout = undefined;
    }
    await this.watcher?.close();
    this.watcher = undefined;
    await this.running;
  }
}
