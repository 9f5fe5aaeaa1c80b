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

import type { Logger } from './loggingTypes';

/** What the CLI needs from a progress display. */
export interface StatusUI {
  updateStatus(status: string): void;
  /** Print a line without disturbing the status line. */
  print(line: string): void;
  finish(finalStatus: string): void;
  finishWithError(finalStatus: string): void;
  cleanup(): void;
}

/**
 * A single, continuously rewritten status line on a TTY. When stdout is not a
 * TTY, status updates are dropped and only printed lines and final statuses
 * appear.
 */
export class UIManager implements StatusUI {
  private statusLine = '';
  private isTuiActive = false;

  private static readonly ESC = '\x1B';
  private static readonly CSI = UIManager.ESC + '[';
  private static readonly CLEAR_LINE = `${UIManager.CSI}2K`;
  private static readonly HIDE_CURSOR = `${UIManager.CSI}?25l`;
  private static readonly SHOW_CURSOR = `${UIManager.CSI}?25h`;

  private write(str: string): void {
    process.stdout.write(str);
  }

  private clearCurrentTui(): void {
    if (!process.stdout.isTTY) return;

    // Move cursor to the beginning of the current line and clear it.
    this.write('\r' + UIManager.CLEAR_LINE);
  }

  private render(): void {
    if (!process.stdout.isTTY) return;
    this.clearCurrentTui();
    this.write(this.statusLine);

    this.isTuiActive = true;
  }

  public updateStatus(status: string): void {
    this.statusLine = status;
    if (this.isTuiActive) {
      this.render();
    } else if (process.stdout.isTTY) {
      // First time rendering for a TTY: hide cursor, then render.
      this.write(UIManager.HIDE_CURSOR);
      this.render();
    }
  }

  public print(line: string): void {
    if (this.isTuiActive) {
      this.clearCurrentTui();
      this.write(line + '\n');
      this.render();
    } else {
      this.write(line + '\n');
    }
  }

  private end(writeFinal: () => void): void {
    if (this.isTuiActive) {
      this.clearCurrentTui();
    }
    writeFinal();

    if (process.stdout.isTTY) {
      this.write(UIManager.SHOW_CURSOR);
    }

    this.isTuiActive = false;
  }

  public finish(finalStatus: string): void {
    this.end(() => this.write(finalStatus + '\n'));
  }

  /** Like `finish`, but the final status goes to stderr. */
  public finishWithError(finalStatus: string): void {
    this.end(() => process.stderr.write(finalStatus + '\n'));
  }

  public cleanup(): void {
    if (!process.stdout.isTTY) return;
    // Explicitly show cursor in case of unexpected exit
    if (this.isTuiActive) this.write(UIManager.SHOW_CURSOR);
  }
}

/** A `StatusUI` that reports everything through a logger. */
export class LoggerUI implements StatusUI {
  constructor(private logger: Logger) {}

  public updateStatus(status: string): void {
    this.logger.info(status);
  }

  public print(line: string): void {
    this.logger.info(line);
  }

  public finish(finalStatus: string): void {
    this.logger.info(finalStatus);
  }

  public finishWithError(finalStatus: string): void {
    this.logger.error(finalStatus);
  }

  public cleanup(): void {
    // no-op
  }
}

/**
 * A logger that prints through a status UI, so log lines and the status line
 * don't overwrite each other.
 */
export function uiLogger(ui: StatusUI, quiet = false): Logger {
  return {
    info: (msg: string) => {
      if (!quiet) ui.print(msg);
    },
    warn: (msg: string) => ui.print(`warning: ${msg}`),
    error: (msg: string) => ui.print(`error: ${msg}`),
  };
}
