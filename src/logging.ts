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

import type { Logger, LogLevel } from './loggingTypes';

type LogEntry = {
  level: LogLevel;
  message: string;
  timestamp: Date;
};

export interface ConsoleLoggerOptions {
  /** Drop info messages; warnings and errors still go to stderr. */
  quiet?: boolean;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
}

export function createConsoleLogger({
  quiet = false,
  stdout = process.stdout,
  stderr = process.stderr,
}: ConsoleLoggerOptions = {}): Logger {
  return {
    info: (msg: string) => {
      if (!quiet) stdout.write(msg + '\n');
    },
    warn: (msg: string) => stderr.write(`warning: ${msg}\n`),
    error: (msg: string) => stderr.write(`error: ${msg}\n`),
  };
}

/** A logger that discards everything. */
export const nullLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export interface LogDumpPassthrough extends Logger {
  logs: LogEntry[];
}

/**
 * Wrap a logger so that every message is also kept in memory, in the order it
 * was logged.
 */
export function loggerWithPassthrough(logger: Logger): LogDumpPassthrough {
  const logs: LogEntry[] = [];
  return {
    info: (msg: string) => {
      logger.info(msg);
      logs.push({ level: 'info', message: msg, timestamp: new Date() });
    },
    warn: (msg: string) => {
      logger.warn(msg);
      logs.push({ level: 'warn', message: msg, timestamp: new Date() });
    },
    error: (msg: string) => {
      logger.error(msg);
      logs.push({ level: 'error', message: msg, timestamp: new Date() });
    },
    logs,
  };
}
