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

import * as fs_p from 'fs/promises';
import * as path from 'path';

import type { Define, DependencyRecord } from '../depfile/types';
import { normalizeRoot, resolveFrom } from './paths';

/** The resolved toolchain, supplied by configuration. */
export interface Toolchain {
  /** Path of the compiler executable. Used as-is. */
  compiler: string;
  /** Include directories the compiler searches implicitly. */
  includeDirs: readonly string[];
}

/**
 * The two forms of the command in a compilation database entry.
 *
 * See: https://clang.llvm.org/docs/JSONCompilationDatabase.html
 */
export type CompileCommandFormat = 'arguments' | 'command';

export const COMPILE_COMMAND_FORMATS: readonly CompileCommandFormat[] = [
  'arguments',
  'command',
];

/** One compile command, before it is given its on-disk form. */
export interface CompileCommandEntry {
  readonly directory: string;
  readonly file: string;
  readonly arguments: readonly string[];
}

type CompileCommandData =
  | { directory: string; file: string; arguments: string[] }
  | { directory: string; file: string; command: string };

export function defineFlag({ name, value }: Define): string {
  return value === undefined ? `-D${name}` : `-D${name}=${value}`;
}

/**
 * Build the argument list for one record: the compiler, the record's include
 * directories, the toolchain's include directories, the defines, the
 * remaining flags verbatim, then the source file.
 */
export function buildArguments(
  record: DependencyRecord,
  projectRoot: string,
  toolchain: Toolchain,
): string[] {
  return [
    toolchain.compiler,
    ...record.includeDirs.map((dir) => `-I${resolveFrom(projectRoot, dir)}`),
    ...toolchain.includeDirs.map((dir) => `-I${dir}`),
    ...record.defines.map(defineFlag),
    ...record.extraFlags,
    resolveFrom(projectRoot, record.sourcePath),
  ];
}

/**
 * Produce one compile command per record, in record order.
 *
 * @param projectRoot The absolute directory the `.dep` paths are relative to
 */
export function synthesizeCompileCommands(
  records: readonly DependencyRecord[],
  projectRoot: string,
  toolchain: Toolchain,
): CompileCommandEntry[] {
  const directory = normalizeRoot(projectRoot);

  return records.map((record) => ({
    directory,
    file: resolveFrom(projectRoot, record.sourcePath),
    arguments: buildArguments(record, projectRoot, toolchain),
  }));
}

/** Quote an argument for the `command` form when it needs it. */
export function quoteArgument(arg: string): string {
  if (arg !== '' && !/[\s"'\\]/.test(arg)) return arg;
  return `"${arg.replace(/(["\\])/g, '\\$1')}"`;
}

export function joinCommand(args: readonly string[]): string {
  return args.map(quoteArgument).join(' ');
}

function toData(
  entry: CompileCommandEntry,
  format: CompileCommandFormat,
): CompileCommandData {
  return format === 'command'
    ? {
        directory: entry.directory,
        file: entry.file,
        command: joinCommand(entry.arguments),
      }
    : {
        directory: entry.directory,
        file: entry.file,
        arguments: [...entry.arguments],
      };
}

export function serializeCompileCommands(
  entries: readonly CompileCommandEntry[],
  format: CompileCommandFormat = 'arguments',
): string {
  return JSON.stringify(
    entries.map((entry) => toData(entry, format)),
    null,
    2,
  );
}

/**
 * A `clangd` compilation database.
 *
 * See: https://clang.llvm.org/docs/JSONCompilationDatabase.html
 */
export class CompilationDatabase {
  db: CompileCommandEntry[] = [];

  static fromRecords(
    records: readonly DependencyRecord[],
    projectRoot: string,
    toolchain: Toolchain,
  ): CompilationDatabase {
    const compDb = new CompilationDatabase();
    for (const entry of synthesizeCompileCommands(
      records,
      projectRoot,
      toolchain,
    )) {
      compDb.add(entry);
    }
    return compDb;
  }

  /** Add a compile command to the database. */
  add(entry: CompileCommandEntry): void {
    this.db.push(entry);
  }

  get size(): number {
    return this.db.length;
  }

  serialize(format: CompileCommandFormat = 'arguments'): string {
    return serializeCompileCommands(this.db, format);
  }

  /** Write the database, replacing whatever is at `filePath`. */
  async write(
    filePath: string,
    format: CompileCommandFormat = 'arguments',
  ): Promise<void> {
    const fileData = this.serialize(format);
    await fs_p.mkdir(path.dirname(filePath), { recursive: true });
    await fs_p.writeFile(filePath, fileData);
  }
}
