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

import {
  CompilationDatabase,
  type CompileCommandFormat,
  type Toolchain,
} from './clangd/compileCommand';
import {
  compileCommandsPath,
  DEFAULT_BUILD_DIR,
  findDepFile,
} from './clangd/paths';
import { parseTargetSection } from './depfile/parser';
import { IOFailureError, UnsupportedEncodingError } from './errors';
import type { Logger } from './loggingTypes';

export interface GenerateOptions {
  /** The directory holding the uVision project; `.dep` paths are relative to it. */
  projectPath: string;
  projectName: string;
  targetName: string;
  /** Absolute, or relative to `projectPath`. Discovered when absent. */
  depFile?: string;
  toolchain: Toolchain;
  /** Absolute, or relative to `projectPath`. */
  outputDir?: string;
  format?: CompileCommandFormat;
  /** Leave the output alone when the target compiles no files. */
  skipEmpty?: boolean;
  /** Text encoding of the `.dep` file, as a WHATWG encoding label. */
  encoding?: string;
}

export interface GenerateResult {
  depFile: string;
  outputPath: string;
  entryCount: number;
  written: boolean;
}

/** Locate the `.dep` file for a run. */
export async function resolveDepFile(
  projectPath: string,
  projectName: string,
  targetName: string,
  depFile?: string,
  logger?: Logger,
): Promise<string> {
  if (depFile !== undefined) {
    const resolved = path.resolve(projectPath, depFile);
    if (!path.isAbsolute(depFile)) {
      logger?.info(`.dep file path is relative, resolved to ${resolved}`);
    }
    return resolved;
  }

  const found = await findDepFile(projectPath, projectName, targetName, logger);

  if (found === undefined) {
    throw new IOFailureError('No .dep file found below', projectPath);
  }

  logger?.info(`Using .dep file ${found}`);
  return found;
}

/**
 * Decode `.dep` file contents. Bytes that are invalid in `encoding` are an
 * error rather than replacement characters, which would end up in the paths.
 *
 * @throws {UnsupportedEncodingError}
 */
export function decodeDepFile(
  data: Uint8Array,
  depFile: string,
  encoding: string,
): string {
  try {
    return new TextDecoder(encoding, { fatal: true }).decode(data);
  } catch (err: unknown) {
    throw new UnsupportedEncodingError(depFile, encoding, err);
  }
}

/**
 * Read a `.dep` file, build the compilation database for one target and write
 * it.
 *
 * Nothing is written unless parsing succeeds, so a previous database survives
 * a failed run untouched.
 */
export async function generateCompileCommandsFromDepFile(
  options: GenerateOptions,
  logger?: Logger,
): Promise<GenerateResult> {
  const startTime = Date.now();
  const projectPath = path.resolve(options.projectPath);
  const format = options.format ?? 'arguments';

  const depFile = await resolveDepFile(
    projectPath,
    options.projectName,
    options.targetName,
    options.depFile,
    logger,
  );

  let data: Buffer;
  try {
    data = await fs_p.readFile(depFile);
  } catch (err: unknown) {
    throw new IOFailureError("Can't read .dep file", depFile, err);
  }

  const text = decodeDepFile(data, depFile, options.encoding ?? 'utf-8');

  const section = parseTargetSection(
    text,
    options.projectName,
    options.targetName,
  );

  if (section.compilerVersion) {
    const { version, family } = section.compilerVersion;
    logger?.info(`Target '${section.targetName}' built with ${family} ${version}`);
  }

  const compDb = CompilationDatabase.fromRecords(
    section.records,
    projectPath,
    options.toolchain,
  );

  const outputPath = compileCommandsPath(
    projectPath,
    options.outputDir ?? DEFAULT_BUILD_DIR,
  );

  if (compDb.size === 0) {
    logger?.warn(
      `No compiled files found for target '${options.targetName}' in ${depFile}`,
    );

    if (options.skipEmpty) {
      logger?.info(`Leaving ${outputPath} unchanged.`);
      return { depFile, outputPath, entryCount: 0, written: false };
    }
  }

  try {
    await compDb.write(outputPath, format);
  } catch (err: unknown) {
    throw new IOFailureError("Can't write compilation database", outputPath, err);
  }

  logger?.info(
    `Wrote ${compDb.size} compile command${compDb.size === 1 ? '' : 's'} ` +
      `to ${outputPath} in ${Date.now() - startTime}ms.`,
  );

  return { depFile, outputPath, entryCount: compDb.size, written: true };
}
