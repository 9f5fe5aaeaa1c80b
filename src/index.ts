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

export * from './errors';
export type * from './depfile/types';
export {
  assembleRecords,
  classifyOptions,
  findSections,
  parseCompilerVersion,
  parseDependencyFile,
  parseTargetSection,
} from './depfile/parser';
export { splitCommandLine } from './depfile/tokenizer';
export {
  buildArguments,
  CompilationDatabase,
  serializeCompileCommands,
  synthesizeCompileCommands,
} from './clangd/compileCommand';
export type {
  CompileCommandEntry,
  CompileCommandFormat,
  Toolchain,
} from './clangd/compileCommand';
export { CDB_FILE_NAME, findDepFile, resolveFrom } from './clangd/paths';
export {
  decodeDepFile,
  generateCompileCommandsFromDepFile,
  resolveDepFile,
} from './generator';
export type { GenerateOptions, GenerateResult } from './generator';
export {
  applyOverrides,
  loadSettings,
  parseSettings,
  resolveToolchain,
} from './settings/config';
export type { Settings } from './settings/config';
export type { Logger } from './loggingTypes';
export { createConsoleLogger, loggerWithPassthrough } from './logging';
