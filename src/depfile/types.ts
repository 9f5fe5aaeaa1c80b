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

/** A preprocessor definition, `NAME` or `NAME=VALUE`. */
export interface Define {
  readonly name: string;
  /** Absent for `-DNAME`; present (possibly empty) for `-DNAME=...`. */
  readonly value?: string;
}

/** The compiler invocation recorded for one source file. */
export interface DependencyRecord {
  /** Exactly as written in the `.dep` file; may be relative, may use `\`. */
  readonly sourcePath: string;
  readonly includeDirs: readonly string[];
  readonly defines: readonly Define[];
  /** Everything that is neither an include directory nor a define. */
  readonly extraFlags: readonly string[];
}

/**
 * The `CompilerVersion:` line of a section, e.g.
 * `6190000::V6.19::ARMCLANG`.
 */
export interface CompilerVersion {
  readonly raw: string;
  readonly build: string;
  readonly version: string;
  /** `ARMCLANG` for Arm Compiler 6, `ARMCC` for Arm Compiler 5. */
  readonly family: string;
}

export interface TargetSection {
  readonly projectName: string;
  readonly targetName: string;
  /** 1-based line of the section header. */
  readonly line: number;
  readonly compilerVersion?: CompilerVersion;
  readonly records: readonly DependencyRecord[];
}

/**
 * One classified piece of a source block. Records are built from a stream of
 * these, which keeps classification separate from record assembly.
 */
export type DepToken =
  | { kind: 'source'; path: string; line: number }
  | { kind: 'include'; path: string }
  | { kind: 'define'; name: string; value?: string }
  | { kind: 'flag'; text: string };
