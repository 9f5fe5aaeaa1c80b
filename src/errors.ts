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

/** Base class for every error this tool reports to the user. */
export class CompdbError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The `.dep` file has no section for the requested project and target. */
export class TargetNotFoundError extends CompdbError {
  readonly projectName: string;
  readonly targetName: string;
  /** The `project/target` sections that the file does contain. */
  readonly available: string[];

  constructor(projectName: string, targetName: string, available: string[]) {
    const found =
      available.length > 0
        ? `sections present: ${available.map((s) => `'${s}'`).join(', ')}`
        : 'the file has no target sections';
    super(
      `Target '${targetName}' of project '${projectName}' not found in .dep file (${found})`,
    );
    this.projectName = projectName;
    this.targetName = targetName;
    this.available = available;
  }
}

/** A structural problem in the `.dep` file. */
export class MalformedRecordError extends CompdbError {
  /** 1-based line in the `.dep` text where the problem was detected. */
  readonly line: number;
  readonly reason: string;

  constructor(reason: string, line: number) {
    super(`Malformed .dep record at line ${line}: ${reason}`);
    this.reason = reason;
    this.line = line;
  }
}

export class ConfigurationError extends CompdbError {}

/** Reading the `.dep` file or writing the database failed. */
export class IOFailureError extends CompdbError {
  readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super(
      cause instanceof Error
        ? `${message}: ${path} (${cause.message})`
        : `${message}: ${path}`,
      { cause },
    );
    this.path = path;
  }
}

/** The `.dep` file is not valid text in the configured encoding. */
export class UnsupportedEncodingError extends CompdbError {
  readonly path: string;
  readonly encoding: string;

  constructor(path: string, encoding: string, cause?: unknown) {
    super(
      `Can't decode .dep file as ${encoding}: ${path} ` +
        `(set 'encoding' to the code page uVision wrote it in, e.g. gbk)`,
      { cause },
    );
    this.path = path;
    this.encoding = encoding;
  }
}

export class UsageError extends CompdbError {}
