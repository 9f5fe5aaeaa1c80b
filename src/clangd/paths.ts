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

import * as path from 'path';

import { escape, glob } from 'glob';

import type { Logger } from '../loggingTypes';

export const CDB_FILE_NAME = 'compile_commands.json' as const;

export const DEFAULT_BUILD_DIR = 'build';

/** Windows drive-letter (`C:\`, `C:/`) or UNC (`\\server`) paths. */
export function isWindowsPath(p: string): boolean {
  return /^[A-Za-z]:[\\/]/.test(p) || /^\\\\[^\\]/.test(p);
}

export function toForwardSlashes(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Resolve a path from a `.dep` file against an absolute root.
 *
 * uVision writes Windows paths, but this may run anywhere. A Windows root is
 * resolved with Windows rules; otherwise backslashes are taken as separators
 * and POSIX rules apply. The result always uses forward slashes.
 */
export function resolveFrom(root: string, p: string): string {
  if (isWindowsPath(root) || isWindowsPath(p)) {
    return toForwardSlashes(path.win32.resolve(root, p));
  }

  return path.posix.resolve(toForwardSlashes(root), toForwardSlashes(p));
}

/** Normalize an absolute root the same way `resolveFrom` treats it. */
export function normalizeRoot(root: string): string {
  return resolveFrom(root, '.');
}

/** uVision names the file `<project>_<target>.dep`. */
export function depFileName(projectName: string, targetName: string): string {
  return `${projectName}_${targetName}.dep`;
}

/**
 * Find the `.dep` file for a target below the project directory.
 *
 * The uVision file name for the target is preferred; failing that, any `.dep`
 * file is accepted. Among several candidates the first in sorted order wins.
 *
 * @returns The absolute path, or `undefined` when nothing matched
 */
export async function findDepFile(
  projectPath: string,
  projectName: string,
  targetName: string,
  logger?: Logger,
): Promise<string | undefined> {
  // Target names may contain glob magic such as brackets.
  const exactPattern = `**/${escape(depFileName(projectName, targetName))}`;

  for (const pattern of [exactPattern, '**/*.dep']) {
    const matches = (
      await glob(pattern, {
        cwd: projectPath,
        nodir: true,
        ignore: ['**/node_modules/**'],
      })
    ).sort();

    if (matches.length === 0) continue;

    if (matches.length > 1) {
      logger?.warn(
        `Multiple .dep files found in ${projectPath} (${matches.join(', ')}); ` +
          `using ${matches[0]}. Pass --dep-file to choose another.`,
      );
    }

    return path.resolve(projectPath, matches[0]);
  }

  return undefined;
}

/** Where the database for a project goes. */
export function compileCommandsPath(
  projectPath: string,
  outputDir: string = DEFAULT_BUILD_DIR,
): string {
  return path.resolve(projectPath, outputDir, CDB_FILE_NAME);
}
