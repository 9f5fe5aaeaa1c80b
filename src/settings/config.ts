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

import * as fs from 'fs';
import * as fs_p from 'fs/promises';
import * as path from 'path';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import type { CompileCommandFormat, Toolchain } from '../clangd/compileCommand';
import { DEFAULT_BUILD_DIR } from '../clangd/paths';
import { ConfigurationError } from '../errors';

export const SETTINGS_FILE_NAME = '.mdk-compdb.yaml';

const DEFAULT_COMPILER = path.join('bin', 'armclang');
const DEFAULT_TOOLCHAIN_INCLUDE_DIR = 'include';
const DEFAULT_WATCH_DEBOUNCE_MS = 200;
const DEFAULT_ENCODING = 'utf-8';

function isSupportedEncoding(label: string): boolean {
  try {
    new TextDecoder(label);
    return true;
  } catch {
    return false;
  }
}

const settingsSchema = z
  .object({
    toolchain_root: z.string().optional(),
    compiler: z.string().default(DEFAULT_COMPILER),
    include_dirs: z.array(z.string()).optional(),
    build_dir: z.string().default(DEFAULT_BUILD_DIR),
    output_format: z.enum(['arguments', 'command']).default('arguments'),
    skip_empty: z.boolean().default(false),
    watch_debounce_ms: z
      .number()
      .int()
      .nonnegative()
      .default(DEFAULT_WATCH_DEBOUNCE_MS),
    encoding: z
      .string()
      .refine(isSupportedEncoding, { message: 'Unsupported encoding' })
      .default(DEFAULT_ENCODING),
  })
  .strict();

export type Settings = z.infer<typeof settingsSchema>;

/** Values from the command line, which win over the settings file. */
export interface SettingsOverrides {
  toolchain_root?: string;
  compiler?: string;
  include_dirs?: string[];
  build_dir?: string;
  output_format?: CompileCommandFormat;
  skip_empty?: boolean;
  watch_debounce_ms?: number;
  encoding?: string;
}

export function defaultSettings(): Settings {
  return settingsSchema.parse({});
}

/**
 * Parse settings file contents.
 *
 * @throws {ConfigurationError} On a YAML syntax error or a schema violation
 */
export function parseSettings(settingsData: string, source = 'settings'): Settings {
  let parsed: unknown;

  try {
    parsed = parseYaml(settingsData);
  } catch (err: unknown) {
    throw new ConfigurationError(
      `Invalid YAML in ${source}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  // An empty document is a file with nothing set.
  if (parsed === null || parsed === undefined) return defaultSettings();

  const result = settingsSchema.safeParse(parsed);

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid settings in ${source}: ${issues}`);
  }

  return result.data;
}

/**
 * Read the settings file, either the one given explicitly or the default one
 * in the project directory.
 *
 * @returns The file contents and path, or `null` when there is no default
 *   settings file
 * @throws {ConfigurationError} When an explicitly given file can't be read
 */
export async function loadSettingsFile(
  projectPath: string,
  explicitPath?: string,
): Promise<{ data: string; path: string } | null> {
  if (explicitPath === undefined) {
    const defaultPath = path.join(projectPath, SETTINGS_FILE_NAME);
    if (!fs.existsSync(defaultPath)) return null;
    const data = await fs_p.readFile(defaultPath);
    return { data: data.toString(), path: defaultPath };
  }

  const settingsPath = path.resolve(projectPath, explicitPath);

  try {
    const data = await fs_p.readFile(settingsPath);
    return { data: data.toString(), path: settingsPath };
  } catch (err: unknown) {
    throw new ConfigurationError(
      `Can't read settings file ${settingsPath}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}

/**
 * Load settings for a project; defaults when there is no settings file. A
 * relative `toolchain_root` is taken relative to the settings file.
 */
export async function loadSettings(
  projectPath: string,
  explicitPath?: string,
): Promise<Settings> {
  const file = await loadSettingsFile(projectPath, explicitPath);
  if (file === null) return defaultSettings();

  const settings = parseSettings(file.data, file.path);
  if (settings.toolchain_root !== undefined) {
    settings.toolchain_root = path.resolve(
      path.dirname(file.path),
      settings.toolchain_root,
    );
  }
  return settings;
}

export function applyOverrides(
  settings: Settings,
  overrides: SettingsOverrides,
): Settings {
  const merged: Settings = { ...settings };

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }

  return merged;
}

export interface ResolveToolchainOptions {
  /** Defaults to `fs.existsSync`. */
  fileExists?: (p: string) => boolean;
}

/**
 * Turn settings into the absolute compiler path and include directories the
 * synthesizer takes.
 *
 * @throws {ConfigurationError} When the compiler path can't be resolved or
 *   the compiler doesn't exist
 */
export function resolveToolchain(
  settings: Settings,
  { fileExists = fs.existsSync }: ResolveToolchainOptions = {},
): Toolchain {
  const root = settings.toolchain_root;

  if (root !== undefined && !path.isAbsolute(root)) {
    throw new ConfigurationError(`toolchain_root '${root}' must be absolute`);
  }

  const fromRoot = (p: string, what: string) => {
    if (path.isAbsolute(p)) return path.normalize(p);
    if (root === undefined) {
      throw new ConfigurationError(
        `${what} '${p}' is relative but no toolchain_root is configured`,
      );
    }
    return path.resolve(root, p);
  };

  let compiler = fromRoot(settings.compiler, 'Compiler path');

  if (!fileExists(compiler)) {
    if (fileExists(`${compiler}.exe`)) {
      compiler = `${compiler}.exe`;
    } else {
      throw new ConfigurationError(`Compiler not found: ${compiler}`);
    }
  }

  const includeDirs =
    settings.include_dirs ??
    (root === undefined ? [] : [DEFAULT_TOOLCHAIN_INCLUDE_DIR]);

  return {
    compiler,
    includeDirs: includeDirs.map((dir) =>
      fromRoot(dir, 'Toolchain include directory'),
    ),
  };
}
