#!/usr/bin/env node
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

import {
  COMPILE_COMMAND_FORMATS,
  type CompileCommandFormat,
} from './clangd/compileCommand';
import { CompdbError, UsageError } from './errors';
import { generateCompileCommandsFromDepFile, resolveDepFile } from './generator';
import { createConsoleLogger } from './logging';
import type { Logger } from './loggingTypes';
import {
  applyOverrides,
  loadSettings,
  resolveToolchain,
  type SettingsOverrides,
} from './settings/config';
import { LoggerUI, UIManager, uiLogger, type StatusUI } from './ui';
import { DepFileWatcher } from './watcher';

export const USAGE = `Usage: mdk-compdb <project-path> <project-name> <target-name> [options]

Generate compile_commands.json for a Keil MDK target from its .dep file.

Options:
  --dep-file <file>        .dep file (default: discovered under project path)
  --config <file>          settings file (default: <project>/.mdk-compdb.yaml)
  --toolchain-root <dir>   toolchain installation root
  --compiler <file>        compiler executable
  --include-dir <dir>      toolchain include directory (repeatable)
  --output-dir <dir>       output directory (default: <project>/build)
  --format <fmt>           arguments | command
  --skip-empty             do not write a database with no entries
  --watch                  regenerate whenever the .dep file changes
  --debounce <ms>          watch-mode debounce
  --encoding <label>       .dep file encoding (default: utf-8)
  --quiet                  only print warnings and errors
  --help                   print this message`;

export interface CliArgs {
  projectPath: string;
  projectName: string;
  targetName: string;
  depFile?: string;
  configFile?: string;
  overrides: SettingsOverrides;
  watch: boolean;
  quiet: boolean;
}

const VALUE_OPTIONS = [
  'dep-file',
  'config',
  'toolchain-root',
  'compiler',
  'include-dir',
  'output-dir',
  'format',
  'debounce',
  'encoding',
] as const;

const FLAG_OPTIONS = ['skip-empty', 'watch', 'quiet', 'help'] as const;

type ValueOption = (typeof VALUE_OPTIONS)[number];
type FlagOption = (typeof FLAG_OPTIONS)[number];

function isValueOption(name: string): name is ValueOption {
  return VALUE_OPTIONS.some((option) => option === name);
}

function isFlagOption(name: string): name is FlagOption {
  return FLAG_OPTIONS.some((option) => option === name);
}

function isFormat(value: string): value is CompileCommandFormat {
  return COMPILE_COMMAND_FORMATS.some((format) => format === value);
}

/**
 * Parse command line arguments (without the `node` and script entries).
 *
 * @returns The parsed arguments, or `'help'` when help was requested
 * @throws {UsageError} On unknown options, missing values or a wrong number
 *   of positional arguments
 */
export function parseCliArgs(argv: string[]): CliArgs | 'help' {
  const positional: string[] = [];
  const values: Partial<Record<ValueOption, string>> = {};
  const includeDirs: string[] = [];
  const flags = new Set<FlagOption>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--') {
      positional.push(...argv.slice(i + 1));
      break;
    }

    if (!arg.startsWith('--')) {
      positional.push(arg);
      continue;
    }

    // Both `--name value` and `--name=value` are accepted.
    const eq = arg.indexOf('=');
    const name = eq < 0 ? arg.slice(2) : arg.slice(2, eq);

    if (isFlagOption(name)) {
      if (eq >= 0) throw new UsageError(`--${name} takes no value`);
      flags.add(name);
    } else if (isValueOption(name)) {
      let value: string | undefined;
      if (eq >= 0) {
        value = arg.slice(eq + 1);
      } else {
        value = argv.at(i + 1);
        i++;
      }
      if (value === undefined) {
        throw new UsageError(`--${name} requires a value`);
      }
      if (name === 'include-dir') {
        includeDirs.push(value);
      } else {
        values[name] = value;
      }
    } else {
      throw new UsageError(`Unknown option: ${arg}`);
    }
  }

  if (flags.has('help')) return 'help';

  if (positional.length !== 3) {
    throw new UsageError(
      `Expected <project-path> <project-name> <target-name>, got ${positional.length} argument${positional.length === 1 ? '' : 's'}`,
    );
  }

  const [projectPath, projectName, targetName] = positional;
  const overrides: SettingsOverrides = {
    toolchain_root: values['toolchain-root'],
    compiler: values['compiler'],
    build_dir: values['output-dir'],
  };

  if (includeDirs.length > 0) overrides.include_dirs = includeDirs;
  if (flags.has('skip-empty')) overrides.skip_empty = true;

  const format = values['format'];
  if (format !== undefined) {
    if (!isFormat(format)) {
      throw new UsageError(
        `--format must be one of ${COMPILE_COMMAND_FORMATS.join(', ')}, got '${format}'`,
      );
    }
    overrides.output_format = format;
  }

  const debounce = values['debounce'];
  if (debounce !== undefined) {
    if (!/^\d+$/.test(debounce)) {
      throw new UsageError(`--debounce must be a non-negative integer, got '${debounce}'`);
    }
    overrides.watch_debounce_ms = Number(debounce);
  }

  const encoding = values['encoding'];
  if (encoding !== undefined) overrides.encoding = encoding;

  return {
    projectPath,
    projectName,
    targetName,
    depFile: values['dep-file'],
    configFile: values['config'],
    overrides,
    watch: flags.has('watch'),
    quiet: flags.has('quiet'),
  };
}

function describeError(err: unknown): string {
  if (err instanceof CompdbError) return err.message;
  if (err instanceof Error) return err.stack ?? err.message;
  return String(err);
}

function interrupted(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
  });
}

/**
 * Run the tool and return the process exit status. Watch mode runs until
 * `stop` resolves, by default on Ctrl-C.
 */
export async function runCli(
  argv: string[],
  logger?: Logger,
  stop: () => Promise<void> = interrupted,
): Promise<number> {
  let args: CliArgs | 'help';

  try {
    args = parseCliArgs(argv);
  } catch (err: unknown) {
    const log = logger ?? createConsoleLogger();
    log.error(describeError(err));
    log.info(USAGE);
    return 2;
  }

  if (args === 'help') {
    (logger ?? createConsoleLogger()).info(USAGE);
    return 0;
  }

  // The status line is only drawn on an interactive terminal; otherwise
  // everything goes through the logger.
  let ui: StatusUI;
  let log: Logger;
  if (logger === undefined && process.stdout.isTTY) {
    ui = new UIManager();
    log = uiLogger(ui, args.quiet);
  } else {
    log = logger ?? createConsoleLogger({ quiet: args.quiet });
    ui = new LoggerUI(log);
  }

  try {
    const projectPath = path.resolve(args.projectPath);
    const { toolchain_root: cliToolchainRoot } = args.overrides;
    const settings = applyOverrides(
      await loadSettings(projectPath, args.configFile),
      {
        ...args.overrides,
        toolchain_root:
          cliToolchainRoot === undefined
            ? undefined
            : path.resolve(cliToolchainRoot),
      },
    );
    const toolchain = resolveToolchain(settings);

    const generate = async (depFile: string | undefined) => {
      ui.updateStatus(
        `⏳ Generating compile_commands.json for target: ${args.targetName}`,
      );
      return generateCompileCommandsFromDepFile(
        {
          projectPath,
          projectName: args.projectName,
          targetName: args.targetName,
          depFile,
          toolchain,
          outputDir: settings.build_dir,
          format: settings.output_format,
          skipEmpty: settings.skip_empty,
          encoding: settings.encoding,
        },
        log,
      );
    };

    if (!args.watch) {
      const result = await generate(args.depFile);
      ui.finish(
        result.written
          ? `✅ Generated ${result.outputPath} (${result.entryCount} entries).`
          : `⚠️ No compile commands generated for target: ${args.targetName}`,
      );
      return 0;
    }

    const depFile = await resolveDepFile(
      projectPath,
      args.projectName,
      args.targetName,
      args.depFile,
      log,
    );
    const watcher = new DepFileWatcher(
      depFile,
      async () => {
        await generate(depFile);
      },
      settings.watch_debounce_ms,
      log,
      ({ generationCount, lastGenerationTime }) =>
        ui.updateStatus(
          `👀 Watching ${path.basename(depFile)} | ` +
            `last generated ${lastGenerationTime?.toLocaleTimeString() ?? 'never'} | ` +
            `generations: ${generationCount}`,
        ),
    );

    await watcher.runGeneration();
    await watcher.start();

    await stop();
    await watcher.close();
    ui.finish('Stopped watching.');
    return 0;
  } catch (err: unknown) {
    ui.finishWithError(`❌ ${describeError(err)}`);
    return 1;
  } finally {
    ui.cleanup();
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).then(
    (status) => process.exit(status),
    (err: unknown) => {
      console.error(err);
      process.exit(1);
    },
  );
}
