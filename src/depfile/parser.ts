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

import { MalformedRecordError, TargetNotFoundError } from '../errors';
import { splitCommandLine } from './tokenizer';
import type {
  CompilerVersion,
  DependencyRecord,
  DepToken,
  TargetSection,
} from './types';

const SECTION_HEADER_REGEX = /^Dependencies for Project '(.*?)', Target '(.*)':/;
const COMPILER_VERSION_REGEX = /^CompilerVersion:\s*(.*?)\s*$/;
const SOURCE_BLOCK_REGEX = /^F[ \t]*\(/;
const HEADER_DEPENDENCY_REGEX = /^I[ \t]*\(/;

/** Maps character offsets in the `.dep` text to 1-based line numbers. */
class LineIndex {
  private readonly starts: number[] = [0];

  constructor(text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') this.starts.push(i + 1);
    }
  }

  lineAt(offset: number): number {
    let lo = 0;
    let hi = this.starts.length - 1;

    while (lo < hi) {
      const mid = Math.ceil((lo + hi) / 2);
      if (this.starts[mid] <= offset) {
        lo = mid;
      } else {
        hi = mid - 1;
      }
    }

    return lo + 1;
  }
}

/** Where one `Dependencies for Project ...` section sits in the text. */
export interface SectionBounds {
  projectName: string;
  targetName: string;
  /** 1-based line of the header. */
  line: number;
  /** Offset of the first character after the header line. */
  start: number;
  /** Offset of the next header, or the end of the text. */
  end: number;
}

/** The end of the line containing `offset`, clamped to `end`. */
function lineEndFrom(text: string, offset: number, end: number): number {
  const newline = text.indexOf('\n', offset);
  return newline < 0 || newline > end ? end : newline;
}

function* linesOf(
  text: string,
): Generator<{ offset: number; content: string }> {
  let offset = 0;

  while (offset < text.length) {
    const lineEnd = lineEndFrom(text, offset, text.length);
    yield { offset, content: text.slice(offset, lineEnd).replace(/\r$/, '') };
    offset = lineEnd + 1;
  }
}

/** Find every target section in a `.dep` file, in textual order. */
export function findSections(text: string): SectionBounds[] {
  const lines = new LineIndex(text);
  const sections: SectionBounds[] = [];

  for (const { offset, content } of linesOf(text)) {
    const match = content.match(SECTION_HEADER_REGEX);
    if (!match) continue;

    const previous = sections.at(-1);
    if (previous) previous.end = offset;

    sections.push({
      projectName: match[1],
      targetName: match[2],
      line: lines.lineAt(offset),
      start: Math.min(lineEndFrom(text, offset, text.length) + 1, text.length),
      end: text.length,
    });
  }

  return sections;
}

export function parseCompilerVersion(raw: string): CompilerVersion {
  const [build = '', version = '', family = ''] = raw.split('::');
  return { raw, build, version, family };
}

/**
 * Read consecutive parenthesised groups starting at `offset`, e.g. the
 * `(path)(0x5F1C2A3B)(-c -O1)` of a source block. Groups nest, and from
 * `quotedFrom` onward a parenthesis inside quotes does not count.
 *
 * @returns The group contents and the offset just past the last group
 */
function readGroups(
  text: string,
  offset: number,
  end: number,
  lines: LineIndex,
  quotedFrom: number,
): { groups: string[]; next: number } {
  const groups: string[] = [];
  let pos = offset;

  for (;;) {
    while (pos < end && (text[pos] === ' ' || text[pos] === '\t')) pos++;
    if (pos >= end || text[pos] !== '(') break;

    const quoteAware = groups.length >= quotedFrom;
    let depth = 0;
    let quote: string | null = null;
    let close = -1;

    for (let i = pos; i < end; i++) {
      const c = text[i];

      if (quote) {
        if (c === '\\') {
          i++;
        } else if (c === quote) {
          quote = null;
        }
      } else if (quoteAware && (c === '"' || c === "'")) {
        quote = c;
      } else if (c === '(') {
        depth++;
      } else if (c === ')') {
        depth--;
        if (depth === 0) {
          close = i;
          break;
        }
      }
    }

    if (close < 0) {
      throw new MalformedRecordError(
        'unterminated parenthesised group',
        lines.lineAt(pos),
      );
    }

    groups.push(text.slice(pos + 1, close));
    pos = close + 1;
  }

  return { groups, next: pos };
}

/**
 * Classify the tokens of one compiler option string.
 *
 * Only include directories and defines are understood; every other token is
 * passed through untouched and in order, including flags this code has never
 * seen.
 */
export function classifyOptions(options: string[], line: number): DepToken[] {
  const tokens: DepToken[] = [];

  const takeValue = (i: number, flag: string) => {
    const value = options.at(i + 1);
    if (value === undefined) {
      throw new MalformedRecordError(`'${flag}' is missing its value`, line);
    }
    return value;
  };

  const define = (text: string): DepToken => {
    const eq = text.indexOf('=');
    const name = eq < 0 ? text : text.slice(0, eq);

    if (name === '') {
      throw new MalformedRecordError(`define '-D${text}' has no name`, line);
    }

    return eq < 0
      ? { kind: 'define', name }
      : { kind: 'define', name, value: text.slice(eq + 1) };
  };

  for (let i = 0; i < options.length; i++) {
    const option = options[i];

    if (option === '-I') {
      tokens.push({ kind: 'include', path: takeValue(i, option) });
      i++;
    } else if (option.startsWith('-I')) {
      tokens.push({ kind: 'include', path: option.slice(2) });
    } else if (option === '-D') {
      tokens.push(define(takeValue(i, option)));
      i++;
    } else if (option.startsWith('-D')) {
      tokens.push(define(option.slice(2)));
    } else {
      tokens.push({ kind: 'flag', text: option });
    }
  }

  return tokens;
}

/**
 * Turn the text of one section into a flat token stream. Each source block
 * contributes a `source` token followed by the tokens of its options.
 */
function tokenizeSection(
  text: string,
  section: SectionBounds,
  lines: LineIndex,
): { tokens: DepToken[]; compilerVersion?: CompilerVersion } {
  const tokens: DepToken[] = [];
  let compilerVersion: CompilerVersion | undefined;
  let inSourceBlock = false;
  let pos = section.start;

  while (pos < section.end) {
    const lineEnd = lineEndFrom(text, pos, section.end);
    const content = text.slice(pos, lineEnd).replace(/\r$/, '');
    const line = lines.lineAt(pos);
    let next = lineEnd + 1;

    const versionMatch = content.match(COMPILER_VERSION_REGEX);

    if (SOURCE_BLOCK_REGEX.test(content)) {
      const { groups, next: groupsEnd } = readGroups(
        text,
        pos + 1,
        section.end,
        lines,
        2,
      );

      const [sourcePath = '', timestamp, options = ''] = groups;

      if (sourcePath.trim() === '') {
        throw new MalformedRecordError('source block has no file path', line);
      }
      if (timestamp === undefined) {
        throw new MalformedRecordError(
          `truncated source block for '${sourcePath}'`,
          line,
        );
      }

      let split: string[];
      try {
        split = splitCommandLine(options);
      } catch (err: unknown) {
        throw new MalformedRecordError(
          err instanceof Error ? err.message : String(err),
          line,
        );
      }

      tokens.push({ kind: 'source', path: sourcePath.trim(), line });
      tokens.push(...classifyOptions(split, line));
      inSourceBlock = true;

      // The option group can span lines; resume after the line it ends on.
      next = lineEndFrom(text, groupsEnd, section.end) + 1;
    } else if (HEADER_DEPENDENCY_REGEX.test(content)) {
      if (!inSourceBlock) {
        throw new MalformedRecordError(
          'header dependency outside of a source block',
          line,
        );
      }

      const { groups, next: groupsEnd } = readGroups(
        text,
        pos + 1,
        section.end,
        lines,
        Infinity,
      );
      if (groups.length === 0 || groups[0].trim() === '') {
        throw new MalformedRecordError('header dependency has no path', line);
      }

      next = lineEndFrom(text, groupsEnd, section.end) + 1;
    } else if (versionMatch) {
      compilerVersion = parseCompilerVersion(versionMatch[1]);
    }

    pos = next;
  }

  return { tokens, compilerVersion };
}

/**
 * Group a token stream into records, one per `source` token, keeping the
 * stream's order.
 *
 * @throws {MalformedRecordError} On a source path that was already seen
 */
export function assembleRecords(tokens: DepToken[]): DependencyRecord[] {
  type Building = {
    sourcePath: string;
    includeDirs: string[];
    defines: { name: string; value?: string }[];
    extraFlags: string[];
  };

  const records: Building[] = [];
  const seen = new Map<string, number>();
  let current: Building | undefined;

  for (const token of tokens) {
    if (token.kind === 'source') {
      const firstLine = seen.get(token.path);
      if (firstLine !== undefined) {
        throw new MalformedRecordError(
          `duplicate source file '${token.path}' (first seen at line ${firstLine})`,
          token.line,
        );
      }
      seen.set(token.path, token.line);

      current = {
        sourcePath: token.path,
        includeDirs: [],
        defines: [],
        extraFlags: [],
      };
      records.push(current);
      continue;
    }

    if (!current) {
      throw new Error(`'${token.kind}' token before the first source token`);
    }

    switch (token.kind) {
      case 'include':
        current.includeDirs.push(token.path);
        break;
      case 'define':
        current.defines.push(
          token.value === undefined
            ? { name: token.name }
            : { name: token.name, value: token.value },
        );
        break;
      case 'flag':
        current.extraFlags.push(token.text);
        break;
    }
  }

  return records;
}

/**
 * Parse the section of a `.dep` file that belongs to one project and target.
 *
 * @throws {TargetNotFoundError} When the file has no such section
 * @throws {MalformedRecordError} On any structural problem in the section
 */
export function parseTargetSection(
  text: string,
  projectName: string,
  targetName: string,
): TargetSection {
  const sections = findSections(text);
  const section = sections.find(
    (s) => s.projectName === projectName && s.targetName === targetName,
  );

  if (!section) {
    throw new TargetNotFoundError(
      projectName,
      targetName,
      sections.map((s) => `${s.projectName}/${s.targetName}`),
    );
  }

  const lines = new LineIndex(text);
  const { tokens, compilerVersion } = tokenizeSection(text, section, lines);

  return {
    projectName,
    targetName,
    line: section.line,
    compilerVersion,
    records: assembleRecords(tokens),
  };
}

/** Parse the records of one project's target from `.dep` file text. */
export function parseDependencyFile(
  text: string,
  projectName: string,
  targetName: string,
): DependencyRecord[] {
  return [...parseTargetSection(text, projectName, targetName).records];
}
