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

// A token is a run of unquoted characters and quoted strings with no
// whitespace between them, so `-DNAME="a b"` stays one token.
const TOKEN_REGEX = /(?:[^\s"']+|"(?:\\.|[^"\\])*"|'(?:\\.|[^'\\])*')+/g;

const QUOTED_PART_REGEX = /"((?:\\.|[^"\\])*)"|'((?:\\.|[^'\\])*)'/g;

/** Remove the quoting from one token. */
export function unquote(token: string): string {
  return token.replace(
    QUOTED_PART_REGEX,
    (_match, doubleQuoted: string | undefined, singleQuoted: string) =>
      doubleQuoted !== undefined
        ? doubleQuoted.replace(/\\"/g, '"')
        : singleQuoted,
  );
}

/**
 * Split a compiler option string the way uVision writes it into the `.dep`
 * file.
 *
 * Backslashes are not escape characters outside of quotes: option strings are
 * full of Windows paths like `-I ..\Core\Inc`. Inside double quotes only `\"`
 * is special.
 *
 * @throws When the string has a quote that is never closed
 */
export function splitCommandLine(options: string): string[] {
  const tokens = options.match(TOKEN_REGEX) ?? [];

  if (options.replace(TOKEN_REGEX, '').trim() !== '') {
    throw new Error(`Unbalanced quote in options: ${options.trim()}`);
  }

  return tokens.map(unquote);
}
