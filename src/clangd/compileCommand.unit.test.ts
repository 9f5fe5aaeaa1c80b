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

import * as assert from 'assert';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';

import type { DependencyRecord } from '../depfile/types';
import {
  buildArguments,
  CompilationDatabase,
  defineFlag,
  joinCommand,
  quoteArgument,
  serializeCompileCommands,
  synthesizeCompileCommands,
  type Toolchain,
} from './compileCommand';

const ROOT = '/work/blinky/MDK-ARM';

const TOOLCHAIN: Toolchain = {
  compiler: '/opt/armclang/bin/armclang',
  includeDirs: ['/opt/armclang/include'],
};

const MAIN_RECORD: DependencyRecord = {
  sourcePath: '../Core/Src/main.c',
  includeDirs: ['../Core/Inc', './RTE/_Debug'],
  defines: [{ name: 'STM32F407xx' }, { name: 'HSE_VALUE', value: '8000000' }],
  extraFlags: ['-xc', '-std=c99', '-mcpu=cortex-m4'],
};

const GPIO_RECORD: DependencyRecord = {
  sourcePath: '..\\Core\\Src\\gpio.c',
  includeDirs: [],
  defines: [],
  extraFlags: ['-O1'],
};

suite('defineFlag', () => {
  test('omits = for a define without a value', () => {
    assert.strictEqual(defineFlag({ name: 'FOO' }), '-DFOO');
  });

  test('keeps a value, even an empty one', () => {
    assert.strictEqual(defineFlag({ name: 'FOO', value: '1' }), '-DFOO=1');
    assert.strictEqual(defineFlag({ name: 'FOO', value: '' }), '-DFOO=');
  });
});

suite('buildArguments', () => {
  test('orders compiler, includes, defines, flags, then the source', () => {
    assert.deepStrictEqual(buildArguments(MAIN_RECORD, ROOT, TOOLCHAIN), [
      '/opt/armclang/bin/armclang',
      '-I/work/blinky/Core/Inc',
      '-I/work/blinky/MDK-ARM/RTE/_Debug',
      '-I/opt/armclang/include',
      '-DSTM32F407xx',
      '-DHSE_VALUE=8000000',
      '-xc',
      '-std=c99',
      '-mcpu=cortex-m4',
      '/work/blinky/Core/Src/main.c',
    ]);
  });

  test('works without toolchain include directories', () => {
    assert.deepStrictEqual(
      buildArguments(GPIO_RECORD, ROOT, { compiler: 'armclang', includeDirs: [] }),
      ['armclang', '-O1', '/work/blinky/Core/Src/gpio.c'],
    );
  });
});

suite('synthesizeCompileCommands', () => {
  test('emits one entry per record in record order', () => {
    const entries = synthesizeCompileCommands(
      [GPIO_RECORD, MAIN_RECORD],
      ROOT,
      TOOLCHAIN,
    );

    assert.deepStrictEqual(
      entries.map((e) => [e.directory, e.file]),
      [
        [ROOT, '/work/blinky/Core/Src/gpio.c'],
        [ROOT, '/work/blinky/Core/Src/main.c'],
      ],
    );
  });

  test('returns nothing for no records', () => {
    assert.deepStrictEqual(synthesizeCompileCommands([], ROOT, TOOLCHAIN), []);
  });

  test('does not modify the records', () => {
    const records = [MAIN_RECORD, GPIO_RECORD].map((r) =>
      Object.freeze({
        ...r,
        includeDirs: Object.freeze([...r.includeDirs]),
        defines: Object.freeze([...r.defines]),
        extraFlags: Object.freeze([...r.extraFlags]),
      }),
    );

    synthesizeCompileCommands(records, ROOT, TOOLCHAIN);
    assert.deepStrictEqual(records, [MAIN_RECORD, GPIO_RECORD]);
  });

  test('uses forward slashes under a Windows root', () => {
    const [entry] = synthesizeCompileCommands(
      [GPIO_RECORD],
      'C:\\Proj\\MDK-ARM',
      { compiler: 'C:\\Keil_v5\\ARM\\ARMCLANG\\bin\\armclang.exe', includeDirs: [] },
    );

    assert.deepStrictEqual(entry, {
      directory: 'C:/Proj/MDK-ARM',
      file: 'C:/Proj/Core/Src/gpio.c',
      arguments: [
        'C:\\Keil_v5\\ARM\\ARMCLANG\\bin\\armclang.exe',
        '-O1',
        'C:/Proj/Core/Src/gpio.c',
      ],
    });
  });
});

suite('quoteArgument', () => {
  test('leaves plain arguments alone', () => {
    assert.strictEqual(quoteArgument('-DFOO=1'), '-DFOO=1');
    assert.strictEqual(quoteArgument('C:/Proj/a.c'), 'C:/Proj/a.c');
  });

  test('quotes whitespace, quotes and backslashes', () => {
    assert.strictEqual(quoteArgument('-DMSG=a b'), '"-DMSG=a b"');
    assert.strictEqual(quoteArgument('-DQ="x"'), '"-DQ=\\"x\\""');
    assert.strictEqual(quoteArgument('C:\\Keil'), '"C:\\\\Keil"');
    assert.strictEqual(quoteArgument(''), '""');
  });

  test('joinCommand quotes each argument', () => {
    assert.strictEqual(
      joinCommand(['cc', '-DMSG=a b', '/p/a.c']),
      'cc "-DMSG=a b" /p/a.c',
    );
  });
});

suite('serializeCompileCommands', () => {
  const ENTRY = {
    directory: '/p',
    file: '/p/a.c',
    arguments: ['cc', '-DX', '/p/a.c'],
  };

  test('writes the arguments form by default', () => {
    assert.strictEqual(
      serializeCompileCommands([ENTRY]),
      [
        '[',
        '  {',
        '    "directory": "/p",',
        '    "file": "/p/a.c",',
        '    "arguments": [',
        '      "cc",',
        '      "-DX",',
        '      "/p/a.c"',
        '    ]',
        '  }',
        ']',
      ].join('\n'),
    );
  });

  test('writes the command form on request', () => {
    const data: unknown = JSON.parse(
      serializeCompileCommands(
        [{ ...ENTRY, arguments: ['cc', '-DMSG=a b', '-DQ="x"', '/p/a.c'] }],
        'command',
      ),
    );

    assert.deepStrictEqual(data, [
      {
        directory: '/p',
        file: '/p/a.c',
        command: 'cc "-DMSG=a b" "-DQ=\\"x\\"" /p/a.c',
      },
    ]);
  });

  test('writes an empty array for no entries', () => {
    assert.strictEqual(serializeCompileCommands([]), '[]');
  });
});

suite('CompilationDatabase', () => {
  const TEST_DIR = path.join(os.tmpdir(), '__mdk_compdb_database_test');

  teardown(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  test('fromRecords adds one entry per record', () => {
    const compDb = CompilationDatabase.fromRecords(
      [MAIN_RECORD, GPIO_RECORD],
      ROOT,
      TOOLCHAIN,
    );
    assert.strictEqual(compDb.size, 2);
    assert.strictEqual(compDb.db[1].file, '/work/blinky/Core/Src/gpio.c');
  });

  test('serializes the same records identically', () => {
    const a = CompilationDatabase.fromRecords([MAIN_RECORD], ROOT, TOOLCHAIN);
    const b = CompilationDatabase.fromRecords([MAIN_RECORD], ROOT, TOOLCHAIN);
    assert.strictEqual(a.serialize(), b.serialize());
    assert.strictEqual(a.serialize('command'), b.serialize('command'));
  });

  test('write creates missing directories and replaces the file', async () => {
    const filePath = path.join(TEST_DIR, 'nested', 'compile_commands.json');
    const compDb = CompilationDatabase.fromRecords([GPIO_RECORD], ROOT, TOOLCHAIN);

    await compDb.write(filePath);
    await new CompilationDatabase().write(filePath);

    assert.strictEqual(fs.readFileSync(filePath, 'utf-8'), '[]');

    await compDb.write(filePath, 'command');
    assert.strictEqual(
      fs.readFileSync(filePath, 'utf-8'),
      compDb.serialize('command'),
    );
  });
});
