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

import { loggerWithPassthrough, nullLogger } from '../logging';
import {
  compileCommandsPath,
  depFileName,
  findDepFile,
  isWindowsPath,
  normalizeRoot,
  resolveFrom,
} from './paths';

suite('isWindowsPath', () => {
  test('recognises drive letters and UNC paths', () => {
    assert.ok(isWindowsPath('C:\\Keil_v5\\ARM'));
    assert.ok(isWindowsPath('d:/work'));
    assert.ok(isWindowsPath('\\\\server\\share'));
  });

  test('rejects POSIX and relative paths', () => {
    assert.ok(!isWindowsPath('/opt/arm'));
    assert.ok(!isWindowsPath('..\\Core\\Inc'));
    assert.ok(!isWindowsPath('C:'));
  });
});

suite('resolveFrom', () => {
  test('resolves relative paths against a POSIX root', () => {
    assert.strictEqual(
      resolveFrom('/work/blinky/MDK-ARM', '../Core/Inc'),
      '/work/blinky/Core/Inc',
    );
    assert.strictEqual(
      resolveFrom('/work/blinky/MDK-ARM', './RTE/_Debug'),
      '/work/blinky/MDK-ARM/RTE/_Debug',
    );
  });

  test('treats backslashes as separators under a POSIX root', () => {
    assert.strictEqual(
      resolveFrom('/work/blinky/MDK-ARM', '..\\Core\\Src\\gpio.c'),
      '/work/blinky/Core/Src/gpio.c',
    );
  });

  test('keeps absolute paths', () => {
    assert.strictEqual(resolveFrom('/work', '/opt/arm/include'), '/opt/arm/include');
    assert.strictEqual(resolveFrom('/work', 'C:\\Keil\\inc'), 'C:/Keil/inc');
  });

  test('uses Windows rules under a Windows root', () => {
    assert.strictEqual(
      resolveFrom('C:\\Proj\\MDK-ARM', '..\\Core\\Src\\main.c'),
      'C:/Proj/Core/Src/main.c',
    );
    assert.strictEqual(normalizeRoot('C:\\Proj\\MDK-ARM\\'), 'C:/Proj/MDK-ARM');
  });

  test('normalizes a POSIX root', () => {
    assert.strictEqual(normalizeRoot('/work/blinky/./MDK-ARM/'), '/work/blinky/MDK-ARM');
  });
});

test('depFileName joins project and target', () => {
  assert.strictEqual(depFileName('Blinky', 'Debug'), 'Blinky_Debug.dep');
});

test('compileCommandsPath defaults to the build directory', () => {
  assert.strictEqual(
    compileCommandsPath('/work/proj'),
    path.resolve('/work/proj', 'build', 'compile_commands.json'),
  );
  assert.strictEqual(
    compileCommandsPath('/work/proj', 'out/clangd'),
    path.resolve('/work/proj', 'out/clangd', 'compile_commands.json'),
  );
});

suite('findDepFile', () => {
  const TEST_DIR = path.join(os.tmpdir(), '__mdk_compdb_find_dep_test');

  function touch(relativePath: string) {
    const fullPath = path.join(TEST_DIR, relativePath);
    fs.mkdirSync(path.dirname(fullPath), { recursive: true });
    fs.writeFileSync(fullPath, '');
  }

  setup(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
    fs.mkdirSync(TEST_DIR, { recursive: true });
  });

  teardown(() => {
    fs.rmSync(TEST_DIR, { recursive: true, force: true });
  });

  test('prefers the file named after the target', async () => {
    touch('Objects/aaa.dep');
    touch('Objects/Blinky_Debug.dep');

    assert.strictEqual(
      await findDepFile(TEST_DIR, 'Blinky', 'Debug'),
      path.join(TEST_DIR, 'Objects', 'Blinky_Debug.dep'),
    );
  });

  test('escapes glob characters in the target name', async () => {
    touch('Objects/Blinky_Debug [F4].dep');
    touch('Objects/Blinky_Debug F.dep');

    assert.strictEqual(
      await findDepFile(TEST_DIR, 'Blinky', 'Debug [F4]'),
      path.join(TEST_DIR, 'Objects', 'Blinky_Debug [F4].dep'),
    );
  });

  test('falls back to the first .dep file in sorted order', async () => {
    touch('b/second.dep');
    touch('a.dep');
    const logger = loggerWithPassthrough(nullLogger);

    assert.strictEqual(
      await findDepFile(TEST_DIR, 'Blinky', 'Debug', logger),
      path.join(TEST_DIR, 'a.dep'),
    );
    assert.strictEqual(logger.logs.length, 1);
    assert.strictEqual(logger.logs[0].level, 'warn');
  });

  test('returns undefined when there is no .dep file', async () => {
    touch('Objects/main.o');
    assert.strictEqual(await findDepFile(TEST_DIR, 'Blinky', 'Debug'), undefined);
  });
});
