import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import {
  buildProbeCommand,
  collectSearchDirs,
  looksLikeQtProbe,
  probeDefines,
  probeEnvironment,
  probeSource,
  qtFrameworkName,
} from '../../../src/core/compile-check.js';
import type { CompileCheck } from '../../../src/types/manifest.js';
import { makeTempDir, mkdirs, testProfile } from '../../helpers/fixtures.js';

function check(partial: Partial<CompileCheck> = {}): CompileCheck {
  return { include_lines: [], code: 'int main(){return 0;}', defines: [], link_libs: [], ...partial };
}

describe('compile-check', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('compile-check');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('probe source', () => {
    it('joins include lines before the body', () => {
      const src = probeSource(check({ include_lines: ['#include <a.h>', '#include <b.h>'], code: 'int main(){}' }));
      expect(src).toBe('#include <a.h>\n#include <b.h>\nint main(){}');
    });

    it('strips Windows-only import macros elsewhere', () => {
      const c = check({ defines: ['SOQT_DLL', 'HAVE_GL', 'COIN_DLL'] });
      expect(probeDefines(c, testProfile('linux'))).toEqual(['HAVE_GL']);
      expect(probeDefines(c, testProfile('windows'))).toEqual(['SOQT_DLL', 'HAVE_GL', 'COIN_DLL']);
    });
  });

  describe('buildProbeCommand', () => {
    it('assembles a GCC command with rpaths for every runtime directory', () => {
      const install = join(root, 'install');
      const qt = join(root, 'qt');
      const eigen = join(root, 'eigen');
      mkdirs(join(install, 'include'), join(install, 'lib'), join(qt, 'include', 'QtCore'), join(qt, 'lib'), eigen);

      const search = collectSearchDirs([install, qt], {
        platform: testProfile('linux'),
        msvc: false,
        eigenIncludeRoot: eigen,
        systemQtIncludeRoots: [],
      });
      const src = join(root, 'probe.cpp');
      const exe = join(root, 'probe');
      const linkLib = join(install, 'lib', 'libCoin.so');
      const extra = join(qt, 'lib', 'libQt6Core.so');

      const { command, runtimeLibDirs } = buildProbeCommand({
        compiler: { id: 'g++', path: '/usr/bin/g++' },
        sourcePath: src,
        exePath: exe,
        defines: ['HAVE_GL'],
        installRoot: install,
        prefixes: [install, qt],
        search,
        linkLib,
        extraLibPaths: [extra],
        frameworks: [],
        frameworkDirs: [],
      });

      expect(runtimeLibDirs).toEqual([join(install, 'lib'), join(qt, 'lib')]);
      expect(command).toEqual([
        '/usr/bin/g++',
        '-std=c++17',
        '-DHAVE_GL',
        src,
        `-I${join(install, 'include')}`,
        `-I${eigen}`,
        `-I${join(qt, 'include')}`,
        `-I${join(qt, 'include', 'QtCore')}`,
        '-L',
        join(install, 'lib'),
        '-L',
        join(qt, 'lib'),
        `-Wl,-rpath,${join(install, 'lib')}`,
        `-Wl,-rpath,${join(qt, 'lib')}`,
        '-o',
        exe,
        linkLib,
        extra,
      ]);
    });

    it('puts every library path after /link for MSVC', () => {
      const { command, runtimeLibDirs } = buildProbeCommand({
        compiler: { id: 'cl', path: 'C:\\VS\\cl.exe' },
        sourcePath: 'C:\\p\\probe.cpp',
        exePath: 'C:\\p\\probe.exe',
        defines: ['COIN_DLL'],
        installRoot: join(root, 'not-installed'),
        prefixes: [],
        search: { includes: ['C:\\inc'], libPaths: ['C:\\lib'], frameworkRoots: [] },
        linkLib: 'C:\\deps\\lib\\Coin4.lib',
        extraLibPaths: ['C:\\Qt\\lib\\Qt6Core.lib'],
        frameworks: [],
        frameworkDirs: [],
      });
      expect(runtimeLibDirs).toEqual([]);
      expect(command).toEqual([
        'C:\\VS\\cl.exe',
        '/nologo',
        '/EHsc',
        '/std:c++17',
        '/Zc:__cplusplus',
        '/permissive-',
        '/DCOIN_DLL',
        '/IC:\\inc',
        'C:\\p\\probe.cpp',
        '/link',
        '/LIBPATH:C:\\lib',
        '/MACHINE:X64',
        'C:\\deps\\lib\\Coin4.lib',
        'C:\\Qt\\lib\\Qt6Core.lib',
        '/OUT:C:\\p\\probe.exe',
      ]);
    });

    it('links Qt frameworks on macOS', () => {
      const qt = join(root, 'qt');
      const lib = join(qt, 'lib');
      mkdirs(join(lib, 'QtCore.framework', 'Headers'));

      const search = collectSearchDirs([qt], {
        platform: testProfile('macos'),
        msvc: false,
        eigenIncludeRoot: null,
        systemQtIncludeRoots: [],
      });
      expect(search).toEqual({
        includes: [join(lib, 'QtCore.framework', 'Headers')],
        libPaths: [lib],
        frameworkRoots: [lib],
      });

      const { command } = buildProbeCommand({
        compiler: { id: 'clang++', path: '/usr/bin/clang++' },
        sourcePath: 'probe.cpp',
        exePath: 'probe',
        defines: [],
        installRoot: join(root, 'not-installed'),
        prefixes: [qt],
        search,
        linkLib: null,
        extraLibPaths: [],
        frameworks: [qtFrameworkName('Qt6Core') ?? ''],
        frameworkDirs: [lib],
      });
      expect(command).toEqual([
        '/usr/bin/clang++',
        '-std=c++17',
        'probe.cpp',
        `-I${join(lib, 'QtCore.framework', 'Headers')}`,
        '-L',
        lib,
        `-F${lib}`,
        '-framework',
        'QtCore',
        `-Wl,-rpath,${lib}`,
        '-o',
        'probe',
      ]);
    });

    it('adds system Qt include roots with their module directories', () => {
      const sys = join(root, 'usr', 'include', 'qt6');
      mkdirs(join(sys, 'QtWidgets'));
      const search = collectSearchDirs([], {
        platform: testProfile('linux'),
        msvc: false,
        eigenIncludeRoot: null,
        systemQtIncludeRoots: [sys],
      });
      expect(search.includes).toEqual([sys, join(sys, 'QtWidgets')]);
    });
  });

  describe('qt detection', () => {
    it('maps Qt 6 module names to framework names', () => {
      expect(qtFrameworkName('Qt6OpenGLWidgets')).toBe('QtOpenGLWidgets');
      expect(qtFrameworkName('GL')).toBeNull();
    });

    it('recognises Qt programs by includes, code, or libraries', () => {
      expect(looksLikeQtProbe(check({ include_lines: ['#include <QtWidgets/QApplication>'] }), null)).toBe(true);
      expect(looksLikeQtProbe(check({ link_libs: ['Qt6Gui'] }), null)).toBe(true);
      expect(looksLikeQtProbe(check(), '/x/lib/libSoQt.so')).toBe(true);
      expect(looksLikeQtProbe(check(), '/x/lib/libCoin.so')).toBe(false);
    });
  });

  describe('probeEnvironment', () => {
    it('prepends runtime directories and forces a headless Qt platform on Linux', () => {
      const qt = join(root, 'qt');
      mkdirs(join(qt, 'plugins', 'platforms'));
      const env = probeEnvironment({
        platform: testProfile('linux'),
        baseEnv: { LD_LIBRARY_PATH: '/old' },
        runtimeLibDirs: ['/a', '/b'],
        binDirs: [],
        qtProbe: true,
        prefixes: [join(root, 'install'), qt],
      });
      expect(env).toEqual({
        LD_LIBRARY_PATH: '/a:/b:/old',
        QT_QPA_PLATFORM: 'offscreen',
        QT_PLUGIN_PATH: join(qt, 'plugins'),
        QT_QPA_PLATFORM_PLUGIN_PATH: join(qt, 'plugins', 'platforms'),
      });
    });

    it('leaves the Qt platform alone when a display exists or one is chosen', () => {
      const base = { platform: testProfile('linux'), runtimeLibDirs: [], binDirs: [], qtProbe: true, prefixes: [] };
      expect(probeEnvironment({ ...base, baseEnv: { DISPLAY: ':0' } }).QT_QPA_PLATFORM).toBeUndefined();
      expect(probeEnvironment({ ...base, baseEnv: { QT_QPA_PLATFORM: 'xcb' } }).QT_QPA_PLATFORM).toBe('xcb');
    });

    it('uses DYLD_LIBRARY_PATH on macOS', () => {
      const env = probeEnvironment({
        platform: testProfile('macos'),
        baseEnv: {},
        runtimeLibDirs: ['/deps/lib'],
        binDirs: [],
        qtProbe: true,
        prefixes: [],
      });
      expect(env).toEqual({ DYLD_LIBRARY_PATH: '/deps/lib' });
    });

    it('puts DLL directories on PATH on Windows', () => {
      const env = probeEnvironment({
        platform: testProfile('windows'),
        baseEnv: { Path: 'C:\\Windows' },
        runtimeLibDirs: [],
        binDirs: ['C:\\deps\\bin', 'C:\\Qt\\bin'],
        qtProbe: false,
        prefixes: [],
      });
      expect(env).toEqual({ Path: 'C:\\deps\\bin;C:\\Qt\\bin;C:\\Windows' });
    });
  });
});
