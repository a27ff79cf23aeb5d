import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { ExternalProcessError, ToolNotFoundError, VerificationError } from '../../../src/core/errors.js';
import { parseManifest } from '../../../src/core/manifest.js';
import { dependencyPaths } from '../../../src/core/state.js';
import {
  checkHeader,
  checkLibrary,
  compileCheck,
  systemQtIncludeRoots,
  verifyDependency,
} from '../../../src/core/verifier.js';
import type { DependencySpec } from '../../../src/types/manifest.js';
import { FakeRunner, engineFixture, makeTempDir, mkdirs, stubHost, testProfile, touch } from '../../helpers/fixtures.js';

function dependency(yaml: string): DependencySpec {
  const [dep] = parseManifest(`deps:\n${yaml}`).deps;
  if (!dep) throw new Error('fixture has no dependency');
  return dep;
}

const COIN = dependency(`  - name: coin
    repo: https://example.invalid/coin.git
    verify:
      header: include/Inventor/SoDB.h
      lib_name: [Coin4, Coin]
      compile_check:
        include_lines: ["#include <Inventor/SoDB.h>"]
        code: "int main(){return 0;}"
`);

const compilerHost = stubHost({ which: { 'c++': '/usr/bin/c++' } });

describe('verifier', () => {
  let root: string;
  let install: string;

  beforeEach(() => {
    root = makeTempDir('verifier');
    install = join(root, 'third_party', '_install');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  describe('checkHeader', () => {
    it('accepts a header present under the install root', () => {
      touch(join(install, 'include/Inventor/SoDB.h'));
      expect(() => checkHeader(COIN, install)).not.toThrow();
    });

    it('names the missing path', () => {
      expect(() => checkHeader(COIN, install)).toThrow(
        `Verification failed for coin: header not found: ${join(install, 'include/Inventor/SoDB.h')}`,
      );
    });
  });

  describe('checkLibrary', () => {
    const ctx = () => ({ installRoot: install, platform: testProfile('linux') });

    it('tries candidates in declared order', () => {
      touch(join(install, 'lib/libCoin.so'));
      touch(join(install, 'lib/libCoin4.so'));
      expect(checkLibrary(COIN, ctx())).toBe(join(install, 'lib/libCoin4.so'));
    });

    it('falls back to a later candidate', () => {
      touch(join(install, 'lib/libCoin.so'));
      expect(checkLibrary(COIN, ctx())).toBe(join(install, 'lib/libCoin.so'));
    });

    it('fails when no candidate is installed', () => {
      expect(() => checkLibrary(COIN, ctx())).toThrow(
        `none of the libraries 'Coin4', 'Coin' found under ${join(install, 'lib')}`,
      );
    });

    it('returns null for dependencies without a library', () => {
      const headerOnly = dependency('  - name: eigen\n    kind: check\n');
      expect(checkLibrary(headerOnly, ctx())).toBeNull();
    });
  });

  describe('systemQtIncludeRoots', () => {
    function qtLayout() {
      const base = join(root, 'usr', 'include');
      mkdirs(join(root, 'cmake', 'Qt6'), join(base, 'x86_64-linux-gnu', 'qt6'), join(base, 'qt6'));
      return testProfile('linux', { qtSystemCmakeDirs: [join(root, 'cmake', 'Qt6')], linuxIncludeBase: base });
    }

    it('uses the multiarch triplet when dpkg-architecture answers', () => {
      const platform = qtLayout();
      const host = stubHost({
        which: { 'dpkg-architecture': '/usr/bin/dpkg-architecture' },
        capture: () => 'x86_64-linux-gnu',
      });
      const base = join(root, 'usr', 'include');
      expect(systemQtIncludeRoots({ platform, host })).toEqual([
        join(base, 'x86_64-linux-gnu', 'qt6'),
        join(base, 'qt6'),
      ]);
    });

    it('needs the system Qt 6 CMake package', () => {
      const platform = testProfile('linux', { linuxIncludeBase: join(root, 'usr', 'include') });
      mkdirs(join(root, 'usr', 'include', 'qt6'));
      expect(systemQtIncludeRoots({ platform, host: stubHost() })).toEqual([]);
    });
  });

  describe('compileCheck', () => {
    function installCoin(): string {
      touch(join(install, 'include/Inventor/SoDB.h'));
      return touch(join(install, 'lib/libCoin.so'));
    }

    it('compiles against the install root and runs with the library on the loader path', async () => {
      const lib = installCoin();
      const runner = new FakeRunner();
      const { ctx, layout, reporter } = engineFixture(root, { runner, host: compilerHost });
      const probe = dependencyPaths(layout, 'coin').probeDir;
      const src = join(probe, 'probe.cpp');
      const exe = join(probe, 'probe');
      const libDir = join(install, 'lib');

      await verifyDependency(COIN, ctx);

      expect(runner.calls.map((c) => c.command)).toEqual([
        [
          '/usr/bin/c++',
          '-std=c++17',
          src,
          `-I${join(install, 'include')}`,
          '-L',
          libDir,
          `-Wl,-rpath,${libDir}`,
          '-o',
          exe,
          lib,
        ],
        [exe],
      ]);
      expect(runner.calls[1]?.opts.env).toEqual({ LD_LIBRARY_PATH: libDir });
      expect(reporter.lines).toContain(`[compile-check] linklib:  ${lib}`);
      expect(reporter.lines).toContain(`[compile-check] run:      ${exe}`);
    });

    it('reports a failing probe run as a verification error', async () => {
      const lib = installCoin();
      const runner = new FakeRunner((command) => {
        if (command[0]?.endsWith('probe')) throw new ExternalProcessError(command, 3, 'segfault');
      });
      const { ctx } = engineFixture(root, { runner, host: compilerHost });

      const failure = await compileCheck(COIN, lib, ctx).catch((err: unknown) => err);

      if (!(failure instanceof VerificationError)) throw new Error('expected a VerificationError');
      expect(failure.message).toBe('Verification failed for coin: probe exited with an error (exit code 3)');
      expect(failure.output).toBe('segfault');
    });

    it('does nothing without a compile check', async () => {
      const runner = new FakeRunner();
      const { ctx } = engineFixture(root, { runner });
      await compileCheck(dependency('  - name: eigen\n    kind: check\n'), null, ctx);
      expect(runner.calls).toEqual([]);
    });

    it('needs a compiler', async () => {
      const { ctx } = engineFixture(root);
      await expect(compileCheck(COIN, null, ctx)).rejects.toBeInstanceOf(ToolNotFoundError);
    });

    it('requires Qt frameworks for Qt link libraries on macOS', async () => {
      const soqt = dependency(`  - name: soqt
    kind: check
    verify:
      compile_check:
        link_libs: [Qt6Core]
`);
      const { ctx } = engineFixture(root, { os: 'macos', host: stubHost({ which: { 'clang++': '/usr/bin/clang++' } }) });
      await expect(compileCheck(soqt, null, ctx)).rejects.toThrow('Qt frameworks not found on macOS');
    });
  });
});
