import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { existsSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { effectiveProjectPath, hintsQtBin, runDoctor, type DoctorCheck } from '../../../src/core/doctor.js';
import { writeHints } from '../../../src/core/hints.js';
import { parseManifest } from '../../../src/core/manifest.js';
import { writeMarker } from '../../../src/core/state.js';
import { engineFixture, makeTempDir, mkdirs, stubHost } from '../../helpers/fixtures.js';

const MANIFEST = parseManifest(`deps:
  - name: coin
    repo: https://example.invalid/coin.git
  - name: soqt
    repo: https://example.invalid/soqt.git
`);

const host = stubHost({
  which: { git: '/usr/bin/git' },
  capture: (cmd, args) => (cmd === 'git' && args[0] === '--version' ? 'git version 2.43.0\nextra' : null),
});

function find(checks: DoctorCheck[], label: string): DoctorCheck | undefined {
  return checks.find((c) => c.label === label);
}

describe('runDoctor', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('doctor');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('reports tools, compiler and project state', () => {
    const { ctx, layout } = engineFixture(root, { host });

    const checks = runDoctor(ctx, null, 'v20.11.0');

    expect(find(checks, 'Node.js')?.detail).toBe('v20.11.0');
    expect(find(checks, 'git')).toMatchObject({ status: 'ok', detail: 'git version 2.43.0' });
    expect(find(checks, 'cmake')).toMatchObject({ status: 'fail', detail: 'not found on PATH' });
    expect(find(checks, 'C++')?.status).toBe('fail');
    expect(find(checks, 'Qt 6')?.status).toBe('warn');
    expect(find(checks, '#1')?.detail).toBe(layout.installRoot);
    expect(find(checks, 'Manifest')?.status).toBe('warn');
  });

  it('leaves a missing install root alone', () => {
    const { ctx, layout } = engineFixture(root, { host });

    const checks = runDoctor(ctx, null, 'v20.11.0');

    expect(find(checks, 'Install root')).toMatchObject({
      status: 'info',
      detail: `${layout.installRoot} (not created yet)`,
    });
    expect(existsSync(layout.installRoot)).toBe(false);
  });

  it('shows the marker state of each dependency', () => {
    const { ctx, layout } = engineFixture(root, { host });
    writeMarker(layout, 'coin');

    const checks = runDoctor(ctx, MANIFEST, 'v20.11.0').filter((c) => c.section === 'Dependencies');

    expect(checks.map((c) => [c.label, c.status, c.detail])).toEqual([
      ['coin', 'ok', 'verified (.ok present)'],
      ['soqt', 'warn', 'not built yet'],
    ]);
  });

  it('does not ask pkg-config about verified dependencies', () => {
    const asked: string[] = [];
    const pkgHost = stubHost({
      which: { 'pkg-config': '/usr/bin/pkg-config' },
      succeeds: (_cmd, args) => {
        asked.push(args.join(' '));
        return true;
      },
    });
    const manifest = parseManifest(`deps:
  - name: simage
    repo: https://example.invalid/simage.git
    system_package:
      platforms: [linux]
      pkg_config: [simage]
`);
    const { ctx, layout } = engineFixture(root, { host: pkgHost });
    writeMarker(layout, 'simage');

    const checks = runDoctor(ctx, manifest, 'v20.11.0');

    expect(find(checks, 'simage')?.detail).toBe('verified (.ok present)');
    expect(asked).toEqual([]);
  });

  it('reports the Qt bin directory named by the hints file', () => {
    const qt = join(root, 'qt');
    mkdirs(join(qt, 'lib', 'cmake', 'Qt6'), join(qt, 'bin'));
    const { ctx, layout } = engineFixture(root, { host });
    writeHints(layout.hintsPath, {
      prefixes: [layout.installRoot, qt],
      qt6Dir: join(qt, 'lib', 'cmake', 'Qt6'),
      eigenIncludeDir: null,
      boostRoot: null,
    });

    const checks = runDoctor(ctx, null, 'v20.11.0');

    expect(hintsQtBin(layout.hintsPath)).toBe(join(qt, 'bin'));
    expect(find(checks, 'Qt bin (hints)')).toMatchObject({ status: 'ok', detail: join(qt, 'bin') });
    expect(find(checks, 'moc')).toBeUndefined();
  });

  it('finds the Qt bin through the listed prefixes when Qt6_DIR is absent', () => {
    const qt = join(root, 'qt');
    mkdirs(join(qt, 'lib', 'cmake', 'Qt6'), join(qt, 'bin'));
    const hintsPath = join(root, 'hints.cmake');
    writeHints(hintsPath, { prefixes: [join(root, 'other'), qt], qt6Dir: null, eigenIncludeDir: null, boostRoot: null });

    expect(hintsQtBin(hintsPath)).toBe(join(qt, 'bin'));
    expect(hintsQtBin(join(root, 'missing.cmake'))).toBeNull();
  });

  it('measures the global PATH and the effective project PATH', () => {
    const qt = join(root, 'qt');
    mkdirs(join(qt, 'bin'));
    const { ctx, layout } = engineFixture(root, {
      host,
      env: { PATH: 'x'.repeat(9000) },
      overrides: Object.freeze({ qtRoot: qt, boostRoot: null, eigenRoot: null }),
    });
    mkdirs(join(layout.installRoot, 'bin'));
    const effective = ['/usr/bin', '/bin', join(layout.installRoot, 'bin'), join(qt, 'bin')].join(':');

    expect(effectiveProjectPath(ctx)).toBe(effective);
    const checks = runDoctor(ctx, null, 'v20.11.0');
    expect(find(checks, 'Global PATH length')).toMatchObject({ status: 'info', detail: '9000 characters' });
    expect(find(checks, 'Effective PATH length')).toMatchObject({
      status: 'ok',
      detail: `${effective.length} characters`,
    });
  });
});
