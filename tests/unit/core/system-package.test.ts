import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { rmSync } from 'node:fs';
import { join } from 'node:path';
import { describeSystemPackage, detectSystemPackage } from '../../../src/core/system-package.js';
import type { SystemPackage } from '../../../src/types/manifest.js';
import { makeTempDir, stubHost, testProfile, touch } from '../../helpers/fixtures.js';

describe('detectSystemPackage', () => {
  let root: string;

  beforeEach(() => {
    root = makeTempDir('syspkg');
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  const withPkgConfig = stubHost({
    which: { 'pkg-config': '/usr/bin/pkg-config' },
    succeeds: (_cmd, args) => args[1] === 'simage',
  });

  function pkg(overrides: Partial<SystemPackage> = {}): SystemPackage {
    return { platforms: ['linux'], pkg_config: ['simage'], headers: [], ...overrides };
  }

  it('ignores platforms the package is not declared for', () => {
    expect(detectSystemPackage(pkg(), { platform: testProfile('macos'), host: withPkgConfig })).toBeNull();
    expect(detectSystemPackage(undefined, { platform: testProfile('linux'), host: withPkgConfig })).toBeNull();
  });

  it('accepts a pkg-config module without a version', () => {
    const found = detectSystemPackage(pkg(), { platform: testProfile('linux'), host: withPkgConfig });
    expect(found).toEqual({ source: 'simage', via: 'pkg-config', version: null });
    expect(found && describeSystemPackage(found)).toBe('pkg-config simage');
  });

  it('falls back to the declared headers', () => {
    const header = touch(join(root, 'include', 'simage.h'));
    const found = detectSystemPackage(pkg({ pkg_config: ['other'], headers: [join(root, 'missing.h'), header] }), {
      platform: testProfile('linux'),
      host: withPkgConfig,
    });
    expect(found).toEqual({ source: header, via: 'header', version: null });
    expect(found && describeSystemPackage(found)).toBe(`system headers (${header})`);
  });

  it('finds nothing when neither pkg-config nor headers answer', () => {
    expect(
      detectSystemPackage(pkg({ headers: [join(root, 'missing.h')] }), { platform: testProfile('linux'), host: stubHost() }),
    ).toBeNull();
  });
});
