import { join, normalize } from 'node:path';
import { envVar } from '../config/branding.js';
import { ConfigurationError } from './errors.js';
import { boostHeaderDirCandidates, eigenLayoutCandidates, eigenIncludeRoot, hasBoostHeaders, qt6ConfigDir } from './probe.js';
import { dirExists } from '../utils/fs.js';

export type OverrideCategory = 'qt' | 'boost' | 'eigen';

/**
 * User-supplied roots, validated once at startup. An override replaces all
 * autodetection for its category.
 */
export interface OverrideSet {
  readonly qtRoot: string | null;
  readonly boostRoot: string | null;
  readonly eigenRoot: string | null;
}

export interface OverrideFlags {
  qtRoot?: string;
  boostRoot?: string;
  eigenRoot?: string;
}

export const NO_OVERRIDES: OverrideSet = Object.freeze({
  qtRoot: null,
  boostRoot: null,
  eigenRoot: null,
});

export const OVERRIDE_ENV: Record<OverrideCategory, string> = {
  qt: envVar('QT_ROOT'),
  boost: envVar('BOOST_ROOT'),
  eigen: envVar('EIGEN_ROOT'),
};

function requireDir(flag: string, root: string): void {
  if (!dirExists(root)) {
    throw new ConfigurationError(`--${flag} points to a non-existing directory: ${root}`);
  }
}

export function validateQtRoot(value: string): string {
  const root = normalize(value);
  requireDir('qt-root', root);
  if (!qt6ConfigDir(root)) {
    throw new ConfigurationError(
      `--qt-root does not look like a Qt prefix (missing ${join(root, 'lib', 'cmake', 'Qt6')}).\n` +
        '        Expected something like: C:\\Qt\\6.x.x\\msvc2022_64',
    );
  }
  return root;
}

export function validateBoostRoot(value: string): string {
  const root = normalize(value);
  requireDir('boost-root', root);
  if (!hasBoostHeaders(root)) {
    const tried = boostHeaderDirCandidates(root).join('\n          ');
    throw new ConfigurationError(
      '--boost-root does not appear to contain Boost headers.\n' +
        "        Expected a 'boost' include directory with at least one header file.\n" +
        `        Tried:\n          ${tried}`,
    );
  }
  return root;
}

export function validateEigenRoot(value: string): string {
  const root = normalize(value);
  requireDir('eigen-root', root);
  if (!eigenIncludeRoot(root)) {
    const checked = eigenLayoutCandidates(root)
      .map((dir) => join(dir, 'Eigen', 'Core'))
      .join('\n          ');
    throw new ConfigurationError(
      `--eigen-root does not look like Eigen (cannot find Eigen/Core).\n        Checked:\n          ${checked}`,
    );
  }
  return root;
}

/** Flags take precedence over environment variables; empty values are ignored. */
export function buildOverrideSet(
  flags: OverrideFlags,
  env: NodeJS.ProcessEnv = process.env,
): OverrideSet {
  const pick = (flag: string | undefined, category: OverrideCategory) =>
    flag || env[OVERRIDE_ENV[category]] || null;

  const qt = pick(flags.qtRoot, 'qt');
  const boost = pick(flags.boostRoot, 'boost');
  const eigen = pick(flags.eigenRoot, 'eigen');

  return Object.freeze({
    qtRoot: qt ? validateQtRoot(qt) : null,
    boostRoot: boost ? validateBoostRoot(boost) : null,
    eigenRoot: eigen ? validateEigenRoot(eigen) : null,
  });
}
