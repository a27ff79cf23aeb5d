import { homedir } from 'node:os';
import { join } from 'node:path';

export type OsKind = 'windows' | 'linux' | 'macos';
export type CpuArch = 'x64' | 'arm64' | 'x86';

/** A literal base directory plus a `/`-separated wildcard pattern below it. */
export interface SearchGlob {
  base: string;
  pattern: string;
}

/** OS-conventional places the resolvers look in, in priority order. */
export interface HostLocations {
  systemPrefixes: string[];
  qtInstallGlobs: SearchGlob[];
  qtSystemCmakeDirs: string[];
  linuxIncludeBase: string;
  boostGlobs: SearchGlob[];
  boostSystemPrefixes: string[];
  eigenSystemDirs: string[];
  eigenGlobs: SearchGlob[];
  mocCandidates: string[];
  sdkLibRoots: string[];
  vswherePath: string | null;
  visualStudioBases: string[];
}

export interface PlatformProfile {
  os: OsKind;
  arch: CpuArch;
  pathListSeparator: ';' | ':';
  dynamicLibExt: string;
  archiveExt: string;
  exeSuffix: string;
  /** Variable the dynamic loader searches at run time. */
  runtimeLibraryVar: string;
  /** Extensions of files that exist only for run time (never linked against). */
  runtimeOnlyExts: string[];
  libraryPatterns(base: string): string[];
  locations: HostLocations;
}

const WINDOWS_PROGRAM_FILES = ['C:\\Program Files (x86)', 'C:\\Program Files'];

function windowsLocations(): HostLocations {
  return {
    systemPrefixes: [],
    qtInstallGlobs: [{ base: 'C:\\Qt', pattern: '6.*/msvc*_*' }],
    qtSystemCmakeDirs: [],
    linuxIncludeBase: '',
    boostGlobs: [
      { base: 'C:\\', pattern: 'boost_1_*' },
      { base: 'C:\\local', pattern: 'boost_1_*' },
    ],
    boostSystemPrefixes: [],
    eigenSystemDirs: [],
    eigenGlobs: [
      { base: 'C:\\', pattern: 'eigen-*' },
      { base: 'C:\\', pattern: 'eigen3' },
      { base: 'C:\\local', pattern: 'eigen-*' },
      { base: 'C:\\local', pattern: 'eigen3' },
    ],
    mocCandidates: [],
    sdkLibRoots: WINDOWS_PROGRAM_FILES.flatMap((pf) => [
      `${pf}\\Windows Kits\\10\\Lib`,
      `${pf}\\Windows Kits\\11\\Lib`,
    ]),
    vswherePath: 'C:\\Program Files (x86)\\Microsoft Visual Studio\\Installer\\vswhere.exe',
    visualStudioBases: [
      'C:\\Program Files\\Microsoft Visual Studio',
      'C:\\Program Files (x86)\\Microsoft Visual Studio',
    ],
  };
}

function posixLocations(os: OsKind, home: string): HostLocations {
  const qtKits = os === 'macos' ? ['clang_64', 'macos'] : ['gcc_64'];
  return {
    systemPrefixes:
      os === 'macos' ? ['/usr/local', '/usr', '/opt/homebrew'] : ['/usr/local', '/usr'],
    qtInstallGlobs: qtKits.map((kit) => ({ base: join(home, 'Qt'), pattern: `6.*/${kit}` })),
    qtSystemCmakeDirs:
      os === 'linux'
        ? [
            '/usr/lib/x86_64-linux-gnu/cmake/Qt6',
            '/usr/lib/aarch64-linux-gnu/cmake/Qt6',
            '/usr/lib/cmake/Qt6',
            '/usr/lib64/cmake/Qt6',
            '/usr/lib/qt6/lib/cmake/Qt6',
          ]
        : [],
    linuxIncludeBase: os === 'linux' ? '/usr/include' : '',
    boostGlobs: [],
    boostSystemPrefixes: ['/usr', '/usr/local'],
    eigenSystemDirs:
      os === 'macos'
        ? [
            '/usr/include/eigen3',
            '/usr/local/include/eigen3',
            '/opt/homebrew/include/eigen3',
            '/opt/homebrew/opt/eigen/include/eigen3',
            '/usr/local/opt/eigen/include/eigen3',
          ]
        : ['/usr/include/eigen3', '/usr/local/include/eigen3'],
    eigenGlobs: [],
    mocCandidates:
      os === 'linux'
        ? ['/usr/lib/qt6/libexec/moc', '/usr/lib/x86_64-linux-gnu/qt6/libexec/moc']
        : [],
    sdkLibRoots: [],
    vswherePath: null,
    visualStudioBases: [],
  };
}

export interface ProfileOptions {
  arch?: CpuArch;
  home?: string;
  locations?: Partial<HostLocations>;
}

export function platformProfile(os: OsKind, opts: ProfileOptions = {}): PlatformProfile {
  const arch = opts.arch ?? 'x64';
  const defaults = os === 'windows' ? windowsLocations() : posixLocations(os, opts.home ?? homedir());
  const locations = { ...defaults, ...opts.locations };

  switch (os) {
    case 'windows':
      return {
        os,
        arch,
        pathListSeparator: ';',
        dynamicLibExt: '.dll',
        archiveExt: '.lib',
        exeSuffix: '.exe',
        runtimeLibraryVar: 'PATH',
        runtimeOnlyExts: ['.dll'],
        libraryPatterns: (base) => [`${base}*.lib`, `${base}*.dll`],
        locations,
      };
    case 'macos':
      return {
        os,
        arch,
        pathListSeparator: ':',
        dynamicLibExt: '.dylib',
        archiveExt: '.a',
        exeSuffix: '',
        runtimeLibraryVar: 'DYLD_LIBRARY_PATH',
        runtimeOnlyExts: [],
        libraryPatterns: (base) => [`lib${base}*.dylib`, `lib${base}*.a`],
        locations,
      };
    case 'linux':
      return {
        os,
        arch,
        pathListSeparator: ':',
        dynamicLibExt: '.so',
        archiveExt: '.a',
        exeSuffix: '',
        runtimeLibraryVar: 'LD_LIBRARY_PATH',
        runtimeOnlyExts: [],
        libraryPatterns: (base) => [`lib${base}*.so*`, `lib${base}*.a`],
        locations,
      };
  }
}

function hostOs(): OsKind {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

function hostArch(): CpuArch {
  switch (process.arch) {
    case 'arm64':
      return 'arm64';
    case 'ia32':
      return 'x86';
    default:
      return 'x64';
  }
}

/** Selected once at startup and passed down. */
export function detectPlatform(): PlatformProfile {
  return platformProfile(hostOs(), { arch: hostArch() });
}
