import { readFileSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import Handlebars from 'handlebars';
import type { ResolveContext } from './context.js';
import { qt6ConfigDir } from './probe.js';
import { resolveBoostRoot, resolveMathHeaderIncludeRoot, resolvePrefixes } from './prefixes.js';
import { APP_NAME } from '../config/branding.js';
import { ensureDir, fileExists } from '../utils/fs.js';
import { dedupe, toCMakePath } from '../utils/paths.js';

/** What the downstream CMake configure step is told. Always fully regenerated. */
export interface HintsDocument {
  prefixes: string[];
  qt6Dir: string | null;
  eigenIncludeDir: string | null;
  boostRoot: string | null;
}

export function buildHints(ctx: ResolveContext): HintsDocument {
  const prefixes = dedupe(resolvePrefixes(ctx).map(toCMakePath));
  const qtConfig = prefixes.map(qt6ConfigDir).find((dir): dir is string => dir !== null);
  const eigen = resolveMathHeaderIncludeRoot(ctx);
  const boost = resolveBoostRoot(ctx);
  return {
    prefixes,
    qt6Dir: qtConfig ? toCMakePath(qtConfig) : null,
    eigenIncludeDir: eigen ? toCMakePath(eigen) : null,
    boostRoot: boost ? toCMakePath(boost) : null,
  };
}

interface CacheEntry {
  name: string;
  value: string;
}

const HINTS_TEMPLATE = Handlebars.compile<{ app: string; entries: CacheEntry[] }>(
  [
    '# Auto-generated by {{app}}',
    '# Do not edit by hand; this file may be regenerated.',
    '',
    '{{#each entries}}',
    'set({{name}} "{{value}}" CACHE PATH "" FORCE)',
    '{{/each}}',
    '',
  ].join('\n'),
  { noEscape: true },
);

export function renderHints(doc: HintsDocument): string {
  const entries: CacheEntry[] = [];
  if (doc.prefixes.length > 0) entries.push({ name: 'CMAKE_PREFIX_PATH', value: doc.prefixes.join(';') });
  if (doc.qt6Dir) entries.push({ name: 'Qt6_DIR', value: doc.qt6Dir });
  if (doc.eigenIncludeDir) entries.push({ name: 'EIGEN3_INCLUDE_DIR', value: doc.eigenIncludeDir });
  if (doc.boostRoot) entries.push({ name: 'BOOST_ROOT', value: doc.boostRoot });
  return HINTS_TEMPLATE({ app: APP_NAME, entries });
}

export function writeHints(path: string, doc: HintsDocument): void {
  ensureDir(dirname(path));
  writeFileSync(path, renderHints(doc), 'utf-8');
}

export function refreshHints(ctx: ResolveContext, path: string): HintsDocument {
  const doc = buildHints(ctx);
  writeHints(path, doc);
  return doc;
}

const SET_LINE = /^set\(\s*(\w+)\s+"([^"]*)"/;

/** Reads back a generated file; unknown lines are ignored. */
export function parseHints(text: string): HintsDocument {
  const doc: HintsDocument = { prefixes: [], qt6Dir: null, eigenIncludeDir: null, boostRoot: null };
  for (const line of text.split(/\r?\n/)) {
    const match = SET_LINE.exec(line.trim());
    if (!match) continue;
    const [, name, value] = match;
    switch (name) {
      case 'CMAKE_PREFIX_PATH':
        doc.prefixes = value.split(';').filter(Boolean);
        break;
      case 'Qt6_DIR':
        doc.qt6Dir = value;
        break;
      case 'EIGEN3_INCLUDE_DIR':
        doc.eigenIncludeDir = value;
        break;
      case 'BOOST_ROOT':
        doc.boostRoot = value;
        break;
    }
  }
  return doc;
}

export function readHints(path: string): HintsDocument | null {
  if (!fileExists(path)) return null;
  return parseHints(readFileSync(path, 'utf-8'));
}
