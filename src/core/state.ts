import { readFileSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import type { ProjectLayout } from '../config/settings.js';
import { ensureDir, fileExists } from '../utils/fs.js';

const MARKER_FILE = '.ok';
const FETCHED_TAG_FILE = '.fetched-tag';

export interface DependencyPaths {
  stepDir: string;
  srcDir: string;
  buildDir: string;
  probeDir: string;
  marker: string;
  fetchedTag: string;
}

export function dependencyPaths(layout: ProjectLayout, name: string): DependencyPaths {
  const stepDir = join(layout.buildDir, name);
  return {
    stepDir,
    srcDir: join(stepDir, 'src'),
    buildDir: join(stepDir, 'build'),
    probeDir: join(stepDir, 'probe'),
    marker: join(stepDir, MARKER_FILE),
    fetchedTag: join(stepDir, FETCHED_TAG_FILE),
  };
}

/** Presence is the whole contract; the content is never read. */
export function isVerified(layout: ProjectLayout, name: string): boolean {
  return fileExists(dependencyPaths(layout, name).marker);
}

export function writeMarker(layout: ProjectLayout, name: string): void {
  const paths = dependencyPaths(layout, name);
  ensureDir(paths.stepDir);
  writeFileSync(paths.marker, 'ok', 'utf-8');
}

/** The tag the checkout was last moved to; `''` means the default branch. */
export function readFetchedTag(paths: DependencyPaths): string | null {
  try {
    return readFileSync(paths.fetchedTag, 'utf-8').trim();
  } catch {
    return null;
  }
}

export function writeFetchedTag(paths: DependencyPaths, tag: string | undefined): void {
  ensureDir(paths.stepDir);
  writeFileSync(paths.fetchedTag, tag ?? '', 'utf-8');
}
