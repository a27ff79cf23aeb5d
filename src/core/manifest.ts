import { readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { ManifestSchema } from '../config/schema.js';
import type { DependencySpec, Manifest } from '../types/manifest.js';
import { ConfigurationError } from './errors.js';
import { fileExists } from '../utils/fs.js';

export function parseManifest(raw: string, source = 'manifest'): Manifest {
  let data: unknown;
  try {
    data = yaml.load(raw);
  } catch (err) {
    throw new ConfigurationError(`Cannot parse ${source}: ${err instanceof Error ? err.message : String(err)}`);
  }
  const result = ManifestSchema.safeParse(data ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${source}: ${issues}`);
  }
  return result.data;
}

export function loadManifest(path: string): Manifest {
  if (!fileExists(path)) {
    throw new ConfigurationError(`Manifest not found at ${path}`);
  }
  return parseManifest(readFileSync(path, 'utf-8'), path);
}

export function libNameCandidates(dep: DependencySpec): string[] {
  const spec = dep.verify.lib_name;
  if (spec === undefined) return [];
  return typeof spec === 'string' ? [spec] : [...spec];
}
