import { readFileSync } from 'node:fs';
import { isAbsolute, join, resolve } from 'node:path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { CONFIG_FILE, envVar } from './branding.js';
import { ConfigurationError } from '../core/errors.js';

const SettingsFileSchema = z
  .object({
    third_party_dir: z.string().min(1).optional(),
    install_dir: z.string().min(1).optional(),
    build_dir: z.string().min(1).optional(),
    manifest: z.string().min(1).optional(),
    hints_file: z.string().min(1).optional(),
  })
  .strict();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

/** Where everything lives for one project checkout. */
export interface ProjectLayout {
  root: string;
  thirdPartyDir: string;
  buildDir: string;
  installRoot: string;
  manifestPath: string;
  hintsPath: string;
}

export function loadSettingsFile(root: string): SettingsFile {
  const path = join(root, CONFIG_FILE);
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    return {};
  }
  const result = SettingsFileSchema.safeParse(yaml.load(raw) ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${path}: ${issues}`);
  }
  return result.data;
}

function under(base: string, p: string): string {
  return isAbsolute(p) ? p : resolve(base, p);
}

/** Flag > environment > settings file > default. */
export function resolveLayout(
  root: string,
  env: NodeJS.ProcessEnv = process.env,
): ProjectLayout {
  const absRoot = resolve(root);
  const file = loadSettingsFile(absRoot);

  const thirdPartyDir = under(absRoot, file.third_party_dir ?? 'third_party');
  const installOverride = env[envVar('INSTALL_DIR')];

  return {
    root: absRoot,
    thirdPartyDir,
    buildDir: under(thirdPartyDir, file.build_dir ?? '_build'),
    installRoot: installOverride
      ? under(absRoot, installOverride)
      : under(thirdPartyDir, file.install_dir ?? '_install'),
    manifestPath: under(thirdPartyDir, file.manifest ?? 'deps.yaml'),
    hintsPath: under(absRoot, file.hints_file ?? join('cmake', 'LocalDepsHints.cmake')),
  };
}
