export interface EnvEntry {
  key: string;
  value: string;
}

/**
 * Parses `KEY=VALUE` lines as printed by `set`/`env`. Lines without `=` are
 * skipped; only the first `=` splits, so values may contain `=`.
 */
export function parseEnvDump(content: string): EnvEntry[] {
  const entries: EnvEntry[] = [];
  for (const line of content.split(/\r?\n/)) {
    const eqIndex = line.indexOf('=');
    if (eqIndex <= 0) continue;
    entries.push({
      key: line.slice(0, eqIndex).trim(),
      value: line.slice(eqIndex + 1),
    });
  }
  return entries;
}

/** The key actually holding `name`; Windows environments are case-insensitive. */
export function envKey(env: NodeJS.ProcessEnv, name: string, caseInsensitive: boolean): string {
  if (!caseInsensitive || name in env) return name;
  const upper = name.toUpperCase();
  return Object.keys(env).find((k) => k.toUpperCase() === upper) ?? name;
}

export function envGet(env: NodeJS.ProcessEnv, name: string, caseInsensitive: boolean): string | undefined {
  return env[envKey(env, name, caseInsensitive)];
}

export function envSet(
  env: NodeJS.ProcessEnv,
  name: string,
  value: string,
  caseInsensitive: boolean,
): void {
  env[envKey(env, name, caseInsensitive)] = value;
}
