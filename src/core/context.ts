import type { ProjectLayout } from '../config/settings.js';
import type { PlatformProfile } from '../utils/platform.js';
import type { HostQuery } from './host.js';
import type { OverrideSet } from './overrides.js';
import type { ProcessRunner } from './runner.js';
import type { Reporter } from './reporter.js';
import type { SourceControl } from './source.js';

/** Everything the resolvers read. None of it is mutated. */
export interface ResolveContext {
  platform: PlatformProfile;
  env: NodeJS.ProcessEnv;
  overrides: OverrideSet;
  host: HostQuery;
  installRoot: string;
}

export interface EngineContext extends ResolveContext {
  layout: ProjectLayout;
  runner: ProcessRunner;
  git: SourceControl;
  reporter: Reporter;
}

export interface EngineParts {
  platform: PlatformProfile;
  env: NodeJS.ProcessEnv;
  overrides: OverrideSet;
  host: HostQuery;
  layout: ProjectLayout;
  runner: ProcessRunner;
  git: SourceControl;
  reporter: Reporter;
}

export function createEngineContext(parts: EngineParts): EngineContext {
  return {
    ...parts,
    env: { ...parts.env },
    installRoot: parts.layout.installRoot,
  };
}
