export const APP_NAME = 'nativedeps';
export const DISPLAY_NAME = 'NativeDeps';
export const DESCRIPTION = 'Native third-party dependency provisioning';
export const ENV_PREFIX = 'NATIVEDEPS';
export const CONFIG_FILE = 'nativedeps.config.yaml';

export function envVar(suffix: string): string {
  return `${ENV_PREFIX}_${suffix.toUpperCase()}`;
}
