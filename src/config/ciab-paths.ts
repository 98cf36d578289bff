import { isAbsolute, resolve } from 'node:path';
import { resolveCiabConfigDirectory } from './config-core.ts';

const CIAB_SESSIONS_DIRECTORY = 'sessions';

function resolveHomePath(pathValue: string, env: NodeJS.ProcessEnv): string | null {
  const homeDirectory = env.HOME?.trim() ?? '';
  if (homeDirectory.length === 0) {
    return null;
  }
  if (pathValue === '~') {
    return homeDirectory;
  }
  if (pathValue.startsWith('~/')) {
    return resolve(homeDirectory, pathValue.slice(2));
  }
  return null;
}

export function resolveCiabSessionsDirectory(env: NodeJS.ProcessEnv = process.env): string {
  return resolve(resolveCiabConfigDirectory(env), CIAB_SESSIONS_DIRECTORY);
}

// Relative paths land under the config directory; `~` expands against HOME.
export function resolveCiabRuntimePath(
  pathValue: string,
  env: NodeJS.ProcessEnv = process.env
): string {
  const normalizedPath = pathValue.trim();
  const configDirectory = resolveCiabConfigDirectory(env);
  if (normalizedPath.length === 0) {
    return configDirectory;
  }
  const expandedHomePath = resolveHomePath(normalizedPath, env);
  if (expandedHomePath !== null) {
    return expandedHomePath;
  }
  if (isAbsolute(normalizedPath)) {
    return normalizedPath;
  }
  return resolve(configDirectory, normalizedPath);
}
