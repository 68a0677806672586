/**
 * Environment detection for CI and color support
 */

import ci from 'ci-info';

export interface Environment {
  isCI: boolean;
  ciName: string | null;
  colors: boolean;
}

/**
 * Colors unless NO_COLOR or FORCE_COLOR=0 says otherwise. Without a TTY,
 * only CI providers whose logs render ANSI get colors.
 */
export function shouldUseColors(env: NodeJS.ProcessEnv, isTTY: boolean): boolean {
  if (env['NO_COLOR'] !== undefined) {
    return false;
  }

  const forceColor = env['FORCE_COLOR'];
  if (forceColor !== undefined) {
    return forceColor !== '0' && forceColor !== 'false';
  }

  if (!isTTY) {
    return ci.isCI && (env['GITHUB_ACTIONS'] !== undefined || env['GITLAB_CI'] !== undefined);
  }

  return true;
}

export function getEnvironment(env: NodeJS.ProcessEnv, isTTY: boolean): Environment {
  return {
    isCI: ci.isCI,
    ciName: ci.name,
    colors: shouldUseColors(env, isTTY),
  };
}
