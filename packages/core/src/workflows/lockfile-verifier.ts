/**
 * Lockfile Verifier
 *
 * After an install command exits 0, checks that its lock file exists and is
 * no older than the manifests it was generated from. Modification times are
 * compared, so a lock file touched without being regenerated still passes.
 */

import { existsSync, statSync } from 'node:fs';
import { basename, join } from 'node:path';
import type { CommandExecutor } from '../executor/command-executor.js';
import { LockfileVerificationError } from '../utils/errors.js';
import { getLogger, type Logger } from '../utils/logger.js';

export interface LockfileSpec {
  tool: string;
  lockfile: string;
  /** Compared only when present */
  manifests: readonly string[];
  /** Must exit 0 after the install */
  infoCommand?: string;
}

export const LOCKFILE_SPECS: Readonly<Record<'pixi' | 'npm', LockfileSpec>> = {
  pixi: { tool: 'pixi', lockfile: 'pixi.lock', manifests: ['pixi.toml', 'pyproject.toml'], infoCommand: 'pixi info' },
  npm: { tool: 'npm', lockfile: 'package-lock.json', manifests: ['package.json'] },
};

const INSTALL_SUBCOMMANDS: Readonly<Record<string, readonly string[]>> = {
  pixi: ['install'],
  npm: ['install', 'i', 'ci'],
};

/**
 * Lock file expectations for an install command, or null for anything else
 */
export function lockfileSpecFor(argv: readonly string[]): LockfileSpec | null {
  const [executable, subcommand] = argv;
  const tool = executable === undefined ? undefined : basename(executable);
  if (tool !== 'pixi' && tool !== 'npm') return null;
  if (subcommand === undefined || !INSTALL_SUBCOMMANDS[tool]?.includes(subcommand)) return null;
  return LOCKFILE_SPECS[tool];
}

export class LockfileVerifier {
  private readonly logger: Logger;

  constructor(
    private readonly executor: CommandExecutor,
    private readonly projectDir: string,
    logger?: Logger
  ) {
    this.logger = logger ?? getLogger('lockfile');
  }

  /**
   * Throws LockfileVerificationError when the lock file is missing, the
   * environment check fails or a manifest is newer than the lock file.
   */
  async verify(spec: LockfileSpec): Promise<void> {
    const lockPath = join(this.projectDir, spec.lockfile);
    if (!existsSync(lockPath)) {
      throw new LockfileVerificationError(`${spec.lockfile} file not found after install`, { lockfile: spec.lockfile });
    }

    if (spec.infoCommand) {
      const result = await this.executor.execute(spec.infoCommand, { workingDirectory: this.projectDir });
      if (result.exitCode !== 0) {
        throw new LockfileVerificationError(`Failed to verify ${spec.tool} environment: ${result.stderr.trim()}`, {
          lockfile: spec.lockfile,
          details: { exitCode: result.exitCode },
        });
      }
    }

    // mtime comparison: clock skew or two writes within the timestamp
    // resolution can pass a stale lock file
    const lockTime = statSync(lockPath).mtimeMs;
    for (const manifest of spec.manifests) {
      const manifestPath = join(this.projectDir, manifest);
      if (!existsSync(manifestPath)) continue;

      if (lockTime < statSync(manifestPath).mtimeMs) {
        throw new LockfileVerificationError(`${spec.lockfile} appears to still be outdated`, {
          lockfile: spec.lockfile,
          details: { manifest },
        });
      }
    }

    this.logger.debug('Lock file verified', { lockfile: spec.lockfile });
  }
}
