/**
 * Cleanup Service
 * 
 * Best-effort removal of conversion artifacts:
 * - the produced audio file
 * - the source video in the Bot API local cache, when it was read from there
 * 
 * Nothing here throws. Every call reports what it decided so the caller
 * can log it, and repeated calls on a removed path are harmless.
 */

import { lstat, stat, unlink } from 'node:fs/promises';
import { join, resolve, sep } from 'node:path';
import { isNotFound, logger as defaultLogger, redactSecret, type Logger } from '@relay/utils';
import type { ResolvedSource } from '../types/media.js';
import { errorMessage } from '../errors/index.js';

export interface CleanupPolicy {
  cleanupOutput: boolean;
  cleanupLocalSource: boolean;
  /** Root of the Bot API server's file cache */
  cacheRoot: string;
  /** Sub-directory owned by this bot under cacheRoot (the bot token) */
  credentialSegment: string;
}

export type CleanupDecision =
  | 'deleted'
  | 'missing'
  | 'disabled'
  | 'rejected'
  | 'not_a_file'
  | 'not_local'
  | 'failed';

export type CacheOwnership = 'owned' | 'outside_root' | 'outside_credential';

function withTrailingSep(dir: string): string {
  return dir.endsWith(sep) ? dir : dir + sep;
}

export class CleanupService {
  private readonly policy: CleanupPolicy;
  private readonly logger: Logger;
  private readonly rootPrefix: string;
  private readonly credentialPrefix: string | undefined;

  constructor(policy: CleanupPolicy, logger: Logger = defaultLogger) {
    this.policy = policy;
    this.logger = logger;
    this.rootPrefix = withTrailingSep(resolve(policy.cacheRoot));
    this.credentialPrefix = policy.credentialSegment
      ? withTrailingSep(join(resolve(policy.cacheRoot), policy.credentialSegment))
      : undefined;
  }

  /**
   * Classify a path against the cache namespace.
   * The path is normalized first so `..` segments cannot escape it.
   */
  checkOwnership(filePath: string): CacheOwnership {
    const normalized = resolve(filePath);
    if (!normalized.startsWith(this.rootPrefix)) {
      return 'outside_root';
    }
    if (!this.credentialPrefix || !normalized.startsWith(this.credentialPrefix)) {
      return 'outside_credential';
    }
    return 'owned';
  }

  /**
   * Delete the produced output file if it exists
   */
  async cleanupOutput(filePath: string): Promise<CleanupDecision> {
    if (!this.policy.cleanupOutput) {
      return 'disabled';
    }

    try {
      await unlink(filePath);
      this.logger.info({ path: filePath }, 'Deleted output file');
      return 'deleted';
    } catch (error) {
      if (isNotFound(error)) {
        return 'missing';
      }
      this.logger.warn({ path: filePath, error: errorMessage(error) }, 'Failed to delete output file');
      return 'failed';
    }
  }

  /**
   * Delete the cached source video, only when it was read locally and
   * lives inside this bot's own cache directory
   */
  async cleanupSource(source: ResolvedSource): Promise<CleanupDecision> {
    if (source.kind !== 'local') {
      return 'not_local';
    }
    if (!this.policy.cleanupLocalSource) {
      return 'disabled';
    }

    const safePath = this.redact(source.path);
    const ownership = this.checkOwnership(source.path);

    if (ownership === 'outside_root') {
      this.logger.warn({ path: safePath }, 'Skip deleting local source outside the cache root');
      return 'rejected';
    }
    if (ownership === 'outside_credential') {
      this.logger.warn({ path: safePath }, 'Skip deleting local source not under this bot\'s cache directory');
      return 'rejected';
    }

    try {
      const stats = await lstat(source.path);
      if (!stats.isFile()) {
        this.logger.warn({ path: safePath }, 'Skip deleting local source that is not a regular file');
        return 'not_a_file';
      }
      await unlink(source.path);
      this.logger.info({ path: safePath }, 'Deleted local source video');
      return 'deleted';
    } catch (error) {
      if (isNotFound(error)) {
        return 'missing';
      }
      this.logger.warn({ path: safePath, error: errorMessage(error) }, 'Failed to delete local source');
      return 'failed';
    }
  }

  /**
   * Startup check for the cache layout the source cleanup relies on.
   * Returns false (and warns) when source cleanup could never delete anything.
   */
  async checkCacheLayout(): Promise<boolean> {
    if (!this.policy.cleanupLocalSource) {
      return true;
    }
    if (!this.credentialPrefix) {
      this.logger.warn('Local source cleanup enabled without a bot credential; nothing will be deleted');
      return false;
    }

    try {
      const stats = await stat(this.credentialPrefix);
      if (stats.isDirectory()) {
        return true;
      }
    } catch (error) {
      if (!isNotFound(error)) {
        this.logger.warn({ error: errorMessage(error) }, 'Could not inspect the bot cache directory');
        return false;
      }
    }

    this.logger.warn(
      { cacheRoot: this.policy.cacheRoot },
      'Bot cache directory not found under the cache root; local source cleanup will skip every file'
    );
    return false;
  }

  private redact(text: string): string {
    return redactSecret(text, this.policy.credentialSegment);
  }
}
