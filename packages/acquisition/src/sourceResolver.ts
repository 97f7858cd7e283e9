/**
 * Source Resolver
 * 
 * Decides whether a Bot API file path can be read straight from the
 * local Bot API cache, or has to be downloaded.
 * 
 * A self-hosted Bot API server in --local mode returns absolute paths
 * under its working directory (sometimes glued onto a URL); the public
 * server returns relative paths such as `videos/file_12.mp4`.
 */

import { existsSync } from 'node:fs';
import { isAbsolute } from 'node:path';
import type { ResolvedSource } from '@relay/core';

export interface SourceResolverOptions {
  /** Local cache root of the Bot API server, e.g. /var/lib/telegram-bot-api/ */
  cacheRoot: string;
  /** `<file base>/file/bot<token>`, computed once at startup */
  fileUrlPrefix: string;
  /** Existence check, replaceable in tests */
  exists?: (path: string) => boolean;
}

export class SourceResolver {
  private readonly cacheRoot: string;
  private readonly fileUrlPrefix: string;
  private readonly exists: (path: string) => boolean;

  constructor(options: SourceResolverOptions) {
    this.cacheRoot = options.cacheRoot;
    this.fileUrlPrefix = options.fileUrlPrefix.replace(/\/+$/, '');
    this.exists = options.exists ?? existsSync;
  }

  /**
   * Map a raw file path to a local path or a download URL
   */
  resolve(rawPath: string | undefined): ResolvedSource {
    const filePath = (rawPath ?? '').trim();

    const localPath = this.pickLocalPath(filePath);
    if (localPath) {
      return { kind: 'local', path: localPath };
    }

    const url = this.buildDirectUrl(filePath);
    return url ? { kind: 'remote', url } : { kind: 'remote' };
  }

  /**
   * Find a readable local copy of the file, if any
   */
  pickLocalPath(filePath: string): string | undefined {
    if (!filePath) {
      return undefined;
    }

    // The path may be a full URL; pull out the absolute cache path inside it
    if (this.cacheRoot) {
      const index = filePath.indexOf(this.cacheRoot);
      if (index >= 0) {
        const candidate = filePath.slice(index);
        if (this.exists(candidate)) {
          return candidate;
        }
      }
    }

    // Or the path is itself absolute
    if (isAbsolute(filePath) && this.exists(filePath)) {
      return filePath;
    }

    return undefined;
  }

  /**
   * Build the direct download URL for a Bot API file path
   */
  buildDirectUrl(filePath: string): string | undefined {
    if (!filePath) {
      return undefined;
    }
    if (filePath.startsWith('http://') || filePath.startsWith('https://')) {
      return filePath;
    }
    const normalized = filePath.startsWith('/') ? filePath : `/${filePath}`;
    return `${this.fileUrlPrefix}${normalized}`;
  }
}
