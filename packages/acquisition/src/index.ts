/**
 * @relay/acquisition
 * 
 * Getting the source video onto local disk:
 * - Source resolution (local Bot API cache vs. download URL)
 * - HTTP client construction
 * - Streaming downloads with throttled progress
 */

export { SourceResolver, type SourceResolverOptions } from './sourceResolver.js';

export { ProgressThrottle, type ProgressThrottleOptions } from './progress.js';

export {
  ProgressDownloader,
  parseContentLength,
  type DownloadListener,
  type DownloadResult,
  type ProgressDownloaderOptions,
} from './downloader.js';

export {
  buildHttpClients,
  createApiAgent,
  HTTP_FEATURES,
  type HttpClientConfig,
  type HttpClients,
  type HttpFeature,
  type HttpTarget,
  type ApiClientSettings,
} from './httpClient.js';
