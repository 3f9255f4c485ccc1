export { runBatch, dedupeTickers, type BatchParams, type BatchDeps } from './core/batch.js';
export { SecClient, filingDocumentUrl, submissionsUrl, padCik, type SecClientOptions, type FetchLike } from './core/sec-client.js';
export { CompanyResolver, normalizeTicker } from './core/resolver.js';
export { RateLimiter, type RateLimiterOptions } from './core/rate-limiter.js';
export { FORM_DEFINITIONS, getFormDefinition, requireFormDefinition } from './core/forms.js';
export { loadConfig, buildUserAgent, type AppConfig } from './core/config.js';
export { listFilings, selectRecentFilings } from './processing/filing-selector.js';
export { downloadFiling, targetFileName } from './processing/filing-downloader.js';
export * from './core/errors.js';
export type * from './core/types.js';
