/**
 * middleware/index.ts — Barrel export for the transport layer.
 */

export { lightFetch } from './lightFetcher';
export type {
  HttpTransport,
  LightFetchOptions,
  LightFetchResult,
} from './lightFetcher';
