export { IngestionRunner } from './ingestion-runner';
export type { IngestionSummary } from './ingestion-runner';
export { normalizeParsedOffer } from './offer-normalizer';
export type { ParsedOffer } from './offer-normalizer';
