export { ListingStore } from './listing-store';
export type { ListingStoreOptions } from './listing-store';
export {
  InvalidSessionStateError,
  ListingNotFoundError,
  ListingStoreError,
  ListingValidationError,
  StorageError
} from './errors';
export { SELLER_SEPARATOR, parseSeller, serializeSeller } from './codec';
export type { ListingInput } from './validation';
export type {
  DailyStatistic,
  Listing,
  ListingFilters,
  ListingStatistics,
  ListingStatus,
  ParsingSession,
  SaveOutcome,
  SellerContact,
  SessionCounts,
  SessionStatus,
  SessionTotals
} from './types';
