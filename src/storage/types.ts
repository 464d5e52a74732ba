export type ListingStatus = 'open' | 'closed';

export type SessionStatus = 'running' | 'completed' | 'failed';

export type SaveOutcome = 'inserted' | 'updated' | 'unchanged';

export interface SellerContact {
  phone: string | null;
  profileUrl: string | null;
}

export interface Listing {
  id: string;
  source: string;
  price: number | null;
  area: string | null;
  description: string | null;
  url: string | null;
  floor: string | null;
  address: string | null;
  lat: string | null;
  lng: string | null;
  seller: SellerContact | null;
  photos: string[];
  status: ListingStatus;
  visible: boolean;
  /** Null for rows written before activity tracking existed and never seen since. */
  firstSeenAt: string | null;
  updatedAt: string | null;
}

export interface ListingFilters {
  offset?: number;
  source?: string;
  status?: ListingStatus;
  visible?: boolean;
  minPrice?: number;
  maxPrice?: number;
  addressContains?: string;
}

export interface ParsingSession {
  sessionId: string;
  source: string | null;
  status: SessionStatus;
  startedAt: string | null;
  finishedAt: string | null;
  totalParsed: number;
  totalSaved: number;
  notes: string | null;
}

export interface SessionTotals {
  totalParsed: number;
  totalSaved: number;
}

export interface DailyStatistic {
  date: string;
  totalListings: number;
  newListings: number;
  updatedListings: number;
  avgPrice: number | null;
  minPrice: number | null;
  maxPrice: number | null;
  createdAt: string | null;
}

export interface SessionCounts {
  total: number;
  completed: number;
  running: number;
  failed: number;
}

export interface ListingStatistics {
  totalListings: number;
  visibleListings: number;
  openListings: number;
  avgPrice: number | null;
  minPrice: number | null;
  maxPrice: number | null;
  medianPrice: number | null;
  sourcesCount: number;
  bySource: Record<string, number>;
  sessions: SessionCounts;
}

/** Flat values written to `real_estate_listings`, id excluded. */
export interface ListingColumns {
  source: string;
  price: number | null;
  area: string | null;
  description: string | null;
  url: string | null;
  floor: string | null;
  address: string | null;
  lat: string | null;
  lng: string | null;
  seller: string | null;
  photos: string;
  status: ListingStatus;
  visible: 0 | 1;
}

export interface ListingRow {
  id: string;
  source: string;
  price: number | null;
  area: string | null;
  description: string | null;
  url: string | null;
  floor: string | null;
  address: string | null;
  lat: string | null;
  lng: string | null;
  seller: string | null;
  photos: string | null;
  status: string | null;
  visible: number | null;
  first_seen_at: string | null;
  updated_at: string | null;
}

export interface SessionRow {
  session_id: string;
  started_at: string | null;
  finished_at: string | null;
  total_parsed: number | null;
  total_saved: number | null;
  source: string | null;
  status: string | null;
  notes: string | null;
}

export interface DailyStatRow {
  date: string;
  total_listings: number | null;
  new_listings: number | null;
  updated_listings: number | null;
  avg_price: number | null;
  min_price: number | null;
  max_price: number | null;
  created_at: string | null;
}
