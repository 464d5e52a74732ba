import { blankToNull } from '../utils/text';
import type { NormalizedListing } from './validation';
import type {
  DailyStatRow,
  DailyStatistic,
  Listing,
  ListingColumns,
  ListingRow,
  ParsingSession,
  SellerContact,
  SessionRow,
  SessionStatus
} from './types';

export const SELLER_SEPARATOR = ' | ';

export const LISTING_COLUMN_NAMES = [
  'source',
  'price',
  'area',
  'description',
  'url',
  'floor',
  'address',
  'lat',
  'lng',
  'seller',
  'photos',
  'status',
  'visible'
] as const satisfies ReadonlyArray<keyof ListingColumns>;

const PROFILE_URL_PATTERN = /^https?:\/\//i;

function parseJson(value: string | null | undefined): unknown {
  if (!value) {
    return undefined;
  }
  try {
    return JSON.parse(value);
  } catch (error) {
    return undefined;
  }
}

export function serializeSeller(contact: SellerContact | null): string | null {
  if (!contact) {
    return null;
  }
  const parts = [contact.phone, contact.profileUrl]
    .map((part) => blankToNull(part))
    .filter((part): part is string => part !== null);
  return parts.length > 0 ? parts.join(SELLER_SEPARATOR) : null;
}

export function parseSeller(raw: string | null): SellerContact | null {
  const parts = (raw ?? '')
    .split(SELLER_SEPARATOR)
    .map((part) => part.trim())
    .filter(Boolean);
  if (parts.length === 0) {
    return null;
  }

  const urlIndex = parts.findIndex((part) => PROFILE_URL_PATTERN.test(part));
  const profileUrl = urlIndex === -1 ? null : parts[urlIndex];
  const phoneParts = parts.filter((_, index) => index !== urlIndex);

  return {
    phone: phoneParts.length > 0 ? phoneParts.join(SELLER_SEPARATOR) : null,
    profileUrl
  };
}

export function serializePhotos(photos: string[]): string {
  return JSON.stringify(photos);
}

// Rows written by older tooling may hold a bare string instead of a JSON array.
export function parsePhotos(raw: string | null): string[] {
  const parsed = parseJson(raw);
  if (Array.isArray(parsed)) {
    return parsed.filter((entry): entry is string => typeof entry === 'string' && entry.length > 0);
  }
  const single = blankToNull(raw);
  return single === null || parsed !== undefined ? [] : [single];
}

export function toListingColumns(listing: NormalizedListing): ListingColumns {
  return {
    source: listing.source,
    price: listing.price,
    area: listing.area,
    description: listing.description,
    url: listing.url,
    floor: listing.floor,
    address: listing.address,
    lat: listing.lat,
    lng: listing.lng,
    seller: serializeSeller(listing.seller),
    photos: serializePhotos(listing.photos),
    status: listing.status,
    visible: listing.visible ? 1 : 0
  };
}

export function columnValues(columns: ListingColumns): Array<string | number | null> {
  return LISTING_COLUMN_NAMES.map((name) => columns[name]);
}

function samePhotos(stored: string | null, next: string): boolean {
  const storedPhotos = parsePhotos(stored);
  const nextPhotos = parsePhotos(next);
  return storedPhotos.length === nextPhotos.length && storedPhotos.every((photo, index) => photo === nextPhotos[index]);
}

// Photos compare as lists: other writers format the JSON array differently.
export function sameColumns(stored: ListingRow, next: ListingColumns): boolean {
  return LISTING_COLUMN_NAMES.every((name) =>
    name === 'photos' ? samePhotos(stored.photos, next.photos) : stored[name] === next[name]
  );
}

export function fromListingRow(row: ListingRow): Listing {
  return {
    id: row.id,
    source: row.source,
    price: row.price,
    area: row.area,
    description: row.description,
    url: row.url,
    floor: row.floor,
    address: row.address,
    lat: row.lat,
    lng: row.lng,
    seller: parseSeller(row.seller),
    photos: parsePhotos(row.photos),
    status: row.status === 'closed' ? 'closed' : 'open',
    visible: row.visible !== 0,
    firstSeenAt: row.first_seen_at,
    updatedAt: row.updated_at
  };
}

function toSessionStatus(value: string | null): SessionStatus {
  if (value === 'completed' || value === 'failed') {
    return value;
  }
  return 'running';
}

export function fromSessionRow(row: SessionRow): ParsingSession {
  return {
    sessionId: row.session_id,
    source: row.source,
    status: toSessionStatus(row.status),
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    totalParsed: row.total_parsed ?? 0,
    totalSaved: row.total_saved ?? 0,
    notes: row.notes
  };
}

export function fromDailyStatRow(row: DailyStatRow): DailyStatistic {
  const totalListings = row.total_listings ?? 0;
  const newListings = row.new_listings ?? 0;
  return {
    date: row.date,
    totalListings,
    newListings,
    updatedListings: row.updated_listings ?? totalListings - newListings,
    avgPrice: row.avg_price,
    minPrice: row.min_price,
    maxPrice: row.max_price,
    createdAt: row.created_at
  };
}
