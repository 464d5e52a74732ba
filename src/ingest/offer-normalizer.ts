import { ListingValidationError } from '../storage/errors';
import type { ListingInput } from '../storage/validation';
import { blankToNull, normalizeWhitespace } from '../utils/text';

/** Offer dictionary as emitted by the search-results parser. */
export interface ParsedOffer {
  id?: string | number;
  price_per_month?: number | null;
  area?: string | number | null;
  description?: string | null;
  url?: string | null;
  floor?: string | number | null;
  address?: string | null;
  coordinates?: {
    lat?: string | number | null;
    lng?: string | number | null;
  } | null;
  phones?: string[] | null;
  seller_url?: string | null;
  photos?: string[] | null;
  error?: string;
  [key: string]: unknown;
}

// Filler strings the parser writes when a field is missing on the source page.
const PLACEHOLDERS = new Set(['не указана', 'не указан', 'не указано', 'ошибка обработки']);

function cleanText(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) {
    return null;
  }
  const text = blankToNull(String(value));
  if (text === null || PLACEHOLDERS.has(normalizeWhitespace(text).toLowerCase())) {
    return null;
  }
  return text;
}

// The parser falls back to 0 when coordinates are absent.
function cleanCoordinate(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined || Number(value) === 0) {
    return null;
  }
  return cleanText(value);
}

export function normalizeParsedOffer(offer: ParsedOffer, source: string): ListingInput {
  const id = offer.id === undefined ? '' : String(offer.id).trim();

  if (offer.error !== undefined) {
    throw new ListingValidationError('parsed offer', [`${id || 'unknown offer'}: ${offer.error}`]);
  }

  const phones = (offer.phones ?? []).map((phone) => phone.trim()).filter(Boolean);
  const phone = phones.length > 0 ? phones.join(', ') : null;
  const profileUrl = blankToNull(offer.seller_url);

  return {
    id,
    source,
    price: offer.price_per_month ?? null,
    area: cleanText(offer.area),
    description: cleanText(offer.description),
    url: cleanText(offer.url),
    floor: cleanText(offer.floor),
    address: cleanText(offer.address),
    lat: cleanCoordinate(offer.coordinates?.lat),
    lng: cleanCoordinate(offer.coordinates?.lng),
    seller: phone === null && profileUrl === null ? null : { phone, profileUrl },
    photos: (offer.photos ?? []).filter((photo) => photo.trim().length > 0),
    status: 'open',
    visible: true
  };
}
