import { randomBytes } from 'crypto';
import { formatDay } from './calendar';

const SUFFIX_ALPHABET = '0123456789ABCDEFGHJKMNPQRSTVWXYZ';
const SUFFIX_LENGTH = 8;

export const ORDER_NUMBER_PATTERN = /^ORD-\d{8}-[0-9A-HJKMNP-TV-Z]{8}$/;

export type OrderNumberGenerator = (createdAt: Date) => string;

/**
 * ORD-YYYYMMDD-XXXXXXXX: the UTC creation day keeps numbers sortable, the
 * 40-bit suffix keeps collisions negligible. No retry happens here.
 */
export const generateOrderNumber: OrderNumberGenerator = (createdAt) => {
  const bytes = randomBytes(SUFFIX_LENGTH);
  let suffix = '';
  for (const byte of bytes) {
    suffix += SUFFIX_ALPHABET[byte % SUFFIX_ALPHABET.length];
  }
  return `ORD-${formatDay(createdAt).replace(/-/g, '')}-${suffix}`;
};
