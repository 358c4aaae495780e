import { v4 as uuidv4 } from 'uuid';
import { ORDER_NUMBER_PREFIX, RETURN_NUMBER_PREFIX } from '../constants';

const datePart = (now: Date): string => {
  const yy = String(now.getUTCFullYear() % 100).padStart(2, '0');
  const mm = String(now.getUTCMonth() + 1).padStart(2, '0');
  const dd = String(now.getUTCDate()).padStart(2, '0');
  return `${yy}${mm}${dd}`;
};

const randomSuffix = (): string => uuidv4().replace(/-/g, '').slice(0, 8).toUpperCase();

/**
 * ORD-YYMMDD-XXXXXXXX, UTC date
 */
export const generateOrderNumber = (now: Date = new Date()): string =>
  `${ORDER_NUMBER_PREFIX}-${datePart(now)}-${randomSuffix()}`;

export const generateReturnNumber = (now: Date = new Date()): string =>
  `${RETURN_NUMBER_PREFIX}-${datePart(now)}-${randomSuffix()}`;
