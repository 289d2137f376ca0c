import { randomUUID } from 'node:crypto';

export { logger } from './logger.js';
export {
  CustomerNotFoundError, StoreError, InputError, RunFailedError,
  errorMessage, hasErrorCode,
} from './errors.js';
export { toDate, addDays, daysBetween } from './dates.js';

export function generateId(): string {
  return randomUUID();
}
