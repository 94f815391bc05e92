export { Result } from './result';

export {
  validateIsoDate,
  validateDateRange,
  addDays,
  parseClockTime,
  formatClockTime,
} from './validation';
