export { PARSER_VERSION, PARSER_NAME } from './constants.js';
export {
  monthNumber,
  toISODate,
  resolveStatementDate,
  yearForMonth,
} from './date.js';
export {
  sanitizeAmount,
  parseMinorUnits,
  parseSignedMinorUnits,
  parseSignedBalance,
  sumMinorUnits,
  formatMinorUnits,
  type SanitizedAmount,
} from './money.js';
export { collapseWhitespace, sliceColumn, isBlank } from './text.js';
