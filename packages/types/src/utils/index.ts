export { PARSER_VERSION, DEFAULT_CURRENCY, DEFAULT_TEXT_ENCODING } from './constants.js';
export { parseStrictUSDate, addDays } from './date.js';
export { parseDecimal, formatAmount } from './money.js';
