export const PARSER_VERSION = '0.1.0';

export const DEFAULT_CURRENCY = 'EUR';

export const DEFAULT_TEXT_ENCODING = 'utf8';
