export const PARSER_VERSION = '0.1.0';

export const PARSER_NAME = 'ledgerscan';
