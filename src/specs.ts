export const CR = 0x0d;
export const LF = 0x0a;
export const COLON = 0x3a;
export const SP = ' ';

export const HEADER_TEXT_ENCODING = 'utf8';

export const CONTENT_LENGTH = 'content-length';

export const DEFAULT_HTTP_VERSION = 'HTTP/1.1';

export const TOKEN_REG = /^[!#$%&'*+\-.^_`|~0-9a-z]+$/i;
export const HTTP_VERSION_REG = /^HTTP\/\d\.\d$/;
export const STATUS_CODE_REG = /^\d{3}$/;
export const CONTENT_LENGTH_REG = /^\d+$/;
