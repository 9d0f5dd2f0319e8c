/** Path parameter whose string value replaces template expansion entirely. */
export const RAW_URL_KEY = 'request-raw-url';

/** Path parameter required by templates that start with `{+baseurl}`. */
export const BASE_URL_KEY = 'baseurl';

export const BASE_URL_TOKEN = `{+${BASE_URL_KEY}}`;

export const CONTENT_TYPE_HEADER = 'Content-Type';

export const BINARY_CONTENT_TYPE = 'application/octet-stream';
