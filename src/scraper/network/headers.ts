import type { RequestHeaders } from '../../types.js';

export const CHROME_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/129.0.0.0 Safari/537.36';

export const DEFAULT_HEADERS: Readonly<RequestHeaders> = Object.freeze({
  'Content-Type': 'application/json',
  Connection: 'keep-alive',
  'Cache-Control': 'no-cache',
  Accept: '*/*',
  'User-Agent': CHROME_USER_AGENT,
});
