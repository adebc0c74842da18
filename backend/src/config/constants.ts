// Configuration constants
export const EXCHANGERATE_API_BASE = process.env.EXCHANGERATE_API_BASE || 'https://api.exchangerate.host';
export const TIMEFRAME_ENDPOINT = '/timeframe';
export const EXCHANGERATE_SOURCE = 'exchangerate.host';

export const EXCHANGERATE_API_KEY = process.env.EXCHANGERATE_API_KEY || '';

// 24 hours by default, the provider quota is small
export const CACHE_TTL_SECONDS = Math.floor(
  parseInt(process.env.CACHE_TTL_MS || String(24 * 60 * 60 * 1000), 10) / 1000
);

export const MAX_THROTTLE_SECONDS = parseFloat(process.env.MAX_THROTTLE_SECONDS || '2');

export const REDIS_URL = process.env.REDIS_URL || '';

export const CACHE_KEY_PREFIX = 'fx:';

export const DEFAULT_BASE = 'GBP';
export const DEFAULT_TARGETS = ['EUR', 'USD', 'CHF'];

export const COMMON_CURRENCIES = [
  'GBP', 'EUR', 'USD', 'CHF', 'JPY', 'AUD', 'CAD', 'NZD', 'SEK', 'NOK', 'DKK',
  'PLN', 'CZK', 'HUF', 'TRY', 'ZAR', 'CNY', 'HKD', 'SGD', 'INR', 'MXN', 'BRL'
];
