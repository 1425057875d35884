export const MAX_TOKENS = 1500;
export const TEMPERATURE = 0.7;
export const PRESENCE_PENALTY = 0.1;
export const FREQUENCY_PENALTY = 0.1;

export const MAX_HISTORY_MESSAGES = 10;

export const ERROR_MESSAGES = {
  noMessage: 'No message provided',
  emptyMessage: 'Message cannot be empty',
  apiKeyMissing:
    'API key not configured. Please set OPENAI_API_KEY environment variable.',
  invalidCryptoId: 'Invalid crypto ID',
  cryptoNotFound: 'Cryptocurrency not found',
  networkError: 'Network error occurred',
  internalError: 'Internal server error',
  endpointNotFound: 'Endpoint not found',
} as const;

export const APP_INFO = {
  name: 'Crypto Research Assistant',
  version: '2.0.0',
  description:
    'AI-powered cryptocurrency research assistant with streaming responses',
  features: [
    'Real-time streaming responses',
    'Instant greeting responses',
    'Live market data integration',
    'Price charts with volume',
  ],
};
