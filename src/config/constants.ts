export const APP_CONSTANTS = {
  API_PREFIX: '/api/v1',
  CONNECTION_RATE_LIMIT: { windowMs: 60 * 1000, max: 20 },
  JSON_BODY_LIMIT: '100kb',
  DEBUG_LOG_MAX_ENTRIES: 1000,
  // Live interest tokens the HTTP surface may hold at once
  MAX_INTEREST_TOKENS: 256,
  DEMO_TROUBLE_CODES: ['P0171', 'P0420'],
};

// Mode 01 PIDs whose payload is a status word rather than a measurement
export const STATUS_PIDS = {
  MIL_STATUS: '01',
  FUEL_SYSTEM_STATUS: '03',
} as const;
