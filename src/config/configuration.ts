export default () => ({
  port: parseInt(process.env.PORT || '3000', 10),
  apiVersion: process.env.API_VERSION || 'api/v1',

  database: {
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    name: process.env.DB_NAME || 'football_models',
    synchronize: process.env.DB_SYNCHRONIZE === 'true',
    logging: process.env.DB_LOGGING === 'true',
  },

  redis: {
    host: process.env.REDIS_HOST || 'localhost',
    port: parseInt(process.env.REDIS_PORT || '6379', 10),
    password: process.env.REDIS_PASSWORD || '',
  },

  cache: {
    prefix: process.env.CACHE_PREFIX || 'fmg:',
    predictionTtlSeconds: parseInt(process.env.PREDICTION_CACHE_TTL_SECONDS || '60', 10),
    writeAttempts: parseInt(process.env.PREDICTION_CACHE_WRITE_ATTEMPTS || '3', 10),
    retryDelayMs: parseInt(process.env.PREDICTION_CACHE_RETRY_DELAY_MS || '50', 10),
  },

  models: {
    defaultName: process.env.MODEL_NAME || 'match_outcome',
  },

  abTesting: {
    configKey: process.env.AB_CONFIG_KEY || 'predictions.canary',
  },

  shadow: {
    queueCapacity: parseInt(process.env.SHADOW_QUEUE_CAPACITY || '1000', 10),
    writeAttempts: parseInt(process.env.SHADOW_WRITE_ATTEMPTS || '3', 10),
    retryDelayMs: parseInt(process.env.SHADOW_RETRY_DELAY_MS || '200', 10),
  },

  calibration: {
    windowDays: parseInt(process.env.CALIBRATION_WINDOW_DAYS || '7', 10),
    accuracyFloor: parseFloat(process.env.CALIBRATION_ACCURACY_FLOOR || '0.45'),
    eceCeil: parseFloat(process.env.CALIBRATION_ECE_CEIL || '0.08'),
    minSamples: parseInt(process.env.CALIBRATION_MIN_SAMPLES || '30', 10),
    bins: parseInt(process.env.CALIBRATION_BINS || '10', 10),
    driftThreshold: parseFloat(process.env.CALIBRATION_DRIFT_THRESHOLD || '0.05'),
  },

  arbitrage: {
    freshnessSeconds: parseInt(process.env.ARBITRAGE_FRESHNESS_SECONDS || '300', 10),
    lookbackMinutes: parseInt(process.env.ARBITRAGE_LOOKBACK_MINUTES || '60', 10),
    minProfitPct: parseFloat(process.env.ARBITRAGE_MIN_PROFIT_PCT || '0'),
    defaultStake: parseFloat(process.env.ARBITRAGE_DEFAULT_STAKE || '100'),
  },
});
