export {
  DEFAULT_EXCHANGE_API_BASE_URL,
  DEFAULT_PIPELINE_VERSION,
  getDataDirectory,
  getExchangeApiConfig,
  getPipelineVersion,
  resetEnvCache,
  type ExchangeApiConfig,
  type ValidatedEnv,
} from './config.js';
