export {
  loadConfigFromEnv,
  validateConfig,
  resolveAccessToken,
  ACCESS_TOKEN_ENV,
  MISSING_TOKEN_MESSAGE,
  type SyncConfig,
} from './config.js';
export { createVerboseObserver, describeResponse } from './verbose.js';
