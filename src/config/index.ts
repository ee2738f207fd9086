export type { WriteLimits, PartialSocialAgentConfig } from './config.js';
export {
  SocialAgentConfig,
  SocialAgentConfigBuilder,
  createDefaultConfig,
  validateConfig,
  writeGateConfig,
  readGateConfig,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  DEFAULT_MAX_POST_LENGTH,
  DEFAULT_MAX_RETRIES,
  DEFAULT_WRITE_LIMITS,
} from './config.js';
