export * from '@/lib/home-assistant';
export {
  DEFAULT_TIMEOUT_MS,
  buildBaseUrl,
  createHomeAssistantEnv,
  homeAssistantConfigSchema,
  parseHomeAssistantConfig,
  verifyHomeAssistantConfigured,
  type HomeAssistantConfig,
  type HomeAssistantConfigInput,
  type HomeAssistantEnv
} from '@/lib/config/homeAssistant';
export { tokenSortRatio, ratio } from '@/lib/string';
export { logger, childLogger } from '@/lib/logging';
