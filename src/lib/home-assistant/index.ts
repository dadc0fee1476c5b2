// Client exports
export {
  HomeAssistantClient,
  createHomeAssistantClientFromEnv,
  type HomeAssistantClientOptions
} from '@/lib/home-assistant/client';

// REST client exports
export {
  callService,
  createHttpClient,
  fetchComponents,
  fetchStates,
  processConversation,
  type RestContext,
  type Result,
  type StatesResult
} from '@/lib/home-assistant/rest-client';

// Entity utilities exports
export {
  type AttributeSummary,
  type EntityAttributes,
  type EntityState,
  type NamedEntityState,
  type RecordParseResult,
  type ResolvedEntity,
  entityStateSchema,
  getAttribute,
  getDomainFromEntityId,
  getStringAttribute,
  parseEntityRecord,
  summarizeEntity
} from '@/lib/home-assistant/entities';

// Resolution exports
export { MIN_MATCH_SCORE, findEntityRecord, resolveEntity } from '@/lib/home-assistant/resolver';

// Error exports
export {
  HomeAssistantConfigError,
  HomeAssistantError,
  HttpStatusError,
  InvalidUrlError,
  NetworkError,
  ResponseShapeError,
  isRequestError,
  toRequestError,
  type HomeAssistantRequestError
} from '@/lib/home-assistant/errors';

// URL exports
export { checkUrl } from '@/lib/home-assistant/url';
