import type { AxiosInstance, AxiosResponse } from "axios";
import type { Logger } from "pino";

import {
  createHomeAssistantEnv,
  parseHomeAssistantConfig,
  type HomeAssistantConfig,
  type HomeAssistantConfigInput
} from "@/lib/config/homeAssistant";
import { childLogger, logger as rootLogger } from "@/lib/logging";
import { summarizeEntity, type AttributeSummary, type ResolvedEntity } from "./entities";
import { findEntityRecord, resolveEntity } from "./resolver";
import {
  callService,
  createHttpClient,
  fetchComponents,
  fetchStates,
  processConversation,
  type RestContext,
  type StatesResult
} from "./rest-client";

export interface HomeAssistantClientOptions {
  logger?: Logger;
  /** Replaces the HTTP client built from the config. */
  http?: AxiosInstance;
}

/**
 * Client for one Home Assistant server.
 *
 * Every call fetches what it needs fresh from the server; nothing is cached
 * between calls, so concurrent use is safe.
 */
export class HomeAssistantClient {
  readonly config: HomeAssistantConfig;
  private readonly ctx: RestContext;

  constructor(config: HomeAssistantConfigInput, options: HomeAssistantClientOptions = {}) {
    this.config = parseHomeAssistantConfig(config);
    this.ctx = {
      http: options.http ?? createHttpClient(this.config),
      log: childLogger({ component: "home-assistant" }, options.logger ?? rootLogger)
    };
  }

  get baseUrl(): string {
    return this.ctx.http.defaults.baseURL ?? "";
  }

  /**
   * Raw state catalog. Transport failures come back as the `error` arm.
   */
  fetchStates(): Promise<StatesResult> {
    return fetchStates(this.ctx);
  }

  private async requireStates(): Promise<unknown[]> {
    const result = await this.fetchStates();
    if (!result.ok) {
      throw result.error;
    }
    return result.value;
  }

  /**
   * `true` when the state catalog can be fetched.
   */
  async isConnected(): Promise<boolean> {
    const result = await this.fetchStates();
    return result.ok;
  }

  /**
   * Find the entity in one of `domains` whose name best matches `utterance`.
   *
   * @throws NetworkError | HttpStatusError when the catalog cannot be fetched
   */
  async findEntity(utterance: string, domains: Iterable<string>): Promise<ResolvedEntity | null> {
    const states = await this.requireStates();
    const match = resolveEntity(states, utterance, domains, this.ctx.log);
    this.ctx.log.debug(
      { utterance, entityId: match?.id, score: match?.score },
      match ? "Resolved spoken entity name" : "No entity matched spoken name"
    );
    return match;
  }

  /**
   * Name, state and unit of an entity, looked up by exact entity id.
   */
  async findEntityAttributes(entityId: string): Promise<AttributeSummary | null> {
    const states = await this.requireStates();
    const entity = findEntityRecord(states, entityId, this.ctx.log);
    return entity ? summarizeEntity(entity) : null;
  }

  /**
   * Execute a service, e.g. `light.turn_on`. Not idempotent.
   */
  async executeService(
    domain: string,
    service: string,
    data: Record<string, unknown> = {}
  ): Promise<AxiosResponse<unknown>> {
    const entityId = data["entity_id"];
    const log = childLogger(
      { domain, service, entityId: typeof entityId === "string" ? entityId : undefined },
      this.ctx.log
    );
    log.info("Calling Home Assistant service");
    return callService({ ...this.ctx, log }, domain, service, data);
  }

  async hasComponent(component: string): Promise<boolean> {
    const components = await fetchComponents(this.ctx);
    return components.includes(component);
  }

  async engageConversation(utterance: string): Promise<string> {
    return processConversation(this.ctx, utterance);
  }
}

export function createHomeAssistantClientFromEnv(
  source: Record<string, unknown> = process.env,
  options: HomeAssistantClientOptions = {}
): HomeAssistantClient {
  return new HomeAssistantClient(createHomeAssistantEnv(source), options);
}
