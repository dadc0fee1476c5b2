import https from "node:https";

import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import type { Logger } from "pino";
import { z } from "zod";

import { buildBaseUrl, type HomeAssistantConfig } from "@/lib/config/homeAssistant";
import { elapsedTimer, requestLogger, toErrorObject } from "@/lib/logging";
import { ResponseShapeError, toRequestError, type HomeAssistantRequestError } from "./errors";

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export type StatesResult = Result<unknown[], HomeAssistantRequestError>;

export interface RestContext {
  http: AxiosInstance;
  log: Logger;
}

/**
 * Build the HTTP client for one Home Assistant server. Certificate
 * verification follows `config.verify` when TLS is on.
 */
export function createHttpClient(config: HomeAssistantConfig): AxiosInstance {
  return axios.create({
    baseURL: buildBaseUrl(config),
    timeout: config.timeoutMs,
    headers: {
      "Authorization": `Bearer ${config.token}`,
      "Content-Type": "application/json"
    },
    ...(config.ssl ? { httpsAgent: new https.Agent({ rejectUnauthorized: config.verify }) } : {})
  });
}

/**
 * Send one request, converting transport failures into a request error.
 */
async function send<T>(
  ctx: RestContext,
  method: "GET" | "POST",
  path: string,
  body?: unknown
): Promise<Result<AxiosResponse<T>, HomeAssistantRequestError>> {
  const log = requestLogger(ctx.log, { route: path, method });
  const elapsed = elapsedTimer();

  try {
    const response = await ctx.http.request<T>({
      method,
      url: path,
      ...(body !== undefined ? { data: body } : {})
    });
    log.debug({ status: response.status, ...elapsed() }, "Home Assistant request completed");
    return { ok: true, value: response };
  } catch (error) {
    const requestError = toRequestError(error, `${ctx.http.defaults.baseURL ?? ""}${path}`);
    log.warn({ err: toErrorObject(requestError), ...elapsed() }, "Home Assistant request failed");
    return { ok: false, error: requestError };
  }
}

async function sendOrThrow<T>(
  ctx: RestContext,
  method: "GET" | "POST",
  path: string,
  body?: unknown
): Promise<AxiosResponse<T>> {
  const result = await send<T>(ctx, method, path, body);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

/**
 * Fetch the full state catalog from /api/states
 */
export async function fetchStates(ctx: RestContext): Promise<StatesResult> {
  const result = await send<unknown>(ctx, "GET", "/api/states");
  if (!result.ok) {
    return result;
  }

  const body = result.value.data;
  if (!Array.isArray(body)) {
    ctx.log.warn({ bodyType: typeof body }, "Home Assistant state catalog is not a list; treating it as empty");
    return { ok: true, value: [] };
  }

  return { ok: true, value: body };
}

const componentsSchema = z.array(z.string());

/**
 * List the components loaded on the server
 */
export async function fetchComponents(ctx: RestContext): Promise<string[]> {
  const response = await sendOrThrow<unknown>(ctx, "GET", "/api/components");
  const parsed = componentsSchema.safeParse(response.data);
  if (!parsed.success) {
    throw new ResponseShapeError("Home Assistant component list is not a list of strings");
  }
  return parsed.data;
}

/**
 * Call a Home Assistant service via REST API
 */
export async function callService(
  ctx: RestContext,
  domain: string,
  service: string,
  serviceData: Record<string, unknown>
): Promise<AxiosResponse<unknown>> {
  const path = `/api/services/${encodeURIComponent(domain)}/${encodeURIComponent(service)}`;
  return sendOrThrow<unknown>(ctx, "POST", path, serviceData);
}

const conversationResponseSchema = z.union([
  z.object({ speech: z.object({ plain: z.string() }) }),
  z.object({ speech: z.object({ plain: z.object({ speech: z.string() }) }) }),
  z.object({ response: z.object({ speech: z.object({ plain: z.object({ speech: z.string() }) }) }) })
]);

function extractSpeech(data: z.infer<typeof conversationResponseSchema>): string {
  if ("response" in data) {
    return data.response.speech.plain.speech;
  }
  return typeof data.speech.plain === "string" ? data.speech.plain : data.speech.plain.speech;
}

/**
 * Send a free-text turn to the conversation agent and return its plain-text reply
 */
export async function processConversation(ctx: RestContext, utterance: string): Promise<string> {
  const response = await sendOrThrow<unknown>(ctx, "POST", "/api/conversation/process", { text: utterance });
  const parsed = conversationResponseSchema.safeParse(response.data);
  if (!parsed.success) {
    throw new ResponseShapeError("Home Assistant conversation response has no speech.plain text");
  }
  return extractSpeech(parsed.data);
}
