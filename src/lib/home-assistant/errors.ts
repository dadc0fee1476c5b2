import { isAxiosError } from "axios";

export class HomeAssistantError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "HomeAssistantError";
  }
}

/**
 * The server could not be reached: connection refused, DNS failure or timeout.
 */
export class NetworkError extends HomeAssistantError {
  readonly code: string | undefined;
  readonly url: string;

  constructor(message: string, url: string, code?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "NetworkError";
    this.url = url;
    this.code = code;
  }

  get isTimeout(): boolean {
    return this.code === "ECONNABORTED" || this.code === "ETIMEDOUT";
  }
}

/**
 * The server answered with a non-2xx status.
 */
export class HttpStatusError extends HomeAssistantError {
  readonly status: number;
  readonly statusText: string;
  readonly url: string;

  constructor(status: number, statusText: string, url: string, options?: { cause?: unknown }) {
    super(`Home Assistant API error: ${status} ${statusText}`.trim(), options);
    this.name = "HttpStatusError";
    this.status = status;
    this.statusText = statusText;
    this.url = url;
  }
}

export class ResponseShapeError extends HomeAssistantError {
  constructor(message: string) {
    super(message);
    this.name = "ResponseShapeError";
  }
}

export class InvalidUrlError extends HomeAssistantError {
  constructor(input: string) {
    super(`No host or IP address found in "${input}"`);
    this.name = "InvalidUrlError";
  }
}

export class HomeAssistantConfigError extends HomeAssistantError {
  constructor(message: string) {
    super(message);
    this.name = "HomeAssistantConfigError";
  }
}

export type HomeAssistantRequestError = NetworkError | HttpStatusError;

export function isRequestError(error: unknown): error is HomeAssistantRequestError {
  return error instanceof NetworkError || error instanceof HttpStatusError;
}

/**
 * Convert a transport failure into a request error. Anything that did not come
 * from the HTTP layer is rethrown untouched.
 */
export function toRequestError(error: unknown, url: string): HomeAssistantRequestError {
  if (!isAxiosError(error)) {
    throw error;
  }

  if (error.response) {
    return new HttpStatusError(error.response.status, error.response.statusText ?? "", url, { cause: error });
  }

  if (error.code === "ECONNABORTED" || error.code === "ETIMEDOUT") {
    return new NetworkError("Home Assistant request timed out. Please check your connection.", url, error.code, {
      cause: error
    });
  }

  return new NetworkError(`Unable to reach Home Assistant: ${error.message}`, url, error.code, { cause: error });
}
