import { describeError, Logger } from "@listing-sync/shared-utils";
import { StoreConfig } from "../config/env";
import { StoreRequest } from "../core/dto";
import { StoreRequestError, StoreTransport } from "../core/ports";
import { isRecord } from "../core/values";
import { HttpResult, HttpTimeoutError, postJson } from "./http";

const SENSITIVE_KEYS = ["password", "token", "apikey", "api_key", "authorization"];

/**
 * Copy of a payload with credential-like keys replaced, for debug logs
 */
export function maskSensitive(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(maskSensitive);
  if (!isRecord(value)) return value;

  const masked: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const lower = key.toLowerCase();
    masked[key] = SENSITIVE_KEYS.some((s) => lower.includes(s))
      ? "****"
      : maskSensitive(entry);
  }
  return masked;
}

/**
 * Store transport over the host's JSON-2 API:
 * POST {url}/json/2/{entity}/{method} with the method's keyword arguments.
 */
export class JsonRpcTransport implements StoreTransport {
  constructor(
    private config: StoreConfig,
    private logger: Logger
  ) {}

  async call(request: StoreRequest): Promise<unknown> {
    const url = `${this.config.url}/json/2/${request.entity}/${request.method}`;
    this.logger.debug(
      `Store request URL=${url} payload=${JSON.stringify(maskSensitive(request.args))}`
    );

    const response = await this.post(url, request.args, request);
    const { body } = response;

    if (!response.ok) {
      this.logger.error(`Store request failed: ${response.status} - ${body.slice(0, 500)}`);
      throw new StoreRequestError(
        `Store ${request.entity}.${request.method} failed with HTTP ${response.status}`,
        request,
        response.status
      );
    }

    this.logger.debug(`Store response ${response.status}: ${body.slice(0, 500)}`);

    try {
      return body ? JSON.parse(body) : null;
    } catch (error) {
      throw new StoreRequestError(
        `Store ${request.entity}.${request.method} returned invalid JSON`,
        request,
        response.status,
        { cause: error }
      );
    }
  }

  /**
   * Verify the URL and API key by fetching the current user's context
   */
  async checkConnection(): Promise<void> {
    this.logger.info(`Connecting to store at ${this.config.url}`);
    const request: StoreRequest = { entity: "res.users", method: "context_get", args: {} };
    const response = await this.post(
      `${this.config.url}/json/2/res.users/context_get`,
      {},
      request
    );

    if (response.status !== 200) {
      this.logger.error(`Authentication with store failed: ${response.status}`);
      throw new StoreRequestError(
        "Authentication with store failed",
        request,
        response.status
      );
    }

    this.logger.info(`Connected to store at ${this.config.url}`);
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.config.apiKey) {
      headers.Authorization = `bearer ${this.config.apiKey}`;
    }
    if (this.config.database) {
      headers["X-Odoo-Database"] = this.config.database;
    }
    return headers;
  }

  private async post(
    url: string,
    payload: unknown,
    request: StoreRequest
  ): Promise<HttpResult> {
    try {
      return await postJson(url, payload, {
        headers: this.headers(),
        timeoutMs: this.config.timeoutMs,
      });
    } catch (error) {
      const reason = error instanceof HttpTimeoutError ? error.message : describeError(error);
      throw new StoreRequestError(
        `Store ${request.entity}.${request.method} request ${reason}`,
        request,
        undefined,
        { cause: error }
      );
    }
  }
}
