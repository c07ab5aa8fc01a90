import { ApiError, ConfigurationError, RateLimitError, ValidationError } from './errors.js';
import { SpamCheckResult } from './result.js';
import { USER_AGENT } from './version.js';
import { debug } from './debug.js';

export const DEFAULT_BASE_URL = 'https://is-it-spam.com';
export const DEFAULT_TIMEOUT = 30;
export const API_VERSION = 'v1';

const EMAIL_PATTERN = /^[^@\s]+@[^@\s]+$/;

export interface IsItSpamClientOptions {
  apiKey: string | null | undefined;
  apiSecret: string | null | undefined;
  baseUrl?: string;
  /** Request timeout in seconds */
  timeout?: number;
}

export interface SpamCheckInput {
  name: string;
  email: string;
  message: string;
  /** Extra form fields sent as `additional_fields` */
  customFields?: Record<string, string>;
  /** IP address of the person who filled in the form */
  endUserIp?: string;
}

interface RawResponse {
  status: number;
  body: string;
}

function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === '';
}

function parseJson(body: string): unknown {
  try {
    return JSON.parse(body);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Pull `error` out of a JSON error body, falling back when absent or unreadable. */
function errorMessage(body: string, fallback: string): string {
  const data = parseJson(body);
  if (isRecord(data) && typeof data.error === 'string') return data.error;
  return fallback;
}

function fieldErrors(value: unknown): Record<string, string[]> {
  if (!isRecord(value)) return {};
  const errors: Record<string, string[]> = {};
  for (const [field, messages] of Object.entries(value)) {
    if (Array.isArray(messages)) {
      errors[field] = messages.map((m) => String(m));
    } else if (typeof messages === 'string') {
      errors[field] = [messages];
    }
  }
  return errors;
}

/**
 * Client for the is-it-spam.com REST API.
 *
 * Holds no per-call state, so a single instance can serve concurrent requests.
 */
export class IsItSpamClient {
  readonly baseUrl: string;
  readonly timeout: number;
  private readonly apiKey: string;
  private readonly apiSecret: string;

  constructor(options: IsItSpamClientOptions) {
    if (options.apiKey === null || options.apiKey === undefined || options.apiKey === '') {
      throw new ConfigurationError('API key is required');
    }
    if (options.apiSecret === null || options.apiSecret === undefined || options.apiSecret === '') {
      throw new ConfigurationError('API secret is required');
    }
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/$/, '');
    this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
  }

  /**
   * Classify a form submission.
   *
   * Input is validated locally first; a {@link ValidationError} is thrown
   * without contacting the API if name, email or message is unusable.
   */
  async checkSpam(input: SpamCheckInput): Promise<SpamCheckResult> {
    this.validateInput(input);

    const payload = {
      spam_check: {
        name: input.name,
        email: input.email,
        message: input.message,
        additional_fields: input.customFields ?? {},
        end_user_ip: input.endUserIp,
      },
    };

    const response = await this.request('POST', `/api/${API_VERSION}/spam_checks`, payload);
    try {
      return SpamCheckResult.fromJSON(JSON.parse(response.body));
    } catch {
      throw new ApiError('API request failed', { statusCode: response.status, responseBody: response.body });
    }
  }

  /** True when the service is up, false when it answers 503. Other failures throw. */
  async healthCheck(): Promise<boolean> {
    try {
      await this.request('GET', '/up');
      return true;
    } catch (err) {
      if (err instanceof ApiError && err.statusCode === 503) return false;
      throw err;
    }
  }

  private validateInput(input: SpamCheckInput): void {
    const errors: Record<string, string[]> = {};
    const add = (field: string, message: string) => {
      (errors[field] ??= []).push(message);
    };

    if (isBlank(input.name)) add('name', "can't be blank");
    if (isBlank(input.email)) {
      add('email', "can't be blank");
    } else if (!EMAIL_PATTERN.test(input.email)) {
      add('email', 'is not a valid email address');
    }
    if (isBlank(input.message)) add('message', "can't be blank");

    if (Object.keys(errors).length > 0) {
      throw new ValidationError('Validation failed', errors);
    }
  }

  private async request(method: 'GET' | 'POST', path: string, body?: unknown): Promise<RawResponse> {
    const url = `${this.baseUrl}${path}`;
    debug('is-it-spam', `${method} ${url}`);

    let response: Response;
    let text: string;
    try {
      response = await fetch(url, {
        method,
        headers: {
          'Content-Type': 'application/json',
          'X-API-Key': this.apiKey,
          'X-API-Secret': this.apiSecret,
          'User-Agent': USER_AGENT,
        },
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeout * 1000),
      });
      text = await response.text();
    } catch (err) {
      throw new ApiError(`Request failed: ${err instanceof Error ? err.message : String(err)}`);
    }

    debug('is-it-spam', `${method} ${url} -> ${response.status}`);
    return this.handleResponse({ status: response.status, body: text });
  }

  private handleResponse(response: RawResponse): RawResponse {
    const { status, body } = response;
    const details = { statusCode: status, responseBody: body };

    if (status >= 200 && status <= 299) return response;

    if (status === 400 || status === 401 || (status >= 500 && status <= 599)) {
      throw new ApiError(errorMessage(body, 'API request failed'), details);
    }
    if (status === 404) {
      throw new ApiError('Endpoint not found', details);
    }
    if (status === 422) {
      const data = parseJson(body);
      const message = isRecord(data) && typeof data.error === 'string' ? data.error : 'Validation failed';
      const errors = isRecord(data) ? fieldErrors(data.errors) : {};
      throw new ValidationError(message, errors, details);
    }
    if (status === 429) {
      throw new RateLimitError(errorMessage(body, 'API request failed'), details);
    }
    throw new ApiError(`Unexpected response code: ${status}`, details);
  }
}
