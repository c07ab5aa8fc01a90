import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';
import JSON5 from 'json5';
import { IsItSpamClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT } from './client.js';
import { ConfigurationError } from './errors.js';
import { consoleLogger, type Logger } from './debug.js';

export interface IsItSpamSettings {
  apiKey?: string;
  apiSecret?: string;
  baseUrl: string;
  /** Request timeout in seconds */
  timeout: number;
  /** Forward the submitter's IP address with each check */
  trackEndUserIp: boolean;
}

export const DEFAULT_SETTINGS: IsItSpamSettings = {
  baseUrl: DEFAULT_BASE_URL,
  timeout: DEFAULT_TIMEOUT,
  trackEndUserIp: true,
};

/** Where `is-it-spam init` writes the credentials file, relative to the project root. */
export const CREDENTIALS_FILE = join('config', 'is-it-spam.json5');

/**
 * Settings for talking to is-it-spam.com, plus the client built from them.
 *
 * Constructed once at startup and passed to whatever needs a client. The
 * client is built lazily and cached until {@link resetClient} or
 * {@link configure} is called.
 */
export class Configuration implements IsItSpamSettings {
  apiKey?: string;
  apiSecret?: string;
  baseUrl: string;
  timeout: number;
  trackEndUserIp: boolean;
  logger: Logger;
  private cachedClient: IsItSpamClient | null = null;

  constructor(settings: Partial<IsItSpamSettings> = {}, logger: Logger = consoleLogger) {
    this.apiKey = settings.apiKey;
    this.apiSecret = settings.apiSecret;
    this.baseUrl = settings.baseUrl ?? DEFAULT_SETTINGS.baseUrl;
    this.timeout = settings.timeout ?? DEFAULT_SETTINGS.timeout;
    this.trackEndUserIp = settings.trackEndUserIp ?? DEFAULT_SETTINGS.trackEndUserIp;
    this.logger = logger;
  }

  /** Apply setup code and drop the cached client so the changes take effect. */
  configure(apply: (config: Configuration) => void): this {
    apply(this);
    this.resetClient();
    return this;
  }

  /** @throws ConfigurationError when credentials are missing */
  client(): IsItSpamClient {
    if (!this.cachedClient) {
      this.cachedClient = new IsItSpamClient({
        apiKey: this.apiKey,
        apiSecret: this.apiSecret,
        baseUrl: this.baseUrl,
        timeout: this.timeout,
      });
    }
    return this.cachedClient;
  }

  resetClient(): void {
    this.cachedClient = null;
  }

  isValid(): boolean {
    return !!this.apiKey && !!this.apiSecret;
  }

  validate(): void {
    if (!this.apiKey) throw new ConfigurationError('API key is required');
    if (!this.apiSecret) throw new ConfigurationError('API secret is required');
  }

  toSettings(): IsItSpamSettings {
    return {
      apiKey: this.apiKey,
      apiSecret: this.apiSecret,
      baseUrl: this.baseUrl,
      timeout: this.timeout,
      trackEndUserIp: this.trackEndUserIp,
    };
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

function parseTimeout(value: unknown): number | undefined {
  if (typeof value === 'string' && value.trim() === '') return undefined;
  const n = typeof value === 'number' || typeof value === 'string' ? Number(value) : NaN;
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

function parseFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === '') return undefined;
  return !['0', 'false', 'no', 'off'].includes(value.trim().toLowerCase());
}

/** Keep only the known, well-typed keys of a parsed credentials file. */
function pickSettings(data: unknown): Partial<IsItSpamSettings> {
  if (typeof data !== 'object' || data === null || Array.isArray(data)) return {};
  const picked: Partial<IsItSpamSettings> = {};
  for (const [key, value] of Object.entries(data)) {
    switch (key) {
      case 'apiKey':
      case 'apiSecret':
      case 'baseUrl':
        if (typeof value === 'string' && value !== '') picked[key] = value;
        break;
      case 'timeout': {
        const timeout = parseTimeout(value);
        if (timeout !== undefined) picked.timeout = timeout;
        break;
      }
      case 'trackEndUserIp':
        if (typeof value === 'boolean') picked.trackEndUserIp = value;
        break;
    }
  }
  return picked;
}

/** Copy the defined values of `source` onto `target`. */
function assignDefined(target: IsItSpamSettings, source: Partial<IsItSpamSettings>): void {
  if (source.apiKey !== undefined) target.apiKey = source.apiKey;
  if (source.apiSecret !== undefined) target.apiSecret = source.apiSecret;
  if (source.baseUrl !== undefined) target.baseUrl = source.baseUrl;
  if (source.timeout !== undefined) target.timeout = source.timeout;
  if (source.trackEndUserIp !== undefined) target.trackEndUserIp = source.trackEndUserIp;
}

/** Path of the credentials file: IS_IT_SPAM_CREDENTIALS_PATH, else config/is-it-spam.json5 under cwd. */
export function credentialsPath(cwd: string = process.cwd()): string {
  const fromEnv = nonEmpty(process.env.IS_IT_SPAM_CREDENTIALS_PATH);
  return fromEnv ? resolve(cwd, fromEnv) : join(cwd, CREDENTIALS_FILE);
}

/** Read the JSON5 credentials file. Missing → `{}`; malformed → `{}` with a warning. */
export function loadCredentialsFile(path: string, logger: Logger = consoleLogger): Partial<IsItSpamSettings> {
  if (!existsSync(path)) return {};
  try {
    return pickSettings(JSON5.parse(readFileSync(path, 'utf-8')));
  } catch {
    logger.warn(`Ignoring malformed credentials file: ${path}`);
    return {};
  }
}

export interface ResolveConfigOptions {
  cwd?: string;
  logger?: Logger;
}

/**
 * Build a {@link Configuration} from defaults, the environment, the
 * credentials file and `overrides`, later sources winning. The credentials
 * file is preferred over environment variables.
 */
export function resolveConfig(
  overrides: Partial<IsItSpamSettings> = {},
  options: ResolveConfigOptions = {},
): Configuration {
  const env = process.env;
  const logger = options.logger ?? consoleLogger;

  const fromEnv: Partial<IsItSpamSettings> = {
    apiKey: nonEmpty(env.IS_IT_SPAM_API_KEY),
    apiSecret: nonEmpty(env.IS_IT_SPAM_API_SECRET),
    baseUrl: nonEmpty(env.IS_IT_SPAM_BASE_URL),
    timeout: parseTimeout(env.IS_IT_SPAM_TIMEOUT),
    trackEndUserIp: parseFlag(env.IS_IT_SPAM_TRACK_END_USER_IP),
  };
  const fromFile = loadCredentialsFile(credentialsPath(options.cwd), logger);

  const settings: IsItSpamSettings = { ...DEFAULT_SETTINGS };
  for (const source of [fromEnv, fromFile, overrides]) {
    assignDefined(settings, source);
  }
  return new Configuration(settings, logger);
}
