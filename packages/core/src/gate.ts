import type { IsItSpamClient } from './client.js';
import type { Configuration } from './config.js';
import { ApiError, RateLimitError, ValidationError } from './errors.js';
import { extractFormFields } from './extractor.js';
import type { ParamFields } from './params.js';
import type { SpamCheckResult } from './result.js';
import { consoleLogger, type Logger } from './debug.js';

/** Where to send a submission flagged as spam. */
export type RedirectTarget =
  | { kind: 'literal'; path: string }
  | { kind: 'resolver'; resolve: () => string };

export function redirectTo(path: string): RedirectTarget {
  return { kind: 'literal', path };
}

/** Target computed when the redirect happens, e.g. from a route helper. */
export function resolveRedirect(resolve: () => string): RedirectTarget {
  return { kind: 'resolver', resolve };
}

export function resolveTarget(target: RedirectTarget): string {
  switch (target.kind) {
    case 'literal':
      return target.path;
    case 'resolver':
      return target.resolve();
  }
}

export interface FlashMessages {
  notice?: string;
  alert?: string;
}

export interface OnSpamOptions extends FlashMessages {
  /** Defaults to `/` */
  redirectTo?: RedirectTarget;
}

export interface SpamGateOptions {
  /** Top-level parameter key the form is nested under */
  paramKey?: string;
  /** API field name → parameter key, sent as additional fields */
  customFields?: Readonly<Record<string, string>>;
  /** Redirect spam automatically; without it, or when empty, the host inspects the attached result */
  onSpam?: OnSpamOptions;
}

/** The host framework's view of the request being checked. */
export interface GateContext {
  params: ParamFields;
  endUserIp?: string;
  attachResult(result: SpamCheckResult): void;
  redirect(path: string, flash: FlashMessages): void;
}

export type GateOutcome =
  | { status: 'skipped' }
  | { status: 'checked'; result: SpamCheckResult }
  | { status: 'redirected'; result: SpamCheckResult; path: string }
  | { status: 'failed'; error: unknown };

export interface SpamGateDeps {
  /** Called per check so a reset client is picked up */
  client: () => IsItSpamClient;
  logger?: Logger;
  trackEndUserIp?: boolean;
}

const isBlank = (value: string) => value.trim() === '';

/** An empty `onSpam` leaves spam to the host, like omitting it. */
const hasSpamHandling = (onSpam: OnSpamOptions) =>
  onSpam.redirectTo !== undefined || !!onSpam.notice || !!onSpam.alert;

/**
 * Runs one spam check per request before the handler.
 *
 * Fails open: a missing field skips the check, and any error from the client
 * is logged and swallowed, so the request always proceeds unless spam was
 * detected and `onSpam` asked for a redirect.
 */
export class SpamGate {
  private readonly logger: Logger;
  private readonly trackEndUserIp: boolean;

  constructor(private readonly deps: SpamGateDeps, private readonly options: SpamGateOptions = {}) {
    this.logger = deps.logger ?? consoleLogger;
    this.trackEndUserIp = deps.trackEndUserIp ?? true;
  }

  static fromConfiguration(config: Configuration, options: SpamGateOptions = {}): SpamGate {
    return new SpamGate(
      {
        client: () => config.client(),
        logger: config.logger,
        trackEndUserIp: config.trackEndUserIp,
      },
      options,
    );
  }

  async check(ctx: GateContext): Promise<GateOutcome> {
    const fields = extractFormFields(ctx.params, {
      paramKey: this.options.paramKey,
      customFields: this.options.customFields,
    });
    if (isBlank(fields.name) || isBlank(fields.email) || isBlank(fields.message)) {
      return { status: 'skipped' };
    }

    try {
      const result = await this.deps.client().checkSpam({
        name: fields.name,
        email: fields.email,
        message: fields.message,
        customFields: fields.customFields,
        endUserIp: this.trackEndUserIp ? ctx.endUserIp : undefined,
      });

      this.logger.debug?.(`Spam check: ${result.summary()}`);

      const onSpam = this.options.onSpam;
      if (result.isSpam() && onSpam && hasSpamHandling(onSpam)) {
        const path = resolveTarget(onSpam.redirectTo ?? redirectTo('/'));
        const flash: FlashMessages = {};
        if (onSpam.notice) flash.notice = onSpam.notice;
        if (onSpam.alert) flash.alert = onSpam.alert;
        ctx.redirect(path, flash);
        // Attach only after a successful redirect
        ctx.attachResult(result);
        return { status: 'redirected', result, path };
      }
      ctx.attachResult(result);
      return { status: 'checked', result };
    } catch (err) {
      this.report(err);
      return { status: 'failed', error: err };
    }
  }

  private report(err: unknown): void {
    const message = err instanceof Error ? err.message : String(err);
    if (err instanceof ValidationError) {
      this.logger.warn(`Spam check validation failed: ${message}`);
    } else if (err instanceof RateLimitError) {
      this.logger.warn(`Spam check rate limit exceeded: ${message}`);
    } else if (err instanceof ApiError) {
      this.logger.error(`Spam check API error: ${message}`);
    } else {
      this.logger.error(`Spam check unexpected error: ${message}`);
    }
  }
}
