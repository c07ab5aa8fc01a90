import type { NextFunction, Request, Response } from 'express';
import {
  Configuration,
  SpamGate,
  toParams,
  type FlashMessages,
  type SpamCheckResult,
  type SpamGateDeps,
  type SpamGateOptions,
} from '@is-it-spam/core';

declare global {
  namespace Express {
    interface Request {
      spamCheckResult?: SpamCheckResult;
    }
  }
}

/** The parts of an Express request the middleware touches. */
export type SpamCheckRequest = Pick<Request, 'body' | 'ip'> & { spamCheckResult?: SpamCheckResult };
export type SpamCheckResponse = Pick<Response, 'locals' | 'redirect'>;

export type FlashHandler = (req: SpamCheckRequest, messages: FlashMessages) => void;

export interface SpamCheckMiddlewareOptions extends SpamGateOptions {
  /** Stores flash messages before a spam redirect. Defaults to connect-flash's `req.flash` when present. */
  flash?: FlashHandler;
}

interface ConnectFlash {
  flash(type: string, message: string): unknown;
}

function hasConnectFlash<T extends object>(req: T): req is T & ConnectFlash {
  return 'flash' in req && typeof req.flash === 'function';
}

function storeFlash(req: SpamCheckRequest, messages: FlashMessages, flash: FlashHandler | undefined): void {
  if (flash) {
    flash(req, messages);
    return;
  }
  if (!hasConnectFlash(req)) return;
  if (messages.notice) req.flash('notice', messages.notice);
  if (messages.alert) req.flash('alert', messages.alert);
}

/**
 * Express middleware that checks the submitted form before the route handler.
 *
 * The result lands on `req.spamCheckResult` and `res.locals.spamCheckResult`.
 * Spam is redirected when `onSpam` is set; otherwise, and whenever the check
 * is skipped or fails, the request continues to the handler.
 *
 * @example
 * app.post('/contact', createSpamCheckMiddleware(config, {
 *   onSpam: { redirectTo: redirectTo('/thanks'), notice: 'Thank you' },
 * }), handleContact);
 */
export function createSpamCheckMiddleware(
  source: Configuration | SpamGateDeps,
  options: SpamCheckMiddlewareOptions = {},
) {
  const { flash, ...gateOptions } = options;
  const gate = source instanceof Configuration
    ? SpamGate.fromConfiguration(source, gateOptions)
    : new SpamGate(source, gateOptions);

  return async (req: SpamCheckRequest, res: SpamCheckResponse, next: NextFunction): Promise<void> => {
    try {
      const outcome = await gate.check({
        params: toParams(req.body),
        endUserIp: req.ip,
        attachResult: (result) => {
          req.spamCheckResult = result;
          res.locals.spamCheckResult = result;
        },
        redirect: (path, messages) => {
          storeFlash(req, messages, flash);
          res.redirect(path);
        },
      });
      if (outcome.status === 'redirected') return;
      next();
    } catch (err) {
      next(err);
    }
  };
}
