import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import {
  ApiError,
  Configuration,
  IsItSpamClient,
  SpamCheckResult,
  redirectTo,
  type FlashMessages,
} from '@is-it-spam/core';
import { createSpamCheckMiddleware, type SpamCheckRequest } from '../middleware/spam-check.js';

const legitimate = SpamCheckResult.fromJSON({ spam: false, confidence: 0.1, reasons: [] });
const spam = SpamCheckResult.fromJSON({ spam: true, confidence: 0.95, reasons: ['Contains suspicious links'] });

const contactBody = {
  contact: { name: 'Jane Doe', email: 'jane@example.com', message: 'Do you take commissions?' },
};

describe('createSpamCheckMiddleware', () => {
  const logger = { warn: vi.fn(), error: vi.fn() };
  let config: Configuration;
  let client: IsItSpamClient;
  let mockResponse: { locals: Record<string, unknown>; redirect: Mock };
  let mockNext: Mock;

  beforeEach(() => {
    vi.clearAllMocks();
    config = new Configuration({ apiKey: 'test-key', apiSecret: 'test-secret' }, logger);
    client = config.client();
    mockResponse = { locals: {}, redirect: vi.fn() };
    mockNext = vi.fn();
  });

  function request(body: unknown, flash?: Mock): SpamCheckRequest {
    const req = { body, ip: '203.0.113.7', flash };
    return req;
  }

  it('attaches a legitimate result and calls next', async () => {
    vi.spyOn(client, 'checkSpam').mockResolvedValueOnce(legitimate);
    const req = request(contactBody);

    await createSpamCheckMiddleware(config)(req, mockResponse, mockNext);

    expect(req.spamCheckResult).toBe(legitimate);
    expect(mockResponse.locals.spamCheckResult).toBe(legitimate);
    expect(mockResponse.redirect).not.toHaveBeenCalled();
    expect(mockNext).toHaveBeenCalledWith();
  });

  it('forwards the request IP', async () => {
    const checkSpam = vi.spyOn(client, 'checkSpam').mockResolvedValueOnce(legitimate);

    await createSpamCheckMiddleware(config)(request(contactBody), mockResponse, mockNext);

    expect(checkSpam).toHaveBeenCalledWith(expect.objectContaining({ endUserIp: '203.0.113.7' }));
  });

  it('redirects spam without calling next', async () => {
    vi.spyOn(client, 'checkSpam').mockResolvedValueOnce(spam);
    const req = request(contactBody);

    await createSpamCheckMiddleware(config, {
      onSpam: { redirectTo: redirectTo('/thanks'), notice: 'Thank you' },
    })(req, mockResponse, mockNext);

    expect(mockResponse.redirect).toHaveBeenCalledWith('/thanks');
    expect(mockNext).not.toHaveBeenCalled();
    expect(req.spamCheckResult).toBe(spam);
  });

  it('hands flash messages to the flash option', async () => {
    vi.spyOn(client, 'checkSpam').mockResolvedValueOnce(spam);
    const flashed: FlashMessages[] = [];

    await createSpamCheckMiddleware(config, {
      onSpam: { redirectTo: redirectTo('/error'), alert: 'There was an issue' },
      flash: (_req, messages) => { flashed.push(messages); },
    })(request(contactBody), mockResponse, mockNext);

    expect(flashed).toEqual([{ alert: 'There was an issue' }]);
  });

  it('falls back to connect-flash when the request has req.flash', async () => {
    vi.spyOn(client, 'checkSpam').mockResolvedValueOnce(spam);
    const flash = vi.fn();

    await createSpamCheckMiddleware(config, {
      onSpam: { redirectTo: redirectTo('/thanks'), notice: 'Thank you', alert: 'Flagged' },
    })(request(contactBody, flash), mockResponse, mockNext);

    expect(flash).toHaveBeenNthCalledWith(1, 'notice', 'Thank you');
    expect(flash).toHaveBeenNthCalledWith(2, 'alert', 'Flagged');
  });

  it('continues without a result when the flash handler throws', async () => {
    vi.spyOn(client, 'checkSpam').mockResolvedValueOnce(spam);
    const req = request(contactBody);

    await createSpamCheckMiddleware(config, {
      onSpam: { redirectTo: redirectTo('/thanks'), notice: 'Thank you' },
      flash: () => { throw new Error('session store unavailable'); },
    })(req, mockResponse, mockNext);

    expect(req.spamCheckResult).toBeUndefined();
    expect(mockResponse.locals.spamCheckResult).toBeUndefined();
    expect(mockResponse.redirect).not.toHaveBeenCalled();
    expect(mockNext).toHaveBeenCalledWith();
    expect(logger.error).toHaveBeenCalledWith('Spam check unexpected error: session store unavailable');
  });

  it('leaves spam to the handler without onSpam', async () => {
    vi.spyOn(client, 'checkSpam').mockResolvedValueOnce(spam);
    const req = request(contactBody);

    await createSpamCheckMiddleware(config)(req, mockResponse, mockNext);

    expect(req.spamCheckResult?.isSpam()).toBe(true);
    expect(mockNext).toHaveBeenCalledWith();
  });

  it('skips the check when fields are missing', async () => {
    const checkSpam = vi.spyOn(client, 'checkSpam');
    const req = request({ contact: { name: 'John Doe', email: '', message: 'Test' } });

    await createSpamCheckMiddleware(config)(req, mockResponse, mockNext);

    expect(checkSpam).not.toHaveBeenCalled();
    expect(req.spamCheckResult).toBeUndefined();
    expect(mockNext).toHaveBeenCalledWith();
  });

  it('skips when the body was never parsed', async () => {
    await createSpamCheckMiddleware(config)(request(undefined), mockResponse, mockNext);
    expect(mockNext).toHaveBeenCalledWith();
  });

  it('lets the request through when the API is down', async () => {
    vi.spyOn(client, 'checkSpam').mockRejectedValueOnce(new ApiError('Service unavailable', { statusCode: 503 }));
    const req = request(contactBody);

    await createSpamCheckMiddleware(config, { onSpam: { redirectTo: redirectTo('/thanks') } })(
      req,
      mockResponse,
      mockNext,
    );

    expect(req.spamCheckResult).toBeUndefined();
    expect(mockResponse.redirect).not.toHaveBeenCalled();
    expect(mockNext).toHaveBeenCalledWith();
    expect(logger.error).toHaveBeenCalledWith('Spam check API error: Service unavailable');
  });

  it('reads the form from a custom param key', async () => {
    const checkSpam = vi.spyOn(client, 'checkSpam').mockResolvedValueOnce(legitimate);

    await createSpamCheckMiddleware(config, { paramKey: 'lead', customFields: { company: 'company_name' } })(
      request({ lead: { name: 'Ann', email: 'ann@example.com', message: 'Hi', company_name: 'Acme' } }),
      mockResponse,
      mockNext,
    );

    expect(checkSpam).toHaveBeenCalledWith({
      name: 'Ann',
      email: 'ann@example.com',
      message: 'Hi',
      customFields: { company: 'Acme' },
      endUserIp: '203.0.113.7',
    });
  });

  it('accepts gate dependencies instead of a configuration', async () => {
    const other = new IsItSpamClient({ apiKey: 'k', apiSecret: 's' });
    const checkSpam = vi.spyOn(other, 'checkSpam').mockResolvedValueOnce(legitimate);

    await createSpamCheckMiddleware({ client: () => other, logger, trackEndUserIp: false })(
      request(contactBody),
      mockResponse,
      mockNext,
    );

    expect(checkSpam).toHaveBeenCalledWith(expect.objectContaining({ endUserIp: undefined }));
    expect(mockNext).toHaveBeenCalledWith();
  });

  it('passes errors thrown outside the gate to next', async () => {
    const failure = new Error('body getter exploded');
    const req = request(contactBody);
    Object.defineProperty(req, 'body', { get: () => { throw failure; } });

    await createSpamCheckMiddleware(config)(req, mockResponse, mockNext);

    expect(mockNext).toHaveBeenCalledWith(failure);
  });
});
