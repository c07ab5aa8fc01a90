/**
 * Check one submission with the client directly.
 *
 * Run:
 *   IS_IT_SPAM_API_KEY=... IS_IT_SPAM_API_SECRET=... npx tsx examples/check-submission.ts
 */
import { resolveConfig, ValidationError, RateLimitError, IsItSpamError } from 'is-it-spam';

const config = resolveConfig();

try {
  const result = await config.client().checkSpam({
    name: 'Jane Doe',
    email: 'jane@example.com',
    message: 'Would you paint a portrait of my cat?',
    customFields: { budget: '300' },
  });
  console.log(result.summary());
} catch (err) {
  if (err instanceof ValidationError) {
    console.error('Invalid submission:', err.errors);
  } else if (err instanceof RateLimitError) {
    console.error('Slow down:', err.message);
  } else if (err instanceof IsItSpamError) {
    console.error(`Spam check failed (${err.statusCode ?? 'no response'}):`, err.message);
  } else {
    throw err;
  }
}
