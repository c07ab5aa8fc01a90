/**
 * A contact form guarded by is-it-spam.
 *
 * Prerequisites:
 *   npm run cli -- init   (then add your API key and secret)
 *
 * Run:
 *   npx tsx examples/contact-form.ts
 */
import express from 'express';
import {
  resolveConfig,
  redirectTo,
  createSpamCheckMiddleware,
  createHealthRoutes,
} from 'is-it-spam';

const config = resolveConfig();
const app = express();

app.use(express.urlencoded({ extended: true }));
app.use(express.json());
app.use(createHealthRoutes(config));

app.get('/', (_req, res) => {
  res.type('html').send(`
    <form method="post" action="/contact">
      <input name="contact[name]" placeholder="Name">
      <input name="contact[email]" placeholder="Email">
      <textarea name="contact[message]"></textarea>
      <button>Send</button>
    </form>
  `);
});

// Spam goes back to the form; the handler never sees it
app.post(
  '/contact',
  createSpamCheckMiddleware(config, {
    onSpam: { redirectTo: redirectTo('/'), notice: 'Thank you for your message' },
  }),
  (req, res) => {
    const result = req.spamCheckResult;
    res.json({ received: true, checked: result !== undefined, confidence: result?.confidence });
  },
);

// Manual mode: no onSpam, so the handler decides
app.post(
  '/commission',
  createSpamCheckMiddleware(config, { customFields: { budget: 'budget' } }),
  (req, res) => {
    if (req.spamCheckResult?.isSpam()) {
      res.status(422).json({ error: 'Your request looks like spam', reasons: req.spamCheckResult.reasons });
      return;
    }
    res.status(201).json({ received: true });
  },
);

const port = Number(process.env.PORT ?? 3000);
app.listen(port, '127.0.0.1', () => {
  console.log(`[example] Contact form on http://127.0.0.1:${port}`);
});
