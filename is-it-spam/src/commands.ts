import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { parseArgs } from 'node:util';
import JSON5 from 'json5';
import {
  CREDENTIALS_FILE,
  ValidationError,
  resolveConfig,
  type Configuration,
  type SpamCheckInput,
} from '@is-it-spam/core';
import { c, createUi, type Print, type Ui } from './format.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_SPAM = 2;

export interface CommandContext {
  /** Project root; the credentials file lives under it */
  cwd: string;
  print: Print;
  /** Defaults to {@link resolveConfig} rooted at `cwd` */
  loadConfig?: () => Configuration;
}

export const CREDENTIALS_TEMPLATE = `// Credentials for is-it-spam.com
// Get yours from the dashboard at https://is-it-spam.com/dashboard
//
// Keep this file out of version control. Any key left out here is read
// from the environment instead: IS_IT_SPAM_API_KEY, IS_IT_SPAM_API_SECRET,
// IS_IT_SPAM_BASE_URL, IS_IT_SPAM_TIMEOUT, IS_IT_SPAM_TRACK_END_USER_IP.
{
  // apiKey: 'your_api_key_here',
  // apiSecret: 'your_api_secret_here',

  // Optional
  // baseUrl: 'https://is-it-spam.com',
  // timeout: 30,           // request timeout in seconds
  // trackEndUserIp: true,  // send the submitter's IP address with each check
}
`;

const errorMessage = (err: unknown) => (err instanceof Error ? err.message : String(err));

function loadConfig(ctx: CommandContext): Configuration {
  return ctx.loadConfig ? ctx.loadConfig() : resolveConfig({}, { cwd: ctx.cwd });
}

/** Fail with a hint when credentials are missing; true when the command may go on. */
function ensureCredentials(config: Configuration, ui: Ui): boolean {
  try {
    config.validate();
    return true;
  } catch (err) {
    ui.fail(errorMessage(err));
    ui.info(`Add them to ${CREDENTIALS_FILE} or set IS_IT_SPAM_API_KEY and IS_IT_SPAM_API_SECRET.`);
    return false;
  }
}

// --- init ---

export function cmdInit(ctx: CommandContext, options: { force?: boolean } = {}): number {
  const ui = createUi(ctx.print);
  const path = join(ctx.cwd, CREDENTIALS_FILE);

  if (existsSync(path) && !options.force) {
    ui.fail(`${CREDENTIALS_FILE} already exists. Run with --force to overwrite it.`);
    return EXIT_FAILURE;
  }

  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, CREDENTIALS_TEMPLATE, { mode: 0o600 });
  ui.ok(`Created ${CREDENTIALS_FILE}`);

  ui.log('');
  ui.log(`  ${c.bold('Next steps:')}`);
  ui.log(`    1. Add your API key and secret to ${c.cyan(CREDENTIALS_FILE)}`);
  ui.log(`    2. Add ${c.cyan(CREDENTIALS_FILE)} to .gitignore`);
  ui.log('    3. Put the spam check in front of your form routes:');
  ui.log('');
  ui.log(c.dim("    app.post('/contact', createSpamCheckMiddleware(resolveConfig(), {"));
  ui.log(c.dim("      onSpam: { redirectTo: redirectTo('/'), notice: 'Thank you for your message' },"));
  ui.log(c.dim('    }), handleContact);'));
  ui.log('');
  ui.log(`  Docs: ${c.cyan('https://is-it-spam.com/docs')}`);
  ui.log('');
  return EXIT_OK;
}

// --- health ---

export async function cmdHealth(ctx: CommandContext): Promise<number> {
  const ui = createUi(ctx.print);
  const config = loadConfig(ctx);
  if (!ensureCredentials(config, ui)) return EXIT_FAILURE;

  try {
    const healthy = await config.client().healthCheck();
    if (healthy) {
      ui.ok(`is-it-spam.com is up ${c.dim(`(${config.baseUrl})`)}`);
      return EXIT_OK;
    }
    ui.fail(`is-it-spam.com is unavailable ${c.dim(`(${config.baseUrl})`)}`);
    return EXIT_FAILURE;
  } catch (err) {
    ui.fail(`Health check failed: ${errorMessage(err)}`);
    return EXIT_FAILURE;
  }
}

// --- check ---

export async function cmdCheck(ctx: CommandContext, input: SpamCheckInput): Promise<number> {
  const ui = createUi(ctx.print);
  const config = loadConfig(ctx);
  if (!ensureCredentials(config, ui)) return EXIT_FAILURE;

  try {
    const result = await config.client().checkSpam(input);
    if (result.isSpam()) {
      ui.fail(result.summary());
      return EXIT_SPAM;
    }
    ui.ok(result.summary());
    return EXIT_OK;
  } catch (err) {
    ui.fail(`Spam check failed: ${errorMessage(err)}`);
    if (err instanceof ValidationError) {
      for (const [field, messages] of Object.entries(err.errors)) {
        for (const message of messages) ui.info(`${field} ${message}`);
      }
    }
    return EXIT_FAILURE;
  }
}

/** Parse the `--fields` option: a JSON5 object of scalar values. */
export function parseCustomFields(raw: string | undefined): Record<string, string> {
  if (raw === undefined) return {};
  const data: unknown = JSON5.parse(raw);
  if (typeof data !== 'object' || data === null || Array.isArray(data)) {
    throw new TypeError('--fields must be an object, e.g. "{ company: \'Acme\' }"');
  }
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(data)) {
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw new TypeError(`--fields value for "${key}" must be a string, number or boolean`);
    }
    fields[key] = String(value);
  }
  return fields;
}

// --- help ---

export function printUsage(print: Print): void {
  const ui = createUi(print);
  ui.log('');
  ui.log(`  ${c.bgCyan(' is-it-spam ')} ${c.dim('Spam checks for your forms via is-it-spam.com')}`);
  ui.log('');
  ui.log('  Commands:');
  ui.log(`    ${c.green('is-it-spam init')} [--force]      Create ${CREDENTIALS_FILE}`);
  ui.log(`    ${c.green('is-it-spam health')}              Check that the API is reachable`);
  ui.log(`    ${c.green('is-it-spam check')} --name N --email E --message M [--ip IP] [--fields JSON5]`);
  ui.log('                                   Check one submission (exit 2 when spam)');
  ui.log(`    ${c.green('is-it-spam help')}                Show this help`);
  ui.log('');
}

/** Parse `argv` (without node and script), run the command and return its exit code. */
export async function runCli(argv: readonly string[], ctx: CommandContext): Promise<number> {
  const [command, ...args] = argv;
  const ui = createUi(ctx.print);

  try {
    switch (command) {
      case 'init': {
        const { values } = parseArgs({ args, options: { force: { type: 'boolean' } } });
        return cmdInit(ctx, { force: values.force === true });
      }
      case 'health':
        parseArgs({ args, options: {} });
        return await cmdHealth(ctx);
      case 'check': {
        const { values } = parseArgs({
          args,
          options: {
            name: { type: 'string' },
            email: { type: 'string' },
            message: { type: 'string' },
            ip: { type: 'string' },
            fields: { type: 'string' },
          },
        });
        return await cmdCheck(ctx, {
          name: values.name ?? '',
          email: values.email ?? '',
          message: values.message ?? '',
          endUserIp: values.ip,
          customFields: parseCustomFields(values.fields),
        });
      }
      case undefined:
      case 'help':
      case '--help':
      case '-h':
        printUsage(ctx.print);
        return EXIT_OK;
      default:
        ui.fail(`Unknown command: ${command}`);
        printUsage(ctx.print);
        return EXIT_FAILURE;
    }
  } catch (err) {
    ui.fail(errorMessage(err));
    return EXIT_FAILURE;
  }
}
