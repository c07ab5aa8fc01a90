// is-it-spam: client, Express middleware and CLI commands in one import

export * from '@is-it-spam/core';
export * from '@is-it-spam/express';
export {
  runCli,
  cmdInit,
  cmdHealth,
  cmdCheck,
  printUsage,
  parseCustomFields,
  CREDENTIALS_TEMPLATE,
  EXIT_OK,
  EXIT_FAILURE,
  EXIT_SPAM,
  type CommandContext,
} from './commands.js';
