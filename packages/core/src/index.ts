// @is-it-spam/core: public API

// Client
export {
  IsItSpamClient,
  DEFAULT_BASE_URL,
  DEFAULT_TIMEOUT,
  API_VERSION,
  type IsItSpamClientOptions,
  type SpamCheckInput,
} from './client.js';
export { SpamCheckResult, type SpamCheckResultData } from './result.js';
export { VERSION, USER_AGENT } from './version.js';

// Errors
export {
  IsItSpamError,
  ConfigurationError,
  ApiError,
  ValidationError,
  RateLimitError,
  type ErrorResponseDetails,
} from './errors.js';

// Config
export {
  Configuration,
  resolveConfig,
  credentialsPath,
  loadCredentialsFile,
  DEFAULT_SETTINGS,
  CREDENTIALS_FILE,
  type IsItSpamSettings,
  type ResolveConfigOptions,
} from './config.js';

// Request parameters & field extraction
export { toParams, scalar, nested, scalarAt, nestedAt, type ParamValue, type ParamFields } from './params.js';
export { extractFormFields, FORM_PARAM_KEYS, type ExtractOptions, type ExtractedFields } from './extractor.js';

// Spam gate
export {
  SpamGate,
  redirectTo,
  resolveRedirect,
  resolveTarget,
  type RedirectTarget,
  type FlashMessages,
  type OnSpamOptions,
  type SpamGateOptions,
  type SpamGateDeps,
  type GateContext,
  type GateOutcome,
} from './gate.js';

// Logging
export { debug, consoleLogger, type Logger } from './debug.js';
