import { nestedAt, scalarAt, type ParamFields } from './params.js';

/** Top-level keys that commonly wrap a contact form, in lookup order. */
export const FORM_PARAM_KEYS = ['commission', 'contact', 'inquiry', 'message', 'form'] as const;

export interface ExtractOptions {
  /** Top-level key the form is nested under; tried before {@link FORM_PARAM_KEYS} */
  paramKey?: string;
  /** API field name → parameter key, read from the same scope as the form */
  customFields?: Readonly<Record<string, string>>;
}

export interface ExtractedFields {
  name: string;
  email: string;
  message: string;
  customFields: Record<string, string>;
}

function fromScope(scope: ParamFields, customFields: Readonly<Record<string, string>>): ExtractedFields {
  // Without a single name field, first and last name are joined; either may be missing.
  const name =
    scalarAt(scope, 'name') ??
    `${scalarAt(scope, 'first_name') ?? ''} ${scalarAt(scope, 'last_name') ?? ''}`.trim();

  const extra: Record<string, string> = {};
  for (const [apiField, paramKey] of Object.entries(customFields)) {
    const value = scalarAt(scope, paramKey);
    if (value !== undefined) extra[apiField] = value;
  }

  return {
    name,
    email: scalarAt(scope, 'email') ?? '',
    message: scalarAt(scope, 'message') ?? scalarAt(scope, 'body') ?? scalarAt(scope, 'content') ?? '',
    customFields: extra,
  };
}

/**
 * Locate name, email and message in request parameters without knowing the
 * form's schema. Looks under `paramKey`, then under the first of
 * {@link FORM_PARAM_KEYS} holding a nested mapping, then at the top level.
 */
export function extractFormFields(params: ParamFields, options: ExtractOptions = {}): ExtractedFields {
  const customFields = options.customFields ?? {};

  if (options.paramKey) {
    const scope = nestedAt(params, options.paramKey);
    if (scope) return fromScope(scope, customFields);
  }

  for (const key of FORM_PARAM_KEYS) {
    const scope = nestedAt(params, key);
    if (scope) return fromScope(scope, customFields);
  }

  return fromScope(params, customFields);
}
