/**
 * Shared JSON schema validator
 *
 * Validation applies schema defaults and strips unknown properties, so callers
 * must hand it a copy they are happy to see mutated.
 */

import AjvModule from "ajv";
import addFormatsModule from "ajv-formats";

import type { ErrorObject } from "ajv";

const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export const ajv = new Ajv({
  allErrors: true,
  useDefaults: true,
  removeAdditional: true,
});
addFormats(ajv);

/**
 * Turn ajv errors into printable lines
 * @param errors - Errors from the last validation
 *
 * @returns One line per error, prefixed with the instance path
 */
export const formatSchemaErrors = (
  errors: Array<ErrorObject> | null | undefined,
): Array<string> => {
  if (errors == null) {
    return [];
  }
  return errors.map((err) => {
    const location = err.instancePath || "(root)";
    return `${location}: ${err.message ?? "unknown error"}`;
  });
};
