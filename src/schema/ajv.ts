/**
 * Shared AJV instance (draft-07, all errors, standard formats)
 */

import Ajv from "ajv";
import addFormats from "ajv-formats";

export const ajv = new Ajv({ allErrors: true, verbose: true });
addFormats(ajv);
