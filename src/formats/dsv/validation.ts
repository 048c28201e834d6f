/**
 * @module formats/dsv/validation
 * @description ArkType schema for delimited table reader options
 */

import { type } from "arktype";

/**
 * ArkType validation schema for reader options
 */
export const DSVReadOptionsSchema = type({
  "delimiter?": "string",
  "quote?": "string",
  "escape?": "string",
  "skipEmptyLines?": "boolean",
  "commentPrefix?": "string",
  "maxFieldLines?": "number.integer>0",
}).narrow((options, ctx) => {
  if (options.delimiter !== undefined && options.delimiter.length !== 1) {
    return ctx.reject({
      path: ["delimiter"],
      expected: "single character delimiter",
      actual: `${options.delimiter.length} characters`,
    });
  }

  if (options.quote !== undefined && options.quote === options.delimiter) {
    return ctx.reject({
      path: ["quote", "delimiter"],
      expected: "different quote and delimiter characters",
      actual: "same character for both",
    });
  }

  if (options.commentPrefix === "") {
    return ctx.reject({
      path: ["commentPrefix"],
      expected: "non-empty comment prefix",
      actual: "empty string",
    });
  }

  return true;
});
