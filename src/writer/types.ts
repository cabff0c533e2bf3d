/**
 * Writer Type Definitions
 */

import type { BOMStrategy } from "../types";

export interface WriterOptions {
  /** Defaults to `,` and `\n` */
  delimiters?: {
    field?: string;
    row?: string;
  };
  /** Encoding label such as `"utf8"` or `"Shift_JIS"`; defaults to `"utf8"` */
  encoding?: string;
  /** Defaults to `"convention"` */
  bomStrategy?: BOMStrategy;
  /** Written as the first row when non-empty */
  headers?: readonly string[];
  /** Quote every field, not only those that need it */
  quoteAll?: boolean;
}
