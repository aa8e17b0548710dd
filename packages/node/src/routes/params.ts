/**
 * Path parameter parsing shared by the record routes.
 */

import { HTTPException } from "hono/http-exception";
import { RecordIdSchema } from "../types/dto.js";

/**
 * Parse a positive integer record id, or fail the request with 400.
 */
export function recordId(raw: string): number {
  const parsed = RecordIdSchema.safeParse(raw);
  if (!parsed.success) {
    throw new HTTPException(400, { message: `Invalid record id '${raw}'` });
  }
  return parsed.data;
}
