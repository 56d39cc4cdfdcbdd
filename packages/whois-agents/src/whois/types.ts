/**
 * WHOIS API response types
 *
 * Every record field is optional and may be null; the service omits what it
 * could not determine. A field of the wrong type reads as absent, so one bad
 * value never hides the rest of the record. Unknown fields pass through
 * untouched.
 */

import { z } from 'zod';

function lenient<T extends z.ZodTypeAny>(schema: T) {
  return schema.nullish().catch(undefined);
}

const optionalString = lenient(z.string());
const optionalNumber = lenient(z.number());
const optionalStrings = lenient(z.array(z.string()));

export const ParsedWhoisDataSchema = z
  .object({
    registrar: optionalString,
    creation_date: optionalString,
    updated_date: optionalString,
    expiration_date: optionalString,
    created_ago: optionalNumber, // days since creation
    updated_ago: optionalNumber, // days since last update
    expires_in: optionalNumber, // days until expiration, negative once expired
    name_servers: optionalStrings,
    status: optionalStrings,
    registrant_name: optionalString,
    registrant_email: optionalString,
    admin_email: optionalString,
    tech_email: optionalString,
  })
  .passthrough();

export const WhoisRecordSchema = z
  .object({
    domain: optionalString,
    whois_server: optionalString,
    raw_data: optionalString,
    parsed_data: lenient(ParsedWhoisDataSchema),
    cached: lenient(z.boolean()),
    query_time_ms: optionalNumber,
    parsing_analysis: optionalStrings,
  })
  .passthrough();

export const WhoisHealthSchema = z
  .object({
    status: z.string(),
    version: z.string(),
    uptime_seconds: z.number(),
  })
  .passthrough();

export const WhoisErrorBodySchema = z.object({
  error: z.string(),
  status: z.number().optional(),
});

export type ParsedWhoisData = z.infer<typeof ParsedWhoisDataSchema>;
export type WhoisRecord = z.infer<typeof WhoisRecordSchema>;
export type WhoisHealth = z.infer<typeof WhoisHealthSchema>;

export interface WhoisLookupOptions {
  /** Bypass the service-side cache */
  fresh?: boolean;
  /** Use the debug route, which adds parsing_analysis */
  debug?: boolean;
}

export interface WhoisLookupResult {
  domain: string;
  record: WhoisRecord;
  /** Response body exactly as received */
  payload: unknown;
}

/**
 * Client port used by the tools
 */
export interface IWhoisApiClient {
  lookup(domain: string, options?: WhoisLookupOptions): Promise<WhoisLookupResult>;
  health(): Promise<WhoisHealth>;
}
