/**
 * Text rendering of WHOIS lookups for LLM consumption
 */

import { WhoisStatusError } from '../shared/utils/errors.js';
import type { ParsedWhoisData, WhoisLookupResult } from './types.js';

const NOT_AVAILABLE = 'Not available';
const UNKNOWN = 'Unknown';
const RAW_PREVIEW_LINES = 5;

type ParsedField = {
  label: string;
  key: keyof ParsedWhoisData;
};

// Order matters: this is the order lines appear in the summary
const PARSED_FIELDS: ReadonlyArray<ParsedField> = [
  { label: 'Registrar', key: 'registrar' },
  { label: 'Created', key: 'creation_date' },
  { label: 'Updated', key: 'updated_date' },
  { label: 'Expires', key: 'expiration_date' },
  { label: 'Created Days Ago', key: 'created_ago' },
  { label: 'Updated Days Ago', key: 'updated_ago' },
  { label: 'Expires In Days', key: 'expires_in' },
  { label: 'Name Servers', key: 'name_servers' },
  { label: 'Status', key: 'status' },
  { label: 'Registrant Name', key: 'registrant_name' },
  { label: 'Registrant Email', key: 'registrant_email' },
  { label: 'Admin Email', key: 'admin_email' },
  { label: 'Tech Email', key: 'tech_email' },
];

export function normalizeDomain(input: string): string {
  return input.trim().toLowerCase();
}

function renderValue(value: unknown, fallback: string): string {
  if (value === undefined || value === null) {
    return fallback;
  }
  if (Array.isArray(value)) {
    return value.length > 0 ? value.map(String).join(', ') : fallback;
  }
  return String(value);
}

/**
 * Verbose summary: headline fields, parsed data, a raw-data preview and the
 * full JSON response.
 */
export function formatWhoisSummary(domain: string, result: WhoisLookupResult): string {
  const { record } = result;
  const lines: string[] = [
    `WHOIS Information for ${domain}:`,
    '',
    `Domain: ${renderValue(record.domain, UNKNOWN)}`,
    `WHOIS Server: ${renderValue(record.whois_server, UNKNOWN)}`,
    `Cached: ${renderValue(record.cached, 'false')}`,
    `Query Time: ${renderValue(record.query_time_ms, '0')}ms`,
    '',
  ];

  const parsed = record.parsed_data;
  if (parsed && Object.keys(parsed).length > 0) {
    lines.push('Parsed WHOIS Data:');
    for (const field of PARSED_FIELDS) {
      lines.push(`  ${field.label}: ${renderValue(parsed[field.key], NOT_AVAILABLE)}`);
    }
  } else {
    lines.push('Parsed Data: Not available or could not be parsed');
  }

  const analysis = record.parsing_analysis;
  if (analysis && analysis.length > 0) {
    lines.push('', 'Parsing Analysis:');
    for (const entry of analysis) {
      lines.push(`  - ${entry}`);
    }
  }

  const raw = record.raw_data;
  if (raw) {
    lines.push('', `Raw WHOIS Data Available: Yes (${raw.length} characters)`);
    lines.push('First few lines of raw data:');
    for (const line of raw.split('\n').slice(0, RAW_PREVIEW_LINES)) {
      lines.push(`  ${line}`);
    }
  } else {
    lines.push('', 'Raw WHOIS Data Available: No');
  }

  lines.push('', '--- Full API Response ---', JSON.stringify(result.payload, null, 2));
  return lines.join('\n');
}

/**
 * Raw record only, for the model to analyse itself
 */
export function formatRawWhois(domain: string, result: WhoisLookupResult): string {
  const raw = result.record.raw_data;
  if (raw) {
    return `Raw WHOIS data for ${domain}:\n\n${raw}`;
  }
  return `No WHOIS data available for ${domain}. This may be due to privacy protection or server restrictions.`;
}

export interface LookupErrorFormatOptions {
  /** Append the HTTP status to non-200 failures */
  includeStatus: boolean;
}

export function formatLookupError(
  domain: string,
  error: unknown,
  options: LookupErrorFormatOptions
): string {
  if (error instanceof WhoisStatusError) {
    const status = options.includeStatus ? ` (Status: ${error.statusCode})` : '';
    return `Error: Failed to get WHOIS data for ${domain}${status}`;
  }
  return `Error: ${error instanceof Error ? error.message : String(error)}`;
}
