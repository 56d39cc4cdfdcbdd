/**
 * Custom error classes
 */

export class WhoisToolsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'WhoisToolsError';
  }
}

export class ConfigurationError extends WhoisToolsError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class NetworkError extends WhoisToolsError {
  constructor(
    message: string,
    public readonly statusCode?: number
  ) {
    super(message);
    this.name = 'NetworkError';
  }
}

/**
 * The WHOIS API answered with a status other than 200
 */
export class WhoisStatusError extends NetworkError {
  constructor(
    public readonly domain: string,
    statusCode: number,
    public readonly serverMessage?: string
  ) {
    super(
      `WHOIS API returned status ${statusCode} for ${domain}${serverMessage ? `: ${serverMessage}` : ''}`,
      statusCode
    );
    this.name = 'WhoisStatusError';
  }
}

export class WhoisResponseError extends WhoisToolsError {
  constructor(message: string) {
    super(message);
    this.name = 'WhoisResponseError';
  }
}
