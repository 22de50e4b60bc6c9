import { ZodError } from 'zod';

export class DavError extends Error {
  type: string;
  fix: string;

  constructor(message: string, type: string, fix: string) {
    super(message);
    this.name = 'DavError';
    this.type = type;
    this.fix = fix;
  }

  /**
   * Create the error matching an HTTP-level failure (4xx, 5xx responses)
   */
  static httpError(url: string, status: number, statusText: string): DavError {
    const message = statusText
      ? `HTTP ${status} ${statusText} on ${url}`
      : `HTTP ${status} on ${url}`;

    if (status === 404 || status === 410) {
      return new NotFoundError(url, message);
    }

    if (status === 401) {
      return new ProtocolError(
        message,
        'unauthorized',
        'Check your credentials. Verify DAV_USERNAME and DAV_PASSWORD, or try --no-preemptive for servers that reject unsolicited credentials.'
      );
    }

    if (status === 403) {
      return new ProtocolError(
        message,
        'forbidden',
        'The account may not access this resource. Try the URL of your own calendar or address book.'
      );
    }

    if (status >= 500) {
      return new ProtocolError(
        message,
        'serverError',
        'The DAV server encountered an error. Try again later or contact the server administrator.'
      );
    }

    return new ProtocolError(
      message,
      'httpError',
      'An HTTP error occurred. Check the server URL and try again.'
    );
  }

  /**
   * Create the error for a request that did not complete in time
   */
  static timeout(operation: string): DavError {
    return new TransportError(
      `${operation} timed out`,
      'timeout',
      'The server took too long to answer. Check your network connection or increase DAV_REQUEST_TIMEOUT.'
    );
  }
}

/** Network or TLS failure: the request never produced an HTTP response */
export class TransportError extends DavError {
  constructor(
    message: string,
    type = 'transport',
    fix = 'Check that the host name is correct and reachable, and that its TLS certificate is valid.'
  ) {
    super(message, type, fix);
    this.name = 'TransportError';
  }
}

/** The resource does not exist (404/410) */
export class NotFoundError extends DavError {
  constructor(
    public readonly url: string,
    message = `No resource at ${url}`
  ) {
    super(message, 'notFound', 'The path does not exist on this server. Verify the URL.');
    this.name = 'NotFoundError';
  }
}

/** Malformed or unexpected server response */
export class ProtocolError extends DavError {
  constructor(
    message: string,
    type = 'protocol',
    fix = 'The server answered with something other than a WebDAV response. Verify this is a CalDAV/CardDAV endpoint.'
  ) {
    super(message, type, fix);
    this.name = 'ProtocolError';
  }
}

/** DNS lookup failed for a reason other than "no such record" */
export class DnsResolutionError extends DavError {
  constructor(
    public readonly query: string,
    message: string
  ) {
    super(
      message,
      'dns',
      'DNS lookup failed. Check your resolver, or enter the server URL instead of an email address.'
    );
    this.name = 'DnsResolutionError';
  }
}

/** The user-given URI cannot be used as a discovery starting point */
export class InvalidInputError extends DavError {
  constructor(public readonly input: string) {
    super(
      `Cannot discover services from "${input}"`,
      'invalidInput',
      'Enter an https:// or http:// URL, or an email address such as user@example.com.'
    );
    this.name = 'InvalidInputError';
  }
}

export function formatStartupError(error: Error): string {
  // Handle Zod validation errors
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => {
      const field = issue.path.join('.');
      return `  ${field}: ${issue.message}`;
    });
    return [
      'Configuration validation failed:',
      ...issues,
      '',
      'Fix: Check your environment variables.',
      'Credentials: DAV_USERNAME, DAV_PASSWORD, DAV_PREEMPTIVE_AUTH=true|false',
      'Timeouts (milliseconds): DAV_REQUEST_TIMEOUT, DAV_DNS_TIMEOUT',
      'Logging: LOG_LEVEL=fatal|error|warn|info|debug|trace',
    ].join('\n');
  }

  if (error instanceof DavError) {
    return [error.message, '', `Fix: ${error.fix}`].join('\n');
  }

  const message = error.message.toLowerCase();

  // Timeout errors
  if (message.includes('timeout') || message.includes('timed out')) {
    return [
      'A request timed out.',
      '',
      'Fix: Check your network connection, or increase DAV_REQUEST_TIMEOUT.',
    ].join('\n');
  }

  // Fallback
  return [
    `Unexpected error: ${error.message}`,
    '',
    'Fix: Check your configuration and try again.',
  ].join('\n');
}
