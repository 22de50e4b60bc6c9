/**
 * WebDAV client over fetch: depth-limited PROPFIND and OPTIONS with HTTP Basic authentication.
 */
import type { Logger } from '../config/logger.js';
import { DavError, ProtocolError, TransportError } from '../errors.js';
import type { Depth, DavResource, DavTransport, PropertyKind } from './types.js';
import { buildPropfindBody, parseMultistatus } from './xml.js';

export interface DavCredentials {
  userName?: string;
  password?: string;
  /** Send credentials with every request instead of waiting for a 401 challenge */
  preemptiveAuth: boolean;
}

export interface DavClientOptions {
  credentials: DavCredentials;
  logger?: Logger;
  /** Per-request timeout in milliseconds */
  timeout?: number;
}

/** Default request timeout */
const REQUEST_TIMEOUT = 30000;

export class DavClient implements DavTransport {
  private readonly credentials: DavCredentials;
  private readonly logger: Logger | undefined;
  private readonly timeout: number;

  constructor(options: DavClientOptions) {
    this.credentials = options.credentials;
    this.logger = options.logger;
    this.timeout = options.timeout ?? REQUEST_TIMEOUT;
  }

  /**
   * PROPFIND the given properties of `url`.
   * The returned location is the final URL after redirects.
   * @throws NotFoundError, ProtocolError or TransportError
   */
  async propfind(url: URL, depth: Depth, properties: readonly PropertyKind[]): Promise<DavResource> {
    const response = await this.send(url, 'PROPFIND', {
      headers: {
        Depth: String(depth),
        'Content-Type': 'application/xml; charset=utf-8',
      },
      body: buildPropfindBody(properties),
    });

    if (response.status !== 207) {
      await this.discardBody(response);
      throw new ProtocolError(
        `Expected 207 Multi-Status for PROPFIND ${url.href}, got ${response.status}`,
        'unexpectedStatus'
      );
    }

    const location = response.url ? new URL(response.url) : url;
    const body = await this.readBody(response, 'PROPFIND', url);
    const [resource] = parseMultistatus(body, location);
    if (!resource) {
      throw new ProtocolError(`Empty multistatus response from ${location.href}`);
    }

    return { location, properties: resource.properties };
  }

  /**
   * OPTIONS request; returns the tokens of the DAV header (e.g. "1", "calendar-access").
   * @throws NotFoundError, ProtocolError or TransportError
   */
  async options(url: URL): Promise<ReadonlySet<string>> {
    const response = await this.send(url, 'OPTIONS', { headers: {} });
    const header = response.headers.get('DAV') ?? '';
    await this.discardBody(response);

    return new Set(
      header
        .split(',')
        .map((token) => token.trim())
        .filter((token) => token.length > 0)
    );
  }

  private authorizationHeader(): string | undefined {
    const { userName, password } = this.credentials;
    if (userName === undefined) return undefined;
    const token = Buffer.from(`${userName}:${password ?? ''}`).toString('base64');
    return `Basic ${token}`;
  }

  private async send(
    url: URL,
    method: string,
    init: { headers: Record<string, string>; body?: string }
  ): Promise<Response> {
    const authorization = this.authorizationHeader();

    let response = await this.fetchOnce(url, method, init, this.credentials.preemptiveAuth ? authorization : undefined);

    // Answer a Basic challenge once when credentials were not sent up front
    if (
      response.status === 401 &&
      !this.credentials.preemptiveAuth &&
      authorization !== undefined &&
      /\bbasic\b/i.test(response.headers.get('WWW-Authenticate') ?? '')
    ) {
      this.logger?.debug({ url: url.href, method }, 'Answering Basic authentication challenge');
      await this.discardBody(response);
      response = await this.fetchOnce(url, method, init, authorization);
    }

    if (!response.ok) {
      await this.discardBody(response);
      throw DavError.httpError(url.href, response.status, response.statusText);
    }

    return response;
  }

  private async fetchOnce(
    url: URL,
    method: string,
    init: { headers: Record<string, string>; body?: string },
    authorization: string | undefined
  ): Promise<Response> {
    const headers: Record<string, string> = { ...init.headers };
    if (authorization !== undefined) {
      headers['Authorization'] = authorization;
    }

    this.logger?.debug({ url: url.href, method }, 'DAV request');

    try {
      const response = await fetch(url.href, {
        method,
        headers,
        body: init.body,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeout),
      });
      this.logger?.debug({ url: url.href, method, status: response.status }, 'DAV response');
      return response;
    } catch (error) {
      throw requestFailure(method, url, error);
    }
  }

  /**
   * Read the response body; the connection can still fail or time out here.
   * @throws TransportError
   */
  private async readBody(response: Response, method: string, url: URL): Promise<string> {
    try {
      return await response.text();
    } catch (error) {
      throw requestFailure(method, url, error);
    }
  }

  /** Release the connection of a response whose body is not needed */
  private async discardBody(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger?.debug({ err: error, url: response.url }, 'Discarding response body failed');
    }
  }
}

/** Map a fetch or body-read failure to a DavError */
function requestFailure(method: string, url: URL, error: unknown): DavError {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return DavError.timeout(`${method} ${url.href}`);
  }
  const reason = error instanceof Error ? error.message : String(error);
  return new TransportError(`${method} ${url.href} failed: ${reason}`);
}
