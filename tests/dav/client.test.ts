import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import createFetchMock from 'vitest-fetch-mock';
import { DavClient, type DavCredentials } from '../../src/dav/client.js';
import { NotFoundError, ProtocolError, TransportError } from '../../src/errors.js';
import type { Logger } from '../../src/config/logger.js';
import { discover } from '../../src/discovery/orchestrator.js';
import { FakeDnsResolver } from '../helpers/fake-dav.js';

// Setup fetch mock
const fetchMocker = createFetchMock(vi);

// Mock logger
const mockLogger: Logger = {
  info: vi.fn(),
  debug: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  fatal: vi.fn(),
  trace: vi.fn(),
  child: vi.fn().mockReturnThis(),
  level: 'info',
} as unknown as Logger;

const preemptive: DavCredentials = {
  userName: 'alice',
  password: 'test-secret',
  preemptiveAuth: true,
};

const BASIC_ALICE = `Basic ${Buffer.from('alice:test-secret').toString('base64')}`;

const principalMultistatus = `<?xml version="1.0" encoding="utf-8"?>
<d:multistatus xmlns:d="DAV:">
  <d:response>
    <d:href>/dav/</d:href>
    <d:propstat>
      <d:prop>
        <d:current-user-principal><d:href>/principals/alice/</d:href></d:current-user-principal>
      </d:prop>
      <d:status>HTTP/1.1 200 OK</d:status>
    </d:propstat>
  </d:response>
</d:multistatus>`;

function headerOf(call: unknown[], name: string): string | undefined {
  const init = call[1];
  if (typeof init !== 'object' || init === null || !('headers' in init)) return undefined;
  const headers = init.headers;
  if (typeof headers !== 'object' || headers === null) return undefined;
  return new Headers(Object.entries(headers)).get(name) ?? undefined;
}

describe('DavClient', () => {
  beforeEach(() => {
    fetchMocker.enableMocks();
    fetchMocker.resetMocks();
    vi.clearAllMocks();
  });

  afterEach(() => {
    fetchMocker.disableMocks();
  });

  describe('propfind', () => {
    it('sends a depth-0 PROPFIND and returns typed properties', async () => {
      fetchMocker.mockResponseOnce(principalMultistatus, { status: 207 });

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });
      const resource = await client.propfind(new URL('https://dav.example.com/dav/'), 0, [
        'currentUserPrincipal',
      ]);

      expect(resource.location.href).toBe('https://dav.example.com/dav/');
      expect(resource.properties.currentUserPrincipal).toEqual({ href: '/principals/alice/' });

      expect(fetchMocker).toHaveBeenCalledOnce();
      const [url, options] = fetchMocker.mock.calls[0];
      expect(url).toBe('https://dav.example.com/dav/');
      expect(options?.method).toBe('PROPFIND');
      expect(options?.redirect).toBe('follow');
      expect(options?.body).toContain('<d:current-user-principal/>');
      expect(headerOf(fetchMocker.mock.calls[0], 'Depth')).toBe('0');
      expect(headerOf(fetchMocker.mock.calls[0], 'Authorization')).toBe(BASIC_ALICE);
    });

    it('uses the final URL after redirects as location', async () => {
      const redirected = new Response(principalMultistatus, { status: 207 });
      Object.defineProperty(redirected, 'url', { value: 'https://dav.example.com/remote.php/dav/' });
      fetchMocker.mockImplementationOnce(async () => redirected);

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });
      const resource = await client.propfind(
        new URL('https://example.com/.well-known/caldav'),
        0,
        ['currentUserPrincipal']
      );

      expect(resource.location.href).toBe('https://dav.example.com/remote.php/dav/');
    });

    it('throws NotFoundError on 404', async () => {
      fetchMocker.mockResponseOnce('Not Found', { status: 404, statusText: 'Not Found' });

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });

      await expect(
        client.propfind(new URL('https://dav.example.com/missing/'), 0, ['resourceType'])
      ).rejects.toThrow(NotFoundError);
    });

    it('throws ProtocolError when the server answers 200 instead of 207', async () => {
      fetchMocker.mockResponseOnce('<html></html>', { status: 200 });

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });

      await expect(
        client.propfind(new URL('https://www.example.com/'), 0, ['resourceType'])
      ).rejects.toThrow(ProtocolError);
    });

    it('throws ProtocolError on a 207 body that is not a multistatus', async () => {
      fetchMocker.mockResponseOnce('<d:error xmlns:d="DAV:"/>', { status: 207 });

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });

      await expect(
        client.propfind(new URL('https://dav.example.com/'), 0, ['resourceType'])
      ).rejects.toThrow('Expected a multistatus response from https://dav.example.com/');
    });

    it('throws ProtocolError on an empty multistatus', async () => {
      fetchMocker.mockResponseOnce('<d:multistatus xmlns:d="DAV:"></d:multistatus>', { status: 207 });

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });

      await expect(
        client.propfind(new URL('https://dav.example.com/'), 0, ['resourceType'])
      ).rejects.toThrow('Empty multistatus response from https://dav.example.com/');
    });

    it('throws ProtocolError on 500', async () => {
      fetchMocker.mockResponseOnce('Server Error', { status: 500, statusText: 'Internal Server Error' });

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });

      await expect(
        client.propfind(new URL('https://dav.example.com/'), 0, ['resourceType'])
      ).rejects.toThrow('HTTP 500 Internal Server Error on https://dav.example.com/');
    });

    it('wraps network failures in TransportError', async () => {
      fetchMocker.mockRejectOnce(new Error('getaddrinfo ENOTFOUND dav.example.com'));

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });

      await expect(
        client.propfind(new URL('https://dav.example.com/'), 0, ['resourceType'])
      ).rejects.toThrow(TransportError);
    });

    it('maps timeouts to a TransportError of type timeout', async () => {
      const timeoutError = new Error('The operation was aborted due to timeout');
      timeoutError.name = 'TimeoutError';
      fetchMocker.mockRejectOnce(timeoutError);

      const client = new DavClient({ credentials: preemptive, logger: mockLogger, timeout: 10 });

      await expect(
        client.propfind(new URL('https://dav.example.com/'), 0, ['resourceType'])
      ).rejects.toMatchObject({ name: 'TransportError', type: 'timeout' });
    });
  });

  describe('response bodies', () => {
    function bodyFailingWith(error: Error): Response {
      const response = new Response('', { status: 207 });
      Object.defineProperty(response, 'text', { value: () => Promise.reject(error) });
      return response;
    }

    it('wraps a connection lost while reading the body in TransportError', async () => {
      fetchMocker.mockImplementationOnce(async () => bodyFailingWith(new TypeError('terminated')));

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });

      await expect(
        client.propfind(new URL('https://dav.example.com/'), 0, ['resourceType'])
      ).rejects.toMatchObject({
        name: 'TransportError',
        type: 'transport',
        message: 'PROPFIND https://dav.example.com/ failed: terminated',
      });
    });

    it('maps a timeout while reading the body to a timeout error', async () => {
      const timeoutError = new Error('The operation was aborted due to timeout');
      timeoutError.name = 'TimeoutError';
      fetchMocker.mockImplementationOnce(async () => bodyFailingWith(timeoutError));

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });

      await expect(
        client.propfind(new URL('https://dav.example.com/'), 0, ['resourceType'])
      ).rejects.toMatchObject({
        name: 'TransportError',
        type: 'timeout',
        message: 'PROPFIND https://dav.example.com/ timed out',
      });
    });

    it('lets discovery finish when every body read fails', async () => {
      fetchMocker.mockImplementation(async () => bodyFailingWith(new TypeError('terminated')));

      const config = await discover(
        'https://example.com/',
        { userName: 'alice', password: 'test-secret', preemptiveAuth: true },
        { resolver: new FakeDnsResolver() }
      );

      expect(config.calendarService).toBeNull();
      expect(config.contactsService).toBeNull();
    });

    it('releases the body of an OPTIONS response', async () => {
      const response = new Response('unused', { status: 200, headers: { DAV: '1' } });
      fetchMocker.mockImplementationOnce(async () => response);

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });
      await client.options(new URL('https://dav.example.com/'));

      expect(response.bodyUsed).toBe(true);
    });

    it('releases the body of an error response', async () => {
      const response = new Response('Not Found', { status: 404, statusText: 'Not Found' });
      fetchMocker.mockImplementationOnce(async () => response);

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });

      await expect(client.options(new URL('https://dav.example.com/missing/'))).rejects.toThrow(NotFoundError);
      expect(response.bodyUsed).toBe(true);
    });

    it('releases the body of a challenge before answering it', async () => {
      const challenge = new Response('Unauthorized', {
        status: 401,
        statusText: 'Unauthorized',
        headers: { 'WWW-Authenticate': 'Basic realm="dav"' },
      });
      fetchMocker.mockImplementationOnce(async () => challenge);
      fetchMocker.mockResponseOnce('', { status: 200, headers: { DAV: '1' } });

      const client = new DavClient({ credentials: { ...preemptive, preemptiveAuth: false }, logger: mockLogger });
      await client.options(new URL('https://dav.example.com/'));

      expect(challenge.bodyUsed).toBe(true);
    });
  });

  describe('options', () => {
    it('returns the DAV header tokens', async () => {
      fetchMocker.mockResponseOnce('', {
        status: 200,
        headers: { DAV: '1, 2, access-control, calendar-access, addressbook' },
      });

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });
      const capabilities = await client.options(new URL('https://dav.example.com/principals/alice/'));

      expect([...capabilities]).toEqual(['1', '2', 'access-control', 'calendar-access', 'addressbook']);
      expect(fetchMocker.mock.calls[0][1]?.method).toBe('OPTIONS');
    });

    it('returns an empty set without a DAV header', async () => {
      fetchMocker.mockResponseOnce('', { status: 200 });

      const client = new DavClient({ credentials: preemptive, logger: mockLogger });
      const capabilities = await client.options(new URL('https://www.example.com/'));

      expect(capabilities.size).toBe(0);
    });
  });

  describe('authentication', () => {
    const lazy: DavCredentials = { ...preemptive, preemptiveAuth: false };

    it('waits for a Basic challenge before sending credentials', async () => {
      fetchMocker.mockResponseOnce('Unauthorized', {
        status: 401,
        statusText: 'Unauthorized',
        headers: { 'WWW-Authenticate': 'Basic realm="dav"' },
      });
      fetchMocker.mockResponseOnce('', { status: 200, headers: { DAV: '1, calendar-access' } });

      const client = new DavClient({ credentials: lazy, logger: mockLogger });
      const capabilities = await client.options(new URL('https://dav.example.com/'));

      expect(capabilities.has('calendar-access')).toBe(true);
      expect(fetchMocker).toHaveBeenCalledTimes(2);
      expect(headerOf(fetchMocker.mock.calls[0], 'Authorization')).toBeUndefined();
      expect(headerOf(fetchMocker.mock.calls[1], 'Authorization')).toBe(BASIC_ALICE);
    });

    it('does not retry when the challenge is not Basic', async () => {
      fetchMocker.mockResponseOnce('Unauthorized', {
        status: 401,
        statusText: 'Unauthorized',
        headers: { 'WWW-Authenticate': 'Bearer realm="dav"' },
      });

      const client = new DavClient({ credentials: lazy, logger: mockLogger });

      await expect(client.options(new URL('https://dav.example.com/'))).rejects.toMatchObject({
        type: 'unauthorized',
      });
      expect(fetchMocker).toHaveBeenCalledOnce();
    });

    it('sends no Authorization header without a user name', async () => {
      fetchMocker.mockResponseOnce('', { status: 200 });

      const client = new DavClient({ credentials: { preemptiveAuth: true }, logger: mockLogger });
      await client.options(new URL('https://dav.example.com/'));

      expect(headerOf(fetchMocker.mock.calls[0], 'Authorization')).toBeUndefined();
    });
  });
});
