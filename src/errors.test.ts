/**
 * Tests for the DavError hierarchy and formatStartupError.
 */
import { describe, it, expect } from 'vitest';
import {
  DavError,
  DnsResolutionError,
  InvalidInputError,
  NotFoundError,
  ProtocolError,
  TransportError,
  formatStartupError,
} from './errors.js';
import { z } from 'zod';

describe('DavError', () => {
  describe('constructor', () => {
    it('creates error with message, type, and fix', () => {
      const error = new DavError('Test error', 'testType', 'Fix: do something');

      expect(error.message).toBe('Test error');
      expect(error.name).toBe('DavError');
      expect(error.type).toBe('testType');
      expect(error.fix).toBe('Fix: do something');
    });
  });

  describe('httpError', () => {
    const url = 'https://dav.example.com/principals/';

    it('maps 404 to NotFoundError', () => {
      const error = DavError.httpError(url, 404, 'Not Found');

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.message).toBe('HTTP 404 Not Found on https://dav.example.com/principals/');
      expect(error.type).toBe('notFound');
    });

    it('maps 410 to NotFoundError', () => {
      expect(DavError.httpError(url, 410, 'Gone')).toBeInstanceOf(NotFoundError);
    });

    it('maps 401 to an unauthorized ProtocolError', () => {
      const error = DavError.httpError(url, 401, 'Unauthorized');

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error.type).toBe('unauthorized');
      expect(error.fix).toContain('DAV_USERNAME');
    });

    it('maps 403 to a forbidden ProtocolError', () => {
      const error = DavError.httpError(url, 403, 'Forbidden');

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error.type).toBe('forbidden');
    });

    it('maps 5xx to a serverError ProtocolError', () => {
      const error = DavError.httpError(url, 503, 'Service Unavailable');

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error.type).toBe('serverError');
    });

    it('maps other statuses to a generic httpError', () => {
      const error = DavError.httpError(url, 418, '');

      expect(error.message).toBe('HTTP 418 on https://dav.example.com/principals/');
      expect(error.type).toBe('httpError');
    });
  });

  describe('timeout', () => {
    it('creates a TransportError of type timeout', () => {
      const error = DavError.timeout('PROPFIND https://dav.example.com/');

      expect(error).toBeInstanceOf(TransportError);
      expect(error.message).toBe('PROPFIND https://dav.example.com/ timed out');
      expect(error.type).toBe('timeout');
      expect(error.fix).toContain('DAV_REQUEST_TIMEOUT');
    });
  });

  describe('subclasses', () => {
    it('all extend DavError', () => {
      expect(new TransportError('boom')).toBeInstanceOf(DavError);
      expect(new NotFoundError('https://example.com/')).toBeInstanceOf(DavError);
      expect(new ProtocolError('bad xml')).toBeInstanceOf(DavError);
      expect(new DnsResolutionError('_caldavs._tcp.example.com', 'SERVFAIL')).toBeInstanceOf(DavError);
      expect(new InvalidInputError('ftp://example.com')).toBeInstanceOf(DavError);
    });

    it('NotFoundError keeps the url and a default message', () => {
      const error = new NotFoundError('https://example.com/missing/');

      expect(error.url).toBe('https://example.com/missing/');
      expect(error.message).toBe('No resource at https://example.com/missing/');
      expect(error.name).toBe('NotFoundError');
    });

    it('DnsResolutionError keeps the query name', () => {
      const error = new DnsResolutionError('_carddavs._tcp.example.com', 'queryTxt ESERVFAIL');

      expect(error.query).toBe('_carddavs._tcp.example.com');
      expect(error.type).toBe('dns');
    });

    it('InvalidInputError names the input', () => {
      const error = new InvalidInputError('ftp://example.com');

      expect(error.message).toBe('Cannot discover services from "ftp://example.com"');
      expect(error.type).toBe('invalidInput');
    });
  });
});

describe('formatStartupError', () => {
  it('formats ZodError with field paths', () => {
    const schema = z.object({ DAV_REQUEST_TIMEOUT: z.number() });
    const result = schema.safeParse({ DAV_REQUEST_TIMEOUT: 'soon' });
    if (result.success) {
      throw new Error('expected validation to fail');
    }

    const message = formatStartupError(result.error);

    expect(message).toContain('Configuration validation failed:');
    expect(message).toContain('  DAV_REQUEST_TIMEOUT:');
    expect(message).toContain('Fix: Check your environment variables.');
  });

  it('formats DavError with its fix', () => {
    const message = formatStartupError(new InvalidInputError('ftp://example.com'));

    expect(message).toBe(
      [
        'Cannot discover services from "ftp://example.com"',
        '',
        'Fix: Enter an https:// or http:// URL, or an email address such as user@example.com.',
      ].join('\n')
    );
  });

  it('formats plain timeout errors', () => {
    const message = formatStartupError(new Error('Operation timeout'));

    expect(message).toContain('A request timed out.');
  });

  it('falls back to the raw message', () => {
    const message = formatStartupError(new Error('Something odd'));

    expect(message).toContain('Unexpected error: Something odd');
  });
});
