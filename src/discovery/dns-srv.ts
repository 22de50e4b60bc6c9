/**
 * DNS SRV/TXT resolution for CalDAV/CardDAV service discovery
 * RFC 6764 Section 3 - Locating services via _caldavs._tcp / _carddavs._tcp
 */

import { promises as dns } from 'node:dns';
import { DnsResolutionError } from '../errors.js';
import type { DiagnosticLog } from './diagnostic-log.js';
import type { ServiceKind, ServiceLocation } from './types.js';

/** Subset of dns.promises used for discovery */
export interface DnsResolver {
  resolveSrv(hostname: string): Promise<Array<{ name: string; port: number; priority: number; weight: number }>>;
  resolveTxt(hostname: string): Promise<string[][]>;
}

export interface LocateServiceOptions {
  resolver?: DnsResolver;
  /** Timeout in milliseconds per lookup (default: 3000) */
  timeout?: number;
}

/** Only secure services are discovered */
const DEFAULT_PORT = 443;

/**
 * SRV/TXT query name of the secure variant of a service, e.g. _caldavs._tcp.example.com
 */
export function srvQueryName(domain: string, service: ServiceKind): string {
  return `_${service}s._tcp.${domain}`;
}

function isNoDataError(error: unknown): boolean {
  return (
    error !== null &&
    typeof error === 'object' &&
    'code' in error &&
    (error.code === 'ENOTFOUND' || error.code === 'ENODATA')
  );
}

/**
 * Run a lookup with a timeout.
 * Returns an empty list when the name has no records of that type.
 * @throws DnsResolutionError on timeout or resolver failure
 */
async function lookup<T>(query: string, resolve: () => Promise<T[]>, timeout: number): Promise<T[]> {
  let timer: NodeJS.Timeout | undefined;
  try {
    // Race DNS query against timeout
    return await Promise.race([
      resolve(),
      new Promise<never>((_, reject) => {
        timer = setTimeout(() => reject(new DnsResolutionError(query, `DNS timeout for ${query}`)), timeout);
      }),
    ]);
  } catch (error) {
    if (isNoDataError(error)) {
      return [];
    }
    if (error instanceof DnsResolutionError) {
      throw error;
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new DnsResolutionError(query, `DNS query failed for ${query}: ${reason}`);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Find host, port and initial context paths for a service on a domain.
 *
 * The first SRV record wins (a warning is logged when there are several); without SRV records
 * the domain itself is used on port 443. TXT "path=" values come first in the path list,
 * followed by /.well-known/{service} and "/". DNS failures are logged, never thrown.
 *
 * @param domain - Domain to query (e.g., "example.com")
 * @param service - "caldav" or "carddav"
 */
export async function locateService(
  domain: string,
  service: ServiceKind,
  log: DiagnosticLog,
  options: LocateServiceOptions = {}
): Promise<ServiceLocation> {
  const resolver = options.resolver ?? dns;
  const timeout = options.timeout ?? 3000;
  const query = srvQueryName(domain, service);

  let host = domain;
  let port = DEFAULT_PORT;

  log.debug(`Looking up SRV records for ${query}`);
  try {
    const records = await lookup(query, () => resolver.resolveSrv(query), timeout);
    const [record] = records;
    if (record) {
      if (records.length > 1) {
        log.warn('Multiple SRV records not supported yet; using first one');
      }
      host = record.name.replace(/\.$/, '');
      port = record.port;
      log.info(`Found ${service} service at https://${host}:${port}`);
    } else {
      log.info(`Didn't find ${service} service, trying at https://${domain}:${port}`);
    }
  } catch (error) {
    log.warn(`SRV lookup failed, trying at https://${domain}:${port}`, error);
  }

  const paths: string[] = [];
  try {
    const records = await lookup(query, () => resolver.resolveTxt(query), timeout);
    for (const segments of records) {
      const segment = segments.find((s) => s.startsWith('path='));
      if (segment !== undefined) {
        const path = segment.substring('path='.length);
        paths.push(path.startsWith('/') ? path : `/${path}`);
        log.info(`Found TXT record; initial context path=${paths.join(', ')}`);
      }
    }
  } catch (error) {
    log.warn(`TXT lookup failed for ${query}`, error);
  }

  // If the TXT path is wrong, try well-known, then the root
  paths.push(`/.well-known/${service}`, '/');

  return { scheme: 'https', host, port, paths };
}
