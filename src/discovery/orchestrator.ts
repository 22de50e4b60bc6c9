/**
 * Discovery orchestrator - chains the user-given URL, .well-known and DNS SRV/TXT discovery
 * Provides the high-level API to turn a URL or email address into a CalDAV/CardDAV configuration
 */

import type { Logger } from '../config/logger.js';
import { DavClient } from '../dav/client.js';
import { ResourceTypes, type DavTransport } from '../dav/types.js';
import { resolveReference } from '../dav/url.js';
import { DavError, InvalidInputError, NotFoundError } from '../errors.js';
import { ServiceInfoAccumulator, recordIfCollectionOrHomeSet } from './collections.js';
import { DiagnosticLog } from './diagnostic-log.js';
import { locateService, type DnsResolver } from './dns-srv.js';
import { providesService, resolvePrincipal } from './principal.js';
import {
  SERVICES,
  type Configuration,
  type Credentials,
  type ServiceInfo,
  type ServiceKind,
} from './types.js';

export interface DiscoveryOptions {
  logger?: Logger;
  /** Called once per pipeline: the two pipelines never share a transport */
  createTransport?: (credentials: Credentials, logger: Logger | undefined) => DavTransport;
  resolver?: DnsResolver;
  /** Per-request timeout in milliseconds for the default transport */
  requestTimeout?: number;
  /** Per-lookup DNS timeout in milliseconds */
  dnsTimeout?: number;
}

/** Collaborators of one pipeline run */
export interface PipelineContext {
  transport: DavTransport;
  log: DiagnosticLog;
  resolver?: DnsResolver;
  dnsTimeout?: number;
}

/**
 * Parse the user-given starting point.
 * Accepts http(s) URLs and mailto: URIs; a bare email address is read as mailto:.
 * @throws InvalidInputError for anything else
 */
export function parseDiscoveryInput(input: string): URL {
  const trimmed = input.trim();
  const candidate = /^[^:/@\s]+@[^:/@\s]+$/.test(trimmed) ? `mailto:${trimmed}` : trimmed;

  let url: URL;
  try {
    url = new URL(candidate);
  } catch {
    throw new InvalidInputError(input);
  }

  if (!['http:', 'https:', 'mailto:'].includes(url.protocol)) {
    throw new InvalidInputError(input);
  }
  if (url.protocol !== 'mailto:' && url.hostname === '') {
    throw new InvalidInputError(input);
  }
  return url;
}

/**
 * Extract the domain of a mailto: URI (part after the last "@").
 * @returns lower-cased domain, or null if there is none
 */
export function extractDomain(mailto: URL): string | null {
  const mailbox = mailto.pathname;
  const at = mailbox.lastIndexOf('@');
  if (at === -1) return null;
  const domain = mailbox.substring(at + 1).trim().toLowerCase();
  return domain.length > 0 ? domain : null;
}

/**
 * Probe the user-given URL: record collections/home sets and look for a principal,
 * either referenced by current-user-principal or the resource itself.
 */
export async function checkUserGivenUrl(
  baseUrl: URL,
  service: ServiceKind,
  result: ServiceInfoAccumulator,
  { transport, log }: PipelineContext
): Promise<void> {
  log.info(`Checking user-given URL: ${baseUrl.href}`);

  try {
    const resource = await transport.propfind(baseUrl, 0, SERVICES[service].probeProperties);
    recordIfCollectionOrHomeSet(resource, service, result, log);

    const { properties, location } = resource;
    let principal: URL | null = null;

    const href = properties.currentUserPrincipal?.href;
    if (href !== undefined) {
      principal = resolveReference(location, href);
    } else if (properties.resourceType?.has(ResourceTypes.PRINCIPAL)) {
      principal = location;
    }

    // A principal only counts if it provides the required service
    if (principal !== null && (await providesService(transport, principal, service, log))) {
      result.principal = principal;
    }
  } catch (error) {
    if (!(error instanceof DavError)) throw error;
    log.debug('PROPFIND/OPTIONS on user-given URL failed', error);
  }
}

/**
 * Look for the principal via DNS: SRV target plus each candidate context path in order.
 * Collections and home sets seen at a candidate are recorded even when it has no principal.
 * @returns the first principal that provides the service, or null
 */
export async function discoverPrincipalUrl(
  domain: string,
  service: ServiceKind,
  result: ServiceInfoAccumulator,
  { transport, log, resolver, dnsTimeout }: PipelineContext
): Promise<URL | null> {
  const location = await locateService(domain, service, log, { resolver, timeout: dnsTimeout });

  let origin: URL;
  try {
    origin = new URL(`${location.scheme}://${location.host}:${location.port}`);
  } catch (error) {
    log.warn(`Invalid service location ${location.host}:${location.port}`, error);
    return null;
  }

  for (const path of location.paths) {
    const initialContextPath = new URL(origin.href);
    initialContextPath.pathname = path;

    log.info(`Trying to determine principal from initial context path=${initialContextPath.href}`);
    const outcome = await resolvePrincipal(transport, initialContextPath, service, log, result);

    switch (outcome.kind) {
      case 'found':
        return outcome.value;
      case 'absent':
        log.debug(outcome.reason);
        break;
      case 'failed':
        if (outcome.error instanceof NotFoundError) {
          log.warn('No resource found', outcome.error);
        } else {
          log.debug(`Principal lookup at ${initialContextPath.href} failed`, outcome.error);
        }
        break;
    }
  }

  return null;
}

/**
 * Run the discovery pipeline for one service:
 * user-given URL → .well-known/{service} → DNS SRV/TXT.
 * @returns the ServiceInfo, or null if nothing useful was found
 */
export async function findServiceInfo(
  input: URL,
  service: ServiceKind,
  context: PipelineContext
): Promise<ServiceInfo | null> {
  const { transport, log } = context;
  const result = new ServiceInfoAccumulator();

  // Domain for DNS discovery: only secure discovery is implemented
  let discoveryDomain: string | null = null;

  log.info(`Finding initial ${service} service configuration`);

  if (input.protocol === 'http:' || input.protocol === 'https:') {
    if (input.protocol === 'https:') {
      discoveryDomain = input.hostname;
    }

    // Stage 1 - user-given URL
    await checkUserGivenUrl(input, service, result, context);

    // Stage 2 - well-known URL on the same host
    if (result.principal === null) {
      const wellKnown = new URL(`/.well-known/${service}`, input);
      const outcome = await resolvePrincipal(transport, wellKnown, service, log, result);
      if (outcome.kind === 'found') {
        result.principal = outcome.value;
      } else if (outcome.kind === 'failed') {
        log.debug('Well-known URL detection failed', outcome.error);
      } else {
        log.debug(outcome.reason);
      }
    }
  } else if (input.protocol === 'mailto:') {
    discoveryDomain = extractDomain(input);
  }

  // Stage 3 - DNS service discovery
  if (result.principal === null && discoveryDomain !== null) {
    log.info('No principal found at user-given URL, trying to discover');
    result.principal = await discoverPrincipalUrl(discoveryDomain, service, result, context);
  }

  return result.isUseful() ? result.toServiceInfo() : null;
}

function defaultTransport(credentials: Credentials, logger: Logger | undefined, timeout?: number): DavTransport {
  return new DavClient({ credentials, logger, timeout });
}

/**
 * Discover CalDAV and CardDAV configuration from a URL or email address.
 *
 * Both services are discovered concurrently, each with its own transport and diagnostic log.
 * A service is null in the result if nothing useful was found; this never throws for
 * network conditions.
 *
 * @param input - https:// or http:// URL, mailto: URI or email address
 * @throws InvalidInputError if `input` is not one of those
 */
export async function discover(
  input: string | URL,
  credentials: Credentials,
  options: DiscoveryOptions = {}
): Promise<Configuration> {
  const url = typeof input === 'string' ? parseDiscoveryInput(input) : input;
  const { logger, resolver, dnsTimeout } = options;

  const runPipeline = async (service: ServiceKind) => {
    const serviceLogger = logger?.child({ service });
    const transport = options.createTransport
      ? options.createTransport(credentials, serviceLogger)
      : defaultTransport(credentials, serviceLogger, options.requestTimeout);
    const log = new DiagnosticLog(serviceLogger);
    const info = await findServiceInfo(url, service, { transport, log, resolver, dnsTimeout });
    return { info, log };
  };

  const [calendar, contacts] = await Promise.all([runPipeline('caldav'), runPipeline('carddav')]);

  return Object.freeze({
    userName: credentials.userName ?? null,
    password: credentials.password ?? null,
    preemptiveAuth: credentials.preemptiveAuth,
    calendarService: calendar.info,
    contactsService: contacts.info,
    diagnosticLog: [calendar.log.toString(), contacts.log.toString()].join('\n'),
  });
}
