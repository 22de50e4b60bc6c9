/**
 * current-user-principal lookup and service capability check
 * RFC 5397 (current-user-principal), RFC 4791 Section 5.1 / RFC 6352 Section 6.1 (DAV header tokens)
 */
import { DavError } from '../errors.js';
import type { DavTransport, PropertyKind } from '../dav/types.js';
import { resolveReference } from '../dav/url.js';
import { recordIfCollectionOrHomeSet, type ServiceInfoAccumulator } from './collections.js';
import type { DiagnosticLog } from './diagnostic-log.js';
import { SERVICES, type ProbeOutcome, type ServiceKind } from './types.js';

const PRINCIPAL_ONLY: readonly PropertyKind[] = ['currentUserPrincipal'];

/**
 * Check whether `url` advertises the capability token of `service` in its DAV header.
 * Any DAV failure counts as "not provided".
 */
export async function providesService(
  transport: DavTransport,
  url: URL,
  service: ServiceKind,
  log: DiagnosticLog
): Promise<boolean> {
  try {
    const capabilities = await transport.options(url);
    return capabilities.has(SERVICES[service].capability);
  } catch (error) {
    if (!(error instanceof DavError)) throw error;
    log.error(`Couldn't detect services on ${url.href}`, error);
    return false;
  }
}

/**
 * Query `url` (PROPFIND, depth 0) for current-user-principal.
 * When `service` is given, the principal is only accepted if it provides that service.
 * When `result` is given too, the probed resource is also checked for collections and home sets.
 * DAV errors are returned as a "failed" outcome, never thrown.
 */
export async function resolvePrincipal(
  transport: DavTransport,
  url: URL,
  service: ServiceKind | undefined,
  log: DiagnosticLog,
  result?: ServiceInfoAccumulator
): Promise<ProbeOutcome<URL>> {
  let principal: URL;
  try {
    const resource = await transport.propfind(
      url,
      0,
      service !== undefined && result !== undefined ? SERVICES[service].probeProperties : PRINCIPAL_ONLY
    );
    if (service !== undefined && result !== undefined) {
      recordIfCollectionOrHomeSet(resource, service, result, log);
    }

    const href = resource.properties.currentUserPrincipal?.href;
    if (href === undefined) {
      return { kind: 'absent', reason: `No current-user-principal at ${resource.location.href}` };
    }
    principal = resolveReference(resource.location, href);
  } catch (error) {
    if (!(error instanceof DavError)) throw error;
    return { kind: 'failed', error };
  }

  log.info(`Found current-user-principal: ${principal.href}`);

  if (service !== undefined && !(await providesService(transport, principal, service, log))) {
    log.info(`${principal.href} doesn't provide required ${service} service, dismissing`);
    return { kind: 'absent', reason: `${principal.href} doesn't provide ${service}` };
  }

  return { kind: 'found', value: principal };
}
