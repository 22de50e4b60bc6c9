/**
 * Recording of calendar/address book collections and home sets found while probing.
 */
import type { DavResource } from '../dav/types.js';
import { resolveReference, withTrailingSlash } from '../dav/url.js';
import type { DiagnosticLog } from './diagnostic-log.js';
import { SERVICES, type CollectionInfo, type ServiceInfo, type ServiceKind } from './types.js';

/** Privileges that allow changing the content of a collection */
const WRITE_PRIVILEGES = ['all', 'write', 'write-content'];

/**
 * Mutable per-pipeline result. Passed into every recording step, frozen into a ServiceInfo at the end.
 */
export class ServiceInfoAccumulator {
  principal: URL | null = null;
  readonly homeSets = new Set<string>();
  readonly collections = new Map<string, CollectionInfo>();

  /** A service is worth reporting if anything at all was found */
  isUseful(): boolean {
    return this.principal !== null || this.homeSets.size > 0 || this.collections.size > 0;
  }

  toServiceInfo(): ServiceInfo {
    return Object.freeze({
      principal: this.principal?.href ?? null,
      homeSets: Object.freeze([...this.homeSets]),
      collections: Object.freeze(Object.fromEntries(this.collections)),
    });
  }
}

/**
 * Build collection metadata from a probed resource.
 * @param url - Normalized collection URL (trailing slash)
 */
export function collectionInfoFromResource(
  resource: DavResource,
  service: ServiceKind,
  url: string
): CollectionInfo {
  const { properties } = resource;
  const privileges = [...(properties.currentUserPrivilegeSet ?? [])];
  const components = properties.supportedCalendarComponentSet;

  return Object.freeze({
    url,
    type: SERVICES[service].collectionType,
    displayName: properties.displayName ?? null,
    description:
      (service === 'caldav' ? properties.calendarDescription : properties.addressbookDescription) ?? null,
    color: service === 'caldav' ? properties.calendarColor ?? null : null,
    timezone: service === 'caldav' ? properties.calendarTimezone ?? null : null,
    privileges: Object.freeze(privileges),
    // Without a privilege set the server did not restrict anything
    readOnly:
      properties.currentUserPrivilegeSet !== undefined &&
      !privileges.some((privilege) => WRITE_PRIVILEGES.includes(privilege)),
    ...(service === 'caldav' && {
      supportsEvents: components === undefined || components.includes('VEVENT'),
      supportsTasks: components === undefined || components.includes('VTODO'),
    }),
  });
}

/**
 * Record `resource` as a collection if its resource type matches the service,
 * and record every home set it references. Both apply independently.
 * Re-recording the same collection overwrites its entry.
 */
export function recordIfCollectionOrHomeSet(
  resource: DavResource,
  service: ServiceKind,
  result: ServiceInfoAccumulator,
  log: DiagnosticLog
): void {
  const definition = SERVICES[service];

  if (resource.properties.resourceType?.has(definition.collectionType)) {
    const location = withTrailingSlash(resource.location);
    log.info(`Found ${definition.collectionType} collection at ${location}`);
    result.collections.set(location, collectionInfoFromResource(resource, service, location));
  }

  for (const href of resource.properties[definition.homeSetProperty] ?? []) {
    const homeSet = withTrailingSlash(resolveReference(resource.location, href));
    log.info(`Found ${definition.collectionType} home set at ${homeSet}`);
    result.homeSets.add(homeSet);
  }
}
