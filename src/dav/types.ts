/**
 * WebDAV / CalDAV / CardDAV resource types.
 * A probed resource exposes a sparse set of typed properties keyed by a closed set of kinds.
 */

export const NS_DAV = 'DAV:';
export const NS_CALDAV = 'urn:ietf:params:xml:ns:caldav';
export const NS_CARDDAV = 'urn:ietf:params:xml:ns:carddav';
export const NS_APPLE_ICAL = 'http://apple.com/ns/ical/';

/** Resource type tokens (local names of the children of DAV:resourcetype) */
export const ResourceTypes = {
  COLLECTION: 'collection',
  PRINCIPAL: 'principal',
  CALENDAR: 'calendar',
  ADDRESSBOOK: 'addressbook',
} as const;

/** Typed properties of one resource; a key is absent when the server did not return it */
export interface DavProperties {
  resourceType?: ReadonlySet<string>;
  displayName?: string;
  /** Present as `{}` when the element exists without an href (e.g. `<unauthenticated/>`) */
  currentUserPrincipal?: { href?: string };
  calendarHomeSet?: readonly string[];
  addressbookHomeSet?: readonly string[];
  calendarDescription?: string;
  addressbookDescription?: string;
  calendarColor?: string;
  calendarTimezone?: string;
  currentUserPrivilegeSet?: readonly string[];
  supportedCalendarComponentSet?: readonly string[];
}

export type PropertyKind = keyof DavProperties;

export const PROPERTY_KINDS: readonly PropertyKind[] = [
  'resourceType',
  'displayName',
  'currentUserPrincipal',
  'calendarHomeSet',
  'addressbookHomeSet',
  'calendarDescription',
  'addressbookDescription',
  'calendarColor',
  'calendarTimezone',
  'currentUserPrivilegeSet',
  'supportedCalendarComponentSet',
];

/** XML element requested in PROPFIND for each property kind */
export const PROPERTY_ELEMENTS: Record<PropertyKind, { namespace: string; name: string }> = {
  resourceType: { namespace: NS_DAV, name: 'resourcetype' },
  displayName: { namespace: NS_DAV, name: 'displayname' },
  currentUserPrincipal: { namespace: NS_DAV, name: 'current-user-principal' },
  currentUserPrivilegeSet: { namespace: NS_DAV, name: 'current-user-privilege-set' },
  calendarHomeSet: { namespace: NS_CALDAV, name: 'calendar-home-set' },
  calendarDescription: { namespace: NS_CALDAV, name: 'calendar-description' },
  calendarTimezone: { namespace: NS_CALDAV, name: 'calendar-timezone' },
  supportedCalendarComponentSet: { namespace: NS_CALDAV, name: 'supported-calendar-component-set' },
  calendarColor: { namespace: NS_APPLE_ICAL, name: 'calendar-color' },
  addressbookHomeSet: { namespace: NS_CARDDAV, name: 'addressbook-home-set' },
  addressbookDescription: { namespace: NS_CARDDAV, name: 'addressbook-description' },
};

export type Depth = 0 | 1;

/** A resource after PROPFIND: its final location (after redirects) and its properties */
export interface DavResource {
  location: URL;
  properties: DavProperties;
}

/**
 * WebDAV capability consumed by discovery.
 * Implementations throw DavError subclasses (TransportError, NotFoundError, ProtocolError).
 * One instance is not assumed safe for concurrent use by several pipelines.
 */
export interface DavTransport {
  propfind(url: URL, depth: Depth, properties: readonly PropertyKind[]): Promise<DavResource>;
  /** Capability tokens from the DAV response header of an OPTIONS request */
  options(url: URL): Promise<ReadonlySet<string>>;
}
