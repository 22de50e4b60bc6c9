/**
 * CalDAV/CardDAV discovery result types
 * Supports the user-given URL, .well-known/{service}, and DNS SRV/TXT discovery
 */
import type { DavError } from '../errors.js';
import type { PropertyKind } from '../dav/types.js';

export type ServiceKind = 'caldav' | 'carddav';

export interface ServiceDefinition {
  kind: ServiceKind;
  /** Token the server must advertise in the DAV header of the principal */
  capability: string;
  /** Resource type token of a collection of this service */
  collectionType: 'calendar' | 'addressbook';
  homeSetProperty: 'calendarHomeSet' | 'addressbookHomeSet';
  /** Properties requested when probing the user-given URL */
  probeProperties: readonly PropertyKind[];
}

export const SERVICES: Record<ServiceKind, ServiceDefinition> = {
  caldav: {
    kind: 'caldav',
    capability: 'calendar-access',
    collectionType: 'calendar',
    homeSetProperty: 'calendarHomeSet',
    probeProperties: [
      'resourceType',
      'displayName',
      'calendarColor',
      'calendarDescription',
      'calendarTimezone',
      'currentUserPrivilegeSet',
      'supportedCalendarComponentSet',
      'calendarHomeSet',
      'currentUserPrincipal',
    ],
  },
  carddav: {
    kind: 'carddav',
    capability: 'addressbook',
    collectionType: 'addressbook',
    homeSetProperty: 'addressbookHomeSet',
    probeProperties: [
      'resourceType',
      'displayName',
      'addressbookDescription',
      'currentUserPrivilegeSet',
      'addressbookHomeSet',
      'currentUserPrincipal',
    ],
  },
};

/** Metadata of one discovered calendar or address book */
export interface CollectionInfo {
  readonly url: string;
  readonly type: 'calendar' | 'addressbook';
  readonly displayName: string | null;
  readonly description: string | null;
  /** Calendar color as sent by the server, e.g. "#3A87ADFF" */
  readonly color: string | null;
  /** VTIMEZONE of the calendar */
  readonly timezone: string | null;
  readonly privileges: readonly string[];
  readonly readOnly: boolean;
  readonly supportsEvents?: boolean;
  readonly supportsTasks?: boolean;
}

/** Frozen, together with its arrays, records and collections */
export interface ServiceInfo {
  readonly principal: string | null;
  readonly homeSets: readonly string[];
  readonly collections: Readonly<Record<string, CollectionInfo>>;
}

export interface Credentials {
  userName?: string;
  password?: string;
  preemptiveAuth: boolean;
}

export interface Configuration {
  readonly userName: string | null;
  readonly password: string | null;
  readonly preemptiveAuth: boolean;
  readonly calendarService: ServiceInfo | null;
  readonly contactsService: ServiceInfo | null;
  readonly diagnosticLog: string;
}

/**
 * Result of one discovery probe.
 * "absent" means the server answered but gave nothing usable; "failed" means the probe broke.
 */
export type ProbeOutcome<T> =
  | { kind: 'found'; value: T }
  | { kind: 'absent'; reason: string }
  | { kind: 'failed'; error: DavError };

/** Where DNS discovery should look for the service */
export interface ServiceLocation {
  scheme: 'https';
  host: string;
  port: number;
  /** Initial context paths in the order they are tried */
  paths: string[];
}
