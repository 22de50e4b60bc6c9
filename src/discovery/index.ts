/**
 * CalDAV/CardDAV service discovery module
 * Exports the high-level discover() API plus the building blocks it chains
 */

// Types
export type {
  CollectionInfo,
  Configuration,
  Credentials,
  ProbeOutcome,
  ServiceInfo,
  ServiceKind,
  ServiceLocation,
} from './types.js';
export { SERVICES } from './types.js';
export type { DavTransport, DavResource, DavProperties, PropertyKind } from '../dav/types.js';
export {
  DavError,
  TransportError,
  NotFoundError,
  ProtocolError,
  DnsResolutionError,
  InvalidInputError,
} from '../errors.js';

// Low-level discovery functions
export { locateService, srvQueryName, type DnsResolver } from './dns-srv.js';
export { providesService, resolvePrincipal } from './principal.js';
export { ServiceInfoAccumulator, recordIfCollectionOrHomeSet } from './collections.js';
export { DiagnosticLog } from './diagnostic-log.js';
export { DavClient, type DavClientOptions } from '../dav/client.js';

// High-level orchestration
export {
  discover,
  findServiceInfo,
  parseDiscoveryInput,
  extractDomain,
  type DiscoveryOptions,
} from './orchestrator.js';
