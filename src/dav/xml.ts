/**
 * XML helpers for WebDAV:
 * - PROPFIND request bodies
 * - multistatus responses to typed DavProperties
 */
import { XMLParser } from 'fast-xml-parser';
import { ProtocolError } from '../errors.js';
import {
  NS_APPLE_ICAL,
  NS_CALDAV,
  NS_CARDDAV,
  NS_DAV,
  PROPERTY_ELEMENTS,
  PROPERTY_KINDS,
  type DavProperties,
  type PropertyKind,
} from './types.js';
import { resolveReference } from './url.js';

/** Elements that may repeat and are always parsed as arrays */
const ARRAY_ELEMENTS = new Set(['response', 'propstat', 'href', 'comp', 'privilege']);

// Namespace prefixes are dropped: property names do not collide across the namespaces we request
const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  isArray: (name) => ARRAY_ELEMENTS.has(name),
});

const PREFIXES: Record<string, string> = {
  [NS_DAV]: 'd',
  [NS_CALDAV]: 'c',
  [NS_CARDDAV]: 'card',
  [NS_APPLE_ICAL]: 'a',
};

export interface MultistatusResponse {
  href: URL;
  properties: DavProperties;
}

/**
 * Build a PROPFIND body requesting the given properties
 */
export function buildPropfindBody(kinds: readonly PropertyKind[]): string {
  const props = kinds
    .map((kind) => {
      const element = PROPERTY_ELEMENTS[kind];
      return `    <${PREFIXES[element.namespace]}:${element.name}/>`;
    })
    .join('\n');

  const namespaces = Object.entries(PREFIXES)
    .map(([namespace, prefix]) => `xmlns:${prefix}="${namespace}"`)
    .join(' ');

  return `<?xml version="1.0" encoding="utf-8"?>
<d:propfind ${namespaces}>
  <d:prop>
${props}
  </d:prop>
</d:propfind>`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}

function readText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (isRecord(value)) return readText(value['#text']);
  return undefined;
}

function readNonEmptyText(value: unknown): string | undefined {
  const text = readText(value)?.trim();
  return text ? text : undefined;
}

/** Local names of the child elements, e.g. the tokens inside <resourcetype> */
function childNames(value: unknown): string[] {
  if (!isRecord(value)) return [];
  return Object.keys(value).filter((key) => !key.startsWith('@_') && key !== '#text');
}

function readHrefs(value: unknown): string[] {
  if (!isRecord(value)) return [];
  return asArray(value.href)
    .map((href) => readNonEmptyText(href))
    .filter((href): href is string => href !== undefined);
}

function isSuccessStatus(status: unknown): boolean {
  const text = readText(status);
  // A propstat without status is taken as successful
  if (text === undefined) return true;
  return /\s2\d\d(\s|$)/.test(text);
}

function extractProperties(prop: Record<string, unknown>, properties: DavProperties): void {
  for (const kind of PROPERTY_KINDS) {
    const value = prop[PROPERTY_ELEMENTS[kind].name];
    if (value === undefined) continue;

    switch (kind) {
      case 'resourceType':
        properties.resourceType = new Set(childNames(value));
        break;
      case 'currentUserPrincipal': {
        const [href] = readHrefs(value);
        properties.currentUserPrincipal = href ? { href } : {};
        break;
      }
      case 'calendarHomeSet':
        properties.calendarHomeSet = readHrefs(value);
        break;
      case 'addressbookHomeSet':
        properties.addressbookHomeSet = readHrefs(value);
        break;
      case 'currentUserPrivilegeSet':
        properties.currentUserPrivilegeSet = isRecord(value)
          ? asArray(value.privilege).flatMap((privilege) => childNames(privilege))
          : [];
        break;
      case 'supportedCalendarComponentSet':
        properties.supportedCalendarComponentSet = isRecord(value)
          ? asArray(value.comp)
              .map((comp) => (isRecord(comp) ? readNonEmptyText(comp['@_name']) : undefined))
              .filter((name): name is string => name !== undefined)
              .map((name) => name.toUpperCase())
          : [];
        break;
      case 'displayName':
      case 'calendarDescription':
      case 'addressbookDescription':
      case 'calendarColor':
      case 'calendarTimezone': {
        const text = readNonEmptyText(value);
        if (text !== undefined) properties[kind] = text;
        break;
      }
    }
  }
}

/**
 * Parse a 207 multistatus body.
 * Only properties from 2xx propstats are returned; hrefs are resolved against `base`.
 * @throws ProtocolError if the body is not a multistatus document
 */
export function parseMultistatus(xmlText: string, base: URL): MultistatusResponse[] {
  let parsed: unknown;
  try {
    parsed = xmlParser.parse(xmlText);
  } catch (error) {
    throw new ProtocolError(
      `Malformed XML from ${base.href}: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const multistatus = isRecord(parsed) ? parsed.multistatus : undefined;
  if (!isRecord(multistatus)) {
    throw new ProtocolError(`Expected a multistatus response from ${base.href}`);
  }

  return asArray(multistatus.response).filter(isRecord).map((response) => {
    const [href] = readHrefs(response);
    const properties: DavProperties = {};

    for (const propstat of asArray(response.propstat)) {
      if (!isRecord(propstat) || !isSuccessStatus(propstat.status)) continue;
      if (isRecord(propstat.prop)) {
        extractProperties(propstat.prop, properties);
      }
    }

    return {
      href: href ? resolveReference(base, href) : base,
      properties,
    };
  });
}
