import { randomUUID } from 'node:crypto';
import { format } from 'date-fns';
import { ControlNode, GroupNode, ParsedPolicy, Resource, RevisionRecord } from './types.js';

export const DEFAULT_OSCAL_VERSION = '1.1.2';

const TIMESTAMP_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

export interface CatalogOptions {
  oscalVersion?: string;
  /** Defaults to now */
  lastModified?: Date;
  /** Catalog identifier (default: a random UUID) */
  uuid?: string;
}

export interface CatalogPart {
  id: string;
  name: string;
  prose: string;
}

export interface CatalogControl {
  id: string;
  title: string;
  parts: CatalogPart[];
}

export interface CatalogGroup {
  id: string;
  title: string;
  groups?: CatalogGroup[];
  controls?: CatalogControl[];
}

export interface CatalogRevision {
  version: string;
  published: string;
  remarks?: string;
}

export interface CatalogResource {
  uuid: string;
  title: string;
  description: string;
  rlinks: { href: string }[];
}

export interface CatalogMetadata {
  title: string;
  published: string;
  'last-modified': string;
  version: string;
  'oscal-version': string;
  revisions?: CatalogRevision[];
}

export interface CatalogDocument {
  catalog: {
    uuid: string;
    metadata: CatalogMetadata;
    groups: CatalogGroup[];
    'back-matter'?: { resources: CatalogResource[] };
  };
}

export function formatTimestamp(date: Date): string {
  return format(date, TIMESTAMP_FORMAT);
}

function toRevision(record: RevisionRecord): CatalogRevision {
  const revision: CatalogRevision = {
    version: record.version,
    published: formatTimestamp(record.published)
  };
  if (record.remarks) {
    revision.remarks = record.remarks;
  }
  return revision;
}

function toControl(control: ControlNode): CatalogControl {
  return {
    id: control.id,
    title: control.title,
    parts: control.parts.map(part => ({ id: part.id, name: part.name, prose: part.prose }))
  };
}

function toGroup(group: GroupNode): CatalogGroup {
  const result: CatalogGroup = { id: group.id, title: group.title };
  if (group.groups && group.groups.length > 0) {
    result.groups = group.groups.map(toGroup);
  }
  if (group.controls && group.controls.length > 0) {
    result.controls = group.controls.map(toControl);
  }
  return result;
}

function toResource(resource: Resource): CatalogResource {
  return {
    uuid: resource.id,
    title: resource.title,
    description: resource.description,
    rlinks: [{ href: resource.link.href }]
  };
}

/**
 * Assemble the JSON-ready catalog for a parsed policy.
 */
export function toCatalog(parsed: ParsedPolicy, options: CatalogOptions = {}): CatalogDocument {
  const { metadata } = parsed;

  const catalogMetadata: CatalogMetadata = {
    title: metadata.title,
    published: formatTimestamp(metadata.published),
    'last-modified': formatTimestamp(options.lastModified ?? new Date()),
    version: metadata.version,
    'oscal-version': options.oscalVersion ?? DEFAULT_OSCAL_VERSION
  };
  if (metadata.revisions.length > 0) {
    catalogMetadata.revisions = metadata.revisions.map(toRevision);
  }

  const document: CatalogDocument = {
    catalog: {
      uuid: options.uuid ?? randomUUID(),
      metadata: catalogMetadata,
      groups: parsed.groups.map(toGroup)
    }
  };
  if (parsed.resources.length > 0) {
    document.catalog['back-matter'] = { resources: parsed.resources.map(toResource) };
  }

  return document;
}
