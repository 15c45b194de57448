/**
 * XMP packet codec
 *
 * An XMP packet is handled as an ordered property bag: a list of properties
 * in document order plus a name index. Properties the codec does not rewrite
 * keep their original markup, so other tools' entries (including structured
 * ones) survive a write verbatim.
 *
 * Embedding: JPEG APP1 segments prefixed with the Adobe namespace and NUL,
 * PNG iTXt chunks keyed `XML:com.adobe.xmp`.
 */

import { toXmpDateTime } from './datetime.js';
import { Marker, createSegment, findApp1, upsertSegment, type JpegDocument } from './jpeg.js';
import { decodeTextChunk, textKeyword, upsertTextChunk, type PngDocument } from './png.js';
import { isExifFieldName, putField, type CodecLimits, type ExifFieldName, type MetadataField } from './types.js';
import { MetadataError } from '../lib/errors.js';

export const XMP_JPEG_HEADER = Buffer.from('http://ns.adobe.com/xap/1.0/\0', 'latin1');
export const XMP_PNG_KEYWORD = 'XML:com.adobe.xmp';

const RDF_NS = 'http://www.w3.org/1999/02/22-rdf-syntax-ns#';

/** Prefix for keys that belong to no other schema */
export const CUSTOM_PREFIX = 'imc';

export const wellKnownNamespaces: Record<string, string> = {
  dc: 'http://purl.org/dc/elements/1.1/',
  xmp: 'http://ns.adobe.com/xap/1.0/',
  xmpRights: 'http://ns.adobe.com/xap/1.0/rights/',
  xmpMM: 'http://ns.adobe.com/xap/1.0/mm/',
  photoshop: 'http://ns.adobe.com/photoshop/1.0/',
  tiff: 'http://ns.adobe.com/tiff/1.0/',
  exif: 'http://ns.adobe.com/exif/1.0/',
  Iptc4xmpCore: 'http://iptc.org/std/Iptc4xmpCore/1.0/xmlns/',
  [CUSTOM_PREFIX]: 'https://ns.image-metadata-codec.dev/1.0/'
};

const reservedPrefixes = new Set(['x', 'rdf', 'xml', 'xmlns']);

export type XmpValueKind = 'simple' | 'alt' | 'seq' | 'bag' | 'raw';

export interface XmpProperty {
  /** Qualified name, e.g. `dc:description` */
  name: string;
  kind: XmpValueKind;
  /** Plain-text value; inner markup for `raw` properties */
  value: string;
  /** Original element markup, reused while the property is unchanged */
  raw?: string;
}

const standardProperties: Record<ExifFieldName, { name: string; kind: XmpValueKind }> = {
  description: { name: 'dc:description', kind: 'alt' },
  artist: { name: 'dc:creator', kind: 'seq' },
  copyright: { name: 'dc:rights', kind: 'alt' },
  software: { name: 'xmp:CreatorTool', kind: 'simple' },
  datetime: { name: 'xmp:ModifyDate', kind: 'simple' },
  user_comment: { name: 'xmp:Label', kind: 'simple' }
};

const NCNAME = /^[A-Za-z_][A-Za-z0-9_.-]*$/;
const QNAME = /^([A-Za-z_][A-Za-z0-9_.-]*):([A-Za-z_][A-Za-z0-9_.-]*)$/;

// ─── XML text helpers ─────────────────────────────────────────────────────────

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

export function unescapeXml(text: string): string {
  return text.replace(/&(#x[0-9a-fA-F]+|#\d+|amp|lt|gt|quot|apos);/g, (match, entity: string) => {
    switch (entity) {
      case 'amp':
        return '&';
      case 'lt':
        return '<';
      case 'gt':
        return '>';
      case 'quot':
        return '"';
      case 'apos':
        return "'";
      default: {
        const codePoint = entity.startsWith('#x') ? parseInt(entity.slice(2), 16) : parseInt(entity.slice(1), 10);
        // References outside the Unicode range stay as written
        return codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
      }
    }
  });
}

const ATTRIBUTE = /([A-Za-z_][\w.-]*(?::[A-Za-z_][\w.-]*)?)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;
const START_TAG = /<([A-Za-z_][\w.-]*(?::[A-Za-z_][\w.-]*)?)((?:[^>"']|"[^"]*"|'[^']*')*?)(\/?)>/g;

function attributes(source: string): Array<[string, string]> {
  return [...source.matchAll(ATTRIBUTE)].map(match => [match[1] ?? '', match[2] ?? match[3] ?? '']);
}

/**
 * Index just past the close tag matching an element opened before `from`
 */
function findClose(xml: string, name: string, from: number): { start: number; end: number } | undefined {
  const tags = new RegExp(`<(/?)${name.replace(/[.]/g, '\\.')}(?=[\\s/>])((?:[^>"']|"[^"]*"|'[^']*')*?)(/?)>`, 'g');
  tags.lastIndex = from;
  let depth = 1;
  let match: RegExpExecArray | null;
  while ((match = tags.exec(xml)) !== null) {
    if (match[1] === '/') {
      depth--;
      if (depth === 0) {
        return { start: match.index, end: match.index + match[0].length };
      }
    } else if (match[3] !== '/') {
      depth++;
    }
  }
  return undefined;
}

function listItems(inner: string): string[] | undefined {
  const items: string[] = [];
  for (const match of inner.matchAll(/<rdf:li\b((?:[^>"']|"[^"]*"|'[^']*')*?)(\/?)>([\s\S]*?)(?:<\/rdf:li>|$)/g)) {
    const text = match[2] === '/' ? '' : (match[3] ?? '');
    if (text.includes('<')) {
      return undefined;
    }
    const lang = attributes(match[1] ?? '').find(([name]) => name === 'xml:lang')?.[1];
    if (lang === 'x-default') {
      items.unshift(unescapeXml(text));
    } else {
      items.push(unescapeXml(text));
    }
  }
  return items;
}

function classify(name: string, inner: string, raw: string): XmpProperty {
  const trimmed = inner.trim();
  if (!trimmed.includes('<')) {
    return { name, kind: 'simple', value: unescapeXml(inner), raw };
  }

  const container = /^<rdf:(Alt|Seq|Bag)\b/.exec(trimmed);
  if (container) {
    const items = listItems(trimmed);
    if (items) {
      const kind = container[1] === 'Alt' ? 'alt' : container[1] === 'Seq' ? 'seq' : 'bag';
      const value = kind === 'alt' ? (items[0] ?? '') : items.join('; ');
      return { name, kind, value, raw };
    }
  }

  return { name, kind: 'raw', value: trimmed, raw };
}

function renderProperty(property: XmpProperty): string {
  const { name, kind, value } = property;
  switch (kind) {
    case 'simple':
      return `<${name}>${escapeXml(value)}</${name}>`;
    case 'raw':
      return `<${name}>${value}</${name}>`;
    case 'alt':
      return [
        `<${name}>`,
        '    <rdf:Alt>',
        `     <rdf:li xml:lang="x-default">${escapeXml(value)}</rdf:li>`,
        '    </rdf:Alt>',
        `   </${name}>`
      ].join('\n');
    case 'seq':
    case 'bag': {
      const container = kind === 'seq' ? 'rdf:Seq' : 'rdf:Bag';
      return [
        `<${name}>`,
        `    <${container}>`,
        `     <rdf:li>${escapeXml(value)}</rdf:li>`,
        `    </${container}>`,
        `   </${name}>`
      ].join('\n');
    }
  }
}

// ─── Packet ───────────────────────────────────────────────────────────────────

export class XmpPacket {
  /** prefix → namespace URI, in declaration order */
  readonly namespaces = new Map<string, string>();
  private readonly properties: XmpProperty[] = [];
  private readonly index = new Map<string, number>();

  static parse(xml: string): XmpPacket {
    const packet = new XmpPacket();

    for (const match of xml.matchAll(/xmlns:([A-Za-z_][\w.-]*)\s*=\s*(?:"([^"]*)"|'([^']*)')/g)) {
      const prefix = match[1] ?? '';
      if (!reservedPrefixes.has(prefix) && !packet.namespaces.has(prefix)) {
        packet.namespaces.set(prefix, match[2] ?? match[3] ?? '');
      }
    }

    const body = xml.replace(/<!--[\s\S]*?-->/g, '');
    const descriptions = /<rdf:Description\b((?:[^>"']|"[^"]*"|'[^']*')*?)(\/?)>/g;
    let match: RegExpExecArray | null;

    while ((match = descriptions.exec(body)) !== null) {
      for (const [name, value] of attributes(match[1] ?? '')) {
        const prefix = name.split(':')[0] ?? '';
        if (name.includes(':') && !reservedPrefixes.has(prefix)) {
          packet.add({ name, kind: 'simple', value: unescapeXml(value) });
        }
      }
      if (match[2] === '/') {
        continue;
      }

      const contentStart = match.index + match[0].length;
      const close = findClose(body, 'rdf:Description', contentStart);
      const contentEnd = close ? close.start : body.length;
      packet.parseProperties(body.slice(contentStart, contentEnd));
      descriptions.lastIndex = close ? close.end : body.length;
    }

    return packet;
  }

  private parseProperties(content: string): void {
    const tags = new RegExp(START_TAG.source, 'g');
    let match: RegExpExecArray | null;

    while ((match = tags.exec(content)) !== null) {
      const name = match[1] ?? '';
      if (match[3] === '/') {
        const resource = attributes(match[2] ?? '').find(([attr]) => attr === 'rdf:resource')?.[1];
        this.add({ name, kind: 'raw', value: resource ?? '', raw: match[0] });
        continue;
      }

      const innerStart = match.index + match[0].length;
      const close = findClose(content, name, innerStart);
      if (!close) {
        break;
      }
      const raw = content.slice(match.index, close.end);
      this.add(classify(name, content.slice(innerStart, close.start), raw));
      tags.lastIndex = close.end;
    }
  }

  private add(property: XmpProperty): void {
    if (this.index.has(property.name)) {
      return;
    }
    this.index.set(property.name, this.properties.length);
    this.properties.push(property);
  }

  get size(): number {
    return this.properties.length;
  }

  has(name: string): boolean {
    return this.index.has(name);
  }

  get(name: string): XmpProperty | undefined {
    const position = this.index.get(name);
    return position === undefined ? undefined : this.properties[position];
  }

  /**
   * Set a property value. Existing properties keep their position and, when
   * the value is unchanged, their original markup.
   */
  set(name: string, value: string, kind: XmpValueKind = 'simple'): void {
    const position = this.index.get(name);
    const existing = position === undefined ? undefined : this.properties[position];

    if (existing && position !== undefined) {
      if (existing.value === value && existing.kind !== 'raw') {
        return;
      }
      // A structured value replaced by plain text becomes a simple property
      this.properties[position] = {
        name,
        kind: existing.kind !== 'raw' ? existing.kind : kind === 'raw' ? 'simple' : kind,
        value
      };
      return;
    }

    const prefix = name.split(':')[0] ?? '';
    if (!this.namespaces.has(prefix)) {
      const uri = wellKnownNamespaces[prefix];
      if (uri === undefined) {
        throw new MetadataError('InvalidFieldValue', `XMP namespace prefix "${prefix}" is not declared`, {
          key: name,
          codec: 'xmp'
        });
      }
      this.namespaces.set(prefix, uri);
    }
    this.add({ name, kind: kind === 'raw' ? 'simple' : kind, value });
  }

  entries(): XmpProperty[] {
    return [...this.properties];
  }

  toFields(): MetadataField[] {
    return this.properties.map(property => ({
      namespace: 'XMP' as const,
      key: fieldKeyFor(property.name),
      value: property.value,
      typeHint: property.name === standardProperties.datetime.name ? ('DATETIME' as const) : ('TEXT' as const)
    }));
  }

  serialize(): string {
    const declarations = [...this.namespaces.entries()]
      .map(([prefix, uri]) => `\n    xmlns:${prefix}="${escapeXml(uri)}"`)
      .join('');

    return [
      '<?xpacket begin="\uFEFF" id="W5M0MpCehiHzreSzNTczkc9d"?>',
      '<x:xmpmeta xmlns:x="adobe:ns:meta/">',
      ` <rdf:RDF xmlns:rdf="${RDF_NS}">`,
      `  <rdf:Description rdf:about=""${declarations}>`,
      ...this.properties.map(property => `   ${property.raw ?? renderProperty(property)}`),
      '  </rdf:Description>',
      ' </rdf:RDF>',
      '</x:xmpmeta>',
      '<?xpacket end="w"?>'
    ].join('\n');
  }
}

function fieldKeyFor(name: string): string {
  for (const [field, property] of Object.entries(standardProperties)) {
    if (property.name === name) {
      return field;
    }
  }
  if (name.startsWith(`${CUSTOM_PREFIX}:`)) {
    return name.slice(CUSTOM_PREFIX.length + 1);
  }
  return name;
}

/**
 * Resolve a request key to an XMP property name and value kind
 */
function propertyFor(key: string, packet: XmpPacket): { name: string; kind: XmpValueKind } {
  if (isExifFieldName(key)) {
    return standardProperties[key];
  }

  if (NCNAME.test(key)) {
    return { name: `${CUSTOM_PREFIX}:${key}`, kind: 'simple' };
  }

  const qualified = QNAME.exec(key);
  const prefix = qualified?.[1];
  if (!qualified || prefix === undefined) {
    throw new MetadataError('InvalidFieldValue', `"${key}" is not a valid XMP property name`, {
      key,
      codec: 'xmp'
    });
  }
  if (reservedPrefixes.has(prefix)) {
    throw new MetadataError('InvalidFieldValue', `XMP prefix "${prefix}" is reserved`, { key, codec: 'xmp' });
  }
  if (!packet.namespaces.has(prefix) && wellKnownNamespaces[prefix] === undefined) {
    throw new MetadataError('InvalidFieldValue', `XMP namespace prefix "${prefix}" is not declared`, {
      key,
      codec: 'xmp'
    });
  }
  const kind = packet.get(key)?.kind;
  return { name: key, kind: kind === undefined || kind === 'raw' ? 'simple' : kind };
}

/**
 * Merge request fields into a packet; returns the stored values
 */
export function applyXmpFields(packet: XmpPacket, fields: Record<string, string>): Record<string, string> {
  const applied: Record<string, string> = {};
  for (const [key, raw] of Object.entries(fields)) {
    const { name, kind } = propertyFor(key, packet);
    const value = key === 'datetime' ? toXmpDateTime(raw, key) : raw;
    packet.set(name, value, kind);
    putField(applied, key, value);
  }
  return applied;
}

function encodePacket(packet: XmpPacket, limit: number): Buffer {
  const bytes = Buffer.from(packet.serialize(), 'utf8');
  if (bytes.length > limit) {
    throw new MetadataError(
      'ResourceLimitExceeded',
      `XMP packet of ${bytes.length} bytes exceeds the ${limit}-byte limit`,
      { codec: 'xmp' }
    );
  }
  return bytes;
}

// ─── JPEG embedding ───────────────────────────────────────────────────────────

export function readJpegXmp(document: JpegDocument): XmpPacket | undefined {
  const segment = document.segments[findApp1(document, XMP_JPEG_HEADER)];
  if (!segment) {
    return undefined;
  }
  return XmpPacket.parse(segment.payload.subarray(XMP_JPEG_HEADER.length).toString('utf8'));
}

/** After the last leading APP0/APP1 segment, or straight after SOI */
function xmpInsertIndex(document: JpegDocument): number {
  let index = 0;
  document.segments.forEach((segment, position) => {
    if (segment.marker === Marker.APP0 || segment.marker === Marker.APP1) {
      index = position + 1;
    }
  });
  return index;
}

export function writeJpegXmp(
  document: JpegDocument,
  fields: Record<string, string>,
  limits: CodecLimits
): Record<string, string> {
  const index = findApp1(document, XMP_JPEG_HEADER);
  const packet = readJpegXmp(document) ?? new XmpPacket();
  const applied = applyXmpFields(packet, fields);

  const bytes = encodePacket(packet, limits.maxXmpBytes);
  const segment = createSegment(Marker.APP1, Buffer.concat([XMP_JPEG_HEADER, bytes]));
  upsertSegment(document, index, segment, () => xmpInsertIndex(document));
  return applied;
}

// ─── PNG embedding ────────────────────────────────────────────────────────────

export function readPngXmp(document: PngDocument, limits: CodecLimits): XmpPacket | undefined {
  const chunk = document.chunks.find(candidate => textKeyword(candidate) === XMP_PNG_KEYWORD);
  if (!chunk) {
    return undefined;
  }
  return XmpPacket.parse(decodeTextChunk(chunk, limits).text);
}

export function writePngXmp(
  document: PngDocument,
  fields: Record<string, string>,
  limits: CodecLimits
): Record<string, string> {
  const packet = readPngXmp(document, limits) ?? new XmpPacket();
  const applied = applyXmpFields(packet, fields);
  const bytes = encodePacket(packet, limits.maxXmpBytes);
  upsertTextChunk(document, XMP_PNG_KEYWORD, bytes.toString('utf8'), limits, true);
  return applied;
}

/**
 * Fields of a standalone packet (WebP `XMP ` chunk, sidecar text)
 */
export function readXmpFields(xml: string): MetadataField[] {
  return XmpPacket.parse(xml).toFields();
}
