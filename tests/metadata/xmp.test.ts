import { describe, it, expect } from 'vitest';

import { parseJpeg, serializeJpeg } from '../../src/metadata/jpeg.js';
import { parsePng, serializePng } from '../../src/metadata/png.js';
import { defaultLimits, fieldsToRecord } from '../../src/metadata/types.js';
import {
  XMP_PNG_KEYWORD,
  XmpPacket,
  applyXmpFields,
  readJpegXmp,
  readPngXmp,
  writeJpegXmp,
  writePngXmp
} from '../../src/metadata/xmp.js';
import { catchError } from '../helpers/errors.js';
import { asciiEntry, buildJpeg, buildPng, buildTiff, exifSegment, jfifSegment } from '../helpers/test-images.js';

const SAMPLE = `<?xpacket begin="\uFEFF" id="W5M0MpCehiHzreSzNTczkc9d"?>
<x:xmpmeta xmlns:x="adobe:ns:meta/">
 <rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">
  <rdf:Description rdf:about=""
    xmlns:dc="http://purl.org/dc/elements/1.1/"
    xmlns:xmp="http://ns.adobe.com/xap/1.0/"
    xmlns:acme="http://example.com/acme/1.0/"
    xmp:Rating="5">
   <!-- <dc:ignored>x</dc:ignored> -->
   <dc:description>
    <rdf:Alt>
     <rdf:li xml:lang="de">Altes Foto</rdf:li>
     <rdf:li xml:lang="x-default">Old photo &amp; frame</rdf:li>
    </rdf:Alt>
   </dc:description>
   <dc:creator>
    <rdf:Seq>
     <rdf:li>Ann</rdf:li>
     <rdf:li>Bob</rdf:li>
    </rdf:Seq>
   </dc:creator>
   <acme:flag>on</acme:flag>
   <acme:info rdf:parseType="Resource">
    <acme:lens>50mm</acme:lens>
   </acme:info>
  </rdf:Description>
 </rdf:RDF>
</x:xmpmeta>
<?xpacket end="w"?>`;

const STRUCTURED = `<acme:info rdf:parseType="Resource">
    <acme:lens>50mm</acme:lens>
   </acme:info>`;

const names = (packet: XmpPacket) => packet.entries().map(property => property.name);

describe('XMP packet codec', () => {
  describe('parsing', () => {
    it('should collect properties from elements and attribute shorthand in order', () => {
      const packet = XmpPacket.parse(SAMPLE);

      expect(names(packet)).toEqual(['xmp:Rating', 'dc:description', 'dc:creator', 'acme:flag', 'acme:info']);
      expect([...packet.namespaces.keys()]).toEqual(['dc', 'xmp', 'acme']);
    });

    it('should map standard properties to field names and keep the rest qualified', () => {
      expect(fieldsToRecord(XmpPacket.parse(SAMPLE).toFields())).toEqual({
        'xmp:Rating': '5',
        description: 'Old photo & frame',
        artist: 'Ann; Bob',
        'acme:flag': 'on',
        'acme:info': '<acme:lens>50mm</acme:lens>'
      });
    });

    it('should keep the markup of structured properties', () => {
      expect(XmpPacket.parse(SAMPLE).get('acme:info')).toEqual({
        name: 'acme:info',
        kind: 'raw',
        value: '<acme:lens>50mm</acme:lens>',
        raw: STRUCTURED
      });
    });

    it('should ignore commented-out properties', () => {
      expect(XmpPacket.parse(SAMPLE).has('dc:ignored')).toBe(false);
    });

    it('should keep numeric references outside the Unicode range as written', () => {
      const xml = SAMPLE.replace('<acme:flag>on</acme:flag>', '<acme:flag>&#x110000; &#65; &#1114112;</acme:flag>');
      expect(XmpPacket.parse(xml).get('acme:flag')?.value).toBe('&#x110000; A &#1114112;');
    });
  });

  describe('merging', () => {
    it('should merge keys without dropping unknown properties', () => {
      const packet = XmpPacket.parse(SAMPLE);
      const applied = applyXmpFields(packet, {
        description: 'Restored',
        datetime: '2024:01:15 10:30:00',
        album: 'Summer'
      });
      const result = XmpPacket.parse(packet.serialize());

      expect(applied).toEqual({ description: 'Restored', datetime: '2024-01-15T10:30:00', album: 'Summer' });
      expect(names(result)).toEqual([
        'xmp:Rating',
        'dc:description',
        'dc:creator',
        'acme:flag',
        'acme:info',
        'xmp:ModifyDate',
        'imc:album'
      ]);
      expect(fieldsToRecord(result.toFields())).toEqual({
        'xmp:Rating': '5',
        description: 'Restored',
        artist: 'Ann; Bob',
        'acme:flag': 'on',
        'acme:info': '<acme:lens>50mm</acme:lens>',
        datetime: '2024-01-15T10:30:00',
        album: 'Summer'
      });
      expect(result.get('acme:info')?.raw).toBe(STRUCTURED);
      expect(result.get('dc:description')?.kind).toBe('alt');
      expect(result.namespaces.get('imc')).toBe('https://ns.image-metadata-codec.dev/1.0/');
    });

    it('should keep original markup for unchanged values', () => {
      const packet = XmpPacket.parse(SAMPLE);
      applyXmpFields(packet, { 'acme:flag': 'on', artist: 'Ann; Bob' });
      expect(packet.get('dc:creator')?.raw).toBeDefined();
      expect(packet.get('acme:flag')?.raw).toBe('<acme:flag>on</acme:flag>');
    });

    it('should write a structured property as escaped text', () => {
      const packet = XmpPacket.parse(SAMPLE);
      applyXmpFields(packet, { 'acme:info': '<b>' });
      expect(packet.serialize()).toContain('   <acme:info>&lt;b&gt;</acme:info>\n');
    });

    it('should round-trip characters that need escaping', () => {
      const packet = new XmpPacket();
      applyXmpFields(packet, { note: `a<b & "c" 'd'` });
      expect(fieldsToRecord(XmpPacket.parse(packet.serialize()).toFields())).toEqual({ note: `a<b & "c" 'd'` });
    });

    it('should accept well-known prefixes and reject unusable keys', () => {
      const packet = XmpPacket.parse(SAMPLE);
      expect(applyXmpFields(packet, { 'photoshop:City': 'Berlin' })).toEqual({ 'photoshop:City': 'Berlin' });

      for (const key of ['vendor:flag', 'rdf:about', '1bad', 'a b', 'x:y:z']) {
        expect(catchError(() => applyXmpFields(packet, { [key]: 'v' }))).toMatchObject({
          code: 'InvalidFieldValue',
          context: { key, codec: 'xmp' }
        });
      }
    });
  });

  describe('serialization', () => {
    it('should wrap a fresh packet in an xpacket', () => {
      const packet = new XmpPacket();
      applyXmpFields(packet, { software: 'Codec 1.0' });

      expect(packet.serialize()).toBe(
        [
          '<?xpacket begin="\uFEFF" id="W5M0MpCehiHzreSzNTczkc9d"?>',
          '<x:xmpmeta xmlns:x="adobe:ns:meta/">',
          ' <rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">',
          '  <rdf:Description rdf:about=""',
          '    xmlns:xmp="http://ns.adobe.com/xap/1.0/">',
          '   <xmp:CreatorTool>Codec 1.0</xmp:CreatorTool>',
          '  </rdf:Description>',
          ' </rdf:RDF>',
          '</x:xmpmeta>',
          '<?xpacket end="w"?>'
        ].join('\n')
      );
    });

    it('should serialize a reparsed packet identically', () => {
      const packet = new XmpPacket();
      applyXmpFields(packet, { description: 'Hello', artist: 'Ann', album: 'Summer' });
      const xml = packet.serialize();
      expect(XmpPacket.parse(xml).serialize()).toBe(xml);
    });
  });

  describe('JPEG embedding', () => {
    it('should add an XMP APP1 segment after the last APP0/APP1', () => {
      const document = parseJpeg(buildJpeg([jfifSegment(), exifSegment(buildTiff([asciiEntry(0x010e, 'x')]))]));
      writeJpegXmp(document, { album: 'Summer' }, defaultLimits);
      const result = parseJpeg(serializeJpeg(document));

      expect(result.segments.map(segment => segment.marker)).toEqual([0xe0, 0xe1, 0xe1, 0xc0]);
      expect(result.segments[2]?.payload.subarray(0, 29).toString('latin1')).toBe('http://ns.adobe.com/xap/1.0/\0');
      expect(fieldsToRecord(readJpegXmp(result)?.toFields() ?? [])).toEqual({ album: 'Summer' });
    });

    it('should merge into the existing packet on a second write', () => {
      const document = parseJpeg(buildJpeg());
      writeJpegXmp(document, { album: 'Summer' }, defaultLimits);
      writeJpegXmp(document, { rating: '4' }, defaultLimits);

      expect(document.segments.map(segment => segment.marker)).toEqual([0xe0, 0xe1, 0xc0]);
      expect(fieldsToRecord(readJpegXmp(document)?.toFields() ?? [])).toEqual({ album: 'Summer', rating: '4' });
    });

    it('should enforce the packet size limit', () => {
      const document = parseJpeg(buildJpeg());
      expect(
        catchError(() => writeJpegXmp(document, { album: 'Summer' }, { ...defaultLimits, maxXmpBytes: 100 }))
      ).toMatchObject({ code: 'ResourceLimitExceeded', context: { codec: 'xmp' } });
    });
  });

  describe('PNG embedding', () => {
    it('should store the packet in an iTXt chunk before IEND', () => {
      const document = parsePng(buildPng(), defaultLimits);
      writePngXmp(document, { description: 'Hello' }, defaultLimits);
      const result = parsePng(serializePng(document), defaultLimits);

      expect(result.chunks.map(chunk => chunk.type)).toEqual(['IHDR', 'IDAT', 'iTXt', 'IEND']);
      expect(result.chunks[2]?.data.subarray(0, XMP_PNG_KEYWORD.length).toString('latin1')).toBe(XMP_PNG_KEYWORD);
      expect(fieldsToRecord(readPngXmp(result, defaultLimits)?.toFields() ?? [])).toEqual({ description: 'Hello' });
    });

    it('should leave the chunk untouched when nothing changes', () => {
      const document = parsePng(buildPng(), defaultLimits);
      writePngXmp(document, { description: 'Hello' }, defaultLimits);
      const once = serializePng(document);

      const again = parsePng(once, defaultLimits);
      writePngXmp(again, { description: 'Hello' }, defaultLimits);
      expect(serializePng(again).equals(once)).toBe(true);
    });
  });
});
