import { describe, it, expect } from 'vitest';
import { buildDescriptorXml, descriptorFileName, groupBySchema, parseDescriptorXml } from '../dublin-core.js';
import type { MetadataValue } from '@/types.js';

const value = (element: string, text: string, extra: Partial<MetadataValue> = {}): MetadataValue => ({
    schema: 'dc', element, qualifier: null, language: null, value: text, ...extra
});

describe('descriptorFileName', () => {
    it('uses dublin_core.xml for dc and metadata_<schema>.xml otherwise', () => {
        expect(descriptorFileName('dc')).toBe('dublin_core.xml');
        expect(descriptorFileName('local')).toBe('metadata_local.xml');
    });
});

describe('buildDescriptorXml', () => {
    it('writes one dcvalue per field with optional attributes', () => {
        const xml = buildDescriptorXml('dc', [
            value('title', 'Alpha'),
            value('date', '2023-01-05', { qualifier: 'issued' }),
            value('title', 'Alphé', { qualifier: 'alternative', language: 'fr' })
        ]);
        expect(xml).toBe([
            '<?xml version="1.0" encoding="UTF-8"?>',
            '<dublin_core schema="dc">',
            '  <dcvalue element="title">Alpha</dcvalue>',
            '  <dcvalue element="date" qualifier="issued">2023-01-05</dcvalue>',
            '  <dcvalue element="title" qualifier="alternative" language="fr">Alphé</dcvalue>',
            '</dublin_core>',
            ''
        ].join('\n'));
    });

    it('escapes markup in values', () => {
        const xml = buildDescriptorXml('dc', [value('title', `Tom & Jerry's <"best">`)]);
        expect(xml).toContain('<dcvalue element="title">Tom &amp; Jerry&apos;s &lt;&quot;best&quot;&gt;</dcvalue>');
    });

    it('writes an empty root when there are no fields', () => {
        expect(buildDescriptorXml('dc', [])).toBe('<?xml version="1.0" encoding="UTF-8"?>\n<dublin_core schema="dc">\n</dublin_core>\n');
    });
});

describe('parseDescriptorXml', () => {
    it('reads back what buildDescriptorXml wrote', () => {
        const fields = [
            value('title', 'A & B <c>'),
            value('subject', 'x', { qualifier: 'lcsh', language: 'en_US' }),
            value('description', 'line one\nline two')
        ];
        expect(parseDescriptorXml(buildDescriptorXml('dc', fields))).toEqual(fields);
    });

    it('takes the schema from the root element', () => {
        const xml = '<dublin_core schema="local"><dcvalue element="note">n</dcvalue></dublin_core>';
        expect(parseDescriptorXml(xml)).toEqual([
            { schema: 'local', element: 'note', qualifier: null, language: null, value: 'n' }
        ]);
    });

    it('accepts single-quoted attributes and self-closing values', () => {
        const xml = "<dublin_core><dcvalue element='title' qualifier='none'/></dublin_core>";
        expect(parseDescriptorXml(xml)).toEqual([
            { schema: 'dc', element: 'title', qualifier: 'none', language: null, value: '' }
        ]);
    });

    it('rejects documents that are not descriptors', () => {
        expect(() => parseDescriptorXml('<metadata/>')).toThrow(/missing <dublin_core> root/);
        expect(() => parseDescriptorXml('<dublin_core><dcvalue qualifier="x">v</dcvalue></dublin_core>'))
            .toThrow('dcvalue without an element attribute');
    });
});

describe('groupBySchema', () => {
    it('puts dc first, then other schemas alphabetically, keeping row order', () => {
        const groups = groupBySchema([
            value('note', 'z', { schema: 'zeta' }),
            value('title', 'T'),
            value('note', 'l', { schema: 'local' }),
            value('subject', 'S')
        ]);
        expect(groups.map(([schema, fields]) => [schema, fields.map(f => f.value)])).toEqual([
            ['dc', ['T', 'S']],
            ['local', ['l']],
            ['zeta', ['z']]
        ]);
    });
});
