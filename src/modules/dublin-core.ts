/**
 * Metadata descriptor XML.
 *
 * Writes and reads the per-schema descriptor files of a package:
 * dublin_core.xml for the dc schema, metadata_<schema>.xml for any other.
 *
 *   <?xml version="1.0" encoding="UTF-8"?>
 *   <dublin_core schema="dc">
 *     <dcvalue element="title" qualifier="alternative" language="en">...</dcvalue>
 *   </dublin_core>
 */

import { SAF } from './constants.js';
import { compareStrings, escapeXml, unescapeXml } from './utilities.js';
import type { MetadataValue } from '../types.js';

const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

export function descriptorFileName(schema: string): string {
    return schema === SAF.DEFAULT_SCHEMA ? SAF.DESCRIPTOR_FILE : `metadata_${schema}.xml`;
}

/** Group values by schema; dc first, then the others alphabetically. Row order is kept within a schema. */
export function groupBySchema(fields: readonly MetadataValue[]): Array<[string, MetadataValue[]]> {
    const groups = new Map<string, MetadataValue[]>();
    for (const field of fields) {
        const list = groups.get(field.schema) ?? [];
        list.push(field);
        groups.set(field.schema, list);
    }
    return [...groups.entries()].sort(([a], [b]) => {
        if (a === SAF.DEFAULT_SCHEMA) return -1;
        if (b === SAF.DEFAULT_SCHEMA) return 1;
        return compareStrings(a, b);
    });
}

export function buildDescriptorXml(schema: string, fields: readonly MetadataValue[]): string {
    const lines = [XML_DECLARATION, `<dublin_core schema="${escapeXml(schema)}">`];
    for (const field of fields) {
        let attrs = `element="${escapeXml(field.element)}"`;
        if (field.qualifier) attrs += ` qualifier="${escapeXml(field.qualifier)}"`;
        if (field.language) attrs += ` language="${escapeXml(field.language)}"`;
        lines.push(`  <dcvalue ${attrs}>${escapeXml(field.value)}</dcvalue>`);
    }
    lines.push('</dublin_core>');
    return lines.join('\n') + '\n';
}

const ROOT_PATTERN = /<dublin_core\b([^>]*)>/;
const VALUE_PATTERN = /<dcvalue\b([^>]*?)(?:\/>|>([\s\S]*?)<\/dcvalue>)/g;
const ATTR_PATTERN = /([A-Za-z_][\w.-]*)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

function parseAttributes(source: string): Map<string, string> {
    const attrs = new Map<string, string>();
    for (const match of source.matchAll(ATTR_PATTERN)) {
        attrs.set(match[1], unescapeXml(match[2] ?? match[3] ?? ''));
    }
    return attrs;
}

/**
 * Parse a descriptor written by buildDescriptorXml.
 * Throws on a document without a dublin_core root or a dcvalue without element.
 */
export function parseDescriptorXml(xml: string): MetadataValue[] {
    const root = ROOT_PATTERN.exec(xml);
    if (!root) {
        throw new Error('Not a metadata descriptor: missing <dublin_core> root');
    }
    const schema = parseAttributes(root[1]).get('schema') ?? SAF.DEFAULT_SCHEMA;

    const values: MetadataValue[] = [];
    for (const match of xml.matchAll(VALUE_PATTERN)) {
        const attrs = parseAttributes(match[1]);
        const element = attrs.get('element');
        if (!element) {
            throw new Error('dcvalue without an element attribute');
        }
        values.push({
            schema,
            element,
            qualifier: attrs.get('qualifier') || null,
            language: attrs.get('language') || null,
            value: unescapeXml(match[2] ?? '')
        });
    }
    return values;
}
