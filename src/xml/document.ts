/**
 * XML helpers — element construction, serialization and atomic writes.
 *
 * Elements are plain objects in fast-xml-parser's layout: attributes under
 * `@_name` keys, children under their tag name (arrays for repeated tags).
 */

import path from 'path'
import fs from 'fs-extra'
import { XMLBuilder, XMLParser } from 'fast-xml-parser'

export const ATTR_PREFIX = '@_'
export const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>'

export type AttrValue = string | number
export type Attributes = Record<string, AttrValue>

/** An element body: attributes and child elements */
export interface XmlElement {
    [key: string]: string | XmlElement | XmlElement[]
}

/**
 * Build an element body.
 * Attribute values are stringified here so numbers print the same everywhere.
 */
export function element(
    attributes: Attributes = {},
    children: Record<string, XmlElement | XmlElement[]> = {}
): XmlElement {
    const node: XmlElement = {}
    for (const [name, value] of Object.entries(attributes)) {
        node[ATTR_PREFIX + name] = String(value)
    }
    for (const [tag, child] of Object.entries(children)) {
        node[tag] = child
    }
    return node
}

/** DART numbers: integers keep a trailing ".0" the simulator writes itself */
export function formatDecimal(value: number): string {
    return Number.isInteger(value) ? value.toFixed(1) : String(value)
}

const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    format: true,
    indentBy: '    ',
    suppressEmptyNode: true,
    suppressBooleanAttributes: false,
})

/** Serialize a document with a single root element */
export function serializeDocument(rootTag: string, root: XmlElement): string {
    const body: string = builder.build({ [rootTag]: root })
    return `${XML_DECLARATION}\n${body.trimEnd()}\n`
}

/** Parser for documents we only read (attributes kept as strings) */
export function createReader(arrayTags: readonly string[] = []): XMLParser {
    const repeated = new Set(arrayTags)
    return new XMLParser({
        ignoreAttributes: false,
        attributeNamePrefix: ATTR_PREFIX,
        parseAttributeValue: false,
        ignoreDeclaration: true,
        isArray: (tagName: string) => repeated.has(tagName),
    })
}

/**
 * Write `content` to `target` through a temporary sibling file and a rename,
 * so an interrupted run never leaves a truncated document under the real name.
 */
export async function writeFileAtomic(target: string, content: string): Promise<void> {
    const dir = path.dirname(target)
    await fs.ensureDir(dir)
    const temp = path.join(dir, `.${path.basename(target)}.${process.pid}.tmp`)
    try {
        await fs.writeFile(temp, content, 'utf-8')
        await fs.rename(temp, target)
    } catch (err) {
        await fs.remove(temp)
        throw err
    }
}
