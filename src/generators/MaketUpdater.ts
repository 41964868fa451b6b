/**
 * MaketUpdater — points the scene ground of maket.xml at the soil and
 * soil temperature defined in coeff_diff.xml.
 *
 * maket.xml is a DART-authored file: it is edited in place (element order
 * preserved) and a one-time .backup copy of the original is kept.
 */

import path from 'path'
import fs from 'fs-extra'
import { XMLBuilder, XMLParser } from 'fast-xml-parser'
import { InputDataError, describeError } from '../errors.js'
import type { SimulationConfig } from '../types/index.js'
import { createLogger } from '../util/logger.js'
import { ATTR_PREFIX, XML_DECLARATION, createReader, writeFileAtomic } from '../xml/document.js'
import { COEFF_DIFF_FILE } from './CoeffDiffGenerator.js'
import { DEFAULT_SOIL_OPTICAL, SOIL_TEMPERATURE } from './naming.js'

const log = createLogger('Maket')

export const MAKET_FILE = 'maket.xml'

/** Key fast-xml-parser uses for attributes in preserveOrder mode */
const ORDERED_ATTRS = ':@'

type Node = Record<string, unknown>

function isNode(value: unknown): value is Node {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

const orderedParserOptions = {
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    preserveOrder: true,
    ignoreDeclaration: true,
} as const

const orderedBuilderOptions = {
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    preserveOrder: true,
    format: true,
    indentBy: '    ',
    suppressEmptyNode: true,
    suppressBooleanAttributes: false,
} as const

/** First element named `tag`, depth-first, in a preserveOrder tree */
function findOrdered(nodes: unknown, tag: string): Node | undefined {
    if (!Array.isArray(nodes)) return undefined
    for (const node of nodes) {
        if (!isNode(node)) continue
        if (tag in node) return node
        for (const [key, children] of Object.entries(node)) {
            if (key === ORDERED_ATTRS) continue
            const hit = findOrdered(children, tag)
            if (hit) return hit
        }
    }
    return undefined
}

/** Set an attribute on a preserveOrder node; returns the previous value */
function setOrderedAttribute(node: Node, name: string, value: string): string | undefined {
    const existing = node[ORDERED_ATTRS]
    const attrs: Node = isNode(existing) ? existing : {}
    node[ORDERED_ATTRS] = attrs
    const previous = attrs[ATTR_PREFIX + name]
    attrs[ATTR_PREFIX + name] = value
    return typeof previous === 'string' ? previous : undefined
}

function child(node: unknown, key: string): unknown {
    return isNode(node) ? node[key] : undefined
}

/** Optical identifiers starting with soil_ in a coeff_diff.xml document */
export function soilNamesFromCoeffDiff(xml: string): string[] {
    const doc: unknown = createReader(['LambertianMulti']).parse(xml)
    const functions = child(
        child(child(child(child(doc, 'DartFile'), 'Coeff_diff'), 'Surfaces'), 'LambertianMultiFunctions'),
        'LambertianMulti'
    )
    if (!Array.isArray(functions)) return []

    const names: string[] = []
    for (const fn of functions) {
        const ident = child(fn, `${ATTR_PREFIX}ident`)
        if (typeof ident === 'string' && ident.startsWith('soil_')) names.push(ident)
    }
    return names
}

export interface MaketLinks {
    soilOptical: string
    soilTemperature: string
}

/** Rewrite the first optical and thermal property links of a maket.xml document */
export function applyMaketLinks(xml: string, links: MaketLinks): string {
    const parser = new XMLParser(orderedParserOptions)
    const doc: unknown = parser.parse(xml)

    const optical = findOrdered(doc, 'OpticalPropertyLink')
    if (!optical) {
        throw new InputDataError('Could not find OpticalPropertyLink in maket.xml')
    }
    const previousSoil = setOrderedAttribute(optical, 'ident', links.soilOptical)
    log.info(`Optical property: '${previousSoil ?? ''}' -> '${links.soilOptical}'`)

    const thermal = findOrdered(doc, 'ThermalPropertyLink')
    if (thermal) {
        const previous = setOrderedAttribute(thermal, 'idTemperature', links.soilTemperature)
        log.info(`Thermal property: '${previous ?? ''}' -> '${links.soilTemperature}'`)
    } else {
        log.warn('Could not find ThermalPropertyLink in maket.xml')
    }

    const body: string = new XMLBuilder(orderedBuilderOptions).build(doc)
    return `${XML_DECLARATION}\n${body.trim()}\n`
}

export class MaketUpdater {
    readonly fileName = MAKET_FILE

    maketPath(config: SimulationConfig): string {
        return path.join(config.paths.simulation_path, 'input', this.fileName)
    }

    /** soil_<first folder> for multi_sol runs with soils in coeff_diff.xml, else soil */
    async determineSoil(config: SimulationConfig): Promise<string> {
        if (!config.simulation_settings.multi_sol) return DEFAULT_SOIL_OPTICAL

        const coeffDiffPath = path.join(config.paths.simulation_path, 'input', COEFF_DIFF_FILE)
        let names: string[]
        try {
            names = soilNamesFromCoeffDiff(await fs.readFile(coeffDiffPath, 'utf-8'))
        } catch (err) {
            log.warn(`Cannot read soils from ${coeffDiffPath}: ${describeError(err)}`)
            return DEFAULT_SOIL_OPTICAL
        }

        if (names.length === 0) {
            log.warn('No soil definitions found in coeff_diff.xml')
            return DEFAULT_SOIL_OPTICAL
        }
        log.info(`Found ${names.length} soil definitions in coeff_diff.xml: ${names.join(', ')}`)
        return names[0]
    }

    async update(config: SimulationConfig): Promise<MaketLinks> {
        const maketPath = this.maketPath(config)
        if (!(await fs.pathExists(maketPath))) {
            throw new InputDataError(`maket.xml not found at ${maketPath}`)
        }

        const backupPath = `${maketPath}.backup`
        if (!(await fs.pathExists(backupPath))) {
            await fs.copy(maketPath, backupPath)
            log.info(`Created backup of maket.xml at ${backupPath}`)
        }

        const links: MaketLinks = {
            soilOptical: await this.determineSoil(config),
            soilTemperature: SOIL_TEMPERATURE,
        }
        const xml = applyMaketLinks(await fs.readFile(maketPath, 'utf-8'), links)
        await writeFileAtomic(maketPath, xml)
        return links
    }
}
