/**
 * Spectral interval resolution — how many bands the simulation has and
 * which DART mode each band runs in.
 *
 * The coeff_diff generator only sees the SpectralIntervalResolver contract;
 * PhaseXmlSpectralResolver is the implementation used by the CLI.
 */

import path from 'path'
import fs from 'fs-extra'
import { ExternalResolutionError, describeError } from '../errors.js'
import type { SpectralDartMode, SpectralIntervals } from '../types/index.js'
import { createLogger } from '../util/logger.js'
import { ATTR_PREFIX, createReader } from '../xml/document.js'

const log = createLogger('SpectralResolver')

export interface SpectralIntervalResolver {
    /**
     * Resolve band number -> mode for the soils under `soilFactorPath`.
     * Throws ExternalResolutionError when the bands cannot be determined.
     */
    resolve(soilFactorPath: string): Promise<SpectralIntervals>
}

type XmlNode = Record<string, unknown>

function isNode(value: unknown): value is XmlNode {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Depth-first search for the first element named `tag` */
function findElement(value: unknown, tag: string): XmlNode | undefined {
    if (Array.isArray(value)) {
        for (const item of value) {
            const hit = findElement(item, tag)
            if (hit) return hit
        }
        return undefined
    }
    if (!isNode(value)) return undefined

    for (const [key, child] of Object.entries(value)) {
        if (key.startsWith(ATTR_PREFIX)) continue
        if (key === tag) {
            if (isNode(child)) return child
            if (Array.isArray(child) && isNode(child[0])) return child[0]
        }
        const hit = findElement(child, tag)
        if (hit) return hit
    }
    return undefined
}

function isSpectralDartMode(value: number): value is SpectralDartMode {
    return value === 0 || value === 1 || value === 2 || value === 3
}

/** Extract the band map from phase.xml text */
export function parseSpectralIntervals(xml: string): SpectralIntervals {
    let doc: unknown
    try {
        doc = createReader(['SpectralIntervalsProperties']).parse(xml, true)
    } catch (err) {
        throw new ExternalResolutionError(`Invalid XML in phase.xml: ${describeError(err)}`, { cause: err })
    }

    const intervals = findElement(doc, 'SpectralIntervals')
    if (!intervals) {
        throw new ExternalResolutionError('No SpectralIntervals found in phase.xml')
    }

    const props = intervals['SpectralIntervalsProperties']
    const entries: Array<[number, SpectralDartMode]> = []
    if (Array.isArray(props)) {
        for (const band of props) {
            if (!isNode(band)) continue
            const rawBand = band[`${ATTR_PREFIX}bandNumber`]
            const rawMode = band[`${ATTR_PREFIX}spectralDartMode`]
            if (typeof rawBand !== 'string' || typeof rawMode !== 'string') continue
            const bandNumber = Number.parseInt(rawBand, 10)
            const mode = Number.parseInt(rawMode, 10)
            if (Number.isNaN(bandNumber) || !isSpectralDartMode(mode)) continue
            entries.push([bandNumber, mode])
        }
    }

    if (entries.length === 0) {
        throw new ExternalResolutionError('No valid spectral intervals found in phase.xml')
    }

    entries.sort((a, b) => a[0] - b[0])
    return new Map(entries)
}

/** Reads the band layout from <simulation_path>/input/phase.xml */
export class PhaseXmlSpectralResolver implements SpectralIntervalResolver {
    readonly phaseXmlPath: string

    constructor(simulationPath: string) {
        this.phaseXmlPath = path.join(simulationPath, 'input', 'phase.xml')
    }

    async resolve(soilFactorPath: string): Promise<SpectralIntervals> {
        log.debug(`Resolving spectral bands for ${soilFactorPath}`)

        if (!(await fs.pathExists(this.phaseXmlPath))) {
            throw new ExternalResolutionError(`phase.xml not found at: ${this.phaseXmlPath}`)
        }

        let xml: string
        try {
            xml = await fs.readFile(this.phaseXmlPath, 'utf-8')
        } catch (err) {
            throw new ExternalResolutionError(`Cannot read ${this.phaseXmlPath}: ${describeError(err)}`, { cause: err })
        }

        const bands = parseSpectralIntervals(xml)
        log.info(`Found ${bands.size} spectral bands in phase.xml`)
        for (const [band, mode] of bands) {
            log.debug(`  Band ${band}: spectralDartMode = ${mode}`)
        }
        return bands
    }
}
