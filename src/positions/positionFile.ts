/**
 * Position file reading.
 *
 * A DART position file holds an optional "complete transformation" header,
 * `//` comments, and one data line per tree:
 *
 *   type  x  y  z  xscale  yscale  zscale  xrot  yrot  zrot
 *
 * Tree index = order of the data line in the file.
 */

import fs from 'fs-extra'
import { InputDataError, describeError } from '../errors.js'
import type { TreePosition } from '../types/index.js'
import { createLogger } from '../util/logger.js'

const log = createLogger('Positions')

const HEADER_LINE = 'complete transformation'
const FIELD_COUNT = 10

/** True for lines that describe a tree */
export function isDataLine(line: string): boolean {
    const trimmed = line.trim()
    if (trimmed === '') return false
    if (trimmed.startsWith('//')) return false
    return trimmed.toLowerCase() !== HEADER_LINE
}

/**
 * Number of trees in the position file.
 * Returns 0 (with a warning) when the file cannot be read; callers abort on 0.
 */
export async function countTrees(positionFile: string): Promise<number> {
    let text: string
    try {
        text = await fs.readFile(positionFile, 'utf-8')
    } catch (err) {
        log.warn(`Cannot read position file ${positionFile}: ${describeError(err)}`)
        return 0
    }
    return text.split(/\r?\n/).filter(isDataLine).length
}

/** Parse position file text. `source` only appears in error messages. */
export function parsePositions(text: string, source = 'position file'): TreePosition[] {
    const positions: TreePosition[] = []
    const lines = text.split(/\r?\n/)

    lines.forEach((line, lineIndex) => {
        if (!isDataLine(line)) return

        const fields = line.trim().split(/\s+/)
        if (fields.length !== FIELD_COUNT) {
            throw new InputDataError(
                `${source}:${lineIndex + 1}: expected ${FIELD_COUNT} fields, found ${fields.length}`
            )
        }

        const values = fields.map(Number)
        const bad = values.findIndex(v => !Number.isFinite(v))
        if (bad !== -1) {
            throw new InputDataError(`${source}:${lineIndex + 1}: "${fields[bad]}" is not a number`)
        }

        const [type, x, y, z, sx, sy, sz, rx, ry, rz] = values
        positions.push({
            index: positions.length,
            objectType: type,
            position: { x, y, z },
            scale: { x: sx, y: sy, z: sz },
            rotation: { x: rx, y: ry, z: rz },
        })
    })

    return positions
}

/** Read and parse every tree record, in file order */
export async function readPositions(positionFile: string): Promise<TreePosition[]> {
    let text: string
    try {
        text = await fs.readFile(positionFile, 'utf-8')
    } catch (err) {
        throw new InputDataError(`Cannot read position file ${positionFile}: ${describeError(err)}`, { cause: err })
    }
    return parsePositions(text, positionFile)
}
