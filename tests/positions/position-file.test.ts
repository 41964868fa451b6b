import os from 'os'
import path from 'path'
import fs from 'fs-extra'
import { afterAll, beforeAll, describe, it, expect, vi } from 'vitest'
import { countTrees, isDataLine, parsePositions, readPositions } from '../../src/positions/positionFile.js'
import { InputDataError } from '../../src/errors.js'
import { POSITIONS_3 } from '../helpers/workspace.js'

describe('isDataLine', () => {
    it('skips blanks, comments and the transformation header', () => {
        expect(isDataLine('   ')).toBe(false)
        expect(isDataLine('// comment')).toBe(false)
        expect(isDataLine('complete transformation')).toBe(false)
        expect(isDataLine('0 1 2 3 1 1 1 0 0 0')).toBe(true)
    })
})

describe('parsePositions', () => {
    it('parses records in file order with 0-based indices', () => {
        const trees = parsePositions(POSITIONS_3)
        expect(trees.map(t => t.index)).toEqual([0, 1, 2])
        expect(trees[0]).toEqual({
            index: 0,
            objectType: 0,
            position: { x: 10.5, y: 20, z: 0 },
            scale: { x: 1, y: 1, z: 1 },
            rotation: { x: 0, y: 0, z: 90 },
        })
        expect(trees[2].position.x).toBe(30)
    })

    it('accepts CRLF line endings and tabs', () => {
        const trees = parsePositions('0\t1\t2\t3\t1\t1\t1\t0\t0\t0\r\n0 4 5 6 1 1 1 0 0 0\r\n')
        expect(trees).toHaveLength(2)
        expect(trees[1].position).toEqual({ x: 4, y: 5, z: 6 })
    })

    it('reports the line of a short record', () => {
        expect(() => parsePositions('complete transformation\n0 1 2 3\n', 'pos.txt')).toThrow(
            'pos.txt:2: expected 10 fields, found 4'
        )
    })

    it('reports non-numeric fields', () => {
        expect(() => parsePositions('0 1 2 3 1 1 1 0 0 abc\n')).toThrow(InputDataError)
    })

    it('returns no records for an empty file', () => {
        expect(parsePositions('')).toEqual([])
    })
})

describe('countTrees / readPositions', () => {
    let dir: string

    beforeAll(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'dart-prep-pos-'))
    })

    afterAll(async () => {
        await fs.remove(dir)
    })

    it('counts data lines', async () => {
        const file = path.join(dir, 'positions.txt')
        await fs.writeFile(file, POSITIONS_3, 'utf-8')
        expect(await countTrees(file)).toBe(3)
        expect(await readPositions(file)).toHaveLength(3)
    })

    it('returns 0 with a warning for an unreadable file', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
        expect(await countTrees(path.join(dir, 'missing.txt'))).toBe(0)
        expect(warn).toHaveBeenCalledTimes(1)
        warn.mockRestore()
    })

    it('raises InputDataError when reading a missing file', async () => {
        await expect(readPositions(path.join(dir, 'missing.txt'))).rejects.toThrow(InputDataError)
    })
})
