import path from 'path'
import fs from 'fs-extra'
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest'
import { checkSoilFactorPath, findSoilFolders } from '../../src/soils/soilFactors.js'
import type { SpectralDartMode } from '../../src/types/index.js'
import { createWorkspace, type Workspace } from '../helpers/workspace.js'

const TWO_BANDS = new Map<number, SpectralDartMode>([
    [0, 0],
    [1, 2],
])

describe('findSoilFolders', () => {
    let ws: Workspace
    let warnings: unknown[][]

    beforeEach(async () => {
        warnings = []
        vi.spyOn(console, 'info').mockImplementation(() => {})
        vi.spyOn(console, 'warn').mockImplementation((...args: unknown[]) => {
            warnings.push(args)
        })
        ws = await createWorkspace()
        await fs.outputFile(path.join(ws.soilDir, 'sand', 'b1.txt'), '1')
        await fs.outputFile(path.join(ws.soilDir, 'sand', 'b0.txt'), '1')
        await fs.outputFile(path.join(ws.soilDir, 'clay', 'only.txt'), '1')
        await fs.outputFile(path.join(ws.soilDir, 'loam', 'a.txt'), '1')
        await fs.outputFile(path.join(ws.soilDir, 'loam', 'b.txt'), '1')
        await fs.outputFile(path.join(ws.soilDir, 'loam', 'notes.md'), '')
        await fs.outputFile(path.join(ws.soilDir, 'stray.txt'), '')
    })

    afterEach(async () => {
        vi.restoreAllMocks()
        await ws.cleanup()
    })

    it('keeps folders with one factor file per band, sorted by name', async () => {
        const soils = await findSoilFolders(ws.soilDir, TWO_BANDS)
        expect(soils.map(s => s.name)).toEqual(['loam', 'sand'])
    })

    it('assigns band files in sorted order', async () => {
        const [, sand] = await findSoilFolders(ws.soilDir, TWO_BANDS)
        expect(sand.bands).toEqual([
            { bandNumber: 0, mode: 0, factorFile: path.join(ws.soilDir, 'sand', 'b0.txt') },
            { bandNumber: 1, mode: 2, factorFile: path.join(ws.soilDir, 'sand', 'b1.txt') },
        ])
    })

    it('orders numbered band files numerically', async () => {
        const bands = new Map<number, SpectralDartMode>(Array.from({ length: 12 }, (_, i) => [i, 0]))
        const dir = path.join(ws.root, 'many-bands')
        for (let i = 0; i < 12; i++) {
            await fs.outputFile(path.join(dir, 'peat', `band${i}.txt`), '1')
        }

        const [peat] = await findSoilFolders(dir, bands)

        expect(peat.bands.map(b => path.basename(b.factorFile))).toEqual(
            Array.from({ length: 12 }, (_, i) => `band${i}.txt`)
        )
        expect(path.basename(peat.bands[2].factorFile)).toBe('band2.txt')
    })

    it('warns about folders with the wrong file count', async () => {
        await findSoilFolders(ws.soilDir, TWO_BANDS)
        expect(warnings).toContainEqual(['[Soils]', "Soil folder 'clay' has 1 .txt files, expected 2 (found: only.txt)"])
    })
})

describe('checkSoilFactorPath', () => {
    let ws: Workspace

    beforeEach(async () => {
        ws = await createWorkspace({ settings: { multi_sol: true, run_sequencer: true } })
    })

    afterEach(async () => {
        vi.restoreAllMocks()
        await ws.cleanup()
    })

    it('accepts an existing directory', async () => {
        await fs.ensureDir(ws.soilDir)
        expect(await checkSoilFactorPath(ws.config)).toBe(true)
    })

    it('warns about both settings when the directory is missing', async () => {
        const warn = vi.spyOn(console, 'warn').mockImplementation(() => {})
        expect(await checkSoilFactorPath(ws.config)).toBe(false)
        expect(warn).toHaveBeenCalledTimes(3)
    })

    it('rejects a file in place of the directory', async () => {
        vi.spyOn(console, 'warn').mockImplementation(() => {})
        await fs.outputFile(ws.soilDir, 'not a directory')
        expect(await checkSoilFactorPath(ws.config)).toBe(false)
    })
})
