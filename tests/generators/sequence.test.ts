import path from 'path'
import { afterEach, describe, it, expect, vi } from 'vitest'
import { SequenceGenerator, buildSequence, buildSequenceEntries } from '../../src/generators/SequenceGenerator.js'
import { ConfigError } from '../../src/errors.js'
import { parsePositions } from '../../src/positions/positionFile.js'
import { createRng } from '../../src/util/random.js'
import { NO_VARIATION, POSITIONS_3, at, attr, createWorkspace, list, parseXml, type Workspace } from '../helpers/workspace.js'

const trees = parsePositions(POSITIONS_3)

describe('buildSequenceEntries', () => {
    it('emits nothing when no parameter varies', () => {
        expect(buildSequenceEntries({ runs: 4, trees, params: NO_VARIATION, rng: createRng(1) })).toEqual([])
    })

    it('emits three scale axes per tree', () => {
        const entries = buildSequenceEntries({
            runs: 4,
            trees,
            params: { ...NO_VARIATION, scale: true },
            rng: createRng(1),
        })
        expect(entries).toHaveLength(9)
        expect(entries[4].propertyName).toBe('object_3d.ObjectList.Object[1].GeometricProperties.ScaleProperties.yscale')
        // axes of one tree share values; tree 1 has xscale 1.5
        expect(entries[3].values).toEqual(entries[5].values)
        for (const v of entries[3].values) {
            expect(v).toBeGreaterThanOrEqual(1.5 * 0.8)
            expect(v).toBeLessThan(1.5 * 1.2)
        }
    })

    it('addresses soil, leaf and trunk thermal functions in coeff_diff order', () => {
        const entries = buildSequenceEntries({
            runs: 5,
            trees,
            params: { ...NO_VARIATION, soil_temperature: true, tree_temperature: true },
            rng: createRng(9),
        })
        expect(entries.map(e => e.propertyName)).toEqual([
            'Coeff_diff.Temperatures.ThermalFunction[0].meanT',
            'Coeff_diff.Temperatures.ThermalFunction[1].meanT',
            'Coeff_diff.Temperatures.ThermalFunction[2].meanT',
            'Coeff_diff.Temperatures.ThermalFunction[3].meanT',
            'Coeff_diff.Temperatures.ThermalFunction[4].meanT',
            'Coeff_diff.Temperatures.ThermalFunction[5].meanT',
            'Coeff_diff.Temperatures.ThermalFunction[6].meanT',
        ])

        const soil = entries[0].values
        for (let run = 0; run < 5; run++) {
            expect(soil[run]).toBeGreaterThanOrEqual(290)
            expect(soil[run]).toBeLessThan(310)
            const leaf = entries[1].values[run]
            const trunk = entries[4].values[run]
            expect(soil[run] - leaf).toBeGreaterThanOrEqual(1)
            expect(soil[run] - leaf).toBeLessThan(10)
            expect(soil[run] - trunk).toBeGreaterThanOrEqual(0.5)
            expect(soil[run] - trunk).toBeLessThan(5)
        }
    })

    it('varies Cab and Cw for every leaf entry', () => {
        const entries = buildSequenceEntries({
            runs: 3,
            trees,
            params: { ...NO_VARIATION, chlorophyl: true, water_thickness: true },
            rng: createRng(5),
        })
        expect(entries).toHaveLength(6)
        expect(entries[0].propertyName).toBe(
            'Coeff_diff.Surfaces.LambertianMultiFunctions.LambertianMulti[0].Lambertian.ProspectExternalModule.ProspectExternParameters.Cab'
        )
        expect(entries[5].propertyName).toMatch(/LambertianMulti\[2\].*\.Cw$/)
        for (const v of entries[0].values) {
            expect(v).toBeGreaterThanOrEqual(20)
            expect(v).toBeLessThan(90)
        }
    })

    it('is reproducible with the same seed', () => {
        const params = { ...NO_VARIATION, tree_temperature: true, chlorophyl: true }
        const a = buildSequenceEntries({ runs: 3, trees, params, rng: createRng(77) })
        const b = buildSequenceEntries({ runs: 3, trees, params, rng: createRng(77) })
        expect(a).toEqual(b)
    })
})

describe('buildSequence', () => {
    it('joins values with semicolons in enumerate entries', () => {
        const xml = buildSequence({
            runs: 2,
            trees,
            params: { ...NO_VARIATION, soil_temperature: true },
            rng: createRng(3),
        })
        const descriptor = at(parseXml(xml, ['DartSequencerDescriptorEntry']), 'DartFile', 'DartSequencerDescriptor')
        expect(attr(descriptor, 'sequenceName')).toBe('sequence;;sequence')

        const group = at(descriptor, 'DartSequencerDescriptorEntries', 'DartSequencerDescriptorGroup')
        const [entry] = list(group, 'DartSequencerDescriptorEntry')
        expect(attr(entry, 'type')).toBe('enumerate')
        expect(String(attr(entry, 'args')).split(';')).toHaveLength(2)

        const prefs = at(descriptor, 'DartSequencerPreferences')
        expect(attr(prefs, 'numberParallelThreads')).toBe('4')
    })
})

describe('SequenceGenerator.generate', () => {
    let ws: Workspace | undefined

    afterEach(async () => {
        vi.restoreAllMocks()
        await ws?.cleanup()
        ws = undefined
    })

    it('requires nbr_of_sequence', async () => {
        ws = await createWorkspace({ settings: { run_sequencer: true } })
        await expect(new SequenceGenerator().generate(ws.config)).rejects.toThrow(ConfigError)
    })

    it('writes sequence.xml at the simulation root', async () => {
        vi.spyOn(console, 'info').mockImplementation(() => {})
        ws = await createWorkspace({ settings: { run_sequencer: true }, params: { scale: true }, nbrOfSequence: 3 })
        const result = await new SequenceGenerator(createRng(1)).generate(ws.config)
        expect(result.outputPath).toBe(path.join(ws.simulationPath, 'sequence.xml'))
        expect(result.treeCount).toBe(3)
    })
})
