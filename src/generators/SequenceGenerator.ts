/**
 * SequenceGenerator — builds sequence.xml for the DART sequencer.
 *
 * Each enabled parameter_to_vary becomes one or more "enumerate" entries
 * whose args hold nbr_of_sequence values, one per sequencer run. Property
 * paths index into the documents built by CoeffDiffGenerator and
 * Object3DGenerator, so their entry order is relied on here:
 *   ThermalFunction[0]        Temp_soil
 *   ThermalFunction[1+i]      Temp_leaf_i
 *   ThermalFunction[1+N+i]    Temp_trunk_i
 *   LambertianMulti[i]        leaf_i
 */

import path from 'path'
import { ConfigError, InputDataError } from '../errors.js'
import { readPositions } from '../positions/positionFile.js'
import type { ParametersToVary, SimulationConfig, TreePosition } from '../types/index.js'
import { createLogger } from '../util/logger.js'
import { rngFromSeed, uniform, type Rng } from '../util/random.js'
import { element, serializeDocument, writeFileAtomic, type XmlElement } from '../xml/document.js'
import type { DocumentGenerator, GeneratedDocument } from './types.js'

const log = createLogger('Sequence')

export const SEQUENCE_FILE = 'sequence.xml'

/** Value ranges drawn for each sequencer run */
export const SEQUENCE_RANGES = {
    cab: [20, 90],
    cw: [0.01, 0.05],
    soilTemperature: [290, 310],
    /** Leaves run cooler than the soil by this much */
    leafCooling: [1, 10],
    /** Trunks sit between soil and leaves */
    trunkCooling: [0.5, 5],
    /** Multiplier applied to the file's xscale */
    scaleFactor: [0.8, 1.2],
} as const

const SEQUENCER_PREFERENCES: Record<string, string> = {
    atmosphereMaketLaunched: 'true',
    dartLaunched: 'true',
    deleteAll: 'false',
    deleteAtmosphere: 'false',
    deleteAtmosphereMaket: 'false',
    deleteBandFolder: 'false',
    deleteDartLut: 'false',
    deleteDartSequenceur: 'false',
    deleteDartTxt: 'false',
    deleteDirection: 'false',
    deleteInputs: 'false',
    deleteLibPhase: 'false',
    deleteMaket: 'false',
    deleteMaketTreeResults: 'false',
    deletePlyFolder: 'false',
    deleteScnFiles: 'false',
    deleteTreePosition: 'false',
    deleteTriangles: 'false',
    demGeneratorLaunched: 'false',
    directionLaunched: 'false',
    displayEnabled: 'true',
    hapkeLaunched: 'false',
    individualDisplayEnabled: 'false',
    maketLaunched: 'true',
    numberOfEnumerateValuesDisplayed: '1000',
    numberParallelThreads: '4',
    phaseLaunched: 'true',
    prospectLaunched: 'true',
    triangleFileProcessorLaunched: 'true',
    useBroadBand: 'true',
    useSceneSpectra: 'true',
    vegetationLaunched: 'true',
    zippedResults: 'false',
}

const LUT_PREFERENCES: Record<string, string> = {
    addedDirection: 'false',
    atmosToa: 'false',
    atmosToaOrdre: 'false',
    coupl: 'true',
    fluorescence: 'true',
    generateLUT: 'false',
    iterx: 'true',
    luminance: 'true',
    maketCoverage: 'false',
    ordre: 'true',
    otherIter: 'true',
    phiMax: '',
    phiMin: '',
    productsPerType: 'false',
    reflectance: 'true',
    sensor: 'true',
    storeIndirect: 'false',
    thetaMax: '',
    thetaMin: '',
    toa: 'true',
}

const PROSPECT_PATH =
    'Coeff_diff.Surfaces.LambertianMultiFunctions.LambertianMulti[{i}].Lambertian.ProspectExternalModule.ProspectExternParameters'

export interface SequenceEntry {
    propertyName: string
    values: number[]
}

export interface SequenceOptions {
    runs: number
    trees: TreePosition[]
    params: ParametersToVary
    rng: Rng
}

/** Per-run temperatures: soil, then one per leaf, then one per trunk */
interface RunTemperatures {
    soil: number
    leaves: number[]
    trunks: number[]
}

function drawTemperatures(treeCount: number, rng: Rng): RunTemperatures {
    const soil = uniform(rng, ...SEQUENCE_RANGES.soilTemperature)
    const leaves = Array.from({ length: treeCount }, () => soil - uniform(rng, ...SEQUENCE_RANGES.leafCooling))
    const trunks = Array.from({ length: treeCount }, () => soil - uniform(rng, ...SEQUENCE_RANGES.trunkCooling))
    return { soil, leaves, trunks }
}

/** Enumerate entries in the order DART lists them: scale, temperatures, Cab, Cw */
export function buildSequenceEntries(options: SequenceOptions): SequenceEntry[] {
    const { runs, trees, params, rng } = options
    const n = trees.length
    const repeat = (draw: () => number): number[] => Array.from({ length: runs }, draw)

    // Drawn up front so every run shares one coherent soil/leaf/trunk set
    const cab = repeat(() => uniform(rng, ...SEQUENCE_RANGES.cab))
    const cw = repeat(() => uniform(rng, ...SEQUENCE_RANGES.cw))
    const temperatures = Array.from({ length: runs }, () => drawTemperatures(n, rng))

    const entries: SequenceEntry[] = []

    if (params.scale) {
        for (const tree of trees) {
            const values = repeat(() => tree.scale.x * uniform(rng, ...SEQUENCE_RANGES.scaleFactor))
            for (const axis of ['x', 'y', 'z'] as const) {
                entries.push({
                    propertyName: `object_3d.ObjectList.Object[${tree.index}].GeometricProperties.ScaleProperties.${axis}scale`,
                    values,
                })
            }
        }
    }

    if (params.soil_temperature) {
        entries.push({
            propertyName: 'Coeff_diff.Temperatures.ThermalFunction[0].meanT',
            values: temperatures.map(t => t.soil),
        })
    }

    if (params.tree_temperature) {
        for (let i = 0; i < n; i++) {
            entries.push({
                propertyName: `Coeff_diff.Temperatures.ThermalFunction[${i + 1}].meanT`,
                values: temperatures.map(t => t.leaves[i]),
            })
        }
        for (let i = 0; i < n; i++) {
            entries.push({
                propertyName: `Coeff_diff.Temperatures.ThermalFunction[${i + n + 1}].meanT`,
                values: temperatures.map(t => t.trunks[i]),
            })
        }
    }

    if (params.chlorophyl) {
        for (let i = 0; i < n; i++) {
            entries.push({ propertyName: `${PROSPECT_PATH.replace('{i}', String(i))}.Cab`, values: cab })
        }
    }

    if (params.water_thickness) {
        for (let i = 0; i < n; i++) {
            entries.push({ propertyName: `${PROSPECT_PATH.replace('{i}', String(i))}.Cw`, values: cw })
        }
    }

    return entries
}

/** Serialized sequence.xml */
export function buildSequence(options: SequenceOptions): string {
    if (options.trees.length === 0) {
        throw new InputDataError('sequence.xml needs at least one tree position')
    }

    const entries: XmlElement[] = buildSequenceEntries(options).map(entry =>
        element({
            args: entry.values.map(String).join(';'),
            propertyName: entry.propertyName,
            type: 'enumerate',
        })
    )

    const descriptor = element({ sequenceName: 'sequence;;sequence' }, {
        DartSequencerDescriptorEntries: element({}, {
            DartSequencerDescriptorGroup: element(
                { currentDisplayedPage: 1, groupName: 'group1' },
                { DartSequencerDescriptorEntry: entries }
            ),
        }),
        DartSequencerPreferences: element(SEQUENCER_PREFERENCES),
        DartLutPreferences: element(LUT_PREFERENCES),
    })

    return serializeDocument('DartFile', element({ version: '1.0' }, { DartSequencerDescriptor: descriptor }))
}

export class SequenceGenerator implements DocumentGenerator {
    readonly fileName = SEQUENCE_FILE

    constructor(private readonly rng?: Rng) {}

    async generate(config: SimulationConfig): Promise<GeneratedDocument> {
        const runs = config.nbr_of_sequence
        if (runs === undefined) {
            throw new ConfigError('nbr_of_sequence is required when run_sequencer is enabled')
        }

        const trees = await readPositions(config.paths.position_txt_path)
        if (trees.length === 0) {
            throw new InputDataError(`No tree positions found in ${config.paths.position_txt_path}`)
        }

        const xml = buildSequence({
            runs,
            trees,
            params: config.parameters_to_vary,
            rng: this.rng ?? rngFromSeed(config.simulation_settings.random_seed),
        })

        const outputPath = path.join(config.paths.simulation_path, this.fileName)
        await writeFileAtomic(outputPath, xml)
        log.info(`sequence.xml written to ${outputPath} (${runs} runs)`)

        return { outputPath, xml, treeCount: trees.length }
    }
}
