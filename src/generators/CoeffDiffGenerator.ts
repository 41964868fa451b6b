/**
 * CoeffDiffGenerator — builds coeff_diff.xml, the optical and thermal
 * property catalogue the objects of object_3d.xml point at.
 *
 * Document layout:
 *   Surfaces/LambertianMultiFunctions  leaf entries, trunk, soil entries
 *   Volumes                             empty understory and air sections
 *   Temperatures                        Temp_soil, leaf temps, trunk temps
 *
 * Everything except the soil catalogue is a pure function of the tree count
 * and the parameters_to_vary flags.
 */

import path from 'path'
import fs from 'fs-extra'
import { ExternalResolutionError, InputDataError, describeError } from '../errors.js'
import { findSoilFolders } from '../soils/soilFactors.js'
import type { SpectralIntervalResolver } from '../spectral/SpectralResolver.js'
import type {
    PropertyFlags,
    ProspectParameters,
    SimulationConfig,
    SoilDefinition,
} from '../types/index.js'
import { createLogger } from '../util/logger.js'
import { countTrees } from '../positions/positionFile.js'
import { element, formatDecimal, serializeDocument, writeFileAtomic, type XmlElement } from '../xml/document.js'
import {
    DEFAULT_SOIL_OPTICAL,
    POOLED_TEMPERATURE,
    SOIL_TEMPERATURE,
    TRUNK_OPTICAL,
    leafOpticalId,
    leafTemperatureId,
    propertyFlags,
    soilOpticalId,
    trunkTemperatureId,
} from './naming.js'
import { DART_FILE_ATTRIBUTES, type DocumentGenerator, type GeneratedDocument } from './types.js'

const log = createLogger('CoeffDiff')

export const COEFF_DIFF_FILE = 'coeff_diff.xml'

/** Leaf PROSPECT inputs; the sequencer varies Cab and Cw per tree */
export const DEFAULT_PROSPECT_PARAMETERS: ProspectParameters = {
    CBrown: '0.0',
    Cab: '60.0',
    Car: '30.0',
    Cbc: '0.009',
    Cm: '0.01',
    Cp: '0.001',
    Cw: '0.012',
    N: '1.5',
    anthocyanin: '0.0',
    inputProspectFile: 'Prospect_Fluspect/Optipar2021_ProspectPRO.txt',
    isV2Z: '0',
    useCm: '0',
}

const LEAF_MODEL = { model: 'reflect_equal_1_trans_equal_0_0', database: 'Lambertian_vegetation.db' }
const TRUNK_MODEL = { model: 'bark_spruce', database: 'Lambertian_vegetation.db' }
const SOIL_MODEL = { model: 'reflect_equal_1_trans_equal_0_0', database: 'Lambertian_mineral.db' }

/** Default mean temperature (K) of every thermal function */
export const DEFAULT_MEAN_TEMPERATURE = 300
/** Half-width (K) of the pooled 290-310 K range */
export const POOLED_TEMPERATURE_DELTA = 10

const EMPTY_SURFACE_SECTIONS = [
    'HapkeSpecularMultiFunctions',
    'RPVMultiFunctions',
    'PhaseExternMultiFunctions',
    'SpecularMultiFunctions',
    'MixedMultiFunctions',
] as const

export interface CoeffDiffOptions {
    /** N, the number of trees in the position file */
    treeCount: number
    flags: PropertyFlags
    /** Soils with per-band factors; empty means the single default soil */
    soils?: SoilDefinition[]
    prospect?: ProspectParameters
}

// ============================================================================
// ELEMENT BUILDERS
// ============================================================================

function thermalFunction(idTemperature: string, meanT: number, deltaT: number): XmlElement {
    return element({
        deltaT: String(deltaT),
        idTemperature,
        meanT: formatDecimal(meanT),
        override3DMatrix: 0,
        singleTemperatureSurface: 1,
        useOpticalFactorMatrix: 0,
        usePrecomputedIPARs: 0,
    })
}

function lambertian(
    model: { model: string; database: string },
    prospect?: ProspectParameters
): XmlElement {
    const prospectModule = element(
        { isFluorescent: 0, useProspectExternalModule: prospect ? 1 : 0 },
        prospect ? { ProspectExternParameters: element({ ...prospect }) } : {}
    )
    return element(
        { ModelName: model.model, databaseName: model.database, useSpecular: 0 },
        { ProspectExternalModule: prospectModule }
    )
}

function lambertianMulti(
    ident: string,
    model: { model: string; database: string },
    prospect?: ProspectParameters,
    factors?: XmlElement
): XmlElement {
    const children: Record<string, XmlElement> = { Lambertian: lambertian(model, prospect) }
    if (factors) children.lambertianNodeMultiplicativeFactorForLUT = factors
    return element(
        {
            ident,
            lambertianDefinition: 0,
            roStDev: '0.0',
            useMultiplicativeFactorForLUT: factors ? 1 : 0,
        },
        children
    )
}

/**
 * One factor entry per band. Thermal-only bands (mode 2) carry the file
 * but do not apply it, since they have no reflectance to scale.
 */
function soilFactorNode(soil: SoilDefinition): XmlElement {
    const bands = soil.bands.map(band =>
        element({
            bandNumber: band.bandNumber,
            spectralDartMode: band.mode,
            reflectanceFactor: '1.0',
            diffuseTransmittanceFactor: '1.0',
            useOpticalFactorMatrix: band.mode === 2 ? 0 : 1,
            opticalFactorMatrixFile: band.factorFile,
        })
    )
    return element({ useSameFactorForAllBands: 0 }, { lambertianMultiplicativeFactorForLUT: bands })
}

function opticalEntries(options: CoeffDiffOptions): XmlElement[] {
    const { treeCount, flags } = options
    const prospect = options.prospect ?? DEFAULT_PROSPECT_PARAMETERS
    const entries: XmlElement[] = []

    if (flags.perTreeLeafOptics) {
        for (let i = 0; i < treeCount; i++) {
            entries.push(lambertianMulti(leafOpticalId(i, flags), LEAF_MODEL, prospect))
        }
    } else {
        entries.push(lambertianMulti(leafOpticalId(0, flags), LEAF_MODEL, prospect))
    }

    entries.push(lambertianMulti(TRUNK_OPTICAL, TRUNK_MODEL))

    const soils = options.soils ?? []
    if (soils.length === 0) {
        entries.push(lambertianMulti(DEFAULT_SOIL_OPTICAL, SOIL_MODEL))
    } else {
        for (const soil of soils) {
            entries.push(lambertianMulti(soilOpticalId(soil.name), SOIL_MODEL, undefined, soilFactorNode(soil)))
        }
    }

    return entries
}

/** Temp_soil first: the sequencer addresses it as ThermalFunction[0] */
function thermalEntries(treeCount: number, flags: PropertyFlags): XmlElement[] {
    const entries = [thermalFunction(SOIL_TEMPERATURE, DEFAULT_MEAN_TEMPERATURE, 0)]

    if (flags.perTreeTemperature) {
        for (let i = 0; i < treeCount; i++) {
            entries.push(thermalFunction(leafTemperatureId(i, flags), DEFAULT_MEAN_TEMPERATURE, 0))
        }
        for (let i = 0; i < treeCount; i++) {
            entries.push(thermalFunction(trunkTemperatureId(i, flags), DEFAULT_MEAN_TEMPERATURE, 0))
        }
    } else {
        entries.push(thermalFunction(POOLED_TEMPERATURE, DEFAULT_MEAN_TEMPERATURE, POOLED_TEMPERATURE_DELTA))
    }

    return entries
}

/** Serialized coeff_diff.xml for the given tree count and flags */
export function buildCoeffDiff(options: CoeffDiffOptions): string {
    if (!Number.isInteger(options.treeCount) || options.treeCount < 1) {
        throw new InputDataError(`coeff_diff.xml needs at least one tree, got ${options.treeCount}`)
    }

    const surfaces: Record<string, XmlElement | XmlElement[]> = {
        LambertianMultiFunctions: element({}, { LambertianMulti: opticalEntries(options) }),
    }
    for (const section of EMPTY_SURFACE_SECTIONS) {
        surfaces[section] = element()
    }

    const coeffDiff = element(
        { fluorescenceFile: 0, fluorescenceProducts: 0, useCombinedYield: 0 },
        {
            Surfaces: element({}, surfaces),
            Volumes: element({}, {
                UnderstoryMultiFunctions: element({
                    integrationStepOnPhi: 10,
                    integrationStepOnTheta: 1,
                    outputLADFile: 0,
                }),
                AirMultiFunctions: element(),
            }),
            Temperatures: element({}, {
                ThermalFunction: thermalEntries(options.treeCount, options.flags),
            }),
        }
    )

    return serializeDocument('DartFile', element({ ...DART_FILE_ATTRIBUTES }, { Coeff_diff: coeffDiff }))
}

// ============================================================================
// GENERATOR
// ============================================================================

export class CoeffDiffGenerator implements DocumentGenerator {
    readonly fileName = COEFF_DIFF_FILE

    constructor(private readonly resolver: SpectralIntervalResolver) {}

    /**
     * Soils for multi_sol runs. Any resolution problem downgrades to the
     * single default soil with a warning.
     */
    async resolveSoils(config: SimulationConfig): Promise<SoilDefinition[]> {
        if (!config.simulation_settings.multi_sol) return []

        const soilFactorPath = config.paths.soil_factor_path
        if (soilFactorPath === undefined) {
            log.warn('multi_sol is enabled but soil_factor_path is not configured; using default soil')
            return []
        }

        const isDirectory = await fs.stat(soilFactorPath).then(s => s.isDirectory(), () => false)
        if (!isDirectory) {
            log.warn(`Soil factor directory not found: ${soilFactorPath}; using default soil`)
            return []
        }

        try {
            const bands = await this.resolver.resolve(soilFactorPath)
            const soils = await findSoilFolders(soilFactorPath, bands)
            if (soils.length === 0) {
                log.warn('No usable soil folder; using default soil')
            }
            return soils
        } catch (err) {
            if (!(err instanceof ExternalResolutionError)) throw err
            log.warn(`Spectral interval resolution failed: ${describeError(err)}; using default soil`)
            return []
        }
    }

    async generate(config: SimulationConfig): Promise<GeneratedDocument> {
        const positionFile = config.paths.position_txt_path
        const treeCount = await countTrees(positionFile)
        if (treeCount === 0) {
            throw new InputDataError(`No trees found in position file ${positionFile}`)
        }
        log.info(`Found ${treeCount} trees in position file`)

        const soils = await this.resolveSoils(config)
        const xml = buildCoeffDiff({
            treeCount,
            flags: propertyFlags(config.parameters_to_vary),
            soils,
        })

        const outputPath = path.join(config.paths.simulation_path, 'input', this.fileName)
        await writeFileAtomic(outputPath, xml)
        log.info(`coeff_diff.xml written to ${outputPath}`)

        return { outputPath, xml, treeCount }
    }
}
