/**
 * prepareSimulation — runs every preparation pass against one config file.
 *
 *   1. Load and validate config.json
 *   2. Check the simulation directory, create input/
 *   3. Check soil_factor_path (warnings only)
 *   4. coeff_diff.xml
 *   5. maket.xml (skipped with a warning when DART has not written one yet)
 *   6. object_3d.xml
 *   7. sequence.xml when run_sequencer is on
 */

import path from 'path'
import fs from 'fs-extra'
import { loadConfig } from '../config/loadConfig.js'
import { InputDataError } from '../errors.js'
import { CoeffDiffGenerator } from '../generators/CoeffDiffGenerator.js'
import { MaketUpdater } from '../generators/MaketUpdater.js'
import { Object3DGenerator } from '../generators/Object3DGenerator.js'
import { SequenceGenerator } from '../generators/SequenceGenerator.js'
import type { DocumentGenerator } from '../generators/types.js'
import { checkSoilFactorPath } from '../soils/soilFactors.js'
import { PhaseXmlSpectralResolver, type SpectralIntervalResolver } from '../spectral/SpectralResolver.js'
import type { SimulationConfig } from '../types/index.js'
import { createLogger } from '../util/logger.js'
import type { Rng } from '../util/random.js'

const log = createLogger('Prepare')

export interface PrepareOptions {
    /** Defaults to reading <simulation_path>/input/phase.xml */
    resolver?: SpectralIntervalResolver
    /** Overrides simulation_settings.random_seed */
    rng?: Rng
}

export interface PrepareResult {
    config: SimulationConfig
    treeCount: number
    /** Paths of every file written, in order */
    written: string[]
}

/** Fails with InputDataError when the simulation directory is missing */
export async function ensureSimulationInput(simulationPath: string): Promise<string> {
    if (!(await fs.pathExists(simulationPath))) {
        throw new InputDataError(`Simulation path not found: ${simulationPath}`)
    }
    const inputDir = path.join(simulationPath, 'input')
    if (!(await fs.pathExists(inputDir))) {
        await fs.ensureDir(inputDir)
        log.info(`Created input directory: ${inputDir}`)
    }
    return inputDir
}

export async function prepareConfig(config: SimulationConfig, options: PrepareOptions = {}): Promise<PrepareResult> {
    await ensureSimulationInput(config.paths.simulation_path)
    await checkSoilFactorPath(config)

    const resolver = options.resolver ?? new PhaseXmlSpectralResolver(config.paths.simulation_path)
    const written: string[] = []

    const run = async (generator: DocumentGenerator): Promise<number> => {
        const doc = await generator.generate(config)
        written.push(doc.outputPath)
        return doc.treeCount
    }

    const treeCount = await run(new CoeffDiffGenerator(resolver))

    const maket = new MaketUpdater()
    if (await fs.pathExists(maket.maketPath(config))) {
        await maket.update(config)
        written.push(maket.maketPath(config))
    } else {
        log.warn(`maket.xml not found at ${maket.maketPath(config)}; skipping soil link update`)
    }

    await run(new Object3DGenerator(options.rng))

    if (config.simulation_settings.run_sequencer) {
        await run(new SequenceGenerator(options.rng))
    }

    return { config, treeCount, written }
}

export async function prepareSimulation(configPath: string, options: PrepareOptions = {}): Promise<PrepareResult> {
    const config = await loadConfig(configPath)
    log.info(`Configuration loaded from ${configPath}`)
    return prepareConfig(config, options)
}
