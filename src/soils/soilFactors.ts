/**
 * Soil factor catalog.
 *
 * Layout expected under soil_factor_path:
 *
 *   <soil_factor_path>/<soil name>/<one .txt factor matrix per spectral band>
 *
 * Band files are matched to bands in sorted file-name order, digits compared
 * numerically (band2.txt before band10.txt).
 */

import path from 'path'
import fs from 'fs-extra'
import type { SimulationConfig, SoilDefinition, SpectralIntervals } from '../types/index.js'
import { createLogger } from '../util/logger.js'

const log = createLogger('Soils')

const FACTOR_EXTENSION = '.txt'

const collator = new Intl.Collator('en', { numeric: true })

function byName(a: string, b: string): number {
    return collator.compare(a, b)
}

/**
 * Soil subfolders holding exactly one factor file per band.
 * Folders with the wrong file count are skipped with a warning.
 */
export async function findSoilFolders(
    soilFactorPath: string,
    bands: SpectralIntervals
): Promise<SoilDefinition[]> {
    const bandList = [...bands.entries()]
    const entries = await fs.readdir(soilFactorPath, { withFileTypes: true })
    const folders = entries.filter(e => e.isDirectory()).map(e => e.name).sort(byName)

    const soils: SoilDefinition[] = []
    for (const folder of folders) {
        const folderPath = path.join(soilFactorPath, folder)
        const files = (await fs.readdir(folderPath))
            .filter(f => f.toLowerCase().endsWith(FACTOR_EXTENSION))
            .sort(byName)

        if (files.length !== bandList.length) {
            log.warn(
                `Soil folder '${folder}' has ${files.length} ${FACTOR_EXTENSION} files, expected ${bandList.length}` +
                (files.length > 0 ? ` (found: ${files.join(', ')})` : '')
            )
            continue
        }

        soils.push({
            name: folder,
            bands: bandList.map(([bandNumber, mode], i) => ({
                bandNumber,
                mode,
                factorFile: path.join(folderPath, files[i]),
            })),
        })
    }

    if (soils.length > 0) {
        log.info(`Soils used: ${soils.map(s => s.name).join(', ')}`)
    } else {
        log.warn(`No soil folder in ${soilFactorPath} matches the ${bandList.length} spectral bands`)
    }
    return soils
}

/**
 * Check soil_factor_path before a run. Returns false (after warning about
 * the multi_sol / run_sequencer consequences) when the directory is unusable.
 */
export async function checkSoilFactorPath(config: SimulationConfig): Promise<boolean> {
    const soilFactorPath = config.paths.soil_factor_path
    const { multi_sol, run_sequencer } = config.simulation_settings

    const consequences = (problem: string): void => {
        if (multi_sol) log.warn(`multi_sol is set to true but ${problem}`)
        if (run_sequencer) log.warn('run_sequencer is set to true - sequencer will run with default soil only')
    }

    if (soilFactorPath === undefined) {
        if (multi_sol) consequences('no soil_factor_path is configured')
        return false
    }

    if (!(await fs.pathExists(soilFactorPath))) {
        log.warn(`Soil factor directory not found: ${soilFactorPath}`)
        consequences('the soil factor directory is missing')
        return false
    }

    const stat = await fs.stat(soilFactorPath)
    if (!stat.isDirectory()) {
        log.warn(`Soil factor path is not a directory: ${soilFactorPath}`)
        consequences('the soil factor path is not a directory')
        return false
    }

    return true
}
