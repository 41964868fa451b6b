import os from 'os'
import path from 'path'
import fs from 'fs-extra'
import type { ParametersToVary, SimulationConfig, SimulationSettings } from '../../src/types/index.js'
import { createReader } from '../../src/xml/document.js'

export const POSITIONS_3 = [
    'complete transformation',
    '// type x y z xscale yscale zscale xrot yrot zrot',
    '0 10.5 20 0 1 1 1 0 0 90',
    '0 12 22.25 0 1.5 1.5 1.5 0 0 45',
    '',
    '0 30 5 0 0.8 0.8 0.8 0 0 0',
    '',
].join('\n')

export interface Workspace {
    root: string
    simulationPath: string
    positionFile: string
    modelDir: string
    soilDir: string
    configPath: string
    config: SimulationConfig
    cleanup(): Promise<void>
}

export interface WorkspaceOptions {
    positions?: string
    models?: string[]
    settings?: Partial<SimulationSettings>
    params?: Partial<ParametersToVary>
    nbrOfSequence?: number
}

export const NO_VARIATION: ParametersToVary = {
    scale: false,
    tree_temperature: false,
    chlorophyl: false,
    water_thickness: false,
    soil_temperature: false,
}

/** Temp directory with a simulation folder, position file, models and config.json */
export async function createWorkspace(options: WorkspaceOptions = {}): Promise<Workspace> {
    const root = await fs.mkdtemp(path.join(os.tmpdir(), 'dart-prep-'))
    const simulationPath = path.join(root, 'simulation')
    const positionFile = path.join(root, 'positions.txt')
    const modelDir = path.join(root, 'models')
    const soilDir = path.join(root, 'soils')

    await fs.ensureDir(path.join(simulationPath, 'input'))
    await fs.ensureDir(modelDir)
    await fs.writeFile(positionFile, options.positions ?? POSITIONS_3, 'utf-8')
    for (const model of options.models ?? ['pine.obj', 'birch.obj']) {
        await fs.outputFile(path.join(modelDir, model), '# model\n', 'utf-8')
    }

    const config: SimulationConfig = {
        paths: {
            simulation_path: simulationPath,
            position_txt_path: positionFile,
            tree_obj_path: modelDir,
            soil_factor_path: soilDir,
        },
        simulation_settings: {
            multi_sol: false,
            multi_tree: false,
            run_sequencer: false,
            ...options.settings,
        },
        parameters_to_vary: { ...NO_VARIATION, ...options.params },
        nbr_of_sequence: options.nbrOfSequence,
    }

    const configPath = path.join(root, 'config.json')
    await fs.writeJson(configPath, config)

    return {
        root,
        simulationPath,
        positionFile,
        modelDir,
        soilDir,
        configPath,
        config,
        cleanup: () => fs.remove(root),
    }
}

type Node = Record<string, unknown>

function isNode(value: unknown): value is Node {
    return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Parse generated XML; `arrayTags` always come back as arrays */
export function parseXml(xml: string, arrayTags: string[]): Node {
    const doc: unknown = createReader(arrayTags).parse(xml)
    if (!isNode(doc)) throw new Error('expected an XML document')
    return doc
}

/** Walk element names; throws when a step is missing */
export function at(node: unknown, ...keys: string[]): Node {
    let current: unknown = node
    for (const key of keys) {
        if (!isNode(current)) throw new Error(`no element at ${key}`)
        current = current[key]
    }
    if (!isNode(current)) throw new Error(`no element at ${keys.join('/')}`)
    return current
}

/** Array child of an element */
export function list(node: unknown, key: string): Node[] {
    const value = isNode(node) ? node[key] : undefined
    if (!Array.isArray(value)) throw new Error(`no list at ${key}`)
    return value.filter(isNode)
}

/** Attribute value */
export function attr(node: Node, name: string): unknown {
    return node[`@_${name}`]
}
