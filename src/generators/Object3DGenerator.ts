/**
 * Object3DGenerator — builds object_3d.xml, one Object per tree position.
 *
 * Pipeline per tree (file order):
 *   1. Pick a model (random when multi_tree, else the first sorted model)
 *   2. Copy position / scale / rotation from the record
 *   3. Link the Leaves group to leaf_i or leaf_0, the Trunk group to trunk
 *   4. Link both groups to per-tree or pooled thermal functions
 */

import path from 'path'
import { InputDataError } from '../errors.js'
import { ModelCatalog } from '../models/modelCatalog.js'
import { readPositions } from '../positions/positionFile.js'
import type { PropertyFlags, SimulationConfig, TreePosition, Vec3 } from '../types/index.js'
import { createLogger } from '../util/logger.js'
import { rngFromSeed, type Rng } from '../util/random.js'
import { element, formatDecimal, serializeDocument, writeFileAtomic, type XmlElement } from '../xml/document.js'
import {
    TRUNK_OPTICAL,
    leafOpticalId,
    leafTemperatureId,
    propertyFlags,
    trunkTemperatureId,
} from './naming.js'
import { DART_FILE_ATTRIBUTES, type DocumentGenerator, type GeneratedDocument } from './types.js'

const log = createLogger('Object3D')

export const OBJECT_3D_FILE = 'object_3d.xml'

/** DART default object types referenced by the groups */
const DEFAULT_TYPES = [
    { indexOT: 101, name: 'Default_Object', typeColor: '255 0 0' },
    { indexOT: 102, name: 'Leaf', typeColor: '0 175 0' },
    { indexOT: 103, name: 'Trunk', typeColor: '71 55 25' },
] as const

const LEAF_TYPE = DEFAULT_TYPES[1]
const TRUNK_TYPE = DEFAULT_TYPES[2]

/** Bounding box of the reference tree model, as DART measured it */
const MODEL_DIMENSION = { xdim: '9.32332992553711', ydim: '9.625602722167969', zdim: '6.392255189130083' }
const MODEL_CENTER = {
    xCenter: '-0.15236902236938477',
    yCenter: '-0.17827844619750977',
    zCenter: '3.1936185945523903',
}

export interface ObjectPlacement {
    tree: TreePosition
    /** Model file for this tree */
    modelFile: string
}

export interface Object3dOptions {
    placements: ObjectPlacement[]
    flags: PropertyFlags
}

function axisProps(prefix: 'scale' | 'rot', v: Vec3): Record<string, string> {
    if (prefix === 'scale') {
        return {
            xScaleDeviation: '0.0',
            xscale: formatDecimal(v.x),
            yScaleDeviation: '0.0',
            yscale: formatDecimal(v.y),
            zScaleDeviation: '0.0',
            zscale: formatDecimal(v.z),
        }
    }
    return {
        xRotDeviation: '0.0',
        xrot: formatDecimal(v.x),
        yRotDeviation: '0.0',
        yrot: formatDecimal(v.y),
        zRotDeviation: '0.0',
        zrot: formatDecimal(v.z),
    }
}

interface GroupLinks {
    name: string
    num: number
    opticalIdent: string
    indexFctPhase: number
    idTemperature: string
    type: { indexOT: number; name: string }
}

function group(links: GroupLinks): XmlElement {
    const opticalProperties = element({}, {
        SurfaceOpticalProperties: element({ doubleFace: 0 }, {
            OpticalPropertyLink: element({
                ident: links.opticalIdent,
                indexFctPhase: links.indexFctPhase,
                type: 0,
            }),
        }),
        SurfaceExitanceProperties: element({ doubleFace: 0, useTemperaturePerTriangle: 0 }, {
            ThermalPropertyLink: element({ idTemperature: links.idTemperature, indexTemperature: 0 }),
        }),
    })

    return element(
        {
            groupDEMMode: 0,
            hidden: 0,
            hideRB: 0,
            isLAICalc: 0,
            name: links.name,
            num: links.num,
            transparent: 0,
        },
        {
            GroupOpticalProperties: opticalProperties,
            GroupTypeProperties: element({}, {
                ObjectTypeLink: element({ identOType: links.type.name, indexOT: links.type.indexOT }),
            }),
        }
    )
}

function objectNode({ tree, modelFile }: ObjectPlacement, flags: PropertyFlags): XmlElement {
    const i = tree.index

    const geometry = element({}, {
        PositionProperties: element({
            xpos: formatDecimal(tree.position.x),
            ypos: formatDecimal(tree.position.y),
            zpos: formatDecimal(tree.position.z),
        }),
        Dimension3D: element(MODEL_DIMENSION),
        Center3D: element(MODEL_CENTER),
        ScaleProperties: element(axisProps('scale', tree.scale)),
        RotationProperties: element(axisProps('rot', tree.rotation)),
    })

    const groups = [
        group({
            name: 'Leaves',
            num: 1,
            opticalIdent: leafOpticalId(i, flags),
            indexFctPhase: 0,
            idTemperature: leafTemperatureId(i, flags),
            type: LEAF_TYPE,
        }),
        group({
            name: 'Trunk',
            num: 2,
            opticalIdent: TRUNK_OPTICAL,
            indexFctPhase: 1,
            idTemperature: trunkTemperatureId(i, flags),
            type: TRUNK_TYPE,
        }),
    ]

    return element(
        {
            file_src: modelFile,
            hasGroups: 1,
            hidden: 0,
            hideRB: 0,
            isDisplayed: 1,
            name: 'Object',
            num: i,
            objectColor: '125 0 125',
            objectDEMMode: 0,
            repeatedOnBorder: 1,
        },
        {
            GeometricProperties: geometry,
            ObjectOpticalProperties: element({
                isLAICalc: 0,
                isSingleGlobalLai: 0,
                sameExitanceObject: 0,
                sameOPObject: 0,
                transparent: 0,
            }),
            ObjectTypeProperties: element({ sameOTObject: 0 }),
            Groups: element({}, { Group: groups }),
        }
    )
}

/** Serialized object_3d.xml for the given placements */
export function buildObject3d(options: Object3dOptions): string {
    if (options.placements.length === 0) {
        throw new InputDataError('object_3d.xml needs at least one tree position')
    }

    const types = element({}, {
        DefaultTypes: element({}, {
            DefaultType: DEFAULT_TYPES.map(t => element({ ...t })),
        }),
        CustomTypes: element(),
    })

    const object3d = element({ generateTriangleFileXML: 0 }, {
        Types: types,
        ObjectList: element({}, {
            Object: options.placements.map(p => objectNode(p, options.flags)),
        }),
        ObjectFields: element(),
    })

    return serializeDocument('DartFile', element({ ...DART_FILE_ATTRIBUTES }, { object_3d: object3d }))
}

/** Assign a model to every tree, in file order */
export function placeTrees(
    trees: TreePosition[],
    catalog: ModelCatalog,
    multiTree: boolean,
    rng: Rng
): ObjectPlacement[] {
    return trees.map(tree => ({ tree, modelFile: catalog.select(multiTree, rng) }))
}

export class Object3DGenerator implements DocumentGenerator {
    readonly fileName = OBJECT_3D_FILE

    /** `rng` overrides the seed from simulation_settings.random_seed */
    constructor(private readonly rng?: Rng) {}

    async generate(config: SimulationConfig): Promise<GeneratedDocument> {
        const { paths, simulation_settings: settings } = config

        const trees = await readPositions(paths.position_txt_path)
        if (trees.length === 0) {
            throw new InputDataError(`No tree positions found in ${paths.position_txt_path}`)
        }

        const catalog = await ModelCatalog.fromDirectory(paths.tree_obj_path)
        log.info(`Placing ${trees.length} trees using ${settings.multi_tree ? catalog.count : 1} model(s)`)

        const rng = this.rng ?? rngFromSeed(settings.random_seed)
        const xml = buildObject3d({
            placements: placeTrees(trees, catalog, settings.multi_tree, rng),
            flags: propertyFlags(config.parameters_to_vary),
        })

        const outputPath = path.join(paths.simulation_path, 'input', this.fileName)
        await writeFileAtomic(outputPath, xml)
        log.info(`object_3d.xml written to ${outputPath}`)

        return { outputPath, xml, treeCount: trees.length }
    }
}
