/**
 * Property identifiers shared by coeff_diff.xml and object_3d.xml.
 * The two documents are only linked through these names.
 */

import type { ParametersToVary, PropertyFlags } from '../types/index.js'

export const SHARED_LEAF_OPTICAL = 'leaf_0'
export const TRUNK_OPTICAL = 'trunk'
export const DEFAULT_SOIL_OPTICAL = 'soil'
export const SOIL_TEMPERATURE = 'Temp_soil'
export const POOLED_TEMPERATURE = 'Temperature_290_310'

export function propertyFlags(params: ParametersToVary): PropertyFlags {
    return {
        perTreeTemperature: params.tree_temperature,
        perTreeLeafOptics: params.chlorophyl || params.water_thickness,
    }
}

export function leafOpticalId(index: number, flags: PropertyFlags): string {
    return flags.perTreeLeafOptics ? `leaf_${index}` : SHARED_LEAF_OPTICAL
}

export function leafTemperatureId(index: number, flags: PropertyFlags): string {
    return flags.perTreeTemperature ? `Temp_leaf_${index}` : POOLED_TEMPERATURE
}

export function trunkTemperatureId(index: number, flags: PropertyFlags): string {
    return flags.perTreeTemperature ? `Temp_trunk_${index}` : POOLED_TEMPERATURE
}

export function soilOpticalId(soilName: string): string {
    return `soil_${soilName}`
}
