/**
 * DART Scene Prep — Core Types
 *
 * Shared shapes for the configuration, the parsed tree positions and the
 * property identifiers that link object_3d.xml to coeff_diff.xml.
 */

// ============================================================================
// CONFIGURATION
// ============================================================================

export interface PathsConfig {
    /** DART simulation root; outputs land in <simulation_path>/input */
    simulation_path: string
    /** Plain-text DART position file, one tree per data line */
    position_txt_path: string
    /** Directory searched (recursively) for .obj tree models */
    tree_obj_path: string
    /** One subfolder per soil, one .txt factor matrix per spectral band */
    soil_factor_path?: string
}

export interface SimulationSettings {
    multi_sol: boolean
    multi_tree: boolean
    run_sequencer: boolean
    /** Seeds model selection and sequencer values */
    random_seed?: number
}

export interface ParametersToVary {
    scale: boolean
    tree_temperature: boolean
    chlorophyl: boolean
    water_thickness: boolean
    soil_temperature: boolean
}

export interface SimulationConfig {
    paths: PathsConfig
    simulation_settings: SimulationSettings
    parameters_to_vary: ParametersToVary
    /** Number of sequencer runs (needed only when run_sequencer is on) */
    nbr_of_sequence?: number
}

// ============================================================================
// POSITIONS
// ============================================================================

export interface Vec3 {
    x: number
    y: number
    z: number
}

export interface TreePosition {
    /** 0-based order of the data line in the position file */
    index: number
    /** First column of the line (DART object type number) */
    objectType: number
    position: Vec3
    scale: Vec3
    rotation: Vec3
}

// ============================================================================
// SPECTRAL BANDS & SOILS
// ============================================================================

/**
 * DART spectral mode of a band.
 * 0 = reflectance, 1 = reflectance + thermal emission, 2 = thermal only, 3 = fluorescence
 */
export type SpectralDartMode = 0 | 1 | 2 | 3

/** Band number -> mode, iterated in ascending band order */
export type SpectralIntervals = Map<number, SpectralDartMode>

export interface SoilBandFactor {
    bandNumber: number
    mode: SpectralDartMode
    /** Absolute path of the factor matrix file for this band */
    factorFile: string
}

export interface SoilDefinition {
    /** Subfolder name; the optical identifier is soil_<name> */
    name: string
    bands: SoilBandFactor[]
}

// ============================================================================
// PROPERTY NAMING — the only link between the two documents
// ============================================================================

export interface PropertyFlags {
    /** Per-tree Temp_leaf_i / Temp_trunk_i instead of the pooled range */
    perTreeTemperature: boolean
    /** Per-tree leaf_i instead of a shared leaf_0 */
    perTreeLeafOptics: boolean
}

/** PROSPECT leaf model inputs, written verbatim as attributes */
export type ProspectParameters = {
    CBrown: string
    Cab: string
    Car: string
    Cbc: string
    Cm: string
    Cp: string
    Cw: string
    N: string
    anthocyanin: string
    inputProspectFile: string
    isV2Z: string
    useCm: string
}
