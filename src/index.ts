/**
 * DART Scene Prep — Public API
 *
 * Generates DART input files (coeff_diff.xml, object_3d.xml, sequence.xml)
 * from a JSON config, a tree position file and a folder of .obj tree models.
 */

// Core types
export type {
    PathsConfig,
    SimulationSettings,
    ParametersToVary,
    SimulationConfig,
    Vec3,
    TreePosition,
    SpectralDartMode,
    SpectralIntervals,
    SoilBandFactor,
    SoilDefinition,
    PropertyFlags,
    ProspectParameters,
} from './types/index.js'

// Errors
export {
    GeneratorError,
    ConfigError,
    InputDataError,
    ExternalResolutionError,
    isGeneratorError,
} from './errors.js'
export type { GeneratorErrorKind } from './errors.js'

// Configuration
export { loadConfig, parseConfig, SimulationConfigSchema } from './config/loadConfig.js'

// Inputs
export { countTrees, readPositions, parsePositions, isDataLine } from './positions/positionFile.js'
export { ModelCatalog, listModelFiles } from './models/modelCatalog.js'
export { PhaseXmlSpectralResolver, parseSpectralIntervals } from './spectral/SpectralResolver.js'
export type { SpectralIntervalResolver } from './spectral/SpectralResolver.js'
export { findSoilFolders, checkSoilFactorPath } from './soils/soilFactors.js'

// Generators
export type { DocumentGenerator, GeneratedDocument } from './generators/types.js'
export { CoeffDiffGenerator, buildCoeffDiff, DEFAULT_PROSPECT_PARAMETERS } from './generators/CoeffDiffGenerator.js'
export type { CoeffDiffOptions } from './generators/CoeffDiffGenerator.js'
export { Object3DGenerator, buildObject3d, placeTrees } from './generators/Object3DGenerator.js'
export type { Object3dOptions, ObjectPlacement } from './generators/Object3DGenerator.js'
export { SequenceGenerator, buildSequence, buildSequenceEntries } from './generators/SequenceGenerator.js'
export type { SequenceEntry, SequenceOptions } from './generators/SequenceGenerator.js'
export { MaketUpdater, applyMaketLinks, soilNamesFromCoeffDiff } from './generators/MaketUpdater.js'
export * from './generators/naming.js'

// Pipeline
export { prepareSimulation, prepareConfig, ensureSimulationInput } from './pipeline/prepareSimulation.js'
export type { PrepareOptions, PrepareResult } from './pipeline/prepareSimulation.js'

// Utilities
export { Logger, createLogger } from './util/logger.js'
export { createRng, rngFromSeed } from './util/random.js'
export type { Rng } from './util/random.js'
