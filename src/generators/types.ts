/**
 * Generator interface — every DART input file is produced by one of these.
 * coeff_diff, object_3d, sequence: same contract, different documents.
 */

import type { SimulationConfig } from '../types/index.js'

export interface GeneratedDocument {
    /** Absolute or config-relative path the document was written to */
    outputPath: string
    /** Serialized document, as written */
    xml: string
    /** Number of trees the document was generated for */
    treeCount: number
}

export interface DocumentGenerator {
    /** Output file name (e.g. coeff_diff.xml) */
    readonly fileName: string

    /**
     * Read the inputs named by the configuration, build the document and
     * write it. Nothing is written when an input error is raised.
     */
    generate(config: SimulationConfig): Promise<GeneratedDocument>
}

/** Header attributes of every DART document we emit */
export const DART_FILE_ATTRIBUTES = {
    build: 'v1410',
    version: '5.10.6',
} as const
