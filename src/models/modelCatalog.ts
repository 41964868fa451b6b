/**
 * ModelCatalog — the .obj tree models available for placement.
 * Files are found recursively and sorted, so "first model" is stable across runs.
 */

import path from 'path'
import fs from 'fs-extra'
import { InputDataError, describeError } from '../errors.js'
import { pick, type Rng } from '../util/random.js'

export const MODEL_EXTENSION = '.obj'

/** Recursively collect model files under `dir`, sorted by path */
export async function listModelFiles(dir: string, extension = MODEL_EXTENSION): Promise<string[]> {
    const found: string[] = []

    const walk = async (current: string): Promise<void> => {
        const entries = await fs.readdir(current, { withFileTypes: true })
        for (const entry of entries) {
            const full = path.join(current, entry.name)
            if (entry.isDirectory()) {
                await walk(full)
            } else if (entry.isFile() && entry.name.toLowerCase().endsWith(extension)) {
                found.push(full)
            }
        }
    }

    try {
        await walk(dir)
    } catch (err) {
        throw new InputDataError(`Cannot read tree model directory ${dir}: ${describeError(err)}`, { cause: err })
    }

    return found.sort((a, b) => (a < b ? -1 : a > b ? 1 : 0))
}

export class ModelCatalog {
    private readonly files: readonly string[]

    constructor(files: readonly string[], readonly source = 'model directory') {
        if (files.length === 0) {
            throw new InputDataError(`No ${MODEL_EXTENSION} files found in ${source}`)
        }
        this.files = files
    }

    static async fromDirectory(dir: string): Promise<ModelCatalog> {
        return new ModelCatalog(await listModelFiles(dir), dir)
    }

    /** First model in sorted order */
    get first(): string {
        return this.files[0]
    }

    get count(): number {
        return this.files.length
    }

    getAll(): string[] {
        return [...this.files]
    }

    /** Uniform random model */
    random(rng: Rng): string {
        return pick(this.files, rng)
    }

    /** Random model when `multiTree`, otherwise always the first */
    select(multiTree: boolean, rng: Rng): string {
        return multiTree ? this.random(rng) : this.first
    }
}
