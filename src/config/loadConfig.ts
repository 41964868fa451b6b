/**
 * Config loader — reads config.json into a validated SimulationConfig.
 * No defaults are filled in for required keys: an incomplete document is a ConfigError.
 */

import fs from 'fs-extra'
import { z } from 'zod'
import { ConfigError, describeError } from '../errors.js'
import type { SimulationConfig } from '../types/index.js'

const PathString = z.string().trim().min(1, 'must be a non-empty path')

const PathsSchema = z.object({
    simulation_path: PathString,
    position_txt_path: PathString,
    tree_obj_path: PathString,
    soil_factor_path: PathString.optional(),
})

const SimulationSettingsSchema = z.object({
    multi_sol: z.boolean(),
    multi_tree: z.boolean(),
    run_sequencer: z.boolean(),
    random_seed: z.number().int().optional(),
})

const ParametersToVarySchema = z.object({
    scale: z.boolean(),
    tree_temperature: z.boolean(),
    chlorophyl: z.boolean(),
    water_thickness: z.boolean(),
    soil_temperature: z.boolean(),
})

export const SimulationConfigSchema = z
    .object({
        paths: PathsSchema,
        simulation_settings: SimulationSettingsSchema,
        parameters_to_vary: ParametersToVarySchema,
        nbr_of_sequence: z.number().int().positive().optional(),
    })
    .superRefine((config, ctx) => {
        if (config.simulation_settings.run_sequencer && config.nbr_of_sequence === undefined) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['nbr_of_sequence'],
                message: 'Required when simulation_settings.run_sequencer is true',
            })
        }
    })

/** Validate an already-parsed JSON value */
export function parseConfig(raw: unknown, source = 'config'): SimulationConfig {
    const result = SimulationConfigSchema.safeParse(raw)
    if (!result.success) {
        const issues = result.error.issues
            .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
            .join('; ')
        throw new ConfigError(`Invalid configuration in ${source}: ${issues}`)
    }
    const { paths, simulation_settings, parameters_to_vary, nbr_of_sequence } = result.data
    return Object.freeze({
        paths: Object.freeze(paths),
        simulation_settings: Object.freeze(simulation_settings),
        parameters_to_vary: Object.freeze(parameters_to_vary),
        nbr_of_sequence,
    })
}

/** Read, parse and validate a JSON configuration file */
export async function loadConfig(configPath: string): Promise<SimulationConfig> {
    let text: string
    try {
        text = await fs.readFile(configPath, 'utf-8')
    } catch (err) {
        throw new ConfigError(`Configuration file not readable: ${configPath} (${describeError(err)})`, { cause: err })
    }

    let raw: unknown
    try {
        raw = JSON.parse(text)
    } catch (err) {
        throw new ConfigError(`Invalid JSON in configuration file ${configPath}: ${describeError(err)}`, { cause: err })
    }

    return parseConfig(raw, configPath)
}
