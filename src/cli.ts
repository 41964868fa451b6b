#!/usr/bin/env node

/**
 * dart-prep [config.json]
 *
 * Writes coeff_diff.xml, object_3d.xml (and sequence.xml when enabled)
 * for the simulation named in the config. Exit code 1 on a fatal error.
 */

import path from 'path'
import { fileURLToPath } from 'url'
import chalk from 'chalk'
import fs from 'fs-extra'
import { describeError, isGeneratorError } from './errors.js'
import { prepareSimulation } from './pipeline/prepareSimulation.js'

const DEFAULT_CONFIG = 'config.json'
const RULE = '='.repeat(80)

function usage(): string {
    return 'usage: dart-prep [config.json]'
}

export async function main(argv: string[]): Promise<number> {
    const args = argv.slice(2)
    if (args.includes('--help') || args.includes('-h')) {
        console.log(usage())
        return 0
    }
    if (args.length > 1) {
        console.error(chalk.red(`error: expected at most one argument\n${usage()}`))
        return 1
    }

    const configPath = path.resolve(args[0] ?? DEFAULT_CONFIG)
    const started = Date.now()

    console.log(chalk.cyan(RULE))
    console.log(chalk.cyan('DART simulation preparation'))
    console.log(chalk.cyan(RULE))

    try {
        const result = await prepareSimulation(configPath)
        const seconds = ((Date.now() - started) / 1000).toFixed(1)
        console.log(chalk.green(`\nPrepared ${result.treeCount} trees in ${seconds}s`))
        for (const file of result.written) {
            console.log(`  - ${file}`)
        }
        return 0
    } catch (err) {
        const label = isGeneratorError(err) ? `${err.kind} error` : 'unexpected error'
        console.error(chalk.red(`\n${label}: ${describeError(err)}`))
        return 1
    }
}

/** True when this module is the process entry point (bin links resolved) */
function isEntryPoint(): boolean {
    const script = process.argv[1]
    if (!script) return false
    return fs.realpathSync(script) === fs.realpathSync(fileURLToPath(import.meta.url))
}

if (isEntryPoint()) {
    main(process.argv).then(
        code => {
            process.exitCode = code
        },
        (err: unknown) => {
            console.error(chalk.red(describeError(err)))
            process.exitCode = 1
        }
    )
}
