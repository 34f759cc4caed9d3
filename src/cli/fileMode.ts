import path from 'node:path'

import { ByteFile } from '../adapters/node/ByteFile.js'
import { ensureDir, listTextFiles } from '../adapters/node/listTextFiles.js'
import { CipherError, isCipherError } from '../common/errors/CipherError.js'
import type { Logger } from '../common/utils/log.js'
import type { LabConfig } from '../config.js'
import {
    type Algorithm,
    ALGORITHMS,
    buildRequest,
    CipherLab,
    type Operation,
    OPERATIONS,
    type RunSummary,
} from '../core/CipherLab.js'
import type { Prompter } from './prompter.js'

export interface FileModeOptions {
    input?: string
    output?: string
    operation?: string
    algorithm?: string
    key?: string
}

const ALGORITHM_LABELS: Record<Algorithm, string> = {
    caesar: 'Caesar',
    xor: 'XOR',
    vigenere: 'Vigenere',
    des: 'DES',
}

class InputEnded extends Error {
    constructor() {
        super('Input ended before the file mode finished')
        this.name = 'InputEnded'
    }
}

const ask = async (prompter: Prompter, question: string): Promise<string> => {
    const answer = await prompter.ask(question)
    if (answer === null) throw new InputEnded()
    return answer
}

/** Accepts either the menu number ("1") or the name ("caesar"). */
const pick = <T extends string>(answer: string, choices: readonly T[]): T | undefined => {
    const value = answer.trim().toLowerCase()
    const index = Number.parseInt(value, 10)
    if (String(index) === value) return choices[index - 1]
    return choices.find((choice) => choice === value)
}

async function chooseInput(
    prompter: Prompter,
    config: LabConfig,
    logger: Logger,
): Promise<string | undefined> {
    const files = await listTextFiles(config.inputDir)
    if (files.length === 0) {
        logger.error(`No .txt files found in ${config.inputDir}`)
        return undefined
    }
    logger.print('Available files:')
    files.forEach((file, index) => logger.print(`[${index + 1}] ${file}`))

    for (;;) {
        const selection = Number.parseInt(await ask(prompter, 'Select a file by number: '), 10)
        const file = files[selection - 1]
        if (selection >= 1 && file !== undefined) {
            return path.join(config.inputDir, file)
        }
    }
}

async function chooseOutput(prompter: Prompter, config: LabConfig): Promise<string> {
    await ensureDir(config.outputDir)
    for (;;) {
        const name = (await ask(prompter, 'Output file name: ')).trim()
        if (name) return path.join(config.outputDir, name)
    }
}

async function chooseOperation(prompter: Prompter, preset?: string): Promise<Operation> {
    if (preset !== undefined) {
        const operation = pick(preset, OPERATIONS)
        if (!operation) {
            throw new CipherError('InvalidKey', `Unknown operation "${preset}"`)
        }
        return operation
    }
    for (;;) {
        const operation = pick(await ask(prompter, 'Operation: [1] Encrypt  [2] Decrypt: '), OPERATIONS)
        if (operation) return operation
    }
}

async function chooseAlgorithm(prompter: Prompter, logger: Logger, preset?: string): Promise<Algorithm> {
    if (preset !== undefined) {
        const algorithm = pick(preset, ALGORITHMS)
        if (!algorithm) {
            throw new CipherError('InvalidKey', `Unknown algorithm "${preset}"`)
        }
        return algorithm
    }
    logger.print('Algorithm:')
    ALGORITHMS.forEach((algorithm, index) => logger.print(`${index + 1}. ${ALGORITHM_LABELS[algorithm]}`))
    for (;;) {
        const algorithm = pick(await ask(prompter, 'Select: '), ALGORITHMS)
        if (algorithm) return algorithm
        logger.warn('Invalid algorithm')
    }
}

/**
 * Interactive encrypt/decrypt of one file. Options given on the command
 * line skip the matching prompt. Resolves with the process exit code.
 */
export async function runFileMode(
    options: FileModeOptions,
    prompter: Prompter,
    config: LabConfig,
    logger: Logger,
): Promise<number> {
    logger.print('--- File encryption / decryption ---')
    try {
        const inputPath = options.input ?? (await chooseInput(prompter, config, logger))
        if (inputPath === undefined) return 1

        let outputPath = options.output
        if (outputPath === undefined) {
            outputPath = await chooseOutput(prompter, config)
        } else {
            await ensureDir(path.dirname(outputPath))
        }

        const operation = await chooseOperation(prompter, options.operation)
        const algorithm = await chooseAlgorithm(prompter, logger, options.algorithm)
        const key = options.key ?? (await ask(prompter, 'Key: '))

        const lab = new CipherLab(new ByteFile(inputPath), new ByteFile(outputPath))
        const summary: RunSummary = await lab.run(buildRequest(algorithm, operation, key))
        if (algorithm === 'des' && summary.bytesIn > summary.bytesOut) {
            logger.warn(`DES processes a single block: only the first 8 of ${summary.bytesIn} bytes were used`)
        }
        logger.info(`${operation} with ${ALGORITHM_LABELS[algorithm]}: ${summary.bytesIn} -> ${summary.bytesOut} bytes`)
        logger.print(`Operation completed, file saved to: ${summary.outputPath}`)
        return 0
    } catch (error) {
        if (isCipherError(error)) {
            logger.error(`${error.kind}: ${error.message}`)
            return 1
        }
        if (error instanceof InputEnded) {
            logger.error(error.message)
            return 1
        }
        throw error
    }
}
