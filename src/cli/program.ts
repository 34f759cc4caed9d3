import { Command, InvalidArgumentError, Option } from 'commander'

import { ByteFile } from '../adapters/node/ByteFile.js'
import { CipherError, isCipherError } from '../common/errors/CipherError.js'
import { createLogger, isLogLevel, type Logger, type LogLevel } from '../common/utils/log.js'
import { type LabConfig, loadConfig } from '../config.js'
import { ALGORITHMS, isAlgorithm } from '../core/CipherLab.js'
import { attackCaesar, attackVigenere, attackXor, isXorAttackMode, XOR_ATTACK_MODES } from './attack.js'
import { type FileModeOptions, runFileMode } from './fileMode.js'
import { runKeygen } from './keygen.js'
import { runMenu } from './menu.js'
import { createConsolePrompter, type Prompter } from './prompter.js'

type GlobalOptions = {
    inputDir?: string
    outputDir?: string
    logLevel?: string
}

interface AttackOptions {
    mode: string
    hex?: boolean
    maxLen?: number
}

interface KeygenCommandOptions {
    length: number
    bits: number
    symbols: boolean
}

export interface ProgramDeps {
    createPrompter?: () => Prompter
    output?: Pick<Console, 'log' | 'warn' | 'error'>
    env?: NodeJS.ProcessEnv
}

const parsePositiveInt = (value: string): number => {
    const parsed = Number(value)
    if (!Number.isInteger(parsed) || parsed < 1) {
        throw new InvalidArgumentError('Expected a positive integer.')
    }
    return parsed
}

export function createProgram(deps: ProgramDeps = {}): Command {
    const program = new Command()
    const createPrompter = deps.createPrompter ?? (() => createConsolePrompter())

    const context = (): { config: LabConfig; logger: Logger } => {
        const globals = program.opts<GlobalOptions>()
        const logLevel: LogLevel | undefined = isLogLevel(globals.logLevel) ? globals.logLevel : undefined
        const config = loadConfig(
            { inputDir: globals.inputDir, outputDir: globals.outputDir, logLevel },
            deps.env,
        )
        return {
            config,
            logger: createLogger('cipher-lab', { level: config.logLevel, output: deps.output }),
        }
    }

    const withPrompter = async <T>(fn: (prompter: Prompter) => Promise<T>): Promise<T> => {
        const prompter = createPrompter()
        try {
            return await fn(prompter)
        } finally {
            prompter.close()
        }
    }

    program
        .name('cipher-lab')
        .description('Classical and toy ciphers for text files')
        .version('0.1.0')
        .option('--input-dir <dir>', 'directory offered for input files')
        .option('--output-dir <dir>', 'directory output files are written to')
        .option('--log-level <level>', 'debug, info, warn, error or silent')

    program
        .command('menu', { isDefault: true })
        .description('run the cipher demonstrations')
        .action(async () => {
            const { logger } = context()
            await withPrompter((prompter) => runMenu(prompter, logger))
        })

    program
        .command('file')
        .description('encrypt or decrypt a file')
        .option('-i, --input <path>', 'input file (skips the file list)')
        .option('-o, --output <path>', 'output file')
        .option('--operation <operation>', 'encrypt or decrypt (1 or 2)')
        .option('-a, --algorithm <algorithm>', `one of ${ALGORITHMS.join(', ')} (or 1-4)`)
        .option('-k, --key <key>', 'cipher key')
        .action(async (options: FileModeOptions) => {
            const { config, logger } = context()
            process.exitCode = await withPrompter((prompter) => runFileMode(options, prompter, config, logger))
        })

    program
        .command('attack')
        .description('brute-force a ciphertext file')
        .argument('<algorithm>', 'caesar, xor or vigenere')
        .argument('<file>', 'ciphertext file')
        .addOption(new Option('-m, --mode <mode>', 'XOR attack').choices(XOR_ATTACK_MODES).default('dictionary'))
        .option('--hex', 'XOR input is a hex dump')
        .option('--max-len <n>', 'longest Vigenere key to try', parsePositiveInt)
        .action(async (algorithm: string, file: string, options: AttackOptions) => {
            const { config, logger } = context()
            try {
                const content = await new ByteFile(file).read()
                if (content === null) {
                    throw new CipherError('FileNotFound', `Input file not found: ${file}`, { path: file })
                }
                if (!isAlgorithm(algorithm) || algorithm === 'des') {
                    throw new CipherError('InvalidKey', `No attack available for "${algorithm}"`)
                }
                switch (algorithm) {
                    case 'caesar':
                        attackCaesar(content, logger)
                        break
                    case 'xor': {
                        const mode = isXorAttackMode(options.mode) ? options.mode : 'dictionary'
                        const found = attackXor(content, mode, logger, options.hex ?? false)
                        logger.info(`${found} readable candidate(s)`)
                        break
                    }
                    case 'vigenere':
                        attackVigenere(content, options.maxLen ?? config.vigenereMaxKeyLength, logger)
                        break
                }
            } catch (error) {
                if (!isCipherError(error)) throw error
                logger.error(`${error.kind}: ${error.message}`)
                process.exitCode = 1
            }
        })

    program
        .command('keygen')
        .description('print random keys, a password, an IV and a salt')
        .option('-l, --length <n>', 'password length', parsePositiveInt, 16)
        .option('-b, --bits <n>', 'key size in bits', parsePositiveInt, 128)
        .option('--no-symbols', 'leave symbols out of the password')
        .action((options: KeygenCommandOptions) => {
            const { logger } = context()
            try {
                runKeygen(options, logger)
            } catch (error) {
                if (!isCipherError(error)) throw error
                logger.error(`${error.kind}: ${error.message}`)
                process.exitCode = 1
            }
        })

    return program
}
