import { isLogLevel, type LogLevel } from './common/utils/log.js'

export interface LabConfig {
    /** Directory the file mode offers input files from. */
    inputDir: string
    /** Directory transformed files are written to. */
    outputDir: string
    logLevel: LogLevel
    vigenereMaxKeyLength: number
}

export const defaultConfig: LabConfig = {
    inputDir: 'DatosCrudos',
    outputDir: 'DatosCif',
    logLevel: 'info',
    vigenereMaxKeyLength: 3,
}

const positiveInt = (value: string | undefined): number | undefined => {
    if (value === undefined || value === '') return undefined
    const parsed = Number(value)
    return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined
}

/**
 * Defaults, then CIPHER_LAB_* environment variables, then explicit overrides.
 */
export function loadConfig(
    overrides: Partial<LabConfig> = {},
    env: NodeJS.ProcessEnv = process.env,
): LabConfig {
    const level = env.CIPHER_LAB_LOG_LEVEL
    return {
        inputDir: overrides.inputDir ?? env.CIPHER_LAB_INPUT_DIR ?? defaultConfig.inputDir,
        outputDir: overrides.outputDir ?? env.CIPHER_LAB_OUTPUT_DIR ?? defaultConfig.outputDir,
        logLevel: overrides.logLevel ?? (isLogLevel(level) ? level : defaultConfig.logLevel),
        vigenereMaxKeyLength:
            overrides.vigenereMaxKeyLength ??
            positiveInt(env.CIPHER_LAB_VIGENERE_MAX_LEN) ??
            defaultConfig.vigenereMaxKeyLength,
    }
}
