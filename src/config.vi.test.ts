import { describe, expect, it } from 'vitest'

import { defaultConfig, loadConfig } from './config.js'

describe('loadConfig', () => {
    it('should fall back to the defaults', () => {
        expect(loadConfig({}, {})).toEqual(defaultConfig)
        expect(defaultConfig).toEqual({
            inputDir: 'DatosCrudos',
            outputDir: 'DatosCif',
            logLevel: 'info',
            vigenereMaxKeyLength: 3,
        })
    })

    it('should read the environment', () => {
        const config = loadConfig(
            {},
            {
                CIPHER_LAB_INPUT_DIR: 'in',
                CIPHER_LAB_OUTPUT_DIR: 'out',
                CIPHER_LAB_LOG_LEVEL: 'debug',
                CIPHER_LAB_VIGENERE_MAX_LEN: '4',
            },
        )
        expect(config).toEqual({ inputDir: 'in', outputDir: 'out', logLevel: 'debug', vigenereMaxKeyLength: 4 })
    })

    it('should ignore invalid environment values', () => {
        const config = loadConfig({}, { CIPHER_LAB_LOG_LEVEL: 'loud', CIPHER_LAB_VIGENERE_MAX_LEN: '-2' })
        expect(config.logLevel).toBe('info')
        expect(config.vigenereMaxKeyLength).toBe(3)
    })

    it('should let overrides win over the environment', () => {
        const config = loadConfig({ inputDir: 'cli', logLevel: 'error' }, { CIPHER_LAB_INPUT_DIR: 'env' })
        expect(config.inputDir).toBe('cli')
        expect(config.logLevel).toBe('error')
    })
})
