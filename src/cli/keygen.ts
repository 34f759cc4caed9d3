import { CryptoGenerator } from '../common/keys/CryptoGenerator.js'
import { generateRandomKey, keyToHex } from '../common/keys/keyBridge.js'
import type { RandomSource } from '../common/keys/randomSource.js'
import type { Logger } from '../common/utils/log.js'

export interface KeygenOptions {
    length: number
    bits: number
    symbols: boolean
}

export function runKeygen(options: KeygenOptions, logger: Logger, source?: RandomSource): void {
    const generator = new CryptoGenerator(source)
    const password = generator.generatePassword(options.length, true, true, true, options.symbols)
    const key = generator.generateKey(options.bits)
    const iv = generator.generateIV(16)
    const salt = generator.generateSalt(16)

    logger.print(`DES key (hex)  : ${keyToHex(generateRandomKey(source))}`)
    logger.print(`Password       : ${password}`)
    logger.print(`Strong         : ${generator.validatePassword(password) ? 'yes' : 'no'}`)
    logger.print(`Key (hex)      : ${generator.toHex(key)}`)
    logger.print(`Key (base64)   : ${generator.toBase64(key)}`)
    logger.print(`IV (hex)       : ${generator.toHex(iv)}`)
    logger.print(`Salt (base64)  : ${generator.toBase64(salt)}`)

    generator.secureWipe(key)
}
