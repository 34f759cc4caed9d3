import { bruteForceCaesar, evaluatePossibleKey } from '../common/cipher/caesar.js'
import type { Candidate } from '../common/cipher/candidate.js'
import { breakVigenere } from '../common/cipher/vigenere.js'
import {
    bruteForceXor1Byte,
    bruteForceXor2Byte,
    bruteForceXorDictionary,
    hexToBytes,
} from '../common/cipher/xor.js'
import { byteStringToUtf8, fromByteString, hexByte } from '../common/utils/bytes.js'
import type { Logger } from '../common/utils/log.js'

export type XorAttackMode = 'one-byte' | 'two-byte' | 'dictionary'

export const XOR_ATTACK_MODES: readonly XorAttackMode[] = ['one-byte', 'two-byte', 'dictionary']

export const isXorAttackMode = (value: unknown): value is XorAttackMode =>
    typeof value === 'string' && XOR_ATTACK_MODES.some((mode) => mode === value)

const SEPARATOR = '============================='

const keyLabel = (key: string): string => {
    const hex: string[] = []
    for (let i = 0; i < key.length; i++) hex.push(`0x${hexByte(key.charCodeAt(i))}`)
    return `'${key}' (${hex.join(' ')})`
}

const printCandidates = (candidates: Iterable<Candidate<string>>, logger: Logger, label: string): number => {
    let found = 0
    for (const { key, plaintext } of candidates) {
        logger.print(SEPARATOR)
        logger.print(`${label}: ${keyLabel(key)}`)
        logger.print(`Possible text : ${byteStringToUtf8(plaintext)}`)
        found++
    }
    return found
}

/**
 * Prints every shift and the frequency-analysis guess. Returns the guess.
 * Ciphertexts are byte strings; candidates are shown as UTF-8.
 */
export function attackCaesar(ciphertext: string, logger: Logger): number {
    logger.print('Brute force attempts:')
    for (const { key, plaintext } of bruteForceCaesar(ciphertext)) {
        logger.print(`Key ${key}: ${byteStringToUtf8(plaintext)}`)
    }
    const guess = evaluatePossibleKey(ciphertext)
    logger.print(`Most likely key: ${guess}`)
    return guess
}

/**
 * Runs one XOR attack. `hex` reads the input as a hex dump ("2b 03 0d")
 * instead of raw bytes. Returns the number of readable candidates.
 */
export function attackXor(input: string, mode: XorAttackMode, logger: Logger, hex = false): number {
    const cipher = hex ? hexToBytes(input) : fromByteString(input)
    switch (mode) {
        case 'one-byte':
            return printCandidates(bruteForceXor1Byte(cipher), logger, '1-byte key')
        case 'two-byte':
            return printCandidates(bruteForceXor2Byte(cipher), logger, '2-byte key')
        case 'dictionary':
            return printCandidates(bruteForceXorDictionary(cipher), logger, 'Dictionary key')
    }
}

export function attackVigenere(ciphertext: string, maxKeyLength: number, logger: Logger): string {
    const best = breakVigenere(ciphertext, maxKeyLength)
    logger.print('*** Vigenere brute force ***')
    logger.print(`Key found      : ${best.key}`)
    logger.print(`Decrypted text : ${byteStringToUtf8(best.plaintext)}`)
    return best.key
}
