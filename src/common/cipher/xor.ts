import { CipherError } from '../errors/CipherError.js'
import { assertByteString, byteAt, hexByte, toByteString } from '../utils/bytes.js'
import { createLogger, type Logger } from '../utils/log.js'
import type { Candidate } from './candidate.js'

/** Weak keys tried by the dictionary attack. */
export const COMMON_XOR_KEYS: readonly string[] = [
    'clave', 'admin', '1234', 'root', 'test', 'abc', 'hola',
    'user', 'pass', '12345', '0000', 'password', 'default',
]

/**
 * XORs every byte with the key, repeating the key as needed. Applying it
 * twice with the same key gives back the input.
 */
export const encodeXor = (input: string, key: string): string => {
    if (key.length === 0) {
        throw new CipherError('EmptyKey', 'XOR key must not be empty')
    }
    assertByteString(input, 'XOR input')
    assertByteString(key, 'XOR key')
    let output = ''
    for (let i = 0; i < input.length; i++) {
        output += String.fromCharCode(byteAt(input, i) ^ byteAt(key, i % key.length))
    }
    return output
}

export const decodeXor = encodeXor

/**
 * Parses whitespace separated hex tokens ("2b 3 0d") into bytes.
 * One-digit tokens are read as if left padded with '0'.
 */
export const hexToBytes = (input: string): Uint8Array => {
    const tokens = input.split(/\s+/).filter((token) => token.length > 0)
    const bytes = new Uint8Array(tokens.length)
    tokens.forEach((token, index) => {
        const padded = token.length === 1 ? `0${token}` : token
        if (!/^[0-9a-fA-F]+$/.test(padded)) {
            throw new CipherError('MalformedEncoding', `Invalid hex token "${token}"`, { token })
        }
        bytes[index] = parseInt(padded, 16) & 0xff
    })
    return bytes
}

/** Every byte as two lowercase hex digits followed by a space. */
export const toHexDump = (input: string): string => {
    assertByteString(input, 'Input')
    let dump = ''
    for (let i = 0; i < input.length; i++) {
        dump += `${hexByte(byteAt(input, i))} `
    }
    return dump
}

export const printHex = (input: string, logger: Logger = createLogger('xor')): void => {
    logger.print(toHexDump(input))
}

// isprint: 0x20..0x7e, isspace: \t \n \v \f \r and ' '
const isPrintableByte = (code: number): boolean =>
    (code >= 0x20 && code <= 0x7e) || (code >= 0x09 && code <= 0x0d)

export const isPrintable = (data: string): boolean => {
    for (let i = 0; i < data.length; i++) {
        if (!isPrintableByte(byteAt(data, i))) return false
    }
    return true
}

const xorWith = (cipher: Uint8Array, key: readonly number[]): string => {
    let result = ''
    for (let i = 0; i < cipher.length; i++) {
        result += String.fromCharCode((cipher[i] ?? 0) ^ (key[i % key.length] ?? 0))
    }
    return result
}

/**
 * Tries the 256 single-byte keys and yields the readable results.
 */
export function* bruteForceXor1Byte(cipher: Uint8Array): Generator<Candidate<string>> {
    for (let key = 0; key < 256; key++) {
        const plaintext = xorWith(cipher, [key])
        if (isPrintable(plaintext)) {
            yield { key: String.fromCharCode(key), plaintext }
        }
    }
}

/**
 * Tries all 65 536 two-byte keys (first byte on even positions, second
 * on odd ones) and yields the readable results.
 */
export function* bruteForceXor2Byte(cipher: Uint8Array): Generator<Candidate<string>> {
    for (let b1 = 0; b1 < 256; b1++) {
        for (let b2 = 0; b2 < 256; b2++) {
            const plaintext = xorWith(cipher, [b1, b2])
            if (isPrintable(plaintext)) {
                yield { key: String.fromCharCode(b1, b2), plaintext }
            }
        }
    }
}

export function* bruteForceXorDictionary(
    cipher: Uint8Array,
    dictionary: readonly string[] = COMMON_XOR_KEYS,
): Generator<Candidate<string>> {
    for (const key of dictionary) {
        if (key.length === 0) continue
        const plaintext = encodeXor(toByteString(cipher), key)
        if (isPrintable(plaintext)) {
            yield { key, plaintext }
        }
    }
}
