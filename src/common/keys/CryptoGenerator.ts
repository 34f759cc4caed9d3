import { CipherError } from '../errors/CipherError.js'
import { byteAt } from '../utils/bytes.js'
import { createRandomSource, type RandomSource, uniformInt } from './randomSource.js'

export const UPPERCASE = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ'
export const LOWERCASE = 'abcdefghijklmnopqrstuvwxyz'
export const DIGITS = '0123456789'
export const SYMBOLS = "!@#$%^&*()-_=+[]{}|;:',.<>?/"

const HEX_PATTERN = /^[0-9a-fA-F]*$/
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/

const isPunct = (code: number): boolean =>
    (code >= 0x21 && code <= 0x2f) ||
    (code >= 0x3a && code <= 0x40) ||
    (code >= 0x5b && code <= 0x60) ||
    (code >= 0x7b && code <= 0x7e)

/**
 * Random passwords, keys, IVs and salts plus hex/Base64 helpers.
 *
 * Every instance draws from its own source, seeded when the instance is
 * created. Instances are not meant to be shared between concurrent callers.
 */
export class CryptoGenerator {
    readonly #source: RandomSource

    constructor(source: RandomSource = createRandomSource()) {
        this.#source = source
    }

    generatePassword(
        length: number,
        useUpper: boolean = true,
        useLower: boolean = true,
        useDigits: boolean = true,
        useSymbols: boolean = false,
    ): string {
        let pool = ''
        if (useUpper) pool += UPPERCASE
        if (useLower) pool += LOWERCASE
        if (useDigits) pool += DIGITS
        if (useSymbols) pool += SYMBOLS

        if (!pool) {
            throw new CipherError('EmptyKey', 'No character types enabled for password generation')
        }

        let password = ''
        for (let i = 0; i < length; i++) {
            password += pool.charAt(uniformInt(this.#source, pool.length))
        }
        return password
    }

    generateBytes(numBytes: number): Uint8Array {
        const bytes = new Uint8Array(numBytes)
        for (let i = 0; i < numBytes; i++) {
            bytes[i] = uniformInt(this.#source, 256)
        }
        return bytes
    }

    generateKey(bits: number): Uint8Array {
        if (bits % 8 !== 0) {
            throw new CipherError('InvalidAlphabet', `Key size must be a multiple of 8 bits, got ${bits}`, { bits })
        }
        return this.generateBytes(bits / 8)
    }

    generateIV(blockSize: number): Uint8Array {
        return this.generateBytes(blockSize)
    }

    generateSalt(length: number): Uint8Array {
        return this.generateBytes(length)
    }

    toHex(data: Uint8Array): string {
        return Buffer.from(data).toString('hex')
    }

    fromHex(hex: string): Uint8Array {
        if (hex.length % 2 !== 0) {
            throw new CipherError('MalformedEncoding', 'Invalid hex (odd length)', { length: hex.length })
        }
        if (!HEX_PATTERN.test(hex)) {
            throw new CipherError('MalformedEncoding', 'Invalid hex (unexpected character)')
        }
        return Uint8Array.from(Buffer.from(hex, 'hex'))
    }

    toBase64(data: Uint8Array): string {
        return Buffer.from(data).toString('base64')
    }

    fromBase64(b64: string): Uint8Array {
        if (!BASE64_PATTERN.test(b64) || b64.replace(/=+$/, '').length % 4 === 1) {
            throw new CipherError('MalformedEncoding', 'Invalid Base64 input')
        }
        return Uint8Array.from(Buffer.from(b64, 'base64'))
    }

    /** Overwrites the buffer in place with zeros. */
    secureWipe(data: Uint8Array): void {
        data.fill(0)
    }

    /**
     * At least 8 characters with an upper-case letter, a lower-case letter,
     * a digit and a punctuation character.
     */
    validatePassword(password: string): boolean {
        if (password.length < 8) return false
        let hasUpper = false
        let hasLower = false
        let hasDigit = false
        let hasSymbol = false
        for (let i = 0; i < password.length; i++) {
            const code = byteAt(password, i)
            if (code >= 65 && code <= 90) hasUpper = true
            else if (code >= 97 && code <= 122) hasLower = true
            else if (code >= 48 && code <= 57) hasDigit = true
            else if (isPunct(code)) hasSymbol = true
        }
        return hasUpper && hasLower && hasDigit && hasSymbol
    }
}
