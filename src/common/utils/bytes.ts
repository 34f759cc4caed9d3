import { CipherError } from '../errors/CipherError.js'

/**
 * Byte strings are JS strings whose code units are all in 0..255, the
 * in-memory form every cipher works on. latin1 maps them to and from
 * buffers one byte per code unit.
 */
export const toByteString = (bytes: Uint8Array): string =>
    Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('latin1')

export const fromByteString = (text: string): Uint8Array =>
    Uint8Array.from(Buffer.from(text, 'latin1'))

/** UTF-8 bytes of typed text (keys, demo input) as a byte string. */
export const utf8ToByteString = (text: string): string =>
    Buffer.from(text, 'utf8').toString('latin1')

/** Reads a byte string as UTF-8 for display. */
export const byteStringToUtf8 = (bytes: string): string =>
    Buffer.from(bytes, 'latin1').toString('utf8')

export const isByteString = (text: string): boolean => {
    for (let i = 0; i < text.length; i++) {
        if (text.charCodeAt(i) > 0xff) return false
    }
    return true
}

export const assertByteString = (text: string, label: string): void => {
    if (!isByteString(text)) {
        throw new CipherError('MalformedEncoding', `${label} must be a byte string (code units 0..255)`)
    }
}

/**
 * Code unit at `index`. Letter-based ciphers treat anything above 0xff
 * as a non-letter; byte-level code checks with `assertByteString` first.
 */
export const byteAt = (text: string, index: number): number =>
    text.charCodeAt(index)

export const hexByte = (value: number): string =>
    value.toString(16).padStart(2, '0')
