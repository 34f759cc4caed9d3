import { CipherError } from '../errors/CipherError.js'
import { assertByteString, byteAt } from '../utils/bytes.js'

/**
 * 8-bit big-endian binary form of a single byte.
 */
export const byteToBits = (code: number): string =>
    (code & 0xff).toString(2).padStart(8, '0')

/**
 * Converts text to space separated 8-bit groups, e.g. "Hi" -> "01001000 01101001".
 */
export const stringToBinary = (text: string): string => {
    assertByteString(text, 'Text')
    const groups: string[] = []
    for (let i = 0; i < text.length; i++) {
        groups.push(byteToBits(byteAt(text, i)))
    }
    return groups.join(' ')
}

/**
 * Reads whitespace separated base-2 tokens back into text. Token length is
 * not checked: each token is evaluated positionally and kept to its low byte.
 */
export const binaryToString = (binary: string): string => {
    const tokens = binary.split(/\s+/).filter((token) => token.length > 0)
    let result = ''
    for (const token of tokens) {
        let value = 0
        for (const bit of token) {
            if (bit !== '0' && bit !== '1') {
                throw new CipherError(
                    'MalformedEncoding',
                    `Invalid binary token "${token}"`,
                    { token },
                )
            }
            value = (value * 2 + (bit === '1' ? 1 : 0)) & 0xff
        }
        result += String.fromCharCode(value)
    }
    return result
}
