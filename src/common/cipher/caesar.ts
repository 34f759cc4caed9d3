import lodash from 'lodash'

import { CipherError } from '../errors/CipherError.js'
import { byteAt } from '../utils/bytes.js'
import type { Candidate } from './candidate.js'

const UPPER_A = 65
const UPPER_Z = 90
const LOWER_A = 97
const LOWER_Z = 122
const DIGIT_0 = 48
const DIGIT_9 = 57

/** Most frequent letters of Spanish text, in order. */
export const SPANISH_FREQUENT_LETTERS = ['e', 'a', 'o', 's', 'r', 'n', 'i', 'd', 'l', 'c'] as const

/** Short Spanish words used to score a candidate decryption. */
export const SPANISH_COMMON_WORDS = ['el', 'de', 'la', 'que', 'en', 'y', 'los', 'se'] as const

const assertShift = (shift: number): void => {
    if (!Number.isInteger(shift) || shift < 0) {
        throw new CipherError('InvalidKey', `Caesar shift must be a non-negative integer, got ${shift}`, { shift })
    }
}

/**
 * Shifts letters by `shift mod 26` and digits by `shift mod 10`.
 * Any other character is copied unchanged.
 */
export const encodeCaesar = (text: string, shift: number): string => {
    assertShift(shift)
    const letterShift = shift % 26
    const digitShift = shift % 10

    let result = ''
    for (let i = 0; i < text.length; i++) {
        const code = byteAt(text, i)
        if (code >= UPPER_A && code <= UPPER_Z) {
            result += String.fromCharCode(((code - UPPER_A + letterShift) % 26) + UPPER_A)
        } else if (code >= LOWER_A && code <= LOWER_Z) {
            result += String.fromCharCode(((code - LOWER_A + letterShift) % 26) + LOWER_A)
        } else if (code >= DIGIT_0 && code <= DIGIT_9) {
            result += String.fromCharCode(((code - DIGIT_0 + digitShift) % 10) + DIGIT_0)
        } else {
            result += String.fromCharCode(code)
        }
    }
    return result
}

/**
 * Applies the complementary letter shift `26 - (shift mod 26)`.
 * Digits go through the same shift, so they are not restored: "fgh678"
 * decoded with 5 gives "abc789".
 */
export const decodeCaesar = (text: string, shift: number): string => {
    assertShift(shift)
    return encodeCaesar(text, 26 - (shift % 26))
}

/**
 * Every shift 0..25 with the text decoded under it.
 */
export function* bruteForceCaesar(text: string): Generator<Candidate<number>> {
    for (let key = 0; key < 26; key++) {
        yield { key, plaintext: decodeCaesar(text, key) }
    }
}

/** Overlapping occurrences of `word` in `text`. */
const countOccurrences = (text: string, word: string): number => {
    let count = 0
    let pos = text.indexOf(word)
    while (pos !== -1) {
        count++
        pos = text.indexOf(word, pos + 1)
    }
    return count
}

export const scoreSpanishWords = (text: string): number =>
    lodash.sumBy(SPANISH_COMMON_WORDS, (word) => countOccurrences(text, word))

/**
 * Guesses the shift by frequency analysis: the most frequent letter is
 * assumed to be one of the common Spanish letters, and each resulting
 * shift is scored by how many common words its decryption contains.
 */
export const evaluatePossibleKey = (text: string): number => {
    const frequencies = new Array<number>(26).fill(0)
    for (let i = 0; i < text.length; i++) {
        const code = byteAt(text, i)
        if (code >= LOWER_A && code <= LOWER_Z) {
            frequencies[code - LOWER_A] = (frequencies[code - LOWER_A] ?? 0) + 1
        } else if (code >= UPPER_A && code <= UPPER_Z) {
            frequencies[code - UPPER_A] = (frequencies[code - UPPER_A] ?? 0) + 1
        }
    }

    // maxBy keeps the first index on ties
    const maxIndex = lodash.maxBy(lodash.range(26), (index) => frequencies[index]) ?? 0

    let bestKey = 0
    let bestScore = -1
    for (const reference of SPANISH_FREQUENT_LETTERS) {
        const candidate = (maxIndex - (reference.charCodeAt(0) - LOWER_A) + 26) % 26
        const score = scoreSpanishWords(decodeCaesar(text, candidate))
        if (score > bestScore) {
            bestScore = score
            bestKey = candidate
        }
    }
    return bestKey
}
