import { CipherError } from '../errors/CipherError.js'
import { byteAt } from '../utils/bytes.js'
import type { Candidate } from './candidate.js'

const UPPER_A = 65

/** Common Spanish words, space padded, used to score a decryption. */
export const SPANISH_FITNESS_WORDS: readonly string[] = [
    ' DE ', ' LA ', ' EL ', ' QUE ', ' Y ',
    ' A ', ' EN ', ' UN ', ' PARA ', ' CON ',
    ' POR ', ' COMO ', ' SU ', ' AL ', ' DEL ',
    ' LOS ', ' SE ', ' NO ', ' MAS ', ' O ',
    ' SI ', ' YA ', ' TODO ', ' ESTA ', ' HAY ',
    ' ESTO ', ' SON ', ' TIENE ', ' HACE ', ' SUS ',
    ' VIDA ', ' NOS ', ' TE ', ' LO ', ' ME ',
    ' ESTE ', ' ESA ', ' ESE ', ' BIEN ', ' MUY ',
    ' PUEDE ', ' TAMBIEN ', ' AUN ', ' MI ', ' DOS ',
    ' UNO ', ' OTRO ', ' NUEVO ', ' SIN ', ' ENTRE ',
    ' SOBRE ',
]

const isUpper = (code: number): boolean => code >= 65 && code <= 90
const isLower = (code: number): boolean => code >= 97 && code <= 122

/**
 * Keeps only the ASCII letters of a raw key, upper-cased: "Limon!" -> "LIMON".
 */
export const normalizeKey = (rawKey: string): string => {
    let key = ''
    for (let i = 0; i < rawKey.length; i++) {
        const code = byteAt(rawKey, i)
        if (isUpper(code)) key += String.fromCharCode(code)
        else if (isLower(code)) key += String.fromCharCode(code - 32)
    }
    return key
}

/**
 * Repeating-key alphabetic shift. The key position only advances on
 * letters; case and every other byte are preserved.
 */
export class Vigenere {
    readonly key: string

    constructor(rawKey: string) {
        this.key = normalizeKey(rawKey)
        if (!this.key) {
            throw new CipherError('EmptyKey', 'Vigenere key must contain at least one letter')
        }
    }

    encode(text: string): string {
        return this.#shift(text, 1)
    }

    decode(text: string): string {
        return this.#shift(text, -1)
    }

    #shift(text: string, direction: 1 | -1): string {
        let result = ''
        let keyIndex = 0
        for (let i = 0; i < text.length; i++) {
            const code = byteAt(text, i)
            if (isUpper(code) || isLower(code)) {
                const base = isLower(code) ? 97 : UPPER_A
                const shift = this.key.charCodeAt(keyIndex % this.key.length) - UPPER_A
                result += String.fromCharCode((((code - base) + direction * shift + 26) % 26) + base)
                keyIndex++
            } else {
                result += String.fromCharCode(code)
            }
        }
        return result
    }
}

/**
 * Sum of the padded lengths of the non-overlapping occurrences of every
 * fitness word in the upper-cased text, which is itself padded with a
 * space on each side so words at the edges count.
 */
export const vigenereFitness = (text: string): number => {
    const haystack = ` ${text.replace(/[a-z]/g, (letter) => letter.toUpperCase())} `
    let score = 0
    for (const word of SPANISH_FITNESS_WORDS) {
        let pos = haystack.indexOf(word)
        while (pos !== -1) {
            score += word.length
            pos = haystack.indexOf(word, pos + word.length)
        }
    }
    return score
}

export interface VigenereCandidate extends Candidate<string> {
    score: number
}

/**
 * Every uppercase key of length 1..maxKeyLength in depth-first order,
 * with the text decoded under it and its fitness score.
 */
export function* scoreVigenereKeys(text: string, maxKeyLength: number): Generator<VigenereCandidate> {
    if (!Number.isInteger(maxKeyLength) || maxKeyLength < 1) {
        throw new CipherError('InvalidKey', `Maximum key length must be a positive integer, got ${maxKeyLength}`, {
            maxKeyLength,
        })
    }

    function* walk(prefix: string, length: number): Generator<VigenereCandidate> {
        if (prefix.length === length) {
            const plaintext = new Vigenere(prefix).decode(text)
            yield { key: prefix, plaintext, score: vigenereFitness(plaintext) }
            return
        }
        for (let code = UPPER_A; code < UPPER_A + 26; code++) {
            yield* walk(prefix + String.fromCharCode(code), length)
        }
    }

    for (let length = 1; length <= maxKeyLength; length++) {
        yield* walk('', length)
    }
}

/**
 * Exhaustive key search. Cost grows as 26^maxKeyLength, so keep the
 * length small. The first key reaching the best score wins.
 */
export const breakVigenere = (text: string, maxKeyLength: number): VigenereCandidate => {
    let best: VigenereCandidate | undefined
    for (const candidate of scoreVigenereKeys(text, maxKeyLength)) {
        if (!best || candidate.score > best.score) {
            best = candidate
        }
    }
    if (!best) {
        throw new CipherError('InvalidKey', 'No key candidates were generated')
    }
    return best
}
