import { CipherError, type CipherErrorKind } from '../errors/CipherError.js'
import { bitsetToString, stringToBitset } from '../keys/keyBridge.js'

/*
 * Single-block Feistel cipher in the shape of DES. It keeps the DES
 * E-box and P-box but only the four rows of S1, identity initial and
 * final permutations, a subkey schedule made of plain right shifts, and
 * no swap after the last round. Bit i of every word is its i-th least
 * significant bit.
 */

export const EXPANSION_TABLE: readonly number[] = [
    32, 1, 2, 3, 4, 5,
    4, 5, 6, 7, 8, 9,
    8, 9, 10, 11, 12, 13,
    12, 13, 14, 15, 16, 17,
    16, 17, 18, 19, 20, 21,
    20, 21, 22, 23, 24, 25,
    24, 25, 26, 27, 28, 29,
    28, 29, 30, 31, 32, 1,
]

export const P_TABLE: readonly number[] = [
    16, 7, 20, 21, 29, 12, 28, 17,
    1, 15, 23, 26, 5, 18, 31, 10,
    2, 8, 24, 14, 32, 27, 3, 9,
    19, 13, 30, 6, 22, 11, 4, 25,
]

export const SBOX: readonly (readonly number[])[] = [
    [14, 4, 13, 1, 2, 15, 11, 8, 3, 10, 6, 12, 5, 9, 0, 7],
    [0, 15, 7, 4, 14, 2, 13, 1, 10, 6, 12, 11, 9, 5, 3, 8],
    [4, 1, 14, 8, 13, 6, 2, 11, 15, 12, 9, 7, 3, 10, 5, 0],
    [15, 12, 8, 2, 4, 9, 1, 7, 5, 11, 3, 14, 10, 0, 6, 13],
]

export const ROUNDS = 16

const MASK_32 = (1n << 32n) - 1n
const MASK_48 = (1n << 48n) - 1n
const MASK_64 = (1n << 64n) - 1n

const bit = (word: bigint, index: number): number =>
    Number((word >> BigInt(index)) & 1n)

const withBit = (word: bigint, index: number, value: number): bigint =>
    value ? word | (1n << BigInt(index)) : word

const tableEntry = (table: readonly number[], index: number): number => {
    const entry = table[index]
    if (entry === undefined) throw new RangeError(`Table index ${index} out of range`)
    return entry
}

export const generateSubkeys = (key: bigint): bigint[] => {
    const subkeys: bigint[] = []
    for (let i = 0; i < ROUNDS; i++) {
        subkeys.push((key >> BigInt(i)) & MASK_48)
    }
    return subkeys
}

export const initialPermutation = (block: bigint): bigint => block

export const finalPermutation = (block: bigint): bigint => block

/** 32 -> 48 bits; output bit i is input bit 32 - EXPANSION_TABLE[i]. */
export const expand = (half: bigint): bigint => {
    let output = 0n
    for (let i = 0; i < 48; i++) {
        output = withBit(output, i, bit(half, 32 - tableEntry(EXPANSION_TABLE, i)))
    }
    return output
}

/** 48 -> 32 bits through eight 6-bit groups. */
export const substitute = (input: bigint): bigint => {
    let output = 0n
    for (let i = 0; i < 8; i++) {
        const base = i * 6
        const row = (bit(input, base) << 1) | bit(input, base + 5)
        const col =
            (bit(input, base + 1) << 3) |
            (bit(input, base + 2) << 2) |
            (bit(input, base + 3) << 1) |
            bit(input, base + 4)
        const value = SBOX[row % 4]?.[col % 16] ?? 0
        for (let j = 0; j < 4; j++) {
            output = withBit(output, i * 4 + j, (value >> (3 - j)) & 1)
        }
    }
    return output
}

export const permuteP = (input: bigint): bigint => {
    let output = 0n
    for (let i = 0; i < 32; i++) {
        output = withBit(output, i, bit(input, 32 - tableEntry(P_TABLE, i)))
    }
    return output
}

export const feistel = (half: bigint, subkey: bigint): bigint =>
    permuteP(substitute(expand(half) ^ subkey))

const assertWord = (block: bigint, label: string, kind: CipherErrorKind): void => {
    if (block < 0n || block > MASK_64) {
        throw new CipherError(kind, `${label} must fit in 64 bits`, { block: block.toString(16) })
    }
}

export class DesLite {
    readonly #subkeys: bigint[]

    constructor(key: bigint) {
        assertWord(key, 'DES key', 'InvalidKey')
        this.#subkeys = generateSubkeys(key)
    }

    get subkeys(): readonly bigint[] {
        return this.#subkeys
    }

    encode(plaintext: bigint): bigint {
        assertWord(plaintext, 'DES block', 'MalformedEncoding')
        const data = initialPermutation(plaintext)
        let left = data >> 32n
        let right = data & MASK_32

        for (let round = 0; round < ROUNDS; round++) {
            const nextRight = left ^ feistel(right, this.#subkey(round))
            left = right
            right = nextRight
        }

        return finalPermutation((right << 32n) | left)
    }

    decode(ciphertext: bigint): bigint {
        assertWord(ciphertext, 'DES block', 'MalformedEncoding')
        const data = initialPermutation(ciphertext)
        // encode stored (R16 << 32) | L16
        let left = data & MASK_32
        let right = data >> 32n

        for (let round = ROUNDS - 1; round >= 0; round--) {
            const previousLeft = right ^ feistel(left, this.#subkey(round))
            right = left
            left = previousLeft
        }

        return finalPermutation((left << 32n) | right)
    }

    #subkey(round: number): bigint {
        const subkey = this.#subkeys[round]
        if (subkey === undefined) throw new RangeError(`No subkey for round ${round}`)
        return subkey
    }
}

const DES_BLOCK_BYTES = 8

const keyFromBytes = (key: string): bigint => {
    if (key.length < DES_BLOCK_BYTES) {
        throw new CipherError('ShortInput', `DES key must be ${DES_BLOCK_BYTES} bytes, got ${key.length}`, {
            length: key.length,
        })
    }
    return stringToBitset(key)
}

/**
 * Encrypts the first 8 bytes of `block` (zero padded) and returns exactly
 * 8 bytes. Anything past the first block is ignored.
 */
export const encodeBlock = (block: string, key: string): string =>
    bitsetToString(new DesLite(keyFromBytes(key)).encode(stringToBitset(block)))

export const decodeBlock = (block: string, key: string): string =>
    bitsetToString(new DesLite(keyFromBytes(key)).decode(stringToBitset(block)))
