import { encodeCaesar, decodeCaesar } from '../common/cipher/caesar.js'
import { decodeBlock, encodeBlock } from '../common/cipher/desLite.js'
import { Vigenere } from '../common/cipher/vigenere.js'
import { encodeXor } from '../common/cipher/xor.js'
import { CipherError } from '../common/errors/CipherError.js'
import { utf8ToByteString } from '../common/utils/bytes.js'
import type { Adapter } from './adapter.js'

export type Operation = 'encrypt' | 'decrypt'
export type Algorithm = 'caesar' | 'xor' | 'vigenere' | 'des'

export const ALGORITHMS: readonly Algorithm[] = ['caesar', 'xor', 'vigenere', 'des']
export const OPERATIONS: readonly Operation[] = ['encrypt', 'decrypt']

export type CipherRequest =
    | { algorithm: 'caesar'; operation: Operation; shift: number }
    | { algorithm: 'xor'; operation: Operation; key: string }
    | { algorithm: 'vigenere'; operation: Operation; key: string }
    | { algorithm: 'des'; operation: Operation; key: string }

export const isAlgorithm = (value: unknown): value is Algorithm =>
    typeof value === 'string' && ALGORITHMS.some((algorithm) => algorithm === value)

export const isOperation = (value: unknown): value is Operation =>
    typeof value === 'string' && OPERATIONS.some((operation) => operation === value)

export const DES_KEY_LENGTH = 8

/**
 * Builds a request from the raw key text typed by the user. Byte keys
 * are taken as their UTF-8 bytes, so "ñ" is the two bytes C3 B1.
 */
export function buildRequest(algorithm: Algorithm, operation: Operation, rawKey: string): CipherRequest {
    if (algorithm === 'caesar') {
        const trimmed = rawKey.trim()
        const shift = Number(trimmed)
        if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(shift)) {
            throw new CipherError('InvalidKey', `Caesar key must be a non-negative integer, got "${rawKey}"`)
        }
        return { algorithm, operation, shift }
    }

    const key = utf8ToByteString(rawKey)
    if (algorithm === 'des' && key.length !== DES_KEY_LENGTH) {
        throw new CipherError('ShortInput', `DES key must be exactly ${DES_KEY_LENGTH} bytes`, {
            length: key.length,
        })
    }
    return { algorithm, operation, key }
}

/**
 * Applies the requested cipher to a byte string. DES only looks at the
 * first 8 bytes and always returns 8 bytes.
 */
export function transform(request: CipherRequest, input: string): string {
    const encrypt = request.operation === 'encrypt'
    switch (request.algorithm) {
        case 'caesar':
            return encrypt ? encodeCaesar(input, request.shift) : decodeCaesar(input, request.shift)
        case 'xor':
            return encodeXor(input, request.key)
        case 'vigenere': {
            const vigenere = new Vigenere(request.key)
            return encrypt ? vigenere.encode(input) : vigenere.decode(input)
        }
        case 'des':
            if (request.key.length !== DES_KEY_LENGTH) {
                throw new CipherError('ShortInput', `DES key must be exactly ${DES_KEY_LENGTH} bytes`, {
                    length: request.key.length,
                })
            }
            return encrypt ? encodeBlock(input, request.key) : decodeBlock(input, request.key)
    }
}

export interface FileAdapter extends Adapter<string> {
    readonly filename: string
}

export interface RunSummary {
    algorithm: Algorithm
    operation: Operation
    bytesIn: number
    bytesOut: number
    outputPath: string
}

/**
 * Reads one file, transforms it and writes the result to another.
 * The output is only written once the transform has succeeded.
 */
export class CipherLab {
    readonly input: FileAdapter
    readonly output: FileAdapter

    constructor(input: FileAdapter, output: FileAdapter) {
        this.input = input
        this.output = output
    }

    async run(request: CipherRequest): Promise<RunSummary> {
        const content = await this.input.read()
        if (content === null) {
            throw new CipherError('FileNotFound', `Input file not found: ${this.input.filename}`, {
                path: this.input.filename,
            })
        }
        const result = transform(request, content)
        await this.output.write(result)
        return {
            algorithm: request.algorithm,
            operation: request.operation,
            bytesIn: content.length,
            bytesOut: result.length,
            outputPath: this.output.filename,
        }
    }
}
