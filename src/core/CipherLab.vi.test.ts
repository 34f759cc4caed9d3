import { describe, expect, it } from 'vitest'

import { CipherError } from '../common/errors/CipherError.js'
import {
    buildRequest,
    CipherLab,
    type CipherRequest,
    type FileAdapter,
    isAlgorithm,
    isOperation,
    transform,
} from './CipherLab.js'

class MemoryFile implements FileAdapter {
    readonly filename: string
    data: string | null
    writes = 0

    constructor(filename: string, data: string | null = null) {
        this.filename = filename
        this.data = data
    }

    async read(): Promise<string | null> {
        return this.data
    }

    async write(data: string): Promise<void> {
        this.data = data
        this.writes++
    }
}

const XOR_HOLA = '\x2b\x03\x0d\x17\x45\x2e\x19\x0f\x12\x0a'
const DES_HOLA = '\xf7e\x86sy\xda\x0c\x1d'

describe('CipherLab', () => {
    describe('guards', () => {
        it('should recognise algorithms and operations', () => {
            expect(isAlgorithm('vigenere')).toBe(true)
            expect(isAlgorithm('rot13')).toBe(false)
            expect(isOperation('decrypt')).toBe(true)
            expect(isOperation(2)).toBe(false)
        })
    })

    describe('buildRequest', () => {
        it('should parse a Caesar shift', () => {
            expect(buildRequest('caesar', 'encrypt', ' 3 ')).toEqual({
                algorithm: 'caesar',
                operation: 'encrypt',
                shift: 3,
            })
        })

        it('should accept the largest safe Caesar shift', () => {
            expect(buildRequest('caesar', 'decrypt', '9007199254740991')).toEqual({
                algorithm: 'caesar',
                operation: 'decrypt',
                shift: Number.MAX_SAFE_INTEGER,
            })
        })

        it.each(['abc', '-1', '1.5', '', '99999999999999999999'])('should reject the Caesar key %j', (key) => {
            expect(() => buildRequest('caesar', 'encrypt', key)).toThrow(CipherError)
        })

        it('should require an 8 character DES key', () => {
            expect(buildRequest('des', 'decrypt', 'claveDES')).toEqual({
                algorithm: 'des',
                operation: 'decrypt',
                key: 'claveDES',
            })
            try {
                buildRequest('des', 'encrypt', 'short')
                expect.unreachable()
            } catch (error) {
                expect(error).toBeInstanceOf(CipherError)
                expect(error).toHaveProperty('kind', 'ShortInput')
            }
        })

        it('should pass XOR and Vigenere keys through', () => {
            expect(buildRequest('xor', 'encrypt', ' k ')).toEqual({ algorithm: 'xor', operation: 'encrypt', key: ' k ' })
        })

        it('should take keys as their UTF-8 bytes', () => {
            expect(buildRequest('xor', 'encrypt', 'ñ')).toEqual({ algorithm: 'xor', operation: 'encrypt', key: '\xc3\xb1' })
            expect(buildRequest('vigenere', 'encrypt', 'Łimo')).toEqual({
                algorithm: 'vigenere',
                operation: 'encrypt',
                key: '\xc5\x81imo',
            })
        })

        it('should count DES key length in bytes', () => {
            expect(buildRequest('des', 'encrypt', 'claveDñ')).toEqual({
                algorithm: 'des',
                operation: 'encrypt',
                key: 'claveD\xc3\xb1',
            })
            expect(() => buildRequest('des', 'encrypt', 'claveDEñ')).toThrow('DES key must be exactly 8 bytes')
        })
    })

    describe('transform', () => {
        it.each<[CipherRequest, string, string]>([
            [{ algorithm: 'caesar', operation: 'encrypt', shift: 3 }, 'Hola Mundo', 'Krod Pxqgr'],
            [{ algorithm: 'caesar', operation: 'decrypt', shift: 3 }, 'Krod Pxqgr', 'Hola Mundo'],
            [{ algorithm: 'xor', operation: 'encrypt', key: 'clave' }, 'Hola Mundo', XOR_HOLA],
            [{ algorithm: 'xor', operation: 'decrypt', key: 'clave' }, XOR_HOLA, 'Hola Mundo'],
            [{ algorithm: 'vigenere', operation: 'encrypt', key: 'Limon' }, 'Ataque al amanecer.', 'Lbmehp ix ozlvqqrc.'],
            [{ algorithm: 'vigenere', operation: 'decrypt', key: 'Limon' }, 'Lbmehp ix ozlvqqrc.', 'Ataque al amanecer.'],
            [{ algorithm: 'des', operation: 'encrypt', key: 'claveDES' }, 'Hola Mundo!', DES_HOLA],
            [{ algorithm: 'des', operation: 'decrypt', key: 'claveDES' }, DES_HOLA, 'Hola Mun'],
        ])('%j', (request, input, expected) => {
            expect(transform(request, input)).toBe(expected)
        })

        it('should reject a DES key of the wrong length', () => {
            expect(() => transform({ algorithm: 'des', operation: 'encrypt', key: 'claveDES!' }, 'x')).toThrow(
                CipherError,
            )
        })
    })

    describe('run', () => {
        it('should write the transformed file', async () => {
            const input = new MemoryFile('in.txt', 'Hola Mundo')
            const output = new MemoryFile('out.txt')
            const summary = await new CipherLab(input, output).run(buildRequest('caesar', 'encrypt', '3'))

            expect(output.data).toBe('Krod Pxqgr')
            expect(summary).toEqual({
                algorithm: 'caesar',
                operation: 'encrypt',
                bytesIn: 10,
                bytesOut: 10,
                outputPath: 'out.txt',
            })
        })

        it('should fail on a missing input file', async () => {
            const output = new MemoryFile('out.txt')
            const lab = new CipherLab(new MemoryFile('missing.txt'), output)

            await expect(lab.run(buildRequest('xor', 'encrypt', 'k'))).rejects.toThrow('Input file not found: missing.txt')
            expect(output.writes).toBe(0)
        })

        it('should not write when the cipher fails', async () => {
            const output = new MemoryFile('out.txt')
            const lab = new CipherLab(new MemoryFile('in.txt', 'abc'), output)

            await expect(lab.run({ algorithm: 'vigenere', operation: 'encrypt', key: '123' })).rejects.toThrow(
                CipherError,
            )
            expect(output.writes).toBe(0)
            expect(output.data).toBeNull()
        })
    })
})
