import { readFileSync, writeFileSync } from 'node:fs'
import path from 'node:path'

import { temporaryDirectory } from 'tempy'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'

import { createProgram } from './program.js'
import type { Prompter } from './prompter.js'

const scriptedPrompter = (answers: string[]): Prompter => ({
    ask: async () => answers.shift() ?? null,
    close: () => undefined,
})

describe('createProgram', () => {
    let lines: string[]
    let dir: string
    const record = (...args: unknown[]): void => {
        lines.push(args.join(' '))
    }
    const output = { log: record, warn: record, error: record }

    const run = async (args: string[], answers: string[] = []): Promise<void> => {
        const program = createProgram({ createPrompter: () => scriptedPrompter(answers), output, env: {} })
        await program.parseAsync(args, { from: 'user' })
    }

    beforeEach(() => {
        lines = []
        dir = temporaryDirectory()
    })

    afterEach(() => {
        process.exitCode = undefined
    })

    it('should run the menu by default', async () => {
        await run([], ['3', '0'])
        expect(lines).toContain('Back   : Hola')
    })

    it('should encrypt a file from options', async () => {
        const input = path.join(dir, 'plain.txt')
        const outputFile = path.join(dir, 'out', 'cipher.txt')
        writeFileSync(input, 'Hola Mundo')

        await run(['file', '-i', input, '-o', outputFile, '--operation', 'encrypt', '-a', 'xor', '-k', 'clave'])

        expect(process.exitCode).toBe(0)
        expect(readFileSync(outputFile, 'latin1')).toBe('\x2b\x03\x0d\x17\x45\x2e\x19\x0f\x12\x0a')
        expect(lines.at(-1)).toBe(`Operation completed, file saved to: ${outputFile}`)
    })

    it('should offer files from --input-dir', async () => {
        const inputDir = path.join(dir, 'crudos')
        await run(['--input-dir', inputDir, 'file'])

        expect(process.exitCode).toBe(1)
        expect(lines.at(-1)).toBe(`[cipher-lab] No .txt files found in ${inputDir}`)
    })

    it('should attack a Caesar file', async () => {
        const file = path.join(dir, 'caesar.txt')
        writeFileSync(file, 'Krod Pxqgr')

        await run(['attack', 'caesar', file])

        expect(lines.at(-1)).toBe('Most likely key: 3')
    })

    it('should print a UTF-8 file as text', async () => {
        const file = path.join(dir, 'utf8.txt')
        writeFileSync(file, 'año', 'utf8')

        await run(['attack', 'caesar', file])

        expect(lines).toContain('Key 0: año')
    })

    it('should attack an XOR hex dump', async () => {
        const file = path.join(dir, 'xor.hex')
        writeFileSync(file, '2b 03 0d 17 45 2e 19 0f 12 0a\n')

        await run(['attack', 'xor', file, '--hex'])

        expect(lines).toContain('Possible text : Hola Mundo')
        expect(lines.at(-1)).toBe('[cipher-lab] 10 readable candidate(s)')
    })

    it('should attack a Vigenere file', async () => {
        const file = path.join(dir, 'vigenere.txt')
        writeFileSync(file, 'fm qfssp ef mb dbtb z fm hbup ef mb wfdjob')

        await run(['attack', 'vigenere', file, '--max-len', '1'])

        expect(lines).toContain('Key found      : B')
    })

    it('should refuse to attack DES', async () => {
        const file = path.join(dir, 'des.bin')
        writeFileSync(file, 'whatever')

        await run(['attack', 'des', file])

        expect(process.exitCode).toBe(1)
        expect(lines.at(-1)).toBe('[cipher-lab] InvalidKey: No attack available for "des"')
    })

    it('should report a missing attack file', async () => {
        const file = path.join(dir, 'missing.txt')

        await run(['attack', 'caesar', file])

        expect(process.exitCode).toBe(1)
        expect(lines.at(-1)).toBe(`[cipher-lab] FileNotFound: Input file not found: ${file}`)
    })

    it('should generate keys', async () => {
        await run(['keygen', '-l', '12', '-b', '64', '--no-symbols'])

        expect(lines).toHaveLength(7)
        expect(lines[1]).toMatch(/^Password {7}: [A-Za-z0-9]{12}$/)
        expect(lines[3]).toMatch(/^Key \(hex\) {6}: [0-9a-f]{16}$/)
    })

    it('should report a bad key size', async () => {
        await run(['keygen', '-b', '12'])

        expect(process.exitCode).toBe(1)
        expect(lines.at(-1)).toBe('[cipher-lab] InvalidAlphabet: Key size must be a multiple of 8 bits, got 12')
    })
})
