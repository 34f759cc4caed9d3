import { binaryToString, stringToBinary } from '../common/codec/asciiBinary.js'
import {
    bruteForceCaesar,
    decodeCaesar,
    encodeCaesar,
    evaluatePossibleKey,
} from '../common/cipher/caesar.js'
import { DesLite } from '../common/cipher/desLite.js'
import { Vigenere } from '../common/cipher/vigenere.js'
import { bruteForceXorDictionary, encodeXor, toHexDump } from '../common/cipher/xor.js'
import { CryptoGenerator } from '../common/keys/CryptoGenerator.js'
import { generateRandomKey, keyToHex } from '../common/keys/keyBridge.js'
import type { RandomSource } from '../common/keys/randomSource.js'
import { byteStringToUtf8, fromByteString, utf8ToByteString } from '../common/utils/bytes.js'

const word64 = (value: bigint): string => `0x${value.toString(16).toUpperCase().padStart(16, '0')}`

export function caesarDemo(text = 'Hola Mundo', shift = 3): string[] {
    const bytes = utf8ToByteString(text)
    const encoded = encodeCaesar(bytes, shift)
    const lines = [
        '--- Caesar ---',
        `Original : ${text}`,
        `Encoded  : ${byteStringToUtf8(encoded)} (shift ${shift})`,
        `Decoded  : ${byteStringToUtf8(decodeCaesar(encoded, shift))}`,
        'Brute force:',
    ]
    for (const { key, plaintext } of bruteForceCaesar(encoded)) {
        lines.push(`Key ${key}: ${byteStringToUtf8(plaintext)}`)
    }
    lines.push(`Most likely key: ${evaluatePossibleKey(encoded)}`)
    return lines
}

export function xorDemo(text = 'Hola Mundo', key = 'clave'): string[] {
    const keyBytes = utf8ToByteString(key)
    const encoded = encodeXor(utf8ToByteString(text), keyBytes)
    const lines = [
        '--- XOR ---',
        `Original : ${text}`,
        `Key      : ${key}`,
        `Encoded  : ${toHexDump(encoded).trimEnd()}`,
        `Decoded  : ${byteStringToUtf8(encodeXor(encoded, keyBytes))}`,
        'Dictionary attack:',
    ]
    for (const candidate of bruteForceXorDictionary(fromByteString(encoded))) {
        lines.push(`Key '${candidate.key}': ${candidate.plaintext}`)
    }
    return lines
}

/** Binary form of the UTF-8 bytes of `text`. */
export function asciiBinaryDemo(text = 'Hola'): string[] {
    const binary = stringToBinary(utf8ToByteString(text))
    return [
        '--- ASCII <-> Binary ---',
        `Text   : ${text}`,
        `Binary : ${binary}`,
        `Back   : ${byteStringToUtf8(binaryToString(binary))}`,
    ]
}

export function desDemo(key = 0x133457799bbcdff1n, plaintext = 0x123456789abcdef1n): string[] {
    const des = new DesLite(key)
    const ciphertext = des.encode(plaintext)
    const decoded = des.decode(ciphertext)
    return [
        '--- DES ---',
        `Key        : ${word64(key)}`,
        `Subkey 1   : 0x${(des.subkeys[0] ?? 0n).toString(16).toUpperCase().padStart(12, '0')}`,
        `Plaintext  : ${word64(plaintext)}`,
        `Ciphertext : ${word64(ciphertext)}`,
        `Decoded    : ${word64(decoded)}`,
        `Round trip : ${decoded === plaintext ? 'ok' : 'FAILED'}`,
    ]
}

export function vigenereDemo(key = 'Limon!', text = 'Ataque al amanecer.'): string[] {
    const vigenere = new Vigenere(utf8ToByteString(key))
    const encoded = vigenere.encode(utf8ToByteString(text))
    return [
        '--- Vigenere ---',
        `Key      : ${key} -> ${vigenere.key}`,
        `Original : ${text}`,
        `Encoded  : ${byteStringToUtf8(encoded)}`,
        `Decoded  : ${byteStringToUtf8(vigenere.decode(encoded))}`,
    ]
}

export function generatorDemo(source?: RandomSource): string[] {
    const generator = new CryptoGenerator(source)
    const password = generator.generatePassword(16, true, true, true, true)
    const key = generator.generateKey(128)
    const iv = generator.generateIV(16)
    const salt = generator.generateSalt(16)
    return [
        '--- Generator ---',
        `Password       : ${password} (${generator.validatePassword(password) ? 'strong' : 'weak'})`,
        `Key 128 (hex)  : ${generator.toHex(key)}`,
        `IV (base64)    : ${generator.toBase64(iv)}`,
        `Salt (hex)     : ${generator.toHex(salt)}`,
        `DES key (hex)  : ${keyToHex(generateRandomKey(source))}`,
    ]
}

export interface DemoEntry {
    label: string
    run: () => string[]
}

export const DEMOS: ReadonlyMap<number, DemoEntry> = new Map([
    [1, { label: 'Caesar', run: () => caesarDemo() }],
    [2, { label: 'XOR', run: () => xorDemo() }],
    [3, { label: 'ASCII <-> Binary', run: () => asciiBinaryDemo() }],
    [4, { label: 'DES', run: () => desDemo() }],
    [5, { label: 'Vigenere', run: () => vigenereDemo() }],
    [6, { label: 'Generator', run: () => generatorDemo() }],
])
