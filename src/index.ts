// Codecs
export { binaryToString, byteToBits, stringToBinary } from './common/codec/asciiBinary.js'

// Ciphers
export type { Candidate } from './common/cipher/candidate.js'
export {
    bruteForceCaesar,
    decodeCaesar,
    encodeCaesar,
    evaluatePossibleKey,
} from './common/cipher/caesar.js'
export {
    bruteForceXor1Byte,
    bruteForceXor2Byte,
    bruteForceXorDictionary,
    COMMON_XOR_KEYS,
    decodeXor,
    encodeXor,
    hexToBytes,
    isPrintable,
    printHex,
    toHexDump,
} from './common/cipher/xor.js'
export {
    breakVigenere,
    normalizeKey,
    scoreVigenereKeys,
    Vigenere,
    vigenereFitness,
} from './common/cipher/vigenere.js'
export type { VigenereCandidate } from './common/cipher/vigenere.js'
export {
    decodeBlock,
    DesLite,
    encodeBlock,
    EXPANSION_TABLE,
    expand,
    feistel,
    generateSubkeys,
    P_TABLE,
    permuteP,
    SBOX,
    substitute,
} from './common/cipher/desLite.js'

// Keys
export { CryptoGenerator } from './common/keys/CryptoGenerator.js'
export {
    bitsetToString,
    generateRandomKey,
    keyToHex,
    printKeyHex,
    stringToBitset,
} from './common/keys/keyBridge.js'
export { createRandomSource, uniformInt } from './common/keys/randomSource.js'
export type { RandomSource } from './common/keys/randomSource.js'

// Errors and logging
export { CipherError, isCipherError } from './common/errors/CipherError.js'
export type { CipherErrorKind } from './common/errors/CipherError.js'
export { createLogger } from './common/utils/log.js'
export type { Logger, LogLevel } from './common/utils/log.js'
export { byteStringToUtf8, fromByteString, isByteString, toByteString, utf8ToByteString } from './common/utils/bytes.js'

// File transforms
export { buildRequest, CipherLab, transform } from './core/CipherLab.js'
export type { Algorithm, CipherRequest, Operation, RunSummary } from './core/CipherLab.js'
export type { Adapter, SyncAdapter } from './core/adapter.js'
export { ByteFile, ByteFileSync } from './adapters/node/ByteFile.js'
export { ensureDir, listTextFiles } from './adapters/node/listTextFiles.js'
export { defaultConfig, loadConfig } from './config.js'
export type { LabConfig } from './config.js'
