export type CipherErrorKind =
    | 'EmptyKey'
    | 'InvalidAlphabet'
    | 'MalformedEncoding'
    | 'ShortInput'
    | 'InvalidKey'
    | 'FileNotFound'

/**
 * Typed failure raised by every cipher, codec and generator operation.
 * Brute-force routines never raise it for content they cannot decode.
 */
export class CipherError extends Error {
    readonly kind: CipherErrorKind
    readonly context: Record<string, unknown> | undefined

    constructor(
        kind: CipherErrorKind,
        message: string,
        context?: Record<string, unknown>,
    ) {
        super(message)
        this.name = 'CipherError'
        this.kind = kind
        this.context = context
    }

    toJSON(): { name: string; kind: CipherErrorKind; message: string; context?: Record<string, unknown> } {
        return {
            name: this.name,
            kind: this.kind,
            message: this.message,
            ...(this.context ? { context: this.context } : {}),
        }
    }
}

export const isCipherError = (error: unknown): error is CipherError =>
    error instanceof CipherError
