import { type PathLike, readFileSync, renameSync, writeFileSync } from 'node:fs'
import { readFile } from 'node:fs/promises'
import path from 'node:path'

import { Writer } from 'steno'

import type { Adapter, SyncAdapter } from '../../core/adapter.js'

/**
 * Reads and writes a file as a byte string (one latin1 code unit per
 * byte), so cipher output is stored exactly as produced.
 */
export class ByteFile implements Adapter<string> {
    #filename: PathLike
    #writer: Writer

    constructor(filename: PathLike) {
        this.#filename = filename
        this.#writer = new Writer(filename)
    }

    get filename(): string {
        return this.#filename.toString()
    }

    async read(): Promise<string | null> {
        try {
            const data = await readFile(this.#filename)
            return data.toString('latin1')
        } catch (e) {
            if ((e as NodeJS.ErrnoException).code === 'ENOENT') {
                return null
            }
            throw e
        }
    }

    async write(bytes: string): Promise<void> {
        return this.#writer.write(Buffer.from(bytes, 'latin1'))
    }
}

export class ByteFileSync implements SyncAdapter<string> {
    #tempFilename: PathLike
    #filename: PathLike

    constructor(filename: PathLike) {
        this.#filename = filename
        const f = filename.toString()
        this.#tempFilename = path.join(
            path.dirname(f),
            `.${path.basename(f)}.tmp`,
        )
    }

    get filename(): string {
        return this.#filename.toString()
    }

    read(): string | null {
        try {
            return readFileSync(this.#filename).toString('latin1')
        } catch (e) {
            if ((e as NodeJS.ErrnoException).code === 'ENOENT') {
                return null
            }
            throw e
        }
    }

    write(bytes: string): void {
        writeFileSync(this.#tempFilename, Buffer.from(bytes, 'latin1'))
        renameSync(this.#tempFilename, this.#filename)
    }
}
