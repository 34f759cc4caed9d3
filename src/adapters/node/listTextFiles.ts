import { mkdir, readdir } from 'node:fs/promises'

/**
 * Sorted names of the `.txt` files directly inside `dir`; a missing
 * directory has none.
 */
export async function listTextFiles(dir: string): Promise<string[]> {
    try {
        const entries = await readdir(dir, { withFileTypes: true })
        return entries
            .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith('.txt'))
            .map((entry) => entry.name)
            .sort()
    } catch (e) {
        if ((e as NodeJS.ErrnoException).code === 'ENOENT') {
            return []
        }
        throw e
    }
}

export async function ensureDir(dir: string): Promise<void> {
    await mkdir(dir, { recursive: true })
}
