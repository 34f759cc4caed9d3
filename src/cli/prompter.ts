import { createInterface } from 'node:readline'

export interface Prompter {
    /** Resolves with the answer, or null once input has ended. */
    ask: (question: string) => Promise<string | null>
    close: () => void
}

export function createConsolePrompter(
    input: NodeJS.ReadableStream = process.stdin,
    output: NodeJS.WritableStream = process.stdout,
): Prompter {
    const rl = createInterface({ input, output })
    let closed = false
    rl.on('close', () => {
        closed = true
    })

    return {
        ask: (question) =>
            new Promise((resolve) => {
                if (closed) {
                    resolve(null)
                    return
                }
                const onClose = (): void => resolve(null)
                rl.once('close', onClose)
                rl.question(question, (answer) => {
                    rl.off('close', onClose)
                    resolve(answer)
                })
            }),
        close: () => {
            rl.close()
        },
    }
}
