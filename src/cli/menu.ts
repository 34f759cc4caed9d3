import type { Logger } from '../common/utils/log.js'
import { DEMOS, type DemoEntry } from './demos.js'
import type { Prompter } from './prompter.js'

export const menuText = (demos: ReadonlyMap<number, DemoEntry> = DEMOS): string[] => [
    '',
    '=== Cipher lab demos ===',
    ...[...demos].map(([option, demo]) => `${option}. ${demo.label}`),
    '0. Exit',
]

/**
 * Shows the demo menu until the user picks 0 or input ends.
 * Returns how many demos were run.
 */
export async function runMenu(
    prompter: Prompter,
    logger: Logger,
    demos: ReadonlyMap<number, DemoEntry> = DEMOS,
): Promise<number> {
    let runs = 0
    for (;;) {
        for (const line of menuText(demos)) logger.print(line)
        const answer = await prompter.ask('Select an option: ')
        if (answer === null) return runs

        const option = Number.parseInt(answer.trim(), 10)
        if (option === 0) return runs

        const demo = Number.isNaN(option) ? undefined : demos.get(option)
        if (!demo) {
            logger.warn(`Invalid option: ${answer.trim()}`)
            continue
        }
        for (const line of demo.run()) logger.print(line)
        runs++
    }
}
