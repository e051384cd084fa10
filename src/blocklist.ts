import { type BlockedPrefix, PREFIX_BLOCKLIST } from './types.js'

/**
 * Returns the blocklist prefix that forbids tracking `name`, or undefined.
 * The base name is blocked when it starts with a prefix; a parent directory
 * only when its name is exactly one of them.
 */
export function blocklistItem(name: string): BlockedPrefix | undefined {
    const components: string[] = name
        .split(/[\\/]/)
        .filter((part: string) => part && part !== '.')
    const base: string | undefined = components.pop()

    if (base !== undefined) {
        const forbidden = PREFIX_BLOCKLIST.find((prefix: BlockedPrefix) => base.startsWith(prefix))
        if (forbidden) {
            return forbidden
        }
    }

    for (const directory of components.reverse()) {
        const forbidden = PREFIX_BLOCKLIST.find((prefix: BlockedPrefix) => directory === prefix)
        if (forbidden) {
            return forbidden
        }
    }

    return undefined
}
