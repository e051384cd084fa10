import { type ParsedRuleLine, RULE_ATTRIBUTES } from './types.js'

function fieldsOf(line: string): string[] {
    return line.trim().split(/\s+/).filter((field: string) => field)
}

function isOpaque(fields: string[]): boolean {
    return fields.length === 0 || fields[0].startsWith('#')
}

export function escapePattern(pattern: string): string {
    return pattern.split(' ').join(RULE_ATTRIBUTES.spaceEscape)
}

export function unescapePattern(encoded: string): string {
    return encoded.split(RULE_ATTRIBUTES.spaceEscape).join(' ')
}

/**
 * Decoded first field of a rule line, or undefined for blank and comment
 * lines. Existing lines are matched against pending patterns by this key.
 */
export function lineKey(line: string): string | undefined {
    const fields: string[] = fieldsOf(line)
    if (isOpaque(fields)) {
        return undefined
    }
    return unescapePattern(fields[0])
}

export function parseLine(line: string): ParsedRuleLine | undefined {
    const fields: string[] = fieldsOf(line)
    if (isOpaque(fields)) {
        return undefined
    }

    const attributes: string[] = fields.slice(1)
    if (!attributes.includes(RULE_ATTRIBUTES.filterMarker)) {
        return undefined
    }

    return {
        pattern: unescapePattern(fields[0]),
        lockable: attributes.includes(RULE_ATTRIBUTES.lockable)
    }
}

export function renderLine(pattern: string, lockable: boolean): string {
    const lockableSuffix: string = lockable ? ` ${RULE_ATTRIBUTES.lockable}` : ''
    return `${escapePattern(pattern)} ${RULE_ATTRIBUTES.suffix}${lockableSuffix}\n`
}
