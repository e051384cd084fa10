import * as fs from 'fs'
import * as path from 'path'
import { describeError } from './errors.js'
import type { Output } from './types.js'

export const HOOK_NAMES = ['pre-push', 'post-checkout', 'post-commit', 'post-merge'] as const

export type HookName = (typeof HOOK_NAMES)[number]

export type HookStatus = 'installed' | 'unchanged' | 'conflict' | 'failed'

export function hookScript(hook: HookName): string {
    return [
        '#!/bin/sh',
        `command -v git-lfs >/dev/null 2>&1 || { echo >&2 "This repository is configured for Git LFS but 'git-lfs' was not found on your path. Remove .git/hooks/${hook} to silence this warning."; exit 2; }`,
        `git lfs ${hook} "$@"`,
        ''
    ].join('\n')
}

/**
 * Writes the content-filter hooks into `hooksDir`. A hook that already exists
 * with other contents is left in place unless `force` is set. Failures are
 * reported and never stop the caller.
 */
export function installHooks(hooksDir: string, force: boolean, output: Output): Partial<Record<HookName, HookStatus>> {
    const statuses: Partial<Record<HookName, HookStatus>> = {}

    for (const hook of HOOK_NAMES) {
        const hookPath: string = path.join(hooksDir, hook)
        const script: string = hookScript(hook)

        try {
            if (fs.existsSync(hookPath)) {
                const current: string = fs.readFileSync(hookPath, 'utf8')
                if (current === script) {
                    statuses[hook] = 'unchanged'
                    continue
                }
                if (!force) {
                    output.log(`Hook already exists: ${hook}`)
                    statuses[hook] = 'conflict'
                    continue
                }
            }

            fs.mkdirSync(hooksDir, { recursive: true })
            fs.writeFileSync(hookPath, script, { mode: 0o755 })
            fs.chmodSync(hookPath, 0o755)
            statuses[hook] = 'installed'
        } catch (error) {
            output.error(`Error installing ${hook} hook: ${describeError(error)}`)
            statuses[hook] = 'failed'
        }
    }

    return statuses
}
