import * as fs from 'fs'
import * as path from 'path'
import { blocklistItem } from './blocklist.js'
import { EnumerationError, EnvironmentError, describeError } from './errors.js'
import { lineKey, renderLine } from './pattern-codec.js'
import {
    ATTRIBUTES_FILE,
    type AttributesManager,
    type BlocklistConflict,
    type HostEnvironment,
    type Output,
    type PatternDescriptor,
    type TouchFailure,
    type TrackOptions,
    type TrackOutcome
} from './types.js'

export interface TrackContext {
    rootDir: string
    /** Current directory relative to the tree root, '' at the root */
    relativeCwd: string
    knownPatterns: readonly PatternDescriptor[]
    environment: HostEnvironment
    manager: AttributesManager
    output: Output
}

export interface PendingSelection {
    alreadySupported: string[]
    pending: ReadonlyMap<string, string>
}

export interface MergeResult {
    content: string
    /** Pending patterns with no existing line, in request order */
    appended: string[]
}

interface TouchResult {
    touched: string[]
    failures: TouchFailure[]
}

function selectPending(
    requested: readonly string[],
    lockable: boolean,
    relativeCwd: string,
    knownPatterns: readonly PatternDescriptor[]
): PendingSelection {
    const alreadySupported: string[] = []
    const pending: Map<string, string> = new Map()

    for (const pattern of requested) {
        const treePath: string = path.posix.join(relativeCwd, pattern)
        const known: boolean = knownPatterns.some((descriptor: PatternDescriptor) =>
            descriptor.path === treePath && descriptor.lockable === lockable)

        if (known) {
            alreadySupported.push(pattern)
        } else {
            pending.set(pattern, renderLine(pattern, lockable))
        }
    }

    return { alreadySupported, pending }
}

function splitLines(content: string): string[] {
    if (content === '') {
        return []
    }
    const lines: string[] = content.split('\n')
    if (lines[lines.length - 1] === '') {
        lines.pop()
    }
    return lines.map((line: string) => line.endsWith('\r') ? line.slice(0, -1) : line)
}

/**
 * Rewrites `content` with every line whose pattern is pending replaced in
 * place. Whatever is still pending after the last line is appended.
 */
function mergeRuleLines(content: string, pending: ReadonlyMap<string, string>): MergeResult {
    const replaced: Set<string> = new Set()
    const lines: string[] = splitLines(content).map((line: string): string => {
        const key: string | undefined = lineKey(line)
        const replacement: string | undefined = key === undefined || replaced.has(key) ? undefined : pending.get(key)

        if (key === undefined || replacement === undefined) {
            return `${line}\n`
        }
        replaced.add(key)
        return replacement
    })

    const remaining: Array<[string, string]> = [...pending.entries()].filter(([key]) => !replaced.has(key))
    return {
        content: [...lines, ...remaining.map(([, rendered]) => rendered)].join(''),
        appended: remaining.map(([key]) => key)
    }
}

function touchFiles(rootDir: string, files: string[], options: TrackOptions, output: Output): TouchResult {
    const touched: string[] = []
    const failures: TouchFailure[] = []

    for (const file of files) {
        if (options.verbose || options.dryRun) {
            output.log(`Git LFS: touching ${file}`)
        }
        if (options.dryRun) {
            continue
        }

        const now: Date = new Date()
        try {
            fs.utimesSync(path.join(rootDir, file), now, now)
            touched.push(file)
        } catch (error) {
            const reason: string = describeError(error)
            output.error(`Error marking "${file}" modified: ${reason}`)
            failures.push({ file, reason })
        }
    }

    return { touched, failures }
}

function listPatterns(knownPatterns: readonly PatternDescriptor[], output: Output): TrackOutcome {
    output.log('Listing tracked paths')
    for (const known of knownPatterns) {
        const lockable: string = known.lockable ? ' [lockable]' : ''
        output.log(`    ${known.path}${lockable} (${known.source})`)
    }
    return { kind: 'listing', patterns: knownPatterns }
}

function trackPatterns(requested: readonly string[], options: TrackOptions, context: TrackContext): TrackOutcome {
    const { rootDir, relativeCwd, knownPatterns, environment, manager, output } = context

    const selection: PendingSelection = selectPending(requested, options.lockable, relativeCwd, knownPatterns)
    for (const pattern of selection.alreadySupported) {
        output.log(`${pattern} already supported`)
    }
    const tracking: string[] = [...selection.pending.keys()]
    for (const pattern of tracking) {
        output.log(`Tracking ${pattern}`)
    }

    const conflicts: BlocklistConflict[] = []
    const touched: string[] = []
    const touchFailures: TouchFailure[] = []

    if (selection.pending.size === 0) {
        return { kind: 'tracked', alreadySupported: selection.alreadySupported, tracking, appended: [], conflicts, touched, touchFailures }
    }

    const attributesPath: string = path.join(rootDir, relativeCwd, ATTRIBUTES_FILE)
    let existing: string
    try {
        existing = manager.readRuleFile(attributesPath)
    } catch (error) {
        output.error(`Error reading ${ATTRIBUTES_FILE} file`)
        return { kind: 'aborted', reason: describeError(error) }
    }

    const merged: MergeResult = mergeRuleLines(existing, selection.pending)
    try {
        manager.writeRuleFile(attributesPath, merged.content)
    } catch (error) {
        output.error(`Error writing ${ATTRIBUTES_FILE} file`)
        return { kind: 'aborted', reason: describeError(error) }
    }

    for (const pattern of merged.appended) {
        if (options.verbose) {
            output.log(`Searching for files matching pattern: ${pattern}`)
        }

        let tracked: string[]
        try {
            tracked = environment.enumerateTrackedFiles(pattern, relativeCwd)
        } catch (error) {
            throw new EnumerationError(pattern, error)
        }

        if (options.verbose) {
            output.log(`Found ${tracked.length} files previously added to Git matching pattern: ${pattern}`)
        }

        const blocked: BlocklistConflict[] = []
        for (const file of tracked) {
            const prefix = blocklistItem(file)
            if (prefix) {
                output.log(`Pattern ${pattern} matches forbidden file ${file}. If you would like to track ${file}, modify ${ATTRIBUTES_FILE} manually.`)
                blocked.push({ pattern, file, prefix })
            }
        }
        if (blocked.length > 0) {
            conflicts.push(...blocked)
            continue
        }

        const touch: TouchResult = touchFiles(rootDir, tracked, options, output)
        touched.push(...touch.touched)
        touchFailures.push(...touch.failures)
    }

    return {
        kind: 'tracked',
        alreadySupported: selection.alreadySupported,
        tracking,
        appended: merged.appended,
        conflicts,
        touched,
        touchFailures
    }
}

/**
 * Entry point for the track command: validates the environment, installs
 * hooks, builds the known-pattern index and then either lists it (no
 * patterns) or reconciles the requested patterns against it.
 */
function runTrack(
    requested: readonly string[],
    options: TrackOptions,
    environment: HostEnvironment,
    manager: AttributesManager,
    output: Output,
    cwd: string
): TrackOutcome {
    const gitDir: string | undefined = environment.locateGitDir()
    if (gitDir === undefined) {
        throw new EnvironmentError('Not a git repository.')
    }

    const rootDir: string | undefined = environment.locateWorkingTreeRoot()
    if (rootDir === undefined) {
        throw new EnvironmentError('This operation must be run in a work tree.')
    }

    environment.installHooks(false)

    const knownPatterns: PatternDescriptor[] = manager.readKnownPatterns(
        manager.findAttributeFiles(rootDir, gitDir),
        rootDir
    )

    if (requested.length === 0) {
        return listPatterns(knownPatterns, output)
    }

    const relative: string = path.relative(rootDir, cwd)
    if (relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
        throw new EnvironmentError(`Current directory "${cwd}" outside of git working directory "${rootDir}".`, 2)
    }

    return trackPatterns(requested, options, {
        rootDir,
        relativeCwd: relative.split(path.sep).join('/'),
        knownPatterns,
        environment,
        manager,
        output
    })
}

export {
    selectPending,
    mergeRuleLines,
    touchFiles,
    listPatterns,
    trackPatterns,
    runTrack
}
