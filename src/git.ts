import * as fs from 'fs'
import * as path from 'path'
import { execFileSync } from 'child_process'
import { minimatch } from 'minimatch'
import { installHooks } from './hooks.js'
import type { HostEnvironment, Output } from './types.js'

function runGit(args: string[], cwd: string): string {
    return execFileSync('git', args, {
        cwd,
        encoding: 'utf8',
        stdio: ['ignore', 'pipe', 'pipe'],
        maxBuffer: 64 * 1024 * 1024
    })
}

function tryGit(args: string[], cwd: string): string | undefined {
    try {
        const output: string = runGit(args, cwd).trim()
        return output || undefined
    } catch {
        // git exits non-zero outside a repository or work tree
        return undefined
    }
}

/**
 * Filters tree-relative tracked files down to those `pattern` matches when it
 * is written in the rule file of `baseDir`. A leading slash anchors the
 * pattern at `baseDir`; patterns without a slash match the base name at any
 * depth below it.
 */
function matchTrackedFiles(files: readonly string[], pattern: string, baseDir: string): string[] {
    const prefix: string = baseDir === '' ? '' : `${baseDir.replace(/\/+$/, '')}/`
    const anchored: boolean = pattern.startsWith('/')
    const glob: string = anchored ? pattern.replace(/^\/+/, '') : pattern
    const matchBase: boolean = !anchored && !glob.includes('/')

    return files.filter((file: string) => {
        if (!file.startsWith(prefix)) {
            return false
        }
        return minimatch(file.slice(prefix.length), glob, { dot: true, matchBase })
    })
}

class GitEnvironment implements HostEnvironment {
    private readonly cwd: string
    private readonly output: Output

    constructor(cwd: string, output: Output) {
        this.cwd = cwd
        this.output = output
    }

    locateGitDir(): string | undefined {
        return tryGit(['rev-parse', '--absolute-git-dir'], this.cwd)
    }

    locateWorkingTreeRoot(): string | undefined {
        const root: string | undefined = tryGit(['rev-parse', '--show-toplevel'], this.cwd)
        return root === undefined ? undefined : fs.realpathSync(root)
    }

    enumerateTrackedFiles(pattern: string, baseDir: string): string[] {
        const root: string | undefined = this.locateWorkingTreeRoot()
        if (root === undefined) {
            throw new Error('not inside a git work tree')
        }

        const listing: string = runGit(['-c', 'core.quotepath=false', 'ls-files', '--cached', '--full-name', '-z'], root)
        const files: string[] = listing.split('\0').filter((file: string) => file)
        return matchTrackedFiles(files, pattern, baseDir)
    }

    installHooks(force: boolean): void {
        const gitDir: string | undefined = this.locateGitDir()
        if (gitDir === undefined) {
            return
        }
        installHooks(path.join(gitDir, 'hooks'), force, this.output)
    }
}

export {
    matchTrackedFiles,
    GitEnvironment
}
