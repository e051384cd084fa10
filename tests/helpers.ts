import { execSync } from 'child_process'
import path from 'path'
import fs from 'fs'
import os from 'os'
import { matchTrackedFiles } from '../src/git.js'
import type { HostEnvironment, Output } from '../src/types.js'

export const OLD_TIME = new Date('2001-02-03T04:05:06Z')

/**
 * Creates a temporary working tree with an empty .git/info directory
 * @returns Real path of the tree root
 */
export function createTestTree(): string {
  const tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'attr-track-test-')))
  fs.mkdirSync(path.join(tempDir, '.git', 'info'), { recursive: true })
  return tempDir
}

/**
 * Creates a temporary git repository and commits the given files
 * @returns Real path of the repository root
 */
export function createTestRepo(files: Record<string, string>): string {
  const tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'attr-track-repo-')))

  execSync('git init', { cwd: tempDir, stdio: 'pipe' })
  execSync('git config --local user.name "Test User"', { cwd: tempDir, stdio: 'pipe' })
  execSync('git config --local user.email "test@example.com"', { cwd: tempDir, stdio: 'pipe' })
  execSync('git config --local commit.gpgsign false', { cwd: tempDir, stdio: 'pipe' })

  for (const [filename, content] of Object.entries(files)) {
    createFile(tempDir, filename, content)
  }
  execSync('git add -A', { cwd: tempDir, stdio: 'pipe' })
  execSync('git commit -m "Initial commit"', { cwd: tempDir, stdio: 'pipe' })

  return tempDir
}

export function cleanupTestTree(rootDir: string) {
  if (fs.existsSync(rootDir)) {
    fs.rmSync(rootDir, { recursive: true, force: true })
  }
}

/**
 * Creates a file (and its parent directories) inside the tree
 */
export function createFile(rootDir: string, filename: string, content: string) {
  const filePath = path.join(rootDir, filename)
  fs.mkdirSync(path.dirname(filePath), { recursive: true })
  fs.writeFileSync(filePath, content)
}

export function readFile(rootDir: string, filename: string): string {
  return fs.readFileSync(path.join(rootDir, filename), 'utf-8')
}

/**
 * Creates a file whose timestamps are set to OLD_TIME
 */
export function createStaleFile(rootDir: string, filename: string) {
  createFile(rootDir, filename, 'content')
  fs.utimesSync(path.join(rootDir, filename), OLD_TIME, OLD_TIME)
}

export function modifiedTime(rootDir: string, filename: string): number {
  return fs.statSync(path.join(rootDir, filename)).mtime.getTime()
}

export interface CollectedOutput extends Output {
  lines: string[]
  errors: string[]
}

export function collectOutput(): CollectedOutput {
  const lines: string[] = []
  const errors: string[] = []
  return {
    lines,
    errors,
    log: (line: string) => { lines.push(line) },
    error: (line: string) => { errors.push(line) }
  }
}

/**
 * In-process stand-in for the git-backed environment. Tracked files are a
 * fixed list matched the same way GitEnvironment matches `git ls-files`.
 */
export class FakeEnvironment implements HostEnvironment {
  public readonly hookInstalls: boolean[] = []
  public readonly enumerated: Array<{ pattern: string; baseDir: string }> = []
  public failingPattern: string | undefined

  constructor(
    private readonly rootDir: string | undefined,
    private readonly gitDir: string | undefined,
    private readonly tracked: string[] = []
  ) {}

  locateWorkingTreeRoot(): string | undefined {
    return this.rootDir
  }

  locateGitDir(): string | undefined {
    return this.gitDir
  }

  enumerateTrackedFiles(pattern: string, baseDir: string): string[] {
    this.enumerated.push({ pattern, baseDir })
    if (pattern === this.failingPattern) {
      throw new Error('fatal: ls-files failed')
    }
    return matchTrackedFiles(this.tracked, pattern, baseDir)
  }

  installHooks(force: boolean): void {
    this.hookInstalls.push(force)
  }
}
