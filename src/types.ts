export interface PatternDescriptor {
  /** Pattern text relative to the working tree root */
  path: string;
  /** Tree-relative path of the rule file that declared the pattern */
  source: string;
  lockable: boolean;
}

export interface ParsedRuleLine {
  pattern: string;
  lockable: boolean;
}

export interface TrackOptions {
  readonly lockable: boolean;
  readonly dryRun: boolean;
  readonly verbose: boolean;
}

export interface Output {
  log(line: string): void;
  error(line: string): void;
}

export interface HostEnvironment {
  locateWorkingTreeRoot(): string | undefined;
  locateGitDir(): string | undefined;
  /**
   * Tree-relative paths of tracked files matched by `pattern`, as written in
   * the rule file that lives in `baseDir` ('' for the tree root).
   */
  enumerateTrackedFiles(pattern: string, baseDir: string): string[];
  installHooks(force: boolean): void;
}

export interface AttributesManager {
  findAttributeFiles(rootDir: string, gitDir: string): string[];
  readKnownPatterns(files: string[], rootDir: string): PatternDescriptor[];
  readRuleFile(filePath: string): string;
  writeRuleFile(filePath: string, content: string): void;
}

export interface BlocklistConflict {
  pattern: string;
  file: string;
  prefix: string;
}

export interface TouchFailure {
  file: string;
  reason: string;
}

export type TrackOutcome =
  | { kind: 'listing'; patterns: readonly PatternDescriptor[] }
  | { kind: 'aborted'; reason: string }
  | {
      kind: 'tracked';
      alreadySupported: string[];
      tracking: string[];
      appended: string[];
      conflicts: BlocklistConflict[];
      touched: string[];
      touchFailures: TouchFailure[];
    };

export const ATTRIBUTES_FILE = '.gitattributes';

export const RULE_ATTRIBUTES = {
  filterMarker: 'filter=lfs',
  suffix: 'filter=lfs diff=lfs merge=lfs -text',
  lockable: 'lockable',
  spaceEscape: '[[:space:]]'
} as const;

export const PREFIX_BLOCKLIST = ['.git', '.lfs'] as const;

export type BlockedPrefix = (typeof PREFIX_BLOCKLIST)[number];
