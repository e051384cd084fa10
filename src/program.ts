import { Command } from 'commander';
import { FileSystemAttributesManager } from './attributes-manager.js';
import { describeError, isFatalError } from './errors.js';
import { GitEnvironment } from './git.js';
import { runTrack } from './track.js';
import type { AttributesManager, HostEnvironment, Output, TrackOptions, TrackOutcome } from './types.js';

interface TrackFlags {
    verbose?: boolean;
    dryRun?: boolean;
    lockable?: boolean;
    notLockable?: boolean;
}

export interface ProgramDependencies {
    output: Output;
    cwd: () => string;
    createEnvironment: (cwd: string, output: Output) => HostEnvironment;
    manager: AttributesManager;
    setExitCode: (code: number) => void;
}

export const consoleOutput: Output = {
    log: (line: string) => console.log(line),
    error: (line: string) => console.error(line)
};

export const defaultDependencies: ProgramDependencies = {
    output: consoleOutput,
    cwd: () => process.cwd(),
    createEnvironment: (cwd: string, output: Output) => new GitEnvironment(cwd, output),
    manager: new FileSystemAttributesManager(),
    setExitCode: (code: number) => {
        process.exitCode = code;
    }
};

export function createProgram(deps: ProgramDependencies = defaultDependencies): Command {
    const program = new Command();

    program
        .name('git-attr-track')
        .description('Route file patterns through the lfs content filter via .gitattributes')
        .version('0.1.0');

    program
        .command('track')
        .description('Track patterns in .gitattributes, or list tracked patterns when none are given')
        .argument('[patterns...]', 'patterns to track, relative to the current directory')
        .option('-v, --verbose', 'log which files are being tracked and modified')
        .option('-d, --dry-run', 'preview results without touching tracked files')
        .option('-l, --lockable', 'make pattern lockable, i.e. read-only unless locked')
        .option('--not-lockable', 'remove lockable attribute from pattern')
        .action((patterns: string[], flags: TrackFlags) => {
            if (flags.lockable && flags.notLockable) {
                program.error('error: --lockable and --not-lockable cannot be used together');
            }

            const options: TrackOptions = {
                lockable: flags.lockable === true,
                dryRun: flags.dryRun === true,
                verbose: flags.verbose === true
            };

            const cwd = deps.cwd();
            try {
                const outcome: TrackOutcome = runTrack(
                    patterns,
                    options,
                    deps.createEnvironment(cwd, deps.output),
                    deps.manager,
                    deps.output,
                    cwd
                );
                if (outcome.kind === 'aborted') {
                    deps.setExitCode(1);
                }
            } catch (error) {
                if (!isFatalError(error)) {
                    throw error;
                }
                deps.output.error(describeError(error));
                deps.setExitCode(error.exitCode);
            }
        });

    return program;
}
