/**
 * External command execution for the container engine CLI and helper tools
 *
 * The orchestrator only ever talks to the engine through `CommandRunner`, so tests
 * swap in a scripted fake and never need a real Docker daemon.
 */

import spawn from 'cross-spawn';
import { constants as osConstants } from 'node:os';
import { join } from 'node:path';
import { configuration } from '@/configuration';
import { logger } from '@/ui/logger';
import { augmentedSearchPath, extraPathDirs } from './dockerPaths';

export interface CommandResult {
    exitCode: number;
    stdout: string;
    stderr: string;
}

export interface RunOptions {
    /** Receives every complete line of stdout and stderr as it arrives */
    onLine?: (line: string) => void;
    timeoutMs?: number;
}

export interface CommandRunner {
    /** Never rejects for a non-zero exit; callers interpret `exitCode` */
    run(args: string[], options?: RunOptions): Promise<CommandResult>;
}

/** Exit code reported when the program could not be started at all */
export const SPAWN_FAILURE_EXIT_CODE = 127;

/**
 * Subprocess environment: PATH augmented with the engine install locations and
 * DOCKER_CONFIG pointed at an isolated directory so the engine's credential
 * helper never triggers OS keychain prompts.
 */
export function buildCommandEnvironment(params: {
    baseEnv?: NodeJS.ProcessEnv;
    extraDirs?: string[];
    dockerConfigDir?: string;
} = {}): NodeJS.ProcessEnv {
    const baseEnv = params.baseEnv ?? process.env;
    return {
        ...baseEnv,
        PATH: augmentedSearchPath(baseEnv.PATH, params.extraDirs ?? extraPathDirs()),
        DOCKER_CONFIG: params.dockerConfigDir ?? join(configuration.launcherHomeDir, '.docker'),
    };
}

function createLineSplitter(onLine: (line: string) => void): { push: (chunk: string) => void; flush: () => void } {
    let pending = '';
    return {
        push(chunk) {
            pending += chunk;
            let newlineIndex = pending.search(/\r?\n|\r/);
            while (newlineIndex !== -1) {
                const line = pending.slice(0, newlineIndex);
                const separatorLength = pending.startsWith('\r\n', newlineIndex) ? 2 : 1;
                pending = pending.slice(newlineIndex + separatorLength);
                onLine(line);
                newlineIndex = pending.search(/\r?\n|\r/);
            }
        },
        flush() {
            if (pending.length > 0) {
                onLine(pending);
                pending = '';
            }
        },
    };
}

export class SpawnCommandRunner implements CommandRunner {
    constructor(private readonly env: NodeJS.ProcessEnv = buildCommandEnvironment()) { }

    run(args: string[], options: RunOptions = {}): Promise<CommandResult> {
        const [command, ...commandArgs] = args;
        if (!command) {
            return Promise.resolve({ exitCode: SPAWN_FAILURE_EXIT_CODE, stdout: '', stderr: 'No command given' });
        }

        return new Promise((resolve) => {
            const stdoutChunks: string[] = [];
            const stderrChunks: string[] = [];
            const stdoutLines = options.onLine ? createLineSplitter(options.onLine) : null;
            const stderrLines = options.onLine ? createLineSplitter(options.onLine) : null;
            let settled = false;
            let timeout: NodeJS.Timeout | undefined;

            const finish = (result: CommandResult) => {
                if (settled) {
                    return;
                }
                settled = true;
                if (timeout) {
                    clearTimeout(timeout);
                }
                stdoutLines?.flush();
                stderrLines?.flush();
                resolve(result);
            };

            const child = spawn(command, commandArgs, {
                env: this.env,
                stdio: ['ignore', 'pipe', 'pipe'],
            });

            // Both pipes are drained as data arrives so neither can fill up and stall the child
            child.stdout?.setEncoding('utf8');
            child.stderr?.setEncoding('utf8');
            child.stdout?.on('data', (chunk: string) => {
                stdoutChunks.push(chunk);
                stdoutLines?.push(chunk);
            });
            child.stderr?.on('data', (chunk: string) => {
                stderrChunks.push(chunk);
                stderrLines?.push(chunk);
            });

            if (options.timeoutMs !== undefined) {
                timeout = setTimeout(() => {
                    logger.debug(`[COMMAND] Timed out after ${options.timeoutMs}ms: ${args.join(' ')}`);
                    child.kill('SIGKILL');
                }, options.timeoutMs);
            }

            child.on('error', (error) => {
                logger.debug(`[COMMAND] Failed to spawn ${command}:`, error);
                finish({
                    exitCode: SPAWN_FAILURE_EXIT_CODE,
                    stdout: stdoutChunks.join(''),
                    stderr: stderrChunks.join('') || error.message,
                });
            });

            child.on('close', (code, signal) => {
                finish({
                    exitCode: code ?? (signal ? 128 + osConstants.signals[signal] : 1),
                    stdout: stdoutChunks.join(''),
                    stderr: stderrChunks.join(''),
                });
            });
        });
    }
}
