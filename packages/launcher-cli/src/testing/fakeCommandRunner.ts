/**
 * Scripted CommandRunner for tests. Handlers match on an argument prefix; the most
 * recently registered match wins so a test can change engine behaviour midway.
 */

import type { CommandResult, CommandRunner, RunOptions } from '@/docker/commandRunner';

type Handler = (args: string[], options: RunOptions) => CommandResult | Promise<CommandResult>;

export function ok(stdout: string = ''): CommandResult {
    return { exitCode: 0, stdout, stderr: '' };
}

export function fail(stderr: string = '', exitCode: number = 1): CommandResult {
    return { exitCode, stdout: '', stderr };
}

export class FakeCommandRunner implements CommandRunner {
    readonly calls: string[][] = [];
    private readonly handlers: Array<{ prefix: string[]; handler: Handler }> = [];

    on(prefix: string, response: CommandResult | Handler): this {
        const handler: Handler = typeof response === 'function' ? response : () => response;
        this.handlers.unshift({ prefix: prefix.split(' '), handler });
        return this;
    }

    /** Joined command lines in call order */
    commandLines(): string[] {
        return this.calls.map((args) => args.join(' '));
    }

    ran(prefix: string): boolean {
        const wanted = prefix.split(' ');
        return this.calls.some((args) => startsWith(args, wanted));
    }

    count(prefix: string): number {
        const wanted = prefix.split(' ');
        return this.calls.filter((args) => startsWith(args, wanted)).length;
    }

    async run(args: string[], options: RunOptions = {}): Promise<CommandResult> {
        this.calls.push(args);
        const match = this.handlers.find((entry) => startsWith(args, entry.prefix));
        return match ? match.handler(args, options) : ok();
    }
}

function startsWith(args: string[], prefix: string[]): boolean {
    return prefix.every((part, index) => args[index] === part);
}
