/**
 * Typed wrapper over the engine CLI
 *
 * Every engine interaction the orchestrator makes is one method here, so the
 * exact argument vectors live in a single place.
 */

import { CommandResult, CommandRunner } from './commandRunner';
import { buildDockerRunArgs, type RunContainerSpec } from './securityProfile';

export const DEFAULT_LOG_TAIL = 300;

export class DockerClient {
    constructor(private readonly runner: CommandRunner) { }

    /** True when the engine daemon answers `docker info` */
    async isEngineResponding(): Promise<boolean> {
        const result = await this.runner.run(['docker', 'info']);
        return result.exitCode === 0;
    }

    async isContainerRunning(name: string): Promise<boolean> {
        const result = await this.runner.run(['docker', 'ps', '--filter', `name=^${name}$`, '--format', '{{.Names}}']);
        return result.exitCode === 0 && result.stdout.trim() !== '';
    }

    /** When the container last started, in epoch ms; null when the engine cannot say */
    async containerStartedAt(name: string): Promise<number | null> {
        const result = await this.runner.run(['docker', 'inspect', '-f', '{{.State.StartedAt}}', name]);
        if (result.exitCode !== 0) {
            return null;
        }
        // RFC 3339 with nanoseconds; a never-started container reports year 1
        const startedAt = Date.parse(result.stdout.trim().replace(/(\.\d{3})\d+/, '$1'));
        return Number.isNaN(startedAt) || startedAt <= 0 ? null : startedAt;
    }

    pullImage(image: string, onLine?: (line: string) => void): Promise<CommandResult> {
        return this.runner.run(['docker', 'pull', image], { onLine });
    }

    async imageExists(image: string): Promise<boolean> {
        const result = await this.runner.run(['docker', 'image', 'inspect', image]);
        return result.exitCode === 0;
    }

    runContainer(spec: RunContainerSpec): Promise<CommandResult> {
        return this.runner.run(buildDockerRunArgs(spec));
    }

    stopContainer(name: string): Promise<CommandResult> {
        return this.runner.run(['docker', 'stop', name]);
    }

    restartContainer(name: string): Promise<CommandResult> {
        return this.runner.run(['docker', 'restart', name]);
    }

    /** Force-removes the container; exit status is irrelevant when nothing exists */
    removeContainer(name: string): Promise<CommandResult> {
        return this.runner.run(['docker', 'rm', '-f', name]);
    }

    async containerLogs(name: string, tail: number = DEFAULT_LOG_TAIL): Promise<string> {
        const result = await this.runner.run(['docker', 'logs', '--tail', String(tail), name]);
        // The gateway logs to stderr as often as stdout
        if (result.stdout === '') {
            return result.stderr;
        }
        if (result.stderr === '') {
            return result.stdout;
        }
        return `${result.stdout}\n--- stderr ---\n${result.stderr}`;
    }

    /**
     * Brings up the desktop companion app so its daemon starts
     */
    openEngineApp(appPath: string, platform: NodeJS.Platform = process.platform): Promise<CommandResult> {
        if (platform === 'darwin') {
            return this.runner.run(['open', '-a', appPath]);
        }
        return this.runner.run(['systemctl', '--user', 'start', 'docker-desktop']);
    }
}
