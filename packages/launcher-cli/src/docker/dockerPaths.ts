/**
 * Docker binary & desktop app discovery
 *
 * A launcher started from a desktop shortcut or a service manager inherits a
 * minimal PATH (`/usr/bin:/bin:/usr/sbin:/sbin`) that misses most Docker
 * installs. Everything here probes the filesystem directly instead of asking PATH.
 *
 * Covers: Docker Desktop, OrbStack, Homebrew, Colima, Rancher Desktop, Podman, Lima, Nix, MacPorts
 */

import { accessSync, constants, existsSync } from 'node:fs';
import { homedir } from 'node:os';
import { delimiter, join } from 'node:path';

export type EngineBackend =
    | 'Docker Desktop'
    | 'Docker Engine'
    | 'OrbStack'
    | 'Homebrew'
    | 'Colima'
    | 'Rancher Desktop'
    | 'Podman'
    | 'Podman Desktop'
    | 'Lima'
    | 'Nix'
    | 'MacPorts';

export interface EngineLocation {
    backend: EngineBackend;
    path: string;
}

export interface EngineDiscovery {
    binary: EngineLocation | null;
    app: EngineLocation | null;
}

export interface ProbeOptions {
    home?: string;
    platform?: NodeJS.Platform;
    isExecutable?: (path: string) => boolean;
    exists?: (path: string) => boolean;
}

export const MINIMAL_SYSTEM_PATH = '/usr/bin:/bin:/usr/sbin:/sbin';

/**
 * Known Docker CLI locations, most likely first. The first executable match wins.
 */
export function binarySearchPaths(home: string = homedir(), platform: NodeJS.Platform = process.platform): EngineLocation[] {
    if (platform === 'darwin') {
        return [
            { backend: 'Docker Desktop', path: '/usr/local/bin/docker' },
            { backend: 'Docker Desktop', path: '/Applications/Docker.app/Contents/Resources/bin/docker' },
            { backend: 'Docker Desktop', path: join(home, '.docker/bin/docker') },
            { backend: 'OrbStack', path: join(home, '.orbstack/bin/docker') },
            { backend: 'OrbStack', path: '/Applications/OrbStack.app/Contents/Resources/bin/docker' },
            { backend: 'Homebrew', path: '/opt/homebrew/bin/docker' },
            // Colima relies on the Homebrew docker CLI; its own binary is a good enough signal
            { backend: 'Colima', path: '/opt/homebrew/bin/colima' },
            { backend: 'Colima', path: '/usr/local/bin/colima' },
            { backend: 'Rancher Desktop', path: join(home, '.rd/bin/docker') },
            { backend: 'Rancher Desktop', path: '/Applications/Rancher Desktop.app/Contents/Resources/resources/darwin/bin/docker' },
            { backend: 'Podman', path: '/opt/homebrew/bin/podman' },
            { backend: 'Podman', path: '/usr/local/bin/podman' },
            { backend: 'Podman', path: join(home, '.local/bin/podman') },
            { backend: 'Lima', path: '/opt/homebrew/bin/limactl' },
            { backend: 'Lima', path: '/usr/local/bin/limactl' },
            { backend: 'Nix', path: join(home, '.nix-profile/bin/docker') },
            { backend: 'Nix', path: '/run/current-system/sw/bin/docker' },
            { backend: 'MacPorts', path: '/opt/local/bin/docker' },
        ];
    }

    return [
        { backend: 'Docker Engine', path: '/usr/bin/docker' },
        { backend: 'Docker Engine', path: '/usr/local/bin/docker' },
        { backend: 'Docker Engine', path: '/snap/bin/docker' },
        { backend: 'Docker Desktop', path: join(home, '.docker/bin/docker') },
        { backend: 'Rancher Desktop', path: join(home, '.rd/bin/docker') },
        { backend: 'Podman', path: '/usr/bin/podman' },
        { backend: 'Podman', path: join(home, '.local/bin/podman') },
        { backend: 'Nix', path: join(home, '.nix-profile/bin/docker') },
        { backend: 'Nix', path: '/run/current-system/sw/bin/docker' },
    ];
}

/**
 * Desktop companion apps that can be launched to bring the daemon up
 */
export function appBundlePaths(platform: NodeJS.Platform = process.platform): EngineLocation[] {
    if (platform === 'darwin') {
        return [
            { backend: 'Docker Desktop', path: '/Applications/Docker.app' },
            { backend: 'OrbStack', path: '/Applications/OrbStack.app' },
            { backend: 'Rancher Desktop', path: '/Applications/Rancher Desktop.app' },
            { backend: 'Podman Desktop', path: '/Applications/Podman Desktop.app' },
        ];
    }
    return [
        { backend: 'Docker Desktop', path: '/opt/docker-desktop' },
    ];
}

/**
 * Directories prepended to PATH for every subprocess
 */
export function extraPathDirs(home: string = homedir(), platform: NodeJS.Platform = process.platform): string[] {
    const dirs = [
        '/usr/local/bin',
        '/opt/homebrew/bin',
        '/opt/homebrew/sbin',
        '/Applications/Docker.app/Contents/Resources/bin',
        join(home, '.docker/bin'),
        join(home, '.orbstack/bin'),
        join(home, '.rd/bin'),
        join(home, '.local/bin'),
        join(home, '.nix-profile/bin'),
        '/run/current-system/sw/bin',
        '/opt/local/bin',
    ];
    if (platform !== 'darwin') {
        dirs.push('/snap/bin');
    }
    return dirs;
}

/**
 * PATH value for subprocesses: extra directories first, then whatever we inherited
 */
export function augmentedSearchPath(currentPath: string | undefined, extraDirs: string[]): string {
    const inherited = (currentPath && currentPath.trim() !== '' ? currentPath : MINIMAL_SYSTEM_PATH)
        .split(delimiter)
        .filter(Boolean);
    const seen = new Set<string>();
    const merged: string[] = [];
    for (const dir of [...extraDirs, ...inherited]) {
        if (!seen.has(dir)) {
            seen.add(dir);
            merged.push(dir);
        }
    }
    return merged.join(delimiter);
}

function defaultIsExecutable(path: string): boolean {
    try {
        accessSync(path, constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

export function findDockerBinary(options: ProbeOptions = {}): EngineLocation | null {
    const isExecutable = options.isExecutable ?? defaultIsExecutable;
    return binarySearchPaths(options.home, options.platform).find((entry) => isExecutable(entry.path)) ?? null;
}

export function findInstalledApp(options: ProbeOptions = {}): EngineLocation | null {
    const exists = options.exists ?? existsSync;
    return appBundlePaths(options.platform).find((entry) => exists(entry.path)) ?? null;
}

export function discoverEngine(options: ProbeOptions = {}): EngineDiscovery {
    return {
        binary: findDockerBinary(options),
        app: findInstalledApp(options),
    };
}
