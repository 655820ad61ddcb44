/**
 * Lockdown profile for the gateway container
 *
 * Every flag here is asserted on each `docker run`. Only the memory and CPU
 * ceilings come from settings; the rest is fixed.
 */

export interface ResourceLimits {
    /** Docker memory string, e.g. "2g". Also used as the swap ceiling (no swap) */
    memory: string;
    /** Fractional CPU count. "0" means no CPU ceiling */
    cpus: string;
}

export const CONTAINER_SECURITY_PROFILE = {
    init: true,
    readOnlyRootFilesystem: true,
    tmpfsMounts: [
        '/tmp:rw,noexec,nosuid,size=256m',
        '/home/node/.npm:rw,size=64m',
    ],
    pidsLimit: 256,
    capDrop: 'ALL',
    capAdd: 'NET_BIND_SERVICE',
    securityOpt: 'no-new-privileges:true',
    publishHost: '127.0.0.1',
    restartPolicy: 'unless-stopped',
} as const;

export const DEFAULT_RESOURCE_LIMITS: ResourceLimits = {
    memory: '2g',
    cpus: '2.0',
};

export const GATEWAY_CONTAINER_HOME = '/home/node';

export interface RunContainerSpec {
    containerName: string;
    image: string;
    hostPort: number;
    containerPort: number;
    configDir: string;
    workspaceDir: string;
    envFile: string;
    limits: ResourceLimits;
}

/**
 * Full argument vector for `docker run`, starting with "docker"
 */
export function buildDockerRunArgs(spec: RunContainerSpec): string[] {
    const profile = CONTAINER_SECURITY_PROFILE;
    const args = ['docker', 'run', '-d', '--name', spec.containerName];

    // Isolation
    if (profile.init) {
        args.push('--init');
    }
    if (profile.readOnlyRootFilesystem) {
        args.push('--read-only');
    }
    for (const mount of profile.tmpfsMounts) {
        args.push('--tmpfs', mount);
    }

    // Resource ceilings
    args.push('--memory', spec.limits.memory, '--memory-swap', spec.limits.memory);
    if (spec.limits.cpus !== '0') {
        args.push('--cpus', spec.limits.cpus);
    }
    args.push('--pids-limit', String(profile.pidsLimit));

    // Privileges
    args.push(
        '--cap-drop', profile.capDrop,
        '--cap-add', profile.capAdd,
        '--security-opt', profile.securityOpt,
    );

    // Loopback only, never exposed to the network
    args.push('-p', `${profile.publishHost}:${spec.hostPort}:${spec.containerPort}`);

    args.push(
        '-v', `${spec.configDir}:${GATEWAY_CONTAINER_HOME}/.openclaw`,
        '-v', `${spec.workspaceDir}:${GATEWAY_CONTAINER_HOME}/.openclaw/workspace`,
        '-e', `HOME=${GATEWAY_CONTAINER_HOME}`,
        '-e', 'TERM=xterm-256color',
        '--env-file', spec.envFile,
        '-e', 'NODE_ENV=production',
        '--restart', profile.restartPolicy,
        spec.image,
        // Upstream default command is `node dist/index.js`; bind the gateway explicitly
        'node', 'dist/index.js', 'gateway', '--bind', 'lan', '--port', String(spec.containerPort),
    );

    return args;
}
