import { describe, expect, it } from 'vitest';

import { buildDockerRunArgs, type RunContainerSpec } from './securityProfile';

const spec: RunContainerSpec = {
    containerName: 'openclaw',
    image: 'ghcr.io/openclaw/openclaw:latest',
    hostPort: 18789,
    containerPort: 18789,
    configDir: '/state/config',
    workspaceDir: '/state/workspace',
    envFile: '/state/.env',
    limits: { memory: '2g', cpus: '2.0' },
};

describe('buildDockerRunArgs', () => {
    it('asserts the full lockdown profile in order', () => {
        expect(buildDockerRunArgs(spec)).toEqual([
            'docker', 'run', '-d', '--name', 'openclaw',
            '--init', '--read-only',
            '--tmpfs', '/tmp:rw,noexec,nosuid,size=256m',
            '--tmpfs', '/home/node/.npm:rw,size=64m',
            '--memory', '2g', '--memory-swap', '2g',
            '--cpus', '2.0',
            '--pids-limit', '256',
            '--cap-drop', 'ALL',
            '--cap-add', 'NET_BIND_SERVICE',
            '--security-opt', 'no-new-privileges:true',
            '-p', '127.0.0.1:18789:18789',
            '-v', '/state/config:/home/node/.openclaw',
            '-v', '/state/workspace:/home/node/.openclaw/workspace',
            '-e', 'HOME=/home/node',
            '-e', 'TERM=xterm-256color',
            '--env-file', '/state/.env',
            '-e', 'NODE_ENV=production',
            '--restart', 'unless-stopped',
            'ghcr.io/openclaw/openclaw:latest',
            'node', 'dist/index.js', 'gateway', '--bind', 'lan', '--port', '18789',
        ]);
    });

    it('publishes a custom host port on loopback only', () => {
        const args = buildDockerRunArgs({ ...spec, hostPort: 24567 });
        const publish = args[args.indexOf('-p') + 1];

        expect(publish).toBe('127.0.0.1:24567:18789');
    });

    it('omits the CPU ceiling when the limit is 0', () => {
        const args = buildDockerRunArgs({ ...spec, limits: { memory: '4g', cpus: '0' } });

        expect(args).not.toContain('--cpus');
        expect(args.slice(args.indexOf('--memory'), args.indexOf('--memory') + 4)).toEqual(['--memory', '4g', '--memory-swap', '4g']);
    });
});
