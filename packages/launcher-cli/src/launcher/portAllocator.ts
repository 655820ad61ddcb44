import { createServer } from 'node:net';
import { randomInt } from 'node:crypto';
import type { LauncherSettings } from '@/persistence';

export interface RandomPortOptions {
    min?: number;
    max?: number;
    attempts?: number;
    isAvailable?: (port: number) => Promise<boolean>;
}

/**
 * Binds and releases a loopback listener to see whether `port` is free
 */
export function isPortAvailable(port: number, host: string = '127.0.0.1'): Promise<boolean> {
    return new Promise((resolve) => {
        const server = createServer();
        server.once('error', () => resolve(false));
        server.listen({ port, host, exclusive: true }, () => {
            server.close(() => resolve(true));
        });
    });
}

/** Lets the kernel pick a free port */
export function kernelAssignedPort(host: string = '127.0.0.1'): Promise<number> {
    return new Promise((resolve, reject) => {
        const server = createServer();
        server.once('error', reject);
        server.listen({ port: 0, host }, () => {
            const address = server.address();
            const port = typeof address === 'object' && address ? address.port : 0;
            server.close(() => resolve(port));
        });
    });
}

/**
 * Random free port in [min, max]; falls back to a kernel-assigned port when
 * every attempt collides.
 */
export async function findRandomFreePort(options: RandomPortOptions = {}): Promise<number> {
    const min = options.min ?? 20000;
    const max = options.max ?? 60000;
    const attempts = options.attempts ?? 20;
    const isAvailable = options.isAvailable ?? ((port: number) => isPortAvailable(port));

    for (let attempt = 0; attempt < attempts; attempt++) {
        const candidate = randomInt(min, max + 1);
        if (await isAvailable(candidate)) {
            return candidate;
        }
    }
    return kernelAssignedPort();
}

export function resolveGatewayPort(settings: Pick<LauncherSettings, 'port' | 'randomizePort'>): Promise<number> {
    if (settings.randomizePort) {
        return findRandomFreePort();
    }
    return Promise.resolve(settings.port);
}
