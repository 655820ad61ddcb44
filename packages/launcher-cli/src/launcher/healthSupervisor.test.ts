import { afterEach, describe, expect, it, vi } from 'vitest';

import type { GatewayProbe, StatusProbeResult } from './gatewayProbe';
import { HealthSupervisor } from './healthSupervisor';
import type { HealthSnapshot } from './types';

function probeReturning(...results: StatusProbeResult[]): GatewayProbe {
    const queue = [...results];
    return {
        isReady: async () => false,
        checkStatus: async () => queue.shift() ?? { reachable: false, status: null },
    };
}

const down: StatusProbeResult = { reachable: false, status: null };

describe('HealthSupervisor', () => {
    let supervisor: HealthSupervisor | null = null;

    afterEach(() => {
        supervisor?.stop();
        supervisor = null;
    });

    function create(probe: GatewayProbe, containerRunning: boolean) {
        const snapshots: HealthSnapshot[] = [];
        const onContainerGone = vi.fn();
        const isContainerRunning = vi.fn(async () => containerRunning);
        supervisor = new HealthSupervisor({
            probe,
            intervalMs: 60_000,
            isContainerRunning,
            onSnapshot: (snapshot) => snapshots.push(snapshot),
            onContainerGone,
        });
        return { supervisor, snapshots, onContainerGone, isContainerRunning };
    }

    it('reports the container gone after three failures when the engine agrees', async () => {
        const { supervisor, snapshots, onContainerGone, isContainerRunning } = create(probeReturning(down, down, down), false);
        supervisor.start(18789);

        await vi.waitFor(() => expect(snapshots).toHaveLength(1));
        await supervisor.checkOnce();
        await supervisor.checkOnce();

        expect(snapshots.map((snapshot) => snapshot.consecutiveFailures)).toEqual([1, 2, 3]);
        expect(isContainerRunning).toHaveBeenCalledTimes(1);
        expect(onContainerGone).toHaveBeenCalledTimes(1);
        expect(supervisor.isActive).toBe(false);
    });

    it('keeps supervising a slow gateway while the engine still lists the container', async () => {
        const { supervisor, snapshots, onContainerGone, isContainerRunning } = create(probeReturning(down, down, down), true);
        supervisor.start(18789);

        await vi.waitFor(() => expect(snapshots).toHaveLength(1));
        await supervisor.checkOnce();
        await supervisor.checkOnce();

        expect(isContainerRunning).toHaveBeenCalledTimes(1);
        expect(onContainerGone).not.toHaveBeenCalled();
        expect(supervisor.isActive).toBe(true);
        expect(snapshots.at(-1)).toEqual({ healthy: false, consecutiveFailures: 3 });
    });

    it('a success resets the failure counter', async () => {
        const up: StatusProbeResult = { reachable: true, status: { uptime: 12 } };
        const { supervisor, snapshots, isContainerRunning } = create(probeReturning(down, down, up, down), false);
        supervisor.start(18789);

        await vi.waitFor(() => expect(snapshots).toHaveLength(1));
        await supervisor.checkOnce();
        await supervisor.checkOnce();
        await supervisor.checkOnce();

        expect(snapshots).toEqual([
            { healthy: false, consecutiveFailures: 1 },
            { healthy: false, consecutiveFailures: 2 },
            { healthy: true, consecutiveFailures: 0, uptimeSeconds: 12 },
            { healthy: false, consecutiveFailures: 1 },
        ]);
        expect(isContainerRunning).not.toHaveBeenCalled();
    });

    it('skips a probe while the previous one is pending', async () => {
        let release: (result: StatusProbeResult) => void = () => undefined;
        const checkStatus = vi.fn(() => new Promise<StatusProbeResult>((resolve) => {
            release = resolve;
        }));
        const { supervisor } = create({ isReady: async () => false, checkStatus }, true);
        supervisor.start(18789);

        await supervisor.checkOnce();

        expect(checkStatus).toHaveBeenCalledTimes(1);
        release(down);
    });

    it('drops the result of a probe that finishes after stop', async () => {
        let release: (result: StatusProbeResult) => void = () => undefined;
        const probe: GatewayProbe = {
            isReady: async () => false,
            checkStatus: () => new Promise<StatusProbeResult>((resolve) => {
                release = resolve;
            }),
        };
        const { supervisor, snapshots } = create(probe, false);
        supervisor.start(18789);

        supervisor.stop();
        release(down);
        await new Promise((resolve) => setTimeout(resolve, 0));

        expect(snapshots).toEqual([]);
    });
});
