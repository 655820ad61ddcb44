/**
 * Periodic gateway health polling while the launcher believes the container runs.
 *
 * Three consecutive failed probes trigger an independent engine check: a container
 * the engine no longer lists is reported gone, a listed one is just a slow gateway.
 */

import { logger } from '@/ui/logger';
import type { GatewayProbe } from './gatewayProbe';
import type { HealthSnapshot } from './types';

export const FAILURE_THRESHOLD = 3;

export interface HealthSupervisorOptions {
    probe: GatewayProbe;
    intervalMs: number;
    isContainerRunning: () => Promise<boolean>;
    onSnapshot: (snapshot: HealthSnapshot) => void;
    onContainerGone: () => void;
}

export class HealthSupervisor {
    private timer: NodeJS.Timeout | null = null;
    private port: number | null = null;
    private consecutiveFailures = 0;
    private probeInFlight = false;
    // Bumped on every start/stop so results of an abandoned probe are dropped
    private generation = 0;

    constructor(private readonly options: HealthSupervisorOptions) { }

    get isActive(): boolean {
        return this.timer !== null;
    }

    start(port: number, intervalMs: number = this.options.intervalMs): void {
        this.stop();
        this.port = port;
        this.consecutiveFailures = 0;
        this.timer = setInterval(() => {
            this.checkOnce().catch((error) => logger.debug('[HEALTH] Probe crashed', error));
        }, intervalMs);
        this.checkOnce().catch((error) => logger.debug('[HEALTH] Probe crashed', error));
    }

    stop(): void {
        this.generation++;
        if (this.timer) {
            clearInterval(this.timer);
            this.timer = null;
        }
        this.port = null;
        this.consecutiveFailures = 0;
        this.probeInFlight = false;
    }

    /**
     * One probe cycle. Skipped while a previous cycle is still waiting.
     */
    async checkOnce(): Promise<void> {
        const port = this.port;
        if (port === null || this.probeInFlight) {
            return;
        }
        const generation = this.generation;
        this.probeInFlight = true;
        try {
            const result = await this.options.probe.checkStatus(port);
            if (generation !== this.generation) {
                return;
            }

            if (result.reachable) {
                this.consecutiveFailures = 0;
                this.options.onSnapshot({
                    healthy: true,
                    consecutiveFailures: 0,
                    uptimeSeconds: result.status?.uptime,
                });
                return;
            }

            this.consecutiveFailures++;
            this.options.onSnapshot({ healthy: false, consecutiveFailures: this.consecutiveFailures });
            if (this.consecutiveFailures < FAILURE_THRESHOLD) {
                return;
            }

            logger.debug(`[HEALTH] ${this.consecutiveFailures} consecutive failures, asking the engine`);
            const running = await this.options.isContainerRunning();
            if (generation !== this.generation) {
                return;
            }
            if (!running) {
                this.stop();
                this.options.onContainerGone();
            }
        } finally {
            if (generation === this.generation) {
                this.probeInFlight = false;
            }
        }
    }
}
