/**
 * HTTP probes against the gateway's control UI
 */

import * as z from 'zod';
import { configuration } from '@/configuration';
import { logger } from '@/ui/logger';

export const DEFAULT_PROBE_TIMEOUT_MS = 3000;

const GatewayStatusSchema = z.object({
    uptime: z.number().optional(),
}).passthrough();

export type GatewayStatus = z.infer<typeof GatewayStatusSchema>;

export interface StatusProbeResult {
    reachable: boolean;
    /** Present only when the status endpoint answered with JSON */
    status: GatewayStatus | null;
}

export interface GatewayProbe {
    /** Readiness: the control UI root answers without an error status */
    isReady(port: number): Promise<boolean>;
    /** Richer status endpoint, falling back to the readiness check */
    checkStatus(port: number): Promise<StatusProbeResult>;
}

type FetchFn = typeof fetch;

export class HttpGatewayProbe implements GatewayProbe {
    private readonly fetchFn: FetchFn;
    private readonly timeoutMs: number;
    private readonly basePath: string;

    constructor(options: { fetch?: FetchFn; timeoutMs?: number; basePath?: string } = {}) {
        this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
        this.timeoutMs = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
        this.basePath = options.basePath ?? configuration.controlUiBasePath;
    }

    async isReady(port: number): Promise<boolean> {
        try {
            const response = await this.fetchFn(`http://localhost:${port}${this.basePath}/`, {
                redirect: 'manual',
                signal: AbortSignal.timeout(this.timeoutMs),
            });
            // Drain so the socket is released
            await response.arrayBuffer();
            return response.status < 400;
        } catch (error) {
            logger.debug(`[PROBE] Gateway on :${port} not reachable`, error instanceof Error ? error.message : error);
            return false;
        }
    }

    async checkStatus(port: number): Promise<StatusProbeResult> {
        const status = await this.fetchStatus(port);
        if (status) {
            return { reachable: true, status };
        }
        return { reachable: await this.isReady(port), status: null };
    }

    private async fetchStatus(port: number): Promise<GatewayStatus | null> {
        try {
            const response = await this.fetchFn(`http://localhost:${port}${this.basePath}/api/status`, {
                signal: AbortSignal.timeout(this.timeoutMs),
            });
            if (response.status !== 200) {
                await response.arrayBuffer();
                return null;
            }
            const parsed = GatewayStatusSchema.safeParse(await response.json());
            return parsed.success ? parsed.data : null;
        } catch (error) {
            logger.debug(`[PROBE] Status endpoint on :${port} failed`, error instanceof Error ? error.message : error);
            return null;
        }
    }
}
