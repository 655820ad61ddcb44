/**
 * Launcher state model shared by the orchestrator, the control channel and the CLI
 */

export type LauncherState =
    | 'idle'
    | 'working'
    | 'needsAuth'
    | 'waitingForAuthInput'
    | 'running'
    | 'stopped'
    | 'error';

export type StepStatus = 'pending' | 'running' | 'done' | 'error' | 'warning';

export interface LaunchStep {
    readonly status: StepStatus;
    readonly message: string;
    /** Epoch ms */
    readonly at: number;
}

export type AuthInputMode = 'oauthCode' | 'apiKey';

export type LaunchFailure =
    | { kind: 'EngineNotInstalled' }
    | { kind: 'EngineNotRunning' }
    | { kind: 'ImagePullFailed'; detail: string }
    | { kind: 'ContainerStartFailed'; detail: string }
    | { kind: 'NoSecretAvailable' }
    | { kind: 'UnexpectedContainerExit' };

export type RemediationAction =
    | { kind: 'openDownloadPage'; url: string }
    | { kind: 'openEngineApp'; path: string | null };

export interface HealthSnapshot {
    healthy: boolean;
    consecutiveFailures: number;
    /** Reported by the gateway status endpoint when available */
    uptimeSeconds?: number;
}

export interface LauncherSnapshot {
    state: LauncherState;
    /** A lifecycle operation is in flight */
    busy: boolean;
    steps: LaunchStep[];
    gatewayToken: string | null;
    port: number | null;
    controlUiUrl: string | null;
    health: HealthSnapshot;
    /** Epoch ms, set while running */
    containerStartedAt: number | null;
    pullProgress: string | null;
    authInputMode: AuthInputMode | null;
    /** Sign-in page for the pending PKCE session */
    authorizeUrl: string | null;
    authExpired: boolean;
    lastFailure: LaunchFailure | null;
    remediation: RemediationAction | null;
}

export const MAX_FAILURE_DETAIL_LENGTH = 200;

export function truncateDetail(detail: string): string {
    const trimmed = detail.trim();
    return trimmed.length > MAX_FAILURE_DETAIL_LENGTH ? trimmed.slice(0, MAX_FAILURE_DETAIL_LENGTH) : trimmed;
}

export function describeLaunchFailure(failure: LaunchFailure): string {
    switch (failure.kind) {
        case 'EngineNotInstalled':
            return 'Docker is not installed';
        case 'EngineNotRunning':
            return 'Docker did not start in time. Please open Docker Desktop manually and try again.';
        case 'ImagePullFailed':
            return `Failed to pull image: ${failure.detail}`;
        case 'ContainerStartFailed':
            return `Failed to start container: ${failure.detail}`;
        case 'NoSecretAvailable':
            return 'Gateway token is missing. Reset the launcher to generate a new one.';
        case 'UnexpectedContainerExit':
            return 'Container stopped unexpectedly';
    }
}

export function controlUiUrl(port: number, token: string, basePath: string): string {
    return `http://localhost:${port}${basePath}?token=${token}`;
}
