/**
 * Launch orchestrator
 *
 * Owns the launcher state machine, the step log and health supervision. Every
 * lifecycle operation runs under a single in-flight guard; a request that arrives
 * while another operation runs resolves `false` and does nothing. Failures never
 * escape: they become a step-log entry, a typed `lastFailure` and the `error` state.
 *
 * The engine is re-queried for ground truth on every start, which is what lets a
 * restarted launcher pick up a container that kept running.
 */

import { configuration } from '@/configuration';
import { SpawnCommandRunner, type CommandRunner } from '@/docker/commandRunner';
import { DockerClient } from '@/docker/dockerClient';
import { discoverEngine as probeEngine, type EngineDiscovery } from '@/docker/dockerPaths';
import { readSettings, type LauncherSettings } from '@/persistence';
import { logger } from '@/ui/logger';
import { openUrl } from '@/utils/openUrl';
import { delay } from '@/utils/time';
import { LaunchError } from './errors';
import { HttpGatewayProbe, type GatewayProbe } from './gatewayProbe';
import { HealthSupervisor } from './healthSupervisor';
import {
    buildAuthorizeUrl,
    generatePKCE,
    normalizeAuthorizationCode,
    OAuthClient,
    type OAuthCredentialSet,
    type PKCE,
} from './oauth';
import { resolveGatewayPort } from './portAllocator';
import { StateStore } from './stateStore';
import { StepLog } from './stepLog';
import {
    controlUiUrl,
    truncateDetail,
    type AuthInputMode,
    type HealthSnapshot,
    type LaunchFailure,
    type LauncherSnapshot,
    type LauncherState,
    type RemediationAction,
    type StepStatus,
} from './types';

export interface OrchestratorTiming {
    dockerRetryCount: number;
    dockerRetryDelayMs: number;
    gatewayRetryCount: number;
    gatewayRetryDelayMs: number;
}

export const DEFAULT_TIMING: OrchestratorTiming = {
    dockerRetryCount: 45,
    dockerRetryDelayMs: 2000,
    gatewayRetryCount: 30,
    gatewayRetryDelayMs: 1000,
};

export interface TokenExchanger {
    exchangeCode(code: string, verifier: string): Promise<OAuthCredentialSet>;
    refreshAccessToken(refreshToken: string): Promise<OAuthCredentialSet>;
}

export interface LaunchOrchestratorOptions {
    runner?: CommandRunner;
    store?: StateStore;
    loadSettings?: () => Promise<LauncherSettings>;
    oauth?: TokenExchanger;
    probe?: GatewayProbe;
    timing?: Partial<OrchestratorTiming>;
    openExternal?: (url: string) => Promise<boolean>;
    discoverEngine?: () => EngineDiscovery;
    allocatePort?: (settings: LauncherSettings) => Promise<number>;
    now?: () => number;
    sleep?: (ms: number) => Promise<void>;
    platform?: NodeJS.Platform;
}

export type SnapshotListener = (snapshot: LauncherSnapshot) => void;

const START_STATES: readonly LauncherState[] = ['idle', 'running', 'stopped', 'error'];
const RESTART_STATES: readonly LauncherState[] = ['running', 'stopped', 'error'];
const AUTH_STATES: readonly LauncherState[] = ['needsAuth', 'waitingForAuthInput'];

/** States each guarded operation may start from; null means any state */
const OPERATION_STATES = {
    start: START_STATES,
    stop: null,
    restart: RESTART_STATES,
    reset: null,
    reauth: null,
    beginOAuth: AUTH_STATES,
    showApiKeyInput: AUTH_STATES,
    submitOAuthCode: AUTH_STATES,
    submitApiKey: AUTH_STATES,
    skipAuth: AUTH_STATES,
} satisfies Record<string, readonly LauncherState[] | null>;

export type LauncherOperation = keyof typeof OPERATION_STATES;

const PULL_PROGRESS_MARKERS = ['Pulling', 'Downloading', 'Extracting', 'Verifying', 'Pull complete', 'Already exists', 'Digest', 'Status'];
const MAX_PULL_PROGRESS_LENGTH = 80;

const HEALTH_UNKNOWN: HealthSnapshot = { healthy: false, consecutiveFailures: 0 };

export class LaunchOrchestrator {
    private readonly docker: DockerClient;
    private readonly runner: CommandRunner;
    private readonly store: StateStore;
    private readonly loadSettings: () => Promise<LauncherSettings>;
    private readonly oauth: TokenExchanger;
    private readonly probe: GatewayProbe;
    private readonly timing: OrchestratorTiming;
    private readonly openExternal: (url: string) => Promise<boolean>;
    private readonly discoverEngine: () => EngineDiscovery;
    private readonly allocatePort: (settings: LauncherSettings) => Promise<number>;
    private readonly now: () => number;
    private readonly sleep: (ms: number) => Promise<void>;
    private readonly platform: NodeJS.Platform;
    private readonly healthSupervisor: HealthSupervisor;
    private readonly listeners = new Set<SnapshotListener>();

    private state: LauncherState = 'idle';
    private readonly steps = new StepLog();
    private gatewayToken: string | null = null;
    private port: number | null = null;
    private health: HealthSnapshot = HEALTH_UNKNOWN;
    private containerStartedAt: number | null = null;
    private pullProgress: string | null = null;
    private authInputMode: AuthInputMode | null = null;
    private authorizeUrl: string | null = null;
    private authExpired = false;
    private lastFailure: LaunchFailure | null = null;
    private remediation: RemediationAction | null = null;

    private settings: LauncherSettings | null = null;
    private pkce: PKCE | null = null;
    private isFirstRun = false;
    private operationInFlight = false;

    constructor(options: LaunchOrchestratorOptions = {}) {
        this.runner = options.runner ?? new SpawnCommandRunner();
        this.docker = new DockerClient(this.runner);
        this.store = options.store ?? new StateStore();
        this.loadSettings = options.loadSettings ?? readSettings;
        this.oauth = options.oauth ?? new OAuthClient();
        this.probe = options.probe ?? new HttpGatewayProbe();
        this.timing = { ...DEFAULT_TIMING, ...options.timing };
        this.openExternal = options.openExternal ?? ((url) => openUrl(url, this.runner));
        this.discoverEngine = options.discoverEngine ?? (() => probeEngine());
        this.allocatePort = options.allocatePort ?? resolveGatewayPort;
        this.now = options.now ?? Date.now;
        this.sleep = options.sleep ?? delay;
        this.platform = options.platform ?? process.platform;

        this.healthSupervisor = new HealthSupervisor({
            probe: this.probe,
            intervalMs: 5000,
            isContainerRunning: () => this.docker.isContainerRunning(configuration.containerName),
            onSnapshot: (snapshot) => {
                this.health = snapshot;
                this.commit();
            },
            onContainerGone: () => this.handleContainerGone(),
        });
    }

    //
    // Observation
    //

    getSnapshot(): LauncherSnapshot {
        return {
            state: this.state,
            busy: this.operationInFlight,
            steps: this.steps.entries(),
            gatewayToken: this.gatewayToken,
            port: this.port,
            controlUiUrl: this.gatewayToken && this.port !== null
                ? controlUiUrl(this.port, this.gatewayToken, configuration.controlUiBasePath)
                : null,
            health: { ...this.health },
            containerStartedAt: this.containerStartedAt,
            pullProgress: this.pullProgress,
            authInputMode: this.authInputMode,
            authorizeUrl: this.authorizeUrl,
            authExpired: this.authExpired,
            lastFailure: this.lastFailure,
            remediation: this.remediation,
        };
    }

    subscribe(listener: SnapshotListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    isBusy(): boolean {
        return this.operationInFlight;
    }

    /** Whether `operation` would run if called now */
    accepts(operation: LauncherOperation): boolean {
        if (this.operationInFlight) {
            return false;
        }
        const allowed: readonly LauncherState[] | null = OPERATION_STATES[operation];
        return allowed === null || allowed.includes(this.state);
    }

    //
    // Lifecycle
    //

    start(): Promise<boolean> {
        return this.guarded('start', async () => {
            this.healthSupervisor.stop();
            this.steps.clear();
            this.lastFailure = null;
            this.remediation = null;
            this.authInputMode = null;
            this.authorizeUrl = null;
            this.setState('working');

            const settings = await this.refreshSettings();

            if (await this.tryRecoverRunningContainer()) {
                return;
            }

            await this.ensureEngine();
            await this.firstRunSetup(settings);
            await this.refreshOAuthIfNeeded();

            if (this.isFirstRun && !this.store.hasApiKeyProfile() && !this.store.hasOAuthCredentials()) {
                this.setState('needsAuth');
                return;
            }

            await this.continueAfterSetup();
        });
    }

    stopContainer(): Promise<boolean> {
        return this.guarded('stop', async () => {
            this.healthSupervisor.stop();
            this.addStep('running', 'Stopping OpenClaw...');
            const result = await this.docker.stopContainer(configuration.containerName);
            if (result.exitCode !== 0) {
                logger.debug(`[LAUNCHER] docker stop exited ${result.exitCode}: ${result.stderr.trim()}`);
            }
            this.steps.clear();
            this.containerStartedAt = null;
            this.health = HEALTH_UNKNOWN;
            this.pullProgress = null;
            this.authInputMode = null;
            this.authorizeUrl = null;
            this.pkce = null;
            this.setState('stopped');
        });
    }

    restartContainer(): Promise<boolean> {
        return this.guarded('restart', async () => {
            this.healthSupervisor.stop();
            this.health = HEALTH_UNKNOWN;
            this.addStep('running', 'Restarting...');

            const result = await this.docker.restartContainer(configuration.containerName);
            if (result.exitCode !== 0) {
                const detail = truncateDetail(result.stderr);
                this.containerStartedAt = null;
                this.lastFailure = { kind: 'ContainerStartFailed', detail };
                this.remediation = null;
                this.addStep('error', `Failed to restart: ${detail}`);
                this.setState('error');
                return;
            }

            await this.ensureGatewayEnvironment();
            this.addStep('done', 'Restarted');
            this.lastFailure = null;
            this.remediation = null;
            this.containerStartedAt = this.now();
            this.setState('running');
            this.startHealthSupervision();
        });
    }

    resetEverything(): Promise<boolean> {
        return this.guarded('reset', async () => {
            this.healthSupervisor.stop();
            this.addStep('running', 'Stopping container...');
            await this.docker.stopContainer(configuration.containerName);
            await this.docker.removeContainer(configuration.containerName);
            this.addStep('done', 'Container removed');

            await this.store.destroy();
            this.addStep('done', 'Local config cleaned up');

            this.steps.clear();
            this.gatewayToken = null;
            this.port = null;
            this.containerStartedAt = null;
            this.health = HEALTH_UNKNOWN;
            this.pullProgress = null;
            this.isFirstRun = false;
            this.pkce = null;
            this.authInputMode = null;
            this.authorizeUrl = null;
            this.authExpired = false;
            this.lastFailure = null;
            this.remediation = null;
            this.setState('stopped');
        });
    }

    /**
     * Drops stored credentials and returns to the auth choice. Secret and config stay.
     */
    reAuthenticate(): Promise<boolean> {
        return this.guarded('reauth', async () => {
            this.healthSupervisor.stop();
            if (await this.docker.isContainerRunning(configuration.containerName)) {
                this.addStep('running', 'Stopping OpenClaw...');
                await this.docker.stopContainer(configuration.containerName);
                this.addStep('done', 'Stopped.');
            }
            this.containerStartedAt = null;
            this.health = HEALTH_UNKNOWN;

            await this.store.clearCredentials();
            this.addStep('done', 'Cleared saved credentials');
            this.pkce = null;
            this.authInputMode = null;
            this.authorizeUrl = null;
            this.authExpired = false;
            this.lastFailure = null;
            this.remediation = null;
            this.setState('needsAuth');
        });
    }

    //
    // Auth continuations
    //

    beginOAuth(): Promise<boolean> {
        return this.guarded('beginOAuth', async () => {
            const pkce = generatePKCE();
            const url = buildAuthorizeUrl(pkce);
            this.pkce = pkce;
            this.authInputMode = 'oauthCode';
            this.authorizeUrl = url;
            this.addStep('running', 'Opened browser for Anthropic sign-in');
            this.setState('waitingForAuthInput');
            if (!(await this.openExternal(url))) {
                logger.debug('[LAUNCHER] Browser did not open; the sign-in URL is on the snapshot');
            }
        });
    }

    showApiKeyInput(): Promise<boolean> {
        return this.guarded('showApiKeyInput', async () => {
            this.authInputMode = 'apiKey';
            this.authorizeUrl = null;
            this.setState('waitingForAuthInput');
        });
    }

    submitOAuthCode(input: string): Promise<boolean> {
        return this.guarded('submitOAuthCode', async () => {
            const pkce = this.pkce;
            if (!pkce) {
                this.addStep('error', 'No PKCE session. Try signing in again.');
                this.authInputMode = null;
                this.setState('needsAuth');
                return;
            }

            const code = normalizeAuthorizationCode(input);
            logger.debug(`[LAUNCHER] Exchanging code: ${code.slice(0, 8)}...`);
            this.addStep('running', 'Exchanging authorization code...');
            this.setState('working');

            try {
                const credentials = await this.oauth.exchangeCode(code, pkce.verifier);
                await this.store.writeOAuthCredentials(credentials);
            } catch (error) {
                this.addStep('error', `OAuth exchange failed: ${truncateDetail(error instanceof Error ? error.message : String(error))}`);
                this.authInputMode = null;
                this.authorizeUrl = null;
                this.setState('needsAuth');
                return;
            }

            this.pkce = null;
            this.authInputMode = null;
            this.authorizeUrl = null;
            this.authExpired = false;
            this.addStep('done', 'Signed in with Claude');
            await this.continueAfterSetup();
        });
    }

    /** An empty key counts as skipping */
    submitApiKey(key: string): Promise<boolean> {
        return this.guarded('submitApiKey', async () => {
            const trimmed = key.trim();
            if (trimmed === '') {
                this.addStep('warning', 'Skipped API key. Set it up later in the Control UI');
            } else {
                await this.store.writeApiKeyProfile(trimmed);
                this.addStep('done', 'API key saved');
            }
            this.authInputMode = null;
            this.authorizeUrl = null;
            this.setState('working');
            await this.continueAfterSetup();
        });
    }

    skipAuth(): Promise<boolean> {
        return this.guarded('skipAuth', async () => {
            this.addStep('warning', 'Skipped auth. Set it up later in the Control UI');
            this.authInputMode = null;
            this.authorizeUrl = null;
            this.setState('working');
            await this.continueAfterSetup();
        });
    }

    //
    // Utilities outside the lifecycle guard
    //

    fetchLogs(tail?: number): Promise<string> {
        return this.docker.containerLogs(configuration.containerName, tail);
    }

    /** Opens the control UI with the gateway token; null when there is nothing to open */
    async openControlUi(): Promise<string | null> {
        if (!this.gatewayToken || this.port === null) {
            await this.ensureGatewayEnvironment();
        }
        if (!this.gatewayToken || this.port === null) {
            return null;
        }
        const url = controlUiUrl(this.port, this.gatewayToken, configuration.controlUiBasePath);
        if (await this.openExternal(url)) {
            this.addStep('done', 'Opened Control UI in browser');
        }
        return url;
    }

    dispose(): void {
        this.healthSupervisor.stop();
        this.listeners.clear();
    }

    //
    // Pipeline
    //

    private async tryRecoverRunningContainer(): Promise<boolean> {
        if (!(await this.docker.isEngineResponding())) {
            return false;
        }
        if (!(await this.docker.isContainerRunning(configuration.containerName))) {
            return false;
        }

        await this.store.migrateLegacyDirectoryIfPresent();
        const environment = await this.store.readGatewayEnvironment();
        this.gatewayToken = environment?.token ?? null;
        this.port = environment?.port ?? this.port ?? this.settingsOrDefault().port;

        this.addStep('done', 'Recovered running container');
        this.containerStartedAt = await this.runningContainerStartedAt();
        this.setState('running');
        this.startHealthSupervision();
        return true;
    }

    private async ensureEngine(): Promise<void> {
        this.addStep('running', 'Checking Docker...');
        const discovery = this.discoverEngine();
        if (!discovery.binary && !discovery.app) {
            throw new LaunchError({ kind: 'EngineNotInstalled' });
        }

        if (await this.docker.isEngineResponding()) {
            this.addStep('done', 'Docker is ready');
            return;
        }

        this.addStep('warning', 'Docker not running. Starting Docker Desktop...');
        if (discovery.app) {
            const opened = await this.docker.openEngineApp(discovery.app.path, this.platform);
            if (opened.exitCode !== 0) {
                logger.debug(`[LAUNCHER] Could not open ${discovery.app.path}: ${opened.stderr.trim()}`);
            }
        }

        for (let attempt = 0; attempt < this.timing.dockerRetryCount; attempt++) {
            await this.sleep(this.timing.dockerRetryDelayMs);
            if (await this.docker.isEngineResponding()) {
                this.addStep('done', 'Docker is ready');
                return;
            }
        }

        throw new LaunchError(
            { kind: 'EngineNotRunning' },
            { kind: 'openEngineApp', path: discovery.app?.path ?? null },
        );
    }

    private async firstRunSetup(settings: LauncherSettings): Promise<void> {
        await this.store.migrateLegacyDirectoryIfPresent();
        const candidatePort = this.store.isInitialized() ? settings.port : await this.allocatePort(settings);

        const result = await this.store.loadOrInitialize(candidatePort);
        this.gatewayToken = result.token;
        this.port = result.port;
        if (result.firstRun) {
            this.isFirstRun = true;
            this.addStep('done', 'Configuration created');
        } else {
            this.addStep('done', 'Loaded existing configuration');
            if (!settings.randomizePort && result.port !== settings.port) {
                await this.store.writeGatewayPort(settings.port);
                this.port = settings.port;
                this.addStep('done', `Gateway port changed to ${settings.port}`);
            }
        }
    }

    private async runningContainerStartedAt(): Promise<number> {
        return (await this.docker.containerStartedAt(configuration.containerName)) ?? this.now();
    }

    private async refreshOAuthIfNeeded(): Promise<void> {
        const credentials = await this.store.readOAuthCredentials();
        if (!credentials || this.now() < credentials.expiresAtEpochMs) {
            return;
        }

        try {
            const refreshed = await this.oauth.refreshAccessToken(credentials.refreshToken);
            await this.store.writeOAuthCredentials(refreshed);
            this.authExpired = false;
            this.addStep('done', 'OAuth token refreshed');
        } catch (error) {
            logger.debug('[LAUNCHER] OAuth refresh failed', error);
            this.authExpired = true;
            this.addStep('warning', 'OAuth token expired (refresh failed)');
        }
    }

    private async continueAfterSetup(): Promise<void> {
        const settings = await this.currentSettings();
        await this.ensureImage(settings.dockerImage);
        const started = await this.runContainer(settings);
        await this.waitForGateway();

        this.containerStartedAt = started ? this.now() : await this.runningContainerStartedAt();
        this.setState('running');
        this.startHealthSupervision();
        if (settings.openBrowserOnStart) {
            await this.openControlUi();
        }
    }

    private async ensureImage(image: string): Promise<void> {
        this.addStep('running', 'Pulling image...');
        this.pullProgress = 'Connecting...';
        this.commit();

        const result = await this.docker.pullImage(image, (line) => {
            const trimmed = line.trim();
            if (PULL_PROGRESS_MARKERS.some((marker) => trimmed.includes(marker))) {
                this.pullProgress = trimmed.slice(0, MAX_PULL_PROGRESS_LENGTH);
                this.commit();
            }
        });
        this.pullProgress = null;

        if (result.exitCode === 0) {
            this.addStep('done', 'Docker image up to date');
            return;
        }

        logger.debug(`[LAUNCHER] docker pull exited ${result.exitCode}: ${result.stderr.trim()}`);
        if (await this.docker.imageExists(image)) {
            this.addStep('warning', "Couldn't check for updates (offline?). Using cached image.");
            return;
        }

        throw new LaunchError({ kind: 'ImagePullFailed', detail: truncateDetail(result.stderr || result.stdout || 'Image pull failed') });
    }

    /** Resolves true when a new container was started, false when one was already up */
    private async runContainer(settings: LauncherSettings): Promise<boolean> {
        await this.ensureGatewayEnvironment();
        const port = this.port;
        if (!this.gatewayToken || port === null) {
            throw new LaunchError({ kind: 'NoSecretAvailable' });
        }

        if (await this.docker.isContainerRunning(configuration.containerName)) {
            this.addStep('done', 'Container already running');
            return false;
        }

        // A stopped container with the same name blocks `docker run`
        await this.docker.removeContainer(configuration.containerName);

        this.addStep('running', 'Starting container (lockdown mode)...');
        const result = await this.docker.runContainer({
            containerName: configuration.containerName,
            image: settings.dockerImage,
            hostPort: port,
            containerPort: configuration.containerPort,
            configDir: this.store.configDir,
            workspaceDir: this.store.workspaceDir,
            envFile: this.store.envFile,
            limits: { memory: settings.memoryLimit, cpus: settings.cpuLimit },
        });
        if (result.exitCode !== 0) {
            throw new LaunchError({ kind: 'ContainerStartFailed', detail: truncateDetail(result.stderr) });
        }
        this.addStep('done', 'Container started (locked down)');
        return true;
    }

    private async waitForGateway(): Promise<void> {
        this.addStep('running', 'Waiting for Gateway to be ready...');
        const port = this.port ?? configuration.defaultPort;

        for (let attempt = 0; attempt < this.timing.gatewayRetryCount; attempt++) {
            await this.sleep(this.timing.gatewayRetryDelayMs);
            if (await this.probe.isReady(port)) {
                this.addStep('done', 'Gateway is ready!');
                return;
            }
        }

        this.addStep('warning', 'Gateway is still starting. Try opening the browser anyway.');
    }

    //
    // Internals
    //

    private async guarded(name: LauncherOperation, operation: () => Promise<void>): Promise<boolean> {
        if (!this.accepts(name)) {
            logger.debug(`[LAUNCHER] Ignoring ${name} in state ${this.state}${this.operationInFlight ? ' (busy)' : ''}`);
            return false;
        }

        this.operationInFlight = true;
        this.commit();
        try {
            await operation();
        } catch (error) {
            this.recordFailure(error);
        } finally {
            this.operationInFlight = false;
            this.commit();
        }
        return true;
    }

    private recordFailure(error: unknown): void {
        this.healthSupervisor.stop();
        this.pullProgress = null;
        if (error instanceof LaunchError) {
            this.lastFailure = error.failure;
            this.remediation = error.remediation;
        } else {
            logger.debug('[LAUNCHER] Unexpected failure', error);
            this.lastFailure = null;
            this.remediation = null;
        }
        this.addStep('error', error instanceof Error ? error.message : String(error));
        this.setState('error');
    }

    private handleContainerGone(): void {
        if (this.state !== 'running') {
            return;
        }
        logger.debug('[LAUNCHER] Container is gone, leaving running state');
        this.containerStartedAt = null;
        this.recordFailure(new LaunchError({ kind: 'UnexpectedContainerExit' }));
    }

    private startHealthSupervision(): void {
        const port = this.port;
        if (port === null) {
            return;
        }
        this.health = HEALTH_UNKNOWN;
        this.healthSupervisor.start(port, this.settingsOrDefault().healthCheckIntervalMs);
    }

    /** Reloads token and port from the store when they are not in memory */
    private async ensureGatewayEnvironment(): Promise<void> {
        if (this.gatewayToken && this.port !== null) {
            return;
        }
        const environment = await this.store.readGatewayEnvironment();
        this.gatewayToken = this.gatewayToken ?? environment?.token ?? null;
        this.port = this.port ?? environment?.port ?? this.settingsOrDefault().port;
    }

    private async refreshSettings(): Promise<LauncherSettings> {
        this.settings = await this.loadSettings();
        return this.settings;
    }

    private async currentSettings(): Promise<LauncherSettings> {
        return this.settings ?? this.refreshSettings();
    }

    private settingsOrDefault(): Pick<LauncherSettings, 'port' | 'healthCheckIntervalMs'> {
        return this.settings ?? { port: configuration.defaultPort, healthCheckIntervalMs: 5000 };
    }

    private addStep(status: StepStatus, message: string): void {
        this.steps.append(status, message, this.now());
        this.commit();
    }

    private setState(state: LauncherState): void {
        if (state !== 'running') {
            this.healthSupervisor.stop();
        }
        this.state = state;
        this.commit();
    }

    private commit(): void {
        const snapshot = this.getSnapshot();
        for (const listener of this.listeners) {
            try {
                listener(snapshot);
            } catch (error) {
                logger.debug('[LAUNCHER] Snapshot listener threw', error);
            }
        }
    }
}
