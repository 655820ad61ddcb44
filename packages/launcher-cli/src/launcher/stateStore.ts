/**
 * State directory owner
 *
 * Everything the gateway container mounts or reads lives here: the `.env` file with
 * the gateway secret, `config/` (mounted as the gateway's home) and `workspace/`.
 * Files that carry a secret are written atomically and end up mode 600;
 * the credentials directory is 700.
 */

import { existsSync } from 'node:fs';
import { chmod, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import * as z from 'zod';
import { configuration } from '@/configuration';
import { logger } from '@/ui/logger';
import { generateGatewaySecret } from './gatewaySecret';
import type { OAuthCredentialSet } from './oauth';

const SECRET_FILE_MODE = 0o600;
const SECRET_DIR_MODE = 0o700;

export const DEFAULT_AGENT_MODEL = 'anthropic/claude-opus-4-5';
const CONTAINER_WORKSPACE = '/home/node/.openclaw/workspace';

export interface GatewayEnvironment {
    token: string | null;
    port: number | null;
}

export interface InitializedState {
    token: string | null;
    port: number;
    /** True when this call created the state directory */
    firstRun: boolean;
}

const OAuthFileSchema = z.object({
    anthropic: z.object({
        type: z.string(),
        refresh: z.string(),
        access: z.string(),
        expires: z.number(),
    }),
});

export class StateStore {
    readonly envFile: string;
    readonly configDir: string;
    readonly workspaceDir: string;
    readonly configFile: string;
    readonly agentDir: string;
    readonly sessionsDir: string;
    readonly authProfilesFile: string;
    readonly credentialsDir: string;
    readonly oauthFile: string;
    readonly dockerConfigDir: string;

    constructor(
        readonly stateDir: string = configuration.launcherHomeDir,
        readonly legacyDir: string = configuration.legacyHomeDir,
    ) {
        this.envFile = join(stateDir, '.env');
        this.configDir = join(stateDir, 'config');
        this.workspaceDir = join(stateDir, 'workspace');
        this.configFile = join(this.configDir, 'openclaw.json');
        this.agentDir = join(this.configDir, 'agents', 'default', 'agent');
        this.sessionsDir = join(this.configDir, 'agents', 'default', 'sessions');
        this.authProfilesFile = join(this.agentDir, 'auth-profiles.json');
        this.credentialsDir = join(this.configDir, 'credentials');
        this.oauthFile = join(this.credentialsDir, 'oauth.json');
        this.dockerConfigDir = join(stateDir, '.docker');
    }

    /**
     * Loads the persisted secret, or performs first-run setup when no `.env` exists yet.
     * An existing secret is never regenerated.
     */
    async loadOrInitialize(port: number): Promise<InitializedState> {
        await this.migrateLegacyDirectoryIfPresent();

        if (existsSync(this.envFile)) {
            const environment = await this.readGatewayEnvironment();
            return {
                token: environment?.token ?? null,
                port: environment?.port ?? port,
                firstRun: false,
            };
        }

        logger.debug(`[STATE] First-time setup in ${this.stateDir}`);
        await mkdir(this.configDir, { recursive: true });
        await mkdir(this.workspaceDir, { recursive: true });
        await mkdir(this.agentDir, { recursive: true });
        await mkdir(this.sessionsDir, { recursive: true });
        await mkdir(this.dockerConfigDir, { recursive: true });

        const token = generateGatewaySecret();
        await this.writeConfig(token);
        // .env last: its presence marks setup as complete
        await writeSecretFile(this.envFile, `OPENCLAW_GATEWAY_TOKEN=${token}\nOPENCLAW_PORT=${port}\n`);

        return { token, port, firstRun: true };
    }

    /** First-run setup has completed */
    isInitialized(): boolean {
        return existsSync(this.envFile);
    }

    async readGatewayEnvironment(): Promise<GatewayEnvironment | null> {
        const content = await readOptional(this.envFile);
        if (content === null) {
            return null;
        }
        const values = parseEnvFile(content);
        const token = values.get('OPENCLAW_GATEWAY_TOKEN') ?? values.get('GATEWAY_TOKEN') ?? null;
        const rawPort = values.get('OPENCLAW_PORT') ?? values.get('PORT');
        const port = rawPort !== undefined && /^\d+$/.test(rawPort) ? Number(rawPort) : null;
        return { token: token === '' ? null : token, port };
    }

    /**
     * Points `.env` at a new host port. The secret and any other entries stay as they are.
     */
    async writeGatewayPort(port: number): Promise<void> {
        const content = (await readOptional(this.envFile)) ?? '';
        const kept = content
            .split('\n')
            .filter((line) => line.trim() !== '' && !/^\s*(OPENCLAW_)?PORT\s*=/.test(line));
        await writeSecretFile(this.envFile, `${[...kept, `OPENCLAW_PORT=${port}`].join('\n')}\n`);
    }

    async readConfig(): Promise<unknown> {
        const content = await readOptional(this.configFile);
        if (content === null) {
            return null;
        }
        try {
            return JSON.parse(content);
        } catch (error) {
            logger.debug(`[STATE] Malformed ${this.configFile}`, error);
            return null;
        }
    }

    async writeOAuthCredentials(credentials: OAuthCredentialSet): Promise<void> {
        await mkdir(this.credentialsDir, { recursive: true, mode: SECRET_DIR_MODE });
        // mkdir leaves an existing directory's mode alone
        await chmod(this.credentialsDir, SECRET_DIR_MODE);
        const body = {
            anthropic: {
                type: credentials.type,
                refresh: credentials.refreshToken,
                access: credentials.accessToken,
                expires: credentials.expiresAtEpochMs,
            },
        };
        await writeSecretFile(this.oauthFile, JSON.stringify(body, null, 2));
    }

    async readOAuthCredentials(): Promise<OAuthCredentialSet | null> {
        const content = await readOptional(this.oauthFile);
        if (content === null) {
            return null;
        }
        try {
            const parsed = OAuthFileSchema.safeParse(JSON.parse(content));
            if (!parsed.success) {
                logger.debug(`[STATE] Ignoring malformed ${this.oauthFile}`);
                return null;
            }
            const { anthropic } = parsed.data;
            return {
                type: 'oauth',
                refreshToken: anthropic.refresh,
                accessToken: anthropic.access,
                expiresAtEpochMs: anthropic.expires,
            };
        } catch (error) {
            logger.debug(`[STATE] Unreadable ${this.oauthFile}`, error);
            return null;
        }
    }

    async writeApiKeyProfile(key: string): Promise<void> {
        await mkdir(this.agentDir, { recursive: true });
        const body = {
            version: 1,
            profiles: {
                'anthropic:default': {
                    type: 'api_key',
                    provider: 'anthropic',
                    key,
                },
            },
        };
        await writeSecretFile(this.authProfilesFile, JSON.stringify(body, null, 2));
    }

    hasApiKeyProfile(): boolean {
        return existsSync(this.authProfilesFile);
    }

    hasOAuthCredentials(): boolean {
        return existsSync(this.oauthFile);
    }

    /** Removes the API-key profile and OAuth credentials; secret and config stay */
    async clearCredentials(): Promise<void> {
        await rm(this.authProfilesFile, { force: true });
        await rm(this.oauthFile, { force: true });
    }

    /**
     * Moves the legacy state directory into place when only the legacy one exists.
     * Returns true when a move happened.
     */
    async migrateLegacyDirectoryIfPresent(): Promise<boolean> {
        if (!existsSync(this.legacyDir) || existsSync(this.stateDir)) {
            return false;
        }
        try {
            await mkdir(dirname(this.stateDir), { recursive: true });
            await rename(this.legacyDir, this.stateDir);
            logger.debug(`[STATE] Migrated ${this.legacyDir} -> ${this.stateDir}`);
            return true;
        } catch (error) {
            logger.warn(`Could not migrate ${this.legacyDir}: ${error instanceof Error ? error.message : String(error)}`);
            return false;
        }
    }

    /** Deletes the whole state directory, gateway secret included */
    async destroy(): Promise<void> {
        await rm(this.stateDir, { recursive: true, force: true });
    }

    private async writeConfig(token: string): Promise<void> {
        const config = {
            gateway: {
                mode: 'local',
                bind: 'lan',
                auth: {
                    mode: 'token',
                    token,
                },
                controlUi: {
                    enabled: true,
                    basePath: configuration.controlUiBasePath,
                    dangerouslyDisableDeviceAuth: true,
                },
            },
            agents: {
                defaults: {
                    workspace: CONTAINER_WORKSPACE,
                    model: { primary: DEFAULT_AGENT_MODEL },
                },
            },
        };
        await writeSecretFile(this.configFile, JSON.stringify(config, null, 2));
    }
}

export function parseEnvFile(content: string): Map<string, string> {
    const values = new Map<string, string>();
    for (const rawLine of content.split('\n')) {
        const line = rawLine.trim();
        if (line === '' || line.startsWith('#')) {
            continue;
        }
        const separator = line.indexOf('=');
        if (separator <= 0) {
            continue;
        }
        values.set(line.slice(0, separator).trim(), line.slice(separator + 1).trim());
    }
    return values;
}

async function writeSecretFile(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    const tmpPath = `${path}.tmp-${process.pid}`;
    await writeFile(tmpPath, content, { mode: SECRET_FILE_MODE });
    await rename(tmpPath, path);
    // The creation mode is subject to umask
    await chmod(path, SECRET_FILE_MODE);
}

async function readOptional(path: string): Promise<string | null> {
    try {
        return await readFile(path, 'utf8');
    } catch (error) {
        if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
            return null;
        }
        logger.debug(`[STATE] Could not read ${path}`, error);
        return null;
    }
}
