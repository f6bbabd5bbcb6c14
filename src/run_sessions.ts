/**
 * Per-run external sessions
 *
 * Provider, model and tool sessions are created on first use and released
 * together, newest first, when the run ends. Release never throws: a close
 * failure is logged and the next session is still closed.
 */

import { CommandRunner, SpawnCommandRunner } from './command_runner';
import { errorMessage } from './errors';
import { createLogger } from './logger';
import { BedrockModelClient, ModelClient } from './model_client';
import { AliyunCliProvider, ProviderApiClient } from './provider_client';
import { CommandToolProvider, ToolProvider } from './tool_provider';

const log = createLogger('sessions');

export interface MigrationCollaborators {
    createProviderClient(): ProviderApiClient;
    createModelClient(): ModelClient;
    createToolProvider(): ToolProvider;
    runner: CommandRunner;
}

export function defaultCollaborators(): MigrationCollaborators {
    const runner = new SpawnCommandRunner();
    return {
        runner,
        createProviderClient: () => new AliyunCliProvider({ runner }),
        createModelClient: () => new BedrockModelClient(),
        createToolProvider: () => new CommandToolProvider({ runner }),
    };
}

interface Session {
    connect?(): Promise<void>;
    close(): Promise<void>;
}

export class RunSessions {
    private readonly opened: Array<{ name: string; session: Session }> = [];
    private providerSession: Promise<ProviderApiClient> | null = null;
    private modelSession: Promise<ModelClient> | null = null;
    private toolSession: Promise<ToolProvider> | null = null;

    constructor(private readonly collaborators: MigrationCollaborators) {}

    provider(): Promise<ProviderApiClient> {
        if (!this.providerSession) {
            this.providerSession = this.open('provider', () => this.collaborators.createProviderClient());
        }
        return this.providerSession;
    }

    model(): Promise<ModelClient> {
        if (!this.modelSession) {
            this.modelSession = this.open('model', () => this.collaborators.createModelClient());
        }
        return this.modelSession;
    }

    tools(): Promise<ToolProvider> {
        if (!this.toolSession) {
            this.toolSession = this.open('tools', () => this.collaborators.createToolProvider());
        }
        return this.toolSession;
    }

    /** Names of sessions still held, oldest first. */
    openSessions(): string[] {
        return this.opened.map((o) => o.name);
    }

    async releaseAll(): Promise<void> {
        for (let entry = this.opened.pop(); entry; entry = this.opened.pop()) {
            try {
                await entry.session.close();
                log.debug('Session closed', { session: entry.name });
            } catch (e) {
                log.warn('Session close failed', { session: entry.name, error: errorMessage(e) });
            }
        }
        this.providerSession = null;
        this.modelSession = null;
        this.toolSession = null;
    }

    // Registered before connect so a half-open session is still released.
    private async open<T extends Session>(name: string, factory: () => T): Promise<T> {
        const session = factory();
        this.opened.push({ name, session });
        if (session.connect) {
            await session.connect();
        }
        log.debug('Session opened', { session: name });
        return session;
    }
}
