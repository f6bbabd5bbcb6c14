/**
 * Provider API client - Alibaba Cloud VPC queries through the `aliyun` CLI
 *
 * The client hands back whatever the provider produced, decoded as far as
 * it will go: JSON when the output parses, opaque text otherwise. Turning
 * that into a CanonicalVpc is the normalizer's (or the parser's) job.
 */

import { TIMEOUTS, TOOLCHAIN } from './config';
import { CommandRunner } from './command_runner';
import { ProviderCallError } from './errors';
import { createLogger } from './logger';
import { ProviderQuery } from './types';

const log = createLogger('provider-client');

export type ProviderPayload =
    | { kind: 'json'; body: unknown }
    | { kind: 'text'; text: string };

export interface ProviderApiClient {
    connect(): Promise<void>;
    describeVpcs(query: ProviderQuery): Promise<ProviderPayload>;
    /** Optional subnet detail lookup for one VPC. */
    describeSubnets?(vpcId: string, region: string): Promise<ProviderPayload>;
    close(): Promise<void>;
}

export function decodeProviderPayload(output: string): ProviderPayload {
    const trimmed = output.trim();
    try {
        return { kind: 'json', body: JSON.parse(trimmed) };
    } catch {
        return { kind: 'text', text: output };
    }
}

export interface AliyunCliProviderConfig {
    runner: CommandRunner;
    bin?: string;
    timeoutMs?: number;
}

export class AliyunCliProvider implements ProviderApiClient {
    private readonly runner: CommandRunner;
    private readonly bin: string;
    private readonly timeoutMs: number;
    private connected = false;

    constructor(config: AliyunCliProviderConfig) {
        this.runner = config.runner;
        this.bin = config.bin ?? TOOLCHAIN.ALIYUN_BIN;
        this.timeoutMs = config.timeoutMs ?? TIMEOUTS.PROVIDER_CALL_MS;
    }

    /** Verifies the CLI is runnable. */
    async connect(): Promise<void> {
        const res = await this.runner.run({ command: this.bin, args: ['version'], timeoutMs: this.timeoutMs });
        if (res.exitCode !== 0) {
            throw new ProviderCallError(`${this.bin} is not available (exit ${res.exitCode}): ${res.stderr}`, {
                exit_code: res.exitCode,
            });
        }
        this.connected = true;
        log.info('Provider CLI ready', { bin: this.bin, version: res.stdout.trim() });
    }

    async describeVpcs(query: ProviderQuery): Promise<ProviderPayload> {
        const args = ['vpc', 'DescribeVpcs', '--RegionId', query.region];
        if (query.resourceId) args.push('--VpcId', query.resourceId);
        return this.call(args);
    }

    async describeSubnets(vpcId: string, region: string): Promise<ProviderPayload> {
        return this.call(['vpc', 'DescribeVSwitches', '--RegionId', region, '--VpcId', vpcId]);
    }

    async close(): Promise<void> {
        this.connected = false;
    }

    private async call(args: string[]): Promise<ProviderPayload> {
        if (!this.connected) {
            throw new ProviderCallError('provider client is not connected');
        }
        const res = await this.runner.run({ command: this.bin, args, timeoutMs: this.timeoutMs });
        if (res.exitCode !== 0) {
            throw new ProviderCallError(`${args.slice(0, 2).join(' ')} failed (exit ${res.exitCode}): ${res.stderr}`, {
                action: args[1],
                exit_code: res.exitCode,
            });
        }
        log.info('Provider response received', { action: args[1], chars: res.stdout.length });
        return decodeProviderPayload(res.stdout);
    }
}
