/**
 * Provider Data Normalizer
 *
 * Converts Alibaba Cloud DescribeVpcs / DescribeVSwitches payloads into the
 * canonical VPC representation. The producer never falls back on its own:
 * failures come back as `err(ExtractionDegraded)` and the caller decides
 * whether to substitute `syntheticVpc()`.
 *
 * Subnets derived from `VSwitchIds` and the default security group are
 * placeholders, not values read from the provider.
 */

import { createLogger } from './logger';
import { ExtractionDegraded, errorMessage } from './errors';
import { isRecord } from './schema_validator';
import {
    CanonicalSecurityGroup,
    CanonicalSubnet,
    CanonicalVpc,
    ProviderQuery,
    Result,
    Rule,
    err,
    ok,
} from './types';

const log = createLogger('provider_normalizer');

export const MOCK_VPC_ID = 'vpc-mock-123456';
export const DEFAULT_VPC_CIDR = '10.0.0.0/16';

/* -------------------------------------------------------------------------- */
/* Collection strategies                                                      */
/* -------------------------------------------------------------------------- */

export interface CollectionStrategy {
    name: string;
    extract(data: Record<string, unknown>): unknown[] | null;
}

function nested(outer: string, inner: string): CollectionStrategy {
    return {
        name: `${outer}.${inner}`,
        extract: (data) => {
            const container = data[outer];
            if (!isRecord(container)) return null;
            const list = container[inner];
            return Array.isArray(list) ? list : null;
        },
    };
}

function flat(key: string): CollectionStrategy {
    return {
        name: key,
        extract: (data) => {
            const list = data[key];
            return Array.isArray(list) ? list : null;
        },
    };
}

function objectOrArray(key: string): CollectionStrategy {
    return {
        name: key,
        extract: (data) => {
            const value = data[key];
            if (Array.isArray(value)) return value;
            return isRecord(value) ? [value] : null;
        },
    };
}

export const VPC_COLLECTION_STRATEGIES: readonly CollectionStrategy[] = [
    nested('Vpcs', 'Vpc'),
    flat('vpcs'),
    objectOrArray('Vpc'),
];

export const SUBNET_COLLECTION_STRATEGIES: readonly CollectionStrategy[] = [
    nested('VSwitches', 'VSwitch'),
    flat('vswitches'),
    flat('subnets'),
];

function locateCollection(
    data: Record<string, unknown>,
    strategies: readonly CollectionStrategy[]
): { strategy: string; entries: Record<string, unknown>[] } | null {
    for (const strategy of strategies) {
        const list = strategy.extract(data);
        if (list === null) continue;
        return { strategy: strategy.name, entries: list.filter(isRecord) };
    }
    return null;
}

/* -------------------------------------------------------------------------- */
/* Payload helpers                                                            */
/* -------------------------------------------------------------------------- */

/** Accepts deserialized JSON or a JSON string. Returns null for anything else. */
function toPayload(raw: unknown): Record<string, unknown> | null {
    let value = raw;
    if (typeof raw === 'string') {
        try {
            value = JSON.parse(raw);
        } catch {
            return null;
        }
    }
    if (!isRecord(value)) return null;
    const body = value.body;
    return isRecord(body) ? body : value;
}

/** First non-empty string among `keys`. */
function pick(entry: Record<string, unknown>, ...keys: string[]): string {
    for (const key of keys) {
        const v = entry[key];
        if (typeof v === 'string' && v !== '') return v;
    }
    return '';
}

function zoneLetter(index: number): string {
    return String.fromCharCode(97 + index);
}

function webIngressRules(): Rule[] {
    return [
        { protocol: 'tcp', port: '80', source: '0.0.0.0/0', direction: 'ingress' },
        { protocol: 'tcp', port: '443', source: '0.0.0.0/0', direction: 'ingress' },
    ];
}

export function defaultSecurityGroup(vpcId: string): CanonicalSecurityGroup {
    return {
        group_id: `sg-${vpcId}`,
        name: 'default-sg',
        description: 'Default security group',
        rules: webIngressRules(),
    };
}

function placeholderSubnets(entry: Record<string, unknown>, region: string): CanonicalSubnet[] {
    const container = entry.VSwitchIds;
    if (!isRecord(container)) return [];
    const ids = container.VSwitchId;
    if (!Array.isArray(ids)) return [];

    return ids
        .filter((id): id is string => typeof id === 'string')
        .map((id, i) => ({
            subnet_id: id,
            name: `subnet-${i + 1}`,
            cidr_block: `10.0.${i + 1}.0/24`,
            availability_zone: `${region}-${zoneLetter(i)}`,
            status: 'Available',
        }));
}

/* -------------------------------------------------------------------------- */
/* Public API                                                                 */
/* -------------------------------------------------------------------------- */

export function normalizeProviderResponse(
    raw: unknown,
    query: ProviderQuery
): Result<CanonicalVpc, ExtractionDegraded> {
    const requestedId = query.resourceId ?? '';
    try {
        const data = toPayload(raw);
        if (data === null) {
            return err(new ExtractionDegraded('provider response is not a JSON object'));
        }

        const found = locateCollection(data, VPC_COLLECTION_STRATEGIES);
        if (found === null || found.entries.length === 0) {
            return err(new ExtractionDegraded('no VPC entries in provider response', {
                keys: Object.keys(data),
            }));
        }

        let target = found.entries[0];
        if (requestedId) {
            const match = found.entries.find(
                (e) => e.VpcId === requestedId || e.vpc_id === requestedId
            );
            if (match) {
                target = match;
            } else {
                log.warn('Requested VPC not in response, using first entry', {
                    requested: requestedId,
                    entries: found.entries.length,
                });
            }
        }

        const vpcId = pick(target, 'VpcId', 'vpc_id') || requestedId;
        const vpc: CanonicalVpc = {
            vpc_id: vpcId,
            vpc_name: pick(target, 'VpcName', 'vpc_name') || `vpc-${vpcId}`,
            cidr_block: pick(target, 'CidrBlock', 'cidr_block') || DEFAULT_VPC_CIDR,
            region: query.region,
            status: pick(target, 'Status', 'status') || 'Available',
            subnets: placeholderSubnets(target, query.region),
            security_groups: [defaultSecurityGroup(vpcId)],
        };

        log.info('Normalized provider VPC', {
            strategy: found.strategy,
            vpc_id: vpc.vpc_id,
            vpc_name: vpc.vpc_name,
            subnets: vpc.subnets.length,
        });
        return ok(vpc);
    } catch (e) {
        return err(new ExtractionDegraded(`normalization failed: ${errorMessage(e)}`));
    }
}

export function normalizeSubnetResponse(
    raw: unknown,
    region: string
): Result<CanonicalSubnet[], ExtractionDegraded> {
    try {
        const data = toPayload(raw);
        if (data === null) {
            return err(new ExtractionDegraded('subnet response is not a JSON object'));
        }

        const found = locateCollection(data, SUBNET_COLLECTION_STRATEGIES);
        if (found === null) {
            return err(new ExtractionDegraded('no subnet collection in provider response'));
        }

        const subnets: CanonicalSubnet[] = [];
        for (const entry of found.entries) {
            const cidr = pick(entry, 'CidrBlock', 'cidr_block');
            if (!cidr) continue;
            const index = subnets.length;
            subnets.push({
                subnet_id: pick(entry, 'VSwitchId', 'vswitch_id', 'subnet_id'),
                name: pick(entry, 'VSwitchName', 'name') || `subnet-${index + 1}`,
                cidr_block: cidr,
                availability_zone: pick(entry, 'ZoneId', 'availability_zone') || `${region}-${zoneLetter(index)}`,
                status: pick(entry, 'Status', 'status') || 'Available',
            });
        }

        if (subnets.length === 0) {
            return err(new ExtractionDegraded('subnet collection has no usable entries'));
        }
        return ok(subnets);
    } catch (e) {
        return err(new ExtractionDegraded(`subnet normalization failed: ${errorMessage(e)}`));
    }
}

/** Deterministic placeholder used whenever real data cannot be obtained. */
export function syntheticVpc(query: ProviderQuery): CanonicalVpc {
    const region = query.region;
    return {
        vpc_id: query.resourceId || MOCK_VPC_ID,
        vpc_name: 'demo-vpc',
        cidr_block: DEFAULT_VPC_CIDR,
        region,
        status: 'Available',
        subnets: [
            {
                subnet_id: 'vsw-mock-123456',
                name: 'demo-subnet-1',
                cidr_block: '10.0.1.0/24',
                availability_zone: `${region}-a`,
                status: 'Available',
            },
            {
                subnet_id: 'vsw-mock-789012',
                name: 'demo-subnet-2',
                cidr_block: '10.0.2.0/24',
                availability_zone: `${region}-b`,
                status: 'Available',
            },
        ],
        security_groups: [
            {
                group_id: 'sg-mock-123456',
                name: 'demo-sg',
                description: 'Demo security group',
                rules: webIngressRules(),
            },
        ],
    };
}

/** Normalize, substituting the synthetic VPC on any failure. Never throws. */
export function normalizeVpc(raw: unknown, query: ProviderQuery): CanonicalVpc {
    const result = normalizeProviderResponse(raw, query);
    if (result.ok) return result.value;
    log.warn('Using synthetic VPC', { reason: result.error.message });
    return syntheticVpc(query);
}
