/**
 * Schema Transformer - canonical source VPC to AWS-shaped target descriptor
 *
 * Pure and deterministic: the same input always yields a structurally equal
 * descriptor, and no I/O happens here.
 */

import { DEFAULT_TARGET_ZONE, ZONE_MAP } from './config';
import { TransformError } from './errors';
import {
    CanonicalSecurityGroup,
    CanonicalSubnet,
    CanonicalVpc,
    Rule,
    TargetRule,
    TargetSecurityGroup,
    TargetSubnet,
    TargetVpcDescriptor,
} from './types';

const PORT_PATTERN = /^\d{1,5}$/;
const MAX_PORT = 65535;

/** CDK construct ids use underscores where the source allows dashes. */
export function toIdentifier(name: string): string {
    return name.replace(/-/g, '_');
}

export function mapZone(sourceZone: string): string {
    return Object.prototype.hasOwnProperty.call(ZONE_MAP, sourceZone)
        ? ZONE_MAP[sourceZone]
        : DEFAULT_TARGET_ZONE;
}

function requireField(value: string | undefined, field: string): string {
    if (typeof value !== 'string' || value.trim() === '') {
        throw new TransformError(field);
    }
    return value;
}

function transformRule(rule: Rule, path: string): TargetRule {
    if (!PORT_PATTERN.test(rule.port)) {
        throw new TransformError(`${path}.port`, `not a single integer port: '${rule.port}'`);
    }
    const port = parseInt(rule.port, 10);
    if (port > MAX_PORT) {
        throw new TransformError(`${path}.port`, `port out of range 0-${MAX_PORT}: '${rule.port}'`);
    }
    return {
        protocol: rule.protocol,
        fromPort: port,
        toPort: port,
        cidrBlocks: [rule.source],
    };
}

function transformSubnet(subnet: CanonicalSubnet, index: number): TargetSubnet {
    const cidr = requireField(subnet.cidr_block, `subnets[${index}].cidr_block`);
    return {
        name: toIdentifier(subnet.name),
        cidr,
        availabilityZone: mapZone(subnet.availability_zone),
        mapPublicIpOnLaunch: true,
    };
}

function transformSecurityGroup(group: CanonicalSecurityGroup, index: number): TargetSecurityGroup {
    const ingressRules: TargetRule[] = [];
    const egressRules: TargetRule[] = [];

    group.rules.forEach((rule, r) => {
        const target = transformRule(rule, `security_groups[${index}].rules[${r}]`);
        if (rule.direction === 'egress') {
            egressRules.push(target);
        } else {
            ingressRules.push(target);
        }
    });

    return {
        name: toIdentifier(group.name),
        description: `Migrated from source security group ${group.group_id}`,
        ingressRules,
        egressRules,
    };
}

export function transformVpc(vpc: CanonicalVpc): TargetVpcDescriptor {
    const name = requireField(vpc.vpc_name, 'vpc_name');
    const cidr = requireField(vpc.cidr_block, 'cidr_block');

    return {
        vpc: {
            name: toIdentifier(name),
            cidr,
            enableDnsHostnames: true,
            enableDnsSupport: true,
        },
        subnets: vpc.subnets.map(transformSubnet),
        securityGroups: vpc.security_groups.map(transformSecurityGroup),
    };
}
