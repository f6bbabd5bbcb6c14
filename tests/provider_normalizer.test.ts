import test from 'node:test';
import assert from 'node:assert/strict';
import {
    MOCK_VPC_ID,
    normalizeProviderResponse,
    normalizeSubnetResponse,
    normalizeVpc,
    syntheticVpc,
} from '../src/provider_normalizer';
import { ExtractionDegraded } from '../src/errors';

const QUERY = { resourceId: 'vpc-1', region: 'cn-hangzhou' };

const DESCRIBE_VPCS = {
    body: {
        RequestId: 'req-1',
        TotalCount: 2,
        Vpcs: {
            Vpc: [
                {
                    VpcId: 'vpc-0',
                    VpcName: 'other',
                    CidrBlock: '192.168.0.0/16',
                    Status: 'Available',
                },
                {
                    VpcId: 'vpc-1',
                    VpcName: 'prod-network',
                    CidrBlock: '172.16.0.0/12',
                    Status: 'Pending',
                    VSwitchIds: { VSwitchId: ['vsw-a', 'vsw-b'] },
                },
            ],
        },
    },
};

test('unwraps the body envelope and selects the requested VPC', () => {
    const result = normalizeProviderResponse(DESCRIBE_VPCS, QUERY);
    assert.ok(result.ok);
    assert.deepEqual(result.value, {
        vpc_id: 'vpc-1',
        vpc_name: 'prod-network',
        cidr_block: '172.16.0.0/12',
        region: 'cn-hangzhou',
        status: 'Pending',
        subnets: [
            {
                subnet_id: 'vsw-a',
                name: 'subnet-1',
                cidr_block: '10.0.1.0/24',
                availability_zone: 'cn-hangzhou-a',
                status: 'Available',
            },
            {
                subnet_id: 'vsw-b',
                name: 'subnet-2',
                cidr_block: '10.0.2.0/24',
                availability_zone: 'cn-hangzhou-b',
                status: 'Available',
            },
        ],
        security_groups: [
            {
                group_id: 'sg-vpc-1',
                name: 'default-sg',
                description: 'Default security group',
                rules: [
                    { protocol: 'tcp', port: '80', source: '0.0.0.0/0', direction: 'ingress' },
                    { protocol: 'tcp', port: '443', source: '0.0.0.0/0', direction: 'ingress' },
                ],
            },
        ],
    });
});

test('falls back to the first entry when the requested id is absent', () => {
    const result = normalizeProviderResponse(DESCRIBE_VPCS, { resourceId: 'vpc-9', region: 'cn-hangzhou' });
    assert.ok(result.ok);
    assert.equal(result.value.vpc_id, 'vpc-0');
    assert.equal(result.value.vpc_name, 'other');
});

test('accepts the lowercase and single-object collection shapes', () => {
    const lower = normalizeProviderResponse(
        { vpcs: [{ vpc_id: 'vpc-1', vpc_name: 'lower', cidr_block: '10.1.0.0/16', status: 'Available' }] },
        QUERY
    );
    assert.ok(lower.ok);
    assert.equal(lower.value.vpc_name, 'lower');
    assert.equal(lower.value.cidr_block, '10.1.0.0/16');

    const single = normalizeProviderResponse({ Vpc: { VpcId: 'vpc-1', VpcName: 'single' } }, QUERY);
    assert.ok(single.ok);
    assert.equal(single.value.vpc_name, 'single');
    assert.equal(single.value.cidr_block, '10.0.0.0/16');
    assert.equal(single.value.status, 'Available');
    assert.deepEqual(single.value.subnets, []);
});

test('parses a JSON string payload', () => {
    const result = normalizeProviderResponse(JSON.stringify({ Vpcs: { Vpc: [{ VpcId: 'vpc-1' }] } }), QUERY);
    assert.ok(result.ok);
    assert.equal(result.value.vpc_name, 'vpc-vpc-1');
});

test('malformed and empty inputs degrade instead of throwing', () => {
    const inputs: unknown[] = [null, undefined, 'not json', 42, [], {}, { body: { Vpcs: { Vpc: [] } } }, { Vpcs: 'x' }];
    for (const raw of inputs) {
        const result = normalizeProviderResponse(raw, QUERY);
        assert.equal(result.ok, false);
        if (!result.ok) assert.ok(result.error instanceof ExtractionDegraded);

        const vpc = normalizeVpc(raw, QUERY);
        assert.ok(Array.isArray(vpc.subnets));
        assert.ok(Array.isArray(vpc.security_groups));
        assert.equal(vpc.vpc_id, 'vpc-1');
    }
});

test('synthetic VPC is deterministic and uses the mock id without a request id', () => {
    const vpc = syntheticVpc({ region: 'cn-shanghai' });
    assert.equal(vpc.vpc_id, MOCK_VPC_ID);
    assert.equal(vpc.vpc_name, 'demo-vpc');
    assert.deepEqual(
        vpc.subnets.map((s) => [s.subnet_id, s.name, s.cidr_block, s.availability_zone]),
        [
            ['vsw-mock-123456', 'demo-subnet-1', '10.0.1.0/24', 'cn-shanghai-a'],
            ['vsw-mock-789012', 'demo-subnet-2', '10.0.2.0/24', 'cn-shanghai-b'],
        ]
    );
    assert.equal(vpc.security_groups.length, 1);
    assert.deepEqual(
        vpc.security_groups[0].rules.map((r) => r.port),
        ['80', '443']
    );
    assert.deepEqual(syntheticVpc({ region: 'cn-shanghai' }), vpc);
});

test('subnet detail responses map VSwitch fields and drop entries without a CIDR', () => {
    const result = normalizeSubnetResponse(
        {
            VSwitches: {
                VSwitch: [
                    { VSwitchId: 'vsw-a', VSwitchName: 'web', CidrBlock: '172.16.1.0/24', ZoneId: 'cn-hangzhou-b', Status: 'Available' },
                    { VSwitchId: 'vsw-x', VSwitchName: 'broken' },
                ],
            },
        },
        'cn-hangzhou'
    );
    assert.ok(result.ok);
    assert.deepEqual(result.value, [
        {
            subnet_id: 'vsw-a',
            name: 'web',
            cidr_block: '172.16.1.0/24',
            availability_zone: 'cn-hangzhou-b',
            status: 'Available',
        },
    ]);

    assert.equal(normalizeSubnetResponse({ VSwitches: { VSwitch: [] } }, 'cn-hangzhou').ok, false);
    assert.equal(normalizeSubnetResponse('garbage', 'cn-hangzhou').ok, false);
});
