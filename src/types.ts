export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
    return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
    return { ok: false, error };
}

/* -------------------------------------------------------------------------- */
/* Canonical source representation                                            */
/* -------------------------------------------------------------------------- */

export type RuleDirection = 'ingress' | 'egress';

export interface Rule {
    protocol: string;
    port: string;
    source: string; // CIDR
    direction: RuleDirection;
}

export interface CanonicalSubnet {
    subnet_id: string;
    name: string;
    cidr_block: string;
    availability_zone: string;
    status: string;
}

export interface CanonicalSecurityGroup {
    group_id: string;
    name: string;
    description: string;
    rules: Rule[];
}

/** Pivot shape between provider schemas. `subnets` / `security_groups` are never omitted. */
export interface CanonicalVpc {
    vpc_id: string;
    vpc_name: string;
    cidr_block: string;
    region: string;
    status: string;
    subnets: CanonicalSubnet[];
    security_groups: CanonicalSecurityGroup[];
}

/* -------------------------------------------------------------------------- */
/* Target representation                                                      */
/* -------------------------------------------------------------------------- */

export interface TargetRule {
    protocol: string;
    fromPort: number;
    toPort: number;
    cidrBlocks: string[];
}

export interface TargetSubnet {
    name: string;
    cidr: string;
    availabilityZone: string;
    mapPublicIpOnLaunch: boolean;
}

export interface TargetSecurityGroup {
    name: string;
    description: string;
    ingressRules: TargetRule[];
    egressRules: TargetRule[];
}

export interface TargetVpcDescriptor {
    vpc: {
        name: string;
        cidr: string;
        enableDnsHostnames: boolean;
        enableDnsSupport: boolean;
    };
    subnets: TargetSubnet[];
    securityGroups: TargetSecurityGroup[];
}

/* -------------------------------------------------------------------------- */
/* Workflow                                                                   */
/* -------------------------------------------------------------------------- */

export type WorkflowStatus =
    | 'started'
    | 'vpc_extracted'
    | 'data_transformed'
    | 'cdk_generated'
    | 'completed'
    | 'error';

export interface SourceConfig {
    provider: string;
    resourceId?: string;
    region: string;
}

/** Selector handed to the provider client and the normalizer. */
export interface ProviderQuery {
    resourceId?: string;
    region: string;
}

export interface DeploymentResult {
    status: 'deployed';
    output: string;
    projectPath: string;
}

export interface WorkflowState {
    runId: string;
    sourceConfig: SourceConfig;
    targetProjectName: string;
    targetDirectory: string;

    sourceData: CanonicalVpc | null;
    transformedData: TargetVpcDescriptor | null;
    generatedCode: string;
    projectPath: string;

    deploymentResult: DeploymentResult | null;
    status: WorkflowStatus;
    errorMessage?: string;
    extractionDegraded: boolean;
}
