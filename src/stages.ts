/**
 * Workflow stages
 *
 * Each stage reads and mutates the shared WorkflowState and either returns
 * normally (status advanced) or throws. Extraction is the exception: every
 * failure on that path is absorbed into the synthetic VPC.
 */

import * as path from 'path';
import { TIMEOUTS } from './config';
import { StackCodeGenerator, StackCodeGeneratorOptions, buildStackDescription } from './code_generator';
import { ExtractionDegraded, TransformError, errorMessage, toStructuredError } from './errors';
import { createLogger } from './logger';
import {
    normalizeProviderResponse,
    normalizeSubnetResponse,
    syntheticVpc,
} from './provider_normalizer';
import { ProviderApiClient } from './provider_client';
import { RunSessions } from './run_sessions';
import { transformVpc } from './schema_transformer';
import { parseSubnetText, parseVpcText } from './semantic_parser';
import { withTimeout } from './timeout';
import { ToolchainDriver } from './toolchain_driver';
import { CanonicalSubnet, CanonicalVpc, ProviderQuery, Result, WorkflowState, WorkflowStatus } from './types';

const log = createLogger('stages');

export interface StageTimeouts {
    providerCallMs: number;
    semanticParseMs: number;
}

export interface StageContext {
    sessions: RunSessions;
    toolchain: ToolchainDriver;
    generator?: StackCodeGeneratorOptions;
    /** Overrides for the extraction timeouts in TIMEOUTS. */
    timeouts?: Partial<StageTimeouts>;
}

function stageTimeouts(ctx: StageContext): StageTimeouts {
    return {
        providerCallMs: ctx.timeouts?.providerCallMs ?? TIMEOUTS.PROVIDER_CALL_MS,
        semanticParseMs: ctx.timeouts?.semanticParseMs ?? TIMEOUTS.SEMANTIC_PARSE_MS,
    };
}

export type Stage = (state: WorkflowState, ctx: StageContext) => Promise<void>;

/* -------------------------------------------------------------------------- */
/* Status transitions                                                         */
/* -------------------------------------------------------------------------- */

const STATUS_ORDER: readonly WorkflowStatus[] = [
    'started',
    'vpc_extracted',
    'data_transformed',
    'cdk_generated',
    'completed',
];

/** Move status forward. Re-entering the current status is allowed; going back is not. */
export function advance(state: WorkflowState, next: WorkflowStatus): void {
    if (state.status === 'error') {
        throw new Error(`Cannot advance to ${next}: run is in error`);
    }
    if (STATUS_ORDER.indexOf(next) < STATUS_ORDER.indexOf(state.status)) {
        throw new Error(`Status regression: ${state.status} -> ${next}`);
    }
    state.status = next;
}

export function markError(state: WorkflowState, e: unknown): void {
    state.status = 'error';
    state.errorMessage = errorMessage(e) || (e instanceof Error ? e.name : 'Unknown error');
}

/* -------------------------------------------------------------------------- */
/* Extract                                                                    */
/* -------------------------------------------------------------------------- */

function queryOf(state: WorkflowState): ProviderQuery {
    return { resourceId: state.sourceConfig.resourceId, region: state.sourceConfig.region };
}

interface FetchedVpc {
    result: Result<CanonicalVpc, ExtractionDegraded>;
    provider: ProviderApiClient;
}

async function fetchVpc(ctx: StageContext, query: ProviderQuery): Promise<FetchedVpc> {
    const timeouts = stageTimeouts(ctx);
    const provider = await ctx.sessions.provider();
    const payload = await withTimeout(provider.describeVpcs(query), timeouts.providerCallMs, 'DescribeVpcs');

    if (payload.kind === 'json') {
        return { result: normalizeProviderResponse(payload.body, query), provider };
    }

    log.info('Provider response is not JSON, using model parsing', { chars: payload.text.length });
    const model = await ctx.sessions.model();
    const result = await withTimeout(
        parseVpcText(model, payload.text, query),
        timeouts.semanticParseMs,
        'semantic parse'
    );
    return { result, provider };
}

/** Replace placeholder subnets with provider detail when it can be had. */
async function enrichSubnets(
    vpc: CanonicalVpc,
    provider: ProviderApiClient,
    ctx: StageContext
): Promise<CanonicalVpc> {
    if (!provider.describeSubnets || !vpc.vpc_id) return vpc;

    const timeouts = stageTimeouts(ctx);
    try {
        const payload = await withTimeout(
            provider.describeSubnets(vpc.vpc_id, vpc.region),
            timeouts.providerCallMs,
            'DescribeVSwitches'
        );

        let subnets: CanonicalSubnet[] = [];
        if (payload.kind === 'json') {
            const result = normalizeSubnetResponse(payload.body, vpc.region);
            if (result.ok) {
                subnets = result.value;
            } else {
                log.warn('Subnet detail unusable, keeping placeholders', { reason: result.error.message });
            }
        } else {
            const model = await ctx.sessions.model();
            subnets = await withTimeout(
                parseSubnetText(model, payload.text, vpc.region),
                timeouts.semanticParseMs,
                'subnet parse'
            );
        }

        if (subnets.length === 0) return vpc;
        log.info('Subnets enriched from provider detail', { subnets: subnets.length });
        return { ...vpc, subnets };
    } catch (e) {
        log.warn('Subnet detail lookup failed, keeping placeholders', { error: errorMessage(e) });
        return vpc;
    }
}

export const extractStage: Stage = async (state, ctx) => {
    const query = queryOf(state);
    log.info('Extracting source VPC', { resource_id: query.resourceId ?? null, region: query.region });

    let vpc: CanonicalVpc | null = null;
    try {
        const { result, provider } = await fetchVpc(ctx, query);
        if (result.ok) {
            vpc = await enrichSubnets(result.value, provider, ctx);
        } else {
            log.warn('Extraction degraded', { ...toStructuredError(result.error) });
        }
    } catch (e) {
        log.warn('Extraction failed', { ...toStructuredError(e) });
    }

    if (vpc) {
        state.sourceData = vpc;
        state.extractionDegraded = false;
    } else {
        state.sourceData = syntheticVpc(query);
        state.extractionDegraded = true;
        log.warn('Using synthetic VPC', { vpc_id: state.sourceData.vpc_id });
    }
    advance(state, 'vpc_extracted');
};

/* -------------------------------------------------------------------------- */
/* Transform / generate / deploy                                              */
/* -------------------------------------------------------------------------- */

export const transformStage: Stage = async (state) => {
    if (!state.sourceData) {
        throw new TransformError('sourceData');
    }
    state.transformedData = transformVpc(state.sourceData);
    log.info('Transformed VPC', {
        name: state.transformedData.vpc.name,
        subnets: state.transformedData.subnets.length,
        security_groups: state.transformedData.securityGroups.length,
    });
    advance(state, 'data_transformed');
};

export const generateStage: Stage = async (state, ctx) => {
    if (!state.transformedData) {
        throw new TransformError('transformedData', 'no target descriptor to generate from');
    }

    const projectPath = path.resolve(state.targetDirectory, state.targetProjectName);
    await ctx.toolchain.scaffold(projectPath);
    state.projectPath = projectPath;

    const generator = new StackCodeGenerator(await ctx.sessions.model(), await ctx.sessions.tools(), ctx.generator);
    const description = buildStackDescription(state.transformedData, state.targetProjectName);
    const result = await generator.generate(description);

    ctx.toolchain.writeProjectFiles(projectPath, state.targetProjectName, result.code);
    state.generatedCode = result.code;
    advance(state, 'cdk_generated');
};

export const deployStage: Stage = async (state, ctx) => {
    if (!state.projectPath) {
        throw new Error('No project path to deploy');
    }
    state.deploymentResult = await ctx.toolchain.deploy(state.projectPath);
    advance(state, 'completed');
};

export const STAGES: ReadonlyArray<{ name: string; run: Stage }> = [
    { name: 'extract', run: extractStage },
    { name: 'transform', run: transformStage },
    { name: 'generate', run: generateStage },
    { name: 'deploy', run: deployStage },
];
