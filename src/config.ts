/**
 * Shared Configuration Constants
 *
 * Centralized configuration for the migration kernel.
 * Values can be overridden via environment variables.
 */

import * as path from 'path';

function envInt(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const n = parseInt(raw, 10);
    return Number.isFinite(n) && n > 0 ? n : fallback;
}

// Model used for both semantic parsing and stack generation
export const DEFAULT_MODEL_ID = process.env.VPCMIG_MODEL_ID || 'anthropic.claude-3-5-haiku-20241022-v1:0';

export const BEDROCK_REGION = process.env.VPCMIG_BEDROCK_REGION || process.env.AWS_REGION || 'us-west-2';

// Bedrock messages API version tag
export const ANTHROPIC_VERSION = 'bedrock-2023-05-31';

// Max output tokens per model call
export const MAX_OUTPUT_TOKENS = {
    VPC_PARSE: envInt('VPCMIG_MAX_TOKENS_VPC', 2000),
    SUBNET_PARSE: envInt('VPCMIG_MAX_TOKENS_SUBNET', 1500),
    CODE_GEN: envInt('VPCMIG_MAX_TOKENS_CODE', 2000),
};

// Timeouts (milliseconds)
export const TIMEOUTS = {
    SEMANTIC_PARSE_MS: 30000,
    MODEL_CALL_MS: envInt('VPCMIG_MODEL_TIMEOUT', 120000),
    PROVIDER_CALL_MS: envInt('VPCMIG_PROVIDER_TIMEOUT', 60000),
    TOOL_CALL_MS: 60000,
    SCAFFOLD_MS: 300000,          // 5 minutes
    INSTALL_MS: 600000,           // 10 minutes
    BOOTSTRAP_MS: 600000,
    DEPLOY_MS: envInt('VPCMIG_DEPLOY_TIMEOUT', 1800000), // 30 minutes
};

export const GENERATION = {
    MAX_ITERATIONS: envInt('VPCMIG_MAX_TOOL_ITERATIONS', 10),
    TOOL_RESULT_CACHE_ENTRIES: 64,
};

export const DEFAULT_SOURCE_REGION = 'cn-hangzhou';

// Source zone -> target zone. Unmapped zones land in DEFAULT_TARGET_ZONE.
export const ZONE_MAP: Readonly<Record<string, string>> = {
    'cn-hangzhou-a': 'us-east-1a',
    'cn-hangzhou-b': 'us-east-1b',
};

export const DEFAULT_TARGET_ZONE = 'us-east-1a';

export const TOOLCHAIN = {
    CDK_BIN: process.env.VPCMIG_CDK_BIN || 'cdk',
    NPM_BIN: process.env.VPCMIG_NPM_BIN || 'npm',
    ALIYUN_BIN: process.env.VPCMIG_ALIYUN_BIN || 'aliyun',
};

export const TOOL_CATALOGUE_PATH =
    process.env.VPCMIG_TOOL_CATALOGUE || path.resolve(__dirname, '..', 'config', 'toolchain_tools.json');

// Error snippets carried into logs and state
export const SANITIZE = {
    ERROR_SNIPPET_MAX_CHARS: 500,
};
