/**
 * Semantic Parser
 *
 * Recovers canonical VPC / subnet records from provider output that is not
 * JSON, by asking the model for a bare JSON rendition and pulling the JSON
 * back out of whatever it answers. Model failures, unparseable answers and
 * schema mismatches all end in the degraded path; nothing here throws.
 */

import { DEFAULT_MODEL_ID, MAX_OUTPUT_TOKENS } from './config';
import { ExtractionDegraded, errorMessage } from './errors';
import { createLogger } from './logger';
import { ModelClient, responseText } from './model_client';
import { getSubnetParsePrompt, getVpcParsePrompt } from './prompts';
import { SCHEMA_IDS, createCanonicalValidator, isRecord } from './schema_validator';
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

const log = createLogger('semantic_parser');
const validator = createCanonicalValidator();

export type JsonShape = 'object' | 'array';

const DELIMITERS: Record<JsonShape, [string, string]> = {
    object: ['{', '}'],
    array: ['[', ']'],
};

/**
 * Parse `text` as JSON; failing that, parse the greedy span from the first
 * opening delimiter to the last closing one.
 */
export function extractJson(text: string, shape: JsonShape): Result<unknown, string> {
    try {
        return ok(JSON.parse(text));
    } catch {
        // fall through to the delimited span
    }

    const [open, close] = DELIMITERS[shape];
    const start = text.indexOf(open);
    const end = text.lastIndexOf(close);
    if (start < 0 || end <= start) {
        return err(`no ${shape} found in model output`);
    }

    try {
        return ok(JSON.parse(text.slice(start, end + 1)));
    } catch (e) {
        return err(`embedded ${shape} is not valid JSON: ${errorMessage(e)}`);
    }
}

/* -------------------------------------------------------------------------- */
/* Coercion (runs after schema validation, so present fields are well typed)  */
/* -------------------------------------------------------------------------- */

function str(v: unknown): string {
    return typeof v === 'string' ? v : '';
}

function records(v: unknown): Record<string, unknown>[] {
    return Array.isArray(v) ? v.filter(isRecord) : [];
}

function toSubnet(raw: Record<string, unknown>): CanonicalSubnet {
    return {
        subnet_id: str(raw.subnet_id),
        name: str(raw.name),
        cidr_block: str(raw.cidr_block),
        availability_zone: str(raw.availability_zone),
        status: str(raw.status),
    };
}

function toRule(raw: Record<string, unknown>): Rule {
    return {
        protocol: str(raw.protocol),
        port: typeof raw.port === 'number' ? String(raw.port) : str(raw.port),
        source: str(raw.source),
        direction: raw.direction === 'egress' ? 'egress' : 'ingress',
    };
}

function toSecurityGroup(raw: Record<string, unknown>): CanonicalSecurityGroup {
    return {
        group_id: str(raw.group_id),
        name: str(raw.name),
        description: str(raw.description),
        rules: records(raw.rules).map(toRule),
    };
}

function toCanonicalVpc(raw: Record<string, unknown>, query: ProviderQuery): CanonicalVpc {
    return {
        vpc_id: str(raw.vpc_id) || query.resourceId || '',
        vpc_name: str(raw.vpc_name),
        cidr_block: str(raw.cidr_block),
        region: str(raw.region) || query.region,
        status: str(raw.status),
        subnets: records(raw.subnets).map(toSubnet),
        security_groups: records(raw.security_groups).map(toSecurityGroup),
    };
}

/* -------------------------------------------------------------------------- */
/* Entry points                                                               */
/* -------------------------------------------------------------------------- */

export async function parseVpcText(
    model: ModelClient,
    text: string,
    query: ProviderQuery
): Promise<Result<CanonicalVpc, ExtractionDegraded>> {
    log.info('Parsing VPC text with model', { chars: text.length });

    let answer: string;
    try {
        const resp = await model.invoke({
            model_id: DEFAULT_MODEL_ID,
            max_tokens: MAX_OUTPUT_TOKENS.VPC_PARSE,
            messages: [{ role: 'user', content: getVpcParsePrompt(text, query.region) }],
        });
        answer = responseText(resp);
    } catch (e) {
        return err(new ExtractionDegraded(`model call failed: ${errorMessage(e)}`));
    }

    const parsed = extractJson(answer, 'object');
    if (!parsed.ok) {
        return err(new ExtractionDegraded(parsed.error));
    }
    if (!isRecord(parsed.value)) {
        return err(new ExtractionDegraded('model output is not a JSON object'));
    }

    const check = validator.validate(parsed.value, SCHEMA_IDS.CANONICAL_VPC);
    if (!check.valid) {
        return err(new ExtractionDegraded('model output does not match the VPC schema', {
            errors: check.errors.slice(0, 5),
        }));
    }

    const vpc = toCanonicalVpc(parsed.value, query);
    log.info('Parsed VPC from model output', { vpc_id: vpc.vpc_id, subnets: vpc.subnets.length });
    return ok(vpc);
}

/** Array variant. Any failure yields an empty list. */
export async function parseSubnetText(
    model: ModelClient,
    text: string,
    region: string
): Promise<CanonicalSubnet[]> {
    try {
        const resp = await model.invoke({
            model_id: DEFAULT_MODEL_ID,
            max_tokens: MAX_OUTPUT_TOKENS.SUBNET_PARSE,
            messages: [{ role: 'user', content: getSubnetParsePrompt(text) }],
        });

        const parsed = extractJson(responseText(resp), 'array');
        if (!parsed.ok) {
            log.warn('Subnet parse failed', { region, reason: parsed.error });
            return [];
        }

        const check = validator.validate(parsed.value, SCHEMA_IDS.CANONICAL_SUBNET_LIST);
        if (!check.valid) {
            log.warn('Subnet output does not match schema', { region, errors: check.errors.slice(0, 5) });
            return [];
        }

        return records(parsed.value).map(toSubnet);
    } catch (e) {
        log.warn('Subnet parse failed', { region, reason: errorMessage(e) });
        return [];
    }
}
