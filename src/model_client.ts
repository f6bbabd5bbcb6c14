// model_client.ts - Anthropic messages on Amazon Bedrock

import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { ANTHROPIC_VERSION, BEDROCK_REGION, TIMEOUTS } from './config';
import { ModelCallError, errorMessage } from './errors';
import { createLogger } from './logger';
import { JsonSchema, isRecord } from './schema_validator';
import { withTimeout } from './timeout';

const log = createLogger('model-client');

// ============================================================================
// Types
// ============================================================================

export interface TextBlock {
    type: 'text';
    text: string;
}

export interface ToolUseBlock {
    type: 'tool_use';
    id: string;
    name: string;
    input: Record<string, unknown>;
}

export interface ToolResultBlock {
    type: 'tool_result';
    tool_use_id: string;
    content: string;
    is_error?: boolean;
}

export type ContentBlock = TextBlock | ToolUseBlock | ToolResultBlock;

export type ModelRole = 'user' | 'assistant';

export interface ModelMessage {
    role: ModelRole;
    content: string | ContentBlock[];
}

export interface ToolDescriptor {
    name: string;
    description: string;
    input_schema: JsonSchema;
}

export interface ModelRequest {
    model_id: string;
    messages: ModelMessage[];
    max_tokens: number;
    tools?: ToolDescriptor[];
}

export interface ModelResponse {
    content: Array<TextBlock | ToolUseBlock>;
    stop_reason: string | null;
    usage: {
        input_tokens: number;
        output_tokens: number;
    };
    model_id: string;
    latency_ms: number;
}

/** LLM collaborator. Invocation failures reject; nothing here retries. */
export interface ModelClient {
    invoke(req: ModelRequest): Promise<ModelResponse>;
    close(): Promise<void>;
}

export function responseText(resp: Pick<ModelResponse, 'content'>): string {
    return resp.content
        .filter((b): b is TextBlock => b.type === 'text')
        .map((b) => b.text)
        .join('\n');
}

export function toolUses(resp: Pick<ModelResponse, 'content'>): ToolUseBlock[] {
    return resp.content.filter((b): b is ToolUseBlock => b.type === 'tool_use');
}

// ============================================================================
// Response decoding
// ============================================================================

function clampInt(v: unknown): number {
    return typeof v === 'number' && Number.isFinite(v) && v >= 0 ? Math.floor(v) : 0;
}

function decodeBlock(raw: unknown): TextBlock | ToolUseBlock | null {
    if (!isRecord(raw)) return null;
    if (raw.type === 'text' && typeof raw.text === 'string') {
        return { type: 'text', text: raw.text };
    }
    if (raw.type === 'tool_use' && typeof raw.id === 'string' && typeof raw.name === 'string') {
        return {
            type: 'tool_use',
            id: raw.id,
            name: raw.name,
            input: isRecord(raw.input) ? raw.input : {},
        };
    }
    // Unknown block kinds are dropped
    return null;
}

/**
 * Decode an Anthropic messages response body. Throws ModelCallError when the
 * body is not JSON or carries no content array.
 */
export function parseBedrockBody(
    bodyText: string,
    modelId: string
): Pick<ModelResponse, 'content' | 'stop_reason' | 'usage'> {
    let data: unknown;
    try {
        data = JSON.parse(bodyText);
    } catch {
        throw new ModelCallError('provider_response_not_json', modelId, bodyText);
    }

    if (!isRecord(data) || !Array.isArray(data.content)) {
        throw new ModelCallError('provider_response_missing_content', modelId, bodyText);
    }

    const content: Array<TextBlock | ToolUseBlock> = [];
    for (const raw of data.content) {
        const block = decodeBlock(raw);
        if (block) content.push(block);
    }

    const usage = isRecord(data.usage) ? data.usage : {};
    return {
        content,
        stop_reason: typeof data.stop_reason === 'string' ? data.stop_reason : null,
        usage: {
            input_tokens: clampInt(usage.input_tokens),
            output_tokens: clampInt(usage.output_tokens),
        },
    };
}

// ============================================================================
// Bedrock implementation
// ============================================================================

export interface BedrockModelClientConfig {
    region?: string;
    client?: BedrockRuntimeClient;
}

export class BedrockModelClient implements ModelClient {
    private readonly client: BedrockRuntimeClient;

    constructor(config: BedrockModelClientConfig = {}) {
        this.client = config.client ?? new BedrockRuntimeClient({ region: config.region ?? BEDROCK_REGION });
    }

    async invoke(req: ModelRequest): Promise<ModelResponse> {
        const body: Record<string, unknown> = {
            anthropic_version: ANTHROPIC_VERSION,
            max_tokens: req.max_tokens,
            messages: req.messages,
        };
        if (req.tools && req.tools.length > 0) {
            body.tools = req.tools;
        }

        const cmd = new InvokeModelCommand({
            modelId: req.model_id,
            contentType: 'application/json',
            accept: 'application/json',
            body: JSON.stringify(body),
        });

        const started = Date.now();
        let bodyText: string;
        try {
            const resp = await withTimeout(this.client.send(cmd), TIMEOUTS.MODEL_CALL_MS, `model call ${req.model_id}`);
            bodyText = new TextDecoder().decode(resp.body);
        } catch (e) {
            throw new ModelCallError(errorMessage(e), req.model_id);
        }
        const latencyMs = Date.now() - started;

        const parsed = parseBedrockBody(bodyText, req.model_id);
        log.debug('Model call complete', {
            model_id: req.model_id,
            latency_ms: latencyMs,
            stop_reason: parsed.stop_reason,
            input_tokens: parsed.usage.input_tokens,
            output_tokens: parsed.usage.output_tokens,
        });

        return { ...parsed, model_id: req.model_id, latency_ms: latencyMs };
    }

    async close(): Promise<void> {
        this.client.destroy();
    }
}
