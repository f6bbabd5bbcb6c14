/**
 * Code Generator - target descriptor to CDK stack source
 *
 * 1. buildStackDescription() renders the descriptor as a natural-language brief.
 * 2. StackCodeGenerator drives a bounded tool-augmented conversation:
 *      awaiting_model -> executing_tool -> awaiting_model ... -> done
 *    Every tool_use block in a model turn is executed and all results are
 *    returned together in the next user message.
 * 3. extractStackCode() pulls the stack source out of the joined text turns.
 *
 * Model invocation failures propagate unchanged; nothing here retries.
 */

import { DEFAULT_MODEL_ID, GENERATION, MAX_OUTPUT_TOKENS } from './config';
import { GenerationExtractionEmpty, GenerationLoopExceeded, errorMessage } from './errors';
import { createLogger } from './logger';
import {
    ModelClient,
    ModelMessage,
    ModelResponse,
    ToolDescriptor,
    ToolResultBlock,
    ToolUseBlock,
    responseText,
    toolUses,
} from './model_client';
import { getStackGenerationPrompt } from './prompts';
import { ToolProvider } from './tool_provider';
import { TargetVpcDescriptor } from './types';

const log = createLogger('code_generator');

/* -------------------------------------------------------------------------- */
/* Description                                                                */
/* -------------------------------------------------------------------------- */

function capitalize(word: string): string {
    return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

/** `my-vpc-migration` -> `MyVpcMigrationStack` */
export function stackClassName(projectName: string): string {
    return projectName.split('-').map(capitalize).join('') + 'Stack';
}

export function buildStackDescription(descriptor: TargetVpcDescriptor, projectName: string): string {
    const className = stackClassName(projectName);
    const { vpc } = descriptor;

    const lines: string[] = [
        'Generate ONLY valid TypeScript CDK code without any explanations or comments.',
        'Use correct CDK v2 syntax and imports.',
        '',
        'Requirements:',
        "- Import Construct from 'constructs' package",
        `- Export class name must be: ${className}`,
        `- VPC: name='${vpc.name}', cidr='${vpc.cidr}', ` +
            `enableDnsHostnames=${vpc.enableDnsHostnames}, enableDnsSupport=${vpc.enableDnsSupport}`,
        '- Use maxAzs: 2 for automatic AZ distribution (do not specify availabilityZone in subnetConfiguration)',
        '',
        'Subnets (use subnetConfiguration with cidrMask only):',
    ];

    descriptor.subnets.forEach((subnet, i) => {
        lines.push(`- Subnet ${i + 1}: cidrMask=24, name='${subnet.name}', type=PUBLIC`);
    });

    lines.push('', 'Security Groups:');
    for (const sg of descriptor.securityGroups) {
        const ports = sg.ingressRules.map((r) => String(r.fromPort));
        const sources = [...new Set(sg.ingressRules.flatMap((r) => r.cidrBlocks))];
        lines.push(`- name='${sg.name}', ingress_ports=[${ports.join(',')}], source=${sources.join(',') || 'none'}`);
    }

    lines.push('', `Return ONLY valid TypeScript CDK v2 code with export class ${className}. Use proper imports and syntax.`);
    return lines.join('\n');
}

/* -------------------------------------------------------------------------- */
/* Extraction                                                                 */
/* -------------------------------------------------------------------------- */

const FENCED_CODE = /```(?:typescript|ts)\b\s*([\s\S]*?)\s*```/;

const CODE_START_TOKENS = ['import ', 'export ', 'const ', 'class ', 'interface '];

// Best effort only. Prose that avoids these phrases survives the scan.
const EXPLANATORY_PHRASES = [
    'this cdk code',
    'to use this',
    'notes and best',
    'would you like',
    'the code uses',
    'for production',
    'the stack uses',
];

export function extractStackCode(raw: string): string {
    const fenced = FENCED_CODE.exec(raw);
    if (fenced) return fenced[1].trim();

    const kept: string[] = [];
    let collecting = false;
    for (const line of raw.split('\n')) {
        if (!collecting && CODE_START_TOKENS.some((t) => line.trim().startsWith(t))) {
            collecting = true;
        }
        if (!collecting) continue;

        const lower = line.toLowerCase();
        if (EXPLANATORY_PHRASES.some((p) => lower.includes(p))) continue;
        kept.push(line);
    }
    return kept.join('\n').trim();
}

/* -------------------------------------------------------------------------- */
/* Generation session                                                         */
/* -------------------------------------------------------------------------- */

export type GenerationPhase = 'awaiting_model' | 'executing_tool' | 'done';

export class GenerationSession {
    readonly messages: ModelMessage[];
    private _phase: GenerationPhase = 'awaiting_model';
    private _iterations = 0;
    private _pending: ToolUseBlock[] = [];
    private readonly textTurns: string[] = [];

    constructor(prompt: string, readonly tools: ToolDescriptor[]) {
        this.messages = [{ role: 'user', content: prompt }];
    }

    get phase(): GenerationPhase {
        return this._phase;
    }

    /** Model invocations so far. */
    get iterations(): number {
        return this._iterations;
    }

    get pendingToolCalls(): readonly ToolUseBlock[] {
        return this._pending;
    }

    recordModelTurn(resp: ModelResponse): void {
        this.expectPhase('awaiting_model');
        this._iterations++;

        const text = responseText(resp);
        if (text) this.textTurns.push(text);
        this.messages.push({ role: 'assistant', content: resp.content });

        const calls = toolUses(resp);
        if (calls.length > 0) {
            this._pending = calls;
            this._phase = 'executing_tool';
        } else {
            this._pending = [];
            this._phase = 'done';
        }
    }

    recordToolResults(results: ToolResultBlock[]): void {
        this.expectPhase('executing_tool');
        this.messages.push({ role: 'user', content: results });
        this._pending = [];
        this._phase = 'awaiting_model';
    }

    rawText(): string {
        return this.textTurns.join('\n');
    }

    private expectPhase(expected: GenerationPhase): void {
        if (this._phase !== expected) {
            throw new Error(`GenerationSession: expected phase ${expected}, in ${this._phase}`);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Generator                                                                  */
/* -------------------------------------------------------------------------- */

export interface GenerationResult {
    raw: string;
    code: string;
    iterations: number;
}

export interface StackCodeGeneratorOptions {
    modelId?: string;
    maxTokens?: number;
    maxIterations?: number;
}

export class StackCodeGenerator {
    private readonly modelId: string;
    private readonly maxTokens: number;
    private readonly maxIterations: number;

    constructor(
        private readonly model: ModelClient,
        private readonly toolProvider: ToolProvider,
        options: StackCodeGeneratorOptions = {}
    ) {
        this.modelId = options.modelId ?? DEFAULT_MODEL_ID;
        this.maxTokens = options.maxTokens ?? MAX_OUTPUT_TOKENS.CODE_GEN;
        this.maxIterations = options.maxIterations ?? GENERATION.MAX_ITERATIONS;
    }

    async generate(description: string): Promise<GenerationResult> {
        const tools = await this.toolProvider.listTools();
        const session = new GenerationSession(getStackGenerationPrompt(description), tools);
        log.info('Generation started', { tools: tools.length, max_iterations: this.maxIterations });

        while (session.phase !== 'done') {
            if (session.phase === 'awaiting_model') {
                const resp = await this.model.invoke({
                    model_id: this.modelId,
                    max_tokens: this.maxTokens,
                    messages: session.messages,
                    tools: tools.length > 0 ? tools : undefined,
                });
                session.recordModelTurn(resp);

                if (session.pendingToolCalls.length > 0 && session.iterations >= this.maxIterations) {
                    throw new GenerationLoopExceeded(session.iterations);
                }
            } else {
                const results: ToolResultBlock[] = [];
                for (const call of session.pendingToolCalls) {
                    results.push(await this.executeTool(call));
                }
                session.recordToolResults(results);
            }
        }

        const raw = session.rawText();
        const code = extractStackCode(raw);
        if (!code) {
            throw new GenerationExtractionEmpty(raw.length);
        }

        log.info('Generation complete', {
            iterations: session.iterations,
            raw_chars: raw.length,
            code_chars: code.length,
        });
        return { raw, code, iterations: session.iterations };
    }

    private async executeTool(call: ToolUseBlock): Promise<ToolResultBlock> {
        log.info('Executing tool', { tool: call.name, id: call.id });
        try {
            const result = await this.toolProvider.callTool(call.name, call.input);
            return {
                type: 'tool_result',
                tool_use_id: call.id,
                content: result.content,
                is_error: result.is_error,
            };
        } catch (e) {
            log.warn('Tool call raised', { tool: call.name, error: errorMessage(e) });
            return {
                type: 'tool_result',
                tool_use_id: call.id,
                content: `Tool ${call.name} failed: ${errorMessage(e)}`,
                is_error: true,
            };
        }
    }
}
