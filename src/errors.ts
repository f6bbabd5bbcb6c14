/**
 * Migration error taxonomy
 *
 * Every failure a stage can raise is a MigrationError with a machine-readable
 * code. WARNING-severity errors are absorbed at the stage boundary (the run
 * continues on synthetic data); FATAL ones put the workflow into `error`.
 */

import { SANITIZE } from './config';

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type MigrationErrorCode =
    // Extraction (non-fatal, mock substitution)
    | 'EXTRACTION_DEGRADED'

    // Stage contract violations
    | 'TRANSFORM_ERROR'
    | 'INVALID_RUN_CONFIG'

    // Generation
    | 'GENERATION_LOOP_EXCEEDED'
    | 'GENERATION_EXTRACTION_EMPTY'
    | 'MODEL_CALL_FAILED'

    // Toolchain / infrastructure
    | 'SCAFFOLD_ERROR'
    | 'DEPLOY_ERROR'
    | 'PROVIDER_CALL_FAILED'
    | 'TIMEOUT'

    | 'UNEXPECTED';

export type Severity = 'FATAL' | 'WARNING';

export interface StructuredError {
    code: MigrationErrorCode;
    message: string;
    severity: Severity;
    context: Record<string, unknown>;
    timestamp: string;
}

const WARNING_CODES: MigrationErrorCode[] = [
    'EXTRACTION_DEGRADED',
    'TIMEOUT',
    'PROVIDER_CALL_FAILED',
];

export function getSeverity(code: MigrationErrorCode): Severity {
    return WARNING_CODES.includes(code) ? 'WARNING' : 'FATAL';
}

/* -------------------------------------------------------------------------- */
/* Error classes                                                              */
/* -------------------------------------------------------------------------- */

export class MigrationError extends Error {
    constructor(
        public readonly code: MigrationErrorCode,
        message: string,
        public readonly context: Record<string, unknown> = {}
    ) {
        super(message);
        this.name = 'MigrationError';
    }

    get severity(): Severity {
        return getSeverity(this.code);
    }
}

export class ExtractionDegraded extends MigrationError {
    constructor(reason: string, context: Record<string, unknown> = {}) {
        super('EXTRACTION_DEGRADED', `Extraction degraded: ${reason}`, context);
        this.name = 'ExtractionDegraded';
    }
}

export class TransformError extends MigrationError {
    constructor(public readonly field: string, detail = 'required field missing') {
        super('TRANSFORM_ERROR', `Transform failed: ${field}: ${detail}`, { field });
        this.name = 'TransformError';
    }
}

export class InvalidRunConfigError extends MigrationError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super('INVALID_RUN_CONFIG', message, context);
        this.name = 'InvalidRunConfigError';
    }
}

export class GenerationLoopExceeded extends MigrationError {
    constructor(public readonly iterations: number) {
        super(
            'GENERATION_LOOP_EXCEEDED',
            `Tool-call loop did not converge after ${iterations} model invocations`,
            { iterations }
        );
        this.name = 'GenerationLoopExceeded';
    }
}

export class GenerationExtractionEmpty extends MigrationError {
    constructor(rawLength: number) {
        super(
            'GENERATION_EXTRACTION_EMPTY',
            `No stack code could be extracted from the model response (${rawLength} chars)`,
            { raw_length: rawLength }
        );
        this.name = 'GenerationExtractionEmpty';
    }
}

export class ModelCallError extends MigrationError {
    constructor(message: string, modelId: string, providerBodySnippet: string | null = null) {
        super('MODEL_CALL_FAILED', sanitizeErrorSnippet(message), {
            model_id: modelId,
            provider_body_snippet: providerBodySnippet ? sanitizeErrorSnippet(providerBodySnippet) : null,
        });
        this.name = 'ModelCallError';
    }
}

export class ProviderCallError extends MigrationError {
    constructor(message: string, context: Record<string, unknown> = {}) {
        super('PROVIDER_CALL_FAILED', sanitizeErrorSnippet(message), context);
        this.name = 'ProviderCallError';
    }
}

/** Non-zero subprocess exit during `cdk init`. */
export class ScaffoldError extends MigrationError {
    constructor(public readonly exitCode: number, public readonly stderr: string) {
        super('SCAFFOLD_ERROR', `CDK init failed (exit ${exitCode}): ${sanitizeErrorSnippet(stderr)}`, { exit_code: exitCode });
        this.name = 'ScaffoldError';
    }
}

/** Non-zero subprocess exit during `cdk deploy`. */
export class DeployError extends MigrationError {
    constructor(public readonly exitCode: number, public readonly stderr: string) {
        super('DEPLOY_ERROR', `CDK deploy failed (exit ${exitCode}): ${sanitizeErrorSnippet(stderr)}`, { exit_code: exitCode });
        this.name = 'DeployError';
    }
}

export class TimeoutError extends MigrationError {
    constructor(label: string, public readonly timeoutMs: number) {
        super('TIMEOUT', `${label} timed out after ${timeoutMs}ms`, { label, timeout_ms: timeoutMs });
        this.name = 'TimeoutError';
    }
}

/* -------------------------------------------------------------------------- */
/* Helpers                                                                    */
/* -------------------------------------------------------------------------- */

const STRIP_PATTERNS: RegExp[] = [
    /AKIA[0-9A-Z]{16}/g,
    /LTAI[0-9A-Za-z]{12,}/g,
    /Authorization:\s*Bearer\s+[A-Za-z0-9._-]+/gi,
];

export function sanitizeErrorSnippet(input: string): string {
    let out = input || '';
    for (const re of STRIP_PATTERNS) {
        out = out.replace(re, '[REDACTED]');
    }
    if (out.length > SANITIZE.ERROR_SNIPPET_MAX_CHARS) {
        out = out.slice(0, SANITIZE.ERROR_SNIPPET_MAX_CHARS);
    }
    return out.trim();
}

export function errorMessage(e: unknown): string {
    if (e instanceof Error) return e.message;
    return String(e);
}

export function toStructuredError(e: unknown): StructuredError {
    const code: MigrationErrorCode = e instanceof MigrationError ? e.code : 'UNEXPECTED';
    return {
        code,
        message: errorMessage(e),
        severity: getSeverity(code),
        context: e instanceof MigrationError ? e.context : {},
        timestamp: new Date().toISOString(),
    };
}
