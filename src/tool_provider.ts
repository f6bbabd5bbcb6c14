/**
 * Toolchain-query tools offered to the code generator
 *
 * Tools are declared in a JSON catalogue (name, description, input schema,
 * command and argument template). Calls are validated against the tool's
 * schema, run through the CommandRunner, and memoized per (tool, args).
 * Failures come back as `is_error` results for the model to read; callTool
 * itself does not reject for tool-level problems.
 */

import * as fs from 'fs';
import { LRUCache } from 'lru-cache';
import { GENERATION, TIMEOUTS, TOOLCHAIN, TOOL_CATALOGUE_PATH } from './config';
import { CommandRunner } from './command_runner';
import { errorMessage, sanitizeErrorSnippet } from './errors';
import { createLogger } from './logger';
import { ToolDescriptor } from './model_client';
import { SchemaValidator, isRecord, parseJsonSchema } from './schema_validator';

const log = createLogger('tool-provider');

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export interface ToolCallResult {
    content: string;
    is_error: boolean;
}

export interface ToolProvider {
    connect(): Promise<void>;
    listTools(): Promise<ToolDescriptor[]>;
    callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult>;
    close(): Promise<void>;
}

export interface ToolCatalogueEntry extends ToolDescriptor {
    command: string;
    args: string[];
}

/* -------------------------------------------------------------------------- */
/* Catalogue loading                                                          */
/* -------------------------------------------------------------------------- */

export class ToolCatalogueError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ToolCatalogueError';
    }
}

function parseEntry(raw: unknown, index: number): ToolCatalogueEntry {
    if (!isRecord(raw)) {
        throw new ToolCatalogueError(`tools[${index}] is not an object`);
    }
    const { name, description, command, args } = raw;
    if (typeof name !== 'string' || name === '') {
        throw new ToolCatalogueError(`tools[${index}].name must be a non-empty string`);
    }
    if (typeof description !== 'string') {
        throw new ToolCatalogueError(`tools[${index}].description must be a string`);
    }
    if (typeof command !== 'string' || command === '') {
        throw new ToolCatalogueError(`tools[${index}].command must be a non-empty string`);
    }
    if (!Array.isArray(args) || !args.every((a): a is string => typeof a === 'string')) {
        throw new ToolCatalogueError(`tools[${index}].args must be an array of strings`);
    }
    const inputSchema = parseJsonSchema(raw.input_schema);
    if (!inputSchema || inputSchema.type !== 'object') {
        throw new ToolCatalogueError(`tools[${index}].input_schema must be an object schema`);
    }
    return { name, description, input_schema: inputSchema, command, args };
}

export function parseToolCatalogue(raw: unknown): ToolCatalogueEntry[] {
    if (!isRecord(raw) || !Array.isArray(raw.tools)) {
        throw new ToolCatalogueError('catalogue must be an object with a "tools" array');
    }
    const entries = raw.tools.map(parseEntry);
    const names = new Set<string>();
    for (const e of entries) {
        if (names.has(e.name)) throw new ToolCatalogueError(`duplicate tool name: ${e.name}`);
        names.add(e.name);
    }
    return entries;
}

export function loadToolCatalogue(filePath: string = TOOL_CATALOGUE_PATH): ToolCatalogueEntry[] {
    const text = fs.readFileSync(filePath, 'utf8');
    return parseToolCatalogue(JSON.parse(text));
}

/* -------------------------------------------------------------------------- */
/* Argument handling                                                          */
/* -------------------------------------------------------------------------- */

const ARG_VALUE_PATTERN = /^[@A-Za-z0-9._\/-]+$/;
const PLACEHOLDER = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

function argValue(value: unknown): string | null {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return null;
}

/**
 * Substitute `{name}` placeholders. Values may not look like options and may
 * only carry package-name characters.
 */
export function renderArgs(template: string[], args: Record<string, unknown>): string[] {
    return template.map((part) =>
        part.replace(PLACEHOLDER, (_m, key: string) => {
            const value = argValue(args[key]);
            if (value === null) {
                throw new Error(`missing or non-scalar argument: ${key}`);
            }
            if (value.startsWith('-') || !ARG_VALUE_PATTERN.test(value)) {
                throw new Error(`argument ${key} has disallowed characters`);
            }
            return value;
        })
    );
}

function cacheKey(name: string, args: Record<string, unknown>): string {
    const sorted = Object.keys(args).sort().map((k) => [k, args[k]]);
    return `${name}:${JSON.stringify(sorted)}`;
}

/* -------------------------------------------------------------------------- */
/* Command-backed provider                                                    */
/* -------------------------------------------------------------------------- */

export interface CommandToolProviderConfig {
    runner: CommandRunner;
    cataloguePath?: string;
    /** Supplied entries take precedence over the catalogue file. */
    catalogue?: ToolCatalogueEntry[];
    timeoutMs?: number;
}

const COMMAND_ALIASES: Readonly<Record<string, string>> = {
    npm: TOOLCHAIN.NPM_BIN,
    cdk: TOOLCHAIN.CDK_BIN,
};

export class CommandToolProvider implements ToolProvider {
    private readonly runner: CommandRunner;
    private readonly cataloguePath: string;
    private readonly timeoutMs: number;
    private readonly validator = new SchemaValidator();
    private readonly cache = new LRUCache<string, ToolCallResult>({
        max: GENERATION.TOOL_RESULT_CACHE_ENTRIES,
    });
    private tools: Map<string, ToolCatalogueEntry> | null = null;
    private preset: ToolCatalogueEntry[] | undefined;

    constructor(config: CommandToolProviderConfig) {
        this.runner = config.runner;
        this.cataloguePath = config.cataloguePath ?? TOOL_CATALOGUE_PATH;
        this.timeoutMs = config.timeoutMs ?? TIMEOUTS.TOOL_CALL_MS;
        this.preset = config.catalogue;
    }

    async connect(): Promise<void> {
        const entries = this.preset ?? loadToolCatalogue(this.cataloguePath);
        this.tools = new Map();
        for (const entry of entries) {
            this.tools.set(entry.name, entry);
            this.validator.registerSchema(entry.name, entry.input_schema);
        }
        log.info('Tool catalogue loaded', { tools: entries.map((e) => e.name) });
    }

    async listTools(): Promise<ToolDescriptor[]> {
        return [...this.requireTools().values()].map((t) => ({
            name: t.name,
            description: t.description,
            input_schema: t.input_schema,
        }));
    }

    async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult> {
        const tool = this.requireTools().get(name);
        if (!tool) {
            return { content: `Unknown tool: ${name}`, is_error: true };
        }

        const check = this.validator.validate(args, name);
        if (!check.valid) {
            const detail = check.errors.map((e) => `${e.path || '.'}: ${e.message}`).join('; ');
            return { content: `Invalid arguments for ${name}: ${detail}`, is_error: true };
        }

        const key = cacheKey(name, args);
        const cached = this.cache.get(key);
        if (cached) {
            log.debug('Tool result served from cache', { tool: name });
            return cached;
        }

        let argv: string[];
        try {
            argv = renderArgs(tool.args, args);
        } catch (e) {
            return { content: `Invalid arguments for ${name}: ${errorMessage(e)}`, is_error: true };
        }

        const command = COMMAND_ALIASES[tool.command] ?? tool.command;
        const res = await this.runner.run({ command, args: argv, timeoutMs: this.timeoutMs });
        if (res.exitCode !== 0) {
            log.warn('Tool command failed', { tool: name, exit_code: res.exitCode });
            return {
                content: `${name} failed (exit ${res.exitCode}): ${sanitizeErrorSnippet(res.stderr)}`,
                is_error: true,
            };
        }

        const result: ToolCallResult = { content: res.stdout.trim(), is_error: false };
        this.cache.set(key, result);
        log.info('Tool call complete', { tool: name, chars: result.content.length });
        return result;
    }

    async close(): Promise<void> {
        this.cache.clear();
        this.tools = null;
    }

    private requireTools(): Map<string, ToolCatalogueEntry> {
        if (!this.tools) {
            throw new Error('tool provider is not connected');
        }
        return this.tools;
    }
}
