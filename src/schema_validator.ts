/**
 * Schema Validator - JSON schema validation for model and provider payloads
 *
 * Covers the subset of JSON Schema used by the canonical VPC contract and the
 * tool catalogue: type, properties, required, items, enum, pattern, min/max.
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export interface JsonSchema {
    /** One type name, or the list of types a value may take. */
    type: string | string[];
    description?: string;
    properties?: Record<string, JsonSchema>;
    required?: string[];
    items?: JsonSchema;
    enum?: unknown[];
    pattern?: string;
    minimum?: number;
    maximum?: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    validate(value: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(value, schema, '', errors);

        return {
            valid: errors.length === 0,
            errors,
        };
    }

    private validateValue(
        value: unknown,
        schema: JsonSchema,
        path: string,
        errors: ValidationError[]
    ): void {
        const actualType = this.getType(value);
        const allowed = Array.isArray(schema.type) ? schema.type : [schema.type];
        if (!allowed.includes(actualType)) {
            errors.push({
                path,
                message: `Expected type ${allowed.join(' | ')}, got ${actualType}`,
            });
            return;
        }

        if (isRecord(value)) {
            if (schema.required) {
                for (const req of schema.required) {
                    if (!(req in value)) {
                        errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                    }
                }
            }

            if (schema.properties) {
                for (const [key, propSchema] of Object.entries(schema.properties)) {
                    if (key in value) {
                        this.validateValue(value[key], propSchema, `${path}.${key}`, errors);
                    }
                }
            }
        }

        if (schema.items && Array.isArray(value)) {
            for (let i = 0; i < value.length; i++) {
                this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
            }
        }

        if (schema.enum && !schema.enum.includes(value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.join(', ')}`,
            });
        }

        if (schema.pattern && typeof value === 'string') {
            const regex = new RegExp(schema.pattern);
            if (!regex.test(value)) {
                errors.push({ path, message: `Value does not match pattern: ${schema.pattern}` });
            }
        }

        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value ${value} < minimum ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value ${value} > maximum ${schema.maximum}` });
            }
        }
    }

    private getType(value: unknown): string {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        return typeof value;
    }
}

/** Read a schema out of loaded JSON. Returns null when the shape is not a schema. */
export function parseJsonSchema(raw: unknown): JsonSchema | null {
    if (!isRecord(raw)) return null;
    const { type } = raw;
    let schemaType: string | string[];
    if (typeof type === 'string') {
        schemaType = type;
    } else if (Array.isArray(type) && type.length > 0 && type.every((t): t is string => typeof t === 'string')) {
        schemaType = type;
    } else {
        return null;
    }
    const schema: JsonSchema = { type: schemaType };

    if (typeof raw.description === 'string') schema.description = raw.description;
    if (typeof raw.pattern === 'string') schema.pattern = raw.pattern;
    if (typeof raw.minimum === 'number') schema.minimum = raw.minimum;
    if (typeof raw.maximum === 'number') schema.maximum = raw.maximum;
    if (Array.isArray(raw.enum)) schema.enum = raw.enum;

    if (Array.isArray(raw.required)) {
        if (!raw.required.every((r): r is string => typeof r === 'string')) return null;
        schema.required = raw.required;
    }

    if (raw.properties !== undefined) {
        if (!isRecord(raw.properties)) return null;
        const properties: Record<string, JsonSchema> = {};
        for (const [key, value] of Object.entries(raw.properties)) {
            const child = parseJsonSchema(value);
            if (!child) return null;
            properties[key] = child;
        }
        schema.properties = properties;
    }

    if (raw.items !== undefined) {
        const items = parseJsonSchema(raw.items);
        if (!items) return null;
        schema.items = items;
    }

    return schema;
}

/* -------------------------------------------------------------------------- */
/* Canonical schemas                                                          */
/* -------------------------------------------------------------------------- */

// Nothing is required: absent fields are defaulted by the caller, present
// fields must carry the right type.

const RULE_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        protocol: { type: 'string' },
        port: { type: ['string', 'number'] },
        source: { type: 'string' },
        direction: { type: 'string', enum: ['ingress', 'egress'] },
    },
};

export const CANONICAL_SUBNET_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        subnet_id: { type: 'string' },
        name: { type: 'string' },
        cidr_block: { type: 'string' },
        availability_zone: { type: 'string' },
        status: { type: 'string' },
    },
};

export const CANONICAL_SECURITY_GROUP_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        group_id: { type: 'string' },
        name: { type: 'string' },
        description: { type: 'string' },
        rules: { type: 'array', items: RULE_SCHEMA },
    },
};

export const CANONICAL_VPC_SCHEMA: JsonSchema = {
    type: 'object',
    properties: {
        vpc_id: { type: 'string' },
        vpc_name: { type: 'string' },
        cidr_block: { type: 'string' },
        region: { type: 'string' },
        status: { type: 'string' },
        subnets: { type: 'array', items: CANONICAL_SUBNET_SCHEMA },
        security_groups: { type: 'array', items: CANONICAL_SECURITY_GROUP_SCHEMA },
    },
};

export const CANONICAL_SUBNET_LIST_SCHEMA: JsonSchema = {
    type: 'array',
    items: CANONICAL_SUBNET_SCHEMA,
};

export const SCHEMA_IDS = {
    CANONICAL_VPC: 'canonical_vpc',
    CANONICAL_SUBNET_LIST: 'canonical_subnet_list',
} as const;

export function createCanonicalValidator(): SchemaValidator {
    const validator = new SchemaValidator();
    validator.registerSchema(SCHEMA_IDS.CANONICAL_VPC, CANONICAL_VPC_SCHEMA);
    validator.registerSchema(SCHEMA_IDS.CANONICAL_SUBNET_LIST, CANONICAL_SUBNET_LIST_SCHEMA);
    return validator;
}
