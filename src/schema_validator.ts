/**
 * Schema Validator - JSON schema validation for model config.json documents
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type JsonType = 'object' | 'array' | 'string' | 'number' | 'boolean' | 'null';

export interface JsonSchema {
    type?: JsonType | JsonType[];
    properties?: Record<string, JsonSchema>;
    required?: string[];
    items?: JsonSchema;
    enum?: (string | number | boolean | null)[];
    pattern?: string;
    minimum?: number;
    maximum?: number;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function joinPath(base: string, key: string): string {
    return base ? `${base}.${key}` : key;
}

export class SchemaValidator {
    private schemas: Map<string, JsonSchema> = new Map();

    registerSchema(schemaId: string, schema: JsonSchema): void {
        this.schemas.set(schemaId, schema);
    }

    hasSchema(schemaId: string): boolean {
        return this.schemas.has(schemaId);
    }

    validate(document: unknown, schemaId: string): ValidationResult {
        const schema = this.schemas.get(schemaId);
        if (!schema) {
            return {
                valid: false,
                errors: [{ path: '', message: `Schema not found: ${schemaId}` }],
            };
        }

        const errors: ValidationError[] = [];
        this.validateValue(document, schema, '', errors);

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
        // Type validation
        const actualType = this.getType(value);
        if (schema.type) {
            const allowed = Array.isArray(schema.type) ? schema.type : [schema.type];
            const matches = allowed.some((t) => t === actualType || (t === 'number' && actualType === 'integer'));
            if (!matches) {
                errors.push({
                    path,
                    message: `Expected type ${allowed.join(' | ')}, got ${actualType === 'integer' ? 'number' : actualType}`,
                });
                return;
            }
        }

        if (isRecord(value)) {
            for (const req of schema.required ?? []) {
                if (!(req in value)) {
                    errors.push({ path: joinPath(path, req), message: 'Required field missing' });
                }
            }
            for (const [key, propSchema] of Object.entries(schema.properties ?? {})) {
                if (key in value) {
                    this.validateValue(value[key], propSchema, joinPath(path, key), errors);
                }
            }
        }

        if (Array.isArray(value) && schema.items) {
            for (let i = 0; i < value.length; i++) {
                this.validateValue(value[i], schema.items, `${path}[${i}]`, errors);
            }
        }

        if (schema.enum && !schema.enum.some((e) => e === value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.map(String).join(', ')}`,
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

    private getType(value: unknown): JsonType | 'integer' | 'undefined' | 'other' {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        switch (typeof value) {
            case 'object': return 'object';
            case 'string': return 'string';
            case 'boolean': return 'boolean';
            case 'number': return Number.isInteger(value) ? 'integer' : 'number';
            case 'undefined': return 'undefined';
            default: return 'other';
        }
    }
}
