/**
 * Schema Validator - JSON schema subset for kernel documents
 * (interop requests/responses, manifests, pipeline configuration)
 */

export interface ValidationError {
    path: string;
    message: string;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationError[];
}

export type JsonType = 'object' | 'array' | 'string' | 'number' | 'integer' | 'boolean' | 'null';

export interface JsonSchema {
    type?: JsonType | JsonType[];
    properties?: Record<string, JsonSchema>;
    required?: string[];
    additionalProperties?: boolean | JsonSchema;
    items?: JsonSchema;
    enum?: ReadonlyArray<string | number | boolean | null>;
    pattern?: string;
    minLength?: number;
    minimum?: number;
    maximum?: number;
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
        // Type validation
        if (schema.type) {
            const allowed = Array.isArray(schema.type) ? schema.type : [schema.type];
            if (!allowed.some((t) => this.matchesType(value, t))) {
                errors.push({
                    path,
                    message: `Expected type ${allowed.join('|')}, got ${this.getType(value)}`,
                });
                return;
            }
        }

        if (schema.enum && !schema.enum.some((v) => v === value)) {
            errors.push({
                path,
                message: `Value must be one of: ${schema.enum.map((v) => String(v)).join(', ')}`,
            });
        }

        if (isRecord(value)) {
            this.validateObject(value, schema, path, errors);
        }

        const items = schema.items;
        if (Array.isArray(value) && items) {
            for (let i = 0; i < value.length; i++) {
                this.validateValue(value[i], items, `${path}[${i}]`, errors);
            }
        }

        if (typeof value === 'string') {
            if (schema.minLength !== undefined && value.length < schema.minLength) {
                errors.push({ path, message: `String shorter than ${schema.minLength}` });
            }
            if (schema.pattern && !new RegExp(schema.pattern).test(value)) {
                errors.push({ path, message: `String does not match pattern: ${schema.pattern}` });
            }
        }

        if (typeof value === 'number') {
            if (schema.minimum !== undefined && value < schema.minimum) {
                errors.push({ path, message: `Value must be >= ${schema.minimum}` });
            }
            if (schema.maximum !== undefined && value > schema.maximum) {
                errors.push({ path, message: `Value must be <= ${schema.maximum}` });
            }
        }
    }

    private validateObject(
        value: Record<string, unknown>,
        schema: JsonSchema,
        path: string,
        errors: ValidationError[]
    ): void {
        if (schema.required) {
            for (const req of schema.required) {
                if (!(req in value) || value[req] === undefined) {
                    errors.push({ path: `${path}.${req}`, message: 'Required field missing' });
                }
            }
        }

        const props = schema.properties ?? {};
        for (const [key, child] of Object.entries(value)) {
            const propSchema = Object.hasOwn(props, key) ? props[key] : undefined;
            if (propSchema) {
                if (child !== undefined) this.validateValue(child, propSchema, `${path}.${key}`, errors);
            } else if (schema.additionalProperties === false) {
                errors.push({ path: `${path}.${key}`, message: 'Unexpected property' });
            } else if (typeof schema.additionalProperties === 'object') {
                this.validateValue(child, schema.additionalProperties, `${path}.${key}`, errors);
            }
        }
    }

    private matchesType(value: unknown, type: JsonType): boolean {
        if (type === 'integer') return typeof value === 'number' && Number.isInteger(value);
        if (type === 'number') return typeof value === 'number' && Number.isFinite(value);
        return this.getType(value) === type;
    }

    private getType(value: unknown): string {
        if (value === null) return 'null';
        if (Array.isArray(value)) return 'array';
        return typeof value;
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Flatten validation errors into `path: message` lines. */
export function formatErrors(result: ValidationResult): string[] {
    return result.errors.map((e) => `${e.path || '$'}: ${e.message}`);
}
