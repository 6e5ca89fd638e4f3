/**
 * Schema Validator - structural validation for prompt entry objects
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
    type: string;
    properties?: Record<string, JsonSchema>;
    required?: string[];
    /** At least one of `keys` must hold a value of `type` */
    requireAnyOf?: { keys: readonly string[]; type: string };
    minLength?: number;
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
        const actualType = getType(value);
        if (schema.type && actualType !== schema.type) {
            errors.push({
                path,
                message: `Expected type ${schema.type}, got ${actualType}`,
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

            if (schema.requireAnyOf) {
                const { keys, type } = schema.requireAnyOf;
                const record = value;
                if (!keys.some(k => k in record && getType(record[k]) === type)) {
                    errors.push({ path, message: `Expected a ${type} field in one of: ${keys.join(', ')}` });
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

        if (schema.minLength !== undefined && typeof value === 'string' && value.length < schema.minLength) {
            errors.push({ path, message: `Length ${value.length} < minLength ${schema.minLength}` });
        }
    }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function getType(value: unknown): string {
    if (value === null) return 'null';
    if (Array.isArray(value)) return 'array';
    return typeof value;
}
