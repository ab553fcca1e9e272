import { logger } from '@toolbridge/logger';
import Ajv, { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { SchemaError } from '../errors';
import { ArgumentMapping, JsonObject } from '../types';

const toMessage = (args: unknown[]): string => args.map(String).join(' ');

const ajv = new Ajv({
    strict: false,
    allErrors: true,
    logger: {
        log: (...args: unknown[]) => logger.info(toMessage(args), { source: 'ajv' }),
        warn: (...args: unknown[]) => logger.warn(toMessage(args), { source: 'ajv' }),
        error: (...args: unknown[]) => logger.error(toMessage(args), { source: 'ajv' }),
    },
});
addFormats(ajv);

const IGNORED_KEYWORDS = new Set(['$schema', '$id']);

export type ValidationResult = { valid: true } | { valid: false; errors: ErrorObject[] };

export type ArgumentValidator = (args: ArgumentMapping) => ValidationResult;

/**
 * Compiles a dereferenced input schema into a reusable validator.
 * Compilation failures surface as a SchemaError for the tool.
 */
export const compileArgumentValidator = (schema: JsonObject, toolName: string): ArgumentValidator => {
    const body: SchemaObject = {};
    for (const [key, value] of Object.entries(schema)) {
        if (!IGNORED_KEYWORDS.has(key)) {
            body[key] = value;
        }
    }

    let validate: ValidateFunction;
    try {
        validate = ajv.compile(body);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new SchemaError(`invalid input schema for tool ${toolName}: ${message}`, toolName);
    }

    return (args: ArgumentMapping): ValidationResult => {
        if (validate(args)) {
            return { valid: true };
        }
        return { valid: false, errors: validate.errors ?? [] };
    };
};

export const formatValidationErrors = (errors: ErrorObject[]): string =>
    errors.map((error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`).join('; ');
