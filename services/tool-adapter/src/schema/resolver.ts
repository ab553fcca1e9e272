import { SchemaError } from '../errors';
import { JsonObject, JsonValue, ToolInputs } from '../types';

export const DEFAULT_DESCRIPTION = 'see tool description';
export const DEFAULT_TYPE = 'string';

export const isJsonObject = (value: unknown): value is JsonObject =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

const schemaError = (toolName: string | undefined, detail: string): SchemaError =>
    new SchemaError(`invalid input schema${toolName ? ` for tool ${toolName}` : ''}: ${detail}`, toolName);

const withoutDefinitions = (schema: JsonObject): JsonObject => {
    const copy: JsonObject = { ...schema };
    delete copy.$defs;
    return copy;
};

// RFC 6901 pointer in a URI fragment: "#", "#/$defs/Item", "#/properties/a~1b"
const parsePointer = (ref: string, toolName?: string): string[] => {
    let fragment: string;
    try {
        fragment = decodeURIComponent(ref.slice(1));
    } catch {
        throw schemaError(toolName, `malformed reference ${ref}`);
    }

    if (fragment === '') {
        return [];
    }
    if (!fragment.startsWith('/')) {
        throw schemaError(toolName, `unsupported anchor reference ${ref}`);
    }

    return fragment
        .slice(1)
        .split('/')
        .map((token) => token.replace(/~1/g, '/').replace(/~0/g, '~'));
};

const lookup = (root: JsonObject, ref: string, toolName?: string): JsonValue => {
    let current: JsonValue = root;

    for (const token of parsePointer(ref, toolName)) {
        if (Array.isArray(current) && /^\d+$/.test(token) && Number(token) < current.length) {
            current = current[Number(token)];
        } else if (isJsonObject(current) && Object.prototype.hasOwnProperty.call(current, token)) {
            current = current[token];
        } else {
            throw schemaError(toolName, `unresolvable reference ${ref}`);
        }
    }

    return current;
};

// Writes an own data property, so keys such as "__proto__" stay ordinary entries
const setEntry = <T>(target: Record<string, T>, key: string, value: T): void => {
    Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
};

interface ResolveState {
    root: JsonObject;
    resolved: Map<string, JsonValue>;
    toolName?: string;
}

// Stands in for a reference back into its own resolution; keeps the target's type only
const truncatedReference = (target: JsonValue): JsonObject =>
    isJsonObject(target) && typeof target.type === 'string' ? { type: target.type } : {};

const resolveValue = (value: JsonValue, state: ResolveState, active: string[]): JsonValue => {
    if (Array.isArray(value)) {
        return value.map((item) => resolveValue(item, state, active));
    }
    if (!isJsonObject(value)) {
        return value;
    }

    const ref = value.$ref;
    if (typeof ref === 'string') {
        if (!ref.startsWith('#')) {
            throw schemaError(state.toolName, `non-local reference ${ref}`);
        }

        const cached = state.resolved.get(ref);
        if (cached !== undefined) {
            return cached;
        }

        const target = lookup(state.root, ref, state.toolName);
        if (active.includes(ref)) {
            return truncatedReference(target);
        }

        // The reference object is replaced by its target; sibling keywords go with it
        const result = resolveValue(target, state, [...active, ref]);
        state.resolved.set(ref, result);
        return result;
    }

    const resolved: JsonObject = {};
    for (const [key, child] of Object.entries(value)) {
        setEntry(resolved, key, resolveValue(child, state, active));
    }
    return resolved;
};

/**
 * Returns a copy of `inputSchema` with every local `$ref` substituted by its
 * resolved target and the `$defs` section removed. The input is left untouched.
 *
 * Each reference is resolved once per call and the result is shared wherever it
 * recurs. A reference back into its own resolution is cut to `{ type }` (or `{}`).
 */
export const dereferenceSchema = (inputSchema: unknown, toolName?: string): JsonObject => {
    if (!isJsonObject(inputSchema)) {
        throw schemaError(toolName, 'not an object');
    }

    const state: ResolveState = { root: inputSchema, resolved: new Map(), toolName };
    const resolved = resolveValue(withoutDefinitions(inputSchema), state, []);
    if (!isJsonObject(resolved)) {
        throw schemaError(toolName, 'does not resolve to an object');
    }

    return withoutDefinitions(resolved);
};

export const normalizeProperties = (schema: JsonObject, toolName?: string): ToolInputs => {
    if (!('properties' in schema)) {
        throw schemaError(toolName, 'missing properties');
    }

    const properties = schema.properties;
    if (!isJsonObject(properties)) {
        throw schemaError(toolName, 'properties must be an object');
    }

    const inputs: ToolInputs = {};
    for (const [name, entry] of Object.entries(properties)) {
        if (!isJsonObject(entry)) {
            throw schemaError(toolName, `parameter ${name} is not a schema object`);
        }

        const description = 'description' in entry ? entry.description : DEFAULT_DESCRIPTION;
        if (typeof description !== 'string') {
            throw schemaError(toolName, `parameter ${name} has a non-string description`);
        }

        setEntry(inputs, name, {
            ...entry,
            description,
            type: 'type' in entry ? entry.type : DEFAULT_TYPE,
        });
    }

    return inputs;
};

export const resolveInputSchema = (inputSchema: unknown, toolName?: string): ToolInputs =>
    normalizeProperties(dereferenceSchema(inputSchema, toolName), toolName);
