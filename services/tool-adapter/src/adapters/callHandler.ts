import type { Logger } from '@toolbridge/logger';
import { ArgumentError, EmptyResultError, UnsupportedContentError } from '../errors';
import { ArgumentMapping, CallResult } from '../types';

export type ArgumentShape =
    | { kind: 'keywords'; mapping: ArgumentMapping }
    | { kind: 'mapping'; mapping: ArgumentMapping }
    | { kind: 'non-mapping-positional' }
    | { kind: 'positional-with-keywords' }
    | { kind: 'multiple-positional'; count: number };

export const isArgumentMapping = (value: unknown): value is ArgumentMapping => {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
        return false;
    }
    const proto: unknown = Object.getPrototypeOf(value);
    return proto === Object.prototype || proto === null;
};

/**
 * Classifies how the agent framework called the tool:
 *
 * | positional             | keywords | shape                      |
 * |------------------------|----------|----------------------------|
 * | none                   | any      | keywords                   |
 * | one mapping            | none     | mapping                    |
 * | one non-mapping        | none     | non-mapping-positional     |
 * | one                    | some     | positional-with-keywords   |
 * | several                | any      | multiple-positional        |
 */
export const classifyArguments = (args: readonly unknown[], kwargs: ArgumentMapping): ArgumentShape => {
    if (args.length === 0) {
        return { kind: 'keywords', mapping: { ...kwargs } };
    }
    if (args.length > 1) {
        return { kind: 'multiple-positional', count: args.length };
    }
    if (Object.keys(kwargs).length > 0) {
        return { kind: 'positional-with-keywords' };
    }

    const [only] = args;
    return isArgumentMapping(only) ? { kind: 'mapping', mapping: only } : { kind: 'non-mapping-positional' };
};

export const toArgumentMapping = (toolName: string, args: readonly unknown[], kwargs: ArgumentMapping): ArgumentMapping => {
    const shape = classifyArguments(args, kwargs);

    switch (shape.kind) {
        case 'keywords':
        case 'mapping':
            return shape.mapping;
        case 'non-mapping-positional':
            throw new ArgumentError(
                `tool ${toolName} only accepts an argument mapping as its positional argument`,
                toolName
            );
        case 'positional-with-keywords':
            throw new ArgumentError(
                `tool ${toolName} does not support combined positional and keyword arguments`,
                toolName
            );
        case 'multiple-positional':
            throw new ArgumentError(
                `tool ${toolName} does not support multiple positional arguments (got ${shape.count})`,
                toolName
            );
    }
};

/** Reduces a call result to the text of its first content item. */
export const extractTextResult = (toolName: string, result: CallResult, logger: Logger): string => {
    const [first, ...rest] = result.content;

    if (first === undefined) {
        throw new EmptyResultError(toolName);
    }

    if (rest.length > 0) {
        logger.warn(`tool ${toolName} returned multiple content, using the first one`, {
            tool: toolName,
            discarded: rest.length,
        });
    }

    if (first.type !== 'text') {
        throw new UnsupportedContentError(toolName, first.type);
    }

    return first.text;
};
