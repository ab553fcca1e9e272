import { logger as sharedLogger, Logger } from '@toolbridge/logger';
import { loadConfig } from '../config';
import { ArgumentError, SchemaError } from '../errors';
import { dereferenceSchema, normalizeProperties } from '../schema/resolver';
import { AgentTool, ArgumentMapping, InvokeFunction, ToolDescriptor, ToolInputs } from '../types';
import { ArgumentValidator, compileArgumentValidator, formatValidationErrors } from '../validation';
import { extractTextResult, toArgumentMapping } from './callHandler';
import { ToolAdapter } from './ToolAdapter';

export interface AgentToolAdapterOptions {
    logger?: Logger;
    /** Defaults to `TOOL_ADAPTER_VALIDATE_INPUT`. */
    validateInput?: boolean;
}

interface SchemaDrivenToolInit {
    name: string;
    description: string;
    inputs: ToolInputs;
    invoke: InvokeFunction;
    logger: Logger;
    validator?: ArgumentValidator;
}

/**
 * Agent tool backed by a remote call. Inputs come from the resolved schema rather
 * than a native signature, so the framework is told to skip signature validation.
 */
export class SchemaDrivenTool implements AgentTool {
    readonly outputType = 'string';
    readonly isInitialized = true;
    readonly skipSignatureValidation = true;

    readonly name: string;
    readonly description: string;
    readonly inputs: ToolInputs;

    private readonly invoke: InvokeFunction;
    private readonly logger: Logger;
    private readonly validator?: ArgumentValidator;

    constructor(init: SchemaDrivenToolInit) {
        this.name = init.name;
        this.description = init.description;
        this.inputs = init.inputs;
        this.invoke = init.invoke;
        this.logger = init.logger;
        this.validator = init.validator;
    }

    // Bound: may be called detached from the tool
    readonly call = (args: readonly unknown[] = [], kwargs: ArgumentMapping = {}): string => {
        const mapping = toArgumentMapping(this.name, args, kwargs);

        if (this.validator) {
            const validation = this.validator(mapping);
            if (!validation.valid) {
                throw new ArgumentError(
                    `tool ${this.name} received invalid arguments: ${formatValidationErrors(validation.errors)}`,
                    this.name,
                    validation.errors
                );
            }
        }

        const invoke = this.invoke;
        return extractTextResult(this.name, invoke(mapping), this.logger);
    };
}

export class AgentToolAdapter implements ToolAdapter<AgentTool> {
    private readonly logger: Logger;
    private readonly validateInput: boolean;

    constructor(options: AgentToolAdapterOptions = {}) {
        this.logger = options.logger ?? sharedLogger;
        this.validateInput = options.validateInput ?? loadConfig().validateInput;
    }

    adapt(invoke: InvokeFunction, descriptor: ToolDescriptor): AgentTool {
        const { name } = descriptor;
        if (!name) {
            throw new SchemaError('tool descriptor has an empty name');
        }

        const schema = dereferenceSchema(descriptor.inputSchema, name);

        return new SchemaDrivenTool({
            name,
            description: descriptor.description ?? '',
            inputs: normalizeProperties(schema, name),
            invoke,
            logger: this.logger,
            validator: this.validateInput ? compileArgumentValidator(schema, name) : undefined,
        });
    }
}
