export class ToolAdapterError extends Error {
    constructor(message: string, readonly toolName?: string) {
        super(message);
        this.name = new.target.name;
    }
}

/** Input schema the resolver cannot turn into a flat set of inputs. */
export class SchemaError extends ToolAdapterError {}

export class ArgumentError extends ToolAdapterError {
    constructor(message: string, toolName: string, readonly details: unknown[] = []) {
        super(message, toolName);
    }
}

export class EmptyResultError extends ToolAdapterError {
    constructor(toolName: string) {
        super(`tool ${toolName} returned an empty content`, toolName);
    }
}

export class UnsupportedContentError extends ToolAdapterError {
    constructor(toolName: string, readonly contentType: string) {
        super(`tool ${toolName} returned a non-text content: \`${contentType}\``, toolName);
    }
}
