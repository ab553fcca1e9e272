export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export interface JsonObject {
    [key: string]: JsonValue;
}

export interface ToolDescriptor {
    name: string;
    description?: string | null;
    inputSchema: JsonObject;
}

export type ArgumentMapping = Record<string, unknown>;

export interface TextContent {
    type: 'text';
    text: string;
}

export interface ImageContent {
    type: 'image';
    data: string;
    mimeType: string;
}

export interface AudioContent {
    type: 'audio';
    data: string;
    mimeType: string;
}

export interface EmbeddedResource {
    type: 'resource';
    resource: {
        uri: string;
        mimeType?: string;
        text?: string;
        blob?: string;
    };
}

export interface ResourceLink {
    type: 'resource_link';
    uri: string;
    name: string;
    mimeType?: string;
}

export type ContentItem = TextContent | ImageContent | AudioContent | EmbeddedResource | ResourceLink;

export interface CallResult {
    content: ContentItem[];
}

/** Synchronous call into the remote tool; transport failures are thrown as-is. */
export type InvokeFunction = (args: ArgumentMapping | null) => CallResult;

export type DiscoveredTool = [invoke: InvokeFunction, descriptor: ToolDescriptor];

export interface ToolInput {
    type: JsonValue;
    description: string;
    [key: string]: JsonValue;
}

export type ToolInputs = Record<string, ToolInput>;

/**
 * Tool contract expected by the agent framework.
 *
 * `call` accepts either a single argument mapping as its only positional argument,
 * or keyword arguments alone.
 */
export interface AgentTool {
    readonly name: string;
    readonly description: string;
    readonly inputs: ToolInputs;
    readonly outputType: 'string';
    readonly isInitialized: true;
    readonly skipSignatureValidation: true;
    call(args?: readonly unknown[], kwargs?: ArgumentMapping): string;
}
