import { logger } from '@toolbridge/logger';
import { AgentTool, DiscoveredTool } from '../types';
import { AgentToolAdapter } from './AgentToolAdapter';
import { ToolAdapter } from './ToolAdapter';

/**
 * Adapts every discovered `(invoke, descriptor)` pair, in discovery order.
 * The first descriptor that cannot be adapted aborts the batch.
 */
export function adaptTools(discovered: Iterable<DiscoveredTool>): AgentTool[];
export function adaptTools<TTool>(discovered: Iterable<DiscoveredTool>, adapter: ToolAdapter<TTool>): TTool[];
export function adaptTools<TTool>(
    discovered: Iterable<DiscoveredTool>,
    adapter?: ToolAdapter<TTool>
): Array<TTool | AgentTool> {
    const target: ToolAdapter<TTool | AgentTool> = adapter ?? new AgentToolAdapter();
    const pairs = Array.from(discovered);
    const tools = pairs.map(([invoke, descriptor]) => target.adapt(invoke, descriptor));

    logger.debug(`Adapted ${tools.length} tools`, { tools: pairs.map(([, descriptor]) => descriptor.name) });
    return tools;
}

export * from './ToolAdapter';
export * from './AgentToolAdapter';
export * from './callHandler';
