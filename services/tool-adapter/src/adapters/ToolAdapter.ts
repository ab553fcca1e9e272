import { InvokeFunction, ToolDescriptor } from '../types';

/** Turns one discovered tool into the shape a particular agent framework expects. */
export interface ToolAdapter<TTool> {
    adapt(invoke: InvokeFunction, descriptor: ToolDescriptor): TTool;
}
