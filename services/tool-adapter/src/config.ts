import 'dotenv/config';

export interface AdapterConfig {
    /** Validate each call's arguments against the tool's input schema before invoking it. */
    validateInput: boolean;
}

const isEnabled = (value: string | undefined): boolean => value === 'true' || value === '1';

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AdapterConfig => ({
    validateInput: isEnabled(env.TOOL_ADAPTER_VALIDATE_INPUT?.trim().toLowerCase()),
});
