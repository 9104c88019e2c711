import { z } from 'zod';
import { ParseError } from './errors';

export const DEFAULT_QSTAT_COMMAND = 'qstat -f -F -xml -u "*"';

export const GridEngineConfigSchema = z.object({
    qstatCommand: z.string().min(1).default(DEFAULT_QSTAT_COMMAND),
    sshHost: z.string().default(''),
    sshUser: z.string().default(''),
    sshKeyPath: z.string().default(''),
    commandTimeout: z.coerce.number().int().positive().default(30000),
    maxBuffer: z.coerce.number().int().positive().default(10 * 1024 * 1024),
    expandTaskRanges: z.preprocess(
        v => typeof v === 'string' ? ['1', 'true', 'yes'].includes(v.toLowerCase()) : v,
        z.boolean()
    ).default(false),
});

export type GridEngineConfig = z.infer<typeof GridEngineConfigSchema>;

const ENV_KEYS: Record<keyof GridEngineConfig, string> = {
    qstatCommand: 'GRIDENGINE_QSTAT_COMMAND',
    sshHost: 'GRIDENGINE_SSH_HOST',
    sshUser: 'GRIDENGINE_SSH_USER',
    sshKeyPath: 'GRIDENGINE_SSH_KEY_PATH',
    commandTimeout: 'GRIDENGINE_COMMAND_TIMEOUT',
    maxBuffer: 'GRIDENGINE_MAX_BUFFER',
    expandTaskRanges: 'GRIDENGINE_EXPAND_TASKS',
};

/**
 * Builds the configuration from GRIDENGINE_* environment variables, with
 * explicit overrides taking precedence.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: Partial<GridEngineConfig> = {}): GridEngineConfig {
    const raw: Record<string, unknown> = {};
    for (const [key, envKey] of Object.entries(ENV_KEYS)) {
        const value = env[envKey];
        if (value !== undefined && value !== '') raw[key] = value;
    }

    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) raw[key] = value;
    }

    const result = GridEngineConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
        throw new ParseError(`Invalid configuration: ${issues}`, JSON.stringify(raw), { cause: result.error });
    }
    return result.data;
}
