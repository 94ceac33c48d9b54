import fs from 'fs-extra';
import { z } from 'zod';
import { ConfigError } from './errors';
import { getConfigPath, validateDatabaseName } from './paths';

export const ConfigSchema = z
    .object({
        database: z
            .string()
            .min(1)
            .default('project.db')
            .superRefine((name, ctx) => {
                try {
                    validateDatabaseName(name);
                } catch (err) {
                    ctx.addIssue({
                        code: z.ZodIssueCode.custom,
                        message: err instanceof Error ? err.message : String(err),
                    });
                }
            }),
        logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        git: z
            .object({
                timeoutMs: z.number().int().positive().default(500),
            })
            .strict()
            .default({}),
        sync: z
            .object({
                maxAttempts: z.number().int().min(1).max(10).default(3),
                baseDelayMs: z.number().int().nonnegative().default(50),
            })
            .strict()
            .default({}),
        lock: z
            .object({
                timeoutMs: z.number().int().positive().default(5000),
            })
            .strict()
            .default({}),
    })
    .strict();

export type PathkeeperConfig = z.infer<typeof ConfigSchema>;

export const DEFAULT_CONFIG: PathkeeperConfig = ConfigSchema.parse({});

export function parseConfig(raw: unknown, source = 'config'): PathkeeperConfig {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => `${issue.path.length ? issue.path.join('.') : '(root)'}: ${issue.message}`)
            .join('; ');
        throw new ConfigError(`Invalid ${source}: ${details}`);
    }
    return result.data;
}

export class ConfigLoader {
    private readonly configPath: string;

    constructor(rootDir: string) {
        this.configPath = getConfigPath(rootDir);
    }

    /** Missing file means defaults. A present but broken file is an error, never ignored. */
    async load(): Promise<PathkeeperConfig> {
        if (!(await fs.pathExists(this.configPath))) {
            return DEFAULT_CONFIG;
        }

        const content = await fs.readFile(this.configPath, 'utf-8');
        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (e) {
            throw new ConfigError(`Invalid config JSON in ${this.configPath}: ${e instanceof Error ? e.message : String(e)}`);
        }
        return parseConfig(raw, this.configPath);
    }

    /** Writes the default config unless one exists. Returns true when written. */
    async writeDefaults(): Promise<boolean> {
        if (await fs.pathExists(this.configPath)) {
            return false;
        }
        await fs.outputJson(this.configPath, DEFAULT_CONFIG, { spaces: 2 });
        return true;
    }

    getPath(): string {
        return this.configPath;
    }
}
