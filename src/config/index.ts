import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

const ConfigSchema = z.object({
    crawler: z.object({
        engine: z.enum(['browser', 'http']).default('browser'),
        headless: z.boolean().default(true),
        timeout_ms: z.number().int().min(1000).max(120000).default(30000),
        settle_ms: z.number().int().min(0).max(30000).default(2000),
        executable_path: z.string().min(1).nullish(),
        user_agent: z.string().min(1),
        try_contact_pages: z.boolean().default(true),
        contact_paths: z.array(z.string().startsWith('/')).default([]),
    }),
    fetcher: z.object({
        retries: z.number().int().min(0).max(10).default(2),
        backoff_ms: z.number().int().min(0).default(500),
    }),
    dispatch: z.object({
        enabled: z.boolean().default(true),
        subject: z.string().min(1),
        body_file: z.string().min(1).nullish(),
        credentials_file: z.string().min(1),
        token_file: z.string().min(1),
        max_attempts: z.number().int().min(1).max(10).default(3),
    }),
    pacing: z.object({
        delay_ms: z.number().int().min(0).default(1000),
    }),
    storage: z.object({
        output_dir: z.string().min(1),
        format: z.enum(['csv', 'excel', 'sqlite', 'all']).default('all'),
    }),
});

export type Config = z.infer<typeof ConfigSchema>;
export type OutputFormat = Config['storage']['format'];
export type CrawlEngine = Config['crawler']['engine'];

let configInstance: Config | null = null;

const DEFAULT_CONFIG_PATH = path.join(__dirname, '../../src/config/default.yaml');

export const parseConfig = (raw: unknown): Config => {
    const result = ConfigSchema.safeParse(raw);
    if (!result.success) {
        const issues = result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`, { issues });
    }
    return applyEnvOverrides(result.data);
};

function applyEnvOverrides(config: Config): Config {
    const env = process.env;
    return {
        ...config,
        crawler: {
            ...config.crawler,
            executable_path: env.CHROME_EXECUTABLE_PATH || config.crawler.executable_path,
        },
        dispatch: {
            ...config.dispatch,
            credentials_file: env.GMAIL_CREDENTIALS_FILE || config.dispatch.credentials_file,
            token_file: env.GMAIL_TOKEN_FILE || config.dispatch.token_file,
        },
        storage: {
            ...config.storage,
            output_dir: env.RESULTS_DIR || config.storage.output_dir,
        },
    };
}

export const loadConfig = (configPath?: string): Config => {
    if (configInstance && !configPath) return configInstance;

    const validPath = configPath || DEFAULT_CONFIG_PATH;
    if (!fs.existsSync(validPath)) {
        throw new ConfigurationError(`Config file not found: ${validPath}`);
    }
    const fileContents = fs.readFileSync(validPath, 'utf8');
    configInstance = parseConfig(yaml.load(fileContents));

    return configInstance;
};

export const getConfig = (): Config => {
    return configInstance ?? loadConfig();
};

export const resetConfig = (): void => {
    configInstance = null;
};
