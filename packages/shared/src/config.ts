import { z } from 'zod';

const booleanFlag = (fallback: boolean) =>
    z.enum(['true', 'false', '1', '0'])
        .optional()
        .transform(value => value === undefined ? fallback : value === 'true' || value === '1');

const ConfigSchema = z.object({
    PORT: z.coerce.number().int().positive().default(5000),
    DATABASE_PATH: z.string().min(1).default('carewatch.db'),
    DATA_DIR: z.string().min(1).default('attached_assets'),
    DEFAULT_DEVICE_ID: z.string().min(1).default('D1000'),

    LLM_ENABLED: booleanFlag(true),
    LLM_BASE_URL: z.string().url().default('http://localhost:11434/v1'),
    LLM_API_KEY: z.string().min(1).default('ollama'),
    LLM_MODEL: z.string().min(1).default('llama3'),
    LLM_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.3),
    EMBEDDING_MODEL: z.string().min(1).default('nomic-embed-text'),

    REDIS_URL: z.string().default('redis://localhost:6379'),
    QUEUE_ENABLED: booleanFlag(true),
    AGENT_SWEEP_INTERVAL_MINUTES: z.coerce.number().int().min(0).default(15),

    TWILIO_ACCOUNT_SID: z.string().optional(),
    TWILIO_AUTH_TOKEN: z.string().optional(),
    TWILIO_FROM_NUMBER: z.string().optional(),

    REMINDER_LOOKAHEAD_MINUTES: z.coerce.number().int().min(0).default(30),
    REMINDER_MISSED_AFTER_MINUTES: z.coerce.number().int().min(0).default(60),
});

export interface AppConfig {
    port: number;
    databasePath: string;
    dataDir: string;
    defaultDeviceId: string;
    llm: {
        enabled: boolean;
        baseUrl: string;
        apiKey: string;
        model: string;
        temperature: number;
        embeddingModel: string;
    };
    queue: {
        enabled: boolean;
        redisUrl: string;
        sweepIntervalMinutes: number;
    };
    twilio?: {
        accountSid: string;
        authToken: string;
        fromNumber: string;
    };
    reminders: {
        lookaheadMinutes: number;
        missedAfterMinutes: number;
    };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = ConfigSchema.safeParse(env);

    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
        throw new Error(`Invalid configuration: ${issues.join('; ')}`);
    }

    const values = parsed.data;
    const { TWILIO_ACCOUNT_SID, TWILIO_AUTH_TOKEN, TWILIO_FROM_NUMBER } = values;

    return {
        port: values.PORT,
        databasePath: values.DATABASE_PATH,
        dataDir: values.DATA_DIR,
        defaultDeviceId: values.DEFAULT_DEVICE_ID,
        llm: {
            enabled: values.LLM_ENABLED,
            baseUrl: values.LLM_BASE_URL,
            apiKey: values.LLM_API_KEY,
            model: values.LLM_MODEL,
            temperature: values.LLM_TEMPERATURE,
            embeddingModel: values.EMBEDDING_MODEL,
        },
        queue: {
            enabled: values.QUEUE_ENABLED,
            redisUrl: values.REDIS_URL,
            sweepIntervalMinutes: values.AGENT_SWEEP_INTERVAL_MINUTES,
        },
        twilio: TWILIO_ACCOUNT_SID && TWILIO_AUTH_TOKEN && TWILIO_FROM_NUMBER
            ? { accountSid: TWILIO_ACCOUNT_SID, authToken: TWILIO_AUTH_TOKEN, fromNumber: TWILIO_FROM_NUMBER }
            : undefined,
        reminders: {
            lookaheadMinutes: values.REMINDER_LOOKAHEAD_MINUTES,
            missedAfterMinutes: values.REMINDER_MISSED_AFTER_MINUTES,
        },
    };
}

export function redisConnection(redisUrl: string): { host: string; port: number } {
    const url = new URL(redisUrl);
    return {
        host: url.hostname,
        port: parseInt(url.port || '6379')
    };
}
