import { config } from "dotenv";
import { resolve, dirname } from "path";
import { fileURLToPath } from "url";
import { z } from "zod";
import {
    DEFAULT_MARKET_CACHE_TTL_MS,
    DEFAULT_MAX_CONCURRENCY,
    MAX_DISCOUNT_PERCENT,
} from "@hub-appraiser/shared";

// Load .env from the repo root (four levels up from apps/appraiser/src/config)
const __dirname = dirname(fileURLToPath(import.meta.url));
config({ path: resolve(__dirname, "../../../../.env") });

const envSchema = z.object({
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    LOG_LEVEL: z
        .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
        .default("info"),
    ESI_BASE_URL: z.string().url().default("https://esi.evetech.net/latest/"),
    ESI_USER_AGENT: z.string().min(1).default("hub-appraiser/0.1.0"),
    ESI_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
    ESI_MAX_RPS: z.coerce.number().int().positive().default(20),
    MARKET_CACHE_TTL_MS: z.coerce.number().int().nonnegative().default(DEFAULT_MARKET_CACHE_TTL_MS),
    VALUATION_MAX_CONCURRENCY: z.coerce.number().int().positive().default(DEFAULT_MAX_CONCURRENCY),
    DISCOUNT_CAP_PERCENT: z.coerce
        .number()
        .int()
        .min(1)
        .max(MAX_DISCOUNT_PERCENT)
        .default(MAX_DISCOUNT_PERCENT),
});

export type Env = z.infer<typeof envSchema>;

function loadEnv(): Env {
    const result = envSchema.safeParse(process.env);
    if (!result.success) {
        console.error("❌ Invalid environment variables:");
        console.error(result.error.format());
        process.exit(1);
    }
    return result.data;
}

export const env = loadEnv();
