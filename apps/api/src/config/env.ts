import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

const truthyTokens = new Set(["1", "true", "yes", "on"]);
const booleanLike = z
  .string()
  .optional()
  .transform((value) => truthyTokens.has((value ?? "").trim().toLowerCase()));

const optionalText = z
  .string()
  .optional()
  .transform((value) => value?.trim() || undefined);

export const QR_CODE_APPS = [
  "web",
  "android",
  "ios",
  "linux",
  "mac",
  "windows",
  "tv",
  "alipaymini",
  "wechatmini",
  "qandroid"
] as const;

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/114.0.0.0 Safari/537.36 115Browser/27.0.5.7";

const currentDir = path.dirname(fileURLToPath(import.meta.url));
const rootEnvPath = path.resolve(currentDir, "../../../../.env");
const apiEnvPath = path.resolve(currentDir, "../../.env");
const cwdEnvPath = path.resolve(process.cwd(), ".env");

export const envSchema = z.object({
  NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
  API_PORT: z.coerce.number().default(8080),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
  CLOUD115_COOKIE: optionalText,
  CLOUD115_QRCODE_TOKEN: optionalText,
  CLOUD115_QRCODE_SOURCE: z.enum(QR_CODE_APPS).default("linux"),
  CLOUD115_PAGE_SIZE: z.coerce.number().int().default(1000),
  CLOUD115_USER_AGENT: z.string().min(1).default(DEFAULT_USER_AGENT),
  CLOUD115_PROXY_URL: optionalText,
  CLOUD115_TLS_INSECURE_SKIP_VERIFY: booleanLike,
  CLOUD115_ECDH_PEER_KEY: z
    .string()
    .regex(/^04[0-9a-fA-F]{112}$/, "must be an uncompressed P-224 point in hex")
    .optional()
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const message = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid environment variables: ${message}`);
  }
  return parsed.data;
}

let cached: Env | null = null;

export function loadEnv(): Env {
  if (cached) {
    return cached;
  }
  dotenv.config({ path: rootEnvPath });
  dotenv.config({ path: apiEnvPath, override: true });
  dotenv.config({ path: cwdEnvPath, override: true });
  cached = parseEnv(process.env);
  return cached;
}
