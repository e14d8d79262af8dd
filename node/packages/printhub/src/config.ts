type Env = Record<string, string | undefined>;

const DEFAULT_ORIGINS = [
  "http://localhost:3000",
  "http://127.0.0.1:3000",
  "http://localhost:5173",
  "http://127.0.0.1:5173",
  "http://localhost:4173",
  "http://127.0.0.1:4173",
];

const DEFAULT_FILE_TYPES = [".stl", ".obj", ".3mf", ".jpg", ".jpeg", ".png"];

function required(env: Env, name: string): string {
  const value = env[name];
  if (value === undefined || value === "") {
    console.error(`ERROR: Required environment variable ${name} is not set`);
    process.exit(1);
  }
  return value;
}

function optional(env: Env, name: string, defaultValue: string): string {
  const value = env[name];
  return value === undefined || value === "" ? defaultValue : value;
}

function optionalInt(env: Env, name: string, defaultValue: number): number {
  const value = env[name];
  if (value === undefined || value === "") return defaultValue;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function optionalBool(env: Env, name: string, defaultValue: boolean): boolean {
  const value = env[name];
  if (value === undefined || value === "") return defaultValue;
  return ["true", "1", "yes", "on"].includes(value.toLowerCase());
}

function optionalList(env: Env, name: string, defaultValue: string[]): string[] {
  const value = env[name];
  if (value === undefined || value === "") return defaultValue;
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function loadConfig(env: Env = process.env) {
  const environment = optional(env, "NODE_ENV", "development");
  const isProduction = environment === "production";

  return {
    environment,
    isProduction,
    server: {
      host: optional(env, "HOST", "0.0.0.0"),
      port: optionalInt(env, "PORT", 8000),
      workers: Math.max(1, optionalInt(env, "WORKERS", 1)),
    },
    auth: {
      secretKey: isProduction
        ? required(env, "SECRET_KEY")
        : optional(env, "SECRET_KEY", "dev-secret-change-me"),
      accessTokenExpireMinutes: optionalInt(
        env,
        "ACCESS_TOKEN_EXPIRE_MINUTES",
        30,
      ),
    },
    db: {
      url: optional(env, "DATABASE_URL", "sqlite:./data/printhub.db"),
    },
    cache: {
      redisUrl: env.REDIS_URL || undefined,
      defaultTtlSeconds: optionalInt(env, "CACHE_TTL_SECONDS", 300),
    },
    storage: {
      useS3: optionalBool(env, "USE_S3", false),
      uploadDir: optional(env, "UPLOAD_DIR", "uploads"),
      maxFileSize: optionalInt(env, "MAX_FILE_SIZE", 50 * 1024 * 1024),
      allowedFileTypes: optionalList(
        env,
        "ALLOWED_FILE_TYPES",
        DEFAULT_FILE_TYPES,
      ).map((ext) => ext.toLowerCase()),
      s3: {
        accessKeyId: optional(env, "S3_ACCESS_KEY", ""),
        secretAccessKey: optional(env, "S3_SECRET_KEY", ""),
        bucket: optional(env, "S3_BUCKET_NAME", "printhub"),
        region: optional(env, "S3_REGION", "us-east-1"),
        endpoint: env.S3_ENDPOINT_URL || undefined,
      },
    },
    cors: {
      allowedOrigins: optionalList(env, "ALLOWED_ORIGINS", DEFAULT_ORIGINS),
    },
    notifications: {
      telegramWebhookUrl: optional(env, "TELEGRAM_BOT_WEBHOOK_URL", ""),
    },
    docs: {
      enabled: !isProduction,
    },
    logging: {
      level: optional(env, "LOG_LEVEL", "info"),
    },
  };
}

export type Config = ReturnType<typeof loadConfig>;
