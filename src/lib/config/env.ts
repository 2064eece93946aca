import { z } from "zod";

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  IMMERSION_API_BASE_URL: z.string().url().default("https://provider.example.com/api"),
  IMMERSION_API_TIMEOUT_MS: z.coerce.number().int().min(1000).max(120000).default(15000)
});

export type Env = z.infer<typeof envSchema>;

let validatedEnv: Env | null = null;

export class InvalidEnvironmentError extends Error {
  constructor(readonly issues: z.ZodIssue[]) {
    super(`Invalid environment: ${issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")}`);
    this.name = "InvalidEnvironmentError";
  }
}

export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new InvalidEnvironmentError(result.error.issues);
  }
  return result.data;
}

export function getEnv(): Env {
  if (process.env.NODE_ENV === "test") {
    validatedEnv = null;
  }
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

export function resolveLogLevel(env: Env): NonNullable<Env["LOG_LEVEL"]> {
  return env.LOG_LEVEL ?? (env.NODE_ENV === "test" ? "silent" : "info");
}
