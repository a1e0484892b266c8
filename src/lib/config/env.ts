import { z } from "zod";

const DEFAULT_PIPELINES = "default,1305376,1313057,2453638,6617404,17494655,1305377";

const csvList = z
  .string()
  .transform((val) =>
    val
      .split(",")
      .map((s) => s.trim())
      .filter((s) => s.length > 0)
  );

const envSchema = z
  .object({
    DATABASE_URL: z.string().optional(),
    ACV_PIPELINE_ALLOW_LIST: csvList.default(DEFAULT_PIPELINES),
    ACV_NEW_BUSINESS_PIPELINE_ID: z.string().default("default"),
    ACV_RENEWAL_PIPELINE_ID: z.string().optional(),
    ACV_RENEWAL_STAGE_ID: z.string().optional(),
    ACV_RENEWAL_POLICY: z.enum(["rolling-window", "calendar-year"]).default("rolling-window"),
    ACV_RENEWAL_DETECTION: z.enum(["renewal-period", "pipeline-stage"]).default("renewal-period"),
    CACHE_TTL_MS: z.coerce.number().int().positive().default(15 * 60 * 1000),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  })
  .superRefine((env, ctx) => {
    if (env.ACV_RENEWAL_DETECTION !== "pipeline-stage") return;
    for (const key of ["ACV_RENEWAL_PIPELINE_ID", "ACV_RENEWAL_STAGE_ID"] as const) {
      if (!env[key]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key],
          message: "is required when ACV_RENEWAL_DETECTION is pipeline-stage",
        });
      }
    }
  });

export type Env = z.infer<typeof envSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (_env) return _env;
  _env = envSchema.parse(process.env);
  return _env;
}

/** Parse an explicit environment object without touching the memoized one. */
export function parseEnv(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

export function resetEnv(): void {
  _env = null;
}
