import { z } from "zod";
import type { LightConfig } from "./util/types.js";

// Node clamps larger timer delays to 1 ms.
const MAX_TIMER_MS = 2_147_483_647;

// A variable that is set but empty falls back to the default.
const unsetIfBlank = (v: unknown) => (typeof v === "string" && v.trim() === "" ? undefined : v);

const int = (fallback: number) => z.preprocess(unsetIfBlank, z.coerce.number().int().default(fallback));
const flag = z
  .string()
  .optional()
  .transform((v) => /^true$/i.test(v || "false"));

const EnvSchema = z
  .object({
    LIGHT_HOST: z.string().trim().min(1, "device host is required"),
    LIGHT_PORT: int(9123).pipe(z.number().min(1).max(65535)),
    LIGHT_PATH: z.preprocess(unsetIfBlank, z.string().startsWith("/").default("/elgato/lights")),
    LIGHT_TIMEOUT_MS: int(3000).pipe(z.number().positive().max(MAX_TIMER_MS)),
    LIGHT_DRY_RUN: flag,
    LIGHT_DEBOUNCE_MS: int(250).pipe(z.number().nonnegative().max(MAX_TIMER_MS)),
    LIGHT_BRIGHTNESS_MIN: int(3),
    LIGHT_BRIGHTNESS_MAX: int(100),
    LIGHT_BRIGHTNESS_STEP: int(10).pipe(z.number().min(1)),
    LIGHT_BRIGHTNESS_INITIAL: int(50),
    LIGHT_TEMPERATURE_MIN: int(143),
    LIGHT_TEMPERATURE_MAX: int(344),
    LIGHT_TEMPERATURE_STEP: int(10).pipe(z.number().min(1)),
    LIGHT_TEMPERATURE_INITIAL: int(170),
  })
  .superRefine((env, ctx) => {
    if (env.LIGHT_BRIGHTNESS_MIN > env.LIGHT_BRIGHTNESS_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["LIGHT_BRIGHTNESS_MIN"],
        message: "must not exceed LIGHT_BRIGHTNESS_MAX",
      });
    }
    if (env.LIGHT_TEMPERATURE_MIN > env.LIGHT_TEMPERATURE_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["LIGHT_TEMPERATURE_MIN"],
        message: "must not exceed LIGHT_TEMPERATURE_MAX",
      });
    }
  });

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LightConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new Error(`Invalid light configuration: ${issues.join("; ")}`);
  }
  const e = parsed.data;
  return {
    endpoint: {
      host: e.LIGHT_HOST,
      port: e.LIGHT_PORT,
      path: e.LIGHT_PATH,
      timeoutMs: e.LIGHT_TIMEOUT_MS,
      dryRun: e.LIGHT_DRY_RUN,
    },
    controller: {
      debounceMs: e.LIGHT_DEBOUNCE_MS,
      brightness: {
        min: e.LIGHT_BRIGHTNESS_MIN,
        max: e.LIGHT_BRIGHTNESS_MAX,
        step: e.LIGHT_BRIGHTNESS_STEP,
        initial: e.LIGHT_BRIGHTNESS_INITIAL,
      },
      temperature: {
        min: e.LIGHT_TEMPERATURE_MIN,
        max: e.LIGHT_TEMPERATURE_MAX,
        step: e.LIGHT_TEMPERATURE_STEP,
        initial: e.LIGHT_TEMPERATURE_INITIAL,
      },
    },
  };
}
