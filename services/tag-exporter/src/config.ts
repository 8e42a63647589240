import { fileURLToPath } from "node:url";
import { z } from "zod";

const DEFAULT_JOBS_CONFIG_PATH = fileURLToPath(new URL("../jobs.json", import.meta.url));

const configSchema = z.object({
  PORT: z.coerce.number().int().positive().default(3000),
  AWS_REGIONS: z
    .string()
    .default("eu-west-2")
    .transform((v) => v.split(",").map((r) => r.trim()).filter((r) => r.length > 0))
    .pipe(z.array(z.string()).min(1, "AWS_REGIONS must name at least one region")),
  AWS_ROLE_ARN: z.string().min(1).optional(),
  JOBS_CONFIG_PATH: z.string().min(1).default(DEFAULT_JOBS_CONFIG_PATH),
  LABELS_SNAKE_CASE: z
    .enum(["true", "false"])
    .default("true")
    .transform((v) => v === "true"),
});

export type Config = z.infer<typeof configSchema>;

let config: Config | null = null;

export function getConfig(): Config {
  if (!config) {
    config = configSchema.parse(process.env);
  }
  return config;
}

export function loadConfig(env: Record<string, string | undefined>): Config {
  return configSchema.parse(env);
}

export function resetConfig(): void {
  config = null;
}
