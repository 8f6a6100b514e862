import { existsSync, readFileSync, writeFileSync } from "fs";
import { basename } from "path";
import { parse as parseTOML, stringify as stringifyTOML } from "smol-toml";
import { z } from "zod";
import type { EmrConfigurationToml, EmrSparkConfig } from "@emr-spark/shared";
import { CONFIG_DEFAULTS } from "@emr-spark/shared";
import {
  CONFIG_ENV_VAR,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG_PATH,
} from "@/lib/constants.ts";
import { ConfigError } from "@/lib/errors.ts";
import { parseDuration } from "@/lib/duration.ts";

const EmrConfigurationSchema: z.ZodType<EmrConfigurationToml> = z.lazy(() =>
  z.object({
    classification: z.string().min(1),
    properties: z.record(z.string()).optional(),
    configurations: z.array(EmrConfigurationSchema).optional(),
  }),
);

export function createConfigSchema(defaultClusterName: string) {
  return z.object({
    aws: z.object({
      region: z.string().min(1),
      profile: z.string().optional(),
      max_attempts: z.number().int().positive().optional(),
    }),
    cluster: z
      .object({
        name: z.string().min(1).default(defaultClusterName),
        release: z.string().default(CONFIG_DEFAULTS.release),
        service_role: z.string().default(CONFIG_DEFAULTS.serviceRole),
        applications: z
          .array(z.string())
          .default([...CONFIG_DEFAULTS.applications]),
        log_uri: z.string().startsWith("s3://").optional(),
        configurations: z.array(EmrConfigurationSchema).default([]),
      })
      .default({}),
    instances: z
      .object({
        count: z
          .number()
          .int("instances.count must be a whole number")
          .min(1, "instances.count must be at least 1")
          .default(CONFIG_DEFAULTS.instanceCount),
        type: z.string().default(CONFIG_DEFAULTS.instanceType),
        bid_price: z.number().positive().optional(),
        role: z.string().default(CONFIG_DEFAULTS.instanceRole),
        key_name: z.string().optional(),
        subnet_id: z.string().optional(),
        security_group_ids: z.array(z.string()).default([]),
      })
      .default({}),
    s3: z
      .object({
        jar_folder: z.string().startsWith("s3://").optional(),
        server_side_encryption: z.enum(["AES256", "aws:kms"]).optional(),
      })
      .default({}),
    job: z
      .object({
        main_class: z.string().optional(),
        jar: z.string().optional(),
        timeout: z
          .string()
          .default(CONFIG_DEFAULTS.timeout)
          .refine(isDuration, "job.timeout must look like 90m, 2h or HH:MM:SS"),
        submit_confs: z.record(z.string()).default({}),
      })
      .default({}),
  });
}

function isDuration(value: string): boolean {
  try {
    parseDuration(value);
    return true;
  } catch {
    return false;
  }
}

export function resolveConfigPath(explicit?: string): string {
  return explicit ?? process.env[CONFIG_ENV_VAR] ?? DEFAULT_CONFIG_PATH;
}

/** Validate an already-parsed TOML document. */
export function parseConfig(
  raw: unknown,
  defaultClusterName: string,
  source = CONFIG_FILE_NAME,
): EmrSparkConfig {
  const result = createConfigSchema(defaultClusterName).safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join(", ");
    throw new ConfigError(`Invalid config at ${source}: ${issues}`);
  }
  return result.data;
}

export function loadConfig(path: string): EmrSparkConfig {
  if (!existsSync(path)) {
    throw new ConfigError(
      `No config found at ${path}. Run "emrs init" to create one.`,
    );
  }

  let raw: unknown;
  try {
    raw = parseTOML(readFileSync(path, "utf-8"));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read config at ${path}: ${detail}`);
  }
  return parseConfig(raw, basename(process.cwd()), path);
}

export function starterConfig(
  region: string,
  clusterName: string,
  jarFolder: string,
) {
  return {
    aws: { region },
    cluster: {
      name: clusterName,
      release: CONFIG_DEFAULTS.release,
      service_role: CONFIG_DEFAULTS.serviceRole,
      applications: [...CONFIG_DEFAULTS.applications],
    },
    instances: {
      count: CONFIG_DEFAULTS.instanceCount,
      type: CONFIG_DEFAULTS.instanceType,
      role: CONFIG_DEFAULTS.instanceRole,
      security_group_ids: [],
    },
    s3: { jar_folder: jarFolder },
    job: { timeout: CONFIG_DEFAULTS.timeout, submit_confs: {} },
  };
}

export function saveConfig(
  path: string,
  document: ReturnType<typeof starterConfig>,
): void {
  parseConfig(document, document.cluster.name, path);
  writeFileSync(path, stringifyTOML(document) + "\n");
}
