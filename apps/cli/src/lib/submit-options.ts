import type { EmrSparkConfig } from "@emr-spark/shared";
import { ConfigError } from "./errors.ts";

export interface SubmitOptions {
  class?: string;
  jar?: string;
  conf?: string[];
  wait?: boolean;
  timeout?: string;
  json?: boolean;
}

export interface SubmitTarget {
  mainClass: string;
  jarPath: string;
  jarFolder: string;
  submitConfs: Record<string, string>;
}

/** Parse repeated `--conf key=value` flags; the value may itself contain "=". */
export function parseConfPairs(pairs: readonly string[]): Record<string, string> {
  return Object.fromEntries(
    pairs.map((pair): [string, string] => {
      const eqIdx = pair.indexOf("=");
      if (eqIdx < 1) {
        throw new ConfigError(`Invalid --conf "${pair}". Use key=value.`);
      }
      return [pair.slice(0, eqIdx), pair.slice(eqIdx + 1)];
    }),
  );
}

/**
 * Merge command-line flags over the project config. Flags win; `--conf`
 * entries are appended after (or override) `job.submit_confs`.
 */
export function resolveSubmitTarget(
  options: SubmitOptions,
  config: EmrSparkConfig,
): SubmitTarget {
  const mainClass = options.class ?? config.job.main_class;
  if (!mainClass) {
    throw new ConfigError(
      "Can't locate the main class. Set job.main_class or pass --class.",
    );
  }

  const jarPath = options.jar ?? config.job.jar;
  if (!jarPath) {
    throw new ConfigError("No job jar given. Set job.jar or pass --jar.");
  }

  const jarFolder = config.s3.jar_folder;
  if (!jarFolder) {
    throw new ConfigError("s3.jar_folder must be set to submit a job.");
  }

  return {
    mainClass,
    jarPath,
    jarFolder,
    submitConfs: {
      ...config.job.submit_confs,
      ...parseConfPairs(options.conf ?? []),
    },
  };
}
