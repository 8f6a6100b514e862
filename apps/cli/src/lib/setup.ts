import type { EmrSparkConfig, Session } from "@emr-spark/shared";
import { EmrClient } from "@/core/emr.ts";
import { loadConfig, resolveConfigPath } from "@/core/config.ts";
import { resolveSession } from "@/core/session.ts";

/** Options registered on the root program, visible to every command. */
export type GlobalOptions = {
  config?: string;
  clusterId?: string;
};

export function ensureSetup(globals: GlobalOptions): {
  config: EmrSparkConfig;
  configPath: string;
  emr: EmrClient;
  session: Session;
} {
  const configPath = resolveConfigPath(globals.config);
  const config = loadConfig(configPath);
  const emr = EmrClient.fromConfig(config);
  const session = resolveSession(globals);
  return { config, configPath, emr, session };
}
