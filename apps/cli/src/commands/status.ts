import type { Command } from "commander";
import ora from "ora";
import type { ClusterHandle } from "@emr-spark/shared";
import { ensureSetup, type GlobalOptions } from "@/lib/setup.ts";
import {
  theme,
  formatClusterState,
  formatDetail,
  formatSectionHeader,
} from "@/lib/theme.ts";
import {
  findClusterById,
  findClusterByName,
} from "@/core/cluster-registry.ts";

interface StatusOptions {
  json?: boolean;
}

export function registerStatusCommand(program: Command) {
  program
    .command("status")
    .description("Show the bound cluster, or the one named in the config")
    .option("--json", "output as JSON")
    .action(async (options: StatusOptions, command: Command) => {
      try {
        await runStatus(options, command.optsWithGlobals<GlobalOptions>());
      } catch (error) {
        if (options.json) {
          console.log(
            JSON.stringify({
              error: error instanceof Error ? error.message : String(error),
            }),
          );
        } else if (error instanceof Error) {
          console.error(theme.error(`\nError: ${error.message}`));
        }
        process.exit(1);
      }
    });
}

async function runStatus(options: StatusOptions, globals: GlobalOptions) {
  const { config, configPath, emr, session } = ensureSetup(globals);
  const isJson = !!options.json;

  const spinner = isJson ? null : ora("Fetching cluster...").start();
  let cluster: ClusterHandle | null;
  if (session.clusterId) {
    cluster = await findClusterById(emr, session.clusterId);
  } else {
    cluster = await findClusterByName(emr, config.cluster.name);
  }
  spinner?.stop();

  if (isJson) {
    console.log(
      JSON.stringify(
        { bound: session.clusterId ?? null, cluster },
        null,
        2,
      ),
    );
    return;
  }

  console.log(formatSectionHeader("Project"));
  console.log(formatDetail("config", configPath));
  console.log(formatDetail("cluster name", config.cluster.name));
  console.log(formatDetail("region", config.aws.region));

  console.log(formatSectionHeader("Cluster"));
  if (!cluster) {
    console.log(theme.muted("  No active cluster found."));
    console.log();
    return;
  }
  console.log(formatDetail("id", cluster.id));
  console.log(formatDetail("name", cluster.name));
  console.log(`  ${theme.muted("state:")} ${formatClusterState(cluster.state)}`);
  console.log(
    formatDetail("bound", session.clusterId ? "yes" : "no (matched by name)"),
  );
  console.log();
}
