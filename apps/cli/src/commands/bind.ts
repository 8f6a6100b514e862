import type { Command } from "commander";
import ora from "ora";
import { select } from "@inquirer/prompts";
import { ensureSetup, type GlobalOptions } from "@/lib/setup.ts";
import { theme, formatCommand } from "@/lib/theme.ts";
import { listActiveClusters } from "@/core/cluster-registry.ts";
import { bindCluster } from "@/core/lifecycle.ts";
import { formatBindHint } from "@/core/session.ts";

export function registerBindCommand(program: Command) {
  program
    .command("bind")
    .description("Bind later commands to an active cluster")
    .argument("[clusterId]", "cluster to bind (default: pick from active clusters)")
    .action(
      async (clusterId: string | undefined, _options: object, command: Command) => {
        try {
          await runBind(clusterId, command.optsWithGlobals<GlobalOptions>());
        } catch (error) {
          if (error instanceof Error) {
            console.error(theme.error(`\nError: ${error.message}`));
          }
          process.exit(1);
        }
      },
    );
}

async function runBind(clusterId: string | undefined, globals: GlobalOptions) {
  const { emr } = ensureSetup(globals);

  let targetId = clusterId;
  if (!targetId) {
    const spinner = ora("Fetching active clusters...").start();
    const clusters = await listActiveClusters(emr);
    spinner.stop();

    if (clusters.size === 0) {
      console.log(theme.muted("\nNo active cluster found."));
      return;
    }

    targetId = await select({
      message: "Cluster to bind",
      choices: Array.from(clusters.values()).map((c) => ({
        name: `${c.id}  ${c.name}  (${c.state})`,
        value: c.id,
      })),
    });
  }

  const cluster = await bindCluster(emr, targetId);
  console.log(
    theme.success(`\nBound to cluster ${cluster.id}`) +
      theme.muted(` ("${cluster.name}", ${cluster.state})`),
  );
  console.log(theme.muted("Run this to keep it bound in your shell:"));
  console.log(formatCommand(formatBindHint(cluster.id)));
}
