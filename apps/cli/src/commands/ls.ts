import type { Command } from "commander";
import ora from "ora";
import { ensureSetup, type GlobalOptions } from "@/lib/setup.ts";
import { theme, formatClusterState } from "@/lib/theme.ts";
import { listActiveClusters } from "@/core/cluster-registry.ts";

interface LsOptions {
  json?: boolean;
}

export function registerLsCommand(program: Command) {
  program
    .command("ls")
    .alias("list")
    .description("List active clusters")
    .option("--json", "output as JSON")
    .action(async (options: LsOptions, command: Command) => {
      try {
        await runLs(options, command.optsWithGlobals<GlobalOptions>());
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

async function runLs(options: LsOptions, globals: GlobalOptions) {
  const { emr, session } = ensureSetup(globals);
  const isJson = !!options.json;

  const spinner = isJson ? null : ora("Fetching clusters...").start();
  const clusters = Array.from((await listActiveClusters(emr)).values());
  spinner?.stop();

  if (isJson) {
    console.log(JSON.stringify({ clusters }, null, 2));
    return;
  }

  if (clusters.length === 0) {
    console.log(theme.muted("\nNo active cluster found."));
    return;
  }

  console.log(theme.info(`\n${clusters.length} active clusters found:`));
  console.log(
    theme.muted(`  ${"ID".padEnd(18)}${"Name".padEnd(28)}State`),
  );
  for (const c of clusters) {
    const marker = c.id === session.clusterId ? theme.accent(" (bound)") : "";
    console.log(
      `  ${c.id.padEnd(18)}${c.name.padEnd(28).slice(0, 27).padEnd(28)}${formatClusterState(c.state)}${marker}`,
    );
  }
  console.log();
}
