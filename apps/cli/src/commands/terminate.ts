import type { Command } from "commander";
import ora from "ora";
import { confirm } from "@inquirer/prompts";
import { ensureSetup, type GlobalOptions } from "@/lib/setup.ts";
import { theme, formatCommand } from "@/lib/theme.ts";
import { terminateCluster } from "@/core/lifecycle.ts";
import { CLUSTER_ID_ENV_VAR } from "@/lib/constants.ts";

interface TerminateOptions {
  yes?: boolean;
}

export function registerTerminateCommand(program: Command) {
  program
    .command("terminate")
    .description("Terminate the bound cluster")
    .option("-y, --yes", "skip the confirmation prompt")
    .action(async (options: TerminateOptions, command: Command) => {
      try {
        await runTerminate(options, command.optsWithGlobals<GlobalOptions>());
      } catch (error) {
        if (error instanceof Error) {
          console.error(theme.error(`\nError: ${error.message}`));
        }
        process.exit(1);
      }
    });
}

async function runTerminate(options: TerminateOptions, globals: GlobalOptions) {
  const { emr, session } = ensureSetup(globals);

  if (!session.clusterId) {
    console.log(
      theme.muted(
        '\nNo cluster is bound. Pass --cluster-id or run "emrs bind" first.',
      ),
    );
    return;
  }

  if (!options.yes) {
    const proceed = await confirm({
      message: `Terminate cluster ${session.clusterId}?`,
      default: false,
    });
    if (!proceed) {
      console.log(theme.muted("Cancelled."));
      return;
    }
  }

  const spinner = ora(`Terminating cluster ${session.clusterId}...`).start();
  const terminated = await terminateCluster(emr, session);
  spinner.succeed(
    `Cluster with id ${terminated} is terminating, check the AWS console for progress.`,
  );
  console.log(formatCommand(`unset ${CLUSTER_ID_ENV_VAR}`));
}
