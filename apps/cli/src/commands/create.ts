import type { Command } from "commander";
import ora from "ora";
import { ensureSetup, type GlobalOptions } from "@/lib/setup.ts";
import { theme, formatCommand } from "@/lib/theme.ts";
import { buildCreationRequestFromConfig } from "@/core/request-builder.ts";
import { createCluster } from "@/core/lifecycle.ts";
import { formatBindHint } from "@/core/session.ts";

export function registerCreateCommand(program: Command) {
  program
    .command("create")
    .description("Create a long-lived cluster from the project config")
    .action(async (_options: object, command: Command) => {
      try {
        await runCreate(command.optsWithGlobals<GlobalOptions>());
      } catch (error) {
        if (error instanceof Error) {
          console.error(theme.error(`\nError: ${error.message}`));
        }
        process.exit(1);
      }
    });
}

async function runCreate(globals: GlobalOptions) {
  const { config, emr } = ensureSetup(globals);
  const spec = buildCreationRequestFromConfig(config);

  const spinner = ora(`Creating cluster "${spec.name}"...`).start();
  const clusterId = await createCluster(emr, spec);
  spinner.succeed(
    `Your new cluster's id is ${clusterId}, you may check its status on the AWS console.`,
  );

  console.log(theme.muted("\nBind it for later commands:"));
  console.log(formatCommand(formatBindHint(clusterId)));
}
