#!/usr/bin/env -S npx tsx
import { readFileSync } from "fs";
import { Command } from "commander";
import { z } from "zod";
import { registerInitCommand } from "./src/commands/init.ts";
import { registerCreateCommand } from "./src/commands/create.ts";
import { registerBindCommand } from "./src/commands/bind.ts";
import { registerTerminateCommand } from "./src/commands/terminate.ts";
import { registerSubmitCommand } from "./src/commands/submit.ts";
import { registerLsCommand } from "./src/commands/ls.ts";
import { registerMonitorCommand } from "./src/commands/monitor.ts";
import { registerStatusCommand } from "./src/commands/status.ts";

const pkg = z
  .object({ version: z.string() })
  .parse(
    JSON.parse(
      readFileSync(new URL("./package.json", import.meta.url), "utf-8"),
    ),
  );

async function main() {
  const program = new Command();

  program
    .version(pkg.version)
    .name("emrs")
    .enablePositionalOptions()
    .description("launch EMR clusters and run Spark jobs on them")
    .option("--config <path>", "project config (default: ./emr-spark.toml)")
    .option(
      "--cluster-id <id>",
      "bound cluster (default: $EMR_SPARK_CLUSTER_ID)",
    );

  registerInitCommand(program);
  registerCreateCommand(program);
  registerBindCommand(program);
  registerTerminateCommand(program);
  registerSubmitCommand(program);
  registerLsCommand(program);
  registerMonitorCommand(program);
  registerStatusCommand(program);

  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
