import type { Command } from "commander";
import { existsSync } from "fs";
import { basename } from "path";
import { input } from "@inquirer/prompts";
import type { GlobalOptions } from "@/lib/setup.ts";
import { theme, formatCommand } from "@/lib/theme.ts";
import { ConfigError } from "@/lib/errors.ts";
import {
  resolveConfigPath,
  saveConfig,
  starterConfig,
} from "@/core/config.ts";

interface InitOptions {
  region?: string;
  name?: string;
  jarFolder?: string;
  force?: boolean;
}

export function registerInitCommand(program: Command) {
  program
    .command("init")
    .description("Write a starter emr-spark.toml for this project")
    .option("--region <region>", "AWS region")
    .option("--name <name>", "cluster name (default: directory name)")
    .option("--jar-folder <s3Url>", "S3 folder for uploaded job jars")
    .option("-f, --force", "overwrite an existing config")
    .action(async (options: InitOptions, command: Command) => {
      try {
        await runInit(options, command.optsWithGlobals<GlobalOptions>());
      } catch (error) {
        if (error instanceof Error) {
          console.error(theme.error(`\nError: ${error.message}`));
        }
        process.exit(1);
      }
    });
}

async function runInit(options: InitOptions, globals: GlobalOptions) {
  const path = resolveConfigPath(globals.config);
  if (existsSync(path) && !options.force) {
    throw new ConfigError(`${path} already exists. Use --force to overwrite.`);
  }

  const region =
    options.region ??
    (await input({ message: "AWS region", default: "us-east-1" }));
  const jarFolder =
    options.jarFolder ??
    (await input({
      message: "S3 folder for job jars",
      validate: (value) =>
        value.startsWith("s3://") || "Must start with s3://",
    }));
  const name = options.name ?? basename(process.cwd());

  saveConfig(path, starterConfig(region, name, jarFolder));

  console.log(theme.success(`\nWrote ${path}`));
  console.log(theme.muted("Next steps:"));
  console.log(formatCommand("emrs create          # start a long-lived cluster"));
  console.log(formatCommand("emrs submit -w       # or run one job on an ephemeral one"));
}
