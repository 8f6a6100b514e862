import type { Command } from "commander";
import ora from "ora";
import { ensureSetup, type GlobalOptions } from "@/lib/setup.ts";
import { theme } from "@/lib/theme.ts";
import { parseDuration } from "@/lib/duration.ts";
import { resolveSubmitTarget, type SubmitOptions } from "@/lib/submit-options.ts";
import { buildCreationRequestFromConfig } from "@/core/request-builder.ts";
import { submitJob } from "@/core/job-submitter.ts";
import {
  createS3Client,
  decoratorFromConfig,
  uploadArtifact,
} from "@/core/artifact-store.ts";
import { watchCluster } from "./monitor.ts";

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function registerSubmitCommand(program: Command) {
  program
    .command("submit")
    .description(
      "Upload the job jar and run it on the named cluster, or on a new ephemeral one",
    )
    .passThroughOptions()
    .argument("[args...]", "arguments passed to the job's main class")
    .option("-c, --class <mainClass>", "main class (default: job.main_class)")
    .option("-j, --jar <path>", "local jar to upload (default: job.jar)")
    .option("--conf <key=value>", "extra spark-submit --conf (repeatable)", collect)
    .option("-w, --wait", "monitor the cluster until it finishes")
    .option("-t, --timeout <duration>", "timeout for --wait (default: job.timeout)")
    .option("--json", "output as JSON")
    .action(
      async (args: string[], options: SubmitOptions, command: Command) => {
        try {
          await runSubmit(args, options, command.optsWithGlobals<GlobalOptions>());
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
      },
    );
}

async function runSubmit(
  args: string[],
  options: SubmitOptions,
  globals: GlobalOptions,
) {
  const { config, emr } = ensureSetup(globals);
  const target = resolveSubmitTarget(options, config);
  const creationRequest = buildCreationRequestFromConfig(config);
  const isJson = !!options.json;
  const timeoutMs = parseDuration(options.timeout ?? config.job.timeout);

  const uploadSpinner = isJson
    ? null
    : ora(`Putting ${target.jarPath} to ${target.jarFolder}...`).start();
  const artifactLocation = await uploadArtifact(
    createS3Client(config),
    target.jarPath,
    target.jarFolder,
    decoratorFromConfig(config),
  );
  uploadSpinner?.succeed(`Uploaded ${artifactLocation}`);

  const submitSpinner = isJson ? null : ora("Submitting job...").start();
  const result = await submitJob(emr, {
    clusterName: config.cluster.name,
    mainClass: target.mainClass,
    args,
    submitConfs: target.submitConfs,
    artifactLocation,
    creationRequest,
  });

  const waitForEphemeral = !!options.wait && result.created;

  if (isJson) {
    const monitor = waitForEphemeral
      ? await watchCluster(emr, result.clusterId, timeoutMs, { quiet: true })
      : undefined;
    console.log(
      JSON.stringify({ ...result, artifactLocation, monitor }, null, 2),
    );
    return;
  }

  if (result.created) {
    submitSpinner?.succeed(
      `Your new cluster's id is ${result.clusterId}, you may check its status on the AWS console.`,
    );
  } else {
    submitSpinner?.succeed(
      `Your job is added to the cluster with id ${result.clusterId}, you may check its status on the AWS console.`,
    );
  }

  if (!options.wait) return;
  if (!waitForEphemeral) {
    console.log(
      theme.warning(
        "\n--wait only applies to ephemeral clusters; the named cluster stays up after the job.",
      ),
    );
    return;
  }

  await watchCluster(emr, result.clusterId, timeoutMs);
  console.log(theme.success("Cluster terminated without error."));
}
