import type { Command } from "commander";
import type { MonitorResult } from "@emr-spark/shared";
import { ensureSetup, type GlobalOptions } from "@/lib/setup.ts";
import { theme } from "@/lib/theme.ts";
import { parseDuration, formatDuration } from "@/lib/duration.ts";
import { MONITOR_TICK_MARK } from "@/lib/constants.ts";
import type { EmrApi } from "@/core/emr.ts";
import { findClusterByName } from "@/core/cluster-registry.ts";
import { monitorCluster } from "@/core/cluster-monitor.ts";

interface MonitorOptions {
  timeout?: string;
}

export function registerMonitorCommand(program: Command) {
  program
    .command("monitor")
    .description(
      "Wait for a cluster to finish; terminate it if it outlives the timeout",
    )
    .option("-t, --timeout <duration>", "timeout (default: job.timeout)")
    .action(async (options: MonitorOptions, command: Command) => {
      try {
        await runMonitor(options, command.optsWithGlobals<GlobalOptions>());
      } catch (error) {
        if (error instanceof Error) {
          console.error(theme.error(`\nError: ${error.message}`));
        }
        process.exit(1);
      }
    });
}

export interface WatchOptions {
  /** No progress output, for --json */
  quiet?: boolean;
  pollIntervalMs?: number;
}

/**
 * Monitor with dot-per-poll progress. Ctrl-C stops watching but leaves
 * the cluster alone.
 */
export async function watchCluster(
  emr: EmrApi,
  clusterId: string,
  timeoutMs: number,
  options: WatchOptions = {},
): Promise<MonitorResult> {
  const controller = new AbortController();
  const onSigint = () => controller.abort();
  process.once("SIGINT", onSigint);

  if (!options.quiet) {
    console.log(
      theme.muted(
        `Monitoring cluster ${clusterId} (timeout ${formatDuration(timeoutMs)})`,
      ),
    );
  }
  try {
    return await monitorCluster(emr, clusterId, timeoutMs, {
      signal: controller.signal,
      ...(options.pollIntervalMs !== undefined
        ? { pollIntervalMs: options.pollIntervalMs }
        : {}),
      onTick: (tick) => {
        if (tick.phase === "active" && !options.quiet) {
          process.stdout.write(MONITOR_TICK_MARK);
        }
      },
    });
  } finally {
    process.removeListener("SIGINT", onSigint);
    if (!options.quiet) process.stdout.write("\n");
  }
}

async function runMonitor(options: MonitorOptions, globals: GlobalOptions) {
  const { config, emr, session } = ensureSetup(globals);
  const timeoutMs = parseDuration(options.timeout ?? config.job.timeout);

  let clusterId = session.clusterId;
  if (!clusterId) {
    const cluster = await findClusterByName(emr, config.cluster.name);
    if (!cluster) {
      console.log(
        theme.muted(
          `\nThe cluster with name ${config.cluster.name} does not exist.`,
        ),
      );
      return;
    }
    console.log(theme.muted(`Found cluster ${cluster.id}, start monitoring.`));
    clusterId = cluster.id;
  }

  const result = await watchCluster(emr, clusterId, timeoutMs);
  console.log(
    theme.success(
      `Cluster terminated without error after ${formatDuration(result.elapsedMs)} (${result.steps.length} steps completed).`,
    ),
  );
}
