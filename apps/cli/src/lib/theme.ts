import chalk from "chalk";
import { isActivatedState } from "@emr-spark/shared";

export const theme = {
  success: chalk.green,
  warning: chalk.yellow,
  error: chalk.red,
  info: chalk.blue,
  muted: chalk.gray,
  accent: chalk.cyan,
  emphasis: chalk.bold,
} as const;

export function formatSectionHeader(text: string): string {
  return theme.info(`\n${text}:`);
}

export function formatDetail(label: string, value: string): string {
  return theme.muted(`  ${label}: ${value}`);
}

export function formatCommand(command: string): string {
  return theme.accent(`  ${command}`);
}

/** Green while the cluster is up, yellow while it shuts down, red once gone. */
export function formatClusterState(state: string): string {
  if (isActivatedState(state)) return theme.success(state);
  if (state === "TERMINATING") return theme.warning(state);
  return theme.error(state);
}
