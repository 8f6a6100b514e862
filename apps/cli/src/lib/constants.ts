import { join } from "path";

// Project config, looked up relative to the working directory
export const CONFIG_FILE_NAME = "emr-spark.toml";
export const DEFAULT_CONFIG_PATH = join(process.cwd(), CONFIG_FILE_NAME);

// Environment overrides
export const CONFIG_ENV_VAR = "EMR_SPARK_CONFIG";
export const CLUSTER_ID_ENV_VAR = "EMR_SPARK_CLUSTER_ID";

// Monitor progress output
export const MONITOR_TICK_MARK = ".";
