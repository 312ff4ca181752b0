import { getOptional } from "../utils/validation";

/**
 * Application configuration
 */
export interface AppConfig {
  /** Directory reports are written to */
  dataDirectory: string;
  /** Pipeline configuration JSON named by PIPELINE_CONFIG_FILE */
  pipelineConfigFile?: string;
}

/**
 * Retrieves application configuration from environment variables
 */
export function getAppConfig(): AppConfig {
  const pipelineConfigFile = getOptional(process.env.PIPELINE_CONFIG_FILE, "");

  return {
    dataDirectory: getOptional(process.env.DATA_DIRECTORY, "./data"),
    pipelineConfigFile: pipelineConfigFile || undefined,
  };
}
