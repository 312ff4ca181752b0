import { JiraConfig, getJiraConfig } from "./jira.config";
import { AppConfig, getAppConfig } from "./app.config";
import { PipelineConfig, getPipelineConfig } from "./pipeline.config";
import { ConfigurationError } from "../utils/errors";

/**
 * Complete application configuration. Jira settings are only present when issues
 * are fetched from Jira.
 */
export interface Config {
  app: AppConfig;
  pipeline: PipelineConfig;
  jira?: JiraConfig;
}

/**
 * Re-export individual config interfaces for convenience
 */
export type { JiraConfig, AppConfig, PipelineConfig };

export interface GetConfigOptions {
  /** Path to a pipeline configuration JSON file */
  pipelineConfigPath?: string;
  /** Whether the Jira connection settings are required */
  useJira: boolean;
}

/**
 * Retrieves complete application configuration with validation
 * This is the main entry point for accessing configuration
 */
export function getConfig({ pipelineConfigPath, useJira }: GetConfigOptions): Config {
  const app = getAppConfig();

  return {
    app,
    // --config wins over PIPELINE_CONFIG_FILE
    pipeline: getPipelineConfig(pipelineConfigPath ?? app.pipelineConfigFile),
    jira: useJira ? getJiraConfig() : undefined,
  };
}

/**
 * Loads and validates all configuration needed for a run
 * Throws a ConfigurationError pointing at the .env file if anything is missing or invalid
 */
export function loadConfig(options: GetConfigOptions): Config {
  try {
    return getConfig(options);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      throw new ConfigurationError(
        `Configuration Error:\n${error.message}\n\n` +
          `Please check your .env file and pipeline config. See .env.example for reference.`,
        { cause: error }
      );
    }
    throw error;
  }
}
