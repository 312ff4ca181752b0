import {
  validateRequired,
  isValidJiraUrl,
  getOptional,
  validateNumber,
} from "../utils/validation";
import { ConfigurationError } from "../utils/errors";

/**
 * Jira API configuration
 */
export interface JiraConfig {
  url: string;
  username: string;
  token: string;
  /** Page size for the search endpoint */
  maxResults: number;
  fields: string;
  /** Custom field holding the root cause, e.g. customfield_10100 */
  rootCauseField?: string;
}

/**
 * Retrieves and validates Jira configuration from environment variables
 */
export function getJiraConfig(): JiraConfig {
  const url = validateRequired("JIRA_URL", process.env.JIRA_URL);
  const username = validateRequired("JIRA_USERNAME", process.env.JIRA_USERNAME);
  const token = validateRequired("JIRA_TOKEN", process.env.JIRA_TOKEN);

  // Validate Jira URL format
  if (!isValidJiraUrl(url)) {
    throw new ConfigurationError(
      `Invalid JIRA_URL format: ${url}\n` +
        `Expected format: https://your-company.atlassian.net`
    );
  }

  const maxResults = validateNumber(
    "JIRA_MAX_RESULTS",
    getOptional(process.env.JIRA_MAX_RESULTS, "100"),
    { min: 1, integer: true }
  );

  const rootCauseField = getOptional(process.env.JIRA_ROOT_CAUSE_FIELD, "");

  const fields = [
    "summary",
    "description",
    "status",
    "priority",
    "issuetype",
    "resolution",
    "project",
    "assignee",
    "reporter",
    "created",
    "updated",
    "resolutiondate",
    "labels",
    "components",
    ...(rootCauseField ? [rootCauseField] : []),
  ].join(",");

  return {
    url: url.replace(/\/+$/, ""),
    username,
    token,
    maxResults,
    fields,
    rootCauseField: rootCauseField || undefined,
  };
}
