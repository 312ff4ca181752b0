import axios, { AxiosError } from "axios";
import type { JiraConfig } from "../config/config";
import type { JiraIssue, JiraSearchPage, RawRecord } from "../types";
import { jiraIssueToRecord } from "../utils/jira-record-mapper";
import { ConfigurationError, SourceError } from "../utils/errors";
import { logger } from "../utils/logger";

/**
 * Parameters for building an issue query
 */
export interface IssueQueryParams {
  /** Project key, e.g. "CS" */
  project?: string;
  /** Inclusive lower bound on created date (YYYY-MM-DD) */
  from?: string;
  /** Inclusive upper bound on created date (YYYY-MM-DD) */
  to?: string;
  /** Raw JQL; wins over the other parameters */
  jql?: string;
}

/**
 * Safety cap on pages fetched for one query
 */
const MAX_PAGES = 1000;

/**
 * Service class for reading issues from the Jira API
 */
export class JiraService {
  private readonly headers: { Authorization: string; Accept: string };

  constructor(private readonly config: JiraConfig) {
    this.headers = {
      Authorization: `Basic ${Buffer.from(
        `${this.config.username}:${this.config.token}`
      ).toString("base64")}`,
      Accept: "application/json",
    };
  }

  /**
   * Builds the JQL for a project and created-date range
   * @returns JQL query string ordered by creation date
   */
  buildJql({ project, from, to, jql }: IssueQueryParams): string {
    if (jql) {
      return jql;
    }

    const clauses: string[] = [];
    if (project) {
      clauses.push(`project = "${project}"`);
    }
    if (from) {
      clauses.push(`created >= "${from}"`);
    }
    if (to) {
      clauses.push(`created <= "${to} 23:59"`);
    }
    if (clauses.length === 0) {
      throw new ConfigurationError(
        "A project, a date range or a JQL query is required to fetch from Jira"
      );
    }

    return `${clauses.join(" AND ")} ORDER BY created ASC`;
  }

  /**
   * Fetches one page of issues for a JQL query
   * @throws {SourceError} When the API request fails
   */
  private async fetchPage(
    jql: string,
    nextPageToken?: string
  ): Promise<JiraSearchPage> {
    const url = `${this.config.url}/rest/api/3/search/jql`;

    try {
      const response = await axios.get<JiraSearchPage>(url, {
        headers: this.headers,
        params: {
          jql,
          maxResults: this.config.maxResults,
          fields: this.config.fields,
          ...(nextPageToken ? { nextPageToken } : {}),
        },
      });
      return response.data;
    } catch (error) {
      if (error instanceof AxiosError) {
        const status = error.response ? ` (HTTP ${error.response.status})` : "";
        throw new SourceError(`Jira search failed${status}: ${error.message}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  /**
   * Fetches every issue matching a JQL query, following page tokens
   */
  async fetchIssues(jql: string): Promise<JiraIssue[]> {
    const issues: JiraIssue[] = [];
    let nextPageToken: string | undefined;

    for (let page = 0; page < MAX_PAGES; page++) {
      const result = await this.fetchPage(jql, nextPageToken);
      issues.push(...result.issues);
      logger.debug(`Fetched page ${page + 1} (${issues.length} issues so far)`);

      if (result.isLast === true || !result.nextPageToken) {
        return issues;
      }
      nextPageToken = result.nextPageToken;
    }

    logger.warn(`Stopped after ${MAX_PAGES} pages; results may be incomplete`);
    return issues;
  }

  /**
   * Fetches issues and flattens them into raw records for the pipeline
   * @param params - Project, created-date range or raw JQL
   */
  async fetchRawRecords(params: IssueQueryParams): Promise<RawRecord[]> {
    const jql = this.buildJql(params);
    logger.info(`Querying Jira: ${jql}`);

    const issues = await this.fetchIssues(jql);
    return issues.map((issue) =>
      jiraIssueToRecord(issue, this.config.rootCauseField)
    );
  }
}
