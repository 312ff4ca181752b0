import type { JiraIssue, JiraNamedValue, RawRecord } from "../types";
import { descriptionToText } from "./jira-description-parser";

const nameOf = (value: JiraNamedValue | null | undefined): string | undefined =>
  value ? value.name : undefined;

/**
 * Flattens a Jira search issue into a raw record using the field names of a Jira CSV export,
 * so that API and file sources go through the same field aliases.
 * @param issue - Issue as returned by the search endpoint
 * @param rootCauseField - Custom field id holding the root cause, if the instance has one
 */
export function jiraIssueToRecord(
  issue: JiraIssue,
  rootCauseField?: string
): RawRecord {
  const { key, fields } = issue;
  const record: Record<string, unknown> = {
    Key: key,
    Summary: fields.summary,
    Description: descriptionToText(fields.description),
    Status: nameOf(fields.status),
    Priority: nameOf(fields.priority),
    "Issue Type": nameOf(fields.issuetype),
    Resolution: nameOf(fields.resolution),
    Project: fields.project ? fields.project.key : undefined,
    Assignee: fields.assignee ? fields.assignee.displayName : "Unassigned",
    Reporter: fields.reporter ? fields.reporter.displayName : undefined,
    Created: fields.created,
    Updated: fields.updated,
    Resolved: fields.resolutiondate ?? undefined,
    Labels: fields.labels && fields.labels.length > 0 ? fields.labels.join(", ") : undefined,
    Components:
      fields.components && fields.components.length > 0
        ? fields.components.map((component) => component.name).join(", ")
        : undefined,
  };

  if (rootCauseField) {
    record["Root Cause"] = fields[rootCauseField];
  }

  return Object.fromEntries(
    Object.entries(record).filter(([, value]) => value !== undefined && value !== null)
  );
}

/**
 * Whether a parsed JSON value looks like a Jira search response
 */
export function isJiraSearchResponse(
  value: unknown
): value is { issues: JiraIssue[] } {
  if (typeof value !== "object" || value === null || !("issues" in value)) {
    return false;
  }
  const { issues } = value;
  return (
    Array.isArray(issues) &&
    issues.every(
      (issue: unknown) =>
        typeof issue === "object" &&
        issue !== null &&
        "key" in issue &&
        "fields" in issue &&
        typeof issue.fields === "object"
    )
  );
}
