import type { JiraContent } from "../types";

/**
 * Flattens an Atlassian Document Format description to plain text.
 * Text nodes of the same type are concatenated; a new node type starts a new line.
 */
export const extractTextFromJiraDescription = (json: JiraContent): string => {
  let text = "";
  let previousNodeType: string | null = null;

  json.content?.forEach((content) => {
    if (content.text) {
      text += (content.type === previousNodeType ? "" : "\n") + content.text;
      previousNodeType = content.type || null;
    }
    if (content.content) {
      text += extractTextFromJiraDescription(content);
    }
  });

  return text;
};

/**
 * Description as plain text, whether the API returned ADF (v3) or a string (v2)
 */
export const descriptionToText = (
  description: JiraContent | string | null | undefined
): string | undefined => {
  if (!description) {
    return undefined;
  }
  if (typeof description === "string") {
    return description;
  }
  return extractTextFromJiraDescription(description).trim() || undefined;
};
