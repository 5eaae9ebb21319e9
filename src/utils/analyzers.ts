/**
 * Issue and pull request aggregation
 * Pure functions over normalized records. Sorts are stable, so ties keep
 * the order in which keys or records first appeared.
 */

import {
  ActivityPreview,
  CategorizedIssueRef,
  CategorizedIssues,
  CountEntry,
  DirectMetadata,
  DiscussedIssue,
  Issue,
  IssueInsights,
  IssueStatistics,
  PullRequest,
  RecentActivity,
} from '../types/index.js';

export const TOP_LABELS = 20;
export const TOP_USERS = 10;
export const TOP_ISSUES = 10;
export const HIGHLY_DISCUSSED_THRESHOLD = 5;

/**
 * Count occurrences, keeping keys in first-appearance order
 */
export function countOccurrences(values: Iterable<string>): Map<string, number> {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return counts;
}

export function toCountEntries(counts: Map<string, number>): CountEntry[] {
  return [...counts].map(([name, count]) => ({ name, count }));
}

/**
 * Sort counts descending (stable) and keep the first `limit` entries
 */
export function rankCounts(counts: Map<string, number>, limit?: number): CountEntry[] {
  const ranked = toCountEntries(counts).sort((a, b) => b.count - a.count);
  return limit === undefined ? ranked : ranked.slice(0, limit);
}

export function countLabels(issues: Issue[]): Map<string, number> {
  return countOccurrences(issues.flatMap((issue) => issue.labels));
}

function countMilestones(issues: Issue[]): CountEntry[] {
  const milestones: string[] = [];
  for (const issue of issues) {
    if (issue.milestone) milestones.push(issue.milestone);
  }
  return toCountEntries(countOccurrences(milestones));
}

function countAuthors(records: Array<{ author: string | null }>): Map<string, number> {
  const authors: string[] = [];
  for (const record of records) {
    if (record.author) authors.push(record.author);
  }
  return countOccurrences(authors);
}

function hasLabelContaining(issue: Issue, ...needles: string[]): boolean {
  return issue.labels.some((label) => {
    const lower = label.toLowerCase();
    return needles.some((needle) => lower.includes(needle));
  });
}

function byCommentsDescending(issues: Issue[]): Issue[] {
  return [...issues].sort((a, b) => b.comment_count - a.comment_count);
}

function toDiscussed(issue: Issue): DiscussedIssue {
  return { number: issue.number, title: issue.title, comments: issue.comment_count };
}

/**
 * Extract metadata directly from issues without an LLM
 */
export function extractDirectMetadata(issues: Issue[], prs: PullRequest[]): DirectMetadata {
  const assignees = [
    ...issues.flatMap((issue) => issue.assignees),
    ...prs.flatMap((pr) => pr.assignees),
  ];

  return {
    labels: rankCounts(countLabels(issues), TOP_LABELS),
    top_issue_creators: rankCounts(countAuthors(issues), TOP_USERS),
    top_pr_creators: rankCounts(countAuthors(prs), TOP_USERS),
    top_assignees: rankCounts(countOccurrences(assignees), TOP_USERS),
    milestones: countMilestones(issues),
    issue_counts_by_type: {
      bugs: issues.filter((issue) => hasLabelContaining(issue, 'bug')).length,
      features: issues.filter((issue) => hasLabelContaining(issue, 'feature', 'enhancement')).length,
      documentation: issues.filter((issue) => hasLabelContaining(issue, 'doc')).length,
    },
  };
}

/**
 * Calculate statistics from issues and PRs
 */
export function calculateStatistics(issues: Issue[], prs: PullRequest[]): IssueStatistics {
  const discussed = byCommentsDescending(issues.filter((issue) => issue.comment_count > 0));

  return {
    most_discussed_issues: discussed.slice(0, TOP_ISSUES).map(toDiscussed),
    label_distribution: rankCounts(countLabels(issues)),
    milestone_distribution: countMilestones(issues),
    pr_statistics: {
      total: prs.length,
      open: prs.filter((pr) => pr.state === 'open').length,
      merged: prs.filter((pr) => pr.merged_at !== null).length,
      draft: prs.filter((pr) => pr.is_draft).length,
      with_assignees: prs.filter((pr) => pr.assignees.length > 0).length,
    },
  };
}

/**
 * Extract insights from issues, PRs and the direct metadata
 */
export function extractInsights(issues: Issue[], prs: PullRequest[], metadata: DirectMetadata): IssueInsights {
  const highlyDiscussed = byCommentsDescending(
    issues.filter((issue) => issue.comment_count > HIGHLY_DISCUSSED_THRESHOLD)
  );

  // ISO-8601 timestamps order correctly as strings
  const recentlyActive = [...issues].sort((a, b) => {
    const left = a.updated_at ?? '';
    const right = b.updated_at ?? '';
    return left < right ? 1 : left > right ? -1 : 0;
  });

  return {
    highly_discussed_issues: highlyDiscussed.slice(0, TOP_ISSUES).map(toDiscussed),
    recently_active_issues: recentlyActive.slice(0, TOP_ISSUES).map((issue) => ({
      number: issue.number,
      title: issue.title,
      updated_at: issue.updated_at,
    })),
    unassigned_open_issues_count: issues.filter(
      (issue) => issue.state === 'open' && issue.assignees.length === 0
    ).length,
    draft_prs_count: prs.filter((pr) => pr.is_draft).length,
    prs_awaiting_review_count: prs.filter(
      (pr) => pr.state === 'open' && pr.requested_reviewers.length === 0
    ).length,
    most_used_labels: metadata.labels.slice(0, TOP_ISSUES).map((entry) => entry.name),
  };
}

/**
 * Label-based categorization, used when LLM categorization is unavailable.
 * Matches whole label names, case-insensitively; the first matching bucket wins.
 */
export function categorizeByLabels(issues: Issue[]): CategorizedIssues {
  const categories: CategorizedIssues = {
    bugs: [],
    features: [],
    enhancements: [],
    documentation: [],
    questions: [],
    other: [],
  };

  for (const issue of issues) {
    const labels = issue.labels.map((label) => label.toLowerCase());
    const has = (...names: string[]) => names.some((name) => labels.includes(name));
    const ref: CategorizedIssueRef = { number: issue.number, title: issue.title };

    if (has('bug', 'defect', 'error')) {
      categories.bugs.push(ref);
    } else if (has('feature', 'enhancement')) {
      categories.features.push(ref);
    } else if (has('documentation', 'docs')) {
      categories.documentation.push(ref);
    } else if (has('question')) {
      categories.questions.push(ref);
    } else {
      categories.other.push(ref);
    }
  }

  return categories;
}

/**
 * Top contributors across issues and PRs, most active first
 */
export function topContributors(issues: Issue[], prs: PullRequest[], limit: number): Array<[string, number]> {
  const counts = countAuthors([...issues, ...prs]);
  return rankCounts(counts, limit).map((entry): [string, number] => [entry.name, entry.count]);
}

function toActivity(record: { number: number; title: string; created_at: string | null }): ActivityPreview {
  return { number: record.number, title: record.title, created_at: record.created_at };
}

/**
 * Get recent activity summary
 */
export function getRecentActivity(issues: Issue[], prs: PullRequest[]): RecentActivity {
  return {
    recent_issues: issues.map(toActivity),
    recent_prs: prs.map(toActivity),
  };
}
