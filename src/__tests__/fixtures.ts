/**
 * Minimal analysis results for tests that only pass them through
 */

import { CombinedReport, IssuesAnalyzerResult, RepositoryExplorerResult, RepositoryRef } from '../types';

export function emptyExploration(repository: RepositoryRef): RepositoryExplorerResult {
  return {
    repository: { ...repository, url: `https://github.com/${repository.owner}/${repository.name}` },
    overview: 'An online shop',
    metadata: {
      license: { exists: false },
      contributing: { exists: false },
      code_of_conduct: { exists: false },
      security: { exists: false },
      changelog: { exists: false },
      ci_cd_workflows: [],
      docker_support: { dockerfile: false, docker_compose: false },
      documentation: { has_docs_folder: false },
      testing: { has_test_directory: false },
    },
    services: [],
    connections: [],
    patterns: {},
    tech_stack: [],
  };
}

export function emptyIssuesResult(): IssuesAnalyzerResult {
  return {
    summary: { total_issues: 0, total_open_issues: 0, total_closed_issues: 0, total_prs: 0, open_prs: 0, merged_prs: 0 },
    metadata: {
      labels: [],
      top_issue_creators: [],
      top_pr_creators: [],
      top_assignees: [],
      milestones: [],
      issue_counts_by_type: { bugs: 0, features: 0, documentation: 0 },
    },
    statistics: {
      most_discussed_issues: [],
      label_distribution: [],
      milestone_distribution: [],
      pr_statistics: { total: 0, open: 0, merged: 0, draft: 0, with_assignees: 0 },
    },
    insights: {
      highly_discussed_issues: [],
      recently_active_issues: [],
      unassigned_open_issues_count: 0,
      draft_prs_count: 0,
      prs_awaiting_review_count: 0,
      most_used_labels: [],
    },
    recent_issues: [],
    recent_prs: [],
  };
}

export function sampleReport(repository: RepositoryRef, analyzedAt: string): CombinedReport {
  return {
    analysis_metadata: { analyzed_at: analyzedAt, repository, analyzer_version: '1.0.0' },
    repository: emptyExploration(repository),
    issues: emptyIssuesResult(),
  };
}
