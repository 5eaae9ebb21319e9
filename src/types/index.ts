/**
 * Type definitions for the repository analyzer
 */

// ============================================
// Repository
// ============================================

export interface RepositoryRef {
  owner: string;
  name: string;
}

// ============================================
// Normalized records (Extraction Layer output)
// ============================================

export type IssueState = 'open' | 'closed';

export interface Issue {
  number: number;
  title: string;
  state: IssueState;
  labels: string[];
  created_at: string | null;
  updated_at: string | null;
  closed_at: string | null;
  author: string | null;
  assignees: string[];
  comment_count: number;
  body_preview: string;
  url: string;
  milestone: string | null;
}

export interface PullRequest {
  number: number;
  title: string;
  state: IssueState;
  author: string | null;
  created_at: string | null;
  updated_at: string | null;
  merged_at: string | null;
  closed_at: string | null;
  labels: string[];
  is_draft: boolean;
  url: string;
  body_preview: string;
  assignees: string[];
  requested_reviewers: string[];
  head_ref: string | null;
  base_ref: string | null;
}

export interface DirectoryEntry {
  name: string;
  path: string;
  type: 'dir';
}

export interface FileRef {
  name: string;
  path: string;
}

// ============================================
// Repository exploration
// ============================================

export type ServiceKind = 'api' | 'webapp' | 'library' | 'service' | 'unknown';

export interface Service {
  name: string;
  description: string;
  technologies: string[];
  dependencies: string[];
  kind: ServiceKind;
  port: string | null;
}

export interface ServiceConnection {
  from: string;
  to: string;
  method: string;
}

export interface ArchitecturePatterns {
  shared_technologies?: string[];
  communication_styles?: string[];
  architecture_pattern?: string;
}

export interface ArchitectureAnalysis {
  overview: string;
  connections: ServiceConnection[];
  patterns: ArchitecturePatterns;
  tech_stack: string[];
}

export type MetadataFileInfo =
  | { exists: true; path: string; content_preview: string }
  | { exists: false };

export type MetadataFileCategory = 'license' | 'contributing' | 'code_of_conduct' | 'security' | 'changelog';

export interface RepositoryMetadata extends Record<MetadataFileCategory, MetadataFileInfo> {
  ci_cd_workflows: FileRef[];
  docker_support: {
    dockerfile: boolean;
    docker_compose: boolean;
  };
  documentation: {
    has_docs_folder: boolean;
  };
  testing: {
    has_test_directory: boolean;
  };
}

export interface RepositoryExplorerResult {
  repository: RepositoryRef & { url: string };
  overview: string;
  metadata: RepositoryMetadata;
  services: Service[];
  connections: ServiceConnection[];
  patterns: ArchitecturePatterns;
  tech_stack: string[];
}

// ============================================
// Issue aggregation
// ============================================

export interface IssueTypeCounts {
  bugs: number;
  features: number;
  documentation: number;
}

/**
 * One counted key. Counts are kept as ordered lists rather than objects,
 * whose integer-like keys would be reordered.
 */
export interface CountEntry {
  name: string;
  count: number;
}

export interface DirectMetadata {
  labels: CountEntry[];
  top_issue_creators: CountEntry[];
  top_pr_creators: CountEntry[];
  top_assignees: CountEntry[];
  milestones: CountEntry[];
  issue_counts_by_type: IssueTypeCounts;
}

export interface DiscussedIssue {
  number: number;
  title: string;
  comments: number;
}

export interface RecentlyActiveIssue {
  number: number;
  title: string;
  updated_at: string | null;
}

export interface PullRequestStatistics {
  total: number;
  open: number;
  merged: number;
  draft: number;
  with_assignees: number;
}

export interface IssueStatistics {
  most_discussed_issues: DiscussedIssue[];
  label_distribution: CountEntry[];
  milestone_distribution: CountEntry[];
  pr_statistics: PullRequestStatistics;
}

export interface IssueInsights {
  highly_discussed_issues: DiscussedIssue[];
  recently_active_issues: RecentlyActiveIssue[];
  unassigned_open_issues_count: number;
  draft_prs_count: number;
  prs_awaiting_review_count: number;
  most_used_labels: string[];
}

export interface IssuesSummary {
  total_issues: number;
  total_open_issues: number;
  total_closed_issues: number;
  total_prs: number;
  open_prs: number;
  merged_prs: number;
}

// Alternate LLM-backed outputs, not part of the default report

export type IssueCategory = 'bugs' | 'features' | 'enhancements' | 'documentation' | 'questions' | 'other';

export interface CategorizedIssueRef {
  number: number;
  title: string;
  priority?: string;
  status?: string;
}

export type CategorizedIssues = Record<IssueCategory, CategorizedIssueRef[]>;

export interface IssuePatterns {
  common_bug_areas: string[];
  frequent_feature_requests: string[];
  pain_points: string[];
  improvement_opportunities: string[];
}

export interface LlmIssueMetadata {
  code_owners: string[];
  active_contributors: string[];
  affected_services: string[];
  common_technologies: string[];
  issue_labels: Record<string, number>;
  common_issue_themes: string[];
}

export interface ActivityPreview {
  number: number;
  title: string;
  created_at: string | null;
}

export interface RecentActivity {
  recent_issues: ActivityPreview[];
  recent_prs: ActivityPreview[];
}

export interface LlmIssueInsights {
  categories: CategorizedIssues;
  patterns: IssuePatterns;
  metadata: LlmIssueMetadata;
}

export interface IssuesAnalyzerResult {
  summary: IssuesSummary;
  metadata: DirectMetadata;
  statistics: IssueStatistics;
  insights: IssueInsights;
  recent_issues: Issue[];
  recent_prs: PullRequest[];
  llm_insights?: LlmIssueInsights;
}

// ============================================
// Pipeline
// ============================================

export type AnalysisStatus = 'initialized' | 'repository_explored' | 'issues_analyzed' | 'completed';

export interface AnalysisMetadata {
  analyzed_at: string;
  repository: RepositoryRef;
  analyzer_version: string;
}

export interface CombinedReport {
  analysis_metadata: AnalysisMetadata;
  repository: RepositoryExplorerResult;
  issues: IssuesAnalyzerResult;
}

export interface AnalysisState {
  readonly repository: RepositoryRef;
  readonly repository_analysis: RepositoryExplorerResult | null;
  readonly issues_analysis: IssuesAnalyzerResult | null;
  readonly final_output: CombinedReport | null;
  readonly status: AnalysisStatus;
}
